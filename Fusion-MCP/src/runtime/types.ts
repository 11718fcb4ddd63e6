/**
 * Result types of one dispatcher run.
 */

import type { ErrorRecord } from '@fusion/shared/Types/errors.js';
import type { OutcomeStatus } from '../executors/types.js';
import type { LanguageTag } from '../languages.js';
import type { SecurityReport } from '../security/types.js';
import type { Diagnostic } from '../source/types.js';

export type BlockStatus = OutcomeStatus | 'skipped';

export interface BlockResult {
  index: number;
  line: number;
  language: LanguageTag;
  status: BlockStatus;
  stdout: string;
  stderr: string;
  exitCode: number | null;
  durationMs: number;
  truncated: boolean;
  /** printf calls replaced before the block ran. */
  printfResolved: number;
  error?: ErrorRecord;
}

export interface RunStats {
  blocksByLanguage: Partial<Record<LanguageTag, number>>;
  /** Blocks that finished ok, with an error, or by timing out. */
  executed: number;
  durationMs: number;
  /** Final sizes of the environment tables. */
  variables: number;
  functions: number;
  modules: number;
}

export interface ExecutionResult {
  runId: string;
  status: 'completed' | 'halted';
  exitCode: 0 | 1;
  /** Every block's stdout, concatenated in block order. */
  output: string;
  blocks: BlockResult[];
  diagnostics: Diagnostic[];
  stats: RunStats;
  /** The fatal error, when the run halted. */
  haltedAt?: { blockIndex: number; line: number; error: ErrorRecord };
}

export interface RunOptions {
  /** Scan of the same program; a blocked or foreign report stops the run. */
  report: SecurityReport;
  /** Per-block budget, in ms. */
  timeoutMs: number;
  signal?: AbortSignal;
  /** Missing toolchains halt the run instead of selecting stub output. */
  strictToolchains?: boolean;
  /** Seed for the native `random` module. */
  seed?: number;
  runId?: string;
}
