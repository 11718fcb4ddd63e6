/**
 * Language executor contract.
 */

import type { SourceLocation } from '../errors.js';
import type { LanguageTag } from '../languages.js';
import type { EnvironmentSnapshot, ExecutionEnvironment } from '../runtime/environment.js';
import type { MarshalAdapter } from './marshal.js';

export type OutcomeStatus = 'ok' | 'error' | 'timeout' | 'stubbed';

export interface ExecutionOutcome {
  status: OutcomeStatus;
  stdout: string;
  stderr: string;
  exitCode: number | null;
  durationMs: number;
  truncated: boolean;
  /** Names the block bound or rebound. Only the native executor reports them. */
  defined?: string[];
  /** Block-relative line of a native failure. */
  errorLine?: number;
}

export interface ExecuteOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  /** Where the block sits in the source, for errors raised while executing it. */
  location?: SourceLocation;
}

interface ExecutorBase {
  readonly language: LanguageTag;
  available(): Promise<boolean>;
}

/** Runs in-process and mutates the environment it is given. */
export interface NativeExecutor extends ExecutorBase {
  readonly kind: 'native';
  execute(code: string, env: ExecutionEnvironment, options: ExecuteOptions): Promise<ExecutionOutcome>;
}

/** Runs a toolchain in a child process against a read-only snapshot. */
export interface SubprocessExecutor extends ExecutorBase {
  readonly kind: 'subprocess';
  /** Renders printf replacements and marshalled declarations. */
  readonly adapter: MarshalAdapter;
  execute(code: string, snapshot: EnvironmentSnapshot, options: ExecuteOptions): Promise<ExecutionOutcome>;
  /** Output used in place of execution when the toolchain is missing. */
  stub(code: string): ExecutionOutcome;
}

export type LanguageExecutor = NativeExecutor | SubprocessExecutor;
