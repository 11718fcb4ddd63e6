/**
 * Log entry types for JSONL logging.
 *
 * - RunLogEntry: one dispatcher run (daily rotation)
 */

import type { SecurityLevel } from '../config.js';
import type { LanguageTag } from '../languages.js';
import type { BlockStatus } from '../runtime/types.js';

export interface RunBlockLogEntry {
  index: number;
  line: number;
  language: LanguageTag;
  status: BlockStatus;
  exit_code: number | null;
  duration_ms: number;
  stdout: string;
  stderr: string;
}

export interface RunLogEntry {
  type: 'run';
  run_id: string;
  source_hash: string;
  program_name: string | null;
  security_level: SecurityLevel;
  status: 'completed' | 'halted';
  exit_code: 0 | 1;
  blocks: RunBlockLogEntry[];
  diagnostics: number;
  duration_ms: number;
  executed_at: string;
}
