/**
 * JSONL log writer.
 *
 * - logRun(): daily rotation for dispatcher runs
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { getConfig } from '../config.js';
import type { RunLogEntry } from './types.js';
import { Logger } from '@fusion/shared/Utils/logger.js';

const logger = new Logger('fusion:log');

/**
 * Append a run log entry to the daily JSONL file. Failures are logged, not thrown.
 */
export async function logRun(entry: RunLogEntry, logDir: string = getConfig().logDir): Promise<void> {
  const date = entry.executed_at.slice(0, 10); // YYYY-MM-DD
  const filepath = join(logDir, `runs-${date}.jsonl`);

  const line = JSON.stringify(entry) + '\n';

  try {
    await mkdir(logDir, { recursive: true });
    await appendFile(filepath, line, 'utf-8');
  } catch (err) {
    logger.error('Failed to write run log', { filepath, error: err });
  }
}
