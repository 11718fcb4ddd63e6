/**
 * ID generators using Node's built-in crypto.
 */

import { randomUUID } from 'node:crypto';

function shortId(): string {
  return randomUUID().replace(/-/g, '').slice(0, 12);
}

export function generateRunId(): string {
  return `run_${shortId()}`;
}

/** Name of the scratch directory one block executes in. */
export function generateWorkDirName(): string {
  return `blk_${shortId()}`;
}
