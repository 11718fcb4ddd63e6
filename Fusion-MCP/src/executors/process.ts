/**
 * Child process runner for toolchain steps.
 *
 * Spawns one command with:
 * - Stripped environment (no API keys/tokens)
 * - ulimit process and file-size limits
 * - Timeout enforcement (SIGTERM → 5s grace → SIGKILL)
 * - Output capture and head+tail truncation
 * - Cancellation through an AbortSignal
 */

import { spawn } from 'node:child_process';
import { getConfig, getStrippedEnv, type FusionConfig } from '../config.js';
import { RunCancelledError, type SourceLocation } from '../errors.js';
import { truncateOutput } from '../utils/output-truncate.js';

export interface ProcessRequest {
  command: string;
  args: readonly string[];
  cwd: string;
  timeoutMs: number;
  signal?: AbortSignal;
  /** Attached to the RunCancelledError raised on abort. */
  location?: SourceLocation;
}

export interface ProcessResult {
  stdout: string;
  stderr: string;
  /** `null` when the process was killed by a signal. */
  exitCode: number | null;
  durationMs: number;
  timedOut: boolean;
  truncated: boolean;
}

export type ProcessRunner = (request: ProcessRequest) => Promise<ProcessResult>;

export const SIGKILL_GRACE_MS = 5_000;

export function shellQuote(arg: string): string {
  return /^[A-Za-z0-9_./=:+-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`;
}

/** Build ulimit prefix for resource constraints. bash counts -f in 1024-byte blocks. */
function getUlimitPrefix(config: FusionConfig): string {
  const maxFileBlocks = Math.floor(config.maxFileSizeBytes / 1024);
  return `ulimit -u ${config.maxProcesses} -f ${maxFileBlocks}`;
}

/** Wrap the command in bash so the limits apply to it and its children. */
function getCommand(config: FusionConfig, command: string, args: readonly string[]): [string, string[]] {
  const line = [command, ...args].map(shellQuote).join(' ');
  return ['bash', ['-c', `${getUlimitPrefix(config)} && exec ${line}`]];
}

export const runProcess: ProcessRunner = (request) => {
  const config = getConfig();
  const { signal } = request;

  if (signal?.aborted) {
    return Promise.reject(new RunCancelledError(request.location));
  }

  const [cmd, args] = getCommand(config, request.command, request.args);
  const startTime = Date.now();

  return new Promise<ProcessResult>((resolve, reject) => {
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let timedOut = false;
    let cancelled = false;
    let killTimer: ReturnType<typeof setTimeout> | null = null;
    let settled = false;

    const child = spawn(cmd, args, {
      cwd: request.cwd,
      env: getStrippedEnv(),
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    child.stdout.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

    const terminate = (): void => {
      child.kill('SIGTERM');
      // Grace period, then SIGKILL
      killTimer ??= setTimeout(() => {
        if (child.exitCode === null && child.signalCode === null) child.kill('SIGKILL');
      }, SIGKILL_GRACE_MS);
    };

    const onAbort = (): void => {
      cancelled = true;
      terminate();
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    const timeoutTimer = setTimeout(() => {
      timedOut = true;
      terminate();
    }, request.timeoutMs);

    const finish = (): void => {
      settled = true;
      clearTimeout(timeoutTimer);
      if (killTimer) clearTimeout(killTimer);
      signal?.removeEventListener('abort', onAbort);
    };

    // Spawn errors (e.g. bash missing)
    child.on('error', (err) => {
      if (settled) return;
      finish();
      resolve({
        stdout: '',
        stderr: err.message,
        exitCode: 127,
        durationMs: Date.now() - startTime,
        timedOut: false,
        truncated: false,
      });
    });

    child.on('close', (code) => {
      if (settled) return;
      finish();

      if (cancelled) {
        reject(new RunCancelledError(request.location));
        return;
      }

      const truncConfig = {
        maxChars: config.maxOutputChars,
        head: config.truncationHead,
        tail: config.truncationTail,
      };
      const stdoutResult = truncateOutput(Buffer.concat(stdoutChunks).toString('utf-8'), truncConfig);
      const stderrResult = truncateOutput(Buffer.concat(stderrChunks).toString('utf-8'), truncConfig);

      resolve({
        stdout: stdoutResult.text,
        stderr: stderrResult.text,
        exitCode: code,
        durationMs: Date.now() - startTime,
        timedOut,
        truncated: stdoutResult.truncated || stderrResult.truncated,
      });
    });
  });
};
