/**
 * In-process stand-ins for toolchains and the process runner.
 */

import { mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { getConfig, resetConfig, type FusionConfig } from '../../src/config.js';
import { createAdapter, marshalSnapshot, type MarshalAdapter } from '../../src/executors/marshal.js';
import type { ProcessRequest, ProcessResult, ProcessRunner } from '../../src/executors/process.js';
import { renderStub } from '../../src/executors/stub.js';
import type { SubprocessLanguage } from '../../src/executors/toolchains.js';
import type { ExecuteOptions, ExecutionOutcome, SubprocessExecutor } from '../../src/executors/types.js';
import type { EnvironmentSnapshot } from '../../src/runtime/environment.js';

export interface TestDirs {
  sandboxDir: string;
  logDir: string;
  config: FusionConfig;
  cleanup(): Promise<void>;
}

/** Point the config at fresh temp directories. */
export async function useTestConfig(env: Record<string, string> = {}): Promise<TestDirs> {
  const id = randomUUID().slice(0, 8);
  const sandboxDir = join(tmpdir(), `fusion-test-sandbox-${id}`);
  const logDir = join(tmpdir(), `fusion-test-logs-${id}`);
  await mkdir(sandboxDir, { recursive: true });
  await mkdir(logDir, { recursive: true });

  process.env.FUSION_SANDBOX_DIR = sandboxDir;
  process.env.FUSION_LOG_DIR = logDir;
  for (const [key, value] of Object.entries(env)) process.env[key] = value;
  resetConfig();

  return {
    sandboxDir,
    logDir,
    config: getConfig(),
    async cleanup() {
      delete process.env.FUSION_SANDBOX_DIR;
      delete process.env.FUSION_LOG_DIR;
      for (const key of Object.keys(env)) delete process.env[key];
      resetConfig();
      await rm(sandboxDir, { recursive: true, force: true });
      await rm(logDir, { recursive: true, force: true });
    },
  };
}

export function processResult(overrides: Partial<ProcessResult> = {}): ProcessResult {
  return { stdout: '', stderr: '', exitCode: 0, durationMs: 1, timedOut: false, truncated: false, ...overrides };
}

export interface RecordingRunner {
  runner: ProcessRunner;
  requests: ProcessRequest[];
}

/** Runner that records each request and answers through `answer`. */
export function recordingRunner(answer: (request: ProcessRequest) => ProcessResult | Promise<ProcessResult>): RecordingRunner {
  const requests: ProcessRequest[] = [];
  return {
    requests,
    runner: async (request) => {
      requests.push(request);
      return answer(request);
    },
  };
}

export interface ExecutedBlock {
  code: string;
  declarations: string[];
}

/**
 * Subprocess executor that never spawns: it records the resolved code and
 * the declarations it would have compiled, and answers with `respond`.
 */
export class FakeToolchainExecutor implements SubprocessExecutor {
  readonly kind = 'subprocess';
  readonly adapter: MarshalAdapter;
  readonly executed: ExecutedBlock[] = [];

  constructor(
    readonly language: SubprocessLanguage,
    private readonly options: {
      available?: boolean;
      respond?: (block: ExecutedBlock) => Partial<ExecutionOutcome>;
    } = {},
  ) {
    this.adapter = createAdapter(language);
  }

  async available(): Promise<boolean> {
    return this.options.available ?? true;
  }

  stub(code: string): ExecutionOutcome {
    return renderStub(this.language, code);
  }

  async execute(code: string, snapshot: EnvironmentSnapshot, options: ExecuteOptions): Promise<ExecutionOutcome> {
    const block = { code, declarations: marshalSnapshot(this.adapter, snapshot, options.location) };
    this.executed.push(block);
    return {
      status: 'ok',
      stdout: '',
      stderr: '',
      exitCode: 0,
      durationMs: 1,
      truncated: false,
      ...this.options.respond?.(block),
    };
  }
}
