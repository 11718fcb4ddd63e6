/**
 * Subprocess executor: one toolchain, one scratch directory per block.
 */

import { mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Logger } from '@fusion/shared/Utils/logger.js';
import { getConfig, type FusionConfig } from '../config.js';
import type { EnvironmentSnapshot } from '../runtime/environment.js';
import { generateWorkDirName } from '../utils/id-generator.js';
import { createAdapter, marshalSnapshot, type MarshalAdapter } from './marshal.js';
import { runProcess, type ProcessRunner } from './process.js';
import { renderStub } from './stub.js';
import { TOOLCHAINS, type SubprocessLanguage, type Toolchain } from './toolchains.js';
import type { ExecuteOptions, ExecutionOutcome, SubprocessExecutor } from './types.js';

const logger = new Logger('fusion:exec');

const CHECK_TIMEOUT_MS = 10_000;

export interface ToolchainExecutorOptions {
  config?: FusionConfig;
  runner?: ProcessRunner;
}

export class ToolchainExecutor implements SubprocessExecutor {
  readonly kind = 'subprocess';
  readonly language: SubprocessLanguage;
  readonly adapter: MarshalAdapter;
  private readonly toolchain: Toolchain;
  private readonly config: FusionConfig;
  private readonly runner: ProcessRunner;
  private availability: Promise<boolean> | null = null;

  constructor(language: SubprocessLanguage, options: ToolchainExecutorOptions = {}) {
    this.language = language;
    this.toolchain = TOOLCHAINS[language];
    this.adapter = createAdapter(language);
    this.config = options.config ?? getConfig();
    this.runner = options.runner ?? runProcess;
  }

  /** Ask every tool for its version once; the answer is cached for the executor's lifetime. */
  available(): Promise<boolean> {
    this.availability ??= this.checkTools();
    return this.availability;
  }

  private async checkTools(): Promise<boolean> {
    for (const tool of this.toolchain.tools) {
      const command = this.config.toolchains[tool];
      const result = await this.runner({
        command,
        args: this.toolchain.versionArgs,
        cwd: tmpdir(),
        timeoutMs: CHECK_TIMEOUT_MS,
      });
      if (result.exitCode !== 0 || result.timedOut) {
        logger.info('Toolchain unavailable', { language: this.language, command, exitCode: result.exitCode });
        return false;
      }
    }
    logger.debug('Toolchain available', { language: this.language });
    return true;
  }

  stub(code: string): ExecutionOutcome {
    return renderStub(this.language, code);
  }

  async execute(code: string, snapshot: EnvironmentSnapshot, options: ExecuteOptions): Promise<ExecutionOutcome> {
    const declarations = marshalSnapshot(this.adapter, snapshot, options.location);
    const file = this.toolchain.render(code, declarations);

    const workDir = join(this.config.sandboxDir, generateWorkDirName());
    await mkdir(workDir, { recursive: true });

    try {
      await writeFile(join(workDir, file.name), file.content, 'utf-8');

      let stdout = '';
      let stderr = '';
      let durationMs = 0;
      let truncated = false;

      for (const step of this.toolchain.steps(file, this.config.toolchains)) {
        const timeoutMs = step.phase === 'compile' ? this.config.compileTimeoutMs : options.timeoutMs;
        const result = await this.runner({
          command: step.command,
          args: step.args,
          cwd: workDir,
          timeoutMs,
          signal: options.signal,
          location: options.location,
        });
        durationMs += result.durationMs;
        truncated ||= result.truncated;
        stderr += result.stderr;
        if (step.phase === 'run') stdout += result.stdout;

        if (result.timedOut || result.exitCode !== 0) {
          logger.debug('Step failed', { language: this.language, phase: step.phase, exitCode: result.exitCode });
          return {
            status: result.timedOut ? 'timeout' : 'error',
            stdout: step.phase === 'run' ? stdout : result.stdout,
            stderr,
            exitCode: result.exitCode,
            durationMs,
            truncated,
          };
        }
      }

      return { status: 'ok', stdout, stderr, exitCode: 0, durationMs, truncated };
    } finally {
      await rm(workDir, { recursive: true, force: true }).catch((err: unknown) => {
        logger.warn('Failed to remove work directory', { workDir, error: err });
      });
    }
  }
}
