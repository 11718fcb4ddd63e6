/**
 * Tag → executor lookup. The dispatcher never branches on a language name;
 * adding a language means registering one more executor.
 */

import { getConfig, type FusionConfig } from '../config.js';
import { FusionError } from '../errors.js';
import { LANGUAGE_SYNTAX, LANGUAGE_TAGS, type LanguageTag } from '../languages.js';
import { InterpreterExecutor } from './native.js';
import type { ProcessRunner } from './process.js';
import { ToolchainExecutor } from './subprocess.js';
import type { LanguageExecutor } from './types.js';

export interface ToolchainStatus {
  language: LanguageTag;
  displayName: string;
  kind: LanguageExecutor['kind'];
  available: boolean;
}

export class ExecutorRegistry {
  private readonly executors = new Map<LanguageTag, LanguageExecutor>();

  register(executor: LanguageExecutor): this {
    this.executors.set(executor.language, executor);
    return this;
  }

  get(language: LanguageTag): LanguageExecutor {
    const executor = this.executors.get(language);
    if (!executor) {
      throw new FusionError(`No executor registered for '${language}'`, 'EXECUTOR_MISSING', {}, { language });
    }
    return executor;
  }

  async status(): Promise<ToolchainStatus[]> {
    return Promise.all(
      [...this.executors.values()].map(async (executor) => ({
        language: executor.language,
        displayName: LANGUAGE_SYNTAX[executor.language].displayName,
        kind: executor.kind,
        available: await executor.available(),
      })),
    );
  }
}

export interface RegistryOptions {
  config?: FusionConfig;
  runner?: ProcessRunner;
}

/** Native executor plus one toolchain executor per subprocess language. */
export function createDefaultRegistry(options: RegistryOptions = {}): ExecutorRegistry {
  const config = options.config ?? getConfig();
  const registry = new ExecutorRegistry().register(
    new InterpreterExecutor({
      maxChars: config.maxOutputChars,
      head: config.truncationHead,
      tail: config.truncationTail,
    }),
  );
  for (const language of LANGUAGE_TAGS) {
    if (language === 'py') continue;
    registry.register(new ToolchainExecutor(language, { config, runner: options.runner }));
  }
  return registry;
}
