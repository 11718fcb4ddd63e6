/**
 * Native executor: runs `py` blocks on the in-process interpreter, writing
 * straight into the run's environment.
 */

import { RunCancelledError } from '../errors.js';
import { NATIVE_TAG } from '../languages.js';
import { InterpreterTimeout, PyRaise, PySyntaxError } from '../python/errors.js';
import type { PyValue } from '../python/values.js';
import type { ExecutionEnvironment } from '../runtime/environment.js';
import { truncateOutput, type TruncateConfig } from '../utils/output-truncate.js';
import type { ExecuteOptions, ExecutionOutcome, NativeExecutor } from './types.js';

function bindings(env: ExecutionEnvironment): Map<string, PyValue> {
  const map = new Map<string, PyValue>();
  for (const name of env.names()) {
    const value = env.lookup(name);
    if (value !== undefined) map.set(name, value);
  }
  return map;
}

export class InterpreterExecutor implements NativeExecutor {
  readonly kind = 'native';
  readonly language = NATIVE_TAG;

  constructor(private readonly truncation?: TruncateConfig) {}

  async available(): Promise<boolean> {
    return true;
  }

  async execute(code: string, env: ExecutionEnvironment, options: ExecuteOptions): Promise<ExecutionOutcome> {
    if (options.signal?.aborted) throw new RunCancelledError(options.location);

    const chunks: string[] = [];
    const before = bindings(env);
    const started = Date.now();
    let failure: Pick<ExecutionOutcome, 'status' | 'stderr' | 'errorLine'> | null = null;

    try {
      env.interpreter.execute(code, { write: (text) => chunks.push(text), timeoutMs: options.timeoutMs });
    } catch (err) {
      if (err instanceof PyRaise) {
        const where = err.line === undefined ? '' : `line ${err.line}: `;
        failure = { status: 'error', stderr: `${where}${err.message}\n`, errorLine: err.line };
      } else if (err instanceof PySyntaxError) {
        failure = { status: 'error', stderr: `line ${err.line}: SyntaxError: ${err.detail}\n`, errorLine: err.line };
      } else if (err instanceof InterpreterTimeout) {
        failure = { status: 'timeout', stderr: `${err.message}\n` };
      } else {
        throw err;
      }
    }

    const after = bindings(env);
    const defined = [...after].filter(([name, value]) => before.get(name) !== value).map(([name]) => name);

    const raw = chunks.join('');
    const stdout = this.truncation ? truncateOutput(raw, this.truncation) : { text: raw, truncated: false };

    return {
      status: failure?.status ?? 'ok',
      stdout: stdout.text,
      stderr: failure?.stderr ?? '',
      exitCode: failure ? 1 : 0,
      durationMs: Date.now() - started,
      truncated: stdout.truncated,
      defined,
      errorLine: failure?.errorLine,
    };
  }
}
