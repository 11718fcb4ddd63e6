/**
 * Execution dispatcher: runs a program's blocks in order against one
 * environment.
 *
 * Native blocks run in-process and mutate the environment; every other block
 * gets its printf calls resolved, a snapshot of the names it references, and
 * a trip through its toolchain (or stub output when the toolchain is
 * missing). Native failures halt the run; everything else is recorded on the
 * block and the run continues.
 */

import { Logger } from '@fusion/shared/Utils/logger.js';
import {
  ExecutionError,
  FusionError,
  MarshalError,
  RunCancelledError,
  SecurityViolationError,
  ToolchainUnavailableError,
  type SourceLocation,
} from '../errors.js';
import type { ExecutorRegistry } from '../executors/registry.js';
import type { ExecutionOutcome, NativeExecutor, SubprocessExecutor } from '../executors/types.js';
import { PyRaise, PySyntaxError } from '../python/errors.js';
import { blockingFindings } from '../security/scanner.js';
import type { SecurityReport } from '../security/types.js';
import { sourceLineOf } from '../source/assembler.js';
import { importsOf } from '../source/directives.js';
import type { CodeBlock, Diagnostic, Program } from '../source/types.js';
import { generateRunId } from '../utils/id-generator.js';
import { ExecutionEnvironment } from './environment.js';
import { referencedNames } from './guest-code.js';
import { resolvePrintf } from './printf.js';
import type { BlockResult, ExecutionResult, RunOptions, RunStats } from './types.js';

const logger = new Logger('fusion:dispatch');

const MODULE_NAME = /^[A-Za-z_]\w*(?:\.[A-Za-z_]\w*)*$/;

interface BlockStep {
  result: BlockResult;
  /** Set when the run must stop after this block. */
  fatal?: FusionError;
}

/** Refuse a blocked report, or one produced for different source. */
export function assertRunnable(program: Program, report: SecurityReport): void {
  if (report.sourceHash !== program.sourceHash) {
    throw new SecurityViolationError('Security report was produced for a different program', {}, {
      expected: program.sourceHash,
      actual: report.sourceHash,
    });
  }
  if (report.verdict !== 'blocked') return;

  const blocking = blockingFindings(report);
  const [first] = blocking;
  const location: SourceLocation = first ? { line: first.line, blockIndex: first.blockIndex ?? undefined } : {};
  const summary = first ? `${first.ruleId}: ${first.message}` : 'blocked';
  throw new SecurityViolationError(`Execution blocked at level '${report.level}' (${summary})`, location, {
    level: report.level,
    findings: blocking.length,
    ruleIds: [...new Set(blocking.map((f) => f.ruleId))],
  });
}

function blockResult(block: CodeBlock, index: number, outcome: ExecutionOutcome, printfResolved = 0): BlockResult {
  return {
    index,
    line: block.line,
    language: block.language,
    status: outcome.status,
    stdout: outcome.stdout,
    stderr: outcome.stderr,
    exitCode: outcome.exitCode,
    durationMs: outcome.durationMs,
    truncated: outcome.truncated,
    printfResolved,
  };
}

function failedBlock(block: CodeBlock, index: number, error: FusionError): BlockResult {
  return {
    index,
    line: block.line,
    language: block.language,
    status: 'error',
    stdout: '',
    stderr: `${error.message}\n`,
    exitCode: null,
    durationMs: 0,
    truncated: false,
    printfResolved: 0,
    error: error.toRecord(),
  };
}

function skippedBlock(block: CodeBlock, index: number): BlockResult {
  return {
    index,
    line: block.line,
    language: block.language,
    status: 'skipped',
    stdout: '',
    stderr: '',
    exitCode: null,
    durationMs: 0,
    truncated: false,
    printfResolved: 0,
  };
}

function warning(category: Diagnostic['category'], error: FusionError): Diagnostic {
  return { severity: 'warning', category, message: error.message, line: error.line, blockIndex: error.blockIndex };
}

/** Import `native_import` modules once each; failures become warnings. */
function loadImports(program: Program, env: ExecutionEnvironment, diagnostics: Diagnostic[]): void {
  for (const module of importsOf(program)) {
    const line = program.directives.native_import?.find((d) => d.value === module)?.line;
    if (!MODULE_NAME.test(module)) {
      diagnostics.push({ severity: 'warning', category: 'ImportFailed', message: `'${module}' is not a module name`, line });
      continue;
    }
    try {
      env.interpreter.execute(`import ${module}`);
      logger.debug('Imported module', { module });
    } catch (err) {
      if (!(err instanceof PyRaise || err instanceof PySyntaxError)) throw err;
      diagnostics.push({ severity: 'warning', category: 'ImportFailed', message: `import ${module}: ${err.message}`, line });
    }
  }
}

async function runNative(
  executor: NativeExecutor,
  block: CodeBlock,
  index: number,
  env: ExecutionEnvironment,
  options: RunOptions,
): Promise<BlockStep> {
  const location = { line: block.line, blockIndex: index };
  const outcome = await executor.execute(block.content, env, {
    timeoutMs: options.timeoutMs,
    signal: options.signal,
    location,
  });
  const result = blockResult(block, index, outcome);
  if (outcome.status === 'ok') return { result };

  const line = outcome.errorLine === undefined ? block.line : sourceLineOf(block, outcome.errorLine);
  const message =
    outcome.status === 'timeout'
      ? `Native block ${index} timed out after ${options.timeoutMs}ms`
      : `Native block ${index} failed: ${outcome.stderr.trim()}`;
  const fatal = new ExecutionError(message, { line, blockIndex: index }, { status: outcome.status });
  result.error = fatal.toRecord();
  return { result, fatal };
}

async function runSubprocess(
  executor: SubprocessExecutor,
  block: CodeBlock,
  index: number,
  env: ExecutionEnvironment,
  options: RunOptions,
  diagnostics: Diagnostic[],
): Promise<BlockStep> {
  const location = { line: block.line, blockIndex: index };

  let code: string;
  let printfResolved: number;
  try {
    const evaluate = (expression: string) => env.interpreter.evaluate(expression, { timeoutMs: options.timeoutMs });
    ({ code, resolved: printfResolved } = resolvePrintf(block.content, executor.adapter, evaluate, location));
  } catch (err) {
    if (!(err instanceof ExecutionError)) throw err;
    diagnostics.push(warning('ExecutionError', err));
    return { result: failedBlock(block, index, err) };
  }

  if (!(await executor.available())) {
    const unavailable = new ToolchainUnavailableError(block.language, location);
    if (options.strictToolchains) {
      return { result: failedBlock(block, index, unavailable), fatal: unavailable };
    }
    diagnostics.push(warning('ToolchainUnavailable', unavailable));
    return { result: blockResult(block, index, executor.stub(code), printfResolved) };
  }

  const snapshot = env.snapshot(referencedNames(code, block.language));
  let outcome: ExecutionOutcome;
  try {
    outcome = await executor.execute(code, snapshot, {
      timeoutMs: options.timeoutMs,
      signal: options.signal,
      location,
    });
  } catch (err) {
    if (!(err instanceof MarshalError)) throw err;
    diagnostics.push(warning('MarshalError', err));
    return { result: failedBlock(block, index, err) };
  }

  const result = blockResult(block, index, outcome, printfResolved);
  if (outcome.status === 'error' || outcome.status === 'timeout') {
    const failure = new ExecutionError(
      outcome.status === 'timeout'
        ? `${block.language} block ${index} timed out after ${options.timeoutMs}ms`
        : `${block.language} block ${index} exited with code ${outcome.exitCode ?? 'null'}`,
      location,
      { status: outcome.status, exitCode: outcome.exitCode },
    );
    result.error = failure.toRecord();
    diagnostics.push(warning('ExecutionError', failure));
  }
  return { result };
}

function collectStats(program: Program, blocks: readonly BlockResult[], env: ExecutionEnvironment, durationMs: number): RunStats {
  const blocksByLanguage: RunStats['blocksByLanguage'] = {};
  for (const block of program.blocks) {
    blocksByLanguage[block.language] = (blocksByLanguage[block.language] ?? 0) + 1;
  }
  return {
    blocksByLanguage,
    executed: blocks.filter((b) => b.status === 'ok' || b.status === 'error' || b.status === 'timeout').length,
    durationMs,
    variables: env.values.size,
    functions: env.functions.size,
    modules: env.modules.size,
  };
}

/**
 * Run every block of `program` in order.
 *
 * @throws SecurityViolationError when the report blocks the program or belongs to other source
 * @throws RunCancelledError when `options.signal` aborts
 */
export async function run(program: Program, registry: ExecutorRegistry, options: RunOptions): Promise<ExecutionResult> {
  assertRunnable(program, options.report);

  const runId = options.runId ?? generateRunId();
  const started = Date.now();
  const env = new ExecutionEnvironment({ timeoutMs: options.timeoutMs, seed: options.seed });
  const diagnostics: Diagnostic[] = [];
  const blocks: BlockResult[] = [];
  let haltedAt: ExecutionResult['haltedAt'];

  logger.info('Run started', { runId, blocks: program.blocks.length });
  loadImports(program, env, diagnostics);

  for (const [index, block] of program.blocks.entries()) {
    if (haltedAt) {
      blocks.push(skippedBlock(block, index));
      continue;
    }
    if (options.signal?.aborted) throw new RunCancelledError({ line: block.line, blockIndex: index });

    const executor = registry.get(block.language);
    const step =
      executor.kind === 'native'
        ? await runNative(executor, block, index, env, options)
        : await runSubprocess(executor, block, index, env, options, diagnostics);
    blocks.push(step.result);

    if (step.fatal) {
      diagnostics.push({
        severity: 'error',
        category: step.fatal instanceof ToolchainUnavailableError ? 'ToolchainUnavailable' : 'ExecutionError',
        message: step.fatal.message,
        line: step.fatal.line,
        blockIndex: index,
      });
      haltedAt = { blockIndex: index, line: step.fatal.line ?? block.line, error: step.fatal.toRecord() };
      logger.warn('Run halted', { runId, blockIndex: index, error: step.fatal.message });
    }
  }

  const durationMs = Date.now() - started;
  const result: ExecutionResult = {
    runId,
    status: haltedAt ? 'halted' : 'completed',
    exitCode: haltedAt ? 1 : 0,
    output: blocks.map((b) => b.stdout).join(''),
    blocks,
    diagnostics,
    stats: collectStats(program, blocks, env, durationMs),
  };
  if (haltedAt) result.haltedAt = haltedAt;

  logger.info('Run finished', { runId, status: result.status, durationMs });
  return result;
}
