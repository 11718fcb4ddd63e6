import { describe, it, expect } from 'vitest';
import { RunCancelledError, SecurityViolationError } from '../../src/errors.js';
import { InterpreterExecutor } from '../../src/executors/native.js';
import { ExecutorRegistry } from '../../src/executors/registry.js';
import { buildProgram } from '../../src/ir/builder.js';
import { run } from '../../src/runtime/dispatcher.js';
import type { RunOptions } from '../../src/runtime/types.js';
import { scan } from '../../src/security/scanner.js';
import type { Program } from '../../src/source/types.js';
import { FakeToolchainExecutor } from '../helpers/fakes.js';

function program(source: string): Program {
  return buildProgram(source).program;
}

function options(target: Program, overrides: Partial<RunOptions> = {}): RunOptions {
  return { report: scan(target, 'low'), timeoutMs: 1_000, runId: 'run_test', ...overrides };
}

function registry(...executors: FakeToolchainExecutor[]): ExecutorRegistry {
  const result = new ExecutorRegistry().register(new InterpreterExecutor());
  for (const executor of executors) result.register(executor);
  return result;
}

describe('run', () => {
  it('runs blocks in order and passes native values to later blocks', async () => {
    const cpp = new FakeToolchainExecutor('cpp', { respond: () => ({ stdout: 'x=10\n' }) });
    const js = new FakeToolchainExecutor('js', { respond: () => ({ stdout: '10\n' }) });
    const target = program('py.x = 10\ncpp.printf("x=%d\\n", x);\njs.console.log(x)');

    const result = await run(target, registry(cpp, js), options(target));

    expect(cpp.executed).toEqual([{ code: 'fputs("x=10\\n", stdout);', declarations: [] }]);
    expect(js.executed).toEqual([{ code: 'console.log(x)', declarations: ['const x = 10;'] }]);
    expect(result).toMatchObject({ runId: 'run_test', status: 'completed', exitCode: 0, output: 'x=10\n10\n' });
    expect(result.blocks.map((b) => [b.language, b.status, b.printfResolved])).toEqual([
      ['py', 'ok', 0],
      ['cpp', 'ok', 1],
      ['js', 'ok', 0],
    ]);
    expect(result.stats).toMatchObject({ blocksByLanguage: { py: 1, cpp: 1, js: 1 }, executed: 3, variables: 1 });
    expect(result.diagnostics).toEqual([]);
  });

  it('records an unresolvable printf argument and keeps going', async () => {
    const cpp = new FakeToolchainExecutor('cpp');
    const target = program('cpp.printf("%d", missing);\npy.print("after")');

    const result = await run(target, registry(cpp), options(target));

    expect(cpp.executed).toEqual([]);
    expect(result.blocks[0]).toMatchObject({
      status: 'error',
      stderr: "Unresolved name 'missing' in printf argument 'missing'\n",
    });
    expect(result.diagnostics).toEqual([
      {
        severity: 'warning',
        category: 'ExecutionError',
        message: "Unresolved name 'missing' in printf argument 'missing'",
        line: 1,
        blockIndex: 0,
      },
    ]);
    expect(result.output).toBe('after\n');
    expect(result.exitCode).toBe(0);
  });

  it('falls back to stub output when a toolchain is missing', async () => {
    const cpp = new FakeToolchainExecutor('cpp', { available: false });
    const target = program('py.n = 3\ncpp.printf("n=%d\\n", n);');

    const result = await run(target, registry(cpp), options(target));

    expect(result.blocks[1]).toMatchObject({
      status: 'stubbed',
      stdout: '// C++ toolchain unavailable; block not executed\nfputs("n=3\\n", stdout);\n',
    });
    expect(result.diagnostics).toEqual([
      {
        severity: 'warning',
        category: 'ToolchainUnavailable',
        message: "Toolchain for 'cpp' is not available",
        line: 2,
        blockIndex: 1,
      },
    ]);
    expect(result.status).toBe('completed');
    expect(result.stats.executed).toBe(1);
  });

  it('halts on a missing toolchain when toolchains are strict', async () => {
    const cpp = new FakeToolchainExecutor('cpp', { available: false });
    const js = new FakeToolchainExecutor('js');
    const target = program('py.n = 3\ncpp.puts("x");\njs.console.log(n)');

    const result = await run(target, registry(cpp, js), options(target, { strictToolchains: true }));

    expect(result.status).toBe('halted');
    expect(result.exitCode).toBe(1);
    expect(result.haltedAt).toMatchObject({ blockIndex: 1, line: 2 });
    expect(result.blocks.map((b) => b.status)).toEqual(['ok', 'error', 'skipped']);
    expect(js.executed).toEqual([]);
    expect(result.diagnostics).toEqual([
      {
        severity: 'error',
        category: 'ToolchainUnavailable',
        message: "Toolchain for 'cpp' is not available",
        line: 2,
        blockIndex: 1,
      },
    ]);
  });

  it('runs a metadata-only program with native code', async () => {
    const target = program('#name "Hello"\npy.message = "Hi"\npy.print(message)');
    const result = await run(target, registry(), options(target));
    expect(result.output).toBe('Hi\n');
    expect(result.exitCode).toBe(0);
  });

  it('halts on a native failure and skips the rest', async () => {
    const js = new FakeToolchainExecutor('js');
    const target = program('py.x = 1\npy.raise ValueError("boom")\njs.console.log(x)');

    const result = await run(target, registry(js), options(target));

    const message = 'Native block 1 failed: line 1: ValueError: boom';
    expect(result.status).toBe('halted');
    expect(result.blocks.map((b) => b.status)).toEqual(['ok', 'error', 'skipped']);
    expect(result.blocks[1].error).toMatchObject({ message, line: 2, blockIndex: 1 });
    expect(result.diagnostics).toEqual([{ severity: 'error', category: 'ExecutionError', message, line: 2, blockIndex: 1 }]);
    expect(js.executed).toEqual([]);
  });

  it('records values that cannot cross languages', async () => {
    const js = new FakeToolchainExecutor('js');
    const target = program('py.def f():\npy.    return 1\njs.f()');

    const result = await run(target, registry(js), options(target));

    expect(result.blocks[1].status).toBe('error');
    expect(result.diagnostics).toEqual([
      {
        severity: 'warning',
        category: 'MarshalError',
        message: "Cannot pass function 'f' to JavaScript as 'f'",
        line: 3,
        blockIndex: 1,
      },
    ]);
    expect(result.status).toBe('completed');
  });

  it('keeps going after a subprocess block fails', async () => {
    const js = new FakeToolchainExecutor('js', { respond: () => ({ status: 'error', exitCode: 2, stderr: 'boom\n' }) });
    const target = program('js.throw 1\npy.print("still here")');

    const result = await run(target, registry(js), options(target));

    expect(result.blocks[0]).toMatchObject({ status: 'error', exitCode: 2, stderr: 'boom\n' });
    expect(result.diagnostics[0]).toMatchObject({ category: 'ExecutionError', message: 'js block 0 exited with code 2' });
    expect(result.output).toBe('still here\n');
    expect(result.exitCode).toBe(0);
  });

  it('turns a failed native_import into a warning', async () => {
    const target = program('#native_import "nosuchmod"\npy.x = 1');
    const result = await run(target, registry(), options(target));

    expect(result.diagnostics).toEqual([
      {
        severity: 'warning',
        category: 'ImportFailed',
        message: "import nosuchmod: ModuleNotFoundError: No module named 'nosuchmod'",
        line: 1,
      },
    ]);
    expect(result.status).toBe('completed');
  });

  it('makes native_import modules visible to every block', async () => {
    const target = program('#native_import "math"\npy.print(math.floor(2.5))');
    const result = await run(target, registry(), options(target));
    expect(result.output).toBe('2\n');
    expect(result.stats.modules).toBe(1);
  });

  it('refuses a blocked program', async () => {
    const target = program('py.import os\npy.os.system("ls")');
    await expect(run(target, registry(), options(target, { report: scan(target, 'medium') }))).rejects.toThrow(
      "Execution blocked at level 'medium' (py.import.os: import of 'os' (operating-system interface))",
    );
  });

  it('refuses a report made for another program', async () => {
    const target = program('py.x = 1');
    const other = program('py.x = 2');
    await expect(run(target, registry(), options(target, { report: scan(other, 'low') }))).rejects.toBeInstanceOf(
      SecurityViolationError,
    );
  });

  it('stops when the run is cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const target = program('py.x = 1');
    await expect(run(target, registry(), options(target, { signal: controller.signal }))).rejects.toBeInstanceOf(
      RunCancelledError,
    );
  });
});
