import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { MarshalError, RunCancelledError } from '../../src/errors.js';
import { InterpreterExecutor } from '../../src/executors/native.js';
import { ExecutorRegistry, createDefaultRegistry } from '../../src/executors/registry.js';
import { renderStub } from '../../src/executors/stub.js';
import { ToolchainExecutor } from '../../src/executors/subprocess.js';
import { TOOLCHAINS } from '../../src/executors/toolchains.js';
import { builtin, NONE, pyInt } from '../../src/python/values.js';
import { ExecutionEnvironment } from '../../src/runtime/environment.js';
import { processResult, recordingRunner, useTestConfig, type TestDirs } from '../helpers/fakes.js';

describe('InterpreterExecutor', () => {
  const executor = new InterpreterExecutor();

  it('runs against the shared environment and reports new bindings', async () => {
    const env = new ExecutionEnvironment();
    const outcome = await executor.execute('x = 1\nprint(x)', env, { timeoutMs: 1_000 });

    expect(outcome).toMatchObject({ status: 'ok', stdout: '1\n', stderr: '', exitCode: 0, defined: ['x'] });
    expect(env.lookup('x')).toEqual(pyInt(1));
  });

  it('reports an uncaught exception with its block line', async () => {
    const outcome = await executor.execute('y = 1\nraise ValueError("bad")', new ExecutionEnvironment(), {
      timeoutMs: 1_000,
    });

    expect(outcome.status).toBe('error');
    expect(outcome.stderr).toBe('line 2: ValueError: bad\n');
    expect(outcome.errorLine).toBe(2);
    expect(outcome.exitCode).toBe(1);
    expect(outcome.defined).toEqual(['y']);
  });

  it('stops a block that runs past its deadline', async () => {
    const outcome = await executor.execute('while True:\n    pass', new ExecutionEnvironment(), { timeoutMs: 50 });
    expect(outcome.status).toBe('timeout');
    expect(outcome.stderr).toBe('Execution exceeded 50ms\n');
  });

  it('refuses to start once the run is cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(
      executor.execute('x = 1', new ExecutionEnvironment(), { timeoutMs: 1_000, signal: controller.signal }),
    ).rejects.toBeInstanceOf(RunCancelledError);
  });

  it('truncates long output head and tail', async () => {
    const small = new InterpreterExecutor({ maxChars: 10, head: 2, tail: 2 });
    const outcome = await small.execute('print("abcdefghijkl")', new ExecutionEnvironment(), { timeoutMs: 1_000 });
    expect(outcome.stdout).toBe('ab\n\n[... truncated 9 characters ...]\n\nl\n');
    expect(outcome.truncated).toBe(true);
  });
});

describe('ToolchainExecutor', () => {
  let dirs: TestDirs;

  beforeEach(async () => {
    dirs = await useTestConfig();
  });

  afterEach(async () => {
    await dirs.cleanup();
  });

  it('writes the rendered program into a scratch directory and runs it', async () => {
    let written = '';
    const { runner, requests } = recordingRunner((request) => {
      written = readFileSync(join(request.cwd, 'main.js'), 'utf-8');
      return processResult({ stdout: '10\n' });
    });
    const executor = new ToolchainExecutor('js', { config: dirs.config, runner });

    const outcome = await executor.execute('console.log(x)', new Map([['x', pyInt(10)]]), { timeoutMs: 5_000 });

    expect(written).toBe('const x = 10;\n{\nconsole.log(x)\n}\n');
    expect(outcome).toEqual({ status: 'ok', stdout: '10\n', stderr: '', exitCode: 0, durationMs: 1, truncated: false });
    expect(requests).toHaveLength(1);
    expect(requests[0]).toMatchObject({ command: 'node', args: ['main.js'], timeoutMs: 5_000 });
    expect(requests[0].cwd.startsWith(dirs.sandboxDir)).toBe(true);
    expect(existsSync(requests[0].cwd)).toBe(false);
  });

  it('stops after a failed compile step', async () => {
    const { runner, requests } = recordingRunner(() => processResult({ exitCode: 1, stderr: 'main.cpp:3: error\n' }));
    const executor = new ToolchainExecutor('cpp', { config: dirs.config, runner });

    const outcome = await executor.execute('cout << 1;', new Map(), { timeoutMs: 5_000 });

    expect(outcome).toMatchObject({ status: 'error', stdout: '', stderr: 'main.cpp:3: error\n', exitCode: 1 });
    expect(requests).toHaveLength(1);
    expect(requests[0]).toMatchObject({ command: 'g++', timeoutMs: dirs.config.compileTimeoutMs });
  });

  it('reports a run step that hits its deadline', async () => {
    const { runner } = recordingRunner(() => processResult({ exitCode: null, timedOut: true, stdout: 'partial' }));
    const executor = new ToolchainExecutor('js', { config: dirs.config, runner });

    const outcome = await executor.execute('for (;;) {}', new Map(), { timeoutMs: 100 });
    expect(outcome).toMatchObject({ status: 'timeout', stdout: 'partial', exitCode: null });
  });

  it('refuses values it cannot marshal before spawning anything', async () => {
    const { runner, requests } = recordingRunner(() => processResult());
    const executor = new ToolchainExecutor('cpp', { config: dirs.config, runner });

    await expect(
      executor.execute('helper();', new Map([['helper', builtin('helper', () => NONE)]]), { timeoutMs: 100 }),
    ).rejects.toBeInstanceOf(MarshalError);
    expect(requests).toEqual([]);
  });

  it('checks every tool once and caches the answer', async () => {
    const { runner, requests } = recordingRunner(() => processResult());
    const executor = new ToolchainExecutor('java', { config: dirs.config, runner });

    expect(await executor.available()).toBe(true);
    expect(await executor.available()).toBe(true);
    expect(requests.map((r) => [r.command, r.args])).toEqual([
      ['javac', ['-version']],
      ['java', ['-version']],
    ]);
  });

  it('is unavailable when a version check fails', async () => {
    const { runner, requests } = recordingRunner(() => processResult({ exitCode: 127 }));
    const executor = new ToolchainExecutor('java', { config: dirs.config, runner });

    expect(await executor.available()).toBe(false);
    expect(requests).toHaveLength(1);
  });
});

describe('renderStub', () => {
  it('comments the block out in its own syntax', () => {
    expect(renderStub('rust', 'println!("hi");')).toEqual({
      status: 'stubbed',
      stdout: '// Rust toolchain unavailable; block not executed\nprintln!("hi");\n',
      stderr: '',
      exitCode: null,
      durationMs: 0,
      truncated: false,
    });
  });
});

describe('toolchain rendering', () => {
  it('keeps a whole java class and names the file after it', () => {
    const file = TOOLCHAINS.java.render('public class Hello {\npublic static void main(String[] a) {}\n}', [
      'static final long x = 1L;',
    ]);
    expect(file).toEqual({
      name: 'Hello.java',
      content: 'public class Hello {\nstatic final long x = 1L;\n\npublic static void main(String[] a) {}\n}\n',
    });
    expect(TOOLCHAINS.java.steps(file, defaultCommands())).toEqual([
      { phase: 'compile', command: 'javac', args: ['Hello.java'] },
      { phase: 'run', command: 'java', args: ['-cp', '.', 'Hello'] },
    ]);
  });

  it('wraps a rust fragment in main', () => {
    expect(TOOLCHAINS.rust.render('println!("{}", x);', []).content).toBe(
      '#![allow(unused)]\nfn main() {\nprintln!("{}", x);\n}\n',
    );
  });

  it('declares php values after the opening tag', () => {
    expect(TOOLCHAINS.php.render('<?php echo $x;', ['$x = 1;']).content).toBe('<?php\n$x = 1;\n echo $x;\n');
  });

  it('leaves js without declarations unwrapped', () => {
    expect(TOOLCHAINS.js.render('console.log(1)', []).content).toBe('console.log(1)\n');
  });
});

describe('ExecutorRegistry', () => {
  let dirs: TestDirs;

  beforeEach(async () => {
    dirs = await useTestConfig();
  });

  afterEach(async () => {
    await dirs.cleanup();
  });

  it('registers the interpreter and one toolchain per language', async () => {
    const { runner } = recordingRunner((request) => processResult({ exitCode: request.command === 'rustc' ? 127 : 0 }));
    const registry = createDefaultRegistry({ config: dirs.config, runner });

    const status = await registry.status();
    expect(status.map((s) => [s.language, s.kind, s.available])).toEqual([
      ['py', 'native', true],
      ['cpp', 'subprocess', true],
      ['js', 'subprocess', true],
      ['java', 'subprocess', true],
      ['php', 'subprocess', true],
      ['rust', 'subprocess', false],
    ]);
    expect(status[0].displayName).toBe('Python');
  });

  it('exposes only registration, lookup and status', () => {
    expect(Object.getOwnPropertyNames(ExecutorRegistry.prototype).sort()).toEqual(['constructor', 'get', 'register', 'status']);
  });

  it('names a language with no executor', () => {
    expect(() => new ExecutorRegistry().get('js')).toThrow("No executor registered for 'js'");
  });
});

function defaultCommands() {
  return { gxx: 'g++', node: 'node', javac: 'javac', java: 'java', php: 'php', rustc: 'rustc' };
}
