/**
 * Subprocess execution against a real toolchain: the Node.js binary running
 * these tests stands in for the js toolchain.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { RunCancelledError } from '../../src/errors.js';
import { runProcess } from '../../src/executors/process.js';
import { ExecutorRegistry } from '../../src/executors/registry.js';
import { InterpreterExecutor } from '../../src/executors/native.js';
import { ToolchainExecutor } from '../../src/executors/subprocess.js';
import { FusionService } from '../../src/fusion.js';
import { pyInt, pyList, pyStr, type PyValue } from '../../src/python/values.js';
import { useTestConfig, type TestDirs } from '../helpers/fakes.js';

let dirs: TestDirs;

beforeEach(async () => {
  dirs = await useTestConfig({ FUSION_NODE: process.execPath, FUSION_MAX_PROCESSES: '4096' });
});

afterEach(async () => {
  await dirs.cleanup();
});

describe('runProcess', () => {
  it('captures output and exit code', async () => {
    const result = await runProcess({
      command: process.execPath,
      args: ['-e', 'console.log("out"); console.error("err"); process.exit(3)'],
      cwd: dirs.sandboxDir,
      timeoutMs: 10_000,
    });

    expect(result).toMatchObject({ stdout: 'out\n', stderr: 'err\n', exitCode: 3, timedOut: false });
  });

  it('kills a process that runs past its deadline', async () => {
    const result = await runProcess({
      command: process.execPath,
      args: ['-e', 'setInterval(() => {}, 1000)'],
      cwd: dirs.sandboxDir,
      timeoutMs: 300,
    });

    expect(result.timedOut).toBe(true);
    expect(result.exitCode).not.toBe(0);
  });
});

describe('js toolchain', () => {
  it('runs a block against marshalled values', async () => {
    const executor = new ToolchainExecutor('js', { config: dirs.config });
    const snapshot = new Map<string, PyValue>([
      ['items', pyList([pyInt(1), pyInt(2), pyInt(3)])],
      ['name', pyStr('Ada')],
    ]);

    expect(await executor.available()).toBe(true);
    const outcome = await executor.execute('console.log(items.length, name)', snapshot, { timeoutMs: 10_000 });
    expect(outcome).toMatchObject({ status: 'ok', stdout: '3 Ada\n', exitCode: 0 });
  });

  it('runs a mixed program end to end', async () => {
    const registry = new ExecutorRegistry()
      .register(new InterpreterExecutor())
      .register(new ToolchainExecutor('js', { config: dirs.config }));
    const service = new FusionService({ config: dirs.config, registry, logRuns: false });
    const source = 'py.items = [1, 2, 3]\njs.console.log(items.reduce((a, b) => a + b, 0))\npy.print(len(items))';

    const { result } = await service.run(service.build(source).program, { timeoutMs: 10_000 });

    expect(result.output).toBe('6\n3\n');
    expect(result.blocks.map((b) => b.status)).toEqual(['ok', 'ok', 'ok']);
  });

  it('terminates a running block when the run is cancelled', async () => {
    const registry = new ExecutorRegistry()
      .register(new InterpreterExecutor())
      .register(new ToolchainExecutor('js', { config: dirs.config }));
    const service = new FusionService({ config: dirs.config, registry, logRuns: false });
    const { program } = service.build('py.x = 1\njs.setTimeout(() => {}, 20000)');
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), 300);
    const started = Date.now();

    try {
      await expect(service.run(program, { timeoutMs: 30_000, signal: controller.signal })).rejects.toBeInstanceOf(
        RunCancelledError,
      );
    } finally {
      clearTimeout(timer);
    }
    expect(Date.now() - started).toBeLessThan(10_000);
  });
});
