import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ValidationError } from '@fusion/shared/Types/errors.js';
import { IntegrityError, SecurityViolationError } from '../../src/errors.js';
import { InterpreterExecutor } from '../../src/executors/native.js';
import { ExecutorRegistry } from '../../src/executors/registry.js';
import { FusionService } from '../../src/fusion.js';
import { FakeToolchainExecutor, useTestConfig, type TestDirs } from '../helpers/fakes.js';

const SOURCE = ['#name "Demo"', '#version "1.0"', '// greeting', '', 'py.x = 1', 'py.print(x)', 'js.console.log(x)'].join('\n');

describe('FusionService', () => {
  let dirs: TestDirs;
  let js: FakeToolchainExecutor;
  let service: FusionService;

  beforeEach(async () => {
    dirs = await useTestConfig();
    js = new FakeToolchainExecutor('js', { respond: () => ({ stdout: '1\n' }) });
    const registry = new ExecutorRegistry().register(new InterpreterExecutor()).register(js);
    service = new FusionService({ config: dirs.config, registry });
  });

  afterEach(async () => {
    await dirs.cleanup();
  });

  it('analyzes a source without running it', () => {
    const analysis = service.analyze(SOURCE);

    expect(analysis.metadata).toEqual({ name: 'Demo', version: '1.0', author: null, description: null });
    expect(analysis).toMatchObject({ totalLines: 7, directiveLines: 2, commentLines: 1, blankLines: 1, codeBlocks: 3 });
    expect(analysis.linesByLanguage).toMatchObject({ py: 2, js: 1, cpp: 0 });
    expect(analysis.blocksByLanguage).toMatchObject({ py: 2, js: 1 });
    expect(js.executed).toEqual([]);
  });

  it('builds each distinct source once', () => {
    expect(service.build(SOURCE)).toBe(service.build(SOURCE));
  });

  it('runs a program and appends it to the daily run log', async () => {
    const { result, report } = await service.run(service.build(SOURCE).program);

    expect(report.verdict).toBe('allowed');
    expect(result.output).toBe('1\n1\n');

    const files = await readdir(dirs.logDir);
    expect(files).toHaveLength(1);
    expect(files[0]).toMatch(/^runs-\d{4}-\d{2}-\d{2}\.jsonl$/);

    const lines = (await readFile(join(dirs.logDir, files[0]), 'utf-8')).trim().split('\n');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({
      type: 'run',
      run_id: result.runId,
      program_name: 'Demo',
      security_level: 'medium',
      status: 'completed',
      exit_code: 0,
      diagnostics: 0,
    });
  });

  it('formats a printf in a compiled block from a host variable at the default level', async () => {
    const cpp = new FakeToolchainExecutor('cpp', {
      respond: (block) => ({ stdout: block.code === 'fputs("Hi\\n", stdout);' ? 'Hi\n' : '' }),
    });
    const registry = new ExecutorRegistry().register(new InterpreterExecutor()).register(cpp);
    const hello = new FusionService({ config: dirs.config, registry, logRuns: false });
    const source = ['#name "Hello"', 'py.message = "Hi"', 'cpp.printf("%s\\n", message);'].join('\n');

    const { result, report } = await hello.run(hello.build(source).program);

    expect(report.verdict).toBe('allowed');
    expect(report.findings).toEqual([]);
    expect(cpp.executed.map((block) => block.code)).toEqual(['fputs("Hi\\n", stdout);']);
    expect(result.output).toBe('Hi\n');
    expect(result.exitCode).toBe(0);
  });

  it('caps the timeout at the configured maximum', async () => {
    const capped = new FusionService({
      config: { ...dirs.config, maxTimeoutMs: 50 },
      registry: new ExecutorRegistry().register(new InterpreterExecutor()),
      logRuns: false,
    });
    const { result } = await capped.run(capped.build('py.while True:\npy.    pass').program, { timeoutMs: 60_000 });
    expect(result.haltedAt?.error.message).toBe('Native block 0 timed out after 50ms');
  });

  it('throws when the security level blocks the program', async () => {
    const { program } = service.build('py.import os\npy.os.system("ls")');
    await expect(service.run(program, { securityLevel: 'medium' })).rejects.toBeInstanceOf(SecurityViolationError);
  });

  it('writes and reloads an artifact', async () => {
    const outputPath = join(dirs.sandboxDir, 'out', 'demo.lsf.json');
    const { program } = await service.compile({ text: SOURCE }, { outputPath });

    const loaded = await service.loadArtifact(outputPath, SOURCE);
    expect(loaded).toEqual(program);
    await expect(service.loadArtifact(outputPath, `${SOURCE}\npy.y = 2`)).rejects.toBeInstanceOf(IntegrityError);
  });

  it('reads sources from disk', async () => {
    const path = join(dirs.sandboxDir, 'demo.fu');
    await writeFile(path, SOURCE, 'utf-8');
    expect(await service.loadSource(path)).toEqual({ text: SOURCE, path });
  });

  it('refuses forbidden locations', async () => {
    await expect(service.loadSource('/etc/passwd')).rejects.toBeInstanceOf(ValidationError);
  });
});
