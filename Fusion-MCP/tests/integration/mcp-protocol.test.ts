/**
 * MCP protocol integration tests.
 *
 * Connects an SDK client to the server over InMemoryTransport; toolchains
 * are in-process fakes, so nothing is spawned.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { z } from 'zod';
import { join } from 'node:path';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  FUSION_ANALYZE_SOURCE,
  FUSION_COMPILE_SOURCE,
  FUSION_LIST_TOOLCHAINS,
  FUSION_RUN_PROGRAM,
  FUSION_SCAN_PROGRAM,
} from '@fusion/shared/Types/tool-names.js';
import { InterpreterExecutor } from '../../src/executors/native.js';
import { ExecutorRegistry } from '../../src/executors/registry.js';
import { createServer } from '../../src/server.js';
import { FakeToolchainExecutor, useTestConfig, type TestDirs } from '../helpers/fakes.js';

const toolResultSchema = z.object({
  content: z.array(z.object({ type: z.literal('text'), text: z.string() })),
  isError: z.boolean().optional(),
});

const responseSchema = z.object({
  success: z.boolean(),
  error: z.string().optional(),
  errorCode: z.string().optional(),
  data: z.record(z.unknown()).optional(),
});

let dirs: TestDirs;
let server: McpServer;
let client: Client;

beforeEach(async () => {
  dirs = await useTestConfig();
  const registry = new ExecutorRegistry()
    .register(new InterpreterExecutor())
    .register(new FakeToolchainExecutor('js', { respond: () => ({ stdout: 'hi\n' }) }))
    .register(new FakeToolchainExecutor('rust', { available: false }));
  ({ server } = createServer({ config: dirs.config, registry, logRuns: false }));

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  client = new Client({ name: 'fusion-test', version: '1.0.0' });
  await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
});

afterEach(async () => {
  await client.close();
  await server.close();
  await dirs.cleanup();
});

/** Parse the StandardResponse from an MCP tool call result */
async function call(name: string, args: Record<string, unknown>) {
  const result = toolResultSchema.parse(await client.callTool({ name, arguments: args }));
  return responseSchema.parse(JSON.parse(result.content[0].text));
}

describe('MCP Protocol', () => {
  it('lists every fusion tool', async () => {
    const { tools } = await client.listTools();

    expect(tools.map((t) => t.name).sort()).toEqual(
      [FUSION_ANALYZE_SOURCE, FUSION_COMPILE_SOURCE, FUSION_LIST_TOOLCHAINS, FUSION_RUN_PROGRAM, FUSION_SCAN_PROGRAM].sort(),
    );
    const run = tools.find((t) => t.name === FUSION_RUN_PROGRAM);
    expect(run?.annotations?.destructiveHint).toBe(true);
  });

  it('runs inline source', async () => {
    const response = await call(FUSION_RUN_PROGRAM, { source: 'py.print(1 + 1)\njs.console.log("hi")' });

    expect(response.success).toBe(true);
    expect(response.data?.result).toMatchObject({ status: 'completed', exitCode: 0, output: '2\nhi\n' });
  });

  it('reports a blocked program as an error response', async () => {
    const response = await call(FUSION_RUN_PROGRAM, {
      source: 'py.import os\npy.os.system("ls")',
      security_level: 'medium',
    });

    expect(response.success).toBe(false);
    expect(response.errorCode).toBe('SECURITY_VIOLATION');
  });

  it('scans without executing', async () => {
    const response = await call(FUSION_SCAN_PROGRAM, { source: 'py.eval("1")', security_level: 'high' });

    expect(response.success).toBe(true);
    expect(response.data?.report).toMatchObject({ verdict: 'blocked', blockingSeverity: 'medium' });
  });

  it('requires exactly one source', async () => {
    const response = await call(FUSION_ANALYZE_SOURCE, { source: 'py.x = 1', path: '/tmp/x.fu' });

    expect(response.success).toBe(false);
    expect(response.error).toBe('Provide exactly one of source or path');
  });

  it('analyzes a source', async () => {
    const response = await call(FUSION_ANALYZE_SOURCE, { source: '#name "Demo"\npy.x = 1\njs.console.log(x)' });

    expect(response.data).toMatchObject({
      metadata: { name: 'Demo' },
      totalLines: 3,
      directiveLines: 1,
      codeBlocks: 2,
    });
  });

  it('compiles to an artifact and runs the artifact', async () => {
    const outputPath = join(dirs.sandboxDir, 'hello.lsf.json');
    const source = '#name "Hello"\npy.print("from artifact")';

    const compiled = await call(FUSION_COMPILE_SOURCE, { source, output_path: outputPath });
    expect(compiled.data?.output_path).toBe(outputPath);
    expect(compiled.data?.artifact).toMatchObject({ format_version: 'LSF-3.0' });

    const ran = await call(FUSION_RUN_PROGRAM, { artifact_path: outputPath, source });
    expect(ran.data?.result).toMatchObject({ output: 'from artifact\n' });
  });

  it('lists toolchain availability', async () => {
    const response = await call(FUSION_LIST_TOOLCHAINS, {});

    expect(response.data?.toolchains).toEqual([
      { language: 'py', displayName: 'Python', kind: 'native', available: true },
      { language: 'js', displayName: 'JavaScript', kind: 'subprocess', available: true },
      { language: 'rust', displayName: 'Rust', kind: 'subprocess', available: false },
    ]);
  });
});
