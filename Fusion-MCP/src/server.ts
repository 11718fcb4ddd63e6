/**
 * Fusion MCP Server
 *
 * Registers compile, scan, run, analyze and toolchain tools on an McpServer instance.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerTool } from '@fusion/shared/Utils/register-tool.js';
import { createSuccess } from '@fusion/shared/Types/StandardResponse.js';
import {
  FUSION_ANALYZE_SOURCE,
  FUSION_COMPILE_SOURCE,
  FUSION_LIST_TOOLCHAINS,
  FUSION_RUN_PROGRAM,
  FUSION_SCAN_PROGRAM,
} from '@fusion/shared/Types/tool-names.js';
import { FusionService, type FusionServiceOptions } from './fusion.js';
import { compileSourceSchema, handleCompileSource } from './tools/compile.js';
import { scanProgramSchema, handleScanProgram } from './tools/scan.js';
import { runProgramSchema, handleRunProgram } from './tools/run.js';
import { analyzeSourceSchema, handleAnalyzeSource } from './tools/analyze.js';
import { listToolchainsSchema, handleListToolchains } from './tools/toolchains.js';

export function createServer(options: FusionServiceOptions = {}): { server: McpServer; service: FusionService } {
  const server = new McpServer({
    name: 'fusion',
    version: '1.0.0',
  });

  const service = new FusionService(options);

  // ── Compilation ─────────────────────────────────────────────────────────

  registerTool(server, {
    name: FUSION_COMPILE_SOURCE,
    description:
      'Compile a fusion source into its LSF artifact: directives, code blocks with their source lines, hashes and stats.\n\n' +
      'Args:\n' +
      '  - source (string, optional): Fusion source text\n' +
      '  - path (string, optional): Source file path (exactly one of source/path)\n' +
      '  - security_level ("low" | "medium" | "high" | "strict", optional): Recorded in artifact metadata\n' +
      '  - output_path (string, optional): Write the artifact as JSON\n\n' +
      'Returns: { artifact, diagnostics, output_path }',
    inputSchema: compileSourceSchema,
    annotations: {
      readOnlyHint: false,
      destructiveHint: false,
      idempotentHint: true,
      openWorldHint: false,
    },
    handler: async (params) => {
      const result = await handleCompileSource(service)(params);
      return createSuccess(result);
    },
  });

  registerTool(server, {
    name: FUSION_ANALYZE_SOURCE,
    description:
      'Analyze a fusion source: metadata directives, imports, line counts per language and block counts.\n\n' +
      'Args:\n' +
      '  - source (string, optional): Fusion source text\n' +
      '  - path (string, optional): Source file path (exactly one of source/path)\n\n' +
      'Returns: { metadata, imports, totalLines, directiveLines, commentLines, blankLines, linesByLanguage, blocksByLanguage, codeBlocks, diagnostics }',
    inputSchema: analyzeSourceSchema,
    annotations: {
      readOnlyHint: true,
      destructiveHint: false,
      idempotentHint: true,
      openWorldHint: false,
    },
    handler: async (params) => {
      const result = await handleAnalyzeSource(service)(params);
      return createSuccess(result);
    },
  });

  // ── Security ────────────────────────────────────────────────────────────

  registerTool(server, {
    name: FUSION_SCAN_PROGRAM,
    description:
      'Scan a program with the per-language denylist and the native syntax-tree analysis. Nothing is executed.\n\n' +
      'Args:\n' +
      '  - source / path / artifact_path: The program to scan\n' +
      '  - security_level ("low" | "medium" | "high" | "strict", optional): Level deciding the verdict\n\n' +
      'Returns: { report: { level, blockingSeverity, verdict, findings, sourceHash, counts }, diagnostics }',
    inputSchema: scanProgramSchema,
    annotations: {
      readOnlyHint: true,
      destructiveHint: false,
      idempotentHint: true,
      openWorldHint: false,
    },
    handler: async (params) => {
      const result = await handleScanProgram(service)(params);
      return createSuccess(result);
    },
  });

  // ── Execution ───────────────────────────────────────────────────────────

  registerTool(server, {
    name: FUSION_RUN_PROGRAM,
    description:
      'Scan and run a program. Blocks execute in order against one shared environment; py runs in-process, ' +
      'other languages run through their toolchains or fall back to stub output.\n\n' +
      'Args:\n' +
      '  - source / path / artifact_path: The program to run\n' +
      '  - security_level ("low" | "medium" | "high" | "strict", optional): Scan level gating the run\n' +
      '  - timeout_ms (number, optional): Per-block timeout\n' +
      '  - strict_toolchains (boolean, optional): Halt when a toolchain is missing\n' +
      '  - seed (number, optional): Seed for the random module\n\n' +
      'Returns: { report, compileDiagnostics, result: { runId, status, exitCode, output, blocks, diagnostics, stats } }',
    inputSchema: runProgramSchema,
    annotations: {
      readOnlyHint: false,
      destructiveHint: true,
      idempotentHint: false,
      openWorldHint: true,
    },
    handler: async (params) => {
      const result = await handleRunProgram(service)(params);
      return createSuccess(result);
    },
  });

  registerTool(server, {
    name: FUSION_LIST_TOOLCHAINS,
    description:
      'List guest languages with their executor kind and whether the toolchain answered its version check.\n\n' +
      'Returns: { toolchains: [{ language, displayName, kind, available }] }',
    inputSchema: listToolchainsSchema,
    annotations: {
      readOnlyHint: true,
      destructiveHint: false,
      idempotentHint: true,
      openWorldHint: false,
    },
    handler: async (params) => {
      const result = await handleListToolchains(service)(params);
      return createSuccess(result);
    },
  });

  return { server, service };
}
