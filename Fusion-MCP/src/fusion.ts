/**
 * Fusion service facade: the operations the MCP tools expose.
 *
 * Holds the per-process state a server keeps between calls: the executor
 * registry (with its cached toolchain checks), the IR cache and the rule set.
 * Each run still gets its own environment.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { ValidationError } from '@fusion/shared/Types/errors.js';
import { Logger } from '@fusion/shared/Utils/logger.js';
import { expandHome, getConfig, isForbiddenPath, type FusionConfig, type SecurityLevel } from './config.js';
import { createDefaultRegistry, type ExecutorRegistry, type ToolchainStatus } from './executors/registry.js';
import { decodeArtifact, readArtifact, verifySource, writeArtifact, type Artifact } from './ir/artifact.js';
import { buildProgram, compile, type BuildResult, type CompileResult } from './ir/builder.js';
import { ProgramCache } from './ir/cache.js';
import { hashSource } from './ir/hash.js';
import type { LanguageTag } from './languages.js';
import { logRun } from './logging/writer.js';
import { run } from './runtime/dispatcher.js';
import type { ExecutionResult } from './runtime/types.js';
import { defaultRules, type RuleSet } from './security/rules.js';
import { scan } from './security/scanner.js';
import type { SecurityReport } from './security/types.js';
import { importsOf, firstDirective } from './source/directives.js';
import { tokenize } from './source/tokenizer.js';
import type { Diagnostic, Program } from './source/types.js';

const logger = new Logger('fusion:service');

export interface FusionServiceOptions {
  config?: FusionConfig;
  registry?: ExecutorRegistry;
  rules?: RuleSet;
  /** Append each run to the daily JSONL log (default true). */
  logRuns?: boolean;
}

export interface LoadedSource {
  text: string;
  /** Absolute path when the source came from a file. */
  path?: string;
}

export interface CompileRequest {
  securityLevel?: SecurityLevel;
  /** Write the artifact here as JSON. */
  outputPath?: string;
}

export interface RunRequest {
  securityLevel?: SecurityLevel;
  timeoutMs?: number;
  strictToolchains?: boolean;
  seed?: number;
  signal?: AbortSignal;
}

export interface RunResponse {
  report: SecurityReport;
  /** Diagnostics from building the program. */
  compileDiagnostics: Diagnostic[];
  result: ExecutionResult;
}

export interface SourceAnalysis {
  metadata: { name: string | null; version: string | null; author: string | null; description: string | null };
  imports: string[];
  totalLines: number;
  directiveLines: number;
  commentLines: number;
  blankLines: number;
  /** Tagged lines per language. */
  linesByLanguage: Record<LanguageTag, number>;
  /** Assembled blocks per language. */
  blocksByLanguage: Record<LanguageTag, number>;
  codeBlocks: number;
  diagnostics: Diagnostic[];
}

function perLanguage(): Record<LanguageTag, number> {
  return { py: 0, cpp: 0, js: 0, java: 0, php: 0, rust: 0 };
}

export class FusionService {
  readonly config: FusionConfig;
  readonly registry: ExecutorRegistry;
  readonly cache = new ProgramCache();
  private readonly rules: RuleSet;
  private readonly logRuns: boolean;

  constructor(options: FusionServiceOptions = {}) {
    this.config = options.config ?? getConfig();
    this.registry = options.registry ?? createDefaultRegistry({ config: this.config });
    this.rules = options.rules ?? defaultRules();
    this.logRuns = options.logRuns ?? true;
  }

  /** Read a source file, refusing forbidden locations. */
  async loadSource(path: string): Promise<LoadedSource> {
    const absolute = resolve(expandHome(path));
    if (isForbiddenPath(absolute)) {
      throw new ValidationError(`Path is in a forbidden location: ${path}`, { path });
    }
    return { text: await readFile(absolute, 'utf-8'), path: absolute };
  }

  /** Program for `text`, built once per source hash. */
  build(text: string): BuildResult {
    return this.cache.getOrCompile(hashSource(text), () => buildProgram(text));
  }

  async compile(source: LoadedSource, request: CompileRequest = {}): Promise<CompileResult> {
    const result = compile(source.text, {
      sourcePath: source.path,
      securityLevel: request.securityLevel ?? this.config.securityLevel,
    });
    if (request.outputPath) {
      const out = resolve(expandHome(request.outputPath));
      if (isForbiddenPath(out)) {
        throw new ValidationError(`Output path is in a forbidden location: ${request.outputPath}`, { path: request.outputPath });
      }
      await writeArtifact(out, result.artifact);
      logger.info('Artifact written', { path: out });
    }
    return result;
  }

  /** Program from a stored artifact; with `source`, the artifact must match it. */
  async loadArtifact(path: string, source?: string): Promise<Program> {
    const absolute = resolve(expandHome(path));
    if (isForbiddenPath(absolute)) {
      throw new ValidationError(`Path is in a forbidden location: ${path}`, { path });
    }
    const artifact: Artifact = await readArtifact(absolute);
    if (source !== undefined) verifySource(artifact, source);
    return decodeArtifact(artifact);
  }

  scan(program: Program, level: SecurityLevel = this.config.securityLevel): SecurityReport {
    return scan(program, level, this.rules);
  }

  /** Scan, then run. A blocked program throws SecurityViolationError. */
  async run(program: Program, request: RunRequest = {}, compileDiagnostics: Diagnostic[] = []): Promise<RunResponse> {
    const level = request.securityLevel ?? this.config.securityLevel;
    const report = this.scan(program, level);
    const timeoutMs = Math.min(request.timeoutMs ?? this.config.defaultTimeoutMs, this.config.maxTimeoutMs);

    const result = await run(program, this.registry, {
      report,
      timeoutMs,
      signal: request.signal,
      strictToolchains: request.strictToolchains ?? this.config.strictToolchains,
      seed: request.seed,
    });

    if (this.logRuns) {
      await logRun({
        type: 'run',
        run_id: result.runId,
        source_hash: program.sourceHash,
        program_name: firstDirective(program, 'name') ?? null,
        security_level: level,
        status: result.status,
        exit_code: result.exitCode,
        blocks: result.blocks.map((b) => ({
          index: b.index,
          line: b.line,
          language: b.language,
          status: b.status,
          exit_code: b.exitCode,
          duration_ms: b.durationMs,
          stdout: b.stdout,
          stderr: b.stderr,
        })),
        diagnostics: result.diagnostics.length,
        duration_ms: result.stats.durationMs,
        executed_at: new Date().toISOString(),
      }, this.config.logDir);
    }

    return { report, compileDiagnostics, result };
  }

  /** Structure and statistics of a source without running it. */
  analyze(text: string): SourceAnalysis {
    const lines = tokenize(text.replace(/^\uFEFF/, ''));
    const { program, diagnostics } = this.build(text);

    const linesByLanguage = perLanguage();
    let directiveLines = 0;
    let commentLines = 0;
    let blankLines = 0;
    for (const line of lines) {
      switch (line.kind) {
        case 'code': linesByLanguage[line.language]++; break;
        case 'directive': directiveLines++; break;
        case 'comment': commentLines++; break;
        case 'blank': blankLines++; break;
        case 'bare': break;
      }
    }

    const blocksByLanguage = perLanguage();
    for (const block of program.blocks) blocksByLanguage[block.language]++;

    return {
      metadata: {
        name: firstDirective(program, 'name') ?? null,
        version: firstDirective(program, 'version') ?? null,
        author: firstDirective(program, 'author') ?? null,
        description: firstDirective(program, 'description') ?? null,
      },
      imports: importsOf(program),
      totalLines: lines.length,
      directiveLines,
      commentLines,
      blankLines,
      linesByLanguage,
      blocksByLanguage,
      codeBlocks: program.blocks.length,
      diagnostics,
    };
  }

  listToolchains(): Promise<ToolchainStatus[]> {
    return this.registry.status();
  }
}
