/**
 * IR builder: source text → Program, and Program → compiled artifact.
 */

import { basename, resolve } from 'node:path';
import { performance } from 'node:perf_hooks';
import { tokenize, splitLines } from '../source/tokenizer.js';
import { assemble } from '../source/assembler.js';
import { processDirectives } from '../source/directives.js';
import { hashSource } from './hash.js';
import { encodeArtifact, COMPILER_ID, DEFAULT_OPTIMIZATION_LEVEL, type Artifact, type ArtifactStats } from './artifact.js';
import { Logger } from '@fusion/shared/Utils/logger.js';
import type { LanguageTag } from '../languages.js';
import type { SecurityLevel } from '../config.js';
import type { Diagnostic, Program } from '../source/types.js';

const logger = new Logger('fusion:compile');

export interface BuildOptions {
  languages?: readonly LanguageTag[];
}

export interface BuildResult {
  program: Program;
  diagnostics: Diagnostic[];
  stats: ArtifactStats;
  /** Seconds. */
  parseTime: number;
}

export function buildProgram(source: string, options: BuildOptions = {}): BuildResult {
  const started = performance.now();
  const text = source.replace(/^\uFEFF/, '');

  const lines = tokenize(text, { languages: options.languages });
  const assembled = assemble(lines);
  const { directives, diagnostics } = processDirectives(assembled.directives);

  const program: Program = {
    directives,
    blocks: assembled.blocks,
    sourceHash: hashSource(text),
  };
  const stats: ArtifactStats = {
    total_lines: splitLines(text).length,
    directive_count: assembled.directives.length,
    code_block_count: assembled.blocks.length,
  };
  const parseTime = (performance.now() - started) / 1000;

  logger.debug('Program built', { blocks: stats.code_block_count, directives: stats.directive_count });
  return { program, diagnostics, stats, parseTime };
}

export interface CompileOptions extends BuildOptions {
  /** Path of the source file, used in artifact metadata. */
  sourcePath?: string;
  securityLevel?: SecurityLevel;
  optimizationLevel?: number;
  /** Clock override for reproducible artifacts. */
  now?: () => Date;
}

export interface CompileResult {
  program: Program;
  artifact: Artifact;
  diagnostics: Diagnostic[];
}

export function compile(source: string, options: CompileOptions = {}): CompileResult {
  const { program, diagnostics, stats, parseTime } = buildProgram(source, options);
  const sourcePath = options.sourcePath ? resolve(options.sourcePath) : '<memory>';
  const now = options.now ?? (() => new Date());

  const artifact = encodeArtifact(program, {
    metadata: {
      compiler_id: COMPILER_ID,
      source_file: options.sourcePath ? basename(options.sourcePath) : '<memory>',
      source_path: sourcePath,
      compile_time: now().toISOString(),
      security_level: options.securityLevel ?? 'medium',
      optimization_level: options.optimizationLevel ?? DEFAULT_OPTIMIZATION_LEVEL,
    },
    parseTime,
    stats,
  });

  logger.info('Compiled source', { source: artifact.metadata.source_file, blocks: program.blocks.length });
  return { program, artifact, diagnostics };
}
