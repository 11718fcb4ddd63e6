/**
 * Compiled artifact (LSF record): encoding, validated decoding, integrity
 * checks and persistence.
 */

import { z } from 'zod';
import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { LANGUAGE_TAGS } from '../languages.js';
import { SECURITY_LEVELS } from '../config.js';
import { IntegrityError } from '../errors.js';
import { canonicalJson, hashSource, sha256Hex } from './hash.js';
import { emptyDirectiveTable } from '../source/directives.js';
import type { CodeBlock, Directive, Program } from '../source/types.js';

export const FORMAT_VERSION = 'LSF-3.0';
export const COMPILER_ID = 'fusion-compiler/1.0';
export const DEFAULT_OPTIMIZATION_LEVEL = 2;

// ── Schema ───────────────────────────────────────────────────────────────────

const directiveSchema = z.object({
  name: z.string().min(1),
  value: z.string(),
  line: z.number().int().positive(),
});

const directiveGroupSchema = z.array(directiveSchema);

// Parsed key by key: a record schema would drop a `__proto__` group.
const directivesSchema = z
  .custom<Record<string, unknown>>(
    (value) => value !== null && typeof value === 'object' && !Array.isArray(value),
    'Expected a directive table',
  )
  .transform((raw, ctx) => {
    const table = emptyDirectiveTable();
    for (const [key, entries] of Object.entries(raw)) {
      const parsed = directiveGroupSchema.safeParse(entries);
      if (!parsed.success) {
        for (const issue of parsed.error.issues) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key, ...issue.path], message: issue.message });
        }
        continue;
      }
      table[key] = parsed.data;
    }
    return table;
  });

const fragmentSchema = z.object({
  line: z.number().int().positive(),
  text: z.string(),
});

const codeBlockSchema = z.object({
  line: z.number().int().positive(),
  type: z.enum(LANGUAGE_TAGS),
  content: z.string(),
  fragments: z.array(fragmentSchema).min(1),
});

export const artifactSchema = z.object({
  format_version: z.literal(FORMAT_VERSION),
  metadata: z.object({
    compiler_id: z.string(),
    source_file: z.string(),
    source_path: z.string(),
    compile_time: z.string(),
    security_level: z.enum(SECURITY_LEVELS),
    optimization_level: z.number().int().min(0),
  }),
  program: z.object({
    directives: directivesSchema,
    code_blocks: z.array(codeBlockSchema),
    source_hash: z.string().regex(/^[0-9a-f]{64}$/),
    block_digest: z.string().regex(/^[0-9a-f]{64}$/),
    parse_time: z.number().nonnegative(),
    stats: z.object({
      total_lines: z.number().int().nonnegative(),
      directive_count: z.number().int().nonnegative(),
      code_block_count: z.number().int().nonnegative(),
    }),
  }),
});

export type Artifact = z.infer<typeof artifactSchema>;
export type ArtifactMetadata = Artifact['metadata'];
export type ArtifactStats = Artifact['program']['stats'];

// ── Encoding ─────────────────────────────────────────────────────────────────

/** SHA-256 over the canonical JSON of directives and blocks. */
export function blockDigest(directives: Record<string, Directive[]>, blocks: readonly CodeBlock[]): string {
  return sha256Hex(canonicalJson({ directives, blocks }));
}

export interface EncodeOptions {
  metadata: ArtifactMetadata;
  /** Seconds spent building the program. */
  parseTime: number;
  stats: ArtifactStats;
}

export function encodeArtifact(program: Program, options: EncodeOptions): Artifact {
  return {
    format_version: FORMAT_VERSION,
    metadata: { ...options.metadata },
    program: {
      directives: cloneDirectives(program.directives),
      code_blocks: program.blocks.map((b) => ({
        line: b.line,
        type: b.language,
        content: b.content,
        fragments: b.fragments.map((f) => ({ ...f })),
      })),
      source_hash: program.sourceHash,
      block_digest: blockDigest(program.directives, program.blocks),
      parse_time: options.parseTime,
      stats: { ...options.stats },
    },
  };
}

// ── Decoding ─────────────────────────────────────────────────────────────────

/**
 * Validate an artifact record. Shape errors and digest mismatches raise
 * IntegrityError.
 */
export function parseArtifact(raw: unknown): Artifact {
  const result = artifactSchema.safeParse(raw);
  if (!result.success) {
    throw new IntegrityError('Malformed artifact', {
      issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  return result.data;
}

export function decodeArtifact(raw: unknown): Program {
  const artifact = parseArtifact(raw);
  const { program } = artifact;

  const blocks: CodeBlock[] = program.code_blocks.map((b, index) => {
    const joined = b.fragments.map((f) => f.text).join('\n');
    if (joined !== b.content || b.fragments[0].line !== b.line) {
      throw new IntegrityError(`Block ${index} content does not match its fragments`, { blockIndex: index });
    }
    return {
      line: b.line,
      language: b.type,
      content: b.content,
      fragments: b.fragments.map((f) => ({ line: f.line, text: f.text })),
    };
  });

  const directives = cloneDirectives(program.directives);
  for (const [key, entries] of Object.entries(directives)) {
    if (entries.some((d) => d.name !== key)) {
      throw new IntegrityError(`Directive group '${key}' contains foreign entries`);
    }
  }

  const digest = blockDigest(directives, blocks);
  if (digest !== program.block_digest) {
    throw new IntegrityError('Artifact block digest mismatch', {
      expected: program.block_digest,
      actual: digest,
    });
  }

  return { directives, blocks, sourceHash: program.source_hash };
}

/** Fail unless the artifact was compiled from `source`. */
export function verifySource(artifact: Artifact, source: string): void {
  const actual = hashSource(source);
  if (actual !== artifact.program.source_hash) {
    throw new IntegrityError('Source hash mismatch: artifact was compiled from different source', {
      expected: artifact.program.source_hash,
      actual,
    });
  }
}

function cloneDirectives(directives: Record<string, Directive[]>): Record<string, Directive[]> {
  const out = emptyDirectiveTable();
  for (const [key, entries] of Object.entries(directives)) {
    out[key] = entries.map((d) => ({ name: d.name, value: d.value, line: d.line }));
  }
  return out;
}

// ── Persistence ──────────────────────────────────────────────────────────────

export async function writeArtifact(path: string, artifact: Artifact): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(artifact, null, 2) + '\n', 'utf-8');
}

export async function readArtifact(path: string): Promise<Artifact> {
  const text = await readFile(path, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new IntegrityError(`Artifact is not valid JSON: ${path}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
  return parseArtifact(raw);
}
