import { describe, it, expect } from 'vitest';
import { readFile } from 'node:fs/promises';
import { z } from 'zod';

const manifestSchema = z.object({
  exports: z.record(z.object({ types: z.string(), default: z.string() })),
});

const buildConfigSchema = z.object({
  compilerOptions: z.object({ rootDir: z.string(), outDir: z.string() }),
});

async function readJson(relative: string): Promise<unknown> {
  return JSON.parse(await readFile(new URL(relative, import.meta.url), 'utf-8'));
}

describe('package exports', () => {
  it('resolves subpaths to compiled JavaScript at run time and to sources for types', async () => {
    const manifest = manifestSchema.parse(await readJson('../package.json'));
    expect(manifest.exports['./*.js']).toEqual({ types: './*.ts', default: './dist/*.js' });
  });

  it('emits the package build into the directory the export map points at', async () => {
    const tsconfig = buildConfigSchema.parse(await readJson('../tsconfig.json'));
    expect(tsconfig.compilerOptions).toEqual({ rootDir: '.', outDir: 'dist' });
  });
});
