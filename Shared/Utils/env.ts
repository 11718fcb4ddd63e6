import { config as dotenvConfig } from 'dotenv';
import { existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

/**
 * Load `.env` from a package root without letting dotenv print to stdout
 * (stdout carries the MCP stdio transport).
 *
 * @param importMetaUrl - `import.meta.url` of the entry point
 * @param levelsUp - directories between the entry file and the package root
 * @returns the loaded path, or null when no `.env` exists
 */
export function loadPackageEnv(importMetaUrl: string, levelsUp = 1): string | null {
  let dir = dirname(fileURLToPath(importMetaUrl));
  for (let i = 0; i < levelsUp; i++) {
    dir = dirname(dir);
  }
  const envPath = resolve(dir, '.env');
  if (!existsSync(envPath)) return null;
  dotenvConfig({ path: envPath, quiet: true });
  return envPath;
}
