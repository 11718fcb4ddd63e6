import { createHash } from 'node:crypto';

/**
 * Normalise source text so that platform differences do not change its hash:
 * BOM removed, CRLF/CR turned into LF, trailing whitespace trimmed per line
 * and trailing empty lines dropped.
 */
export function normalizeSource(source: string): string {
  const lines = source
    .replace(/^\uFEFF/, '')
    .split(/\r\n|\r|\n/)
    .map((line) => line.replace(/[ \t\f\v]+$/, ''));
  while (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines.join('\n');
}

export function sha256Hex(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

export function hashSource(source: string): string {
  return sha256Hex(normalizeSource(source));
}

/** JSON with object keys sorted, for digests independent of insertion order. */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, val: unknown) => {
    if (val !== null && typeof val === 'object' && !Array.isArray(val)) {
      const sorted: Record<string, unknown> = Object.create(null);
      for (const key of Object.keys(val).sort()) {
        sorted[key] = Reflect.get(val, key);
      }
      return sorted;
    }
    return val;
  });
}
