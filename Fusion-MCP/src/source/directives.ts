/**
 * Directive processing: canonical names, validation, and the import list.
 */

import { FusionSyntaxError } from '../errors.js';
import type { Diagnostic, Directive, DirectiveLine, Program } from './types.js';

export const RECOGNIZED_DIRECTIVES = ['name', 'version', 'author', 'description', 'native_import'] as const;
export type RecognizedDirective = (typeof RECOGNIZED_DIRECTIVES)[number];

/** Legacy spellings folded into their canonical directive. */
export const DIRECTIVE_ALIASES: Readonly<Record<string, RecognizedDirective>> = {
  python_import: 'native_import',
};

const DOTTED_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)*$/;

export function isRecognizedDirective(name: string): name is RecognizedDirective {
  const known: readonly string[] = RECOGNIZED_DIRECTIVES;
  return known.includes(name);
}

export function canonicalDirectiveName(name: string): string {
  return Object.hasOwn(DIRECTIVE_ALIASES, name) ? DIRECTIVE_ALIASES[name] : name;
}

/** Prototype-free table, so names such as `constructor` or `__proto__` are ordinary keys. */
export function emptyDirectiveTable(): Record<string, Directive[]> {
  return Object.create(null);
}

export interface DirectiveTable {
  directives: Record<string, Directive[]>;
  diagnostics: Diagnostic[];
}

/**
 * Group directive lines by canonical name, keeping duplicates in declaration
 * order. Unknown names are kept and reported as warnings.
 */
export function processDirectives(lines: readonly DirectiveLine[]): DirectiveTable {
  const directives = emptyDirectiveTable();
  const diagnostics: Diagnostic[] = [];

  for (const entry of lines) {
    const name = canonicalDirectiveName(entry.name);

    if (!isRecognizedDirective(name)) {
      diagnostics.push({
        severity: 'warning',
        category: 'UnknownDirective',
        message: `Unknown directive '#${entry.name}'`,
        line: entry.line,
      });
    } else if (name === 'native_import') {
      const module = entry.value.trim();
      if (!DOTTED_IDENTIFIER.test(module)) {
        throw new FusionSyntaxError(`Invalid module name '${entry.value}' in '#${entry.name}'`, entry.line);
      }
      (directives[name] ??= []).push({ name, value: module, line: entry.line });
      continue;
    }

    (directives[name] ??= []).push({ name, value: entry.value, line: entry.line });
  }

  return { directives, diagnostics };
}

/** Modules to import before the first block, deduplicated, first occurrence wins. */
export function importsOf(program: Pick<Program, 'directives'>): string[] {
  const seen = new Set<string>();
  const entries = Object.hasOwn(program.directives, 'native_import') ? program.directives.native_import : [];
  for (const d of entries) {
    seen.add(d.value);
  }
  return [...seen];
}

export function firstDirective(program: Pick<Program, 'directives'>, name: string): string | undefined {
  return Object.hasOwn(program.directives, name) ? program.directives[name][0]?.value : undefined;
}
