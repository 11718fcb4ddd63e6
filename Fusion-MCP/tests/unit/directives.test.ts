import { describe, it, expect } from 'vitest';
import { processDirectives, importsOf, firstDirective, canonicalDirectiveName } from '../../src/source/directives.js';
import type { DirectiveLine } from '../../src/source/types.js';
import { FusionSyntaxError } from '../../src/errors.js';

function line(name: string, value: string, lineNo: number): DirectiveLine {
  return { kind: 'directive', line: lineNo, name, value };
}

describe('processDirectives', () => {
  it('groups directives by name in declaration order', () => {
    const { directives, diagnostics } = processDirectives([
      line('name', 'Demo', 1),
      line('native_import', 'math', 2),
      line('native_import', 'json', 3),
      line('native_import', 'math', 4),
    ]);

    expect(diagnostics).toEqual([]);
    expect(directives.name).toEqual([{ name: 'name', value: 'Demo', line: 1 }]);
    expect(directives.native_import.map((d) => d.value)).toEqual(['math', 'json', 'math']);
  });

  it('folds python_import into native_import', () => {
    const { directives } = processDirectives([line('python_import', 'random', 7)]);
    expect(directives).toEqual({ native_import: [{ name: 'native_import', value: 'random', line: 7 }] });
  });

  it('keeps unknown directives and warns about them', () => {
    const { directives, diagnostics } = processDirectives([line('license', 'MIT', 5)]);
    expect(directives.license).toEqual([{ name: 'license', value: 'MIT', line: 5 }]);
    expect(diagnostics).toEqual([
      { severity: 'warning', category: 'UnknownDirective', message: "Unknown directive '#license'", line: 5 },
    ]);
  });

  it('treats names shared with object builtins as ordinary directives', () => {
    const { directives } = processDirectives([
      line('constructor', 'a', 1),
      line('__proto__', 'b', 2),
      line('toString', 'c', 3),
    ]);

    expect(canonicalDirectiveName('constructor')).toBe('constructor');
    expect(Object.keys(directives)).toEqual(['constructor', '__proto__', 'toString']);
    expect(directives['__proto__']).toEqual([{ name: '__proto__', value: 'b', line: 2 }]);
    expect(firstDirective({ directives }, 'constructor')).toBe('a');
    expect(firstDirective({ directives }, 'hasOwnProperty')).toBeUndefined();
    expect(importsOf({ directives })).toEqual([]);
  });

  it('rejects module names that are not dotted identifiers', () => {
    expect(() => processDirectives([line('native_import', 'os; rm', 2)])).toThrow(FusionSyntaxError);
  });
});

describe('importsOf', () => {
  it('deduplicates imports keeping the first occurrence', () => {
    const { directives } = processDirectives([
      line('native_import', 'json', 1),
      line('native_import', 'math', 2),
      line('native_import', 'json', 3),
    ]);
    expect(importsOf({ directives })).toEqual(['json', 'math']);
    expect(firstDirective({ directives }, 'name')).toBeUndefined();
  });
});
