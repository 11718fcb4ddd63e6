import { describe, it, expect } from 'vitest';
import { tokenize, parseDirective, measureIndent } from '../../src/source/tokenizer.js';
import { FusionSyntaxError, UnknownLanguageError } from '../../src/errors.js';

describe('tokenize', () => {
  it('classifies directives, code, comments and blanks', () => {
    const lines = tokenize(['#name "Hello"', '', '// note', 'py.x = 1', '  js.console.log(x)'].join('\n'));

    expect(lines).toEqual([
      { kind: 'directive', line: 1, name: 'name', value: 'Hello' },
      { kind: 'blank', line: 2 },
      { kind: 'comment', line: 3 },
      { kind: 'code', line: 4, language: 'py', indent: 0, text: 'x = 1' },
      { kind: 'code', line: 5, language: 'js', indent: 2, text: 'console.log(x)' },
    ]);
  });

  it('counts indentation before the tag and after the dot', () => {
    const [line] = tokenize('  py.    return x');
    expect(line).toEqual({ kind: 'code', line: 1, language: 'py', indent: 6, text: 'return x' });
  });

  it('treats a tab as four columns', () => {
    expect(measureIndent('\t  x')).toBe(6);
    const [line] = tokenize('py.\treturn 1');
    expect(line).toMatchObject({ kind: 'code', indent: 4, text: 'return 1' });
  });

  it('discards block comments spanning lines', () => {
    const lines = tokenize(['/* first', 'still comment', 'end */', 'py.y = 2'].join('\n'));
    expect(lines.map((l) => l.kind)).toEqual(['comment', 'comment', 'comment', 'code']);
  });

  it('classifies text after a closing comment on its own', () => {
    const lines = tokenize('/* lead */ py.z = 3');
    expect(lines).toEqual([{ kind: 'code', line: 1, language: 'py', indent: 1, text: 'z = 3' }]);
  });

  it('accepts CRLF and CR line endings', () => {
    const lines = tokenize('py.a = 1\r\npy.b = 2\rpy.c = 3');
    expect(lines.map((l) => l.line)).toEqual([1, 2, 3]);
  });

  it('raises UnknownLanguageError for an unknown tag at column zero', () => {
    expect(() => tokenize('py.x = 1\ncobol.DISPLAY X')).toThrow(UnknownLanguageError);
    try {
      tokenize('py.x = 1\ncobol.DISPLAY X');
    } catch (error) {
      expect(error).toBeInstanceOf(UnknownLanguageError);
      if (error instanceof UnknownLanguageError) {
        expect(error.tag).toBe('cobol');
        expect(error.line).toBe(2);
      }
    }
  });

  it('keeps an indented # line inside a py body as code', () => {
    const lines = tokenize(['py.def f():', '    # note', '    return 1', 'js.f()', '  #version "2"'].join('\n'));

    expect(lines).toEqual([
      { kind: 'code', line: 1, language: 'py', indent: 0, text: 'def f():' },
      { kind: 'bare', line: 2, indent: 4, text: '# note' },
      { kind: 'bare', line: 3, indent: 4, text: 'return 1' },
      { kind: 'code', line: 4, language: 'js', indent: 0, text: 'f()' },
      { kind: 'directive', line: 5, name: 'version', value: '2' },
    ]);
  });

  it('restricts tags to the configured language set', () => {
    expect(() => tokenize('rust.let x = 1;', { languages: ['py'] })).toThrow(UnknownLanguageError);
  });

  it('keeps indented untagged lines as bare lines', () => {
    const lines = tokenize('py.def f():\n    items.append(1)');
    expect(lines[1]).toEqual({ kind: 'bare', line: 2, indent: 4, text: 'items.append(1)', tag: 'items' });
  });

  it('rejects an unindented untagged line', () => {
    expect(() => tokenize('x = 1')).toThrow(FusionSyntaxError);
    expect(() => tokenize('x = 1')).toThrow('Malformed line');
  });

  it('rejects an unterminated block comment', () => {
    expect(() => tokenize('py.x = 1\n/* open')).toThrow('Unterminated block comment (line 2)');
  });
});

describe('parseDirective', () => {
  it('unescapes quotes and backslashes', () => {
    expect(parseDirective('#description "say \\"hi\\" \\\\ bye"', 1).value).toBe('say "hi" \\ bye');
  });

  it('allows a trailing line comment', () => {
    expect(parseDirective('#version "1.0" // first release', 3)).toEqual({
      kind: 'directive',
      line: 3,
      name: 'version',
      value: '1.0',
    });
  });

  it('rejects an unquoted value', () => {
    expect(() => parseDirective('#name Hello', 4)).toThrow(
      "Directive '#name' value must be a double-quoted string (line 4)",
    );
  });

  it('rejects an unterminated value', () => {
    expect(() => parseDirective('#name "Hello', 2)).toThrow("Unterminated string in directive '#name' (line 2)");
  });

  it('rejects trailing text after the value', () => {
    expect(() => parseDirective('#name "Hello" extra', 5)).toThrow(FusionSyntaxError);
  });

  it('rejects a directive without a name', () => {
    expect(() => parseDirective('# "value"', 1)).toThrow('Malformed directive');
  });
});
