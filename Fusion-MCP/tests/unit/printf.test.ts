import { describe, it, expect } from 'vitest';
import { ExecutionError } from '../../src/errors.js';
import { CppAdapter, PhpAdapter, RustAdapter } from '../../src/executors/marshal.js';
import { ExecutionEnvironment } from '../../src/runtime/environment.js';
import { decodeCString, findPrintfCalls, maskCode, referencedNames } from '../../src/runtime/guest-code.js';
import { formatPrintf, resolvePrintf, stripLengthModifiers } from '../../src/runtime/printf.js';

function environment(setup: string): ExecutionEnvironment {
  const env = new ExecutionEnvironment();
  env.interpreter.execute(setup);
  return env;
}

describe('maskCode', () => {
  it('blanks string bodies and comments but keeps offsets', () => {
    const code = 'a = "b // c"; // d';
    const masked = maskCode(code, 'js');
    expect(masked).toBe('a = "' + ' '.repeat(6) + '";' + ' '.repeat(5));
    expect(masked).toHaveLength(code.length);
  });

  it('uses # comments for the native language', () => {
    expect(maskCode('x = 1 # note', 'py')).toBe('x = 1' + ' '.repeat(7));
  });
});

describe('referencedNames', () => {
  it('skips member names, strings and comments', () => {
    const code = 'int y = x + 1; // z\nstd::cout << s.size() << "w";';
    expect(referencedNames(code, 'cpp')).toEqual(['int', 'y', 'x', 'std', 's']);
  });

  it('only sees $variables in php', () => {
    expect(referencedNames('echo $name . "$ignored" . strlen($name);', 'php')).toEqual(['name']);
  });
});

describe('findPrintfCalls', () => {
  it('finds free-standing calls with a literal format', () => {
    const code = 'printf("x=%d\\n", x); System.out.printf("no"); printf(fmt, x);';
    const calls = findPrintfCalls(code, 'java');
    expect(calls).toEqual([{ start: 0, end: 19, format: '"x=%d\\n"', args: ['x'] }]);
  });

  it('splits arguments at top-level commas only', () => {
    const [call] = findPrintfCalls('printf("%d %s", max(a, b), "x, y");', 'cpp');
    expect(call.args).toEqual(['max(a, b)', '"x, y"']);
  });
});

describe('decodeCString', () => {
  it('decodes simple, hex and octal escapes', () => {
    expect(decodeCString('"a\\tb\\x41\\101\\n"')).toBe('a\tbAA\n');
  });
});

describe('stripLengthModifiers', () => {
  it('drops C length modifiers and maps %u to %d', () => {
    expect(stripLengthModifiers('%lld %5.2lf %zu %%u')).toBe('%d %5.2f %d %%u');
  });
});

describe('formatPrintf', () => {
  it('evaluates arguments as native expressions', () => {
    const env = environment('items = [3, 4]\nlabel = "total"');
    const text = formatPrintf('"%s=%d\\n"', ['label', 'sum(items)'], 'cpp', (e) => env.interpreter.evaluate(e));
    expect(text).toBe('total=7\n');
  });

  it('strips $ from php arguments', () => {
    const env = environment('name = "Ada"\nage = 36');
    const text = formatPrintf('"%s is %d"', ['$name', '$age'], 'php', (e) => env.interpreter.evaluate(e));
    expect(text).toBe('Ada is 36');
  });

  it('names the unresolved variable', () => {
    const env = new ExecutionEnvironment();
    const location = { line: 7, blockIndex: 3 };
    let caught: unknown;
    try {
      formatPrintf('"%d"', ['missing'], 'cpp', (e) => env.interpreter.evaluate(e), location);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ExecutionError);
    expect(caught).toMatchObject({
      message: "Unresolved name 'missing' in printf argument 'missing'",
      line: 7,
      blockIndex: 3,
    });
  });

  it('reports a format that does not match its arguments', () => {
    const env = environment('x = 1');
    expect(() => formatPrintf('"%d %d"', ['x'], 'cpp', (e) => env.interpreter.evaluate(e))).toThrow(
      'printf format "%d %d" failed: TypeError: not enough arguments for format string',
    );
  });
});

describe('resolvePrintf', () => {
  it('replaces each call with the target print statement', () => {
    const env = environment('x = 10\ny = 2.5');
    const code = 'int z = 1;\nprintf("x=%d\\n", x);\nprintf("y=%.1f", y);';
    const resolution = resolvePrintf(code, new CppAdapter(), (e) => env.interpreter.evaluate(e));
    expect(resolution).toEqual({
      code: 'int z = 1;\nfputs("x=10\\n", stdout);\nfputs("y=2.5", stdout);',
      resolved: 2,
    });
  });

  it('leaves code without printf untouched', () => {
    const env = new ExecutionEnvironment();
    const code = 'println!("{}", 1);';
    expect(resolvePrintf(code, new RustAdapter(), (e) => env.interpreter.evaluate(e))).toEqual({ code, resolved: 0 });
  });

  it('renders php print statements', () => {
    const env = environment('n = 3');
    const resolution = resolvePrintf('printf("n=%d", $n);', new PhpAdapter(), (e) => env.interpreter.evaluate(e));
    expect(resolution.code).toBe("print('n=3');");
  });
});
