import { describe, it, expect } from 'vitest';
import { Interpreter } from '../../src/python/interpreter.js';
import { MapScope } from '../../src/python/scope.js';
import { InterpreterTimeout, PyRaise, PySyntaxError } from '../../src/python/errors.js';
import { pyInt, repr } from '../../src/python/values.js';

function run(source: string, seed = 1): string {
  const out: string[] = [];
  new Interpreter(new MapScope(), { seed }).execute(source, { write: (text) => out.push(text) });
  return out.join('');
}

function raised(source: string): PyRaise {
  try {
    run(source);
  } catch (err) {
    if (err instanceof PyRaise) return err;
    throw err;
  }
  throw new Error('expected an exception');
}

describe('Interpreter arithmetic', () => {
  it('uses floor semantics for // and %', () => {
    expect(run('print(7 // 2, -7 // 2, 7 % -3, 2 ** 10, 7 / 2)')).toBe('3 -4 -2 1024 3.5\n');
  });

  it('prints floats the way Python does', () => {
    expect(run('print(0.1 + 0.2, 1e16, 1/3, 2.0)')).toBe('0.30000000000000004 1e+16 0.3333333333333333 2.0\n');
  });

  it('keeps integers exact beyond 2**53', () => {
    expect(run('print(2 ** 64 + 1)')).toBe('18446744073709551617\n');
  });

  it('sums from a start value of any addable type', () => {
    expect(run('print(sum([1, 2], 10), sum([[1], [2]], []), sum([0.5, 0.25]))')).toBe('13 [1, 2] 0.75\n');
  });

  it('reports division by zero on the failing line', () => {
    const err = raised('a = 1\nb = 0\nprint(a / b)');
    expect(err.exception.cls.name).toBe('ZeroDivisionError');
    expect(err.message).toBe('ZeroDivisionError: division by zero');
    expect(err.line).toBe(3);
  });
});

describe('Interpreter strings', () => {
  it('formats f-strings with conversions and specs', () => {
    expect(run('name = "Ada"\nprint(f"{name!r:>7}|{3.14159:.2f}|{42:05d}")')).toBe("  'Ada'|3.14|00042\n");
  });

  it('interpolates with %', () => {
    expect(run("print('%s has %d items' % ('cart', 3))")).toBe('cart has 3 items\n');
  });

  it('supports the common str methods', () => {
    const source = "print(' a,b ,c '.strip().split(','), '-'.join(['x', 'y']), 'hello'.title(), 'abc'.center(7, '*'))";
    expect(run(source)).toBe("['a', 'b ', 'c'] x-y Hello **abc**\n");
  });

  it('honours print sep and end', () => {
    expect(run("print(1, 2, sep='-', end='!')\nprint('x')")).toBe('1-2!x\n');
  });
});

describe('Interpreter control flow', () => {
  it('runs loops with else clauses', () => {
    const source = [
      'for i in range(3):',
      '    if i == 5:',
      '        break',
      'else:',
      "    print('no break')",
      'n = 0',
      'while n < 10:',
      '    n += 3',
      '    if n > 5:',
      '        break',
      'else:',
      "    print('unreachable')",
      'print(n)',
    ].join('\n');
    expect(run(source)).toBe('no break\n6\n');
  });

  it('builds comprehensions and sorts', () => {
    const source =
      "print(sorted([3, 1, 2], reverse=True), [x * x for x in range(5) if x % 2 == 0], {k: v for k, v in zip('ab', [1, 2])})";
    expect(run(source)).toBe("[3, 2, 1] [0, 4, 16] {'a': 1, 'b': 2}\n");
  });

  it('unpacks with a starred target', () => {
    expect(run('a, *rest, b = [1, 2, 3, 4]\nprint(a, rest, b)')).toBe('1 [2, 3] 4\n');
  });

  it('catches exceptions and runs finally blocks', () => {
    const source = [
      'try:',
      "    {}['missing']",
      'except KeyError as e:',
      "    print('caught', e)",
      'finally:',
      "    print('done')",
    ].join('\n');
    expect(run(source)).toBe("caught 'missing'\ndone\n");
  });

  it('lets a return in finally override the exception', () => {
    const source = ['def f():', '    try:', '        raise ValueError("x")', '    finally:', '        return 7', 'print(f())'].join(
      '\n',
    );
    expect(run(source)).toBe('7\n');
  });
});

describe('Interpreter functions', () => {
  it('closes over enclosing scopes with nonlocal', () => {
    const source = [
      'def counter():',
      '    n = 0',
      '    def inc():',
      '        nonlocal n',
      '        n += 1',
      '        return n',
      '    return inc',
      'c = counter()',
      'c()',
      'c()',
      'print(c())',
    ].join('\n');
    expect(run(source)).toBe('3\n');
  });

  it('binds keyword-only and variadic parameters', () => {
    const source = [
      "def f(a, *rest, sep='-', **extra):",
      '    return sep.join([str(a)] + [str(r) for r in rest]) + str(sorted(extra))',
      "print(f(1, 2, 3, sep='+', z=1, y=2))",
    ].join('\n');
    expect(run(source)).toBe("1+2+3['y', 'z']\n");
  });

  it('names missing arguments', () => {
    const err = raised('def f(a, b):\n    pass\nf(1)');
    expect(err.message).toBe("TypeError: f() missing 1 required positional argument: 'b'");
  });

  it('raises UnboundLocalError for a local read before assignment', () => {
    const err = raised(['x = 1', 'def f():', '    print(x)', '    x = 2', 'f()'].join('\n'));
    expect(err.exception.cls.name).toBe('UnboundLocalError');
    expect(err.line).toBe(3);
  });

  it('stops runaway recursion', () => {
    const err = raised('def f(n):\n    return f(n + 1)\nf(0)');
    expect(err.exception.cls.name).toBe('RecursionError');
  });
});

describe('Interpreter classes', () => {
  it('binds methods and keeps instance attributes', () => {
    const source = [
      'class Counter:',
      '    step = 2',
      '    def __init__(self, start):',
      '        self.value = start',
      '    def bump(self):',
      '        self.value += self.step',
      '        return self',
      'c = Counter(1)',
      'c.bump().bump()',
      'print(c.value, Counter.step, type(c).__name__)',
    ].join('\n');
    expect(run(source)).toBe('5 2 Counter\n');
  });

  it('resolves overridden methods through a base class', () => {
    const source = [
      'class Animal:',
      '    def __init__(self, name):',
      '        self.name = name',
      '    def speak(self):',
      '        return f"{self.name} makes {self.sound()}"',
      '    def sound(self):',
      '        return "a noise"',
      'class Dog(Animal):',
      '    def sound(self):',
      '        return "woof"',
      'd = Dog("Rex")',
      'print(d.speak(), isinstance(d, Animal), isinstance(d, Dog), isinstance(Animal("x"), Dog))',
    ].join('\n');
    expect(run(source)).toBe('Rex makes woof True True False\n');
  });

  it('renders instances through __repr__ and __str__', () => {
    const source = [
      'class Point:',
      '    def __init__(self, x, y):',
      '        self.x = x',
      '        self.y = y',
      '    def __repr__(self):',
      '        return f"Point({self.x}, {self.y})"',
      'class Label:',
      '    def __str__(self):',
      '        return "label"',
      'p = Point(1, 2)',
      'print(p, [p], f"{p}", str(p))',
      'print(Label(), f"{Label()!r}")',
    ].join('\n');
    expect(run(source)).toBe('Point(1, 2) [Point(1, 2)] Point(1, 2) Point(1, 2)\nlabel <Label object>\n');
  });

  it('names missing attributes and surplus constructor arguments', () => {
    expect(raised('class P:\n    pass\nP().z').message).toBe("AttributeError: 'P' object has no attribute 'z'");
    expect(raised('class P:\n    pass\nP(1)').message).toBe('TypeError: P() takes no arguments');
  });
});

describe('Interpreter sets', () => {
  it('adds, tests membership and sorts', () => {
    const source = 's = {3, 1, 2}\ns.add(1)\ns.add(4)\nprint(len(s), 2 in s, 5 in s, sorted(s))';
    expect(run(source)).toBe('4 True False [1, 2, 3, 4]\n');
  });

  it('combines sets with operators', () => {
    expect(run('print({1, 2} | {2, 3}, {1, 2} & {2, 3}, {1, 2} - {2, 3})')).toBe('{1, 2, 3} {2} {1}\n');
  });

  it('keeps {} a dict and builds sets from calls and comprehensions', () => {
    expect(run('print(set(), {}, type({}).__name__, {x % 3 for x in range(6)})')).toBe('set() {} dict {0, 1, 2}\n');
  });
});

describe('Interpreter modules', () => {
  it('provides math and json', () => {
    const source = [
      'import math',
      'import json',
      'print(math.sqrt(16), math.floor(2.7))',
      'print(json.dumps({"a": [1, 2.5, None, True]}))',
      'print(json.loads(\'{"n": 1, "f": 1.0}\'))',
    ].join('\n');
    expect(run(source)).toBe('4.0 2\n{"a": [1, 2.5, null, true]}\n{\'n\': 1, \'f\': 1.0}\n');
  });

  it('provides datetime', () => {
    const source = [
      'import datetime',
      'from datetime import datetime as dt',
      'd = datetime.datetime(2024, 1, 2, 3, 4, 5)',
      'print(d)',
      "print(d.isoformat(), repr(d), d.year, d.strftime('%Y/%m/%d %H:%M %A'))",
      'now = dt.now()',
      'print(isinstance(now, dt), type(now).__name__, now.year >= 2024)',
    ].join('\n');
    expect(run(source)).toBe(
      '2024-01-02 03:04:05\n2024-01-02T03:04:05 datetime.datetime(2024, 1, 2, 3, 4, 5) 2024 2024/01/02 03:04 Tuesday\nTrue datetime True\n',
    );
  });

  it('validates datetime fields', () => {
    expect(raised('import datetime\ndatetime.datetime(2023, 2, 29)').message).toBe('ValueError: day is out of range for month');
  });

  it('refuses modules outside the sandbox', () => {
    const err = raised('import os');
    expect(err.message).toBe("ModuleNotFoundError: No module named 'os'");
  });

  it('repeats random sequences for the same seed', () => {
    const source = 'import random\nprint([random.randint(1, 100) for _ in range(5)])';
    expect(run(source, 7)).toBe(run(source, 7));
  });
});

describe('Interpreter globals', () => {
  it('keeps module-level names across runs', () => {
    const scope = new MapScope();
    const interp = new Interpreter(scope);
    interp.execute('x = 5\ndef double(v):\n    return v * 2');
    expect(scope.values.get('x')).toEqual(pyInt(5));
    expect(repr(interp.evaluate('double(x)'))).toBe('10');
  });

  it('reports syntax errors with their line', () => {
    const interp = new Interpreter(new MapScope());
    expect(() => interp.execute('x = 1\nif x\n    pass')).toThrow(PySyntaxError);
  });

  it('times out runaway loops', () => {
    const interp = new Interpreter(new MapScope(), { timeoutMs: 50 });
    expect(() => interp.execute('while True:\n    pass')).toThrow(InterpreterTimeout);
  });
});
