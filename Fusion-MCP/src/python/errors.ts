/**
 * Interpreter-level errors: syntax errors from the parser, raised Python
 * exceptions, and the deadline guard.
 */

import type { PyClass, PyException, PyValue } from './values.js';

export class PySyntaxError extends Error {
  /** Message without the line suffix. */
  readonly detail: string;

  constructor(message: string, readonly line: number) {
    super(`${message} (line ${line})`);
    this.name = 'PySyntaxError';
    this.detail = message;
  }
}

/** Thrown when execution runs past its deadline. Not catchable from guest code. */
export class InterpreterTimeout extends Error {
  constructor(readonly limitMs: number) {
    super(`Execution exceeded ${limitMs}ms`);
    this.name = 'InterpreterTimeout';
  }
}

// ── Exception classes ───────────────────────────────────────────────────────

const HIERARCHY: ReadonlyArray<readonly [string, string | null]> = [
  ['BaseException', null],
  ['Exception', 'BaseException'],
  ['ArithmeticError', 'Exception'],
  ['ZeroDivisionError', 'ArithmeticError'],
  ['OverflowError', 'ArithmeticError'],
  ['LookupError', 'Exception'],
  ['IndexError', 'LookupError'],
  ['KeyError', 'LookupError'],
  ['ValueError', 'Exception'],
  ['TypeError', 'Exception'],
  ['NameError', 'Exception'],
  ['UnboundLocalError', 'NameError'],
  ['AttributeError', 'Exception'],
  ['RuntimeError', 'Exception'],
  ['RecursionError', 'RuntimeError'],
  ['NotImplementedError', 'RuntimeError'],
  ['ImportError', 'Exception'],
  ['ModuleNotFoundError', 'ImportError'],
  ['AssertionError', 'Exception'],
  ['StopIteration', 'Exception'],
  ['SyntaxError', 'Exception'],
  ['MemoryError', 'Exception'],
];

function buildClasses(): Map<string, PyClass> {
  const classes = new Map<string, PyClass>();
  for (const [name, baseName] of HIERARCHY) {
    const base = baseName === null ? null : (classes.get(baseName) ?? null);
    classes.set(name, { type: 'class', name, base, attrs: new Map() });
  }
  return classes;
}

export const EXCEPTION_CLASSES: ReadonlyMap<string, PyClass> = buildClasses();

export type ExceptionName =
  | 'ZeroDivisionError'
  | 'OverflowError'
  | 'IndexError'
  | 'KeyError'
  | 'ValueError'
  | 'TypeError'
  | 'NameError'
  | 'UnboundLocalError'
  | 'AttributeError'
  | 'RuntimeError'
  | 'RecursionError'
  | 'NotImplementedError'
  | 'ModuleNotFoundError'
  | 'ImportError'
  | 'AssertionError'
  | 'StopIteration'
  | 'SyntaxError'
  | 'MemoryError';

export function exceptionClass(name: string): PyClass {
  const cls = EXCEPTION_CLASSES.get(name);
  if (!cls) throw new Error(`Unknown exception class ${name}`);
  return cls;
}

export function isSubclass(cls: PyClass, parent: PyClass): boolean {
  for (let c: PyClass | null = cls; c; c = c.base) {
    if (c === parent) return true;
  }
  return false;
}

/** A Python exception propagating through the interpreter. */
export class PyRaise extends Error {
  /** Block-relative line where the exception surfaced. */
  line: number | undefined;

  constructor(readonly exception: PyException, line?: number) {
    super(describeException(exception));
    this.name = 'PyRaise';
    this.line = line;
  }
}

/** Build a raisable error for a built-in exception with a message. */
export function pyError(name: ExceptionName, message: string): PyRaise {
  const args: PyValue[] = [{ type: 'str', value: message }];
  return new PyRaise({ type: 'exception', cls: exceptionClass(name), args });
}

function describeException(exc: PyException): string {
  const [first] = exc.args;
  if (exc.args.length === 1 && first.type === 'str') {
    return first.value === '' ? exc.cls.name : `${exc.cls.name}: ${first.value}`;
  }
  return exc.args.length === 0 ? exc.cls.name : `${exc.cls.name}: <${exc.args.length} args>`;
}
