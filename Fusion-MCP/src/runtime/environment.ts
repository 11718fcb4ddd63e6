/**
 * The shared namespace of one run.
 *
 * Module-level names of native blocks land here, sorted into three tables by
 * what they hold. Only the native executor writes to it; every other
 * executor receives a {@link EnvironmentSnapshot}.
 */

import { Interpreter, type InterpreterOptions } from '../python/interpreter.js';
import type { GlobalScope } from '../python/scope.js';
import type { PyBuiltin, PyClass, PyFunction, PyModule, PyValue } from '../python/values.js';

export type Callable = PyFunction | PyBuiltin | PyClass;

/** Read-only copy of the names visible to a non-native block. */
export type EnvironmentSnapshot = ReadonlyMap<string, PyValue>;

function isCallableValue(value: PyValue): value is Callable {
  return value.type === 'function' || value.type === 'builtin' || value.type === 'class';
}

/** Copy mutable containers so later native blocks cannot alter a snapshot. */
export function cloneValue(value: PyValue): PyValue {
  switch (value.type) {
    case 'list':
      return { type: 'list', items: value.items.map(cloneValue) };
    case 'tuple':
      return { type: 'tuple', items: value.items.map(cloneValue) };
    case 'dict': {
      const entries = new Map<string, { key: PyValue; value: PyValue }>();
      for (const [hash, entry] of value.entries) {
        entries.set(hash, { key: cloneValue(entry.key), value: cloneValue(entry.value) });
      }
      return { type: 'dict', entries };
    }
    case 'set':
      return { type: 'set', entries: new Map(value.entries) };
    case 'exception':
      return { type: 'exception', cls: value.cls, args: value.args.map(cloneValue) };
    default:
      return value;
  }
}

export class ExecutionEnvironment implements GlobalScope {
  readonly values = new Map<string, PyValue>();
  readonly functions = new Map<string, Callable>();
  readonly modules = new Map<string, PyModule>();
  readonly interpreter: Interpreter;

  constructor(options: InterpreterOptions = {}) {
    this.interpreter = new Interpreter(this, options);
  }

  lookup(name: string): PyValue | undefined {
    return this.values.get(name) ?? this.functions.get(name) ?? this.modules.get(name);
  }

  assign(name: string, value: PyValue): void {
    this.remove(name);
    if (value.type === 'module') this.modules.set(name, value);
    else if (isCallableValue(value)) this.functions.set(name, value);
    else this.values.set(name, value);
  }

  remove(name: string): boolean {
    const removed = [this.values.delete(name), this.functions.delete(name), this.modules.delete(name)];
    return removed.includes(true);
  }

  has(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  names(): string[] {
    return [...this.values.keys(), ...this.functions.keys(), ...this.modules.keys()];
  }

  /** Snapshot of `names` (all names when omitted); unknown names are skipped. */
  snapshot(names?: Iterable<string>): EnvironmentSnapshot {
    const snapshot = new Map<string, PyValue>();
    for (const name of names ?? this.names()) {
      const value = this.lookup(name);
      if (value !== undefined) snapshot.set(name, cloneValue(value));
    }
    return snapshot;
  }
}
