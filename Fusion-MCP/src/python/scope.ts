import type { PyValue } from './values.js';

/**
 * Module-level namespace. The execution environment implements this so that
 * top-level definitions land in its tables.
 */
export interface GlobalScope {
  lookup(name: string): PyValue | undefined;
  assign(name: string, value: PyValue): void;
  remove(name: string): boolean;
}

const NO_NAMES: ReadonlySet<string> = new Set();

/** Function or comprehension scope. */
export class Scope {
  readonly vars = new Map<string, PyValue>();

  constructor(
    readonly parent: Scope | null,
    readonly localNames: ReadonlySet<string>,
    readonly globalNames: ReadonlySet<string> = NO_NAMES,
    readonly nonlocalNames: ReadonlySet<string> = NO_NAMES,
  ) {}

  /** Nearest scope (this one included) that owns `name` as a local. */
  owner(name: string): Scope | null {
    for (let s: Scope | null = this; s; s = s.parent) {
      if (s.localNames.has(name) && !s.nonlocalNames.has(name) && !s.globalNames.has(name)) return s;
    }
    return null;
  }
}

/** A plain map-backed global scope, for expression evaluation and tests. */
export class MapScope implements GlobalScope {
  constructor(readonly values = new Map<string, PyValue>()) {}

  lookup(name: string): PyValue | undefined {
    return this.values.get(name);
  }

  assign(name: string, value: PyValue): void {
    this.values.set(name, value);
  }

  remove(name: string): boolean {
    return this.values.delete(name);
  }
}
