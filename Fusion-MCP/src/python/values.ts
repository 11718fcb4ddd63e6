/**
 * Runtime values of the native interpreter.
 *
 * Data kinds (`none` through `dict`, plus `range` and `set`) can cross into
 * other languages through the marshalling adapters; the remaining kinds exist
 * only inside the interpreter.
 */

import type { Expr, Stmt } from './ast.js';
import type { Scope } from './scope.js';
import type { Interpreter } from './interpreter.js';
import { pyError } from './errors.js';

export interface PyNone { type: 'none' }
export interface PyBool { type: 'bool'; value: boolean }
export interface PyInt { type: 'int'; value: bigint }
export interface PyFloat { type: 'float'; value: number }
export interface PyStr { type: 'str'; value: string }
export interface PyList { type: 'list'; items: PyValue[] }
export interface PyTuple { type: 'tuple'; items: readonly PyValue[] }

export interface DictEntry { key: PyValue; value: PyValue }
/** Entries keyed by {@link hashKey}; insertion order is iteration order. */
export interface PyDict { type: 'dict'; entries: Map<string, DictEntry> }

export interface PyRange { type: 'range'; start: bigint; stop: bigint; step: bigint }

/** Members keyed by {@link hashKey}, in insertion order. */
export interface PySet { type: 'set'; entries: Map<string, PyValue> }

export interface FunctionParam {
  name: string;
  kind: 'normal' | 'varargs' | 'kwonly' | 'kwargs';
  defaultValue: PyValue | null;
}

export interface PyFunction {
  type: 'function';
  name: string;
  params: FunctionParam[];
  body: Stmt[] | Expr;
  closure: Scope | null;
  localNames: ReadonlySet<string>;
  globalNames: ReadonlySet<string>;
  nonlocalNames: ReadonlySet<string>;
}

export interface CallArgs {
  args: PyValue[];
  kwargs: Map<string, PyValue>;
  interp: Interpreter;
}

export interface PyBuiltin {
  type: 'builtin';
  name: string;
  call: (call: CallArgs) => PyValue;
}

export interface PyModule { type: 'module'; name: string; attrs: Map<string, PyValue> }
export interface PyClass { type: 'class'; name: string; base: PyClass | null; attrs: Map<string, PyValue> }
export interface PyInstance { type: 'instance'; cls: PyClass; attrs: Map<string, PyValue> }
export interface PyMethod { type: 'method'; self: PyValue; func: PyFunction | PyBuiltin }
export interface PyException { type: 'exception'; cls: PyClass; args: PyValue[] }

export type PyData = PyNone | PyBool | PyInt | PyFloat | PyStr | PyList | PyTuple | PyDict | PyRange | PySet;
export type PyValue = PyData | PyFunction | PyBuiltin | PyModule | PyClass | PyInstance | PyMethod | PyException;

// ── Constructors ─────────────────────────────────────────────────────────────

export const NONE: PyNone = { type: 'none' };
export const TRUE: PyBool = { type: 'bool', value: true };
export const FALSE: PyBool = { type: 'bool', value: false };

export const pyBool = (value: boolean): PyBool => (value ? TRUE : FALSE);
export const pyInt = (value: bigint | number): PyInt => ({ type: 'int', value: BigInt(value) });
export const pyFloat = (value: number): PyFloat => ({ type: 'float', value });
export const pyStr = (value: string): PyStr => ({ type: 'str', value });
export const pyList = (items: PyValue[]): PyList => ({ type: 'list', items });
export const pyTuple = (items: readonly PyValue[]): PyTuple => ({ type: 'tuple', items });

export function pyDict(pairs: Iterable<readonly [PyValue, PyValue]> = []): PyDict {
  const dict: PyDict = { type: 'dict', entries: new Map() };
  for (const [key, value] of pairs) dictSet(dict, key, value);
  return dict;
}

export function pySet(items: Iterable<PyValue> = []): PySet {
  const set: PySet = { type: 'set', entries: new Map() };
  for (const item of items) setAdd(set, item);
  return set;
}

export function builtin(name: string, call: (call: CallArgs) => PyValue): PyBuiltin {
  return { type: 'builtin', name, call };
}

// ── Classes ──────────────────────────────────────────────────────────────────

/** Look `name` up on `cls` and then its bases. */
export function classAttribute(cls: PyClass, name: string): PyValue | undefined {
  for (let c: PyClass | null = cls; c; c = c.base) {
    const value = c.attrs.get(name);
    if (value !== undefined) return value;
  }
  return undefined;
}

/** Functions found on a class bind to the instance they were read through. */
export function bindMethod(self: PyValue, attr: PyValue): PyValue {
  return attr.type === 'function' || attr.type === 'builtin' ? { type: 'method', self, func: attr } : attr;
}

const identities = new WeakMap<object, number>();
let nextIdentity = 1;

function identityOf(obj: object): number {
  let id = identities.get(obj);
  if (id === undefined) {
    id = nextIdentity++;
    identities.set(obj, id);
  }
  return id;
}

// ── Introspection ────────────────────────────────────────────────────────────

export function typeName(v: PyValue): string {
  switch (v.type) {
    case 'none': return 'NoneType';
    case 'builtin': return 'builtin_function_or_method';
    case 'class': return 'type';
    case 'instance': return v.cls.name;
    case 'exception': return v.cls.name;
    default: return v.type;
  }
}

export function isTruthy(v: PyValue): boolean {
  switch (v.type) {
    case 'none': return false;
    case 'bool': return v.value;
    case 'int': return v.value !== 0n;
    case 'float': return v.value !== 0;
    case 'str': return v.value.length > 0;
    case 'list':
    case 'tuple': return v.items.length > 0;
    case 'dict':
    case 'set': return v.entries.size > 0;
    case 'range': return rangeLength(v) > 0n;
    default: return true;
  }
}

export function isCallable(v: PyValue): boolean {
  return v.type === 'function' || v.type === 'builtin' || v.type === 'class' || v.type === 'method';
}

export function rangeLength(r: PyRange): bigint {
  if (r.step > 0n) return r.stop > r.start ? (r.stop - r.start + r.step - 1n) / r.step : 0n;
  return r.start > r.stop ? (r.start - r.stop - r.step - 1n) / -r.step : 0n;
}

// ── Numbers ──────────────────────────────────────────────────────────────────

export type Numeric = { kind: 'int'; value: bigint } | { kind: 'float'; value: number };

/** int, float and bool as a number; `null` for anything else. */
export function asNumeric(v: PyValue): Numeric | null {
  switch (v.type) {
    case 'bool': return { kind: 'int', value: v.value ? 1n : 0n };
    case 'int': return { kind: 'int', value: v.value };
    case 'float': return { kind: 'float', value: v.value };
    default: return null;
  }
}

export function toNumber(n: Numeric): number {
  return n.kind === 'int' ? Number(n.value) : n.value;
}

// ── Hashing and equality ─────────────────────────────────────────────────────

/** Key under which a value is stored in a dict. Equal numbers share a key. */
export function hashKey(v: PyValue): string {
  switch (v.type) {
    case 'none': return 'N';
    case 'bool': return v.value ? 'n:1' : 'n:0';
    case 'int': return `n:${v.value}`;
    case 'float':
      return Number.isInteger(v.value) ? `n:${BigInt(v.value)}` : `f:${floatRepr(v.value)}`;
    case 'str': return `s:${v.value}`;
    case 'tuple': return `t:(${v.items.map(hashKey).join(',')})`;
    case 'function':
    case 'builtin':
    case 'module':
    case 'class':
      return `o:${v.type}:${v.name}`;
    case 'instance':
      return `i:${identityOf(v)}`;
    default:
      throw pyError('TypeError', `unhashable type: '${typeName(v)}'`);
  }
}

export function pyEquals(a: PyValue, b: PyValue): boolean {
  const na = asNumeric(a);
  const nb = asNumeric(b);
  if (na && nb) {
    if (na.kind === 'int' && nb.kind === 'int') return na.value === nb.value;
    return toNumber(na) === toNumber(nb);
  }
  if (a.type !== b.type) return false;
  switch (a.type) {
    case 'none': return true;
    case 'str': return b.type === 'str' && a.value === b.value;
    case 'list':
    case 'tuple': {
      if (b.type !== 'list' && b.type !== 'tuple') return false;
      if (a.items.length !== b.items.length) return false;
      return a.items.every((item, i) => pyEquals(item, b.items[i]));
    }
    case 'dict': {
      if (b.type !== 'dict' || a.entries.size !== b.entries.size) return false;
      for (const [key, entry] of a.entries) {
        const other = b.entries.get(key);
        if (!other || !pyEquals(entry.value, other.value)) return false;
      }
      return true;
    }
    case 'set': {
      if (b.type !== 'set' || a.entries.size !== b.entries.size) return false;
      for (const key of a.entries.keys()) if (!b.entries.has(key)) return false;
      return true;
    }
    case 'range':
      return b.type === 'range' && a.start === b.start && a.stop === b.stop && a.step === b.step;
    case 'method':
      return b.type === 'method' && a.self === b.self && a.func === b.func;
    default:
      return a === b;
  }
}

/** Three-way ordering for `<`, `sorted` and friends. */
export function pyCompare(a: PyValue, b: PyValue): number {
  const na = asNumeric(a);
  const nb = asNumeric(b);
  if (na && nb) {
    if (na.kind === 'int' && nb.kind === 'int') return na.value < nb.value ? -1 : na.value > nb.value ? 1 : 0;
    const x = toNumber(na);
    const y = toNumber(nb);
    return x < y ? -1 : x > y ? 1 : 0;
  }
  if (a.type === 'str' && b.type === 'str') {
    return a.value < b.value ? -1 : a.value > b.value ? 1 : 0;
  }
  if ((a.type === 'list' && b.type === 'list') || (a.type === 'tuple' && b.type === 'tuple')) {
    const n = Math.min(a.items.length, b.items.length);
    for (let i = 0; i < n; i++) {
      if (!pyEquals(a.items[i], b.items[i])) return pyCompare(a.items[i], b.items[i]);
    }
    return a.items.length - b.items.length;
  }
  throw pyError('TypeError', `'<' not supported between instances of '${typeName(a)}' and '${typeName(b)}'`);
}

// ── Dicts ────────────────────────────────────────────────────────────────────

export function dictGet(dict: PyDict, key: PyValue): PyValue | undefined {
  return dict.entries.get(hashKey(key))?.value;
}

export function dictSet(dict: PyDict, key: PyValue, value: PyValue): void {
  const k = hashKey(key);
  const existing = dict.entries.get(k);
  // Overwriting keeps the first key object.
  dict.entries.set(k, { key: existing ? existing.key : key, value });
}

export function dictDelete(dict: PyDict, key: PyValue): boolean {
  return dict.entries.delete(hashKey(key));
}

// ── Sets ─────────────────────────────────────────────────────────────────────

export function setAdd(set: PySet, item: PyValue): void {
  const k = hashKey(item);
  if (!set.entries.has(k)) set.entries.set(k, item);
}

export function setHas(set: PySet, item: PyValue): boolean {
  return set.entries.has(hashKey(item));
}

// ── Text conversion ──────────────────────────────────────────────────────────

/** Shortest round-trip representation, in Python's layout. */
export function floatRepr(x: number): string {
  if (Number.isNaN(x)) return 'nan';
  if (x === Infinity) return 'inf';
  if (x === -Infinity) return '-inf';
  if (x === 0) return Object.is(x, -0) ? '-0.0' : '0.0';

  const sign = x < 0 ? '-' : '';
  const [mantissa, expText] = Math.abs(x).toExponential().split('e');
  const exp = Number(expText);
  const digits = mantissa.replace('.', '');

  if (exp < -4 || exp >= 16) {
    const m = digits.length > 1 ? `${digits[0]}.${digits.slice(1)}` : digits;
    const e = `${exp < 0 ? '-' : '+'}${String(Math.abs(exp)).padStart(2, '0')}`;
    return `${sign}${m}e${e}`;
  }
  if (exp >= 0) {
    if (digits.length <= exp + 1) return `${sign}${digits}${'0'.repeat(exp + 1 - digits.length)}.0`;
    return `${sign}${digits.slice(0, exp + 1)}.${digits.slice(exp + 1)}`;
  }
  return `${sign}0.${'0'.repeat(-exp - 1)}${digits}`;
}

export function strRepr(s: string): string {
  const quote = s.includes("'") && !s.includes('"') ? '"' : "'";
  let out = quote;
  for (const ch of s) {
    if (ch === quote || ch === '\\') out += `\\${ch}`;
    else if (ch === '\n') out += '\\n';
    else if (ch === '\r') out += '\\r';
    else if (ch === '\t') out += '\\t';
    else if (ch < ' ' || ch === '\x7f') out += `\\x${ch.charCodeAt(0).toString(16).padStart(2, '0')}`;
    else out += ch;
  }
  return out + quote;
}

/** Text of an instance, supplied by the interpreter so `__str__` and `__repr__` run. */
export type InstanceText = (obj: PyInstance, kind: 'str' | 'repr') => string;

const defaultInstanceText: InstanceText = (obj) => `<${obj.cls.name} object>`;

export function repr(v: PyValue, text: InstanceText = defaultInstanceText): string {
  const r = (item: PyValue): string => repr(item, text);
  switch (v.type) {
    case 'none': return 'None';
    case 'bool': return v.value ? 'True' : 'False';
    case 'int': return v.value.toString();
    case 'float': return floatRepr(v.value);
    case 'str': return strRepr(v.value);
    case 'list': return `[${v.items.map(r).join(', ')}]`;
    case 'tuple':
      return v.items.length === 1 ? `(${r(v.items[0])},)` : `(${v.items.map(r).join(', ')})`;
    case 'dict':
      return `{${[...v.entries.values()].map((e) => `${r(e.key)}: ${r(e.value)}`).join(', ')}}`;
    case 'set':
      return v.entries.size === 0 ? 'set()' : `{${[...v.entries.values()].map(r).join(', ')}}`;
    case 'range':
      return v.step === 1n ? `range(${v.start}, ${v.stop})` : `range(${v.start}, ${v.stop}, ${v.step})`;
    case 'function': return `<function ${v.name}>`;
    case 'builtin': return `<built-in function ${v.name}>`;
    case 'module': return `<module '${v.name}'>`;
    case 'class': return `<class '${v.name}'>`;
    case 'instance': return text(v, 'repr');
    case 'method': return `<bound method ${typeName(v.self)}.${v.func.name}>`;
    case 'exception': return `${v.cls.name}(${v.args.map(r).join(', ')})`;
  }
}

export function str(v: PyValue, text: InstanceText = defaultInstanceText): string {
  switch (v.type) {
    case 'str': return v.value;
    case 'instance': return text(v, 'str');
    case 'exception': {
      if (v.args.length === 0) return '';
      if (v.args.length === 1) {
        return v.cls.name === 'KeyError' ? repr(v.args[0], text) : str(v.args[0], text);
      }
      return repr(pyTuple(v.args), text);
    }
    default: return repr(v, text);
  }
}

/** `ValueError: bad input` as printed for an uncaught exception. */
export function formatException(exc: PyException): string {
  const text = str(exc);
  return text === '' ? exc.cls.name : `${exc.cls.name}: ${text}`;
}
