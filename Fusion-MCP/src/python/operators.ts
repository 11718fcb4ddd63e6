/**
 * Arithmetic, comparison, containment and item access on interpreter values.
 */

import type { BinaryOp, CompareOp, UnaryOp } from './ast.js';
import { exceptionClass, pyError, PyRaise } from './errors.js';
import { formatPercent } from './format.js';
import {
  asNumeric,
  dictDelete,
  dictGet,
  dictSet,
  hashKey,
  isTruthy,
  pyBool,
  pyCompare,
  pyDict,
  pyEquals,
  pyFloat,
  pyInt,
  pyList,
  pyStr,
  pyTuple,
  rangeLength,
  typeName,
  type Numeric,
  type PyDict,
  type PySet,
  type PyValue,
} from './values.js';

/** Largest sequence a repetition may produce. */
const MAX_SEQUENCE = 50_000_000;

// ── Iteration ────────────────────────────────────────────────────────────────

export function* iterate(v: PyValue): Generator<PyValue, void, undefined> {
  switch (v.type) {
    case 'list':
      // Index loop so appends during iteration are seen, as in Python.
      for (let i = 0; i < v.items.length; i++) yield v.items[i];
      return;
    case 'tuple':
      yield* v.items;
      return;
    case 'str':
      for (const ch of v.value) yield pyStr(ch);
      return;
    case 'dict':
      for (const entry of [...v.entries.values()]) yield entry.key;
      return;
    case 'set':
      yield* [...v.entries.values()];
      return;
    case 'range':
      if (v.step > 0n) for (let i = v.start; i < v.stop; i += v.step) yield pyInt(i);
      else for (let i = v.start; i > v.stop; i += v.step) yield pyInt(i);
      return;
    default:
      throw pyError('TypeError', `'${typeName(v)}' object is not iterable`);
  }
}

export function toArray(v: PyValue): PyValue[] {
  return v.type === 'list' ? [...v.items] : [...iterate(v)];
}

// ── Numbers ──────────────────────────────────────────────────────────────────

export function floorDiv(x: bigint, y: bigint): bigint {
  const q = x / y;
  return x % y !== 0n && (x < 0n) !== (y < 0n) ? q - 1n : q;
}

export function floorMod(x: bigint, y: bigint): bigint {
  const r = x % y;
  return r !== 0n && (r < 0n) !== (y < 0n) ? r + y : r;
}

function floatMod(x: number, y: number): number {
  const r = x % y;
  return r !== 0 && (r < 0) !== (y < 0) ? r + y : r;
}

function intPow(base: bigint, exp: bigint): PyValue {
  if (exp < 0n) {
    if (base === 0n) throw pyError('ZeroDivisionError', '0.0 cannot be raised to a negative power');
    return pyFloat(Number(base) ** Number(exp));
  }
  const magnitude = base < 0n ? -base : base;
  if (magnitude > 1n && BigInt(magnitude.toString(2).length) * exp > 1_000_000n) {
    throw pyError('OverflowError', 'integer exponentiation result too large');
  }
  return pyInt(base ** exp);
}

function intOp(op: BinaryOp, x: bigint, y: bigint): PyValue {
  switch (op) {
    case '+': return pyInt(x + y);
    case '-': return pyInt(x - y);
    case '*': return pyInt(x * y);
    case '/':
      if (y === 0n) throw pyError('ZeroDivisionError', 'division by zero');
      return pyFloat(Number(x) / Number(y));
    case '//':
      if (y === 0n) throw pyError('ZeroDivisionError', 'integer division or modulo by zero');
      return pyInt(floorDiv(x, y));
    case '%':
      if (y === 0n) throw pyError('ZeroDivisionError', 'integer modulo by zero');
      return pyInt(floorMod(x, y));
    case '**': return intPow(x, y);
    case '&': return pyInt(x & y);
    case '|': return pyInt(x | y);
    case '^': return pyInt(x ^ y);
    case '<<':
      if (y < 0n) throw pyError('ValueError', 'negative shift count');
      if (y > 1_000_000n) throw pyError('OverflowError', 'too many digits in integer');
      return pyInt(x << y);
    case '>>':
      if (y < 0n) throw pyError('ValueError', 'negative shift count');
      return pyInt(x >> y);
    case '@':
      throw pyError('TypeError', "unsupported operand type(s) for @: 'int' and 'int'");
  }
}

function floatOp(op: BinaryOp, x: number, y: number, left: PyValue, right: PyValue): PyValue {
  switch (op) {
    case '+': return pyFloat(x + y);
    case '-': return pyFloat(x - y);
    case '*': return pyFloat(x * y);
    case '/':
      if (y === 0) throw pyError('ZeroDivisionError', 'float division by zero');
      return pyFloat(x / y);
    case '//':
      if (y === 0) throw pyError('ZeroDivisionError', 'float floor division by zero');
      return pyFloat(Math.floor(x / y));
    case '%':
      if (y === 0) throw pyError('ZeroDivisionError', 'float modulo');
      return pyFloat(floatMod(x, y));
    case '**': {
      if (x === 0 && y < 0) throw pyError('ZeroDivisionError', '0.0 cannot be raised to a negative power');
      if (x < 0 && !Number.isInteger(y)) throw pyError('ValueError', 'math domain error');
      const result = x ** y;
      if (!Number.isFinite(result) && Number.isFinite(x) && Number.isFinite(y)) {
        throw pyError('OverflowError', 'Numerical result out of range');
      }
      return pyFloat(result);
    }
    default:
      throw unsupported(op, left, right);
  }
}

function numericOp(op: BinaryOp, a: Numeric, b: Numeric, left: PyValue, right: PyValue): PyValue {
  if (a.kind === 'int' && b.kind === 'int') return intOp(op, a.value, b.value);
  const x = a.kind === 'int' ? Number(a.value) : a.value;
  const y = b.kind === 'int' ? Number(b.value) : b.value;
  return floatOp(op, x, y, left, right);
}

function unsupported(op: string, a: PyValue, b: PyValue): PyRaise {
  return pyError('TypeError', `unsupported operand type(s) for ${op}: '${typeName(a)}' and '${typeName(b)}'`);
}

function repeatCount(n: PyValue): number | null {
  if (n.type !== 'int' && n.type !== 'bool') return null;
  const count = n.type === 'bool' ? (n.value ? 1 : 0) : Number(n.value);
  return count < 0 ? 0 : count;
}

function repeat<T>(items: readonly T[], count: number): T[] {
  if (items.length * count > MAX_SEQUENCE) throw pyError('MemoryError', '');
  const out: T[] = [];
  for (let i = 0; i < count; i++) out.push(...items);
  return out;
}

// ── Sets ─────────────────────────────────────────────────────────────────────

const SET_OPERATORS = new Set<BinaryOp>(['|', '&', '-', '^']);

function setOp(op: BinaryOp, a: PySet, b: PySet): PySet {
  const left = [...a.entries];
  const right = [...b.entries];
  switch (op) {
    case '|': return { type: 'set', entries: new Map([...left, ...right.filter(([k]) => !a.entries.has(k))]) };
    case '&': return { type: 'set', entries: new Map(left.filter(([k]) => b.entries.has(k))) };
    case '-': return { type: 'set', entries: new Map(left.filter(([k]) => !b.entries.has(k))) };
    default:
      return {
        type: 'set',
        entries: new Map([...left.filter(([k]) => !b.entries.has(k)), ...right.filter(([k]) => !a.entries.has(k))]),
      };
  }
}

function isSubset(a: PySet, b: PySet): boolean {
  for (const key of a.entries.keys()) if (!b.entries.has(key)) return false;
  return true;
}

// ── Operators ────────────────────────────────────────────────────────────────

export function binaryOp(op: BinaryOp, a: PyValue, b: PyValue): PyValue {
  const na = asNumeric(a);
  const nb = asNumeric(b);
  if (na && nb) return numericOp(op, na, nb, a, b);
  if (a.type === 'set' && b.type === 'set' && SET_OPERATORS.has(op)) return setOp(op, a, b);

  switch (op) {
    case '+':
      if (a.type === 'str' && b.type === 'str') return pyStr(a.value + b.value);
      if (a.type === 'list' && b.type === 'list') return pyList([...a.items, ...b.items]);
      if (a.type === 'tuple' && b.type === 'tuple') return pyTuple([...a.items, ...b.items]);
      if (a.type === 'str' || b.type === 'str') {
        const other = a.type === 'str' ? b : a;
        throw pyError('TypeError', `can only concatenate str (not "${typeName(other)}") to str`);
      }
      break;
    case '*': {
      const [seq, n] = na ? [b, a] : [a, b];
      const count = repeatCount(n);
      if (count === null) break;
      if (seq.type === 'str') {
        if (seq.value.length * count > MAX_SEQUENCE) throw pyError('MemoryError', '');
        return pyStr(seq.value.repeat(count));
      }
      if (seq.type === 'list') return pyList(repeat(seq.items, count));
      if (seq.type === 'tuple') return pyTuple(repeat(seq.items, count));
      break;
    }
    case '%':
      if (a.type === 'str') {
        const args: PyValue[] | PyDict = b.type === 'tuple' ? [...b.items] : b.type === 'dict' ? b : [b];
        return pyStr(formatPercent(a.value, args));
      }
      break;
    case '|':
      if (a.type === 'dict' && b.type === 'dict') {
        const merged = pyDict();
        for (const entry of a.entries.values()) dictSet(merged, entry.key, entry.value);
        for (const entry of b.entries.values()) dictSet(merged, entry.key, entry.value);
        return merged;
      }
      break;
    default:
      break;
  }
  throw unsupported(op, a, b);
}

/**
 * Augmented assignment. Lists extend and dicts update in place; everything
 * else rebinds to the plain operator's result.
 */
export function inplaceOp(op: BinaryOp, a: PyValue, b: PyValue): PyValue {
  if (op === '+' && a.type === 'list') {
    a.items.push(...toArray(b));
    return a;
  }
  if (op === '|' && a.type === 'dict' && b.type === 'dict') {
    for (const entry of b.entries.values()) dictSet(a, entry.key, entry.value);
    return a;
  }
  if (a.type === 'set' && b.type === 'set' && SET_OPERATORS.has(op)) {
    const result = setOp(op, a, b);
    a.entries = result.entries;
    return a;
  }
  return binaryOp(op, a, b);
}

export function unaryOp(op: UnaryOp, v: PyValue): PyValue {
  if (op === 'not') return pyBool(!isTruthy(v));
  const n = asNumeric(v);
  if (n) {
    switch (op) {
      case '-': return n.kind === 'int' ? pyInt(-n.value) : pyFloat(-n.value);
      case '+': return n.kind === 'int' ? pyInt(n.value) : pyFloat(n.value);
      case '~':
        if (n.kind === 'int') return pyInt(-n.value - 1n);
        break;
    }
  }
  throw pyError('TypeError', `bad operand type for unary ${op}: '${typeName(v)}'`);
}

function identical(a: PyValue, b: PyValue): boolean {
  if (a === b) return true;
  if (a.type === 'none' && b.type === 'none') return true;
  if (a.type === 'bool' && b.type === 'bool') return a.value === b.value;
  // Small ints and short strings are interned.
  if (a.type === 'int' && b.type === 'int') return a.value === b.value && a.value >= -5n && a.value <= 256n;
  return false;
}

export function contains(container: PyValue, item: PyValue): boolean {
  switch (container.type) {
    case 'str':
      if (item.type !== 'str') {
        throw pyError('TypeError', `'in <string>' requires string as left operand, not ${typeName(item)}`);
      }
      return container.value.includes(item.value);
    case 'list':
    case 'tuple':
      return container.items.some((x) => pyEquals(x, item));
    case 'dict':
    case 'set':
      return container.entries.has(hashKey(item));
    case 'range': {
      const n = asNumeric(item);
      if (!n || n.kind !== 'int') return false;
      const { start, stop, step } = container;
      const inBounds = step > 0n ? n.value >= start && n.value < stop : n.value <= start && n.value > stop;
      return inBounds && (n.value - start) % step === 0n;
    }
    default:
      throw pyError('TypeError', `argument of type '${typeName(container)}' is not iterable`);
  }
}

export function compareOp(op: CompareOp, a: PyValue, b: PyValue): boolean {
  switch (op) {
    case '==': return pyEquals(a, b);
    case '!=': return !pyEquals(a, b);
    case 'in': return contains(b, a);
    case 'not in': return !contains(b, a);
    case 'is': return identical(a, b);
    case 'is not': return !identical(a, b);
    default:
      return ordered(op, a, b);
  }
}

function ordered(op: '<' | '>' | '<=' | '>=', a: PyValue, b: PyValue): boolean {
  // NaN compares false every way.
  if ((a.type === 'float' && Number.isNaN(a.value)) || (b.type === 'float' && Number.isNaN(b.value))) {
    return false;
  }
  if (a.type === 'set' && b.type === 'set') {
    switch (op) {
      case '<=': return isSubset(a, b);
      case '>=': return isSubset(b, a);
      case '<': return a.entries.size < b.entries.size && isSubset(a, b);
      case '>': return b.entries.size < a.entries.size && isSubset(b, a);
    }
  }
  let c: number;
  try {
    c = pyCompare(a, b);
  } catch (err) {
    if (err instanceof PyRaise) {
      throw pyError('TypeError', `'${op}' not supported between instances of '${typeName(a)}' and '${typeName(b)}'`);
    }
    throw err;
  }
  switch (op) {
    case '<': return c < 0;
    case '>': return c > 0;
    case '<=': return c <= 0;
    case '>=': return c >= 0;
  }
}

// ── Item access ──────────────────────────────────────────────────────────────

export function toIndex(v: PyValue, what = 'indices'): number {
  if (v.type === 'int') return Number(v.value);
  if (v.type === 'bool') return v.value ? 1 : 0;
  throw pyError('TypeError', `${what} must be integers, not ${typeName(v)}`);
}

export function keyError(key: PyValue): PyRaise {
  return new PyRaise({ type: 'exception', cls: exceptionClass('KeyError'), args: [key] });
}

function sequenceIndex(len: number, index: PyValue, kind: string): number {
  if (index.type !== 'int' && index.type !== 'bool') {
    throw pyError('TypeError', `${kind} indices must be integers or slices, not ${typeName(index)}`);
  }
  let i = toIndex(index);
  if (i < 0) i += len;
  if (i < 0 || i >= len) throw pyError('IndexError', `${kind} index out of range`);
  return i;
}

export interface SliceBounds {
  lower: PyValue;
  upper: PyValue;
  step: PyValue;
}

/** Indices selected by a slice over a sequence of `len` items. */
export function sliceIndices(len: number, bounds: SliceBounds): number[] {
  const step = bounds.step.type === 'none' ? 1 : toIndex(bounds.step, 'slice indices');
  if (step === 0) throw pyError('ValueError', 'slice step cannot be zero');
  const clamp = (v: PyValue, fallback: number): number => {
    if (v.type === 'none') return fallback;
    let i = toIndex(v, 'slice indices');
    if (i < 0) i += len;
    if (step > 0) return Math.min(Math.max(i, 0), len);
    return Math.min(Math.max(i, -1), len - 1);
  };
  const start = clamp(bounds.lower, step > 0 ? 0 : len - 1);
  const stop = clamp(bounds.upper, step > 0 ? len : -1);
  const out: number[] = [];
  if (step > 0) for (let i = start; i < stop; i += step) out.push(i);
  else for (let i = start; i > stop; i += step) out.push(i);
  return out;
}

export function getItem(container: PyValue, index: PyValue): PyValue {
  switch (container.type) {
    case 'list':
      return container.items[sequenceIndex(container.items.length, index, 'list')];
    case 'tuple':
      return container.items[sequenceIndex(container.items.length, index, 'tuple')];
    case 'str': {
      const chars = [...container.value];
      return pyStr(chars[sequenceIndex(chars.length, index, 'string')]);
    }
    case 'dict': {
      const value = dictGet(container, index);
      if (value === undefined) throw keyError(index);
      return value;
    }
    case 'range': {
      const len = rangeLength(container);
      const i = sequenceIndex(Number(len), index, 'range object');
      return pyInt(container.start + BigInt(i) * container.step);
    }
    default:
      throw pyError('TypeError', `'${typeName(container)}' object is not subscriptable`);
  }
}

export function getSlice(container: PyValue, bounds: SliceBounds): PyValue {
  switch (container.type) {
    case 'list':
      return pyList(sliceIndices(container.items.length, bounds).map((i) => container.items[i]));
    case 'tuple':
      return pyTuple(sliceIndices(container.items.length, bounds).map((i) => container.items[i]));
    case 'str': {
      const chars = [...container.value];
      return pyStr(sliceIndices(chars.length, bounds).map((i) => chars[i]).join(''));
    }
    case 'range': {
      const len = Number(rangeLength(container));
      const picked = sliceIndices(len, bounds).map((i) => container.start + BigInt(i) * container.step);
      return pyList(picked.map(pyInt));
    }
    default:
      throw pyError('TypeError', `'${typeName(container)}' object is not subscriptable`);
  }
}

export function setItem(container: PyValue, index: PyValue, value: PyValue): void {
  if (container.type === 'list') {
    container.items[sequenceIndex(container.items.length, index, 'list')] = value;
    return;
  }
  if (container.type === 'dict') {
    dictSet(container, index, value);
    return;
  }
  throw pyError('TypeError', `'${typeName(container)}' object does not support item assignment`);
}

export function setSlice(container: PyValue, bounds: SliceBounds, value: PyValue): void {
  if (container.type !== 'list') {
    throw pyError('TypeError', `'${typeName(container)}' object does not support item assignment`);
  }
  const replacement = toArray(value);
  const indices = sliceIndices(container.items.length, bounds);
  const contiguous = bounds.step.type === 'none' || (bounds.step.type === 'int' && bounds.step.value === 1n);
  if (contiguous) {
    const len = container.items.length;
    let start = bounds.lower.type === 'none' ? 0 : toIndex(bounds.lower, 'slice indices');
    if (start < 0) start = Math.max(start + len, 0);
    start = Math.min(start, len);
    const count = indices.length;
    container.items.splice(start, count, ...replacement);
    return;
  }
  if (replacement.length !== indices.length) {
    throw pyError(
      'ValueError',
      `attempt to assign sequence of size ${replacement.length} to extended slice of size ${indices.length}`,
    );
  }
  indices.forEach((i, k) => {
    container.items[i] = replacement[k];
  });
}

export function deleteItem(container: PyValue, index: PyValue): void {
  if (container.type === 'list') {
    container.items.splice(sequenceIndex(container.items.length, index, 'list'), 1);
    return;
  }
  if (container.type === 'dict') {
    if (!dictDelete(container, index)) throw keyError(index);
    return;
  }
  throw pyError('TypeError', `'${typeName(container)}' object doesn't support item deletion`);
}

export function deleteSlice(container: PyValue, bounds: SliceBounds): void {
  if (container.type !== 'list') {
    throw pyError('TypeError', `'${typeName(container)}' object doesn't support item deletion`);
  }
  const doomed = new Set(sliceIndices(container.items.length, bounds));
  container.items = container.items.filter((_, i) => !doomed.has(i));
}
