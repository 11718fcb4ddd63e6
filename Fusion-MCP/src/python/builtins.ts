/**
 * Built-in functions, type constructors and the methods of str, list, tuple,
 * dict and set.
 */

import { EXCEPTION_CLASSES, isSubclass, pyError, PyRaise } from './errors.js';
import { formatTemplate, formatValue, toFixed } from './format.js';
import { binaryOp, floorMod, iterate, keyError, toArray, toIndex } from './operators.js';
import {
  NONE,
  asNumeric,
  bindMethod,
  builtin,
  classAttribute,
  dictDelete,
  dictGet,
  dictSet,
  hashKey,
  isCallable,
  isTruthy,
  pyBool,
  pyCompare,
  pyDict,
  pyEquals,
  pyFloat,
  pyInt,
  pyList,
  pySet,
  pyStr,
  pyTuple,
  rangeLength,
  repr,
  setAdd,
  setHas,
  typeName,
  type CallArgs,
  type Numeric,
  type PyBuiltin,
  type PyDict,
  type PyList,
  type PySet,
  type PyStr,
  type PyTuple,
  type PyValue,
} from './values.js';
import type { Interpreter } from './interpreter.js';

// ── Argument helpers ─────────────────────────────────────────────────────────

export function expectArgs(name: string, call: CallArgs, min: number, max = min): PyValue[] {
  const n = call.args.length;
  if (n < min || n > max) {
    const bound = n < min ? min : max;
    const expected = min === max ? `exactly ${min}` : n < min ? `at least ${min}` : `at most ${max}`;
    throw pyError('TypeError', `${name}() takes ${expected} argument${bound === 1 ? '' : 's'} (${n} given)`);
  }
  return call.args;
}

export function keywords(name: string, call: CallArgs, allowed: readonly string[] = []): Map<string, PyValue> {
  for (const key of call.kwargs.keys()) {
    if (!allowed.includes(key)) {
      throw pyError('TypeError', `${name}() got an unexpected keyword argument '${key}'`);
    }
  }
  return call.kwargs;
}

export function numberArg(name: string, v: PyValue): Numeric {
  const n = asNumeric(v);
  if (!n) throw pyError('TypeError', `${name}() argument must be a real number, not '${typeName(v)}'`);
  return n;
}

export function intArg(v: PyValue): bigint {
  if (v.type === 'int') return v.value;
  if (v.type === 'bool') return v.value ? 1n : 0n;
  throw pyError('TypeError', `'${typeName(v)}' object cannot be interpreted as an integer`);
}

export function strArg(name: string, v: PyValue): string {
  if (v.type !== 'str') throw pyError('TypeError', `${name}() argument must be str, not ${typeName(v)}`);
  return v.value;
}

function optional(v: PyValue | undefined): PyValue | undefined {
  return v === undefined || v.type === 'none' ? undefined : v;
}

// ── Conversions ──────────────────────────────────────────────────────────────

const INT_TEXT = /^[+-]?(0[xob])?_?[0-9a-z]+(_[0-9a-z]+)*$/i;

function parseIntText(text: string, base: number): bigint | null {
  const s = text.trim();
  if (!INT_TEXT.test(s)) return null;
  let body = s.replace(/_/g, '').toLowerCase();
  let negative = false;
  if (body[0] === '+' || body[0] === '-') {
    negative = body[0] === '-';
    body = body.slice(1);
  }
  const prefix = body.slice(0, 2);
  const prefixBase = prefix === '0x' ? 16 : prefix === '0o' ? 8 : prefix === '0b' ? 2 : 0;
  let radix = base;
  if (prefixBase !== 0 && (base === 0 || base === prefixBase)) {
    radix = prefixBase;
    body = body.slice(2);
  } else if (base === 0) {
    if (/^0+[1-9]/.test(body)) return null;
    radix = 10;
  }
  if (body === '') return null;
  let value = 0n;
  const big = BigInt(radix);
  for (const ch of body) {
    const digit = parseInt(ch, 36);
    if (Number.isNaN(digit) || digit >= radix) return null;
    value = value * big + BigInt(digit);
  }
  return negative ? -value : value;
}

function toInt(call: CallArgs): PyValue {
  const [value, baseArg] = expectArgs('int', call, 0, 2);
  keywords('int', call);
  if (value === undefined) return pyInt(0n);
  if (baseArg !== undefined) {
    if (value.type !== 'str') throw pyError('TypeError', "int() can't convert non-string with explicit base");
    const base = Number(intArg(baseArg));
    if (base !== 0 && (base < 2 || base > 36)) throw pyError('ValueError', 'int() base must be >= 2 and <= 36, or 0');
    const parsed = parseIntText(value.value, base);
    if (parsed === null) throw pyError('ValueError', `invalid literal for int() with base ${base}: ${repr(value)}`);
    return pyInt(parsed);
  }
  switch (value.type) {
    case 'int': return value;
    case 'bool': return pyInt(value.value ? 1n : 0n);
    case 'float':
      if (Number.isNaN(value.value)) throw pyError('ValueError', 'cannot convert float NaN to integer');
      if (!Number.isFinite(value.value)) throw pyError('OverflowError', 'cannot convert float infinity to integer');
      return pyInt(BigInt(Math.trunc(value.value)));
    case 'str': {
      const parsed = parseIntText(value.value, 10);
      if (parsed === null) throw pyError('ValueError', `invalid literal for int() with base 10: ${repr(value)}`);
      return pyInt(parsed);
    }
    default:
      throw pyError('TypeError', `int() argument must be a string or a real number, not '${typeName(value)}'`);
  }
}

const FLOAT_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
const FLOAT_SPECIAL = /^([+-]?)(inf|infinity|nan)$/i;

export function parseFloatText(text: string): number | null {
  const s = text.trim().replace(/(?<=\d)_(?=\d)/g, '');
  const special = FLOAT_SPECIAL.exec(s);
  if (special) {
    if (special[2].toLowerCase() === 'nan') return NaN;
    return special[1] === '-' ? -Infinity : Infinity;
  }
  return FLOAT_TEXT.test(s) ? Number(s) : null;
}

function toFloat(call: CallArgs): PyValue {
  const [value] = expectArgs('float', call, 0, 1);
  keywords('float', call);
  if (value === undefined) return pyFloat(0);
  if (value.type === 'str') {
    const parsed = parseFloatText(value.value);
    if (parsed === null) throw pyError('ValueError', `could not convert string to float: ${repr(value)}`);
    return pyFloat(parsed);
  }
  const n = asNumeric(value);
  if (!n) throw pyError('TypeError', `float() argument must be a string or a real number, not '${typeName(value)}'`);
  if (n.kind === 'float') return pyFloat(n.value);
  const f = Number(n.value);
  if (!Number.isFinite(f)) throw pyError('OverflowError', 'int too large to convert to float');
  return pyFloat(f);
}

function toDict(call: CallArgs): PyDict {
  const [source] = expectArgs('dict', call, 0, 1);
  const dict = pyDict();
  if (source !== undefined) updateDict(dict, source);
  for (const [key, value] of call.kwargs) dictSet(dict, pyStr(key), value);
  return dict;
}

function updateDict(dict: PyDict, source: PyValue): void {
  if (source.type === 'dict') {
    for (const entry of source.entries.values()) dictSet(dict, entry.key, entry.value);
    return;
  }
  let index = 0;
  for (const item of iterate(source)) {
    const pair = toArray(item);
    if (pair.length !== 2) {
      throw pyError(
        'ValueError',
        `dictionary update sequence element #${index} has length ${pair.length}; 2 is required`,
      );
    }
    dictSet(dict, pair[0], pair[1]);
    index++;
  }
}

function toRange(call: CallArgs): PyValue {
  const args = expectArgs('range', call, 1, 3).map(intArg);
  keywords('range', call);
  const [start, stop, step] = args.length === 1 ? [0n, args[0], 1n] : [args[0], args[1], args[2] ?? 1n];
  if (step === 0n) throw pyError('ValueError', 'range() arg 3 must not be zero');
  return { type: 'range', start, stop, step };
}

// ── Rounding ─────────────────────────────────────────────────────────────────

function roundHalfEven(x: number): number {
  const floor = Math.floor(x);
  const diff = x - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

function round(call: CallArgs): PyValue {
  const [value, digitsArg] = expectArgs('round', call, 1, 2);
  keywords('round', call);
  const n = numberArg('round', value);
  const digits = optional(digitsArg);

  if (digits === undefined) {
    if (n.kind === 'int') return pyInt(n.value);
    if (Number.isNaN(n.value)) throw pyError('ValueError', 'cannot convert float NaN to integer');
    if (!Number.isFinite(n.value)) throw pyError('OverflowError', 'cannot convert float infinity to integer');
    return pyInt(BigInt(roundHalfEven(n.value)));
  }

  const nd = Number(intArg(digits));
  if (n.kind === 'int') {
    if (nd >= 0) return pyInt(n.value);
    const p = 10n ** BigInt(-nd);
    const r = floorMod(n.value, p);
    let base = n.value - r;
    if (2n * r > p || (2n * r === p && (base / p) % 2n !== 0n)) base += p;
    return pyInt(base);
  }
  if (!Number.isFinite(n.value)) return pyFloat(n.value);
  if (nd > 20) return pyFloat(n.value);
  if (nd >= 0) return pyFloat(Number(toFixed(n.value, nd)));
  const p = 10 ** -nd;
  return pyFloat(roundHalfEven(n.value / p) * p);
}

// ── Sequences ────────────────────────────────────────────────────────────────

export function sortValues(interp: Interpreter, items: PyValue[], key: PyValue | undefined, reverse: boolean): PyValue[] {
  const keyed = items.map((value) => ({ value, key: key ? interp.callValue(key, [value]) : value }));
  keyed.sort((a, b) => (reverse ? pyCompare(b.key, a.key) : pyCompare(a.key, b.key)));
  return keyed.map((k) => k.value);
}

function extreme(name: 'min' | 'max', call: CallArgs): PyValue {
  const opts = keywords(name, call, ['key', 'default']);
  const key = optional(opts.get('key'));
  const fallback = opts.get('default');
  if (call.args.length === 0) throw pyError('TypeError', `${name} expected at least 1 argument, got 0`);

  let items: PyValue[];
  if (call.args.length === 1) {
    items = toArray(call.args[0]);
  } else {
    if (fallback !== undefined) {
      throw pyError('TypeError', `Cannot specify a default for ${name}() with multiple positional arguments`);
    }
    items = call.args;
  }
  if (items.length === 0) {
    if (fallback !== undefined) return fallback;
    throw pyError('ValueError', `${name}() iterable argument is empty`);
  }

  const keyOf = (v: PyValue): PyValue => (key ? call.interp.callValue(key, [v]) : v);
  const sign = name === 'max' ? 1 : -1;
  let best = items[0];
  let bestKey = keyOf(best);
  for (const item of items.slice(1)) {
    const k = keyOf(item);
    if (pyCompare(k, bestKey) * sign > 0) {
      best = item;
      bestKey = k;
    }
  }
  return best;
}

function sum(call: CallArgs): PyValue {
  const [iterable, startArg] = expectArgs('sum', call, 1, 2);
  const start = startArg ?? keywords('sum', call, ['start']).get('start') ?? pyInt(0n);
  if (start.type === 'str') throw pyError('TypeError', "sum() can't sum strings [use ''.join(seq) instead]");
  let total: PyValue = start;
  for (const item of iterate(iterable)) total = binaryOp('+', total, item);
  return total;
}

function zip(call: CallArgs): PyValue {
  keywords('zip', call, ['strict']);
  const columns = call.args.map(toArray);
  if (columns.length === 0) return pyList([]);
  const n = Math.min(...columns.map((c) => c.length));
  const rows: PyValue[] = [];
  for (let i = 0; i < n; i++) rows.push(pyTuple(columns.map((c) => c[i])));
  return pyList(rows);
}

// ── Types ────────────────────────────────────────────────────────────────────

const TYPE_NAMES = new Set(['int', 'float', 'str', 'bool', 'list', 'tuple', 'dict', 'set', 'range']);

function isInstance(value: PyValue, cls: PyValue): boolean {
  if (cls.type === 'tuple') return cls.items.some((c) => isInstance(value, c));
  if (cls.type === 'class') {
    return (value.type === 'exception' || value.type === 'instance') && isSubclass(value.cls, cls);
  }
  if (cls.type === 'builtin' && (TYPE_NAMES.has(cls.name) || cls.name === 'object')) {
    const t = typeName(value);
    return cls.name === 'object' || t === cls.name || (cls.name === 'int' && t === 'bool');
  }
  throw pyError('TypeError', 'isinstance() arg 2 must be a type, a tuple of types, or a union');
}

function lengthOf(v: PyValue): bigint {
  switch (v.type) {
    case 'str': return BigInt([...v.value].length);
    case 'list':
    case 'tuple': return BigInt(v.items.length);
    case 'dict':
    case 'set': return BigInt(v.entries.size);
    case 'range': return rangeLength(v);
    default:
      throw pyError('TypeError', `object of type '${typeName(v)}' has no len()`);
  }
}

function radixText(name: string, prefix: string, radix: number, call: CallArgs): PyValue {
  const [value] = expectArgs(name, call, 1);
  const n = intArg(value);
  const digits = (n < 0n ? -n : n).toString(radix);
  return pyStr(`${n < 0n ? '-' : ''}${prefix}${digits}`);
}

function pow(call: CallArgs): PyValue {
  const [base, exp, mod] = expectArgs('pow', call, 2, 3);
  const modulus = optional(mod);
  if (modulus === undefined) return binaryOp('**', base, exp);
  const m = intArg(modulus);
  if (m === 0n) throw pyError('ValueError', 'pow() 3rd argument cannot be 0');
  let b = floorMod(intArg(base), m);
  let e = intArg(exp);
  if (e < 0n) throw pyError('ValueError', 'base is not invertible for the given modulus');
  let result = 1n;
  while (e > 0n) {
    if (e & 1n) result = (result * b) % m;
    b = (b * b) % m;
    e >>= 1n;
  }
  return pyInt(floorMod(result, m));
}

/** Builtins for one interpreter; `type()` results are cached per instance. */
export function createBuiltins(interp: Interpreter): Map<string, PyValue> {
  const table = new Map<string, PyValue>();
  const types = new Map<string, PyBuiltin>();

  const define = (name: string, call: (call: CallArgs) => PyValue): PyBuiltin => {
    const fn = builtin(name, call);
    table.set(name, fn);
    if (TYPE_NAMES.has(name)) types.set(name, fn);
    return fn;
  };

  const typeOf = (v: PyValue): PyValue => {
    if (v.type === 'exception' || v.type === 'instance') return v.cls;
    const name = typeName(v);
    let t = types.get(name);
    if (!t) {
      t = builtin(name, () => {
        throw pyError('TypeError', `cannot create '${name}' instances`);
      });
      types.set(name, t);
    }
    return t;
  };

  define('print', (call) => {
    const opts = keywords('print', call, ['sep', 'end', 'flush']);
    const text = (key: string, fallback: string): string => {
      const v = optional(opts.get(key));
      if (v === undefined) return fallback;
      if (v.type !== 'str') throw pyError('TypeError', `${key} must be None or a string, not ${typeName(v)}`);
      return v.value;
    };
    interp.output(call.args.map((v) => interp.toStr(v)).join(text('sep', ' ')) + text('end', '\n'));
    return NONE;
  });

  define('len', (call) => pyInt(lengthOf(expectArgs('len', call, 1)[0])));
  define('repr', (call) => pyStr(interp.toRepr(expectArgs('repr', call, 1)[0])));
  define('str', (call) => {
    const [value] = expectArgs('str', call, 0, 1);
    return pyStr(value === undefined ? '' : interp.toStr(value));
  });
  define('int', toInt);
  define('float', toFloat);
  define('bool', (call) => {
    const [value] = expectArgs('bool', call, 0, 1);
    return pyBool(value !== undefined && isTruthy(value));
  });
  define('list', (call) => {
    const [value] = expectArgs('list', call, 0, 1);
    return pyList(value === undefined ? [] : toArray(value));
  });
  define('tuple', (call) => {
    const [value] = expectArgs('tuple', call, 0, 1);
    if (value?.type === 'tuple') return value;
    return pyTuple(value === undefined ? [] : toArray(value));
  });
  define('dict', toDict);
  define('set', (call) => {
    const [value] = expectArgs('set', call, 0, 1);
    keywords('set', call);
    return pySet(value === undefined ? [] : iterate(value));
  });
  define('range', toRange);
  define('object', () => {
    throw pyError('TypeError', "cannot create 'object' instances");
  });

  define('abs', (call) => {
    const n = numberArg('abs', expectArgs('abs', call, 1)[0]);
    return n.kind === 'int' ? pyInt(n.value < 0n ? -n.value : n.value) : pyFloat(Math.abs(n.value));
  });
  define('min', (call) => extreme('min', call));
  define('max', (call) => extreme('max', call));
  define('sum', sum);
  define('round', round);
  define('pow', pow);
  define('divmod', (call) => {
    const [a, b] = expectArgs('divmod', call, 2);
    return pyTuple([binaryOp('//', a, b), binaryOp('%', a, b)]);
  });
  define('hex', (call) => radixText('hex', '0x', 16, call));
  define('oct', (call) => radixText('oct', '0o', 8, call));
  define('bin', (call) => radixText('bin', '0b', 2, call));
  define('chr', (call) => {
    const code = intArg(expectArgs('chr', call, 1)[0]);
    if (code < 0n || code > 0x10ffffn) throw pyError('ValueError', 'chr() arg not in range(0x110000)');
    return pyStr(String.fromCodePoint(Number(code)));
  });
  define('ord', (call) => {
    const text = strArg('ord', expectArgs('ord', call, 1)[0]);
    const chars = [...text];
    if (chars.length !== 1) {
      throw pyError('TypeError', `ord() expected a character, but string of length ${chars.length} found`);
    }
    return pyInt(chars[0].codePointAt(0) ?? 0);
  });
  define('format', (call) => {
    const [value, spec] = expectArgs('format', call, 1, 2);
    return pyStr(formatValue(value, spec === undefined ? '' : strArg('format', spec), interp.instanceText));
  });

  define('sorted', (call) => {
    const [iterable] = expectArgs('sorted', call, 1);
    const opts = keywords('sorted', call, ['key', 'reverse']);
    const reverse = opts.get('reverse');
    return pyList(sortValues(interp, toArray(iterable), optional(opts.get('key')), reverse !== undefined && isTruthy(reverse)));
  });
  define('reversed', (call) => {
    const [seq] = expectArgs('reversed', call, 1);
    if (seq.type === 'dict') throw pyError('TypeError', "'dict' object is not reversible");
    return pyList(toArray(seq).reverse());
  });
  define('enumerate', (call) => {
    const [iterable, startArg] = expectArgs('enumerate', call, 1, 2);
    const start = startArg ?? keywords('enumerate', call, ['start']).get('start') ?? pyInt(0n);
    let i = intArg(start);
    const out: PyValue[] = [];
    for (const item of iterate(iterable)) out.push(pyTuple([pyInt(i++), item]));
    return pyList(out);
  });
  define('zip', zip);
  define('map', (call) => {
    if (call.args.length < 2) throw pyError('TypeError', 'map() must have at least two arguments.');
    const [fn, ...rest] = call.args;
    const columns = rest.map(toArray);
    const n = Math.min(...columns.map((c) => c.length));
    const out: PyValue[] = [];
    for (let i = 0; i < n; i++) out.push(interp.callValue(fn, columns.map((c) => c[i])));
    return pyList(out);
  });
  define('filter', (call) => {
    const [fn, iterable] = expectArgs('filter', call, 2);
    const keep = (v: PyValue): boolean => isTruthy(fn.type === 'none' ? v : interp.callValue(fn, [v]));
    return pyList(toArray(iterable).filter(keep));
  });
  define('any', (call) => {
    for (const item of iterate(expectArgs('any', call, 1)[0])) if (isTruthy(item)) return pyBool(true);
    return pyBool(false);
  });
  define('all', (call) => {
    for (const item of iterate(expectArgs('all', call, 1)[0])) if (!isTruthy(item)) return pyBool(false);
    return pyBool(true);
  });

  define('isinstance', (call) => {
    const [value, cls] = expectArgs('isinstance', call, 2);
    return pyBool(isInstance(value, cls));
  });
  define('type', (call) => typeOf(expectArgs('type', call, 1)[0]));
  define('callable', (call) => pyBool(isCallable(expectArgs('callable', call, 1)[0])));
  define('hash', (call) => {
    const key = hashKey(expectArgs('hash', call, 1)[0]);
    let h = 0n;
    for (const ch of key) h = (h * 31n + BigInt(ch.codePointAt(0) ?? 0)) & 0xffffffffffffn;
    return pyInt(h);
  });
  define('getattr', (call) => {
    const [obj, name, fallback] = expectArgs('getattr', call, 2, 3);
    try {
      return getAttribute(obj, strArg('getattr', name));
    } catch (err) {
      if (fallback !== undefined && isAttributeError(err)) return fallback;
      throw err;
    }
  });
  define('hasattr', (call) => {
    const [obj, name] = expectArgs('hasattr', call, 2);
    try {
      getAttribute(obj, strArg('hasattr', name));
      return pyBool(true);
    } catch (err) {
      if (isAttributeError(err)) return pyBool(false);
      throw err;
    }
  });

  for (const [name, cls] of EXCEPTION_CLASSES) table.set(name, cls);
  return table;
}

function isAttributeError(err: unknown): boolean {
  return err instanceof PyRaise && err.exception.cls.name === 'AttributeError';
}

// ── Methods ──────────────────────────────────────────────────────────────────

type Method<T> = (self: T, call: CallArgs) => PyValue;

function methods<T>(table: Record<string, Method<T>>): ReadonlyMap<string, Method<T>> {
  return new Map(Object.entries(table));
}

const WHITESPACE = /\s/;

function stripChars(s: string, chars: PyValue | undefined, left: boolean, right: boolean): string {
  const set = optional(chars);
  const strip = set === undefined ? (ch: string) => WHITESPACE.test(ch) : (ch: string) => strArg('strip', set).includes(ch);
  const cps = [...s];
  let start = 0;
  let end = cps.length;
  if (left) while (start < end && strip(cps[start])) start++;
  if (right) while (end > start && strip(cps[end - 1])) end--;
  return cps.slice(start, end).join('');
}

function splitText(s: string, sepArg: PyValue | undefined, maxArg: PyValue | undefined): string[] {
  const sep = optional(sepArg);
  let max = maxArg === undefined ? -1 : Number(intArg(maxArg));
  if (max < 0) max = Infinity;
  const parts: string[] = [];

  if (sep === undefined) {
    let rest = s.replace(/^\s+/, '');
    while (rest !== '') {
      if (parts.length >= max) {
        parts.push(rest);
        return parts;
      }
      const m = /\s+/.exec(rest);
      if (!m) {
        parts.push(rest);
        return parts;
      }
      parts.push(rest.slice(0, m.index));
      rest = rest.slice(m.index + m[0].length);
    }
    return parts;
  }

  const delimiter = strArg('split', sep);
  if (delimiter === '') throw pyError('ValueError', 'empty separator');
  let rest = s;
  while (parts.length < max) {
    const at = rest.indexOf(delimiter);
    if (at < 0) break;
    parts.push(rest.slice(0, at));
    rest = rest.slice(at + delimiter.length);
  }
  parts.push(rest);
  return parts;
}

function prefixes(name: string, v: PyValue): string[] {
  if (v.type === 'tuple') return v.items.map((item) => strArg(name, item));
  if (v.type !== 'str') {
    throw pyError('TypeError', `${name} first arg must be str or a tuple of str, not ${typeName(v)}`);
  }
  return [v.value];
}

function justify(self: PyStr, call: CallArgs, name: string, place: (pad: number, width: number) => number): PyValue {
  const [widthArg, fillArg] = expectArgs(name, call, 1, 2);
  const width = Number(intArg(widthArg));
  const fill = fillArg === undefined ? ' ' : strArg(name, fillArg);
  if ([...fill].length !== 1) throw pyError('TypeError', 'The fill character must be exactly one character long');
  const len = [...self.value].length;
  if (width <= len) return self;
  const pad = width - len;
  const left = place(pad, width);
  return pyStr(fill.repeat(left) + self.value + fill.repeat(pad - left));
}

function countOccurrences(s: string, sub: string): number {
  if (sub === '') return [...s].length + 1;
  let n = 0;
  for (let at = s.indexOf(sub); at >= 0; at = s.indexOf(sub, at + sub.length)) n++;
  return n;
}

function searchBounds(s: string, call: CallArgs, name: string): { sub: string; start: number; end: number } {
  const [subArg, startArg, endArg] = expectArgs(name, call, 1, 3);
  const norm = (v: PyValue | undefined, fallback: number): number => {
    const o = optional(v);
    if (o === undefined) return fallback;
    let i = Number(intArg(o));
    if (i < 0) i = Math.max(i + s.length, 0);
    return Math.min(i, s.length);
  };
  return { sub: strArg(name, subArg), start: norm(startArg, 0), end: norm(endArg, s.length) };
}

function find(s: string, call: CallArgs, name: string, fromRight: boolean): number {
  const { sub, start, end } = searchBounds(s, call, name);
  const window = s.slice(start, end);
  const at = fromRight ? window.lastIndexOf(sub) : window.indexOf(sub);
  return at < 0 || start > end ? -1 : at + start;
}

const STR_METHODS = methods<PyStr>({
  upper: (s) => pyStr(s.value.toUpperCase()),
  lower: (s) => pyStr(s.value.toLowerCase()),
  swapcase: (s) => pyStr([...s.value].map((c) => (c === c.toUpperCase() ? c.toLowerCase() : c.toUpperCase())).join('')),
  capitalize: (s) => {
    const [first = '', ...rest] = [...s.value];
    return pyStr(first.toUpperCase() + rest.join('').toLowerCase());
  },
  title: (s) => pyStr(s.value.replace(/\p{L}+/gu, (w) => w[0].toUpperCase() + w.slice(1).toLowerCase())),
  strip: (s, call) => pyStr(stripChars(s.value, expectArgs('strip', call, 0, 1)[0], true, true)),
  lstrip: (s, call) => pyStr(stripChars(s.value, expectArgs('lstrip', call, 0, 1)[0], true, false)),
  rstrip: (s, call) => pyStr(stripChars(s.value, expectArgs('rstrip', call, 0, 1)[0], false, true)),
  split: (s, call) => {
    const [sep, max] = expectArgs('split', call, 0, 2);
    const opts = keywords('split', call, ['sep', 'maxsplit']);
    return pyList(splitText(s.value, sep ?? opts.get('sep'), max ?? opts.get('maxsplit')).map(pyStr));
  },
  splitlines: (s) => {
    const lines = s.value.split(/\r\n|\r|\n/);
    if (lines[lines.length - 1] === '') lines.pop();
    return pyList(lines.map(pyStr));
  },
  join: (s, call) => {
    const parts = toArray(expectArgs('join', call, 1)[0]).map((item, i) => {
      if (item.type !== 'str') {
        throw pyError('TypeError', `sequence item ${i}: expected str instance, ${typeName(item)} found`);
      }
      return item.value;
    });
    return pyStr(parts.join(s.value));
  },
  replace: (s, call) => {
    const [oldArg, newArg, countArg] = expectArgs('replace', call, 2, 3);
    const from = strArg('replace', oldArg);
    const to = strArg('replace', newArg);
    const count = countArg === undefined ? -1 : Number(intArg(countArg));
    if (count < 0) return pyStr(s.value.replaceAll(from, to));
    let out = s.value;
    let at = 0;
    for (let i = 0; i < count; i++) {
      const hit = out.indexOf(from, at);
      if (hit < 0) break;
      out = out.slice(0, hit) + to + out.slice(hit + from.length);
      at = hit + to.length + (from === '' ? 1 : 0);
    }
    return pyStr(out);
  },
  startswith: (s, call) => {
    const [prefix] = expectArgs('startswith', call, 1);
    return pyBool(prefixes('startswith', prefix).some((p) => s.value.startsWith(p)));
  },
  endswith: (s, call) => {
    const [suffix] = expectArgs('endswith', call, 1);
    return pyBool(prefixes('endswith', suffix).some((p) => s.value.endsWith(p)));
  },
  find: (s, call) => pyInt(find(s.value, call, 'find', false)),
  rfind: (s, call) => pyInt(find(s.value, call, 'rfind', true)),
  index: (s, call) => {
    const at = find(s.value, call, 'index', false);
    if (at < 0) throw pyError('ValueError', 'substring not found');
    return pyInt(at);
  },
  count: (s, call) => pyInt(countOccurrences(s.value, strArg('count', expectArgs('count', call, 1)[0]))),
  isdigit: (s) => pyBool(/^\p{Nd}+$/u.test(s.value)),
  isnumeric: (s) => pyBool(/^\p{N}+$/u.test(s.value)),
  isalpha: (s) => pyBool(/^\p{L}+$/u.test(s.value)),
  isalnum: (s) => pyBool(/^[\p{L}\p{N}]+$/u.test(s.value)),
  isspace: (s) => pyBool(/^\s+$/.test(s.value)),
  isupper: (s) => pyBool(/\p{Lu}/u.test(s.value) && !/\p{Ll}/u.test(s.value)),
  islower: (s) => pyBool(/\p{Ll}/u.test(s.value) && !/\p{Lu}/u.test(s.value)),
  center: (s, call) => justify(s, call, 'center', (pad, width) => Math.floor(pad / 2) + (pad & width & 1)),
  ljust: (s, call) => justify(s, call, 'ljust', () => 0),
  rjust: (s, call) => justify(s, call, 'rjust', (pad) => pad),
  zfill: (s, call) => {
    const width = Number(intArg(expectArgs('zfill', call, 1)[0]));
    const sign = s.value[0] === '-' || s.value[0] === '+' ? s.value[0] : '';
    const body = s.value.slice(sign.length);
    return pyStr(sign + body.padStart(width - sign.length, '0'));
  },
  format: (s, call) => pyStr(formatTemplate(s.value, call.args, call.kwargs, call.interp.instanceText)),
});

function listIndex(items: readonly PyValue[], value: PyValue): number {
  return items.findIndex((item) => pyEquals(item, value));
}

const LIST_METHODS = methods<PyList>({
  append: (l, call) => {
    l.items.push(expectArgs('append', call, 1)[0]);
    return NONE;
  },
  extend: (l, call) => {
    l.items.push(...toArray(expectArgs('extend', call, 1)[0]));
    return NONE;
  },
  insert: (l, call) => {
    const [indexArg, value] = expectArgs('insert', call, 2);
    let i = Number(intArg(indexArg));
    if (i < 0) i = Math.max(i + l.items.length, 0);
    l.items.splice(Math.min(i, l.items.length), 0, value);
    return NONE;
  },
  pop: (l, call) => {
    const [indexArg] = expectArgs('pop', call, 0, 1);
    if (l.items.length === 0) throw pyError('IndexError', 'pop from empty list');
    let i = indexArg === undefined ? l.items.length - 1 : toIndex(indexArg);
    if (i < 0) i += l.items.length;
    if (i < 0 || i >= l.items.length) throw pyError('IndexError', 'pop index out of range');
    return l.items.splice(i, 1)[0];
  },
  remove: (l, call) => {
    const i = listIndex(l.items, expectArgs('remove', call, 1)[0]);
    if (i < 0) throw pyError('ValueError', 'list.remove(x): x not in list');
    l.items.splice(i, 1);
    return NONE;
  },
  index: (l, call) => {
    const [value] = expectArgs('index', call, 1);
    const i = listIndex(l.items, value);
    if (i < 0) throw pyError('ValueError', `${repr(value)} is not in list`);
    return pyInt(i);
  },
  count: (l, call) => {
    const [value] = expectArgs('count', call, 1);
    return pyInt(l.items.filter((item) => pyEquals(item, value)).length);
  },
  sort: (l, call) => {
    expectArgs('sort', call, 0);
    const opts = keywords('sort', call, ['key', 'reverse']);
    const reverse = opts.get('reverse');
    l.items = sortValues(call.interp, l.items, optional(opts.get('key')), reverse !== undefined && isTruthy(reverse));
    return NONE;
  },
  reverse: (l) => {
    l.items.reverse();
    return NONE;
  },
  clear: (l) => {
    l.items.length = 0;
    return NONE;
  },
  copy: (l) => pyList([...l.items]),
});

const TUPLE_METHODS = methods<PyTuple>({
  index: (t, call) => {
    const i = listIndex(t.items, expectArgs('index', call, 1)[0]);
    if (i < 0) throw pyError('ValueError', 'tuple.index(x): x not in tuple');
    return pyInt(i);
  },
  count: (t, call) => {
    const [value] = expectArgs('count', call, 1);
    return pyInt(t.items.filter((item) => pyEquals(item, value)).length);
  },
});

const DICT_METHODS = methods<PyDict>({
  get: (d, call) => {
    const [key, fallback] = expectArgs('get', call, 1, 2);
    return dictGet(d, key) ?? fallback ?? NONE;
  },
  keys: (d) => pyList([...d.entries.values()].map((e) => e.key)),
  values: (d) => pyList([...d.entries.values()].map((e) => e.value)),
  items: (d) => pyList([...d.entries.values()].map((e) => pyTuple([e.key, e.value]))),
  pop: (d, call) => {
    const [key, fallback] = expectArgs('pop', call, 1, 2);
    const value = dictGet(d, key);
    if (value === undefined) {
      if (fallback !== undefined) return fallback;
      throw keyError(key);
    }
    dictDelete(d, key);
    return value;
  },
  popitem: (d) => {
    const last = [...d.entries.values()].pop();
    if (!last) throw pyError('KeyError', 'popitem(): dictionary is empty');
    dictDelete(d, last.key);
    return pyTuple([last.key, last.value]);
  },
  setdefault: (d, call) => {
    const [key, fallback] = expectArgs('setdefault', call, 1, 2);
    const existing = dictGet(d, key);
    if (existing !== undefined) return existing;
    const value = fallback ?? NONE;
    dictSet(d, key, value);
    return value;
  },
  update: (d, call) => {
    const [source] = expectArgs('update', call, 0, 1);
    if (source !== undefined) updateDict(d, source);
    for (const [key, value] of call.kwargs) dictSet(d, pyStr(key), value);
    return NONE;
  },
  clear: (d) => {
    d.entries.clear();
    return NONE;
  },
  copy: (d) => pyDict([...d.entries.values()].map((e) => [e.key, e.value] as const)),
});

function otherSet(v: PyValue): PySet {
  return v.type === 'set' ? v : pySet(iterate(v));
}

const SET_METHODS = methods<PySet>({
  add: (s, call) => {
    setAdd(s, expectArgs('add', call, 1)[0]);
    return NONE;
  },
  remove: (s, call) => {
    const [item] = expectArgs('remove', call, 1);
    if (!s.entries.delete(hashKey(item))) throw keyError(item);
    return NONE;
  },
  discard: (s, call) => {
    s.entries.delete(hashKey(expectArgs('discard', call, 1)[0]));
    return NONE;
  },
  pop: (s) => {
    if (s.entries.size === 0) throw pyError('KeyError', 'pop from an empty set');
    const [[key, item]] = s.entries;
    s.entries.delete(key);
    return item;
  },
  update: (s, call) => {
    for (const other of call.args) for (const item of iterate(other)) setAdd(s, item);
    return NONE;
  },
  union: (s, call) => {
    const out = pySet(s.entries.values());
    for (const other of call.args) for (const item of iterate(other)) setAdd(out, item);
    return out;
  },
  intersection: (s, call) => {
    const others = call.args.map(otherSet);
    return pySet([...s.entries.values()].filter((item) => others.every((o) => setHas(o, item))));
  },
  difference: (s, call) => {
    const others = call.args.map(otherSet);
    return pySet([...s.entries.values()].filter((item) => !others.some((o) => setHas(o, item))));
  },
  issubset: (s, call) => {
    const other = otherSet(expectArgs('issubset', call, 1)[0]);
    return pyBool([...s.entries.values()].every((item) => setHas(other, item)));
  },
  issuperset: (s, call) => pyBool(toArray(expectArgs('issuperset', call, 1)[0]).every((item) => setHas(s, item))),
  clear: (s) => {
    s.entries.clear();
    return NONE;
  },
  copy: (s) => pySet(s.entries.values()),
});

function bind<T extends PyValue>(table: ReadonlyMap<string, Method<T>>, self: T, name: string): PyValue | undefined {
  const method = table.get(name);
  if (!method) return undefined;
  return builtin(`${typeName(self)}.${name}`, (call) => method(self, call));
}

export function getAttribute(value: PyValue, name: string): PyValue {
  let found: PyValue | undefined;
  switch (value.type) {
    case 'str': found = bind(STR_METHODS, value, name); break;
    case 'list': found = bind(LIST_METHODS, value, name); break;
    case 'tuple': found = bind(TUPLE_METHODS, value, name); break;
    case 'dict': found = bind(DICT_METHODS, value, name); break;
    case 'set': found = bind(SET_METHODS, value, name); break;
    case 'float': {
      const x = value.value;
      if (name === 'is_integer') found = builtin('float.is_integer', () => pyBool(Number.isInteger(x)));
      break;
    }
    case 'int': {
      const magnitude = value.value < 0n ? -value.value : value.value;
      if (name === 'bit_length') {
        found = builtin('int.bit_length', () => pyInt(magnitude === 0n ? 0 : magnitude.toString(2).length));
      }
      break;
    }
    case 'module': {
      found = value.attrs.get(name);
      if (!found) throw pyError('AttributeError', `module '${value.name}' has no attribute '${name}'`);
      break;
    }
    case 'exception':
      if (name === 'args') found = pyTuple(value.args);
      break;
    case 'instance': {
      if (name === '__class__') {
        found = value.cls;
        break;
      }
      const attr = classAttribute(value.cls, name);
      found = value.attrs.get(name) ?? (attr === undefined ? undefined : bindMethod(value, attr));
      break;
    }
    case 'class':
      found = name === '__name__' ? pyStr(value.name) : classAttribute(value, name);
      if (found === undefined) throw pyError('AttributeError', `type object '${value.name}' has no attribute '${name}'`);
      break;
    case 'method':
      if (name === '__self__') found = value.self;
      else if (name === '__name__') found = pyStr(value.func.name);
      break;
    case 'builtin':
    case 'function':
      if (name === '__name__') found = pyStr(value.name);
      break;
    default:
      break;
  }
  if (found === undefined) {
    throw pyError('AttributeError', `'${typeName(value)}' object has no attribute '${name}'`);
  }
  return found;
}

/** Modules, user classes and instances take attribute assignment. */
export function setAttribute(target: PyValue, name: string, value: PyValue): void {
  if (target.type === 'class' && EXCEPTION_CLASSES.get(target.name) === target) {
    throw pyError('TypeError', `cannot set '${name}' attribute of immutable type '${target.name}'`);
  }
  if (target.type !== 'module' && target.type !== 'class' && target.type !== 'instance') {
    throw pyError('AttributeError', `'${typeName(target)}' object attribute '${name}' is read-only`);
  }
  target.attrs.set(name, value);
}
