/**
 * Standard modules available to `import`: math, random, time, datetime and
 * json.
 * Anything else raises ModuleNotFoundError; there is no file system or
 * process access from native code.
 */

import { pyError } from './errors.js';
import { expectArgs, intArg, keywords, numberArg, strArg } from './builtins.js';
import { toArray } from './operators.js';
import {
  NONE,
  builtin,
  dictSet,
  floatRepr,
  isTruthy,
  pyBool,
  pyCompare,
  pyDict,
  pyFloat,
  pyInt,
  pyList,
  pyStr,
  toNumber,
  typeName,
  type CallArgs,
  type PyClass,
  type PyDict,
  type PyInstance,
  type PyModule,
  type PyValue,
} from './values.js';

/** Services a module needs from the interpreter hosting it. */
export interface ModuleHost {
  random(): number;
  seed(value: number): void;
  /** Block for `seconds`, but never past the execution deadline. */
  sleep(seconds: number): void;
}

export const MODULE_NAMES = ['math', 'random', 'time', 'datetime', 'json'] as const;

function module(name: string, attrs: Record<string, PyValue>): PyModule {
  return { type: 'module', name, attrs: new Map(Object.entries(attrs)) };
}

function fn(name: string, call: (call: CallArgs) => PyValue): PyValue {
  return builtin(name, call);
}

function unaryFloat(name: string, op: (x: number) => number, domain?: (x: number) => boolean): PyValue {
  return fn(name, (call) => {
    const x = toNumber(numberArg(name, expectArgs(name, call, 1)[0]));
    if (domain && !domain(x)) throw pyError('ValueError', 'math domain error');
    const result = op(x);
    if (!Number.isFinite(result) && Number.isFinite(x)) throw pyError('OverflowError', 'math range error');
    return pyFloat(result);
  });
}

function floatArgs(name: string, call: CallArgs, count: number): number[] {
  return expectArgs(name, call, count).map((v) => toNumber(numberArg(name, v)));
}

function gcd(a: bigint, b: bigint): bigint {
  let x = a < 0n ? -a : a;
  let y = b < 0n ? -b : b;
  while (y !== 0n) [x, y] = [y, x % y];
  return x;
}

function factorial(n: bigint): bigint {
  let result = 1n;
  for (let i = 2n; i <= n; i++) result *= i;
  return result;
}

function floatToInt(x: number): bigint {
  if (Number.isNaN(x)) throw pyError('ValueError', 'cannot convert float NaN to integer');
  if (!Number.isFinite(x)) throw pyError('OverflowError', 'cannot convert float infinity to integer');
  return BigInt(x);
}

/** floor, ceil and trunc: ints pass through, floats round by `op`. */
function toIntegral(name: string, op: (x: number) => number): PyValue {
  return fn(name, (call) => {
    const v = expectArgs(name, call, 1)[0];
    if (v.type === 'int' || v.type === 'bool') return pyInt(intArg(v));
    return pyInt(floatToInt(op(toNumber(numberArg(name, v)))));
  });
}

function createMath(): PyModule {
  return module('math', {
    pi: pyFloat(Math.PI),
    e: pyFloat(Math.E),
    tau: pyFloat(2 * Math.PI),
    inf: pyFloat(Infinity),
    nan: pyFloat(NaN),
    sqrt: unaryFloat('sqrt', Math.sqrt, (x) => x >= 0),
    exp: unaryFloat('exp', Math.exp),
    log2: unaryFloat('log2', Math.log2, (x) => x > 0),
    log10: unaryFloat('log10', Math.log10, (x) => x > 0),
    sin: unaryFloat('sin', Math.sin),
    cos: unaryFloat('cos', Math.cos),
    tan: unaryFloat('tan', Math.tan),
    asin: unaryFloat('asin', Math.asin, (x) => x >= -1 && x <= 1),
    acos: unaryFloat('acos', Math.acos, (x) => x >= -1 && x <= 1),
    atan: unaryFloat('atan', Math.atan),
    fabs: unaryFloat('fabs', Math.abs),
    degrees: unaryFloat('degrees', (x) => (x * 180) / Math.PI),
    radians: unaryFloat('radians', (x) => (x * Math.PI) / 180),
    log: fn('log', (call) => {
      const [xArg, baseArg] = expectArgs('log', call, 1, 2);
      const x = toNumber(numberArg('log', xArg));
      if (x <= 0) throw pyError('ValueError', 'math domain error');
      if (baseArg === undefined) return pyFloat(Math.log(x));
      const base = toNumber(numberArg('log', baseArg));
      if (base <= 0 || base === 1) throw pyError('ValueError', 'math domain error');
      return pyFloat(Math.log(x) / Math.log(base));
    }),
    pow: fn('pow', (call) => {
      const [x, y] = floatArgs('pow', call, 2);
      return pyFloat(x ** y);
    }),
    atan2: fn('atan2', (call) => {
      const [y, x] = floatArgs('atan2', call, 2);
      return pyFloat(Math.atan2(y, x));
    }),
    hypot: fn('hypot', (call) => pyFloat(Math.hypot(...call.args.map((v) => toNumber(numberArg('hypot', v)))))),
    copysign: fn('copysign', (call) => {
      const [x, y] = floatArgs('copysign', call, 2);
      const negative = y < 0 || Object.is(y, -0);
      return pyFloat(negative ? -Math.abs(x) : Math.abs(x));
    }),
    floor: toIntegral('floor', Math.floor),
    ceil: toIntegral('ceil', Math.ceil),
    trunc: toIntegral('trunc', Math.trunc),
    isnan: fn('isnan', (call) => pyBool(Number.isNaN(floatArgs('isnan', call, 1)[0]))),
    isinf: fn('isinf', (call) => {
      const [x] = floatArgs('isinf', call, 1);
      return pyBool(x === Infinity || x === -Infinity);
    }),
    isfinite: fn('isfinite', (call) => pyBool(Number.isFinite(floatArgs('isfinite', call, 1)[0]))),
    isclose: fn('isclose', (call) => {
      const [a, b] = floatArgs('isclose', call, 2);
      const opts = keywords('isclose', call, ['rel_tol', 'abs_tol']);
      const relArg = opts.get('rel_tol');
      const absArg = opts.get('abs_tol');
      const rel = relArg ? toNumber(numberArg('isclose', relArg)) : 1e-9;
      const abs = absArg ? toNumber(numberArg('isclose', absArg)) : 0;
      if (a === b) return pyBool(true);
      const diff = Math.abs(b - a);
      return pyBool(diff <= Math.abs(rel * b) || diff <= Math.abs(rel * a) || diff <= abs);
    }),
    gcd: fn('gcd', (call) => pyInt(call.args.map(intArg).reduce(gcd, 0n))),
    lcm: fn('lcm', (call) =>
      pyInt(
        call.args.map(intArg).reduce((acc, n) => {
          if (acc === 0n || n === 0n) return 0n;
          const l = (acc * n) / gcd(acc, n);
          return l < 0n ? -l : l;
        }, 1n),
      ),
    ),
    factorial: fn('factorial', (call) => {
      const v = expectArgs('factorial', call, 1)[0];
      if (v.type === 'float') throw pyError('TypeError', "'float' object cannot be interpreted as an integer");
      const n = intArg(v);
      if (n < 0n) throw pyError('ValueError', 'factorial() not defined for negative values');
      if (n > 5000n) throw pyError('OverflowError', 'factorial() argument should not exceed 5000');
      return pyInt(factorial(n));
    }),
    comb: fn('comb', (call) => {
      const [n, k] = expectArgs('comb', call, 2).map(intArg);
      if (n < 0n || k < 0n) throw pyError('ValueError', 'n and k must be non-negative integers');
      if (k > n) return pyInt(0n);
      let result = 1n;
      const kk = k < n - k ? k : n - k;
      for (let i = 1n; i <= kk; i++) result = (result * (n - kk + i)) / i;
      return pyInt(result);
    }),
    perm: fn('perm', (call) => {
      const [n, k] = expectArgs('perm', call, 2).map(intArg);
      if (n < 0n || k < 0n) throw pyError('ValueError', 'n and k must be non-negative integers');
      if (k > n) return pyInt(0n);
      let result = 1n;
      for (let i = n - k + 1n; i <= n; i++) result *= i;
      return pyInt(result);
    }),
    prod: fn('prod', (call) => {
      const [iterable] = expectArgs('prod', call, 1);
      let intProduct = 1n;
      let floatProduct: number | null = null;
      for (const item of toArray(iterable)) {
        const n = numberArg('prod', item);
        if (floatProduct === null && n.kind === 'int') intProduct *= n.value;
        else floatProduct = (floatProduct ?? Number(intProduct)) * toNumber(n);
      }
      return floatProduct === null ? pyInt(intProduct) : pyFloat(floatProduct);
    }),
    fsum: fn('fsum', (call) => {
      // Neumaier summation.
      let sum = 0;
      let compensation = 0;
      for (const item of toArray(expectArgs('fsum', call, 1)[0])) {
        const x = toNumber(numberArg('fsum', item));
        const t = sum + x;
        compensation += Math.abs(sum) >= Math.abs(x) ? sum - t + x : x - t + sum;
        sum = t;
      }
      return pyFloat(sum + compensation);
    }),
  });
}

/** mulberry32: small, seedable, good enough for scripts. */
export function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function seedFrom(v: PyValue): number {
  switch (v.type) {
    case 'int': return Number(BigInt.asUintN(32, v.value));
    case 'bool': return v.value ? 1 : 0;
    case 'float': return Math.floor(v.value * 1000) >>> 0;
    case 'str': {
      let h = 2166136261;
      for (const ch of v.value) h = Math.imul(h ^ (ch.codePointAt(0) ?? 0), 16777619);
      return h >>> 0;
    }
    case 'none': return Date.now() >>> 0;
    default:
      throw pyError('TypeError', `The only supported seed types are: None, int, float, str, not ${typeName(v)}`);
  }
}

function randomBelow(host: ModuleHost, n: bigint): bigint {
  return BigInt(Math.floor(host.random() * Number(n)));
}

function createRandom(host: ModuleHost): PyModule {
  return module('random', {
    seed: fn('seed', (call) => {
      const [value] = expectArgs('seed', call, 0, 1);
      host.seed(seedFrom(value ?? NONE));
      return NONE;
    }),
    random: fn('random', (call) => {
      expectArgs('random', call, 0);
      return pyFloat(host.random());
    }),
    uniform: fn('uniform', (call) => {
      const [a, b] = floatArgs('uniform', call, 2);
      return pyFloat(a + (b - a) * host.random());
    }),
    randint: fn('randint', (call) => {
      const [a, b] = expectArgs('randint', call, 2).map(intArg);
      if (b < a) throw pyError('ValueError', `empty range in randrange(${a}, ${b + 1n})`);
      return pyInt(a + randomBelow(host, b - a + 1n));
    }),
    randrange: fn('randrange', (call) => {
      const args = expectArgs('randrange', call, 1, 3).map(intArg);
      const [start, stop, step] = args.length === 1 ? [0n, args[0], 1n] : [args[0], args[1], args[2] ?? 1n];
      if (step === 0n) throw pyError('ValueError', 'zero step for randrange()');
      const width = stop - start;
      const count = step > 0n ? (width + step - 1n) / step : (width + step + 1n) / step;
      if (count <= 0n) throw pyError('ValueError', `empty range in randrange(${start}, ${stop})`);
      return pyInt(start + step * randomBelow(host, count));
    }),
    choice: fn('choice', (call) => {
      const items = toArray(expectArgs('choice', call, 1)[0]);
      if (items.length === 0) throw pyError('IndexError', 'Cannot choose from an empty sequence');
      return items[Number(randomBelow(host, BigInt(items.length)))];
    }),
    shuffle: fn('shuffle', (call) => {
      const [list] = expectArgs('shuffle', call, 1);
      if (list.type !== 'list') throw pyError('TypeError', `'${typeName(list)}' object does not support item assignment`);
      for (let i = list.items.length - 1; i > 0; i--) {
        const j = Number(randomBelow(host, BigInt(i + 1)));
        [list.items[i], list.items[j]] = [list.items[j], list.items[i]];
      }
      return NONE;
    }),
    sample: fn('sample', (call) => {
      const [population, kArg] = expectArgs('sample', call, 2);
      const pool = toArray(population);
      const k = Number(intArg(kArg));
      if (k < 0 || k > pool.length) throw pyError('ValueError', 'Sample larger than population or is negative');
      const picked: PyValue[] = [];
      for (let i = 0; i < k; i++) {
        const j = Number(randomBelow(host, BigInt(pool.length)));
        picked.push(pool.splice(j, 1)[0]);
      }
      return pyList(picked);
    }),
  });
}

function createTime(host: ModuleHost): PyModule {
  const origin = performance.now();
  return module('time', {
    time: fn('time', () => pyFloat(Date.now() / 1000)),
    perf_counter: fn('perf_counter', () => pyFloat((performance.now() - origin) / 1000)),
    monotonic: fn('monotonic', () => pyFloat(performance.now() / 1000)),
    sleep: fn('sleep', (call) => {
      const seconds = toNumber(numberArg('sleep', expectArgs('sleep', call, 1)[0]));
      if (seconds < 0) throw pyError('ValueError', 'sleep length must be non-negative');
      host.sleep(seconds);
      return NONE;
    }),
  });
}

// ── datetime ─────────────────────────────────────────────────────────────────

const DATETIME_FIELDS = ['year', 'month', 'day', 'hour', 'minute', 'second', 'microsecond'] as const;
type DatetimeField = (typeof DATETIME_FIELDS)[number];
type DatetimeParts = Record<DatetimeField, number>;

const FIELD_RANGES: ReadonlyArray<readonly [Exclude<DatetimeField, 'day'>, number, number]> = [
  ['year', 1, 9999],
  ['month', 1, 12],
  ['hour', 0, 23],
  ['minute', 0, 59],
  ['second', 0, 59],
  ['microsecond', 0, 999_999],
];

const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];
const MONTHS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];

const pad = (n: number, width = 2): string => String(n).padStart(width, '0');

/** UTC midnight of a proleptic Gregorian date; years below 100 are not shifted to 19xx. */
function utcDate(year: number, month: number, day: number): Date {
  const d = new Date(0);
  d.setUTCFullYear(year, month - 1, day);
  return d;
}

function localParts(d: Date): DatetimeParts {
  return {
    year: d.getFullYear(),
    month: d.getMonth() + 1,
    day: d.getDate(),
    hour: d.getHours(),
    minute: d.getMinutes(),
    second: d.getSeconds(),
    microsecond: d.getMilliseconds() * 1000,
  };
}

function partsOf(self: PyValue | undefined): DatetimeParts {
  if (self?.type !== 'instance') throw pyError('TypeError', "descriptor requires a 'datetime.datetime' object");
  const read = (field: DatetimeField): number => {
    const v = self.attrs.get(field);
    return v?.type === 'int' ? Number(v.value) : 0;
  };
  return {
    year: read('year'),
    month: read('month'),
    day: read('day'),
    hour: read('hour'),
    minute: read('minute'),
    second: read('second'),
    microsecond: read('microsecond'),
  };
}

function checkParts(parts: DatetimeParts): void {
  for (const [field, low, high] of FIELD_RANGES) {
    if (parts[field] < low || parts[field] > high) throw pyError('ValueError', `${field} must be in ${low}..${high}`);
  }
  const daysInMonth = utcDate(parts.year, parts.month + 1, 0).getUTCDate();
  if (parts.day < 1 || parts.day > daysInMonth) throw pyError('ValueError', 'day is out of range for month');
}

function isoText(p: DatetimeParts, sep: string): string {
  const fraction = p.microsecond === 0 ? '' : `.${pad(p.microsecond, 6)}`;
  return `${pad(p.year, 4)}-${pad(p.month)}-${pad(p.day)}${sep}${pad(p.hour)}:${pad(p.minute)}:${pad(p.second)}${fraction}`;
}

function strftime(p: DatetimeParts, template: string): string {
  const date = utcDate(p.year, p.month, p.day);
  const weekday = date.getUTCDay();
  const dayOfYear = Math.round((date.getTime() - utcDate(p.year, 1, 1).getTime()) / 86_400_000) + 1;
  const hour12 = p.hour % 12 === 0 ? 12 : p.hour % 12;
  return template.replace(/%([A-Za-z%])/g, (directive: string, code: string) => {
    switch (code) {
      case 'Y': return pad(p.year, 4);
      case 'y': return pad(p.year % 100);
      case 'm': return pad(p.month);
      case 'd': return pad(p.day);
      case 'j': return pad(dayOfYear, 3);
      case 'H': return pad(p.hour);
      case 'I': return pad(hour12);
      case 'M': return pad(p.minute);
      case 'S': return pad(p.second);
      case 'f': return pad(p.microsecond, 6);
      case 'p': return p.hour < 12 ? 'AM' : 'PM';
      case 'A': return WEEKDAYS[weekday];
      case 'a': return WEEKDAYS[weekday].slice(0, 3);
      case 'B': return MONTHS[p.month - 1];
      case 'b': return MONTHS[p.month - 1].slice(0, 3);
      case '%': return '%';
      default: return directive;
    }
  });
}

function reprText(p: DatetimeParts): string {
  const fields = DATETIME_FIELDS.map((f) => p[f]);
  // Trailing zero microsecond, then second, are omitted.
  if (fields[6] === 0) {
    fields.pop();
    if (fields[5] === 0) fields.pop();
  }
  return `datetime.datetime(${fields.join(', ')})`;
}

function createDatetime(): PyModule {
  const cls: PyClass = { type: 'class', name: 'datetime', base: null, attrs: new Map() };

  const fill = (obj: PyInstance, parts: DatetimeParts): PyInstance => {
    for (const field of DATETIME_FIELDS) obj.attrs.set(field, pyInt(parts[field]));
    return obj;
  };
  const make = (parts: DatetimeParts): PyInstance => fill({ type: 'instance', cls, attrs: new Map() }, parts);

  const method = (name: string, body: (parts: DatetimeParts, call: CallArgs) => PyValue): PyValue =>
    fn(name, (call) => body(partsOf(call.args[0]), { ...call, args: call.args.slice(1) }));

  const attrs: Record<string, PyValue> = {
    __init__: fn('__init__', (call) => {
      const [self, ...positional] = call.args;
      if (self?.type !== 'instance') throw pyError('TypeError', "descriptor requires a 'datetime.datetime' object");
      const named = keywords('datetime', call, DATETIME_FIELDS);
      if (positional.length > DATETIME_FIELDS.length) {
        throw pyError('TypeError', `function takes at most ${DATETIME_FIELDS.length} arguments (${positional.length} given)`);
      }
      const value = (field: DatetimeField, index: number): number => {
        const given = positional[index] ?? named.get(field);
        if (given !== undefined) return Number(intArg(given));
        if (index < 3) throw pyError('TypeError', `function missing required argument '${field}' (pos ${index + 1})`);
        return 0;
      };
      const parts: DatetimeParts = {
        year: value('year', 0),
        month: value('month', 1),
        day: value('day', 2),
        hour: value('hour', 3),
        minute: value('minute', 4),
        second: value('second', 5),
        microsecond: value('microsecond', 6),
      };
      checkParts(parts);
      fill(self, parts);
      return NONE;
    }),
    now: fn('now', (call) => {
      expectArgs('now', call, 0);
      return make(localParts(new Date()));
    }),
    today: fn('today', (call) => {
      expectArgs('today', call, 0);
      return make(localParts(new Date()));
    }),
    isoformat: method('isoformat', (p, call) => {
      const [sep] = expectArgs('isoformat', call, 0, 1);
      return pyStr(isoText(p, sep === undefined ? 'T' : strArg('isoformat', sep)));
    }),
    strftime: method('strftime', (p, call) => pyStr(strftime(p, strArg('strftime', expectArgs('strftime', call, 1)[0])))),
    timestamp: method('timestamp', (p) => {
      const ms = new Date(p.year, p.month - 1, p.day, p.hour, p.minute, p.second).getTime();
      return pyFloat(ms / 1000 + p.microsecond / 1_000_000);
    }),
    __str__: method('__str__', (p) => pyStr(isoText(p, ' '))),
    __repr__: method('__repr__', (p) => pyStr(reprText(p))),
  };
  for (const [name, value] of Object.entries(attrs)) cls.attrs.set(name, value);

  return module('datetime', { datetime: cls, MINYEAR: pyInt(1), MAXYEAR: pyInt(9999) });
}

// ── json ─────────────────────────────────────────────────────────────────────

function jsonString(s: string): string {
  let out = '"';
  for (let i = 0; i < s.length; i++) {
    const ch = s[i];
    const code = s.charCodeAt(i);
    if (ch === '"') out += '\\"';
    else if (ch === '\\') out += '\\\\';
    else if (ch === '\n') out += '\\n';
    else if (ch === '\r') out += '\\r';
    else if (ch === '\t') out += '\\t';
    else if (ch === '\b') out += '\\b';
    else if (ch === '\f') out += '\\f';
    else if (code < 0x20 || code > 0x7e) out += `\\u${code.toString(16).padStart(4, '0')}`;
    else out += ch;
  }
  return out + '"';
}

function jsonKey(key: PyValue): string {
  switch (key.type) {
    case 'str': return key.value;
    case 'int': return key.value.toString();
    case 'float': return floatRepr(key.value);
    case 'bool': return key.value ? 'true' : 'false';
    case 'none': return 'null';
    default:
      throw pyError('TypeError', `keys must be str, int, float, bool or None, not ${typeName(key)}`);
  }
}

function jsonFloat(x: number): string {
  if (Number.isNaN(x)) return 'NaN';
  if (x === Infinity) return 'Infinity';
  if (x === -Infinity) return '-Infinity';
  return floatRepr(x);
}

export interface DumpOptions {
  indent: string | null;
  sortKeys: boolean;
}

/** Serialize with `json.dumps` defaults: ASCII output, `", "` and `": "` separators. */
export function dumpJson(value: PyValue, options: DumpOptions, depth = 0): string {
  const { indent } = options;
  const open = indent === null ? '' : `\n${indent.repeat(depth + 1)}`;
  const close = indent === null ? '' : `\n${indent.repeat(depth)}`;
  const comma = indent === null ? ', ' : ',';
  switch (value.type) {
    case 'none': return 'null';
    case 'bool': return value.value ? 'true' : 'false';
    case 'int': return value.value.toString();
    case 'float': return jsonFloat(value.value);
    case 'str': return jsonString(value.value);
    case 'list':
    case 'tuple': {
      if (value.items.length === 0) return '[]';
      const items = value.items.map((item) => dumpJson(item, options, depth + 1));
      return `[${open}${items.join(comma + open)}${close}]`;
    }
    case 'dict': {
      if (value.entries.size === 0) return '{}';
      let entries = [...value.entries.values()].map((e) => ({ key: jsonKey(e.key), value: e.value }));
      if (options.sortKeys) entries = entries.sort((a, b) => pyCompare(pyStr(a.key), pyStr(b.key)));
      const parts = entries.map((e) => `${jsonString(e.key)}: ${dumpJson(e.value, options, depth + 1)}`);
      return `{${open}${parts.join(comma + open)}${close}}`;
    }
    default:
      throw pyError('TypeError', `Object of type ${typeName(value)} is not JSON serializable`);
  }
}

class JsonReader {
  private pos = 0;

  constructor(private readonly text: string) {}

  parse(): PyValue {
    this.skipSpace();
    const value = this.value();
    this.skipSpace();
    if (this.pos < this.text.length) this.fail('Extra data');
    return value;
  }

  private fail(message: string): never {
    const before = this.text.slice(0, this.pos);
    const line = before.split('\n').length;
    const column = this.pos - before.lastIndexOf('\n');
    throw pyError('ValueError', `${message}: line ${line} column ${column} (char ${this.pos})`);
  }

  private skipSpace(): void {
    while (this.pos < this.text.length && ' \t\n\r'.includes(this.text[this.pos])) this.pos++;
  }

  private value(): PyValue {
    const ch = this.text[this.pos];
    if (ch === '{') return this.object();
    if (ch === '[') return this.array();
    if (ch === '"') return pyStr(this.string());
    for (const [word, value] of LITERALS) {
      if (this.text.startsWith(word, this.pos)) {
        this.pos += word.length;
        return value;
      }
    }
    return this.number();
  }

  private object(): PyDict {
    const dict = pyDict();
    this.pos++;
    this.skipSpace();
    if (this.text[this.pos] === '}') {
      this.pos++;
      return dict;
    }
    for (;;) {
      this.skipSpace();
      if (this.text[this.pos] !== '"') this.fail('Expecting property name enclosed in double quotes');
      const key = this.string();
      this.skipSpace();
      if (this.text[this.pos] !== ':') this.fail("Expecting ':' delimiter");
      this.pos++;
      this.skipSpace();
      dictSet(dict, pyStr(key), this.value());
      this.skipSpace();
      const next = this.text[this.pos++];
      if (next === '}') return dict;
      if (next !== ',') {
        this.pos--;
        this.fail("Expecting ',' delimiter");
      }
    }
  }

  private array(): PyValue {
    const items: PyValue[] = [];
    this.pos++;
    this.skipSpace();
    if (this.text[this.pos] === ']') {
      this.pos++;
      return pyList(items);
    }
    for (;;) {
      this.skipSpace();
      items.push(this.value());
      this.skipSpace();
      const next = this.text[this.pos++];
      if (next === ']') return pyList(items);
      if (next !== ',') {
        this.pos--;
        this.fail("Expecting ',' delimiter");
      }
    }
  }

  private string(): string {
    const start = this.pos;
    this.pos++;
    let out = '';
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos++];
      if (ch === '"') return out;
      if (ch !== '\\') {
        if (ch < ' ') {
          this.pos--;
          this.fail('Invalid control character at');
        }
        out += ch;
        continue;
      }
      const esc = this.text[this.pos++];
      const simple = ESCAPES.get(esc);
      if (simple !== undefined) {
        out += simple;
      } else if (esc === 'u') {
        const hex = this.text.slice(this.pos, this.pos + 4);
        if (!/^[0-9a-fA-F]{4}$/.test(hex)) this.fail('Invalid \\uXXXX escape');
        out += String.fromCharCode(parseInt(hex, 16));
        this.pos += 4;
      } else {
        this.pos -= 2;
        this.fail('Invalid \\escape');
      }
    }
    this.pos = start;
    return this.fail('Unterminated string starting at');
  }

  private number(): PyValue {
    const match = /^-?(0|[1-9]\d*)(\.\d+)?([eE][+-]?\d+)?/.exec(this.text.slice(this.pos));
    if (!match) this.fail('Expecting value');
    this.pos += match[0].length;
    if (match[2] === undefined && match[3] === undefined) return pyInt(BigInt(match[0]));
    return pyFloat(Number(match[0]));
  }
}

const LITERALS: ReadonlyArray<readonly [string, PyValue]> = [
  ['null', NONE],
  ['true', pyBool(true)],
  ['false', pyBool(false)],
  ['NaN', pyFloat(NaN)],
  ['Infinity', pyFloat(Infinity)],
  ['-Infinity', pyFloat(-Infinity)],
];

const ESCAPES: ReadonlyMap<string, string> = new Map([
  ['"', '"'],
  ['\\', '\\'],
  ['/', '/'],
  ['b', '\b'],
  ['f', '\f'],
  ['n', '\n'],
  ['r', '\r'],
  ['t', '\t'],
]);

export function loadJson(text: string): PyValue {
  return new JsonReader(text).parse();
}

function createJson(): PyModule {
  return module('json', {
    dumps: fn('dumps', (call) => {
      const [value] = expectArgs('dumps', call, 1);
      const opts = keywords('dumps', call, ['indent', 'sort_keys']);
      const indentArg = opts.get('indent');
      let indent: string | null = null;
      if (indentArg !== undefined && indentArg.type !== 'none') {
        indent = indentArg.type === 'str' ? indentArg.value : ' '.repeat(Math.max(Number(intArg(indentArg)), 0));
      }
      const sortKeys = opts.get('sort_keys');
      return pyStr(dumpJson(value, { indent, sortKeys: sortKeys !== undefined && isTruthy(sortKeys) }));
    }),
    loads: fn('loads', (call) => loadJson(strArg('loads', expectArgs('loads', call, 1)[0]))),
  });
}

/** Instantiate a standard module, or `null` when no such module exists. */
export function createModule(name: string, host: ModuleHost): PyModule | null {
  switch (name) {
    case 'math': return createMath();
    case 'random': return createRandom(host);
    case 'time': return createTime(host);
    case 'datetime': return createDatetime();
    case 'json': return createJson();
    default: return null;
  }
}
