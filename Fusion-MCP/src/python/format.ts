/**
 * Text formatting shared by `%`-interpolation, `format()`, f-strings,
 * `str.format` and the printf sub-protocol.
 */

import { pyError } from './errors.js';
import {
  asNumeric,
  dictGet,
  floatRepr,
  pyStr,
  repr,
  str,
  toNumber,
  typeName,
  type PyDict,
  type InstanceText,
  type PyValue,
} from './values.js';

// ── Number rendering ────────────────────────────────────────────────────────

/** Fixed-point with Python's round-half-even on exact ties. */
export function toFixed(x: number, digits: number): string {
  if (!Number.isFinite(x)) return nonFinite(x);
  const scaled = x * 10 ** digits;
  if (Math.abs(scaled) < 2 ** 52 && Math.abs(scaled % 1) === 0.5) {
    const floor = Math.floor(scaled);
    const even = floor % 2 === 0 ? floor : floor + 1;
    const text = (Math.abs(even) / 10 ** digits).toFixed(digits);
    return (x < 0 ? '-' : '') + text;
  }
  return x.toFixed(digits);
}

export function toExponent(x: number, digits: number, upper = false): string {
  if (!Number.isFinite(x)) return nonFinite(x, upper);
  const [mantissa, exp] = x.toExponential(digits).split('e');
  const sign = exp.startsWith('-') ? '-' : '+';
  const text = `${mantissa}e${sign}${exp.replace(/^[+-]/, '').padStart(2, '0')}`;
  return upper ? text.toUpperCase() : text;
}

function toGeneral(x: number, precision: number, alternate: boolean, upper = false): string {
  if (!Number.isFinite(x)) return nonFinite(x, upper);
  const p = precision === 0 ? 1 : precision;
  if (x === 0) return alternate ? `0.${'0'.repeat(p - 1)}` : Object.is(x, -0) ? '-0' : '0';
  const exp = Number(x.toExponential(p - 1).split('e')[1]);
  let text: string;
  if (exp >= -4 && exp < p) {
    text = toFixed(x, p - 1 - exp);
    if (!alternate && text.includes('.')) text = text.replace(/0+$/, '').replace(/\.$/, '');
  } else {
    text = toExponent(x, p - 1);
    if (!alternate) text = text.replace(/\.?0+e/, 'e');
  }
  return upper ? text.toUpperCase() : text;
}

function nonFinite(x: number, upper = false): string {
  const text = Number.isNaN(x) ? 'nan' : x > 0 ? 'inf' : '-inf';
  return upper ? text.toUpperCase() : text;
}

function groupDigits(digits: string, separator: string): string {
  const [intPart, frac] = digits.split('.');
  const grouped = intPart.replace(/\B(?=(\d{3})+(?!\d))/g, separator);
  return frac === undefined ? grouped : `${grouped}.${frac}`;
}

// ── Format specification mini-language ──────────────────────────────────────

interface FormatSpec {
  fill: string;
  align: '<' | '>' | '=' | '^' | null;
  sign: '+' | '-' | ' ';
  alternate: boolean;
  zero: boolean;
  width: number;
  grouping: ',' | '_' | null;
  precision: number | null;
  type: string | null;
}

const SPEC_PATTERN = /^(?:(.)?([<>=^]))?([+\- ])?(#)?(0)?(\d+)?([,_])?(?:\.(\d+))?([bcdeEfFgGnosxX%])?$/s;

export function parseFormatSpec(spec: string): FormatSpec {
  const m = SPEC_PATTERN.exec(spec);
  if (!m) throw pyError('ValueError', `Invalid format specifier '${spec}'`);
  const [, fill, align, sign, alt, zero, width, grouping, precision, type] = m;
  return {
    fill: fill ?? ' ',
    align: align === '<' || align === '>' || align === '=' || align === '^' ? align : null,
    sign: sign === '+' || sign === ' ' ? sign : '-',
    alternate: alt !== undefined,
    zero: zero !== undefined,
    width: width ? Number(width) : 0,
    grouping: grouping === ',' || grouping === '_' ? grouping : null,
    precision: precision !== undefined ? Number(precision) : null,
    type: type ?? null,
  };
}

function pad(body: string, sign: string, spec: FormatSpec, numeric: boolean): string {
  let fill = spec.fill;
  let align = spec.align;
  if (spec.zero && align === null) {
    fill = '0';
    align = '=';
  }
  align ??= numeric ? '>' : '<';
  const total = sign.length + body.length;
  if (total >= spec.width) return sign + body;
  const padding = spec.width - total;
  switch (align) {
    case '<': return sign + body + fill.repeat(padding);
    case '>': return fill.repeat(padding) + sign + body;
    case '=': return sign + fill.repeat(padding) + body;
    case '^': {
      const left = Math.floor(padding / 2);
      return fill.repeat(left) + sign + body + fill.repeat(padding - left);
    }
  }
}

function signOf(negative: boolean, spec: FormatSpec): string {
  if (negative) return '-';
  return spec.sign === '+' ? '+' : spec.sign === ' ' ? ' ' : '';
}

/** `format(value, spec)`. */
export function formatValue(value: PyValue, specText: string, text?: InstanceText): string {
  if (specText === '') return str(value, text);
  const spec = parseFormatSpec(specText);
  const num = asNumeric(value);

  if (value.type === 'str' || num === null) {
    if (spec.type !== null && spec.type !== 's') {
      throw pyError('ValueError', `Unknown format code '${spec.type}' for object of type '${typeName(value)}'`);
    }
    let shown = str(value, text);
    if (spec.precision !== null) shown = shown.slice(0, spec.precision);
    return pad(shown, '', spec, false);
  }

  const type = spec.type;
  if (num.kind === 'int' && (type === null || 'bcdoxXn'.includes(type))) {
    if (value.type === 'bool' && type === null) return pad(str(value), '', spec, false);
    const negative = num.value < 0n;
    const magnitude = negative ? -num.value : num.value;
    let body: string;
    switch (type) {
      case 'b': body = (spec.alternate ? '0b' : '') + magnitude.toString(2); break;
      case 'o': body = (spec.alternate ? '0o' : '') + magnitude.toString(8); break;
      case 'x': body = (spec.alternate ? '0x' : '') + magnitude.toString(16); break;
      case 'X': body = (spec.alternate ? '0X' : '') + magnitude.toString(16).toUpperCase(); break;
      case 'c': return pad(String.fromCodePoint(Number(num.value)), '', spec, false);
      default: body = magnitude.toString();
    }
    if (spec.grouping && (type === null || type === 'd' || type === 'n')) body = groupDigits(body, spec.grouping);
    return pad(body, signOf(negative, spec), spec, true);
  }

  if (type !== null && !'eEfFgG%'.includes(type)) {
    throw pyError('ValueError', `Unknown format code '${type}' for object of type '${typeName(value)}'`);
  }
  const x = toNumber(num);
  const negative = x < 0 || Object.is(x, -0);
  const abs = Math.abs(x);
  const precision = spec.precision ?? 6;
  let body: string;
  switch (type) {
    case 'f':
    case 'F':
      body = toFixed(abs, precision);
      if (type === 'F') body = body.toUpperCase();
      break;
    case 'e':
    case 'E':
      body = toExponent(abs, precision, type === 'E');
      break;
    case 'g':
    case 'G':
      body = toGeneral(abs, precision, spec.alternate, type === 'G');
      break;
    case '%':
      body = `${toFixed(abs * 100, precision)}%`;
      break;
    default:
      if (spec.precision === null) {
        body = floatRepr(abs);
      } else {
        body = toGeneral(abs, spec.precision, spec.alternate);
        if (/^\d+$/.test(body)) body += '.0';
      }
  }
  if (spec.grouping) body = groupDigits(body, spec.grouping);
  return pad(body, signOf(negative && !Number.isNaN(x), spec), spec, true);
}

// ── printf-style interpolation ──────────────────────────────────────────────

const CONVERSION = /%(?:\(([^)]*)\))?([#0\- +]*)(\*|\d+)?(?:\.(\*|\d+))?([diouxXeEfFgGcrsa%])?/g;

/**
 * Apply a `%` format. `args` is the tuple items, a single value, or a dict
 * for `%(name)s` conversions.
 */
export function formatPercent(format: string, args: PyValue[] | PyDict): string {
  let index = 0;
  let usedMapping = false;
  const positional = Array.isArray(args) ? args : [args];

  const take = (): PyValue => {
    if (index >= positional.length) throw pyError('TypeError', 'not enough arguments for format string');
    return positional[index++];
  };

  const out = format.replace(
    CONVERSION,
    (_match, key: string | undefined, flags: string, width: string | undefined, precision: string | undefined, conv: string | undefined) => {
      if (conv === undefined) throw pyError('ValueError', 'incomplete format');
      if (conv === '%') return '%';

      let value: PyValue;
      if (key !== undefined) {
        if (Array.isArray(args)) throw pyError('TypeError', 'format requires a mapping');
        const found = dictGet(args, pyStr(key));
        if (found === undefined) throw pyError('KeyError', key);
        usedMapping = true;
        value = found;
      } else {
        const w = width === '*' ? take() : null;
        const p = precision === '*' ? take() : null;
        value = take();
        if (w) width = String(toInt(w, '*'));
        if (p) precision = String(toInt(p, '*'));
      }

      const spec: FormatSpec = {
        fill: ' ',
        align: flags.includes('-') ? '<' : null,
        sign: flags.includes('+') ? '+' : flags.includes(' ') ? ' ' : '-',
        alternate: flags.includes('#'),
        zero: flags.includes('0') && !flags.includes('-'),
        width: width ? Number(width) : 0,
        grouping: null,
        precision: precision !== undefined ? Number(precision) : null,
        type: null,
      };
      return convertOne(value, conv, spec);
    },
  );

  if (!usedMapping && Array.isArray(args) && index < positional.length) {
    throw pyError('TypeError', 'not all arguments converted during string formatting');
  }
  return out;
}

function toInt(value: PyValue, conv: string): bigint {
  const num = asNumeric(value);
  if (num === null) {
    throw pyError('TypeError', `%${conv} format: a real number is required, not ${typeName(value)}`);
  }
  return num.kind === 'int' ? num.value : BigInt(Math.trunc(num.value));
}

function toReal(value: PyValue): number {
  const num = asNumeric(value);
  if (num === null) throw pyError('TypeError', `must be real number, not ${typeName(value)}`);
  return toNumber(num);
}

function convertOne(value: PyValue, conv: string, spec: FormatSpec): string {
  switch (conv) {
    case 's':
    case 'r':
    case 'a': {
      let text = conv === 's' ? str(value) : repr(value);
      if (spec.precision !== null) text = text.slice(0, spec.precision);
      return pad(text, '', { ...spec, zero: false, align: spec.align ?? '>' }, false);
    }
    case 'c': {
      const text = value.type === 'str' ? value.value : String.fromCodePoint(Number(toInt(value, 'c')));
      return pad(text, '', { ...spec, zero: false, align: spec.align ?? '>' }, false);
    }
    case 'd':
    case 'i':
    case 'u': {
      const n = toInt(value, conv);
      const body = (n < 0n ? -n : n).toString();
      return pad(zeroExtend(body, spec.precision), signOf(n < 0n, spec), spec, true);
    }
    case 'o':
    case 'x':
    case 'X': {
      const n = toInt(value, conv);
      const magnitude = n < 0n ? -n : n;
      let body = magnitude.toString(conv === 'o' ? 8 : 16);
      if (conv === 'X') body = body.toUpperCase();
      body = zeroExtend(body, spec.precision);
      if (spec.alternate) body = (conv === 'o' ? '0o' : conv === 'x' ? '0x' : '0X') + body;
      return pad(body, signOf(n < 0n, spec), spec, true);
    }
    default: {
      const x = toReal(value);
      const precision = spec.precision ?? 6;
      const abs = Math.abs(x);
      let body: string;
      if (conv === 'f' || conv === 'F') body = toFixed(abs, precision);
      else if (conv === 'e' || conv === 'E') body = toExponent(abs, precision, conv === 'E');
      else body = toGeneral(abs, precision, spec.alternate, conv === 'G');
      return pad(body, signOf(x < 0, spec), spec, true);
    }
  }
}

function zeroExtend(digits: string, precision: number | null): string {
  return precision !== null && digits.length < precision ? digits.padStart(precision, '0') : digits;
}

// ── str.format ──────────────────────────────────────────────────────────────

/** `"{} {name} {0:>4}".format(...)`. */
export function formatTemplate(
  template: string,
  args: PyValue[],
  kwargs: Map<string, PyValue>,
  text?: InstanceText,
): string {
  let auto = 0;
  let out = '';
  let i = 0;
  while (i < template.length) {
    const ch = template[i];
    if (ch === '{' && template[i + 1] === '{') {
      out += '{';
      i += 2;
      continue;
    }
    if (ch === '}' && template[i + 1] === '}') {
      out += '}';
      i += 2;
      continue;
    }
    if (ch === '}') throw pyError('ValueError', "Single '}' encountered in format string");
    if (ch !== '{') {
      out += ch;
      i++;
      continue;
    }

    const close = template.indexOf('}', i);
    if (close === -1) throw pyError('ValueError', "Single '{' encountered in format string");
    const field = template.slice(i + 1, close);
    i = close + 1;

    const m = /^([^!:]*)(?:!([rs]))?(?::(.*))?$/s.exec(field);
    if (!m) throw pyError('ValueError', `Invalid format field '{${field}}'`);
    const [, name, conversion, spec] = m;

    let value: PyValue | undefined;
    if (name === '') {
      value = args[auto++];
      if (value === undefined) throw pyError('IndexError', `Replacement index ${auto - 1} out of range for positional args tuple`);
    } else if (/^\d+$/.test(name)) {
      value = args[Number(name)];
      if (value === undefined) throw pyError('IndexError', `Replacement index ${name} out of range for positional args tuple`);
    } else {
      value = kwargs.get(name);
      if (value === undefined) throw pyError('KeyError', `'${name}'`);
    }

    if (conversion === 'r') value = pyStr(repr(value, text));
    else if (conversion === 's') value = pyStr(str(value, text));
    out += formatValue(value, spec ?? '', text);
  }
  return out;
}
