/**
 * Marshalling adapters: render environment values as declarations and
 * string literals of each subprocess language.
 *
 * Statically typed targets need one element type per container, so their
 * adapters infer a {@link StaticType} first; a value without one is refused
 * with a MarshalError instead of being stringified.
 */

import { MarshalError, type SourceLocation } from '../errors.js';
import { LANGUAGE_SYNTAX, type LanguageTag } from '../languages.js';
import { floatRepr, rangeLength, typeName, type PyValue } from '../python/values.js';
import type { EnvironmentSnapshot } from '../runtime/environment.js';

export interface MarshalAdapter {
  readonly language: LanguageTag;
  stringLiteral(text: string): string;
  /** Expression or statement that writes `text` to stdout without a newline. */
  printStatement(text: string): string;
  /** Declaration binding `name` to `value`; throws MarshalError. */
  declare(name: string, value: PyValue, location?: SourceLocation): string;
}

export type StaticType =
  | { kind: 'bool' }
  | { kind: 'int' }
  | { kind: 'float' }
  | { kind: 'str' }
  | { kind: 'list'; element: StaticType }
  | { kind: 'map'; value: StaticType };

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const MAX_RANGE_ITEMS = 100_000n;

class Refusal extends Error {}

function refuse(message: string): never {
  throw new Refusal(message);
}

function checkInt64(value: bigint): bigint {
  if (value < INT64_MIN || value > INT64_MAX) refuse(`integer ${value} does not fit in 64 bits`);
  return value;
}

function checkFinite(value: number): number {
  if (!Number.isFinite(value)) refuse(`non-finite float ${floatRepr(value)}`);
  return value;
}

/** Items of a list-like value; ranges are expanded and sets keep insertion order. */
function sequenceItems(value: PyValue): readonly PyValue[] | null {
  switch (value.type) {
    case 'list':
    case 'tuple':
      return value.items;
    case 'set':
      return [...value.entries.values()];
    case 'range': {
      if (rangeLength(value) > MAX_RANGE_ITEMS) refuse(`range of ${rangeLength(value)} items is too large`);
      const items: PyValue[] = [];
      for (let i = value.start; value.step > 0n ? i < value.stop : i > value.stop; i += value.step) {
        items.push({ type: 'int', value: i });
      }
      return items;
    }
    default:
      return null;
  }
}

function dictEntries(value: PyValue): Array<[string, PyValue]> | null {
  if (value.type !== 'dict') return null;
  return [...value.entries.values()].map((entry) => {
    if (entry.key.type !== 'str') refuse(`dict key of type '${typeName(entry.key)}' (only str keys cross languages)`);
    return [entry.key.value, entry.value];
  });
}

function sameType(a: StaticType, b: StaticType): boolean {
  if (a.kind === 'list' && b.kind === 'list') return sameType(a.element, b.element);
  if (a.kind === 'map' && b.kind === 'map') return sameType(a.value, b.value);
  return a.kind === b.kind;
}

function unify(a: StaticType, b: StaticType): StaticType {
  if (sameType(a, b)) return a;
  const numeric = (t: StaticType): boolean => t.kind === 'int' || t.kind === 'float';
  if (numeric(a) && numeric(b)) return { kind: 'float' };
  return refuse('heterogeneous container');
}

function unifyAll(values: readonly PyValue[], what: string): StaticType {
  if (values.length === 0) refuse(`cannot infer the element type of an empty ${what}`);
  return values.map(inferType).reduce(unify);
}

export function inferType(value: PyValue): StaticType {
  switch (value.type) {
    case 'bool': return { kind: 'bool' };
    case 'int': return { kind: 'int' };
    case 'float': return { kind: 'float' };
    case 'str': return { kind: 'str' };
    case 'none': return refuse('None inside a container');
    default: {
      const items = sequenceItems(value);
      if (items) return { kind: 'list', element: unifyAll(items, 'list') };
      const entries = dictEntries(value);
      if (entries) return { kind: 'map', value: unifyAll(entries.map(([, v]) => v), 'dict') };
      return refuse(`value of type '${typeName(value)}'`);
    }
  }
}

function unmappable(value: PyValue): string | null {
  switch (value.type) {
    case 'function':
    case 'builtin':
    case 'class':
      return `function '${value.name}'`;
    case 'module':
      return `module '${value.name}'`;
    case 'exception':
      return `exception '${value.cls.name}'`;
    case 'instance':
      return `'${value.cls.name}' object`;
    case 'method':
      return `method '${value.func.name}'`;
    default:
      return null;
  }
}

function intText(value: PyValue): bigint {
  if (value.type === 'int') return value.value;
  if (value.type === 'bool') return value.value ? 1n : 0n;
  return refuse(`expected an integer, got '${typeName(value)}'`);
}

function floatText(value: PyValue): string {
  if (value.type === 'float') return floatRepr(checkFinite(value.value));
  return floatRepr(checkFinite(Number(intText(value))));
}

function strValue(value: PyValue): string {
  return value.type === 'str' ? value.value : refuse(`expected a string, got '${typeName(value)}'`);
}

function boolValue(value: PyValue): boolean {
  return value.type === 'bool' ? value.value : refuse(`expected a bool, got '${typeName(value)}'`);
}

function octal(ch: string): string {
  return `\\${ch.charCodeAt(0).toString(8).padStart(3, '0')}`;
}

function escapeWith(text: string, named: Record<string, string>, control: (ch: string) => string): string {
  let out = '';
  for (const ch of text) {
    const replacement = named[ch];
    if (replacement !== undefined) out += replacement;
    else if (ch < ' ' || ch === '\x7f') out += control(ch);
    else out += ch;
  }
  return out;
}

const C_ESCAPES: Record<string, string> = { '\\': '\\\\', '"': '\\"', '\n': '\\n', '\r': '\\r', '\t': '\\t' };

// ── Adapters ─────────────────────────────────────────────────────────────────

/**
 * Shared declaration flow: refuse host-only values, render the rest, and
 * turn a refusal into a MarshalError naming the variable and language.
 */
abstract class BaseAdapter implements MarshalAdapter {
  abstract readonly language: LanguageTag;
  abstract stringLiteral(text: string): string;
  abstract printStatement(text: string): string;
  protected abstract render(name: string, value: PyValue): string;

  declare(name: string, value: PyValue, location: SourceLocation = {}): string {
    const displayName = LANGUAGE_SYNTAX[this.language].displayName;
    const hostOnly = unmappable(value);
    if (hostOnly) {
      throw new MarshalError(`Cannot pass ${hostOnly} to ${displayName} as '${name}'`, location, { name, language: this.language });
    }
    try {
      return this.render(name, value);
    } catch (err) {
      if (!(err instanceof Refusal)) throw err;
      throw new MarshalError(`Cannot marshal '${name}' to ${displayName}: ${err.message}`, location, {
        name,
        language: this.language,
      });
    }
  }
}

abstract class StaticAdapter extends BaseAdapter {
  protected abstract typeText(type: StaticType): string;
  protected abstract literal(value: PyValue, type: StaticType): string;
  protected abstract declareNone(name: string): string;
  protected abstract declareTyped(name: string, type: StaticType, literal: string): string;

  protected render(name: string, value: PyValue): string {
    if (value.type === 'none') return this.declareNone(name);
    const type = inferType(value);
    return this.declareTyped(name, type, this.literal(value, type));
  }

  protected scalar(value: PyValue, type: StaticType): string | null {
    switch (type.kind) {
      case 'bool': return boolValue(value) ? 'true' : 'false';
      case 'float': return floatText(value);
      case 'str': return this.stringLiteral(strValue(value));
      default: return null;
    }
  }
}

export class CppAdapter extends StaticAdapter {
  readonly language = 'cpp' as const;

  stringLiteral(text: string): string {
    return `"${escapeWith(text, C_ESCAPES, octal)}"`;
  }

  printStatement(text: string): string {
    return `fputs(${this.stringLiteral(text)}, stdout)`;
  }

  protected typeText(type: StaticType): string {
    switch (type.kind) {
      case 'bool': return 'bool';
      case 'int': return 'long long';
      case 'float': return 'double';
      case 'str': return 'std::string';
      case 'list': return `std::vector<${this.typeText(type.element)}>`;
      case 'map': return `std::map<std::string, ${this.typeText(type.value)}>`;
    }
  }

  protected literal(value: PyValue, type: StaticType): string {
    const scalar = this.scalar(value, type);
    if (scalar !== null) return scalar;
    switch (type.kind) {
      case 'int': {
        const n = checkInt64(intText(value));
        return n === INT64_MIN ? '(-9223372036854775807LL - 1)' : `${n}LL`;
      }
      case 'list':
        return `{${(sequenceItems(value) ?? []).map((item) => this.literal(item, type.element)).join(', ')}}`;
      case 'map':
        return `{${(dictEntries(value) ?? [])
          .map(([k, v]) => `{${this.stringLiteral(k)}, ${this.literal(v, type.value)}}`)
          .join(', ')}}`;
      default:
        return refuse('unsupported type');
    }
  }

  protected declareNone(name: string): string {
    return `const std::nullptr_t ${name} = nullptr;`;
  }

  protected declareTyped(name: string, type: StaticType, literal: string): string {
    return `const ${this.typeText(type)} ${name} = ${literal};`;
  }
}

const JAVA_BOXED: Record<'bool' | 'int' | 'float' | 'str', string> = {
  bool: 'Boolean',
  int: 'Long',
  float: 'Double',
  str: 'String',
};

export class JavaAdapter extends StaticAdapter {
  readonly language = 'java' as const;

  stringLiteral(text: string): string {
    const named = { ...C_ESCAPES, '\b': '\\b', '\f': '\\f' };
    return `"${escapeWith(text, named, octal)}"`;
  }

  printStatement(text: string): string {
    return `System.out.print(${this.stringLiteral(text)})`;
  }

  protected typeText(type: StaticType, boxed = false): string {
    switch (type.kind) {
      case 'list': return `java.util.List<${this.typeText(type.element, true)}>`;
      case 'map': return `java.util.Map<String, ${this.typeText(type.value, true)}>`;
      case 'bool': return boxed ? JAVA_BOXED.bool : 'boolean';
      case 'int': return boxed ? JAVA_BOXED.int : 'long';
      case 'float': return boxed ? JAVA_BOXED.float : 'double';
      case 'str': return JAVA_BOXED.str;
    }
  }

  protected literal(value: PyValue, type: StaticType): string {
    const scalar = this.scalar(value, type);
    if (scalar !== null) return scalar;
    switch (type.kind) {
      case 'int':
        return `${checkInt64(intText(value))}L`;
      case 'list':
        return `java.util.List.of(${(sequenceItems(value) ?? []).map((item) => this.literal(item, type.element)).join(', ')})`;
      case 'map': {
        const puts = (dictEntries(value) ?? []).map(([k, v]) => `put(${this.stringLiteral(k)}, ${this.literal(v, type.value)});`);
        return `new java.util.LinkedHashMap<String, ${this.typeText(type.value, true)}>() {{ ${puts.join(' ')} }}`;
      }
      default:
        return refuse('unsupported type');
    }
  }

  protected declareNone(name: string): string {
    return `static final Object ${name} = null;`;
  }

  protected declareTyped(name: string, type: StaticType, literal: string): string {
    return `static final ${this.typeText(type)} ${name} = ${literal};`;
  }
}

export class RustAdapter extends StaticAdapter {
  readonly language = 'rust' as const;

  stringLiteral(text: string): string {
    const named = { ...C_ESCAPES, '\0': '\\0' };
    return `"${escapeWith(text, named, (ch) => `\\u{${ch.charCodeAt(0).toString(16)}}`)}"`;
  }

  printStatement(text: string): string {
    return `print!("{}", ${this.stringLiteral(text)})`;
  }

  protected typeText(type: StaticType): string {
    switch (type.kind) {
      case 'bool': return 'bool';
      case 'int': return 'i64';
      case 'float': return 'f64';
      case 'str': return '&str';
      case 'list': return `Vec<${this.typeText(type.element)}>`;
      case 'map': return `std::collections::HashMap<&str, ${this.typeText(type.value)}>`;
    }
  }

  protected literal(value: PyValue, type: StaticType): string {
    const scalar = this.scalar(value, type);
    if (scalar !== null) return scalar;
    switch (type.kind) {
      case 'int':
        return `${checkInt64(intText(value))}`;
      case 'list':
        return `vec![${(sequenceItems(value) ?? []).map((item) => this.literal(item, type.element)).join(', ')}]`;
      case 'map':
        return `std::collections::HashMap::from([${(dictEntries(value) ?? [])
          .map(([k, v]) => `(${this.stringLiteral(k)}, ${this.literal(v, type.value)})`)
          .join(', ')}])`;
      default:
        return refuse('unsupported type');
    }
  }

  protected declareNone(name: string): string {
    return `let ${name}: () = ();`;
  }

  protected declareTyped(name: string, type: StaticType, literal: string): string {
    return `let ${name}: ${this.typeText(type)} = ${literal};`;
  }
}

/** Dynamic targets take heterogeneous containers; only str dict keys cross. */
abstract class DynamicAdapter extends BaseAdapter {
  protected abstract intLiteral(value: bigint): string;
  protected abstract nullLiteral: string;
  protected abstract listLiteral(items: string[]): string;
  protected abstract mapLiteral(entries: Array<[string, string]>): string;

  protected literal(value: PyValue): string {
    switch (value.type) {
      case 'none': return this.nullLiteral;
      case 'bool': return value.value ? 'true' : 'false';
      case 'int': return this.intLiteral(value.value);
      case 'float': return floatRepr(checkFinite(value.value));
      case 'str': return this.stringLiteral(value.value);
      case 'dict':
        return this.mapLiteral((dictEntries(value) ?? []).map(([k, v]) => [this.stringLiteral(k), this.literal(v)]));
      default: {
        const hostOnly = unmappable(value);
        if (hostOnly) refuse(`contains ${hostOnly}`);
        return this.listLiteral((sequenceItems(value) ?? []).map((item) => this.literal(item)));
      }
    }
  }
}

export class JsAdapter extends DynamicAdapter {
  readonly language = 'js' as const;
  protected nullLiteral = 'null';

  stringLiteral(text: string): string {
    return JSON.stringify(text);
  }

  printStatement(text: string): string {
    return `process.stdout.write(${this.stringLiteral(text)})`;
  }

  protected intLiteral(value: bigint): string {
    const safe = value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER);
    return safe ? `${value}` : `${value}n`;
  }

  protected listLiteral(items: string[]): string {
    return `[${items.join(', ')}]`;
  }

  protected mapLiteral(entries: Array<[string, string]>): string {
    return `{${entries.map(([k, v]) => `${k}: ${v}`).join(', ')}}`;
  }

  protected render(name: string, value: PyValue): string {
    return `const ${name} = ${this.literal(value)};`;
  }
}

export class PhpAdapter extends DynamicAdapter {
  readonly language = 'php' as const;
  protected nullLiteral = 'null';

  stringLiteral(text: string): string {
    return `'${text.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
  }

  printStatement(text: string): string {
    return `print(${this.stringLiteral(text)})`;
  }

  protected intLiteral(value: bigint): string {
    const n = checkInt64(value);
    return n === INT64_MIN ? 'PHP_INT_MIN' : `${n}`;
  }

  protected listLiteral(items: string[]): string {
    return `[${items.join(', ')}]`;
  }

  protected mapLiteral(entries: Array<[string, string]>): string {
    return `[${entries.map(([k, v]) => `${k} => ${v}`).join(', ')}]`;
  }

  protected render(name: string, value: PyValue): string {
    return `$${name} = ${this.literal(value)};`;
  }
}

export function createAdapter(language: Exclude<LanguageTag, 'py'>): MarshalAdapter {
  switch (language) {
    case 'cpp': return new CppAdapter();
    case 'js': return new JsAdapter();
    case 'java': return new JavaAdapter();
    case 'php': return new PhpAdapter();
    case 'rust': return new RustAdapter();
  }
}

/** Declarations for every name in the snapshot, in snapshot order. */
export function marshalSnapshot(adapter: MarshalAdapter, snapshot: EnvironmentSnapshot, location: SourceLocation = {}): string[] {
  return [...snapshot].map(([name, value]) => adapter.declare(name, value, location));
}
