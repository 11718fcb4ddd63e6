/**
 * Lexical helpers for non-native block text: blanking strings and comments,
 * finding the host names a block refers to, and locating `printf` calls.
 */

import { LANGUAGE_SYNTAX, type LanguageTag } from '../languages.js';

/**
 * Copy of `code` with comment text and string literal bodies replaced by
 * spaces. Quotes, newlines and offsets are kept.
 */
export function maskCode(code: string, language: LanguageTag): string {
  const syntax = LANGUAGE_SYNTAX[language];
  const blockComments = syntax.lineComment === '//';
  const out: string[] = [];
  let i = 0;

  const blank = (ch: string): string => (ch === '\n' ? '\n' : ' ');

  while (i < code.length) {
    if (code.startsWith(syntax.lineComment, i)) {
      while (i < code.length && code[i] !== '\n') out.push(blank(code[i++]));
      continue;
    }
    if (blockComments && code.startsWith('/*', i)) {
      const close = code.indexOf('*/', i + 2);
      const end = close === -1 ? code.length : close + 2;
      while (i < end) out.push(blank(code[i++]));
      continue;
    }
    const quote = code[i];
    if (syntax.quotes.includes(quote)) {
      out.push(quote);
      i++;
      while (i < code.length && code[i] !== quote) {
        // Only template literals span lines.
        if (code[i] === '\n' && quote !== '`') break;
        if (code[i] === '\\' && i + 1 < code.length) {
          out.push(' ', blank(code[i + 1]));
          i += 2;
          continue;
        }
        out.push(blank(code[i++]));
      }
      if (i < code.length && code[i] === quote) out.push(code[i++]);
      continue;
    }
    out.push(code[i++]);
  }
  return out.join('');
}

const IDENTIFIER = /[A-Za-z_][A-Za-z0-9_]*/g;
const PHP_VARIABLE = /\$([A-Za-z_][A-Za-z0-9_]*)/g;
const MEMBER_ACCESS = /(\.|->|::)\s*$/;

/**
 * Identifiers a block uses outside strings and comments, in order of first
 * use. Member names (`a.b`, `a->b`, `a::b`) are not references. PHP blocks
 * refer to host names only through `$name`.
 */
export function referencedNames(code: string, language: LanguageTag): string[] {
  const masked = maskCode(code, language);
  const names = new Set<string>();

  if (language === 'php') {
    for (const match of masked.matchAll(PHP_VARIABLE)) names.add(match[1]);
    return [...names];
  }

  for (const match of masked.matchAll(IDENTIFIER)) {
    const index = match.index ?? 0;
    const before = masked.slice(Math.max(0, index - 3), index);
    if (index > 0 && /[0-9$]/.test(masked[index - 1])) continue;
    if (MEMBER_ACCESS.test(before)) continue;
    names.add(match[0]);
  }
  return [...names];
}

export interface PrintfCall {
  /** Offset of `printf`. */
  start: number;
  /** Offset just past the closing parenthesis. */
  end: number;
  /** Raw text of the format literal, quotes included. */
  format: string;
  /** Raw text of each remaining argument, trimmed. */
  args: string[];
}

const PRINTF = /(?<![\w.$>:])printf\s*\(/g;
const OPEN = new Set(['(', '[', '{']);
const CLOSE = new Set([')', ']', '}']);
const STRING_LITERAL = /^"(?:[^"\\\n]|\\.)*"$/s;

/**
 * Free-standing `printf("literal", ...)` calls. Method calls such as
 * `System.out.printf` and calls whose first argument is not a double-quoted
 * literal are left alone.
 */
export function findPrintfCalls(code: string, language: LanguageTag): PrintfCall[] {
  const masked = maskCode(code, language);
  const calls: PrintfCall[] = [];

  for (const match of masked.matchAll(PRINTF)) {
    const start = match.index ?? 0;
    const open = start + match[0].length - 1;
    const argSpans: Array<[number, number]> = [];
    let depth = 0;
    let argStart = open + 1;
    let end = -1;

    for (let i = open + 1; i < masked.length; i++) {
      const ch = masked[i];
      if (OPEN.has(ch)) depth++;
      else if (CLOSE.has(ch)) {
        if (depth === 0) {
          argSpans.push([argStart, i]);
          end = i + 1;
          break;
        }
        depth--;
      } else if (ch === ',' && depth === 0) {
        argSpans.push([argStart, i]);
        argStart = i + 1;
      }
    }
    if (end === -1) continue;

    const [format, ...args] = argSpans.map(([from, to]) => code.slice(from, to).trim());
    if (format === undefined || !STRING_LITERAL.test(format)) continue;
    calls.push({ start, end, format, args: args.filter((a) => a.length > 0) });
  }
  return calls;
}

const SIMPLE_ESCAPES: Record<string, string> = {
  n: '\n', t: '\t', r: '\r', '\\': '\\', '"': '"', "'": "'", '?': '?',
  a: '\x07', b: '\b', f: '\f', v: '\v',
};

/** Decode the escapes of a C-family double-quoted literal (quotes included). */
export function decodeCString(literal: string): string {
  const body = literal.slice(1, -1);
  let out = '';
  for (let i = 0; i < body.length; i++) {
    const ch = body[i];
    if (ch !== '\\' || i + 1 >= body.length) {
      out += ch;
      continue;
    }
    const next = body[++i];
    const simple = SIMPLE_ESCAPES[next];
    if (simple !== undefined) {
      out += simple;
    } else if (next === 'x') {
      const hex = /^[0-9A-Fa-f]{1,2}/.exec(body.slice(i + 1))?.[0] ?? '';
      out += hex ? String.fromCharCode(parseInt(hex, 16)) : 'x';
      i += hex.length;
    } else if (next === 'u') {
      const hex = /^[0-9A-Fa-f]{4}/.exec(body.slice(i + 1))?.[0] ?? '';
      out += hex ? String.fromCharCode(parseInt(hex, 16)) : 'u';
      i += hex.length;
    } else if (/[0-7]/.test(next)) {
      const digits = /^[0-7]{1,3}/.exec(body.slice(i))?.[0] ?? next;
      out += String.fromCharCode(parseInt(digits, 8));
      i += digits.length - 1;
    } else {
      out += next;
    }
  }
  return out;
}
