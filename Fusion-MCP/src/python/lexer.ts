/**
 * Tokenizer for the native language: produces NEWLINE/INDENT/DEDENT tokens
 * the way the parser expects, with implicit line joining inside brackets.
 */

import { PySyntaxError } from './errors.js';

export type Token =
  | { type: 'name'; value: string; line: number }
  | { type: 'number'; value: string; isFloat: boolean; line: number }
  | { type: 'string'; value: string; fstring: boolean; raw: boolean; line: number }
  | { type: 'op'; value: string; line: number }
  | { type: 'newline'; line: number }
  | { type: 'indent'; line: number }
  | { type: 'dedent'; line: number }
  | { type: 'eof'; line: number };

const OPERATORS = [
  '**=', '//=', '>>=', '<<=', '...',
  '**', '//', '==', '!=', '<=', '>=', '->', '+=', '-=', '*=', '/=', '%=', '&=', '|=', '^=', '@=', ':=', '<<', '>>',
  '+', '-', '*', '/', '%', '@', '&', '|', '^', '~', '<', '>', '(', ')', '[', ']', '{', '}', ',', ':', '.', ';', '=',
];

const STRING_PREFIXES = new Set(['', 'r', 'u', 'f', 'b', 'rb', 'br', 'fr', 'rf']);
const NAME = /^[\p{L}_][\p{L}\p{N}_]*/u;
const RADIX_INT = /^0(?:[xX][0-9a-fA-F_]+|[oO][0-7_]+|[bB][01_]+)/;
const DECIMAL = /^(?:\d[\d_]*\.?[\d_]*|\.\d[\d_]*)(?:[eE][+-]?\d[\d_]*)?/;

const TAB_STOP = 8;

export function lex(input: string): Token[] {
  const source = input.replace(/\r\n?/g, '\n');
  const tokens: Token[] = [];
  const indents = [0];
  const n = source.length;
  let i = 0;
  let line = 1;
  let depth = 0;
  let atLineStart = true;

  while (i < n) {
    if (atLineStart && depth === 0) {
      let col = 0;
      let j = i;
      while (j < n && (source[j] === ' ' || source[j] === '\t' || source[j] === '\f')) {
        if (source[j] === '\t') col = (Math.floor(col / TAB_STOP) + 1) * TAB_STOP;
        else if (source[j] === ' ') col++;
        else col = 0;
        j++;
      }
      if (j >= n) {
        i = j;
        break;
      }
      if (source[j] === '\n' || source[j] === '#') {
        while (j < n && source[j] !== '\n') j++;
        if (j < n) {
          j++;
          line++;
        }
        i = j;
        continue;
      }

      i = j;
      atLineStart = false;
      const top = indents[indents.length - 1];
      if (col > top) {
        indents.push(col);
        tokens.push({ type: 'indent', line });
      } else if (col < top) {
        while (col < indents[indents.length - 1]) {
          indents.pop();
          tokens.push({ type: 'dedent', line });
        }
        if (col !== indents[indents.length - 1]) {
          throw new PySyntaxError('unindent does not match any outer indentation level', line);
        }
      }
      continue;
    }

    const c = source[i];

    if (c === '\n') {
      if (depth === 0) {
        tokens.push({ type: 'newline', line });
        atLineStart = true;
      }
      i++;
      line++;
      continue;
    }
    if (c === ' ' || c === '\t' || c === '\f') {
      i++;
      continue;
    }
    if (c === '#') {
      while (i < n && source[i] !== '\n') i++;
      continue;
    }
    if (c === '\\') {
      if (source[i + 1] === '\n') {
        i += 2;
        line++;
        continue;
      }
      throw new PySyntaxError('unexpected character after line continuation character', line);
    }

    // String literal, possibly prefixed.
    let p = i;
    while (p < n && p - i < 2 && /[rRbBuUfF]/.test(source[p])) p++;
    if (p < n && (source[p] === '"' || source[p] === "'")) {
      const prefix = source.slice(i, p).toLowerCase();
      if (STRING_PREFIXES.has(prefix)) {
        if (prefix.includes('b')) throw new PySyntaxError('bytes literals are not supported', line);
        const lexed = lexString(source, p, line);
        const raw = prefix.includes('r');
        const fstring = prefix.includes('f');
        tokens.push({
          type: 'string',
          value: raw || fstring ? lexed.body : decodeEscapes(lexed.body, line),
          fstring,
          raw,
          line,
        });
        line = lexed.line;
        i = lexed.end;
        continue;
      }
    }

    const rest = source.slice(i);

    if (/\d/.test(c) || (c === '.' && /\d/.test(source[i + 1] ?? ''))) {
      const radix = RADIX_INT.exec(rest);
      const decimal = radix ? null : DECIMAL.exec(rest);
      const text = radix ? radix[0] : decimal ? decimal[0] : c;
      const next = source[i + text.length] ?? '';
      if (/[jJ]/.test(next)) throw new PySyntaxError('complex literals are not supported', line);
      if (/[\p{L}_]/u.test(next)) throw new PySyntaxError('invalid decimal literal', line);
      tokens.push({ type: 'number', value: text, isFloat: !radix && /[.eE]/.test(text), line });
      i += text.length;
      continue;
    }

    const name = NAME.exec(rest);
    if (name) {
      tokens.push({ type: 'name', value: name[0], line });
      i += name[0].length;
      continue;
    }

    const op = OPERATORS.find((candidate) => rest.startsWith(candidate));
    if (op) {
      if (op === '(' || op === '[' || op === '{') depth++;
      else if (op === ')' || op === ']' || op === '}') depth = Math.max(0, depth - 1);
      tokens.push({ type: 'op', value: op, line });
      i += op.length;
      continue;
    }

    throw new PySyntaxError(`invalid character '${c}'`, line);
  }

  const last = tokens[tokens.length - 1];
  if (last && last.type !== 'newline' && last.type !== 'dedent') {
    tokens.push({ type: 'newline', line });
  }
  while (indents.length > 1) {
    indents.pop();
    tokens.push({ type: 'dedent', line });
  }
  tokens.push({ type: 'eof', line });
  return tokens;
}

interface LexedString {
  body: string;
  end: number;
  line: number;
}

function lexString(source: string, start: number, startLine: number): LexedString {
  const quote = source[start];
  const triple = source.startsWith(quote.repeat(3), start);
  const delim = triple ? quote.repeat(3) : quote;
  let j = start + delim.length;
  let line = startLine;
  let body = '';

  while (true) {
    if (j >= source.length) {
      throw new PySyntaxError(
        triple ? 'unterminated triple-quoted string literal' : 'unterminated string literal',
        startLine,
      );
    }
    const ch = source[j];
    if (ch === '\\') {
      const next = source[j + 1] ?? '';
      if (next === '\n') line++;
      body += ch + next;
      j += 2;
      continue;
    }
    if (source.startsWith(delim, j)) {
      j += delim.length;
      break;
    }
    if (ch === '\n') {
      if (!triple) throw new PySyntaxError('unterminated string literal', startLine);
      line++;
    }
    body += ch;
    j++;
  }
  return { body, end: j, line };
}

const SIMPLE_ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  a: '\x07',
  b: '\b',
  f: '\f',
  v: '\v',
  '\\': '\\',
  "'": "'",
  '"': '"',
};

/** Resolve backslash escapes of a non-raw string body. */
export function decodeEscapes(body: string, line: number): string {
  let out = '';
  for (let i = 0; i < body.length; i++) {
    const ch = body[i];
    if (ch !== '\\') {
      out += ch;
      continue;
    }
    const next = body[i + 1] ?? '';
    if (next === '\n') {
      i++;
      continue;
    }
    if (next === 'x' || next === 'u' || next === 'U') {
      const width = next === 'x' ? 2 : next === 'u' ? 4 : 8;
      const hex = body.slice(i + 2, i + 2 + width);
      if (hex.length !== width || !/^[0-9a-fA-F]+$/.test(hex)) {
        throw new PySyntaxError(`truncated \\${next} escape`, line);
      }
      out += String.fromCodePoint(parseInt(hex, 16));
      i += 1 + width;
      continue;
    }
    if (/[0-7]/.test(next)) {
      const oct = /^[0-7]{1,3}/.exec(body.slice(i + 1));
      const digits = oct ? oct[0] : next;
      out += String.fromCharCode(parseInt(digits, 8));
      i += digits.length;
      continue;
    }
    const simple = SIMPLE_ESCAPES[next];
    if (simple !== undefined) {
      out += simple;
      i++;
      continue;
    }
    out += ch;
  }
  return out;
}
