/**
 * Line tokenizer for fusion sources.
 *
 * Classifies each physical line as a directive, a tagged code line, a bare
 * (untagged, indented) line, a comment or a blank. Comments are recognised
 * before tagging; `/* ... *\/` may span lines. An indented `#` line that
 * follows a `py` line is a bare line, not a directive.
 */

import { LANGUAGE_TAGS, type LanguageTag } from '../languages.js';
import { FusionSyntaxError, UnknownLanguageError } from '../errors.js';
import type { SourceLine, DirectiveLine } from './types.js';

export interface TokenizeOptions {
  /** Tags accepted in this compilation. Defaults to every known language. */
  languages?: readonly LanguageTag[];
}

const TAB_WIDTH = 4;
const TAG_LINE = /^([A-Za-z_][A-Za-z0-9_]*)\.(.*)$/;
const DIRECTIVE_HEAD = /^#([A-Za-z_][A-Za-z0-9_]*)(.*)$/;

export function splitLines(source: string): string[] {
  return source.split(/\r\n|\r|\n/);
}

/** Width of the leading whitespace of `text`; a tab counts as four columns. */
export function measureIndent(text: string): number {
  let width = 0;
  for (const ch of text) {
    if (ch === ' ') width += 1;
    else if (ch === '\t') width += TAB_WIDTH;
    else break;
  }
  return width;
}

export function tokenize(source: string, options: TokenizeOptions = {}): SourceLine[] {
  const languages: readonly string[] = options.languages ?? LANGUAGE_TAGS;
  const lines = splitLines(source);
  const out: SourceLine[] = [];
  let commentOpenedAt: number | null = null;
  // Language of the block the next bare line would join.
  let open: LanguageTag | null = null;

  for (let i = 0; i < lines.length; i++) {
    const lineNo = i + 1;
    let raw = lines[i];

    if (commentOpenedAt !== null) {
      const close = raw.indexOf('*/');
      if (close === -1) {
        out.push({ kind: 'comment', line: lineNo });
        open = null;
        continue;
      }
      commentOpenedAt = null;
      raw = raw.slice(close + 2);
      if (raw.trim() === '') {
        out.push({ kind: 'comment', line: lineNo });
        open = null;
        continue;
      }
    }

    const trimmed = raw.trim();
    if (trimmed === '') {
      out.push({ kind: 'blank', line: lineNo });
      open = null;
      continue;
    }
    if (trimmed.startsWith('//')) {
      out.push({ kind: 'comment', line: lineNo });
      continue;
    }
    if (trimmed.startsWith('/*')) {
      const close = trimmed.indexOf('*/', 2);
      if (close === -1) {
        commentOpenedAt = lineNo;
        out.push({ kind: 'comment', line: lineNo });
        open = null;
        continue;
      }
      const rest = trimmed.slice(close + 2);
      if (rest.trim() === '') {
        out.push({ kind: 'comment', line: lineNo });
        open = null;
        continue;
      }
      raw = rest;
    }

    const entry = classify(raw, lineNo, languages, open);
    if (entry.kind === 'code') open = entry.language;
    else if (entry.kind !== 'bare') open = null;
    out.push(entry);
  }

  if (commentOpenedAt !== null) {
    throw new FusionSyntaxError('Unterminated block comment', commentOpenedAt);
  }
  return out;
}

function classify(raw: string, line: number, languages: readonly string[], open: LanguageTag | null): SourceLine {
  const outer = measureIndent(raw);
  const body = raw.trimStart();

  if (body.startsWith('#')) {
    if (outer > 0 && open === 'py') return { kind: 'bare', line, indent: outer, text: body.trimEnd() };
    return parseDirective(body.trimEnd(), line);
  }

  const tagged = TAG_LINE.exec(body);
  if (tagged) {
    const [, tag, rest] = tagged;
    if (isAccepted(tag, languages)) {
      return {
        kind: 'code',
        line,
        language: tag,
        indent: outer + measureIndent(rest),
        text: rest.trim(),
      };
    }
    // `obj.method()` inside an indented body is code, not a tag.
    if (outer === 0) throw new UnknownLanguageError(tag, line);
    return { kind: 'bare', line, indent: outer, text: body.trimEnd(), tag };
  }

  if (outer > 0) {
    return { kind: 'bare', line, indent: outer, text: body.trimEnd() };
  }
  throw new FusionSyntaxError(`Malformed line '${truncate(body)}'`, line);
}

function isAccepted(tag: string, languages: readonly string[]): tag is LanguageTag {
  return languages.includes(tag);
}

/**
 * Parse `#name "value"`. Only `\"` and `\\` are escapes inside the value; a
 * trailing `//` comment is allowed.
 */
export function parseDirective(text: string, line: number): DirectiveLine {
  const head = DIRECTIVE_HEAD.exec(text);
  if (!head) {
    throw new FusionSyntaxError(`Malformed directive '${truncate(text)}'`, line);
  }
  const [, name, tail] = head;
  const rest = tail.trimStart();
  if (!rest.startsWith('"')) {
    throw new FusionSyntaxError(`Directive '#${name}' value must be a double-quoted string`, line);
  }

  let value = '';
  let i = 1;
  let closed = false;
  while (i < rest.length) {
    const ch = rest[i];
    if (ch === '\\' && (rest[i + 1] === '"' || rest[i + 1] === '\\')) {
      value += rest[i + 1];
      i += 2;
      continue;
    }
    if (ch === '"') {
      closed = true;
      i++;
      break;
    }
    value += ch;
    i++;
  }
  if (!closed) {
    throw new FusionSyntaxError(`Unterminated string in directive '#${name}'`, line);
  }

  const after = rest.slice(i).trim();
  if (after !== '' && !after.startsWith('//')) {
    throw new FusionSyntaxError(`Unexpected text after directive '#${name}' value`, line);
  }
  return { kind: 'directive', line, name, value };
}

function truncate(text: string, max = 40): string {
  return text.length <= max ? text : `${text.slice(0, max)}...`;
}
