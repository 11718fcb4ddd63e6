/**
 * Block assembler.
 *
 * Folds the classified line stream into code blocks. A tagged line joins the
 * open block of the same language when the block is syntactically unfinished
 * (open bracket or string, trailing opener), when the line is indented deeper
 * than the block's first line, or when it starts a clause (`else`, `except`,
 * ...) of a compound statement. Anything else closes the block.
 */

import { LANGUAGE_SYNTAX, type LanguageSyntax, type LanguageTag } from '../languages.js';
import { FusionSyntaxError, UnknownLanguageError } from '../errors.js';
import type { CodeBlock, DirectiveLine, SourceLine } from './types.js';

/** Bracket and string state carried from one fragment to the next. */
export interface ScanState {
  depth: number;
  /** Delimiter of a string literal still open at end of line. */
  openString: string | null;
}

export interface LineScan extends ScanState {
  /** The line with any trailing comment removed. */
  code: string;
}

const TRIPLE_QUOTES = ['"""', "'''"] as const;
const OPENING = new Set(['(', '[', '{']);
const CLOSING = new Set([')', ']', '}']);

/**
 * Track bracket depth through one line of guest code, skipping string
 * literals and comments.
 */
export function scanLine(text: string, syntax: LanguageSyntax, state: ScanState): LineScan {
  let { depth, openString } = state;
  let codeEnd = text.length;
  let i = 0;

  while (i < text.length) {
    if (openString !== null) {
      if (text[i] === '\\') {
        i += 2;
        continue;
      }
      if (text.startsWith(openString, i)) {
        i += openString.length;
        openString = null;
        continue;
      }
      i++;
      continue;
    }

    if (text.startsWith(syntax.lineComment, i)) {
      codeEnd = i;
      break;
    }
    if (syntax.lineComment === '//' && text.startsWith('/*', i)) {
      const close = text.indexOf('*/', i + 2);
      if (close === -1) {
        codeEnd = i;
        break;
      }
      i = close + 2;
      continue;
    }

    const ch = text[i];
    if (syntax.tag === 'py') {
      const triple = TRIPLE_QUOTES.find((q) => text.startsWith(q, i));
      if (triple) {
        openString = triple;
        i += 3;
        continue;
      }
    }
    if (syntax.quotes.includes(ch)) {
      const end = findStringEnd(text, i + 1, ch);
      if (end === -1) {
        // Only template literals may span lines; other strings end at EOL.
        if (ch === '`') openString = '`';
        i = text.length;
        continue;
      }
      i = end + 1;
      continue;
    }

    if (OPENING.has(ch)) depth++;
    else if (CLOSING.has(ch)) depth = Math.max(0, depth - 1);
    i++;
  }

  return { depth, openString, code: text.slice(0, codeEnd).trimEnd() };
}

function findStringEnd(text: string, from: number, quote: string): number {
  for (let i = from; i < text.length; i++) {
    if (text[i] === '\\') {
      i++;
      continue;
    }
    if (text[i] === quote) return i;
  }
  return -1;
}

export function endsWithOpener(code: string, syntax: LanguageSyntax): boolean {
  return syntax.openers.some((suffix) => code.endsWith(suffix));
}

export function startsWithClause(text: string, syntax: LanguageSyntax): boolean {
  return syntax.clauseKeywords.some((kw) => {
    if (!text.startsWith(kw)) return false;
    const next = text.charAt(kw.length);
    return next === '' || !/[A-Za-z0-9_]/.test(next);
  });
}

interface PendingFragment {
  line: number;
  indent: number;
  text: string;
}

interface OpenBlock {
  language: LanguageTag;
  syntax: LanguageSyntax;
  baseIndent: number;
  compound: boolean;
  fragments: PendingFragment[];
  scan: ScanState;
  lastCode: string;
}

export interface AssembledSource {
  blocks: CodeBlock[];
  directives: DirectiveLine[];
}

export function assemble(lines: readonly SourceLine[]): AssembledSource {
  const blocks: CodeBlock[] = [];
  const directives: DirectiveLine[] = [];
  let current: OpenBlock | null = null;

  const close = (): void => {
    if (current) blocks.push(finish(current));
    current = null;
  };

  for (const entry of lines) {
    switch (entry.kind) {
      case 'blank':
      case 'comment':
        close();
        break;

      case 'directive':
        close();
        directives.push(entry);
        break;

      case 'bare': {
        if (current === null) {
          if (entry.tag !== undefined) throw new UnknownLanguageError(entry.tag, entry.line);
          throw new FusionSyntaxError('Malformed line: indented code outside a block', entry.line);
        }
        append(current, entry.line, entry.indent, entry.text);
        break;
      }

      case 'code': {
        if (current !== null && current.language === entry.language && continues(current, entry.indent, entry.text)) {
          append(current, entry.line, entry.indent, entry.text);
          break;
        }
        close();
        const syntax = LANGUAGE_SYNTAX[entry.language];
        const block: OpenBlock = {
          language: entry.language,
          syntax,
          baseIndent: entry.indent,
          compound: false,
          fragments: [],
          scan: { depth: 0, openString: null },
          lastCode: '',
        };
        append(block, entry.line, entry.indent, entry.text);
        block.compound = endsWithOpener(block.lastCode, syntax);
        current = block;
        break;
      }
    }
  }

  close();
  return { blocks, directives };
}

function continues(block: OpenBlock, indent: number, text: string): boolean {
  if (block.scan.depth > 0 || block.scan.openString !== null) return true;
  if (endsWithOpener(block.lastCode, block.syntax)) return true;
  if (indent > block.baseIndent) return true;
  return block.compound && indent === block.baseIndent && startsWithClause(text, block.syntax);
}

function append(block: OpenBlock, line: number, indent: number, text: string): void {
  const inString = block.scan.openString !== null;
  const result = scanLine(text, block.syntax, block.scan);
  block.scan = { depth: result.depth, openString: result.openString };
  // Lines wholly inside a multi-line string carry no opener.
  if (!inString || result.openString === null) {
    block.lastCode = result.code;
  }
  block.fragments.push({ line, indent, text });
}

function finish(block: OpenBlock): CodeBlock {
  const fragments = block.fragments.map((f) => ({
    line: f.line,
    text: ' '.repeat(Math.max(0, f.indent - block.baseIndent)) + f.text,
  }));
  return {
    line: fragments[0].line,
    language: block.language,
    content: fragments.map((f) => f.text).join('\n'),
    fragments,
  };
}

/** Source line of a line inside a block's content (1-based, block-relative). */
export function sourceLineOf(block: Pick<CodeBlock, 'line' | 'fragments'>, relativeLine: number): number {
  return block.fragments[relativeLine - 1]?.line ?? block.line;
}
