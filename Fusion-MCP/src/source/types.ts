/**
 * Core types for fusion sources: classified lines, directives, blocks, programs.
 */

import type { LanguageTag } from '../languages.js';

// ── Classified lines ────────────────────────────────────────────────────────

export interface DirectiveLine {
  kind: 'directive';
  line: number;
  name: string;
  value: string;
}

export interface CodeLine {
  kind: 'code';
  line: number;
  language: LanguageTag;
  /** Columns before the tag plus columns after the dot (tab = 4). */
  indent: number;
  /** Code with the tag, dot and leading whitespace removed. */
  text: string;
}

/** Indented untagged line; only meaningful right after an open block. */
export interface BareLine {
  kind: 'bare';
  line: number;
  indent: number;
  text: string;
  /** Set when the line looked like `<tag>.<code>` with an unknown tag. */
  tag?: string;
}

export interface CommentLine {
  kind: 'comment';
  line: number;
}

export interface BlankLine {
  kind: 'blank';
  line: number;
}

export type SourceLine = DirectiveLine | CodeLine | BareLine | CommentLine | BlankLine;

// ── Program ─────────────────────────────────────────────────────────────────

export interface Directive {
  name: string;
  value: string;
  line: number;
}

export interface BlockFragment {
  line: number;
  text: string;
}

export interface CodeBlock {
  /** First physical line. */
  line: number;
  language: LanguageTag;
  /** Fragments joined by newline, indentation relative to the first line. */
  content: string;
  fragments: BlockFragment[];
}

export interface Program {
  directives: Record<string, Directive[]>;
  blocks: CodeBlock[];
  sourceHash: string;
}

// ── Diagnostics ─────────────────────────────────────────────────────────────

export type DiagnosticCategory =
  | 'UnknownDirective'
  | 'ToolchainUnavailable'
  | 'ImportFailed'
  | 'ExecutionError'
  | 'MarshalError'
  | 'SecurityFinding';

/** Non-fatal condition accumulated alongside a result. */
export interface Diagnostic {
  severity: 'warning' | 'error';
  category: DiagnosticCategory;
  message: string;
  line?: number;
  blockIndex?: number;
}
