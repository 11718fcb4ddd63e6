/**
 * Guest languages known to the fusion format.
 *
 * The syntax descriptors feed the block assembler's continuation predicate;
 * they are deliberately shallow (suffixes, clause keywords, comment and
 * string delimiters) and never a guest grammar.
 */

export const LANGUAGE_TAGS = ['py', 'cpp', 'js', 'java', 'php', 'rust'] as const;
export type LanguageTag = (typeof LANGUAGE_TAGS)[number];

/** The one language executed in-process against the shared environment. */
export const NATIVE_TAG = 'py' satisfies LanguageTag;

export function isLanguageTag(value: string): value is LanguageTag {
  const known: readonly string[] = LANGUAGE_TAGS;
  return known.includes(value);
}

export interface LanguageSyntax {
  tag: LanguageTag;
  displayName: string;
  /** Source file extension used when a block is written to disk. */
  extension: string;
  /** A fragment ending with one of these keeps the block open. */
  openers: readonly string[];
  /** Keywords that continue a compound statement at the base indentation. */
  clauseKeywords: readonly string[];
  /** Line comment introducer inside guest code. */
  lineComment: string;
  /** Characters that open string literals. */
  quotes: readonly string[];
}

const SHARED_OPENERS = [',', '(', '[', '\\'] as const;
const BRACE_CLAUSES = ['else', 'catch', 'finally'] as const;

export const LANGUAGE_SYNTAX: Record<LanguageTag, LanguageSyntax> = {
  py: {
    tag: 'py',
    displayName: 'Python',
    extension: 'py',
    openers: [':', ...SHARED_OPENERS, '{'],
    clauseKeywords: ['elif', 'else', 'except', 'finally'],
    lineComment: '#',
    quotes: ['"', "'"],
  },
  cpp: {
    tag: 'cpp',
    displayName: 'C++',
    extension: 'cpp',
    openers: ['{', ...SHARED_OPENERS],
    clauseKeywords: BRACE_CLAUSES,
    lineComment: '//',
    quotes: ['"', "'"],
  },
  js: {
    tag: 'js',
    displayName: 'JavaScript',
    extension: 'js',
    openers: ['{', ...SHARED_OPENERS],
    clauseKeywords: BRACE_CLAUSES,
    lineComment: '//',
    quotes: ['"', "'", '`'],
  },
  java: {
    tag: 'java',
    displayName: 'Java',
    extension: 'java',
    openers: ['{', ...SHARED_OPENERS],
    clauseKeywords: BRACE_CLAUSES,
    lineComment: '//',
    quotes: ['"', "'"],
  },
  php: {
    tag: 'php',
    displayName: 'PHP',
    extension: 'php',
    openers: ['{', ...SHARED_OPENERS],
    clauseKeywords: ['else', 'elseif', 'catch', 'finally'],
    lineComment: '//',
    quotes: ['"', "'"],
  },
  rust: {
    tag: 'rust',
    displayName: 'Rust',
    extension: 'rs',
    openers: ['{', ...SHARED_OPENERS],
    clauseKeywords: ['else'],
    lineComment: '//',
    quotes: ['"'],
  },
};
