import { LANGUAGE_SYNTAX, type LanguageTag } from '../languages.js';
import type { ExecutionOutcome } from './types.js';

/**
 * Stub rendering for a language whose toolchain is missing: the block's
 * resolved text, under a comment saying it was not executed.
 */
export function renderStub(language: LanguageTag, code: string): ExecutionOutcome {
  const syntax = LANGUAGE_SYNTAX[language];
  const header = `${syntax.lineComment} ${syntax.displayName} toolchain unavailable; block not executed`;
  return {
    status: 'stubbed',
    stdout: `${header}\n${code}\n`,
    stderr: '',
    exitCode: null,
    durationMs: 0,
    truncated: false,
  };
}
