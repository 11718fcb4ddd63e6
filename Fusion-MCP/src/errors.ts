import { BaseError } from '@fusion/shared/Types/errors.js';

/**
 * Where in the fusion source an error originated. `blockIndex` is absent for
 * errors raised before blocks exist (compilation) or outside any block.
 */
export interface SourceLocation {
  line?: number;
  blockIndex?: number;
}

/**
 * Base error for all Fusion errors.
 * Extends shared BaseError for consistent error handling across the stack.
 */
export class FusionError extends BaseError {
  readonly line?: number;
  readonly blockIndex?: number;

  constructor(message: string, code: string, location: SourceLocation = {}, details?: Record<string, unknown>) {
    super(message, code, { ...details, ...location });
    this.name = 'FusionError';
    this.line = location.line;
    this.blockIndex = location.blockIndex;
  }
}

/**
 * Bad directive, malformed line or unterminated comment. Aborts compilation.
 */
export class FusionSyntaxError extends FusionError {
  constructor(message: string, line: number, code = 'SYNTAX_ERROR', details?: Record<string, unknown>) {
    super(`${message} (line ${line})`, code, { line }, details);
    this.name = 'FusionSyntaxError';
  }
}

/**
 * `<tag>.<code>` line whose tag is not a registered language.
 */
export class UnknownLanguageError extends FusionSyntaxError {
  readonly tag: string;

  constructor(tag: string, line: number) {
    super(`Unknown language tag '${tag}'`, line, 'UNKNOWN_LANGUAGE', { tag });
    this.name = 'UnknownLanguageError';
    this.tag = tag;
  }
}

/**
 * A finding at or above the blocking severity. Raised before any block runs.
 */
export class SecurityViolationError extends FusionError {
  constructor(message: string, location: SourceLocation = {}, details?: Record<string, unknown>) {
    super(message, 'SECURITY_VIOLATION', location, details);
    this.name = 'SecurityViolationError';
  }
}

/**
 * A block failed: native exception, non-zero exit, timeout, or an
 * unresolvable printf argument.
 */
export class ExecutionError extends FusionError {
  constructor(message: string, location: SourceLocation = {}, details?: Record<string, unknown>) {
    super(message, 'EXECUTION_ERROR', location, details);
    this.name = 'ExecutionError';
  }
}

/**
 * A value cannot be expressed in the target language.
 */
export class MarshalError extends FusionError {
  constructor(message: string, location: SourceLocation = {}, details?: Record<string, unknown>) {
    super(message, 'MARSHAL_ERROR', location, details);
    this.name = 'MarshalError';
  }
}

/**
 * Compiled artifact does not match its digest or its source.
 */
export class IntegrityError extends FusionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INTEGRITY_ERROR', {}, details);
    this.name = 'IntegrityError';
  }
}

/**
 * Raised only when toolchains are mandatory; otherwise a missing toolchain
 * selects stub rendering and is reported as a warning.
 */
export class ToolchainUnavailableError extends FusionError {
  constructor(language: string, location: SourceLocation = {}) {
    super(`Toolchain for '${language}' is not available`, 'TOOLCHAIN_UNAVAILABLE', location, { language });
    this.name = 'ToolchainUnavailableError';
  }
}

export class RunCancelledError extends FusionError {
  constructor(location: SourceLocation = {}) {
    super('Run cancelled', 'RUN_CANCELLED', location);
    this.name = 'RunCancelledError';
  }
}
