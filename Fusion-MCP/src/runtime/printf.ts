/**
 * printf sub-protocol for non-native blocks.
 *
 * Each free-standing `printf("fmt", args...)` is resolved before the block
 * runs: arguments are evaluated as native expressions against the current
 * environment, the format is applied, and the call is replaced by the target
 * language's print of the resulting text.
 */

import { ExecutionError, type SourceLocation } from '../errors.js';
import type { LanguageTag } from '../languages.js';
import { InterpreterTimeout, PyRaise, PySyntaxError } from '../python/errors.js';
import { formatPercent } from '../python/format.js';
import type { PyValue } from '../python/values.js';
import type { MarshalAdapter } from '../executors/marshal.js';
import { decodeCString, findPrintfCalls } from './guest-code.js';

export type Evaluate = (expression: string) => PyValue;

/** C length modifiers have no meaning for host values; `%u` prints as `%d`. */
const C_CONVERSION = /%%|%([#0\- +]*(?:\d+|\*)?(?:\.(?:\d+|\*))?)(?:hh|h|ll|l|L|q|j|z|t)?([diouxXeEfFgGcs])/g;

export function stripLengthModifiers(format: string): string {
  return format.replace(C_CONVERSION, (match, spec: string | undefined, conv: string | undefined) => {
    if (match === '%%') return match;
    return `%${spec ?? ''}${conv === 'u' ? 'd' : conv ?? ''}`;
  });
}

/** Argument text as a native expression; PHP variables lose their `$`. */
function nativeExpression(arg: string, language: LanguageTag): string {
  return language === 'php' ? arg.replace(/\$(?=[A-Za-z_])/g, '') : arg;
}

function describe(err: unknown): string {
  if (err instanceof PyRaise) return err.message;
  if (err instanceof PySyntaxError) return `SyntaxError: ${err.detail}`;
  if (err instanceof Error) return err.message;
  return String(err);
}

function evaluationError(arg: string, err: unknown, location: SourceLocation): ExecutionError {
  if (err instanceof PyRaise && err.exception.cls.name === 'NameError') {
    const name = /name '([^']+)'/.exec(err.message)?.[1] ?? arg;
    return new ExecutionError(`Unresolved name '${name}' in printf argument '${arg}'`, location, { argument: arg, name });
  }
  return new ExecutionError(`Cannot evaluate printf argument '${arg}': ${describe(err)}`, location, { argument: arg });
}

/** Formatted text of one call. */
export function formatPrintf(format: string, args: readonly string[], language: LanguageTag, evaluate: Evaluate, location: SourceLocation = {}): string {
  const values = args.map((arg) => {
    try {
      return evaluate(nativeExpression(arg, language));
    } catch (err) {
      if (err instanceof PyRaise || err instanceof PySyntaxError || err instanceof InterpreterTimeout) {
        throw evaluationError(arg, err, location);
      }
      throw err;
    }
  });

  const template = stripLengthModifiers(decodeCString(format));
  try {
    return formatPercent(template, values);
  } catch (err) {
    if (!(err instanceof PyRaise)) throw err;
    throw new ExecutionError(`printf format ${format} failed: ${err.message}`, location, { format });
  }
}

export interface PrintfResolution {
  code: string;
  /** Number of calls replaced. */
  resolved: number;
}

/** Rewrite every printf call in `code`; throws ExecutionError on the first failure. */
export function resolvePrintf(
  code: string,
  adapter: MarshalAdapter,
  evaluate: Evaluate,
  location: SourceLocation = {},
): PrintfResolution {
  const calls = findPrintfCalls(code, adapter.language);
  const texts = calls.map((call) => formatPrintf(call.format, call.args, adapter.language, evaluate, location));
  let out = code;
  // Replace from the end so earlier offsets stay valid.
  for (let i = calls.length - 1; i >= 0; i--) {
    out = out.slice(0, calls[i].start) + adapter.printStatement(texts[i]) + out.slice(calls[i].end);
  }
  return { code: out, resolved: calls.length };
}
