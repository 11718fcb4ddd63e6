import type { Expr, Parameter, Stmt } from './ast.js';

export interface ScopeNames {
  locals: Set<string>;
  globals: Set<string>;
  nonlocals: Set<string>;
}

/** Names bound by an assignment target. Subscripts and attributes bind nothing. */
export function targetNames(target: Expr, into: Set<string>): void {
  switch (target.kind) {
    case 'name':
      into.add(target.id);
      break;
    case 'tuple':
    case 'list':
      for (const elt of target.elts) targetNames(elt, into);
      break;
    case 'starred':
      targetNames(target.value, into);
      break;
    default:
      break;
  }
}

function collect(body: readonly Stmt[], names: ScopeNames): void {
  for (const stmt of body) {
    switch (stmt.kind) {
      case 'assign':
        for (const target of stmt.targets) targetNames(target, names.locals);
        break;
      case 'augassign':
        targetNames(stmt.target, names.locals);
        break;
      case 'del':
        for (const target of stmt.targets) targetNames(target, names.locals);
        break;
      case 'for':
        targetNames(stmt.target, names.locals);
        collect(stmt.body, names);
        collect(stmt.orelse, names);
        break;
      case 'while':
      case 'if':
        collect(stmt.body, names);
        collect(stmt.orelse, names);
        break;
      case 'try':
        collect(stmt.body, names);
        for (const handler of stmt.handlers) {
          if (handler.name) names.locals.add(handler.name);
          collect(handler.body, names);
        }
        collect(stmt.orelse, names);
        collect(stmt.finalbody, names);
        break;
      case 'import':
        for (const alias of stmt.names) names.locals.add(alias.asname ?? alias.name.split('.')[0]);
        break;
      case 'importfrom':
        for (const alias of stmt.names) {
          if (alias.name !== '*') names.locals.add(alias.asname ?? alias.name);
        }
        break;
      case 'def':
      case 'class':
        names.locals.add(stmt.name);
        break;
      case 'global':
        for (const name of stmt.names) names.globals.add(name);
        break;
      case 'nonlocal':
        for (const name of stmt.names) names.nonlocals.add(name);
        break;
      default:
        break;
    }
  }
}

/**
 * Classify the names a function body binds. A name assigned anywhere in the
 * body is local throughout it unless declared `global` or `nonlocal`.
 */
export function analyzeFunction(params: readonly Parameter[], body: readonly Stmt[] | null): ScopeNames {
  const names: ScopeNames = { locals: new Set(), globals: new Set(), nonlocals: new Set() };
  for (const param of params) names.locals.add(param.name);
  if (body) collect(body, names);
  for (const name of names.globals) names.locals.delete(name);
  for (const name of names.nonlocals) names.locals.delete(name);
  return names;
}
