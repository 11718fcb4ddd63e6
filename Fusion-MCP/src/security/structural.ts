/**
 * Syntax-tree scan of native blocks.
 *
 * Walks each parsed block in source order, keeping one alias table for the
 * whole program so that a module imported in one block and called through a
 * renamed binding in a later block is still recognised.
 */

import type { Argument, Expr, ImportAlias, Module, Stmt } from '../python/ast.js';
import { targetNames } from '../python/analysis.js';
import type { ModuleRule, RuleSet } from './rules.js';
import type { Severity } from './types.js';

/** Assignment hops followed from an import before a binding is forgotten. */
export const MAX_ALIAS_HOPS = 3;

export interface AliasTarget {
  /** Dotted module path as imported. */
  module: string;
  /** Attribute path below the module, if the binding names a member. */
  attrs: readonly string[];
  hops: number;
}

/** A finding with its line relative to the scanned block. */
export interface StructuralHit {
  line: number;
  severity: Severity;
  ruleId: string;
  message: string;
}

const WRITE_MODE = /[wax+]/;

export class AliasTable {
  private readonly entries = new Map<string, AliasTarget>();

  get(name: string): AliasTarget | undefined {
    return this.entries.get(name);
  }

  /** Bind `name`; bindings past the hop bound are dropped. */
  bind(name: string, target: AliasTarget): void {
    if (target.hops > MAX_ALIAS_HOPS) {
      this.entries.delete(name);
      return;
    }
    this.entries.set(name, target);
  }

  forget(name: string): void {
    this.entries.delete(name);
  }

  get size(): number {
    return this.entries.size;
  }
}

function rootOf(module: string): string {
  return module.split('.')[0];
}

function stringLiteral(expr: Expr | undefined): string | null {
  return expr?.kind === 'literal' && typeof expr.value === 'string' ? expr.value : null;
}

function positional(args: readonly Argument[], index: number): Expr | undefined {
  const values = args.flatMap((a) => (a.kind === 'positional' ? [a.value] : []));
  return values[index];
}

function keyword(args: readonly Argument[], name: string): Expr | undefined {
  for (const arg of args) {
    if (arg.kind === 'keyword' && arg.name === name) return arg.value;
  }
  return undefined;
}

export class StructuralScanner {
  private hits: StructuralHit[] = [];

  constructor(
    private readonly rules: RuleSet,
    readonly aliases = new AliasTable(),
  ) {}

  /**
   * Record an import performed outside any block (a `native_import`
   * directive). Returns the finding, if the module is on the denylist.
   */
  importDirective(module: string, line: number): StructuralHit | null {
    this.hits = [];
    this.importName({ name: module, asname: null }, line);
    return this.hits[0] ?? null;
  }

  scanModule(module: Module): StructuralHit[] {
    this.hits = [];
    this.statements(module.body);
    return this.hits;
  }

  // ── Statements ─────────────────────────────────────────────────────────────

  private statements(body: readonly Stmt[]): void {
    for (const stmt of body) this.statement(stmt);
  }

  private statement(stmt: Stmt): void {
    switch (stmt.kind) {
      case 'expr':
        this.expression(stmt.value);
        break;
      case 'assign':
        this.expression(stmt.value);
        this.assign(stmt.targets, stmt.value);
        break;
      case 'augassign':
        this.expression(stmt.value);
        this.forgetTarget(stmt.target);
        break;
      case 'del':
        for (const target of stmt.targets) this.forgetTarget(target);
        break;
      case 'return':
        if (stmt.value) this.expression(stmt.value);
        break;
      case 'assert':
        this.expression(stmt.test);
        if (stmt.msg) this.expression(stmt.msg);
        break;
      case 'raise':
        if (stmt.exc) this.expression(stmt.exc);
        if (stmt.cause) this.expression(stmt.cause);
        break;
      case 'import':
        for (const alias of stmt.names) this.importName(alias, stmt.line);
        break;
      case 'importfrom':
        this.importFrom(stmt.module, stmt.names, stmt.line);
        break;
      case 'if':
      case 'while':
        this.expression(stmt.test);
        this.statements(stmt.body);
        this.statements(stmt.orelse);
        break;
      case 'for':
        this.expression(stmt.iter);
        this.forgetTarget(stmt.target);
        this.statements(stmt.body);
        this.statements(stmt.orelse);
        break;
      case 'def':
        this.aliases.forget(stmt.name);
        for (const param of stmt.params) {
          if (param.defaultValue) this.expression(param.defaultValue);
        }
        this.statements(stmt.body);
        break;
      case 'class':
        this.aliases.forget(stmt.name);
        for (const base of stmt.bases) this.expression(base);
        this.statements(stmt.body);
        break;
      case 'try':
        this.statements(stmt.body);
        for (const handler of stmt.handlers) {
          if (handler.type) this.expression(handler.type);
          if (handler.name) this.aliases.forget(handler.name);
          this.statements(handler.body);
        }
        this.statements(stmt.orelse);
        this.statements(stmt.finalbody);
        break;
      case 'pass':
      case 'break':
      case 'continue':
      case 'global':
      case 'nonlocal':
        break;
    }
  }

  private importName(alias: ImportAlias, line: number): void {
    const rule = this.moduleRule(alias.name);
    const bound = alias.asname ?? rootOf(alias.name);
    if (!rule) {
      this.aliases.forget(bound);
      return;
    }
    this.report(line, rule.import, `py.import.${rootOf(alias.name)}`, `import of '${alias.name}' (${rule.message})`);
    const module = alias.asname ? alias.name : rootOf(alias.name);
    this.aliases.bind(bound, { module, attrs: [], hops: 0 });
  }

  private importFrom(module: string, names: readonly ImportAlias[], line: number): void {
    const rule = this.moduleRule(module);
    if (!rule) {
      for (const alias of names) {
        if (alias.name !== '*') this.aliases.forget(alias.asname ?? alias.name);
      }
      return;
    }
    this.report(line, rule.import, `py.import.${rootOf(module)}`, `import from '${module}' (${rule.message})`);
    for (const alias of names) {
      if (alias.name === '*') {
        for (const capability of Object.keys(rule.capabilities)) {
          this.aliases.bind(capability, { module, attrs: [capability], hops: 0 });
        }
        continue;
      }
      this.aliases.bind(alias.asname ?? alias.name, { module, attrs: [alias.name], hops: 0 });
    }
  }

  private assign(targets: readonly Expr[], value: Expr): void {
    const resolved = this.resolve(value);
    for (const target of targets) {
      if (target.kind === 'name' && resolved) {
        this.aliases.bind(target.id, { ...resolved, hops: resolved.hops + 1 });
      } else {
        this.forgetTarget(target);
      }
    }
  }

  private forgetTarget(target: Expr): void {
    const names = new Set<string>();
    targetNames(target, names);
    for (const name of names) this.aliases.forget(name);
  }

  // ── Expressions ────────────────────────────────────────────────────────────

  private expression(expr: Expr): void {
    switch (expr.kind) {
      case 'call':
        this.call(expr.func, expr.args, expr.line);
        this.expression(expr.func);
        for (const arg of expr.args) this.expression(arg.value);
        break;
      case 'name':
      case 'literal':
        break;
      case 'fstring':
        for (const part of expr.parts) {
          if (typeof part !== 'string') this.expression(part.expr);
        }
        break;
      case 'list':
      case 'tuple':
      case 'set':
        for (const elt of expr.elts) this.expression(elt);
        break;
      case 'dict':
        for (const key of expr.keys) if (key) this.expression(key);
        for (const value of expr.values) this.expression(value);
        break;
      case 'binop':
        this.expression(expr.left);
        this.expression(expr.right);
        break;
      case 'unary':
        this.expression(expr.operand);
        break;
      case 'boolop':
        for (const value of expr.values) this.expression(value);
        break;
      case 'compare':
        this.expression(expr.left);
        for (const comparator of expr.comparators) this.expression(comparator);
        break;
      case 'attribute':
      case 'starred':
        this.expression(expr.value);
        break;
      case 'subscript':
        this.expression(expr.value);
        this.expression(expr.index);
        break;
      case 'slice':
        if (expr.lower) this.expression(expr.lower);
        if (expr.upper) this.expression(expr.upper);
        if (expr.step) this.expression(expr.step);
        break;
      case 'lambda':
        this.expression(expr.body);
        break;
      case 'ifexp':
        this.expression(expr.test);
        this.expression(expr.body);
        this.expression(expr.orelse);
        break;
      case 'listcomp':
      case 'setcomp':
        for (const gen of expr.generators) {
          this.expression(gen.iter);
          for (const condition of gen.conditions) this.expression(condition);
        }
        this.expression(expr.elt);
        break;
      case 'dictcomp':
        for (const gen of expr.generators) {
          this.expression(gen.iter);
          for (const condition of gen.conditions) this.expression(condition);
        }
        this.expression(expr.key);
        this.expression(expr.value);
        break;
    }
  }

  private call(func: Expr, args: readonly Argument[], line: number): void {
    const target = this.resolve(func);
    if (target) {
      this.capability(target, line, 'call to');
      return;
    }
    if (func.kind !== 'name' || this.aliases.get(func.id)) return;

    if (func.id === 'getattr') {
      this.dynamicAttribute(args, line);
      return;
    }
    if (func.id === 'open') {
      this.open(args, line);
      return;
    }
    const rule = this.rules.builtins.get(func.id);
    if (rule) this.report(line, rule.severity, `py.builtin.${func.id}`, `${rule.message}: ${func.id}()`);
  }

  private dynamicAttribute(args: readonly Argument[], line: number): void {
    const object = positional(args, 0);
    const base = object ? this.resolve(object) : null;
    if (!base) return;
    const name = stringLiteral(positional(args, 1));
    if (name !== null) {
      this.capability({ ...base, attrs: [...base.attrs, name] }, line, 'dynamic access to');
      return;
    }
    this.report(line, 'high', 'py.dynamic-attribute', `dynamic attribute access on '${base.module}'`);
  }

  private open(args: readonly Argument[], line: number): void {
    const modeExpr = positional(args, 1) ?? keyword(args, 'mode');
    if (!modeExpr) return;
    const mode = stringLiteral(modeExpr);
    if (mode === null) {
      this.report(line, 'medium', 'py.file-open', 'file opened with a computed mode');
    } else if (WRITE_MODE.test(mode)) {
      this.report(line, 'high', 'py.file-write', `arbitrary file write: open(..., '${mode}')`);
    }
  }

  private capability(target: AliasTarget, line: number, verb: string): void {
    const rule = this.moduleRule(target.module);
    if (!rule) return;
    const segments = [...target.module.split('.'), ...target.attrs];
    const capability = segments[1];
    if (capability === undefined) return;
    const severity = rule.capabilities[capability] ?? rule.default;
    const root = segments[0];
    this.report(line, severity, `py.capability.${root}`, `${verb} '${segments.join('.')}' (${rule.message})`);
  }

  /** The module member an expression denotes, through tracked aliases. */
  private resolve(expr: Expr): AliasTarget | null {
    switch (expr.kind) {
      case 'name':
        return this.aliases.get(expr.id) ?? null;
      case 'attribute': {
        const base = this.resolve(expr.value);
        return base ? { ...base, attrs: [...base.attrs, expr.attr] } : null;
      }
      case 'call': {
        if (expr.func.kind !== 'name' || expr.func.id !== 'getattr' || this.aliases.get('getattr')) return null;
        const object = positional(expr.args, 0);
        const name = stringLiteral(positional(expr.args, 1));
        const base = object ? this.resolve(object) : null;
        return base && name !== null ? { ...base, attrs: [...base.attrs, name] } : null;
      }
      default:
        return null;
    }
  }

  private moduleRule(module: string): ModuleRule | undefined {
    return this.rules.modules.get(rootOf(module));
  }

  private report(line: number, severity: Severity, ruleId: string, message: string): void {
    this.hits.push({ line, severity, ruleId, message });
  }
}
