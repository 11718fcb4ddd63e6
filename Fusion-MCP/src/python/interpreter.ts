/**
 * Tree-walking evaluator for the native language.
 *
 * One interpreter serves one execution context: module-level names live in
 * the {@link GlobalScope} it was built with, so definitions made by one block
 * are visible to the next.
 */

import type { Argument, BinaryOp, Comprehension, Expr, FStringPart, Module, Parameter, Stmt } from './ast.js';
import { analyzeFunction, targetNames } from './analysis.js';
import { createBuiltins, getAttribute, setAttribute } from './builtins.js';
import { exceptionClass, InterpreterTimeout, isSubclass, pyError, PyRaise } from './errors.js';
import { formatValue } from './format.js';
import { createModule, mulberry32, type ModuleHost } from './modules.js';
import {
  binaryOp,
  compareOp,
  deleteItem,
  deleteSlice,
  getItem,
  getSlice,
  inplaceOp,
  iterate,
  setItem,
  setSlice,
  toArray,
  unaryOp,
  type SliceBounds,
} from './operators.js';
import { parseExpression, parseModule } from './parser.js';
import { Scope, type GlobalScope } from './scope.js';
import {
  NONE,
  bindMethod,
  classAttribute,
  dictSet,
  isTruthy,
  pyBool,
  pyDict,
  pyFloat,
  pyInt,
  pyList,
  pySet,
  pyStr,
  pyTuple,
  repr,
  setAdd,
  str,
  typeName,
  type InstanceText,
  type PyClass,
  type PyException,
  type PyFunction,
  type PyInstance,
  type PyModule,
  type PyValue,
} from './values.js';

export interface InterpreterOptions {
  /** Default wall-clock budget for one `execute` or `evaluate`, in ms. */
  timeoutMs?: number;
  /** Nested function calls allowed before RecursionError. */
  maxDepth?: number;
  /** Seed for the `random` module; unseeded runs use the clock. */
  seed?: number;
}

export interface RunOptions {
  /** Receives everything `print` writes during the run. */
  write?: (text: string) => void;
  timeoutMs?: number;
}

type Completion =
  | { type: 'normal' }
  | { type: 'break' }
  | { type: 'continue' }
  | { type: 'return'; value: PyValue };

const NORMAL: Completion = { type: 'normal' };
const BREAK: Completion = { type: 'break' };
const CONTINUE: Completion = { type: 'continue' };

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_DEPTH = 200;
const TICK_INTERVAL = 256;

const discard = (): void => {};

export class Interpreter implements ModuleHost {
  readonly builtins: Map<string, PyValue>;
  private readonly modules = new Map<string, PyModule>();
  private readonly timeoutMs: number;
  private readonly maxDepth: number;
  private rng: () => number;

  private write: (text: string) => void = discard;
  private deadline = Infinity;
  private activeTimeoutMs = 0;
  private steps = 0;
  private depth = 0;
  private handling: PyRaise[] = [];

  constructor(
    readonly globals: GlobalScope,
    options: InterpreterOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.rng = mulberry32(options.seed ?? Date.now());
    this.builtins = createBuiltins(this);
  }

  // ── Entry points ───────────────────────────────────────────────────────────

  /** Run source (or a parsed module) as module-level code. */
  execute(source: string | Module, options: RunOptions = {}): void {
    const module = typeof source === 'string' ? parseModule(source) : source;
    this.run(options, () => {
      const completion = this.execBlock(module.body, null);
      if (completion.type === 'return') throw pyError('SyntaxError', "'return' outside function");
      if (completion.type !== 'normal') throw pyError('SyntaxError', `'${completion.type}' outside loop`);
    });
  }

  /** Evaluate one expression against the global scope. */
  evaluate(source: string | Expr, options: RunOptions = {}): PyValue {
    const expr = typeof source === 'string' ? parseExpression(source) : source;
    return this.run(options, () => {
      try {
        return this.evalExpr(expr, null);
      } catch (err) {
        if (err instanceof PyRaise && err.line === undefined) err.line = expr.line;
        throw err;
      }
    });
  }

  private run<T>(options: RunOptions, body: () => T): T {
    const saved = { write: this.write, deadline: this.deadline, timeoutMs: this.activeTimeoutMs };
    this.write = options.write ?? discard;
    this.activeTimeoutMs = options.timeoutMs ?? this.timeoutMs;
    this.deadline = Date.now() + this.activeTimeoutMs;
    try {
      return body();
    } catch (err) {
      if (err instanceof RangeError && err.message.includes('call stack')) {
        throw pyError('RecursionError', 'maximum recursion depth exceeded');
      }
      throw err;
    } finally {
      this.write = saved.write;
      this.deadline = saved.deadline;
      this.activeTimeoutMs = saved.timeoutMs;
      this.depth = 0;
      this.handling = [];
    }
  }

  /** Text written by `print`. */
  output(text: string): void {
    this.write(text);
  }

  /** `str()` of a value; instances go through `__str__` or `__repr__`. */
  toStr(value: PyValue): string {
    return str(value, this.instanceText);
  }

  toRepr(value: PyValue): string {
    return repr(value, this.instanceText);
  }

  readonly instanceText: InstanceText = (obj, kind) => {
    const dunder = kind === 'str' && classAttribute(obj.cls, '__str__') !== undefined ? '__str__' : '__repr__';
    const method = classAttribute(obj.cls, dunder);
    if (method === undefined) return `<${obj.cls.name} object>`;
    const text = this.callValue(bindMethod(obj, method), []);
    if (text.type !== 'str') throw pyError('TypeError', `${dunder} returned non-string (type ${typeName(text)})`);
    return text.value;
  };

  private tick(): void {
    this.steps++;
    if (this.steps % TICK_INTERVAL === 0 && Date.now() > this.deadline) {
      throw new InterpreterTimeout(this.activeTimeoutMs);
    }
  }

  // ── ModuleHost ─────────────────────────────────────────────────────────────

  random(): number {
    return this.rng();
  }

  seed(value: number): void {
    this.rng = mulberry32(value);
  }

  sleep(seconds: number): void {
    const wanted = seconds * 1000;
    const remaining = Math.max(this.deadline - Date.now(), 0);
    const ms = Math.min(wanted, remaining);
    if (ms > 0) Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
    if (wanted > remaining) throw new InterpreterTimeout(this.activeTimeoutMs);
  }

  importModule(name: string): PyModule {
    let mod = this.modules.get(name);
    if (!mod) {
      mod = createModule(name, this) ?? undefined;
      if (!mod) throw pyError('ModuleNotFoundError', `No module named '${name}'`);
      this.modules.set(name, mod);
    }
    return mod;
  }

  // ── Names ──────────────────────────────────────────────────────────────────

  lookup(name: string, scope: Scope | null = null): PyValue {
    for (let s = scope; s; s = s.parent) {
      if (s.globalNames.has(name)) break;
      if (s.nonlocalNames.has(name)) continue;
      if (s.localNames.has(name)) {
        const value = s.vars.get(name);
        if (value !== undefined) return value;
        if (s === scope) {
          throw pyError('UnboundLocalError', `cannot access local variable '${name}' where it is not associated with a value`);
        }
        throw pyError('NameError', `cannot access free variable '${name}' where it is not associated with a value in enclosing scope`);
      }
    }
    const value = this.globals.lookup(name) ?? this.builtins.get(name);
    if (value === undefined) throw pyError('NameError', `name '${name}' is not defined`);
    return value;
  }

  private assignName(name: string, value: PyValue, scope: Scope | null): void {
    if (!scope || scope.globalNames.has(name)) {
      this.globals.assign(name, value);
      return;
    }
    if (scope.nonlocalNames.has(name)) {
      const owner = scope.parent?.owner(name);
      if (!owner) throw pyError('SyntaxError', `no binding for nonlocal '${name}' found`);
      owner.vars.set(name, value);
      return;
    }
    scope.vars.set(name, value);
  }

  private deleteName(name: string, scope: Scope | null): void {
    let removed: boolean;
    if (!scope || scope.globalNames.has(name)) removed = this.globals.remove(name);
    else if (scope.nonlocalNames.has(name)) removed = scope.parent?.owner(name)?.vars.delete(name) ?? false;
    else removed = scope.vars.delete(name);
    if (!removed) throw pyError('NameError', `name '${name}' is not defined`);
  }

  // ── Calls ──────────────────────────────────────────────────────────────────

  callValue(fn: PyValue, args: PyValue[], kwargs: Map<string, PyValue> = new Map()): PyValue {
    switch (fn.type) {
      case 'builtin':
        return fn.call({ args, kwargs, interp: this });
      case 'function':
        return this.callFunction(fn, args, kwargs);
      case 'class':
        return this.instantiate(fn, args, kwargs);
      case 'method':
        return this.callValue(fn.func, [fn.self, ...args], kwargs);
      default:
        throw pyError('TypeError', `'${typeName(fn)}' object is not callable`);
    }
  }

  private instantiate(cls: PyClass, args: PyValue[], kwargs: Map<string, PyValue>): PyValue {
    if (isSubclass(cls, exceptionClass('BaseException'))) {
      if (kwargs.size > 0) throw pyError('TypeError', `${cls.name}() takes no keyword arguments`);
      return { type: 'exception', cls, args: [...args] };
    }
    const obj: PyInstance = { type: 'instance', cls, attrs: new Map() };
    const init = classAttribute(cls, '__init__');
    if (init === undefined) {
      if (args.length > 0 || kwargs.size > 0) throw pyError('TypeError', `${cls.name}() takes no arguments`);
      return obj;
    }
    const result = this.callValue(bindMethod(obj, init), args, kwargs);
    if (result.type !== 'none') throw pyError('TypeError', `__init__() should return None, not '${typeName(result)}'`);
    return obj;
  }

  private callFunction(fn: PyFunction, args: PyValue[], kwargs: Map<string, PyValue>): PyValue {
    this.tick();
    if (this.depth >= this.maxDepth) throw pyError('RecursionError', 'maximum recursion depth exceeded');
    this.depth++;
    try {
      const scope = new Scope(fn.closure, fn.localNames, fn.globalNames, fn.nonlocalNames);
      bindArguments(fn, args, kwargs, scope);
      if (!Array.isArray(fn.body)) return this.evalExpr(fn.body, scope);
      const completion = this.execBlock(fn.body, scope);
      return completion.type === 'return' ? completion.value : NONE;
    } finally {
      this.depth--;
    }
  }

  private makeFunction(name: string, params: Parameter[], body: Stmt[] | Expr, scope: Scope | null): PyFunction {
    const names = analyzeFunction(params, Array.isArray(body) ? body : null);
    for (const nonlocal of names.nonlocals) {
      if (!scope) throw pyError('SyntaxError', 'nonlocal declaration not allowed at module level');
      if (!scope.owner(nonlocal)) throw pyError('SyntaxError', `no binding for nonlocal '${nonlocal}' found`);
    }
    return {
      type: 'function',
      name,
      params: params.map((p) => ({
        name: p.name,
        kind: p.kind,
        defaultValue: p.defaultValue ? this.evalExpr(p.defaultValue, scope) : null,
      })),
      body,
      closure: scope,
      localNames: names.locals,
      globalNames: names.globals,
      nonlocalNames: names.nonlocals,
    };
  }

  // ── Statements ─────────────────────────────────────────────────────────────

  private execBlock(body: readonly Stmt[], scope: Scope | null): Completion {
    for (const stmt of body) {
      const completion = this.execStmt(stmt, scope);
      if (completion.type !== 'normal') return completion;
    }
    return NORMAL;
  }

  private execStmt(stmt: Stmt, scope: Scope | null): Completion {
    this.tick();
    try {
      return this.dispatch(stmt, scope);
    } catch (err) {
      if (err instanceof PyRaise && err.line === undefined) err.line = stmt.line;
      throw err;
    }
  }

  private dispatch(stmt: Stmt, scope: Scope | null): Completion {
    switch (stmt.kind) {
      case 'expr':
        this.evalExpr(stmt.value, scope);
        return NORMAL;
      case 'assign': {
        const value = this.evalExpr(stmt.value, scope);
        for (const target of stmt.targets) this.assignTarget(target, value, scope);
        return NORMAL;
      }
      case 'augassign':
        this.augmentedAssign(stmt.target, stmt.op, stmt.value, scope);
        return NORMAL;
      case 'pass':
      case 'global':
        return NORMAL;
      case 'nonlocal':
        if (!scope) throw pyError('SyntaxError', 'nonlocal declaration not allowed at module level');
        return NORMAL;
      case 'break':
        return BREAK;
      case 'continue':
        return CONTINUE;
      case 'return':
        return { type: 'return', value: stmt.value ? this.evalExpr(stmt.value, scope) : NONE };
      case 'del':
        for (const target of stmt.targets) this.deleteTarget(target, scope);
        return NORMAL;
      case 'assert':
        if (!isTruthy(this.evalExpr(stmt.test, scope))) {
          const args = stmt.msg ? [this.evalExpr(stmt.msg, scope)] : [];
          throw this.raiseValue(this.lookup('AssertionError'), args);
        }
        return NORMAL;
      case 'raise':
        return this.execRaise(stmt.exc, stmt.cause, scope);
      case 'import':
        for (const alias of stmt.names) {
          const mod = this.importModule(alias.name);
          this.assignName(alias.asname ?? alias.name.split('.')[0], mod, scope);
        }
        return NORMAL;
      case 'importfrom': {
        const mod = this.importModule(stmt.module);
        for (const alias of stmt.names) {
          if (alias.name === '*') {
            for (const [name, value] of mod.attrs) if (!name.startsWith('_')) this.assignName(name, value, scope);
            continue;
          }
          const value = mod.attrs.get(alias.name);
          if (value === undefined) {
            throw pyError('ImportError', `cannot import name '${alias.name}' from '${mod.name}'`);
          }
          this.assignName(alias.asname ?? alias.name, value, scope);
        }
        return NORMAL;
      }
      case 'if':
        return isTruthy(this.evalExpr(stmt.test, scope))
          ? this.execBlock(stmt.body, scope)
          : this.execBlock(stmt.orelse, scope);
      case 'while':
        return this.execWhile(stmt, scope);
      case 'for':
        return this.execFor(stmt, scope);
      case 'def':
        this.assignName(stmt.name, this.makeFunction(stmt.name, stmt.params, stmt.body, scope), scope);
        return NORMAL;
      case 'class':
        this.assignName(stmt.name, this.makeClass(stmt, scope), scope);
        return NORMAL;
      case 'try':
        return this.execTry(stmt, scope);
    }
  }

  /** Run a class body in its own namespace; single inheritance only. */
  private makeClass(stmt: Extract<Stmt, { kind: 'class' }>, scope: Scope | null): PyClass {
    const bases = stmt.bases.map((b) => this.evalExpr(b, scope));
    if (bases.length > 1) throw pyError('TypeError', 'multiple inheritance is not supported');
    let base: PyClass | null = null;
    for (const candidate of bases) {
      if (candidate.type !== 'class') {
        throw pyError('TypeError', `class base must be a class, not '${typeName(candidate)}'`);
      }
      base = candidate;
    }

    const names = analyzeFunction([], stmt.body);
    const namespace = new Scope(scope, names.locals, names.globals, names.nonlocals);
    const completion = this.execBlock(stmt.body, namespace);
    if (completion.type === 'return') throw pyError('SyntaxError', "'return' outside function");
    if (completion.type !== 'normal') throw pyError('SyntaxError', `'${completion.type}' outside loop`);

    const cls: PyClass = { type: 'class', name: stmt.name, base, attrs: new Map() };
    for (const [name, value] of namespace.vars) {
      // Methods see the enclosing scope, not the class body.
      if (value.type === 'function' && value.closure === namespace) value.closure = scope;
      cls.attrs.set(name, value);
    }
    return cls;
  }

  private execWhile(stmt: Extract<Stmt, { kind: 'while' }>, scope: Scope | null): Completion {
    while (isTruthy(this.evalExpr(stmt.test, scope))) {
      this.tick();
      const completion = this.execBlock(stmt.body, scope);
      if (completion.type === 'break') return NORMAL;
      if (completion.type === 'return') return completion;
    }
    return this.execBlock(stmt.orelse, scope);
  }

  private execFor(stmt: Extract<Stmt, { kind: 'for' }>, scope: Scope | null): Completion {
    for (const item of iterate(this.evalExpr(stmt.iter, scope))) {
      this.tick();
      this.assignTarget(stmt.target, item, scope);
      const completion = this.execBlock(stmt.body, scope);
      if (completion.type === 'break') return NORMAL;
      if (completion.type === 'return') return completion;
    }
    return this.execBlock(stmt.orelse, scope);
  }

  private execTry(stmt: Extract<Stmt, { kind: 'try' }>, scope: Scope | null): Completion {
    let completion: Completion = NORMAL;
    let pending: { error: unknown } | null = null;
    try {
      completion = this.execHandled(stmt, scope);
    } catch (err) {
      if (stmt.finalbody.length === 0) throw err;
      pending = { error: err };
    }
    if (stmt.finalbody.length > 0) {
      const final = this.execBlock(stmt.finalbody, scope);
      // A jump out of `finally` discards whatever was propagating.
      if (final.type !== 'normal') return final;
    }
    if (pending) throw pending.error;
    return completion;
  }

  private execHandled(stmt: Extract<Stmt, { kind: 'try' }>, scope: Scope | null): Completion {
    let completion: Completion;
    try {
      completion = this.execBlock(stmt.body, scope);
    } catch (err) {
      if (!(err instanceof PyRaise)) throw err;
      for (const handler of stmt.handlers) {
        if (!this.matches(handler.type, err.exception, scope)) continue;
        if (handler.name) this.assignName(handler.name, err.exception, scope);
        this.handling.push(err);
        try {
          return this.execBlock(handler.body, scope);
        } finally {
          this.handling.pop();
          if (handler.name) this.unbind(handler.name, scope);
        }
      }
      throw err;
    }
    if (completion.type !== 'normal') return completion;
    return this.execBlock(stmt.orelse, scope);
  }

  private unbind(name: string, scope: Scope | null): void {
    if (!scope || scope.globalNames.has(name)) this.globals.remove(name);
    else scope.vars.delete(name);
  }

  private matches(typeExpr: Expr | null, exc: PyException, scope: Scope | null): boolean {
    if (!typeExpr) return true;
    const spec = this.evalExpr(typeExpr, scope);
    const classes = spec.type === 'tuple' ? spec.items : [spec];
    return classes.some((cls) => {
      if (cls.type !== 'class') {
        throw pyError('TypeError', 'catching classes that do not inherit from BaseException is not allowed');
      }
      return isSubclass(exc.cls, cls);
    });
  }

  private execRaise(excExpr: Expr | null, causeExpr: Expr | null, scope: Scope | null): never {
    if (!excExpr) {
      const current = this.handling[this.handling.length - 1];
      if (!current) throw pyError('RuntimeError', 'No active exception to reraise');
      throw current;
    }
    const value = this.evalExpr(excExpr, scope);
    if (causeExpr) this.evalExpr(causeExpr, scope);
    throw this.raiseValue(value, []);
  }

  private raiseValue(value: PyValue, args: PyValue[]): PyRaise {
    if (value.type === 'class') return new PyRaise({ type: 'exception', cls: value, args });
    if (value.type === 'exception') return new PyRaise(value);
    return pyError('TypeError', 'exceptions must derive from BaseException');
  }

  // ── Targets ────────────────────────────────────────────────────────────────

  private sliceBounds(index: Extract<Expr, { kind: 'slice' }>, scope: Scope | null): SliceBounds {
    const part = (e: Expr | null): PyValue => (e ? this.evalExpr(e, scope) : NONE);
    return { lower: part(index.lower), upper: part(index.upper), step: part(index.step) };
  }

  private assignTarget(target: Expr, value: PyValue, scope: Scope | null): void {
    switch (target.kind) {
      case 'name':
        this.assignName(target.id, value, scope);
        return;
      case 'tuple':
      case 'list':
        this.unpack(target.elts, value, scope);
        return;
      case 'subscript': {
        const container = this.evalExpr(target.value, scope);
        if (target.index.kind === 'slice') setSlice(container, this.sliceBounds(target.index, scope), value);
        else setItem(container, this.evalExpr(target.index, scope), value);
        return;
      }
      case 'attribute':
        setAttribute(this.evalExpr(target.value, scope), target.attr, value);
        return;
      default:
        throw pyError('SyntaxError', 'cannot assign to expression');
    }
  }

  private unpack(targets: Expr[], value: PyValue, scope: Scope | null): void {
    const items = toArray(value);
    const star = targets.findIndex((t) => t.kind === 'starred');
    if (star < 0) {
      if (items.length > targets.length) {
        throw pyError('ValueError', `too many values to unpack (expected ${targets.length})`);
      }
      if (items.length < targets.length) {
        throw pyError('ValueError', `not enough values to unpack (expected ${targets.length}, got ${items.length})`);
      }
      targets.forEach((t, i) => this.assignTarget(t, items[i], scope));
      return;
    }
    const after = targets.length - star - 1;
    if (items.length < targets.length - 1) {
      throw pyError(
        'ValueError',
        `not enough values to unpack (expected at least ${targets.length - 1}, got ${items.length})`,
      );
    }
    targets.forEach((t, i) => {
      if (i < star) this.assignTarget(t, items[i], scope);
      else if (i > star) this.assignTarget(t, items[items.length - (targets.length - i)], scope);
      else if (t.kind === 'starred') this.assignTarget(t.value, pyList(items.slice(star, items.length - after)), scope);
    });
  }

  private augmentedAssign(target: Expr, op: BinaryOp, valueExpr: Expr, scope: Scope | null): void {
    switch (target.kind) {
      case 'name': {
        const current = this.lookup(target.id, scope);
        this.assignName(target.id, inplaceOp(op, current, this.evalExpr(valueExpr, scope)), scope);
        return;
      }
      case 'subscript': {
        const container = this.evalExpr(target.value, scope);
        if (target.index.kind === 'slice') {
          const bounds = this.sliceBounds(target.index, scope);
          const result = inplaceOp(op, getSlice(container, bounds), this.evalExpr(valueExpr, scope));
          setSlice(container, bounds, result);
          return;
        }
        const index = this.evalExpr(target.index, scope);
        setItem(container, index, inplaceOp(op, getItem(container, index), this.evalExpr(valueExpr, scope)));
        return;
      }
      case 'attribute': {
        const obj = this.evalExpr(target.value, scope);
        const result = inplaceOp(op, getAttribute(obj, target.attr), this.evalExpr(valueExpr, scope));
        setAttribute(obj, target.attr, result);
        return;
      }
      default:
        throw pyError('SyntaxError', "'expression' is an illegal expression for augmented assignment");
    }
  }

  private deleteTarget(target: Expr, scope: Scope | null): void {
    switch (target.kind) {
      case 'name':
        this.deleteName(target.id, scope);
        return;
      case 'tuple':
      case 'list':
        for (const elt of target.elts) this.deleteTarget(elt, scope);
        return;
      case 'subscript': {
        const container = this.evalExpr(target.value, scope);
        if (target.index.kind === 'slice') deleteSlice(container, this.sliceBounds(target.index, scope));
        else deleteItem(container, this.evalExpr(target.index, scope));
        return;
      }
      case 'attribute': {
        const obj = this.evalExpr(target.value, scope);
        const owned = obj.type === 'module' || obj.type === 'instance' || obj.type === 'class';
        if (!owned || !obj.attrs.delete(target.attr)) {
          throw pyError('AttributeError', `'${typeName(obj)}' object has no attribute '${target.attr}'`);
        }
        return;
      }
      default:
        throw pyError('SyntaxError', 'cannot delete expression');
    }
  }

  // ── Expressions ────────────────────────────────────────────────────────────

  private evalExpr(expr: Expr, scope: Scope | null): PyValue {
    switch (expr.kind) {
      case 'name':
        return this.lookup(expr.id, scope);
      case 'literal': {
        const v = expr.value;
        if (v === null) return NONE;
        if (typeof v === 'boolean') return pyBool(v);
        if (typeof v === 'bigint') return pyInt(v);
        if (typeof v === 'number') return pyFloat(v);
        return pyStr(v);
      }
      case 'fstring':
        return pyStr(this.renderFString(expr.parts, scope));
      case 'list':
        return pyList(this.evalElements(expr.elts, scope));
      case 'tuple':
        return pyTuple(this.evalElements(expr.elts, scope));
      case 'set':
        return pySet(this.evalElements(expr.elts, scope));
      case 'dict': {
        const dict = pyDict();
        expr.keys.forEach((keyExpr, i) => {
          const value = this.evalExpr(expr.values[i], scope);
          if (keyExpr) {
            dictSet(dict, this.evalExpr(keyExpr, scope), value);
            return;
          }
          if (value.type !== 'dict') throw pyError('TypeError', `'${typeName(value)}' object is not a mapping`);
          for (const entry of value.entries.values()) dictSet(dict, entry.key, entry.value);
        });
        return dict;
      }
      case 'binop':
        return binaryOp(expr.op, this.evalExpr(expr.left, scope), this.evalExpr(expr.right, scope));
      case 'unary':
        return unaryOp(expr.op, this.evalExpr(expr.operand, scope));
      case 'boolop': {
        let result: PyValue = NONE;
        for (const operand of expr.values) {
          result = this.evalExpr(operand, scope);
          if (isTruthy(result) === (expr.op === 'or')) return result;
        }
        return result;
      }
      case 'compare': {
        let left = this.evalExpr(expr.left, scope);
        for (let i = 0; i < expr.ops.length; i++) {
          const right = this.evalExpr(expr.comparators[i], scope);
          if (!compareOp(expr.ops[i], left, right)) return pyBool(false);
          left = right;
        }
        return pyBool(true);
      }
      case 'call': {
        const fn = this.evalExpr(expr.func, scope);
        const { args, kwargs } = this.evalArguments(expr.args, scope);
        return this.callValue(fn, args, kwargs);
      }
      case 'attribute':
        return getAttribute(this.evalExpr(expr.value, scope), expr.attr);
      case 'subscript': {
        const container = this.evalExpr(expr.value, scope);
        if (expr.index.kind === 'slice') return getSlice(container, this.sliceBounds(expr.index, scope));
        return getItem(container, this.evalExpr(expr.index, scope));
      }
      case 'slice':
        throw pyError('SyntaxError', 'slice outside subscript');
      case 'lambda':
        return this.makeFunction('<lambda>', expr.params, expr.body, scope);
      case 'ifexp':
        return isTruthy(this.evalExpr(expr.test, scope))
          ? this.evalExpr(expr.body, scope)
          : this.evalExpr(expr.orelse, scope);
      case 'listcomp': {
        const items: PyValue[] = [];
        this.comprehension(expr.generators, scope, (inner) => items.push(this.evalExpr(expr.elt, inner)));
        return pyList(items);
      }
      case 'setcomp': {
        const set = pySet();
        this.comprehension(expr.generators, scope, (inner) => setAdd(set, this.evalExpr(expr.elt, inner)));
        return set;
      }
      case 'dictcomp': {
        const dict = pyDict();
        this.comprehension(expr.generators, scope, (inner) => {
          const key = this.evalExpr(expr.key, inner);
          dictSet(dict, key, this.evalExpr(expr.value, inner));
        });
        return dict;
      }
      case 'starred':
        throw pyError('SyntaxError', "can't use starred expression here");
    }
  }

  private evalElements(elts: Expr[], scope: Scope | null): PyValue[] {
    const out: PyValue[] = [];
    for (const elt of elts) {
      if (elt.kind === 'starred') out.push(...toArray(this.evalExpr(elt.value, scope)));
      else out.push(this.evalExpr(elt, scope));
    }
    return out;
  }

  private evalArguments(argExprs: Argument[], scope: Scope | null): { args: PyValue[]; kwargs: Map<string, PyValue> } {
    const args: PyValue[] = [];
    const kwargs = new Map<string, PyValue>();
    const setKeyword = (name: string, value: PyValue): void => {
      if (kwargs.has(name)) throw pyError('TypeError', `got multiple values for keyword argument '${name}'`);
      kwargs.set(name, value);
    };
    for (const arg of argExprs) {
      switch (arg.kind) {
        case 'positional':
          args.push(this.evalExpr(arg.value, scope));
          break;
        case 'star':
          args.push(...toArray(this.evalExpr(arg.value, scope)));
          break;
        case 'keyword':
          setKeyword(arg.name, this.evalExpr(arg.value, scope));
          break;
        case 'doublestar': {
          const mapping = this.evalExpr(arg.value, scope);
          if (mapping.type !== 'dict') {
            throw pyError('TypeError', `argument after ** must be a mapping, not ${typeName(mapping)}`);
          }
          for (const entry of mapping.entries.values()) {
            if (entry.key.type !== 'str') throw pyError('TypeError', 'keywords must be strings');
            setKeyword(entry.key.value, entry.value);
          }
          break;
        }
      }
    }
    return { args, kwargs };
  }

  private renderFString(parts: FStringPart[], scope: Scope | null): string {
    let out = '';
    for (const part of parts) {
      if (typeof part === 'string') {
        out += part;
        continue;
      }
      let value = this.evalExpr(part.expr, scope);
      if (part.conversion === 'r') value = pyStr(this.toRepr(value));
      else if (part.conversion === 's') value = pyStr(this.toStr(value));
      out += formatValue(value, this.renderFString(part.spec, scope), this.instanceText);
    }
    return out;
  }

  private comprehension(generators: Comprehension[], scope: Scope | null, emit: (inner: Scope) => void): void {
    const names = new Set<string>();
    for (const gen of generators) targetNames(gen.target, names);
    const inner = new Scope(scope, names);
    const loop = (level: number): void => {
      if (level === generators.length) {
        emit(inner);
        return;
      }
      const gen = generators[level];
      // The outermost iterable is evaluated in the enclosing scope.
      const iterable = this.evalExpr(gen.iter, level === 0 ? scope : inner);
      for (const item of iterate(iterable)) {
        this.tick();
        this.assignTarget(gen.target, item, inner);
        if (gen.conditions.every((cond) => isTruthy(this.evalExpr(cond, inner)))) loop(level + 1);
      }
    };
    loop(0);
  }
}

function bindArguments(fn: PyFunction, args: PyValue[], kwargs: Map<string, PyValue>, scope: Scope): void {
  const positional = fn.params.filter((p) => p.kind === 'normal');
  const varargs = fn.params.find((p) => p.kind === 'varargs');
  const varkw = fn.params.find((p) => p.kind === 'kwargs');

  positional.forEach((param, i) => {
    if (i < args.length) scope.vars.set(param.name, args[i]);
  });
  if (args.length > positional.length && !varargs) {
    const s = positional.length === 1 ? '' : 's';
    const were = args.length === 1 ? 'was' : 'were';
    throw pyError('TypeError', `${fn.name}() takes ${positional.length} positional argument${s} but ${args.length} ${were} given`);
  }
  if (varargs) scope.vars.set(varargs.name, pyTuple(args.slice(positional.length)));

  const extra = pyDict();
  for (const [name, value] of kwargs) {
    const param = fn.params.find((p) => p.name === name && (p.kind === 'normal' || p.kind === 'kwonly'));
    if (!param) {
      if (!varkw) throw pyError('TypeError', `${fn.name}() got an unexpected keyword argument '${name}'`);
      dictSet(extra, pyStr(name), value);
      continue;
    }
    if (scope.vars.has(name)) throw pyError('TypeError', `${fn.name}() got multiple values for argument '${name}'`);
    scope.vars.set(name, value);
  }
  if (varkw) scope.vars.set(varkw.name, extra);

  const missing: string[] = [];
  const missingKeyword: string[] = [];
  for (const param of fn.params) {
    if ((param.kind !== 'normal' && param.kind !== 'kwonly') || scope.vars.has(param.name)) continue;
    if (param.defaultValue) scope.vars.set(param.name, param.defaultValue);
    else (param.kind === 'normal' ? missing : missingKeyword).push(`'${param.name}'`);
  }
  if (missing.length > 0) throw missingArguments(fn.name, missing, 'positional');
  if (missingKeyword.length > 0) throw missingArguments(fn.name, missingKeyword, 'keyword-only');
}

function missingArguments(name: string, params: string[], kind: string): PyRaise {
  const last = params[params.length - 1];
  const list =
    params.length === 1
      ? last
      : params.length === 2
        ? `${params[0]} and ${last}`
        : `${params.slice(0, -1).join(', ')}, and ${last}`;
  const s = params.length === 1 ? '' : 's';
  return pyError('TypeError', `${name}() missing ${params.length} required ${kind} argument${s}: ${list}`);
}
