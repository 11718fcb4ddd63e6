/**
 * Recursive-descent parser for the native language.
 *
 * Precedence follows the reference grammar: lambda/conditional, or, and, not,
 * comparisons, |, ^, &, shifts, + -, * / // % @, unary, **, then primaries.
 */

import type {
  Argument,
  BinaryOp,
  CompareOp,
  Comprehension,
  ExceptHandler,
  Expr,
  FStringPart,
  ImportAlias,
  Module,
  Parameter,
  Stmt,
} from './ast.js';
import { PySyntaxError } from './errors.js';
import { decodeEscapes, lex, type Token } from './lexer.js';

const KEYWORDS = new Set([
  'False', 'None', 'True', 'and', 'as', 'assert', 'async', 'await', 'break', 'class', 'continue', 'def', 'del',
  'elif', 'else', 'except', 'finally', 'for', 'from', 'global', 'if', 'import', 'in', 'is', 'lambda', 'nonlocal',
  'not', 'or', 'pass', 'raise', 'return', 'try', 'while', 'with', 'yield',
]);

const SYMBOLIC_COMPARISONS: readonly CompareOp[] = ['<', '>', '==', '!=', '<=', '>='];

const UNSUPPORTED_STATEMENTS = new Set(['with', 'async', 'yield', 'await']);

const AUGMENTED: Record<string, BinaryOp> = {
  '+=': '+', '-=': '-', '*=': '*', '/=': '/', '//=': '//', '%=': '%', '**=': '**',
  '&=': '&', '|=': '|', '^=': '^', '<<=': '<<', '>>=': '>>', '@=': '@',
};

export function parseModule(source: string): Module {
  const parser = new Parser(lex(source));
  return { body: parser.parseStatements() };
}

/** Parse a single expression (or bare tuple), e.g. a printf argument. */
export function parseExpression(source: string, lineOffset = 0): Expr {
  const tokens = lex(source.trim()).map((t) => ({ ...t, line: t.line + lineOffset }));
  const parser = new Parser(tokens);
  return parser.parseStandaloneExpression();
}

class Parser {
  private pos = 0;

  constructor(private readonly tokens: Token[]) {}

  // ── Token helpers ──────────────────────────────────────────────────────────

  private peek(offset = 0): Token {
    return this.tokens[Math.min(this.pos + offset, this.tokens.length - 1)];
  }

  private next(): Token {
    const tok = this.peek();
    if (this.pos < this.tokens.length - 1) this.pos++;
    return tok;
  }

  private isOp(value: string, offset = 0): boolean {
    const tok = this.peek(offset);
    return tok.type === 'op' && tok.value === value;
  }

  private isKeyword(value: string, offset = 0): boolean {
    const tok = this.peek(offset);
    return tok.type === 'name' && tok.value === value;
  }

  private acceptOp(value: string): boolean {
    if (!this.isOp(value)) return false;
    this.next();
    return true;
  }

  private acceptKeyword(value: string): boolean {
    if (!this.isKeyword(value)) return false;
    this.next();
    return true;
  }

  private expectOp(value: string): void {
    if (!this.acceptOp(value)) throw this.error(`expected '${value}'`);
  }

  private expectKeyword(value: string): void {
    if (!this.acceptKeyword(value)) throw this.error(`expected '${value}'`);
  }

  private expectIdentifier(): string {
    const tok = this.next();
    if (tok.type !== 'name' || KEYWORDS.has(tok.value)) {
      throw new PySyntaxError(`expected identifier, got ${describe(tok)}`, tok.line);
    }
    return tok.value;
  }

  private atLineEnd(): boolean {
    const tok = this.peek();
    return tok.type === 'newline' || tok.type === 'eof' || this.isOp(';');
  }

  private error(message: string, tok: Token = this.peek()): PySyntaxError {
    return new PySyntaxError(`${message}, got ${describe(tok)}`, tok.line);
  }

  // ── Statements ─────────────────────────────────────────────────────────────

  parseStatements(): Stmt[] {
    const body: Stmt[] = [];
    while (this.peek().type !== 'eof') {
      body.push(...this.parseStatement());
    }
    return body;
  }

  parseStandaloneExpression(): Expr {
    const expr = this.parseTestList();
    if (this.peek().type === 'newline') this.next();
    if (this.peek().type !== 'eof') throw this.error('unexpected trailing input');
    return expr;
  }

  private parseStatement(): Stmt[] {
    const tok = this.peek();
    if (tok.type === 'indent') throw new PySyntaxError('unexpected indent', tok.line);
    if (tok.type === 'dedent') throw new PySyntaxError('unexpected dedent', tok.line);
    if (tok.type === 'name') {
      switch (tok.value) {
        case 'if': return [this.parseIf()];
        case 'while': return [this.parseWhile()];
        case 'for': return [this.parseFor()];
        case 'def': return [this.parseDef()];
        case 'class': return [this.parseClass()];
        case 'try': return [this.parseTry()];
        default:
          if (UNSUPPORTED_STATEMENTS.has(tok.value)) {
            throw new PySyntaxError(`'${tok.value}' statements are not supported`, tok.line);
          }
      }
    }
    return this.parseSimpleLine();
  }

  private parseSimpleLine(): Stmt[] {
    const stmts: Stmt[] = [this.parseSmallStatement()];
    while (this.acceptOp(';')) {
      if (this.peek().type === 'newline' || this.peek().type === 'eof') break;
      stmts.push(this.parseSmallStatement());
    }
    const end = this.peek();
    if (end.type === 'newline') this.next();
    else if (end.type !== 'eof') throw this.error('expected end of line');
    return stmts;
  }

  private parseSuite(): Stmt[] {
    this.expectOp(':');
    if (this.peek().type !== 'newline') return this.parseSimpleLine();
    this.next();
    const indent = this.next();
    if (indent.type !== 'indent') throw new PySyntaxError('expected an indented block', indent.line);
    const body: Stmt[] = [];
    while (this.peek().type !== 'dedent' && this.peek().type !== 'eof') {
      body.push(...this.parseStatement());
    }
    if (this.peek().type === 'dedent') this.next();
    return body;
  }

  private parseIf(): Stmt {
    const line = this.next().line;
    const test = this.parseTest();
    const body = this.parseSuite();
    let orelse: Stmt[] = [];
    if (this.isKeyword('elif')) {
      orelse = [this.parseIf()];
    } else if (this.acceptKeyword('else')) {
      orelse = this.parseSuite();
    }
    return { kind: 'if', line, test, body, orelse };
  }

  private parseWhile(): Stmt {
    const line = this.next().line;
    const test = this.parseTest();
    const body = this.parseSuite();
    const orelse = this.acceptKeyword('else') ? this.parseSuite() : [];
    return { kind: 'while', line, test, body, orelse };
  }

  private parseFor(): Stmt {
    const line = this.next().line;
    const target = this.parseTargetList();
    this.expectKeyword('in');
    const iter = this.parseTestList();
    const body = this.parseSuite();
    const orelse = this.acceptKeyword('else') ? this.parseSuite() : [];
    return { kind: 'for', line, target, iter, body, orelse };
  }

  private parseDef(): Stmt {
    const line = this.next().line;
    const name = this.expectIdentifier();
    this.expectOp('(');
    const params = this.parseParameters(')', true);
    this.expectOp(')');
    if (this.acceptOp('->')) this.parseTest();
    const body = this.parseSuite();
    return { kind: 'def', line, name, params, body };
  }

  private parseClass(): Stmt {
    const line = this.next().line;
    const name = this.expectIdentifier();
    const bases: Expr[] = [];
    if (this.acceptOp('(')) {
      while (!this.isOp(')')) {
        bases.push(this.parseTest());
        if (!this.acceptOp(',')) break;
      }
      this.expectOp(')');
    }
    const body = this.parseSuite();
    return { kind: 'class', line, name, bases, body };
  }

  private parseTry(): Stmt {
    const line = this.next().line;
    const body = this.parseSuite();
    const handlers: ExceptHandler[] = [];
    while (this.isKeyword('except')) {
      const handlerLine = this.next().line;
      let type: Expr | null = null;
      let name: string | null = null;
      if (!this.isOp(':')) {
        type = this.parseTest();
        if (this.acceptKeyword('as')) name = this.expectIdentifier();
      }
      handlers.push({ line: handlerLine, type, name, body: this.parseSuite() });
    }
    const orelse = handlers.length > 0 && this.acceptKeyword('else') ? this.parseSuite() : [];
    const finalbody = this.acceptKeyword('finally') ? this.parseSuite() : [];
    if (handlers.length === 0 && finalbody.length === 0) {
      throw this.error("expected 'except' or 'finally' block");
    }
    return { kind: 'try', line, body, handlers, orelse, finalbody };
  }

  private parseParameters(closing: string, annotations: boolean): Parameter[] {
    const params: Parameter[] = [];
    const seen = new Set<string>();
    let keywordOnly = false;
    while (!this.isOp(closing)) {
      let kind: Parameter['kind'] = keywordOnly ? 'kwonly' : 'normal';
      if (this.acceptOp('**')) kind = 'kwargs';
      else if (this.acceptOp('*')) {
        keywordOnly = true;
        kind = 'varargs';
        // Bare `*` only separates keyword-only parameters.
        if (this.isOp(',')) {
          this.next();
          continue;
        }
      }
      const nameTok = this.peek();
      const name = this.expectIdentifier();
      if (seen.has(name)) {
        throw new PySyntaxError(`duplicate argument '${name}' in function definition`, nameTok.line);
      }
      seen.add(name);
      if (annotations && this.acceptOp(':')) this.parseTest();
      let defaultValue: Expr | null = null;
      if ((kind === 'normal' || kind === 'kwonly') && this.acceptOp('=')) defaultValue = this.parseTest();
      params.push({ name, kind, defaultValue });
      if (!this.acceptOp(',')) break;
    }
    return params;
  }

  private parseSmallStatement(): Stmt {
    const tok = this.peek();
    const line = tok.line;
    if (tok.type === 'name') {
      switch (tok.value) {
        case 'pass':
          this.next();
          return { kind: 'pass', line };
        case 'break':
          this.next();
          return { kind: 'break', line };
        case 'continue':
          this.next();
          return { kind: 'continue', line };
        case 'return':
          this.next();
          return { kind: 'return', line, value: this.atLineEnd() ? null : this.parseTestListStar() };
        case 'global':
        case 'nonlocal': {
          this.next();
          const names = [this.expectIdentifier()];
          while (this.acceptOp(',')) names.push(this.expectIdentifier());
          return tok.value === 'global' ? { kind: 'global', line, names } : { kind: 'nonlocal', line, names };
        }
        case 'del': {
          this.next();
          const target = this.parseTargetList();
          const targets = target.kind === 'tuple' ? target.elts : [target];
          targets.forEach((t) => this.checkTarget(t, 'delete'));
          return { kind: 'del', line, targets };
        }
        case 'assert': {
          this.next();
          const test = this.parseTest();
          const msg = this.acceptOp(',') ? this.parseTest() : null;
          return { kind: 'assert', line, test, msg };
        }
        case 'raise': {
          this.next();
          if (this.atLineEnd()) return { kind: 'raise', line, exc: null, cause: null };
          const exc = this.parseTest();
          const cause = this.acceptKeyword('from') ? this.parseTest() : null;
          return { kind: 'raise', line, exc, cause };
        }
        case 'import':
          return this.parseImport();
        case 'from':
          return this.parseFromImport();
      }
    }

    const first = this.parseTestListStar();
    if (this.isOp('=')) {
      const targets: Expr[] = [first];
      let value = first;
      while (this.acceptOp('=')) {
        value = this.parseTestListStar();
        targets.push(value);
      }
      targets.pop();
      targets.forEach((t) => this.checkTarget(t, 'assign to'));
      return { kind: 'assign', line, targets, value };
    }

    const op = this.peek();
    if (op.type === 'op' && op.value in AUGMENTED) {
      this.next();
      if (first.kind !== 'name' && first.kind !== 'attribute' && first.kind !== 'subscript') {
        throw new PySyntaxError("'tuple' is an illegal expression for augmented assignment", line);
      }
      return { kind: 'augassign', line, target: first, op: AUGMENTED[op.value], value: this.parseTestList() };
    }

    if (this.acceptOp(':')) {
      // Annotated assignment; the annotation is evaluated by nobody.
      this.checkTarget(first, 'annotate');
      this.parseTest();
      if (this.acceptOp('=')) {
        return { kind: 'assign', line, targets: [first], value: this.parseTestListStar() };
      }
      return { kind: 'pass', line };
    }

    return { kind: 'expr', line, value: first };
  }

  private parseDottedName(): string {
    let name = this.expectIdentifier();
    while (this.acceptOp('.')) name += `.${this.expectIdentifier()}`;
    return name;
  }

  private parseImport(): Stmt {
    const line = this.next().line;
    const names: ImportAlias[] = [];
    do {
      const name = this.parseDottedName();
      const asname = this.acceptKeyword('as') ? this.expectIdentifier() : null;
      names.push({ name, asname });
    } while (this.acceptOp(','));
    return { kind: 'import', line, names };
  }

  private parseFromImport(): Stmt {
    const line = this.next().line;
    if (this.isOp('.')) throw new PySyntaxError('relative imports are not supported', line);
    const module = this.parseDottedName();
    this.expectKeyword('import');
    if (this.acceptOp('*')) return { kind: 'importfrom', line, module, names: [{ name: '*', asname: null }] };

    const parenthesized = this.acceptOp('(');
    const names: ImportAlias[] = [];
    do {
      if (parenthesized && this.isOp(')')) break;
      const name = this.expectIdentifier();
      const asname = this.acceptKeyword('as') ? this.expectIdentifier() : null;
      names.push({ name, asname });
    } while (this.acceptOp(','));
    if (parenthesized) this.expectOp(')');
    return { kind: 'importfrom', line, module, names };
  }

  private checkTarget(expr: Expr, action: string): void {
    switch (expr.kind) {
      case 'name':
      case 'attribute':
      case 'subscript':
        return;
      case 'tuple':
      case 'list':
        expr.elts.forEach((e) => this.checkTarget(e, action));
        return;
      case 'starred':
        this.checkTarget(expr.value, action);
        return;
      default:
        throw new PySyntaxError(`cannot ${action} ${expr.kind === 'literal' ? 'literal' : 'expression'}`, expr.line);
    }
  }

  // ── Expressions ────────────────────────────────────────────────────────────

  /** Comma-separated expressions; a tuple when there is a comma. */
  private parseTestList(): Expr {
    return this.parseSequence(() => this.parseTest(), false);
  }

  private parseTestListStar(): Expr {
    return this.parseSequence(() => this.parseTestOrStar(), false);
  }

  /** Targets of `for` and `del`: stops before `in`. */
  private parseTargetList(): Expr {
    return this.parseSequence(() => {
      if (this.isOp('*')) {
        const line = this.next().line;
        return { kind: 'starred', line, value: this.parseBitOr() };
      }
      return this.parseBitOr();
    }, true);
  }

  private parseSequence(item: () => Expr, targets: boolean): Expr {
    const line = this.peek().line;
    const first = item();
    if (!this.isOp(',')) return first;
    const elts = [first];
    while (this.acceptOp(',')) {
      if (this.endsSequence(targets)) break;
      elts.push(item());
    }
    return { kind: 'tuple', line, elts };
  }

  private endsSequence(targets: boolean): boolean {
    const tok = this.peek();
    if (tok.type === 'newline' || tok.type === 'eof') return true;
    if (tok.type === 'op' && ['=', ')', ']', '}', ';', ':'].includes(tok.value)) return true;
    if (tok.type === 'op' && tok.value in AUGMENTED) return true;
    return targets && this.isKeyword('in');
  }

  private parseTestOrStar(): Expr {
    if (this.isOp('*')) {
      const line = this.next().line;
      return { kind: 'starred', line, value: this.parseBitOr() };
    }
    return this.parseTest();
  }

  private parseTest(): Expr {
    if (this.isKeyword('lambda')) return this.parseLambda();
    const line = this.peek().line;
    const body = this.parseOrTest();
    if (this.acceptKeyword('if')) {
      const test = this.parseOrTest();
      this.expectKeyword('else');
      const orelse = this.parseTest();
      return { kind: 'ifexp', line, test, body, orelse };
    }
    return body;
  }

  private parseLambda(): Expr {
    const line = this.next().line;
    const params = this.parseParameters(':', false);
    this.expectOp(':');
    return { kind: 'lambda', line, params, body: this.parseTest() };
  }

  private parseOrTest(): Expr {
    const line = this.peek().line;
    const first = this.parseAndTest();
    if (!this.isKeyword('or')) return first;
    const values = [first];
    while (this.acceptKeyword('or')) values.push(this.parseAndTest());
    return { kind: 'boolop', line, op: 'or', values };
  }

  private parseAndTest(): Expr {
    const line = this.peek().line;
    const first = this.parseNotTest();
    if (!this.isKeyword('and')) return first;
    const values = [first];
    while (this.acceptKeyword('and')) values.push(this.parseNotTest());
    return { kind: 'boolop', line, op: 'and', values };
  }

  private parseNotTest(): Expr {
    if (this.isKeyword('not')) {
      const line = this.next().line;
      return { kind: 'unary', line, op: 'not', operand: this.parseNotTest() };
    }
    return this.parseComparison();
  }

  private parseComparison(): Expr {
    const line = this.peek().line;
    const left = this.parseBitOr();
    const ops: CompareOp[] = [];
    const comparators: Expr[] = [];
    while (true) {
      const op = this.readCompareOp();
      if (!op) break;
      ops.push(op);
      comparators.push(this.parseBitOr());
    }
    return ops.length === 0 ? left : { kind: 'compare', line, left, ops, comparators };
  }

  private readCompareOp(): CompareOp | null {
    const tok = this.peek();
    const symbolic = tok.type === 'op' ? SYMBOLIC_COMPARISONS.find((op) => op === tok.value) : undefined;
    if (symbolic) {
      this.next();
      return symbolic;
    }
    if (this.isKeyword('in')) {
      this.next();
      return 'in';
    }
    if (this.isKeyword('not') && this.isKeyword('in', 1)) {
      this.next();
      this.next();
      return 'not in';
    }
    if (this.isKeyword('is')) {
      this.next();
      return this.acceptKeyword('not') ? 'is not' : 'is';
    }
    return null;
  }

  private parseBinaryLevel(ops: readonly BinaryOp[], operand: () => Expr): Expr {
    const line = this.peek().line;
    let left = operand();
    while (true) {
      const tok = this.peek();
      const op = tok.type === 'op' ? ops.find((o) => o === tok.value) : undefined;
      if (!op) return left;
      this.next();
      left = { kind: 'binop', line, op, left, right: operand() };
    }
  }

  private parseBitOr(): Expr {
    return this.parseBinaryLevel(['|'], () => this.parseBitXor());
  }

  private parseBitXor(): Expr {
    return this.parseBinaryLevel(['^'], () => this.parseBitAnd());
  }

  private parseBitAnd(): Expr {
    return this.parseBinaryLevel(['&'], () => this.parseShift());
  }

  private parseShift(): Expr {
    return this.parseBinaryLevel(['<<', '>>'], () => this.parseArith());
  }

  private parseArith(): Expr {
    return this.parseBinaryLevel(['+', '-'], () => this.parseTerm());
  }

  private parseTerm(): Expr {
    return this.parseBinaryLevel(['*', '/', '//', '%', '@'], () => this.parseFactor());
  }

  private parseFactor(): Expr {
    const tok = this.peek();
    if (tok.type === 'op' && (tok.value === '-' || tok.value === '+' || tok.value === '~')) {
      this.next();
      return { kind: 'unary', line: tok.line, op: tok.value, operand: this.parseFactor() };
    }
    return this.parsePower();
  }

  private parsePower(): Expr {
    const line = this.peek().line;
    const base = this.parsePrimary();
    if (this.acceptOp('**')) {
      return { kind: 'binop', line, op: '**', left: base, right: this.parseFactor() };
    }
    return base;
  }

  private parsePrimary(): Expr {
    let expr = this.parseAtom();
    while (true) {
      const tok = this.peek();
      if (tok.type !== 'op') return expr;
      if (tok.value === '(') {
        this.next();
        expr = { kind: 'call', line: tok.line, func: expr, args: this.parseArguments() };
      } else if (tok.value === '[') {
        this.next();
        const index = this.parseSubscriptList();
        this.expectOp(']');
        expr = { kind: 'subscript', line: tok.line, value: expr, index };
      } else if (tok.value === '.') {
        this.next();
        expr = { kind: 'attribute', line: tok.line, value: expr, attr: this.expectIdentifier() };
      } else {
        return expr;
      }
    }
  }

  private parseArguments(): Argument[] {
    const args: Argument[] = [];
    while (!this.isOp(')')) {
      if (this.acceptOp('**')) {
        args.push({ kind: 'doublestar', value: this.parseTest() });
      } else if (this.acceptOp('*')) {
        args.push({ kind: 'star', value: this.parseTest() });
      } else if (this.peek().type === 'name' && this.isOp('=', 1)) {
        const name = this.expectIdentifier();
        this.next();
        args.push({ kind: 'keyword', name, value: this.parseTest() });
      } else {
        const line = this.peek().line;
        const value = this.parseTest();
        if (this.isKeyword('for')) {
          const generators = this.parseComprehensionClauses();
          args.push({ kind: 'positional', value: { kind: 'listcomp', line, elt: value, generators } });
        } else {
          args.push({ kind: 'positional', value });
        }
      }
      if (!this.acceptOp(',')) break;
    }
    this.expectOp(')');
    return args;
  }

  private parseSubscriptList(): Expr {
    const line = this.peek().line;
    const first = this.parseSubscriptItem();
    if (!this.isOp(',')) return first;
    const elts = [first];
    while (this.acceptOp(',')) {
      if (this.isOp(']')) break;
      elts.push(this.parseSubscriptItem());
    }
    return { kind: 'tuple', line, elts };
  }

  private parseSubscriptItem(): Expr {
    const line = this.peek().line;
    const lower = this.isOp(':') ? null : this.parseTest();
    if (!this.acceptOp(':')) {
      if (lower === null) throw this.error('expected subscript');
      return lower;
    }
    const stops = () => this.isOp(']') || this.isOp(',') || this.isOp(':');
    const upper = stops() ? null : this.parseTest();
    let step: Expr | null = null;
    if (this.acceptOp(':')) {
      step = this.isOp(']') || this.isOp(',') ? null : this.parseTest();
    }
    return { kind: 'slice', line, lower, upper, step };
  }

  private parseComprehensionClauses(): Comprehension[] {
    const generators: Comprehension[] = [];
    while (this.acceptKeyword('for')) {
      const target = this.parseTargetList();
      this.expectKeyword('in');
      const iter = this.parseOrTest();
      const conditions: Expr[] = [];
      while (this.acceptKeyword('if')) conditions.push(this.parseOrTest());
      generators.push({ target, iter, conditions });
    }
    return generators;
  }

  private parseAtom(): Expr {
    const tok = this.next();
    const line = tok.line;

    switch (tok.type) {
      case 'number':
        return { kind: 'literal', line, value: parseNumber(tok.value, tok.isFloat) };
      case 'string':
        return this.parseStrings(tok);
      case 'name':
        if (tok.value === 'True') return { kind: 'literal', line, value: true };
        if (tok.value === 'False') return { kind: 'literal', line, value: false };
        if (tok.value === 'None') return { kind: 'literal', line, value: null };
        if (KEYWORDS.has(tok.value)) throw new PySyntaxError(`invalid syntax near '${tok.value}'`, line);
        return { kind: 'name', line, id: tok.value };
      case 'op':
        break;
      default:
        throw new PySyntaxError(`invalid syntax, got ${describe(tok)}`, line);
    }

    switch (tok.value) {
      case '(': {
        if (this.acceptOp(')')) return { kind: 'tuple', line, elts: [] };
        const first = this.parseTestOrStar();
        if (this.isKeyword('for')) {
          const generators = this.parseComprehensionClauses();
          this.expectOp(')');
          return { kind: 'listcomp', line, elt: first, generators };
        }
        if (this.acceptOp(')')) return first;
        const elts = [first];
        while (this.acceptOp(',')) {
          if (this.isOp(')')) break;
          elts.push(this.parseTestOrStar());
        }
        this.expectOp(')');
        return { kind: 'tuple', line, elts };
      }
      case '[': {
        if (this.acceptOp(']')) return { kind: 'list', line, elts: [] };
        const first = this.parseTestOrStar();
        if (this.isKeyword('for')) {
          const generators = this.parseComprehensionClauses();
          this.expectOp(']');
          return { kind: 'listcomp', line, elt: first, generators };
        }
        const elts = [first];
        while (this.acceptOp(',')) {
          if (this.isOp(']')) break;
          elts.push(this.parseTestOrStar());
        }
        this.expectOp(']');
        return { kind: 'list', line, elts };
      }
      case '{':
        return this.parseBrace(line);
      default:
        throw new PySyntaxError(`invalid syntax, got ${describe(tok)}`, line);
    }
  }

  /** `{}` is an empty dict; a first item without `:` makes a set. */
  private parseBrace(line: number): Expr {
    const keys: Array<Expr | null> = [];
    const values: Expr[] = [];
    if (this.acceptOp('}')) return { kind: 'dict', line, keys, values };

    const readEntry = (): void => {
      if (this.acceptOp('**')) {
        keys.push(null);
        values.push(this.parseBitOr());
        return;
      }
      keys.push(this.parseTest());
      this.expectOp(':');
      values.push(this.parseTest());
    };

    if (this.isOp('**')) {
      readEntry();
    } else {
      const first = this.parseTestOrStar();
      if (!this.acceptOp(':')) return this.parseSetDisplay(line, first);
      if (first.kind === 'starred') throw new PySyntaxError('cannot use a starred expression as a dict key', first.line);
      const value = this.parseTest();
      if (this.isKeyword('for')) {
        const generators = this.parseComprehensionClauses();
        this.expectOp('}');
        return { kind: 'dictcomp', line, key: first, value, generators };
      }
      keys.push(first);
      values.push(value);
    }
    while (this.acceptOp(',')) {
      if (this.isOp('}')) break;
      readEntry();
    }
    this.expectOp('}');
    return { kind: 'dict', line, keys, values };
  }

  private parseSetDisplay(line: number, first: Expr): Expr {
    if (first.kind !== 'starred' && this.isKeyword('for')) {
      const generators = this.parseComprehensionClauses();
      this.expectOp('}');
      return { kind: 'setcomp', line, elt: first, generators };
    }
    const elts = [first];
    while (this.acceptOp(',')) {
      if (this.isOp('}')) break;
      elts.push(this.parseTestOrStar());
    }
    this.expectOp('}');
    return { kind: 'set', line, elts };
  }

  /** Adjacent string literals concatenate; any f-string makes the whole an f-string. */
  private parseStrings(first: Extract<Token, { type: 'string' }>): Expr {
    const pieces = [first];
    while (true) {
      const tok = this.peek();
      if (tok.type !== 'string') break;
      this.next();
      pieces.push(tok);
    }

    if (!pieces.some((p) => p.fstring)) {
      return { kind: 'literal', line: first.line, value: pieces.map((p) => p.value).join('') };
    }

    const parts: FStringPart[] = [];
    for (const piece of pieces) {
      const pieceParts = piece.fstring ? parseFStringBody(piece.value, piece.raw, piece.line) : [piece.value];
      for (const part of pieceParts) {
        const last = parts[parts.length - 1];
        if (typeof part === 'string' && typeof last === 'string') parts[parts.length - 1] = last + part;
        else parts.push(part);
      }
    }
    return { kind: 'fstring', line: first.line, parts };
  }
}

function describe(tok: Token): string {
  switch (tok.type) {
    case 'eof': return 'end of input';
    case 'newline': return 'end of line';
    case 'indent': return 'indent';
    case 'dedent': return 'dedent';
    case 'string': return 'string';
    default: return `'${tok.value}'`;
  }
}

function parseNumber(text: string, isFloat: boolean): bigint | number {
  const clean = text.replace(/_/g, '');
  return isFloat ? Number(clean) : BigInt(clean);
}

/**
 * Split an f-string body into literal text and `{expr!conv:spec}` fields.
 * `{{` and `}}` are literal braces.
 */
export function parseFStringBody(body: string, raw: boolean, line: number): FStringPart[] {
  const parts: FStringPart[] = [];
  let literal = '';
  const flush = (): void => {
    if (literal !== '') parts.push(raw ? literal : decodeEscapes(literal, line));
    literal = '';
  };

  let i = 0;
  while (i < body.length) {
    const ch = body[i];
    if (ch === '{') {
      if (body[i + 1] === '{') {
        literal += '{';
        i += 2;
        continue;
      }
      flush();
      const field = readField(body, i + 1, line);
      const expr = parseExpression(field.expr, line - 1);
      const spec = field.spec === null ? [] : parseFStringBody(field.spec, raw, line);
      parts.push({ expr, conversion: field.conversion, spec });
      i = field.end;
      continue;
    }
    if (ch === '}') {
      if (body[i + 1] === '}') {
        literal += '}';
        i += 2;
        continue;
      }
      throw new PySyntaxError("f-string: single '}' is not allowed", line);
    }
    literal += ch;
    i++;
  }
  flush();
  return parts;
}

interface FieldText {
  expr: string;
  conversion: 'r' | 's' | null;
  spec: string | null;
  /** Index just past the closing brace. */
  end: number;
}

function readField(body: string, start: number, line: number): FieldText {
  let depth = 0;
  let quote: string | null = null;
  let i = start;

  for (; i < body.length; i++) {
    const ch = body[i];
    if (quote) {
      if (ch === quote) quote = null;
      continue;
    }
    if (ch === '"' || ch === "'") quote = ch;
    else if (ch === '(' || ch === '[' || ch === '{') depth++;
    else if (ch === ')' || ch === ']' || (ch === '}' && depth > 0)) depth--;
    else if (depth === 0 && (ch === '}' || ch === ':' || (ch === '!' && body[i + 1] !== '='))) break;
  }
  if (i >= body.length) throw new PySyntaxError("f-string: expecting '}'", line);

  const expr = body.slice(start, i);
  if (expr.trim() === '') throw new PySyntaxError('f-string: empty expression not allowed', line);

  let conversion: FieldText['conversion'] = null;
  if (body[i] === '!') {
    const c = body[i + 1];
    if (c !== 'r' && c !== 's') throw new PySyntaxError(`f-string: invalid conversion character '${c}'`, line);
    conversion = c;
    i += 2;
  }

  let spec: string | null = null;
  if (body[i] === ':') {
    let nested = 0;
    let j = i + 1;
    for (; j < body.length; j++) {
      if (body[j] === '{') nested++;
      else if (body[j] === '}') {
        if (nested === 0) break;
        nested--;
      }
    }
    spec = body.slice(i + 1, j);
    i = j;
  }
  if (body[i] !== '}') throw new PySyntaxError("f-string: expecting '}'", line);
  return { expr, conversion, spec, end: i + 1 };
}
