/**
 * Syntax tree of the native language. Every node records the block-relative
 * line it starts on.
 */

export type Literal = null | boolean | bigint | number | string;

export type BinaryOp = '+' | '-' | '*' | '/' | '//' | '%' | '**' | '&' | '|' | '^' | '<<' | '>>' | '@';
export type UnaryOp = '-' | '+' | '~' | 'not';
export type CompareOp = '<' | '>' | '==' | '!=' | '<=' | '>=' | 'in' | 'not in' | 'is' | 'is not';

export interface FStringField {
  expr: Expr;
  conversion: 'r' | 's' | null;
  spec: FStringPart[];
}
export type FStringPart = string | FStringField;

export type Argument =
  | { kind: 'positional'; value: Expr }
  | { kind: 'keyword'; name: string; value: Expr }
  | { kind: 'star'; value: Expr }
  | { kind: 'doublestar'; value: Expr };

export interface Comprehension {
  target: Expr;
  iter: Expr;
  conditions: Expr[];
}

export interface Parameter {
  name: string;
  /** `kwonly` parameters follow `*` or `*args` and bind only by keyword. */
  kind: 'normal' | 'varargs' | 'kwonly' | 'kwargs';
  defaultValue: Expr | null;
}

export type Expr =
  | { kind: 'name'; line: number; id: string }
  | { kind: 'literal'; line: number; value: Literal }
  | { kind: 'fstring'; line: number; parts: FStringPart[] }
  | { kind: 'list'; line: number; elts: Expr[] }
  | { kind: 'set'; line: number; elts: Expr[] }
  | { kind: 'tuple'; line: number; elts: Expr[] }
  | { kind: 'dict'; line: number; keys: Array<Expr | null>; values: Expr[] }
  | { kind: 'binop'; line: number; op: BinaryOp; left: Expr; right: Expr }
  | { kind: 'unary'; line: number; op: UnaryOp; operand: Expr }
  | { kind: 'boolop'; line: number; op: 'and' | 'or'; values: Expr[] }
  | { kind: 'compare'; line: number; left: Expr; ops: CompareOp[]; comparators: Expr[] }
  | { kind: 'call'; line: number; func: Expr; args: Argument[] }
  | { kind: 'attribute'; line: number; value: Expr; attr: string }
  | { kind: 'subscript'; line: number; value: Expr; index: Expr }
  | { kind: 'slice'; line: number; lower: Expr | null; upper: Expr | null; step: Expr | null }
  | { kind: 'lambda'; line: number; params: Parameter[]; body: Expr }
  | { kind: 'ifexp'; line: number; test: Expr; body: Expr; orelse: Expr }
  | { kind: 'listcomp'; line: number; elt: Expr; generators: Comprehension[] }
  | { kind: 'setcomp'; line: number; elt: Expr; generators: Comprehension[] }
  | { kind: 'dictcomp'; line: number; key: Expr; value: Expr; generators: Comprehension[] }
  | { kind: 'starred'; line: number; value: Expr };

export interface ImportAlias {
  name: string;
  asname: string | null;
}

export interface ExceptHandler {
  line: number;
  type: Expr | null;
  name: string | null;
  body: Stmt[];
}

export type Stmt =
  | { kind: 'expr'; line: number; value: Expr }
  | { kind: 'assign'; line: number; targets: Expr[]; value: Expr }
  | { kind: 'augassign'; line: number; target: Expr; op: BinaryOp; value: Expr }
  | { kind: 'pass'; line: number }
  | { kind: 'break'; line: number }
  | { kind: 'continue'; line: number }
  | { kind: 'return'; line: number; value: Expr | null }
  | { kind: 'global'; line: number; names: string[] }
  | { kind: 'nonlocal'; line: number; names: string[] }
  | { kind: 'del'; line: number; targets: Expr[] }
  | { kind: 'assert'; line: number; test: Expr; msg: Expr | null }
  | { kind: 'raise'; line: number; exc: Expr | null; cause: Expr | null }
  | { kind: 'import'; line: number; names: ImportAlias[] }
  | { kind: 'importfrom'; line: number; module: string; names: ImportAlias[] }
  | { kind: 'if'; line: number; test: Expr; body: Stmt[]; orelse: Stmt[] }
  | { kind: 'while'; line: number; test: Expr; body: Stmt[]; orelse: Stmt[] }
  | { kind: 'for'; line: number; target: Expr; iter: Expr; body: Stmt[]; orelse: Stmt[] }
  | { kind: 'def'; line: number; name: string; params: Parameter[]; body: Stmt[] }
  | { kind: 'class'; line: number; name: string; bases: Expr[]; body: Stmt[] }
  | {
      kind: 'try';
      line: number;
      body: Stmt[];
      handlers: ExceptHandler[];
      orelse: Stmt[];
      finalbody: Stmt[];
    };

export interface Module {
  body: Stmt[];
}
