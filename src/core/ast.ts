// src/core/ast.ts
//
// Kestrel AST (Abstract Syntax Tree)
// ----------------------------------
// Canonical tree shared by every stage:
//
//   Lexer  -> tokens
//   Parser -> AST (this file)
//   Checker -> types keyed by node identity
//   Safety  -> audit / violation marks keyed by node identity
//   Codegen -> IR
//
// Nodes are plain objects and never mutated after parsing. Later stages keep
// their results in side tables (Map<Node, ...>) so a tree can be checked twice.

export type Integer = number;

/* =========================================================
   Source locations
   ========================================================= */

export type Position = {
  /** Absolute offset from file start (0-based). */
  offset: Integer;
  /** Line index (0-based). */
  line: Integer;
  /** Column index (0-based). */
  column: Integer;
};

export type Range = {
  start: Position;
  end: Position;
};

export const UNKNOWN_POSITION: Position = Object.freeze({
  offset: 0,
  line: 0,
  column: 0,
});

export const UNKNOWN_RANGE: Range = Object.freeze({
  start: UNKNOWN_POSITION,
  end: UNKNOWN_POSITION,
});

export function clonePosition(p: Position): Position {
  return { offset: p.offset, line: p.line, column: p.column };
}

export function cloneRange(r: Range): Range {
  return { start: clonePosition(r.start), end: clonePosition(r.end) };
}

export function mergeRanges(a: Range, b: Range): Range {
  const start = a.start.offset <= b.start.offset ? a.start : b.start;
  const end = a.end.offset >= b.end.offset ? a.end : b.end;
  return { start: clonePosition(start), end: clonePosition(end) };
}

export function containsOffset(r: Range, offset: number): boolean {
  return offset >= r.start.offset && offset <= r.end.offset;
}

/* =========================================================
   Node kinds
   ========================================================= */

export const NODE_KINDS = [
  // Module level
  "Module",
  "ImportDecl",
  "FromImportDecl",
  "Decorator",
  "FunctionDecl",

  // Types
  "NamedType",
  "PointerType",
  "ArrayType",
  "SliceType",
  "TupleType",
  "ResultType",

  // Statements
  "Block",
  "VarDecl",
  "Assign",
  "ExprStmt",
  "If",
  "While",
  "For",
  "Match",
  "Return",
  "Pass",
  "Break",
  "Continue",

  // Expressions
  "Identifier",
  "IntLiteral",
  "FloatLiteral",
  "StringLiteral",
  "BoolLiteral",
  "BinaryOp",
  "UnaryOp",
  "Call",
  "TupleExpr",
  "ArrayLiteral",
  "IndexExpr",
  "MemberAccess",
  "TryChain",
] as const;

export type NodeKind = (typeof NODE_KINDS)[number];

export type NodeBase = {
  kind: NodeKind;
  range: Range;
};

/* =========================================================
   Module / declarations
   ========================================================= */

export type Module = NodeBase & {
  kind: "Module";
  /** `module a.b` line, if present. */
  name: QualifiedName | null;
  decorators: Decorator[];
  imports: Array<ImportDecl | FromImportDecl>;
  functions: FunctionDecl[];
  /**
   * Functions whose header failed to parse. Their names still resolve
   * (to an unknown type) so later stages don't report them as undefined.
   */
  incompleteFunctions: string[];
};

export type QualifiedName = {
  parts: string[];
  range: Range;
};

export type ImportDecl = NodeBase & {
  kind: "ImportDecl";
  path: QualifiedName;
  alias: Identifier | null;
};

export type ImportedName = {
  name: Identifier;
  alias: Identifier | null;
};

export type FromImportDecl = NodeBase & {
  kind: "FromImportDecl";
  path: QualifiedName;
  names: ImportedName[];
};

/* =========================================================
   Decorators
   ========================================================= */

export type DecoratorValue =
  | { kind: "int"; value: bigint; range: Range }
  | { kind: "float"; value: number; range: Range }
  | { kind: "string"; value: string; range: Range }
  | { kind: "bool"; value: boolean; range: Range }
  | { kind: "symbol"; name: string; range: Range }
  | { kind: "list"; items: DecoratorValue[]; range: Range };

export type DecoratorArg = {
  name: string;
  value: DecoratorValue;
  range: Range;
};

export type BackoffKind = "none" | "linear" | "exponential";
export type SafetyModeName = "SAFE" | "UNSAFE" | "CUSTOM";

/** Validated, closed configuration produced from a decorator at parse time. */
export type DecoratorConfig =
  | { kind: "safety_level"; mode: SafetyModeName; allow: string[]; block: string[] }
  | { kind: "unsafe" }
  | { kind: "resilient"; maxAttempts: number; timeoutMs: number | null; backoff: BackoffKind }
  | { kind: "export"; symbol: string | null };

export type DecoratorName = DecoratorConfig["kind"];

export type Decorator = NodeBase & {
  kind: "Decorator";
  name: DecoratorName;
  args: DecoratorArg[];
  config: DecoratorConfig;
};

/* =========================================================
   Functions
   ========================================================= */

export type Param = {
  name: Identifier;
  type: TypeNode;
  range: Range;
};

export type FunctionDecl = NodeBase & {
  kind: "FunctionDecl";
  name: Identifier;
  params: Param[];
  /** null means void. A TupleType means multi-return. */
  returnType: TypeNode | null;
  decorators: Decorator[];
  body: Block;
  /** True when at least one statement in the body failed to parse. */
  hasErrors: boolean;
};

/* =========================================================
   Type annotations
   ========================================================= */

export type TypeNode = NamedType | PointerType | ArrayType | SliceType | TupleType | ResultType;

export type NamedType = NodeBase & { kind: "NamedType"; name: string };
export type PointerType = NodeBase & { kind: "PointerType"; target: TypeNode };
export type ArrayType = NodeBase & { kind: "ArrayType"; element: TypeNode; size: number };
export type SliceType = NodeBase & { kind: "SliceType"; element: TypeNode };
export type TupleType = NodeBase & { kind: "TupleType"; elements: TypeNode[] };
export type ResultType = NodeBase & { kind: "ResultType"; inner: TypeNode };

/* =========================================================
   Statements
   ========================================================= */

export type Statement =
  | VarDecl
  | Assign
  | ExprStmt
  | If
  | While
  | For
  | Match
  | Return
  | Pass
  | Break
  | Continue;

export type Block = NodeBase & {
  kind: "Block";
  body: Statement[];
};

export type VarDecl = NodeBase & {
  kind: "VarDecl";
  mutable: boolean;
  /** More than one name (or `destructure`) means `let (a, b) = ...`. */
  names: Identifier[];
  destructure: boolean;
  typeAnnotation: TypeNode | null;
  initializer: Expression;
};

export type AssignOperator = "=" | "+=" | "-=" | "*=" | "/=" | "%=" | "&=" | "|=" | "^=";

export type Assign = NodeBase & {
  kind: "Assign";
  target: Identifier | IndexExpr;
  op: AssignOperator;
  value: Expression;
};

export type ExprStmt = NodeBase & {
  kind: "ExprStmt";
  expression: Expression;
};

export type ElifClause = {
  test: Expression;
  consequent: Block;
  range: Range;
};

export type If = NodeBase & {
  kind: "If";
  test: Expression;
  consequent: Block;
  elifs: ElifClause[];
  alternate: Block | null;
};

export type While = NodeBase & {
  kind: "While";
  test: Expression;
  body: Block;
};

export type For = NodeBase & {
  kind: "For";
  variable: Identifier;
  iterable: Expression;
  body: Block;
};

export type MatchPattern =
  | { kind: "ValuePattern"; value: Expression; range: Range }
  | { kind: "RangePattern"; low: Expression; high: Expression; range: Range }
  | { kind: "WildcardPattern"; range: Range };

export type MatchCase = {
  patterns: MatchPattern[];
  body: Block;
  range: Range;
};

export type Match = NodeBase & {
  kind: "Match";
  subject: Expression;
  cases: MatchCase[];
};

export type Return = NodeBase & {
  kind: "Return";
  /** `return a, b` and `return (a, b)` both produce two values. */
  values: Expression[];
};

export type Pass = NodeBase & { kind: "Pass" };
export type Break = NodeBase & { kind: "Break" };
export type Continue = NodeBase & { kind: "Continue" };

/* =========================================================
   Expressions
   ========================================================= */

export type Expression =
  | Identifier
  | IntLiteral
  | FloatLiteral
  | StringLiteral
  | BoolLiteral
  | BinaryOp
  | UnaryOp
  | Call
  | TupleExpr
  | ArrayLiteral
  | IndexExpr
  | MemberAccess
  | TryChain;

export type Literal = IntLiteral | FloatLiteral | StringLiteral | BoolLiteral;

export type Identifier = NodeBase & {
  kind: "Identifier";
  name: string;
};

export type IntLiteral = NodeBase & {
  kind: "IntLiteral";
  value: bigint;
  /** Width suffix such as "u8" in `10u8`. */
  suffix: string | null;
  raw: string;
};

export type FloatLiteral = NodeBase & {
  kind: "FloatLiteral";
  value: number;
  suffix: string | null;
  raw: string;
};

export type StringLiteral = NodeBase & {
  kind: "StringLiteral";
  value: string;
};

export type BoolLiteral = NodeBase & {
  kind: "BoolLiteral";
  value: boolean;
};

export type ArithmeticOperator = "+" | "-" | "*" | "/" | "%" | "**";
export type BitwiseOperator = "&" | "|" | "^" | "<<" | ">>";
export type ComparisonOperator = "==" | "!=" | "<" | "<=" | ">" | ">=";
export type LogicalOperator = "and" | "or";

export type BinaryOperator = ArithmeticOperator | BitwiseOperator | ComparisonOperator | LogicalOperator;

export type BinaryOp = NodeBase & {
  kind: "BinaryOp";
  op: BinaryOperator;
  left: Expression;
  right: Expression;
};

export type UnaryOperator = "-" | "not" | "~";

export type UnaryOp = NodeBase & {
  kind: "UnaryOp";
  op: UnaryOperator;
  operand: Expression;
};

export type Call = NodeBase & {
  kind: "Call";
  callee: Expression;
  args: Expression[];
};

export type TupleExpr = NodeBase & {
  kind: "TupleExpr";
  elements: Expression[];
};

export type ArrayLiteral = NodeBase & {
  kind: "ArrayLiteral";
  elements: Expression[];
};

export type IndexExpr = NodeBase & {
  kind: "IndexExpr";
  object: Expression;
  index: Expression;
};

export type MemberAccess = NodeBase & {
  kind: "MemberAccess";
  object: Expression;
  property: Identifier;
};

export type TryClauseRole = "primary" | "secondary" | "fallback";

export type TryClause = {
  role: TryClauseRole;
  /** Statements run before the clause value; empty for inline clauses. */
  body: Statement[];
  /** Clause result. null when a block clause ends without an expression. */
  value: Expression | null;
  range: Range;
};

export type TryChain = NodeBase & {
  kind: "TryChain";
  clauses: TryClause[];
};

export type Node =
  | Module
  | ImportDecl
  | FromImportDecl
  | Decorator
  | FunctionDecl
  | TypeNode
  | Block
  | Statement
  | Expression;

/* =========================================================
   Helpers
   ========================================================= */

const EXPRESSION_KINDS: ReadonlySet<NodeKind> = new Set<NodeKind>([
  "Identifier",
  "IntLiteral",
  "FloatLiteral",
  "StringLiteral",
  "BoolLiteral",
  "BinaryOp",
  "UnaryOp",
  "Call",
  "TupleExpr",
  "ArrayLiteral",
  "IndexExpr",
  "MemberAccess",
  "TryChain",
]);

export function isExpression(n: Node): n is Expression {
  return EXPRESSION_KINDS.has(n.kind);
}

export function isLiteral(e: Expression): e is Literal {
  return e.kind === "IntLiteral" || e.kind === "FloatLiteral" || e.kind === "StringLiteral" || e.kind === "BoolLiteral";
}

/**
 * Dotted path of a pure identifier/member chain (`windows.registry.write`),
 * or null when the expression is anything else.
 */
export function qualifiedNameOf(e: Expression): string | null {
  if (e.kind === "Identifier") return e.name;
  if (e.kind === "MemberAccess") {
    const head = qualifiedNameOf(e.object);
    return head === null ? null : `${head}.${e.property.name}`;
  }
  return null;
}

export function hasDecorator(fn: FunctionDecl, name: DecoratorName): boolean {
  return fn.decorators.some((d) => d.name === name);
}

export function findDecorator<K extends DecoratorName>(
  decorators: Decorator[],
  name: K
): Extract<DecoratorConfig, { kind: K }> | null {
  for (const d of decorators) {
    const c = d.config;
    if (isConfigOf(c, name)) return c;
  }
  return null;
}

function isConfigOf<K extends DecoratorName>(c: DecoratorConfig, name: K): c is Extract<DecoratorConfig, { kind: K }> {
  return c.kind === name;
}

/* =========================================================
   Traversal
   ========================================================= */

/** Calls `fn` for each direct child node, in source order. */
export function forEachChild(node: Node, fn: (child: Node) => void): void {
  switch (node.kind) {
    case "Module":
      node.decorators.forEach(fn);
      node.imports.forEach(fn);
      node.functions.forEach(fn);
      return;
    case "ImportDecl":
      if (node.alias) fn(node.alias);
      return;
    case "FromImportDecl":
      for (const n of node.names) {
        fn(n.name);
        if (n.alias) fn(n.alias);
      }
      return;
    case "Decorator":
      return;
    case "FunctionDecl":
      node.decorators.forEach(fn);
      fn(node.name);
      for (const p of node.params) {
        fn(p.name);
        fn(p.type);
      }
      if (node.returnType) fn(node.returnType);
      fn(node.body);
      return;

    case "NamedType":
      return;
    case "PointerType":
      fn(node.target);
      return;
    case "ArrayType":
    case "SliceType":
      fn(node.element);
      return;
    case "TupleType":
      node.elements.forEach(fn);
      return;
    case "ResultType":
      fn(node.inner);
      return;

    case "Block":
      node.body.forEach(fn);
      return;
    case "VarDecl":
      node.names.forEach(fn);
      if (node.typeAnnotation) fn(node.typeAnnotation);
      fn(node.initializer);
      return;
    case "Assign":
      fn(node.target);
      fn(node.value);
      return;
    case "ExprStmt":
      fn(node.expression);
      return;
    case "If":
      fn(node.test);
      fn(node.consequent);
      for (const c of node.elifs) {
        fn(c.test);
        fn(c.consequent);
      }
      if (node.alternate) fn(node.alternate);
      return;
    case "While":
      fn(node.test);
      fn(node.body);
      return;
    case "For":
      fn(node.variable);
      fn(node.iterable);
      fn(node.body);
      return;
    case "Match":
      fn(node.subject);
      for (const c of node.cases) {
        for (const p of c.patterns) {
          if (p.kind === "ValuePattern") fn(p.value);
          else if (p.kind === "RangePattern") {
            fn(p.low);
            fn(p.high);
          }
        }
        fn(c.body);
      }
      return;
    case "Return":
      node.values.forEach(fn);
      return;
    case "Pass":
    case "Break":
    case "Continue":
      return;

    case "Identifier":
    case "IntLiteral":
    case "FloatLiteral":
    case "StringLiteral":
    case "BoolLiteral":
      return;
    case "BinaryOp":
      fn(node.left);
      fn(node.right);
      return;
    case "UnaryOp":
      fn(node.operand);
      return;
    case "Call":
      fn(node.callee);
      node.args.forEach(fn);
      return;
    case "TupleExpr":
    case "ArrayLiteral":
      node.elements.forEach(fn);
      return;
    case "IndexExpr":
      fn(node.object);
      fn(node.index);
      return;
    case "MemberAccess":
      fn(node.object);
      fn(node.property);
      return;
    case "TryChain":
      for (const c of node.clauses) {
        c.body.forEach(fn);
        if (c.value) fn(c.value);
      }
      return;
  }
}

export type Visitor = {
  enter?: (node: Node, parent: Node | null) => void;
  leave?: (node: Node, parent: Node | null) => void;
};

export function walkAst(root: Node, visitor: Visitor): void {
  const visitNode = (node: Node, parent: Node | null): void => {
    visitor.enter?.(node, parent);
    forEachChild(node, (child) => visitNode(child, node));
    visitor.leave?.(node, parent);
  };

  visitNode(root, null);
}
