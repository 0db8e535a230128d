// src/core/parser.ts
//
// Kestrel Parser
// --------------
// Turns tokens (from src/core/lexer.ts) into an AST (src/core/ast.ts) + parse errors.
//
// Recursive descent with one token of lookahead. Blocks are `INDENT statement+ DEDENT`.
// Binary expressions use precedence climbing (BIN_OP_TABLE, `**` right-associative).
//
// Error recovery: a grammar rule that cannot continue records one ParseError and
// throws ParseFailure. The nearest statement (or declaration) loop catches it,
// skips to the next NEWLINE at the same nesting level (and over the indented block
// that belongs to the broken line, if any), and keeps going. One bad statement
// therefore yields exactly one error.
//
// Exports:
//   - parseSource(source): ParseResult
//   - parseTokens(tokens): ParseResult
//   - parseTypeText(text): TypeNode | null
//   - Parser class

import type {
  Assign,
  AssignOperator,
  BinaryOperator,
  Block,
  Decorator,
  DecoratorArg,
  DecoratorValue,
  ElifClause,
  Expression,
  For,
  FromImportDecl,
  FunctionDecl,
  Identifier,
  If,
  ImportDecl,
  ImportedName,
  Match,
  MatchCase,
  MatchPattern,
  Module,
  Param,
  Position,
  QualifiedName,
  Range,
  Return,
  Statement,
  TryChain,
  TryClause,
  TryClauseRole,
  TypeNode,
  VarDecl,
  While,
} from "./ast";
import { decoratorPlacement, resolveDecorator } from "./decorators";
import { tokenize, TokenKind, type LexerError, type Token } from "./lexer";

/* =========================================================
   Parse result & diagnostics
   ========================================================= */

export type ParseErrorCode = "UnexpectedToken" | "MissingFallback" | "MalformedDecorator";

export type ParseError = {
  code: ParseErrorCode;
  message: string;
  range: Range;
  /** For UnexpectedToken: what the grammar wanted and what it saw. */
  expected?: string;
  found?: string;
};

export type ParseResult = {
  module: Module;
  errors: ParseError[];
  lexErrors: LexerError[];
};

/** Thrown after an error has been recorded; caught by the statement loops. */
class ParseFailure extends Error {
  constructor() {
    super("parse failure");
    this.name = "ParseFailure";
  }
}

/* =========================================================
   Public helpers
   ========================================================= */

export function parseSource(source: string): ParseResult {
  const lex = tokenize(source);
  const parser = new Parser(lex.tokens);
  const module = parser.parseModule();
  return { module, errors: parser.errors, lexErrors: lex.errors };
}

export function parseTokens(tokens: Token[]): ParseResult {
  const parser = new Parser(tokens);
  const module = parser.parseModule();
  return { module, errors: parser.errors, lexErrors: [] };
}

/** Parses a standalone type annotation such as `ptr[u8]` or `(status, string)`. */
export function parseTypeText(text: string): TypeNode | null {
  const lex = tokenize(text);
  if (lex.errors.length) return null;
  const parser = new Parser(lex.tokens);
  return parser.parseStandaloneType();
}

/* =========================================================
   Operator tables
   ========================================================= */

type Assoc = "left" | "right";

type BinOpInfo = {
  precedence: number;
  assoc: Assoc;
  op: BinaryOperator;
};

const BIN_OP_TABLE: Partial<Record<TokenKind, BinOpInfo>> = {
  [TokenKind.KW_OR]: { precedence: 1, assoc: "left", op: "or" },
  [TokenKind.KW_AND]: { precedence: 2, assoc: "left", op: "and" },

  [TokenKind.EQ]: { precedence: 3, assoc: "left", op: "==" },
  [TokenKind.NEQ]: { precedence: 3, assoc: "left", op: "!=" },

  [TokenKind.LT]: { precedence: 4, assoc: "left", op: "<" },
  [TokenKind.LTE]: { precedence: 4, assoc: "left", op: "<=" },
  [TokenKind.GT]: { precedence: 4, assoc: "left", op: ">" },
  [TokenKind.GTE]: { precedence: 4, assoc: "left", op: ">=" },

  [TokenKind.PIPE]: { precedence: 5, assoc: "left", op: "|" },
  [TokenKind.CARET]: { precedence: 6, assoc: "left", op: "^" },
  [TokenKind.AMP]: { precedence: 7, assoc: "left", op: "&" },

  [TokenKind.SHL]: { precedence: 8, assoc: "left", op: "<<" },
  [TokenKind.SHR]: { precedence: 8, assoc: "left", op: ">>" },

  [TokenKind.PLUS]: { precedence: 9, assoc: "left", op: "+" },
  [TokenKind.MINUS]: { precedence: 9, assoc: "left", op: "-" },

  [TokenKind.STAR]: { precedence: 10, assoc: "left", op: "*" },
  [TokenKind.SLASH]: { precedence: 10, assoc: "left", op: "/" },
  [TokenKind.PERCENT]: { precedence: 10, assoc: "left", op: "%" },

  [TokenKind.POWER]: { precedence: 11, assoc: "right", op: "**" },
};

const POWER_PRECEDENCE = 11;
/** Patterns in `case` sit above comparisons so `case 1..10` reads naturally. */
const PATTERN_PRECEDENCE = 5;

const ASSIGN_OPS: Partial<Record<TokenKind, AssignOperator>> = {
  [TokenKind.ASSIGN]: "=",
  [TokenKind.PLUS_ASSIGN]: "+=",
  [TokenKind.MINUS_ASSIGN]: "-=",
  [TokenKind.STAR_ASSIGN]: "*=",
  [TokenKind.SLASH_ASSIGN]: "/=",
  [TokenKind.PERCENT_ASSIGN]: "%=",
  [TokenKind.AMP_ASSIGN]: "&=",
  [TokenKind.PIPE_ASSIGN]: "|=",
  [TokenKind.CARET_ASSIGN]: "^=",
};

/* =========================================================
   Parser
   ========================================================= */

export class Parser {
  private readonly tokens: Token[];
  private idx = 0;

  public readonly errors: ParseError[] = [];

  constructor(tokens: Token[]) {
    this.tokens = tokens.length ? tokens : [eofToken()];
  }

  /* =========================================================
     Top-level
     ========================================================= */

  public parseModule(): Module {
    const start = this.current().range.start;
    const module: Module = {
      kind: "Module",
      range: { start, end: start },
      name: null,
      decorators: [],
      imports: [],
      functions: [],
      incompleteFunctions: [],
    };

    this.skipNewlines();

    while (!this.isAtEnd()) {
      try {
        this.parseTopLevel(module);
      } catch (e) {
        if (!(e instanceof ParseFailure)) throw e;
        this.synchronize();
      }
      this.skipNewlines();
    }

    module.range = { start, end: this.previous().range.end };
    return module;
  }

  public parseStandaloneType(): TypeNode | null {
    try {
      const t = this.parseType();
      this.skipNewlines();
      return this.isAtEnd() ? t : null;
    } catch (e) {
      if (!(e instanceof ParseFailure)) throw e;
      return null;
    }
  }

  private parseTopLevel(module: Module): void {
    if (this.is(TokenKind.AT)) {
      const decorators = this.parseDecoratorGroup();
      this.attachDecorators(module, decorators);
      return;
    }

    if (this.is(TokenKind.KW_MODULE)) {
      this.parseModuleName(module);
      return;
    }

    if (this.is(TokenKind.KW_IMPORT)) {
      module.imports.push(this.parseImport());
      return;
    }

    if (this.is(TokenKind.KW_FROM)) {
      module.imports.push(this.parseFromImport());
      return;
    }

    if (this.is(TokenKind.KW_FUNC)) {
      module.functions.push(this.parseFunction([], module));
      return;
    }

    this.fail("a declaration ('func', 'import', 'module' or a decorator)");
  }

  private parseModuleName(module: Module): void {
    const kw = this.advance();
    const name = this.parseQualifiedName();
    this.endStatement();

    if (module.name) {
      this.errorAt(kw.range, "UnexpectedToken", "A file may declare its module name only once.");
      return;
    }
    if (module.functions.length > 0) {
      this.errorAt(kw.range, "UnexpectedToken", "'module' must come before any function.");
    }
    module.name = name;
  }

  private parseImport(): ImportDecl {
    const kw = this.advance();
    const path = this.parseQualifiedName();
    let alias: Identifier | null = null;
    if (this.match(TokenKind.KW_AS)) alias = this.parseIdentifier("an alias name");
    this.endStatement();

    return {
      kind: "ImportDecl",
      range: { start: kw.range.start, end: (alias ?? path).range.end },
      path,
      alias,
    };
  }

  private parseFromImport(): FromImportDecl {
    const kw = this.advance();
    const path = this.parseQualifiedName();
    this.expect(TokenKind.KW_IMPORT, "'import'");

    const names: ImportedName[] = [];
    do {
      const name = this.parseIdentifier("a name to import");
      const alias = this.match(TokenKind.KW_AS) ? this.parseIdentifier("an alias name") : null;
      names.push({ name, alias });
    } while (this.match(TokenKind.COMMA));

    const end = this.previous().range.end;
    this.endStatement();
    return { kind: "FromImportDecl", range: { start: kw.range.start, end }, path, names };
  }

  private parseQualifiedName(): QualifiedName {
    const first = this.parseIdentifier("a module name");
    const parts = [first.name];
    let end = first.range.end;
    while (this.match(TokenKind.DOT)) {
      const next = this.parseIdentifier("a name after '.'");
      parts.push(next.name);
      end = next.range.end;
    }
    return { parts, range: { start: first.range.start, end } };
  }

  /* =========================================================
     Decorators
     ========================================================= */

  private parseDecoratorGroup(): Decorator[] {
    const out: Decorator[] = [];

    while (this.is(TokenKind.AT)) {
      const d = this.parseDecorator();
      if (d) out.push(d);
      this.skipNewlines();
    }

    return out;
  }

  /** Returns null when the decorator is well-formed syntax but rejected by the registry. */
  private parseDecorator(): Decorator | null {
    const at = this.advance();
    const name = this.parseIdentifier("a decorator name");
    const args: DecoratorArg[] = [];

    if (this.match(TokenKind.LPAREN)) {
      if (!this.is(TokenKind.RPAREN)) {
        do {
          const key = this.parseIdentifier("an option name");
          this.expect(TokenKind.COLON, "':' after option name");
          const value = this.parseDecoratorValue();
          args.push({ name: key.name, value, range: { start: key.range.start, end: value.range.end } });
        } while (this.match(TokenKind.COMMA));
      }
      this.expect(TokenKind.RPAREN, "')' to close decorator arguments");
    }

    const range = { start: at.range.start, end: this.previous().range.end };
    this.endStatement();

    const resolved = resolveDecorator(name.name, args);
    if (!resolved.ok) {
      this.errorAt(range, "MalformedDecorator", resolved.message);
      return null;
    }

    return { kind: "Decorator", range, name: resolved.name, args, config: resolved.config };
  }

  private parseDecoratorValue(): DecoratorValue {
    const t = this.current();
    const lit = t.literal;

    if (this.match(TokenKind.MINUS)) {
      const n = this.current();
      if (n.literal && n.literal.type === "int") {
        this.advance();
        return { kind: "int", value: -n.literal.value, range: { start: t.range.start, end: n.range.end } };
      }
      if (n.literal && n.literal.type === "float") {
        this.advance();
        return { kind: "float", value: -n.literal.value, range: { start: t.range.start, end: n.range.end } };
      }
      return this.failDecorator(n);
    }

    if (lit && (t.kind === TokenKind.INT || t.kind === TokenKind.FLOAT || t.kind === TokenKind.STRING)) {
      this.advance();
      if (lit.type === "int") return { kind: "int", value: lit.value, range: t.range };
      if (lit.type === "float") return { kind: "float", value: lit.value, range: t.range };
      return { kind: "string", value: lit.value, range: t.range };
    }

    if (this.match(TokenKind.TRUE)) return { kind: "bool", value: true, range: t.range };
    if (this.match(TokenKind.FALSE)) return { kind: "bool", value: false, range: t.range };
    if (this.match(TokenKind.IDENTIFIER)) return { kind: "symbol", name: t.lexeme, range: t.range };

    if (this.match(TokenKind.LBRACKET)) {
      const items: DecoratorValue[] = [];
      if (!this.is(TokenKind.RBRACKET)) {
        do {
          items.push(this.parseDecoratorValue());
        } while (this.match(TokenKind.COMMA));
      }
      const close = this.expect(TokenKind.RBRACKET, "']' to close the list");
      return { kind: "list", items, range: { start: t.range.start, end: close.range.end } };
    }

    return this.failDecorator(t);
  }

  private failDecorator(t: Token): never {
    this.errorAt(
      t.range,
      "MalformedDecorator",
      `Decorator arguments must be literal values, found ${describeToken(t)}.`
    );
    throw new ParseFailure();
  }

  private attachDecorators(module: Module, decorators: Decorator[]): void {
    if (this.is(TokenKind.KW_MODULE)) {
      for (const d of decorators) this.attachToModule(module, d);
      return;
    }

    if (!this.is(TokenKind.KW_FUNC)) {
      this.fail("'func' or 'module' after decorators");
    }

    const forFunction: Decorator[] = [];
    for (const d of decorators) {
      if (decoratorPlacement(d.name) === "function") {
        if (forFunction.some((x) => x.name === d.name)) {
          this.errorAt(d.range, "MalformedDecorator", `Decorator '@${d.name}' is applied twice.`);
          continue;
        }
        forFunction.push(d);
        continue;
      }

      // Module decorators written above the first function of a file without a
      // `module` line belong to the module.
      if (module.functions.length === 0 && module.name === null) {
        this.attachToModule(module, d);
      } else {
        this.errorAt(d.range, "MalformedDecorator", `Decorator '@${d.name}' applies to modules, not functions.`);
      }
    }

    module.functions.push(this.parseFunction(forFunction, module));
  }

  private attachToModule(module: Module, d: Decorator): void {
    if (decoratorPlacement(d.name) !== "module") {
      this.errorAt(d.range, "MalformedDecorator", `Decorator '@${d.name}' applies to functions, not modules.`);
      return;
    }
    if (module.decorators.some((x) => x.name === d.name)) {
      this.errorAt(d.range, "MalformedDecorator", `Decorator '@${d.name}' is applied twice.`);
      return;
    }
    module.decorators.push(d);
  }

  /* =========================================================
     Functions
     ========================================================= */

  private parseFunction(decorators: Decorator[], module: Module): FunctionDecl {
    const kw = this.advance(); // func
    const name = this.parseIdentifier("a function name");

    let params: Param[];
    let returnType: TypeNode | null = null;
    try {
      params = this.parseParams();
      if (this.match(TokenKind.ARROW)) returnType = this.parseReturnType();
      this.expect(TokenKind.COLON, "':' after function signature");
    } catch (e) {
      if (e instanceof ParseFailure) module.incompleteFunctions.push(name.name);
      throw e;
    }

    const errorsBefore = this.errors.length;
    const body = this.parseBlock();

    return {
      kind: "FunctionDecl",
      range: { start: (decorators[0] ?? kw).range.start, end: body.range.end },
      name,
      params,
      returnType,
      decorators,
      body,
      hasErrors: this.errors.length > errorsBefore,
    };
  }

  private parseParams(): Param[] {
    this.expect(TokenKind.LPAREN, "'(' after function name");
    const params: Param[] = [];

    if (!this.is(TokenKind.RPAREN)) {
      do {
        const name = this.parseIdentifier("a parameter name");
        this.expect(TokenKind.COLON, `':' and a type for parameter '${name.name}'`);
        const type = this.parseType();
        params.push({ name, type, range: { start: name.range.start, end: type.range.end } });
      } while (this.match(TokenKind.COMMA));
    }

    this.expect(TokenKind.RPAREN, "')' to close the parameter list");
    return params;
  }

  private parseReturnType(): TypeNode {
    return this.parseType();
  }

  /* =========================================================
     Types
     ========================================================= */

  private parseType(): TypeNode {
    const t = this.current();

    if (this.match(TokenKind.LPAREN)) {
      const elements = this.parseTypeList(TokenKind.RPAREN);
      const close = this.expect(TokenKind.RPAREN, "')' to close the tuple type");
      return { kind: "TupleType", range: { start: t.range.start, end: close.range.end }, elements };
    }

    const name = this.parseIdentifier("a type");

    switch (name.name) {
      case "ptr":
      case "slice":
      case "result": {
        this.expect(TokenKind.LBRACKET, `'[' after '${name.name}'`);
        const inner = this.parseType();
        const close = this.expect(TokenKind.RBRACKET, "']'");
        const range = { start: name.range.start, end: close.range.end };
        if (name.name === "ptr") return { kind: "PointerType", range, target: inner };
        if (name.name === "slice") return { kind: "SliceType", range, element: inner };
        return { kind: "ResultType", range, inner };
      }
      case "array": {
        this.expect(TokenKind.LBRACKET, "'[' after 'array'");
        const element = this.parseType();
        this.expect(TokenKind.COMMA, "',' and an array length");
        const sizeTok = this.expect(TokenKind.INT, "an integer array length");
        const close = this.expect(TokenKind.RBRACKET, "']'");
        const size = sizeTok.literal && sizeTok.literal.type === "int" ? Number(sizeTok.literal.value) : 0;
        return { kind: "ArrayType", range: { start: name.range.start, end: close.range.end }, element, size };
      }
      case "tuple": {
        this.expect(TokenKind.LPAREN, "'(' after 'tuple'");
        const elements = this.parseTypeList(TokenKind.RPAREN);
        const close = this.expect(TokenKind.RPAREN, "')' to close the tuple type");
        return { kind: "TupleType", range: { start: name.range.start, end: close.range.end }, elements };
      }
      default:
        return { kind: "NamedType", range: name.range, name: name.name };
    }
  }

  private parseTypeList(close: TokenKind): TypeNode[] {
    const out: TypeNode[] = [];
    if (this.is(close)) return out;
    do {
      out.push(this.parseType());
    } while (this.match(TokenKind.COMMA));
    return out;
  }

  /* =========================================================
     Blocks & statements
     ========================================================= */

  /** Parses `NEWLINE INDENT statement+ DEDENT` after a header's ':'. */
  private parseBlock(): Block {
    this.expect(TokenKind.NEWLINE, "end of line after ':'");
    const indent = this.expect(TokenKind.INDENT, "an indented block");
    const body = this.parseStatementsUntilDedent();
    const end = this.previous().range.end;
    return { kind: "Block", range: { start: indent.range.start, end }, body };
  }

  private parseStatementsUntilDedent(): Statement[] {
    const body: Statement[] = [];
    this.skipNewlines();

    while (!this.is(TokenKind.DEDENT) && !this.isAtEnd()) {
      try {
        body.push(this.parseStatement());
      } catch (e) {
        if (!(e instanceof ParseFailure)) throw e;
        this.synchronize();
      }
      this.skipNewlines();
    }

    this.match(TokenKind.DEDENT);
    return body;
  }

  private parseStatement(): Statement {
    const t = this.current();

    switch (t.kind) {
      case TokenKind.KW_LET:
      case TokenKind.KW_VAR:
        return this.parseVarDecl();
      case TokenKind.KW_IF:
        return this.parseIf();
      case TokenKind.KW_WHILE:
        return this.parseWhile();
      case TokenKind.KW_FOR:
        return this.parseFor();
      case TokenKind.KW_MATCH:
        return this.parseMatch();
      case TokenKind.KW_RETURN:
        return this.parseReturn();
      case TokenKind.KW_PASS:
        this.advance();
        this.endStatement();
        return { kind: "Pass", range: t.range };
      case TokenKind.KW_BREAK:
        this.advance();
        this.endStatement();
        return { kind: "Break", range: t.range };
      case TokenKind.KW_CONTINUE:
        this.advance();
        this.endStatement();
        return { kind: "Continue", range: t.range };
      case TokenKind.INDENT:
        return this.fail("a statement (unexpected indent)");
      case TokenKind.KW_FUNC:
        return this.fail("a statement (functions cannot be nested)");
      default:
        break;
    }

    return this.parseExpressionOrAssignment();
  }

  private parseVarDecl(): VarDecl {
    const kw = this.advance();
    const mutable = kw.kind === TokenKind.KW_VAR;
    const names: Identifier[] = [];
    let destructure = false;

    if (this.match(TokenKind.LPAREN)) {
      destructure = true;
      do {
        names.push(this.parseIdentifier("a name to bind"));
      } while (this.match(TokenKind.COMMA));
      this.expect(TokenKind.RPAREN, "')' after destructured names");
    } else {
      names.push(this.parseIdentifier("a variable name"));
    }

    const typeAnnotation = this.match(TokenKind.COLON) ? this.parseType() : null;
    this.expect(TokenKind.ASSIGN, "'=' and an initializer");
    const initializer = this.parseExpression();
    const end = initializer.range.end;
    this.endStatement();

    return {
      kind: "VarDecl",
      range: { start: kw.range.start, end },
      mutable,
      names,
      destructure,
      typeAnnotation,
      initializer,
    };
  }

  private parseIf(): If {
    const kw = this.advance();
    const test = this.parseExpression();
    this.expect(TokenKind.COLON, "':' after the condition");
    const consequent = this.parseBlock();

    const elifs: ElifClause[] = [];
    while (this.is(TokenKind.KW_ELIF)) {
      const ek = this.advance();
      const elifTest = this.parseExpression();
      this.expect(TokenKind.COLON, "':' after the condition");
      const block = this.parseBlock();
      elifs.push({ test: elifTest, consequent: block, range: { start: ek.range.start, end: block.range.end } });
    }

    let alternate: Block | null = null;
    if (this.match(TokenKind.KW_ELSE)) {
      this.expect(TokenKind.COLON, "':' after 'else'");
      alternate = this.parseBlock();
    }

    const end = (alternate ?? elifs[elifs.length - 1]?.consequent ?? consequent).range.end;
    return { kind: "If", range: { start: kw.range.start, end }, test, consequent, elifs, alternate };
  }

  private parseWhile(): While {
    const kw = this.advance();
    const test = this.parseExpression();
    this.expect(TokenKind.COLON, "':' after the loop condition");
    const body = this.parseBlock();
    return { kind: "While", range: { start: kw.range.start, end: body.range.end }, test, body };
  }

  private parseFor(): For {
    const kw = this.advance();
    const variable = this.parseIdentifier("a loop variable");
    this.expect(TokenKind.KW_IN, "'in'");
    const iterable = this.parseExpression();
    this.expect(TokenKind.COLON, "':' after the loop header");
    const body = this.parseBlock();
    return { kind: "For", range: { start: kw.range.start, end: body.range.end }, variable, iterable, body };
  }

  private parseMatch(): Match {
    const kw = this.advance();
    const subject = this.parseExpression();
    this.expect(TokenKind.COLON, "':' after the match subject");
    this.expect(TokenKind.NEWLINE, "end of line after ':'");
    this.expect(TokenKind.INDENT, "an indented list of cases");

    const cases: MatchCase[] = [];
    this.skipNewlines();
    while (!this.is(TokenKind.DEDENT) && !this.isAtEnd()) {
      try {
        cases.push(this.parseCase());
      } catch (e) {
        if (!(e instanceof ParseFailure)) throw e;
        this.synchronize();
      }
      this.skipNewlines();
    }
    this.match(TokenKind.DEDENT);

    return { kind: "Match", range: { start: kw.range.start, end: this.previous().range.end }, subject, cases };
  }

  private parseCase(): MatchCase {
    const kw = this.expect(TokenKind.KW_CASE, "'case'");
    const patterns: MatchPattern[] = [];

    do {
      patterns.push(this.parsePattern());
    } while (this.match(TokenKind.COMMA));

    this.expect(TokenKind.COLON, "':' after the case pattern");
    const body = this.parseBlock();
    return { patterns, body, range: { start: kw.range.start, end: body.range.end } };
  }

  private parsePattern(): MatchPattern {
    const t = this.current();
    if (t.kind === TokenKind.IDENTIFIER && t.lexeme === "_") {
      this.advance();
      return { kind: "WildcardPattern", range: t.range };
    }

    const low = this.parseBinary(PATTERN_PRECEDENCE);
    if (this.match(TokenKind.DOTDOT)) {
      const high = this.parseBinary(PATTERN_PRECEDENCE);
      return { kind: "RangePattern", low, high, range: { start: low.range.start, end: high.range.end } };
    }
    return { kind: "ValuePattern", value: low, range: low.range };
  }

  private parseReturn(): Return {
    const kw = this.advance();
    const values: Expression[] = [];

    if (!this.is(TokenKind.NEWLINE) && !this.is(TokenKind.DEDENT) && !this.isAtEnd()) {
      do {
        values.push(this.parseExpression());
      } while (this.match(TokenKind.COMMA));
    }

    const end = this.previous().range.end;
    this.endStatement();

    // `return (a, b)` is the same as `return a, b`
    const only = values[0];
    if (values.length === 1 && only && only.kind === "TupleExpr") {
      return { kind: "Return", range: { start: kw.range.start, end }, values: only.elements };
    }

    return { kind: "Return", range: { start: kw.range.start, end }, values };
  }

  private parseExpressionOrAssignment(): Statement {
    const expr = this.parseExpression();
    const op = ASSIGN_OPS[this.current().kind];

    if (op) {
      this.advance();
      if (expr.kind !== "Identifier" && expr.kind !== "IndexExpr") {
        this.errorAt(expr.range, "UnexpectedToken", "Invalid assignment target.", "a variable or element", describeRange(expr.range));
        throw new ParseFailure();
      }
      const value = this.parseExpression();
      const end = value.range.end;
      this.endStatement();
      const stmt: Assign = { kind: "Assign", range: { start: expr.range.start, end }, target: expr, op, value };
      return stmt;
    }

    this.endStatement();
    return { kind: "ExprStmt", range: expr.range, expression: expr };
  }

  /* =========================================================
     Expressions
     ========================================================= */

  private parseExpression(): Expression {
    return this.parseBinary(1);
  }

  private parseBinary(minPrec: number): Expression {
    let left = this.parseUnary();

    while (true) {
      const opInfo = BIN_OP_TABLE[this.current().kind];
      if (!opInfo) break;
      if (opInfo.precedence < minPrec) break;

      this.advance();

      const nextMinPrec = opInfo.assoc === "left" ? opInfo.precedence + 1 : opInfo.precedence;
      const right = this.parseBinary(nextMinPrec);

      left = {
        kind: "BinaryOp",
        range: { start: left.range.start, end: right.range.end },
        op: opInfo.op,
        left,
        right,
      };
    }

    return left;
  }

  private parseUnary(): Expression {
    const t = this.current();
    const op = t.kind === TokenKind.MINUS ? "-" : t.kind === TokenKind.KW_NOT ? "not" : t.kind === TokenKind.TILDE ? "~" : null;

    if (op) {
      this.advance();
      // -x ** 2 is -(x ** 2)
      const operand = this.parseBinary(POWER_PRECEDENCE);
      return { kind: "UnaryOp", range: { start: t.range.start, end: operand.range.end }, op, operand };
    }

    return this.parsePostfix();
  }

  private parsePostfix(): Expression {
    let expr = this.parsePrimary();

    while (true) {
      if (this.match(TokenKind.LPAREN)) {
        const args: Expression[] = [];
        if (!this.is(TokenKind.RPAREN)) {
          do {
            args.push(this.parseExpression());
          } while (this.match(TokenKind.COMMA));
        }
        const close = this.expect(TokenKind.RPAREN, "')' to close the argument list");
        expr = { kind: "Call", range: { start: expr.range.start, end: close.range.end }, callee: expr, args };
        continue;
      }

      if (this.match(TokenKind.LBRACKET)) {
        const index = this.parseExpression();
        const close = this.expect(TokenKind.RBRACKET, "']' after the index");
        expr = { kind: "IndexExpr", range: { start: expr.range.start, end: close.range.end }, object: expr, index };
        continue;
      }

      if (this.match(TokenKind.DOT)) {
        const property = this.parseIdentifier("a member name after '.'");
        expr = {
          kind: "MemberAccess",
          range: { start: expr.range.start, end: property.range.end },
          object: expr,
          property,
        };
        continue;
      }

      return expr;
    }
  }

  private parsePrimary(): Expression {
    const t = this.current();
    const lit = t.literal;

    switch (t.kind) {
      case TokenKind.INT:
        this.advance();
        if (lit && lit.type === "int") {
          return { kind: "IntLiteral", range: t.range, value: lit.value, suffix: lit.suffix, raw: t.lexeme };
        }
        break;
      case TokenKind.FLOAT:
        this.advance();
        if (lit && lit.type === "float") {
          return { kind: "FloatLiteral", range: t.range, value: lit.value, suffix: lit.suffix, raw: t.lexeme };
        }
        break;
      case TokenKind.STRING:
        this.advance();
        if (lit && lit.type === "string") return { kind: "StringLiteral", range: t.range, value: lit.value };
        break;
      case TokenKind.TRUE:
      case TokenKind.FALSE:
        this.advance();
        return { kind: "BoolLiteral", range: t.range, value: t.kind === TokenKind.TRUE };
      case TokenKind.IDENTIFIER:
        this.advance();
        return { kind: "Identifier", range: t.range, name: t.lexeme };
      case TokenKind.LPAREN:
        return this.parseParenthesized();
      case TokenKind.LBRACKET:
        return this.parseArrayLiteral();
      case TokenKind.KW_TRY_CHAIN:
        return this.parseTryChain();
      default:
        break;
    }

    this.fail("an expression");
  }

  private parseParenthesized(): Expression {
    const open = this.advance();
    const first = this.parseExpression();

    if (!this.is(TokenKind.COMMA)) {
      this.expect(TokenKind.RPAREN, "')'");
      return first;
    }

    const elements = [first];
    while (this.match(TokenKind.COMMA)) {
      if (this.is(TokenKind.RPAREN)) break;
      elements.push(this.parseExpression());
    }
    const close = this.expect(TokenKind.RPAREN, "')' to close the tuple");
    return { kind: "TupleExpr", range: { start: open.range.start, end: close.range.end }, elements };
  }

  private parseArrayLiteral(): Expression {
    const open = this.advance();
    const elements: Expression[] = [];
    if (!this.is(TokenKind.RBRACKET)) {
      do {
        if (this.is(TokenKind.RBRACKET)) break;
        elements.push(this.parseExpression());
      } while (this.match(TokenKind.COMMA));
    }
    const close = this.expect(TokenKind.RBRACKET, "']' to close the array");
    return { kind: "ArrayLiteral", range: { start: open.range.start, end: close.range.end }, elements };
  }

  /* =========================================================
     try_chain
     ========================================================= */

  private parseTryChain(): TryChain {
    const kw = this.advance();
    this.expect(TokenKind.COLON, "':' after 'try_chain'");
    this.expect(TokenKind.NEWLINE, "end of line after 'try_chain:'");
    this.expect(TokenKind.INDENT, "an indented list of clauses");

    const clauses: TryClause[] = [];
    let sawFallback = false;
    this.skipNewlines();

    while (!this.is(TokenKind.DEDENT) && !this.isAtEnd()) {
      const t = this.current();
      const role = clauseRole(t.kind);

      if (!role) {
        this.errorAt(t.range, "UnexpectedToken", `Expected 'primary', 'secondary' or 'fallback', found ${describeToken(t)}.`, "a try_chain clause", describeToken(t));
        this.synchronize();
        this.skipNewlines();
        continue;
      }

      const clause = this.parseTryClause(role);
      const problem = clauseOrderProblem(role, clauses, sawFallback);
      if (problem) {
        this.errorAt(t.range, "UnexpectedToken", problem, "end of try_chain", `'${role}'`);
      } else {
        clauses.push(clause);
        if (role === "fallback") sawFallback = true;
      }
      this.skipNewlines();
    }
    this.match(TokenKind.DEDENT);

    const range = { start: kw.range.start, end: this.previous().range.end };
    if (!sawFallback) {
      this.errorAt(kw.range, "MissingFallback", "try_chain requires exactly one 'fallback' clause as its last clause.");
    }

    return { kind: "TryChain", range, clauses };
  }

  private parseTryClause(role: TryClauseRole): TryClause {
    const kw = this.advance();
    this.expect(TokenKind.COLON, `':' after '${role}'`);

    // Inline form: `primary: expr`
    if (!this.is(TokenKind.NEWLINE)) {
      const value = this.parseExpression();
      this.endStatement();
      return { role, body: [], value, range: { start: kw.range.start, end: value.range.end } };
    }

    const block = this.parseBlock();
    const body = [...block.body];
    const last = body[body.length - 1];
    let value: Expression | null = null;
    if (last && last.kind === "ExprStmt") {
      body.pop();
      value = last.expression;
    }
    return { role, body, value, range: { start: kw.range.start, end: block.range.end } };
  }

  /* =========================================================
     Token helpers
     ========================================================= */

  private parseIdentifier(expected: string): Identifier {
    const t = this.expect(TokenKind.IDENTIFIER, expected);
    return { kind: "Identifier", range: t.range, name: t.lexeme };
  }

  private current(): Token {
    return this.tokens[this.idx] ?? this.tokens[this.tokens.length - 1] ?? eofToken();
  }

  private previous(): Token {
    return this.tokens[Math.max(0, this.idx - 1)] ?? this.current();
  }

  private isAtEnd(): boolean {
    return this.current().kind === TokenKind.EOF;
  }

  private is(kind: TokenKind): boolean {
    return this.current().kind === kind;
  }

  private match(kind: TokenKind): boolean {
    if (this.is(kind)) {
      this.advance();
      return true;
    }
    return false;
  }

  private advance(): Token {
    const t = this.current();
    if (!this.isAtEnd()) this.idx++;
    return t;
  }

  private expect(kind: TokenKind, expected: string): Token {
    if (this.is(kind)) return this.advance();
    this.fail(expected);
  }

  /** Records UnexpectedToken at the current token and unwinds to the statement loop. */
  private fail(expected: string): never {
    const t = this.current();
    const found = describeToken(t);
    this.errorAt(t.range, "UnexpectedToken", `Expected ${expected}, found ${found}.`, expected, found);
    throw new ParseFailure();
  }

  private errorAt(range: Range, code: ParseErrorCode, message: string, expected?: string, found?: string): void {
    const err: ParseError = { code, message, range };
    if (expected !== undefined) err.expected = expected;
    if (found !== undefined) err.found = found;
    this.errors.push(err);
  }

  /**
   * A simple statement ends at NEWLINE. Constructs that end with their own
   * block (an inline try_chain initializer) have already consumed a DEDENT.
   */
  private endStatement(): void {
    if (this.previous().kind === TokenKind.DEDENT) return;
    if (this.match(TokenKind.NEWLINE)) return;
    if (this.is(TokenKind.DEDENT) || this.isAtEnd()) return;
    this.fail("end of line");
  }

  /**
   * Skips to the next NEWLINE at the current nesting level, then over the
   * indented block that belongs to the broken line, if there is one.
   */
  private synchronize(): void {
    let depth = 0;

    while (!this.isAtEnd()) {
      const k = this.current().kind;

      if (k === TokenKind.INDENT) {
        depth++;
      } else if (k === TokenKind.DEDENT) {
        if (depth === 0) return;
        depth--;
        if (depth === 0) {
          this.advance();
          return;
        }
      } else if (k === TokenKind.NEWLINE && depth === 0) {
        this.advance();
        if (this.is(TokenKind.INDENT)) this.skipIndentedBlock();
        return;
      }

      this.advance();
    }
  }

  private skipIndentedBlock(): void {
    let depth = 0;
    while (!this.isAtEnd()) {
      const k = this.advance().kind;
      if (k === TokenKind.INDENT) depth++;
      else if (k === TokenKind.DEDENT) {
        depth--;
        if (depth === 0) return;
      }
    }
  }

  private skipNewlines(): void {
    while (this.match(TokenKind.NEWLINE)) {
      // keep consuming
    }
  }
}

/* =========================================================
   Helpers
   ========================================================= */

function clauseRole(kind: TokenKind): TryClauseRole | null {
  if (kind === TokenKind.KW_PRIMARY) return "primary";
  if (kind === TokenKind.KW_SECONDARY) return "secondary";
  if (kind === TokenKind.KW_FALLBACK) return "fallback";
  return null;
}

function clauseOrderProblem(role: TryClauseRole, clauses: TryClause[], sawFallback: boolean): string | null {
  if (sawFallback) return `'${role}' clause cannot follow 'fallback'; fallback must be the last clause.`;
  if (role === "primary" && clauses.length > 0) return "try_chain takes exactly one 'primary' clause.";
  if (role !== "primary" && clauses.length === 0) return `try_chain must start with 'primary', found '${role}'.`;
  return null;
}

function describeToken(t: Token): string {
  switch (t.kind) {
    case TokenKind.NEWLINE:
      return "end of line";
    case TokenKind.INDENT:
      return "indent";
    case TokenKind.DEDENT:
      return "dedent";
    case TokenKind.EOF:
      return "end of file";
    default:
      return `'${t.lexeme}'`;
  }
}

function describeRange(r: Range): string {
  return `expression at ${r.start.line + 1}:${r.start.column + 1}`;
}

function eofToken(): Token {
  const p: Position = { offset: 0, line: 0, column: 0 };
  return { kind: TokenKind.EOF, lexeme: "", range: { start: p, end: p }, literal: null };
}
