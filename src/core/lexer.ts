// src/core/lexer.ts
//
// Kestrel Lexer (Tokenizer)
// -------------------------
// Converts raw source text into a stream of tokens with precise source ranges.
//
// Indentation is significant. The lexer keeps a stack of indentation widths and
// synthesizes NEWLINE / INDENT / DEDENT tokens so the parser sees explicit blocks:
//
//   func f():            FUNC IDENT ( ) : NEWLINE
//       return 1         INDENT RETURN INT NEWLINE
//                        DEDENT EOF
//
// Notes:
// - Blank lines and comment-only lines produce no tokens at all.
// - Comments: `# line` and `### block ###`.
// - A tab in leading indentation counts as 4 columns.
// - Inside ( ) and [ ] newlines and indentation are ignored.
// - Numbers: 42, 0xFF, 0b1010, 1_000, 3.14, 1e9, with optional suffix (10u8, 2.5f32).
//   The lexer only decides int vs float; widths are the checker's business.
// - Errors are collected; lexing always continues to EOF.

import type { Position, Range } from "./ast";

/* =========================================================
   Token Kinds
   ========================================================= */

export enum TokenKind {
  // Meta / structure
  EOF = "EOF",
  NEWLINE = "NEWLINE",
  INDENT = "INDENT",
  DEDENT = "DEDENT",

  // Literals
  IDENTIFIER = "IDENTIFIER",
  INT = "INT",
  FLOAT = "FLOAT",
  STRING = "STRING",

  // Keywords
  KW_FUNC = "KW_FUNC",
  KW_LET = "KW_LET",
  KW_VAR = "KW_VAR",
  KW_IF = "KW_IF",
  KW_ELIF = "KW_ELIF",
  KW_ELSE = "KW_ELSE",
  KW_WHILE = "KW_WHILE",
  KW_FOR = "KW_FOR",
  KW_IN = "KW_IN",
  KW_MATCH = "KW_MATCH",
  KW_CASE = "KW_CASE",
  KW_RETURN = "KW_RETURN",
  KW_IMPORT = "KW_IMPORT",
  KW_FROM = "KW_FROM",
  KW_AS = "KW_AS",
  KW_MODULE = "KW_MODULE",
  KW_TRY_CHAIN = "KW_TRY_CHAIN",
  KW_PRIMARY = "KW_PRIMARY",
  KW_SECONDARY = "KW_SECONDARY",
  KW_FALLBACK = "KW_FALLBACK",
  KW_AND = "KW_AND",
  KW_OR = "KW_OR",
  KW_NOT = "KW_NOT",
  KW_PASS = "KW_PASS",
  KW_BREAK = "KW_BREAK",
  KW_CONTINUE = "KW_CONTINUE",
  TRUE = "TRUE",
  FALSE = "FALSE",

  // Operators
  PLUS = "PLUS",
  MINUS = "MINUS",
  STAR = "STAR",
  SLASH = "SLASH",
  PERCENT = "PERCENT",
  POWER = "POWER", // **
  EQ = "EQ", // ==
  NEQ = "NEQ", // !=
  LT = "LT",
  LTE = "LTE",
  GT = "GT",
  GTE = "GTE",
  AMP = "AMP",
  PIPE = "PIPE",
  CARET = "CARET",
  TILDE = "TILDE",
  SHL = "SHL",
  SHR = "SHR",
  ASSIGN = "ASSIGN",
  PLUS_ASSIGN = "PLUS_ASSIGN",
  MINUS_ASSIGN = "MINUS_ASSIGN",
  STAR_ASSIGN = "STAR_ASSIGN",
  SLASH_ASSIGN = "SLASH_ASSIGN",
  PERCENT_ASSIGN = "PERCENT_ASSIGN",
  AMP_ASSIGN = "AMP_ASSIGN",
  PIPE_ASSIGN = "PIPE_ASSIGN",
  CARET_ASSIGN = "CARET_ASSIGN",
  ARROW = "ARROW", // ->
  DOTDOT = "DOTDOT", // ..

  // Punctuation
  LPAREN = "LPAREN",
  RPAREN = "RPAREN",
  LBRACKET = "LBRACKET",
  RBRACKET = "RBRACKET",
  COMMA = "COMMA",
  COLON = "COLON",
  DOT = "DOT",
  AT = "AT",
}

/* =========================================================
   Token Types
   ========================================================= */

export type LiteralValue =
  | { type: "int"; value: bigint; suffix: string | null }
  | { type: "float"; value: number; suffix: string | null }
  | { type: "string"; value: string };

export type Token = {
  kind: TokenKind;
  lexeme: string;
  range: Range;
  /** Decoded value for INT / FLOAT / STRING tokens, null otherwise. */
  literal: LiteralValue | null;
};

/* =========================================================
   Lexer Error
   ========================================================= */

export type LexerErrorCode = "Unterminated" | "InvalidCharacter" | "InconsistentIndentation";

export type LexerError = {
  code: LexerErrorCode;
  message: string;
  range: Range;
};

export type LexResult = {
  tokens: Token[];
  errors: LexerError[];
};

export type LexerOptions = {
  /** Columns a tab counts for in leading indentation. Default: 4 */
  tabWidth?: number;
};

export const DEFAULT_LEXER_OPTIONS: Required<LexerOptions> = {
  tabWidth: 4,
};

const NUMERIC_SUFFIXES = new Set(["i8", "i16", "i32", "i64", "u8", "u16", "u32", "u64", "f32", "f64"]);

/** Multi-character operators, longest first. */
const MULTI_CHAR_OPERATORS: Array<[string, TokenKind]> = [
  ["**", TokenKind.POWER],
  ["->", TokenKind.ARROW],
  ["..", TokenKind.DOTDOT],
  ["==", TokenKind.EQ],
  ["!=", TokenKind.NEQ],
  ["<=", TokenKind.LTE],
  [">=", TokenKind.GTE],
  ["<<", TokenKind.SHL],
  [">>", TokenKind.SHR],
  ["+=", TokenKind.PLUS_ASSIGN],
  ["-=", TokenKind.MINUS_ASSIGN],
  ["*=", TokenKind.STAR_ASSIGN],
  ["/=", TokenKind.SLASH_ASSIGN],
  ["%=", TokenKind.PERCENT_ASSIGN],
  ["&=", TokenKind.AMP_ASSIGN],
  ["|=", TokenKind.PIPE_ASSIGN],
  ["^=", TokenKind.CARET_ASSIGN],
];

type IndentLevel = {
  width: number;
  /** Pushed while recovering from a bad dedent; popping it emits no DEDENT. */
  phantom: boolean;
};

/* =========================================================
   Core Lexer
   ========================================================= */

export class Lexer {
  private readonly src: string;
  private readonly opts: Required<LexerOptions>;

  private i = 0; // offset
  private line = 0; // 0-based
  private col = 0; // 0-based

  private atLineStart = true;
  private nesting = 0; // ( and [ depth
  private readonly indents: IndentLevel[] = [{ width: 0, phantom: false }];

  private readonly tokens: Token[] = [];
  private readonly errors: LexerError[] = [];

  constructor(source: string, options?: LexerOptions) {
    this.src = source;
    this.opts = { ...DEFAULT_LEXER_OPTIONS, ...(options ?? {}) };
  }

  public lex(): LexResult {
    while (!this.isEOF()) {
      if (this.atLineStart && this.nesting === 0) {
        this.lexLineStart();
        continue;
      }

      const c = this.peek();

      if (c === "\n") {
        this.lexNewline();
        continue;
      }

      if (c === " " || c === "\t" || c === "\r") {
        this.advance();
        continue;
      }

      if (c === "#") {
        this.skipComment();
        continue;
      }

      if (c === "'" || c === '"') {
        this.lexString(c);
        continue;
      }

      if (isDigit(c)) {
        this.lexNumber();
        continue;
      }

      if (isIdentStart(c)) {
        this.lexIdentifierOrKeyword();
        continue;
      }

      if (this.lexOperatorOrPunct()) continue;

      const start = this.position();
      this.advance();
      this.addError("InvalidCharacter", `Unexpected character '${printable(c)}'.`, start, this.position());
    }

    this.finish();
    return { tokens: this.tokens, errors: this.errors };
  }

  /* =========================================================
     Basics
     ========================================================= */

  private isEOF(): boolean {
    return this.i >= this.src.length;
  }

  private peek(ahead = 0): string {
    const idx = this.i + ahead;
    if (idx < 0 || idx >= this.src.length) return "\0";
    return this.src.charAt(idx);
  }

  private advance(): string {
    const c = this.peek();
    this.i++;

    if (c === "\n") {
      this.line++;
      this.col = 0;
    } else {
      this.col++;
    }

    return c;
  }

  private position(): Position {
    return { offset: this.i, line: this.line, column: this.col };
  }

  private push(kind: TokenKind, start: Position, literal: LiteralValue | null = null): void {
    const end = this.position();
    this.tokens.push({
      kind,
      lexeme: this.src.slice(start.offset, end.offset),
      range: { start, end },
      literal,
    });
  }

  private pushSynthetic(kind: TokenKind, at: Position): void {
    this.tokens.push({ kind, lexeme: "", range: { start: at, end: at }, literal: null });
  }

  private addError(code: LexerErrorCode, message: string, start: Position, end: Position): void {
    this.errors.push({ code, message, range: { start, end } });
  }

  /* =========================================================
     Indentation
     ========================================================= */

  private lexLineStart(): void {
    let width = 0;
    while (this.peek() === " " || this.peek() === "\t") {
      width += this.advance() === "\t" ? this.opts.tabWidth : 1;
    }

    // Comment-only and blank lines contribute nothing.
    while (this.peek() === "#") {
      this.skipComment();
      while (this.peek() === " " || this.peek() === "\t") this.advance();
    }

    const c = this.peek();
    if (c === "\r" && this.peek(1) === "\n") {
      this.advance();
    }
    if (this.peek() === "\n") {
      this.advance();
      return;
    }
    if (this.isEOF()) return;

    this.applyIndentation(width);
    this.atLineStart = false;
  }

  private applyIndentation(width: number): void {
    const at = this.position();
    const top = this.currentIndent();

    if (width > top) {
      this.indents.push({ width, phantom: false });
      this.pushSynthetic(TokenKind.INDENT, at);
      return;
    }

    while (width < this.currentIndent()) {
      const popped = this.indents.pop();
      if (popped && !popped.phantom) this.pushSynthetic(TokenKind.DEDENT, at);
    }

    if (width !== this.currentIndent()) {
      const lineStart = { offset: at.offset - at.column, line: at.line, column: 0 };
      this.addError(
        "InconsistentIndentation",
        `Unindent to column ${width} does not match any outer indentation level.`,
        lineStart,
        at
      );
      this.indents.push({ width, phantom: true });
    }
  }

  private currentIndent(): number {
    const top = this.indents[this.indents.length - 1];
    return top ? top.width : 0;
  }

  private lexNewline(): void {
    const start = this.position();
    this.advance();

    if (this.nesting > 0) return;

    this.tokens.push({
      kind: TokenKind.NEWLINE,
      lexeme: "\n",
      range: { start, end: this.position() },
      literal: null,
    });
    this.atLineStart = true;
  }

  private finish(): void {
    const at = this.position();

    if (!this.atLineStart) {
      this.pushSynthetic(TokenKind.NEWLINE, at);
    }

    while (this.indents.length > 1) {
      const popped = this.indents.pop();
      if (popped && !popped.phantom) this.pushSynthetic(TokenKind.DEDENT, at);
    }

    this.pushSynthetic(TokenKind.EOF, at);
  }

  /* =========================================================
     Comments
     ========================================================= */

  private skipComment(): void {
    if (this.peek(1) === "#" && this.peek(2) === "#") {
      this.skipBlockComment();
      return;
    }

    while (!this.isEOF() && this.peek() !== "\n") this.advance();
  }

  private skipBlockComment(): void {
    const start = this.position();
    this.advance();
    this.advance();
    this.advance();

    while (!this.isEOF()) {
      if (this.peek() === "#" && this.peek(1) === "#" && this.peek(2) === "#") {
        this.advance();
        this.advance();
        this.advance();
        return;
      }
      this.advance();
    }

    this.addError("Unterminated", "Unterminated block comment.", start, this.position());
  }

  /* =========================================================
     Strings
     ========================================================= */

  private lexString(quote: "'" | '"'): void {
    const start = this.position();
    this.advance(); // opening quote

    let value = "";

    while (!this.isEOF()) {
      const c = this.peek();

      if (c === "\n") break;

      if (c === quote) {
        this.advance();
        this.push(TokenKind.STRING, start, { type: "string", value });
        return;
      }

      if (c === "\\") {
        this.advance();
        if (this.isEOF() || this.peek() === "\n") break;
        const esc = this.advance();
        value += decodeEscape(esc) ?? esc;
        continue;
      }

      value += this.advance();
    }

    this.addError("Unterminated", "Unterminated string literal.", start, this.position());
    // Keep a token so the parser doesn't cascade on the missing operand.
    this.push(TokenKind.STRING, start, { type: "string", value });
  }

  /* =========================================================
     Numbers
     ========================================================= */

  private lexNumber(): void {
    const start = this.position();

    if (this.peek() === "0" && (this.peek(1) === "x" || this.peek(1) === "X")) {
      this.advance();
      this.advance();
      const digits = this.readWhile(isHexDigit);
      this.finishInt(start, "0x", digits, false);
      return;
    }

    if (this.peek() === "0" && (this.peek(1) === "b" || this.peek(1) === "B")) {
      this.advance();
      this.advance();
      const digits = this.readWhile((c) => c === "0" || c === "1" || c === "_");
      this.finishInt(start, "0b", digits, false);
      return;
    }

    let text = this.readWhile((c) => isDigit(c) || c === "_");
    let isFloat = false;

    // `1..5` is a range, not a float.
    if (this.peek() === "." && isDigit(this.peek(1))) {
      isFloat = true;
      text += this.advance();
      text += this.readWhile((c) => isDigit(c) || c === "_");
    }

    if ((this.peek() === "e" || this.peek() === "E") && this.exponentFollows()) {
      isFloat = true;
      text += this.advance();
      if (this.peek() === "+" || this.peek() === "-") text += this.advance();
      text += this.readWhile(isDigit);
    }

    if (isFloat) {
      const suffix = this.readSuffix(start);
      this.push(TokenKind.FLOAT, start, { type: "float", value: Number(stripUnderscores(text)), suffix });
      return;
    }

    this.finishInt(start, "", text, true);
  }

  private finishInt(start: Position, prefix: string, digits: string, allowFloatSuffix: boolean): void {
    const clean = stripUnderscores(digits);
    if (clean.length === 0) {
      this.addError("InvalidCharacter", "Numeric literal has no digits.", start, this.position());
      this.push(TokenKind.INT, start, { type: "int", value: 0n, suffix: null });
      return;
    }

    const suffix = this.readSuffix(start);
    if (suffix !== null && suffix.startsWith("f")) {
      if (allowFloatSuffix) {
        this.push(TokenKind.FLOAT, start, { type: "float", value: Number(clean), suffix });
        return;
      }
    }

    this.push(TokenKind.INT, start, { type: "int", value: BigInt(prefix + clean), suffix });
  }

  private exponentFollows(): boolean {
    const n = this.peek(1);
    if (isDigit(n)) return true;
    return (n === "+" || n === "-") && isDigit(this.peek(2));
  }

  private readSuffix(start: Position): string | null {
    if (!isIdentStart(this.peek())) return null;

    const suffixStart = this.position();
    const suffix = this.readWhile(isIdentPart);
    if (NUMERIC_SUFFIXES.has(suffix)) return suffix;

    this.addError(
      "InvalidCharacter",
      `Invalid numeric literal '${this.src.slice(start.offset, this.i)}'.`,
      suffixStart,
      this.position()
    );
    return null;
  }

  private readWhile(pred: (c: string) => boolean): string {
    let out = "";
    while (!this.isEOF() && pred(this.peek())) out += this.advance();
    return out;
  }

  /* =========================================================
     Identifiers / keywords
     ========================================================= */

  private lexIdentifierOrKeyword(): void {
    const start = this.position();
    const text = this.readWhile(isIdentPart);
    this.push(keywordKind(text) ?? TokenKind.IDENTIFIER, start);
  }

  /* =========================================================
     Operators / punctuation
     ========================================================= */

  private lexOperatorOrPunct(): boolean {
    const start = this.position();
    const pair = this.peek() + this.peek(1);

    for (const [text, kind] of MULTI_CHAR_OPERATORS) {
      if (pair === text) {
        this.advance();
        this.advance();
        this.push(kind, start);
        return true;
      }
    }

    const kind = singleCharKind(this.peek());
    if (kind === null) return false;

    this.advance();
    if (kind === TokenKind.LPAREN || kind === TokenKind.LBRACKET) this.nesting++;
    if ((kind === TokenKind.RPAREN || kind === TokenKind.RBRACKET) && this.nesting > 0) this.nesting--;
    this.push(kind, start);
    return true;
  }
}

/* =========================================================
   Public helpers
   ========================================================= */

export function tokenize(source: string, options?: LexerOptions): LexResult {
  return new Lexer(source, options).lex();
}

/* =========================================================
   Keyword map
   ========================================================= */

function keywordKind(text: string): TokenKind | null {
  switch (text) {
    case "func":
      return TokenKind.KW_FUNC;
    case "let":
      return TokenKind.KW_LET;
    case "var":
      return TokenKind.KW_VAR;

    case "if":
      return TokenKind.KW_IF;
    case "elif":
      return TokenKind.KW_ELIF;
    case "else":
      return TokenKind.KW_ELSE;
    case "while":
      return TokenKind.KW_WHILE;
    case "for":
      return TokenKind.KW_FOR;
    case "in":
      return TokenKind.KW_IN;
    case "match":
      return TokenKind.KW_MATCH;
    case "case":
      return TokenKind.KW_CASE;
    case "return":
      return TokenKind.KW_RETURN;
    case "pass":
      return TokenKind.KW_PASS;
    case "break":
      return TokenKind.KW_BREAK;
    case "continue":
      return TokenKind.KW_CONTINUE;

    case "import":
      return TokenKind.KW_IMPORT;
    case "from":
      return TokenKind.KW_FROM;
    case "as":
      return TokenKind.KW_AS;
    case "module":
      return TokenKind.KW_MODULE;

    case "try_chain":
      return TokenKind.KW_TRY_CHAIN;
    case "primary":
      return TokenKind.KW_PRIMARY;
    case "secondary":
      return TokenKind.KW_SECONDARY;
    case "fallback":
      return TokenKind.KW_FALLBACK;

    case "and":
      return TokenKind.KW_AND;
    case "or":
      return TokenKind.KW_OR;
    case "not":
      return TokenKind.KW_NOT;

    case "true":
      return TokenKind.TRUE;
    case "false":
      return TokenKind.FALSE;

    default:
      return null;
  }
}

function singleCharKind(c: string): TokenKind | null {
  switch (c) {
    case "+":
      return TokenKind.PLUS;
    case "-":
      return TokenKind.MINUS;
    case "*":
      return TokenKind.STAR;
    case "/":
      return TokenKind.SLASH;
    case "%":
      return TokenKind.PERCENT;
    case "<":
      return TokenKind.LT;
    case ">":
      return TokenKind.GT;
    case "=":
      return TokenKind.ASSIGN;
    case "&":
      return TokenKind.AMP;
    case "|":
      return TokenKind.PIPE;
    case "^":
      return TokenKind.CARET;
    case "~":
      return TokenKind.TILDE;
    case "(":
      return TokenKind.LPAREN;
    case ")":
      return TokenKind.RPAREN;
    case "[":
      return TokenKind.LBRACKET;
    case "]":
      return TokenKind.RBRACKET;
    case ",":
      return TokenKind.COMMA;
    case ":":
      return TokenKind.COLON;
    case ".":
      return TokenKind.DOT;
    case "@":
      return TokenKind.AT;
    default:
      return null;
  }
}

/* =========================================================
   Character utilities
   ========================================================= */

function isDigit(c: string): boolean {
  return c >= "0" && c <= "9";
}

function isHexDigit(c: string): boolean {
  return isDigit(c) || (c >= "a" && c <= "f") || (c >= "A" && c <= "F") || c === "_";
}

function isIdentStart(c: string): boolean {
  return (c >= "a" && c <= "z") || (c >= "A" && c <= "Z") || c === "_";
}

function isIdentPart(c: string): boolean {
  return isIdentStart(c) || isDigit(c);
}

function stripUnderscores(s: string): string {
  return s.split("_").join("");
}

function decodeEscape(c: string): string | null {
  switch (c) {
    case "n":
      return "\n";
    case "t":
      return "\t";
    case "r":
      return "\r";
    case "0":
      return "\0";
    case "'":
      return "'";
    case '"':
      return '"';
    case "\\":
      return "\\";
    default:
      return null;
  }
}

function printable(c: string): string {
  if (c === "\n") return "\\n";
  if (c === "\t") return "\\t";
  if (c === "\r") return "\\r";
  if (c === "\0") return "\\0";
  return c;
}
