import { describe, expect, it } from "vitest";

import { tokenize, TokenKind, type Token } from "../../src/core/lexer";

function kinds(tokens: Token[]): TokenKind[] {
  return tokens.map((t) => t.kind);
}

function count(tokens: Token[], kind: TokenKind): number {
  return tokens.filter((t) => t.kind === kind).length;
}

describe("lexer: indentation", () => {
  it("wraps a function body in INDENT/DEDENT", () => {
    const { tokens, errors } = tokenize("func f():\n    return 1\n");

    expect(errors).toEqual([]);
    expect(kinds(tokens)).toEqual([
      TokenKind.KW_FUNC,
      TokenKind.IDENTIFIER,
      TokenKind.LPAREN,
      TokenKind.RPAREN,
      TokenKind.COLON,
      TokenKind.NEWLINE,
      TokenKind.INDENT,
      TokenKind.KW_RETURN,
      TokenKind.INT,
      TokenKind.NEWLINE,
      TokenKind.DEDENT,
      TokenKind.EOF,
    ]);
  });

  it("balances nested blocks and closes them at end of file", () => {
    const { tokens, errors } = tokenize("func f():\n    if x:\n        pass");

    expect(errors).toEqual([]);
    expect(count(tokens, TokenKind.INDENT)).toBe(2);
    expect(count(tokens, TokenKind.DEDENT)).toBe(2);
    // The last line has no newline of its own; one is synthesized.
    expect(kinds(tokens).slice(-4)).toEqual([TokenKind.NEWLINE, TokenKind.DEDENT, TokenKind.DEDENT, TokenKind.EOF]);
  });

  it("ignores blank and comment-only lines", () => {
    const { tokens } = tokenize("# header\n\nlet x = 1 # trailing\n");
    expect(kinds(tokens)).toEqual([
      TokenKind.KW_LET,
      TokenKind.IDENTIFIER,
      TokenKind.ASSIGN,
      TokenKind.INT,
      TokenKind.NEWLINE,
      TokenKind.EOF,
    ]);
  });

  it("reports an unindent that matches no outer level and stays balanced", () => {
    const { tokens, errors } = tokenize("func f():\n        a\n    b\n");

    expect(errors).toHaveLength(1);
    expect(errors[0]?.code).toBe("InconsistentIndentation");
    expect(errors[0]?.message).toBe("Unindent to column 4 does not match any outer indentation level.");
    expect(errors[0]?.range.start.line).toBe(2);
    expect(count(tokens, TokenKind.INDENT)).toBe(count(tokens, TokenKind.DEDENT));
  });

  it("does not emit NEWLINE inside brackets", () => {
    const { tokens } = tokenize("f(1,\n  2)\n");
    expect(kinds(tokens)).toEqual([
      TokenKind.IDENTIFIER,
      TokenKind.LPAREN,
      TokenKind.INT,
      TokenKind.COMMA,
      TokenKind.INT,
      TokenKind.RPAREN,
      TokenKind.NEWLINE,
      TokenKind.EOF,
    ]);
  });

  it("counts a tab as four columns", () => {
    const { tokens, errors } = tokenize("func f():\n\tpass\n    pass\n");
    expect(errors).toEqual([]);
    expect(count(tokens, TokenKind.INDENT)).toBe(1);
  });
});

describe("lexer: literals", () => {
  it("decodes hex, binary and suffixed integers", () => {
    const { tokens, errors } = tokenize("0x1F 0b101 1_000u8");
    expect(errors).toEqual([]);
    expect(tokens.slice(0, 3).map((t) => t.literal)).toEqual([
      { type: "int", value: 31n, suffix: null },
      { type: "int", value: 5n, suffix: null },
      { type: "int", value: 1000n, suffix: "u8" },
    ]);
  });

  it("reads floats, including an integer with a float suffix", () => {
    const { tokens } = tokenize("2.5f32 3f64 1e3");
    expect(kinds(tokens).slice(0, 3)).toEqual([TokenKind.FLOAT, TokenKind.FLOAT, TokenKind.FLOAT]);
    expect(tokens[0]?.literal).toEqual({ type: "float", value: 2.5, suffix: "f32" });
    expect(tokens[1]?.literal).toEqual({ type: "float", value: 3, suffix: "f64" });
    expect(tokens[2]?.literal).toEqual({ type: "float", value: 1000, suffix: null });
  });

  it("reads `1..5` as a range, not a float", () => {
    const { tokens } = tokenize("1..5");
    expect(kinds(tokens).slice(0, 3)).toEqual([TokenKind.INT, TokenKind.DOTDOT, TokenKind.INT]);
  });

  it("rejects an unknown numeric suffix", () => {
    const { errors } = tokenize("12abc");
    expect(errors).toHaveLength(1);
    expect(errors[0]?.code).toBe("InvalidCharacter");
    expect(errors[0]?.message).toBe("Invalid numeric literal '12abc'.");
  });

  it("decodes escapes in strings", () => {
    const { tokens } = tokenize('"a\\tb"');
    expect(tokens[0]?.literal).toEqual({ type: "string", value: "a\tb" });
  });

  it("keeps a token for an unterminated string", () => {
    const { tokens, errors } = tokenize('"abc\n');
    expect(errors.map((e) => e.message)).toEqual(["Unterminated string literal."]);
    expect(tokens[0]?.kind).toBe(TokenKind.STRING);
    expect(tokens[0]?.literal).toEqual({ type: "string", value: "abc" });
  });

  it("reports an unterminated block comment at its opening", () => {
    const { tokens, errors } = tokenize("let x = 1\n    ### open\nmore\n");

    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({ code: "Unterminated", message: "Unterminated block comment." });
    expect(errors[0]?.range.start).toEqual({ offset: 14, line: 1, column: 4 });
    expect(errors[0]?.range.end).toEqual({ offset: 28, line: 3, column: 0 });
    expect(tokens[tokens.length - 1]?.kind).toBe(TokenKind.EOF);
  });

  it("skips block comments", () => {
    const { tokens, errors } = tokenize("### several\nlines ###\nlet x = 1\n");
    expect(errors).toEqual([]);
    expect(tokens[0]?.kind).toBe(TokenKind.KW_LET);
  });
});

describe("lexer: operators and keywords", () => {
  it("prefers the longest operator", () => {
    const { tokens } = tokenize("a ** b -> c <<= d");
    expect(kinds(tokens).slice(0, 8)).toEqual([
      TokenKind.IDENTIFIER,
      TokenKind.POWER,
      TokenKind.IDENTIFIER,
      TokenKind.ARROW,
      TokenKind.IDENTIFIER,
      TokenKind.SHL,
      TokenKind.ASSIGN,
      TokenKind.IDENTIFIER,
    ]);
  });

  it("recognizes try_chain clause keywords", () => {
    const { tokens } = tokenize("try_chain primary secondary fallback");
    expect(kinds(tokens).slice(0, 4)).toEqual([
      TokenKind.KW_TRY_CHAIN,
      TokenKind.KW_PRIMARY,
      TokenKind.KW_SECONDARY,
      TokenKind.KW_FALLBACK,
    ]);
  });

  it("reports a stray character and keeps going", () => {
    const { tokens, errors } = tokenize("let x = $1\n");
    expect(errors.map((e) => e.message)).toEqual(["Unexpected character '$'."]);
    expect(kinds(tokens)).toContain(TokenKind.INT);
  });
});
