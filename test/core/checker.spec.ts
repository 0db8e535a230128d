import { describe, expect, it } from "vitest";

import type { Module } from "../../src/core/ast";
import { check, type CheckResult } from "../../src/core/checker";
import { parseSource } from "../../src/core/parser";
import { typeToString } from "../../src/core/types";

function parse(source: string): Module {
  const { module, errors, lexErrors } = parseSource(source);
  expect(lexErrors).toEqual([]);
  expect(errors).toEqual([]);
  return module;
}

function checkSource(source: string): CheckResult {
  return check(parse(source));
}

function src(...lines: string[]): string {
  return `${lines.join("\n")}\n`;
}

function messages(result: CheckResult): string[] {
  return result.errors.map((e) => e.message);
}

function localType(result: CheckResult, name: string): string | undefined {
  const sym = result.typed.locals.find((s) => s.name === name);
  return sym ? typeToString(sym.type) : undefined;
}

describe("checker: clean programs", () => {
  it("accepts a simple function and records its signature", () => {
    const result = checkSource(src("func add(a: i32, b: i32) -> i32:", "    return a + b"));

    expect(result.errors).toEqual([]);
    const sig = result.typed.signatures.get("add");
    expect(sig?.params.map((p) => typeToString(p.type))).toEqual(["i32", "i32"]);
    expect(sig && typeToString(sig.returns)).toBe("i32");
  });

  it("gives checking the same tree twice the same answer", () => {
    const module = parse(
      src("func f(x: i32) -> i32:", "    let y = x * 2", "    return y + z", "func g():", "    f(1)")
    );

    const first = check(module);
    const second = check(module);

    expect(second.errors).toEqual(first.errors);
    expect([...second.typed.types.values()].map(typeToString)).toEqual([...first.typed.types.values()].map(typeToString));
  });

  it("lets a bare literal take the expected type", () => {
    const result = checkSource(src("func f() -> status:", "    return 5"));
    expect(result.errors).toEqual([]);
  });

  it("types len() as u64", () => {
    const result = checkSource(src("func f():", '    let n = len("abc")'));
    expect(result.errors).toEqual([]);
    expect(localType(result, "n")).toBe("u64");
  });
});

describe("checker: names", () => {
  it("reports one error per undefined name, in every function", () => {
    const result = checkSource(
      src("func a() -> i32:", "    return x", "func b() -> i32:", "    return y + 1", "func c():", "    foo()")
    );

    expect(result.errors.map((e) => e.code)).toEqual(["UndefinedSymbol", "UndefinedSymbol", "UndefinedSymbol"]);
    expect(messages(result)).toEqual(["Unknown name 'x'.", "Unknown name 'y'.", "Unknown function 'foo'."]);
  });

  it("requires an import for qualified external calls", () => {
    const body = ['    return windows.registry.write("k", "v", "d")'];

    const missing = checkSource(src("func f() -> status:", ...body));
    expect(missing.errors).toHaveLength(1);
    expect(missing.errors[0]).toMatchObject({
      code: "UndefinedSymbol",
      message: "'windows.registry.write' is used without an import.",
      hint: "add 'import windows.registry'",
    });

    const imported = checkSource(src("import windows.registry", "func f() -> status:", ...body));
    expect(imported.errors).toEqual([]);
  });

  it("resolves calls through an import alias", () => {
    const result = checkSource(
      src("import windows.registry as reg", "func f() -> status:", '    return reg.write("k", "v", "d")')
    );
    expect(result.errors).toEqual([]);
  });

  it("reports duplicate functions", () => {
    const result = checkSource(src("func f():", "    pass", "func f():", "    pass"));
    expect(result.errors.map((e) => [e.code, e.message])).toEqual([["DuplicateDeclaration", "'f' is already declared."]]);
  });

  it("reports unknown type names", () => {
    const result = checkSource(src("func f(x: word):", "    pass"));
    expect(messages(result)).toEqual(["Unknown type 'word'."]);
  });
});

describe("checker: types", () => {
  it("rejects mixed integer widths", () => {
    const result = checkSource(src("func f(a: i32, b: i64) -> i32:", "    return a + b"));
    expect(result.errors.map((e) => [e.code, e.message])).toEqual([
      ["OperandMismatch", "Operator '+' needs two operands of the same numeric type, got i32 and i64."],
    ]);
  });

  it("checks literal ranges, including negated literals", () => {
    const result = checkSource(src("func f():", "    let b: u8 = 300", "    let n: i8 = -129", "    let ok: i8 = -128"));
    expect(result.errors.map((e) => [e.code, e.message])).toEqual([
      ["LiteralOutOfRange", "300 does not fit in u8."],
      ["LiteralOutOfRange", "-129 does not fit in i8."],
    ]);
  });

  it("checks argument counts of externals", () => {
    const result = checkSource(src("func f():", "    print()"));
    expect(messages(result)).toEqual(["'print' takes 1 argument(s), got 0."]);
  });

  it("rejects @resilient on a function that cannot fail", () => {
    const result = checkSource(src("@resilient", "func f() -> i32:", "    return 1"));
    expect(result.errors.map((e) => [e.code, e.message])).toEqual([
      ["InvalidDecoratorUse", "'@resilient' needs a function that returns a status, got i32."],
    ]);
  });
});

describe("checker: returns and indexing", () => {
  function codes(source: string): string[][] {
    return checkSource(source).errors.map((e) => [e.code, e.message]);
  }

  it("checks the number of returned values", () => {
    expect(codes(src("func s() -> (status, i32):", "    return SUCCESS"))).toEqual([
      ["ReturnArityMismatch", "'s' returns 2 values, got 1."],
    ]);
    expect(codes(src("func u() -> (status, i32):", "    return SUCCESS, 1, 2"))).toEqual([
      ["ReturnArityMismatch", "'u' returns 2 value(s), got 3."],
    ]);
    expect(codes(src("func x():", "    return 1"))).toEqual([
      ["ReturnArityMismatch", "'x' returns nothing but 'return' gives 1 value(s)."],
    ]);
  });

  it("names the position of a mistyped return value", () => {
    expect(codes(src("func t() -> (status, i32):", '    return SUCCESS, "x"'))).toEqual([
      ["ReturnTypeMismatch", "Return value 2 of 't' should be i32, got string."],
    ]);
    expect(codes(src("func v() -> i32:", "    return true"))).toEqual([
      ["ReturnTypeMismatch", "'v' should be i32, got bool."],
    ]);
  });

  it("rejects constant indices past the end of an array or tuple", () => {
    const array = checkSource(src("func w() -> i32:", "    let a = [1, 2, 3]", "    return a[3]"));
    expect(array.errors.map((e) => [e.code, e.message])).toEqual([
      ["IndexOutOfBounds", "Index 3 is out of bounds for array[i32, 3]."],
    ]);
    expect(array.errors[0]?.range.start).toMatchObject({ line: 2, column: 13 });

    expect(codes(src("func y() -> i32:", "    let p = (1, 2)", "    return p[2]"))).toEqual([
      ["IndexOutOfBounds", "Index 2 is out of bounds for (i32, i32)."],
    ]);
  });

  it("leaves in-range and non-constant indices alone", () => {
    expect(codes(src("func z(i: u64) -> i32:", "    let a = [1, 2, 3]", "    return a[2] + a[i]"))).toEqual([]);
  });
});

describe("checker: control flow", () => {
  it("requires a return on every path", () => {
    const result = checkSource(src("func f(x: i32) -> i32:", "    if x > 0:", "        return 1"));
    expect(result.errors.map((e) => [e.code, e.message])).toEqual([
      ["MissingReturn", "'f' must return i32 on every path."],
    ]);
  });

  it("accepts if/else that returns on both branches", () => {
    const result = checkSource(
      src("func f(x: i32) -> i32:", "    if x > 0:", "        return 1", "    else:", "        return 2")
    );
    expect(result.errors).toEqual([]);
  });

  it("rejects assignment to a let binding", () => {
    const result = checkSource(src("func f() -> i32:", "    let x = 1", "    x = 2", "    return x"));
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatchObject({
      code: "AssignToImmutable",
      message: "Cannot assign to 'x': it is declared with 'let'.",
      hint: "declare it with 'var'",
    });
  });

  it("allows assignment to a var binding", () => {
    const result = checkSource(src("func f() -> i32:", "    var x = 1", "    x += 2", "    return x"));
    expect(result.errors).toEqual([]);
  });

  it("requires exhaustive matches", () => {
    const result = checkSource(
      src(
        "func f(x: u8) -> i32:",
        "    match x:",
        "        case 0:",
        "            return 1",
        "        case 1..10:",
        "            return 2",
        "    return 0"
      )
    );
    expect(result.errors.map((e) => [e.code, e.message])).toEqual([
      ["NonExhaustiveMatch", "match on u8 does not cover every value."],
    ]);
  });

  it("reports break outside a loop", () => {
    const result = checkSource(src("func f():", "    break"));
    expect(messages(result)).toEqual(["'break' outside of a loop."]);
  });
});

describe("checker: try_chain", () => {
  it("takes the fallback clause's type", () => {
    const result = checkSource(
      src(
        "func fetch() -> (status, string):",
        '    return SUCCESS, "data"',
        "",
        "func main() -> status:",
        "    let r = try_chain:",
        "        primary: fetch()",
        '        fallback: (GENERIC_ERROR, "none")',
        "    return SUCCESS"
      )
    );

    expect(result.errors).toEqual([]);
    expect(localType(result, "r")).toBe("(status, string)");
  });

  it("reports a clause whose type differs from the fallback", () => {
    const result = checkSource(
      src(
        "func main() -> status:",
        "    let r = try_chain:",
        "        primary: 1",
        '        fallback: "none"',
        "    return SUCCESS"
      )
    );

    expect(result.errors.map((e) => [e.code, e.message])).toEqual([
      ["ClauseTypeMismatch", "The primary clause produces i32, but the fallback produces string."],
    ]);
  });
});
