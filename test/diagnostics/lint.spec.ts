import { describe, expect, it } from "vitest";

import { check } from "../../src/core/checker";
import { parseSource } from "../../src/core/parser";
import { lintModule, type Diagnostic, type LintOptions } from "../../src/diagnostics";

function lint(source: string, options?: LintOptions): Diagnostic[] {
  const parsed = parseSource(source);
  expect(parsed.errors).toEqual([]);
  const checked = check(parsed.module);
  expect(checked.errors).toEqual([]);
  return lintModule(checked.typed, options);
}

function src(...lines: string[]): string {
  return `${lines.join("\n")}\n`;
}

const VARIABLES = src(
  "func f() -> i32:",
  "    let a = 1",
  "    var b = 2",
  "    var c = 3",
  "    c = 4",
  "    let _d = 5",
  "    return b"
);

describe("lint: variables", () => {
  it("flags unread bindings and vars that are never reassigned", () => {
    const found = lint(VARIABLES);

    expect(found.map((d) => [d.code, d.severity, d.message])).toEqual([
      ["UnusedVariable", "warning", "'a' is never read."],
      ["PreferLet", "info", "'b' is never reassigned."],
      ["UnusedVariable", "warning", "'c' is never read."],
    ]);
    expect(found[0]).toMatchObject({ line: 2, column: 9, hint: "remove it or rename it to '_a'" });
    expect(found[1]?.hint).toBe("declare it with 'let'");
  });

  it("honours rule switches", () => {
    expect(lint(VARIABLES, { unusedVariables: false }).map((d) => d.code)).toEqual(["PreferLet"]);
    expect(lint(VARIABLES, { preferLet: false }).map((d) => d.code)).toEqual(["UnusedVariable", "UnusedVariable"]);
  });

  it("does not report parameters", () => {
    expect(lint(src("func f(unused: i32):", "    pass"))).toEqual([]);
  });
});

describe("lint: unreachable code", () => {
  it("covers every statement after a return", () => {
    const found = lint(src("func f() -> i32:", "    return 1", "    let x = 2", "    return x"));

    expect(found.map((d) => [d.code, d.message, d.line])).toEqual([
      ["UnreachableCode", "Code after 'return' never runs.", 3],
    ]);
    expect(found[0]?.range.end.line).toBe(3);
  });

  it("names the statement that leaves a loop", () => {
    const found = lint(src("func f():", "    while true:", "        break", "        pass"));
    expect(found.map((d) => d.message)).toEqual(["Code after 'break' never runs."]);
  });

  it("can be switched off", () => {
    expect(lint(src("func f() -> i32:", "    return 1", "    pass"), { unreachableCode: false })).toEqual([]);
  });
});
