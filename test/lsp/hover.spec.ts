import { describe, expect, it } from "vitest";

import { compileSource } from "../../src/language/kestrel.language";
import { getHover, nodePathAt, type HoverResult } from "../../src/lsp/hover";

const SOURCE = [
  "import windows.registry as reg",
  "func add(a: i32, b: i32) -> i32:",
  "    return a + b",
  "@unsafe",
  "func main() -> status:",
  "    let n = add(1, 2)",
  '    return reg.write("k", "v", "d")',
  "",
].join("\n");

const compiled = compileSource(SOURCE, { codegen: false });

function hoverAt(needle: string, delta = 0): HoverResult | null {
  const offset = SOURCE.indexOf(needle);
  if (offset < 0) throw new Error(`'${needle}' not in source`);
  return getHover({ module: compiled.module, typed: compiled.typed, offset: offset + delta });
}

describe("hover", () => {
  it("compiles the fixture without errors", () => {
    expect(compiled.ok).toBe(true);
  });

  it("shows the signature of a called function", () => {
    const h = hoverAt("add(1");
    expect(h?.markdown).toBe("```kestrel\nfunc add(a: i32, b: i32) -> i32\n```");
    expect(h?.range.start.line).toBe(5);
  });

  it("describes parameters and locals", () => {
    expect(hoverAt("a + b")?.markdown).toBe("### a\n\n**Kind:** `param`\n**Type:** `i32`\n**In:** `add`");
    expect(hoverAt("n = add")?.markdown).toBe("### n\n\n**Kind:** `let`\n**Type:** `i32`\n**In:** `main`");
  });

  it("shows the ABI signature and safety rule of an external call", () => {
    expect(hoverAt("write(")?.markdown).toBe(
      [
        "```kestrel",
        "windows.registry.write(string, string, string) -> status",
        "```",
        "",
        "**Symbol:** `kst_registry_write`",
        "**Safety:** logged (registry): Write a registry value",
      ].join("\n")
    );
  });

  it("documents decorators", () => {
    expect(hoverAt("@unsafe", 1)?.markdown).toBe(
      "### @unsafe\n\nTreat this function body as UNSAFE regardless of the module mode.\n\n**Options:** none"
    );
  });

  it("falls back to the type of an expression", () => {
    expect(hoverAt("1, 2")?.markdown).toBe("`i32`");
  });

  it("names the status code of a literal returned as a status", () => {
    const source = "func f() -> status:\n    return 5\n";
    const result = compileSource(source, { codegen: false });
    const h = getHover({ module: result.module, typed: result.typed, offset: source.indexOf("5") });
    expect(h?.markdown).toBe("`status` (`INVALID_PARAMETER`)");

    const unnamed = "func g() -> status:\n    return 99\n";
    const other = compileSource(unnamed, { codegen: false });
    expect(getHover({ module: other.module, typed: other.typed, offset: unnamed.indexOf("99") })?.markdown).toBe("`status`");
  });

  it("returns null without a module or outside it", () => {
    expect(getHover({ module: null, typed: null, offset: 0 })).toBeNull();
    expect(hoverAt("reg.write", 10_000)).toBeNull();
  });
});

describe("nodePathAt", () => {
  it("walks from the module down to the innermost node", () => {
    const module = compiled.module;
    if (!module) throw new Error("no module");
    const kinds = nodePathAt(module, SOURCE.indexOf("a + b")).map((n) => n.kind);
    expect(kinds).toEqual(["Module", "FunctionDecl", "Block", "Return", "BinaryOp", "Identifier"]);
  });
});
