import { describe, expect, it } from "vitest";

import { parseSource } from "../../src/core/parser";
import { compileSource } from "../../src/language/kestrel.language";
import { getDocumentSymbols } from "../../src/lsp/symbols";

const SOURCE = [
  "module tools.net",
  "import windows.registry as reg",
  "from windows.process import start, terminate as kill",
  "func main(limit: u32) -> status:",
  "    let n = 1",
  "    var total: u32 = 0",
  "    for i in range(limit):",
  "        total += i",
  "    return SUCCESS",
  "",
].join("\n");

describe("document symbols", () => {
  it("outlines the module, its imports and its functions", () => {
    const compiled = compileSource(SOURCE, { codegen: false });
    expect(compiled.diagnostics.filter((d) => d.severity === "error")).toEqual([]);

    const symbols = getDocumentSymbols(compiled.module, compiled.typed);
    expect(symbols.map((s) => [s.name, s.kind, s.detail ?? null])).toEqual([
      ["tools.net", "module", null],
      ["reg", "import", "windows.registry"],
      ["start", "import", "windows.process.start"],
      ["kill", "import", "windows.process.terminate"],
      ["main", "function", "func main(limit: u32) -> status"],
    ]);

    const main = symbols[4];
    expect(main?.selectionRange.start).toMatchObject({ line: 3, column: 5 });
    expect(main?.children?.map((c) => [c.name, c.kind, c.detail ?? null])).toEqual([
      ["limit", "parameter", "u32"],
      ["n", "constant", "i32"],
      ["total", "variable", "u32"],
      ["i", "variable", "u32"],
    ]);
  });

  it("works from the parse tree alone", () => {
    const { module } = parseSource("func f(x: i32):\n    let y = x\n");
    const symbols = getDocumentSymbols(module, null);

    expect(symbols).toHaveLength(1);
    expect(symbols[0]?.detail).toBeUndefined();
    expect(symbols[0]?.children?.map((c) => [c.name, c.detail ?? null])).toEqual([
      ["x", null],
      ["y", null],
    ]);
  });

  it("returns nothing without a module", () => {
    expect(getDocumentSymbols(null, null)).toEqual([]);
  });
});
