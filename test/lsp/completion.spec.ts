import { describe, expect, it } from "vitest";

import { parseSource } from "../../src/core/parser";
import { compileSource } from "../../src/language/kestrel.language";
import { getCompletions, type CompletionItem } from "../../src/lsp/completion";

function labels(items: CompletionItem[]): string[] {
  return items.map((i) => i.label);
}

function completeAtEnd(source: string): CompletionItem[] {
  const compiled = compileSource(source, { codegen: false });
  return getCompletions({ source, offset: source.length, module: compiled.module, typed: compiled.typed });
}

describe("completion: contexts", () => {
  it("offers decorators after '@'", () => {
    const items = getCompletions({ source: "@re", offset: 3, module: null, typed: null });
    expect(items).toEqual([
      {
        label: "resilient",
        kind: "decorator",
        detail: "Retry the function while it returns a failure status.",
        insertText: "resilient",
      },
    ]);
  });

  it("lists the members of an external namespace, resolving import aliases", () => {
    const source = "import windows.registry as reg\nfunc f():\n    reg.";
    const { module } = parseSource(source);
    const items = getCompletions({ source, offset: source.length, module, typed: null });

    expect(labels(items)).toEqual(["create_key", "delete_key", "delete_value", "read", "write"]);
    expect(items.find((i) => i.label === "write")?.detail).toBe(
      "windows.registry.write(string, string, string) -> status"
    );
  });

  it("filters members by the typed prefix", () => {
    const source = "func f():\n    windows.registry.wr";
    expect(labels(getCompletions({ source, offset: source.length, module: null, typed: null }))).toEqual(["write"]);
  });

  it("offers sub-namespaces as modules", () => {
    const source = "func f():\n    windows.";
    const items = getCompletions({ source, offset: source.length, module: null, typed: null });
    expect(items.filter((i) => i.kind === "module").map((i) => i.label)).toEqual([
      "kernel",
      "kernel32",
      "process",
      "registry",
    ]);
  });
});

describe("completion: general", () => {
  it("puts locals in scope ahead of keywords", () => {
    const items = completeAtEnd("func f():\n    let count = 1\n    co");
    expect(labels(items)).toEqual(["count", "continue"]);
    expect(items[0]).toMatchObject({ kind: "variable", detail: "let count: i32" });
  });

  it("includes unqualified runtime functions and keywords", () => {
    expect(labels(completeAtEnd("func f():\n    pr"))).toEqual(["print", "println", "primary"]);
  });

  it("includes status constants and module functions", () => {
    const items = completeAtEnd("func helper():\n    pass\nfunc f() -> status:\n    return ");
    const byLabel = new Map(items.map((i) => [i.label, i]));
    expect(byLabel.get("SUCCESS")).toMatchObject({ kind: "constant", detail: "status" });
    expect(byLabel.get("helper")).toMatchObject({ kind: "function", detail: "func helper()" });
    expect(byLabel.get("i32")?.kind).toBe("type");
  });

  it("caps the number of items", () => {
    const items = getCompletions({ source: "", offset: 0, module: null, typed: null, maxItems: 5 });
    expect(items).toHaveLength(5);
  });
});
