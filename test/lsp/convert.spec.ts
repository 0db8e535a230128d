import { describe, expect, it } from "vitest";
import { CompletionItemKind, DiagnosticSeverity, SymbolKind } from "vscode-languageserver";
import { TextDocument } from "vscode-languageserver-textdocument";

import type { Range } from "../../src/core/ast";
import { error, warn } from "../../src/diagnostics/errors";
import {
  clampRange,
  toLspCompletionItem,
  toLspDiagnostic,
  toLspDocumentSymbol,
  toLspRange,
} from "../../src/lsp/convert";

const doc = TextDocument.create("file:///test/main.kst", "kestrel", 1, "func f():\n    pass\n");

function range(line: number, column: number, endLine: number, endColumn: number): Range {
  return {
    start: { line, column, offset: 0 },
    end: { line: endLine, column: endColumn, offset: 0 },
  };
}

describe("convert", () => {
  it("maps ranges to line/character pairs", () => {
    expect(toLspRange(range(1, 4, 1, 8))).toEqual({
      start: { line: 1, character: 4 },
      end: { line: 1, character: 8 },
    });
  });

  it("clamps ranges that run past the document", () => {
    expect(clampRange(range(1, 4, 9, 0), doc)).toEqual({
      start: { line: 1, character: 4 },
      end: { line: 2, character: 0 },
    });
  });

  it("converts diagnostics, appending the hint", () => {
    const d = warn("lint", "UnusedVariable", "'x' is never read.", range(1, 4, 1, 5), "remove it or rename it to '_x'");
    expect(toLspDiagnostic(d, doc)).toEqual({
      severity: DiagnosticSeverity.Warning,
      range: { start: { line: 1, character: 4 }, end: { line: 1, character: 5 } },
      message: "'x' is never read.\nHint: remove it or rename it to '_x'",
      code: "UnusedVariable",
      source: "kestrel/lint",
    });

    const e = error("checker", "UndefinedSymbol", "Unknown name 'y'.", range(0, 0, 0, 1));
    expect(toLspDiagnostic(e, doc)).toMatchObject({ severity: DiagnosticSeverity.Error, message: "Unknown name 'y'." });
  });

  it("converts completion items and document symbols", () => {
    expect(toLspCompletionItem({ label: "SUCCESS", kind: "constant", detail: "status" })).toEqual({
      label: "SUCCESS",
      kind: CompletionItemKind.Constant,
      detail: "status",
      documentation: undefined,
      insertText: "SUCCESS",
      sortText: undefined,
    });

    const sym = toLspDocumentSymbol({
      name: "f",
      kind: "function",
      range: range(0, 0, 1, 8),
      selectionRange: range(0, 5, 0, 6),
      children: [{ name: "x", kind: "parameter", range: range(0, 7, 0, 13), selectionRange: range(0, 7, 0, 8) }],
    });
    expect(sym.kind).toBe(SymbolKind.Function);
    expect(sym.children?.map((c) => [c.name, c.kind])).toEqual([["x", SymbolKind.Variable]]);
  });
});
