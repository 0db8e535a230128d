// src/lsp/convert.ts
//
// Compiler values -> LSP protocol values.
// Kept apart from server.ts so it can be exercised without a connection.

import {
  CompletionItemKind,
  DiagnosticSeverity,
  SymbolKind,
  type CompletionItem as LspCompletionItem,
  type Diagnostic as LspDiagnostic,
  type DocumentSymbol,
  type Range as LspRange,
} from "vscode-languageserver";
import type { TextDocument } from "vscode-languageserver-textdocument";

import type { Range } from "../core/ast";
import type { Diagnostic, Severity } from "../diagnostics/errors";
import type { CompletionItem, CompletionKind } from "./completion";
import type { KestrelSymbol, KestrelSymbolKind } from "./symbols";

export const DIAGNOSTIC_SOURCE = "kestrel";

/* =========================================================
   Ranges
   ========================================================= */

export function toLspRange(r: Range): LspRange {
  return {
    start: { line: Math.max(0, r.start.line), character: Math.max(0, r.start.column) },
    end: { line: Math.max(0, r.end.line), character: Math.max(0, r.end.column) },
  };
}

/** Round-trips through offsets so a stale range never points past the document. */
export function clampRange(r: Range, doc: TextDocument): LspRange {
  const raw = toLspRange(r);
  return {
    start: doc.positionAt(doc.offsetAt(raw.start)),
    end: doc.positionAt(doc.offsetAt(raw.end)),
  };
}

/* =========================================================
   Diagnostics
   ========================================================= */

export function toLspDiagnostic(d: Diagnostic, doc: TextDocument): LspDiagnostic {
  return {
    severity: toLspSeverity(d.severity),
    range: clampRange(d.range, doc),
    message: d.hint ? `${d.message}\nHint: ${d.hint}` : d.message,
    code: d.code,
    source: `${DIAGNOSTIC_SOURCE}/${d.stage}`,
  };
}

export function toLspSeverity(sev: Severity): DiagnosticSeverity {
  switch (sev) {
    case "error":
      return DiagnosticSeverity.Error;
    case "warning":
      return DiagnosticSeverity.Warning;
    case "info":
      return DiagnosticSeverity.Information;
  }
}

/* =========================================================
   Completions
   ========================================================= */

export function toLspCompletionItem(item: CompletionItem): LspCompletionItem {
  return {
    label: item.label,
    kind: toLspCompletionKind(item.kind),
    detail: item.detail,
    documentation: item.documentation,
    insertText: item.insertText ?? item.label,
    sortText: item.sortText,
  };
}

export function toLspCompletionKind(kind: CompletionKind): CompletionItemKind {
  switch (kind) {
    case "keyword":
      return CompletionItemKind.Keyword;
    case "type":
      return CompletionItemKind.TypeParameter;
    case "module":
      return CompletionItemKind.Module;
    case "function":
      return CompletionItemKind.Function;
    case "constant":
      return CompletionItemKind.Constant;
    case "decorator":
      return CompletionItemKind.Property;
    case "variable":
      return CompletionItemKind.Variable;
  }
}

/* =========================================================
   Document symbols
   ========================================================= */

export function toLspDocumentSymbol(sym: KestrelSymbol): DocumentSymbol {
  return {
    name: sym.name,
    kind: toLspSymbolKind(sym.kind),
    range: toLspRange(sym.range),
    selectionRange: toLspRange(sym.selectionRange),
    detail: sym.detail,
    children: sym.children?.map(toLspDocumentSymbol),
  };
}

export function toLspSymbolKind(kind: KestrelSymbolKind): SymbolKind {
  switch (kind) {
    case "module":
      return SymbolKind.Module;
    case "import":
      return SymbolKind.Namespace;
    case "function":
      return SymbolKind.Function;
    case "parameter":
      return SymbolKind.Variable;
    case "variable":
      return SymbolKind.Variable;
    case "constant":
      return SymbolKind.Constant;
  }
}
