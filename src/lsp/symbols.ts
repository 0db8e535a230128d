// src/lsp/symbols.ts
//
// Kestrel Document Symbols
// ------------------------
// Outline / breadcrumbs: the module line, imports, and one entry per function
// with its parameters and local bindings as children. Types come from the
// checker when it ran; otherwise entries carry no detail.

import { walkAst, type FunctionDecl, type Identifier, type Module, type Range } from "../core/ast";
import type { TypedModule } from "../core/checker";
import { typeToString } from "../core/types";
import { formatFunction } from "./hover";

export type KestrelSymbolKind = "module" | "import" | "function" | "parameter" | "variable" | "constant";

export type KestrelSymbol = {
  name: string;
  kind: KestrelSymbolKind;
  range: Range;
  selectionRange: Range;
  detail?: string;
  children?: KestrelSymbol[];
};

export function getDocumentSymbols(module: Module | null, typed: TypedModule | null): KestrelSymbol[] {
  if (!module) return [];
  const out: KestrelSymbol[] = [];

  if (module.name) {
    out.push({
      name: module.name.parts.join("."),
      kind: "module",
      range: module.name.range,
      selectionRange: module.name.range,
    });
  }

  for (const imp of module.imports) {
    const path = imp.path.parts.join(".");
    if (imp.kind === "ImportDecl") {
      const alias = imp.alias;
      out.push({
        name: alias ? alias.name : path,
        kind: "import",
        range: imp.range,
        selectionRange: alias ? alias.range : imp.path.range,
        detail: alias ? path : undefined,
      });
      continue;
    }
    for (const item of imp.names) {
      const local = item.alias ?? item.name;
      out.push({
        name: local.name,
        kind: "import",
        range: imp.range,
        selectionRange: local.range,
        detail: `${path}.${item.name.name}`,
      });
    }
  }

  for (const fn of module.functions) out.push(functionSymbol(fn, typed));
  return out;
}

function functionSymbol(fn: FunctionDecl, typed: TypedModule | null): KestrelSymbol {
  const sig = typed?.signatures.get(fn.name.name);
  const children: KestrelSymbol[] = fn.params.map((p) => ({
    name: p.name.name,
    kind: "parameter",
    range: p.range,
    selectionRange: p.name.range,
    detail: detailOf(p.name, typed),
  }));

  walkAst(fn.body, {
    enter(node) {
      if (node.kind === "VarDecl") {
        for (const name of node.names) children.push(localSymbol(name, node.mutable ? "variable" : "constant", node.range, typed));
      } else if (node.kind === "For") {
        children.push(localSymbol(node.variable, "variable", node.variable.range, typed));
      }
    },
  });

  return {
    name: fn.name.name,
    kind: "function",
    range: fn.range,
    selectionRange: fn.name.range,
    detail: sig && sig.decl === fn ? formatFunction(sig) : undefined,
    children,
  };
}

function localSymbol(id: Identifier, kind: KestrelSymbolKind, range: Range, typed: TypedModule | null): KestrelSymbol {
  return { name: id.name, kind, range, selectionRange: id.range, detail: detailOf(id, typed) };
}

function detailOf(id: Identifier, typed: TypedModule | null): string | undefined {
  const sym = typed?.bindings.get(id);
  return sym ? typeToString(sym.type) : undefined;
}
