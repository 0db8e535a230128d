// src/lsp/completion.ts
//
// Kestrel Completions Engine
// --------------------------
// Looks at the text left of the cursor to pick a context:
//   @|            decorators
//   a.b.|         members of an external namespace (import aliases resolved)
//   anything else keywords, types, status constants, builtins, functions,
//                 locals in scope, unqualified runtime functions
// and filters by the word being typed.
//
// Exports:
//   - getCompletions(req): CompletionItem[]

import type { Module } from "../core/ast";
import type { TypedModule } from "../core/checker";
import { DECORATOR_REGISTRY, isDecoratorName } from "../core/decorators";
import { defaultExternals, formatSignature, type ExternalTable } from "../core/externals";
import { STATUS_NAMES } from "../core/status";
import { PRIMITIVE_KINDS, typeToString } from "../core/types";
import { formatFunction } from "./hover";

export type CompletionKind = "keyword" | "type" | "variable" | "constant" | "function" | "module" | "decorator";

export type CompletionItem = {
  label: string;
  kind: CompletionKind;
  detail?: string;
  documentation?: string;
  insertText?: string;
  sortText?: string;
};

export type CompletionRequest = {
  source: string;
  offset: number;
  module: Module | null;
  typed: TypedModule | null;
  externals?: ExternalTable;
  maxItems?: number;
};

export const KEYWORDS: readonly string[] = [
  "func",
  "let",
  "var",
  "if",
  "elif",
  "else",
  "while",
  "for",
  "in",
  "match",
  "case",
  "return",
  "pass",
  "break",
  "continue",
  "import",
  "from",
  "as",
  "module",
  "try_chain",
  "primary",
  "secondary",
  "fallback",
  "and",
  "or",
  "not",
  "true",
  "false",
];

const COMPOSITE_TYPES = ["ptr", "array", "slice", "tuple", "result"];

export function getCompletions(req: CompletionRequest): CompletionItem[] {
  const maxItems = req.maxItems ?? 200;
  const externals = req.externals ?? req.typed?.externals ?? defaultExternals();
  const ctx = detectContext(req.source.slice(0, req.offset));

  switch (ctx.kind) {
    case "decorator":
      return limit(filterPrefix(decoratorItems(), ctx.prefix), maxItems);
    case "member":
      return limit(filterPrefix(memberItems(resolveAlias(ctx.path, req.module), externals), ctx.prefix), maxItems);
    case "general": {
      const items = [
        ...localItems(req),
        ...functionItems(req),
        ...constantItems(),
        ...builtinItems(externals),
        ...keywordItems(),
        ...typeItems(),
      ];
      return limit(filterPrefix(dedupe(items), ctx.prefix), maxItems);
    }
  }
}

/* =========================================================
   Context detection
   ========================================================= */

type DetectedContext =
  | { kind: "decorator"; prefix: string }
  | { kind: "member"; path: string[]; prefix: string }
  | { kind: "general"; prefix: string };

function detectContext(left: string): DetectedContext {
  const line = left.slice(left.lastIndexOf("\n") + 1);

  const deco = /@([A-Za-z_]\w*)?$/.exec(line);
  if (deco) return { kind: "decorator", prefix: deco[1] ?? "" };

  const member = /([A-Za-z_]\w*(?:\.[A-Za-z_]\w*)*)\.(\w*)$/.exec(line);
  if (member && member[1]) return { kind: "member", path: member[1].split("."), prefix: member[2] ?? "" };

  const word = /(\w*)$/.exec(line);
  return { kind: "general", prefix: word?.[1] ?? "" };
}

/** `import windows.registry as reg` makes `reg.` complete like `windows.registry.`. */
function resolveAlias(path: string[], module: Module | null): string[] {
  const [head, ...rest] = path;
  if (!module || head === undefined) return path;
  for (const imp of module.imports) {
    if (imp.kind === "ImportDecl" && imp.alias?.name === head) return [...imp.path.parts, ...rest];
    if (imp.kind === "FromImportDecl") {
      const item = imp.names.find((n) => (n.alias ?? n.name).name === head);
      if (item) return [...imp.path.parts, item.name.name, ...rest];
    }
  }
  return path;
}

/* =========================================================
   Item sources
   ========================================================= */

function decoratorItems(): CompletionItem[] {
  return Object.keys(DECORATOR_REGISTRY)
    .filter(isDecoratorName)
    .map((name): CompletionItem => ({
      label: name,
      kind: "decorator",
      detail: DECORATOR_REGISTRY[name].summary,
      insertText: name,
    }));
}

function memberItems(path: string[], externals: ExternalTable): CompletionItem[] {
  const prefix = `${path.join(".")}.`;
  const out: CompletionItem[] = [];
  const namespaces = new Set<string>();

  for (const name of externals.names()) {
    if (!name.startsWith(prefix)) continue;
    const rest = name.slice(prefix.length);
    const dot = rest.indexOf(".");
    if (dot >= 0) {
      namespaces.add(rest.slice(0, dot));
      continue;
    }
    const sig = externals.lookup(name);
    out.push({ label: rest, kind: "function", detail: sig ? formatSignature(sig) : undefined, insertText: rest });
  }

  for (const ns of namespaces) out.push({ label: ns, kind: "module", detail: `${prefix}${ns}`, insertText: ns });
  return out.sort((a, b) => a.label.localeCompare(b.label));
}

function localItems(req: CompletionRequest): CompletionItem[] {
  const { module, typed } = req;
  if (!module || !typed) return [];

  const fn = module.functions.find((f) => req.offset >= f.range.start.offset && req.offset <= f.range.end.offset);
  if (!fn) return [];

  return typed.locals
    .filter((s) => s.owner === fn.name.name && s.declaredAt.start.offset < req.offset)
    .map((s): CompletionItem => ({
      label: s.name,
      kind: "variable",
      detail: `${s.kind} ${s.name}: ${typeToString(s.type)}`,
      insertText: s.name,
      sortText: `0_${s.name}`,
    }));
}

function functionItems(req: CompletionRequest): CompletionItem[] {
  if (req.typed) {
    return [...req.typed.signatures.values()].map((sig): CompletionItem => ({
      label: sig.name,
      kind: "function",
      detail: formatFunction(sig),
      insertText: sig.name,
      sortText: `1_${sig.name}`,
    }));
  }
  return (req.module?.functions ?? []).map((f): CompletionItem => ({
    label: f.name.name,
    kind: "function",
    insertText: f.name.name,
    sortText: `1_${f.name.name}`,
  }));
}

function constantItems(): CompletionItem[] {
  return STATUS_NAMES.map((name): CompletionItem => ({
    label: name,
    kind: "constant",
    detail: "status",
    insertText: name,
    sortText: `2_${name}`,
  }));
}

/** `len`, `range` and runtime functions callable without a namespace. */
function builtinItems(externals: ExternalTable): CompletionItem[] {
  const out: CompletionItem[] = [
    { label: "len", kind: "function", detail: "len(x) -> u64", insertText: "len", sortText: "2_len" },
    { label: "range", kind: "function", detail: "range([start,] stop)", insertText: "range", sortText: "2_range" },
  ];
  for (const name of externals.names()) {
    if (name.includes(".")) continue;
    const sig = externals.lookup(name);
    out.push({ label: name, kind: "function", detail: sig ? formatSignature(sig) : undefined, insertText: name, sortText: `2_${name}` });
  }
  return out;
}

function keywordItems(): CompletionItem[] {
  return KEYWORDS.map((k): CompletionItem => ({ label: k, kind: "keyword", insertText: k, sortText: `3_${k}` }));
}

function typeItems(): CompletionItem[] {
  return [...PRIMITIVE_KINDS, "void", ...COMPOSITE_TYPES].map((t): CompletionItem => ({
    label: t,
    kind: "type",
    insertText: t,
    sortText: `4_${t}`,
  }));
}

/* =========================================================
   Utilities
   ========================================================= */

function filterPrefix(items: CompletionItem[], prefix: string): CompletionItem[] {
  if (!prefix) return items;
  return items.filter((it) => it.label.startsWith(prefix));
}

function dedupe(items: CompletionItem[]): CompletionItem[] {
  const seen = new Set<string>();
  const out: CompletionItem[] = [];
  for (const it of items) {
    const key = `${it.kind}|${it.label}`;
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(it);
  }
  return out;
}

function limit(items: CompletionItem[], max: number): CompletionItem[] {
  return items.length <= max ? items : items.slice(0, max);
}
