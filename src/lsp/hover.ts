// src/lsp/hover.ts
//
// Kestrel Hover Provider
// ----------------------
// Finds the innermost AST node under the cursor and describes it from the
// checker's side tables:
// - identifiers: declared kind + type, or the full signature for functions
// - calls of externals: ABI signature, link symbol, safety classification
// - decorators: registry summary + accepted options
// - any other typed expression: its type
//
// Exports:
//   - getHover(req): HoverResult | null
//   - nodePathAt(root, offset)

import { containsOffset, forEachChild, type Identifier, type Module, type Node, type Range } from "../core/ast";
import type { FunctionSignature, TypedModule } from "../core/checker";
import { DECORATOR_REGISTRY } from "../core/decorators";
import { formatSignature, type ExternalSignature } from "../core/externals";
import { defaultClassificationTable, type ClassificationTable } from "../core/safety";
import type { SymbolInfo } from "../core/scope";
import { statusName, statusValue, isStatusName } from "../core/status";
import { isPrimitive, typeToString } from "../core/types";

export type HoverResult = {
  markdown: string;
  range: Range;
};

export type HoverRequest = {
  module: Module | null;
  typed: TypedModule | null;
  offset: number;
  classification?: ClassificationTable;
};

export function getHover(req: HoverRequest): HoverResult | null {
  if (!req.module) return null;
  const path = nodePathAt(req.module, req.offset);
  const typed = req.typed;

  for (let i = path.length - 1; i >= 0; i--) {
    const node = path[i];
    if (!node) continue;

    switch (node.kind) {
      case "Identifier": {
        const h = typed ? identifierHover(node, typed) : null;
        if (h) return h;
        break;
      }
      case "Call": {
        const target = typed?.calls.get(node);
        if (target?.kind === "external" && containsOffset(node.callee.range, req.offset)) {
          return externalHover(target.signature, node.callee.range, req.classification);
        }
        if (target?.kind === "builtin") {
          return { markdown: builtinDoc(target.name), range: node.callee.range };
        }
        break;
      }
      case "Decorator": {
        const spec = DECORATOR_REGISTRY[node.name];
        const options = Object.keys(spec.options);
        return {
          markdown: [
            `### @${node.name}`,
            ``,
            spec.summary,
            ``,
            `**Options:** ${options.length ? options.map((o) => `\`${o}\``).join(", ") : "none"}`,
          ].join("\n"),
          range: node.range,
        };
      }
      default:
        break;
    }

    if (typed && node.kind !== "Identifier") {
      const t = expressionType(node, typed);
      if (t) return { markdown: `\`${t}\`${statusNote(node, typed)}`, range: node.range };
    }
  }

  return null;
}

/** Root-to-leaf chain of nodes whose range contains `offset`. */
export function nodePathAt(root: Node, offset: number): Node[] {
  const path: Node[] = [];
  let current: Node | null = containsOffset(root.range, offset) ? root : null;
  while (current) {
    path.push(current);
    current = childAt(current, offset);
  }
  return path;
}

function childAt(node: Node, offset: number): Node | null {
  const children: Node[] = [];
  forEachChild(node, (c) => children.push(c));
  return children.find((c) => containsOffset(c.range, offset)) ?? null;
}

/* =========================================================
   Hover bodies
   ========================================================= */

function identifierHover(id: Identifier, typed: TypedModule): HoverResult | null {
  const sym = typed.bindings.get(id);
  if (!sym) return null;

  if (sym.kind === "function") {
    const sig = typed.signatures.get(sym.name);
    return sig ? { markdown: codeBlock(formatFunction(sig)), range: id.range } : null;
  }
  if (sym.kind === "import" && sym.target) {
    const ext = typed.externals.lookup(sym.target);
    if (ext) return { markdown: codeBlock(formatSignature(ext)), range: id.range };
  }
  return { markdown: symbolMarkdown(sym), range: id.range };
}

function symbolMarkdown(sym: SymbolInfo): string {
  const lines = [`### ${sym.name}`, ``, `**Kind:** \`${sym.kind}\``, `**Type:** \`${typeToString(sym.type)}\``];
  if (sym.kind === "constant" && isStatusName(sym.name)) lines.push(`**Value:** \`${statusValue(sym.name)}\``);
  if (sym.owner) lines.push(`**In:** \`${sym.owner}\``);
  return lines.join("\n");
}

function externalHover(sig: ExternalSignature, range: Range, table?: ClassificationTable): HoverResult {
  const rule = (table ?? defaultClassificationTable()).classify(sig.name);
  const lines = [codeBlock(formatSignature(sig)), ``, `**Symbol:** \`${sig.symbol}\``];
  if (rule) lines.push(`**Safety:** ${rule.classification} (${rule.category}): ${rule.description}`);
  return { markdown: lines.join("\n"), range };
}

function builtinDoc(name: "len" | "range"): string {
  return name === "len"
    ? [codeBlock("len(x: array | slice | string) -> u64"), ``, "Number of elements (or bytes of a string)."].join("\n")
    : [codeBlock("range([start,] stop)"), ``, "Half-open integer range; only valid as a `for` iterable."].join("\n");
}

function expressionType(node: Node, typed: TypedModule): string | null {
  switch (node.kind) {
    case "IntLiteral":
    case "FloatLiteral":
    case "StringLiteral":
    case "BoolLiteral":
    case "BinaryOp":
    case "UnaryOp":
    case "Call":
    case "TupleExpr":
    case "ArrayLiteral":
    case "IndexExpr":
    case "MemberAccess":
    case "TryChain": {
      const t = typed.types.get(node);
      return t ? typeToString(t) : null;
    }
    default:
      return null;
  }
}

/** Names the status code an integer literal stands for, e.g. `5` in a `-> status` return. */
function statusNote(node: Node, typed: TypedModule): string {
  if (node.kind !== "IntLiteral") return "";
  const t = typed.types.get(node);
  if (!t || !isPrimitive(t, "status")) return "";
  const name = statusName(Number(node.value));
  return name ? ` (\`${name}\`)` : "";
}

export function formatFunction(sig: FunctionSignature): string {
  const params = sig.params.map((p) => `${p.name}: ${typeToString(p.type)}`).join(", ");
  const ret = sig.returns.kind === "void" ? "" : ` -> ${typeToString(sig.returns)}`;
  return `func ${sig.name}(${params})${ret}`;
}

function codeBlock(text: string): string {
  return ["```kestrel", text, "```"].join("\n");
}
