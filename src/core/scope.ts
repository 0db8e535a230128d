// src/core/scope.ts
//
// Symbol model & scoping
// ----------------------
// One Scope per lexical block. A child keeps a read-only back-reference to its
// parent; lookups walk outward, definitions only ever touch the current scope.

import type { Range } from "./ast";
import type { Type } from "./types";

export type SymbolKind = "function" | "param" | "let" | "var" | "loop" | "constant" | "import";

export type SymbolInfo = {
  name: string;
  kind: SymbolKind;
  type: Type;
  mutable: boolean;
  declaredAt: Range;
  /** Owning function, null for module-level symbols. */
  owner: string | null;
  /** Fully qualified external name for `from x import y` bindings. */
  target: string | null;
  reads: number;
  writes: number;
};

export type ScopeKind = "module" | "function" | "block";

export class Scope {
  public readonly kind: ScopeKind;
  private readonly parent: Scope | null;
  private readonly symbols = new Map<string, SymbolInfo>();

  constructor(kind: ScopeKind, parent: Scope | null) {
    this.kind = kind;
    this.parent = parent;
  }

  /** false when the name already exists in this scope. */
  define(sym: SymbolInfo): boolean {
    if (this.symbols.has(sym.name)) return false;
    this.symbols.set(sym.name, sym);
    return true;
  }

  getLocal(name: string): SymbolInfo | null {
    return this.symbols.get(name) ?? null;
  }

  resolve(name: string): SymbolInfo | null {
    return this.getLocal(name) ?? this.parent?.resolve(name) ?? null;
  }

  allLocal(): SymbolInfo[] {
    return [...this.symbols.values()];
  }
}

export function makeSymbol(
  name: string,
  kind: SymbolKind,
  type: Type,
  declaredAt: Range,
  owner: string | null,
  target: string | null = null
): SymbolInfo {
  return {
    name,
    kind,
    type,
    mutable: kind === "var",
    declaredAt,
    owner,
    target,
    reads: 0,
    writes: 0,
  };
}
