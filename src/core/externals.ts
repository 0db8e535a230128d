// src/core/externals.ts
//
// External symbol table (runtime / OS ABI)
// ----------------------------------------
// Signatures of functions the generated code calls but never defines. The
// default table ships as runtime-abi.json; projects can add entries through
// kestrel.config.json. Tables are immutable once built.
//
// Two namespaces:
// - functions:  callable from source by qualified name (`windows.registry.write`)
// - intrinsics: called only by the code generator (audit log, bounds failure, ...)

import abi from "./runtime-abi.json";
import { parseTypeText } from "./parser";
import { typeFromNode, typeToString, type Type, type TypeProblem } from "./types";
import { InternalCompilerError } from "../diagnostics/errors";

export type ExternalEntry = {
  name: string;
  symbol: string;
  params: string[];
  returns: string;
};

export type ExternalOrigin = "runtime" | "config";

export type ExternalSignature = {
  name: string;
  symbol: string;
  params: Type[];
  returns: Type;
  origin: ExternalOrigin;
};

export type IntrinsicName =
  | "runtime_init"
  | "audit_log"
  | "bounds_fail"
  | "string_concat"
  | "string_equals"
  | "string_length"
  | "sleep"
  | "timestamp_ms";

export type ExternalBuildResult = {
  table: ExternalTable;
  problems: string[];
};

export class ExternalTable {
  private readonly functions: ReadonlyMap<string, ExternalSignature>;
  private readonly intrinsics: ReadonlyMap<string, ExternalSignature>;

  constructor(functions: Map<string, ExternalSignature>, intrinsics: Map<string, ExternalSignature>) {
    this.functions = functions;
    this.intrinsics = intrinsics;
  }

  public lookup(name: string): ExternalSignature | null {
    return this.functions.get(name) ?? null;
  }

  public has(name: string): boolean {
    return this.functions.has(name);
  }

  public names(): string[] {
    return [...this.functions.keys()];
  }

  public intrinsic(name: IntrinsicName): ExternalSignature {
    const sig = this.intrinsics.get(name);
    if (!sig) throw new InternalCompilerError("codegen", `Runtime intrinsic '${name}' is not declared.`);
    return sig;
  }

  /** New table with extra callable functions; later entries replace earlier ones by name. */
  public extend(entries: ExternalEntry[], origin: ExternalOrigin = "config"): ExternalBuildResult {
    const problems: string[] = [];
    const functions = new Map(this.functions);
    for (const e of entries) {
      const sig = toSignature(e, origin, problems);
      if (sig) functions.set(sig.name, sig);
    }
    return { table: new ExternalTable(functions, new Map(this.intrinsics)), problems };
  }

  /** New table without the given callable functions. */
  public without(names: string[]): ExternalTable {
    const functions = new Map(this.functions);
    for (const n of names) functions.delete(n);
    return new ExternalTable(functions, new Map(this.intrinsics));
  }
}

/* =========================================================
   Building
   ========================================================= */

export function buildExternalTable(
  functions: ExternalEntry[],
  intrinsics: ExternalEntry[],
  origin: ExternalOrigin = "runtime"
): ExternalBuildResult {
  const problems: string[] = [];
  const fnMap = new Map<string, ExternalSignature>();
  const inMap = new Map<string, ExternalSignature>();

  for (const e of functions) {
    const sig = toSignature(e, origin, problems);
    if (sig) fnMap.set(sig.name, sig);
  }
  for (const e of intrinsics) {
    const sig = toSignature(e, origin, problems);
    if (sig) inMap.set(sig.name, sig);
  }

  return { table: new ExternalTable(fnMap, inMap), problems };
}

let defaultTable: ExternalTable | null = null;

/** The runtime ABI shipped with the compiler. */
export function defaultExternals(): ExternalTable {
  if (defaultTable) return defaultTable;

  const built = buildExternalTable(abi.functions, abi.intrinsics);
  if (built.problems.length) {
    throw new InternalCompilerError("config", `Bundled runtime ABI is invalid: ${built.problems.join("; ")}`);
  }
  defaultTable = built.table;
  return defaultTable;
}

export function formatSignature(sig: ExternalSignature): string {
  return `${sig.name}(${sig.params.map(typeToString).join(", ")}) -> ${typeToString(sig.returns)}`;
}

function toSignature(e: ExternalEntry, origin: ExternalOrigin, problems: string[]): ExternalSignature | null {
  if (!e.name || !e.symbol) {
    problems.push(`External entry needs both 'name' and 'symbol' (got '${e.name}').`);
    return null;
  }

  const local: TypeProblem[] = [];
  const params = e.params.map((p) => parseSignatureType(p, local));
  const returns = parseSignatureType(e.returns, local);

  if (local.length) {
    problems.push(`External '${e.name}': ${local.map((p) => p.message).join(" ")}`);
    return null;
  }

  return { name: e.name, symbol: e.symbol, params, returns, origin };
}

function parseSignatureType(text: string, problems: TypeProblem[]): Type {
  const node = parseTypeText(text);
  if (!node) {
    problems.push({ message: `Cannot parse type '${text}'.`, range: { start: zero(), end: zero() } });
    return { kind: "unknown" };
  }
  return typeFromNode(node, problems);
}

function zero(): { offset: number; line: number; column: number } {
  return { offset: 0, line: 0, column: 0 };
}
