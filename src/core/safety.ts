// src/core/safety.ts
//
// Kestrel Safety Checker
// ----------------------
// Walks a checked module under a SafetyMode and a static classification table:
//   blocked -> error (BlockedOperation / MissingUnsafeMarker)
//   logged  -> allowed, but codegen emits an audit call before it
//   allowed -> untouched
//
// The mode is passed down explicitly: module mode, then a per-function override
// for `@unsafe`. Nothing here is global or mutable.

import rulesJson from "./safety-rules.json";
import {
  findDecorator,
  hasDecorator,
  walkAst,
  type Call,
  type FunctionDecl,
  type Module,
  type Range,
  type TypeNode,
} from "./ast";
import type { TypedModule } from "./checker";
import { containsPointer, typeFromNode, type Type } from "./types";
import { InternalCompilerError, type StageError } from "../diagnostics/errors";

/* =========================================================
   Modes
   ========================================================= */

/**
 * Custom ruleset entries name an operation exactly (`registry.write`) or end in
 * `.*` to cover everything under a prefix (`registry.*`). A block entry always
 * beats an allow entry for the same operation.
 */
export type Ruleset = {
  allow: readonly string[];
  block: readonly string[];
};

export type SafetyMode = { kind: "safe" } | { kind: "unsafe" } | { kind: "custom"; ruleset: Ruleset };

export const SafetyModes = {
  safe: (): SafetyMode => ({ kind: "safe" }),
  unsafe: (): SafetyMode => ({ kind: "unsafe" }),
  custom: (allow: readonly string[] = [], block: readonly string[] = []): SafetyMode => ({
    kind: "custom",
    ruleset: { allow: [...allow], block: [...block] },
  }),
};

export type SafetyModeLabel = "SAFE" | "UNSAFE" | "CUSTOM";

export function modeLabel(mode: SafetyMode): SafetyModeLabel {
  switch (mode.kind) {
    case "safe":
      return "SAFE";
    case "unsafe":
      return "UNSAFE";
    case "custom":
      return "CUSTOM";
  }
}

export function parseSafetyMode(label: string, allow: readonly string[] = [], block: readonly string[] = []): SafetyMode | null {
  switch (label.toUpperCase()) {
    case "SAFE":
      return SafetyModes.safe();
    case "UNSAFE":
      return SafetyModes.unsafe();
    case "CUSTOM":
      return SafetyModes.custom(allow, block);
    default:
      return null;
  }
}

/** A module-level `@safety_level` wins over the mode the compiler was invoked with. */
export function effectiveMode(module: Module, invocation: SafetyMode): SafetyMode {
  const declared = findDecorator(module.decorators, "safety_level");
  if (!declared) return invocation;
  return parseSafetyMode(declared.mode, declared.allow, declared.block) ?? invocation;
}

export function rulesetMatches(entries: readonly string[], operation: string): boolean {
  return entries.some((entry) => {
    if (entry === operation) return true;
    if (entry.endsWith(".*")) {
      const prefix = entry.slice(0, -1);
      return operation.startsWith(prefix);
    }
    return false;
  });
}

/* =========================================================
   Classification table
   ========================================================= */

export type Classification = "blocked" | "logged" | "allowed";

export type SafetyRule = Readonly<{
  operation: string;
  classification: Classification;
  category: string;
  description: string;
}>;

export const RAW_POINTER_OPERATION = "ptr.raw";
export const DRIVER_ENTRY_OPERATION = "DriverEntry";

export class ClassificationTable {
  private readonly byOperation: ReadonlyMap<string, SafetyRule>;

  constructor(rules: readonly SafetyRule[]) {
    const map = new Map<string, SafetyRule>();
    for (const r of rules) map.set(r.operation, Object.freeze({ ...r }));
    this.byOperation = map;
    Object.freeze(this);
  }

  /** Exact key first, then the longest key that is a dotted suffix of the call path. */
  public classify(path: string): SafetyRule | null {
    const exact = this.byOperation.get(path);
    if (exact) return exact;

    let best: SafetyRule | null = null;
    for (const [key, rule] of this.byOperation) {
      if (path.endsWith(`.${key}`) && (!best || key.length > best.operation.length)) best = rule;
    }
    return best;
  }
}

let defaultTable: ClassificationTable | null = null;

export function defaultClassificationTable(): ClassificationTable {
  if (defaultTable) return defaultTable;

  const rules: SafetyRule[] = [];
  for (const r of rulesJson.rules) {
    const classification = toClassification(r.classification);
    if (!classification) {
      throw new InternalCompilerError("config", `Bad classification '${r.classification}' for '${r.operation}'.`);
    }
    rules.push({ operation: r.operation, classification, category: r.category, description: r.description });
  }
  defaultTable = new ClassificationTable(rules);
  return defaultTable;
}

function toClassification(s: string): Classification | null {
  return s === "blocked" || s === "logged" || s === "allowed" ? s : null;
}

/* =========================================================
   Decisions
   ========================================================= */

export type Decision = "allow" | "audit" | "block";

export function decide(mode: SafetyMode, operation: string, rule: SafetyRule | null): Decision {
  if (mode.kind === "unsafe") return "allow";

  if (mode.kind === "custom") {
    const names = rule ? [operation, rule.operation] : [operation];
    if (names.some((n) => rulesetMatches(mode.ruleset.block, n))) return "block";
    if (names.some((n) => rulesetMatches(mode.ruleset.allow, n))) {
      return rule?.classification === "logged" ? "audit" : "allow";
    }
  }

  if (!rule) return "allow";
  switch (rule.classification) {
    case "blocked":
      return "block";
    case "logged":
      return "audit";
    case "allowed":
      return "allow";
  }
}

/* =========================================================
   Checker
   ========================================================= */

export type SafetyErrorCode = "BlockedOperation" | "MissingUnsafeMarker" | "AuditedOperation";

export type SafetyError = StageError & { code: SafetyErrorCode };

export type AuditPoint = {
  /** Qualified call path, e.g. `windows.registry.write`. */
  operation: string;
  rule: SafetyRule;
};

export type SafeModule = {
  typed: TypedModule;
  mode: SafetyMode;
  functionModes: Map<FunctionDecl, SafetyMode>;
  auditPoints: Map<Call, AuditPoint>;
};

export type SafetyOptions = {
  table?: ClassificationTable;
};

export type SafetyResult = {
  safe: SafeModule;
  /** Errors plus `info` AuditedOperation notes. */
  errors: SafetyError[];
};

export function checkSafety(typed: TypedModule, invocationMode: SafetyMode, options: SafetyOptions = {}): SafetyResult {
  const table = options.table ?? defaultClassificationTable();
  const mode = effectiveMode(typed.module, invocationMode);
  const errors: SafetyError[] = [];
  const auditPoints = new Map<Call, AuditPoint>();
  const functionModes = new Map<FunctionDecl, SafetyMode>();

  for (const fn of typed.module.functions) {
    const fnMode = hasDecorator(fn, "unsafe") ? SafetyModes.unsafe() : mode;
    functionModes.set(fn, fnMode);
    const ctx: FunctionSafety = { typed, table, mode: fnMode, fn, errors, auditPoints };

    if (fn.name.name === DRIVER_ENTRY_OPERATION) {
      apply(ctx, DRIVER_ENTRY_OPERATION, fn.name.range);
    }
    checkSignaturePointers(ctx);
    checkBody(ctx);
  }

  return { safe: { typed, mode, functionModes, auditPoints }, errors };
}

type FunctionSafety = {
  typed: TypedModule;
  table: ClassificationTable;
  mode: SafetyMode;
  fn: FunctionDecl;
  errors: SafetyError[];
  auditPoints: Map<Call, AuditPoint>;
};

function checkSignaturePointers(ctx: FunctionSafety): void {
  for (const p of ctx.fn.params) {
    if (containsPointer(annotationType(p.type))) apply(ctx, RAW_POINTER_OPERATION, p.range);
  }
  const ret = ctx.fn.returnType;
  if (ret && containsPointer(annotationType(ret))) apply(ctx, RAW_POINTER_OPERATION, ret.range);
}

function checkBody(ctx: FunctionSafety): void {
  const { typed } = ctx;

  walkAst(ctx.fn.body, {
    enter(node) {
      switch (node.kind) {
        case "Call": {
          const target = typed.calls.get(node);
          if (target?.kind !== "external") return;
          const operation = target.signature.name;
          const decision = apply(ctx, operation, node.range);
          const rule = ctx.table.classify(operation);
          if (decision === "audit" && rule) ctx.auditPoints.set(node, { operation, rule });
          return;
        }
        case "VarDecl": {
          const pointerName = node.names.find((n) => {
            const sym = typed.bindings.get(n);
            return sym !== undefined && containsPointer(sym.type);
          });
          if (pointerName) apply(ctx, RAW_POINTER_OPERATION, pointerName.range);
          return;
        }
        case "IndexExpr": {
          const objType = typed.types.get(node.object);
          if (objType?.kind === "pointer") apply(ctx, RAW_POINTER_OPERATION, node.range);
          return;
        }
        default:
          return;
      }
    },
  });
}

/** Records the outcome of one operation site and returns the decision. */
function apply(ctx: FunctionSafety, operation: string, range: Range): Decision {
  const rule = ctx.table.classify(operation);
  const decision = decide(ctx.mode, operation, rule);
  const label = modeLabel(ctx.mode);
  const about = rule ? ` (${rule.category}: ${rule.description})` : "";

  if (decision === "block") {
    if (operation === RAW_POINTER_OPERATION && ctx.mode.kind === "safe") {
      push(ctx, "MissingUnsafeMarker", "error", `Raw pointer use in '${ctx.fn.name.name}' requires '@unsafe' in ${label} mode.`, range, "add '@unsafe' to the function");
    } else {
      push(
        ctx,
        "BlockedOperation",
        "error",
        `'${operation}' is blocked in ${label} mode${about}.`,
        range,
        ctx.mode.kind === "custom" ? "add it to the ruleset's allow list" : "mark the function '@unsafe' or use a CUSTOM ruleset"
      );
    }
  } else if (decision === "audit") {
    push(ctx, "AuditedOperation", "info", `'${operation}' is allowed and will be audit-logged${about}.`, range);
  }
  return decision;
}

function push(
  ctx: FunctionSafety,
  code: SafetyErrorCode,
  severity: "error" | "info",
  message: string,
  range: Range,
  hint?: string
): void {
  const e: SafetyError = { code, severity, message, range };
  if (hint !== undefined) e.hint = hint;
  ctx.errors.push(e);
}

function annotationType(node: TypeNode): Type {
  return typeFromNode(node, []);
}
