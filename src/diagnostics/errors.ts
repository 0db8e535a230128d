// src/diagnostics/errors.ts
//
// Kestrel diagnostics model + helpers
// -----------------------------------
// One shared format for every stage:
// - Lexer errors
// - Parser errors
// - Checker / safety / codegen errors
// - Lint findings
//
// Ranges are 0-based (they map cleanly to LSP); `line` / `column` are the
// 1-based start position a command-line driver prints.
//
// Codes are stable identifiers named after the error they describe
// ("UndefinedSymbol", "BlockedOperation", ...), so tests and editors can filter on them.

import type { Range } from "../core/ast";
import type { LexerError } from "../core/lexer";
import type { ParseError } from "../core/parser";

export type { Position, Range } from "../core/ast";

export type Severity = "error" | "warning" | "info";

export type Stage = "lexer" | "parser" | "checker" | "safety" | "codegen" | "lint" | "config";

export type Diagnostic = {
  severity: Severity;
  stage: Stage;
  code: string;
  message: string;
  range: Range;
  /** 1-based line of range.start */
  line: number;
  /** 1-based column of range.start */
  column: number;
  hint?: string;
};

/* =========================================================
   Internal errors
   ========================================================= */

/**
 * A broken contract between compiler stages (a checker gap, a malformed IR).
 * Never reported as a user diagnostic; the pipeline surfaces it separately.
 */
export class InternalCompilerError extends Error {
  public readonly code = "InternalInvariantViolation";
  public readonly stage: Stage;
  public readonly range: Range | null;

  constructor(stage: Stage, message: string, range: Range | null = null) {
    super(`[${stage}] ${message}`);
    this.name = "InternalCompilerError";
    this.stage = stage;
    this.range = range;
  }
}

/* =========================================================
   Factories
   ========================================================= */

export function diag(
  severity: Severity,
  stage: Stage,
  code: string,
  message: string,
  range: Range,
  hint?: string
): Diagnostic {
  const d: Diagnostic = {
    severity,
    stage,
    code,
    message,
    range,
    line: range.start.line + 1,
    column: range.start.column + 1,
  };
  if (hint !== undefined) d.hint = hint;
  return d;
}

export function error(stage: Stage, code: string, message: string, range: Range, hint?: string): Diagnostic {
  return diag("error", stage, code, message, range, hint);
}

export function warn(stage: Stage, code: string, message: string, range: Range, hint?: string): Diagnostic {
  return diag("warning", stage, code, message, range, hint);
}

export function info(stage: Stage, code: string, message: string, range: Range, hint?: string): Diagnostic {
  return diag("info", stage, code, message, range, hint);
}

export function hasErrors(list: Diagnostic[]): boolean {
  return list.some((d) => d.severity === "error");
}

/* =========================================================
   Merging & sorting
   ========================================================= */

export function mergeDiagnostics(...lists: Array<Diagnostic[] | undefined | null>): Diagnostic[] {
  const out: Diagnostic[] = [];
  for (const l of lists) {
    if (!l) continue;
    out.push(...l);
  }
  return sortDiagnostics(out);
}

export function sortDiagnostics(list: Diagnostic[]): Diagnostic[] {
  return [...list].sort((a, b) => {
    const ao = a.range.start.offset;
    const bo = b.range.start.offset;
    if (ao !== bo) return ao - bo;

    // severity ordering: error > warning > info
    const sa = severityRank(a.severity);
    const sb = severityRank(b.severity);
    if (sa !== sb) return sb - sa;

    return a.code.localeCompare(b.code);
  });
}

function severityRank(s: Severity): number {
  switch (s) {
    case "error":
      return 3;
    case "warning":
      return 2;
    case "info":
      return 1;
  }
}

/* =========================================================
   De-duplication
   ========================================================= */

export function dedupeDiagnostics(list: Diagnostic[]): Diagnostic[] {
  const seen = new Set<string>();
  const out: Diagnostic[] = [];

  for (const d of sortDiagnostics(list)) {
    const key = `${d.code}|${d.severity}|${d.range.start.offset}|${d.range.end.offset}|${d.message}`;
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(d);
  }

  return out;
}

/* =========================================================
   Converters
   ========================================================= */

export function fromLexerErrors(errors: LexerError[]): Diagnostic[] {
  return errors.map((e) => error("lexer", e.code, e.message, e.range));
}

export function fromParserErrors(errors: ParseError[]): Diagnostic[] {
  return errors.map((e) => error("parser", e.code, e.message, e.range));
}

/* =========================================================
   Pretty printing
   ========================================================= */

export function formatDiagnostic(d: Diagnostic): string {
  const hint = d.hint ? ` (${d.hint})` : "";
  return `${d.severity.toUpperCase()} [${d.stage}] ${d.code} @ ${d.line}:${d.column}: ${d.message}${hint}`;
}

export function formatDiagnostics(list: Diagnostic[]): string {
  return sortDiagnostics(list).map(formatDiagnostic).join("\n");
}

/* =========================================================
   Stage errors (checker / safety / codegen)
   ========================================================= */

/** Shape every later stage reports before it becomes a Diagnostic. */
export type StageError = {
  code: string;
  message: string;
  range: Range;
  severity?: Severity;
  hint?: string;
};

export function fromStageErrors(stage: Stage, errors: StageError[]): Diagnostic[] {
  return errors.map((e) => diag(e.severity ?? "error", stage, e.code, e.message, e.range, e.hint));
}
