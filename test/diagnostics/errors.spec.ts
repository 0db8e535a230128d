import { describe, expect, it } from "vitest";

import type { Range } from "../../src/core/ast";
import {
  dedupeDiagnostics,
  error,
  formatDiagnostic,
  formatDiagnostics,
  fromStageErrors,
  hasErrors,
  info,
  InternalCompilerError,
  warn,
} from "../../src/diagnostics";

function at(line: number, column: number, offset: number): Range {
  return {
    start: { line, column, offset },
    end: { line, column: column + 1, offset: offset + 1 },
  };
}

describe("diagnostics: model", () => {
  it("derives 1-based line and column from the range", () => {
    const d = error("checker", "UndefinedSymbol", "Unknown name 'x'.", at(2, 4, 30));
    expect(d).toMatchObject({ severity: "error", stage: "checker", line: 3, column: 5 });
    expect("hint" in d).toBe(false);
  });

  it("formats one line per diagnostic, with the hint in parentheses", () => {
    const d = warn("lint", "UnusedVariable", "'a' is never read.", at(1, 8, 20), "remove it or rename it to '_a'");
    expect(formatDiagnostic(d)).toBe(
      "WARNING [lint] UnusedVariable @ 2:9: 'a' is never read. (remove it or rename it to '_a')"
    );
  });

  it("sorts by position, then by severity", () => {
    const list = [
      info("safety", "AuditedOperation", "later", at(3, 0, 40)),
      warn("lint", "UnusedVariable", "same spot, warning", at(1, 0, 10)),
      error("checker", "OperandMismatch", "same spot, error", at(1, 0, 10)),
    ];

    expect(formatDiagnostics(list).split("\n")).toEqual([
      "ERROR [checker] OperandMismatch @ 2:1: same spot, error",
      "WARNING [lint] UnusedVariable @ 2:1: same spot, warning",
      "INFO [safety] AuditedOperation @ 4:1: later",
    ]);
  });

  it("drops exact duplicates", () => {
    const d = error("parser", "UnexpectedToken", "Expected ':'.", at(0, 5, 5));
    const other = error("parser", "UnexpectedToken", "Expected ':'.", at(0, 9, 9));
    expect(dedupeDiagnostics([d, { ...d }, other])).toHaveLength(2);
  });

  it("only counts errors in hasErrors", () => {
    expect(hasErrors([warn("lint", "UnusedVariable", "w", at(0, 0, 0))])).toBe(false);
    expect(hasErrors([error("lint", "X", "e", at(0, 0, 0))])).toBe(true);
  });

  it("converts stage errors, keeping their severity and hint", () => {
    const converted = fromStageErrors("safety", [
      { code: "BlockedOperation", message: "blocked", range: at(0, 0, 0), hint: "mark it" },
      { code: "AuditedOperation", message: "logged", range: at(1, 0, 5), severity: "info" },
    ]);

    expect(converted.map((d) => [d.stage, d.severity, d.code, d.hint ?? null])).toEqual([
      ["safety", "error", "BlockedOperation", "mark it"],
      ["safety", "info", "AuditedOperation", null],
    ]);
  });
});

describe("diagnostics: internal errors", () => {
  it("prefixes the stage and carries a stable code", () => {
    const e = new InternalCompilerError("codegen", "No symbol for function 'f'.");
    expect(e).toBeInstanceOf(Error);
    expect(e.message).toBe("[codegen] No symbol for function 'f'.");
    expect(e.code).toBe("InternalInvariantViolation");
    expect(e.range).toBeNull();
  });
});
