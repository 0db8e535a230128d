// src/diagnostics/lint.ts
//
// Kestrel Lint Rules
// ------------------
// Lint sits above type checking: the checker decides what is legal, lint
// points at what is probably a mistake. Findings never block codegen.
//
//   UnusedVariable   (warning) let/var that is never read
//   PreferLet        (info)    var that is never reassigned
//   UnreachableCode  (warning) statements after return/break/continue
//
// Names starting with `_` are exempt from the variable rules.

import { mergeRanges, walkAst, type Statement } from "../core/ast";
import type { TypedModule } from "../core/checker";
import type { SymbolInfo } from "../core/scope";
import { info, warn, type Diagnostic } from "./errors";

export type LintOptions = {
  unusedVariables?: boolean;
  preferLet?: boolean;
  unreachableCode?: boolean;
};

const DEFAULT_LINT_OPTIONS: Required<LintOptions> = {
  unusedVariables: true,
  preferLet: true,
  unreachableCode: true,
};

export function lintModule(typed: TypedModule, options: LintOptions = {}): Diagnostic[] {
  const linter = new Linter({ ...DEFAULT_LINT_OPTIONS, ...options });
  linter.lint(typed);
  return linter.diagnostics;
}

class Linter {
  public readonly diagnostics: Diagnostic[] = [];
  private readonly options: Required<LintOptions>;

  constructor(options: Required<LintOptions>) {
    this.options = options;
  }

  public lint(typed: TypedModule): void {
    for (const sym of typed.locals) this.lintSymbol(sym);

    if (!this.options.unreachableCode) return;
    for (const fn of typed.module.functions) {
      if (!typed.checkedFunctions.has(fn)) continue;
      walkAst(fn.body, {
        enter: (node) => {
          if (node.kind === "Block") this.lintStatements(node.body);
          else if (node.kind === "TryChain") for (const c of node.clauses) this.lintStatements(c.body);
        },
      });
    }
  }

  /* =========================================================
     Variables
     ========================================================= */

  private lintSymbol(sym: SymbolInfo): void {
    if (sym.kind !== "let" && sym.kind !== "var") return;
    if (sym.name.startsWith("_")) return;

    if (sym.reads === 0) {
      if (this.options.unusedVariables) {
        this.diagnostics.push(
          warn("lint", "UnusedVariable", `'${sym.name}' is never read.`, sym.declaredAt, `remove it or rename it to '_${sym.name}'`)
        );
      }
      return;
    }

    if (sym.kind === "var" && sym.writes === 0 && this.options.preferLet) {
      this.diagnostics.push(
        info("lint", "PreferLet", `'${sym.name}' is never reassigned.`, sym.declaredAt, "declare it with 'let'")
      );
    }
  }

  /* =========================================================
     Control flow
     ========================================================= */

  private lintStatements(list: Statement[]): void {
    const exit = list.findIndex((st) => st.kind === "Return" || st.kind === "Break" || st.kind === "Continue");
    const first = list[exit + 1];
    const last = list[list.length - 1];
    if (exit < 0 || !first || !last) return;

    const after = list[exit]?.kind.toLowerCase() ?? "return";
    this.diagnostics.push(
      warn("lint", "UnreachableCode", `Code after '${after}' never runs.`, mergeRanges(first.range, last.range))
    );
  }
}
