// src/language/kestrel.language.ts
//
// Kestrel Language Service (high-level)
// -------------------------------------
// The single "do everything" entrypoint. It runs
//   lexer -> parser -> checker -> safety -> lint -> codegen
// and returns every intermediate product plus merged diagnostics.
//
// User errors come back as diagnostics. An InternalCompilerError stops the
// pipeline and is returned on `internalError`, never mixed into diagnostics.
// Codegen runs only when no earlier stage reported an error.
//
// Exports:
//   - compileSource(source, options): CompileResult
//   - compileOptionsFromConfig(config)

import type { Module } from "../core/ast";
import { check, type TypedModule } from "../core/checker";
import { generate } from "../core/codegen";
import type { ExternalTable } from "../core/externals";
import type { IRModule, TargetKind } from "../core/ir";
import { printModule, type PrintOptions } from "../core/ir-print";
import { tokenize, type Token } from "../core/lexer";
import { parseTokens } from "../core/parser";
import { checkSafety, SafetyModes, type ClassificationTable, type SafeModule, type SafetyMode } from "../core/safety";
import {
  dedupeDiagnostics,
  fromLexerErrors,
  fromParserErrors,
  fromStageErrors,
  hasErrors,
  InternalCompilerError,
  mergeDiagnostics,
  type Diagnostic,
} from "../diagnostics/errors";
import { lintModule, type LintOptions } from "../diagnostics/lint";
import { SILENT_LOGGER, type Logger } from "../utils/logger";
import { externalsOf, safetyModeOf, type KestrelConfig } from "./configuration";

/* =========================================================
   Public types
   ========================================================= */

export type CompileOptions = {
  /** Invocation mode; a module `@safety_level` overrides it. Default SAFE. */
  mode?: SafetyMode;
  target?: TargetKind;
  externals?: ExternalTable;
  classification?: ClassificationTable;
  /** false turns lint off. */
  lint?: LintOptions | false;
  /** false stops after lint. */
  codegen?: boolean;
  print?: PrintOptions;
  moduleName?: string;
  logger?: Logger;
};

export type CompileTimings = {
  lexMs: number;
  parseMs: number;
  checkMs: number;
  safetyMs: number;
  lintMs: number;
  codegenMs: number;
  totalMs: number;
};

export type CompileResult = {
  /** No error diagnostics and no internal error. */
  ok: boolean;
  tokens: Token[];
  module: Module | null;
  typed: TypedModule | null;
  safe: SafeModule | null;
  ir: IRModule | null;
  irText: string | null;
  diagnostics: Diagnostic[];
  internalError: InternalCompilerError | null;
  timings: CompileTimings;
};

/* =========================================================
   Main entrypoint
   ========================================================= */

export function compileSource(source: string, options: CompileOptions = {}): CompileResult {
  const log = options.logger ?? SILENT_LOGGER;
  const total = log.time("compile");
  const timings: CompileTimings = { lexMs: 0, parseMs: 0, checkMs: 0, safetyMs: 0, lintMs: 0, codegenMs: 0, totalMs: 0 };
  const stageDiagnostics: Diagnostic[][] = [];

  const result: CompileResult = {
    ok: false,
    tokens: [],
    module: null,
    typed: null,
    safe: null,
    ir: null,
    irText: null,
    diagnostics: [],
    internalError: null,
    timings,
  };

  const finish = (): CompileResult => {
    result.diagnostics = dedupeDiagnostics(mergeDiagnostics(...stageDiagnostics));
    result.ok = result.internalError === null && !hasErrors(result.diagnostics);
    timings.totalMs = total.end({ ok: result.ok, diagnostics: result.diagnostics.length });
    return result;
  };

  try {
    // -------- LEX --------
    let t = log.time("lex");
    const lex = tokenize(source);
    timings.lexMs = t.end({ tokens: lex.tokens.length });
    result.tokens = lex.tokens;
    stageDiagnostics.push(fromLexerErrors(lex.errors));

    // -------- PARSE --------
    t = log.time("parse");
    const parsed = parseTokens(lex.tokens);
    timings.parseMs = t.end({ functions: parsed.module.functions.length });
    result.module = parsed.module;
    stageDiagnostics.push(fromParserErrors(parsed.errors));

    // Nothing usable came out of the front end.
    if (!parsed.module.functions.length && (lex.errors.length || parsed.errors.length)) return finish();

    // -------- CHECK --------
    t = log.time("check");
    const checked = check(parsed.module, { externals: options.externals });
    timings.checkMs = t.end({ errors: checked.errors.length });
    result.typed = checked.typed;
    stageDiagnostics.push(fromStageErrors("checker", checked.errors));

    // -------- SAFETY --------
    t = log.time("safety");
    const safety = checkSafety(checked.typed, options.mode ?? SafetyModes.safe(), { table: options.classification });
    timings.safetyMs = t.end({ findings: safety.errors.length });
    result.safe = safety.safe;
    stageDiagnostics.push(fromStageErrors("safety", safety.errors));

    // -------- LINT --------
    if (options.lint !== false) {
      t = log.time("lint");
      const lint = lintModule(checked.typed, options.lint ?? {});
      timings.lintMs = t.end({ findings: lint.length });
      stageDiagnostics.push(lint);
    }

    // -------- CODEGEN --------
    if (options.codegen === false || stageDiagnostics.some(hasErrors)) return finish();

    t = log.time("codegen");
    const generated = generate(safety.safe, {
      target: options.target,
      externals: options.externals,
      moduleName: options.moduleName,
    });
    timings.codegenMs = t.end({ functions: generated.ir?.functions.length ?? 0 });
    stageDiagnostics.push(fromStageErrors("codegen", generated.errors));
    result.ir = generated.ir;
    result.irText = generated.ir ? printModule(generated.ir, options.print) : null;
    return finish();
  } catch (err) {
    if (!(err instanceof InternalCompilerError)) throw err;
    log.error(`internal compiler error: ${err.message}`);
    result.internalError = err;
    return finish();
  }
}

/** Maps a project configuration onto compile options; `problems` lists bad ABI entries. */
export function compileOptionsFromConfig(config: KestrelConfig): { options: CompileOptions; problems: string[] } {
  const externals = externalsOf(config);
  return {
    options: {
      mode: safetyModeOf(config),
      target: config.target,
      externals: externals.table,
      lint: config.lint.enabled
        ? {
            unusedVariables: config.lint.unusedVariables,
            preferLet: config.lint.preferLet,
            unreachableCode: config.lint.unreachableCode,
          }
        : false,
    },
    problems: externals.problems,
  };
}
