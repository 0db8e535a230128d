// src/index.ts
//
// Public API of the Kestrel compiler.
//
//   import { compileSource } from "kestrel-compiler";
//   const result = compileSource(text, { target: "exe" });
//   if (result.ok) console.log(result.irText);

export * from "./core/ast";
export { tokenize, Lexer, TokenKind, type Token, type LexResult, type LexerError } from "./core/lexer";
export { parseSource, parseTokens, Parser, type ParseResult, type ParseError } from "./core/parser";
export * from "./core/types";
export { STATUS_NAMES, StatusCode, statusName, statusValue, type StatusName } from "./core/status";
export { buildExternalTable, defaultExternals, ExternalTable, type ExternalSignature, type ExternalEntry } from "./core/externals";
export { check, type TypedModule, type CheckError, type CheckResult, type FunctionSignature } from "./core/checker";
export * from "./core/safety";
export * from "./core/ir";
export { printModule, printFunction, type PrintOptions } from "./core/ir-print";
export { generate, type CodegenError, type CodegenOptions, type CodegenResult } from "./core/codegen";

export * from "./diagnostics";
export * from "./language/configuration";
export * from "./language/kestrel.language";
export { createLogger, Logger, SILENT_LOGGER, type LogLevel, type LoggerOptions } from "./utils/logger";
