// src/diagnostics/index.ts
//
// Diagnostics barrel: the shared Diagnostic model and the lint rules.

export * from "./errors";
export * from "./lint";
