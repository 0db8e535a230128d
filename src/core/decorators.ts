// src/core/decorators.ts
//
// Decorator registry
// ------------------
// Decorators are compile-time configuration, never runtime calls. Every known
// decorator lists the options it accepts; the parser hands the raw
// `name(key: literal, ...)` form to `resolveDecorator`, which either returns a
// closed DecoratorConfig or a message for a MalformedDecorator error.

import type { BackoffKind, DecoratorArg, DecoratorConfig, DecoratorName, DecoratorValue, SafetyModeName } from "./ast";

export type DecoratorPlacement = "module" | "function";

type OptionKind = "int" | "string" | "symbol" | "stringList" | "symbolOrString";

type OptionSpec = {
  kind: OptionKind;
  required: boolean;
  /** Allowed symbol/string values, when the option is an enumeration. */
  oneOf?: readonly string[];
  /** Smallest accepted value of an int option; 0 when absent. */
  min?: number;
};

type DecoratorSpec = {
  placement: DecoratorPlacement;
  options: Record<string, OptionSpec>;
  summary: string;
};

export const DECORATOR_REGISTRY: Readonly<Record<DecoratorName, DecoratorSpec>> = Object.freeze({
  safety_level: {
    placement: "module",
    summary: "Safety mode for the whole module (SAFE, UNSAFE or CUSTOM).",
    options: {
      mode: { kind: "symbol", required: true, oneOf: ["SAFE", "UNSAFE", "CUSTOM"] },
      allow: { kind: "stringList", required: false },
      block: { kind: "stringList", required: false },
    },
  },
  unsafe: {
    placement: "function",
    summary: "Treat this function body as UNSAFE regardless of the module mode.",
    options: {},
  },
  resilient: {
    placement: "function",
    summary: "Retry the function while it returns a failure status.",
    options: {
      max_attempts: { kind: "int", required: false, min: 1 },
      timeout: { kind: "int", required: false },
      backoff: { kind: "symbolOrString", required: false, oneOf: ["none", "linear", "exponential"] },
    },
  },
  export: {
    placement: "function",
    summary: "Export the function from a dll target.",
    options: {
      name: { kind: "string", required: false },
    },
  },
});

export const DEFAULT_RESILIENT_ATTEMPTS = 3;

export function isDecoratorName(name: string): name is DecoratorName {
  return Object.prototype.hasOwnProperty.call(DECORATOR_REGISTRY, name);
}

export function decoratorPlacement(name: DecoratorName): DecoratorPlacement {
  return DECORATOR_REGISTRY[name].placement;
}

export type ResolveResult = { ok: true; name: DecoratorName; config: DecoratorConfig } | { ok: false; message: string };

export function resolveDecorator(name: string, args: DecoratorArg[]): ResolveResult {
  if (!isDecoratorName(name)) {
    return { ok: false, message: `Unknown decorator '@${name}'.` };
  }

  const spec = DECORATOR_REGISTRY[name];
  const seen = new Map<string, DecoratorValue>();

  for (const arg of args) {
    const opt: OptionSpec | undefined = Object.prototype.hasOwnProperty.call(spec.options, arg.name)
      ? spec.options[arg.name]
      : undefined;
    if (!opt) {
      const known = Object.keys(spec.options);
      const hint = known.length ? ` Known options: ${known.join(", ")}.` : " It takes no options.";
      return { ok: false, message: `Unknown option '${arg.name}' for '@${name}'.${hint}` };
    }
    if (seen.has(arg.name)) {
      return { ok: false, message: `Option '${arg.name}' given twice for '@${name}'.` };
    }

    const problem = checkValue(arg.value, opt);
    if (problem) return { ok: false, message: `Option '${arg.name}' of '@${name}' ${problem}.` };
    seen.set(arg.name, arg.value);
  }

  for (const [optName, opt] of Object.entries(spec.options)) {
    if (opt.required && !seen.has(optName)) {
      return { ok: false, message: `'@${name}' requires option '${optName}'.` };
    }
  }

  return { ok: true, name, config: buildConfig(name, seen) };
}

/* =========================================================
   Value checks
   ========================================================= */

function checkValue(v: DecoratorValue, opt: OptionSpec): string | null {
  switch (opt.kind) {
    case "int":
      if (v.kind !== "int") return "must be an integer";
      if (v.value < BigInt(opt.min ?? 0)) return opt.min ? `must be at least ${opt.min}` : "must not be negative";
      return null;
    case "string":
      return v.kind === "string" ? null : "must be a string";
    case "symbol":
      if (v.kind !== "symbol") return "must be a bare name";
      return checkOneOf(v.name, opt);
    case "symbolOrString": {
      if (v.kind === "symbol") return checkOneOf(v.name, opt);
      if (v.kind === "string") return checkOneOf(v.value, opt);
      return "must be a name or string";
    }
    case "stringList":
      if (v.kind !== "list") return "must be a list of strings";
      return v.items.every((item) => item.kind === "string") ? null : "must contain only strings";
  }
}

function checkOneOf(value: string, opt: OptionSpec): string | null {
  if (!opt.oneOf || opt.oneOf.includes(value)) return null;
  return `must be one of ${opt.oneOf.join(", ")}`;
}

/* =========================================================
   Config builders
   ========================================================= */

function buildConfig(name: DecoratorName, values: Map<string, DecoratorValue>): DecoratorConfig {
  switch (name) {
    case "safety_level":
      return {
        kind: "safety_level",
        mode: toSafetyMode(symbolOf(values.get("mode")) ?? "SAFE"),
        allow: stringsOf(values.get("allow")),
        block: stringsOf(values.get("block")),
      };
    case "unsafe":
      return { kind: "unsafe" };
    case "resilient": {
      const attempts = intOf(values.get("max_attempts"));
      return {
        kind: "resilient",
        maxAttempts: attempts ?? DEFAULT_RESILIENT_ATTEMPTS,
        timeoutMs: intOf(values.get("timeout")),
        backoff: toBackoff(symbolOf(values.get("backoff")) ?? "none"),
      };
    }
    case "export":
      return { kind: "export", symbol: stringOf(values.get("name")) };
  }
}

function symbolOf(v: DecoratorValue | undefined): string | null {
  if (!v) return null;
  if (v.kind === "symbol") return v.name;
  if (v.kind === "string") return v.value;
  return null;
}

function stringOf(v: DecoratorValue | undefined): string | null {
  return v && v.kind === "string" ? v.value : null;
}

function intOf(v: DecoratorValue | undefined): number | null {
  return v && v.kind === "int" ? Number(v.value) : null;
}

function stringsOf(v: DecoratorValue | undefined): string[] {
  if (!v || v.kind !== "list") return [];
  const out: string[] = [];
  for (const item of v.items) {
    if (item.kind === "string") out.push(item.value);
  }
  return out;
}

function toSafetyMode(s: string): SafetyModeName {
  if (s === "UNSAFE" || s === "CUSTOM") return s;
  return "SAFE";
}

function toBackoff(s: string): BackoffKind {
  if (s === "linear" || s === "exponential") return s;
  return "none";
}
