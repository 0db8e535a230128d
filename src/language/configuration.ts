// src/language/configuration.ts
//
// Kestrel Project Configuration Resolver
// --------------------------------------
// Finds `kestrel.config.json` by walking up from a source file (stopping at
// the first directory that has one, or at a `.git` root), deep-merges it over
// the defaults and normalizes the result into a fully populated config.
//
// Node-side only (fs/path). Bad values never throw: they fall back to the
// default and are listed in `problems`.
//
// Exports:
//   - KestrelConfig / ResolvedKestrelConfig
//   - loadKestrelConfig(filePath, workspaceRoot?)
//   - findKestrelProjectRoot(startDir)
//   - resolveConfig(raw)            (pure; used by tests and the server)
//   - safetyModeOf(config), externalsOf(config)

import * as fs from "fs";
import * as path from "path";

import { defaultExternals, type ExternalEntry, type ExternalTable } from "../core/externals";
import type { TargetKind } from "../core/ir";
import { parseSafetyMode, SafetyModes, type SafetyMode, type SafetyModeLabel } from "../core/safety";

export const CONFIG_FILE_NAME = "kestrel.config.json";

export type KestrelConfig = {
  name: string;
  safety: {
    mode: SafetyModeLabel;
    /** CUSTOM ruleset entries; exact names or `prefix.*`. */
    allow: string[];
    block: string[];
  };
  target: TargetKind;
  /** Extra runtime ABI entries on top of the bundled table. */
  externals: ExternalEntry[];
  lint: {
    enabled: boolean;
    unusedVariables: boolean;
    preferLet: boolean;
    unreachableCode: boolean;
  };
  diagnostics: {
    enabled: boolean;
    /** Cap on diagnostics published per file. */
    maxProblems: number;
  };
  files: {
    extensions: string[];
  };
};

export type ResolvedKestrelConfig = KestrelConfig & {
  projectRoot: string | null;
  configPath: string | null;
  problems: string[];
};

export const DEFAULT_CONFIG: KestrelConfig = {
  name: "Kestrel Project",
  safety: { mode: "SAFE", allow: [], block: [] },
  target: "exe",
  externals: [],
  lint: {
    enabled: true,
    unusedVariables: true,
    preferLet: true,
    unreachableCode: true,
  },
  diagnostics: {
    enabled: true,
    maxProblems: 100,
  },
  files: {
    extensions: [".kst"],
  },
};

/* =========================================================
   Public API
   ========================================================= */

export async function loadKestrelConfig(filePath: string, workspaceRoot?: string): Promise<ResolvedKestrelConfig> {
  const startDir = (await isDirectory(filePath)) ? filePath : path.dirname(filePath);

  const projectRoot = (await findKestrelProjectRoot(startDir)) ?? workspaceRoot ?? null;
  const configPath = projectRoot ? await findConfigFile(projectRoot) : null;

  const problems: string[] = [];
  let raw: unknown = {};
  if (configPath) {
    const read = await readJson(configPath);
    if (read.ok) raw = read.value;
    else problems.push(`${configPath}: ${read.message}`);
  }

  const resolved = resolveConfig(raw);
  return {
    ...resolved.config,
    projectRoot,
    configPath,
    problems: [...problems, ...resolved.problems],
  };
}

export async function findKestrelProjectRoot(startDir: string): Promise<string | null> {
  let dir = path.resolve(startDir);

  for (;;) {
    if (await exists(path.join(dir, CONFIG_FILE_NAME))) return dir;
    if (await exists(path.join(dir, ".git"))) return dir;

    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/** Defaults + raw JSON, normalized. */
export function resolveConfig(raw: unknown): { config: KestrelConfig; problems: string[] } {
  const problems: string[] = [];
  if (!isObject(raw)) {
    problems.push("Configuration must be a JSON object.");
    return { config: cloneDefaults(), problems };
  }

  const merged = deepMerge(toRecord(DEFAULT_CONFIG), raw);
  return { config: normalize(merged, problems), problems };
}

export function safetyModeOf(config: KestrelConfig): SafetyMode {
  return parseSafetyMode(config.safety.mode, config.safety.allow, config.safety.block) ?? SafetyModes.safe();
}

/** Bundled ABI plus the configured extras. */
export function externalsOf(config: KestrelConfig): { table: ExternalTable; problems: string[] } {
  if (!config.externals.length) return { table: defaultExternals(), problems: [] };
  return defaultExternals().extend(config.externals, "config");
}

/* =========================================================
   Normalization
   ========================================================= */

type JsonRecord = Record<string, unknown>;

const SAFETY_LABELS: readonly SafetyModeLabel[] = ["SAFE", "UNSAFE", "CUSTOM"];
const TARGETS: readonly TargetKind[] = ["exe", "dll", "driver"];

function normalize(m: JsonRecord, problems: string[]): KestrelConfig {
  const d = DEFAULT_CONFIG;
  const safety = section(m, "safety");
  const lint = section(m, "lint");
  const diagnostics = section(m, "diagnostics");
  const files = section(m, "files");

  const modeText = readString(safety, "safety.mode", d.safety.mode, problems).toUpperCase();
  const mode = SAFETY_LABELS.find((l) => l === modeText);
  if (!mode) problems.push(`safety.mode must be one of ${SAFETY_LABELS.join(", ")} (got '${modeText}').`);

  const targetText = readString(m, "target", d.target, problems);
  const target = TARGETS.find((t) => t === targetText);
  if (!target) problems.push(`target must be one of ${TARGETS.join(", ")} (got '${targetText}').`);

  const maxProblems = readNumber(diagnostics, "diagnostics.maxProblems", d.diagnostics.maxProblems, problems);

  return {
    name: readString(m, "name", d.name, problems),
    safety: {
      mode: mode ?? d.safety.mode,
      allow: uniqueStrings(readStringList(safety, "safety.allow", problems)),
      block: uniqueStrings(readStringList(safety, "safety.block", problems)),
    },
    target: target ?? d.target,
    externals: readExternals(m.externals, problems),
    lint: {
      enabled: readBool(lint, "lint.enabled", d.lint.enabled, problems),
      unusedVariables: readBool(lint, "lint.unusedVariables", d.lint.unusedVariables, problems),
      preferLet: readBool(lint, "lint.preferLet", d.lint.preferLet, problems),
      unreachableCode: readBool(lint, "lint.unreachableCode", d.lint.unreachableCode, problems),
    },
    diagnostics: {
      enabled: readBool(diagnostics, "diagnostics.enabled", d.diagnostics.enabled, problems),
      maxProblems: maxProblems > 0 ? Math.floor(maxProblems) : d.diagnostics.maxProblems,
    },
    files: {
      extensions: uniqueStrings(readStringList(files, "files.extensions", problems).map(normalizeExt)),
    },
  };
}

function readExternals(v: unknown, problems: string[]): ExternalEntry[] {
  if (v === undefined) return [];
  if (!Array.isArray(v)) {
    problems.push("externals must be a list.");
    return [];
  }

  const out: ExternalEntry[] = [];
  v.forEach((item: unknown, i) => {
    if (!isObject(item)) {
      problems.push(`externals[${i}] must be an object.`);
      return;
    }
    const { name, symbol, params, returns } = item;
    if (typeof name !== "string" || typeof symbol !== "string" || typeof returns !== "string" || !isStringList(params)) {
      problems.push(`externals[${i}] needs string 'name', 'symbol', 'returns' and a 'params' list of type names.`);
      return;
    }
    out.push({ name, symbol, params, returns });
  });
  return out;
}

/* ---------- field readers ---------- */

function section(m: JsonRecord, key: string): JsonRecord {
  const v = m[key];
  return isObject(v) ? v : {};
}

function readString(m: JsonRecord, label: string, fallback: string, problems: string[]): string {
  const v = m[lastKey(label)];
  if (typeof v === "string") return v;
  if (v !== undefined) problems.push(`${label} must be a string.`);
  return fallback;
}

function readBool(m: JsonRecord, label: string, fallback: boolean, problems: string[]): boolean {
  const v = m[lastKey(label)];
  if (typeof v === "boolean") return v;
  if (v !== undefined) problems.push(`${label} must be true or false.`);
  return fallback;
}

function readNumber(m: JsonRecord, label: string, fallback: number, problems: string[]): number {
  const v = m[lastKey(label)];
  if (typeof v === "number" && Number.isFinite(v)) return v;
  if (v !== undefined) problems.push(`${label} must be a number.`);
  return fallback;
}

function readStringList(m: JsonRecord, label: string, problems: string[]): string[] {
  const v = m[lastKey(label)];
  if (isStringList(v)) return v;
  if (v !== undefined) problems.push(`${label} must be a list of strings.`);
  return [];
}

function lastKey(label: string): string {
  return label.slice(label.lastIndexOf(".") + 1);
}

/* =========================================================
   Deep merge
   ========================================================= */

/** Objects merge key by key; arrays and scalars from `override` replace. */
export function deepMerge(base: JsonRecord, override: JsonRecord): JsonRecord {
  const out: JsonRecord = { ...base };

  for (const [k, v] of Object.entries(override)) {
    if (v === undefined) continue;
    const current = out[k];
    if (Array.isArray(v)) out[k] = v.slice();
    else if (isObject(v) && isObject(current)) out[k] = deepMerge(current, v);
    else out[k] = v;
  }
  return out;
}

function toRecord(config: KestrelConfig): JsonRecord {
  return { ...config };
}

function cloneDefaults(): KestrelConfig {
  const d = DEFAULT_CONFIG;
  return {
    ...d,
    safety: { ...d.safety, allow: [...d.safety.allow], block: [...d.safety.block] },
    externals: [...d.externals],
    lint: { ...d.lint },
    diagnostics: { ...d.diagnostics },
    files: { extensions: [...d.files.extensions] },
  };
}

/* =========================================================
   Filesystem helpers
   ========================================================= */

async function findConfigFile(projectRoot: string): Promise<string | null> {
  const p = path.join(projectRoot, CONFIG_FILE_NAME);
  return (await exists(p)) ? p : null;
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.promises.access(p, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(p)).isDirectory();
  } catch {
    return false;
  }
}

async function readJson(p: string): Promise<{ ok: true; value: unknown } | { ok: false; message: string }> {
  try {
    const text = await fs.promises.readFile(p, "utf8");
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (err) {
    return { ok: false, message: err instanceof Error ? err.message : String(err) };
  }
}

/* =========================================================
   Small guards
   ========================================================= */

function isObject(x: unknown): x is JsonRecord {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function isStringList(x: unknown): x is string[] {
  return Array.isArray(x) && x.every((s) => typeof s === "string");
}

function uniqueStrings(list: string[]): string[] {
  const set = new Set<string>();
  for (const s of list) {
    const t = s.trim();
    if (t) set.add(t);
  }
  return [...set];
}

function normalizeExt(ext: string): string {
  const e = ext.trim();
  if (!e) return ".kst";
  return e.startsWith(".") ? e : `.${e}`;
}
