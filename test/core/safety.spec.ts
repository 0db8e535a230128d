import { describe, expect, it } from "vitest";

import { check } from "../../src/core/checker";
import { parseSource } from "../../src/core/parser";
import {
  checkSafety,
  ClassificationTable,
  decide,
  defaultClassificationTable,
  rulesetMatches,
  SafetyModes,
  type SafetyMode,
  type SafetyResult,
} from "../../src/core/safety";

function src(...lines: string[]): string {
  return `${lines.join("\n")}\n`;
}

function analyze(source: string, mode: SafetyMode): SafetyResult {
  const parsed = parseSource(source);
  expect(parsed.errors).toEqual([]);
  const checked = check(parsed.module);
  expect(checked.errors).toEqual([]);
  return checkSafety(checked.typed, mode);
}

const SHUTDOWN = src("import system", "func main() -> status:", "    return system.shutdown()");
const ALLOC = src("func main():", "    alloc(16)");
const REGISTRY_WRITE = src(
  "import windows.registry",
  "func main() -> status:",
  '    return windows.registry.write("Software", "k", "v")'
);

describe("safety: classification table", () => {
  const table = defaultClassificationTable();

  it("matches exact keys and the longest dotted suffix", () => {
    expect(table.classify("alloc")?.classification).toBe("blocked");
    expect(table.classify("windows.process.terminate")?.operation).toBe("process.terminate");
    expect(table.classify("windows.kernel32.OpenProcess")?.operation).toBe("kernel32.OpenProcess");
    expect(table.classify("print")).toBeNull();
  });

  it("prefers the longer of two matching suffixes", () => {
    const custom = new ClassificationTable([
      { operation: "write", classification: "allowed", category: "io", description: "any write" },
      { operation: "registry.write", classification: "blocked", category: "registry", description: "registry write" },
    ]);
    expect(custom.classify("windows.registry.write")?.classification).toBe("blocked");
    expect(custom.classify("fs.write")?.classification).toBe("allowed");
  });

  it("matches ruleset entries exactly or by prefix wildcard", () => {
    expect(rulesetMatches(["registry.*"], "registry.write")).toBe(true);
    expect(rulesetMatches(["registry.*"], "registryx.write")).toBe(false);
    expect(rulesetMatches(["alloc"], "alloc")).toBe(true);
    expect(rulesetMatches(["alloc"], "realloc")).toBe(false);
  });

  it("lets a block entry beat an allow entry", () => {
    const rule = table.classify("system.shutdown");
    expect(decide(SafetyModes.custom(["system.*"], ["system.shutdown"]), "system.shutdown", rule)).toBe("block");
    expect(decide(SafetyModes.custom(["system.*"]), "system.shutdown", rule)).toBe("allow");
    expect(decide(SafetyModes.unsafe(), "system.shutdown", rule)).toBe("allow");
    expect(decide(SafetyModes.safe(), "print", null)).toBe("allow");
  });
});

describe("safety: checkSafety", () => {
  it("blocks a classified operation in SAFE mode with exactly one error", () => {
    const { errors } = analyze(ALLOC, SafetyModes.safe());

    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({
      code: "BlockedOperation",
      message: "'alloc' is blocked in SAFE mode (memory: Manual memory allocation).",
      hint: "mark the function '@unsafe' or use a CUSTOM ruleset",
    });
    expect(errors[0]?.range.start.line).toBe(1);
  });

  it("allows everything in UNSAFE mode", () => {
    expect(analyze(ALLOC, SafetyModes.unsafe()).errors).toEqual([]);
    expect(analyze(SHUTDOWN, SafetyModes.unsafe()).errors).toEqual([]);
  });

  it("lets @unsafe override the module mode for one function", () => {
    const result = analyze(src("@unsafe", "func main():", "    alloc(16)", "func other():", "    alloc(8)"), SafetyModes.safe());

    expect(result.errors.map((e) => e.message)).toEqual(["'alloc' is blocked in SAFE mode (memory: Manual memory allocation)."]);
    expect(result.errors[0]?.range.start.line).toBe(4);
    const modes = result.safe.typed.module.functions.map((f) => result.safe.functionModes.get(f)?.kind);
    expect(modes).toEqual(["unsafe", "safe"]);
  });

  it("prefers @safety_level over the invocation mode", () => {
    const result = analyze(src("@safety_level(mode: UNSAFE)", "module tools", "", ALLOC), SafetyModes.safe());
    expect(result.errors).toEqual([]);
    expect(result.safe.mode.kind).toBe("unsafe");
  });

  it("applies a CUSTOM ruleset, block winning over allow", () => {
    const result = analyze(SHUTDOWN, SafetyModes.custom(["system.*"], ["system.shutdown"]));
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatchObject({
      code: "BlockedOperation",
      message: "'system.shutdown' is blocked in CUSTOM mode (system: Shut down the machine).",
      hint: "add it to the ruleset's allow list",
    });

    expect(analyze(SHUTDOWN, SafetyModes.custom(["system.*"])).errors).toEqual([]);
  });

  it("records an audit point for a logged operation", () => {
    const result = analyze(REGISTRY_WRITE, SafetyModes.safe());

    expect(result.errors.map((e) => [e.code, e.severity, e.message])).toEqual([
      [
        "AuditedOperation",
        "info",
        "'windows.registry.write' is allowed and will be audit-logged (registry: Write a registry value).",
      ],
    ]);
    expect([...result.safe.auditPoints.values()].map((p) => [p.operation, p.rule.operation])).toEqual([
      ["windows.registry.write", "registry.write"],
    ]);
  });

  it("requires @unsafe for raw pointers in SAFE mode", () => {
    const { errors } = analyze(src("func f(p: ptr[u8]):", "    pass"), SafetyModes.safe());
    expect(errors.map((e) => [e.code, e.message])).toEqual([
      ["MissingUnsafeMarker", "Raw pointer use in 'f' requires '@unsafe' in SAFE mode."],
    ]);
  });

  it("classifies a DriverEntry function", () => {
    const { errors } = analyze(src("func DriverEntry() -> status:", "    return SUCCESS"), SafetyModes.safe());
    expect(errors.map((e) => e.message)).toEqual([
      "'DriverEntry' is blocked in SAFE mode (kernel: Kernel driver entry point).",
    ]);
  });
});
