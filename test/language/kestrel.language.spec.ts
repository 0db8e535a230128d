import { describe, expect, it } from "vitest";

import { ExternalTable } from "../../src/core/externals";
import { SafetyModes } from "../../src/core/safety";
import { resolveConfig } from "../../src/language/configuration";
import { compileOptionsFromConfig, compileSource } from "../../src/language/kestrel.language";
import { Logger } from "../../src/utils/logger";

function src(...lines: string[]): string {
  return `${lines.join("\n")}\n`;
}

const HELLO = src("func main() -> status:", '    print("hi")', "    return SUCCESS");
const ALLOC = src("func main():", "    alloc(16)");

describe("compileSource", () => {
  it("runs every stage on a clean program", () => {
    const result = compileSource(HELLO);

    expect(result.ok).toBe(true);
    expect(result.diagnostics).toEqual([]);
    expect(result.internalError).toBeNull();
    expect(result.typed).not.toBeNull();
    expect(result.irText).toBe(
      [
        "; module main",
        "; target exe, entry @main",
        "",
        '@.str.0 = private constant str c"hi"',
        "",
        "declare status @kst_runtime_init() ; runtime_init",
        "declare status @kst_print(str) ; print",
        "",
        "define status @main() {",
        "entry:",
        "  %0 = call status @kst_runtime_init()",
        "  %1 = call status @kst_print(str @.str.0)",
        "  ret status 0",
        "}",
        "",
      ].join("\n")
    );
  });

  it("skips codegen when a stage reports an error", () => {
    const result = compileSource(src("func main():", "    let _x: u8 = 300"));

    expect(result.ok).toBe(false);
    expect(result.ir).toBeNull();
    expect(result.irText).toBeNull();
    expect(result.diagnostics.map((d) => [d.stage, d.code, d.line])).toEqual([["checker", "LiteralOutOfRange", 2]]);
  });

  it("stops after the front end when nothing parsed", () => {
    const result = compileSource("$\n");

    expect(result.typed).toBeNull();
    expect(result.diagnostics.map((d) => [d.stage, d.message])).toEqual([["lexer", "Unexpected character '$'."]]);
  });

  it("applies the safety mode", () => {
    const safe = compileSource(ALLOC);
    expect(safe.ok).toBe(false);
    expect(safe.diagnostics.map((d) => [d.stage, d.code])).toEqual([["safety", "BlockedOperation"]]);

    const unsafe = compileSource(ALLOC, { mode: SafetyModes.unsafe() });
    expect(unsafe.ok).toBe(true);
    expect(unsafe.irText).toContain("declare u8* @kst_alloc(u64) ; alloc");
  });

  it("keeps audit notes without failing the build", () => {
    const result = compileSource(
      src("import windows.registry", "func main() -> status:", '    return windows.registry.write("Software", "k", "v")')
    );

    expect(result.ok).toBe(true);
    expect(result.diagnostics.map((d) => [d.severity, d.code])).toEqual([["info", "AuditedOperation"]]);
    expect(result.ir).not.toBeNull();
  });

  it("can stop before codegen or skip lint", () => {
    const source = src("func main():", "    let unused = 1");

    const noCodegen = compileSource(source, { codegen: false });
    expect(noCodegen.ir).toBeNull();
    expect(noCodegen.diagnostics.map((d) => d.code)).toEqual(["UnusedVariable"]);
    expect(noCodegen.ok).toBe(true);

    expect(compileSource(source, { lint: false }).diagnostics).toEqual([]);
  });

  it("reports a broken runtime table as an internal error", () => {
    const bare = new ExternalTable(new Map(), new Map());
    const result = compileSource(src("func main():", "    pass"), { externals: bare });

    expect(result.ok).toBe(false);
    expect(result.diagnostics).toEqual([]);
    expect(result.internalError?.message).toBe("[codegen] Runtime intrinsic 'runtime_init' is not declared.");
  });

  it("logs stage timings at debug level", () => {
    const lines: string[] = [];
    const sink = { error: () => undefined, warn: () => undefined, info: () => undefined, debug: (m: string) => lines.push(m) };
    const logger = new Logger({ name: "test", level: "debug", timestamp: false, includePayload: false, sink });

    compileSource(HELLO, { logger });

    expect(lines.map((l) => l.replace(/ took .*$/, ""))).toEqual([
      "[test] DEBUG: lex",
      "[test] DEBUG: parse",
      "[test] DEBUG: check",
      "[test] DEBUG: safety",
      "[test] DEBUG: lint",
      "[test] DEBUG: codegen",
      "[test] DEBUG: compile",
    ]);
  });
});

describe("compileOptionsFromConfig", () => {
  it("maps a project configuration onto compile options", () => {
    const { config } = resolveConfig({ target: "dll", safety: { mode: "UNSAFE" }, lint: { enabled: false } });
    const { options, problems } = compileOptionsFromConfig(config);

    expect(problems).toEqual([]);
    expect(options.target).toBe("dll");
    expect(options.mode).toEqual({ kind: "unsafe" });
    expect(options.lint).toBe(false);
  });

  it("passes the lint switches through", () => {
    const { config } = resolveConfig({ lint: { preferLet: false } });
    expect(compileOptionsFromConfig(config).options.lint).toEqual({
      unusedVariables: true,
      preferLet: false,
      unreachableCode: true,
    });
  });
});
