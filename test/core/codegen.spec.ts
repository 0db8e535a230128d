import { describe, expect, it } from "vitest";

import { check } from "../../src/core/checker";
import { generate, type CodegenOptions, type CodegenResult } from "../../src/core/codegen";
import { defaultExternals } from "../../src/core/externals";
import type { IRFunction, IRModule } from "../../src/core/ir";
import { printFunction, printModule } from "../../src/core/ir-print";
import { parseSource } from "../../src/core/parser";
import { checkSafety, SafetyModes, type SafetyMode } from "../../src/core/safety";

function src(...lines: string[]): string {
  return `${lines.join("\n")}\n`;
}

function lower(source: string, options: CodegenOptions = {}, mode: SafetyMode = SafetyModes.unsafe()): CodegenResult {
  const parsed = parseSource(source);
  expect(parsed.errors).toEqual([]);
  const checked = check(parsed.module);
  expect(checked.errors).toEqual([]);
  const safety = checkSafety(checked.typed, mode);
  expect(safety.errors.filter((e) => e.severity !== "info")).toEqual([]);
  return generate(safety.safe, options);
}

function irOf(result: CodegenResult): IRModule {
  expect(result.errors).toEqual([]);
  if (!result.ir) throw new Error("no IR produced");
  return result.ir;
}

function fnNamed(ir: IRModule, name: string): IRFunction {
  const fn = ir.functions.find((f) => f.name === name);
  if (!fn) throw new Error(`no function '${name}'`);
  return fn;
}

function callees(fn: IRFunction): string[] {
  return fn.blocks.flatMap((b) => b.instructions.flatMap((i) => (i.op === "call" ? [i.callee] : [])));
}

describe("codegen: functions", () => {
  it("lowers straight-line arithmetic into a single block", () => {
    const ir = irOf(lower(src("func add(a: i32, b: i32) -> i32:", "    return a + b"), { target: "dll" }));

    expect(printModule(ir)).toBe(
      "; module main\n; target dll\n\ndefine i32 @add(i32 %0, i32 %1) {\nentry:\n  %2 = add i32 %0, %1\n  ret i32 %2\n}\n"
    );
  });

  it("initializes the runtime at the start of an exe entry point", () => {
    const ir = irOf(lower(src("func main() -> status:", '    print("hi")', "    return SUCCESS")));

    expect(printModule(ir)).toBe(
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

  it("keeps var bindings in stack slots", () => {
    const ir = irOf(
      lower(src("func f() -> i32:", "    var x = 1", "    x += 2", "    return x"), { target: "dll" })
    );

    expect(printFunction(fnNamed(ir, "f"))).toBe(
      [
        "define i32 @f() {",
        "entry:",
        "  %0 = alloca i32",
        "  store i32 1, i32* %0",
        "  %1 = load i32, i32* %0",
        "  %2 = add i32 %1, 2",
        "  store i32 %2, i32* %0",
        "  %3 = load i32, i32* %0",
        "  ret i32 %3",
        "}",
      ].join("\n")
    );
  });

  it("uses the @export name as the dll symbol", () => {
    const ir = irOf(
      lower(src('@export(name: "Start")', "func start() -> status:", "    return SUCCESS"), { target: "dll" })
    );

    const fn = fnNamed(ir, "start");
    expect(fn.symbol).toBe("Start");
    expect(fn.exported).toBe(true);
    expect(ir.entry).toBeNull();
  });

  it("takes the module name from the source or the options", () => {
    const source = src("module tools.net", "func main():", "    pass");
    expect(irOf(lower(source)).name).toBe("tools.net");
    expect(irOf(lower(source, { moduleName: "override" })).name).toBe("override");
  });
});

describe("codegen: errors", () => {
  it("reports a missing entry point for exe targets", () => {
    const result = lower(src("func helper():", "    pass"));

    expect(result.ir).toBeNull();
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatchObject({
      code: "MissingEntryPoint",
      message: "The exe target needs a 'main' function.",
      hint: "define 'func main()'",
    });
  });

  it("requires DriverEntry for driver targets", () => {
    const result = lower(src("func main():", "    pass"), { target: "driver" });
    expect(result.errors.map((e) => e.message)).toEqual(["The driver target needs a 'DriverEntry' function."]);
  });

  it("reports calls the ABI table does not declare", () => {
    const result = lower(src("func main():", '    print("x")'), {
      externals: defaultExternals().without(["print"]),
    });

    expect(result.ir).toBeNull();
    expect(result.errors.map((e) => [e.code, e.message])).toEqual([
      ["UnknownExternal", "'print' has no matching declaration in the runtime ABI."],
    ]);
  });
});

describe("codegen: safety and resilience", () => {
  it("logs an audited operation right before the call", () => {
    const ir = irOf(
      lower(
        src("import windows.registry", "func main() -> status:", '    return windows.registry.write("Software", "k", "v")'),
        {},
        SafetyModes.safe()
      )
    );

    expect(callees(fnNamed(ir, "main"))).toEqual(["kst_runtime_init", "kst_audit_log", "kst_registry_write"]);
    expect(ir.strings).toEqual(["Software", "k", "v", "windows.registry.write"]);
  });

  it("wraps a @resilient function in a retry loop with linear backoff", () => {
    const ir = irOf(
      lower(src("@resilient(max_attempts: 3, backoff: linear)", "func fetch() -> status:", "    return SUCCESS"), {
        target: "dll",
      })
    );

    expect(ir.functions.map((f) => f.symbol)).toEqual(["fetch.attempt", "fetch"]);
    expect(printFunction(fnNamed(ir, "fetch"))).toBe(
      [
        "define status @fetch() {",
        "entry:",
        "  %0 = alloca u32",
        "  store u32 0, u32* %0",
        "  br label %retry.attempt",
        "",
        "retry.attempt:",
        "  %1 = call status @fetch.attempt()",
        "  %2 = load u32, u32* %0",
        "  %3 = add u32 %2, 1",
        "  store u32 %3, u32* %0",
        "  %4 = cmp ne status %1, 0",
        "  br i1 %4, label %retry.check, label %retry.done",
        "",
        "retry.done:",
        "  ret status %1",
        "",
        "retry.check:",
        "  %5 = cmp lt u32 %3, 3",
        "  br i1 %5, label %retry.backoff, label %retry.exhausted",
        "",
        "retry.backoff:",
        "  %6 = mul u32 100, %3",
        "  call void @kst_sleep(u32 %6)",
        "  br label %retry.attempt",
        "",
        "retry.exhausted:",
        "  ret status %1",
        "}",
      ].join("\n")
    );
  });

  it("checks the elapsed time when @resilient has a timeout", () => {
    const ir = irOf(
      lower(src("@resilient(max_attempts: 2, timeout: 500)", "func fetch() -> status:", "    return SUCCESS"), {
        target: "dll",
      })
    );

    // No backoff option: retries immediately.
    expect(callees(fnNamed(ir, "fetch"))).toEqual(["kst_timestamp_ms", "fetch.attempt", "kst_timestamp_ms"]);
  });
});

describe("codegen: control flow", () => {
  function fn(source: string, name: string): string {
    return printFunction(fnNamed(irOf(lower(source, { target: "dll" })), name));
  }

  it("lowers if/elif/else into one block per arm", () => {
    const source = src(
      "func sign(x: i32) -> i32:",
      "    if x > 0:",
      "        return 1",
      "    elif x < 0:",
      "        return -1",
      "    else:",
      "        return 0"
    );

    expect(fn(source, "sign")).toBe(
      [
        "define i32 @sign(i32 %0) {",
        "entry:",
        "  %1 = cmp gt i32 %0, 0",
        "  br i1 %1, label %if.then, label %if.elif",
        "",
        "if.then:",
        "  ret i32 1",
        "",
        "if.elif:",
        "  %2 = cmp lt i32 %0, 0",
        "  br i1 %2, label %if.then.1, label %if.else",
        "",
        "if.then.1:",
        "  ret i32 -1",
        "",
        "if.else:",
        "  ret i32 0",
        "}",
      ].join("\n")
    );
  });

  it("lowers while into condition, body and exit blocks", () => {
    const source = src("func count(n: i32) -> i32:", "    var i = 0", "    while i < n:", "        i += 1", "    return i");

    expect(fn(source, "count")).toBe(
      [
        "define i32 @count(i32 %0) {",
        "entry:",
        "  %1 = alloca i32",
        "  store i32 0, i32* %1",
        "  br label %while.cond",
        "",
        "while.cond:",
        "  %2 = load i32, i32* %1",
        "  %3 = cmp lt i32 %2, %0",
        "  br i1 %3, label %while.body, label %while.end",
        "",
        "while.body:",
        "  %4 = load i32, i32* %1",
        "  %5 = add i32 %4, 1",
        "  store i32 %5, i32* %1",
        "  br label %while.cond",
        "",
        "while.end:",
        "  %6 = load i32, i32* %1",
        "  ret i32 %6",
        "}",
      ].join("\n")
    );
  });

  it("turns for-in-range into a counted loop with a step block", () => {
    const source = src(
      "func total(n: u32) -> u32:",
      "    var sum: u32 = 0",
      "    for i in range(1, n):",
      "        sum += i",
      "    return sum"
    );

    expect(fn(source, "total")).toBe(
      [
        "define u32 @total(u32 %0) {",
        "entry:",
        "  %1 = alloca u32",
        "  %2 = alloca u32",
        "  store u32 0, u32* %1",
        "  store u32 1, u32* %2",
        "  br label %for.cond",
        "",
        "for.cond:",
        "  %3 = load u32, u32* %2",
        "  %4 = cmp lt u32 %3, %0",
        "  br i1 %4, label %for.body, label %for.end",
        "",
        "for.body:",
        "  %5 = load u32, u32* %1",
        "  %6 = add u32 %5, %3",
        "  store u32 %6, u32* %1",
        "  br label %for.step",
        "",
        "for.step:",
        "  %7 = load u32, u32* %2",
        "  %8 = add u32 %7, 1",
        "  store u32 %8, u32* %2",
        "  br label %for.cond",
        "",
        "for.end:",
        "  %9 = load u32, u32* %1",
        "  ret u32 %9",
        "}",
      ].join("\n")
    );
  });

  it("walks an array by index when iterating over it", () => {
    const source = src(
      "func sum3() -> i32:",
      "    let xs = [1, 2, 3]",
      "    var s = 0",
      "    for v in xs:",
      "        s += v",
      "    return s"
    );

    expect(fn(source, "sum3")).toBe(
      [
        "define i32 @sum3() {",
        "entry:",
        "  %1 = alloca i32",
        "  %2 = alloca [3 x i32]",
        "  %3 = alloca u64",
        "  %0 = aggregate [3 x i32] { i32 1, i32 2, i32 3 }",
        "  store i32 0, i32* %1",
        "  store [3 x i32] %0, [3 x i32]* %2",
        "  store u64 0, u64* %3",
        "  br label %for.cond",
        "",
        "for.cond:",
        "  %4 = load u64, u64* %3",
        "  %5 = cmp lt u64 %4, 3",
        "  br i1 %5, label %for.body, label %for.end",
        "",
        "for.body:",
        "  %6 = elementptr [3 x i32]* %2, u64 %4",
        "  %7 = load i32, i32* %6",
        "  %8 = load i32, i32* %1",
        "  %9 = add i32 %8, %7",
        "  store i32 %9, i32* %1",
        "  br label %for.step",
        "",
        "for.step:",
        "  %10 = load u64, u64* %3",
        "  %11 = add u64 %10, 1",
        "  store u64 %11, u64* %3",
        "  br label %for.cond",
        "",
        "for.end:",
        "  %12 = load i32, i32* %1",
        "  ret i32 %12",
        "}",
      ].join("\n")
    );
  });

  it("lowers match into an ordered compare chain with inclusive ranges", () => {
    const source = src(
      "func grade(x: u8) -> i32:",
      "    match x:",
      "        case 0:",
      "            return 0",
      "        case 1..9, 20:",
      "            return 1",
      "        case _:",
      "            return 2"
    );

    expect(fn(source, "grade")).toBe(
      [
        "define i32 @grade(u8 %0) {",
        "entry:",
        "  %1 = cmp eq u8 %0, 0",
        "  br i1 %1, label %match.case, label %match.next",
        "",
        "match.case:",
        "  ret i32 0",
        "",
        "match.next:",
        "  %2 = cmp ge u8 %0, 1",
        "  %3 = cmp le u8 %0, 9",
        "  %4 = and i1 %2, %3",
        "  br i1 %4, label %match.case.1, label %match.or",
        "",
        "match.or:",
        "  %5 = cmp eq u8 %0, 20",
        "  br i1 %5, label %match.case.1, label %match.next.1",
        "",
        "match.case.1:",
        "  ret i32 1",
        "",
        "match.next.1:",
        "  br label %match.case.2",
        "",
        "match.case.2:",
        "  ret i32 2",
        "}",
      ].join("\n")
    );
  });

  it("compares string cases through the runtime", () => {
    const source = src(
      "func pick(s: string) -> i32:",
      "    match s:",
      '        case "a":',
      "            return 1",
      "        case _:",
      "            return 0"
    );

    expect(fn(source, "pick")).toBe(
      [
        "define i32 @pick(str %0) {",
        "entry:",
        "  %1 = call i1 @kst_string_equals(str %0, str @.str.0)",
        "  br i1 %1, label %match.case, label %match.next",
        "",
        "match.case:",
        "  ret i32 1",
        "",
        "match.next:",
        "  br label %match.case.1",
        "",
        "match.case.1:",
        "  ret i32 0",
        "}",
      ].join("\n")
    );
  });

  it("branches a try_chain on each clause's status and joins with a phi", () => {
    const source = src(
      "func fetch() -> (status, string):",
      '    return SUCCESS, "data"',
      "",
      "func fetch_or() -> (status, string):",
      "    let r = try_chain:",
      "        primary: fetch()",
      '        fallback: (GENERIC_ERROR, "none")',
      "    return r"
    );

    expect(fn(source, "fetch_or")).toBe(
      [
        "define { status, str } @fetch_or() {",
        "entry:",
        "  %0 = call { status, str } @fetch()",
        "  %1 = extract { status, str } %0, 0",
        "  %2 = cmp ne status %1, 0",
        "  br i1 %2, label %try.fallback, label %try.end",
        "",
        "try.fallback:",
        "  %3 = aggregate { status, str } { status 1, str @.str.1 }",
        "  br label %try.end",
        "",
        "try.end:",
        "  %4 = phi { status, str } [ %0, %entry ], [ %3, %try.fallback ]",
        "  ret { status, str } %4",
        "}",
      ].join("\n")
    );
  });

  it("guards a non-constant index with a runtime bounds check", () => {
    const source = src("func at(i: u64) -> i32:", "    let xs = [1, 2, 3]", "    return xs[i]");

    expect(fn(source, "at")).toBe(
      [
        "define i32 @at(u64 %0) {",
        "entry:",
        "  %2 = alloca [3 x i32]",
        "  %1 = aggregate [3 x i32] { i32 1, i32 2, i32 3 }",
        "  store [3 x i32] %1, [3 x i32]* %2",
        "  %3 = cmp lt u64 %0, 3",
        "  br i1 %3, label %bounds.ok, label %bounds.fail",
        "",
        "bounds.fail:",
        "  call void @kst_bounds_fail(u64 %0, u64 3)",
        "  unreachable",
        "",
        "bounds.ok:",
        "  %4 = elementptr [3 x i32]* %2, u64 %0",
        "  %5 = load i32, i32* %4",
        "  ret i32 %5",
        "}",
      ].join("\n")
    );
  });

  it("short-circuits and/or through a phi", () => {
    expect(fn(src("func both(a: bool, b: bool) -> bool:", "    return a and b"), "both")).toBe(
      [
        "define i1 @both(i1 %0, i1 %1) {",
        "entry:",
        "  br i1 %0, label %and.rhs, label %and.end",
        "",
        "and.rhs:",
        "  br label %and.end",
        "",
        "and.end:",
        "  %2 = phi i1 [ false, %entry ], [ %1, %and.rhs ]",
        "  ret i1 %2",
        "}",
      ].join("\n")
    );

    expect(fn(src("func either(a: bool, b: bool) -> bool:", "    return a or b"), "either")).toBe(
      [
        "define i1 @either(i1 %0, i1 %1) {",
        "entry:",
        "  br i1 %0, label %or.end, label %or.rhs",
        "",
        "or.rhs:",
        "  br label %or.end",
        "",
        "or.end:",
        "  %2 = phi i1 [ true, %entry ], [ %1, %or.rhs ]",
        "  ret i1 %2",
        "}",
      ].join("\n")
    );
  });
});

describe("codegen: array to slice conversion", () => {
  const USE = ["func use(p: (status, slice[i32])) -> status:", "    return SUCCESS", ""];

  it("converts an array inside a tuple literal argument", () => {
    const ir = irOf(
      lower(src(...USE, "func run() -> status:", "    let arr = [1, 2, 3]", "    return use((SUCCESS, arr))"), {
        target: "dll",
      })
    );

    expect(printFunction(fnNamed(ir, "run"))).toBe(
      [
        "define status @run() {",
        "entry:",
        "  %1 = alloca [3 x i32]",
        "  %0 = aggregate [3 x i32] { i32 1, i32 2, i32 3 }",
        "  store [3 x i32] %0, [3 x i32]* %1",
        "  %2 = elementptr [3 x i32]* %1, u64 0",
        "  %3 = aggregate { i32*, u64 } { i32* %2, u64 3 }",
        "  %4 = aggregate { status, { i32*, u64 } } { status 0, { i32*, u64 } %3 }",
        "  %5 = call status @use({ status, { i32*, u64 } } %4)",
        "  ret status %5",
        "}",
      ].join("\n")
    );
  });

  it("rebuilds a tuple value whose element needs converting", () => {
    const ir = irOf(
      lower(
        src(...USE, "func run() -> status:", "    let arr = [1, 2, 3]", "    let pair = (SUCCESS, arr)", "    return use(pair)"),
        { target: "dll" }
      )
    );

    expect(printFunction(fnNamed(ir, "run"))).toBe(
      [
        "define status @run() {",
        "entry:",
        "  %4 = alloca [3 x i32]",
        "  %0 = aggregate [3 x i32] { i32 1, i32 2, i32 3 }",
        "  %1 = aggregate { status, [3 x i32] } { status 0, [3 x i32] %0 }",
        "  %2 = extract { status, [3 x i32] } %1, 0",
        "  %3 = extract { status, [3 x i32] } %1, 1",
        "  store [3 x i32] %3, [3 x i32]* %4",
        "  %5 = elementptr [3 x i32]* %4, u64 0",
        "  %6 = aggregate { i32*, u64 } { i32* %5, u64 3 }",
        "  %7 = aggregate { status, { i32*, u64 } } { status %2, { i32*, u64 } %6 }",
        "  %8 = call status @use({ status, { i32*, u64 } } %7)",
        "  ret status %8",
        "}",
      ].join("\n")
    );
  });
});
