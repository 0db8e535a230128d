// src/core/codegen.ts
//
// Kestrel Code Generator
// ----------------------
// Lowers a safety-checked module into the block-structured IR (ir.ts).
//
// Runs only on modules the checker and the safety checker accepted, so most
// "impossible" states throw InternalCompilerError instead of producing an
// error. The user-facing errors here are about the target and the ABI:
//   - MissingEntryPoint: exe without main, driver without DriverEntry
//   - UnknownExternal:   a call whose signature the ABI table does not match
//   - UnreachableCase:   cases after a wildcard (normally caught earlier)

import {
  findDecorator,
  hasDecorator,
  type AssignOperator,
  type BinaryOp,
  type BinaryOperator,
  type Block,
  type Call,
  type DecoratorConfig,
  type Expression,
  type For,
  type FunctionDecl,
  type Identifier,
  type If,
  type IndexExpr,
  type Match,
  type MatchPattern,
  type Range,
  type Return,
  type Statement,
  type TryChain,
  type UnaryOp,
  type VarDecl,
} from "./ast";
import { compoundOperator, constantIndex, type FunctionSignature, type TypedModule } from "./checker";
import type { ExternalSignature, ExternalTable, IntrinsicName } from "./externals";
import {
  constBool,
  constFloat,
  constInt,
  FunctionBuilder,
  verifyModule,
  VOID_VALUE,
  type BasicBlock,
  type BinaryOpcode,
  type ComparePredicate,
  type ExternalDecl,
  type IRFunction,
  type IRModule,
  type Register,
  type TargetKind,
  type Value,
} from "./ir";
import type { SafeModule } from "./safety";
import type { SymbolInfo } from "./scope";
import { isStatusName, statusValue } from "./status";
import { containsUnknown, isFloat, isPrimitive, statusCarrier, T, typeEquals, typeToString, type Type } from "./types";
import { InternalCompilerError, type StageError } from "../diagnostics/errors";

export type CodegenErrorCode = "UnknownExternal" | "UnreachableCase" | "MissingEntryPoint";

export type CodegenError = StageError & { code: CodegenErrorCode };

export type CodegenOptions = {
  target?: TargetKind;
  /** ABI table the generated calls are checked against. Defaults to the checker's. */
  externals?: ExternalTable;
  /** Overrides the `module` line (or "main"). */
  moduleName?: string;
};

export type CodegenResult = {
  /** null when any CodegenError was reported. */
  ir: IRModule | null;
  errors: CodegenError[];
};

/** Base delay of the `@resilient` backoff, in milliseconds. */
export const RESILIENT_BASE_DELAY_MS = 100;

export const ENTRY_POINTS: Readonly<Record<TargetKind, string | null>> = Object.freeze({
  exe: "main",
  dll: null,
  driver: "DriverEntry",
});

export function generate(safe: SafeModule, options: CodegenOptions = {}): CodegenResult {
  const gen = new ModuleGen(safe, options);
  return gen.run();
}

/* =========================================================
   Module
   ========================================================= */

class ModuleGen {
  public readonly safe: SafeModule;
  public readonly typed: TypedModule;
  private readonly table: ExternalTable;
  private readonly target: TargetKind;
  private readonly name: string;

  private readonly errors: CodegenError[] = [];
  private readonly externals = new Map<string, ExternalDecl>();
  private readonly strings: string[] = [];
  private readonly stringIndex = new Map<string, number>();
  private readonly symbols = new Map<string, string>();

  constructor(safe: SafeModule, options: CodegenOptions) {
    this.safe = safe;
    this.typed = safe.typed;
    this.table = options.externals ?? safe.typed.externals;
    this.target = options.target ?? "exe";
    this.name = options.moduleName ?? safe.typed.module.name?.parts.join(".") ?? "main";
  }

  public run(): CodegenResult {
    const module = this.typed.module;
    const entry = ENTRY_POINTS[this.target];

    if (entry !== null && !this.typed.signatures.has(entry)) {
      this.error(
        "MissingEntryPoint",
        `The ${this.target} target needs a '${entry}' function.`,
        module.range,
        `define 'func ${entry}()'`
      );
    }

    for (const sig of this.typed.signatures.values()) this.symbols.set(sig.name, this.symbolFor(sig));

    const functions: IRFunction[] = [];
    for (const decl of module.functions) {
      const sig = this.typed.signatures.get(decl.name.name);
      if (!sig || sig.decl !== decl || !this.typed.checkedFunctions.has(decl)) continue;
      functions.push(...this.lowerFunction(decl, sig, entry));
    }

    if (this.errors.length) return { ir: null, errors: this.errors };

    const ir: IRModule = {
      name: this.name,
      target: this.target,
      entry: entry === null ? null : (this.symbols.get(entry) ?? entry),
      externals: [...this.externals.values()],
      strings: this.strings,
      functions,
    };
    verifyModule(ir);
    return { ir, errors: this.errors };
  }

  private lowerFunction(decl: FunctionDecl, sig: FunctionSignature, entry: string | null): IRFunction[] {
    const symbol = this.symbolOf(sig.name);
    const exported = this.isExported(decl);
    const initRuntime = this.target === "exe" && sig.name === entry;
    const retry = findDecorator(decl.decorators, "resilient");

    if (!retry) {
      const b = new FunctionBuilder(sig.name, symbol, sig.params, sig.returns, exported);
      return [new FunctionGen(this, sig, b).lower(decl, initRuntime)];
    }

    const inner = new FunctionBuilder(`${sig.name}.attempt`, `${symbol}.attempt`, sig.params, sig.returns, false);
    const attempt = new FunctionGen(this, sig, inner).lower(decl, false);
    const wrapper = new FunctionBuilder(sig.name, symbol, sig.params, sig.returns, exported);
    return [attempt, this.lowerRetryWrapper(wrapper, attempt, sig, retry, initRuntime)];
  }

  /**
   * Calls the attempt function until it reports success, the attempt budget
   * runs out or the timeout passes; sleeps between attempts per the backoff.
   */
  private lowerRetryWrapper(
    b: FunctionBuilder,
    attempt: IRFunction,
    sig: FunctionSignature,
    retry: Extract<DecoratorConfig, { kind: "resilient" }>,
    initRuntime: boolean
  ): IRFunction {
    if (initRuntime) b.call(this.intrinsic("runtime_init"), true, [], T.status);

    const counter = b.alloca(T.u32);
    b.store(counter, constInt(0, T.u32));
    const started = retry.timeoutMs === null ? null : b.call(this.intrinsic("timestamp_ms"), true, [], T.u64);

    const tryBlock = b.newBlock("retry.attempt");
    const done = b.newBlock("retry.done");
    const check = b.newBlock("retry.check");
    const wait = b.newBlock("retry.backoff");
    const exhausted = b.newBlock("retry.exhausted");

    b.br(tryBlock);
    b.position(tryBlock);
    const result = b.call(attempt.symbol, false, b.fn.params.map((p) => p.reg), sig.returns);
    const previous = b.load(counter, T.u32);
    const n = b.binary("add", previous, constInt(1, T.u32), T.u32);
    b.store(counter, n);
    const failed = failureTest(b, result, sig.returns);
    if (!failed) throw new InternalCompilerError("codegen", `'@resilient' on '${sig.name}' without a status result.`);
    b.condbr(failed, check, done);

    b.position(done);
    b.ret(result);

    b.position(check);
    let again: Value = b.compare("lt", n, constInt(retry.maxAttempts, T.u32));
    if (started !== null && retry.timeoutMs !== null) {
      const now = b.call(this.intrinsic("timestamp_ms"), true, [], T.u64);
      const elapsed = b.binary("sub", now, started, T.u64);
      const inTime = b.compare("lt", elapsed, constInt(retry.timeoutMs, T.u64));
      again = b.binary("and", again, inTime, T.bool);
    }
    b.condbr(again, wait, exhausted);

    b.position(wait);
    const base = constInt(RESILIENT_BASE_DELAY_MS, T.u32);
    if (retry.backoff === "linear") {
      const delay = b.binary("mul", base, n, T.u32);
      b.call(this.intrinsic("sleep"), true, [delay], T.void);
    } else if (retry.backoff === "exponential") {
      const shift = b.binary("sub", n, constInt(1, T.u32), T.u32);
      const delay = b.binary("shl", base, shift, T.u32);
      b.call(this.intrinsic("sleep"), true, [delay], T.void);
    }
    b.br(tryBlock);

    b.position(exhausted);
    b.ret(result);
    return b.fn;
  }

  /* ---------- symbols ---------- */

  private symbolFor(sig: FunctionSignature): string {
    if (this.target !== "dll") return sig.name;
    return findDecorator(sig.decl.decorators, "export")?.symbol ?? sig.name;
  }

  public symbolOf(name: string): string {
    const symbol = this.symbols.get(name);
    if (symbol === undefined) throw new InternalCompilerError("codegen", `No symbol for function '${name}'.`);
    return symbol;
  }

  private isExported(decl: FunctionDecl): boolean {
    switch (this.target) {
      case "dll":
        return hasDecorator(decl, "export");
      case "driver":
        return decl.name.name === ENTRY_POINTS.driver;
      case "exe":
        return false;
    }
  }

  /* ---------- externals & constants ---------- */

  /** Declares a source-level external, or reports it when the ABI table disagrees. */
  public declareExternal(sig: ExternalSignature, range: Range): string | null {
    const known = this.table.lookup(sig.name);
    if (!known || known.symbol !== sig.symbol || !sameSignature(known, sig)) {
      this.error(
        "UnknownExternal",
        `'${sig.name}' has no matching declaration in the runtime ABI.`,
        range,
        known ? `expected ${formatTypes(known)}` : undefined
      );
      return null;
    }
    return this.declare(sig);
  }

  public intrinsic(name: IntrinsicName): string {
    return this.declare(this.table.intrinsic(name));
  }

  private declare(sig: ExternalSignature): string {
    if (!this.externals.has(sig.symbol)) {
      this.externals.set(sig.symbol, { name: sig.name, symbol: sig.symbol, params: sig.params, returns: sig.returns });
    }
    return sig.symbol;
  }

  public stringConstant(s: string): Value {
    let index = this.stringIndex.get(s);
    if (index === undefined) {
      index = this.strings.length;
      this.strings.push(s);
      this.stringIndex.set(s, index);
    }
    return { kind: "string", type: T.string, index };
  }

  public error(code: CodegenErrorCode, message: string, range: Range, hint?: string): void {
    const e: CodegenError = { code, message, range };
    if (hint !== undefined) e.hint = hint;
    this.errors.push(e);
  }
}

/* =========================================================
   Function bodies
   ========================================================= */

type Binding = { kind: "value"; value: Value } | { kind: "slot"; address: Register; type: Type };

type LoopTargets = { breakTo: BasicBlock; continueTo: BasicBlock };

class FunctionGen {
  private readonly mod: ModuleGen;
  private readonly typed: TypedModule;
  private readonly sig: FunctionSignature;
  private readonly b: FunctionBuilder;
  private readonly locals = new Map<SymbolInfo, Binding>();
  private readonly loops: LoopTargets[] = [];

  constructor(mod: ModuleGen, sig: FunctionSignature, builder: FunctionBuilder) {
    this.mod = mod;
    this.typed = mod.typed;
    this.sig = sig;
    this.b = builder;
  }

  public lower(decl: FunctionDecl, initRuntime: boolean): IRFunction {
    if (initRuntime) this.b.call(this.mod.intrinsic("runtime_init"), true, [], T.status);

    decl.params.forEach((p, i) => {
      const sym = this.typed.bindings.get(p.name);
      const param = this.b.fn.params[i];
      if (sym && param) this.locals.set(sym, { kind: "value", value: param.reg });
    });

    this.statements(decl.body.body);

    if (!this.b.terminated) {
      if (this.sig.returns.kind === "void") this.b.ret(null);
      else this.b.unreachable();
    }
    return this.b.fn;
  }

  /* ---------- statements ---------- */

  private statements(list: Statement[]): void {
    for (const st of list) this.statement(st);
  }

  private block(block: Block): void {
    this.statements(block.body);
  }

  private statement(st: Statement): void {
    switch (st.kind) {
      case "VarDecl":
        return this.varDecl(st);
      case "Assign": {
        const target = st.target;
        if (target.kind === "Identifier") {
          const binding = this.binding(target);
          if (binding.kind !== "slot") throw this.internal(`'${target.name}' is not assignable.`, target.range);
          this.storeInto(binding.address, binding.type, st.op, st.value);
        } else {
          this.storeInto(this.elementAddress(target), this.typeOf(target), st.op, st.value);
        }
        return;
      }
      case "ExprStmt":
        this.expr(st.expression);
        return;
      case "If":
        return this.ifStatement(st);
      case "While": {
        const b = this.b;
        const head = b.newBlock("while.cond");
        const body = b.newBlock("while.body");
        const end = b.newBlock("while.end");
        b.br(head);
        b.position(head);
        b.condbr(this.expr(st.test), body, end);
        b.position(body);
        this.inLoop({ breakTo: end, continueTo: head }, () => this.block(st.body));
        if (!b.terminated) b.br(head);
        b.position(end);
        return;
      }
      case "For":
        return this.forStatement(st);
      case "Match":
        return this.match(st);
      case "Return":
        return this.returnStatement(st);
      case "Pass":
        return;
      case "Break":
      case "Continue": {
        const loop = this.loops[this.loops.length - 1];
        if (!loop) throw this.internal(`'${st.kind.toLowerCase()}' outside of a loop.`, st.range);
        this.b.br(st.kind === "Break" ? loop.breakTo : loop.continueTo);
        return;
      }
    }
  }

  private varDecl(d: VarDecl): void {
    const initType = this.typeOf(d.initializer);
    const value = this.expr(d.initializer);

    if (!d.destructure) {
      for (const name of d.names) {
        const sym = this.symbolOf(name);
        this.bind(sym, this.coerce(value, initType, sym.type));
      }
      return;
    }

    if (initType.kind !== "tuple") throw this.internal(`Cannot destructure ${typeToString(initType)}.`, d.range);
    d.names.forEach((name, i) => {
      const sym = this.symbolOf(name);
      const part = initType.elements[i];
      if (!part) throw this.internal(`Tuple has no element ${i}.`, name.range);
      this.bind(sym, this.coerce(this.b.extract(value, i, part), part, sym.type));
    });
  }

  private bind(sym: SymbolInfo, value: Value): void {
    if (sym.kind !== "var") {
      this.locals.set(sym, { kind: "value", value });
      return;
    }
    const address = this.b.alloca(sym.type);
    this.b.store(address, value);
    this.locals.set(sym, { kind: "slot", address, type: sym.type });
  }

  private storeInto(address: Register, type: Type, op: AssignOperator, valueExpr: Expression): void {
    if (op === "=") {
      this.b.store(address, this.coerced(valueExpr, type));
      return;
    }
    const current = this.b.load(address, type);
    const rhs = this.expr(valueExpr);
    this.b.store(address, this.arithmetic(compoundOperator(op), current, rhs, type));
  }

  private ifStatement(s: If): void {
    const b = this.b;
    const end = b.newBlock("if.end");
    const arms = [{ test: s.test, body: s.consequent }, ...s.elifs.map((e) => ({ test: e.test, body: e.consequent }))];

    arms.forEach((arm, i) => {
      const last = i === arms.length - 1;
      const cond = this.expr(arm.test);
      const then = b.newBlock("if.then");
      const otherwise = last && !s.alternate ? end : b.newBlock(last ? "if.else" : "if.elif");
      b.condbr(cond, then, otherwise);

      b.position(then);
      this.block(arm.body);
      if (!b.terminated) b.br(end);
      if (otherwise !== end) b.position(otherwise);
    });

    if (s.alternate) {
      this.block(s.alternate);
      if (!b.terminated) b.br(end);
    }
    b.position(end);
  }

  private forStatement(f: For): void {
    const b = this.b;
    const loopVar = this.symbolOf(f.variable);
    const it = f.iterable;
    const target = it.kind === "Call" ? this.typed.calls.get(it) : undefined;

    if (it.kind === "Call" && target?.kind === "builtin" && target.name === "range") {
      const element = loopVar.type;
      const [first, second] = it.args;
      if (!first) throw this.internal("range() without arguments.", it.range);
      const start = second ? this.coerced(first, element) : literal(0n, element);
      const stop = second ? this.coerced(second, element) : this.coerced(first, element);

      const counter = b.alloca(element);
      b.store(counter, start);
      this.countedLoop(counter, element, stop, (i) => {
        this.locals.set(loopVar, { kind: "value", value: i });
        this.block(f.body);
      });
      return;
    }

    const iterType = this.typeOf(it);
    let base: Value;
    let length: Value;
    let element: Type;
    if (iterType.kind === "array") {
      base = this.arrayAddress(it, iterType);
      length = constInt(iterType.size, T.u64);
      element = iterType.element;
    } else if (iterType.kind === "slice") {
      const s = this.expr(it);
      base = this.b.extract(s, 0, T.pointer(iterType.element));
      length = this.b.extract(s, 1, T.u64);
      element = iterType.element;
    } else {
      throw this.internal(`Cannot iterate over ${typeToString(iterType)}.`, it.range);
    }

    const counter = b.alloca(T.u64);
    b.store(counter, constInt(0, T.u64));
    this.countedLoop(counter, T.u64, length, (i) => {
      const address = b.elementPtr(base, i, element);
      this.locals.set(loopVar, { kind: "value", value: b.load(address, element) });
      this.block(f.body);
    });
  }

  /** `for counter < stop` with a separate step block as the continue target. */
  private countedLoop(counter: Register, type: Type, stop: Value, body: (i: Value) => void): void {
    const b = this.b;
    const head = b.newBlock("for.cond");
    const bodyBlock = b.newBlock("for.body");
    const step = b.newBlock("for.step");
    const end = b.newBlock("for.end");

    b.br(head);
    b.position(head);
    const i = b.load(counter, type);
    b.condbr(b.compare("lt", i, stop), bodyBlock, end);

    b.position(bodyBlock);
    this.inLoop({ breakTo: end, continueTo: step }, () => body(i));
    if (!b.terminated) b.br(step);

    b.position(step);
    const current = b.load(counter, type);
    b.store(counter, b.binary("add", current, literal(1n, type), type));
    b.br(head);

    b.position(end);
  }

  private match(m: Match): void {
    const b = this.b;
    const subjectType = this.typeOf(m.subject);
    const subject = this.expr(m.subject);
    const end = b.newBlock("match.end");
    let wildcardSeen = false;

    for (const c of m.cases) {
      if (wildcardSeen) {
        this.mod.error("UnreachableCase", "This case follows 'case _' and can never run.", c.range);
        continue;
      }

      const body = b.newBlock("match.case");
      const next = b.newBlock("match.next");
      this.patternTests(c.patterns, subject, subjectType, body, next);

      b.position(body);
      this.block(c.body);
      if (!b.terminated) b.br(end);

      b.position(next);
      if (c.patterns.some((p) => p.kind === "WildcardPattern")) wildcardSeen = true;
    }

    // The checker only lets exhaustive matches through.
    b.unreachable();
    b.position(end);
  }

  private patternTests(patterns: MatchPattern[], subject: Value, type: Type, body: BasicBlock, next: BasicBlock): void {
    const b = this.b;
    patterns.forEach((p, i) => {
      const last = i === patterns.length - 1;
      const onFail = last ? next : b.newBlock("match.or");

      switch (p.kind) {
        case "WildcardPattern":
          b.br(body);
          break;
        case "ValuePattern":
          b.condbr(this.equals(subject, this.coerced(p.value, type), type), body, onFail);
          break;
        case "RangePattern": {
          // both bounds inclusive
          const low = b.compare("ge", subject, this.coerced(p.low, type));
          const high = b.compare("le", subject, this.coerced(p.high, type));
          b.condbr(b.binary("and", low, high, T.bool), body, onFail);
          break;
        }
      }

      if (!last) b.position(onFail);
    });
  }

  private returnStatement(r: Return): void {
    const returns = this.sig.returnTypes;
    const [only] = r.values;

    if (returns.length === 0) {
      for (const v of r.values) this.expr(v);
      this.b.ret(null);
      return;
    }

    if (returns.length === 1 || (only && r.values.length === 1)) {
      if (!only) throw this.internal(`'${this.sig.name}' returns without a value.`, r.range);
      this.b.ret(this.coerced(only, this.sig.returns));
      return;
    }

    const parts = r.values.map((v, i) => this.coerced(v, returns[i] ?? T.unknown));
    this.b.ret(this.b.aggregate(parts, this.sig.returns));
  }

  /* ---------- expressions ---------- */

  private expr(e: Expression): Value {
    switch (e.kind) {
      case "IntLiteral":
        return literal(e.value, this.typeOf(e));
      case "FloatLiteral":
        return constFloat(e.value, this.typeOf(e));
      case "StringLiteral":
        return this.mod.stringConstant(e.value);
      case "BoolLiteral":
        return constBool(e.value);
      case "Identifier":
        return this.read(e);
      case "BinaryOp":
        return this.binary(e);
      case "UnaryOp":
        return this.unary(e);
      case "Call":
        return this.call(e);
      case "TupleExpr":
      case "ArrayLiteral": {
        const t = this.typeOf(e);
        const elementTypes = t.kind === "tuple" ? t.elements : t.kind === "array" ? e.elements.map(() => t.element) : null;
        if (!elementTypes) throw this.internal(`${e.kind} typed as ${typeToString(t)}.`, e.range);
        const parts = e.elements.map((el, i) => this.coerced(el, elementTypes[i] ?? T.unknown));
        return this.b.aggregate(parts, t);
      }
      case "IndexExpr": {
        const objType = this.typeOf(e.object);
        if (objType.kind === "tuple") {
          const index = constantIndex(e.index);
          if (index === null) throw this.internal("Tuple index is not a constant.", e.index.range);
          return this.b.extract(this.expr(e.object), Number(index), this.typeOf(e));
        }
        return this.b.load(this.elementAddress(e), this.typeOf(e));
      }
      case "MemberAccess": {
        const objType = this.typeOf(e.object);
        const prop = e.property.name;
        if (objType.kind !== "result" || (prop !== "status" && prop !== "value")) {
          throw this.internal(`No member '${prop}' on ${typeToString(objType)}.`, e.range);
        }
        const obj = this.expr(e.object);
        return prop === "status" ? this.b.extract(obj, 0, T.status) : this.b.extract(obj, 1, objType.inner);
      }
      case "TryChain":
        return this.tryChain(e);
    }
  }

  private coerced(e: Expression, to: Type): Value {
    const from = this.typeOf(e);
    if (e.kind === "TupleExpr" && to.kind === "tuple" && changesRepresentation(from, to)) {
      const parts = e.elements.map((el, i) => this.coerced(el, to.elements[i] ?? T.unknown));
      return this.b.aggregate(parts, to);
    }
    return this.coerce(this.expr(e), from, to);
  }

  /**
   * The only implicit conversion that changes representation is array to
   * slice; tuples holding one are taken apart and rebuilt.
   */
  private coerce(value: Value, from: Type, to: Type): Value {
    if (!changesRepresentation(from, to)) return value;
    if (from.kind === "array" && to.kind === "slice") {
      const slot = this.b.alloca(from);
      this.b.store(slot, value);
      const first = this.b.elementPtr(slot, constInt(0, T.u64), from.element);
      return this.b.aggregate([first, constInt(from.size, T.u64)], to);
    }
    if (from.kind === "tuple" && to.kind === "tuple") {
      const parts = from.elements.map((part, i) =>
        this.coerce(this.b.extract(value, i, part), part, to.elements[i] ?? part)
      );
      return this.b.aggregate(parts, to);
    }
    throw new InternalCompilerError("codegen", `No conversion from ${typeToString(from)} to ${typeToString(to)}.`);
  }

  private read(id: Identifier): Value {
    const sym = this.symbolOf(id);
    if (sym.kind === "constant" && isStatusName(sym.name)) return constInt(statusValue(sym.name), T.status);
    const binding = this.binding(id);
    return binding.kind === "value" ? binding.value : this.b.load(binding.address, binding.type);
  }

  private binary(e: BinaryOp): Value {
    if (e.op === "and" || e.op === "or") return this.shortCircuit(e);
    const operandType = this.typeOf(e.left);
    const l = this.expr(e.left);
    const r = this.expr(e.right);
    return this.arithmetic(e.op, l, r, operandType);
  }

  /** Every non-logical binary operator on already-lowered operands. */
  private arithmetic(op: BinaryOperator, l: Value, r: Value, operandType: Type): Value {
    const b = this.b;
    const isString = isPrimitive(operandType, "string");

    if (isString && op === "+") return b.call(this.mod.intrinsic("string_concat"), true, [l, r], T.string);
    if (isString && (op === "==" || op === "!=")) {
      const eq = b.call(this.mod.intrinsic("string_equals"), true, [l, r], T.bool);
      return op === "==" ? eq : b.unary("not", eq, T.bool);
    }

    const predicate = comparePredicate(op);
    if (predicate) return b.compare(predicate, l, r);
    return b.binary(binaryOpcode(op), l, r, operandType);
  }

  private shortCircuit(e: BinaryOp): Value {
    const b = this.b;
    const isAnd = e.op === "and";
    const left = this.expr(e.left);
    const fromLeft = b.block.label;
    const rhs = b.newBlock(isAnd ? "and.rhs" : "or.rhs");
    const end = b.newBlock(isAnd ? "and.end" : "or.end");

    if (isAnd) b.condbr(left, rhs, end);
    else b.condbr(left, end, rhs);

    b.position(rhs);
    const right = this.expr(e.right);
    const fromRight = b.block.label;
    b.br(end);

    b.position(end);
    return b.phi(
      [
        { value: constBool(!isAnd), block: fromLeft },
        { value: right, block: fromRight },
      ],
      T.bool
    );
  }

  private unary(e: UnaryOp): Value {
    const t = this.typeOf(e);
    switch (e.op) {
      case "-":
        if (e.operand.kind === "IntLiteral") return literal(-e.operand.value, t);
        if (e.operand.kind === "FloatLiteral") return constFloat(-e.operand.value, t);
        return this.b.unary("neg", this.expr(e.operand), t);
      case "not":
        return this.b.unary("not", this.expr(e.operand), T.bool);
      case "~":
        return this.b.unary("bitnot", this.expr(e.operand), t);
    }
  }

  private call(e: Call): Value {
    const target = this.typed.calls.get(e);
    if (!target) throw this.internal("Call without a resolved target.", e.range);

    switch (target.kind) {
      case "function": {
        const sig = target.signature;
        const args = e.args.map((a, i) => this.coerced(a, sig.params[i]?.type ?? T.unknown));
        return this.b.call(this.mod.symbolOf(sig.name), false, args, sig.returns);
      }
      case "external": {
        const sig = target.signature;
        const args = e.args.map((a, i) => this.coerced(a, sig.params[i] ?? T.unknown));
        const symbol = this.mod.declareExternal(sig, e.range);
        if (symbol === null) return { kind: "undef", type: sig.returns };

        const audit = this.mod.safe.auditPoints.get(e);
        if (audit) {
          this.b.call(this.mod.intrinsic("audit_log"), true, [this.mod.stringConstant(audit.operation)], T.void);
        }
        return this.b.call(symbol, true, args, sig.returns);
      }
      case "builtin":
        if (target.name === "len") return this.len(e);
        throw this.internal("range() outside a for loop.", e.range);
      case "unresolved":
        throw this.internal("Call to an unresolved function.", e.range);
    }
  }

  private len(e: Call): Value {
    const [arg] = e.args;
    if (!arg) throw this.internal("len() without an argument.", e.range);
    const t = this.typeOf(arg);
    const v = this.expr(arg);
    switch (t.kind) {
      case "array":
        return constInt(t.size, T.u64);
      case "slice":
        return this.b.extract(v, 1, T.u64);
      default:
        if (isPrimitive(t, "string")) return this.b.call(this.mod.intrinsic("string_length"), true, [v], T.u64);
        throw this.internal(`len() of ${typeToString(t)}.`, e.range);
    }
  }

  /**
   * Clauses run in order; after each non-fallback clause its status decides
   * whether to go on. The chain's value is a phi over whichever clause won.
   */
  private tryChain(e: TryChain): Value {
    const b = this.b;
    const resultType = this.typeOf(e);
    const producesValue = resultType.kind !== "void";
    const end = b.newBlock("try.end");
    const incoming: Array<{ value: Value; block: string }> = [];

    e.clauses.forEach((c, i) => {
      this.statements(c.body);
      let value = c.value ? this.expr(c.value) : null;
      if (b.terminated) return;

      const clauseType = c.value ? this.typeOf(c.value) : T.void;
      if (value && producesValue) value = this.coerce(value, clauseType, resultType);

      const failed =
        c.role === "fallback" || !value ? null : failureTest(b, value, producesValue ? resultType : clauseType);
      if (value && producesValue) incoming.push({ value, block: b.block.label });

      if (!failed) {
        b.br(end);
        return;
      }
      const next = b.newBlock(`try.${e.clauses[i + 1]?.role ?? "fallback"}`);
      b.condbr(failed, next, end);
      b.position(next);
    });

    if (!b.terminated) b.unreachable();
    b.position(end);

    if (!producesValue) return VOID_VALUE;
    if (!incoming.length) return { kind: "undef", type: resultType };
    return b.phi(incoming, resultType);
  }

  /* ---------- places ---------- */

  /** Address of `obj[index]`, with a bounds check where the index is not known to be in range. */
  private elementAddress(e: IndexExpr): Register {
    const objType = this.typeOf(e.object);
    switch (objType.kind) {
      case "array": {
        const base = this.arrayAddress(e.object, objType);
        const index = this.indexValue(e.index);
        if (constantIndex(e.index) === null) this.boundsCheck(index, constInt(objType.size, T.u64));
        return this.b.elementPtr(base, index, objType.element);
      }
      case "slice": {
        const s = this.expr(e.object);
        const index = this.indexValue(e.index);
        const ptr = this.b.extract(s, 0, T.pointer(objType.element));
        const length = this.b.extract(s, 1, T.u64);
        this.boundsCheck(index, length);
        return this.b.elementPtr(ptr, index, objType.element);
      }
      case "pointer": {
        const ptr = this.expr(e.object);
        return this.b.elementPtr(ptr, this.indexValue(e.index), objType.target);
      }
      default:
        throw this.internal(`Cannot take an element address of ${typeToString(objType)}.`, e.range);
    }
  }

  /** Pointer to the array an expression denotes; temporaries are spilled to a slot. */
  private arrayAddress(obj: Expression, type: Type): Register {
    if (obj.kind === "Identifier") {
      const binding = this.binding(obj);
      if (binding.kind === "slot") return binding.address;
    }
    if (obj.kind === "IndexExpr" && this.typeOf(obj.object).kind !== "tuple") return this.elementAddress(obj);

    const slot = this.b.alloca(type);
    this.b.store(slot, this.expr(obj));
    return slot;
  }

  private indexValue(e: Expression): Value {
    const constant = constantIndex(e);
    if (constant !== null) return constInt(constant, T.u64);
    const v = this.expr(e);
    return isPrimitive(this.typeOf(e), "u64") ? v : this.b.cast(v, T.u64);
  }

  private boundsCheck(index: Value, length: Value): void {
    const b = this.b;
    const ok = b.newBlock("bounds.ok");
    const fail = b.newBlock("bounds.fail");
    b.condbr(b.compare("lt", index, length), ok, fail);

    b.position(fail);
    b.call(this.mod.intrinsic("bounds_fail"), true, [index, length], T.void);
    b.unreachable();

    b.position(ok);
  }

  /* ---------- helpers ---------- */

  private equals(a: Value, b: Value, type: Type): Value {
    return this.arithmetic("==", a, b, type);
  }

  private inLoop(targets: LoopTargets, fn: () => void): void {
    this.loops.push(targets);
    try {
      fn();
    } finally {
      this.loops.pop();
    }
  }

  private typeOf(e: Expression): Type {
    const t = this.typed.types.get(e);
    if (!t || containsUnknown(t)) throw this.internal(`${e.kind} reached codegen without a type.`, e.range);
    return t;
  }

  private symbolOf(id: Identifier): SymbolInfo {
    const sym = this.typed.bindings.get(id);
    if (!sym) throw this.internal(`'${id.name}' reached codegen unresolved.`, id.range);
    return sym;
  }

  private binding(id: Identifier): Binding {
    const binding = this.locals.get(this.symbolOf(id));
    if (!binding) throw this.internal(`'${id.name}' has no storage.`, id.range);
    return binding;
  }

  private internal(message: string, range: Range): InternalCompilerError {
    return new InternalCompilerError("codegen", message, range);
  }
}

/* =========================================================
   Free helpers
   ========================================================= */

/** i1 that is true when a status-carrying value reports failure; null when it carries no status. */
function failureTest(b: FunctionBuilder, value: Value, type: Type): Value | null {
  switch (statusCarrier(type)) {
    case "self":
      return b.compare("ne", value, constInt(0, type));
    case "first":
    case "result": {
      const status = b.extract(value, 0, T.status);
      return b.compare("ne", status, constInt(0, T.status));
    }
    case null:
      return null;
  }
}

/** Whether storing `from` where `to` is expected needs the array-to-slice conversion somewhere. */
function changesRepresentation(from: Type, to: Type): boolean {
  if (from.kind === "array" && to.kind === "slice") return true;
  if (from.kind === "tuple" && to.kind === "tuple") {
    return from.elements.some((part, i) => {
      const target = to.elements[i];
      return target !== undefined && changesRepresentation(part, target);
    });
  }
  return false;
}

function literal(value: bigint, type: Type): Value {
  return isFloat(type) ? constFloat(Number(value), type) : constInt(value, type);
}

function comparePredicate(op: BinaryOperator): ComparePredicate | null {
  switch (op) {
    case "==":
      return "eq";
    case "!=":
      return "ne";
    case "<":
      return "lt";
    case "<=":
      return "le";
    case ">":
      return "gt";
    case ">=":
      return "ge";
    default:
      return null;
  }
}

function binaryOpcode(op: BinaryOperator): BinaryOpcode {
  switch (op) {
    case "+":
      return "add";
    case "-":
      return "sub";
    case "*":
      return "mul";
    case "/":
      return "div";
    case "%":
      return "rem";
    case "**":
      return "pow";
    case "&":
      return "and";
    case "|":
      return "or";
    case "^":
      return "xor";
    case "<<":
      return "shl";
    case ">>":
      return "shr";
    default:
      throw new InternalCompilerError("codegen", `'${op}' is not an arithmetic operator.`);
  }
}

function sameSignature(a: ExternalSignature, b: ExternalSignature): boolean {
  return (
    a.params.length === b.params.length &&
    a.params.every((p, i) => {
      const q = b.params[i];
      return q !== undefined && typeEquals(p, q);
    }) &&
    typeEquals(a.returns, b.returns)
  );
}

function formatTypes(sig: ExternalSignature): string {
  return `(${sig.params.map(typeToString).join(", ")}) -> ${typeToString(sig.returns)}`;
}
