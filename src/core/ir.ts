// src/core/ir.ts
//
// Kestrel IR
// ----------
// Typed, basic-block structured output of the code generator, consumed by an
// external backend. Values are SSA virtual registers typed with the checker's
// Type model. Every block ends in exactly one terminator, kept apart from the
// instruction list so "last instruction is the terminator" holds by shape.
//
// Also here:
// - FunctionBuilder: the only way codegen creates blocks and registers
// - verifyModule: structural checks (throws InternalCompilerError)
// - reachability: dead blocks are allowed, just marked

import { InternalCompilerError } from "../diagnostics/errors";
import { T, typeEquals, typeToString, type Type } from "./types";

/* =========================================================
   Values
   ========================================================= */

export type Register = { kind: "reg"; id: number; type: Type };

export type Value =
  | Register
  | { kind: "const"; type: Type; value: bigint | number | boolean }
  | { kind: "string"; type: Type; index: number }
  | { kind: "undef"; type: Type };

export const VOID_VALUE: Value = Object.freeze({ kind: "undef" as const, type: T.void });

export function constInt(value: bigint | number, type: Type = T.i32): Value {
  return { kind: "const", type, value: typeof value === "bigint" ? value : BigInt(value) };
}

export function constFloat(value: number, type: Type = T.f64): Value {
  return { kind: "const", type, value };
}

export function constBool(value: boolean): Value {
  return { kind: "const", type: T.bool, value };
}

/* =========================================================
   Instructions
   ========================================================= */

export type BinaryOpcode = "add" | "sub" | "mul" | "div" | "rem" | "pow" | "and" | "or" | "xor" | "shl" | "shr";
export type ComparePredicate = "eq" | "ne" | "lt" | "le" | "gt" | "ge";
export type UnaryOpcode = "neg" | "not" | "bitnot";

export type Instruction =
  | { op: "binary"; dest: Register; opcode: BinaryOpcode; lhs: Value; rhs: Value }
  | { op: "compare"; dest: Register; predicate: ComparePredicate; lhs: Value; rhs: Value }
  | { op: "unary"; dest: Register; opcode: UnaryOpcode; operand: Value }
  | { op: "call"; dest: Register | null; callee: string; external: boolean; args: Value[]; returns: Type }
  | { op: "alloca"; dest: Register; allocated: Type }
  | { op: "load"; dest: Register; address: Value }
  | { op: "store"; address: Value; value: Value }
  | { op: "elementptr"; dest: Register; base: Value; index: Value }
  | { op: "extract"; dest: Register; aggregate: Value; index: number }
  | { op: "aggregate"; dest: Register; elements: Value[] }
  | { op: "cast"; dest: Register; value: Value }
  | { op: "phi"; dest: Register; incoming: Array<{ value: Value; block: string }> };

export type Terminator =
  | { op: "br"; target: string }
  | { op: "condbr"; condition: Value; then: string; else: string }
  | { op: "ret"; value: Value | null }
  | { op: "unreachable" };

export type BasicBlock = {
  label: string;
  instructions: Instruction[];
  terminator: Terminator | null;
};

export type IRParam = { name: string; reg: Register };

export type IRFunction = {
  /** Source-level name (`foo`, or `foo.attempt` for a retry body). */
  name: string;
  /** Link symbol. */
  symbol: string;
  params: IRParam[];
  returns: Type;
  blocks: BasicBlock[];
  exported: boolean;
};

export type ExternalDecl = {
  /** Source name (`windows.registry.write`) or intrinsic role. */
  name: string;
  symbol: string;
  params: Type[];
  returns: Type;
};

export type TargetKind = "exe" | "dll" | "driver";

export type IRModule = {
  name: string;
  target: TargetKind;
  /** Symbol of the entry function, null for dll targets. */
  entry: string | null;
  externals: ExternalDecl[];
  strings: string[];
  functions: IRFunction[];
};

/* =========================================================
   Builder
   ========================================================= */

export class FunctionBuilder {
  public readonly fn: IRFunction;
  private nextReg = 0;
  private readonly labelCounts = new Map<string, number>();
  private readonly attached = new Set<BasicBlock>();
  private current: BasicBlock;
  private readonly entry: BasicBlock;
  private entryAllocas = 0;

  constructor(name: string, symbol: string, params: Array<{ name: string; type: Type }>, returns: Type, exported: boolean) {
    this.fn = {
      name,
      symbol,
      params: params.map((p) => ({ name: p.name, reg: this.reg(p.type) })),
      returns,
      blocks: [],
      exported,
    };
    this.entry = this.newBlock("entry");
    this.current = this.entry;
    this.position(this.entry);
  }

  public get block(): BasicBlock {
    return this.current;
  }

  public get terminated(): boolean {
    return this.current.terminator !== null;
  }

  public reg(type: Type): Register {
    return { kind: "reg", id: this.nextReg++, type };
  }

  /** A detached block; it joins the function the first time it is positioned. */
  public newBlock(hint: string): BasicBlock {
    const n = this.labelCounts.get(hint) ?? 0;
    this.labelCounts.set(hint, n + 1);
    return { label: n === 0 ? hint : `${hint}.${n}`, instructions: [], terminator: null };
  }

  public position(block: BasicBlock): void {
    if (!this.attached.has(block)) {
      this.attached.add(block);
      this.fn.blocks.push(block);
    }
    this.current = block;
  }

  public emit(inst: Instruction): void {
    // Code after a terminator still gets lowered, into a block nothing jumps to.
    if (this.terminated) this.position(this.newBlock("dead"));
    this.current.instructions.push(inst);
  }

  public terminate(term: Terminator): void {
    if (this.terminated) this.position(this.newBlock("dead"));
    this.current.terminator = term;
  }

  /** Stack slots go to the top of the entry block. */
  public alloca(type: Type): Register {
    const dest = this.reg(T.pointer(type));
    this.entry.instructions.splice(this.entryAllocas, 0, { op: "alloca", dest, allocated: type });
    this.entryAllocas++;
    return dest;
  }

  public binary(opcode: BinaryOpcode, lhs: Value, rhs: Value, type: Type): Register {
    const dest = this.reg(type);
    this.emit({ op: "binary", dest, opcode, lhs, rhs });
    return dest;
  }

  public compare(predicate: ComparePredicate, lhs: Value, rhs: Value): Register {
    const dest = this.reg(T.bool);
    this.emit({ op: "compare", dest, predicate, lhs, rhs });
    return dest;
  }

  public unary(opcode: UnaryOpcode, operand: Value, type: Type): Register {
    const dest = this.reg(type);
    this.emit({ op: "unary", dest, opcode, operand });
    return dest;
  }

  public call(callee: string, external: boolean, args: Value[], returns: Type): Value {
    const dest = returns.kind === "void" ? null : this.reg(returns);
    this.emit({ op: "call", dest, callee, external, args, returns });
    return dest ?? VOID_VALUE;
  }

  public load(address: Value, type: Type): Register {
    const dest = this.reg(type);
    this.emit({ op: "load", dest, address });
    return dest;
  }

  public store(address: Value, value: Value): void {
    this.emit({ op: "store", address, value });
  }

  public elementPtr(base: Value, index: Value, element: Type): Register {
    const dest = this.reg(T.pointer(element));
    this.emit({ op: "elementptr", dest, base, index });
    return dest;
  }

  public extract(aggregate: Value, index: number, type: Type): Register {
    const dest = this.reg(type);
    this.emit({ op: "extract", dest, aggregate, index });
    return dest;
  }

  public aggregate(elements: Value[], type: Type): Register {
    const dest = this.reg(type);
    this.emit({ op: "aggregate", dest, elements });
    return dest;
  }

  public cast(value: Value, type: Type): Register {
    const dest = this.reg(type);
    this.emit({ op: "cast", dest, value });
    return dest;
  }

  public phi(incoming: Array<{ value: Value; block: string }>, type: Type): Register {
    const dest = this.reg(type);
    this.emit({ op: "phi", dest, incoming });
    return dest;
  }

  public br(target: BasicBlock): void {
    this.terminate({ op: "br", target: target.label });
  }

  public condbr(condition: Value, then: BasicBlock, otherwise: BasicBlock): void {
    this.terminate({ op: "condbr", condition, then: then.label, else: otherwise.label });
  }

  public ret(value: Value | null): void {
    this.terminate({ op: "ret", value });
  }

  public unreachable(): void {
    this.terminate({ op: "unreachable" });
  }
}

/* =========================================================
   Reachability
   ========================================================= */

export function successors(term: Terminator | null): string[] {
  if (!term) return [];
  switch (term.op) {
    case "br":
      return [term.target];
    case "condbr":
      return [term.then, term.else];
    case "ret":
    case "unreachable":
      return [];
  }
}

export function reachableBlocks(fn: IRFunction): Set<string> {
  const byLabel = new Map(fn.blocks.map((b) => [b.label, b]));
  const seen = new Set<string>();
  const first = fn.blocks[0];
  const stack = first ? [first.label] : [];

  while (stack.length) {
    const label = stack.pop();
    if (label === undefined || seen.has(label)) continue;
    seen.add(label);
    const block = byLabel.get(label);
    if (block) stack.push(...successors(block.terminator));
  }
  return seen;
}

/** Labels of blocks no path from the entry reaches. */
export function deadBlocks(fn: IRFunction): string[] {
  const live = reachableBlocks(fn);
  return fn.blocks.filter((b) => !live.has(b.label)).map((b) => b.label);
}

/* =========================================================
   Verifier
   ========================================================= */

export function verifyModule(module: IRModule): void {
  const externals = new Map(module.externals.map((e) => [e.symbol, e]));
  const functions = new Map(module.functions.map((f) => [f.symbol, f]));

  for (const fn of module.functions) verifyFunction(fn, externals, functions, module.strings.length);
}

function verifyFunction(
  fn: IRFunction,
  externals: Map<string, ExternalDecl>,
  functions: Map<string, IRFunction>,
  stringCount: number
): void {
  const fail = (message: string): never => {
    throw new InternalCompilerError("codegen", `IR verification failed in '${fn.name}': ${message}`);
  };

  if (!fn.blocks.length) fail("function has no blocks");

  const labels = new Set<string>();
  for (const b of fn.blocks) {
    if (labels.has(b.label)) fail(`duplicate block label '${b.label}'`);
    labels.add(b.label);
  }

  const defined = new Set<number>();
  const define = (r: Register): void => {
    if (defined.has(r.id)) fail(`register %${r.id} defined twice`);
    defined.add(r.id);
  };
  for (const p of fn.params) define(p.reg);
  for (const b of fn.blocks) {
    for (const inst of b.instructions) {
      const dest = destOf(inst);
      if (dest) define(dest);
    }
  }

  const use = (v: Value): void => {
    if (v.kind === "reg" && !defined.has(v.id)) fail(`register %${v.id} used but never defined`);
    if (v.kind === "string" && (v.index < 0 || v.index >= stringCount)) fail(`string constant ${v.index} missing`);
  };

  for (const b of fn.blocks) {
    for (const inst of b.instructions) {
      operandsOf(inst).forEach(use);

      if (inst.op === "phi") {
        for (const inc of inst.incoming) {
          if (!labels.has(inc.block)) fail(`phi names unknown block '${inc.block}'`);
        }
      }

      if (inst.op === "call") {
        const params = calleeParams(inst, externals, functions, fail);
        if (params.length !== inst.args.length) {
          fail(`call to '${inst.callee}' passes ${inst.args.length} argument(s), expected ${params.length}`);
        }
        inst.args.forEach((a, i) => {
          const p = params[i];
          if (p && !sameRepresentation(a.type, p)) {
            fail(`argument ${i + 1} of '${inst.callee}' is ${typeToString(a.type)}, expected ${typeToString(p)}`);
          }
        });
      }
    }

    const term = b.terminator;
    if (!term) return fail(`block '${b.label}' has no terminator`);
    for (const target of successors(term)) {
      if (!labels.has(target)) fail(`block '${b.label}' branches to unknown block '${target}'`);
    }
    if (term.op === "condbr") use(term.condition);
    if (term.op === "ret") {
      if (term.value) use(term.value);
      const isVoid = fn.returns.kind === "void";
      if (isVoid !== (term.value === null)) fail(`block '${b.label}' returns the wrong arity`);
      if (term.value && !sameRepresentation(term.value.type, fn.returns)) {
        fail(`block '${b.label}' returns ${typeToString(term.value.type)}, expected ${typeToString(fn.returns)}`);
      }
    }
  }
}

/**
 * Types the backend lays out identically. Unlike source-level assignability
 * this admits no conversions, only the status/i32 and handle/u64 aliases.
 */
export function sameRepresentation(a: Type, b: Type): boolean {
  return typeEquals(layout(a), layout(b));
}

function layout(t: Type): Type {
  switch (t.kind) {
    case "primitive":
      return t.name === "status" ? T.i32 : t.name === "handle" ? T.u64 : t;
    case "array":
      return T.array(layout(t.element), t.size);
    case "slice":
      return T.slice(layout(t.element));
    case "pointer":
      return T.pointer(layout(t.target));
    case "tuple":
      return T.tuple(t.elements.map(layout));
    case "result":
      return T.result(layout(t.inner));
    case "function":
      return T.fn(t.params.map(layout), layout(t.returns));
    case "void":
    case "unknown":
      return t;
  }
}

function calleeParams(
  inst: Extract<Instruction, { op: "call" }>,
  externals: Map<string, ExternalDecl>,
  functions: Map<string, IRFunction>,
  fail: (message: string) => never
): Type[] {
  if (inst.external) {
    const decl = externals.get(inst.callee);
    if (!decl) return fail(`call to undeclared external '${inst.callee}'`);
    return decl.params;
  }
  const target = functions.get(inst.callee);
  if (!target) return fail(`call to unknown function '${inst.callee}'`);
  return target.params.map((p) => p.reg.type);
}

export function destOf(inst: Instruction): Register | null {
  return inst.op === "store" ? null : inst.dest;
}

export function operandsOf(inst: Instruction): Value[] {
  switch (inst.op) {
    case "binary":
    case "compare":
      return [inst.lhs, inst.rhs];
    case "unary":
      return [inst.operand];
    case "call":
      return inst.args;
    case "alloca":
      return [];
    case "load":
      return [inst.address];
    case "store":
      return [inst.address, inst.value];
    case "elementptr":
      return [inst.base, inst.index];
    case "extract":
      return [inst.aggregate];
    case "aggregate":
      return inst.elements;
    case "cast":
      return [inst.value];
    case "phi":
      return inst.incoming.map((i) => i.value);
  }
}
