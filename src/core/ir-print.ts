// src/core/ir-print.ts
//
// Textual IR listing (LLVM-flavoured) for the external backend and for tests.

import { deadBlocks, type BasicBlock, type IRFunction, type IRModule, type Instruction, type Terminator, type Value } from "./ir";
import type { Type } from "./types";

export type PrintOptions = {
  /** Leave out blocks the entry cannot reach. */
  dropDeadBlocks?: boolean;
};

const DEFAULT_PRINT_OPTIONS: Required<PrintOptions> = {
  dropDeadBlocks: true,
};

export function printModule(module: IRModule, options: PrintOptions = {}): string {
  const opts: Required<PrintOptions> = { ...DEFAULT_PRINT_OPTIONS, ...options };
  const out: string[] = [];

  out.push(`; module ${module.name}`);
  out.push(`; target ${module.target}${module.entry ? `, entry @${module.entry}` : ""}`);

  if (module.strings.length) {
    out.push("");
    module.strings.forEach((s, i) => out.push(`@.str.${i} = private constant str c"${escapeString(s)}"`));
  }

  if (module.externals.length) {
    out.push("");
    for (const e of module.externals) {
      out.push(`declare ${irType(e.returns)} @${e.symbol}(${e.params.map(irType).join(", ")}) ; ${e.name}`);
    }
  }

  for (const fn of module.functions) {
    out.push("");
    out.push(printFunction(fn, opts));
  }

  return out.join("\n") + "\n";
}

export function printFunction(fn: IRFunction, options: PrintOptions = {}): string {
  const opts: Required<PrintOptions> = { ...DEFAULT_PRINT_OPTIONS, ...options };
  const dead = new Set(deadBlocks(fn));
  const params = fn.params.map((p) => `${irType(p.reg.type)} %${p.reg.id}`).join(", ");
  const linkage = fn.exported ? "dllexport " : "";

  const lines = [`define ${linkage}${irType(fn.returns)} @${fn.symbol}(${params}) {`];
  fn.blocks.forEach((b, i) => {
    const isDead = dead.has(b.label);
    if (isDead && opts.dropDeadBlocks) return;
    if (i > 0) lines.push("");
    lines.push(printBlock(b, isDead));
  });
  lines.push("}");
  return lines.join("\n");
}

function printBlock(b: BasicBlock, dead: boolean): string {
  const lines = [`${b.label}:${dead ? " ; dead" : ""}`];
  for (const inst of b.instructions) lines.push(`  ${printInstruction(inst)}`);
  lines.push(`  ${b.terminator ? printTerminator(b.terminator) : "; <missing terminator>"}`);
  return lines.join("\n");
}

export function printInstruction(inst: Instruction): string {
  switch (inst.op) {
    case "binary":
      return `%${inst.dest.id} = ${inst.opcode} ${irType(inst.dest.type)} ${val(inst.lhs)}, ${val(inst.rhs)}`;
    case "compare":
      return `%${inst.dest.id} = cmp ${inst.predicate} ${irType(inst.lhs.type)} ${val(inst.lhs)}, ${val(inst.rhs)}`;
    case "unary":
      return `%${inst.dest.id} = ${inst.opcode} ${irType(inst.dest.type)} ${val(inst.operand)}`;
    case "call": {
      const args = inst.args.map(typed).join(", ");
      const call = `call ${irType(inst.returns)} @${inst.callee}(${args})`;
      return inst.dest ? `%${inst.dest.id} = ${call}` : call;
    }
    case "alloca":
      return `%${inst.dest.id} = alloca ${irType(inst.allocated)}`;
    case "load":
      return `%${inst.dest.id} = load ${irType(inst.dest.type)}, ${typed(inst.address)}`;
    case "store":
      return `store ${typed(inst.value)}, ${typed(inst.address)}`;
    case "elementptr":
      return `%${inst.dest.id} = elementptr ${typed(inst.base)}, ${typed(inst.index)}`;
    case "extract":
      return `%${inst.dest.id} = extract ${typed(inst.aggregate)}, ${inst.index}`;
    case "aggregate":
      return `%${inst.dest.id} = aggregate ${irType(inst.dest.type)} { ${inst.elements.map(typed).join(", ")} }`;
    case "cast":
      return `%${inst.dest.id} = cast ${typed(inst.value)} to ${irType(inst.dest.type)}`;
    case "phi": {
      const incoming = inst.incoming.map((i) => `[ ${val(i.value)}, %${i.block} ]`).join(", ");
      return `%${inst.dest.id} = phi ${irType(inst.dest.type)} ${incoming}`;
    }
  }
}

export function printTerminator(term: Terminator): string {
  switch (term.op) {
    case "br":
      return `br label %${term.target}`;
    case "condbr":
      return `br i1 ${val(term.condition)}, label %${term.then}, label %${term.else}`;
    case "ret":
      return term.value ? `ret ${typed(term.value)}` : "ret void";
    case "unreachable":
      return "unreachable";
  }
}

/* =========================================================
   Types & values
   ========================================================= */

export function irType(t: Type): string {
  switch (t.kind) {
    case "primitive":
      return t.name === "bool" ? "i1" : t.name === "string" ? "str" : t.name;
    case "array":
      return `[${t.size} x ${irType(t.element)}]`;
    case "slice":
      return `{ ${irType(t.element)}*, u64 }`;
    case "pointer":
      return `${irType(t.target)}*`;
    case "tuple":
      return `{ ${t.elements.map(irType).join(", ")} }`;
    case "result":
      return `{ status, ${irType(t.inner)} }`;
    case "function":
      return `${irType(t.returns)} (${t.params.map(irType).join(", ")})*`;
    case "void":
      return "void";
    case "unknown":
      return "<unknown>";
  }
}

function typed(v: Value): string {
  return `${irType(v.type)} ${val(v)}`;
}

export function val(v: Value): string {
  switch (v.kind) {
    case "reg":
      return `%${v.id}`;
    case "string":
      return `@.str.${v.index}`;
    case "undef":
      return "undef";
    case "const":
      if (typeof v.value === "boolean") return v.value ? "true" : "false";
      if (typeof v.value === "bigint") return v.value.toString();
      return Number.isInteger(v.value) ? v.value.toFixed(1) : String(v.value);
  }
}

function escapeString(s: string): string {
  let out = "";
  for (const ch of s) {
    const code = ch.codePointAt(0) ?? 0;
    if (ch === '"' || ch === "\\" || code < 0x20 || code > 0x7e) {
      out += code > 0xff ? `\\u{${code.toString(16)}}` : `\\${code.toString(16).toUpperCase().padStart(2, "0")}`;
    } else {
      out += ch;
    }
  }
  return out;
}
