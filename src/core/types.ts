// src/core/types.ts
//
// Kestrel type lattice
// --------------------
// Closed set of structural types shared by the checker, the safety checker and
// the IR. Types are compared structurally; there is no nominal subtyping.
//
// Two primitives exist for the runtime ABI: `status` (i32 width, the error
// convention) and `handle` (u64 width, opaque OS handle). They are mutually
// assignable with i32 / u64 respectively.

import type { Range, TypeNode } from "./ast";

export const INTEGER_KINDS = ["i8", "i16", "i32", "i64", "u8", "u16", "u32", "u64"] as const;
export const FLOAT_KINDS = ["f32", "f64"] as const;

export type IntegerKind = (typeof INTEGER_KINDS)[number];
export type FloatKind = (typeof FLOAT_KINDS)[number];

export type PrimitiveKind = IntegerKind | FloatKind | "bool" | "char" | "string" | "status" | "handle";

export const PRIMITIVE_KINDS: readonly PrimitiveKind[] = [
  ...INTEGER_KINDS,
  ...FLOAT_KINDS,
  "bool",
  "char",
  "string",
  "status",
  "handle",
];

export type Type =
  | { kind: "primitive"; name: PrimitiveKind }
  | { kind: "array"; element: Type; size: number }
  | { kind: "slice"; element: Type }
  | { kind: "pointer"; target: Type }
  | { kind: "tuple"; elements: Type[] }
  | { kind: "result"; inner: Type }
  | { kind: "function"; params: Type[]; returns: Type }
  | { kind: "void" }
  | { kind: "unknown" };

export type PrimitiveType = Extract<Type, { kind: "primitive" }>;

/* =========================================================
   Factory
   ========================================================= */

const primCache = new Map<PrimitiveKind, PrimitiveType>();

function prim(name: PrimitiveKind): PrimitiveType {
  const cached = primCache.get(name);
  if (cached) return cached;
  const t: PrimitiveType = { kind: "primitive", name };
  Object.freeze(t);
  primCache.set(name, t);
  return t;
}

const VOID: Type = Object.freeze({ kind: "void" as const });
const UNKNOWN: Type = Object.freeze({ kind: "unknown" as const });

export const T = {
  prim,
  i8: prim("i8"),
  i16: prim("i16"),
  i32: prim("i32"),
  i64: prim("i64"),
  u8: prim("u8"),
  u16: prim("u16"),
  u32: prim("u32"),
  u64: prim("u64"),
  f32: prim("f32"),
  f64: prim("f64"),
  bool: prim("bool"),
  char: prim("char"),
  string: prim("string"),
  status: prim("status"),
  handle: prim("handle"),
  void: VOID,
  unknown: UNKNOWN,
  array: (element: Type, size: number): Type => ({ kind: "array", element, size }),
  slice: (element: Type): Type => ({ kind: "slice", element }),
  pointer: (target: Type): Type => ({ kind: "pointer", target }),
  tuple: (elements: Type[]): Type => ({ kind: "tuple", elements }),
  result: (inner: Type): Type => ({ kind: "result", inner }),
  fn: (params: Type[], returns: Type): Type => ({ kind: "function", params, returns }),
};

export function isPrimitiveName(name: string): name is PrimitiveKind {
  return PRIMITIVE_KINDS.some((k) => k === name);
}

/* =========================================================
   Classification
   ========================================================= */

export function isPrimitive(t: Type, name?: PrimitiveKind): t is PrimitiveType {
  return t.kind === "primitive" && (name === undefined || t.name === name);
}

export function isIntegerKind(name: PrimitiveKind): name is IntegerKind {
  return INTEGER_KINDS.some((k) => k === name);
}

export function isFloatKind(name: PrimitiveKind): name is FloatKind {
  return name === "f32" || name === "f64";
}

/** Integer-like: the eight integer kinds plus status and handle. */
export function isIntegerLike(t: Type): boolean {
  return t.kind === "primitive" && (isIntegerKind(t.name) || t.name === "status" || t.name === "handle");
}

export function isFloat(t: Type): boolean {
  return t.kind === "primitive" && isFloatKind(t.name);
}

export function isNumeric(t: Type): boolean {
  return isIntegerLike(t) || isFloat(t);
}

export function isSignedKind(name: PrimitiveKind): boolean {
  return name.startsWith("i") || name === "status";
}

/** Bit width of a primitive; strings and other non-scalars have none. */
export function bitWidth(name: PrimitiveKind): number | null {
  switch (name) {
    case "bool":
      return 1;
    case "i8":
    case "u8":
    case "char":
      return 8;
    case "i16":
    case "u16":
      return 16;
    case "i32":
    case "u32":
    case "f32":
    case "status":
      return 32;
    case "i64":
    case "u64":
    case "f64":
    case "handle":
      return 64;
    case "string":
      return null;
  }
}

/** Inclusive value range of an integer-like primitive. */
export function integerRange(name: PrimitiveKind): [bigint, bigint] | null {
  const width = bitWidth(name);
  if (width === null || !(isIntegerKind(name) || name === "status" || name === "handle")) return null;
  const w = BigInt(width);
  if (isSignedKind(name)) return [-(1n << (w - 1n)), (1n << (w - 1n)) - 1n];
  return [0n, (1n << w) - 1n];
}

export function fitsIn(value: bigint, name: PrimitiveKind): boolean {
  const r = integerRange(name);
  return r !== null && value >= r[0] && value <= r[1];
}

/** Comparable with == / != (ordering additionally excludes bool and string). */
export function isEqualityComparable(t: Type): boolean {
  return t.kind === "primitive" || t.kind === "pointer";
}

export function isOrdered(t: Type): boolean {
  return isNumeric(t) || isPrimitive(t, "char");
}

export function containsUnknown(t: Type): boolean {
  switch (t.kind) {
    case "unknown":
      return true;
    case "array":
    case "slice":
      return containsUnknown(t.element);
    case "pointer":
      return containsUnknown(t.target);
    case "tuple":
      return t.elements.some(containsUnknown);
    case "result":
      return containsUnknown(t.inner);
    case "function":
      return t.params.some(containsUnknown) || containsUnknown(t.returns);
    default:
      return false;
  }
}

export function containsPointer(t: Type): boolean {
  switch (t.kind) {
    case "pointer":
      return true;
    case "array":
    case "slice":
      return containsPointer(t.element);
    case "tuple":
      return t.elements.some(containsPointer);
    case "result":
      return containsPointer(t.inner);
    case "function":
      return t.params.some(containsPointer) || containsPointer(t.returns);
    default:
      return false;
  }
}

/* =========================================================
   Status component (try_chain, @resilient)
   ========================================================= */

/**
 * Where a value carries its status code:
 * - "self": the value is a status
 * - "first": a tuple whose first element is a status
 * - "result": a result[T]
 * - null: the value cannot signal failure
 */
export type StatusCarrier = "self" | "first" | "result" | null;

export function statusCarrier(t: Type): StatusCarrier {
  if (isPrimitive(t, "status")) return "self";
  if (t.kind === "result") return "result";
  const first = t.kind === "tuple" ? t.elements[0] : undefined;
  if (first && isPrimitive(first, "status")) return "first";
  return null;
}

/* =========================================================
   Equality / assignability
   ========================================================= */

export function typeEquals(a: Type, b: Type): boolean {
  switch (a.kind) {
    case "primitive":
      return b.kind === "primitive" && a.name === b.name;
    case "array":
      return b.kind === "array" && a.size === b.size && typeEquals(a.element, b.element);
    case "slice":
      return b.kind === "slice" && typeEquals(a.element, b.element);
    case "pointer":
      return b.kind === "pointer" && typeEquals(a.target, b.target);
    case "tuple":
      return b.kind === "tuple" && listEquals(a.elements, b.elements);
    case "result":
      return b.kind === "result" && typeEquals(a.inner, b.inner);
    case "function":
      return b.kind === "function" && listEquals(a.params, b.params) && typeEquals(a.returns, b.returns);
    case "void":
    case "unknown":
      return a.kind === b.kind;
  }
}

function listEquals(a: Type[], b: Type[]): boolean {
  return a.length === b.length && a.every((t, i) => {
    const other = b[i];
    return other !== undefined && typeEquals(t, other);
  });
}

/**
 * Can a value of `from` be stored where `to` is expected?
 * Unknown is compatible with everything so one error doesn't cascade.
 */
export function isAssignable(from: Type, to: Type): boolean {
  if (from.kind === "unknown" || to.kind === "unknown") return true;
  if (from.kind === "primitive" && to.kind === "primitive") {
    return from.name === to.name || aliasPair(from.name, to.name);
  }
  if (from.kind === "tuple" && to.kind === "tuple") {
    return from.elements.length === to.elements.length && from.elements.every((t, i) => {
      const target = to.elements[i];
      return target !== undefined && isAssignable(t, target);
    });
  }
  if (from.kind === "array" && to.kind === "slice") {
    return typeEquals(from.element, to.element);
  }
  return typeEquals(from, to);
}

function aliasPair(a: PrimitiveKind, b: PrimitiveKind): boolean {
  return (
    (a === "status" && b === "i32") ||
    (a === "i32" && b === "status") ||
    (a === "handle" && b === "u64") ||
    (a === "u64" && b === "handle")
  );
}

/* =========================================================
   Formatting
   ========================================================= */

export function typeToString(t: Type): string {
  switch (t.kind) {
    case "primitive":
      return t.name;
    case "array":
      return `array[${typeToString(t.element)}, ${t.size}]`;
    case "slice":
      return `slice[${typeToString(t.element)}]`;
    case "pointer":
      return `ptr[${typeToString(t.target)}]`;
    case "tuple":
      return `(${t.elements.map(typeToString).join(", ")})`;
    case "result":
      return `result[${typeToString(t.inner)}]`;
    case "function":
      return `func(${t.params.map(typeToString).join(", ")}) -> ${typeToString(t.returns)}`;
    case "void":
      return "void";
    case "unknown":
      return "unknown";
  }
}

/* =========================================================
   Annotations -> types
   ========================================================= */

export type TypeProblem = {
  message: string;
  range: Range;
};

/** Resolves a parsed annotation; unresolvable parts become unknown and add a problem. */
export function typeFromNode(node: TypeNode, problems: TypeProblem[]): Type {
  switch (node.kind) {
    case "NamedType":
      if (isPrimitiveName(node.name)) return T.prim(node.name);
      if (node.name === "void") return T.void;
      problems.push({ message: `Unknown type '${node.name}'.`, range: node.range });
      return T.unknown;
    case "PointerType":
      return T.pointer(typeFromNode(node.target, problems));
    case "ArrayType":
      if (node.size < 1) problems.push({ message: "Array length must be at least 1.", range: node.range });
      return T.array(typeFromNode(node.element, problems), node.size);
    case "SliceType":
      return T.slice(typeFromNode(node.element, problems));
    case "TupleType":
      if (node.elements.length < 2) {
        problems.push({ message: "A tuple type needs at least two elements.", range: node.range });
      }
      return T.tuple(node.elements.map((e) => typeFromNode(e, problems)));
    case "ResultType":
      return T.result(typeFromNode(node.inner, problems));
  }
}
