// src/core/checker.ts
//
// Kestrel Type Checker
// --------------------
// Two passes over a parsed Module:
//   1) register every function signature (forward references just work)
//   2) check each function body against the scope chain
//
// Results live in side tables keyed by node identity (TypedModule); the AST is
// never mutated, so checking the same tree twice gives the same answer.
//
// Literal typing is deliberately plain: integer literals are i32 and float
// literals f64 unless a suffix or the expected type (annotation, parameter,
// return type, the other operand) says otherwise. There is no implicit widening.

import {
  forEachChild,
  isExpression,
  qualifiedNameOf,
  UNKNOWN_RANGE,
  type ArrayLiteral,
  type Assign,
  type BinaryOp,
  type BinaryOperator,
  type Block,
  type Call,
  type Expression,
  type For,
  type FunctionDecl,
  type Identifier,
  type IndexExpr,
  type IntLiteral,
  type FloatLiteral,
  type Match,
  type MemberAccess,
  type Module,
  type Node,
  type Range,
  type Return,
  type Statement,
  type TryChain,
  type TryClause,
  type TupleExpr,
  type TypeNode,
  type UnaryOp,
  type VarDecl,
  type While,
} from "./ast";
import { defaultExternals, type ExternalSignature, type ExternalTable } from "./externals";
import { makeSymbol, Scope, type SymbolInfo, type SymbolKind } from "./scope";
import { STATUS_NAMES } from "./status";
import {
  containsUnknown,
  fitsIn,
  isAssignable,
  isEqualityComparable,
  isFloat,
  isIntegerLike,
  isNumeric,
  isOrdered,
  isPrimitive,
  isPrimitiveName,
  statusCarrier,
  T,
  typeEquals,
  typeFromNode,
  typeToString,
  type Type,
  type TypeProblem,
} from "./types";
import { InternalCompilerError, type StageError } from "../diagnostics/errors";

/* =========================================================
   Results
   ========================================================= */

export type CheckErrorCode =
  | "UndefinedSymbol"
  | "OperandMismatch"
  | "ReturnArityMismatch"
  | "ReturnTypeMismatch"
  | "IndexOutOfBounds"
  | "DuplicateDeclaration"
  | "TypeMismatch"
  | "ArgumentCountMismatch"
  | "NotCallable"
  | "NotIndexable"
  | "AssignToImmutable"
  | "UnknownType"
  | "NonExhaustiveMatch"
  | "UnreachableCase"
  | "ClauseTypeMismatch"
  | "LiteralOutOfRange"
  | "MissingReturn"
  | "BreakOutsideLoop"
  | "InvalidDecoratorUse";

export type CheckError = StageError & { code: CheckErrorCode };

export type FunctionSignature = {
  name: string;
  params: Array<{ name: string; type: Type }>;
  /** void, a single type, or a tuple for multi-return functions. */
  returns: Type;
  /** Per-position return types; [] for void. */
  returnTypes: Type[];
  decl: FunctionDecl;
};

export type CallTarget =
  | { kind: "function"; signature: FunctionSignature }
  | { kind: "external"; signature: ExternalSignature }
  | { kind: "builtin"; name: "len" | "range" }
  | { kind: "unresolved" };

export type TypedModule = {
  module: Module;
  externals: ExternalTable;
  /** Type of every checked expression. */
  types: Map<Expression, Type>;
  signatures: Map<string, FunctionSignature>;
  /** Declaration and use sites resolved to their symbol. */
  bindings: Map<Identifier, SymbolInfo>;
  calls: Map<Call, CallTarget>;
  /** Function-local symbols in declaration order (with read/write counts). */
  locals: SymbolInfo[];
  /** Functions, imports and constants visible at module level. */
  globals: SymbolInfo[];
  /** Functions whose bodies were checked. */
  checkedFunctions: Set<FunctionDecl>;
  /** Import paths that make qualified external calls legal. */
  importPaths: string[];
};

export type CheckOptions = {
  externals?: ExternalTable;
};

export type CheckResult = {
  typed: TypedModule;
  errors: CheckError[];
};

export function check(module: Module, options: CheckOptions = {}): CheckResult {
  const checker = new Checker(module, options.externals ?? defaultExternals());
  return checker.run();
}

/** Bare `len(x)` / `range(...)` unless shadowed. */
const BUILTINS = new Set(["len", "range"]);

type FunctionContext = {
  signature: FunctionSignature;
  loopDepth: number;
};

/* =========================================================
   Checker
   ========================================================= */

class Checker {
  private readonly module: Module;
  private readonly externals: ExternalTable;

  private readonly errors: CheckError[] = [];
  private readonly types = new Map<Expression, Type>();
  private readonly signatures = new Map<string, FunctionSignature>();
  private readonly bindings = new Map<Identifier, SymbolInfo>();
  private readonly calls = new Map<Call, CallTarget>();
  private readonly locals: SymbolInfo[] = [];
  private readonly checked = new Set<FunctionDecl>();
  private readonly importPaths: string[] = [];
  private readonly importAliases = new Map<string, string>();
  private readonly incomplete: ReadonlySet<string>;

  private readonly moduleScope = new Scope("module", null);
  private scope: Scope = this.moduleScope;
  private fn: FunctionContext | null = null;

  constructor(module: Module, externals: ExternalTable) {
    this.module = module;
    this.externals = externals;
    this.incomplete = new Set(module.incompleteFunctions);
  }

  public run(): CheckResult {
    this.defineConstants();
    this.bindImports();
    this.registerSignatures();

    for (const decl of this.module.functions) this.checkFunction(decl);

    if (this.errors.length === 0 && this.incomplete.size === 0) this.assertFullyTyped();

    return {
      typed: {
        module: this.module,
        externals: this.externals,
        types: this.types,
        signatures: this.signatures,
        bindings: this.bindings,
        calls: this.calls,
        locals: this.locals,
        globals: this.moduleScope.allLocal(),
        checkedFunctions: this.checked,
        importPaths: this.importPaths,
      },
      errors: this.errors,
    };
  }

  /* =========================================================
     Module level
     ========================================================= */

  private defineConstants(): void {
    for (const name of STATUS_NAMES) {
      this.moduleScope.define(makeSymbol(name, "constant", T.status, UNKNOWN_RANGE, null));
    }
  }

  private bindImports(): void {
    for (const imp of this.module.imports) {
      const path = imp.path.parts.join(".");
      if (!this.isNamespace(path)) {
        this.error("UndefinedSymbol", `Unknown module '${path}'.`, imp.path.range);
        continue;
      }

      if (imp.kind === "ImportDecl") {
        this.importPaths.push(path);
        if (imp.alias) this.bindAlias(imp.alias, path);
        continue;
      }

      for (const item of imp.names) {
        const full = `${path}.${item.name.name}`;
        const local = item.alias ?? item.name;
        const sig = this.externals.lookup(full);

        if (sig) {
          const sym = makeSymbol(local.name, "import", T.fn(sig.params, sig.returns), local.range, null, full);
          if (!this.moduleScope.define(sym)) this.duplicate(local);
          else this.bindings.set(local, sym);
        } else if (this.isNamespace(full)) {
          this.importPaths.push(full);
          this.bindAlias(local, full);
        } else {
          this.error("UndefinedSymbol", `'${item.name.name}' is not exported by '${path}'.`, item.name.range);
        }
      }
    }
  }

  private bindAlias(alias: Identifier, path: string): void {
    if (this.importAliases.has(alias.name) || this.moduleScope.getLocal(alias.name)) {
      this.duplicate(alias);
      return;
    }
    this.importAliases.set(alias.name, path);
  }

  private isNamespace(path: string): boolean {
    const prefix = `${path}.`;
    return this.externals.names().some((n) => n.startsWith(prefix));
  }

  private registerSignatures(): void {
    for (const decl of this.module.functions) {
      const problems: TypeProblem[] = [];
      const params = decl.params.map((p) => ({ name: p.name.name, type: typeFromNode(p.type, problems) }));
      const returns = decl.returnType ? typeFromNode(decl.returnType, problems) : T.void;
      for (const pr of problems) this.error("UnknownType", pr.message, pr.range);

      const sig: FunctionSignature = {
        name: decl.name.name,
        params,
        returns,
        returnTypes: returns.kind === "void" ? [] : returns.kind === "tuple" ? returns.elements : [returns],
        decl,
      };

      const sym = makeSymbol(sig.name, "function", T.fn(params.map((p) => p.type), returns), decl.name.range, null);
      if (this.signatures.has(sig.name) || !this.moduleScope.define(sym)) {
        this.duplicate(decl.name);
        continue;
      }
      this.signatures.set(sig.name, sig);
      this.bindings.set(decl.name, sym);
      this.checkDecoratorUse(decl, sig);
    }
  }

  private checkDecoratorUse(decl: FunctionDecl, sig: FunctionSignature): void {
    for (const d of decl.decorators) {
      if (d.config.kind === "resilient" && statusCarrier(sig.returns) === null && sig.returns.kind !== "unknown") {
        this.error(
          "InvalidDecoratorUse",
          `'@resilient' needs a function that returns a status, got ${typeToString(sig.returns)}.`,
          d.range,
          "return status, (status, T) or result[T]"
        );
      }
      if (d.config.kind === "export" && decl.name.name === "main") {
        this.error("InvalidDecoratorUse", "'main' cannot be exported.", d.range);
      }
    }
  }

  /* =========================================================
     Functions
     ========================================================= */

  private checkFunction(decl: FunctionDecl): void {
    const sig = this.signatures.get(decl.name.name);
    if (!sig || sig.decl !== decl) return;
    // Statements that failed to parse would only produce follow-on noise.
    if (decl.hasErrors) return;

    this.checked.add(decl);
    const fnScope = new Scope("function", this.moduleScope);
    this.scope = fnScope;
    this.fn = { signature: sig, loopDepth: 0 };

    decl.params.forEach((p, i) => {
      this.declare(p.name, "param", sig.params[i]?.type ?? T.unknown);
    });

    const terminates = this.checkStatements(decl.body.body);
    if (sig.returns.kind !== "void" && !terminates) {
      this.error(
        "MissingReturn",
        `'${sig.name}' must return ${typeToString(sig.returns)} on every path.`,
        decl.name.range
      );
    }

    this.scope = this.moduleScope;
    this.fn = null;
  }

  /* =========================================================
     Statements (return true when control never falls through)
     ========================================================= */

  private checkStatements(list: Statement[]): boolean {
    let terminated = false;
    for (const st of list) {
      if (this.checkStatement(st)) terminated = true;
    }
    return terminated;
  }

  private checkBlock(block: Block): boolean {
    return this.withBlockScope(() => this.checkStatements(block.body));
  }

  private checkStatement(st: Statement): boolean {
    switch (st.kind) {
      case "VarDecl":
        this.checkVarDecl(st);
        return false;
      case "Assign":
        this.checkAssign(st);
        return false;
      case "ExprStmt":
        this.checkExpr(st.expression, null);
        return false;
      case "If": {
        this.checkCondition(st.test);
        let all = this.checkBlock(st.consequent);
        for (const c of st.elifs) {
          this.checkCondition(c.test);
          all = this.checkBlock(c.consequent) && all;
        }
        const alt = st.alternate ? this.checkBlock(st.alternate) : false;
        return all && alt;
      }
      case "While":
        return this.checkWhile(st);
      case "For":
        this.checkFor(st);
        return false;
      case "Match":
        return this.checkMatch(st);
      case "Return":
        this.checkReturn(st);
        return true;
      case "Pass":
        return false;
      case "Break":
      case "Continue":
        if (!this.fn || this.fn.loopDepth === 0) {
          this.error("BreakOutsideLoop", `'${st.kind.toLowerCase()}' outside of a loop.`, st.range);
          return false;
        }
        return true;
    }
  }

  private checkCondition(test: Expression): void {
    const t = this.checkExpr(test, T.bool);
    if (!isPrimitive(t, "bool") && t.kind !== "unknown") {
      this.error("TypeMismatch", `Condition must be bool, got ${typeToString(t)}.`, test.range);
    }
  }

  private checkVarDecl(d: VarDecl): void {
    const declared = d.typeAnnotation ? this.resolveType(d.typeAnnotation) : null;
    const init = this.checkExpr(d.initializer, declared);

    if (init.kind === "void") {
      this.error("TypeMismatch", "The initializer does not produce a value.", d.initializer.range);
    } else if (declared && !isAssignable(init, declared)) {
      this.error(
        "TypeMismatch",
        `Cannot initialize ${typeToString(declared)} with ${typeToString(init)}.`,
        d.initializer.range
      );
    }

    const bound = declared ?? (init.kind === "void" ? T.unknown : init);
    const kind: SymbolKind = d.mutable ? "var" : "let";

    if (!d.destructure) {
      for (const name of d.names) this.declare(name, kind, bound);
      return;
    }

    const parts = bound.kind === "tuple" && bound.elements.length === d.names.length ? bound.elements : null;
    if (!parts && bound.kind !== "unknown") {
      this.error(
        "TypeMismatch",
        `Cannot destructure ${typeToString(bound)} into ${d.names.length} names.`,
        d.range
      );
    }
    d.names.forEach((name, i) => this.declare(name, kind, parts?.[i] ?? T.unknown));
  }

  private checkAssign(a: Assign): void {
    const target = this.assignTargetType(a.target, a.op !== "=");

    if (a.op === "=") {
      const v = this.checkExpr(a.value, target);
      if (!isAssignable(v, target)) {
        this.error("TypeMismatch", `Cannot assign ${typeToString(v)} to ${typeToString(target)}.`, a.value.range);
      }
      return;
    }

    const op = compoundOperator(a.op);
    const v = this.checkExpr(a.value, target);
    const result = this.binaryResultType(op, target, v, a.range);
    if (!isAssignable(result, target)) {
      this.error(
        "TypeMismatch",
        `'${a.op}' produces ${typeToString(result)}, which cannot be stored in ${typeToString(target)}.`,
        a.range
      );
    }
  }

  private assignTargetType(target: Identifier | IndexExpr, compound: boolean): Type {
    if (target.kind === "IndexExpr") {
      const t = this.record(target, this.indexType(target));
      this.checkElementTarget(target);
      return t;
    }

    const sym = this.scope.resolve(target.name);
    if (!sym) {
      if (!this.incomplete.has(target.name)) {
        this.error("UndefinedSymbol", `Unknown name '${target.name}'.`, target.range);
      }
      return this.record(target, T.unknown);
    }

    this.bindings.set(target, sym);
    sym.writes++;
    if (compound) sym.reads++;

    if (!sym.mutable) {
      this.error("AssignToImmutable", immutableMessage(sym), target.range, sym.kind === "let" ? "declare it with 'var'" : undefined);
    }
    return this.record(target, sym.kind === "function" || sym.kind === "import" ? T.unknown : sym.type);
  }

  /** `a[i] = v` writes into `a`: it must be a var unless it goes through a slice or pointer. */
  private checkElementTarget(target: IndexExpr): void {
    let node: Expression = target;
    while (node.kind === "IndexExpr") {
      const objType = this.types.get(node.object);
      if (objType && (objType.kind === "slice" || objType.kind === "pointer")) return;
      if (objType && objType.kind === "tuple") {
        this.error("AssignToImmutable", "Tuple elements cannot be assigned.", node.range);
        return;
      }
      node = node.object;
    }

    if (node.kind !== "Identifier") {
      this.error("AssignToImmutable", "Only elements of a variable can be assigned.", node.range);
      return;
    }

    const sym = this.bindings.get(node);
    if (!sym) return;
    sym.writes++;
    if (!sym.mutable) {
      this.error("AssignToImmutable", immutableMessage(sym), node.range, sym.kind === "let" ? "declare it with 'var'" : undefined);
    }
  }

  private checkWhile(w: While): boolean {
    this.checkCondition(w.test);
    this.loop(() => this.checkBlock(w.body));
    // `while true` without a break never falls through.
    return w.test.kind === "BoolLiteral" && w.test.value && !breaksOut(w.body);
  }

  private checkFor(f: For): void {
    let element: Type = T.unknown;
    const it = f.iterable;

    if (it.kind === "Call" && it.callee.kind === "Identifier" && it.callee.name === "range" && !this.scope.resolve("range")) {
      this.calls.set(it, { kind: "builtin", name: "range" });
      element = this.rangeArgs(it);
      this.record(it, T.slice(element));
    } else {
      const t = this.checkExpr(it, null);
      if (t.kind === "array" || t.kind === "slice") element = t.element;
      else if (t.kind !== "unknown") {
        this.error("TypeMismatch", `Cannot iterate over ${typeToString(t)}.`, it.range, "use range(a, b), an array or a slice");
      }
    }

    this.loop(() =>
      this.withBlockScope(() => {
        this.declare(f.variable, "loop", element);
        this.checkStatements(f.body.body);
      })
    );
  }

  private rangeArgs(call: Call): Type {
    const [first, second] = call.args;
    if (!first || call.args.length > 2) {
      this.error("ArgumentCountMismatch", `'range' takes 1 or 2 arguments, got ${call.args.length}.`, call.range);
      for (const a of call.args) this.checkExpr(a, null);
      return T.unknown;
    }

    let t: Type;
    if (second) {
      const [l, r] = this.checkOperands(first, second, null);
      if (l.kind !== "unknown" && r.kind !== "unknown" && !sameScalar(l, r)) {
        this.error("OperandMismatch", `range bounds differ: ${typeToString(l)} and ${typeToString(r)}.`, call.range);
      }
      t = l;
    } else {
      t = this.checkExpr(first, null);
    }

    if (!isIntegerLike(t) && t.kind !== "unknown") {
      this.error("TypeMismatch", `range bounds must be integers, got ${typeToString(t)}.`, call.range);
      return T.unknown;
    }
    return t;
  }

  private checkMatch(m: Match): boolean {
    const subject = this.checkExpr(m.subject, null);
    if (subject.kind !== "unknown" && (subject.kind !== "primitive" || !isEqualityComparable(subject))) {
      this.error("TypeMismatch", `Cannot match on ${typeToString(subject)}.`, m.subject.range);
    }

    let wildcard = false;
    let sawTrue = false;
    let sawFalse = false;
    let allTerminate = m.cases.length > 0;

    for (const c of m.cases) {
      if (wildcard) {
        this.error("UnreachableCase", "This case can never match; 'case _' above matches everything.", c.range);
      }

      for (const p of c.patterns) {
        switch (p.kind) {
          case "WildcardPattern":
            wildcard = true;
            break;
          case "ValuePattern": {
            const t = this.checkExpr(p.value, subject);
            if (!isAssignable(t, subject)) {
              this.error("TypeMismatch", `Pattern of type ${typeToString(t)} cannot match ${typeToString(subject)}.`, p.range);
            }
            if (p.value.kind === "BoolLiteral") {
              if (p.value.value) sawTrue = true;
              else sawFalse = true;
            }
            break;
          }
          case "RangePattern": {
            if (!isOrdered(subject) && subject.kind !== "unknown") {
              this.error("TypeMismatch", `Range patterns need a numeric subject, got ${typeToString(subject)}.`, p.range);
            }
            for (const bound of [p.low, p.high]) {
              const t = this.checkExpr(bound, subject);
              if (!isAssignable(t, subject)) {
                this.error("TypeMismatch", `Range bound of type ${typeToString(t)} cannot match ${typeToString(subject)}.`, bound.range);
              }
            }
            break;
          }
        }
      }

      if (!this.checkBlock(c.body)) allTerminate = false;
    }

    const exhaustive = wildcard || (isPrimitive(subject, "bool") && sawTrue && sawFalse);
    if (!exhaustive && subject.kind !== "unknown") {
      this.error("NonExhaustiveMatch", `match on ${typeToString(subject)} does not cover every value.`, m.range, "add 'case _'");
    }
    return exhaustive && allTerminate;
  }

  private checkReturn(r: Return): void {
    const ctx = this.fn;
    if (!ctx) return;
    const sig = ctx.signature;
    const expected = sig.returnTypes;

    if (expected.length === 0) {
      for (const v of r.values) this.checkExpr(v, null);
      if (r.values.length) {
        this.error("ReturnArityMismatch", `'${sig.name}' returns nothing but 'return' gives ${r.values.length} value(s).`, r.range);
      }
      return;
    }

    const [only] = r.values;
    if (only && r.values.length === 1 && expected.length > 1) {
      // `return pair` where pair is already a tuple
      const t = this.checkExpr(only, sig.returns);
      if (t.kind !== "tuple" && t.kind !== "unknown") {
        this.error("ReturnArityMismatch", `'${sig.name}' returns ${expected.length} values, got 1.`, r.range);
      } else if (!isAssignable(t, sig.returns)) {
        this.error("ReturnTypeMismatch", `'${sig.name}' returns ${typeToString(sig.returns)}, got ${typeToString(t)}.`, only.range);
      }
      return;
    }

    if (r.values.length !== expected.length) {
      r.values.forEach((v, i) => this.checkExpr(v, expected[i] ?? null));
      this.error(
        "ReturnArityMismatch",
        `'${sig.name}' returns ${expected.length} value(s), got ${r.values.length}.`,
        r.range
      );
      return;
    }

    r.values.forEach((v, i) => {
      const want = expected[i] ?? T.unknown;
      const t = this.checkExpr(v, want);
      if (!isAssignable(t, want)) {
        const where = expected.length > 1 ? `Return value ${i + 1} of '${sig.name}'` : `'${sig.name}'`;
        this.error("ReturnTypeMismatch", `${where} should be ${typeToString(want)}, got ${typeToString(t)}.`, v.range);
      }
    });
  }

  /* =========================================================
     Expressions
     ========================================================= */

  private checkExpr(e: Expression, expected: Type | null): Type {
    return this.record(e, this.exprType(e, expected));
  }

  private exprType(e: Expression, expected: Type | null): Type {
    switch (e.kind) {
      case "IntLiteral":
        return this.intLiteralType(e, expected, false);
      case "FloatLiteral":
        return floatLiteralType(e, expected);
      case "StringLiteral":
        return T.string;
      case "BoolLiteral":
        return T.bool;
      case "Identifier":
        return this.identifierType(e);
      case "BinaryOp":
        return this.binaryType(e, expected);
      case "UnaryOp":
        return this.unaryType(e, expected);
      case "Call":
        return this.callType(e);
      case "TupleExpr":
        return this.tupleType(e, expected);
      case "ArrayLiteral":
        return this.arrayType(e, expected);
      case "IndexExpr":
        return this.indexType(e);
      case "MemberAccess":
        return this.memberType(e);
      case "TryChain":
        return this.tryChainType(e, expected);
    }
  }

  private intLiteralType(e: IntLiteral, expected: Type | null, negated: boolean): Type {
    let target: Type = T.i32;
    if (e.suffix !== null && isPrimitiveName(e.suffix)) target = T.prim(e.suffix);
    else if (expected && (isIntegerLike(expected) || isFloat(expected))) target = expected;

    if (isFloat(target)) return target;

    const value = negated ? -e.value : e.value;
    if (target.kind === "primitive" && !fitsIn(value, target.name)) {
      this.error("LiteralOutOfRange", `${negated ? "-" : ""}${e.raw} does not fit in ${target.name}.`, e.range);
    }
    return target;
  }

  private identifierType(id: Identifier): Type {
    const sym = this.scope.resolve(id.name);
    if (!sym) {
      if (this.incomplete.has(id.name)) return T.unknown;
      if (this.externals.has(id.name) || BUILTINS.has(id.name)) {
        this.error("TypeMismatch", `'${id.name}' is a function and can only be called.`, id.range);
      } else {
        this.error("UndefinedSymbol", `Unknown name '${id.name}'.`, id.range);
      }
      return T.unknown;
    }

    this.bindings.set(id, sym);
    if (sym.kind === "function" || sym.kind === "import") {
      this.error("TypeMismatch", `'${id.name}' is a function and can only be called.`, id.range);
      return T.unknown;
    }
    sym.reads++;
    return sym.type;
  }

  private binaryType(e: BinaryOp, expected: Type | null): Type {
    if (e.op === "and" || e.op === "or") {
      const l = this.checkExpr(e.left, T.bool);
      const r = this.checkExpr(e.right, T.bool);
      for (const [t, side] of [[l, e.left], [r, e.right]] as const) {
        if (!isPrimitive(t, "bool") && t.kind !== "unknown") {
          this.error("OperandMismatch", `'${e.op}' needs bool operands, got ${typeToString(t)}.`, side.range);
        }
      }
      return T.bool;
    }

    const hint = isComparison(e.op) ? null : expected;
    const [l, r] = this.checkOperands(e.left, e.right, hint);
    return this.binaryResultType(e.op, l, r, e.range);
  }

  /** Checks both operands, letting a bare literal take the other side's type. */
  private checkOperands(left: Expression, right: Expression, hint: Type | null): [Type, Type] {
    if (isBareLiteral(left) && !isBareLiteral(right)) {
      const r = this.checkExpr(right, hint);
      const l = this.checkExpr(left, r.kind === "unknown" ? hint : r);
      return [l, r];
    }
    const l = this.checkExpr(left, hint);
    const r = this.checkExpr(right, l.kind === "unknown" ? hint : l);
    return [l, r];
  }

  private binaryResultType(op: BinaryOperator, l: Type, r: Type, range: Range): Type {
    const comparison = isComparison(op);
    if (l.kind === "unknown" || r.kind === "unknown") return comparison ? T.bool : T.unknown;

    const mismatch = (what: string): Type => {
      this.error(
        "OperandMismatch",
        `Operator '${op}' needs ${what}, got ${typeToString(l)} and ${typeToString(r)}.`,
        range
      );
      return comparison ? T.bool : T.unknown;
    };

    switch (op) {
      case "+":
        if (isPrimitive(l, "string") && isPrimitive(r, "string")) return T.string;
        return isNumeric(l) && sameScalar(l, r) ? l : mismatch("two operands of the same numeric type");
      case "-":
      case "*":
      case "/":
      case "%":
      case "**":
        return isNumeric(l) && sameScalar(l, r) ? l : mismatch("two operands of the same numeric type");
      case "&":
      case "|":
      case "^":
        return isIntegerLike(l) && sameScalar(l, r) ? l : mismatch("two operands of the same integer type");
      case "<<":
      case ">>":
        return isIntegerLike(l) && isIntegerLike(r) ? l : mismatch("integer operands");
      case "==":
      case "!=":
        return isEqualityComparable(l) && sameScalar(l, r) ? T.bool : mismatch("two comparable operands of the same type");
      case "<":
      case "<=":
      case ">":
      case ">=":
        return isOrdered(l) && sameScalar(l, r) ? T.bool : mismatch("two numeric operands of the same type");
      case "and":
      case "or":
        return T.bool;
    }
  }

  private unaryType(e: UnaryOp, expected: Type | null): Type {
    const operand = e.operand;
    switch (e.op) {
      case "-": {
        if (operand.kind === "IntLiteral") return this.record(operand, this.intLiteralType(operand, expected, true));
        const t = this.checkExpr(operand, expected);
        if (!isNumeric(t) && t.kind !== "unknown") {
          this.error("OperandMismatch", `Unary '-' needs a number, got ${typeToString(t)}.`, e.range);
          return T.unknown;
        }
        return t;
      }
      case "not": {
        const t = this.checkExpr(operand, T.bool);
        if (!isPrimitive(t, "bool") && t.kind !== "unknown") {
          this.error("OperandMismatch", `'not' needs bool, got ${typeToString(t)}.`, e.range);
        }
        return T.bool;
      }
      case "~": {
        const t = this.checkExpr(operand, expected);
        if (!isIntegerLike(t) && t.kind !== "unknown") {
          this.error("OperandMismatch", `'~' needs an integer, got ${typeToString(t)}.`, e.range);
          return T.unknown;
        }
        return t;
      }
    }
  }

  private callType(e: Call): Type {
    const target = this.resolveCallee(e);
    this.calls.set(e, target);

    switch (target.kind) {
      case "function": {
        const sig = target.signature;
        this.checkArgs(e, sig.params.map((p) => p.type), sig.name);
        return sig.returns;
      }
      case "external": {
        const sig = target.signature;
        this.checkArgs(e, sig.params, sig.name);
        return sig.returns;
      }
      case "builtin":
        if (target.name === "range") {
          for (const a of e.args) this.checkExpr(a, null);
          this.error("TypeMismatch", "range() can only be used as the iterable of a for loop.", e.range);
          return T.unknown;
        }
        return this.lenType(e);
      case "unresolved":
        for (const a of e.args) this.checkExpr(a, null);
        return T.unknown;
    }
  }

  private resolveCallee(e: Call): CallTarget {
    const callee = e.callee;

    if (callee.kind === "Identifier") {
      const name = callee.name;
      const sym = this.scope.resolve(name);
      if (sym) {
        this.bindings.set(callee, sym);
        if (sym.kind === "function") {
          const sig = this.signatures.get(name);
          if (sig) return { kind: "function", signature: sig };
        }
        if (sym.kind === "import" && sym.target) {
          sym.reads++;
          const ext = this.externals.lookup(sym.target);
          if (ext) return { kind: "external", signature: ext };
        }
        sym.reads++;
        if (sym.type.kind !== "unknown") {
          this.error("NotCallable", `'${name}' has type ${typeToString(sym.type)} and cannot be called.`, callee.range);
        }
        return { kind: "unresolved" };
      }

      if (name === "len" || name === "range") return { kind: "builtin", name };
      const ext = this.externals.lookup(name);
      if (ext) return { kind: "external", signature: ext };
      if (!this.incomplete.has(name)) this.error("UndefinedSymbol", `Unknown function '${name}'.`, callee.range);
      return { kind: "unresolved" };
    }

    if (callee.kind === "MemberAccess") {
      const path = qualifiedNameOf(callee);
      const head = path?.split(".")[0];
      if (path && head && !this.scope.resolve(head)) return this.resolveQualified(path, callee.range);

      this.checkExpr(callee.object, null);
      this.error("NotCallable", `'${callee.property.name}' is not a function.`, callee.property.range);
      return { kind: "unresolved" };
    }

    const t = this.checkExpr(callee, null);
    if (t.kind !== "unknown") {
      this.error("NotCallable", `A value of type ${typeToString(t)} cannot be called.`, callee.range);
    }
    return { kind: "unresolved" };
  }

  private resolveQualified(path: string, range: Range): CallTarget {
    const [head, ...rest] = path.split(".");
    const aliased = head === undefined ? undefined : this.importAliases.get(head);
    const full = aliased ? [aliased, ...rest].join(".") : path;

    const sig = this.externals.lookup(full);
    if (!sig) {
      this.error("UndefinedSymbol", `Unknown function '${full}'.`, range);
      return { kind: "unresolved" };
    }

    if (!aliased && !this.isImported(full)) {
      const parent = full.slice(0, full.lastIndexOf("."));
      this.error("UndefinedSymbol", `'${full}' is used without an import.`, range, `add 'import ${parent}'`);
    }
    return { kind: "external", signature: sig };
  }

  private isImported(full: string): boolean {
    return this.importPaths.some((p) => full.startsWith(`${p}.`));
  }

  private checkArgs(e: Call, params: Type[], name: string): void {
    if (e.args.length !== params.length) {
      this.error(
        "ArgumentCountMismatch",
        `'${name}' takes ${params.length} argument(s), got ${e.args.length}.`,
        e.range
      );
      e.args.forEach((a, i) => this.checkExpr(a, params[i] ?? null));
      return;
    }

    e.args.forEach((a, i) => {
      const want = params[i] ?? T.unknown;
      const t = this.checkExpr(a, want);
      if (!isAssignable(t, want)) {
        this.error(
          "TypeMismatch",
          `Argument ${i + 1} of '${name}' should be ${typeToString(want)}, got ${typeToString(t)}.`,
          a.range
        );
      }
    });
  }

  private lenType(e: Call): Type {
    const [arg] = e.args;
    if (!arg || e.args.length !== 1) {
      this.error("ArgumentCountMismatch", `'len' takes 1 argument, got ${e.args.length}.`, e.range);
      for (const a of e.args) this.checkExpr(a, null);
      return T.u64;
    }
    const t = this.checkExpr(arg, null);
    if (t.kind !== "array" && t.kind !== "slice" && !isPrimitive(t, "string") && t.kind !== "unknown") {
      this.error("TypeMismatch", `len() needs an array, slice or string, got ${typeToString(t)}.`, arg.range);
    }
    return T.u64;
  }

  private tupleType(e: TupleExpr, expected: Type | null): Type {
    const hints = expected && expected.kind === "tuple" && expected.elements.length === e.elements.length ? expected.elements : null;
    const elements = e.elements.map((el, i) => {
      const t = this.checkExpr(el, hints?.[i] ?? null);
      if (t.kind === "void") {
        this.error("TypeMismatch", "A tuple element must produce a value.", el.range);
        return T.unknown;
      }
      return t;
    });
    return T.tuple(elements);
  }

  private arrayType(e: ArrayLiteral, expected: Type | null): Type {
    const hint = expected && (expected.kind === "array" || expected.kind === "slice") ? expected.element : null;
    const [first, ...rest] = e.elements;
    if (!first) {
      this.error("TypeMismatch", "Empty array literals are not supported.", e.range);
      return T.unknown;
    }

    const element = hint ?? this.checkExpr(first, null);
    if (hint) {
      const t = this.checkExpr(first, hint);
      if (!isAssignable(t, hint)) this.elementMismatch(hint, t, first.range);
    }
    for (const el of rest) {
      const t = this.checkExpr(el, element);
      if (!isAssignable(t, element)) this.elementMismatch(element, t, el.range);
    }
    return T.array(element, e.elements.length);
  }

  private elementMismatch(want: Type, got: Type, range: Range): void {
    this.error("TypeMismatch", `Array elements must be ${typeToString(want)}, got ${typeToString(got)}.`, range);
  }

  private indexType(e: IndexExpr): Type {
    const obj = this.checkExpr(e.object, null);

    if (obj.kind === "tuple") {
      if (e.index.kind !== "IntLiteral") {
        this.checkExpr(e.index, null);
        this.error("TypeMismatch", "Tuple elements need a constant index.", e.index.range);
        return T.unknown;
      }
      this.checkExpr(e.index, null);
      const element = obj.elements[Number(e.index.value)];
      if (!element) {
        this.error("IndexOutOfBounds", `Index ${e.index.raw} is out of bounds for ${typeToString(obj)}.`, e.index.range);
        return T.unknown;
      }
      return element;
    }

    const idx = this.checkExpr(e.index, null);
    if (!isIntegerLike(idx) && idx.kind !== "unknown") {
      this.error("TypeMismatch", `Index must be an integer, got ${typeToString(idx)}.`, e.index.range);
    }

    const constant = constantIndex(e.index);
    switch (obj.kind) {
      case "array":
        if (constant !== null && (constant < 0n || constant >= BigInt(obj.size))) {
          this.error("IndexOutOfBounds", `Index ${constant} is out of bounds for ${typeToString(obj)}.`, e.index.range);
        }
        return obj.element;
      case "slice":
        if (constant !== null && constant < 0n) {
          this.error("IndexOutOfBounds", `Index ${constant} is negative.`, e.index.range);
        }
        return obj.element;
      case "pointer":
        return obj.target;
      case "unknown":
        return T.unknown;
      default:
        this.error("NotIndexable", `A value of type ${typeToString(obj)} cannot be indexed.`, e.object.range);
        return T.unknown;
    }
  }

  private memberType(e: MemberAccess): Type {
    const path = qualifiedNameOf(e);
    const head = path?.split(".")[0];
    if (path && head && !this.scope.resolve(head)) {
      const [, ...rest] = path.split(".");
      const aliased = this.importAliases.get(head);
      const full = aliased ? [aliased, ...rest].join(".") : path;
      if (this.externals.has(full)) {
        this.error("TypeMismatch", `'${full}' is a function and can only be called.`, e.range);
      } else {
        this.error("UndefinedSymbol", `Unknown name '${full}'.`, e.range);
      }
      return T.unknown;
    }

    const obj = this.checkExpr(e.object, null);
    const prop = e.property.name;
    if (obj.kind === "result") {
      if (prop === "status") return T.status;
      if (prop === "value") return obj.inner;
    }
    if (obj.kind !== "unknown") {
      this.error("TypeMismatch", `${typeToString(obj)} has no member '${prop}'.`, e.property.range);
    }
    return T.unknown;
  }

  /**
   * The fallback clause decides the chain's type; every other clause must be
   * assignable to it.
   */
  private tryChainType(e: TryChain, expected: Type | null): Type {
    const fallback = e.clauses.find((c) => c.role === "fallback");
    const authoritative = fallback ? this.clauseType(fallback, expected) : T.unknown;
    const hint = authoritative.kind === "void" || authoritative.kind === "unknown" ? expected : authoritative;

    for (const c of e.clauses) {
      if (c === fallback) continue;
      const t = this.clauseType(c, hint);
      if (authoritative.kind !== "void" && !isAssignable(t, authoritative)) {
        this.error(
          "ClauseTypeMismatch",
          `The ${c.role} clause produces ${typeToString(t)}, but the fallback produces ${typeToString(authoritative)}.`,
          c.value?.range ?? c.range
        );
      }
    }
    return authoritative;
  }

  private clauseType(c: TryClause, hint: Type | null): Type {
    return this.withBlockScope(() => {
      this.checkStatements(c.body);
      return c.value ? this.checkExpr(c.value, hint) : T.void;
    });
  }

  /* =========================================================
     Invariant: no Unknown survives a clean check
     ========================================================= */

  private assertFullyTyped(): void {
    const expectTyped = (e: Expression): void => {
      const t = this.types.get(e);
      if (!t || containsUnknown(t)) {
        throw new InternalCompilerError("checker", `${e.kind} left without a concrete type.`, e.range);
      }
    };

    const visit = (n: Node): void => {
      switch (n.kind) {
        case "VarDecl":
          visit(n.initializer);
          return;
        case "For":
          visit(n.iterable);
          visit(n.body);
          return;
        case "Call":
          expectTyped(n);
          n.args.forEach(visit);
          return;
        case "MemberAccess":
          expectTyped(n);
          visit(n.object);
          return;
        default:
          if (isExpression(n)) expectTyped(n);
          forEachChild(n, visit);
      }
    };

    for (const decl of this.checked) visit(decl.body);
  }

  /* =========================================================
     Helpers
     ========================================================= */

  private record(e: Expression, t: Type): Type {
    this.types.set(e, t);
    return t;
  }

  private resolveType(node: TypeNode): Type {
    const problems: TypeProblem[] = [];
    const t = typeFromNode(node, problems);
    for (const p of problems) this.error("UnknownType", p.message, p.range);
    return t;
  }

  private declare(id: Identifier, kind: SymbolKind, type: Type): void {
    const sym = makeSymbol(id.name, kind, type, id.range, this.fn?.signature.name ?? null);
    if (!this.scope.define(sym)) {
      this.duplicate(id);
      return;
    }
    this.bindings.set(id, sym);
    this.locals.push(sym);
  }

  private withBlockScope<R>(fn: () => R): R {
    const prev = this.scope;
    this.scope = new Scope("block", prev);
    try {
      return fn();
    } finally {
      this.scope = prev;
    }
  }

  private loop<R>(fn: () => R): R {
    const ctx = this.fn;
    if (ctx) ctx.loopDepth++;
    try {
      return fn();
    } finally {
      if (ctx) ctx.loopDepth--;
    }
  }

  private duplicate(id: Identifier): void {
    this.error("DuplicateDeclaration", `'${id.name}' is already declared.`, id.range);
  }

  private error(code: CheckErrorCode, message: string, range: Range, hint?: string): void {
    const e: CheckError = { code, message, range };
    if (hint !== undefined) e.hint = hint;
    this.errors.push(e);
  }
}

/* =========================================================
   Free helpers
   ========================================================= */

function floatLiteralType(e: FloatLiteral, expected: Type | null): Type {
  if (e.suffix === "f32") return T.f32;
  if (e.suffix === "f64") return T.f64;
  return expected && isFloat(expected) ? expected : T.f64;
}

/** Unsuffixed numeric literal, possibly negated. */
function isBareLiteral(e: Expression): boolean {
  if (e.kind === "IntLiteral" || e.kind === "FloatLiteral") return e.suffix === null;
  if (e.kind === "UnaryOp" && e.op === "-") return isBareLiteral(e.operand);
  return false;
}

/** Value of a literal (possibly negated) index, null for anything computed. */
export function constantIndex(e: Expression): bigint | null {
  if (e.kind === "IntLiteral") return e.value;
  if (e.kind === "UnaryOp" && e.op === "-" && e.operand.kind === "IntLiteral") return -e.operand.value;
  return null;
}

function isComparison(op: BinaryOperator): boolean {
  return op === "==" || op === "!=" || op === "<" || op === "<=" || op === ">" || op === ">=";
}

/** Same primitive, counting the status/i32 and handle/u64 aliases. */
export function sameScalar(a: Type, b: Type): boolean {
  if (typeEquals(a, b)) return true;
  return a.kind === "primitive" && b.kind === "primitive" && isAssignable(a, b) && isAssignable(b, a);
}

export function compoundOperator(op: Exclude<Assign["op"], "=">): BinaryOperator {
  switch (op) {
    case "+=":
      return "+";
    case "-=":
      return "-";
    case "*=":
      return "*";
    case "/=":
      return "/";
    case "%=":
      return "%";
    case "&=":
      return "&";
    case "|=":
      return "|";
    case "^=":
      return "^";
  }
}

function immutableMessage(sym: SymbolInfo): string {
  switch (sym.kind) {
    case "let":
      return `Cannot assign to '${sym.name}': it is declared with 'let'.`;
    case "param":
      return `Cannot assign to parameter '${sym.name}'.`;
    case "loop":
      return `Cannot assign to loop variable '${sym.name}'.`;
    case "constant":
      return `Cannot assign to constant '${sym.name}'.`;
    default:
      return `Cannot assign to '${sym.name}'.`;
  }
}

function breaksOut(body: Block): boolean {
  let found = false;
  const visit = (n: Node): void => {
    if (found) return;
    if (n.kind === "Break") {
      found = true;
      return;
    }
    if (n.kind === "While" || n.kind === "For") return;
    forEachChild(n, visit);
  };
  body.body.forEach(visit);
  return found;
}
