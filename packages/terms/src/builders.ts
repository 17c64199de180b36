/**
 * Term Builders
 *
 * Every SMT-LIB primitive under a TypeScript-safe name. Names that collide
 * with keywords or common globals carry a trailing underscore (`and_`,
 * `not_`, `int_`, `let_`); the rest keep their SMT-LIB reading (`ite`, `eq`,
 * `lt`, `select`).
 *
 * @example
 * ```typescript
 * const x = sym("x");
 * and_(ge(x, 0), lt(x, 10)); // (and (>= x 0) (< x 10))
 * ```
 */

import type { Sort } from "./sort.js";
import type {
  Apply,
  Binding,
  Let,
  LetBinding,
  Literal,
  Quantifier,
  QuantifierKind,
  SymbolRef,
  Term,
  TermKind,
} from "./term.js";
import { TermError } from "./errors.js";

// ============================================================================
// Literals and Symbols
// ============================================================================

/**
 * Integer numeral.
 *
 * @throws {TermError} If the number is not a safe integer
 */
export function int_(value: number | bigint): Literal {
  if (typeof value === "number") {
    if (!Number.isInteger(value)) {
      throw new TermError(`Not an integer numeral: ${value}`);
    }
    if (!Number.isSafeInteger(value)) {
      throw new TermError(
        `Integer ${value} is beyond the safe-integer range; pass it as a bigint`
      );
    }
  }
  return { kind: "literal", sort: "int", value: value.toString() };
}

/**
 * Decimal constant. Integral values keep a trailing `.0` so they stay Real.
 *
 * @throws {TermError} If the number is NaN or infinite
 */
export function real_(value: number): Literal {
  if (!Number.isFinite(value)) {
    throw new TermError(`Not a finite decimal: ${value}`);
  }
  const text = Number.isInteger(value) ? value.toFixed(1) : String(value);
  if (/e/i.test(text)) {
    throw new TermError(`Decimal ${value} has no plain SMT-LIB spelling`);
  }
  return { kind: "literal", sort: "real", value: text };
}

export function bool_(value: boolean): Literal {
  return { kind: "literal", sort: "bool", value: value ? "true" : "false" };
}

export const true_: Literal = bool_(true);

export const false_: Literal = bool_(false);

/**
 * Reference a declared constant or a bound variable by name.
 */
export function sym(name: string): SymbolRef {
  if (name.length === 0) {
    throw new TermError("Symbol name must be non-empty");
  }
  return { kind: "symbol", name };
}

/**
 * Apply a declared function. `app("ten")` is the nullary application `ten`.
 */
export function app(fn: string, ...args: TermLike[]): Apply {
  if (fn.length === 0) {
    throw new TermError("Function name must be non-empty");
  }
  return { kind: "apply", fn, args: args.map(toTerm) };
}

// ============================================================================
// Auto-wrapping
// ============================================================================

/** A Term, or a JS number/boolean that is wrapped as a literal. */
export type TermLike = Term | number | bigint | boolean;

const TERM_KINDS: ReadonlySet<string> = new Set<TermKind>([
  "literal",
  "symbol",
  "apply",
  "quantifier",
  "let",
]);

/**
 * @throws {TermError} If `value` is neither a term nor a wrappable JS value
 */
export function toTerm(value: TermLike): Term {
  if (typeof value === "boolean") return bool_(value);
  if (typeof value === "bigint") return int_(value);
  if (typeof value === "number") {
    return Number.isInteger(value) ? int_(value) : real_(value);
  }
  // Untyped callers can hand over anything
  if (typeof value !== "object" || value === null || !TERM_KINDS.has(value.kind)) {
    throw new TermError(`Expected a term, got ${value === null ? "null" : typeof value}`);
  }
  return value;
}

function op(fn: string, args: readonly TermLike[]): Apply {
  return { kind: "apply", fn, args: args.map(toTerm) };
}

// ============================================================================
// Core theory
// ============================================================================

export function and_(...args: TermLike[]): Apply {
  return op("and", args);
}

export function or_(...args: TermLike[]): Apply {
  return op("or", args);
}

export function not_(arg: TermLike): Apply {
  return op("not", [arg]);
}

export function implies(premise: TermLike, conclusion: TermLike): Apply {
  return op("=>", [premise, conclusion]);
}

export function xor(left: TermLike, right: TermLike): Apply {
  return op("xor", [left, right]);
}

export function eq(left: TermLike, right: TermLike, ...rest: TermLike[]): Apply {
  return op("=", [left, right, ...rest]);
}

export function distinct(first: TermLike, second: TermLike, ...rest: TermLike[]): Apply {
  return op("distinct", [first, second, ...rest]);
}

export function ite(condition: TermLike, whenTrue: TermLike, whenFalse: TermLike): Apply {
  return op("ite", [condition, whenTrue, whenFalse]);
}

// ============================================================================
// Arithmetic
// ============================================================================

export function add(first: TermLike, ...rest: TermLike[]): Apply {
  return op("+", [first, ...rest]);
}

export function sub(first: TermLike, ...rest: TermLike[]): Apply {
  return op("-", [first, ...rest]);
}

export function mul(first: TermLike, ...rest: TermLike[]): Apply {
  return op("*", [first, ...rest]);
}

/** Real division `/`. */
export function div(left: TermLike, right: TermLike): Apply {
  return op("/", [left, right]);
}

/** Integer division `div`. */
export function intDiv(left: TermLike, right: TermLike): Apply {
  return op("div", [left, right]);
}

export function mod(left: TermLike, right: TermLike): Apply {
  return op("mod", [left, right]);
}

export function abs(arg: TermLike): Apply {
  return op("abs", [arg]);
}

/** Unary minus. */
export function neg(arg: TermLike): Apply {
  return op("-", [arg]);
}

export function toReal(arg: TermLike): Apply {
  return op("to_real", [arg]);
}

export function toInt(arg: TermLike): Apply {
  return op("to_int", [arg]);
}

export function lt(left: TermLike, right: TermLike): Apply {
  return op("<", [left, right]);
}

export function le(left: TermLike, right: TermLike): Apply {
  return op("<=", [left, right]);
}

export function gt(left: TermLike, right: TermLike): Apply {
  return op(">", [left, right]);
}

export function ge(left: TermLike, right: TermLike): Apply {
  return op(">=", [left, right]);
}

// ============================================================================
// Arrays
// ============================================================================

export function select(array: TermLike, index: TermLike): Apply {
  return op("select", [array, index]);
}

export function store(array: TermLike, index: TermLike, value: TermLike): Apply {
  return op("store", [array, index, value]);
}

// ============================================================================
// Binders
// ============================================================================

/** A binding written as a `[name, sort]` pair or as an object. */
export type BindingLike = Binding | readonly [name: string, sort: Sort];

function toBinding(b: BindingLike): Binding {
  if ("name" in b) return b;
  return { name: b[0], sort: b[1] };
}

function quantifier(
  kind: QuantifierKind,
  bindings: readonly BindingLike[],
  body: TermLike
): Quantifier {
  if (bindings.length === 0) {
    throw new TermError(`${kind} needs at least one bound variable`);
  }
  return { kind: "quantifier", quantifier: kind, bindings: bindings.map(toBinding), body: toTerm(body) };
}

export function forall(bindings: readonly BindingLike[], body: TermLike): Quantifier {
  return quantifier("forall", bindings, body);
}

export function exists(bindings: readonly BindingLike[], body: TermLike): Quantifier {
  return quantifier("exists", bindings, body);
}

export function let_(
  bindings: readonly (LetBinding | readonly [name: string, value: TermLike])[],
  body: TermLike
): Let {
  if (bindings.length === 0) {
    throw new TermError("let needs at least one binding");
  }
  return {
    kind: "let",
    bindings: bindings.map((b) => ("name" in b ? b : { name: b[0], value: toTerm(b[1]) })),
    body: toTerm(body),
  };
}
