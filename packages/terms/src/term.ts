/**
 * Term AST
 *
 * Terms are immutable plain objects. Building the same term twice yields two
 * deep-equal values, which is what lets definition expansion be compared
 * structurally.
 *
 * @example
 * ```typescript
 * const a = sym("a");
 * const t = ite(gt(a, 0), a, neg(a)); // (ite (> a 0) a (- a))
 * nodeCount(t); // 7
 * ```
 */

import type { Sort } from "./sort.js";
import { isSort } from "./sort.js";

// ============================================================================
// AST Node Types
// ============================================================================

export type LiteralSort = "int" | "real" | "bool";

/**
 * A numeral, decimal or boolean constant. `value` holds canonical text
 * ("-3", "2.5", "true") so that big integers survive unchanged.
 */
export interface Literal {
  readonly kind: "literal";
  readonly sort: LiteralSort;
  readonly value: string;
}

/**
 * A reference to a declared constant or to a bound variable.
 */
export interface SymbolRef {
  readonly kind: "symbol";
  readonly name: string;
}

/**
 * Application of a built-in operator or a declared function.
 * With no arguments it denotes a nullary function and renders as its name.
 */
export interface Apply {
  readonly kind: "apply";
  readonly fn: string;
  readonly args: readonly Term[];
}

export interface Binding {
  readonly name: string;
  readonly sort: Sort;
}

export type QuantifierKind = "forall" | "exists";

export interface Quantifier {
  readonly kind: "quantifier";
  readonly quantifier: QuantifierKind;
  readonly bindings: readonly Binding[];
  readonly body: Term;
}

export interface LetBinding {
  readonly name: string;
  readonly value: Term;
}

export interface Let {
  readonly kind: "let";
  readonly bindings: readonly LetBinding[];
  readonly body: Term;
}

export type Term = Literal | SymbolRef | Apply | Quantifier | Let;

export type TermKind = Term["kind"];

// ============================================================================
// Built-in operators
// ============================================================================

/**
 * Operator names the solver provides. Applications of these are not
 * references to user declarations.
 */
export const BUILTIN_OPERATORS: ReadonlySet<string> = new Set([
  "and",
  "or",
  "not",
  "=>",
  "xor",
  "=",
  "distinct",
  "ite",
  "+",
  "-",
  "*",
  "/",
  "div",
  "mod",
  "abs",
  "<",
  "<=",
  ">",
  ">=",
  "select",
  "store",
  "to_real",
  "to_int",
  "is_int",
]);

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Structural check for values of unknown origin (untyped definition forms).
 */
export function isTerm(value: unknown): value is Term {
  if (typeof value !== "object" || value === null || !("kind" in value)) {
    return false;
  }
  switch (value.kind) {
    case "literal":
      return (
        "sort" in value &&
        (value.sort === "int" || value.sort === "real" || value.sort === "bool") &&
        "value" in value &&
        typeof value.value === "string"
      );
    case "symbol":
      return "name" in value && typeof value.name === "string";
    case "apply":
      return (
        "fn" in value &&
        typeof value.fn === "string" &&
        "args" in value &&
        Array.isArray(value.args) &&
        value.args.every(isTerm)
      );
    case "quantifier":
      return (
        "quantifier" in value &&
        (value.quantifier === "forall" || value.quantifier === "exists") &&
        "bindings" in value &&
        Array.isArray(value.bindings) &&
        value.bindings.every(isBinding) &&
        "body" in value &&
        isTerm(value.body)
      );
    case "let":
      return (
        "bindings" in value &&
        Array.isArray(value.bindings) &&
        value.bindings.every(isLetBinding) &&
        "body" in value &&
        isTerm(value.body)
      );
    default:
      return false;
  }
}

function isBinding(value: unknown): value is Binding {
  return (
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    typeof value.name === "string" &&
    "sort" in value &&
    isSort(value.sort)
  );
}

function isLetBinding(value: unknown): value is LetBinding {
  return (
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    typeof value.name === "string" &&
    "value" in value &&
    isTerm(value.value)
  );
}

// ============================================================================
// Structural Utilities
// ============================================================================

/**
 * Count the nodes in a term. Binders count as one node each; the sorts in
 * their bindings are not counted.
 */
export function nodeCount(term: Term): number {
  switch (term.kind) {
    case "literal":
    case "symbol":
      return 1;
    case "apply":
      return 1 + term.args.reduce((n, arg) => n + nodeCount(arg), 0);
    case "quantifier":
      return 1 + nodeCount(term.body);
    case "let":
      return 1 + term.bindings.reduce((n, b) => n + nodeCount(b.value), 0) + nodeCount(term.body);
  }
}

/**
 * Names a term refers to without binding them: free symbols plus the heads of
 * applications that are not built-in operators.
 */
export function freeSymbols(term: Term): Set<string> {
  const out = new Set<string>();
  collectFree(term, new Set(), out);
  return out;
}

function collectFree(term: Term, bound: ReadonlySet<string>, out: Set<string>): void {
  switch (term.kind) {
    case "literal":
      return;
    case "symbol":
      if (!bound.has(term.name)) out.add(term.name);
      return;
    case "apply":
      if (!BUILTIN_OPERATORS.has(term.fn) && !bound.has(term.fn)) out.add(term.fn);
      for (const arg of term.args) collectFree(arg, bound, out);
      return;
    case "quantifier": {
      const inner = new Set(bound);
      for (const b of term.bindings) inner.add(b.name);
      collectFree(term.body, inner, out);
      return;
    }
    case "let": {
      // let binds in parallel: values see the outer scope
      for (const b of term.bindings) collectFree(b.value, bound, out);
      const inner = new Set(bound);
      for (const b of term.bindings) inner.add(b.name);
      collectFree(term.body, inner, out);
      return;
    }
  }
}
