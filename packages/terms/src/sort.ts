/**
 * Sort tags
 *
 * A sort names the type of a term. The definition engine passes sorts through
 * unchanged; only the renderer and the solver look inside them.
 *
 * @example
 * ```typescript
 * const Color = sort("Color");
 * sortToSmtLib(ArraySort(Int, Color)); // "(Array Int Color)"
 * ```
 */

import { TermError } from "./errors.js";
import { renderSymbol } from "./symbols.js";

// ============================================================================
// Sort Types
// ============================================================================

export interface BoolSort {
  readonly kind: "bool";
}

export interface IntSort {
  readonly kind: "int";
}

export interface RealSort {
  readonly kind: "real";
}

export interface ArraySortType {
  readonly kind: "array";
  readonly index: Sort;
  readonly element: Sort;
}

/**
 * A sort introduced by `declare-sort`, optionally applied to sort arguments.
 */
export interface NamedSort {
  readonly kind: "named";
  readonly name: string;
  readonly args: readonly Sort[];
}

export type Sort = BoolSort | IntSort | RealSort | ArraySortType | NamedSort;

export type SortKind = Sort["kind"];

// ============================================================================
// Constructors
// ============================================================================

export const Bool: BoolSort = { kind: "bool" };

export const Int: IntSort = { kind: "int" };

export const Real: RealSort = { kind: "real" };

export function ArraySort(index: Sort, element: Sort): ArraySortType {
  return { kind: "array", index, element };
}

/**
 * Reference a declared (uninterpreted) sort by name.
 */
export function sort(name: string, ...args: Sort[]): NamedSort {
  if (name.length === 0) {
    throw new TermError("Sort name must be non-empty");
  }
  return { kind: "named", name, args };
}

// ============================================================================
// Guards and Rendering
// ============================================================================

const SORT_KINDS: ReadonlySet<string> = new Set<SortKind>(["bool", "int", "real", "array", "named"]);

/**
 * Structural check used when validating untyped definition forms.
 */
export function isSort(value: unknown): value is Sort {
  if (typeof value !== "object" || value === null || !("kind" in value)) {
    return false;
  }
  const kind = value.kind;
  if (typeof kind !== "string" || !SORT_KINDS.has(kind)) {
    return false;
  }
  if (kind === "array") {
    return (
      "index" in value && isSort(value.index) && "element" in value && isSort(value.element)
    );
  }
  if (kind === "named") {
    return (
      "name" in value &&
      typeof value.name === "string" &&
      value.name.length > 0 &&
      "args" in value &&
      Array.isArray(value.args) &&
      value.args.every(isSort)
    );
  }
  return true;
}

export function sortToSmtLib(s: Sort): string {
  switch (s.kind) {
    case "bool":
      return "Bool";
    case "int":
      return "Int";
    case "real":
      return "Real";
    case "array":
      return `(Array ${sortToSmtLib(s.index)} ${sortToSmtLib(s.element)})`;
    case "named":
      if (s.args.length === 0) return renderSymbol(s.name);
      return `(${renderSymbol(s.name)} ${s.args.map(sortToSmtLib).join(" ")})`;
  }
}
