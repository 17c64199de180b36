/**
 * SMT-LIB Renderer
 *
 * Prints terms in SMT-LIB 2 concrete syntax, on a single line.
 *
 * @example
 * ```typescript
 * toSmtLib(forall([["x", Int]], ge(mul(sym("x"), sym("x")), 0)));
 * // "(forall ((x Int)) (>= (* x x) 0))"
 * ```
 */

import type { Literal, Term } from "../term.js";
import { sortToSmtLib } from "../sort.js";
import { renderSymbol } from "../symbols.js";

export function toSmtLib(term: Term): string {
  switch (term.kind) {
    case "literal":
      return renderLiteral(term);

    case "symbol":
      return renderSymbol(term.name);

    case "apply":
      if (term.args.length === 0) return renderSymbol(term.fn);
      return `(${renderSymbol(term.fn)} ${term.args.map(toSmtLib).join(" ")})`;

    case "quantifier": {
      const vars = term.bindings
        .map((b) => `(${renderSymbol(b.name)} ${sortToSmtLib(b.sort)})`)
        .join(" ");
      return `(${term.quantifier} (${vars}) ${toSmtLib(term.body)})`;
    }

    case "let": {
      const binds = term.bindings
        .map((b) => `(${renderSymbol(b.name)} ${toSmtLib(b.value)})`)
        .join(" ");
      return `(let (${binds}) ${toSmtLib(term.body)})`;
    }
  }
}

// SMT-LIB numerals are unsigned; negation is an application of `-`.
function renderLiteral(term: Literal): string {
  if (term.sort !== "bool" && term.value.startsWith("-")) {
    return `(- ${term.value.slice(1)})`;
  }
  return term.value;
}
