/**
 * @smtkit/terms
 *
 * Symbolic terms and sorts for SMT-LIB, built from TypeScript expressions.
 *
 * @example
 * ```typescript
 * import { Int, sym, ite, gt, toSmtLib } from "@smtkit/terms";
 *
 * const a = sym("a");
 * const b = sym("b");
 * toSmtLib(ite(gt(a, b), a, b)); // "(ite (> a b) a b)"
 * ```
 */

export * from "./errors.js";
export * from "./sort.js";
export * from "./term.js";
export * from "./symbols.js";
export * from "./builders.js";
export * from "./render/smtlib.js";
