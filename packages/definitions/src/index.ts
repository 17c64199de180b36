/**
 * @smtkit/definitions
 *
 * Function definitions for SMT sessions. A definition is compiled into a
 * signature declaration plus a universally quantified defining equation,
 * never inlined at call sites.
 *
 * @example
 * ```typescript
 * import { defineFun } from "@smtkit/definitions";
 * import { Int, ite, gt } from "@smtkit/terms";
 *
 * await defineFun(session, "max", [["a", Int], ["b", Int]], Int, (a, b) => ite(gt(a, b), a, b));
 * ```
 */

export * from "./definition.js";
export * from "./errors.js";
export * from "./expand.js";
export * from "./match.js";
export * from "./targets.js";
export * from "./define-fun.js";
export { defineFunMacro, matchDefineFunCall, type MatchedCall } from "./macro.js";
