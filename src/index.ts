/**
 * smtkit - SMT-LIB function definitions from TypeScript
 *
 * A definition is sent to the solver as a signature declaration plus one
 * universally quantified defining equation, so definitions that call each
 * other never grow by inlining.
 *
 * @example
 * ```typescript
 * import { Z3Session, app, defineFun, gt, Int, ite } from "smtkit";
 *
 * const session = await Z3Session.create();
 * await defineFun(session, "max", [["a", Int], ["b", Int]], Int, (a, b) => ite(gt(a, b), a, b));
 * await session.assert(gt(app("max", 2, 7), 7));
 * await session.checkSat(); // "unsat"
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Terms and sorts
// ============================================================================

export * from "@smtkit/terms";

// ============================================================================
// Sessions
// ============================================================================

export * from "@smtkit/solver";

// ============================================================================
// Definitions
// ============================================================================

export {
  DefinitionSyntaxError,
  define,
  defineFun,
  expand,
  expandDefinition,
  matchDefinition,
  parameterShape,
  sendExpansion,
  termBody,
  functionBody,
  commandTarget,
  type BodyLike,
  type Definition,
  type DefinitionBody,
  type DefinitionForm,
  type DefinitionTuple,
  type Expansion,
  type ExpansionTarget,
  type Parameter,
  type ParameterPair,
  type ParameterShape,
} from "@smtkit/definitions";

// ============================================================================
// Configuration
// ============================================================================

export { config, defineConfig, type SmtkitConfig } from "@smtkit/core";
