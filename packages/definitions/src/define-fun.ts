/**
 * Defining functions in a solver session
 *
 * @example
 * ```typescript
 * await defineFun(session, "max", [["a", Int], ["b", Int]], Int, (a, b) => ite(gt(a, b), a, b));
 * // (declare-fun max (Int Int) Int)
 * // (assert (forall ((a Int) (b Int)) (= (max a b) (ite (> a b) a b))))
 *
 * await defineFun(session, "ten", [], Int, 10);
 * // (declare-fun ten () Int)
 * // (assert (= ten 10))
 * ```
 */

import type { Sort } from "@smtkit/terms";
import { isSort, isTerm } from "@smtkit/terms";
import type { AssertCommand, DeclareFunCommand, SolverSession } from "@smtkit/solver";
import { renderCommand } from "@smtkit/solver";
import type { Expansion } from "./definition.js";
import { DefinitionSyntaxError } from "./errors.js";
import { expand } from "./expand.js";
import type { BodyLike, DefinitionForm, DefinitionTuple, ParameterPair } from "./match.js";
import { matchDefinition } from "./match.js";
import { commandTarget } from "./targets.js";

/**
 * Match a definition form and expand it into its two commands without
 * sending anything.
 *
 * @throws {DefinitionSyntaxError} If the form is malformed
 */
export function expandDefinition(
  form: DefinitionForm | DefinitionTuple
): Expansion<DeclareFunCommand, AssertCommand> {
  return expand(matchDefinition(form), commandTarget);
}

/**
 * Define a function in `session`: declare its signature, then assert its
 * defining equation.
 *
 * A malformed form throws before anything is sent. Errors from the session
 * propagate unchanged. Nothing is rolled back: when the declaration succeeds
 * and the assertion fails, the declaration stays in the session.
 */
export async function define(
  session: SolverSession,
  form: DefinitionForm | DefinitionTuple
): Promise<void> {
  await sendExpansion(session, expandDefinition(form));
}

/**
 * Send an expansion to `session`: the declaration, then the assertion.
 *
 * Both commands are checked and rendered before the first one is sent, so
 * an expansion that cannot be written out leaves the session untouched.
 * Code generated for the compile-time `defineFun` calls this with the
 * commands it built.
 *
 * @throws {DefinitionSyntaxError} If a sort or the formula is malformed
 * @throws {TermError} If a symbol cannot be written in SMT-LIB
 */
export async function sendExpansion(
  session: SolverSession,
  expansion: Expansion<DeclareFunCommand, AssertCommand>
): Promise<void> {
  const [declaration, assertion] = expansion;
  checkExpansion(declaration, assertion);
  await session.declareFun(declaration.name, declaration.argSorts, declaration.resultSort);
  await session.assert(assertion.formula);
}

function checkExpansion(declaration: DeclareFunCommand, assertion: AssertCommand): void {
  declaration.argSorts.forEach((argSort: unknown, i) => {
    if (!isSort(argSort)) {
      throw new DefinitionSyntaxError(`params[${i}][1]`, "expected a sort");
    }
  });
  const resultSort: unknown = declaration.resultSort;
  if (!isSort(resultSort)) {
    throw new DefinitionSyntaxError("result", "expected a sort");
  }
  const formula: unknown = assertion.formula;
  if (!isTerm(formula)) {
    throw new DefinitionSyntaxError("body", "expected a term");
  }
  renderCommand(declaration);
  renderCommand(assertion);
}

/**
 * `define` with the parts as separate arguments, in `define-fun` order.
 *
 * Under `@smtkit/transformer` a call with a literal name and parameter list
 * is checked and expanded at compile time instead.
 */
export function defineFun(
  session: SolverSession,
  name: string,
  params: readonly ParameterPair[],
  result: Sort,
  body: BodyLike
): Promise<void> {
  return define(session, { name, params, result, body });
}
