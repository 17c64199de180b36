/**
 * Definition Expansion
 *
 * Compiles a definition into two primitive operations instead of inlining
 * its body at call sites:
 *
 *   ten : Int = 10
 *     → (declare-fun ten () Int)
 *       (assert (= ten 10))
 *
 *   max(a: Int, b: Int) : Int = (ite (> a b) a b)
 *     → (declare-fun max (Int Int) Int)
 *       (assert (forall ((a Int) (b Int)) (= (max a b) (ite (> a b) a b))))
 *
 * Other definitions appear in a body only as applications, so the size of
 * an expansion depends on its own body alone.
 */

import type { Definition, DefinitionBody, Expansion, Parameter } from "./definition.js";
import { parameterShape } from "./definition.js";

/**
 * Constructors the engine builds its output from. `T` is the term type,
 * `S` the sort type, `D` and `A` the declaration and assertion types.
 */
export interface ExpansionTarget<T, S, D, A = D> {
  /** A reference to a bound variable */
  variable(name: string, sort: S): T;

  /** `name` applied to `args`; with no arguments, the nullary application */
  apply(name: string, args: readonly T[]): T;

  eq(left: T, right: T): T;

  forall(params: readonly [Parameter<S>, ...Parameter<S>[]], body: T): T;

  declareFun(name: string, argSorts: readonly S[], result: S): D;

  assert(formula: T): A;
}

export function expand<T, S, D, A = D>(
  definition: Definition<T, S>,
  target: ExpansionTarget<T, S, D, A>
): Expansion<D, A> {
  const { name, result } = definition;
  const shape = parameterShape(definition.params);

  switch (shape.kind) {
    case "constant":
      return [
        target.declareFun(name, [], result),
        target.assert(target.eq(target.apply(name, []), bodyTerm(definition.body, []))),
      ];

    case "function": {
      const vars = shape.params.map((p) => target.variable(p.name, p.sort));
      const equation = target.eq(target.apply(name, vars), bodyTerm(definition.body, vars));
      return [
        target.declareFun(
          name,
          shape.params.map((p) => p.sort),
          result
        ),
        target.assert(target.forall(shape.params, equation)),
      ];
    }
  }
}

function bodyTerm<T>(body: DefinitionBody<T>, vars: readonly T[]): T {
  return body.kind === "term" ? body.term : body.build(vars);
}
