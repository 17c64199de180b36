/**
 * Definition Model
 *
 * A definition is a name, an ordered parameter list, a result sort and a
 * body. The types are generic over the term type `T` and sort type `S` so the
 * same definition shape serves both run-time terms and compile-time syntax.
 */

export interface Parameter<S> {
  readonly name: string;
  readonly sort: S;
}

/**
 * The body of a definition: a fixed term, or a function from the parameter
 * variables (in declaration order) to a term.
 */
export type DefinitionBody<T> =
  | { readonly kind: "term"; readonly term: T }
  | { readonly kind: "function"; readonly build: (vars: readonly T[]) => T };

export interface Definition<T, S> {
  readonly name: string;
  readonly params: readonly Parameter<S>[];
  readonly result: S;
  readonly body: DefinitionBody<T>;
}

/**
 * Shape of a parameter list. A constant has no parameters; a function has
 * at least one.
 */
export type ParameterShape<S> =
  | { readonly kind: "constant" }
  | { readonly kind: "function"; readonly params: readonly [Parameter<S>, ...Parameter<S>[]] };

export function parameterShape<S>(params: readonly Parameter<S>[]): ParameterShape<S> {
  const [first, ...rest] = params;
  if (first === undefined) {
    return { kind: "constant" };
  }
  return { kind: "function", params: [first, ...rest] };
}

/**
 * The result of expanding one definition: a signature declaration followed
 * by the assertion that defines it. Always exactly two entries.
 */
export type Expansion<D, A = D> = readonly [declaration: D, assertion: A];

export function termBody<T>(term: T): DefinitionBody<T> {
  return { kind: "term", term };
}

export function functionBody<T>(build: (vars: readonly T[]) => T): DefinitionBody<T> {
  return { kind: "function", build };
}
