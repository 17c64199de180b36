/**
 * Structural matching of definition forms.
 *
 * Forms arrive untyped (from JavaScript callers, configuration or generated
 * code), so every part is checked before the engine sees it. Only the
 * shape is checked. Whether the body has the result sort, or mentions
 * undeclared names, is for the solver to decide.
 */

import type { Sort, Term, TermLike } from "@smtkit/terms";
import { isSort, isTerm, isWritableSymbol, toTerm, TermError } from "@smtkit/terms";
import type { Definition, DefinitionBody, Parameter } from "./definition.js";
import { functionBody, termBody } from "./definition.js";
import { DefinitionSyntaxError } from "./errors.js";

// ============================================================================
// Forms
// ============================================================================

export type ParameterPair = readonly [name: string, sort: Sort];

/** A body given as a term, or built from the parameter variables */
export type BodyLike = TermLike | ((...vars: Term[]) => TermLike);

export interface DefinitionForm {
  readonly name: string;
  readonly params: readonly ParameterPair[];
  readonly result: Sort;
  readonly body: BodyLike;
}

/** The positional spelling, in `define-fun` order */
export type DefinitionTuple = readonly [
  name: string,
  params: readonly ParameterPair[],
  result: Sort,
  body: BodyLike,
];

// ============================================================================
// Matching
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isTermLike(value: unknown): value is TermLike {
  return (
    typeof value === "number" ||
    typeof value === "bigint" ||
    typeof value === "boolean" ||
    isTerm(value)
  );
}

/**
 * Match an untyped definition form, given either as
 * `{ name, params, result, body }` or as `[name, params, result, body]`.
 *
 * @throws {DefinitionSyntaxError} If any part of the form is malformed
 */
export function matchDefinition(form: unknown): Definition<Term, Sort> {
  let name: unknown;
  let params: unknown;
  let result: unknown;
  let body: unknown;

  if (Array.isArray(form)) {
    if (form.length !== 4) {
      throw new DefinitionSyntaxError(
        "form",
        `expected [name, params, result, body], got ${form.length} element(s)`
      );
    }
    [name, params, result, body] = form;
  } else if (isRecord(form)) {
    ({ name, params, result, body } = form);
  } else {
    throw new DefinitionSyntaxError("form", "expected an object or a 4-element array");
  }

  if (typeof name !== "string" || name.length === 0) {
    throw new DefinitionSyntaxError("name", "expected a non-empty string");
  }
  if (!isWritableSymbol(name)) {
    throw new DefinitionSyntaxError("name", unwritable(name));
  }

  const matchedParams = matchParameters(params);

  if (!isSort(result)) {
    throw new DefinitionSyntaxError("result", "expected a sort");
  }

  return {
    name,
    params: matchedParams,
    result,
    body: matchBody(body, matchedParams.length),
  };
}

function matchParameters(params: unknown): Parameter<Sort>[] {
  if (!Array.isArray(params)) {
    throw new DefinitionSyntaxError("params", "expected an array of [name, sort] pairs");
  }

  const seen = new Set<string>();
  return params.map((entry: unknown, i): Parameter<Sort> => {
    const path = `params[${i}]`;
    if (!Array.isArray(entry) || entry.length !== 2) {
      throw new DefinitionSyntaxError(path, "expected a [name, sort] pair");
    }

    const [paramName, sort]: unknown[] = entry;
    if (typeof paramName !== "string" || paramName.length === 0) {
      throw new DefinitionSyntaxError(`${path}[0]`, "expected a non-empty string");
    }
    if (!isWritableSymbol(paramName)) {
      throw new DefinitionSyntaxError(`${path}[0]`, unwritable(paramName));
    }
    if (!isSort(sort)) {
      throw new DefinitionSyntaxError(`${path}[1]`, "expected a sort");
    }
    if (seen.has(paramName)) {
      throw new DefinitionSyntaxError(`${path}[0]`, `duplicate parameter '${paramName}'`);
    }
    seen.add(paramName);
    return { name: paramName, sort };
  });
}

function matchBody(body: unknown, arity: number): DefinitionBody<Term> {
  if (typeof body === "function") {
    const fn = body;
    if (fn.length !== arity) {
      throw new DefinitionSyntaxError(
        "body",
        `function takes ${fn.length} argument(s) but the definition has ${arity} parameter(s)`
      );
    }
    return functionBody((vars) => {
      const built: unknown = fn(...vars);
      if (!isTermLike(built)) {
        throw new DefinitionSyntaxError(
          "body",
          `body function returned ${describe(built)}, expected a term`
        );
      }
      return checkedTerm(built);
    });
  }

  if (isTermLike(body)) {
    return termBody(checkedTerm(body));
  }

  throw new DefinitionSyntaxError("body", "expected a term or a function");
}

function checkedTerm(value: TermLike): Term {
  try {
    return toTerm(value);
  } catch (error) {
    if (error instanceof TermError) {
      throw new DefinitionSyntaxError("body", error.message);
    }
    throw error;
  }
}

function unwritable(name: string): string {
  return `'${name}' cannot be written as an SMT-LIB symbol`;
}

function describe(value: unknown): string {
  if (value === null || value === undefined) return String(value);
  if (Array.isArray(value)) return "an array";
  return typeof value === "object" ? "an object" : `a ${typeof value}`;
}
