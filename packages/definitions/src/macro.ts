/**
 * Compile-time `defineFun`
 *
 * Under `@smtkit/transformer`, a call with a literal name and a literal
 * parameter list is matched against the TypeScript AST and expanded through
 * the same engine as the run-time path:
 *
 * @example
 * ```typescript
 * // Input:
 * await defineFun(session, "max", [["a", Int], ["b", Int]], Int, (a, b) => ite(gt(a, b), a, b));
 *
 * // Expands to:
 * await sendExpansion(session, [
 *   declareFunCommand("max", [Int, Int], Int),
 *   assertCommand(forall([["a", Int], ["b", Int]], eq(app("max", sym("a"), sym("b")), ((a, b) => ite(gt(a, b), a, b))(sym("a"), sym("b"))))),
 * ]);
 * ```
 *
 * Both commands are arguments, so the body runs before anything reaches the
 * session, and `sendExpansion` checks them before sending the first.
 *
 * A malformed call is reported as SMT9001 and replaced by an expression
 * that throws the same message.
 */

import * as ts from "typescript";
import {
  createMacroErrorExpression,
  defineExpressionMacro,
  globalRegistry,
  SMT9001,
  type MacroContext,
} from "@smtkit/core";
import { isWritableSymbol } from "@smtkit/terms";
import type { Definition, DefinitionBody, Parameter } from "./definition.js";
import { functionBody, termBody } from "./definition.js";
import { expand, type ExpansionTarget } from "./expand.js";
import { DefinitionSyntaxError } from "./errors.js";

const TERMS_MODULE = "@smtkit/terms";
const SOLVER_MODULE = "@smtkit/solver";
const DEFINITIONS_MODULE = "@smtkit/definitions";

/** A `defineFun` call split into its session expression and definition */
export interface MatchedCall {
  session: ts.Expression;
  definition: Definition<ts.Expression, ts.Expression>;
}

// ============================================================================
// Matching
// ============================================================================

function stringLiteralText(node: ts.Expression): string | undefined {
  return ts.isStringLiteral(node) || ts.isNoSubstitutionTemplateLiteral(node)
    ? node.text
    : undefined;
}

function skipParentheses(node: ts.Expression): ts.Expression {
  let current = node;
  while (ts.isParenthesizedExpression(current)) {
    current = current.expression;
  }
  return current;
}

/**
 * @throws {DefinitionSyntaxError}
 */
export function matchDefineFunCall(
  checker: ts.TypeChecker,
  args: readonly ts.Expression[]
): MatchedCall {
  if (args.some(ts.isSpreadElement)) {
    throw new DefinitionSyntaxError("arguments", "spread arguments are not supported");
  }
  const [session, nameArg, paramsArg, result, bodyArg] = args;
  if (
    args.length !== 5 ||
    session === undefined ||
    nameArg === undefined ||
    paramsArg === undefined ||
    result === undefined ||
    bodyArg === undefined
  ) {
    throw new DefinitionSyntaxError(
      "arguments",
      `expected (session, name, params, result, body), got ${args.length} argument(s)`
    );
  }

  const name = stringLiteralText(nameArg);
  if (name === undefined) {
    throw new DefinitionSyntaxError("name", "expected a string literal");
  }
  if (name.length === 0) {
    throw new DefinitionSyntaxError("name", "expected a non-empty string");
  }
  if (!isWritableSymbol(name)) {
    throw new DefinitionSyntaxError("name", `'${name}' cannot be written as an SMT-LIB symbol`);
  }

  const params = matchParameterList(paramsArg);

  return {
    session,
    definition: { name, params, result, body: matchBody(checker, bodyArg, params.length) },
  };
}

function matchParameterList(node: ts.Expression): Parameter<ts.Expression>[] {
  if (!ts.isArrayLiteralExpression(node)) {
    throw new DefinitionSyntaxError("params", "expected an array literal of [name, sort] pairs");
  }

  const seen = new Set<string>();
  return node.elements.map((element, i): Parameter<ts.Expression> => {
    const path = `params[${i}]`;
    if (!ts.isArrayLiteralExpression(element) || element.elements.length !== 2) {
      throw new DefinitionSyntaxError(path, "expected a [name, sort] pair");
    }

    const [nameNode, sortNode] = element.elements;
    if (nameNode === undefined || sortNode === undefined) {
      throw new DefinitionSyntaxError(path, "expected a [name, sort] pair");
    }

    const paramName = stringLiteralText(nameNode);
    if (paramName === undefined || paramName.length === 0) {
      throw new DefinitionSyntaxError(`${path}[0]`, "expected a non-empty string literal");
    }
    if (!isWritableSymbol(paramName)) {
      throw new DefinitionSyntaxError(
        `${path}[0]`,
        `'${paramName}' cannot be written as an SMT-LIB symbol`
      );
    }
    if (ts.isSpreadElement(sortNode) || ts.isOmittedExpression(sortNode)) {
      throw new DefinitionSyntaxError(`${path}[1]`, "expected a sort");
    }
    if (seen.has(paramName)) {
      throw new DefinitionSyntaxError(`${path}[0]`, `duplicate parameter '${paramName}'`);
    }
    seen.add(paramName);
    return { name: paramName, sort: sortNode };
  });
}

function matchBody(
  checker: ts.TypeChecker,
  node: ts.Expression,
  arity: number
): DefinitionBody<ts.Expression> {
  const inner = skipParentheses(node);

  if (ts.isArrowFunction(inner) || ts.isFunctionExpression(inner)) {
    if (inner.parameters.some((p) => p.dotDotDotToken !== undefined || p.initializer !== undefined)) {
      throw new DefinitionSyntaxError("body", "rest and default parameters are not supported");
    }
    if (inner.parameters.length !== arity) {
      throw new DefinitionSyntaxError(
        "body",
        `function takes ${inner.parameters.length} argument(s) but the definition has ${arity} parameter(s)`
      );
    }
    // (params) => body, called with the bound variables
    return functionBody((vars) =>
      ts.factory.createCallExpression(ts.factory.createParenthesizedExpression(inner), undefined, [
        ...vars,
      ])
    );
  }

  // A function value whose arity is not visible here
  if (checker.getTypeAtLocation(inner).getCallSignatures().length > 0) {
    throw new DefinitionSyntaxError("body", "pass the body as an arrow function or a term");
  }
  return termBody(node);
}

// ============================================================================
// Syntax target
// ============================================================================

/**
 * Builds `@smtkit/terms` calls for the formula and `@smtkit/solver` command
 * constructors for the two primitive operations.
 */
function syntaxTarget(
  ctx: MacroContext
): ExpansionTarget<ts.Expression, ts.Expression, ts.Expression> {
  const f = ctx.factory;
  const call = (fn: string, from: string, args: readonly ts.Expression[]): ts.Expression =>
    f.createCallExpression(ctx.safeRef(fn, from), undefined, [...args]);

  return {
    variable: (name) => call("sym", TERMS_MODULE, [f.createStringLiteral(name)]),
    apply: (name, args) => call("app", TERMS_MODULE, [f.createStringLiteral(name), ...args]),
    eq: (left, right) => call("eq", TERMS_MODULE, [left, right]),
    forall: (params, body) =>
      call("forall", TERMS_MODULE, [
        f.createArrayLiteralExpression(
          params.map((p) => f.createArrayLiteralExpression([f.createStringLiteral(p.name), p.sort]))
        ),
        body,
      ]),
    declareFun: (name, argSorts, result) =>
      call("declareFunCommand", SOLVER_MODULE, [
        f.createStringLiteral(name),
        f.createArrayLiteralExpression([...argSorts]),
        result,
      ]),
    assert: (formula) => call("assertCommand", SOLVER_MODULE, [formula]),
  };
}

// ============================================================================
// Macro
// ============================================================================

export const defineFunMacro = defineExpressionMacro({
  name: "defineFun",
  module: DEFINITIONS_MODULE,
  description: "Declare a function in a solver session and assert its defining equation",

  expand(ctx: MacroContext, callExpr: ts.CallExpression, args: readonly ts.Expression[]): ts.Expression {
    let matched: MatchedCall;
    try {
      matched = matchDefineFunCall(ctx.typeChecker, args);
    } catch (error) {
      if (error instanceof DefinitionSyntaxError) {
        ctx.diagnostic(SMT9001, callExpr, { path: error.path, reason: error.reason });
        return createMacroErrorExpression(ctx.factory, error.message);
      }
      throw error;
    }

    const [declaration, assertion] = expand(matched.definition, syntaxTarget(ctx));

    // sendExpansion(session, [declaration, assertion])
    return ctx.factory.createCallExpression(
      ctx.safeRef("sendExpansion", DEFINITIONS_MODULE),
      undefined,
      [matched.session, ctx.factory.createArrayLiteralExpression([declaration, assertion])]
    );
  },
});

globalRegistry.register(defineFunMacro);
