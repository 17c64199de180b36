/**
 * AST helpers shared by macros and the transformer
 */

import * as ts from "typescript";

/**
 * `(() => { throw new Error(message); })()`
 *
 * Stands in for a call that could not be expanded, so the failure also
 * shows at run time if the compile-time diagnostic is ignored.
 */
export function createMacroErrorExpression(factory: ts.NodeFactory, message: string): ts.Expression {
  return factory.createCallExpression(
    factory.createParenthesizedExpression(
      factory.createArrowFunction(
        undefined,
        undefined,
        [],
        undefined,
        factory.createToken(ts.SyntaxKind.EqualsGreaterThanToken),
        factory.createBlock([
          factory.createThrowStatement(
            factory.createNewExpression(factory.createIdentifier("Error"), undefined, [
              factory.createStringLiteral(message),
            ])
          ),
        ])
      )
    ),
    undefined,
    []
  );
}
