/**
 * Diagnostics for smtkit macros
 *
 * Error codes live in the TS custom range (9001-9999) and carry a message
 * template with {placeholders}.
 *
 * @example
 * ```typescript
 * ctx.diagnostic(SMT9001, callExpr, { path: "params[1]", reason: "duplicate parameter 'a'" });
 * ```
 */

// ============================================================================
// Diagnostic Categories
// ============================================================================

export enum DiagnosticCategory {
  MacroSyntax = "syntax",
  MacroExpansion = "expansion",
  Internal = "internal",
}

// ============================================================================
// Diagnostic Descriptor (Error Catalog Entry)
// ============================================================================

export interface DiagnosticDescriptor {
  /** Unique error code in range 9001-9999 */
  readonly code: number;

  /** Default severity */
  readonly severity: "error" | "warning" | "info";

  readonly category: DiagnosticCategory;

  /** Message template with {placeholders} for interpolation */
  readonly messageTemplate: string;

  /** Long-form explanation for docs */
  readonly explanation: string;
}

// ============================================================================
// Error Catalog
// ============================================================================

export const SMT9001: DiagnosticDescriptor = {
  code: 9001,
  severity: "error",
  category: DiagnosticCategory.MacroSyntax,
  messageTemplate: "Malformed definition at {path}: {reason}",
  explanation: `defineFun takes a session, a name, a parameter list, a result sort and a body.

Correct:
  defineFun(session, "max", [["a", Int], ["b", Int]], Int, (a, b) => ite(gt(a, b), a, b));

The name must be a string literal, the parameter list an array literal of
["name", sort] pairs with distinct names, and the body a function taking one
argument per parameter.`,
};

export const SMT9002: DiagnosticDescriptor = {
  code: 9002,
  severity: "error",
  category: DiagnosticCategory.MacroExpansion,
  messageTemplate: "Expansion of `{macro}` failed: {message}",
  explanation: `The macro threw while building its replacement. The call is replaced by an
expression that throws the same message at run time.`,
};

export const SMT9999: DiagnosticDescriptor = {
  code: 9999,
  severity: "error",
  category: DiagnosticCategory.Internal,
  messageTemplate: "Internal error: {message}",
  explanation: "This is an internal error in smtkit that should not happen.",
};

/**
 * Interpolate `{name}` placeholders. Unknown placeholders stay as written.
 */
export function formatDiagnostic(
  descriptor: DiagnosticDescriptor,
  args: Readonly<Record<string, string>> = {}
): string {
  return descriptor.messageTemplate.replace(/\{(\w+)\}/g, (whole, key: string) =>
    Object.prototype.hasOwnProperty.call(args, key) ? args[key] : whole
  );
}
