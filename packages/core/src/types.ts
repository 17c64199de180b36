/**
 * Core types for the smtkit macro system
 */

import type * as ts from "typescript";
import type { DiagnosticDescriptor } from "./diagnostics.js";

// ============================================================================
// Macro Context - Available to all macros during expansion
// ============================================================================

export interface MacroContext {
  /** The TypeScript Program instance */
  program: ts.Program;

  /** Type checker for semantic analysis */
  typeChecker: ts.TypeChecker;

  /** Current source file being processed */
  sourceFile: ts.SourceFile;

  /** TypeScript factory for creating nodes */
  factory: ts.NodeFactory;

  /** The transformer context */
  transformContext: ts.TransformationContext;

  // -------------------------------------------------------------------------
  // Diagnostics
  // -------------------------------------------------------------------------

  /** Report a catalogued diagnostic */
  diagnostic(
    descriptor: DiagnosticDescriptor,
    node: ts.Node,
    args?: Readonly<Record<string, string>>
  ): void;

  // -------------------------------------------------------------------------
  // Names
  // -------------------------------------------------------------------------

  /**
   * Reference an export of another module from generated code. Adds the
   * import when the file lacks it and aliases the name when the file
   * already binds it to something else.
   */
  safeRef(symbol: string, from: string): ts.Identifier;
}

// ============================================================================
// Macro Definitions
// ============================================================================

export type MacroKind = "expression";

/** Base interface for all macro definitions */
export interface MacroDefinitionBase {
  /** Unique name of the macro */
  name: string;

  /** Optional description for documentation */
  description?: string;

  /**
   * The module specifier that exports this macro's placeholder function.
   * When set, the macro only expands where the placeholder is imported
   * from this module.
   */
  module?: string;

  /**
   * The exported name of the placeholder in the source module.
   * Defaults to `name`.
   */
  exportName?: string;
}

/** Expression macro - transforms call expressions */
export interface ExpressionMacro extends MacroDefinitionBase {
  kind: "expression";

  /**
   * Expand the macro call into new AST nodes
   * @param callExpr - The macro call expression
   * @param args - The arguments passed to the macro
   */
  expand(
    ctx: MacroContext,
    callExpr: ts.CallExpression,
    args: readonly ts.Expression[]
  ): ts.Expression;
}

export type MacroDefinition = ExpressionMacro;

// ============================================================================
// Macro Registry
// ============================================================================

export interface MacroRegistry {
  /** Register a new macro */
  register(macro: MacroDefinition): void;

  /** Get an expression macro by name */
  getExpression(name: string): ExpressionMacro | undefined;

  /** Look up a macro by its source module and export name */
  getByModuleExport(mod: string, exportName: string): MacroDefinition | undefined;

  /** Check whether a macro requires import-scoping */
  isImportScoped(name: string): boolean;

  /** Get all registered macros */
  getAll(): MacroDefinition[];

  /** Remove every macro (useful for testing) */
  clear(): void;
}

// ============================================================================
// Diagnostics
// ============================================================================

export interface MacroDiagnostic {
  severity: "error" | "warning" | "info";

  message: string;

  /** Catalogue code, when the diagnostic came from a descriptor */
  code?: number;

  /** Source node that caused the diagnostic */
  node?: ts.Node;
}
