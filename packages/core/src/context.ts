/**
 * MacroContext Implementation - Provides utilities for macro expansion
 */

import type * as ts from "typescript";
import type { MacroContext, MacroDiagnostic } from "./types.js";
import { type DiagnosticDescriptor, formatDiagnostic } from "./diagnostics.js";
import { FileBindingCache } from "./hygiene.js";

export class MacroContextImpl implements MacroContext {
  private readonly diagnostics: MacroDiagnostic[] = [];

  /** Reference hygiene for the current file */
  public readonly bindings: FileBindingCache;

  constructor(
    public readonly program: ts.Program,
    public readonly typeChecker: ts.TypeChecker,
    public readonly sourceFile: ts.SourceFile,
    public readonly factory: ts.NodeFactory,
    public readonly transformContext: ts.TransformationContext,
    verbose = false
  ) {
    this.bindings = new FileBindingCache(sourceFile, verbose);
  }

  // -------------------------------------------------------------------------
  // Diagnostics
  // -------------------------------------------------------------------------

  diagnostic(
    descriptor: DiagnosticDescriptor,
    node: ts.Node,
    args: Readonly<Record<string, string>> = {}
  ): void {
    this.diagnostics.push({
      severity: descriptor.severity,
      message: formatDiagnostic(descriptor, args),
      code: descriptor.code,
      node,
    });
  }

  getDiagnostics(): MacroDiagnostic[] {
    return [...this.diagnostics];
  }

  // -------------------------------------------------------------------------
  // Names
  // -------------------------------------------------------------------------

  safeRef(symbol: string, from: string): ts.Identifier {
    return this.bindings.safeRef(symbol, from);
  }
}

/**
 * Create a macro context for a given program and source file
 */
export function createMacroContext(
  program: ts.Program,
  sourceFile: ts.SourceFile,
  transformContext: ts.TransformationContext,
  verbose = false
): MacroContextImpl {
  return new MacroContextImpl(
    program,
    program.getTypeChecker(),
    sourceFile,
    transformContext.factory,
    transformContext,
    verbose
  );
}
