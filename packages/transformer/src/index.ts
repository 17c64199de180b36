/**
 * @smtkit/transformer - TypeScript transformer for macro expansion
 *
 * Expands registered expression macros (such as the compile-time
 * `defineFun`) in source files. Use it as a `before` transformer in a
 * custom emit, or call `transformCode` for a single in-memory file.
 *
 * @example
 * ```typescript
 * const program = ts.createProgram(fileNames, options);
 * program.emit(undefined, undefined, undefined, false, {
 *   before: [macroTransformerFactory(program)],
 * });
 * ```
 */

import * as ts from "typescript";
import * as path from "path";
import {
  type MacroContextImpl,
  SMT9002,
  SMT9999,
  config as smtkitConfig,
  createMacroContext,
  createMacroErrorExpression,
  formatDiagnostic,
  globalRegistry,
  registerMacros,
  type ExpressionMacro,
  type MacroDefinition,
  type MacroRegistry,
} from "@smtkit/core";
import { defineFunMacro } from "@smtkit/definitions";

/**
 * Configuration for the transformer
 */
export interface MacroTransformerConfig {
  /** Enable verbose logging. Defaults to `transformer.verbose` from the smtkit config. */
  verbose?: boolean;

  /** Registry to resolve macros from (default: the global registry) */
  registry?: MacroRegistry;

  /** Receives every diagnostic produced while expanding a file */
  onDiagnostic?: (diagnostic: ts.DiagnosticWithLocation) => void;
}

/** Macros every transformer knows about */
const BUILTIN_MACROS: readonly MacroDefinition[] = [defineFunMacro];

/**
 * Create the TypeScript transformer factory
 */
export default function macroTransformerFactory(
  program: ts.Program,
  transformerConfig?: MacroTransformerConfig
): ts.TransformerFactory<ts.SourceFile> {
  const verbose = transformerConfig?.verbose ?? smtkitConfig.get("transformer.verbose");
  const registry = transformerConfig?.registry ?? globalRegistry;
  registerMacros(registry, ...BUILTIN_MACROS);

  if (verbose) {
    console.log("[smtkit] Initializing transformer");
    console.log(
      `[smtkit] Registered macros: ${registry
        .getAll()
        .map((m) => m.name)
        .join(", ")}`
    );
  }

  return (context: ts.TransformationContext) => {
    return (sourceFile: ts.SourceFile) => {
      if (verbose) {
        console.log(`[smtkit] Processing: ${sourceFile.fileName}`);
      }

      const ctx = createMacroContext(program, sourceFile, context, verbose);
      const transformer = new MacroTransformer(ctx, registry, verbose);

      const visited = ts.visitEachChild(sourceFile, transformer.visit, context);
      const result = injectImports(visited, ctx.bindings.getPendingImports(), context.factory);
      ctx.bindings.logStats(sourceFile.fileName);

      // Report diagnostics through the TS diagnostic pipeline
      for (const diag of ctx.getDiagnostics()) {
        const located = diag.node !== undefined && diag.node.pos >= 0;
        const start = located && diag.node ? diag.node.getStart(sourceFile) : 0;
        const length = located && diag.node ? diag.node.getWidth(sourceFile) : 0;

        const tsDiag: ts.DiagnosticWithLocation = {
          file: sourceFile,
          start,
          length,
          messageText: `[smtkit] ${diag.message}`,
          category:
            diag.severity === "error"
              ? ts.DiagnosticCategory.Error
              : diag.severity === "warning"
                ? ts.DiagnosticCategory.Warning
                : ts.DiagnosticCategory.Message,
          code: diag.code ?? SMT9999.code,
          source: "smtkit",
        };

        transformerConfig?.onDiagnostic?.(tsDiag);

        // The context collects diagnostics for ts.transform and emit, but does
        // not declare it in its public type
        if ("addDiagnostic" in context && typeof context.addDiagnostic === "function") {
          context.addDiagnostic(tsDiag);
        }

        if (verbose) {
          const prefix = diag.severity === "error" ? "ERROR" : "WARNING";
          const line = sourceFile.getLineAndCharacterOfPosition(start).line + 1;
          console.log(`[smtkit ${prefix}] at ${sourceFile.fileName}:${line} ${diag.message}`);
        }
      }

      return result;
    };
  };
}

export { macroTransformerFactory };

/**
 * Insert generated imports after the file's last import declaration.
 */
function injectImports(
  sourceFile: ts.SourceFile,
  imports: readonly ts.ImportDeclaration[],
  factory: ts.NodeFactory
): ts.SourceFile {
  if (imports.length === 0) return sourceFile;

  const statements = [...sourceFile.statements];
  let insertAt = 0;
  statements.forEach((stmt, i) => {
    if (ts.isImportDeclaration(stmt)) insertAt = i + 1;
  });
  statements.splice(insertAt, 0, ...imports);

  return factory.updateSourceFile(sourceFile, statements);
}

/**
 * Walks one file and expands macro calls
 */
class MacroTransformer {
  /**
   * Cache of resolved macro symbols for this source file. `null` marks a
   * symbol known not to be a macro.
   */
  private symbolMacroCache = new Map<ts.Symbol, ExpressionMacro | null>();

  constructor(
    private readonly ctx: MacroContextImpl,
    private readonly registry: MacroRegistry,
    private readonly verbose: boolean
  ) {}

  visit = (node: ts.Node): ts.Node => {
    if (ts.isCallExpression(node)) {
      const expanded = this.tryExpandExpressionMacro(node);
      if (expanded !== undefined) return expanded;
    }
    return ts.visitEachChild(node, this.visit, this.ctx.transformContext);
  };

  private tryExpandExpressionMacro(node: ts.CallExpression): ts.Expression | undefined {
    const macro = this.resolveCallee(node.expression);
    if (!macro) return undefined;

    if (this.verbose) {
      console.log(`[smtkit] Expanding expression macro: ${macro.name}`);
    }

    let result: ts.Expression;
    try {
      result = macro.expand(this.ctx, node, node.arguments);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.ctx.diagnostic(SMT9002, node, { macro: macro.name, message });
      return createMacroErrorExpression(
        this.ctx.factory,
        formatDiagnostic(SMT9002, { macro: macro.name, message })
      );
    }

    // Arguments carried into the expansion may hold macro calls of their own
    return ts.visitNode(result, this.visit, ts.isExpression);
  }

  // ---------------------------------------------------------------------------
  // Import-scoped macro resolution
  // ---------------------------------------------------------------------------

  private resolveCallee(callee: ts.Expression): ExpressionMacro | undefined {
    // Nodes produced by an earlier expansion have no symbols
    if (callee.pos < 0) {
      return ts.isIdentifier(callee) ? this.fallbackNameLookup(callee.text) : undefined;
    }

    if (ts.isIdentifier(callee)) {
      const symbol = this.ctx.typeChecker.getSymbolAtLocation(callee);
      if (!symbol) return this.fallbackNameLookup(callee.text);

      const cached = this.symbolMacroCache.get(symbol);
      if (cached !== undefined) return cached ?? undefined;

      const resolved = this.resolveSymbolToMacro(symbol, callee.text);
      this.symbolMacroCache.set(symbol, resolved ?? null);
      return resolved;
    }

    // ns.defineFun(...) with `import * as ns from "..."`
    if (ts.isPropertyAccessExpression(callee) && ts.isIdentifier(callee.expression)) {
      const symbol = this.ctx.typeChecker.getSymbolAtLocation(callee.expression);
      for (const decl of symbol?.getDeclarations() ?? []) {
        if (ts.isNamespaceImport(decl)) {
          const moduleName = moduleSpecifierText(decl.parent.parent);
          if (moduleName !== undefined) {
            return this.byModuleExport(moduleName, callee.name.text);
          }
        }
      }
    }

    return undefined;
  }

  /**
   * Match the import that brought `symbol` into scope against the
   * registry, then the module of the declaration it aliases.
   */
  private resolveSymbolToMacro(symbol: ts.Symbol, localName: string): ExpressionMacro | undefined {
    for (const decl of symbol.getDeclarations() ?? []) {
      if (ts.isImportSpecifier(decl)) {
        const moduleName = moduleSpecifierText(decl.parent.parent.parent);
        const exportName = (decl.propertyName ?? decl.name).text;
        const macro =
          moduleName === undefined ? undefined : this.byModuleExport(moduleName, exportName);
        if (macro) return macro;
      }
    }

    // Re-exported through another package (an umbrella or barrel module)
    if (symbol.flags & ts.SymbolFlags.Alias) {
      const target = this.ctx.typeChecker.getAliasedSymbol(symbol);
      for (const decl of target.getDeclarations() ?? []) {
        const packageName = owningPackageName(decl.getSourceFile().fileName);
        const macro =
          packageName === undefined ? undefined : this.byModuleExport(packageName, target.name);
        if (macro) return macro;
      }
      return undefined;
    }

    return this.fallbackNameLookup(localName);
  }

  private byModuleExport(moduleName: string, exportName: string): ExpressionMacro | undefined {
    return this.registry.getByModuleExport(moduleName, exportName);
  }

  /**
   * Name-based lookup, only for macros that are not import-scoped.
   */
  private fallbackNameLookup(name: string): ExpressionMacro | undefined {
    if (this.registry.isImportScoped(name)) return undefined;
    return this.registry.getExpression(name);
  }
}

function moduleSpecifierText(node: ts.Node): string | undefined {
  if (ts.isImportDeclaration(node) && ts.isStringLiteral(node.moduleSpecifier)) {
    return node.moduleSpecifier.text;
  }
  return undefined;
}

// ============================================================================
// Package lookup
// ============================================================================

const packageNameCache = new Map<string, string | undefined>();

/**
 * Name of the nearest package.json above `fileName`, if any.
 */
function owningPackageName(fileName: string): string | undefined {
  const dir = path.dirname(fileName);
  if (packageNameCache.has(dir)) return packageNameCache.get(dir);

  let name: string | undefined;
  const manifest = path.join(dir, "package.json");
  const text = ts.sys.fileExists(manifest) ? ts.sys.readFile(manifest) : undefined;
  if (text !== undefined) {
    const pkg: unknown = JSON.parse(text);
    if (typeof pkg === "object" && pkg !== null && "name" in pkg && typeof pkg.name === "string") {
      name = pkg.name;
    }
  } else if (path.dirname(dir) !== dir) {
    name = owningPackageName(dir);
  }

  packageNameCache.set(dir, name);
  return name;
}

export {
  transformCode,
  type TransformCodeOptions,
  type TransformDiagnostic,
  type TransformResult,
} from "./transform-code.js";
