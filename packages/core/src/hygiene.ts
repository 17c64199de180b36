/**
 * Reference hygiene for macro-generated code
 *
 * Generated code refers to exports of other modules (`forall`, `eq`, ...).
 * Those names must resolve to the intended export even when the user's file
 * declares or imports something else under the same name.
 *
 * `FileBindingCache.safeRef()` resolves in two tiers:
 * - Tier 1: the file's import map. Imported from the same module: bare name.
 * - Tier 2: the file's top-level declarations. Declared locally: alias.
 *
 * A conflict yields an aliased import; a name that is not bound at all yields
 * a plain import. Both are collected and injected after expansion.
 *
 * @example
 * ```typescript
 * // User code: const eq = 42;
 * const ref = cache.safeRef("eq", "@smtkit/terms");
 * // ref.text === "__eq_smt0__"
 * // cache.getPendingImports() yields: import { eq as __eq_smt0__ } from "@smtkit/terms"
 * ```
 */

import * as ts from "typescript";

interface PendingImportEntry {
  symbol: string;
  from: string;
  /** Local name when the import must be renamed */
  alias?: string;
}

/**
 * Per-file cache of bindings, built once from the file's top-level
 * statements and shared by every macro expansion in that file.
 */
export class FileBindingCache {
  /** localName -> moduleSpecifier for all value imports in the file */
  readonly importMap = new Map<string, string>();

  /** Names declared at file top level */
  readonly localDecls = new Set<string>();

  /** Imports to inject, deduped by symbol and module */
  private pending = new Map<string, PendingImportEntry>();

  private aliasCounter = 0;

  private stats = { tier1: 0, tier2: 0, conflicts: 0 };

  constructor(
    sourceFile: ts.SourceFile,
    private readonly verbose = false
  ) {
    for (const stmt of sourceFile.statements) {
      if (ts.isImportDeclaration(stmt)) {
        this.collectImportBindings(stmt);
      } else {
        this.collectDeclarationBindings(stmt);
      }
    }

    if (verbose) {
      console.log(
        `[smtkit:hygiene] ${sourceFile.fileName}: cache built (${this.importMap.size} imports, ${this.localDecls.size} local decls)`
      );
    }
  }

  private collectImportBindings(node: ts.ImportDeclaration): void {
    const moduleSpecifier = node.moduleSpecifier;
    if (!ts.isStringLiteral(moduleSpecifier)) return;

    const moduleName = moduleSpecifier.text;
    const importClause = node.importClause;
    if (!importClause) return;

    // A type-only import still occupies the name
    const bind = (name: string): void => {
      if (importClause.isTypeOnly) {
        this.localDecls.add(name);
      } else {
        this.importMap.set(name, moduleName);
      }
    };

    if (importClause.name) {
      bind(importClause.name.text);
    }

    const namedBindings = importClause.namedBindings;
    if (!namedBindings) return;

    if (ts.isNamedImports(namedBindings)) {
      for (const element of namedBindings.elements) {
        const imported = element.propertyName?.text ?? element.name.text;
        if (imported === element.name.text && !element.isTypeOnly) {
          bind(element.name.text);
        } else {
          // Renamed or type-only: the local name does not denote `imported`
          this.localDecls.add(element.name.text);
        }
      }
    } else {
      this.localDecls.add(namedBindings.name.text);
    }
  }

  private collectDeclarationBindings(stmt: ts.Statement): void {
    if (ts.isVariableStatement(stmt)) {
      for (const decl of stmt.declarationList.declarations) {
        this.collectBindingName(decl.name);
      }
      return;
    }

    if (
      (ts.isFunctionDeclaration(stmt) || ts.isClassDeclaration(stmt)) &&
      stmt.name !== undefined
    ) {
      this.localDecls.add(stmt.name.text);
      return;
    }

    if (
      ts.isInterfaceDeclaration(stmt) ||
      ts.isTypeAliasDeclaration(stmt) ||
      ts.isEnumDeclaration(stmt)
    ) {
      this.localDecls.add(stmt.name.text);
      return;
    }

    if (ts.isModuleDeclaration(stmt) && ts.isIdentifier(stmt.name)) {
      this.localDecls.add(stmt.name.text);
    }
  }

  /**
   * Collect names from a binding pattern (handles destructuring).
   */
  private collectBindingName(name: ts.BindingName): void {
    if (ts.isIdentifier(name)) {
      this.localDecls.add(name.text);
    } else if (ts.isObjectBindingPattern(name)) {
      for (const element of name.elements) {
        this.collectBindingName(element.name);
      }
    } else {
      for (const element of name.elements) {
        if (!ts.isOmittedExpression(element)) {
          this.collectBindingName(element.name);
        }
      }
    }
  }

  /**
   * Get a safe reference to `symbol` exported by `from`.
   */
  safeRef(symbol: string, from: string): ts.Identifier {
    const importedFrom = this.importMap.get(symbol);
    if (importedFrom !== undefined) {
      this.stats.tier1++;
      if (importedFrom === from) {
        return ts.factory.createIdentifier(symbol);
      }
      this.stats.conflicts++;
      return this.getOrCreateAlias(symbol, from);
    }

    this.stats.tier2++;
    if (this.localDecls.has(symbol)) {
      this.stats.conflicts++;
      return this.getOrCreateAlias(symbol, from);
    }

    const key = `${symbol}\0${from}`;
    if (!this.pending.has(key)) {
      this.pending.set(key, { symbol, from });
    }
    return ts.factory.createIdentifier(symbol);
  }

  private getOrCreateAlias(symbol: string, from: string): ts.Identifier {
    const key = `${symbol}\0${from}`;
    let entry = this.pending.get(key);
    if (!entry) {
      entry = { symbol, from, alias: `__${symbol}_smt${this.aliasCounter++}__` };
      this.pending.set(key, entry);
    }
    return ts.factory.createIdentifier(entry.alias ?? symbol);
  }

  /**
   * Import declarations for every reference that needed one, one
   * declaration per module.
   */
  getPendingImports(): ts.ImportDeclaration[] {
    if (this.pending.size === 0) return [];

    const byModule = new Map<string, PendingImportEntry[]>();
    for (const entry of this.pending.values()) {
      const list = byModule.get(entry.from) ?? [];
      list.push(entry);
      byModule.set(entry.from, list);
    }

    const imports: ts.ImportDeclaration[] = [];
    for (const [moduleName, entries] of byModule) {
      const specifiers = entries.map((e) =>
        e.alias === undefined
          ? ts.factory.createImportSpecifier(false, undefined, ts.factory.createIdentifier(e.symbol))
          : ts.factory.createImportSpecifier(
              false,
              ts.factory.createIdentifier(e.symbol),
              ts.factory.createIdentifier(e.alias)
            )
      );

      imports.push(
        ts.factory.createImportDeclaration(
          undefined,
          ts.factory.createImportClause(false, undefined, ts.factory.createNamedImports(specifiers)),
          ts.factory.createStringLiteral(moduleName)
        )
      );
    }

    return imports;
  }

  hasPendingImports(): boolean {
    return this.pending.size > 0;
  }

  getStats(): { tier1: number; tier2: number; conflicts: number } {
    return { ...this.stats };
  }

  logStats(fileName: string): void {
    if (!this.verbose) return;
    const s = this.stats;
    console.log(
      `[smtkit:hygiene] ${fileName}: ${s.tier1 + s.tier2} safeRef calls ` +
        `(${s.tier1} tier1, ${s.tier2} tier2, ${s.conflicts} conflicts, ${this.pending.size} imports)`
    );
  }
}
