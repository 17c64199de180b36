/**
 * Macro Registry - Stores and retrieves macro definitions
 */

import type { ExpressionMacro, MacroDefinition, MacroRegistry } from "./types.js";

/**
 * Key for module-scoped macro lookup: "module::exportName"
 */
function moduleKey(mod: string, exportName: string): string {
  return `${mod}::${exportName}`;
}

class MacroRegistryImpl implements MacroRegistry {
  private expressionMacros = new Map<string, ExpressionMacro>();

  /**
   * Secondary index for macros that declare a `module`.
   * Key is "module::exportName".
   */
  private moduleScopedMacros = new Map<string, MacroDefinition>();

  /**
   * Same name and same module counts as the same macro, so a module that is
   * loaded twice can register again.
   */
  private isSameMacro(existing: MacroDefinition, incoming: MacroDefinition): boolean {
    if (existing === incoming) return true;
    return existing.name === incoming.name && existing.module === incoming.module;
  }

  register(macro: MacroDefinition): void {
    const existing = this.expressionMacros.get(macro.name);
    if (existing) {
      if (this.isSameMacro(existing, macro)) return;
      throw new Error(`Expression macro '${macro.name}' is already registered`);
    }
    this.expressionMacros.set(macro.name, macro);

    if (macro.module) {
      const exportName = macro.exportName ?? macro.name;
      this.moduleScopedMacros.set(moduleKey(macro.module, exportName), macro);
    }
  }

  getExpression(name: string): ExpressionMacro | undefined {
    return this.expressionMacros.get(name);
  }

  getByModuleExport(mod: string, exportName: string): MacroDefinition | undefined {
    return this.moduleScopedMacros.get(moduleKey(mod, exportName));
  }

  isImportScoped(name: string): boolean {
    return this.expressionMacros.get(name)?.module !== undefined;
  }

  getAll(): MacroDefinition[] {
    return [...this.expressionMacros.values()];
  }

  clear(): void {
    this.expressionMacros.clear();
    this.moduleScopedMacros.clear();
  }
}

/** Global macro registry singleton */
export const globalRegistry: MacroRegistry = new MacroRegistryImpl();

/** Create a new isolated registry (for testing or scoped usage) */
export function createRegistry(): MacroRegistry {
  return new MacroRegistryImpl();
}

// ============================================================================
// Macro Definition Helpers
// ============================================================================

/**
 * Define an expression macro with type inference
 */
export function defineExpressionMacro(definition: Omit<ExpressionMacro, "kind">): ExpressionMacro {
  return {
    ...definition,
    kind: "expression",
  };
}

/**
 * Register several macros at once
 */
export function registerMacros(
  registry: MacroRegistry,
  ...macros: readonly MacroDefinition[]
): void {
  for (const macro of macros) {
    registry.register(macro);
  }
}
