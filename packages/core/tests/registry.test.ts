/**
 * Tests for the macro registry
 */

import { describe, it, expect, beforeEach } from "vitest";
import { createRegistry, defineExpressionMacro, registerMacros } from "@smtkit/core";
import type { MacroRegistry } from "@smtkit/core";

describe("MacroRegistry", () => {
  let registry: MacroRegistry;

  beforeEach(() => {
    registry = createRegistry();
  });

  it("should register expression macros", () => {
    const macro = defineExpressionMacro({
      name: "testMacro",
      description: "A test macro",
      expand: (_ctx, callExpr) => callExpr,
    });

    registry.register(macro);

    const retrieved = registry.getExpression("testMacro");
    expect(retrieved?.name).toBe("testMacro");
    expect(retrieved?.kind).toBe("expression");
  });

  it("should return undefined for non-existent macros", () => {
    expect(registry.getExpression("nonExistent")).toBeUndefined();
  });

  it("should allow idempotent registration of the same macro", () => {
    const macro = defineExpressionMacro({
      name: "duplicate",
      expand: (_ctx, callExpr) => callExpr,
    });

    registry.register(macro);
    expect(() => registry.register(macro)).not.toThrow();
    expect(() => registry.register({ ...macro })).not.toThrow();
    expect(registry.getAll()).toHaveLength(1);
  });

  it("should throw on the same name from different modules", () => {
    registry.register(
      defineExpressionMacro({ name: "conflicting", module: "module-a", expand: (_c, e) => e })
    );
    expect(() =>
      registry.register(
        defineExpressionMacro({ name: "conflicting", module: "module-b", expand: (_c, e) => e })
      )
    ).toThrow("Expression macro 'conflicting' is already registered");
  });

  it("should index module-scoped macros by export name", () => {
    const macro = defineExpressionMacro({
      name: "defineFunMacro",
      module: "@smtkit/definitions",
      exportName: "defineFun",
      expand: (_ctx, callExpr) => callExpr,
    });
    registerMacros(registry, macro);

    expect(registry.getByModuleExport("@smtkit/definitions", "defineFun")).toBe(macro);
    expect(registry.getByModuleExport("@smtkit/definitions", "defineFunMacro")).toBeUndefined();
    expect(registry.isImportScoped("defineFunMacro")).toBe(true);
  });

  it("should treat macros without a module as global", () => {
    registerMacros(registry, defineExpressionMacro({ name: "anywhere", expand: (_c, e) => e }));
    expect(registry.isImportScoped("anywhere")).toBe(false);
  });

  it("should clear all macros", () => {
    registerMacros(
      registry,
      defineExpressionMacro({ name: "a", module: "m", expand: (_c, e) => e }),
      defineExpressionMacro({ name: "b", expand: (_c, e) => e })
    );
    registry.clear();
    expect(registry.getAll()).toEqual([]);
    expect(registry.getByModuleExport("m", "a")).toBeUndefined();
  });
});
