import { describe, it, expect, vi, afterEach } from "vitest";
import * as ts from "typescript";
import { createRegistry, defineExpressionMacro, type MacroRegistry } from "@smtkit/core";
import { transformCode } from "../src/index.js";

afterEach(() => {
  vi.restoreAllMocks();
});

function testRegistry(): MacroRegistry {
  const registry = createRegistry();
  registry.register(
    defineExpressionMacro({
      name: "answer",
      expand: (ctx) => ctx.factory.createNumericLiteral(42),
    })
  );
  registry.register(
    defineExpressionMacro({
      name: "first",
      expand: (ctx, _callExpr, args) => args[0] ?? ctx.factory.createIdentifier("undefined"),
    })
  );
  registry.register(
    defineExpressionMacro({
      name: "explode",
      expand: () => {
        throw new Error("boom");
      },
    })
  );
  return registry;
}

describe("macroTransformerFactory", () => {
  it("expands a macro found by name", () => {
    const result = transformCode("const x = answer();\n", { registry: testRegistry(), verbose: false });
    expect(result.code).toBe("const x = 42;\n");
    expect(result.changed).toBe(true);
  });

  it("expands macro calls carried into an expansion", () => {
    const result = transformCode("const x = first(answer(), 1);\n", {
      registry: testRegistry(),
      verbose: false,
    });
    expect(result.code).toBe("const x = 42;\n");
  });

  it("leaves unknown calls unchanged", () => {
    const result = transformCode("const x = question();\n", { registry: testRegistry(), verbose: false });
    expect(result.code).toBe("const x = question();\n");
    expect(result.changed).toBe(false);
  });

  it("turns a throwing macro into a diagnostic and a throwing expression", () => {
    const result = transformCode("const x = explode();\n", { registry: testRegistry(), verbose: false });

    expect(result.diagnostics).toEqual([
      {
        file: result.diagnostics[0]?.file,
        start: 10,
        length: 9,
        message: "[smtkit] Expansion of `explode` failed: boom",
        code: 9002,
        severity: "error",
      },
    ]);
    expect(result.code).toContain('throw new Error("Expansion of `explode` failed: boom");');
  });

  it("registers the built-in macros in a custom registry", () => {
    const registry = testRegistry();
    transformCode("", { registry, verbose: false });
    expect(registry.getByModuleExport("@smtkit/definitions", "defineFun")?.name).toBe("defineFun");
  });

  it("logs expansions when verbose", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    transformCode("const x = answer();\n", { registry: testRegistry(), verbose: true });
    expect(log).toHaveBeenCalledWith("[smtkit] Expanding expression macro: answer");
  });

  it("names the virtual file", () => {
    const result = transformCode("const x = explode();\n", {
      registry: testRegistry(),
      verbose: false,
      fileName: "/virtual/setup.ts",
    });
    expect(result.diagnostics[0]?.file).toBe("/virtual/setup.ts");
  });

  it("keeps the compiler options it is given", () => {
    const result = transformCode("const x: number = answer();\n", {
      registry: testRegistry(),
      verbose: false,
      compilerOptions: { target: ts.ScriptTarget.ES2020 },
    });
    expect(result.code).toBe("const x: number = 42;\n");
  });
});
