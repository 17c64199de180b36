/**
 * Single-file transformation
 *
 * Builds a one-file program from a string, runs the macro transformer over
 * it and prints the result. Imports are not followed (`noResolve`), so
 * macros are recognized by the specifiers they are imported from. Library
 * files come from the installed TypeScript and are parsed once per process.
 */

import * as ts from "typescript";
import * as path from "path";
import type { MacroRegistry } from "@smtkit/core";
import macroTransformerFactory from "./index.js";

export interface TransformDiagnostic {
  file: string;
  start: number;
  length: number;
  message: string;
  code: number;
  severity: "error" | "warning";
}

export interface TransformResult {
  /** Transformed code, printed */
  code: string;
  /** Whether any node was replaced */
  changed: boolean;
  /** Macro expansion diagnostics */
  diagnostics: TransformDiagnostic[];
}

export interface TransformCodeOptions {
  /** Name of the virtual file (default: "input.ts") */
  fileName?: string;
  verbose?: boolean;
  registry?: MacroRegistry;
  /** Merged over the defaults below */
  compilerOptions?: ts.CompilerOptions;
}

const DEFAULT_COMPILER_OPTIONS: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.ESNext,
  moduleResolution: ts.ModuleResolutionKind.Bundler,
  strict: true,
  noEmit: true,
  noResolve: true,
  types: [],
};

const libFileCache = new Map<string, ts.SourceFile>();

function createHost(
  fileName: string,
  code: string,
  compilerOptions: ts.CompilerOptions
): ts.CompilerHost {
  const host = ts.createCompilerHost(compilerOptions, true);
  const baseGetSourceFile = host.getSourceFile;
  const baseFileExists = host.fileExists;
  const baseReadFile = host.readFile;

  host.getSourceFile = (name, languageVersion, onError, shouldCreateNewSourceFile) => {
    if (name === fileName) {
      return ts.createSourceFile(name, code, languageVersion, true);
    }
    const target = typeof languageVersion === "object" ? languageVersion.languageVersion : languageVersion;
    const key = `${target}:${name}`;
    const cached = libFileCache.get(key);
    if (cached) return cached;

    const loaded = baseGetSourceFile.call(host, name, languageVersion, onError, shouldCreateNewSourceFile);
    if (loaded) libFileCache.set(key, loaded);
    return loaded;
  };
  host.fileExists = (name) => name === fileName || baseFileExists.call(host, name);
  host.readFile = (name) => (name === fileName ? code : baseReadFile.call(host, name));

  return host;
}

/**
 * Transform one file of source text.
 *
 * @example
 * ```typescript
 * const { code, diagnostics } = transformCode(source, { fileName: "setup.ts" });
 * ```
 */
export function transformCode(code: string, options: TransformCodeOptions = {}): TransformResult {
  const fileName = path.resolve(options.fileName ?? "input.ts").replace(/\\/g, "/");
  const compilerOptions = { ...DEFAULT_COMPILER_OPTIONS, ...options.compilerOptions };

  const program = ts.createProgram([fileName], compilerOptions, createHost(fileName, code, compilerOptions));
  const sourceFile = program.getSourceFile(fileName);
  if (!sourceFile) {
    throw new Error(`Could not load ${fileName} into the program`);
  }

  const collected: ts.DiagnosticWithLocation[] = [];
  const factory = macroTransformerFactory(program, {
    verbose: options.verbose,
    registry: options.registry,
    onDiagnostic: (d) => collected.push(d),
  });

  const result = ts.transform(sourceFile, [factory]);
  try {
    const printer = ts.createPrinter({ newLine: ts.NewLineKind.LineFeed });
    const [transformed] = result.transformed;
    const printed = printer.printFile(transformed);

    return {
      code: printed,
      changed: printed !== printer.printFile(sourceFile),
      diagnostics: collected.map((d) => ({
        file: d.file.fileName,
        start: d.start,
        length: d.length,
        message: ts.flattenDiagnosticMessageText(d.messageText, "\n"),
        code: d.code,
        severity: d.category === ts.DiagnosticCategory.Error ? "error" : "warning",
      })),
    };
  } finally {
    result.dispose();
  }
}
