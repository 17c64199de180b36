/**
 * Core module exports for @smtkit/core
 *
 * This package provides:
 * - Macro system infrastructure (types, registry, context, hygiene)
 * - Diagnostics catalogue
 * - Configuration
 */

export * from "./types.js";
export * from "./registry.js";
export * from "./context.js";
export * from "./hygiene.js";
export * from "./diagnostics.js";
export * from "./ast.js";

// Configuration System
export {
  config,
  defineConfig,
  type SmtkitConfig,
  type SolverConfig,
  type TransformerConfig,
  type ConfigPath,
  type ConfigValues,
} from "./config.js";
