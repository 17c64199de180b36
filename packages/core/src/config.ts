/**
 * Unified Configuration System
 *
 * Configuration is loaded once, from (in priority order):
 *
 * 1. Environment variables: SMTKIT_* (for CI overrides)
 * 2. Config files: smtkit.config.js, .smtkitrc, "smtkit" in package.json
 * 3. Defaults
 *
 * `config.set()` merges over the loaded values.
 *
 * @example
 * ```typescript
 * import { config } from "@smtkit/core";
 *
 * config.get("debug");              // → boolean
 * config.get("solver.macroFinder"); // → boolean
 *
 * config.set({ solver: { timeout: 2000 } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

export interface SolverConfig {
  /** Ask Z3 to turn quantified definitions back into macros (default: true) */
  macroFinder?: boolean;
  /** Per-check timeout in milliseconds */
  timeout?: number;
  /** Logic to set when a session starts, e.g. "ALL" or "UFLIA" */
  logic?: string;
}

export interface TransformerConfig {
  /** Log every macro expansion */
  verbose?: boolean;
}

/**
 * Full smtkit configuration schema.
 */
export interface SmtkitConfig {
  /** Log every command sent to a solver */
  debug?: boolean;
  solver?: SolverConfig;
  transformer?: TransformerConfig;
}

/**
 * Value type of every readable configuration path.
 */
export interface ConfigValues {
  debug: boolean;
  "solver.macroFinder": boolean;
  "solver.timeout": number | undefined;
  "solver.logic": string | undefined;
  "transformer.verbose": boolean;
}

export type ConfigPath = keyof ConfigValues;

// ============================================================================
// Global State
// ============================================================================

let configStore: SmtkitConfig = {};
let configLoaded = false;
let configFilePath: string | undefined;

const DEFAULTS: SmtkitConfig = {
  debug: false,
  solver: { macroFinder: true },
  transformer: { verbose: false },
};

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables prefixed with SMTKIT_.
 * A double underscore separates nesting levels and a single underscore
 * starts a new camelCase word.
 *
 * Examples:
 *   SMTKIT_DEBUG=1                     → { debug: true }
 *   SMTKIT_SOLVER__MACRO_FINDER=false  → { solver: { macroFinder: false } }
 *   SMTKIT_SOLVER__TIMEOUT=5000        → { solver: { timeout: 5000 } }
 */
function loadConfigFromEnv(): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};
  const PREFIX = "SMTKIT_";

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    const configPath = key
      .slice(PREFIX.length)
      .toLowerCase()
      .split("__")
      .map((segment) => segment.replace(/_([a-z0-9])/g, (_, c: string) => c.toUpperCase()))
      .join(".");

    setNestedValue(envConfig, configPath, parseEnvValue(value));
  }

  return envConfig;
}

function parseEnvValue(value: string): unknown {
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false" || value === "") return false;
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  return value;
}

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  const last = parts.pop();
  if (last === undefined) return;

  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

function toRecord(cfg: SmtkitConfig): Record<string, unknown> {
  const record: Record<string, unknown> = {};
  if (cfg.debug !== undefined) record.debug = cfg.debug;
  if (cfg.solver !== undefined) record.solver = { ...cfg.solver };
  if (cfg.transformer !== undefined) record.transformer = { ...cfg.transformer };
  return record;
}

/**
 * Keep the known keys of a raw configuration object. Values of the wrong
 * type raise, naming the offending path.
 */
function normalizeConfig(raw: Record<string, unknown>, source: string): SmtkitConfig {
  const result: SmtkitConfig = {};

  const debug = raw.debug;
  if (debug !== undefined) result.debug = expectBoolean(debug, "debug", source);

  const solver = raw.solver;
  if (solver !== undefined) {
    if (!isRecord(solver)) throw configTypeError("solver", "an object", source);
    const out: SolverConfig = {};
    if (solver.macroFinder !== undefined) {
      out.macroFinder = expectBoolean(solver.macroFinder, "solver.macroFinder", source);
    }
    if (solver.timeout !== undefined) {
      const timeout = solver.timeout;
      if (typeof timeout !== "number" || !Number.isInteger(timeout) || timeout < 0) {
        throw configTypeError("solver.timeout", "a non-negative integer", source);
      }
      out.timeout = timeout;
    }
    if (solver.logic !== undefined) {
      if (typeof solver.logic !== "string") throw configTypeError("solver.logic", "a string", source);
      out.logic = solver.logic;
    }
    result.solver = out;
  }

  const transformer = raw.transformer;
  if (transformer !== undefined) {
    if (!isRecord(transformer)) throw configTypeError("transformer", "an object", source);
    const out: TransformerConfig = {};
    if (transformer.verbose !== undefined) {
      out.verbose = expectBoolean(transformer.verbose, "transformer.verbose", source);
    }
    result.transformer = out;
  }

  return result;
}

function expectBoolean(value: unknown, path: string, source: string): boolean {
  if (typeof value !== "boolean") throw configTypeError(path, "a boolean", source);
  return value;
}

function configTypeError(path: string, expected: string, source: string): TypeError {
  return new TypeError(`smtkit config: '${path}' must be ${expected} (from ${source})`);
}

// ============================================================================
// Config File Loading
// ============================================================================

const MODULE_NAME = "smtkit";

function loadConfigFromFiles(): Record<string, unknown> {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `.${MODULE_NAME}rc.js`,
      `.${MODULE_NAME}rc.cjs`,
      `${MODULE_NAME}.config.js`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });

  const result = explorer.search();
  if (!result || result.isEmpty) return {};

  const loaded: unknown = result.config;
  if (!isRecord(loaded)) {
    throw new TypeError(`smtkit config: ${result.filepath} must export an object`);
  }
  configFilePath = result.filepath;
  return loaded;
}

// ============================================================================
// Config Initialization
// ============================================================================

function initializeConfig(): void {
  if (configLoaded) return;

  const fileConfig = normalizeConfig(loadConfigFromFiles(), configFilePath ?? "config file");
  const envConfig = normalizeConfig(loadConfigFromEnv(), "environment");

  // Merge: defaults < fileConfig < envConfig
  configStore = normalizeConfig(
    deepMerge(deepMerge(toRecord(DEFAULTS), toRecord(fileConfig)), toRecord(envConfig)),
    "merged config"
  );
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path.
 */
function get<P extends ConfigPath>(path: P): ConfigValues[P];
function get(path: ConfigPath): ConfigValues[ConfigPath] {
  initializeConfig();
  switch (path) {
    case "debug":
      return configStore.debug ?? false;
    case "solver.macroFinder":
      return configStore.solver?.macroFinder ?? true;
    case "solver.timeout":
      return configStore.solver?.timeout;
    case "solver.logic":
      return configStore.solver?.logic;
    case "transformer.verbose":
      return configStore.transformer?.verbose ?? false;
  }
}

/**
 * Set configuration values programmatically.
 */
function set(values: SmtkitConfig): void {
  initializeConfig();
  configStore = normalizeConfig(deepMerge(toRecord(configStore), toRecord(values)), "config.set()");
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: ConfigPath): boolean {
  return !!get(path);
}

/**
 * Get all configuration values.
 */
function getAll(): Readonly<SmtkitConfig> {
  initializeConfig();
  return configStore;
}

/**
 * Reset configuration to defaults (mainly for testing).
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
}

/**
 * Unified configuration API.
 */
export const config = {
  get,
  set,
  has,
  getAll,
  reset,
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: SmtkitConfig): SmtkitConfig {
  return cfg;
}
