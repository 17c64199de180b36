import { describe, it, expect, afterEach } from "vitest";
import { config, defineConfig } from "@smtkit/core";

const ENV_KEYS = [
  "SMTKIT_DEBUG",
  "SMTKIT_SOLVER__MACRO_FINDER",
  "SMTKIT_SOLVER__TIMEOUT",
  "SMTKIT_SOLVER__LOGIC",
];

afterEach(() => {
  for (const key of ENV_KEYS) {
    delete process.env[key];
  }
  config.reset();
});

describe("config", () => {
  it("provides defaults", () => {
    config.reset();
    expect(config.get("debug")).toBe(false);
    expect(config.get("solver.macroFinder")).toBe(true);
    expect(config.get("solver.timeout")).toBeUndefined();
    expect(config.get("transformer.verbose")).toBe(false);
  });

  it("merges programmatic values over defaults", () => {
    config.reset();
    config.set({ solver: { timeout: 2000 } });
    expect(config.get("solver.timeout")).toBe(2000);
    expect(config.get("solver.macroFinder")).toBe(true);
    expect(config.has("solver.timeout")).toBe(true);
  });

  it("reads SMTKIT_ environment variables", () => {
    process.env.SMTKIT_DEBUG = "1";
    process.env.SMTKIT_SOLVER__MACRO_FINDER = "false";
    process.env.SMTKIT_SOLVER__TIMEOUT = "5000";
    process.env.SMTKIT_SOLVER__LOGIC = "QF_LIA";
    config.reset();

    expect(config.get("debug")).toBe(true);
    expect(config.get("solver.macroFinder")).toBe(false);
    expect(config.get("solver.timeout")).toBe(5000);
    expect(config.get("solver.logic")).toBe("QF_LIA");
  });

  it("rejects values of the wrong type", () => {
    process.env.SMTKIT_SOLVER__LOGIC = "1";
    config.reset();
    expect(() => config.get("solver.logic")).toThrow(
      "smtkit config: 'solver.logic' must be a string (from environment)"
    );
  });

  it("validates programmatic values", () => {
    config.reset();
    expect(() => config.set({ solver: { timeout: -1 } })).toThrow(
      "smtkit config: 'solver.timeout' must be a non-negative integer (from config.set())"
    );
  });

  it("returns config objects unchanged from defineConfig", () => {
    const cfg = { debug: true, solver: { logic: "ALL" } };
    expect(defineConfig(cfg)).toBe(cfg);
  });
});
