import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: [
      // End-to-end scenarios against the umbrella package
      {
        extends: true,
        test: {
          name: "smtkit",
          include: ["tests/**/*.test.ts"],
          globals: true,
        },
      },
      // Package tests
      "packages/*/vitest.config.ts",
    ],

    exclude: ["**/node_modules/**", "**/dist/**"],

    pool: "forks",

    poolOptions: {
      forks: {
        // One fork so the z3 WASM module is initialized once
        singleFork: true,
      },
    },

    typecheck: {
      enabled: false,
    },

    testTimeout: 30000,
    hookTimeout: 60000,
  },
});
