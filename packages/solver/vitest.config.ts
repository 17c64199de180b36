import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@smtkit/solver",
    globals: true,
    environment: "node",
    testTimeout: 30000,
  },
});
