import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@smtkit/core",
    globals: true,
    environment: "node",
  },
});
