import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@smtkit/terms",
    globals: true,
    environment: "node",
  },
});
