import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@smtkit/definitions",
    globals: true,
    environment: "node",
  },
});
