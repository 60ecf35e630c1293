import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@splitrange/core",
    globals: true,
    environment: "node",
  },
});
