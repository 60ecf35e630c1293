import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@splitrange/parallel",
    globals: true,
    environment: "node",
  },
});
