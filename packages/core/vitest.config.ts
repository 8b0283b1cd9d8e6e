import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@parley/core",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});
