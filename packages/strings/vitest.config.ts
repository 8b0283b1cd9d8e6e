import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@parley/strings",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});
