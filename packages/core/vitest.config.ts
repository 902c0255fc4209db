import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@kindred/core",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});
