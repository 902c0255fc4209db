import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@kindred/fp",
    include: ["src/**/*.test.ts"],
    environment: "node",
  },
});
