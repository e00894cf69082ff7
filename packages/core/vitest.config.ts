import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@texforge/core",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});
