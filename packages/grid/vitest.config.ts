import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@texforge/grid",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});
