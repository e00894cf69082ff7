import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@texforge/markup",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});
