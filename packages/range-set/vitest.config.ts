import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@intervalkit/range-set",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});
