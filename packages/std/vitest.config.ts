import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@intervalkit/std",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});
