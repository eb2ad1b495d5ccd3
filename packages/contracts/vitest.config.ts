import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@intervalkit/contracts",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});
