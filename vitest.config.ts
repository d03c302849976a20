import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    // Tests drive real git processes.
    testTimeout: 60_000,
    hookTimeout: 60_000,
  },
});
