import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "api",
    environment: "node",
    include: ["tests/**/*.test.ts"],
    setupFiles: ["tests/setup.ts"],
    env: {
      LOG_LEVEL: "silent",
    },
    // Key generation and the in-process Postgres both take a moment to boot.
    testTimeout: 30_000,
    hookTimeout: 60_000,
    coverage: {
      thresholds: {
        branches: 70,
        functions: 70,
        lines: 70,
        statements: 70,
      },
    },
  },
});
