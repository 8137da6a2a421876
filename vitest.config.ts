import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // Test file patterns
    include: ["test/**/*.test.ts"],

    coverage: {
      provider: "v8",

      // Source files to measure
      include: ["src/**/*.ts"],

      // The entry point only wires the real process
      exclude: ["src/**/*.d.ts", "src/cli/main.ts"],

      thresholds: {
        branches: 70,
        functions: 85,
        lines: 80,
        statements: 80,
      },

      reporter: ["text", "html", "json"],
    },

    // Settings tests use temp directories
    pool: "forks",

    testTimeout: 30000,
  },
});
