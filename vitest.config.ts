import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],

    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: [
        "src/**/*.d.ts",
        "src/index.ts", // Re-export barrel
        "src/cli/main.ts",
      ],
      thresholds: {
        branches: 65,
        functions: 80,
        lines: 80,
        statements: 80,
      },
      reporter: ["text", "html", "json"],
    },

    // Builds write into temp directories; forks keep process.env and cwd isolated
    pool: "forks",

    testTimeout: 30000,
  },
});
