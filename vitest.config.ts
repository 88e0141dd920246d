import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: [
      // shared package tests
      "tests/unit/**/*.test.ts",
      // package-local tests
      "packages/*/tests/**/*.test.ts",
    ],
    environment: "node",
    reporters: ["default"],
    testTimeout: 30000,
    hookTimeout: 30000,
    coverage: {
      provider: "v8",
      reportsDirectory: "coverage",
      reporter: ["text", "json", "html"],
      exclude: [
        "node_modules/**",
        "dist/**",
        "**/*.d.ts",
        "**/tests/**",
        "packages/client/src/cli/**",
      ],
    },
  },
});
