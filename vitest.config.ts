import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: [
        "src/**/*.test.ts",
        "src/test-fixtures/**",
        "src/index.ts",
        "src/parsers/types.ts",
        "src/search/types.ts",
      ],
      reporter: ["text", "lcov", "json"],
      thresholds: {
        // v8 counts optional chaining/nullish coalescing as branches
        branches: 75,
        functions: 90,
        lines: 90,
        statements: 90,
      },
    },
  },
});
