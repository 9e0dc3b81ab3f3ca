import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const root = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@statusboard/shared/middleware": root("./packages/shared/src/middleware/index.ts"),
      "@statusboard/shared/utils": root("./packages/shared/src/utils/index.ts"),
      "@statusboard/shared": root("./packages/shared/src/index.ts"),
    },
  },
  test: {
    globals: true,
    environment: "node",
    include: ["packages/**/src/**/*.test.ts", "scripts/src/**/*.test.ts", "tests/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    coverage: {
      provider: "v8",
      reporter: ["text", "html", "lcov"],
      include: ["packages/*/src/**/*.ts"],
      exclude: [
        "**/node_modules/**",
        "**/dist/**",
        "**/*.test.ts",
        "**/index.ts",
        "**/types.ts",
      ],
    },
    testTimeout: 15000,
    hookTimeout: 10000,
    pool: "forks",
    fileParallelism: true,
  },
});
