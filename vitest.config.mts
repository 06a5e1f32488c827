import { defineConfig } from "vitest/config";
import tsconfigPaths from "vite-tsconfig-paths";

export default defineConfig({
  plugins: [tsconfigPaths({ projects: ["tsconfig.json"] })],
  test: {
    environment: "node",
    coverage: {
      provider: "v8",
      reporter: ["text"],
      reportOnFailure: true,
      include: [
        "packages/shared/src/**/*.ts",
        "cli/**/*.ts",
      ],
      exclude: [
        "**/node_modules/**",
        "**/*.test.ts",
        "**/tests/**",
        "**/types.ts",
        "packages/**/index.ts", // Re-export files in packages
        "cli/main.ts",
      ],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80,
      },
    },
    include: [
      "packages/shared/tests/**/*.test.ts",
      "cli/tests/**/*.test.ts",
      "web/src/**/*.test.ts",
    ],
  },
});
