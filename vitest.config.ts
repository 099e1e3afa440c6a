import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    server: {
      deps: {
        // clipanion 3 ships ESM with directory imports Node cannot resolve
        inline: ["clipanion"],
      },
    },
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: [
        "src/index.ts",
        "src/cli/banner.ts",
        "src/cli/program.ts",
        "src/cli/commands/run.ts",
        "src/cli/commands/cycle.ts",
        "src/gateway/lifecycle.ts",
        "src/config/types.ts",
      ],
      thresholds: {
        statements: 70,
        branches: 70,
        functions: 70,
        lines: 70,
      },
    },
  },
});
