import * as path from "path";

import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@session-tokens/core": path.resolve(
        __dirname,
        "packages/core/src/index.ts",
      ),
    },
  },
  test: {
    globals: true,
    environment: "node",
    include: ["packages/*/src/**/__tests__/**/*.test.ts"],
    coverage: {
      provider: "v8",
      include: ["packages/*/src/**/*.ts"],
      exclude: ["packages/*/src/**/__tests__/**"],
    },
  },
});
