import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

export default defineConfig({
  resolve: {
    alias: {
      // Resolve workspace packages to their sources
      "@postwatch/shared": fileURLToPath(
        new URL("./packages/shared/src/index.ts", import.meta.url),
      ),
      "@postwatch/worker": fileURLToPath(
        new URL("./packages/worker/src/index.ts", import.meta.url),
      ),
    },
  },
  test: {
    include: ["packages/*/src/**/__tests__/**/*.test.ts"],
    environment: "node",
  },
});
