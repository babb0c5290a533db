import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    globals: false,
    testTimeout: 30000,
    // Workspace packages resolve to their sources so tests need no build first
    alias: {
      "@sssg/shared": fileURLToPath(new URL("./packages/shared/src/index.ts", import.meta.url)),
      "@sssg/ssg": fileURLToPath(new URL("./packages/ssg/src/index.ts", import.meta.url)),
    },
  },
});
