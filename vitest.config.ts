import path from "node:path";
import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/tests/**/*.test.ts", "services/*/tests/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "@concrete-screen/core": path.resolve(rootDir, "packages/screen-core/src/index.ts"),
      "@concrete-screen/regulations": path.resolve(rootDir, "packages/regulations/src/index.ts"),
      "@concrete-screen/compliance": path.resolve(rootDir, "packages/compliance/src/index.ts"),
    },
  },
});
