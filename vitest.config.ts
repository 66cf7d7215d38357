import { defineConfig } from "vitest/config";
import { fileURLToPath } from "url";

export default defineConfig({
  test: {
    include: ["packages/*/src/__tests__/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "@wallshade/core": fileURLToPath(new URL("./packages/core/src/index.ts", import.meta.url)),
    },
  },
});
