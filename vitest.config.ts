import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@pagesmith/pipeline": fileURLToPath(new URL("./apps/pipeline/src/index.ts", import.meta.url)),
    },
  },
  test: {
    include: ["apps/*/test/**/*.test.ts"],
    environment: "node",
  },
});
