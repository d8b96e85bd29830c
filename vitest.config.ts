import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const src = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@verity/core": src("./packages/core/src/index.ts"),
      "@verity/data": src("./packages/data/src/index.ts"),
      "@verity/model": src("./packages/model/src/index.ts"),
      "@verity/effect-runtime": src("./packages/effect-runtime/src/index.ts"),
      "@verity/cli": src("./apps/cli/src/index.ts"),
    },
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    environment: "node",
  },
});
