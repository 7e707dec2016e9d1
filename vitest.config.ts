import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const pkg = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    environment: "node",
    testTimeout: 10000,
    include: ["packages/*/src/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "@kennelcast/types": pkg("types"),
      "@kennelcast/telemetry": pkg("telemetry"),
      "@kennelcast/config": pkg("config"),
      "@kennelcast/utils": pkg("utils"),
      "@kennelcast/api-client": pkg("api-client"),
    },
  },
});
