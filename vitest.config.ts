import { fileURLToPath } from "url";
import { defineConfig } from "vitest/config";

const source = (pkg: string, entry = "index") =>
  fileURLToPath(new URL(`./packages/${pkg}/src/${entry}.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    // Workspace packages resolve to dist/ at run time; tests load their sources.
    alias: {
      "@bookpress/core": source("core"),
      "@bookpress/builder": source("builder"),
      "@bookpress/dev-server": source("dev-server"),
      "@bookpress/cli": source("cli", "program"),
    },
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts"],
    testTimeout: 15000,
  },
});
