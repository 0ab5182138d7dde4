import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";
import { dirname, resolve } from "node:path";

const root = dirname(fileURLToPath(import.meta.url));
const domainEntry = resolve(root, "packages/domain/src/index.ts");

export default defineConfig({
  resolve: {
    preserveSymlinks: true,
    alias: {
      "@battery-savings/domain": domainEntry,
    },
  },
  test: {
    pool: "forks",
    globals: true,
    include: ["analyzer/test/**/*.spec.ts", "packages/domain/test/**/*.spec.ts"],
  },
});
