import { defineConfig } from "vitest/config";
import { resolve } from "node:path";

const domainEntry = resolve(__dirname, "../packages/domain/src/index.ts");

export default defineConfig({
  resolve: {
    preserveSymlinks: true,
    alias: {
      "@dayahead/domain": domainEntry,
    },
  },
  test: {
    pool: "forks",
    include: ["test/**/*.spec.ts"],
  },
});
