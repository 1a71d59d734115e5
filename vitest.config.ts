import { defineConfig } from "vitest/config";
import { fileURLToPath } from "url";

const isCI = process.env.CI === "1" || process.env.CI === "true";

const resolveLocal = (p: string) => fileURLToPath(new URL(p, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "mapview-engine": resolveLocal("./engine/src/index.ts"),
      "mapview-ingestion": resolveLocal("./ingestion/src/index.ts"),
    },
  },
  test: {
    environment: "node",
    include: ["engine/tests/**/*.test.ts", "ingestion/tests/**/*.test.ts", "tests/**/*.test.ts"],
    pool: isCI ? "forks" : "threads",
    watch: false,
    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: isCI ? 30000 : 10000,
  },
});
