import { defineConfig } from "vitest/config";
import * as path from "path";
import { fileURLToPath } from "url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@filemeta/core": path.resolve(__dirname, "packages/core/src/index.ts"),
    },
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    exclude: ["node_modules", "**/dist/**"],
    pool: "forks",
    fileParallelism: false,
    env: {
      LANGUAGE: "",
      LC_ALL: "",
      LC_MESSAGES: "",
      LANG: "C",
    },
  },
});
