import { defineConfig } from "vitest/config";
import { fileURLToPath } from "url";

const source = (file: string) =>
  fileURLToPath(new URL(`./src/${file}`, import.meta.url));

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts", "test/**/*.test.ts"],
    setupFiles: ["./test/matchers.ts"],
  },
  resolve: {
    alias: [
      { find: /^#ir$/, replacement: source("ir/index.ts") },
      { find: /^#ir\/spec$/, replacement: source("ir/spec/index.ts") },
      { find: /^#parser$/, replacement: source("parser/index.ts") },
      { find: /^#layouts$/, replacement: source("layouts/index.ts") },
      { find: /^#optimizer$/, replacement: source("optimizer/index.ts") },
      { find: /^#compiler$/, replacement: source("compiler/index.ts") },
      { find: /^#result$/, replacement: source("result.ts") },
      { find: /^#errors$/, replacement: source("errors.ts") },
    ],
  },
});
