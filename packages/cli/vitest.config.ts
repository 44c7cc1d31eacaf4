import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

function source(pkg: string): string {
  return fileURLToPath(new URL(`../${pkg}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      "@bookshelf/sdk": source("sdk"),
      "@bookshelf/testkit": source("testkit"),
    },
  },
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    testTimeout: 20000,
  },
});
