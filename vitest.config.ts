import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const src = fileURLToPath(new URL("./src/", import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^callpair$/, replacement: `${src}index.ts` },
      { find: /^callpair\/(.*)$/, replacement: `${src}$1` },
    ],
  },
  test: {
    include: ["src/**/*.test.ts", "packages/*/src/**/*.test.ts"],
    environment: "node",
    testTimeout: 10_000,
  },
});
