import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const resolveSource = (relativePath: string): string =>
  fileURLToPath(new URL(relativePath, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@deckname/core": resolveSource("./packages/core/src/index.ts"),
      "@deckname/naming": resolveSource("./packages/naming/src/index.ts"),
      "@deckname/renamer": resolveSource("./packages/renamer/src/index.ts")
    }
  },
  test: {
    include: ["packages/**/__tests__/**/*.test.ts", "apps/**/__tests__/**/*.test.ts"]
  }
});
