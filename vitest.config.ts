import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@": root,
    },
  },
  // tsconfig keeps JSX for Next.js; tests importing pages need it compiled.
  esbuild: {
    jsx: "automatic",
  },
  test: {
    environment: "node",
    include: ["__tests__/**/*.test.ts"],
  },
});
