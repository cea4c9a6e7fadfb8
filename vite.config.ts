import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

export default defineConfig({
  root: ".",
  build: {
    outDir: "dist",
    emptyOutDir: true,
    lib: {
      entry: fileURLToPath(new URL("./src/engine/index.ts", import.meta.url)),
      formats: ["es"],
      fileName: "minefield",
    },
  },
  test: {
    include: ["tests/**/*.test.ts"],
  },
});
