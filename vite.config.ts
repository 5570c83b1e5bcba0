import { fileURLToPath } from "node:url";
import { defineConfig } from "vite";

// keep runtime dependencies and node builtins out of the bundle
const externalDeps = ["zod", "events", "node:events"];

export default defineConfig({
  build: {
    lib: {
      entry: fileURLToPath(new URL("./src/index.ts", import.meta.url)),
      name: "AdaptiveFtl",
      formats: ["es", "cjs"],
      fileName: format => (format === "es" ? "index.js" : "index.cjs"),
    },
    rollupOptions: {
      external: externalDeps,
    },
  },
});
