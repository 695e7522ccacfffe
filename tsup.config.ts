import { defineConfig } from "tsup";

export default defineConfig({
  entry: { cli: "src/cli/index.ts" },
  format: ["esm"],
  clean: true,
  sourcemap: true,
  target: "node20",
  outDir: "dist",
});
