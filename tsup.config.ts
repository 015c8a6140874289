import { defineConfig } from "tsup";

// scripts/index.ts carries its own shebang, which esbuild keeps on the entry chunk
export default defineConfig({
  entry: ["scripts/index.ts"],
  format: ["esm"],
  target: "node20",
  outDir: "dist",
  clean: true,
  splitting: true,
  sourcemap: true,
  dts: false,
});
