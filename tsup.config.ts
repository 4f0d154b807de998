import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/cli.ts", "src/index.ts"],
  format: ["esm"],
  target: "node20",
  platform: "node",
  outDir: "dist/bundle",
  splitting: false,
  sourcemap: true,
  clean: true,
  dts: false,
});
