import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["cjs", "esm"],
  dts: true,
  sourcemap: true,
  clean: true,
  target: "node20",
  esbuildOptions(options) {
    options.alias = {
      "@": "./src",
    };
  },
});
