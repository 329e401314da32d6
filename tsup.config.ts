import { defineConfig } from "tsup";

export default defineConfig({
  entry: {
    cli: "apps/cli/src/main.ts",
  },
  format: ["esm"],
  outDir: "dist",
  target: "node20",
  sourcemap: true,
  splitting: false,
  platform: "node",
  clean: true,
  banner: {
    js: "#!/usr/bin/env node",
  },
  outExtension() {
    return { js: ".mjs" };
  },
});
