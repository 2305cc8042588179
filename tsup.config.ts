import { defineConfig } from "tsup";

export default defineConfig([
  {
    entry: ["src/index.ts"],
    format: ["esm", "cjs"],
    dts: true,
    splitting: false,
    sourcemap: true,
    clean: true,
    outDir: "dist",
    external: ["tr46"],
    target: "node20",
  },
  {
    entry: ["src/cli/index.ts"],
    format: ["cjs"],
    outDir: "dist/cli",
    banner: { js: "#!/usr/bin/env node" },
    external: ["commander", "tr46"],
    target: "node20",
  },
]);
