import { readFileSync } from "fs";
import { defineConfig } from "tsup";

const pkg: { version: string } = JSON.parse(readFileSync("package.json", "utf-8"));

export default defineConfig({
  entry: ["src/cli.ts"],
  format: ["esm"],
  target: "node20",
  outDir: "dist",
  clean: true,
  banner: { js: "#!/usr/bin/env node" },
  external: ["better-sqlite3"],
  define: {
    __VERSION__: JSON.stringify(pkg.version),
  },
});
