import { readFileSync } from "node:fs";
import { defineConfig } from "tsup";

const version = JSON.parse(
  readFileSync(new URL("./package.json", import.meta.url), "utf-8")
).version;

export default defineConfig([
  {
    entry: {
      index: "src/index.ts",
    },
    format: ["cjs", "esm"],
    dts: true,
    sourcemap: true,
    clean: true,
    target: "es2022",
    platform: "node",
    define: {
      __PACKAGE_VERSION__: JSON.stringify(version),
    },
  },
]);
