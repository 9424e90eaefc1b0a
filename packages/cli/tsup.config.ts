import { defineConfig } from "tsup";

export default defineConfig({
  entry: {
    bin: "src/bin.ts",
  },
  format: ["esm"],
  sourcemap: true,
  clean: true,
  // The core package exports TypeScript sources, so it is bundled in
  noExternal: ["@lineio/core"],
  external: ["cosmiconfig"],
});
