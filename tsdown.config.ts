import { defineConfig } from "tsdown";

export default defineConfig({
  entry: {
    index: "src/index.ts",
    bin: "src/bin.ts",
  },
  // package.json "exports" is maintained by hand; bin stays out of it.
  exports: false,
});
