import { defineConfig } from "tsup";

export default defineConfig({
  entry: { barctl: "src/index.ts" },
  format: ["esm"],
  platform: "node",
  target: "node20",
  clean: true,
  sourcemap: true,
  noExternal: ["@barctl/core"],
  banner: { js: "#!/usr/bin/env node" },
});
