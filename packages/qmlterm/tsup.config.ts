import { defineConfig } from "tsup";

export default defineConfig([
  {
    entry: ["src/cli.ts"],
    format: ["esm"],
    platform: "node",
    sourcemap: true,
    target: "node20",
    banner: {
      js: "#!/usr/bin/env node",
    },
    // qmlterm-core publishes TypeScript sources only.
    noExternal: ["qmlterm-core"],
    outDir: "dist",
  },
  {
    entry: ["src/index.ts"],
    format: ["esm"],
    platform: "node",
    sourcemap: true,
    target: "node20",
    noExternal: ["qmlterm-core"],
    outDir: "dist",
  },
]);
