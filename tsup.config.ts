import { defineConfig } from "tsup";

export default defineConfig([
  // Public library (pipeline steps and clients)
  {
    entry: {
      index: "src/index.ts",
    },
    format: ["esm"],
    dts: true,
    sourcemap: true,
    clean: true,
    platform: "node",
    target: "node20",
    external: ["effect", /^@effect\//, /^@aws-sdk\//],
  },
  // CLI
  {
    entry: {
      "cli/index": "src/cli/index.ts",
    },
    format: ["esm"],
    dts: false,
    sourcemap: true,
    platform: "node",
    target: "node20",
    external: [
      "effect",
      /^@effect\//,
      /^@aws-sdk\//,
      "archiver",
      "glob",
    ],
  },
]);
