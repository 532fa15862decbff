import fs from "node:fs";
import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm"],
  dts: false,
  target: "es2022",
  platform: "node",
  clean: true,
  shims: true,
  sourcemap: true,
  noExternal: [/^@sastweave\//],
  external: ["chalk", "openai", "yaml", "zod"],
  // the verifier looks for its templates in ./prompts beside the bundle
  async onSuccess() {
    await fs.promises.cp("../verify/prompts", "dist/prompts", { recursive: true });
  },
});
