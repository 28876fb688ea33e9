import { cpSync } from "node:fs";
import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm"],
  target: "node20",
  platform: "node",
  clean: true,
  sourcemap: true,
  // Bundle workspace packages into the output so the published package
  // is self-contained with no workspace dependencies.
  noExternal: ["@urlbar/autocomplete", "@urlbar/core"],
  // The bundled resource loader looks for ../resources beside dist/.
  onSuccess: async () => {
    cpSync("../../packages/core/resources", "resources", { recursive: true });
  },
});
