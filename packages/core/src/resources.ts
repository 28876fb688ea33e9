import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import type { LoadedResource, ResourceLoader } from "@urlbar/autocomplete";

const BUNDLED_RESOURCES_URL = new URL("../resources/", import.meta.url);

function readResource(name: string, path: string): LoadedResource {
  try {
    return { path, contents: readFileSync(path, "utf-8") };
  } catch (err) {
    throw new Error(`Missing bundled resource: ${name}`, { cause: err });
  }
}

/** Text resources shipped in this package's `resources/` directory. */
export const bundledResources: ResourceLoader = {
  load(name) {
    const path = fileURLToPath(new URL(`${name}.txt`, BUNDLED_RESOURCES_URL));
    return readResource(name, path);
  },
};

/** A loader that serves every resource name from one file. */
export function fileResource(path: string): ResourceLoader {
  return {
    load: (name) => readResource(name, path),
  };
}
