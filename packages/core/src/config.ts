import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { createJiti } from "jiti";

export type SourceName = "custom" | "topDomains";

export const SOURCE_NAMES: readonly SourceName[] = ["custom", "topDomains"];

/** Priority order used when the config does not set `sources`. */
export const DEFAULT_SOURCE_ORDER: readonly SourceName[] = [
  "custom",
  "topDomains",
];

/**
 * Root configuration for urlbar.config.ts.
 */
export interface UrlbarConfig {
  /** Directory holding settings.json (default: ~/.config/urlbar). */
  settingsDir?: string;
  /** Newline-delimited file replacing the bundled top domains list. */
  topDomainsFile?: string;
  /** Suggestion sources in priority order (default: custom, topDomains). */
  sources?: SourceName[];
}

/**
 * Helper for type-safe config files.
 *
 * @example
 * ```ts
 * // urlbar.config.ts
 * import { defineConfig } from "@urlbar/core";
 *
 * export default defineConfig({
 *   sources: ["topDomains", "custom"],
 * });
 * ```
 */
export function defineConfig(config: UrlbarConfig): UrlbarConfig {
  return config;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isSourceName(value: unknown): value is SourceName {
  return SOURCE_NAMES.some((name) => name === value);
}

function validateConfig(value: unknown, name: string): UrlbarConfig {
  if (!isRecord(value)) {
    throw new Error(`Invalid config in ${name}: expected an object`);
  }

  const config: UrlbarConfig = {};
  const { settingsDir, topDomainsFile, sources } = value;

  if (settingsDir !== undefined) {
    if (typeof settingsDir !== "string" || !settingsDir) {
      throw new Error(
        `Invalid config in ${name}: "settingsDir" must be a non-empty string`,
      );
    }
    config.settingsDir = settingsDir;
  }

  if (topDomainsFile !== undefined) {
    if (typeof topDomainsFile !== "string" || !topDomainsFile) {
      throw new Error(
        `Invalid config in ${name}: "topDomainsFile" must be a non-empty string`,
      );
    }
    config.topDomainsFile = topDomainsFile;
  }

  if (sources !== undefined) {
    if (
      !Array.isArray(sources) ||
      sources.length === 0 ||
      !sources.every(isSourceName)
    ) {
      throw new Error(
        `Invalid config in ${name}: "sources" must be a non-empty array of ${SOURCE_NAMES.join(", ")}`,
      );
    }
    config.sources = sources;
  }

  return config;
}

const CONFIG_FILE_NAMES = ["urlbar.config.ts", "urlbar.config.js"];

// Transpiles .ts configs on the fly; plain import() cannot load them.
const jiti = createJiti(import.meta.url);

/**
 * Load a urlbar config file from the given directory.
 *
 * Looks for `urlbar.config.ts` then `urlbar.config.js`.
 * Returns `null` if no config file is found. Relative paths in the config
 * are resolved against `cwd`.
 */
export async function loadConfig(cwd: string): Promise<UrlbarConfig | null> {
  for (const name of CONFIG_FILE_NAMES) {
    const configPath = resolve(cwd, name);
    if (!existsSync(configPath)) continue;

    let loaded: unknown;
    try {
      loaded = await jiti.import(configPath, { default: true });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(`Failed to load ${name}: ${message}`, { cause: err });
    }

    const config = validateConfig(loaded, name);
    if (config.settingsDir) {
      config.settingsDir = resolve(cwd, config.settingsDir);
    }
    if (config.topDomainsFile) {
      config.topDomainsFile = resolve(cwd, config.topDomainsFile);
    }
    return config;
  }

  return null;
}
