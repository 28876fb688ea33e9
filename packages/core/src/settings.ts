import { readFileSync, writeFileSync, mkdirSync, rmSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";
import {
  SETTINGS_TOGGLES,
  type AutocompleteSettings,
  type SettingsToggle,
} from "@urlbar/autocomplete";

const SETTINGS_FILE_NAME = "settings.json";

export interface SettingsData {
  toggles: Record<SettingsToggle, boolean>;
  customDomains: string[];
}

export interface FileSettings extends AutocompleteSettings {
  /** Absolute path of the backing JSON file. */
  readonly path: string;
  setToggle(flag: SettingsToggle, value: boolean): void;
  getToggles(): Record<SettingsToggle, boolean>;
  /** Delete the settings file, restoring defaults. */
  reset(): void;
}

export interface FileSettingsOptions {
  /** Directory holding settings.json (default: ~/.config/urlbar). */
  dir?: string;
}

export function defaultSettingsDir(): string {
  return join(homedir(), ".config", "urlbar");
}

function defaultSettings(): SettingsData {
  return {
    toggles: {
      enableDomainAutocomplete: true,
      enableCustomDomainAutocomplete: true,
    },
    customDomains: [],
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read settings from disk. A missing or corrupt file, or any field of the
 * wrong type, reads as the default for that field.
 */
function readSettings(path: string): SettingsData {
  const settings = defaultSettings();

  let data: string;
  try {
    data = readFileSync(path, "utf-8");
  } catch {
    return settings; // file doesn't exist
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch {
    return settings; // corrupt file
  }

  if (!isRecord(parsed)) return settings;

  const { toggles, customDomains } = parsed;
  if (isRecord(toggles)) {
    for (const flag of SETTINGS_TOGGLES) {
      const value = toggles[flag];
      if (typeof value === "boolean") settings.toggles[flag] = value;
    }
  }

  if (Array.isArray(customDomains)) {
    settings.customDomains = customDomains.filter(
      (domain): domain is string => typeof domain === "string",
    );
  }

  return settings;
}

/**
 * Settings backed by a JSON file. Every read goes to disk, every write
 * rewrites the whole file.
 */
export function createFileSettings(
  options: FileSettingsOptions = {},
): FileSettings {
  const dir = options.dir ?? defaultSettingsDir();
  const path = join(dir, SETTINGS_FILE_NAME);

  function write(settings: SettingsData): void {
    mkdirSync(dir, { recursive: true });
    writeFileSync(path, JSON.stringify(settings, null, 2), "utf-8");
  }

  return {
    path,

    getToggle(flag) {
      return readSettings(path).toggles[flag];
    },

    getToggles() {
      return readSettings(path).toggles;
    },

    setToggle(flag, value) {
      const settings = readSettings(path);
      settings.toggles[flag] = value;
      write(settings);
    },

    getCustomDomains() {
      return readSettings(path).customDomains;
    },

    setCustomDomains(domains) {
      const settings = readSettings(path);
      settings.customDomains = [...domains];
      write(settings);
    },

    reset() {
      rmSync(path, { force: true });
    },
  };
}
