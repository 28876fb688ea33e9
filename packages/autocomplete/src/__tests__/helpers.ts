import type { SettingsToggle } from "../constants.js";
import type { AutocompleteSettings, ResourceLoader } from "../sources.js";

export interface MemorySettings extends AutocompleteSettings {
  toggles: Record<SettingsToggle, boolean>;
  domains: string[];
  writes: number;
}

/** In-memory settings with both sources enabled by default. */
export function memorySettings(
  domains: string[] = [],
  toggles: Partial<Record<SettingsToggle, boolean>> = {},
): MemorySettings {
  const settings: MemorySettings = {
    toggles: {
      enableDomainAutocomplete: true,
      enableCustomDomainAutocomplete: true,
      ...toggles,
    },
    domains: [...domains],
    writes: 0,
    getToggle: (flag) => settings.toggles[flag],
    getCustomDomains: () => [...settings.domains],
    setCustomDomains: (next) => {
      settings.domains = [...next];
      settings.writes++;
    },
  };
  return settings;
}

/** Resource loader serving fixed contents for every name. */
export function staticResources(contents: string): ResourceLoader & {
  loads: string[];
} {
  const loads: string[] = [];
  return {
    loads,
    load: (name) => {
      loads.push(name);
      return { path: `/bundle/${name}.txt`, contents };
    },
  };
}
