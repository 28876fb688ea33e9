export const AUTOCOMPLETE = {
  /** Name of the bundled newline-delimited top domains list */
  TOP_DOMAINS_RESOURCE: "topdomains",

  /** Prefix prepended to a domain before searching for the typed text */
  MATCH_PREFIX: ".www.",
  /** Appended to completions that carry no path of their own */
  COMPLETION_SUFFIX: "/",

  /** Strips leading whitespace, an http(s) scheme and `www.` */
  SANITIZE_PREFIX_PATTERN: /^(\s+)?(?:https?:\/\/)?(?:www\.)?/i,

  /** Settings toggle gating the top domains source */
  TOP_DOMAINS_TOGGLE: "enableDomainAutocomplete",
  /** Settings toggle gating the custom domains source */
  CUSTOM_DOMAINS_TOGGLE: "enableCustomDomainAutocomplete",
} as const;

export type SettingsToggle =
  | typeof AUTOCOMPLETE.TOP_DOMAINS_TOGGLE
  | typeof AUTOCOMPLETE.CUSTOM_DOMAINS_TOGGLE;

export const SETTINGS_TOGGLES: readonly SettingsToggle[] = [
  AUTOCOMPLETE.TOP_DOMAINS_TOGGLE,
  AUTOCOMPLETE.CUSTOM_DOMAINS_TOGGLE,
];
