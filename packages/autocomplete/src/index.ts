export {
  AUTOCOMPLETE,
  SETTINGS_TOGGLES,
  type SettingsToggle,
} from "./constants.js";
export {
  completionErrorMessage,
  DEFAULT_STRINGS,
  type CompletionSourceError,
  type LocalizedStrings,
} from "./errors.js";
export {
  isSameDomain,
  sanitizeDomain,
  stripDomainPrefix,
  stripTrailingSlash,
} from "./domain.js";
export type {
  AutocompleteSettings,
  AutocompleteSource,
  AutocompleteSuggestions,
  CustomAutocompleteSource,
  CustomCompletionResult,
  LoadedResource,
  ResourceLoader,
} from "./sources.js";
export { CustomCompletionSource } from "./custom-source.js";
export { TopDomainsCompletionSource, parseDomainList } from "./top-domains.js";
export { completionForDomain } from "./matcher.js";
export { DomainCompletion } from "./completion.js";
