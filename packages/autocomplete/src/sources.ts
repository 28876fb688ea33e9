import type { SettingsToggle } from "./constants.js";
import type { CompletionSourceError } from "./errors.js";

export type AutocompleteSuggestions = readonly string[];

/**
 * A provider of domains taking part in autocomplete. `enabled` is read
 * again on every completion, so settings changes apply immediately.
 */
export interface AutocompleteSource {
  readonly enabled: boolean;
  getSuggestions(): AutocompleteSuggestions;
}

export type CustomCompletionResult =
  | { ok: true }
  | { ok: false; error: CompletionSourceError };

/** A source whose list the user edits. */
export interface CustomAutocompleteSource extends AutocompleteSource {
  add(suggestion: string, atIndex?: number): CustomCompletionResult;
  remove(index: number): CustomCompletionResult;
  move(from: number, to: number): CustomCompletionResult;
}

/** Persistent settings the sources read and write through. */
export interface AutocompleteSettings {
  getToggle(flag: SettingsToggle): boolean;
  getCustomDomains(): string[];
  setCustomDomains(domains: string[]): void;
}

export interface LoadedResource {
  path: string;
  contents: string;
}

/**
 * Resolves a named bundled text resource.
 * Throws when the resource is missing.
 */
export interface ResourceLoader {
  load(name: string): LoadedResource;
}
