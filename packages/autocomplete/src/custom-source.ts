import { AUTOCOMPLETE } from "./constants.js";
import { isSameDomain, sanitizeDomain } from "./domain.js";
import type {
  AutocompleteSettings,
  AutocompleteSuggestions,
  CustomAutocompleteSource,
  CustomCompletionResult,
} from "./sources.js";

function isValidIndex(index: number, length: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < length;
}

/**
 * User-managed domain list. Every call reads the list from settings and
 * every successful mutation writes it back; nothing is cached here.
 *
 * Entries are stored exactly as typed (`https://Example.com/`), while
 * validation and duplicate checks use the sanitized form (`example.com`).
 */
export class CustomCompletionSource implements CustomAutocompleteSource {
  constructor(private readonly settings: AutocompleteSettings) {}

  get enabled(): boolean {
    return this.settings.getToggle(AUTOCOMPLETE.CUSTOM_DOMAINS_TOGGLE);
  }

  getSuggestions(): AutocompleteSuggestions {
    return this.settings.getCustomDomains();
  }

  /**
   * Append `suggestion`, or insert it at `atIndex` when given.
   * `atIndex` may equal the list length (append).
   */
  add(suggestion: string, atIndex?: number): CustomCompletionResult {
    const sanitized = sanitizeDomain(suggestion);
    if (!sanitized.ok) return { ok: false, error: "invalidUrl" };

    const domains = [...this.getSuggestions()];
    if (domains.some((domain) => isSameDomain(domain, sanitized.domain))) {
      return { ok: false, error: "duplicateDomain" };
    }

    if (atIndex === undefined) {
      domains.push(suggestion);
    } else {
      if (!isValidIndex(atIndex, domains.length + 1)) {
        return { ok: false, error: "indexOutOfRange" };
      }
      domains.splice(atIndex, 0, suggestion);
    }

    this.settings.setCustomDomains(domains);
    return { ok: true };
  }

  remove(index: number): CustomCompletionResult {
    const domains = [...this.getSuggestions()];
    if (!isValidIndex(index, domains.length)) {
      return { ok: false, error: "indexOutOfRange" };
    }

    domains.splice(index, 1);
    this.settings.setCustomDomains(domains);
    return { ok: true };
  }

  /** Reorder one entry; the stored string is kept as-is. */
  move(from: number, to: number): CustomCompletionResult {
    const domains = [...this.getSuggestions()];
    if (
      !isValidIndex(from, domains.length) ||
      !isValidIndex(to, domains.length)
    ) {
      return { ok: false, error: "indexOutOfRange" };
    }

    const [entry] = domains.splice(from, 1);
    domains.splice(to, 0, entry);
    this.settings.setCustomDomains(domains);
    return { ok: true };
  }
}
