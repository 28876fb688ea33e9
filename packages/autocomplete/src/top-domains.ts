import { AUTOCOMPLETE } from "./constants.js";
import type {
  AutocompleteSettings,
  AutocompleteSuggestions,
  AutocompleteSource,
  ResourceLoader,
} from "./sources.js";

/** Split a newline-delimited list, ignoring blank lines and CRLF endings. */
export function parseDomainList(contents: string): string[] {
  return contents
    .split("\n")
    .map((line) => line.replace(/\r$/, ""))
    .filter((line) => line.length > 0);
}

/**
 * Well-known domains read from a bundled resource on first use.
 * A missing resource throws from the loader and is not caught here.
 */
export class TopDomainsCompletionSource implements AutocompleteSource {
  private topDomains: readonly string[] | undefined;

  constructor(
    private readonly settings: AutocompleteSettings,
    private readonly resources: ResourceLoader,
    private readonly resourceName: string = AUTOCOMPLETE.TOP_DOMAINS_RESOURCE,
  ) {}

  get enabled(): boolean {
    return this.settings.getToggle(AUTOCOMPLETE.TOP_DOMAINS_TOGGLE);
  }

  getSuggestions(): AutocompleteSuggestions {
    if (this.topDomains === undefined) {
      const { contents } = this.resources.load(this.resourceName);
      this.topDomains = Object.freeze(parseDomainList(contents));
    }
    return this.topDomains;
  }
}
