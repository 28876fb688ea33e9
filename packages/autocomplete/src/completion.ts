import { completionForDomain } from "./matcher.js";
import type { AutocompleteSource } from "./sources.js";

/**
 * Inline completion over several sources. Sources are consulted in the
 * order given; the first domain that matches wins.
 */
export class DomainCompletion {
  constructor(private readonly completionSources: AutocompleteSource[]) {}

  get sources(): readonly AutocompleteSource[] {
    return this.completionSources;
  }

  /** Completion for the typed text, or `null` when nothing matches. */
  complete(text: string): string | null {
    if (!text) return null;

    for (const domain of this.enabledDomains()) {
      const completion = completionForDomain(domain, text);
      if (completion !== null) return completion;
    }

    return null;
  }

  // Lazy so a hit skips the remaining sources entirely.
  private *enabledDomains(): Generator<string> {
    for (const source of this.completionSources) {
      if (!source.enabled) continue;
      yield* source.getSuggestions();
    }
  }
}
