import {
  CustomCompletionSource,
  DomainCompletion,
  TopDomainsCompletionSource,
  type AutocompleteSettings,
  type AutocompleteSource,
  type ResourceLoader,
} from "@urlbar/autocomplete";
import { DEFAULT_SOURCE_ORDER, type SourceName } from "./config.js";

export interface DomainCompletionOptions {
  settings: AutocompleteSettings;
  resources: ResourceLoader;
  /** Priority order (default: custom, topDomains). */
  sources?: readonly SourceName[];
}

export interface DomainCompletionSetup {
  completion: DomainCompletion;
  custom: CustomCompletionSource;
  topDomains: TopDomainsCompletionSource;
}

/**
 * Build both suggestion sources over shared settings and a coordinator that
 * consults them in the requested order.
 */
export function createDomainCompletion(
  options: DomainCompletionOptions,
): DomainCompletionSetup {
  const custom = new CustomCompletionSource(options.settings);
  const topDomains = new TopDomainsCompletionSource(
    options.settings,
    options.resources,
  );

  const byName: Record<SourceName, AutocompleteSource> = {
    custom,
    topDomains,
  };
  const order = options.sources ?? DEFAULT_SOURCE_ORDER;
  const completion = new DomainCompletion(order.map((name) => byName[name]));

  return { completion, custom, topDomains };
}
