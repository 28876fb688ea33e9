import {
  completionErrorMessage,
  DEFAULT_STRINGS,
  type CompletionSourceError,
  type CustomCompletionResult,
  type LocalizedStrings,
  type SettingsToggle,
} from "@urlbar/autocomplete";
import { resolve } from "node:path";
import {
  bundledResources,
  createDomainCompletion,
  createFileSettings,
  fileResource,
  loadConfig,
  printCompletion,
  printDomainList,
  printError,
  printSuccess,
  printToggles,
  type DomainCompletionSetup,
  type FileSettings,
  type UrlbarConfig,
} from "@urlbar/core";

export interface CliContext extends DomainCompletionSetup {
  settings: FileSettings;
  strings: LocalizedStrings;
}

/** Command-line names for the settings toggles. */
export const TOGGLE_NAMES: Record<string, SettingsToggle> = {
  domains: "enableDomainAutocomplete",
  custom: "enableCustomDomainAutocomplete",
};

export function createContext(config: UrlbarConfig | null): CliContext {
  const settings = createFileSettings({ dir: config?.settingsDir });
  const resources = config?.topDomainsFile
    ? fileResource(config.topDomainsFile)
    : bundledResources;
  const setup = createDomainCompletion({
    settings,
    resources,
    sources: config?.sources,
  });
  return { ...setup, settings, strings: DEFAULT_STRINGS };
}

export interface ConfigArgs {
  /** Path to a config file; citty may report --no-config as `false`. */
  config?: string | boolean;
  noConfig?: boolean;
}

/**
 * Load the config file (unless --no-config), build the context and run
 * `command` with it. An invalid config prints the error and returns 1.
 */
export async function runWithConfig(
  args: ConfigArgs,
  cwd: string,
  command: (ctx: CliContext) => number,
): Promise<number> {
  let fileConfig: UrlbarConfig | null = null;
  if (!args.noConfig && args.config !== false) {
    // When --config is given, resolve its parent directory;
    // otherwise search from the working directory.
    const configDir =
      typeof args.config === "string" && args.config
        ? resolve(cwd, args.config, "..")
        : cwd;
    try {
      fileConfig = await loadConfig(configDir);
    } catch (err) {
      printError(err instanceof Error ? err.message : String(err));
      return 1;
    }
  }

  return command(createContext(fileConfig));
}

function parseIndex(raw: string): number | null {
  if (!/^\d+$/.test(raw.trim())) return null;
  return Number.parseInt(raw, 10);
}

function errorText(
  error: CompletionSourceError,
  strings: LocalizedStrings,
): string {
  switch (error) {
    case "invalidUrl":
      return completionErrorMessage(error, strings);
    case "duplicateDomain":
      return strings.autocompleteAddCustomUrlDuplicate;
    case "indexOutOfRange":
      return strings.autocompleteRemoveIndexError;
  }
}

function report(
  ctx: CliContext,
  result: CustomCompletionResult,
  success: string,
): number {
  if (!result.ok) {
    printError(errorText(result.error, ctx.strings));
    return 1;
  }
  printSuccess(success);
  return 0;
}

export function runComplete(ctx: CliContext, text: string): number {
  const completion = ctx.completion.complete(text);
  if (completion === null) {
    console.log("  No completion");
    return 1;
  }
  printCompletion(text, completion);
  return 0;
}

export function runList(ctx: CliContext): number {
  printDomainList(ctx.custom.getSuggestions());
  return 0;
}

export function runAdd(
  ctx: CliContext,
  domain: string,
  rawIndex?: string,
): number {
  if (rawIndex === undefined) {
    return report(ctx, ctx.custom.add(domain), `Added ${domain}`);
  }

  const index = parseIndex(rawIndex);
  if (index === null) {
    printError(`Invalid index "${rawIndex}". Must be a whole number.`);
    return 1;
  }
  return report(
    ctx,
    ctx.custom.add(domain, index),
    `Added ${domain} at ${index}`,
  );
}

export function runRemove(ctx: CliContext, rawIndex: string): number {
  const index = parseIndex(rawIndex);
  if (index === null) {
    printError(`Invalid index "${rawIndex}". Must be a whole number.`);
    return 1;
  }

  const domain = ctx.custom.getSuggestions()[index];
  return report(ctx, ctx.custom.remove(index), `Removed ${domain}`);
}

export function runMove(
  ctx: CliContext,
  rawFrom: string,
  rawTo: string,
): number {
  const from = parseIndex(rawFrom);
  const to = parseIndex(rawTo);
  if (from === null || to === null) {
    printError("Invalid index. Positions must be whole numbers.");
    return 1;
  }

  const domain = ctx.custom.getSuggestions()[from];
  return report(ctx, ctx.custom.move(from, to), `Moved ${domain} to ${to}`);
}

/** Print both toggles, or set one when `name` and `state` are given. */
export function runToggle(
  ctx: CliContext,
  name?: string,
  state?: string,
): number {
  if (name === undefined) {
    printToggles(ctx.settings.getToggles());
    return 0;
  }

  const flag = Object.hasOwn(TOGGLE_NAMES, name)
    ? TOGGLE_NAMES[name]
    : undefined;
  if (flag === undefined) {
    printError(
      `Unknown toggle "${name}". Use one of: ${Object.keys(TOGGLE_NAMES).join(", ")}.`,
    );
    return 1;
  }

  if (state !== "on" && state !== "off") {
    printError('Toggle state must be "on" or "off".');
    return 1;
  }

  ctx.settings.setToggle(flag, state === "on");
  printToggles(ctx.settings.getToggles());
  return 0;
}
