import pc from "picocolors";
import { SETTINGS_TOGGLES, type SettingsToggle } from "@urlbar/autocomplete";

const TOGGLE_LABELS: Record<SettingsToggle, string> = {
  enableDomainAutocomplete: "Top domains",
  enableCustomDomainAutocomplete: "Custom domains",
};

/** Show the typed text in bold followed by the rest of the completion. */
export function printCompletion(text: string, completion: string): void {
  const typed = completion.slice(0, text.length);
  const rest = completion.slice(text.length);
  console.log(`  ${pc.bold(typed)}${pc.cyan(rest)}`);
}

export function printDomainList(domains: readonly string[]): void {
  if (domains.length === 0) {
    console.log(pc.gray("  No custom domains"));
    return;
  }
  const width = String(domains.length - 1).length;
  domains.forEach((domain, index) => {
    console.log(`  ${pc.gray(String(index).padStart(width))}  ${domain}`);
  });
}

export function printToggles(toggles: Record<SettingsToggle, boolean>): void {
  for (const flag of SETTINGS_TOGGLES) {
    const state = toggles[flag] ? pc.green("on") : pc.red("off");
    console.log(`  ${pc.gray(TOGGLE_LABELS[flag].padEnd(16))}${state}`);
  }
}

export function printSuccess(message: string): void {
  console.log(`  ${pc.green("✓")} ${message}`);
}

export function printError(message: string): void {
  console.log(`  ${pc.red("Error:")} ${message}`);
}
