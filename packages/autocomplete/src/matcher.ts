import { AUTOCOMPLETE } from "./constants.js";

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Completion for `text` against a single domain, or `null`.
 *
 * The domain is searched as `.www.<domain>` for `.<text>`, so one lookup
 * covers typing from the start of the domain, after `www.`, or from any
 * later label: `goo` and `www.goo` both complete `google.com` to
 * `google.com/` and `www.google.com/`, `mail` completes `mail.google.com`.
 *
 * A match that leaves only the top-level domain (`com`) is rejected.
 * `text` must be non-empty.
 */
export function completionForDomain(
  domain: string,
  text: string,
): string | null {
  const candidate = `${AUTOCOMPLETE.MATCH_PREFIX}${domain}`;
  const match = new RegExp(escapeRegExp(`.${text}`), "i").exec(candidate);
  if (!match) return null;

  const matchedDomain = candidate.slice(match.index + 1);
  if (!matchedDomain.includes(".")) return null;
  if (matchedDomain.includes("/")) return matchedDomain;
  return `${matchedDomain}${AUTOCOMPLETE.COMPLETION_SUFFIX}`;
}
