import { AUTOCOMPLETE } from "./constants.js";

/**
 * Strip leading whitespace, an `http://` or `https://` scheme and a `www.`
 * prefix from the start of a raw domain string. Case-insensitive.
 */
export function stripDomainPrefix(raw: string): string {
  return raw.replace(AUTOCOMPLETE.SANITIZE_PREFIX_PATTERN, "");
}

/** Drop a single trailing slash. */
export function stripTrailingSlash(domain: string): string {
  return domain.endsWith("/") ? domain.slice(0, -1) : domain;
}

/**
 * Validate a user-entered domain and return the form used for duplicate
 * checks: `HTTPS://www.Example.com/` → `Example.com`.
 */
export function sanitizeDomain(
  raw: string,
): { ok: true; domain: string } | { ok: false; reason: "empty" | "no-dot" } {
  const stripped = stripDomainPrefix(raw);
  if (!stripped) return { ok: false, reason: "empty" };
  if (!stripped.includes(".")) return { ok: false, reason: "no-dot" };
  return { ok: true, domain: stripTrailingSlash(stripped) };
}

/** Case-insensitive whole-string comparison of two sanitized domains. */
export function isSameDomain(a: string, b: string): boolean {
  return (
    stripTrailingSlash(stripDomainPrefix(a)).toLowerCase() ===
    stripTrailingSlash(stripDomainPrefix(b)).toLowerCase()
  );
}
