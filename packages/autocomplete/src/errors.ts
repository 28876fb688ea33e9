export type CompletionSourceError =
  | "invalidUrl"
  | "duplicateDomain"
  | "indexOutOfRange";

export interface LocalizedStrings {
  autocompleteAddCustomUrlError: string;
  autocompleteAddCustomUrlDuplicate: string;
  autocompleteRemoveIndexError: string;
}

export const DEFAULT_STRINGS: LocalizedStrings = {
  autocompleteAddCustomUrlError:
    "Double-check the URL you entered. It should look like example.com.",
  autocompleteAddCustomUrlDuplicate: "This URL is already in your list.",
  autocompleteRemoveIndexError: "There is no URL at that position.",
};

/**
 * User-facing message for a failed custom list mutation.
 * Only `invalidUrl` carries one; other kinds return an empty string.
 */
export function completionErrorMessage(
  error: CompletionSourceError,
  strings: LocalizedStrings = DEFAULT_STRINGS,
): string {
  if (error !== "invalidUrl") return "";
  return strings.autocompleteAddCustomUrlError;
}
