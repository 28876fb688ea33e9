import { describe, it, expect, vi } from "vitest";
import { DomainCompletion } from "../completion.js";
import { CustomCompletionSource } from "../custom-source.js";
import { TopDomainsCompletionSource } from "../top-domains.js";
import type { AutocompleteSource } from "../sources.js";
import { memorySettings, staticResources } from "./helpers.js";

function listSource(domains: string[], enabled = true): AutocompleteSource {
  return { enabled, getSuggestions: () => domains };
}

describe("DomainCompletion", () => {
  it("returns null for empty text", () => {
    const completion = new DomainCompletion([listSource(["example.com"])]);
    expect(completion.complete("")).toBeNull();
  });

  it("does not consult any source for empty text", () => {
    const getSuggestions = vi.fn(() => ["example.com"]);
    const completion = new DomainCompletion([
      { enabled: true, getSuggestions },
    ]);

    completion.complete("");
    expect(getSuggestions).not.toHaveBeenCalled();
  });

  it("returns the first match in list order", () => {
    const completion = new DomainCompletion([
      listSource(["example.com", "example.org"]),
    ]);
    expect(completion.complete("exa")).toBe("example.com/");
  });

  it("skips disabled sources", () => {
    const completion = new DomainCompletion([
      listSource(["foo.com", "example.net"], false),
      listSource(["example.com", "example.org"]),
    ]);
    expect(completion.complete("exa")).toBe("example.com/");
    expect(completion.complete("foo")).toBeNull();
  });

  it("prefers earlier sources", () => {
    const completion = new DomainCompletion([
      listSource(["example.org"]),
      listSource(["example.com"]),
    ]);
    expect(completion.complete("exa")).toBe("example.org/");
  });

  it("falls through to later sources when earlier ones do not match", () => {
    const completion = new DomainCompletion([
      listSource(["foo.com"]),
      listSource(["mozilla.org"]),
    ]);
    expect(completion.complete("mozilla")).toBe("mozilla.org/");
  });

  it("stops at the first hit without reading later sources", () => {
    const later = vi.fn(() => ["example.org"]);
    const laterEnabled = vi.fn(() => true);
    const completion = new DomainCompletion([
      listSource(["example.com"]),
      {
        get enabled() {
          return laterEnabled();
        },
        getSuggestions: later,
      },
    ]);

    expect(completion.complete("exa")).toBe("example.com/");
    expect(laterEnabled).not.toHaveBeenCalled();
    expect(later).not.toHaveBeenCalled();
  });

  it("returns null when nothing matches", () => {
    const completion = new DomainCompletion([listSource(["example.com"])]);
    expect(completion.complete("zzz")).toBeNull();
  });

  it("returns null with no sources", () => {
    expect(new DomainCompletion([]).complete("exa")).toBeNull();
  });

  it("exposes the configured sources in order", () => {
    const first = listSource(["a.com"]);
    const second = listSource(["b.com"]);
    expect(new DomainCompletion([first, second]).sources).toEqual([
      first,
      second,
    ]);
  });

  describe("with custom and top domains sources", () => {
    it("ignores the custom list when its toggle is off", () => {
      const settings = memorySettings(["foo.com"], {
        enableCustomDomainAutocomplete: false,
      });
      const completion = new DomainCompletion([
        new CustomCompletionSource(settings),
        new TopDomainsCompletionSource(
          settings,
          staticResources("example.com\nexample.org\n"),
        ),
      ]);

      expect(completion.complete("exa")).toBe("example.com/");
      expect(completion.complete("foo")).toBeNull();
    });

    it("completes a custom domain added at runtime", () => {
      const settings = memorySettings();
      const custom = new CustomCompletionSource(settings);
      const completion = new DomainCompletion([
        custom,
        new TopDomainsCompletionSource(
          settings,
          staticResources("mozilla.org\n"),
        ),
      ]);

      expect(completion.complete("moz")).toBe("mozilla.org/");
      custom.add("mozilla.net");
      expect(completion.complete("moz")).toBe("mozilla.net/");
    });

    it("completes a stored custom entry in its stored form", () => {
      const settings = memorySettings(["Example.com/docs"]);
      const completion = new DomainCompletion([
        new CustomCompletionSource(settings),
      ]);
      expect(completion.complete("exa")).toBe("Example.com/docs");
    });
  });
});
