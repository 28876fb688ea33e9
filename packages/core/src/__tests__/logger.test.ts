import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { MockInstance } from "vitest";
import {
  printCompletion,
  printDomainList,
  printToggles,
  printSuccess,
  printError,
} from "../logger.js";

// Strip ANSI color codes so assertions hold with or without a TTY.
function plain(value: unknown): string {
  return String(value).replace(/\x1b\[[0-9;]*m/g, "");
}

describe("logger", () => {
  let consoleSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    consoleSpy.mockRestore();
  });

  function lines(): string[] {
    return consoleSpy.mock.calls.map((c) => plain(c[0]));
  }

  describe("printCompletion", () => {
    it("outputs the full completion", () => {
      printCompletion("exa", "example.com/");
      expect(lines()).toEqual(["  example.com/"]);
    });
  });

  describe("printDomainList", () => {
    it("numbers domains from zero", () => {
      printDomainList(["a.com", "b.com"]);
      expect(lines()).toEqual(["  0  a.com", "  1  b.com"]);
    });

    it("pads indices to the widest one", () => {
      printDomainList(Array.from({ length: 11 }, (_, i) => `d${i}.com`));
      const output = lines();
      expect(output[0]).toBe("   0  d0.com");
      expect(output[10]).toBe("  10  d10.com");
    });

    it("says so when the list is empty", () => {
      printDomainList([]);
      expect(lines()).toEqual(["  No custom domains"]);
    });
  });

  describe("printToggles", () => {
    it("outputs one line per toggle", () => {
      printToggles({
        enableDomainAutocomplete: true,
        enableCustomDomainAutocomplete: false,
      });
      expect(lines()).toEqual([
        "  Top domains     on",
        "  Custom domains  off",
      ]);
    });
  });

  describe("printSuccess", () => {
    it("outputs the message", () => {
      printSuccess("Added example.com");
      expect(lines()).toEqual(["  ✓ Added example.com"]);
    });
  });

  describe("printError", () => {
    it("outputs 'Error:' and the message", () => {
      printError("something went wrong");
      expect(lines()).toEqual(["  Error: something went wrong"]);
    });
  });
});
