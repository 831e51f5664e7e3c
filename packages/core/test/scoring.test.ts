/**
 * Scoring tests — subsequence filter, word starts, DP scorer.
 */

import { describe, it, expect } from "vitest";
import { subsequenceMatch, score, findWordStarts } from "../src/scoring.js";
import type { ScoringSettings } from "../src/config.js";

const LETTERS_ONLY: ScoringSettings = { letterMatch: 1, subsequentBonus: 0, wordStartBonus: 0 };

// =============================================================================
// subsequenceMatch
// =============================================================================

describe("subsequenceMatch", () => {
  it("matches empty queries against anything", () => {
    expect(subsequenceMatch("", "")).toBe(true);
    expect(subsequenceMatch("", "foo")).toBe(true);
  });

  it("matches a string against itself", () => {
    for (const s of ["foo", "src/main.ts", "Ünïcode", "a b c"]) {
      expect(subsequenceMatch(s, s)).toBe(true);
    }
  });

  it("matches in order, not necessarily contiguous", () => {
    expect(subsequenceMatch("bar", "bazaar")).toBe(true);
    expect(subsequenceMatch("bar", "bra")).toBe(false);
  });

  it("is case-insensitive on both sides", () => {
    expect(subsequenceMatch("bar", "BaZaAR")).toBe(true);
    expect(subsequenceMatch("BAR", "bar")).toBe(true);
  });

  it("ignores whitespace in the query", () => {
    expect(subsequenceMatch("f b", "foobar")).toBe(true);
    expect(subsequenceMatch("  ", "x")).toBe(true);
  });

  it("fails when the candidate runs out", () => {
    expect(subsequenceMatch("foo", "")).toBe(false);
    expect(subsequenceMatch("foo", "fo")).toBe(false);
    expect(subsequenceMatch("baaaar", "bar")).toBe(false);
  });
});

// =============================================================================
// findWordStarts
// =============================================================================

describe("findWordStarts", () => {
  it("marks the first alphanumeric after each separator run", () => {
    expect(findWordStarts(Array.from("foo/bar"))).toEqual([true, false, false, false, true, false, false]);
    expect(findWordStarts(Array.from("--ab c"))).toEqual([false, false, true, false, false, true]);
  });

  it("does not mark case changes", () => {
    expect(findWordStarts(Array.from("fooBar"))).toEqual([true, false, false, false, false, false]);
  });
});

// =============================================================================
// score
// =============================================================================

describe("score", () => {
  it("credits one point per matched letter", () => {
    expect(score("foo", "f", LETTERS_ONLY)).toBe(1);
    expect(score("foo", "fo", LETTERS_ONLY)).toBe(2);
  });

  it("is zero when the query is longer than the candidate", () => {
    expect(score("foo", "fooo", LETTERS_ONLY)).toBe(0);
  });

  it("is zero for empty inputs", () => {
    expect(score("foo", "", LETTERS_ONLY)).toBe(0);
    expect(score("", "f", LETTERS_ONLY)).toBe(0);
  });

  it("adds the word start bonus at boundaries", () => {
    const settings = { ...LETTERS_ONLY, wordStartBonus: 3 };
    // f(1+3) o(1) b(1+3) a(1)
    expect(score("foo/bar", "foba", settings)).toBe(10);
  });

  it("adds the subsequent bonus for adjacent matches", () => {
    const settings = { ...LETTERS_ONLY, subsequentBonus: 5 };
    // "ab" adjacent: a=1, b=1+(1+5)
    expect(score("ab", "ab", settings)).toBe(7);
    // "a_b" not adjacent: a=1, b=1+1
    expect(score("a_b", "ab", settings)).toBe(2);
  });

  it("carries the best left-over score of the previous query prefix", () => {
    const settings = { letterMatch: 1, subsequentBonus: 0, wordStartBonus: 10 };
    // b(1+10) at 0 and c(1+10) at 2 build on a partial alignment: 11 + 11
    expect(score("b_c_xabc", "abc", settings)).toBe(22);
  });

  it("gives no subsequent bonus after a zero-valued match", () => {
    expect(score("ab", "ab", { letterMatch: 0, subsequentBonus: 5, wordStartBonus: 0 })).toBe(0);
    // a word start makes the first match positive: a=2, b=0+(2+5)
    expect(score("ab", "ab", { letterMatch: 0, subsequentBonus: 5, wordStartBonus: 2 })).toBe(7);
  });

  it("prefers the best alignment", () => {
    const settings = { letterMatch: 1, subsequentBonus: 3, wordStartBonus: 2 };
    // f(1+2) o(1+3+3) beats skipping to the second o
    expect(score("foo", "fo", settings)).toBe(7);
  });

  it("is zero whenever the query is not a subsequence", () => {
    const settings = { letterMatch: 1, subsequentBonus: 3, wordStartBonus: 2 };
    expect(score("ba", "ab", settings)).toBe(0);
    expect(score("foo", "ooo", settings)).toBe(0);
    expect(score("main.ts", "zz", settings)).toBe(0);
  });

  it("ignores case and query whitespace", () => {
    expect(score("FooBar", "f b", LETTERS_ONLY)).toBe(2);
  });

  it("is monotonic in each weight", () => {
    const base = { letterMatch: 1, subsequentBonus: 1, wordStartBonus: 1 };
    const candidates = ["src/components/App.tsx", "packages/core/src/view.ts", "README.md"];
    const queries = ["sca", "view", "rd", "ct"];

    for (const candidate of candidates) {
      for (const query of queries) {
        const s0 = score(candidate, query, base);
        expect(score(candidate, query, { ...base, letterMatch: 4 })).toBeGreaterThanOrEqual(s0);
        expect(score(candidate, query, { ...base, subsequentBonus: 4 })).toBeGreaterThanOrEqual(s0);
        expect(score(candidate, query, { ...base, wordStartBonus: 4 })).toBeGreaterThanOrEqual(s0);
      }
    }
  });
});
