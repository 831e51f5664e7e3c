/**
 * Fuzzy matching and scoring.
 *
 * `subsequenceMatch` is the filter: a candidate that fails it never enters
 * a ranked list. `score` ranks the survivors with a dynamic-programming pass
 * that rewards consecutive matches and matches at word starts.
 *
 * Both compare case-folded code points; whitespace in the query is ignored.
 */

import type { ScoringSettings } from "./config.js";

const WHITESPACE = /\s/u;
const ALPHANUMERIC = /[\p{L}\p{N}]/u;

function foldCandidate(candidate: string): string[] {
  return Array.from(candidate.toLowerCase());
}

function foldQuery(query: string): string[] {
  return Array.from(query.toLowerCase()).filter((ch) => !WHITESPACE.test(ch));
}

/**
 * Indicate whether every query character appears in the candidate, in order.
 */
export function subsequenceMatch(query: string, candidate: string): boolean {
  const chars = foldCandidate(candidate);
  let position = 0;
  for (const ch of foldQuery(query)) {
    const found = chars.indexOf(ch, position);
    if (found < 0) return false;
    position = found + 1;
  }
  return true;
}

/**
 * Flags, per code point, whether a word starts there: an alphanumeric
 * character at index 0 or right after a non-alphanumeric one.
 */
export function findWordStarts(chars: readonly string[]): boolean[] {
  return chars.map((ch, i) => {
    if (!ALPHANUMERIC.test(ch)) return false;
    return i === 0 || !ALPHANUMERIC.test(chars[i - 1] ?? "");
  });
}

/**
 * Score a candidate against a query.
 *
 * For each query index i and candidate index j the pass keeps two values:
 * `take` (best score with candidate[j] matched to query[i], 0 when the
 * characters differ) and `leave` (best score for the same prefixes without
 * using candidate[j]). Only the previous query row is retained.
 *
 * Returns 0 for an empty query, an empty candidate, a query longer than the
 * candidate, or a query that is not a subsequence of the candidate.
 */
export function score(candidate: string, query: string, settings: ScoringSettings): number {
  const q = foldQuery(query);
  const c = foldCandidate(candidate);
  const m = q.length;
  const n = c.length;
  if (m === 0 || n === 0 || m > n) return 0;
  if (!subsequenceMatch(query, candidate)) return 0;

  const wordStarts = findWordStarts(c);
  let prevTake: number[] = new Array<number>(n).fill(0);
  let prevLeave: number[] = new Array<number>(n).fill(0);

  for (let i = 0; i < m; i++) {
    const take = new Array<number>(n).fill(0);
    const leave = new Array<number>(n).fill(0);

    for (let j = 0; j < n; j++) {
      if (j > 0) {
        leave[j] = Math.max(take[j - 1] ?? 0, leave[j - 1] ?? 0);
      }
      if (q[i] !== c[j]) continue;

      let previous = 0;
      if (i > 0 && j > 0) {
        const taken = prevTake[j - 1] ?? 0;
        // Only a positive take earns the subsequent bonus
        const carry = taken > 0 ? taken + settings.subsequentBonus : 0;
        previous = Math.max(carry, prevLeave[j - 1] ?? 0);
      }

      take[j] = settings.letterMatch + (wordStarts[j] ? settings.wordStartBonus : 0) + previous;
    }

    prevTake = take;
    prevLeave = leave;
  }

  return Math.max(prevTake[n - 1] ?? 0, prevLeave[n - 1] ?? 0);
}
