/**
 * Locating the word under the cursor, and splicing a completion into it.
 */

export const WORD_BOUNDARIES: readonly string[] = [" ", "="];

/** Half-open range [start, end) of string indices */
export interface QueryRange {
  start: number;
  end: number;
}

/**
 * Range of the word of `line` that contains `point`. A point sitting on a
 * boundary belongs to the word before it. (0, 0) when nothing matches.
 */
export function getInitialQueryRange(
  line: string,
  point: number,
  boundaries: readonly string[] = WORD_BOUNDARIES,
): QueryRange {
  let start = 0;
  for (let i = 0; i <= line.length; i++) {
    if (i < line.length && !boundaries.includes(line.charAt(i))) continue;
    if (point >= start && point <= i) return { start, end: i };
    start = i + 1;
  }
  return { start: 0, end: 0 };
}

/**
 * Replace `range` of `line` with `completion`; the point lands after it.
 */
export function applyCompletion(line: string, range: QueryRange, completion: string): { line: string; point: number } {
  return {
    line: line.slice(0, range.start) + completion + line.slice(range.end),
    point: range.start + completion.length,
  };
}
