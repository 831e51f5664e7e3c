/**
 * Text layout for the completion UI. Pure functions over ModelSnapshot,
 * kept apart from the Ink components so they can be tested directly.
 */

import type { DisplayStyle, ModelSnapshot, SnapshotRow } from "@completers/core";

const PROMPT = "  Search: ";

/** Foreground colour per display style; undefined keeps the terminal default */
export const STYLE_COLORS: Record<DisplayStyle, string | undefined> = {
  plain: undefined,
  directory: "blue",
  head: "red",
  branch: undefined,
  remote: "gray",
  tag: "yellow",
};

/**
 * `[<completer> <first>-<last>/<count>]`, 1-based over the filtered list.
 */
export function formatStatus(snapshot: ModelSnapshot): string {
  const first = snapshot.rows.length === 0 ? 0 : snapshot.viewOffset + 1;
  const last = snapshot.viewOffset + snapshot.rows.length;
  return `[${snapshot.completerName} ${first}-${last}/${snapshot.count}]`;
}

/**
 * Prompt and query on the left, status flush right within `columns`.
 */
export function formatHeader(snapshot: ModelSnapshot, columns: number): string {
  const left = `${PROMPT}${snapshot.query}`;
  const status = formatStatus(snapshot);
  const gap = Math.max(1, columns - left.length - status.length);
  return `${left}${" ".repeat(gap)}${status}`;
}

export function formatRow(row: SnapshotRow, columns: number): string {
  return truncate(`${String(row.score).padStart(3)} ${row.display}`, columns);
}

/**
 * Cut `text` to at most `width` code points, marking the cut with "…".
 */
export function truncate(text: string, width: number): string {
  if (width <= 0) return "";
  const chars = Array.from(text);
  if (chars.length <= width) return text;
  return `${chars.slice(0, width - 1).join("")}…`;
}
