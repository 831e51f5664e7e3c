/**
 * Key vocabulary understood by the interaction loop.
 *
 * Renderers translate their own input events into these.
 */

export type CommandKey =
  | "up"
  | "down"
  | "pageUp"
  | "pageDown"
  | "home"
  | "end"
  | "left"
  | "right"
  | "enter"
  | "tab"
  | "backspace"
  | "cancel";

export type Key =
  | { kind: CommandKey }
  | { kind: "char"; char: string };

export function charKey(char: string): Key {
  return { kind: "char", char };
}

export function commandKey(kind: CommandKey): Key {
  return { kind };
}
