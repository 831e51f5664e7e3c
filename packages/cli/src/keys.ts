/**
 * Translate Ink input events into engine keys.
 */

import type { Key as InkKey } from "ink";
import { charKey, commandKey, type Key } from "@completers/core";

/** The parts of Ink's key flags the mapping reads */
export type InkKeyFlags = Pick<
  InkKey,
  | "upArrow"
  | "downArrow"
  | "leftArrow"
  | "rightArrow"
  | "pageUp"
  | "pageDown"
  | "return"
  | "escape"
  | "ctrl"
  | "meta"
  | "tab"
  | "backspace"
  | "delete"
>;

/**
 * Keys for one input event. Pasted text yields one char key per code point;
 * anything unbound yields none.
 */
export function keysFromInput(input: string, key: InkKeyFlags): Key[] {
  if (key.upArrow) return [commandKey("up")];
  if (key.downArrow) return [commandKey("down")];
  if (key.pageUp) return [commandKey("pageUp")];
  if (key.pageDown) return [commandKey("pageDown")];
  if (key.leftArrow) return [commandKey("left")];
  if (key.rightArrow) return [commandKey("right")];
  if (key.return) return [commandKey("enter")];
  if (key.tab) return [commandKey("tab")];
  if (key.escape) return [commandKey("cancel")];
  // Most terminals send DEL for Backspace, which Ink reports as delete
  if (key.backspace || key.delete) return [commandKey("backspace")];

  if (key.ctrl) {
    switch (input) {
      case "c":
        return [commandKey("cancel")];
      case "a":
        return [commandKey("home")];
      case "e":
        return [commandKey("end")];
      default:
        return [];
    }
  }
  if (key.meta) return [];

  return Array.from(input)
    .filter((ch) => ch >= " " && ch !== "\u007f")
    .map((ch) => charKey(ch));
}
