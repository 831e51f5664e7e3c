/**
 * Command-line arguments
 *
 *   completers --point <n> [options] [--] CURRENT_LINE
 *
 * Options take their value either as the next argument or after "=".
 */

import { tmpdir } from "node:os";
import * as path from "node:path";
import { createError } from "@completers/core";

export interface CliOptions {
  /** Cursor position within `line` */
  point: number;
  line: string;
  debug: boolean;
  logFile: string;
  pageSize?: number;
  /** Offer the integers below this count instead of files and refs */
  numbers?: number;
}

export type ParsedArgs = { help: true } | ({ help: false } & CliOptions);

export const DEFAULT_LOG_FILE = path.join(tmpdir(), "completers.log");

/**
 * @throws CompletersError (INVALID_ARGUMENT) on unknown options, missing
 *   or malformed values
 */
export function parseArgs(args: string[]): ParsedArgs {
  let point: number | undefined;
  let line: string | undefined;
  let debug = false;
  let logFile = DEFAULT_LOG_FILE;
  let pageSize: number | undefined;
  let numbers: number | undefined;
  let positionalOnly = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";

    if (positionalOnly || !arg.startsWith("-") || arg === "-") {
      if (line !== undefined) {
        throw createError("INVALID_ARGUMENT", `Unexpected argument: ${arg}`);
      }
      line = arg;
      continue;
    }

    const eq = arg.indexOf("=");
    const name = eq === -1 ? arg : arg.slice(0, eq);
    const inlineValue = eq === -1 ? undefined : arg.slice(eq + 1);
    const value = (): string => {
      if (inlineValue !== undefined) return inlineValue;
      const next = args[i + 1];
      if (next === undefined) {
        throw createError("INVALID_ARGUMENT", `Option ${name} needs a value`);
      }
      i++;
      return next;
    };

    switch (name) {
      case "--":
        positionalOnly = true;
        break;
      case "--help":
      case "-h":
        return { help: true };
      case "--point":
      case "-p":
        point = parseCount(name, value(), 0);
        break;
      case "--debug":
        debug = true;
        break;
      case "--log-file":
        logFile = value();
        break;
      case "--page-size":
        pageSize = parseCount(name, value(), 1);
        break;
      case "--numbers":
        numbers = parseCount(name, value(), 0);
        break;
      default:
        throw createError("INVALID_ARGUMENT", `Unknown option: ${name}`);
    }
  }

  if (point === undefined) {
    throw createError("INVALID_ARGUMENT", "Missing required option --point");
  }
  if (line === undefined) {
    throw createError("INVALID_ARGUMENT", "Missing CURRENT_LINE argument");
  }
  if (point > line.length) {
    throw createError("INVALID_ARGUMENT", `--point ${point} is past the end of the line (length ${line.length})`);
  }

  return { help: false, point, line, debug, logFile, pageSize, numbers };
}

function parseCount(name: string, raw: string, min: number): number {
  const n = /^\d+$/.test(raw) ? Number(raw) : NaN;
  if (!Number.isSafeInteger(n) || n < min) {
    throw createError("INVALID_ARGUMENT", `${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return n;
}

export function printHelp(): void {
  console.log(`completers — Interactive fuzzy completion for bash

Usage:
  completers --point <n> [options] [--] CURRENT_LINE

Arguments:
  CURRENT_LINE    The current input line

Options:
  --point, -p <n>      Position of the cursor within CURRENT_LINE (required)
  --page-size <n>      Number of completion rows shown at once (default: 10)
  --numbers <n>        Complete the integers 0..n-1 instead of files and git refs
  --debug              Write debug-level log lines
  --log-file <path>    Log file (default: ${DEFAULT_LOG_FILE})
  --help, -h           Show this help

The chosen completion replaces the word under the cursor. The new cursor
position and line are written to stderr as "<point> <line>".

Keys:
  Up/Down, PageUp/PageDown, Ctrl-A/Ctrl-E    Move the selection
  Right / Left                               Descend into / ascend from the selection
  Tab                                        Next completer
  Enter                                      Accept
  Escape, Ctrl-C                             Cancel
`);
}
