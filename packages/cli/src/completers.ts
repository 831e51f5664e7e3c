import * as path from "node:path";
import type { Completer, Logger } from "@completers/core";
import { FsCompleter, GitBranchCompleter, NumCompleter } from "@completers/sources";

export interface CompleterSelection {
  logger?: Logger;
  /** When set, only the integer completer is offered */
  numbers?: number;
}

/**
 * Completers for a session, one tab each.
 *
 * An absolute path as query roots the directory walk there instead of
 * searching for the path below the working directory.
 */
export function getCompleters(query: string, selection: CompleterSelection = {}): Completer[] {
  if (selection.numbers !== undefined) {
    return [new NumCompleter(selection.numbers)];
  }

  const logger = selection.logger;
  const root = path.isAbsolute(query) ? query : ".";
  return [new FsCompleter(root, { logger }), new GitBranchCompleter({ logger })];
}
