/**
 * Directory completer
 *
 * Walks a directory tree breadth-first in the background, one directory
 * per unit of work, down to DIRECTORY_DEPTH_LIMIT levels below the start.
 * Hidden entries (leading ".") are skipped and not descended into. Each
 * directory's entries are reported sorted by path.
 *
 * Paths are built by joining onto the starting directory as given, so a
 * walker started at "." reports "src/index.ts" and one started at "/tmp"
 * reports "/tmp/...".
 */

import type { Dirent } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import * as path from "node:path";
import {
  BackgroundFetcher,
  describeError,
  nullLogger,
  type Completer,
  type Completion,
  type DisplayStyle,
  type Logger,
  type WorkUnit,
} from "@completers/core";

export const DIRECTORY_DEPTH_LIMIT = 4;

export type FsEntryType = "directory" | "file" | "error";

export class FsCompletion implements Completion {
  readonly path: string;
  readonly entryType: FsEntryType;

  constructor(entryPath: string, entryType: FsEntryType) {
    this.path = entryPath;
    this.entryType = entryType;
  }

  get displayStyle(): DisplayStyle {
    return this.entryType === "directory" ? "directory" : "plain";
  }

  resultString(): string {
    return this.path;
  }
}

export interface FsCompleterOptions {
  logger?: Logger;
}

interface QueuedDirectory {
  dir: string;
  depth: number;
}

export class FsCompleter implements Completer {
  readonly directory: string;
  private readonly options: FsCompleterOptions;
  private readonly logger: Logger;
  private readonly queue: QueuedDirectory[];
  private readonly fetcher: BackgroundFetcher<Completion>;

  constructor(directory: string, options: FsCompleterOptions = {}) {
    this.directory = directory;
    this.options = options;
    this.logger = options.logger ?? nullLogger;
    this.queue = [{ dir: directory, depth: 0 }];
    this.fetcher = new BackgroundFetcher<Completion>(() => this.walkNext(), {
      label: "fs",
      logger: this.logger,
    });
  }

  name(): string {
    return "fs";
  }

  fetchCompletions(): Promise<Completion[]> {
    return this.fetcher.fetch();
  }

  fetchingFinished(): boolean {
    return this.fetcher.isFinished;
  }

  descend(completion: Completion): Completer | undefined {
    if (!(completion instanceof FsCompletion) || completion.entryType !== "directory") {
      return undefined;
    }
    return new FsCompleter(completion.path, this.options);
  }

  ascend(): Completer | undefined {
    const parent = parentDirectory(this.directory);
    return parent === undefined ? undefined : new FsCompleter(parent, this.options);
  }

  dispose(): void {
    this.fetcher.cancel();
  }

  // ===========================================================================
  // Walk
  // ===========================================================================

  /** Read one queued directory */
  private async walkNext(): Promise<WorkUnit<Completion>> {
    const next = this.queue.shift();
    if (!next) return { items: [], exhausted: true };

    const items = await this.readDirectory(next);
    return { items, exhausted: this.queue.length === 0 };
  }

  private async readDirectory({ dir, depth }: QueuedDirectory): Promise<FsCompletion[]> {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (err) {
      // Unreadable directories contribute nothing; the walk goes on
      this.logger.debug(`fs: skipping ${dir}: ${describeError(err)}`);
      return [];
    }

    const completions: FsCompletion[] = [];
    for (const entry of entries) {
      if (entry.name.startsWith(".")) continue;

      const entryPath = path.join(dir, entry.name);
      const entryType = await entryTypeOf(entry, entryPath);
      if (entryType === "directory" && depth < DIRECTORY_DEPTH_LIMIT) {
        this.queue.push({ dir: entryPath, depth: depth + 1 });
      }
      completions.push(new FsCompletion(entryPath, entryType));
    }

    return completions.sort((a, b) => compareStrings(a.path, b.path));
  }
}

// =============================================================================
// Helpers
// =============================================================================

/** Symbolic links are classified by what they point at */
async function entryTypeOf(entry: Dirent, entryPath: string): Promise<FsEntryType> {
  if (entry.isDirectory()) return "directory";
  if (!entry.isSymbolicLink()) return "file";

  try {
    return (await stat(entryPath)).isDirectory() ? "directory" : "file";
  } catch {
    return "error";
  }
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * The directory one level up from `dir`, spelled relative when `dir` is:
 * "." becomes "..", ".." becomes "../..", "/a/b" becomes "/a".
 * A result that resolves to the filesystem root is spelled as the root.
 * Undefined when `dir` already is the root.
 */
export function parentDirectory(dir: string, cwd: string = process.cwd()): string | undefined {
  const absolute = path.resolve(cwd, dir);
  const root = path.parse(absolute).root;
  if (absolute === root) return undefined;

  const base = path.basename(dir);
  const parent = base === "." ? ".." : base === ".." ? path.join(dir, "..") : path.dirname(dir);
  return path.resolve(cwd, parent) === root ? root : parent;
}
