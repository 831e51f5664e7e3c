/**
 * Git completers
 *
 * `br` lists HEAD, local and remote branches and tags. Descending into any
 * of them opens `co`, the commit log of that ref. Both run git once, on
 * their first fetch, and report everything in that single batch.
 *
 * A git failure (not a repository, unknown ref, git missing) yields no
 * completions and a SOURCE_FAILED warning.
 */

import {
  createError,
  describeError,
  nullLogger,
  type Completer,
  type Completion,
  type DisplayStyle,
  type Logger,
} from "@completers/core";
import { spawnRunner, type CommandRunner } from "./process.js";

export interface GitCompleterOptions {
  /** Defaults to spawning real processes */
  runner?: CommandRunner;
  /** Repository working directory; defaults to the process cwd */
  cwd?: string;
  logger?: Logger;
}

// =============================================================================
// Refs
// =============================================================================

export type GitRefKind = "head" | "branch" | "remote" | "tag";

export class GitRefCompletion implements Completion {
  readonly kind: GitRefKind;
  readonly ref: string;

  constructor(kind: GitRefKind, ref: string) {
    this.kind = kind;
    this.ref = ref;
  }

  get displayStyle(): DisplayStyle {
    return this.kind;
  }

  resultString(): string {
    return this.ref;
  }
}

/**
 * Parse `git for-each-ref --format=%(objecttype) %(refname:strip=2)` output.
 * HEAD always comes first.
 */
export function parseRefs(output: string): GitRefCompletion[] {
  const refs = [new GitRefCompletion("head", "HEAD")];
  for (const line of output.split("\n")) {
    const [objectType, ref] = line.trim().split(/\s+/);
    if (!objectType || !ref) continue;
    refs.push(new GitRefCompletion(classifyRef(objectType, ref), ref));
  }
  return refs;
}

function classifyRef(objectType: string, ref: string): GitRefKind {
  if (objectType !== "commit") return "tag";
  return ref.includes("/") ? "remote" : "branch";
}

export class GitBranchCompleter implements Completer {
  private readonly options: GitCompleterOptions;
  private fetched = false;

  constructor(options: GitCompleterOptions = {}) {
    this.options = options;
  }

  name(): string {
    return "br";
  }

  async fetchCompletions(): Promise<Completion[]> {
    if (this.fetched) return [];
    this.fetched = true;

    const output = await runGit(["for-each-ref", "--format=%(objecttype) %(refname:strip=2)"], this.options);
    return output === undefined ? [] : parseRefs(output);
  }

  fetchingFinished(): boolean {
    return true;
  }

  descend(completion: Completion): Completer | undefined {
    if (!(completion instanceof GitRefCompletion)) return undefined;
    return new GitCommitCompleter(completion.ref, this.options);
  }

  ascend(): Completer | undefined {
    return undefined;
  }
}

// =============================================================================
// Commits
// =============================================================================

export class GitCommitCompletion implements Completion {
  readonly hash: string;
  readonly date: string;
  readonly author: string;
  readonly subject: string;

  constructor(hash: string, date: string, author: string, subject: string) {
    this.hash = hash;
    this.date = date;
    this.author = author;
    this.subject = subject;
  }

  resultString(): string {
    return this.hash;
  }

  displayString(): string {
    return `${this.hash.padEnd(10)} ${this.date.padEnd(12)} ${this.author.padEnd(25)} ${this.subject}`;
  }

  /** Queries match the subject line */
  searchString(): string {
    return this.subject;
  }
}

/**
 * Parse `git log --format=%h%x09%ad%x09%an%x09%s` output.
 * Lines without all four fields are dropped.
 */
export function parseCommits(output: string): GitCommitCompletion[] {
  const commits: GitCommitCompletion[] = [];
  for (const line of output.split("\n")) {
    const [hash, date, author, ...subject] = line.split("\t");
    if (hash === undefined || date === undefined || author === undefined || subject.length === 0) continue;
    commits.push(new GitCommitCompletion(hash, date, author, subject.join("\t")));
  }
  return commits;
}

export class GitCommitCompleter implements Completer {
  readonly ref: string;
  private readonly options: GitCompleterOptions;
  private fetched = false;

  constructor(ref: string, options: GitCompleterOptions = {}) {
    this.ref = ref;
    this.options = options;
  }

  name(): string {
    return "co";
  }

  async fetchCompletions(): Promise<Completion[]> {
    if (this.fetched) return [];
    this.fetched = true;

    const output = await runGit(["log", "--format=%h%x09%ad%x09%an%x09%s", "--date=short", this.ref], this.options);
    return output === undefined ? [] : parseCommits(output);
  }

  fetchingFinished(): boolean {
    return true;
  }

  descend(): Completer | undefined {
    return undefined;
  }

  ascend(): Completer | undefined {
    return undefined;
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Run git and return its stdout, or undefined after logging a warning.
 */
async function runGit(args: string[], options: GitCompleterOptions): Promise<string | undefined> {
  const runner = options.runner ?? spawnRunner;
  const logger = options.logger ?? nullLogger;
  const command = `git ${args[0] ?? ""}`;

  try {
    const result = await runner.run("git", args, { cwd: options.cwd });
    if (result.code === 0) return result.stdout;

    const error = createError("SOURCE_FAILED", `${command} exited with code ${result.code}: ${result.stderr.trim()}`);
    logger.warn(describeError(error));
  } catch (err) {
    logger.warn(describeError(createError("SOURCE_FAILED", `${command} could not run: ${describeError(err)}`)));
  }
  return undefined;
}
