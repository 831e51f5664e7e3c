/**
 * @completers/sources — Concrete completion sources
 */

export { FsCompleter, FsCompletion, parentDirectory, DIRECTORY_DEPTH_LIMIT } from "./filesystem.js";
export type { FsCompleterOptions, FsEntryType } from "./filesystem.js";

export {
  GitBranchCompleter,
  GitCommitCompleter,
  GitRefCompletion,
  GitCommitCompletion,
  parseRefs,
  parseCommits,
} from "./git.js";
export type { GitCompleterOptions, GitRefKind } from "./git.js";

export { NumCompleter, NumCompletion } from "./numbers.js";

export { spawnRunner } from "./process.js";
export type { CommandRunner, CommandResult } from "./process.js";
