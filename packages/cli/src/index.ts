/**
 * @completers/cli — Terminal front end for the completion engine
 *
 * The executable lives in cli.ts; this entry exposes its building blocks.
 */

export { default as App, renderApp } from "./app.js";
export { parseArgs, printHelp, DEFAULT_LOG_FILE } from "./args.js";
export type { CliOptions, ParsedArgs } from "./args.js";
export { getCompleters } from "./completers.js";
export type { CompleterSelection } from "./completers.js";
export { keysFromInput } from "./keys.js";
export type { InkKeyFlags } from "./keys.js";
export { createFileLogger } from "./logger.js";
export type { FileLogger, FileLoggerOptions } from "./logger.js";
export { getInitialQueryRange, applyCompletion, WORD_BOUNDARIES } from "./query-range.js";
export type { QueryRange } from "./query-range.js";
export { formatHeader, formatRow, formatStatus, truncate, STYLE_COLORS } from "./render.js";
export { SnapshotFeed } from "./state.js";
export type { SnapshotListener } from "./state.js";
