/**
 * @completers/core — Fuzzy ranking and hierarchical navigation engine
 *
 * Completion sources plug in through the Completer interface; renderers
 * read ModelSnapshot and feed keys to the InteractionLoop.
 */

// Types
export type {
  Completion,
  Completer,
  CompletionScore,
  ScoredCompletion,
  DisplayStyle,
} from "./types.js";
export { displayStringOf, searchStringOf, displayStyleOf } from "./types.js";

// Configuration
export { DEFAULT_CONFIG, DEFAULT_SCORING, resolveConfig } from "./config.js";
export type { EngineConfig, EngineConfigOverrides, ScoringSettings } from "./config.js";

// Errors and logging
export { CompletersError, createError, isCompletersError, describeError } from "./errors.js";
export type { ErrorCode } from "./errors.js";
export { nullLogger, isLogLevelEnabled, LOG_LEVELS } from "./logger.js";
export type { Logger, LogLevel } from "./logger.js";

// Scoring
export { subsequenceMatch, score, findWordStarts } from "./scoring.js";

// Concurrency
export { Channel } from "./channel.js";
export type { ReceiveResult, TryReceiveResult } from "./channel.js";
export { BackgroundFetcher } from "./background.js";
export type { WorkUnit, WorkStep, FetchResponse, BackgroundFetcherOptions } from "./background.js";

// Navigation
export { CompleterView, mergeRanked } from "./view.js";
export { CompleterStack } from "./stack.js";
export { Model } from "./model.js";
export type { ModelSnapshot, SnapshotRow } from "./model.js";

// Interaction
export { charKey, commandKey } from "./keys.js";
export type { Key, CommandKey } from "./keys.js";
export { InteractionLoop } from "./session.js";
export type { SessionOutcome, InteractionLoopEvents, InteractionLoopOptions } from "./session.js";
