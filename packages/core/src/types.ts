/**
 * Completers — Core Types
 *
 * A Completion is one candidate value. A Completer is a source of
 * completions: it may produce them all at once or stream them from
 * background work, and it may open child or parent completers to model
 * a hierarchy (directories, branches → commits).
 *
 * Completions are immutable once produced and are shared by reference
 * between a view's accumulated collection and its ranked list.
 */

// =============================================================================
// Completion
// =============================================================================

/** Presentation hint for the renderer */
export type DisplayStyle = "plain" | "directory" | "head" | "branch" | "remote" | "tag";

export interface Completion {
  /** Text substituted into the command line when this completion is accepted */
  resultString(): string;
  /** Text shown in the chooser (default: result string) */
  displayString?(): string;
  /** Text the scorer ranks against (default: result string) */
  searchString?(): string;
  /** Presentation hint (default: "plain") */
  readonly displayStyle?: DisplayStyle;
}

export function displayStringOf(completion: Completion): string {
  return completion.displayString?.() ?? completion.resultString();
}

export function searchStringOf(completion: Completion): string {
  return completion.searchString?.() ?? completion.resultString();
}

export function displayStyleOf(completion: Completion): DisplayStyle {
  return completion.displayStyle ?? "plain";
}

// =============================================================================
// Completer
// =============================================================================

export interface Completer {
  /** Short stable identifier for the status line */
  name(): string;

  /**
   * Fetch the next batch of completions not returned before.
   *
   * Resolves to an empty batch once fetching is finished. May wait for one
   * unit of background work, but must keep making progress observable via
   * `fetchingFinished()`.
   */
  fetchCompletions(): Promise<Completion[]>;

  /** True once no further batches will ever be produced */
  fetchingFinished(): boolean;

  /** A completer scoped into the given completion, or undefined if not applicable */
  descend(completion: Completion): Completer | undefined;

  /** A completer scoped to the parent context, or undefined at the top */
  ascend(): Completer | undefined;

  /**
   * Advisory cancellation of background work. Called when the level owning
   * this completer is discarded. Background work stops eventually.
   */
  dispose?(): void;
}

// =============================================================================
// Ranking
// =============================================================================

/**
 * A ranked entry of a view: the position of the candidate in the view's
 * accumulated collection and its score against the current query.
 */
export interface CompletionScore {
  index: number;
  score: number;
}

/** A ranked entry resolved to its completion */
export interface ScoredCompletion {
  completion: Completion;
  score: number;
}
