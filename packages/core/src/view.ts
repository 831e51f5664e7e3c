/**
 * Completer View — one navigation level.
 *
 * Holds every completion the level's completer has produced (append-only,
 * arrival order) and the ranked projection of those completions for the
 * current query, sorted by descending score with ties in arrival order.
 *
 * New batches are scored on their own and merged into the ranked list, so
 * a fetch tick costs O(batch + ranked) rather than a full re-rank.
 */

import type { EngineConfig } from "./config.js";
import { nullLogger, type Logger } from "./logger.js";
import { score, subsequenceMatch } from "./scoring.js";
import {
  searchStringOf,
  type Completer,
  type Completion,
  type CompletionScore,
  type ScoredCompletion,
} from "./types.js";

export class CompleterView {
  readonly completer: Completer;

  private readonly config: EngineConfig;
  private readonly logger: Logger;

  private currentQuery = "";
  private allCompletions: Completion[] = [];
  /** Sorted by descending score; equal scores keep arrival order */
  private ranked: CompletionScore[] = [];
  private currentSelection = 0;
  private currentViewOffset = 0;

  constructor(completer: Completer, config: EngineConfig, logger: Logger = nullLogger) {
    this.completer = completer;
    this.config = config;
    this.logger = logger;
  }

  // ===========================================================================
  // Accessors
  // ===========================================================================

  get query(): string {
    return this.currentQuery;
  }

  get selection(): number {
    return this.currentSelection;
  }

  get viewOffset(): number {
    return this.currentViewOffset;
  }

  /** Number of completions passing the current query */
  get count(): number {
    return this.ranked.length;
  }

  /** Number of completions fetched so far, regardless of the query */
  get totalCount(): number {
    return this.allCompletions.length;
  }

  completionAt(position: number): ScoredCompletion | undefined {
    const entry = this.ranked[position];
    if (!entry) return undefined;
    const completion = this.allCompletions[entry.index];
    return completion ? { completion, score: entry.score } : undefined;
  }

  /** The ranked list resolved to completions */
  completions(): ScoredCompletion[] {
    return this.slice(0, this.ranked.length);
  }

  /** The rows currently scrolled into view */
  visibleCompletions(): ScoredCompletion[] {
    return this.slice(this.currentViewOffset, this.currentViewOffset + this.config.pageSize);
  }

  selected(): Completion | undefined {
    return this.completionAt(this.currentSelection)?.completion;
  }

  fetchingFinished(): boolean {
    return this.completer.fetchingFinished();
  }

  // ===========================================================================
  // Query and fetching
  // ===========================================================================

  /**
   * Replace the query and re-rank every accumulated completion.
   */
  setQuery(query: string): void {
    this.currentQuery = query;
    this.currentSelection = 0;
    this.currentViewOffset = 0;
    this.ranked = this.rank(this.allCompletions, 0);
  }

  /**
   * Append a batch of new completions and merge their ranking into the
   * existing one. On equal scores existing entries stay ahead.
   */
  absorb(newCompletions: readonly Completion[]): void {
    if (newCompletions.length === 0) return;

    const firstIndex = this.allCompletions.length;
    for (const completion of newCompletions) this.allCompletions.push(completion);

    const incoming = this.rank(newCompletions, firstIndex);
    this.ranked = mergeRanked(this.ranked, incoming);
  }

  /**
   * Run one fetch tick against the completer and absorb the result.
   * Resolves to the number of completions received.
   */
  async fetchCompletions(): Promise<number> {
    const batch = await this.completer.fetchCompletions();
    this.absorb(batch);
    if (batch.length > 0) {
      this.logger.debug(
        `${this.completer.name()}: +${batch.length} (total ${this.allCompletions.length}, ranked ${this.ranked.length})`,
      );
    }
    return batch.length;
  }

  /** Discard the level, cancelling any background work of its completer */
  dispose(): void {
    this.completer.dispose?.();
  }

  // ===========================================================================
  // Selection and paging
  // ===========================================================================

  selectPrevious(): void {
    this.currentSelection = Math.max(0, this.currentSelection - 1);
    if (this.currentSelection < this.currentViewOffset) {
      this.currentViewOffset = this.currentSelection;
    }
  }

  selectNext(): void {
    this.currentSelection = Math.min(this.currentSelection + 1, this.lastIndex());
    this.scrollToSelection();
  }

  previousPage(): void {
    this.currentSelection = Math.max(0, this.currentSelection - this.config.pageSize);
    if (this.currentSelection < this.currentViewOffset) {
      this.currentViewOffset = this.currentSelection;
    }
  }

  nextPage(): void {
    this.currentSelection = Math.min(this.currentSelection + this.config.pageSize, this.lastIndex());
    this.scrollToSelection();
  }

  selectFirst(): void {
    this.currentSelection = 0;
    this.currentViewOffset = 0;
  }

  selectLast(): void {
    this.currentSelection = this.lastIndex();
    this.currentViewOffset = Math.max(0, this.currentSelection - (this.config.pageSize - 1));
  }

  // ===========================================================================
  // Internal
  // ===========================================================================

  private lastIndex(): number {
    return Math.max(0, this.ranked.length - 1);
  }

  private scrollToSelection(): void {
    const pageSize = this.config.pageSize;
    if (this.currentSelection >= this.currentViewOffset + pageSize) {
      this.currentViewOffset = this.currentSelection - (pageSize - 1);
    }
  }

  private slice(start: number, end: number): ScoredCompletion[] {
    const result: ScoredCompletion[] = [];
    const stop = Math.min(end, this.ranked.length);
    for (let position = start; position < stop; position++) {
      const entry = this.completionAt(position);
      if (entry) result.push(entry);
    }
    return result;
  }

  /**
   * Filter and score `completions`, whose first element sits at
   * `firstIndex` in the accumulated collection.
   */
  private rank(completions: readonly Completion[], firstIndex: number): CompletionScore[] {
    const scored: CompletionScore[] = [];
    completions.forEach((completion, offset) => {
      const text = searchStringOf(completion);
      if (!subsequenceMatch(this.currentQuery, text)) return;
      scored.push({
        index: firstIndex + offset,
        score: score(text, this.currentQuery, this.config.scoring),
      });
    });
    // sort is stable: ties keep arrival order
    return scored.sort((a, b) => b.score - a.score);
  }
}

/**
 * Merge two runs sorted by descending score. On ties `existing` wins.
 */
export function mergeRanked(
  existing: readonly CompletionScore[],
  incoming: readonly CompletionScore[],
): CompletionScore[] {
  const merged: CompletionScore[] = [];
  let i = 0;
  let j = 0;

  while (i < existing.length && j < incoming.length) {
    const a = existing[i];
    const b = incoming[j];
    if (!a || !b) break;
    if (a.score >= b.score) {
      merged.push(a);
      i++;
    } else {
      merged.push(b);
      j++;
    }
  }
  return merged.concat(existing.slice(i), incoming.slice(j));
}
