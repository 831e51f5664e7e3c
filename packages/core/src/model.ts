/**
 * Model — the state of one completion session.
 *
 * One stack per initial completer ("tabs"), the index of the active tab and
 * the session query. Query edits go to the active view only, so every tab
 * and level keeps its own filtered list.
 */

import { DEFAULT_CONFIG, type EngineConfig } from "./config.js";
import { createError } from "./errors.js";
import { nullLogger, type Logger } from "./logger.js";
import { CompleterStack } from "./stack.js";
import type { CompleterView } from "./view.js";
import { displayStringOf, displayStyleOf, type Completer, type DisplayStyle, type ScoredCompletion } from "./types.js";

// =============================================================================
// Render snapshot
// =============================================================================

export interface SnapshotRow {
  display: string;
  style: DisplayStyle;
  score: number;
  selected: boolean;
}

/** Read-only picture of the active tab, consumed by renderers */
export interface ModelSnapshot {
  query: string;
  completerName: string;
  tabNames: string[];
  activeTab: number;
  /** Number of open levels in the active tab */
  depth: number;
  selection: number;
  viewOffset: number;
  /** Completions passing the query */
  count: number;
  /** Completions fetched so far */
  totalCount: number;
  pageSize: number;
  fetching: boolean;
  rows: SnapshotRow[];
}

// =============================================================================
// Model
// =============================================================================

export class Model {
  private readonly stacks: CompleterStack[];
  private readonly config: EngineConfig;
  private readonly logger: Logger;
  private activeTab = 0;
  private sessionQuery = "";

  /**
   * @throws CompletersError (INVALID_ARGUMENT) when no completers are given
   */
  constructor(completers: Completer[], config: EngineConfig = DEFAULT_CONFIG, logger: Logger = nullLogger) {
    if (completers.length === 0) {
      throw createError("INVALID_ARGUMENT", "A completion session needs at least one completer");
    }
    this.config = config;
    this.logger = logger;
    this.stacks = completers.map((c) => new CompleterStack(c, config, logger));
  }

  // ===========================================================================
  // Accessors
  // ===========================================================================

  get query(): string {
    return this.sessionQuery;
  }

  get tabIndex(): number {
    return this.activeTab;
  }

  get tabCount(): number {
    return this.stacks.length;
  }

  completerName(): string {
    return this.activeView().completer.name();
  }

  completions(): ScoredCompletion[] {
    return this.activeView().completions();
  }

  completionAt(position: number): ScoredCompletion | undefined {
    return this.activeView().completionAt(position);
  }

  completionsCount(): number {
    return this.activeView().count;
  }

  selection(): number {
    return this.activeView().selection;
  }

  viewOffset(): number {
    return this.activeView().viewOffset;
  }

  /** Result string of the selected completion, if anything is selected */
  getSelectedResult(): string | undefined {
    return this.activeView().selected()?.resultString();
  }

  fetchingCompletionsFinished(): boolean {
    return this.activeView().fetchingFinished();
  }

  snapshot(): ModelSnapshot {
    const view = this.activeView();
    const rows = view.visibleCompletions().map(({ completion, score }, i) => ({
      display: displayStringOf(completion),
      style: displayStyleOf(completion),
      score,
      selected: view.viewOffset + i === view.selection,
    }));

    return {
      query: this.sessionQuery,
      completerName: view.completer.name(),
      tabNames: this.stacks.map((s) => s.top.completer.name()),
      activeTab: this.activeTab,
      depth: this.activeStack().depth,
      selection: view.selection,
      viewOffset: view.viewOffset,
      count: view.count,
      totalCount: view.totalCount,
      pageSize: this.config.pageSize,
      fetching: !view.fetchingFinished(),
      rows,
    };
  }

  // ===========================================================================
  // Selection
  // ===========================================================================

  selectPrevious(): void {
    this.activeView().selectPrevious();
  }

  selectNext(): void {
    this.activeView().selectNext();
  }

  previousPage(): void {
    this.activeView().previousPage();
  }

  nextPage(): void {
    this.activeView().nextPage();
  }

  selectFirst(): void {
    this.activeView().selectFirst();
  }

  selectLast(): void {
    this.activeView().selectLast();
  }

  // ===========================================================================
  // Query
  // ===========================================================================

  queryAppend(ch: string): void {
    this.sessionQuery += ch;
    this.applyQuery();
  }

  queryBackspace(): void {
    const chars = Array.from(this.sessionQuery);
    chars.pop();
    this.sessionQuery = chars.join("");
    this.applyQuery();
  }

  querySet(query: string): void {
    this.sessionQuery = query;
    this.applyQuery();
  }

  // ===========================================================================
  // Navigation
  // ===========================================================================

  /**
   * Descend into the selected completion of the active tab.
   * A new level starts unfiltered.
   */
  async descend(): Promise<boolean> {
    const descended = await this.activeStack().descend();
    if (descended) this.querySet("");
    return descended;
  }

  /**
   * Ascend in the active tab. The session query follows the query of the
   * level that becomes active.
   */
  async ascend(): Promise<boolean> {
    const ascended = await this.activeStack().ascend();
    if (ascended) this.sessionQuery = this.activeView().query;
    return ascended;
  }

  /**
   * Switch to the next tab and apply the session query to it.
   */
  nextTab(): void {
    this.activeTab = (this.activeTab + 1) % this.stacks.length;
    this.applyQuery();
  }

  // ===========================================================================
  // Fetching
  // ===========================================================================

  /**
   * One fetch tick on every tab's active level, run concurrently.
   * Used once at session start.
   */
  async startFetchingCompletions(): Promise<void> {
    await Promise.all(this.stacks.map((s) => s.top.fetchCompletions()));
  }

  /**
   * One fetch tick on the active tab's active level.
   * Inactive tabs are not polled.
   */
  async fetchCompletions(): Promise<number> {
    return this.activeView().fetchCompletions();
  }

  /** End the session: cancel background work on every level */
  dispose(): void {
    for (const stack of this.stacks) stack.dispose();
    this.logger.debug("session disposed");
  }

  // ===========================================================================
  // Internal
  // ===========================================================================

  private activeStack(): CompleterStack {
    const stack = this.stacks[this.activeTab];
    if (!stack) {
      throw createError("INTERNAL_ERROR", `No tab at index ${this.activeTab}`);
    }
    return stack;
  }

  private activeView(): CompleterView {
    return this.activeStack().top;
  }

  private applyQuery(): void {
    this.activeView().setQuery(this.sessionQuery);
  }
}
