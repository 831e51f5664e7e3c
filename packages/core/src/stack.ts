/**
 * Completer Stack — the navigation path of one tab.
 *
 * Never empty; the last view is the active level. Descending pushes a view
 * for the selected completion, ascending pops it. Ascending from the only
 * level replaces it with the completer's parent, when there is one.
 */

import type { EngineConfig } from "./config.js";
import { nullLogger, type Logger } from "./logger.js";
import type { Completer } from "./types.js";
import { CompleterView } from "./view.js";

export class CompleterStack {
  private readonly levels: [CompleterView, ...CompleterView[]];
  private readonly config: EngineConfig;
  private readonly logger: Logger;

  constructor(completer: Completer, config: EngineConfig, logger: Logger = nullLogger) {
    this.config = config;
    this.logger = logger;
    this.levels = [new CompleterView(completer, config, logger)];
  }

  /** The active level */
  get top(): CompleterView {
    return this.levels[this.levels.length - 1] ?? this.levels[0];
  }

  get depth(): number {
    return this.levels.length;
  }

  /**
   * Descend into the selected completion of the active level.
   * Resolves to true if a level was pushed.
   */
  async descend(): Promise<boolean> {
    const top = this.top;
    const selected = top.selected();
    if (!selected) return false;

    const completer = top.completer.descend(selected);
    if (!completer) return false;

    const level = await this.openLevel(completer);
    this.levels.push(level);
    this.logger.debug(`${top.completer.name()}: descended into "${selected.resultString()}" (depth ${this.levels.length})`);
    return true;
  }

  /**
   * Pop the active level, or replace the root level with its parent.
   * Resolves to true if the stack changed.
   */
  async ascend(): Promise<boolean> {
    if (this.levels.length > 1) {
      this.levels.pop()?.dispose();
      return true;
    }

    const root = this.levels[0];
    const parent = root.completer.ascend();
    if (!parent) return false;

    const level = await this.openLevel(parent);
    root.dispose();
    this.levels[0] = level;
    this.logger.debug(`${root.completer.name()}: replaced root level with its parent`);
    return true;
  }

  /** Dispose every level */
  dispose(): void {
    for (const level of this.levels) level.dispose();
  }

  private async openLevel(completer: Completer): Promise<CompleterView> {
    const level = new CompleterView(completer, this.config, this.logger);
    await level.fetchCompletions();
    return level;
  }
}
