/**
 * Interaction loop
 *
 * Drives a Model from a stream of keys while its sources are still
 * producing. Each turn:
 *
 *   - active tab still fetching → wait up to `pollIntervalMs` for a key,
 *     then run one fetch tick
 *   - active tab finished       → wait for a key with no timeout
 *
 * so typing stays responsive while results stream in, and an exhausted
 * source costs nothing while the user thinks.
 *
 * Keys arrive on a Channel fed by the renderer. Closing it cancels the
 * session.
 */

import type { Channel, ReceiveResult } from "./channel.js";
import { DEFAULT_CONFIG } from "./config.js";
import type { Key } from "./keys.js";
import { nullLogger, type Logger } from "./logger.js";
import type { Model, ModelSnapshot } from "./model.js";

export type SessionOutcome =
  | { kind: "accepted"; result: string }
  | { kind: "cancelled"; result: string };

export interface InteractionLoopEvents {
  /** Called before every wait, with the state to draw */
  onRender?: (snapshot: ModelSnapshot) => void;
}

export interface InteractionLoopOptions {
  model: Model;
  keys: Channel<Key>;
  /** Query the session starts with; returned unchanged on cancel */
  initialQuery: string;
  pollIntervalMs?: number;
  events?: InteractionLoopEvents;
  logger?: Logger;
}

export class InteractionLoop {
  private readonly model: Model;
  private readonly keys: Channel<Key>;
  private readonly initialQuery: string;
  private readonly pollIntervalMs: number;
  private readonly events: InteractionLoopEvents;
  private readonly logger: Logger;

  constructor(options: InteractionLoopOptions) {
    this.model = options.model;
    this.keys = options.keys;
    this.initialQuery = options.initialQuery;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_CONFIG.fetchPollIntervalMs;
    this.events = options.events ?? {};
    this.logger = options.logger ?? nullLogger;
  }

  /**
   * Run the session to completion. The model is disposed on the way out.
   */
  async run(): Promise<SessionOutcome> {
    try {
      this.model.querySet(this.initialQuery);
      this.render();
      await this.model.startFetchingCompletions();

      for (;;) {
        this.render();

        const received = this.model.fetchingCompletionsFinished()
          ? await this.keys.receive()
          : await this.receiveThenFetch();

        if (received.status === "closed") {
          this.logger.debug("key input closed, cancelling");
          return this.cancelled();
        }
        if (received.status === "timeout") continue;

        const outcome = await this.handleKey(received.value);
        if (outcome) return outcome;
      }
    } finally {
      this.model.dispose();
    }
  }

  /**
   * Apply one key. Resolves to an outcome when the key ends the session.
   */
  async handleKey(key: Key): Promise<SessionOutcome | undefined> {
    const model = this.model;

    switch (key.kind) {
      case "up":
        model.selectPrevious();
        break;
      case "down":
        model.selectNext();
        break;
      case "pageUp":
        model.previousPage();
        break;
      case "pageDown":
        model.nextPage();
        break;
      case "home":
        model.selectFirst();
        break;
      case "end":
        model.selectLast();
        break;
      case "left":
        await model.ascend();
        break;
      case "right":
        await model.descend();
        break;
      case "tab":
        model.nextTab();
        break;
      case "backspace":
        model.queryBackspace();
        break;
      case "char":
        model.queryAppend(key.char);
        break;
      case "enter": {
        // Nothing selected: keep waiting for input or more data
        const result = model.getSelectedResult();
        if (result !== undefined) return { kind: "accepted", result };
        break;
      }
      case "cancel":
        return this.cancelled();
    }
    return undefined;
  }

  private async receiveThenFetch(): Promise<ReceiveResult<Key>> {
    const received = await this.keys.receive(this.pollIntervalMs);
    await this.model.fetchCompletions();
    return received;
  }

  private cancelled(): SessionOutcome {
    return { kind: "cancelled", result: this.initialQuery };
  }

  private render(): void {
    this.events.onRender?.(this.model.snapshot());
  }
}
