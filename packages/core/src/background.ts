/**
 * Background fetching
 *
 * Runs a source's work as an independent async task and hands its output
 * to the engine through a request/response channel pair:
 *
 *   engine ──request──▶ worker     "send me what you have"
 *   engine ◀─response── worker     { batch, done }
 *
 * The worker performs units of work back to back. Between units it checks
 * for a pending request and answers it with everything gathered since the
 * last answer. Once exhausted, it waits for one more request and answers
 * with the remainder and `done: true`.
 *
 * `fetch()` sends exactly one request and waits for exactly one response.
 * `cancel()` closes the request channel; the worker notices at its next
 * check and stops. It is never interrupted mid-unit.
 */

import { Channel } from "./channel.js";
import { describeError } from "./errors.js";
import { nullLogger, type Logger } from "./logger.js";

/** Outcome of one unit of background work */
export interface WorkUnit<T> {
  items: T[];
  /** True when no further units will produce anything */
  exhausted: boolean;
}

export type WorkStep<T> = () => Promise<WorkUnit<T>>;

export interface FetchResponse<T> {
  batch: T[];
  done: boolean;
}

export interface BackgroundFetcherOptions {
  /** Name used in log lines */
  label?: string;
  logger?: Logger;
}

export class BackgroundFetcher<T> {
  private readonly requests = new Channel<void>();
  private readonly responses = new Channel<FetchResponse<T>>();
  private readonly worker: Promise<void>;
  private readonly label: string;
  private readonly logger: Logger;
  private finished = false;

  constructor(step: WorkStep<T>, options: BackgroundFetcherOptions = {}) {
    this.label = options.label ?? "background";
    this.logger = options.logger ?? nullLogger;
    this.worker = this.run(step);
  }

  /**
   * Request everything gathered since the previous call.
   * Resolves to an empty batch once finished or cancelled.
   */
  async fetch(): Promise<T[]> {
    if (this.finished) return [];
    if (!this.requests.send(undefined)) {
      this.finished = true;
      return [];
    }

    const response = await this.responses.receive();
    if (response.status !== "ok") {
      // Worker exited without answering (cancelled underneath us)
      this.finished = true;
      return [];
    }

    if (response.value.done) {
      this.finished = true;
      await this.worker;
    }
    return response.value.batch;
  }

  /** True once the final batch has been handed over, or after cancel() */
  get isFinished(): boolean {
    return this.finished;
  }

  /**
   * Ask the worker to stop. Idempotent.
   */
  cancel(): void {
    this.requests.close();
    this.finished = true;
  }

  // ===========================================================================
  // Worker
  // ===========================================================================

  private async run(step: WorkStep<T>): Promise<void> {
    try {
      let pending: T[] = [];

      for (;;) {
        const unit = await this.runStep(step);
        for (const item of unit.items) pending.push(item);
        if (unit.exhausted) break;

        const request = this.requests.tryReceive();
        if (request.status === "closed") {
          this.logger.debug(`${this.label}: cancelled during work`);
          return;
        }
        if (request.status === "ok") {
          this.responses.send({ batch: pending, done: false });
          pending = [];
        }
      }

      const request = await this.requests.receive();
      if (request.status !== "ok") {
        this.logger.debug(`${this.label}: cancelled after finishing`);
        return;
      }
      this.responses.send({ batch: pending, done: true });
    } finally {
      this.responses.close();
    }
  }

  private async runStep(step: WorkStep<T>): Promise<WorkUnit<T>> {
    try {
      return await step();
    } catch (err) {
      this.logger.warn(`${this.label}: background work failed: ${describeError(err)}`);
      return { items: [], exhausted: true };
    }
  }
}
