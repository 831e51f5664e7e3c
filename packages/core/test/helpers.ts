/**
 * Test completers — scripted sources for view, stack and model tests.
 */

import { BackgroundFetcher } from "../src/background.js";
import type { Completer, Completion, DisplayStyle } from "../src/types.js";

export class TextCompletion implements Completion {
  readonly displayStyle: DisplayStyle;
  private readonly text: string;
  private readonly search: string | undefined;

  constructor(text: string, options: { search?: string; style?: DisplayStyle } = {}) {
    this.text = text;
    this.search = options.search;
    this.displayStyle = options.style ?? "plain";
  }

  resultString(): string {
    return this.text;
  }

  searchString(): string {
    return this.search ?? this.text;
  }
}

export function completions(...texts: string[]): TextCompletion[] {
  return texts.map((t) => new TextCompletion(t));
}

/**
 * Everything in one batch on the first fetch; finished from the start.
 * Descends into any completion whose text is a key of `children`.
 */
export class ListCompleter implements Completer {
  readonly items: Completion[];
  private readonly label: string;
  private readonly children: Record<string, string[]>;
  private readonly parent: (() => Completer) | undefined;
  private fetched = false;
  disposed = false;

  constructor(
    label: string,
    items: string[],
    options: { children?: Record<string, string[]>; parent?: () => Completer } = {},
  ) {
    this.label = label;
    this.items = completions(...items);
    this.children = options.children ?? {};
    this.parent = options.parent;
  }

  name(): string {
    return this.label;
  }

  async fetchCompletions(): Promise<Completion[]> {
    if (this.fetched) return [];
    this.fetched = true;
    return this.items;
  }

  fetchingFinished(): boolean {
    return true;
  }

  descend(completion: Completion): Completer | undefined {
    const key = completion.resultString();
    const child = this.children[key];
    return child ? new ListCompleter(`${this.label}/${key}`, child) : undefined;
  }

  ascend(): Completer | undefined {
    return this.parent?.();
  }

  dispose(): void {
    this.disposed = true;
  }
}

/**
 * Produces one scripted batch per unit of background work.
 */
export class BatchedCompleter implements Completer {
  private readonly fetcher: BackgroundFetcher<Completion>;

  constructor(batches: string[][]) {
    let next = 0;
    this.fetcher = new BackgroundFetcher<Completion>(async () => {
      const batch = batches[next] ?? [];
      next++;
      return { items: completions(...batch), exhausted: next >= batches.length };
    });
  }

  name(): string {
    return "batched";
  }

  fetchCompletions(): Promise<Completion[]> {
    return this.fetcher.fetch();
  }

  fetchingFinished(): boolean {
    return this.fetcher.isFinished;
  }

  descend(): Completer | undefined {
    return undefined;
  }

  ascend(): Completer | undefined {
    return undefined;
  }

  dispose(): void {
    this.fetcher.cancel();
  }
}

export function resultStrings(entries: Array<{ completion: Completion }>): string[] {
  return entries.map((e) => e.completion.resultString());
}
