/**
 * Integer completer: "0" through "n-1" in a single batch.
 */

import type { Completer, Completion } from "@completers/core";

export class NumCompletion implements Completion {
  private readonly value: string;

  constructor(value: number) {
    this.value = String(value);
  }

  resultString(): string {
    return this.value;
  }
}

export class NumCompleter implements Completer {
  private readonly count: number;
  private fetched = false;

  constructor(count: number) {
    this.count = count;
  }

  name(): string {
    return "num";
  }

  async fetchCompletions(): Promise<Completion[]> {
    if (this.fetched) return [];
    this.fetched = true;
    return Array.from({ length: this.count }, (_, n) => new NumCompletion(n));
  }

  fetchingFinished(): boolean {
    return true;
  }

  descend(): Completer | undefined {
    return undefined;
  }

  ascend(): Completer | undefined {
    return undefined;
  }
}
