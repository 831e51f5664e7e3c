/**
 * Hand-off of render snapshots from the interaction loop to the Ink tree.
 *
 * The loop publishes on every turn; the App subscribes on mount and picks
 * up whatever was published before it.
 */

import type { ModelSnapshot } from "@completers/core";

export type SnapshotListener = (snapshot: ModelSnapshot) => void;

export class SnapshotFeed {
  private latest: ModelSnapshot | undefined;
  private readonly listeners = new Set<SnapshotListener>();

  get current(): ModelSnapshot | undefined {
    return this.latest;
  }

  publish(snapshot: ModelSnapshot): void {
    this.latest = snapshot;
    for (const listener of this.listeners) listener(snapshot);
  }

  /** Returns the unsubscribe function */
  subscribe(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    if (this.latest) listener(this.latest);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
