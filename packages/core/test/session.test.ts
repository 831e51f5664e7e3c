/**
 * Interaction loop tests — keys in, outcome out.
 */

import { describe, it, expect } from "vitest";
import { Channel } from "../src/channel.js";
import { resolveConfig } from "../src/config.js";
import { charKey, commandKey, type Key } from "../src/keys.js";
import { Model, type ModelSnapshot } from "../src/model.js";
import { InteractionLoop } from "../src/session.js";
import { BatchedCompleter, ListCompleter } from "./helpers.js";

// =============================================================================
// Helpers
// =============================================================================

const CONFIG = resolveConfig({ pageSize: 5 });

function files(): ListCompleter {
  return new ListCompleter("files", ["src", "docs", "readme"], { children: { src: ["main.ts", "util.ts"] } });
}

function keysOf(...keys: Key[]): Channel<Key> {
  const channel = new Channel<Key>();
  for (const key of keys) channel.send(key);
  return channel;
}

function loopFor(model: Model, keys: Channel<Key>, initialQuery = ""): InteractionLoop {
  return new InteractionLoop({ model, keys, initialQuery, pollIntervalMs: 1 });
}

// =============================================================================
// Outcomes
// =============================================================================

describe("InteractionLoop", () => {
  it("accepts the selected completion on enter", async () => {
    const model = new Model([files()], CONFIG);
    const keys = keysOf(commandKey("down"), commandKey("enter"));

    expect(await loopFor(model, keys).run()).toEqual({ kind: "accepted", result: "docs" });
  });

  it("starts filtered by the initial query", async () => {
    const model = new Model([files()], CONFIG);
    const keys = keysOf(commandKey("enter"));

    expect(await loopFor(model, keys, "rd").run()).toEqual({ kind: "accepted", result: "readme" });
  });

  it("returns the initial query on cancel", async () => {
    const model = new Model([files()], CONFIG);
    const keys = keysOf(charKey("s"), commandKey("cancel"));

    expect(await loopFor(model, keys, "orig").run()).toEqual({ kind: "cancelled", result: "orig" });
  });

  it("applies keys queued ahead of the loop in order", async () => {
    const model = new Model([files()], CONFIG);
    const keys = keysOf(charKey("r"), charKey("d"), commandKey("enter"));

    expect(await loopFor(model, keys).run()).toEqual({ kind: "accepted", result: "readme" });
  });

  it("ignores enter while nothing is selected", async () => {
    const model = new Model([files()], CONFIG);
    const keys = keysOf(
      commandKey("enter"),
      commandKey("backspace"),
      commandKey("backspace"),
      commandKey("backspace"),
      commandKey("enter"),
    );

    expect(await loopFor(model, keys, "zzz").run()).toEqual({ kind: "accepted", result: "src" });
  });

  it("cancels and disposes the model when key input closes", async () => {
    const completer = files();
    const model = new Model([completer], CONFIG);
    const keys = new Channel<Key>();
    keys.close();

    expect(await loopFor(model, keys, "q").run()).toEqual({ kind: "cancelled", result: "q" });
    expect(completer.disposed).toBe(true);
  });

  it("descends with right and switches tabs with tab", async () => {
    const descended = new Model([files()], CONFIG);
    expect(await loopFor(descended, keysOf(commandKey("right"), commandKey("enter"))).run()).toEqual({
      kind: "accepted",
      result: "main.ts",
    });

    const switched = new Model([files(), new ListCompleter("branches", ["main", "dev"])], CONFIG);
    expect(await loopFor(switched, keysOf(commandKey("tab"), commandKey("end"), commandKey("enter"))).run()).toEqual({
      kind: "accepted",
      result: "dev",
    });
  });

  it("renders before every wait", async () => {
    const model = new Model([files()], CONFIG);
    const keys = keysOf(commandKey("down"), commandKey("enter"));
    const snapshots: ModelSnapshot[] = [];

    await new InteractionLoop({
      model,
      keys,
      initialQuery: "",
      events: { onRender: (s) => snapshots.push(s) },
    }).run();

    // Before the first fetch, then once per key
    expect(snapshots.map((s) => [s.totalCount, s.selection])).toEqual([
      [0, 0],
      [3, 0],
      [3, 1],
    ]);
  });

  it("keeps fetching while waiting for keys", async () => {
    const model = new Model([new BatchedCompleter([["alpha"], ["beta"], ["gamma"]])], CONFIG);
    const keys = new Channel<Key>();
    let sent = false;

    const outcome = await new InteractionLoop({
      model,
      keys,
      initialQuery: "",
      pollIntervalMs: 1,
      events: {
        onRender: (s) => {
          if (!s.fetching && !sent) {
            sent = true;
            keys.send(commandKey("end"));
            keys.send(commandKey("enter"));
          }
        },
      },
    }).run();

    expect(outcome).toEqual({ kind: "accepted", result: "gamma" });
  });
});
