/**
 * Completion UI — Ink application
 *
 * Renders the latest snapshot published by the interaction loop:
 * - Search prompt with the status on the right
 * - Tab strip, one entry per completer
 * - One row per visible completion, the selection inverted
 *
 * Input events are translated to engine keys and sent to the loop.
 */

import React, { useEffect, useState } from "react";
import { Box, Text, render, useInput, useStdout, type Instance } from "ink";
import type { Channel, Key, ModelSnapshot, SnapshotRow } from "@completers/core";
import { keysFromInput } from "./keys.js";
import { STYLE_COLORS, formatHeader, formatRow } from "./render.js";
import type { SnapshotFeed } from "./state.js";

// =============================================================================
// Main App
// =============================================================================

interface AppProps {
  feed: SnapshotFeed;
  keys: Channel<Key>;
}

export default function App({ feed, keys }: AppProps) {
  const { stdout } = useStdout();
  const [snapshot, setSnapshot] = useState<ModelSnapshot | undefined>(feed.current);

  useEffect(() => feed.subscribe(setSnapshot), [feed]);

  useInput((input, key) => {
    for (const k of keysFromInput(input, key)) keys.send(k);
  });

  const columns = stdout?.columns ?? 80;

  if (!snapshot) {
    return <Text dimColor>Loading…</Text>;
  }

  return (
    <Box flexDirection="column" width={columns}>
      <Text>{formatHeader(snapshot, columns)}</Text>
      <TabStrip names={snapshot.tabNames} active={snapshot.activeTab} />

      {snapshot.rows.map((row, i) => (
        <CompletionRow key={snapshot.viewOffset + i} row={row} columns={columns} />
      ))}
      {snapshot.rows.length === 0 && (
        <Text dimColor>{snapshot.fetching ? "  Searching…" : "  No matches"}</Text>
      )}
    </Box>
  );
}

// =============================================================================
// Tab Strip
// =============================================================================

function TabStrip({ names, active }: { names: string[]; active: number }) {
  return (
    <Box gap={1}>
      {names.map((name, i) => (
        <Text key={i} inverse={i === active} dimColor={i !== active}>
          {` ${name} `}
        </Text>
      ))}
    </Box>
  );
}

// =============================================================================
// Completion Row
// =============================================================================

function CompletionRow({ row, columns }: { row: SnapshotRow; columns: number }) {
  return (
    <Text color={STYLE_COLORS[row.style]} inverse={row.selected} wrap="truncate">
      {formatRow(row, columns)}
    </Text>
  );
}

// =============================================================================
// Mounting
// =============================================================================

/**
 * Mount the UI on the terminal. Ctrl-C is delivered as a key, not as an
 * exit request, so the loop can cancel cleanly.
 */
export function renderApp(feed: SnapshotFeed, keys: Channel<Key>): Instance {
  return render(<App feed={feed} keys={keys} />, { exitOnCtrlC: false });
}
