#!/usr/bin/env node
/**
 * completers CLI — interactive completion of the word under the cursor
 *
 * Usage:
 *   completers --point 5 -- "vim src"
 *
 * Prints "<new point> <new line>" on stderr; shell/completers.bash reads
 * it back into the readline buffer.
 */

import {
  Channel,
  InteractionLoop,
  Model,
  createError,
  describeError,
  resolveConfig,
  type Key,
  type Logger,
} from "@completers/core";
import { renderApp } from "./app.js";
import { parseArgs, printHelp, type CliOptions } from "./args.js";
import { getCompleters } from "./completers.js";
import { createFileLogger } from "./logger.js";
import { applyCompletion, getInitialQueryRange } from "./query-range.js";
import { SnapshotFeed } from "./state.js";

/**
 * Run one completion session for the word under the cursor.
 * Resolves to the line and point to hand back to the shell.
 */
async function complete(options: CliOptions, logger: Logger): Promise<{ line: string; point: number }> {
  if (!process.stdin.isTTY) {
    throw createError("NOT_A_TTY", "completers needs an interactive terminal on stdin");
  }

  const config = resolveConfig({ pageSize: options.pageSize });
  const range = getInitialQueryRange(options.line, options.point);
  const query = options.line.slice(range.start, range.end);
  logger.debug(`query "${query}" at [${range.start}, ${range.end})`);

  const model = new Model(getCompleters(query, { logger, numbers: options.numbers }), config, logger);
  const keys = new Channel<Key>();
  const feed = new SnapshotFeed();

  const loop = new InteractionLoop({
    model,
    keys,
    initialQuery: query,
    pollIntervalMs: config.fetchPollIntervalMs,
    events: { onRender: (snapshot) => feed.publish(snapshot) },
    logger,
  });

  const ui = renderApp(feed, keys);
  try {
    const outcome = await loop.run();
    logger.debug(`session ${outcome.kind}: "${outcome.result}"`);
    // A cancelled session puts the original word back
    return applyCompletion(options.line, range, outcome.result);
  } finally {
    keys.close();
    ui.unmount();
  }
}

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv.slice(2));
  if (parsed.help) {
    printHelp();
    return;
  }

  const logger = createFileLogger({ filePath: parsed.logFile, level: parsed.debug ? "debug" : "warn" });
  try {
    const result = await complete(parsed, logger);
    process.stderr.write(`${result.point} ${result.line}\n`);
  } catch (err) {
    logger.error(describeError(err));
    throw err;
  } finally {
    logger.close();
  }
}

main()
  .then(() => process.exit(0))
  .catch((err) => {
    console.error(`Fatal: ${describeError(err)}`);
    process.exit(1);
  });
