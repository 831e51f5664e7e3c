/**
 * File logger
 *
 * stdout belongs to the terminal UI and stderr carries the result back to
 * the shell, so log lines go to a file:
 *
 *   2024-01-05T10:00:00.000Z WARN fs: skipping /root/private: EACCES ...
 *
 * The file is truncated when the logger is created. Writes are synchronous
 * so nothing is lost when the process exits right after the session.
 */

import { closeSync, openSync, writeSync } from "node:fs";
import { isLogLevelEnabled, type Logger, type LogLevel } from "@completers/core";

export interface FileLoggerOptions {
  filePath: string;
  /** Least severe level written (default: warn) */
  level?: LogLevel;
}

export interface FileLogger extends Logger {
  close(): void;
}

export function createFileLogger(options: FileLoggerOptions): FileLogger {
  const threshold = options.level ?? "warn";
  let fd: number | undefined = openSync(options.filePath, "w");

  const write = (level: LogLevel, message: string): void => {
    if (fd === undefined || !isLogLevelEnabled(threshold, level)) return;
    writeSync(fd, `${new Date().toISOString()} ${level.toUpperCase()} ${message}\n`);
  };

  return {
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message) => write("error", message),
    close() {
      if (fd === undefined) return;
      closeSync(fd);
      fd = undefined;
    },
  };
}
