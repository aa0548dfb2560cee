/**
 * JSON-lines logger for the gateway process. Matches the Logger interface
 * from @walletgate/core (structured context + message) and filters by level.
 */

import type { Logger, LoggerFactory, LogMethod } from "@walletgate/core";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export type LogSink = (level: LogLevel, line: string) => void;

const defaultSink: LogSink = (level, line) => {
  if (level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Create a node-style logger factory. Returns an object with get(prefix)
 * that returns a logger with debug, info, warn and error methods; records
 * below `level` are dropped.
 */
export function createNodeJSLogger(
  serviceName: string,
  options: { level?: LogLevel; sink?: LogSink } = {}
): LoggerFactory {
  const threshold = LOG_LEVELS.indexOf(options.level ?? "info");
  const sink = options.sink ?? defaultSink;

  function makeMethod(level: LogLevel, prefix: string): LogMethod | undefined {
    if (LOG_LEVELS.indexOf(level) < threshold) return undefined;
    return (ctx, msg) => {
      const line = JSON.stringify({
        level,
        time: new Date().toISOString(),
        service: serviceName,
        prefix,
        ...ctx,
        msg,
      });
      sink(level, line);
    };
  }

  return {
    get(prefix: string): Logger {
      return {
        debug: makeMethod("debug", prefix),
        info: makeMethod("info", prefix),
        warn: makeMethod("warn", prefix),
        error: makeMethod("error", prefix),
      };
    },
  };
}
