/**
 * Logger interface for gateway components and collaborator bindings.
 * Allows optional structured logging with context and message.
 */

export type LogMethod = (ctx: Record<string, unknown>, msg: string) => void;

export interface Logger {
  debug?: LogMethod;
  info?: LogMethod;
  warn?: LogMethod;
  error?: LogMethod;
}

/** Factory returning a named logger (e.g. "walletgate:gateway"). */
export interface LoggerFactory {
  get(name: string): Logger;
}

/** Logger that drops everything. */
export const silentLogger: Logger = {};

function isLoggerFactory(source: Logger | LoggerFactory): source is LoggerFactory {
  return "get" in source && typeof source.get === "function";
}

/** Resolve a logger from either a factory or a logger (or nothing). */
export function resolveLogger(source: Logger | LoggerFactory | undefined, name: string): Logger {
  if (!source) return silentLogger;
  return isLoggerFactory(source) ? source.get(name) : source;
}
