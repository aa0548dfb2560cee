/**
 * Shared utility functions for gateway pipelines and collaborator bindings.
 */

import { GatewayError } from "./errors.js";
import type { ErrorBody, ResponseErr } from "./envelope.js";

export interface LinkedSignal {
  signal: AbortSignal;
  /** Detach from the source signals. Runs by itself once the signal aborts. */
  unlink(): void;
}

/**
 * Combines AbortSignals into one that aborts with the first source's reason.
 * Listeners on the sources are removed on unlink or abort, so a long-lived
 * source does not collect one listener per linked signal.
 */
export function linkSignals(signals: AbortSignal[]): LinkedSignal {
  const ctrl = new AbortController();
  const links: Array<[AbortSignal, () => void]> = [];
  const unlink = () => {
    for (const [source, listener] of links.splice(0)) source.removeEventListener("abort", listener);
  };
  for (const source of signals) {
    if (source.aborted) {
      unlink();
      ctrl.abort(source.reason);
      return { signal: ctrl.signal, unlink };
    }
    const listener = () => {
      unlink();
      ctrl.abort(source.reason);
    };
    source.addEventListener("abort", listener, { once: true });
    links.push([source, listener]);
  }
  return { signal: ctrl.signal, unlink };
}

/** Human-readable diagnostic for anything that was thrown. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  if (typeof err === "string") return err;
  try {
    return `Non-error thrown: ${JSON.stringify(err)}`;
  } catch {
    return `Non-error thrown: ${String(err)}`;
  }
}

/**
 * Converts a caught fault into a GatewayError. GatewayErrors keep their
 * kind; anything else becomes InternalError.
 */
export function toGatewayError(err: unknown, context?: string): GatewayError {
  if (err instanceof GatewayError) return err;
  const message = describeError(err);
  return new GatewayError({
    kind: "InternalError",
    message: context ? `${context}: ${message}` : message,
    cause: err,
  });
}

/** Error body for a caught fault. */
export function toErrorBody(err: unknown, context?: string): ErrorBody {
  return toGatewayError(err, context).toBody();
}

/** Error response envelope for a caught fault. */
export function toErrorResponse(err: unknown, context?: string): ResponseErr {
  return { outcome: "err", error: toErrorBody(err, context) };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(err: unknown): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (err: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Longest delay a single Node timer can hold. */
const MAX_TIMER_MS = 2 ** 31 - 1;

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new GatewayError({ kind: "Cancelled", message: "Delay aborted", cause: signal?.reason }));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    if (signal) {
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener("abort", onAbort, { once: true });
    }
  });
}

/**
 * Resolves after `ms`, or rejects with a Cancelled GatewayError as soon as
 * the signal aborts. Delays beyond one timer's range run as several timers.
 */
export async function delay(ms: number, signal?: AbortSignal): Promise<void> {
  let remaining = ms;
  do {
    const step = Math.min(remaining, MAX_TIMER_MS);
    await sleep(step, signal);
    remaining -= step;
  } while (remaining > 0);
}
