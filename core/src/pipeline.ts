/**
 * Middleware composition for gateway invocations.
 *
 * A middleware wraps a `next` handler using reduceRight, enabling pre/post
 * logic, error handling, and short-circuiting.
 */

import type { RequestEnvelope } from "./envelope.js";

/**
 * One invocation as it travels through the pipeline. Middleware fill in the
 * later fields (decoded args, resolved target) as they run.
 */
export interface Invocation<TState = unknown> extends RequestEnvelope {
  state: TState;
}

export type InvocationCore<TState, R> = (inv: Invocation<TState>, signal: AbortSignal) => Promise<R>;

/**
 * Canonical middleware signature.
 *
 * A middleware wraps a `next` handler, enabling:
 * - Pre-processing of the invocation before next() is called
 * - Post-processing of the result after next() returns
 * - Error handling (try/catch around next())
 * - Short-circuiting (return result without calling next())
 */
export type Middleware<TState, R> = (next: InvocationCore<TState, R>) => InvocationCore<TState, R>;

/**
 * Composes an array of middleware around a core handler.
 *
 * Execution order follows array order:
 *   [mw0, mw1, mw2] + core  →  mw0( mw1( mw2( core ) ) )
 *
 * So mw0 runs first (outermost), core runs last (innermost).
 */
export function buildPipeline<TState, R>(params: {
  middleware: Middleware<TState, R>[];
  core: InvocationCore<TState, R>;
}): InvocationCore<TState, R> {
  return params.middleware.reduceRight<InvocationCore<TState, R>>((next, mw) => mw(next), params.core);
}
