/**
 * Native object and dispatch-table definition types.
 *
 * A collaborator describes its surface as a list of method and stream
 * definitions over its own closed set of native object kinds. The gateway
 * only ever sees the erased `MethodDefinition` / `StreamDefinition` shapes;
 * the typed arguments and narrowed target stay inside each definition's
 * closure.
 */

import type { ZodError, ZodTypeAny, z } from "zod";
import type { Handle } from "./envelope.js";
import type { Logger } from "./logger.js";
import { GatewayError } from "./errors.js";

// ── Native Objects ──────────────────────────────────────────────────

/**
 * A type-erased native object stored behind a handle. `kind` is the tag of
 * the closed set of variants; `dispose` runs once the last reference drops.
 */
export interface NativeObject {
  readonly kind: string;
  dispose?(): void | Promise<void>;
}

export type ObjectOfKind<T extends NativeObject, K extends T["kind"]> = Extract<T, { kind: K }>;

export function isKind<T extends NativeObject, K extends T["kind"]>(
  object: T,
  kind: K
): object is ObjectOfKind<T, K> {
  return object.kind === kind;
}

// ── Handler Context ─────────────────────────────────────────────────

/** A synchronous collaborator call to run on a pool thread. */
export interface BlockingJob {
  /** Module specifier (absolute path or file URL) loaded inside the thread */
  module: string | URL;
  /** Named export to call */
  exportName: string;
  /** Structured-cloneable arguments */
  args?: unknown[];
}

/** A reference one native object holds on another. */
export interface ObjectLease {
  release(): void;
}

export interface ObjectRegistrar<TObject extends NativeObject> {
  register(object: TObject): Handle;
  /**
   * Take a reference on the object behind `handle`, keeping it alive after
   * its handle is released until the lease is returned. Fails with
   * HandleNotFound.
   */
  retain(handle: Handle): ObjectLease;
}

export interface HandlerContext<TObject extends NativeObject> {
  /** Request id, or the subscription handle for streams */
  requestId: string;
  method: string;
  handle: Handle | null;
  /** Aborted on runtime shutdown (and on cancel, for streams) */
  signal: AbortSignal;
  objects: ObjectRegistrar<TObject>;
  runBlocking(job: BlockingJob): Promise<unknown>;
  log: Logger;
}

// ── Erased Definitions ──────────────────────────────────────────────

export type BoundCall<TObject extends NativeObject, R> =
  | { ok: true; run(target: TObject | null, ctx: HandlerContext<TObject>): R }
  | { ok: false; error: ZodError };

export interface MethodDefinition<TObject extends NativeObject> {
  readonly type: "method";
  readonly name: string;
  /** Kind the request handle must reference, or null when no handle is used */
  readonly target: TObject["kind"] | null;
  bind(args: unknown): BoundCall<TObject, Promise<unknown>>;
}

export interface StreamDefinition<TObject extends NativeObject> {
  readonly type: "stream";
  readonly name: string;
  readonly target: TObject["kind"] | null;
  bind(args: unknown): BoundCall<TObject, AsyncIterable<unknown>>;
}

export type Definition<TObject extends NativeObject> =
  | MethodDefinition<TObject>
  | StreamDefinition<TObject>;

// ── Builders ────────────────────────────────────────────────────────

function narrowTarget<TObject extends NativeObject, K extends TObject["kind"]>(
  name: string,
  target: TObject | null,
  kind: K
): ObjectOfKind<TObject, K> {
  if (target === null || !isKind(target, kind)) {
    throw new GatewayError({
      kind: "TypeMismatch",
      message: `${name}: handle does not reference a ${kind}`,
    });
  }
  return target;
}

/**
 * Returns builders bound to one collaborator's object union.
 *
 * Usage:
 *   const define = createDefinitions<WalletObject>();
 *   const getBalance = define.targetMethod({ name: "get_balance", target: "wallet", input, handler });
 */
export function createDefinitions<TObject extends NativeObject>() {
  return {
    method<S extends ZodTypeAny>(config: {
      name: string;
      input: S;
      handler: (args: z.output<S>, ctx: HandlerContext<TObject>) => Promise<unknown>;
    }): MethodDefinition<TObject> {
      return {
        type: "method",
        name: config.name,
        target: null,
        bind(args) {
          const parsed = config.input.safeParse(args);
          if (!parsed.success) return { ok: false, error: parsed.error };
          const data: z.output<S> = parsed.data;
          return { ok: true, run: (_target, ctx) => config.handler(data, ctx) };
        },
      };
    },

    targetMethod<K extends TObject["kind"], S extends ZodTypeAny>(config: {
      name: string;
      target: K;
      input: S;
      handler: (
        args: z.output<S>,
        target: ObjectOfKind<TObject, K>,
        ctx: HandlerContext<TObject>
      ) => Promise<unknown>;
    }): MethodDefinition<TObject> {
      return {
        type: "method",
        name: config.name,
        target: config.target,
        bind(args) {
          const parsed = config.input.safeParse(args);
          if (!parsed.success) return { ok: false, error: parsed.error };
          const data: z.output<S> = parsed.data;
          return {
            ok: true,
            run: async (target, ctx) =>
              config.handler(data, narrowTarget(config.name, target, config.target), ctx),
          };
        },
      };
    },

    stream<S extends ZodTypeAny>(config: {
      name: string;
      input: S;
      open: (args: z.output<S>, ctx: HandlerContext<TObject>) => AsyncIterable<unknown>;
    }): StreamDefinition<TObject> {
      return {
        type: "stream",
        name: config.name,
        target: null,
        bind(args) {
          const parsed = config.input.safeParse(args);
          if (!parsed.success) return { ok: false, error: parsed.error };
          const data: z.output<S> = parsed.data;
          return { ok: true, run: (_target, ctx) => config.open(data, ctx) };
        },
      };
    },

    targetStream<K extends TObject["kind"], S extends ZodTypeAny>(config: {
      name: string;
      target: K;
      input: S;
      open: (
        args: z.output<S>,
        target: ObjectOfKind<TObject, K>,
        ctx: HandlerContext<TObject>
      ) => AsyncIterable<unknown>;
    }): StreamDefinition<TObject> {
      return {
        type: "stream",
        name: config.name,
        target: config.target,
        bind(args) {
          const parsed = config.input.safeParse(args);
          if (!parsed.success) return { ok: false, error: parsed.error };
          const data: z.output<S> = parsed.data;
          return {
            ok: true,
            run: (target, ctx) => config.open(data, narrowTarget(config.name, target, config.target), ctx),
          };
        },
      };
    },
  };
}
