/**
 * Handle registry: opaque 64-bit handles → reference-counted native objects.
 *
 * The registry owns one reference to each object. An operation that resolves
 * a handle takes a lease (one more reference) and returns it when done, so
 * releasing the handle while the operation runs only drops the registry's
 * reference; the object is disposed when the last reference goes.
 *
 * Registry calls never run handler logic. The event loop serializes every
 * map mutation, so a lookup never waits on an unrelated handle.
 */

import {
  GatewayError,
  INVALID_HANDLE,
  encodeWide,
  isKind,
  type Handle,
  type Logger,
  type NativeObject,
  type ObjectOfKind,
} from "@walletgate/core";

const LOG_PREFIX = "walletgate:handle-registry";

export type DisposeListener = () => void;

/**
 * Reference-counted cell holding one native object.
 */
export class NativeRef<T extends NativeObject> {
  readonly handle: Handle;
  readonly object: T;
  private refs = 1;
  private disposed = false;
  private listeners = new Set<DisposeListener>();
  private readonly log: Logger;

  constructor(handle: Handle, object: T, log: Logger) {
    this.handle = handle;
    this.object = object;
    this.log = log;
  }

  get refCount(): number {
    return this.refs;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  retain(): boolean {
    if (this.disposed) return false;
    this.refs++;
    return true;
  }

  drop(): void {
    if (this.disposed) return;
    this.refs--;
    if (this.refs > 0) return;
    this.disposed = true;
    this.runDispose();
    const listeners = [...this.listeners];
    this.listeners.clear();
    for (const listener of listeners) {
      try {
        listener();
      } catch (err) {
        this.log.error?.(
          { handle: encodeWide(this.handle), error: err instanceof Error ? err.message : String(err) },
          `${LOG_PREFIX}:drop - Dispose listener threw`
        );
      }
    }
  }

  /** Register a listener for disposal; returns the unregister function. */
  onDispose(listener: DisposeListener): () => void {
    if (this.disposed) {
      listener();
      return () => {};
    }
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private runDispose(): void {
    const dispose = this.object.dispose;
    if (!dispose) return;
    const report = (err: unknown) =>
      this.log.error?.(
        { handle: encodeWide(this.handle), kind: this.object.kind, error: err instanceof Error ? err.message : String(err) },
        `${LOG_PREFIX}:dispose - Native object dispose failed`
      );
    try {
      const result = dispose.call(this.object);
      if (result instanceof Promise) result.catch(report);
    } catch (err) {
      report(err);
    }
  }
}

/**
 * A retained reference held by an in-flight operation.
 */
export interface Lease<T extends NativeObject> {
  readonly handle: Handle;
  readonly object: T;
  readonly ref: NativeRef<T>;
  release(): void;
}

export type LookupResult<T> = { found: true; object: T } | { found: false };

export type ReleaseResult = "released" | "not_found";

export class HandleRegistry<T extends NativeObject> {
  private entries = new Map<Handle, NativeRef<T>>();
  private nextHandle: Handle = 1n;
  private readonly log: Logger;

  constructor(params: { log?: Logger } = {}) {
    this.log = params.log ?? {};
  }

  /** Store an object and return its new handle. */
  register(object: T): Handle {
    const handle = this.nextHandle;
    this.nextHandle += 1n;
    this.entries.set(handle, new NativeRef(handle, object, this.log));
    this.log.debug?.({ handle: encodeWide(handle), kind: object.kind }, `${LOG_PREFIX}:register - Registered`);
    return handle;
  }

  lookup(handle: Handle): LookupResult<T> {
    const ref = this.entries.get(handle);
    return ref ? { found: true, object: ref.object } : { found: false };
  }

  /** Like lookup, failing with HandleNotFound or TypeMismatch. */
  lookupAs<K extends T["kind"]>(handle: Handle, kind: K): ObjectOfKind<T, K> {
    const ref = this.getRef(handle);
    const object = ref.object;
    if (!isKind(object, kind)) {
      throw new GatewayError({
        kind: "TypeMismatch",
        message: `Handle ${encodeWide(handle)} references a ${object.kind}, expected ${kind}`,
      });
    }
    return object;
  }

  /** The live reference cell for a handle; fails with HandleNotFound. */
  getRef(handle: Handle): NativeRef<T> {
    const ref = handle === INVALID_HANDLE ? undefined : this.entries.get(handle);
    if (!ref) {
      throw new GatewayError({
        kind: "HandleNotFound",
        message: `Handle ${encodeWide(handle)} is not registered`,
      });
    }
    return ref;
  }

  /**
   * Resolve a handle and retain its object for the duration of an
   * operation. Fails with HandleNotFound.
   */
  acquire(handle: Handle): Lease<T> {
    return this.retain(this.getRef(handle));
  }

  /**
   * Take another lease on a reference cell, whether or not its handle is
   * still registered. Fails with HandleNotFound once the object is disposed.
   */
  retain(ref: NativeRef<T>): Lease<T> {
    if (!ref.retain()) {
      throw new GatewayError({
        kind: "HandleNotFound",
        message: `Handle ${encodeWide(ref.handle)} is being destroyed`,
      });
    }
    let released = false;
    return {
      handle: ref.handle,
      object: ref.object,
      ref,
      release: () => {
        if (released) return;
        released = true;
        ref.drop();
      },
    };
  }

  /**
   * Remove a handle. The object is disposed once in-flight leases are
   * returned.
   */
  release(handle: Handle): ReleaseResult {
    const ref = this.entries.get(handle);
    if (!ref) return "not_found";
    this.entries.delete(handle);
    this.log.debug?.(
      { handle: encodeWide(handle), kind: ref.object.kind, leases: ref.refCount - 1 },
      `${LOG_PREFIX}:release - Released`
    );
    ref.drop();
    return "released";
  }

  /**
   * Run `listener` when the object behind `handle` is disposed, without
   * retaining it. Returns the unregister function.
   */
  onDispose(handle: Handle, listener: DisposeListener): () => void {
    return this.getRef(handle).onDispose(listener);
  }

  has(handle: Handle): boolean {
    return this.entries.has(handle);
  }

  handles(): Handle[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }

  /** Release every handle. */
  clear(): void {
    for (const handle of this.handles()) this.release(handle);
  }
}
