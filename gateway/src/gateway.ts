/**
 * Gateway facade: the host's entry points.
 *
 * Every entry point returns a status at once; outcomes arrive later as
 * messages on host-registered ports. Requests travel through the middleware
 * pipeline (outermost first):
 *
 *   containment → runtime guard → decode → handle resolution → handler
 *
 * so every fault, thrown or rejected, becomes exactly one error response.
 */

import {
  GatewayError,
  INVALID_HANDLE,
  StatusCode,
  buildPipeline,
  decodePayload,
  encodeWide,
  linkSignals,
  resolveLogger,
  statusForKind,
  toGatewayError,
  type BoundCall,
  type Definition,
  type ErrorBody,
  type Handle,
  type HandlerContext,
  type Invocation,
  type InvocationCore,
  type Logger,
  type LoggerFactory,
  type MethodDefinition,
  type Middleware,
  type NativeObject,
  type PortId,
  type ResponseEnvelope,
} from "@walletgate/core";
import type { ZodError } from "zod";
import type { WorkerFactory } from "./blocking-pool.js";
import { defaultGatewayConfig } from "./config.js";
import { DeliveryChannel } from "./delivery.js";
import { DispatchTable } from "./dispatch-table.js";
import { HandleRegistry, type Lease } from "./handle-registry.js";
import { PortRegistry, type CompletionPort, type PortOptions } from "./ports.js";
import { RuntimeSupervisor, type RuntimeState } from "./runtime-supervisor.js";
import { Subscription } from "./subscription.js";

const LOG_PREFIX = "walletgate:gateway";

// ── Types ───────────────────────────────────────────────────────────

export interface GatewayParams<TObject extends NativeObject> {
  definitions: Iterable<Definition<TObject>>;
  workerThreads?: number;
  shutdownGraceMs?: number;
  cancelTimeoutMs?: number;
  log?: Logger | LoggerFactory;
  workerFactory?: WorkerFactory;
}

export interface DispatchResult {
  status: StatusCode;
  requestId: string;
}

export interface SubscribeResult {
  status: StatusCode;
  /** Subscription handle; INVALID_HANDLE on failure */
  handle: Handle;
  error?: ErrorBody;
}

type ReadyCall<TObject extends NativeObject, R> = Extract<BoundCall<TObject, R>, { ok: true }>;

interface DispatchState<TObject extends NativeObject> {
  definition: MethodDefinition<TObject> | null;
  call: ReadyCall<TObject, Promise<unknown>> | null;
  target: TObject | null;
  lease: Lease<TObject | Subscription> | null;
}

type DispatchMiddleware<TObject extends NativeObject> = Middleware<DispatchState<TObject>, ResponseEnvelope>;

function describeIssues(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "$"}: ${issue.message}`).join("; ");
}

// ── Gateway ─────────────────────────────────────────────────────────

export class Gateway<TObject extends NativeObject> {
  private readonly log: Logger;
  private readonly handlerLog: Logger;
  private readonly subscriptionLog: Logger;
  private readonly cancelTimeoutMs: number;
  private readonly table: DispatchTable<TObject>;
  private readonly registry: HandleRegistry<TObject | Subscription>;
  private readonly ports: PortRegistry;
  private readonly delivery: DeliveryChannel;
  private readonly supervisor: RuntimeSupervisor;
  private readonly pipeline: InvocationCore<DispatchState<TObject>, ResponseEnvelope>;
  private nextRequestId = 1;
  private shutdownPromise: Promise<void> | null = null;

  constructor(params: GatewayParams<TObject>) {
    const defaults = defaultGatewayConfig();
    this.log = resolveLogger(params.log, LOG_PREFIX);
    this.handlerLog = resolveLogger(params.log, "walletgate:handler");
    this.subscriptionLog = resolveLogger(params.log, "walletgate:subscription");
    this.cancelTimeoutMs = params.cancelTimeoutMs ?? defaults.cancelTimeoutMs;
    this.table = DispatchTable.build(params.definitions);
    this.registry = new HandleRegistry({ log: resolveLogger(params.log, "walletgate:handle-registry") });
    this.ports = new PortRegistry({ log: resolveLogger(params.log, "walletgate:ports") });
    this.delivery = new DeliveryChannel({ ports: this.ports, log: resolveLogger(params.log, "walletgate:delivery") });
    this.supervisor = new RuntimeSupervisor({
      workerThreads: params.workerThreads ?? defaults.workerThreads,
      shutdownGraceMs: params.shutdownGraceMs ?? defaults.shutdownGraceMs,
      workerFactory: params.workerFactory,
      log: resolveLogger(params.log, "walletgate:runtime-supervisor"),
    });
    this.pipeline = buildPipeline({
      middleware: [this.containment(), this.runtimeGuard(), this.decode(), this.resolveHandle()],
      core: this.invokeHandler(),
    });
  }

  get runtimeState(): RuntimeState {
    return this.supervisor.state;
  }

  get pendingRequests(): number {
    return this.delivery.pendingCount;
  }

  /** Whether `handle` is currently registered. */
  has(handle: Handle): boolean {
    return this.registry.has(handle);
  }

  // ── Ports ─────────────────────────────────────────────────────────

  registerPort(port: CompletionPort, options?: PortOptions): PortId {
    return this.ports.register(port, options);
  }

  unregisterPort(portId: PortId): boolean {
    return this.ports.unregister(portId);
  }

  // ── Entry points ──────────────────────────────────────────────────

  /**
   * Start a request/response call. Status Ok means exactly one response
   * will be posted to `completionPort`; InvalidPort means nothing will be.
   */
  dispatch(
    method: string,
    payload: string | Uint8Array,
    handle: Handle | null,
    completionPort: PortId
  ): DispatchResult {
    const requestId = String(this.nextRequestId++);
    if (!this.ports.has(completionPort)) {
      this.log.warn?.({ requestId, method, portId: completionPort }, `${LOG_PREFIX}:dispatch - Unknown completion port`);
      return { status: StatusCode.InvalidPort, requestId };
    }
    this.supervisor.ensureStarted();
    this.delivery.begin({ requestId, method, portId: completionPort });

    const invocation: Invocation<DispatchState<TObject>> = {
      requestId,
      method,
      handle,
      payload,
      completionPort,
      state: { definition: null, call: null, target: null, lease: null },
    };
    this.pipeline(invocation, this.supervisor.signal)
      .then((response) => {
        this.delivery.complete(requestId, response);
      })
      .catch((err: unknown) => {
        this.log.error?.(
          { requestId, method, error: err instanceof Error ? err.message : String(err) },
          `${LOG_PREFIX}:dispatch - Response delivery failed`
        );
      });
    return { status: StatusCode.Ok, requestId };
  }

  /**
   * Remove a handle. Releasing a subscription cancels it; any other object
   * is disposed once in-flight operations return their leases.
   */
  releaseHandle(handle: Handle): StatusCode {
    const found = this.registry.lookup(handle);
    if (!found.found) return StatusCode.HandleNotFound;
    if (found.object instanceof Subscription) {
      found.object.cancel("Subscription released");
    }
    this.registry.release(handle);
    return StatusCode.Ok;
  }

  /**
   * Open a stream. Events, then exactly one final event, are posted to
   * `eventPort`; their `request_id` is the returned subscription handle.
   */
  subscribe(
    method: string,
    payload: string | Uint8Array,
    handle: Handle | null,
    eventPort: PortId
  ): SubscribeResult {
    if (!this.ports.has(eventPort)) {
      return {
        status: StatusCode.InvalidPort,
        handle: INVALID_HANDLE,
        error: { kind: "InvalidArgument", message: `Event port ${eventPort} is not registered` },
      };
    }
    this.supervisor.ensureStarted();

    let lease: Lease<TObject | Subscription> | null = null;
    try {
      this.supervisor.assertAvailable();
      const definition = this.table.stream(method);
      const call = ready(method, definition.bind(decodePayload(method, payload)));
      let target: TObject | null = null;
      if (definition.target !== null) {
        const resolved = this.resolveTarget(method, handle, definition.target);
        lease = resolved.lease;
        target = resolved.target;
      }
      const parent = definition.target === null ? null : handle;
      const subscription = new Subscription({
        method,
        parent,
        cancelTimeoutMs: this.cancelTimeoutMs,
        log: this.subscriptionLog,
        onSettled: (settled) => this.onSubscriptionSettled(settled),
      });
      const subscriptionHandle = this.registry.register(subscription);
      subscription.attach(this.delivery.openEventStream(subscriptionHandle, eventPort));
      if (parent !== null) {
        subscription.watchParent(
          this.registry.onDispose(parent, () => subscription.cancel("Parent object destroyed"))
        );
      }

      const openLease = lease;
      lease = null;
      this.startStream(subscription, subscriptionHandle, call, target, openLease);
      this.log.debug?.(
        { method, subscription: encodeWide(subscriptionHandle) },
        `${LOG_PREFIX}:subscribe - Subscription opened`
      );
      return { status: StatusCode.Ok, handle: subscriptionHandle };
    } catch (err) {
      lease?.release();
      const error = toGatewayError(err, method);
      this.log.debug?.({ method, kind: error.kind, error: error.message }, `${LOG_PREFIX}:subscribe - Rejected`);
      return { status: statusForKind(error.kind), handle: INVALID_HANDLE, error: error.toBody() };
    }
  }

  /** Cancel a subscription; its final `Cancelled` event is posted at once. */
  unsubscribe(handle: Handle): StatusCode {
    const found = this.registry.lookup(handle);
    if (!found.found) return StatusCode.HandleNotFound;
    if (!(found.object instanceof Subscription)) return StatusCode.TypeMismatch;
    if (!found.object.cancel("Unsubscribed")) this.registry.release(handle);
    return StatusCode.Ok;
  }

  /**
   * Tear down: cancel subscriptions, drain the runtime, answer leftover
   * requests with `Cancelled`, clear the registry. Runs once.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.doShutdown();
    }
    return this.shutdownPromise;
  }

  private async doShutdown(): Promise<void> {
    this.log.info?.(
      { handles: this.registry.size, pending: this.delivery.pendingCount },
      `${LOG_PREFIX}:shutdown - Shutting down`
    );
    for (const handle of this.registry.handles()) {
      const found = this.registry.lookup(handle);
      if (found.found && found.object instanceof Subscription) {
        found.object.cancel("Runtime shut down");
      }
    }
    await this.supervisor.shutdown();
    for (const requestId of this.delivery.pendingIds()) {
      this.delivery.complete(requestId, {
        outcome: "err",
        error: { kind: "Cancelled", message: "Runtime shut down before the request completed" },
      });
    }
    this.registry.clear();
    this.log.info?.({}, `${LOG_PREFIX}:shutdown - Gateway stopped`);
  }

  // ── Streams ───────────────────────────────────────────────────────

  private startStream(
    subscription: Subscription,
    subscriptionHandle: Handle,
    call: ReadyCall<TObject, AsyncIterable<unknown>>,
    target: TObject | null,
    lease: Lease<TObject | Subscription> | null
  ): void {
    this.supervisor
      .spawn(async (runtimeSignal) => {
        const linked = linkSignals([runtimeSignal, subscription.signal]);
        const ctx = this.context(
          encodeWide(subscriptionHandle),
          subscription.method,
          subscription.parent,
          linked.signal,
          lease
        );
        try {
          // The parent is only held while the stream opens.
          await subscription.pump(() => {
            try {
              return call.run(target, ctx);
            } finally {
              lease?.release();
            }
          });
        } finally {
          lease?.release();
          linked.unlink();
        }
      })
      .catch((err: unknown) => {
        subscription.cancel(err instanceof Error ? err.message : String(err));
      });
  }

  private onSubscriptionSettled(subscription: Subscription): void {
    const handle = subscription.handle;
    if (handle !== null) this.registry.release(handle);
  }

  // ── Pipeline ──────────────────────────────────────────────────────

  private containment(): DispatchMiddleware<TObject> {
    return (next) => async (inv, signal) => {
      try {
        return await next(inv, signal);
      } catch (err) {
        const error = toGatewayError(err, inv.method);
        if (error.kind === "InternalError") {
          this.log.error?.(
            { requestId: inv.requestId, method: inv.method, error: error.message },
            `${LOG_PREFIX}:dispatch - Handler fault`
          );
        } else {
          this.log.debug?.(
            { requestId: inv.requestId, method: inv.method, kind: error.kind },
            `${LOG_PREFIX}:dispatch - Request failed`
          );
        }
        return { outcome: "err", error: error.toBody() };
      }
    };
  }

  private runtimeGuard(): DispatchMiddleware<TObject> {
    return (next) => async (inv, signal) => {
      this.supervisor.assertAvailable();
      return next(inv, signal);
    };
  }

  private decode(): DispatchMiddleware<TObject> {
    return (next) => async (inv, signal) => {
      const definition = this.table.method(inv.method);
      inv.state.definition = definition;
      inv.state.call = ready(inv.method, definition.bind(decodePayload(inv.method, inv.payload)));
      return next(inv, signal);
    };
  }

  private resolveHandle(): DispatchMiddleware<TObject> {
    return (next) => async (inv, signal) => {
      const kind = inv.state.definition?.target ?? null;
      if (kind === null) return next(inv, signal);
      const { lease, target } = this.resolveTarget(inv.method, inv.handle, kind);
      try {
        inv.state.target = target;
        inv.state.lease = lease;
        return await next(inv, signal);
      } finally {
        lease.release();
      }
    };
  }

  private invokeHandler(): InvocationCore<DispatchState<TObject>, ResponseEnvelope> {
    return async (inv) => {
      const call = inv.state.call;
      if (!call) {
        throw new GatewayError({ kind: "InternalError", message: `${inv.method}: request was not decoded` });
      }
      const { target, lease } = inv.state;
      const payload = await this.supervisor.spawn((signal) =>
        call.run(target, this.context(inv.requestId, inv.method, inv.handle, signal, lease))
      );
      return { outcome: "ok", payload };
    };
  }

  // ── Helpers ───────────────────────────────────────────────────────

  /**
   * Resolve and lease the object a call targets. Fails with
   * InvalidArgument (no handle), HandleNotFound or TypeMismatch.
   */
  private resolveTarget(
    method: string,
    handle: Handle | null,
    kind: TObject["kind"]
  ): { lease: Lease<TObject | Subscription>; target: TObject } {
    if (handle === null) {
      throw new GatewayError({ kind: "InvalidArgument", message: `${method}: a ${kind} handle is required` });
    }
    const lease = this.registry.acquire(handle);
    const object = lease.object;
    if (object instanceof Subscription || object.kind !== kind) {
      lease.release();
      throw new GatewayError({
        kind: "TypeMismatch",
        message: `${method}: handle ${encodeWide(handle)} references a ${object.kind}, expected ${kind}`,
      });
    }
    return { lease, target: object };
  }

  private context(
    requestId: string,
    method: string,
    handle: Handle | null,
    signal: AbortSignal,
    held: Lease<TObject | Subscription> | null = null
  ): HandlerContext<TObject> {
    return {
      requestId,
      method,
      handle,
      signal,
      objects: {
        register: (object) => this.registry.register(object),
        // The call's own target stays retainable after its handle is released.
        retain: (target) =>
          held !== null && held.handle === target ? this.registry.retain(held.ref) : this.registry.acquire(target),
      },
      runBlocking: (job) => this.supervisor.runBlocking(job),
      log: this.handlerLog,
    };
  }
}

function ready<TObject extends NativeObject, R>(method: string, bound: BoundCall<TObject, R>): ReadyCall<TObject, R> {
  if (bound.ok) return bound;
  throw new GatewayError({
    kind: "InvalidArgument",
    message: `${method}: invalid arguments (${describeIssues(bound.error)})`,
    details: bound.error.flatten(),
  });
}
