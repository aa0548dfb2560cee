/**
 * NATS host bridge: lets an out-of-process host reach the gateway.
 *
 *   {prefix}.dispatch     { method, handle?, args? }                → response envelope on the reply subject
 *   {prefix}.subscribe    { method, handle?, args?, event_subject } → { status, handle, error? }; events on event_subject
 *   {prefix}.unsubscribe  { handle }                                → { status }
 *   {prefix}.release      { handle }                                → { status }
 *
 * Reply subjects and event subjects become transient ports, released after
 * their final message.
 */

import { StringCodec } from "nats";
import type { z } from "zod";
import {
  DispatchRequestSchema,
  HandleRequestSchema,
  StatusCode,
  SubscribeRequestSchema,
  encodeResponse,
  encodeWide,
  type ErrorBody,
  type Handle,
  type Logger,
  type NativeObject,
} from "@walletgate/core";
import type { Gateway } from "./gateway.js";

const LOG_PREFIX = "walletgate:nats-bridge";

const sc = StringCodec();

// ── Connection surface (satisfied by NatsConnection) ────────────────

export interface BridgeMessage {
  readonly subject: string;
  readonly reply?: string;
  readonly data: Uint8Array;
  respond(data?: Uint8Array): boolean;
}

export interface BridgeSubscription extends AsyncIterable<BridgeMessage> {
  drain(): Promise<void>;
}

export interface BridgeConnection {
  subscribe(subject: string, opts?: { queue?: string }): BridgeSubscription;
  publish(subject: string, data?: Uint8Array): void;
}

export type GatewayEntryPoints = Pick<
  Gateway<NativeObject>,
  "dispatch" | "subscribe" | "unsubscribe" | "releaseHandle" | "registerPort" | "unregisterPort"
>;

export interface NatsHostBridgeParams {
  gateway: GatewayEntryPoints;
  connection: BridgeConnection;
  subjectPrefix: string;
  /** Queue group, so several gateway processes can share the subjects */
  queue?: string;
  log?: Logger;
}

type Parsed<T> = { ok: true; data: T } | { ok: false; error: ErrorBody };

/** request_id used in replies to dispatch bodies that never became a request */
const UNASSIGNED_REQUEST_ID = "0";

// ── Bridge ──────────────────────────────────────────────────────────

export class NatsHostBridge {
  private readonly gateway: GatewayEntryPoints;
  private readonly connection: BridgeConnection;
  private readonly prefix: string;
  private readonly queue?: string;
  private readonly log: Logger;
  private subscriptions: BridgeSubscription[] = [];
  private opened = new Set<Handle>();
  private running = false;

  constructor(params: NatsHostBridgeParams) {
    this.gateway = params.gateway;
    this.connection = params.connection;
    this.prefix = params.subjectPrefix;
    this.queue = params.queue;
    this.log = params.log ?? {};
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Subscriptions opened through the bridge that have not ended yet. */
  get openSubscriptions(): number {
    return this.opened.size;
  }

  /** Subscribe to the bridge subjects and start serving. */
  start(): void {
    if (this.running) {
      this.log.warn?.({}, `${LOG_PREFIX}:start - Already running`);
      return;
    }
    this.running = true;
    this.serve("dispatch", (msg) => this.handleDispatch(msg));
    this.serve("subscribe", (msg) => this.handleSubscribe(msg));
    this.serve("unsubscribe", (msg) => this.handleUnsubscribe(msg));
    this.serve("release", (msg) => this.handleRelease(msg));
    this.log.info?.({ prefix: this.prefix, queue: this.queue }, `${LOG_PREFIX}:start - Serving`);
  }

  /**
   * Drain the bridge subjects and cancel the subscriptions opened through
   * the bridge (their final events are still published).
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.log.info?.({ subscriptions: this.opened.size }, `${LOG_PREFIX}:stop - Stopping`);
    for (const sub of this.subscriptions) {
      await sub.drain();
    }
    this.subscriptions = [];
    for (const handle of this.opened) {
      this.gateway.unsubscribe(handle);
    }
    this.opened.clear();
    this.log.info?.({}, `${LOG_PREFIX}:stop - Stopped`);
  }

  // ── Subject loops ─────────────────────────────────────────────────

  private serve(operation: string, handler: (msg: BridgeMessage) => void): void {
    const subject = `${this.prefix}.${operation}`;
    const sub = this.connection.subscribe(subject, this.queue ? { queue: this.queue } : undefined);
    this.subscriptions.push(sub);
    (async () => {
      for await (const msg of sub) {
        try {
          handler(msg);
        } catch (err) {
          this.log.error?.(
            { subject, error: err instanceof Error ? err.message : String(err) },
            `${LOG_PREFIX}:serve - Handle failed`
          );
          this.reply(msg, { status: StatusCode.InternalError });
        }
      }
    })().catch((err: unknown) => {
      this.log.error?.(
        { subject, error: err instanceof Error ? err.message : String(err) },
        `${LOG_PREFIX}:serve - Subject loop error`
      );
    });
  }

  // ── Handlers ──────────────────────────────────────────────────────

  private handleDispatch(msg: BridgeMessage): void {
    const parsed = this.parse(msg, DispatchRequestSchema);
    if (!parsed.ok) {
      this.respond(msg, encodeResponse(UNASSIGNED_REQUEST_ID, { outcome: "err", error: parsed.error }));
      return;
    }
    if (!msg.reply) {
      this.log.warn?.({ method: parsed.data.method }, `${LOG_PREFIX}:dispatch - No reply subject, dropping request`);
      return;
    }
    const { method, handle, args } = parsed.data;
    const portId = this.gateway.registerPort({ post: (message) => this.respond(msg, message) }, { transient: true });
    const result = this.gateway.dispatch(method, JSON.stringify(args ?? {}), handle ?? null, portId);
    if (result.status !== StatusCode.Ok) {
      this.gateway.unregisterPort(portId);
      this.log.warn?.({ method, status: result.status }, `${LOG_PREFIX}:dispatch - Dispatch refused`);
    }
  }

  private handleSubscribe(msg: BridgeMessage): void {
    const parsed = this.parse(msg, SubscribeRequestSchema);
    if (!parsed.ok) {
      this.reply(msg, { status: StatusCode.InvalidArgument, handle: "0", error: parsed.error });
      return;
    }
    const { method, handle, args, event_subject: eventSubject } = parsed.data;
    // A final event posted before subscribe returns keeps the handle out of `opened`.
    let settled = false;
    let subscription: Handle | null = null;
    const portId = this.gateway.registerPort(
      {
        post: (message, final) => {
          this.connection.publish(eventSubject, sc.encode(message));
          if (!final) return;
          settled = true;
          if (subscription !== null) this.opened.delete(subscription);
        },
      },
      { transient: true }
    );
    const result = this.gateway.subscribe(method, JSON.stringify(args ?? {}), handle ?? null, portId);
    if (result.status === StatusCode.Ok) {
      if (!settled) {
        subscription = result.handle;
        this.opened.add(subscription);
      }
    } else {
      this.gateway.unregisterPort(portId);
    }
    this.reply(msg, {
      status: result.status,
      handle: encodeWide(result.handle),
      ...(result.error ? { error: result.error } : {}),
    });
  }

  private handleUnsubscribe(msg: BridgeMessage): void {
    const parsed = this.parse(msg, HandleRequestSchema);
    if (!parsed.ok) {
      this.reply(msg, { status: StatusCode.InvalidArgument, error: parsed.error });
      return;
    }
    this.opened.delete(parsed.data.handle);
    this.reply(msg, { status: this.gateway.unsubscribe(parsed.data.handle) });
  }

  private handleRelease(msg: BridgeMessage): void {
    const parsed = this.parse(msg, HandleRequestSchema);
    if (!parsed.ok) {
      this.reply(msg, { status: StatusCode.InvalidArgument, error: parsed.error });
      return;
    }
    this.opened.delete(parsed.data.handle);
    this.reply(msg, { status: this.gateway.releaseHandle(parsed.data.handle) });
  }

  // ── Helpers ───────────────────────────────────────────────────────

  private parse<S extends z.ZodTypeAny>(msg: BridgeMessage, schema: S): Parsed<z.output<S>> {
    let body: unknown;
    try {
      body = JSON.parse(sc.decode(msg.data));
    } catch (err) {
      return {
        ok: false,
        error: {
          kind: "InvalidArgument",
          message: `${msg.subject}: body is not valid JSON (${err instanceof Error ? err.message : String(err)})`,
        },
      };
    }
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      return {
        ok: false,
        error: {
          kind: "InvalidArgument",
          message: `${msg.subject}: invalid request body`,
          details: parsed.error.flatten(),
        },
      };
    }
    const data: z.output<S> = parsed.data;
    return { ok: true, data };
  }

  private reply(msg: BridgeMessage, body: Record<string, unknown>): void {
    this.respond(msg, JSON.stringify(body));
  }

  private respond(msg: BridgeMessage, text: string): void {
    if (!msg.reply) return;
    if (!msg.respond(sc.encode(text))) {
      this.log.warn?.({ subject: msg.subject }, `${LOG_PREFIX}:respond - Reply not sent`);
    }
  }
}
