/**
 * Callback delivery channel.
 *
 * Requests: dispatched → completed → delivered once → discarded. A second
 * completion for the same request is dropped.
 *
 * Subscriptions: events are posted in production order with a gap-free
 * `seq`; exactly one final event closes the stream.
 */

import {
  encodeEvent,
  encodeResponse,
  encodeWide,
  toErrorBody,
  type Handle,
  type Logger,
  type PendingState,
  type PortId,
  type ResponseEnvelope,
} from "@walletgate/core";
import type { PortRegistry } from "./ports.js";

const LOG_PREFIX = "walletgate:delivery";

export interface PendingOperation {
  requestId: string;
  method: string;
  portId: PortId;
  startedAt: number;
  state: PendingState;
}

export class DeliveryChannel {
  private readonly ports: PortRegistry;
  private readonly log: Logger;
  private readonly clock: { now(): number };
  private pending = new Map<string, PendingOperation>();

  constructor(params: { ports: PortRegistry; log?: Logger; clock?: { now(): number } }) {
    this.ports = params.ports;
    this.log = params.log ?? {};
    this.clock = params.clock ?? { now: () => Date.now() };
  }

  /** Record a dispatched request awaiting its response. */
  begin(params: { requestId: string; method: string; portId: PortId }): PendingOperation {
    const op: PendingOperation = { ...params, startedAt: this.clock.now(), state: "dispatched" };
    this.pending.set(params.requestId, op);
    return op;
  }

  /**
   * Deliver the one response of a request. Returns false if the request
   * already completed (the response is dropped) or is unknown.
   */
  complete(requestId: string, response: ResponseEnvelope): boolean {
    const op = this.pending.get(requestId);
    if (!op || op.state !== "dispatched") {
      this.log.warn?.({ requestId }, `${LOG_PREFIX}:complete - Request already completed, dropping response`);
      return false;
    }
    op.state = "completed";
    this.pending.delete(requestId);

    let message: string;
    try {
      message = encodeResponse(requestId, response);
    } catch (err) {
      message = encodeResponse(requestId, {
        outcome: "err",
        error: toErrorBody(err, `${op.method}: result could not be encoded`),
      });
    }
    const delivered = this.ports.post(op.portId, message, true);
    this.log.debug?.(
      {
        requestId,
        method: op.method,
        outcome: response.outcome,
        delivered,
        durationMs: this.clock.now() - op.startedAt,
      },
      `${LOG_PREFIX}:complete - Response delivered`
    );
    return true;
  }

  isPending(requestId: string): boolean {
    return this.pending.has(requestId);
  }

  pendingIds(): string[] {
    return [...this.pending.keys()];
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  openEventStream(subscription: Handle, portId: PortId): EventStream {
    return new EventStream({ subscription, portId, ports: this.ports, log: this.log });
  }
}

/**
 * Ordered event sink for one subscription.
 */
export class EventStream {
  readonly subscription: Handle;
  readonly portId: PortId;
  private readonly ports: PortRegistry;
  private readonly log: Logger;
  private seq = 0;
  private closed = false;

  constructor(params: { subscription: Handle; portId: PortId; ports: PortRegistry; log: Logger }) {
    this.subscription = params.subscription;
    this.portId = params.portId;
    this.ports = params.ports;
    this.log = params.log;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get delivered(): number {
    return this.seq;
  }

  /**
   * Post one event. Returns false once the stream is closed. Throws if the
   * payload cannot be encoded; nothing is posted in that case.
   */
  emit(payload: unknown): boolean {
    if (this.closed) return false;
    const message = encodeEvent({
      subscription: this.subscription,
      seq: this.seq,
      final: false,
      outcome: "ok",
      payload,
    });
    this.seq++;
    this.ports.post(this.portId, message, false);
    return true;
  }

  /** Post the final event. Only the first call has an effect. */
  finish(outcome: ResponseEnvelope): boolean {
    if (this.closed) return false;
    this.closed = true;
    let message: string;
    try {
      message = encodeEvent({ subscription: this.subscription, seq: this.seq, final: true, ...outcome });
    } catch (err) {
      message = encodeEvent({
        subscription: this.subscription,
        seq: this.seq,
        final: true,
        outcome: "err",
        error: toErrorBody(err, "final event could not be encoded"),
      });
    }
    this.seq++;
    this.ports.post(this.portId, message, true);
    this.log.debug?.(
      { subscription: encodeWide(this.subscription), outcome: outcome.outcome, events: this.seq },
      `${LOG_PREFIX}:finish - Stream closed`
    );
    return true;
  }
}
