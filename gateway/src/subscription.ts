/**
 * Subscription: a registry object bound to one event stream.
 *
 *   active → cancelled | errored | completed
 *
 * Every transition out of `active` posts the stream's final event. Once
 * terminal, nothing the stream produces is delivered.
 */

import {
  GatewayError,
  encodeWide,
  toErrorResponse,
  type Handle,
  type Logger,
  type NativeObject,
  type ResponseEnvelope,
  type SubscriptionState,
} from "@walletgate/core";
import type { EventStream } from "./delivery.js";

const LOG_PREFIX = "walletgate:subscription";

export interface SubscriptionParams {
  method: string;
  /** Handle of the object the stream observes; never retained */
  parent: Handle | null;
  cancelTimeoutMs: number;
  log?: Logger;
  /** Called once, after the final event was posted */
  onSettled?: (subscription: Subscription) => void;
}

export class Subscription implements NativeObject {
  readonly kind = "subscription";
  readonly method: string;
  readonly parent: Handle | null;
  private readonly cancelTimeoutMs: number;
  private readonly log: Logger;
  private readonly onSettled?: (subscription: Subscription) => void;
  private readonly abort = new AbortController();
  private current: SubscriptionState = "active";
  private events: EventStream | null = null;
  private iterator: AsyncIterator<unknown> | null = null;
  private detachParent: (() => void) | null = null;

  constructor(params: SubscriptionParams) {
    this.method = params.method;
    this.parent = params.parent;
    this.cancelTimeoutMs = params.cancelTimeoutMs;
    this.log = params.log ?? {};
    this.onSettled = params.onSettled;
  }

  get state(): SubscriptionState {
    return this.current;
  }

  get isTerminal(): boolean {
    return this.current !== "active";
  }

  /** Aborted when the subscription is cancelled. */
  get signal(): AbortSignal {
    return this.abort.signal;
  }

  get handle(): Handle | null {
    return this.events?.subscription ?? null;
  }

  /** Bind the event sink. Must happen before `pump`. */
  attach(events: EventStream): void {
    this.events = events;
  }

  /** Run `detach` once the subscription settles (parent listener removal). */
  watchParent(detach: () => void): void {
    if (this.isTerminal) {
      detach();
      return;
    }
    this.detachParent = detach;
  }

  /**
   * Pull the stream until it ends, fails, or the subscription is cancelled.
   * Resolves once the loop exits; never rejects.
   */
  async pump(open: () => AsyncIterable<unknown>): Promise<void> {
    if (this.isTerminal) return;
    try {
      const iterator = open()[Symbol.asyncIterator]();
      this.iterator = iterator;
      while (!this.isTerminal) {
        const result = await iterator.next();
        if (this.isTerminal) return;
        if (result.done) {
          this.settle("completed", { outcome: "ok", payload: null });
          return;
        }
        this.requireEvents().emit(result.value);
      }
    } catch (err) {
      if (this.isTerminal) return;
      this.log.warn?.(
        { subscription: this.describeHandle(), method: this.method, error: err instanceof Error ? err.message : String(err) },
        `${LOG_PREFIX}:pump - Stream failed`
      );
      this.settle("errored", toErrorResponse(err, `${this.method}: stream failed`));
      this.abort.abort(err);
      await this.closeIterator();
    }
  }

  /**
   * Cancel: terminal at once, final `Cancelled` event posted, stream
   * signal aborted, iterator closed. Returns false if already terminal.
   */
  cancel(reason: string): boolean {
    if (this.isTerminal) return false;
    const error = new GatewayError({ kind: "Cancelled", message: reason });
    this.settle("cancelled", { outcome: "err", error: error.toBody() });
    this.abort.abort(error);
    void this.closeIterator();
    return true;
  }

  dispose(): void {
    this.cancel("Subscription released");
  }

  private settle(state: Exclude<SubscriptionState, "active">, outcome: ResponseEnvelope): void {
    this.current = state;
    this.events?.finish(outcome);
    const detach = this.detachParent;
    this.detachParent = null;
    detach?.();
    this.log.debug?.(
      { subscription: this.describeHandle(), method: this.method, state },
      `${LOG_PREFIX}:settle - Subscription settled`
    );
    this.onSettled?.(this);
  }

  private requireEvents(): EventStream {
    if (!this.events) {
      throw new GatewayError({ kind: "InternalError", message: `${this.method}: subscription has no event port` });
    }
    return this.events;
  }

  /** Ask the iterator to stop; warn if it does not settle in time. */
  private async closeIterator(): Promise<void> {
    const iterator = this.iterator;
    this.iterator = null;
    if (!iterator?.return) return;
    const onError = (err: unknown) => {
      this.log.warn?.(
        { subscription: this.describeHandle(), method: this.method, error: err instanceof Error ? err.message : String(err) },
        `${LOG_PREFIX}:cancel - Stream threw while closing`
      );
      return "closed" as const;
    };
    let closed: Promise<"closed">;
    try {
      closed = Promise.resolve(iterator.return()).then(() => "closed" as const, onError);
    } catch (err) {
      onError(err);
      return;
    }
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), this.cancelTimeoutMs);
    });
    const outcome = await Promise.race([closed, timeout]);
    clearTimeout(timer);
    if (outcome === "timeout") {
      this.log.warn?.(
        { subscription: this.describeHandle(), method: this.method, timeoutMs: this.cancelTimeoutMs },
        `${LOG_PREFIX}:cancel - Stream did not stop in time`
      );
    }
  }

  private describeHandle(): string | null {
    const handle = this.handle;
    return handle === null ? null : encodeWide(handle);
  }
}
