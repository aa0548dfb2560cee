/**
 * Test helpers: a port that records what the gateway posts to it.
 */

import type { z } from "zod";
import { WireEventSchema, WireResponseSchema, deferred, type Deferred } from "@walletgate/core";
import type { CompletionPort } from "./ports.js";

export type RecordedResponse = z.output<typeof WireResponseSchema>;
export type RecordedEvent = z.output<typeof WireEventSchema>;

interface CountWaiter {
  count: number;
  done: Deferred<string[]>;
}

export class RecordingPort implements CompletionPort {
  readonly messages: string[] = [];
  private waiters: CountWaiter[] = [];

  post(message: string): void {
    this.messages.push(message);
    const ready = this.waiters.filter((w) => this.messages.length >= w.count);
    this.waiters = this.waiters.filter((w) => this.messages.length < w.count);
    for (const waiter of ready) waiter.done.resolve([...this.messages]);
  }

  /** Messages parsed as response envelopes. */
  responses(): RecordedResponse[] {
    return this.messages.map((m) => WireResponseSchema.parse(JSON.parse(m)));
  }

  /** Messages parsed as subscription events. */
  events(): RecordedEvent[] {
    return this.messages.map((m) => WireEventSchema.parse(JSON.parse(m)));
  }

  /** Resolves once at least `count` messages arrived. */
  waitFor(count: number, timeoutMs = 2_000): Promise<string[]> {
    if (this.messages.length >= count) return Promise.resolve([...this.messages]);
    const done = deferred<string[]>();
    const waiter: CountWaiter = { count, done };
    this.waiters.push(waiter);
    const timer = setTimeout(() => {
      this.waiters = this.waiters.filter((w) => w !== waiter);
      done.reject(new Error(`RecordingPort: expected ${count} messages, got ${this.messages.length}`));
    }, timeoutMs);
    return done.promise.finally(() => clearTimeout(timer));
  }

  /** Resolves with the first response once it arrived. */
  async nextResponse(timeoutMs?: number): Promise<RecordedResponse> {
    await this.waitFor(1, timeoutMs);
    const [first] = this.responses();
    if (!first) throw new Error("RecordingPort: no response");
    return first;
  }
}
