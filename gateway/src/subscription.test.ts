import { describe, it, expect, vi } from "vitest";
import { AsyncQueue, type Logger } from "@walletgate/core";
import { DeliveryChannel } from "./delivery.js";
import { PortRegistry } from "./ports.js";
import { Subscription } from "./subscription.js";
import { RecordingPort } from "./testing.js";

function setup(log: Logger = {}) {
  const ports = new PortRegistry();
  const port = new RecordingPort();
  const delivery = new DeliveryChannel({ ports });
  const settled = vi.fn();
  const subscription = new Subscription({
    method: "ticker",
    parent: null,
    cancelTimeoutMs: 20,
    log,
    onSettled: settled,
  });
  subscription.attach(delivery.openEventStream(5n, ports.register(port)));
  return { port, subscription, settled };
}

/** An iterable whose iterator never yields and never closes. */
function stuck(): AsyncIterable<unknown> {
  return {
    [Symbol.asyncIterator]: () => ({
      next: () => new Promise<IteratorResult<unknown>>(() => {}),
      return: () => new Promise<IteratorResult<unknown>>(() => {}),
    }),
  };
}

describe("Subscription", () => {
  it("completes with a final null event when the stream ends", async () => {
    const { port, subscription, settled } = setup();
    const queue = new AsyncQueue<unknown>();
    queue.push({ tick: 1 });
    queue.end();

    await subscription.pump(() => queue);
    expect(subscription.state).toBe("completed");
    expect(port.events()).toEqual([
      { request_id: "5", subscription: "5", seq: 0, final: false, outcome: "ok", payload: { tick: 1 } },
      { request_id: "5", subscription: "5", seq: 1, final: true, outcome: "ok", payload: null },
    ]);
    expect(settled).toHaveBeenCalledTimes(1);
    expect(settled).toHaveBeenCalledWith(subscription);
  });

  it("ends errored when the stream fails", async () => {
    const { port, subscription } = setup();
    const queue = new AsyncQueue<unknown>();
    queue.fail(new Error("lost"));

    await subscription.pump(() => queue);
    expect(subscription.state).toBe("errored");
    expect(subscription.signal.aborted).toBe(true);
    expect(port.events()).toEqual([
      {
        request_id: "5",
        subscription: "5",
        seq: 0,
        final: true,
        outcome: "err",
        error: { kind: "InternalError", message: "ticker: stream failed: lost" },
      },
    ]);
  });

  it("ends errored when an event cannot be encoded", async () => {
    const { port, subscription } = setup();
    const queue = new AsyncQueue<unknown>();
    queue.push({ lt: 2 ** 60 });

    await subscription.pump(() => queue);
    expect(port.events()).toEqual([
      {
        request_id: "5",
        subscription: "5",
        seq: 0,
        final: true,
        outcome: "err",
        error: { kind: "InternalError", message: "Unsafe integer at $.lt; wide values must be bigint" },
      },
    ]);
    expect(queue.isClosed).toBe(true);
  });

  it("cancels once and delivers nothing afterwards", async () => {
    const { port, subscription, settled } = setup();
    const queue = new AsyncQueue<unknown>();
    const pumping = subscription.pump(() => queue);

    expect(subscription.cancel("Unsubscribed")).toBe(true);
    expect(subscription.cancel("again")).toBe(false);
    queue.push({ tick: 2 });
    await pumping;

    expect(subscription.state).toBe("cancelled");
    expect(port.events()).toEqual([
      {
        request_id: "5",
        subscription: "5",
        seq: 0,
        final: true,
        outcome: "err",
        error: { kind: "Cancelled", message: "Unsubscribed" },
      },
    ]);
    expect(settled).toHaveBeenCalledTimes(1);
  });

  it("warns when a cancelled stream does not stop in time", async () => {
    const warn = vi.fn();
    const { subscription } = setup({ warn });
    void subscription.pump(stuck);

    subscription.cancel("Unsubscribed");
    await vi.waitFor(() =>
      expect(warn).toHaveBeenCalledWith(
        { subscription: "5", method: "ticker", timeoutMs: 20 },
        "walletgate:subscription:cancel - Stream did not stop in time"
      )
    );
  });

  it("cancels on dispose", () => {
    const { port, subscription } = setup();
    subscription.dispose();
    expect(port.events()).toMatchObject([{ final: true, error: { message: "Subscription released" } }]);
  });

  it("detaches its parent watch when it settles", () => {
    const { subscription } = setup();
    const detach = vi.fn();
    subscription.watchParent(detach);
    expect(detach).not.toHaveBeenCalled();

    subscription.cancel("Unsubscribed");
    expect(detach).toHaveBeenCalledTimes(1);

    const late = vi.fn();
    subscription.watchParent(late);
    expect(late).toHaveBeenCalledTimes(1);
  });
});
