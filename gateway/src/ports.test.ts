import { once } from "node:events";
import { MessageChannel } from "node:worker_threads";
import { describe, it, expect, vi } from "vitest";
import { MessagePortSink, PortRegistry, createCallbackPort } from "./ports.js";
import { RecordingPort } from "./testing.js";

const nextTurn = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("PortRegistry", () => {
  it("posts to a registered port", () => {
    const registry = new PortRegistry();
    const port = new RecordingPort();
    const id = registry.register(port);

    expect(id).toBe(1);
    expect(registry.post(id, "hello", false)).toBe(true);
    expect(port.messages).toEqual(["hello"]);
  });

  it("drops messages for an unknown port", () => {
    const warn = vi.fn();
    const registry = new PortRegistry({ log: { warn } });
    expect(registry.post(7, "lost", true)).toBe(false);
    expect(warn).toHaveBeenCalledWith({ portId: 7 }, "walletgate:ports:post - Port not registered, dropping message");
  });

  it("releases a transient port after its final message", () => {
    const registry = new PortRegistry();
    const port = new RecordingPort();
    const id = registry.register(port, { transient: true });

    registry.post(id, "event", false);
    expect(registry.has(id)).toBe(true);
    registry.post(id, "last", true);
    expect(registry.has(id)).toBe(false);
    expect(port.messages).toEqual(["event", "last"]);
  });

  it("keeps a long-lived port after a final message", () => {
    const registry = new PortRegistry();
    const id = registry.register(new RecordingPort());
    registry.post(id, "response", true);
    expect(registry.has(id)).toBe(true);
  });

  it("tells the port which message is final", () => {
    const registry = new PortRegistry();
    const post = vi.fn();
    const id = registry.register({ post });
    registry.post(id, "event", false);
    registry.post(id, "last", true);
    expect(post.mock.calls).toEqual([
      ["event", false],
      ["last", true],
    ]);
  });

  it("unregisters a port that throws and keeps the others", () => {
    const error = vi.fn();
    const registry = new PortRegistry({ log: { error } });
    const broken = registry.register({
      post: () => {
        throw new Error("host gone");
      },
    });
    const healthy = new RecordingPort();
    const healthyId = registry.register(healthy);

    expect(registry.post(broken, "a", false)).toBe(false);
    expect(registry.has(broken)).toBe(false);
    expect(error).toHaveBeenCalledWith({ portId: 1, error: "host gone" }, "walletgate:ports:post - Port threw, unregistered it");

    expect(registry.post(healthyId, "b", false)).toBe(true);
    expect(healthy.messages).toEqual(["b"]);
  });
});

describe("createCallbackPort", () => {
  it("runs the callback on a later turn", async () => {
    const callback = vi.fn();
    const port = createCallbackPort(callback);

    port.post("later", false);
    expect(callback).not.toHaveBeenCalled();

    await nextTurn();
    expect(callback).toHaveBeenCalledWith("later");
  });

  it("logs a throwing callback", async () => {
    const error = vi.fn();
    const port = createCallbackPort(() => {
      throw new Error("host bug");
    }, { error });

    port.post("x", true);
    await nextTurn();
    expect(error).toHaveBeenCalledWith({ error: "host bug" }, "walletgate:ports:callback - Host callback threw");
  });
});

describe("MessagePortSink", () => {
  it("delivers to the other end of a channel and unregisters on close", async () => {
    const registry = new PortRegistry();
    const { port1, port2 } = new MessageChannel();
    const id = MessagePortSink.attach(registry, port1);

    const received = once(port2, "message");
    registry.post(id, '{"request_id":"1"}', false);
    expect(await received).toEqual(['{"request_id":"1"}']);

    const closed = once(port1, "close");
    port2.close();
    await closed;
    expect(registry.has(id)).toBe(false);
  });
});
