/**
 * Host ports: the only way results and events reach the host.
 *
 * A port's `post` only enqueues; the host runs the callback later on its own
 * event loop. Every delivery is a message, never a direct call into host code.
 */

import type { MessagePort } from "node:worker_threads";
import type { Logger, PortId } from "@walletgate/core";

const LOG_PREFIX = "walletgate:ports";

export interface CompletionPort {
  /** `final` is set on a response and on the last event of a subscription. */
  post(message: string, final: boolean): void;
}

export interface PortOptions {
  /** Release the port after its final message (a response, or a final event) */
  transient?: boolean;
}

interface PortEntry {
  port: CompletionPort;
  transient: boolean;
}

export class PortRegistry {
  private ports = new Map<PortId, PortEntry>();
  private nextPortId: PortId = 1;
  private readonly log: Logger;

  constructor(params: { log?: Logger } = {}) {
    this.log = params.log ?? {};
  }

  register(port: CompletionPort, options: PortOptions = {}): PortId {
    const id = this.nextPortId++;
    this.ports.set(id, { port, transient: options.transient ?? false });
    return id;
  }

  unregister(id: PortId): boolean {
    return this.ports.delete(id);
  }

  has(id: PortId): boolean {
    return this.ports.has(id);
  }

  get size(): number {
    return this.ports.size;
  }

  /**
   * Post a message. Returns false when the port is unknown or throws; a
   * throwing port is unregistered. `final` releases transient ports.
   */
  post(id: PortId, message: string, final: boolean): boolean {
    const entry = this.ports.get(id);
    if (!entry) {
      this.log.warn?.({ portId: id }, `${LOG_PREFIX}:post - Port not registered, dropping message`);
      return false;
    }
    if (final && entry.transient) this.ports.delete(id);
    try {
      entry.port.post(message, final);
      return true;
    } catch (err) {
      this.ports.delete(id);
      this.log.error?.(
        { portId: id, error: err instanceof Error ? err.message : String(err) },
        `${LOG_PREFIX}:post - Port threw, unregistered it`
      );
      return false;
    }
  }
}

/**
 * Port backed by a worker_threads MessagePort. The receiving side gets the
 * JSON text as a `message` event on its own thread's event loop.
 */
export class MessagePortSink implements CompletionPort {
  private readonly port: MessagePort;
  private closed = false;

  constructor(port: MessagePort) {
    this.port = port;
    port.once("close", () => {
      this.closed = true;
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  post(message: string): void {
    if (this.closed) throw new Error("MessagePort is closed");
    this.port.postMessage(message);
  }

  /** Register this sink and unregister it when the port closes. */
  static attach(registry: PortRegistry, port: MessagePort, options?: PortOptions): PortId {
    const sink = new MessagePortSink(port);
    const id = registry.register(sink, options);
    port.once("close", () => registry.unregister(id));
    return id;
  }
}

/**
 * Port that runs `callback` on a later turn of the event loop, the way a
 * single-threaded host schedules a delivered message.
 */
export function createCallbackPort(callback: (message: string) => void, log: Logger = {}): CompletionPort {
  return {
    post(message) {
      setImmediate(() => {
        try {
          callback(message);
        } catch (err) {
          log.error?.(
            { error: err instanceof Error ? err.message : String(err) },
            `${LOG_PREFIX}:callback - Host callback threw`
          );
        }
      });
    },
  };
}
