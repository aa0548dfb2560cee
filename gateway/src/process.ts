/**
 * Process-wide gateway instance. Created once, torn down once.
 */

import type { NativeObject } from "@walletgate/core";
import { Gateway, type GatewayParams } from "./gateway.js";

/** Entry points of the process gateway, independent of its object kinds. */
export type ProcessGateway = Pick<
  Gateway<NativeObject>,
  | "dispatch"
  | "subscribe"
  | "unsubscribe"
  | "releaseHandle"
  | "registerPort"
  | "unregisterPort"
  | "shutdown"
  | "has"
  | "runtimeState"
  | "pendingRequests"
>;

let instance: ProcessGateway | null = null;
let teardown: Promise<void> | null = null;

/**
 * Create the process gateway. Throws if one was already created (even if it
 * has since been torn down).
 */
export function initGateway<TObject extends NativeObject>(params: GatewayParams<TObject>): Gateway<TObject> {
  if (instance || teardown) {
    throw new Error("initGateway: gateway already initialized");
  }
  const gateway = new Gateway(params);
  instance = gateway;
  return gateway;
}

/** The process gateway; throws before `initGateway`. */
export function getGateway(): ProcessGateway {
  if (!instance) {
    throw new Error("getGateway: gateway not initialized");
  }
  return instance;
}

/** Shut the process gateway down. Later calls return the same promise. */
export function teardownGateway(): Promise<void> {
  if (!teardown) {
    teardown = instance ? instance.shutdown() : Promise.resolve();
  }
  return teardown;
}

/** Forget the process gateway (tests only). */
export function resetGatewayForTests(): void {
  instance = null;
  teardown = null;
}
