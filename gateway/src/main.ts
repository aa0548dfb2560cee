/**
 * Gateway process: loads config and the wallet engine, builds the dispatch
 * table, serves hosts over NATS, and tears everything down once on
 * SIGTERM/SIGINT.
 */

import "dotenv/config";
import { isAbsolute, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { connect } from "nats";
import { createWalletMethods, type CreateWalletEngine } from "@walletgate/wallet";
import { loadConfig } from "./config.js";
import { createNodeJSLogger } from "./logger.js";
import { NatsHostBridge } from "./nats-bridge.js";
import { initGateway, teardownGateway } from "./process.js";

const SERVICE_NAME = "walletgate";

function isEngineFactory(value: unknown): value is CreateWalletEngine {
  return typeof value === "function";
}

/** Paths resolve against the working directory; package names import as-is. */
function toSpecifier(engineModule: string): string {
  if (engineModule.startsWith(".") || isAbsolute(engineModule)) {
    return pathToFileURL(resolve(engineModule)).href;
  }
  return engineModule;
}

async function loadEngineFactory(engineModule: string): Promise<CreateWalletEngine> {
  const specifier = toSpecifier(engineModule);
  const mod: Record<string, unknown> = await import(specifier);
  const factory = mod.createWalletEngine;
  if (!isEngineFactory(factory)) {
    throw new Error(`${engineModule} does not export createWalletEngine`);
  }
  return factory;
}

async function main(): Promise<void> {
  const bootLog = createNodeJSLogger(SERVICE_NAME).get(`${SERVICE_NAME}:main`);
  const config = loadConfig({ log: bootLog });
  const loggerFactory = createNodeJSLogger(config.connectionName, { level: config.logLevel });
  const log = loggerFactory.get(`${SERVICE_NAME}:main`);

  if (!config.engineModule) {
    throw new Error("ENGINE_MODULE is not set");
  }
  const createEngine = await loadEngineFactory(config.engineModule);
  const engine = await createEngine({ ...config });

  const gateway = initGateway({
    definitions: createWalletMethods(engine),
    workerThreads: config.workerThreads,
    shutdownGraceMs: config.shutdownGraceMs,
    cancelTimeoutMs: config.cancelTimeoutMs,
    log: loggerFactory,
  });

  log.info?.({ commsUrl: config.commsUrl, connectionName: config.connectionName }, `${SERVICE_NAME}:main - Connecting`);
  const connection = await connect({ servers: config.commsUrl, name: config.connectionName });
  const bridge = new NatsHostBridge({
    gateway,
    connection,
    subjectPrefix: config.subjectPrefix,
    queue: config.connectionName,
    log: loggerFactory.get("walletgate:nats-bridge"),
  });
  bridge.start();
  log.info?.({ subjectPrefix: config.subjectPrefix }, `${SERVICE_NAME}:main - Started`);

  let stopping: Promise<void> | null = null;
  const shutdown = (signal: string): Promise<void> => {
    if (!stopping) {
      stopping = (async () => {
        log.info?.({ signal }, `${SERVICE_NAME}:main - Shutting down`);
        await bridge.stop();
        await teardownGateway();
        await connection.drain();
        process.exit(0);
      })();
    }
    return stopping;
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      console.error(`${SERVICE_NAME}:main - Shutdown failed:`, err);
      process.exit(1);
    });
  };
  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}

main().catch((err) => {
  console.error(`${SERVICE_NAME}:main - Fatal:`, err);
  process.exit(1);
});
