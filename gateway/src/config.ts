/**
 * Gateway process configuration: executor sizing, shutdown timing, the NATS
 * host bridge and the collaborator module.
 */

import { readFileSync, existsSync } from "node:fs";
import { availableParallelism } from "node:os";
import { z } from "zod";
import type { Logger } from "@walletgate/core";
import type { LogLevel } from "./logger.js";

const LOG_PREFIX = "walletgate:config";

export interface GatewayConfig {
  /** Threads in the blocking pool */
  workerThreads: number;
  /** Time pending requests get to finish on shutdown */
  shutdownGraceMs: number;
  /** Time a cancelled stream gets to settle before a warning is logged */
  cancelTimeoutMs: number;
  /** Comms server URL for the host bridge */
  commsUrl: string;
  /** Connection name (for debugging) */
  connectionName: string;
  /** Subject prefix of the host bridge (e.g. "walletgate.dispatch") */
  subjectPrefix: string;
  /** Module exporting createWalletEngine(config) */
  engineModule?: string;
  logLevel: LogLevel;
}

export function defaultGatewayConfig(): GatewayConfig {
  return {
    workerThreads: Math.max(1, availableParallelism()),
    shutdownGraceMs: 5_000,
    cancelTimeoutMs: 1_000,
    commsUrl: "nats://127.0.0.1:4222",
    connectionName: "walletgate",
    subjectPrefix: "walletgate",
    logLevel: "info",
  };
}

const FileConfigSchema = z
  .object({
    workerThreads: z.number().int().positive(),
    shutdownGraceMs: z.number().int().nonnegative(),
    cancelTimeoutMs: z.number().int().nonnegative(),
    commsUrl: z.string().min(1),
    connectionName: z.string().min(1),
    subjectPrefix: z.string().min(1),
    engineModule: z.string().min(1),
    logLevel: z.enum(["debug", "info", "warn", "error"]),
  })
  .partial();

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

type EnvField = {
  env: string;
  key: keyof GatewayConfig;
  schema: z.ZodTypeAny;
};

const ENV_FIELDS: EnvField[] = [
  { env: "WORKER_THREADS", key: "workerThreads", schema: positiveInt },
  { env: "SHUTDOWN_GRACE_MS", key: "shutdownGraceMs", schema: nonNegativeInt },
  { env: "CANCEL_TIMEOUT_MS", key: "cancelTimeoutMs", schema: nonNegativeInt },
  { env: "COMMS_URL", key: "commsUrl", schema: z.string().min(1) },
  { env: "SERVICE_NAME", key: "connectionName", schema: z.string().min(1) },
  { env: "SUBJECT_PREFIX", key: "subjectPrefix", schema: z.string().min(1) },
  { env: "ENGINE_MODULE", key: "engineModule", schema: z.string().min(1) },
  { env: "LOG_LEVEL", key: "logLevel", schema: z.enum(["debug", "info", "warn", "error"]) },
];

function readConfigFile(path: string, log: Logger): Partial<GatewayConfig> {
  if (!existsSync(path)) {
    log.warn?.({ configPath: path }, `${LOG_PREFIX}:loadConfig - Config file not found`);
    return {};
  }
  try {
    const data: unknown = JSON.parse(readFileSync(path, "utf-8"));
    const parsed = FileConfigSchema.safeParse(data);
    if (!parsed.success) {
      log.error?.(
        { configPath: path, errors: parsed.error.flatten() },
        `${LOG_PREFIX}:loadConfig - Invalid config file, ignoring it`
      );
      return {};
    }
    log.info?.({ configPath: path }, `${LOG_PREFIX}:loadConfig - Loaded config from file`);
    return parsed.data;
  } catch (err) {
    log.error?.(
      { configPath: path, error: err instanceof Error ? err.message : String(err) },
      `${LOG_PREFIX}:loadConfig - Failed to load config file`
    );
    return {};
  }
}

/**
 * Load config from defaults, an optional JSON file (CONFIG_PATH) and the
 * environment, in increasing precedence. Invalid values are logged and
 * skipped.
 */
export function loadConfig(params: { env?: NodeJS.ProcessEnv; log?: Logger } = {}): GatewayConfig {
  const env = params.env ?? process.env;
  const log = params.log ?? {};
  const config: GatewayConfig = defaultGatewayConfig();

  const configPath = env.CONFIG_PATH;
  if (configPath) {
    Object.assign(config, readConfigFile(configPath, log));
  }

  const fromEnv: Record<string, unknown> = {};
  for (const field of ENV_FIELDS) {
    const raw = env[field.env];
    if (raw === undefined || raw === "") continue;
    const parsed = field.schema.safeParse(raw);
    if (parsed.success) {
      fromEnv[field.key] = parsed.data;
    } else {
      log.warn?.({ variable: field.env, value: raw }, `${LOG_PREFIX}:loadConfig - Invalid value, ignoring it`);
    }
  }
  Object.assign(config, FileConfigSchema.parse(fromEnv));
  return config;
}
