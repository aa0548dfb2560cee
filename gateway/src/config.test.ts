import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { defaultGatewayConfig, loadConfig } from "./config.js";

let dir = "";

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "walletgate-config-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function writeConfig(name: string, content: string): string {
  const path = join(dir, name);
  writeFileSync(path, content);
  return path;
}

describe("loadConfig", () => {
  it("returns the defaults for an empty environment", () => {
    expect(loadConfig({ env: {} })).toEqual(defaultGatewayConfig());
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      env: {
        WORKER_THREADS: "4",
        SHUTDOWN_GRACE_MS: "250",
        CANCEL_TIMEOUT_MS: "0",
        COMMS_URL: "nats://comms:4222",
        SERVICE_NAME: "gateway-a",
        SUBJECT_PREFIX: "wg",
        ENGINE_MODULE: "./engine.js",
        LOG_LEVEL: "debug",
      },
    });
    expect(config).toEqual({
      workerThreads: 4,
      shutdownGraceMs: 250,
      cancelTimeoutMs: 0,
      commsUrl: "nats://comms:4222",
      connectionName: "gateway-a",
      subjectPrefix: "wg",
      engineModule: "./engine.js",
      logLevel: "debug",
    });
  });

  it("logs and skips invalid environment values", () => {
    const warn = vi.fn();
    const config = loadConfig({ env: { WORKER_THREADS: "zero", LOG_LEVEL: "trace" }, log: { warn } });

    expect(config.workerThreads).toBe(defaultGatewayConfig().workerThreads);
    expect(config.logLevel).toBe("info");
    expect(warn).toHaveBeenCalledWith(
      { variable: "WORKER_THREADS", value: "zero" },
      "walletgate:config:loadConfig - Invalid value, ignoring it"
    );
    expect(warn).toHaveBeenCalledWith(
      { variable: "LOG_LEVEL", value: "trace" },
      "walletgate:config:loadConfig - Invalid value, ignoring it"
    );
  });

  it("layers the environment over the config file", () => {
    const info = vi.fn();
    const path = writeConfig("gateway.json", JSON.stringify({ workerThreads: 2, commsUrl: "nats://file:4222" }));
    const config = loadConfig({ env: { CONFIG_PATH: path, COMMS_URL: "nats://env:4222" }, log: { info } });

    expect(config.workerThreads).toBe(2);
    expect(config.commsUrl).toBe("nats://env:4222");
    expect(info).toHaveBeenCalledWith({ configPath: path }, "walletgate:config:loadConfig - Loaded config from file");
  });

  it("warns about a missing config file", () => {
    const warn = vi.fn();
    const path = join(dir, "missing.json");
    expect(loadConfig({ env: { CONFIG_PATH: path }, log: { warn } })).toEqual(defaultGatewayConfig());
    expect(warn).toHaveBeenCalledWith({ configPath: path }, "walletgate:config:loadConfig - Config file not found");
  });

  it("ignores a config file that fails validation", () => {
    const error = vi.fn();
    const path = writeConfig("invalid.json", JSON.stringify({ workerThreads: -1 }));
    const config = loadConfig({ env: { CONFIG_PATH: path }, log: { error } });

    expect(config.workerThreads).toBe(defaultGatewayConfig().workerThreads);
    expect(error).toHaveBeenCalledWith(
      expect.objectContaining({ configPath: path }),
      "walletgate:config:loadConfig - Invalid config file, ignoring it"
    );
  });

  it("ignores a config file that is not JSON", () => {
    const error = vi.fn();
    const path = writeConfig("broken.json", "{ workerThreads: 2");
    expect(loadConfig({ env: { CONFIG_PATH: path }, log: { error } })).toEqual(defaultGatewayConfig());
    expect(error).toHaveBeenCalledWith(
      expect.objectContaining({ configPath: path }),
      "walletgate:config:loadConfig - Failed to load config file"
    );
  });
});
