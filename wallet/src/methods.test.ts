/**
 * Unit tests for the wallet dispatch-table configuration, run against the
 * in-memory engine without a gateway.
 */

import { describe, it, expect, vi } from "vitest";
import { GatewayError, type Handle, type HandlerContext } from "@walletgate/core";
import { accountStateJson, createWalletMethods, walletEventJson, type WalletObject } from "./methods.js";
import { InMemoryWalletEngine, accountState } from "./testing.js";

const PUBLIC_KEY = "0f".repeat(32);

// ── Helpers ─────────────────────────────────────────────────────────

function setup() {
  const engine = new InMemoryWalletEngine();
  const definitions = createWalletMethods(engine);
  const registered: WalletObject[] = [];
  const leases: Array<{ handle: Handle; released: boolean }> = [];
  const abort = new AbortController();

  const ctx: HandlerContext<WalletObject> = {
    requestId: "1",
    method: "test",
    handle: null,
    signal: abort.signal,
    objects: {
      register: (object): Handle => {
        registered.push(object);
        return BigInt(registered.length);
      },
      retain: (handle) => {
        const lease = { handle, released: false };
        leases.push(lease);
        return {
          release: () => {
            lease.released = true;
          },
        };
      },
    },
    runBlocking: async () => undefined,
    log: {},
  };

  function definition(name: string) {
    const found = definitions.find((d) => d.name === name);
    if (!found) throw new Error(`no definition ${name}`);
    return found;
  }

  async function call(name: string, args: unknown, target: WalletObject | null = null): Promise<unknown> {
    const found = definition(name);
    if (found.type !== "method") throw new Error(`${name} is a stream`);
    const bound = found.bind(args);
    if (!bound.ok) throw bound.error;
    return bound.run(target, ctx);
  }

  function open(name: string, target: WalletObject | null): AsyncIterator<unknown> {
    const found = definition(name);
    if (found.type !== "stream") throw new Error(`${name} is a method`);
    const bound = found.bind({});
    if (!bound.ok) throw bound.error;
    return bound.run(target, ctx)[Symbol.asyncIterator]();
  }

  async function walletTarget(): Promise<WalletObject> {
    await call("create_gql_transport", { url: "https://gql.test" });
    const [transport] = registered;
    if (!transport) throw new Error("no transport registered");
    ctx.handle = 1n;
    await call("subscribe_to_ton_wallet", { public_key: PUBLIC_KEY, contract_type: "Surf" }, transport);
    ctx.handle = null;
    const wallet = registered[1];
    if (!wallet) throw new Error("no wallet registered");
    return wallet;
  }

  return { ctx, engine, definitions, registered, leases, abort, definition, call, open, walletTarget };
}

// ── Tests ───────────────────────────────────────────────────────────

describe("createWalletMethods", () => {
  it("defines the wallet surface", () => {
    const { definitions } = setup();
    expect(definitions.map((d) => [d.name, d.type, d.target])).toEqual([
      ["wait", "method", null],
      ["create_gql_transport", "method", null],
      ["subscribe_to_ton_wallet", "method", "transport"],
      ["get_balance", "method", "wallet"],
      ["get_account_state", "method", "wallet"],
      ["get_wallet_info", "method", "wallet"],
      ["refresh", "method", "wallet"],
      ["wallet_events", "stream", "wallet"],
      ["wallet_balance", "stream", "wallet"],
    ]);
  });

  describe("wait", () => {
    it("resolves with null", async () => {
      const { call } = setup();
      await expect(call("wait", { seconds: 0 })).resolves.toBeNull();
    });

    it("refuses a negative duration", () => {
      const { definition } = setup();
      expect(definition("wait").bind({ seconds: -1 }).ok).toBe(false);
    });

    it("refuses a duration outside 32 unsigned bits", () => {
      const { definition } = setup();
      expect(definition("wait").bind({ seconds: 2 ** 32 }).ok).toBe(false);
      expect(definition("wait").bind({ seconds: 2 ** 32 - 1 }).ok).toBe(true);
      expect(definition("wait").bind({ seconds: 1.5 }).ok).toBe(false);
    });

    it("keeps waiting for a duration longer than one timer", async () => {
      vi.useFakeTimers();
      try {
        const { call } = setup();
        let done = false;
        const waiting = call("wait", { seconds: 3_000_000 }).then(() => {
          done = true;
        });
        await vi.advanceTimersByTimeAsync(2 ** 31);
        expect(done).toBe(false);
        await vi.advanceTimersByTimeAsync(3_000_000_000 - 2 ** 31);
        expect(done).toBe(true);
        await waiting;
      } finally {
        vi.useRealTimers();
      }
    });

    it("stops when the request is aborted", async () => {
      const { call, abort } = setup();
      const waiting = call("wait", { seconds: 60 });
      abort.abort();
      await expect(waiting).rejects.toMatchObject({ kind: "Cancelled" });
    });
  });

  describe("create_gql_transport", () => {
    it("registers a transport for the normalized url", async () => {
      const { call, engine, registered } = setup();
      await expect(call("create_gql_transport", { url: "https://gql.test/graphql" })).resolves.toEqual({
        handle: 1n,
      });
      expect(engine.transports.map((t) => t.url)).toEqual(["https://gql.test/graphql"]);
      expect(registered.map((o) => o.kind)).toEqual(["transport"]);
    });

    it("refuses a protocol other than http(s)", async () => {
      const { call } = setup();
      await expect(call("create_gql_transport", { url: "ftp://gql.test" })).rejects.toMatchObject({
        kind: "InvalidUrl",
        message: "Unsupported transport protocol: ftp:",
      });
    });

    it("reports an engine that cannot connect", async () => {
      const { call, engine } = setup();
      engine.transportFailure = new Error("connection refused");
      await expect(call("create_gql_transport", { url: "https://gql.test" })).rejects.toMatchObject({
        kind: "InvalidUrl",
        message: "Cannot connect to https://gql.test/: connection refused",
      });
    });

    it("closes the transport when its object is disposed", async () => {
      const { call, engine, registered } = setup();
      await call("create_gql_transport", { url: "https://gql.test" });
      await registered[0]?.dispose?.();
      expect(engine.transports[0]?.closed).toBe(true);
    });
  });

  describe("subscribe_to_ton_wallet", () => {
    it("lower-cases the public key", async () => {
      const { call, engine, registered } = setup();
      await call("create_gql_transport", { url: "https://gql.test" });
      const [transport] = registered;
      if (!transport) throw new Error("no transport registered");

      const result = await call(
        "subscribe_to_ton_wallet",
        { public_key: PUBLIC_KEY.toUpperCase(), contract_type: "WalletV3" },
        transport
      );
      expect(result).toEqual({ handle: 2n, address: `0:${PUBLIC_KEY}` });
      expect(engine.wallets[0]?.publicKey).toBe(PUBLIC_KEY);
    });

    it("holds its transport until the wallet is disposed", async () => {
      const { walletTarget, leases, engine } = setup();
      const wallet = await walletTarget();
      expect(leases).toEqual([{ handle: 1n, released: false }]);

      await wallet.dispose?.();
      expect(engine.wallets[0]?.closed).toBe(true);
      expect(leases).toEqual([{ handle: 1n, released: true }]);
    });

    it("returns the transport when the engine cannot subscribe", async () => {
      const { ctx, call, engine, registered, leases } = setup();
      await call("create_gql_transport", { url: "https://gql.test" });
      engine.subscribeFailure = new Error("node unreachable");
      ctx.handle = 1n;
      await expect(
        call("subscribe_to_ton_wallet", { public_key: PUBLIC_KEY, contract_type: "Surf" }, registered[0] ?? null)
      ).rejects.toMatchObject({ kind: "FailedToSubscribeToTonWallet", message: "node unreachable" });
      expect(leases).toEqual([{ handle: 1n, released: true }]);
    });

    it("refuses an unknown contract type", () => {
      const { definition } = setup();
      const bound = definition("subscribe_to_ton_wallet").bind({ public_key: PUBLIC_KEY, contract_type: "Legacy" });
      expect(bound.ok).toBe(false);
    });

    it("passes cancellation through unchanged", async () => {
      const { call, engine, registered } = setup();
      await call("create_gql_transport", { url: "https://gql.test" });
      engine.subscribeFailure = new GatewayError({ kind: "Cancelled", message: "Runtime shut down" });
      await expect(
        call("subscribe_to_ton_wallet", { public_key: PUBLIC_KEY, contract_type: "Surf" }, registered[0] ?? null)
      ).rejects.toMatchObject({ kind: "Cancelled", message: "Runtime shut down" });
    });

    it("refuses a wallet handle as its target", async () => {
      const { call, walletTarget } = setup();
      const wallet = await walletTarget();
      await expect(
        call("subscribe_to_ton_wallet", { public_key: PUBLIC_KEY, contract_type: "Surf" }, wallet)
      ).rejects.toMatchObject({
        kind: "TypeMismatch",
        message: "subscribe_to_ton_wallet: handle does not reference a transport",
      });
    });
  });

  describe("wallet queries", () => {
    it("maps the account state", async () => {
      const { call, engine, walletTarget } = setup();
      engine.initialState = accountState({
        balance: 1_500n,
        genTimings: { genLt: 42n, genUtime: 1_700_000_000 },
        lastTransactionId: { lt: 41n, hash: "beef" },
        isDeployed: true,
      });
      const wallet = await walletTarget();

      await expect(call("get_account_state", {}, wallet)).resolves.toEqual({
        balance: 1_500n,
        gen_timings: { gen_lt: 42n, gen_utime: 1_700_000_000 },
        last_transaction_id: { lt: 41n, hash: "beef" },
        is_deployed: true,
      });
      await expect(call("get_balance", {}, wallet)).resolves.toEqual({ balance: 1_500n });
    });

    it("refreshes the wallet", async () => {
      const { call, engine, walletTarget } = setup();
      const wallet = await walletTarget();
      await expect(call("refresh", {}, wallet)).resolves.toBeNull();
      expect(engine.wallets[0]?.refreshCount).toBe(1);
    });
  });

  describe("streams", () => {
    it("yields balances from state changes only", async () => {
      const { open, engine, walletTarget } = setup();
      const wallet = await walletTarget();
      const iterator = open("wallet_balance", wallet);
      const first = iterator.next();

      const source = engine.wallets[0];
      if (!source) throw new Error("no wallet");
      source.emit({ type: "message_expired", pendingTransaction: { bodyHash: "aa", expireAt: 1 } });
      source.setState({ balance: 9n });

      await expect(first).resolves.toEqual({ value: { balance: 9n }, done: false });
      source.endStreams();
      await expect(iterator.next()).resolves.toEqual({ value: undefined, done: true });
    });
  });
});

describe("walletEventJson", () => {
  it("maps found transactions", () => {
    const tx = {
      id: { lt: 10n, hash: "aa" },
      prevTransactionId: null,
      createdAt: 1_700_000_000,
      aborted: false,
      totalFees: 3n,
    };
    expect(
      walletEventJson({
        type: "transactions_found",
        transactions: [tx],
        batchInfo: { minLt: 10n, maxLt: 10n, batchType: "new" },
      })
    ).toEqual({
      type: "transactions_found",
      transactions: [
        {
          id: { lt: 10n, hash: "aa" },
          prev_transaction_id: null,
          created_at: 1_700_000_000,
          aborted: false,
          total_fees: 3n,
        },
      ],
      batch_info: { min_lt: 10n, max_lt: 10n, batch_type: "new" },
    });
  });

  it("maps a sent message without a transaction", () => {
    expect(
      walletEventJson({
        type: "message_sent",
        pendingTransaction: { bodyHash: "bb", expireAt: 60 },
        transaction: null,
      })
    ).toEqual({ type: "message_sent", pending_transaction: { body_hash: "bb", expire_at: 60 }, transaction: null });
  });
});

describe("accountStateJson", () => {
  it("writes null for a missing last transaction", () => {
    expect(accountStateJson(accountState())).toEqual({
      balance: 0n,
      gen_timings: { gen_lt: 0n, gen_utime: 0 },
      last_transaction_id: null,
      is_deployed: false,
    });
  });
});
