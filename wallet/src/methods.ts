/**
 * Wallet dispatch-table configuration: the methods and streams a host can
 * call, over the wallet's own native object kinds.
 */

import { z } from "zod";
import {
  createDefinitions,
  delay,
  describeError,
  isGatewayError,
  type Definition,
  type NativeObject,
  type ObjectLease,
} from "@walletgate/core";
import {
  CONTRACT_TYPES,
  type AccountState,
  type GqlTransport,
  type PendingTransaction,
  type TonWallet,
  type Transaction,
  type TransactionId,
  type WalletEngine,
  type WalletEvent,
} from "./engine.js";
import { walletError } from "./errors.js";

const LOG_PREFIX = "walletgate:wallet";

// ── Native objects ──────────────────────────────────────────────────

export interface TransportObject extends NativeObject {
  readonly kind: "transport";
  readonly transport: GqlTransport;
}

export interface WalletObjectRef extends NativeObject {
  readonly kind: "wallet";
  readonly wallet: TonWallet;
}

export type WalletObject = TransportObject | WalletObjectRef;

function transportObject(transport: GqlTransport): TransportObject {
  return { kind: "transport", transport, dispose: () => transport.close?.() };
}

/** The wallet holds its transport until it is disposed. */
function walletObject(wallet: TonWallet, transport: ObjectLease | null): WalletObjectRef {
  return {
    kind: "wallet",
    wallet,
    dispose: async () => {
      try {
        await wallet.close?.();
      } finally {
        transport?.release();
      }
    },
  };
}

// ── Arguments ───────────────────────────────────────────────────────

const PUBLIC_KEY = /^[0-9a-fA-F]{64}$/;

function parseEndpoint(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (err) {
    throw walletError("InvalidUrl", `Invalid transport url: ${url}`, err);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw walletError("InvalidUrl", `Unsupported transport protocol: ${parsed.protocol}`);
  }
  return parsed.href;
}

function parsePublicKey(publicKey: string): string {
  if (!PUBLIC_KEY.test(publicKey)) {
    throw walletError("InvalidPublicKey", "Public key must be 32 bytes of hex");
  }
  return publicKey.toLowerCase();
}

const NoArgs = z.object({}).passthrough();

/** `wait` takes an unsigned 32-bit count of seconds. */
const MAX_WAIT_SECONDS = 0xffff_ffff;

// ── Results ─────────────────────────────────────────────────────────

function transactionIdJson(id: TransactionId) {
  return { lt: id.lt, hash: id.hash };
}

export function accountStateJson(state: AccountState) {
  return {
    balance: state.balance,
    gen_timings: { gen_lt: state.genTimings.genLt, gen_utime: state.genTimings.genUtime },
    last_transaction_id: state.lastTransactionId ? transactionIdJson(state.lastTransactionId) : null,
    is_deployed: state.isDeployed,
  };
}

function transactionJson(tx: Transaction) {
  return {
    id: transactionIdJson(tx.id),
    prev_transaction_id: tx.prevTransactionId ? transactionIdJson(tx.prevTransactionId) : null,
    created_at: tx.createdAt,
    aborted: tx.aborted,
    total_fees: tx.totalFees,
  };
}

function pendingJson(pending: PendingTransaction) {
  return { body_hash: pending.bodyHash, expire_at: pending.expireAt };
}

export function walletEventJson(event: WalletEvent) {
  switch (event.type) {
    case "state_changed":
      return { type: event.type, state: accountStateJson(event.state) };
    case "transactions_found":
      return {
        type: event.type,
        transactions: event.transactions.map(transactionJson),
        batch_info: {
          min_lt: event.batchInfo.minLt,
          max_lt: event.batchInfo.maxLt,
          batch_type: event.batchInfo.batchType,
        },
      };
    case "message_sent":
      return {
        type: event.type,
        pending_transaction: pendingJson(event.pendingTransaction),
        transaction: event.transaction ? transactionJson(event.transaction) : null,
      };
    case "message_expired":
      return { type: event.type, pending_transaction: pendingJson(event.pendingTransaction) };
  }
}

async function* mapEvents<R>(
  source: AsyncIterable<WalletEvent>,
  map: (event: WalletEvent) => R | null
): AsyncGenerator<R> {
  for await (const event of source) {
    const value = map(event);
    if (value !== null) yield value;
  }
}

// ── Definitions ─────────────────────────────────────────────────────

const define = createDefinitions<WalletObject>();

export function createWalletMethods(engine: WalletEngine): Definition<WalletObject>[] {
  return [
    define.method({
      name: "wait",
      input: z.object({ seconds: z.number().int().min(0).max(MAX_WAIT_SECONDS) }),
      handler: async ({ seconds }, ctx) => {
        await delay(seconds * 1000, ctx.signal);
        return null;
      },
    }),

    define.method({
      name: "create_gql_transport",
      input: z.object({ url: z.string() }),
      handler: async ({ url }, ctx) => {
        const endpoint = parseEndpoint(url);
        let transport: GqlTransport;
        try {
          transport = await engine.createTransport({ url: endpoint });
        } catch (err) {
          throw walletError("InvalidUrl", `Cannot connect to ${endpoint}: ${describeError(err)}`, err);
        }
        return { handle: ctx.objects.register(transportObject(transport)) };
      },
    }),

    define.targetMethod({
      name: "subscribe_to_ton_wallet",
      target: "transport",
      input: z.object({ public_key: z.string(), contract_type: z.enum(CONTRACT_TYPES) }),
      handler: async (args, target, ctx) => {
        const publicKey = parsePublicKey(args.public_key);
        const transportLease = ctx.handle === null ? null : ctx.objects.retain(ctx.handle);
        let wallet: TonWallet;
        try {
          wallet = await engine.subscribeWallet({
            transport: target.transport,
            publicKey,
            contractType: args.contract_type,
            signal: ctx.signal,
          });
        } catch (err) {
          transportLease?.release();
          if (isGatewayError(err) && err.kind === "Cancelled") throw err;
          throw walletError("FailedToSubscribeToTonWallet", describeError(err), err);
        }
        ctx.log.debug?.(
          { address: wallet.address, contractType: wallet.contractType },
          `${LOG_PREFIX}:subscribe_to_ton_wallet - Subscribed`
        );
        return { handle: ctx.objects.register(walletObject(wallet, transportLease)), address: wallet.address };
      },
    }),

    define.targetMethod({
      name: "get_balance",
      target: "wallet",
      input: NoArgs,
      handler: async (_args, target) => ({ balance: target.wallet.accountState().balance }),
    }),

    define.targetMethod({
      name: "get_account_state",
      target: "wallet",
      input: NoArgs,
      handler: async (_args, target) => accountStateJson(target.wallet.accountState()),
    }),

    define.targetMethod({
      name: "get_wallet_info",
      target: "wallet",
      input: NoArgs,
      handler: async (_args, { wallet }) => ({
        address: wallet.address,
        public_key: wallet.publicKey,
        contract_type: wallet.contractType,
      }),
    }),

    define.targetMethod({
      name: "refresh",
      target: "wallet",
      input: NoArgs,
      handler: async (_args, target, ctx) => {
        await target.wallet.refresh(ctx.signal);
        return null;
      },
    }),

    define.targetStream({
      name: "wallet_events",
      target: "wallet",
      input: NoArgs,
      open: (_args, target, ctx) => mapEvents(target.wallet.events(ctx.signal), walletEventJson),
    }),

    define.targetStream({
      name: "wallet_balance",
      target: "wallet",
      input: NoArgs,
      open: (_args, target, ctx) =>
        mapEvents(target.wallet.events(ctx.signal), (event) =>
          event.type === "state_changed" ? { balance: event.state.balance } : null
        ),
    }),
  ];
}
