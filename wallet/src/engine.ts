/**
 * Typed surface of the wallet engine the gateway exposes.
 *
 * The engine itself (GraphQL transport, wallet contracts, signing) lives
 * outside this repo; a deployment names the module that provides it.
 */

// ── Contracts ───────────────────────────────────────────────────────

export const CONTRACT_TYPES = [
  "SafeMultisig",
  "SafeMultisig24h",
  "SetcodeMultisig",
  "Surf",
  "WalletV3",
] as const;

export type ContractType = (typeof CONTRACT_TYPES)[number];

// ── Account & Transactions ──────────────────────────────────────────

export interface TransactionId {
  lt: bigint;
  hash: string;
}

export interface AccountState {
  /** Balance in nano-units */
  balance: bigint;
  genTimings: { genLt: bigint; genUtime: number };
  lastTransactionId: TransactionId | null;
  isDeployed: boolean;
}

export interface Transaction {
  id: TransactionId;
  prevTransactionId: TransactionId | null;
  createdAt: number;
  aborted: boolean;
  totalFees: bigint;
}

export interface PendingTransaction {
  bodyHash: string;
  expireAt: number;
}

export interface TransactionsBatchInfo {
  minLt: bigint;
  maxLt: bigint;
  batchType: "old" | "new";
}

export type WalletEvent =
  | { type: "state_changed"; state: AccountState }
  | { type: "transactions_found"; transactions: Transaction[]; batchInfo: TransactionsBatchInfo }
  | { type: "message_sent"; pendingTransaction: PendingTransaction; transaction: Transaction | null }
  | { type: "message_expired"; pendingTransaction: PendingTransaction };

// ── Engine objects ──────────────────────────────────────────────────

export interface GqlTransport {
  readonly url: string;
  close?(): void | Promise<void>;
}

export interface TonWallet {
  readonly address: string;
  /** Lower-case hex */
  readonly publicKey: string;
  readonly contractType: ContractType;
  accountState(): AccountState;
  refresh(signal: AbortSignal): Promise<void>;
  /** Wallet notifications until `signal` aborts or the wallet closes */
  events(signal: AbortSignal): AsyncIterable<WalletEvent>;
  close?(): void | Promise<void>;
}

export interface WalletEngine {
  /** Throws if the endpoint cannot be used */
  createTransport(params: { url: string }): GqlTransport | Promise<GqlTransport>;
  subscribeWallet(params: {
    transport: GqlTransport;
    publicKey: string;
    contractType: ContractType;
    signal: AbortSignal;
  }): Promise<TonWallet>;
}

/** Export a collaborator module provides for the gateway process. */
export type CreateWalletEngine = (config: Record<string, unknown>) => WalletEngine | Promise<WalletEngine>;
