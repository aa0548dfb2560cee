/**
 * In-memory wallet engine for tests. Wallet state changes only when a test
 * drives it; nothing touches the network.
 */

import { AsyncQueue } from "@walletgate/core";
import type {
  AccountState,
  ContractType,
  GqlTransport,
  TonWallet,
  WalletEngine,
  WalletEvent,
} from "./engine.js";

export function accountState(overrides: Partial<AccountState> = {}): AccountState {
  return {
    balance: 0n,
    genTimings: { genLt: 0n, genUtime: 0 },
    lastTransactionId: null,
    isDeployed: false,
    ...overrides,
  };
}

export class InMemoryTransport implements GqlTransport {
  readonly url: string;
  closed = false;

  constructor(url: string) {
    this.url = url;
  }

  close(): void {
    this.closed = true;
  }
}

export class InMemoryTonWallet implements TonWallet {
  readonly address: string;
  readonly publicKey: string;
  readonly contractType: ContractType;
  closed = false;
  refreshCount = 0;
  private state: AccountState;
  private listeners = new Set<AsyncQueue<WalletEvent>>();

  constructor(params: { publicKey: string; contractType: ContractType; state?: AccountState }) {
    this.publicKey = params.publicKey;
    this.contractType = params.contractType;
    this.address = `0:${params.publicKey}`;
    this.state = params.state ?? accountState();
  }

  accountState(): AccountState {
    return this.state;
  }

  async refresh(_signal: AbortSignal): Promise<void> {
    this.refreshCount++;
  }

  events(signal: AbortSignal): AsyncIterable<WalletEvent> {
    const queue = new AsyncQueue<WalletEvent>(signal);
    if (this.closed) queue.end();
    else this.listeners.add(queue);
    return queue;
  }

  /** Replace the account state and notify listeners. */
  setState(overrides: Partial<AccountState>): void {
    this.state = { ...this.state, ...overrides };
    this.emit({ type: "state_changed", state: this.state });
  }

  emit(event: WalletEvent): void {
    for (const queue of this.listeners) {
      if (!queue.push(event)) this.listeners.delete(queue);
    }
  }

  /** Fail every open event stream. */
  failStreams(err: unknown): void {
    for (const queue of this.listeners) queue.fail(err);
    this.listeners.clear();
  }

  /** End every open event stream. */
  endStreams(): void {
    for (const queue of this.listeners) queue.end();
    this.listeners.clear();
  }

  get listenerCount(): number {
    let open = 0;
    for (const queue of this.listeners) if (!queue.isClosed) open++;
    return open;
  }

  close(): void {
    this.closed = true;
    this.endStreams();
  }
}

export class InMemoryWalletEngine implements WalletEngine {
  readonly transports: InMemoryTransport[] = [];
  readonly wallets: InMemoryTonWallet[] = [];
  /** When set, `subscribeWallet` rejects with it */
  subscribeFailure: Error | null = null;
  /** When set, `subscribeWallet` waits for it before creating the wallet */
  subscribeGate: Promise<void> | null = null;
  /** When set, `createTransport` throws it */
  transportFailure: Error | null = null;
  initialState: AccountState = accountState();

  createTransport(params: { url: string }): InMemoryTransport {
    if (this.transportFailure) throw this.transportFailure;
    const transport = new InMemoryTransport(params.url);
    this.transports.push(transport);
    return transport;
  }

  async subscribeWallet(params: {
    transport: GqlTransport;
    publicKey: string;
    contractType: ContractType;
    signal: AbortSignal;
  }): Promise<InMemoryTonWallet> {
    if (this.subscribeGate) await this.subscribeGate;
    if (this.subscribeFailure) throw this.subscribeFailure;
    const wallet = new InMemoryTonWallet({
      publicKey: params.publicKey,
      contractType: params.contractType,
      state: this.initialState,
    });
    this.wallets.push(wallet);
    return wallet;
  }
}
