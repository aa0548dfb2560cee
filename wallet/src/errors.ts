import { GatewayError } from "@walletgate/core";

/** Domain error kinds of the wallet surface, passed to the host unchanged. */
export type WalletErrorKind = "InvalidUrl" | "InvalidPublicKey" | "FailedToSubscribeToTonWallet";

export function walletError(kind: WalletErrorKind, message: string, cause?: unknown): GatewayError {
  return new GatewayError({ kind, message, cause });
}
