/**
 * Gateway error class (shared).
 *
 * Every failure that reaches the boundary is expressed as a GatewayError
 * before it is encoded into a response or event.
 */

import type { ErrorBody, ErrorKind } from "./envelope.js";

/**
 * Structured error for gateway operations.
 */
export class GatewayError extends Error {
  public readonly kind: ErrorKind;
  public readonly details?: unknown;
  public readonly cause?: unknown;

  constructor(args: {
    kind: ErrorKind;
    message: string;
    details?: unknown;
    cause?: unknown;
  }) {
    super(args.message);
    this.name = "GatewayError";
    this.kind = args.kind;
    this.details = args.details;
    this.cause = args.cause;
  }

  toBody(): ErrorBody {
    return this.details === undefined
      ? { kind: this.kind, message: this.message }
      : { kind: this.kind, message: this.message, details: this.details };
  }
}

export function isGatewayError(err: unknown): err is GatewayError {
  return err instanceof GatewayError;
}
