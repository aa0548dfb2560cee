/**
 * Canonical request, response and event envelopes exchanged between the host
 * and the gateway, plus the error taxonomy and immediate status codes.
 *
 * The in-memory shapes use `bigint` for handles and wide integers. The wire
 * shapes (see wire.ts) carry the same values as decimal strings.
 */

// ── Handles & Ports ─────────────────────────────────────────────────

/** Opaque 64-bit identifier of a native object held by the gateway. */
export type Handle = bigint;

/** Reserved handle value; never issued by the registry. */
export const INVALID_HANDLE: Handle = 0n;

/** Identifier of a host-registered completion or event port. */
export type PortId = number;

// ── Error Kinds ─────────────────────────────────────────────────────

/**
 * Error kinds produced by the gateway itself.
 */
export type CoreErrorKind =
  | "InvalidArgument"
  | "UnknownMethod"
  | "HandleNotFound"
  | "TypeMismatch"
  | "RuntimeUnavailable"
  | "InternalError"
  | "Cancelled";

/**
 * Any error kind that may cross the boundary. Collaborator domain kinds
 * (e.g. "InvalidPublicKey") pass through unchanged.
 */
export type ErrorKind = CoreErrorKind | (string & {});

export interface ErrorBody {
  kind: ErrorKind;
  message: string;
  details?: unknown;
}

// ── Status Codes ────────────────────────────────────────────────────

/**
 * Immediate result of an entry point. The outcome of the operation itself
 * arrives later through a port.
 */
export enum StatusCode {
  Ok = 0,
  RuntimeUnavailable = 1,
  InvalidPort = 2,
  HandleNotFound = 3,
  TypeMismatch = 4,
  UnknownMethod = 5,
  InvalidArgument = 6,
  InternalError = 7,
}

/** Maps an error kind onto the closest immediate status code. */
export function statusForKind(kind: ErrorKind): StatusCode {
  switch (kind) {
    case "RuntimeUnavailable":
      return StatusCode.RuntimeUnavailable;
    case "HandleNotFound":
      return StatusCode.HandleNotFound;
    case "TypeMismatch":
      return StatusCode.TypeMismatch;
    case "UnknownMethod":
      return StatusCode.UnknownMethod;
    case "InvalidArgument":
      return StatusCode.InvalidArgument;
    default:
      return StatusCode.InternalError;
  }
}

// ── Request ─────────────────────────────────────────────────────────

/** A request/response call as the host made it. */
export interface RequestEnvelope {
  requestId: string;
  method: string;
  handle: Handle | null;
  payload: string | Uint8Array;
  completionPort: PortId;
}

// ── Response & Events ───────────────────────────────────────────────

export type ResponseOk<T = unknown> = { outcome: "ok"; payload: T };
export type ResponseErr = { outcome: "err"; error: ErrorBody };

/** Exactly one of these is delivered per request. */
export type ResponseEnvelope<T = unknown> = ResponseOk<T> | ResponseErr;

/**
 * One record of a subscription's stream. The last record of every
 * subscription has `final: true`.
 */
export type EventEnvelope<T = unknown> = {
  subscription: Handle;
  seq: number;
  final: boolean;
} & ResponseEnvelope<T>;

export type SubscriptionState = "active" | "cancelled" | "errored" | "completed";

export type PendingState = "dispatched" | "completed";
