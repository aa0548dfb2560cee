/**
 * Wire envelope (JSON text posted to host ports).
 *
 *   {"request_id":"7","outcome":"ok","payload":{...}}
 *   {"request_id":"7","outcome":"err","error":{"kind":"HandleNotFound","message":"..."}}
 *   {"request_id":"3","subscription":"3","seq":0,"outcome":"ok","payload":{...},"final":false}
 *
 * Handles, request ids and every bigint travel as decimal strings.
 */

import type { ErrorBody, EventEnvelope, ResponseEnvelope } from "./envelope.js";
import { GatewayError } from "./errors.js";
import { encodeWide, toWireValue } from "./numeric.js";

export type WireError = {
  kind: string;
  message: string;
  details?: unknown;
};

export type WireResponse =
  | { request_id: string; outcome: "ok"; payload: unknown }
  | { request_id: string; outcome: "err"; error: WireError };

export type WireEvent = WireResponse & {
  subscription: string;
  seq: number;
  final: boolean;
};

export type WireMessage = WireResponse | WireEvent;

function wireError(error: ErrorBody): WireError {
  return error.details === undefined
    ? { kind: error.kind, message: error.message }
    : { kind: error.kind, message: error.message, details: toWireValue(error.details) };
}

export function toWireResponse(requestId: string, response: ResponseEnvelope): WireResponse {
  if (response.outcome === "ok") {
    return { request_id: requestId, outcome: "ok", payload: toWireValue(response.payload) ?? null };
  }
  return { request_id: requestId, outcome: "err", error: wireError(response.error) };
}

export function toWireEvent(event: EventEnvelope): WireEvent {
  const id = encodeWide(event.subscription);
  const base = toWireResponse(id, event);
  return { ...base, subscription: id, seq: event.seq, final: event.final };
}

/** Serializes a response; encoding faults surface as InternalError. */
export function encodeResponse(requestId: string, response: ResponseEnvelope): string {
  return JSON.stringify(toWireResponse(requestId, response));
}

export function encodeEvent(event: EventEnvelope): string {
  return JSON.stringify(toWireEvent(event));
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Parses a request payload. An empty payload decodes to `{}`. Malformed UTF-8
 * or JSON is an InvalidArgument naming the method.
 */
export function decodePayload(method: string, payload: string | Uint8Array): unknown {
  let text: string;
  try {
    text = typeof payload === "string" ? payload : utf8.decode(payload);
  } catch (err) {
    throw new GatewayError({
      kind: "InvalidArgument",
      message: `${method}: payload is not valid UTF-8`,
      cause: err,
    });
  }
  if (text.trim() === "") return {};
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new GatewayError({
      kind: "InvalidArgument",
      message: `${method}: payload is not valid JSON (${err instanceof Error ? err.message : String(err)})`,
      cause: err,
    });
  }
}
