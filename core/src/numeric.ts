/**
 * Decimal-string convention for integers wider than the host's safe number
 * range. Every bigint leaves the gateway as a decimal string; request fields
 * declared wide accept a decimal string and decode to bigint.
 */

import { z } from "zod";
import { GatewayError } from "./errors.js";

const DECIMAL_PATTERN = /^-?(0|[1-9][0-9]*)$/;

export function encodeWide(value: bigint): string {
  return value.toString(10);
}

export function decodeWide(text: string): bigint {
  if (!DECIMAL_PATTERN.test(text)) {
    throw new GatewayError({
      kind: "InvalidArgument",
      message: `Not a decimal integer: ${JSON.stringify(text)}`,
    });
  }
  return BigInt(text);
}

/**
 * Zod schema for a wide integer field in a request: a decimal string, or a
 * number that is still a safe integer after JSON parsing.
 */
export function wideInt() {
  return z
    .union([
      z.string().regex(DECIMAL_PATTERN, "Expected a decimal integer string"),
      z.number().int().refine(Number.isSafeInteger, "Integer exceeds the safe range; send it as a decimal string"),
    ])
    .transform((value) => BigInt(value));
}

/** Zod schema for a handle field: a wide integer greater than zero. */
export function handleField() {
  return wideInt().refine((value) => value > 0n, "Handle must be a positive integer");
}

/**
 * Converts a result value into its wire form: bigints become decimal strings,
 * Uint8Arrays become hex strings. An integral number outside the safe range
 * is refused, since it has already lost precision, and so are NaN and the
 * infinities, which JSON would write as null.
 */
export function toWireValue(value: unknown, path = "$"): unknown {
  if (typeof value === "bigint") return encodeWide(value);
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new GatewayError({
        kind: "InternalError",
        message: `Non-finite number at ${path}`,
      });
    }
    if (Number.isInteger(value) && !Number.isSafeInteger(value)) {
      throw new GatewayError({
        kind: "InternalError",
        message: `Unsafe integer at ${path}; wide values must be bigint`,
      });
    }
    return value;
  }
  if (value === null || typeof value !== "object") return value;
  if (value instanceof Uint8Array) return Buffer.from(value).toString("hex");
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) {
    return value.map((item, index) => toWireValue(item, `${path}[${index}]`));
  }
  const out: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(value)) {
    if (item === undefined || typeof item === "function") continue;
    out[key] = toWireValue(item, `${path}.${key}`);
  }
  return out;
}
