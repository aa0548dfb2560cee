/**
 * Zod runtime schemas for wire messages.
 *
 * The request schemas validate bodies arriving over the NATS host bridge;
 * the response/event schemas let a host (or a test) parse what the gateway
 * posted to its ports.
 *
 * @see wire.ts for the TypeScript shapes.
 */

import { z } from "zod";
import { handleField } from "./numeric.js";

// ── Requests ────────────────────────────────────────────────────────

export const DispatchRequestSchema = z.object({
  method: z.string().min(1),
  handle: handleField().optional(),
  args: z.unknown().optional(),
});

export const SubscribeRequestSchema = DispatchRequestSchema.extend({
  event_subject: z.string().min(1),
});

export const HandleRequestSchema = z.object({
  handle: handleField(),
});

export type DispatchRequest = z.output<typeof DispatchRequestSchema>;
export type SubscribeRequest = z.output<typeof SubscribeRequestSchema>;
export type HandleRequest = z.output<typeof HandleRequestSchema>;

// ── Responses & Events ──────────────────────────────────────────────

export const WireErrorSchema = z.object({
  kind: z.string(),
  message: z.string(),
  details: z.unknown().optional(),
});

const WireOkSchema = z.object({
  request_id: z.string(),
  outcome: z.literal("ok"),
  payload: z.unknown(),
});

const WireErrSchema = z.object({
  request_id: z.string(),
  outcome: z.literal("err"),
  error: WireErrorSchema,
});

export const WireResponseSchema = z.discriminatedUnion("outcome", [WireOkSchema, WireErrSchema]);

const eventFields = {
  subscription: z.string(),
  seq: z.number().int().nonnegative(),
  final: z.boolean(),
};

export const WireEventSchema = z.discriminatedUnion("outcome", [
  WireOkSchema.extend(eventFields),
  WireErrSchema.extend(eventFields),
]);
