import { z } from "zod";
import { RecordedRoundEvent } from "../types/raffle";

// Amounts travel as decimal strings inside JSONB.
const amount = z
  .union([z.string().regex(/^\d+$/), z.number().int().nonnegative()])
  .transform((v) => BigInt(v));

const address = z.string().min(1);

const base = z.object({
  roundId: z.number().int(),
  at: z.number().int(),
});

const ignoreReason = z.enum([
  "bad_state",
  "unknown_request",
  "empty_payload",
  "invalid_word",
  "no_participants",
  "busy",
  "internal_error",
]);

const recordedEventSchema = z.discriminatedUnion("type", [
  base.extend({
    type: z.literal("TicketsPurchased"),
    participant: address,
    ticketCount: z.number().int(),
    rangeStart: z.number().int(),
    rangeEnd: z.number().int(),
    amountPaid: amount,
  }),
  base.extend({ type: z.literal("CapacityReached"), totalSold: z.number().int() }),
  base.extend({
    type: z.literal("FeesSwept"),
    recipient: address,
    recipientAmount: amount,
    caller: address,
    callerReward: amount,
  }),
  base.extend({ type: z.literal("RandomnessRequested"), requestId: z.string() }),
  base.extend({ type: z.literal("RandomnessStored"), requestId: z.string() }),
  base.extend({
    type: z.literal("FulfillmentIgnored"),
    requestId: z.string(),
    reason: ignoreReason,
  }),
  base.extend({
    type: z.literal("WinnerSelected"),
    winner: address,
    winningIndex: z.number().int().nullable(),
  }),
  base.extend({
    type: z.literal("RoundCancelled"),
    reason: z.string(),
    refundLiability: amount,
  }),
  base.extend({
    type: z.literal("RoundReopened"),
    abandonedRequestId: z.string().nullable(),
  }),
  base.extend({ type: z.literal("PrizeClaimed"), participant: address, amount }),
  base.extend({ type: z.literal("RefundClaimed"), participant: address, amount }),
  base.extend({ type: z.literal("RewardClaimed"), participant: address, amount }),
]);

export function encodeEvent(event: RecordedRoundEvent): string {
  return JSON.stringify(event, (_key, value: unknown) =>
    typeof value === "bigint" ? value.toString() : value
  );
}

export function decodeEvent(payload: unknown): RecordedRoundEvent {
  return recordedEventSchema.parse(payload);
}
