import assert from "node:assert/strict";
import { test } from "node:test";
import { decodeEvent, encodeEvent } from "../db/eventCodec";
import { RecordedRoundEvent } from "../types/raffle";
import { ALICE, FEE_SINK, KEEPER } from "./support/fakes";

test("amounts are stored as decimal strings and read back as bigint", () => {
  const event: RecordedRoundEvent = {
    type: "FeesSwept",
    recipient: FEE_SINK,
    recipientAmount: 12345678901234567890n,
    caller: KEEPER,
    callerReward: 0n,
    roundId: 4,
    at: 1_700_000_000,
  };

  const encoded = encodeEvent(event);
  assert.equal(
    encoded,
    `{"type":"FeesSwept","recipient":"${FEE_SINK}","recipientAmount":"12345678901234567890","caller":"${KEEPER}","callerReward":"0","roundId":4,"at":1700000000}`
  );
  assert.deepEqual(decodeEvent(JSON.parse(encoded)), event);
});

test("nullable fields survive", () => {
  const event: RecordedRoundEvent = {
    type: "WinnerSelected",
    winner: ALICE,
    winningIndex: null,
    roundId: 1,
    at: 5,
  };
  assert.deepEqual(decodeEvent(JSON.parse(encodeEvent(event))), event);
});

test("unknown or malformed payloads are rejected", () => {
  assert.throws(() => decodeEvent({ type: "Unknown", roundId: 1, at: 1 }));
  assert.throws(() =>
    decodeEvent({
      type: "PrizeClaimed",
      participant: ALICE,
      amount: "-5",
      roundId: 1,
      at: 1,
    })
  );
});
