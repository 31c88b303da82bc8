import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { RandomnessCoordinatorClient } from "../services/randomnessCoordinator";
import { RandomnessOracle, RoundState } from "../types/raffle";
import { RaffleError, isRaffleError } from "../utils/raffleErrors";
import { FakeRandomnessOracle } from "./support/fakes";

const waiting = { state: RoundState.CALCULATING, pendingRequestId: "req-1" };

describe("RandomnessCoordinatorClient.submitRequest", () => {
  test("forwards the round id and word count", async () => {
    const oracle = new FakeRandomnessOracle();
    const client = new RandomnessCoordinatorClient(oracle);

    assert.equal(await client.submitRequest(7), "req-1");
    assert.deepEqual(oracle.requests, [{ roundId: 7, numWords: 1 }]);
  });

  test("wraps oracle failures as ORACLE_UNAVAILABLE", async () => {
    const oracle = new FakeRandomnessOracle();
    oracle.failWith = new Error("rpc down");
    const client = new RandomnessCoordinatorClient(oracle);

    await assert.rejects(client.submitRequest(1), (err: unknown) => {
      assert.ok(isRaffleError(err, "ORACLE_UNAVAILABLE"));
      assert.equal(err.message, "Randomness request failed: rpc down");
      return true;
    });
  });

  test("passes raffle errors from the oracle through unchanged", async () => {
    const oracle = new FakeRandomnessOracle();
    oracle.failWith = new RaffleError("INSUFFICIENT_ORACLE_FUNDING", "balance too low");
    const client = new RandomnessCoordinatorClient(oracle);

    await assert.rejects(client.submitRequest(1), (err: unknown) =>
      isRaffleError(err, "INSUFFICIENT_ORACLE_FUNDING")
    );
  });

  test("rejects a blank request id", async () => {
    const oracle: RandomnessOracle = {
      requestRandomWords: async () => "  ",
    };
    const client = new RandomnessCoordinatorClient(oracle);

    await assert.rejects(client.submitRequest(1), (err: unknown) =>
      isRaffleError(err, "ORACLE_UNAVAILABLE")
    );
  });
});

describe("RandomnessCoordinatorClient.receiveResponse", () => {
  const client = new RandomnessCoordinatorClient(new FakeRandomnessOracle());

  test("accepts the pending request and takes the first word", () => {
    assert.deepEqual(client.receiveResponse(waiting, "req-1", [42n, 7n]), {
      accepted: true,
      randomWord: 42n,
    });
  });

  test("reports bad_state outside CALCULATING", () => {
    for (const state of [RoundState.OPEN, RoundState.FINISHED, RoundState.CANCELLED]) {
      assert.deepEqual(
        client.receiveResponse({ state, pendingRequestId: "req-1" }, "req-1", [1n]),
        { accepted: false, reason: "bad_state" }
      );
    }
  });

  test("reports unknown_request for stale or mismatched ids", () => {
    assert.deepEqual(client.receiveResponse(waiting, "req-2", [1n]), {
      accepted: false,
      reason: "unknown_request",
    });
    assert.deepEqual(
      client.receiveResponse(
        { state: RoundState.CALCULATING, pendingRequestId: null },
        "req-1",
        [1n]
      ),
      { accepted: false, reason: "unknown_request" }
    );
  });

  test("reports empty_payload and invalid_word", () => {
    assert.deepEqual(client.receiveResponse(waiting, "req-1", []), {
      accepted: false,
      reason: "empty_payload",
    });
    assert.deepEqual(client.receiveResponse(waiting, "req-1", [-5n]), {
      accepted: false,
      reason: "invalid_word",
    });
  });

  test("state is checked before the request id", () => {
    assert.deepEqual(
      client.receiveResponse(
        { state: RoundState.OPEN, pendingRequestId: null },
        "req-9",
        []
      ),
      { accepted: false, reason: "bad_state" }
    );
  });
});
