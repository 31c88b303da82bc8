import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { MemoryRoundRepository } from "../db/memoryRoundRepository";
import { RaffleService, RaffleServiceOptions } from "../services/raffleService";
import { RoundState } from "../types/raffle";
import { RaffleErrorCode, isRaffleError } from "../utils/raffleErrors";
import {
  ALICE,
  BOB,
  CAROL,
  FEE_SINK,
  FakePaymentToken,
  FakeRandomnessOracle,
  KEEPER,
  ManualClock,
  testConfig,
} from "./support/fakes";

const code = (expected: RaffleErrorCode) => (err: unknown) =>
  isRaffleError(err, expected);

function setup(options: Partial<RaffleServiceOptions> = {}) {
  const clock = new ManualClock();
  const payments = new FakePaymentToken();
  const oracle = new FakeRandomnessOracle();
  const repository = new MemoryRoundRepository();
  const service = new RaffleService({
    repository,
    payments,
    oracle,
    defaults: testConfig(),
    clock,
    ...options,
  });
  return { clock, payments, oracle, repository, service };
}

describe("RaffleService", () => {
  test("createRound applies overrides to the defaults", async () => {
    const { service } = setup();

    const first = await service.createRound();
    const second = await service.createRound({ capacity: 3, ticketPrice: 250n });

    assert.equal(first.id, 1);
    assert.equal(first.state, RoundState.OPEN);
    assert.equal(first.ticketPrice, "100");
    assert.equal(first.deadline, 1_003_600);
    assert.equal(first.participants, 0);
    assert.equal(first.closable, false);

    assert.equal(second.id, 2);
    assert.equal(second.capacity, 3);
    assert.equal(second.ticketPrice, "250");
  });

  test("createRound rejects an invalid configuration", async () => {
    const { service, repository } = setup();
    await assert.rejects(service.createRound({ capacity: 0 }), code("INVALID_CONFIG"));
    assert.deepEqual(await repository.listIds(), []);
  });

  test("full lifecycle: entries fill the round, draw, finalize and claim", async () => {
    const { service, payments } = setup();
    await service.createRound();

    const a = await service.enter(1, ALICE, 5);
    const b = await service.enter(1, BOB, 3);
    const c = await service.enter(1, CAROL, 2);

    assert.equal(a.close, null);
    assert.equal(b.close, null);
    assert.deepEqual(c.close, { kind: "requested", requestId: "req-1" });

    const waiting = await service.getRound(1);
    assert.equal(waiting.state, RoundState.CALCULATING);
    assert.equal(waiting.participants, 3);
    assert.equal(waiting.pendingRequestId, "req-1");

    assert.deepEqual(await service.fulfill("req-1", [6n]), {
      status: "stored",
      roundId: 1,
      requestId: "req-1",
    });
    assert.deepEqual(await service.finalize(1, KEEPER), { winner: BOB, winningIndex: 6 });
    assert.deepEqual(await service.claimPrize(1, BOB), { participant: BOB, amount: 1000n });

    // the entrant that filled the round closed it and earned the caller share
    assert.deepEqual(await service.claimReward(1, CAROL), {
      participant: CAROL,
      amount: 50n,
    });
    assert.equal(payments.paidTo(BOB), 1000n);
    assert.equal(payments.paidTo(FEE_SINK), 50n);

    const types = (await service.events(1)).map((e) => e.type);
    assert.deepEqual(types, [
      "TicketsPurchased",
      "TicketsPurchased",
      "TicketsPurchased",
      "CapacityReached",
      "RandomnessRequested",
      "FeesSwept",
      "RewardClaimed",
      "RandomnessStored",
      "WinnerSelected",
      "PrizeClaimed",
      "RewardClaimed",
    ]);
  });

  test("an entry stands when the automatic close fails", async () => {
    const { service, oracle } = setup();
    await service.createRound({ capacity: 4 });
    await service.enter(1, ALICE, 2);
    oracle.failWith = new Error("relay offline");

    const result = await service.enter(1, BOB, 2);

    assert.deepEqual(result.close, {
      kind: "failed",
      code: "ORACLE_UNAVAILABLE",
      message: "Randomness request failed: relay offline",
    });
    const view = await service.getRound(1);
    assert.equal(view.state, RoundState.CLOSED);
    assert.equal(view.totalSold, 4);
    assert.equal(view.closable, true);

    oracle.failWith = null;
    assert.deepEqual(await service.close(1, KEEPER), {
      kind: "requested",
      requestId: "req-1",
    });
  });

  test("automatic close can be turned off", async () => {
    const { service, oracle } = setup({ autoCloseOnCapacity: false });
    await service.createRound({ capacity: 2 });

    const result = await service.enter(1, ALICE, 2);

    assert.equal(result.capacityReached, true);
    assert.equal(result.close, null);
    assert.equal(oracle.requests.length, 0);
    assert.equal((await service.getRound(1)).state, RoundState.CLOSED);
  });

  test("a rejected operation persists nothing", async () => {
    const { service, payments } = setup();
    await service.createRound();
    await service.enter(1, ALICE, 1);
    payments.failTransferFrom = true;

    await assert.rejects(service.enter(1, BOB, 2), code("PAYMENT_FAILED"));

    const view = await service.getRound(1);
    assert.equal(view.totalSold, 1);
    assert.equal(view.collected, "110");
    assert.equal((await service.events(1)).length, 1);
  });

  test("concurrent entries on one round are serialized", async () => {
    const { service } = setup();
    await service.createRound();

    const [first, second] = await Promise.all([
      service.enter(1, ALICE, 3),
      service.enter(1, BOB, 4),
    ]);

    assert.deepEqual([first.rangeStart, first.rangeEnd], [0, 2]);
    assert.deepEqual([second.rangeStart, second.rangeEnd], [3, 6]);
    assert.equal((await service.getRound(1)).totalSold, 7);
    assert.equal(await service.locate(1, 6), BOB);
  });

  test("a payout that calls back into the same round is refused", async () => {
    const { service, payments, clock } = setup();
    await service.createRound();
    await service.enter(1, ALICE, 2);
    clock.advance(3600);
    await service.close(1, KEEPER);

    const reentry: unknown[] = [];
    payments.onTransfer = async () => {
      payments.onTransfer = null;
      await service.claimPrize(1, ALICE).catch((err: unknown) => {
        reentry.push(err);
      });
    };

    assert.deepEqual(await service.claimPrize(1, ALICE), {
      participant: ALICE,
      amount: 200n,
    });
    assert.equal(reentry.length, 1);
    assert.ok(isRaffleError(reentry[0], "REENTRANT_CALL"));
  });

  test("a delivery arriving during the fee push is applied", async () => {
    const { service, payments, clock } = setup();
    await service.createRound();
    await service.enter(1, ALICE, 2);
    await service.enter(1, BOB, 2);
    clock.advance(3600);

    let pushStarted: () => void = () => undefined;
    const started = new Promise<void>((resolve) => {
      pushStarted = resolve;
    });
    let finishPush: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      finishPush = resolve;
    });
    payments.onTransfer = async () => {
      payments.onTransfer = null;
      pushStarted();
      await held;
    };

    const closing = service.close(1, KEEPER);
    await started;
    // the oracle answers while the fee transfer is still in flight
    const delivery = service.fulfill("req-1", [3n]);
    finishPush();

    assert.deepEqual(await closing, { kind: "requested", requestId: "req-1" });
    assert.deepEqual(await delivery, {
      status: "stored",
      roundId: 1,
      requestId: "req-1",
    });
    const view = await service.getRound(1);
    assert.equal(view.randomnessReady, true);
    assert.equal(payments.paidTo(FEE_SINK), 20n);
  });

  test("close is stored before the fee push, which may fail on its own", async () => {
    const { service, payments, clock } = setup();
    await service.createRound();
    await service.enter(1, ALICE, 2);
    await service.enter(1, BOB, 2);
    clock.advance(3600);
    payments.rejectRecipients.add(FEE_SINK);

    assert.deepEqual(await service.close(1, KEEPER), {
      kind: "requested",
      requestId: "req-1",
    });
    assert.equal((await service.getRound(1)).pendingRequestId, "req-1");
    assert.equal((await service.participant(1, FEE_SINK)).claimableReward, "20");

    payments.rejectRecipients.delete(FEE_SINK);
    assert.deepEqual(await service.claimReward(1, FEE_SINK), {
      participant: FEE_SINK,
      amount: 20n,
    });
  });

  test("a signed entry must carry the holder's current ticket count", async () => {
    const { service } = setup();
    await service.createRound();

    await service.enter(1, ALICE, 2, { nonce: 0 });
    await assert.rejects(service.enter(1, ALICE, 2, { nonce: 0 }), code("STALE_NONCE"));
    const second = await service.enter(1, ALICE, 1, { nonce: 2 });

    assert.deepEqual([second.rangeStart, second.rangeEnd], [2, 2]);
    assert.equal((await service.participant(1, ALICE)).ticketsOwned, 3);
  });

  test("fulfill ignores requests no round is waiting on", async () => {
    const { service } = setup();
    await service.createRound();

    assert.deepEqual(await service.fulfill("req-404", [1n]), {
      status: "ignored",
      roundId: null,
      requestId: "req-404",
      reason: "unknown_request",
    });
  });

  test("fulfill reports storage failures instead of throwing", async () => {
    const { service, repository } = setup();
    repository.findByPendingRequest = async () => {
      throw new Error("connection reset");
    };

    assert.deepEqual(await service.fulfill("req-1", [1n]), {
      status: "ignored",
      roundId: null,
      requestId: "req-1",
      reason: "internal_error",
    });
  });

  test("timeout recovery through the service", async () => {
    const { service, clock } = setup({ defaults: testConfig({ recoveryPolicy: "cancel" }) });
    await service.createRound();
    await service.enter(1, ALICE, 1);
    await service.enter(1, BOB, 1);
    clock.advance(3600);
    await service.close(1, KEEPER);

    assert.deepEqual(await service.timeoutStatus(1), {
      shouldRecover: false,
      secondsRemaining: 600,
    });
    clock.advance(600);
    assert.deepEqual(await service.recover(1, KEEPER), {
      policy: "cancel",
      state: RoundState.CANCELLED,
    });
    assert.deepEqual(await service.claimRefund(1, ALICE), {
      participant: ALICE,
      amount: 100n,
    });
  });

  test("queries", async () => {
    const { service, clock } = setup();
    await service.createRound();
    await service.createRound();
    await service.enter(2, ALICE, 2);
    clock.advance(3600);
    await service.close(1, KEEPER);

    assert.deepEqual(
      (await service.listRounds()).map((r) => [r.id, r.state]),
      [
        [1, RoundState.CANCELLED],
        [2, RoundState.OPEN],
      ]
    );
    assert.deepEqual(
      (await service.listRounds([RoundState.OPEN])).map((r) => r.id),
      [2]
    );

    assert.deepEqual(await service.participant(2, ALICE.toUpperCase().replace("0X", "0x")), {
      participant: ALICE,
      ticketsOwned: 2,
      amountPaid: "220",
      claimableRefund: "0",
      refundClaimed: false,
      claimableReward: "0",
    });
    assert.equal((await service.getRound(2)).closable, true);

    await assert.rejects(service.getRound(99), code("ROUND_NOT_FOUND"));
    await assert.rejects(service.events(99), code("ROUND_NOT_FOUND"));
    await assert.rejects(service.locate(2, 2), code("TICKET_OUT_OF_RANGE"));
  });
});
