import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { MemoryRoundRepository } from "../db/memoryRoundRepository";
import { FulfillmentListener } from "../services/fulfillmentListener";
import { RaffleKeeper } from "../services/raffleKeeper";
import { RaffleService } from "../services/raffleService";
import { initializeRaffleRound } from "../services/startServices";
import { RoundState } from "../types/raffle";
import { InProcessLockProvider, withLock } from "../utils/distributedLock";
import {
  ALICE,
  BOB,
  FakePaymentToken,
  FakeRandomnessOracle,
  KEEPER,
  ManualClock,
  flushMicrotasks,
  testConfig,
} from "./support/fakes";

function setup() {
  const clock = new ManualClock();
  const oracle = new FakeRandomnessOracle();
  const payments = new FakePaymentToken();
  const service = new RaffleService({
    repository: new MemoryRoundRepository(),
    payments,
    oracle,
    defaults: testConfig(),
    clock,
  });
  const locks = new InProcessLockProvider();
  const keeper = new RaffleKeeper(service, locks, {
    keeperAddress: KEEPER,
    intervalMs: 60_000,
  });
  return { clock, oracle, payments, service, locks, keeper };
}

describe("RaffleKeeper.tick", () => {
  test("does nothing while rounds are still open", async () => {
    const { service, keeper } = setup();
    await service.createRound();
    await service.enter(1, ALICE, 1);

    assert.deepEqual(await keeper.tick(), {
      closed: [],
      finalized: [],
      recovered: [],
      failed: [],
    });
  });

  test("closes expired rounds, then finalizes once randomness arrives", async () => {
    const { service, keeper, clock } = setup();
    await service.createRound();
    await service.enter(1, ALICE, 2);
    await service.enter(1, BOB, 2);
    clock.advance(3600);

    assert.deepEqual((await keeper.tick()).closed, [1]);
    assert.equal((await service.getRound(1)).state, RoundState.CALCULATING);

    // waiting on the oracle: nothing to do yet
    assert.deepEqual(await keeper.tick(), {
      closed: [],
      finalized: [],
      recovered: [],
      failed: [],
    });

    await service.fulfill("req-1", [2n]);
    assert.deepEqual((await keeper.tick()).finalized, [1]);

    const round = await service.getRound(1);
    assert.equal(round.state, RoundState.FINISHED);
    assert.equal(round.winner, BOB);
    assert.equal((await service.participant(1, KEEPER)).claimableReward, "20");
  });

  test("recovers rounds whose randomness timed out", async () => {
    const { service, keeper, clock } = setup();
    await service.createRound();
    await service.enter(1, ALICE, 1);
    await service.enter(1, BOB, 1);
    clock.advance(3600);
    await keeper.tick();

    clock.advance(599);
    assert.deepEqual((await keeper.tick()).recovered, []);

    clock.advance(1);
    const report = await keeper.tick();
    assert.deepEqual(report.recovered, [1]);
    // reopened with the deadline already gone, so the next pass closes again
    assert.deepEqual((await keeper.tick()).closed, [1]);
    assert.equal((await service.getRound(1)).pendingRequestId, "req-2");
  });

  test("failures are reported per round and do not stop the pass", async () => {
    const { service, keeper, clock, oracle } = setup();
    await service.createRound();
    await service.createRound();
    await service.enter(1, ALICE, 1);
    await service.enter(1, BOB, 1);
    clock.advance(3600);
    oracle.failWith = new Error("relay offline");

    const report = await keeper.tick();

    // round 2 had no entries and is cancelled without the oracle
    assert.deepEqual(report.closed, [2]);
    assert.deepEqual(report.failed, [
      {
        roundId: 1,
        action: "close",
        error: "Randomness request failed: relay offline",
      },
    ]);
    assert.equal((await service.getRound(2)).state, RoundState.CANCELLED);
  });

  test("start and stop manage the schedule", () => {
    const { keeper } = setup();
    assert.equal(keeper.isRunning(), false);
    keeper.start();
    assert.equal(keeper.isRunning(), true);
    keeper.stop();
    assert.equal(keeper.isRunning(), false);
  });
});

describe("withLock", () => {
  test("skips the work while another holder has the lock", async () => {
    const locks = new InProcessLockProvider();
    const held = await locks.tryAcquire("raffle_keeper");
    assert.ok(held);

    let ran = false;
    const skipped = await withLock(locks, "raffle_keeper", async () => {
      ran = true;
      return "done";
    });
    assert.equal(skipped, null);
    assert.equal(ran, false);

    await held.release();
    assert.equal(await withLock(locks, "raffle_keeper", async () => "done"), "done");
  });

  test("releases the lock when the work throws", async () => {
    const locks = new InProcessLockProvider();
    await assert.rejects(
      withLock(locks, "job", async () => {
        throw new Error("boom");
      }),
      /boom/
    );
    assert.ok(await locks.tryAcquire("job"));
  });
});

describe("FulfillmentListener", () => {
  async function calculatingRound() {
    const ctx = setup();
    await ctx.service.createRound();
    await ctx.service.enter(1, ALICE, 1);
    await ctx.service.enter(1, BOB, 1);
    ctx.clock.advance(3600);
    await ctx.service.close(1, KEEPER);
    return ctx;
  }

  test("oracle deliveries reach the round", async () => {
    const { service, oracle } = await calculatingRound();
    const listener = new FulfillmentListener(oracle, service);

    assert.equal(listener.start(), true);
    assert.equal(oracle.subscriberCount(), 1);

    oracle.deliver("req-1", [1n]);
    await flushMicrotasks();

    assert.equal((await service.getRound(1)).randomnessReady, true);
    listener.stop();
    assert.equal(oracle.subscriberCount(), 0);
  });

  test("a replayed delivery is skipped after it was applied", async () => {
    const { service, oracle } = await calculatingRound();
    const listener = new FulfillmentListener(oracle, service);

    const first = await listener.handle("req-1", [1n]);
    assert.equal(first?.status, "stored");
    assert.equal(await listener.handle("req-1", [1n]), null);
  });

  test("ignored deliveries are forwarded again", async () => {
    const { service, oracle } = await calculatingRound();
    const listener = new FulfillmentListener(oracle, service);

    const empty = await listener.handle("req-1", []);
    assert.equal(empty?.status === "ignored" && empty.reason, "empty_payload");

    const retry = await listener.handle("req-1", [1n]);
    assert.equal(retry?.status, "stored");
  });

  test("start reports an oracle without a delivery feed", () => {
    const { service } = setup();
    const listener = new FulfillmentListener(
      { requestRandomWords: async () => "req-1" },
      service
    );
    assert.equal(listener.start(), false);
  });
});

describe("initializeRaffleRound", () => {
  test("creates a round only when none is live", async () => {
    const { service } = setup();

    await initializeRaffleRound(service);
    await initializeRaffleRound(service);

    assert.deepEqual(
      (await service.listRounds()).map((r) => [r.id, r.state]),
      [[1, RoundState.OPEN]]
    );
  });
});
