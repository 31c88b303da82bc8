import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { AccountingLedger } from "../services/accountingLedger";
import { isRaffleError } from "../utils/raffleErrors";

const config = { ticketPrice: 100n, feeBps: 1000, callerRewardBps: 5000 };

describe("AccountingLedger", () => {
  test("quote adds the fee on top of the base price", () => {
    const ledger = new AccountingLedger(config);
    assert.deepEqual(ledger.quote(3), { base: 300n, fee: 30n, total: 330n });
  });

  test("quote floors fractional fees", () => {
    const ledger = new AccountingLedger({ ...config, ticketPrice: 7n, feeBps: 250 });
    // 7 * 250 / 10000 = 0.175 -> 0
    assert.deepEqual(ledger.quote(1), { base: 7n, fee: 0n, total: 7n });
    // 7 * 60 * 250 / 10000 = 10.5 -> 10
    assert.deepEqual(ledger.quote(60), { base: 420n, fee: 10n, total: 430n });
  });

  test("payments split into prize and fee pools", () => {
    const ledger = new AccountingLedger(config);
    ledger.recordPayment("a", 5, ledger.quote(5));
    ledger.recordPayment("b", 3, ledger.quote(3));

    const state = ledger.state();
    assert.equal(state.prizePool, 800n);
    assert.equal(state.feePool, 80n);
    assert.equal(state.collected, 880n);
    assert.equal(state.prizePool + state.feePool, state.collected);
    assert.equal(ledger.ticketsOf("a"), 5);
    assert.equal(ledger.balance("b").amountPaid, 330n);
  });

  test("sweepFees credits the caller share and empties the pool", () => {
    const ledger = new AccountingLedger(config);
    ledger.recordPayment("a", 5, ledger.quote(5));

    assert.deepEqual(ledger.sweepFees("keeper"), {
      recipientAmount: 25n,
      callerReward: 25n,
    });
    assert.equal(ledger.state().feePool, 0n);
    assert.equal(ledger.balance("keeper").claimableReward, 25n);
    assert.deepEqual(ledger.sweepFees("keeper"), {
      recipientAmount: 0n,
      callerReward: 0n,
    });
  });

  test("sweepFees without a caller reward leaves no balance behind", () => {
    const ledger = new AccountingLedger({ ...config, callerRewardBps: 0 });
    ledger.recordPayment("a", 1, ledger.quote(1));
    assert.deepEqual(ledger.sweepFees("keeper"), {
      recipientAmount: 10n,
      callerReward: 0n,
    });
    assert.equal(ledger.state().balances["keeper"], undefined);
  });

  test("refunds cover the base price only and are paid once", () => {
    const ledger = new AccountingLedger(config);
    ledger.recordPayment("a", 2, ledger.quote(2));
    ledger.sweepFees("keeper");

    assert.equal(ledger.recordRefunds(), 200n);
    assert.equal(ledger.balance("a").claimableRefund, 200n);

    assert.equal(ledger.takeRefund("a"), 200n);
    assert.equal(ledger.state().prizePool, 0n);
    assert.throws(
      () => ledger.takeRefund("a"),
      (err: unknown) => isRaffleError(err, "ALREADY_CLAIMED")
    );
    assert.throws(
      () => ledger.takeRefund("stranger"),
      (err: unknown) => isRaffleError(err, "NO_REFUND")
    );
  });

  test("restoreRefund undoes a failed payout", () => {
    const ledger = new AccountingLedger(config);
    ledger.recordPayment("a", 2, ledger.quote(2));
    ledger.recordRefunds();

    const amount = ledger.takeRefund("a");
    ledger.restoreRefund("a", amount);
    assert.equal(ledger.balance("a").claimableRefund, 200n);
    assert.equal(ledger.balance("a").refundClaimed, false);
    assert.equal(ledger.state().prizePool, 200n);
  });

  test("prize can be taken once and restored after a failed transfer", () => {
    const ledger = new AccountingLedger(config);
    ledger.recordPayment("a", 4, ledger.quote(4));

    assert.equal(ledger.takePrize(), 400n);
    assert.equal(ledger.isPrizeClaimed(), true);
    assert.throws(
      () => ledger.takePrize(),
      (err: unknown) => isRaffleError(err, "ALREADY_CLAIMED")
    );

    ledger.restorePrize(400n);
    assert.equal(ledger.isPrizeClaimed(), false);
    assert.equal(ledger.takePrize(), 400n);
  });

  test("rewards are pulled in full", () => {
    const ledger = new AccountingLedger(config);
    assert.throws(
      () => ledger.takeReward("keeper"),
      (err: unknown) => isRaffleError(err, "NO_REWARD")
    );

    ledger.creditFeeRecipient("sink", 40n);
    assert.equal(ledger.takeReward("sink"), 40n);
    assert.throws(
      () => ledger.takeReward("sink"),
      (err: unknown) => isRaffleError(err, "NO_REWARD")
    );
  });

  test("state round-trips through the constructor without sharing objects", () => {
    const ledger = new AccountingLedger(config);
    ledger.recordPayment("a", 1, ledger.quote(1));

    const state = ledger.state();
    const copy = new AccountingLedger(config, state);
    state.balances["a"].ticketsOwned = 99;

    assert.equal(copy.ticketsOf("a"), 1);
    assert.deepEqual(copy.state(), ledger.state());
  });
});
