import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { TicketLedger } from "../services/ticketLedger";
import { isRaffleError } from "../utils/raffleErrors";

describe("TicketLedger", () => {
  test("append returns contiguous inclusive ranges", () => {
    const ledger = new TicketLedger();
    assert.deepEqual(ledger.append("a", 5), { rangeStart: 0, rangeEnd: 4 });
    assert.deepEqual(ledger.append("b", 3), { rangeStart: 5, rangeEnd: 7 });
    assert.deepEqual(ledger.append("c", 2), { rangeStart: 8, rangeEnd: 9 });
    assert.equal(ledger.totalSold(), 10);
    assert.deepEqual(ledger.entries(), [
      { participant: "a", cumulativeUpperBound: 5 },
      { participant: "b", cumulativeUpperBound: 8 },
      { participant: "c", cumulativeUpperBound: 10 },
    ]);
  });

  test("locate maps every index to the range owner", () => {
    const ledger = new TicketLedger();
    ledger.append("a", 5);
    ledger.append("b", 3);
    ledger.append("c", 2);

    const owners = Array.from({ length: 10 }, (_, i) => ledger.locate(i));
    assert.deepEqual(owners, [
      "a", "a", "a", "a", "a",
      "b", "b", "b",
      "c", "c",
    ]);
  });

  test("repeat buyers own several ranges but count once", () => {
    const ledger = new TicketLedger();
    ledger.append("a", 2);
    ledger.append("b", 1);
    ledger.append("a", 3);

    assert.equal(ledger.participantCount(), 2);
    assert.deepEqual(ledger.participants(), ["a", "b"]);
    assert.equal(ledger.locate(1), "a");
    assert.equal(ledger.locate(2), "b");
    assert.equal(ledger.locate(3), "a");
    assert.equal(ledger.locate(5), "a");
  });

  test("locate rejects indices outside the sold range", () => {
    const ledger = new TicketLedger();
    ledger.append("a", 2);

    for (const bad of [-1, 2, 1.5, Number.NaN]) {
      assert.throws(
        () => ledger.locate(bad),
        (err: unknown) => isRaffleError(err, "TICKET_OUT_OF_RANGE")
      );
    }
    assert.throws(
      () => new TicketLedger().locate(0),
      (err: unknown) => isRaffleError(err, "TICKET_OUT_OF_RANGE")
    );
  });

  test("append rejects non-positive counts without recording anything", () => {
    const ledger = new TicketLedger();
    for (const bad of [0, -3, 2.5]) {
      assert.throws(
        () => ledger.append("a", bad),
        (err: unknown) => isRaffleError(err, "ZERO_COUNT")
      );
    }
    assert.equal(ledger.totalSold(), 0);
    assert.equal(ledger.participantCount(), 0);
  });

  test("restoring from ranges keeps lookups and refuses non-increasing bounds", () => {
    const restored = new TicketLedger([
      { participant: "a", cumulativeUpperBound: 4 },
      { participant: "b", cumulativeUpperBound: 6 },
    ]);
    assert.equal(restored.locate(3), "a");
    assert.equal(restored.locate(4), "b");
    assert.equal(restored.totalSold(), 6);

    assert.throws(
      () =>
        new TicketLedger([
          { participant: "a", cumulativeUpperBound: 4 },
          { participant: "b", cumulativeUpperBound: 4 },
        ]),
      /strictly increasing/
    );
  });

  test("entries returns copies", () => {
    const ledger = new TicketLedger();
    ledger.append("a", 1);
    const copy = ledger.entries();
    copy[0].cumulativeUpperBound = 99;
    assert.equal(ledger.totalSold(), 1);
  });
});
