import {
  ClaimReceipt,
  Clock,
  CloseOutcome,
  EntryReceipt,
  FulfillmentIgnoreReason,
  FulfillmentOutcome,
  ParticipantBalance,
  PaymentToken,
  RecordedRoundEvent,
  RecoveryOutcome,
  RoundConfig,
  RoundEvent,
  RoundSnapshot,
  RoundState,
  TimeoutStatus,
} from "../types/raffle";
import { RaffleError, describeError } from "../utils/raffleErrors";
import { AccountingLedger } from "./accountingLedger";
import { RandomnessCoordinatorClient } from "./randomnessCoordinator";
import { recoveryManager } from "./recoveryManager";
import { TicketLedger } from "./ticketLedger";

export interface RoundDependencies {
  payments: PaymentToken;
  randomness: RandomnessCoordinatorClient;
  clock: Clock;
}

export function validateRoundConfig(config: RoundConfig): void {
  const problems: string[] = [];
  if (config.ticketPrice <= 0n) problems.push("ticketPrice must be positive");
  if (!Number.isSafeInteger(config.capacity) || config.capacity <= 0)
    problems.push("capacity must be a positive integer");
  if (!Number.isSafeInteger(config.durationSec) || config.durationSec <= 0)
    problems.push("durationSec must be a positive integer");
  if (!Number.isSafeInteger(config.timeoutSec) || config.timeoutSec <= 0)
    problems.push("timeoutSec must be a positive integer");
  if (!Number.isInteger(config.feeBps) || config.feeBps < 0 || config.feeBps > 10_000)
    problems.push("feeBps must be within 0..10000");
  if (
    !Number.isInteger(config.callerRewardBps) ||
    config.callerRewardBps < 0 ||
    config.callerRewardBps > 10_000
  )
    problems.push("callerRewardBps must be within 0..10000");
  if (
    !Number.isSafeInteger(config.maxTicketsPerParticipant) ||
    config.maxTicketsPerParticipant < 0
  )
    problems.push("maxTicketsPerParticipant must be 0 or a positive integer");
  if (config.recoveryPolicy !== "reopen" && config.recoveryPolicy !== "cancel")
    problems.push("recoveryPolicy must be reopen or cancel");
  if (!config.feeRecipient) problems.push("feeRecipient is required");

  if (problems.length > 0) {
    throw new RaffleError("INVALID_CONFIG", problems.join("; "));
  }
}

/**
 * One raffle round: weighted entries, one randomness draw, pull payouts.
 *
 * Mutating operations hold a reentrance guard for their whole duration,
 * awaited collaborator calls included. Checks run before effects, and
 * effects before transfers, so a rejected operation leaves no trace.
 */
export class RaffleRound {
  readonly id: number;
  readonly config: RoundConfig;
  readonly createdAt: number;
  readonly deadline: number;

  private state: RoundState;
  private winner: string | null;
  private winningIndex: number | null;
  private pendingRequestId: string | null;
  private requestTimestamp: number | null;
  private requestCount: number;
  private randomnessReady: boolean;
  private storedRandomWord: bigint | null;

  private readonly ledger: TicketLedger;
  private readonly accounting: AccountingLedger;
  private readonly events: RecordedRoundEvent[] = [];
  private busy = false;

  private constructor(
    snapshot: RoundSnapshot,
    private readonly deps: RoundDependencies
  ) {
    this.id = snapshot.id;
    this.config = { ...snapshot.config };
    this.createdAt = snapshot.createdAt;
    this.deadline = snapshot.deadline;
    this.state = snapshot.state;
    this.winner = snapshot.winner;
    this.winningIndex = snapshot.winningIndex;
    this.pendingRequestId = snapshot.pendingRequestId;
    this.requestTimestamp = snapshot.requestTimestamp;
    this.requestCount = snapshot.requestCount;
    this.randomnessReady = snapshot.randomnessReady;
    this.storedRandomWord = snapshot.storedRandomWord;
    this.ledger = new TicketLedger(snapshot.ranges);
    this.accounting = new AccountingLedger(snapshot.config, {
      prizePool: snapshot.prizePool,
      feePool: snapshot.feePool,
      collected: snapshot.collected,
      prizeClaimed: snapshot.prizeClaimed,
      balances: snapshot.balances,
    });
  }

  static create(
    id: number,
    config: RoundConfig,
    deps: RoundDependencies
  ): RaffleRound {
    validateRoundConfig(config);
    const createdAt = deps.clock.now();
    return new RaffleRound(
      {
        id,
        config: { ...config, feeRecipient: config.feeRecipient.toLowerCase() },
        state: RoundState.OPEN,
        createdAt,
        deadline: createdAt + config.durationSec,
        prizePool: 0n,
        feePool: 0n,
        collected: 0n,
        winner: null,
        winningIndex: null,
        pendingRequestId: null,
        requestTimestamp: null,
        requestCount: 0,
        randomnessReady: false,
        storedRandomWord: null,
        prizeClaimed: false,
        ranges: [],
        balances: {},
      },
      deps
    );
  }

  static restore(snapshot: RoundSnapshot, deps: RoundDependencies): RaffleRound {
    return new RaffleRound(snapshot, deps);
  }

  /* ---------- Entry ---------- */

  async enter(participant: string, count: number): Promise<EntryReceipt> {
    return this.guarded(async () => {
      const who = participant.toLowerCase();
      const now = this.deps.clock.now();

      if (this.state !== RoundState.OPEN) {
        throw new RaffleError("NOT_OPEN", `Round ${this.id} is ${this.state}`);
      }
      if (now >= this.deadline) {
        throw new RaffleError("PAST_DEADLINE", `Round ${this.id} entry window closed`);
      }
      if (!Number.isSafeInteger(count) || count <= 0) {
        throw new RaffleError("ZERO_COUNT", "Ticket count must be positive");
      }
      const sold = this.ledger.totalSold();
      if (sold + count > this.config.capacity) {
        throw new RaffleError(
          "CAPACITY_EXCEEDED",
          `Only ${this.config.capacity - sold} tickets left`
        );
      }
      const cap = this.config.maxTicketsPerParticipant;
      if (cap > 0 && this.accounting.ticketsOf(who) + count > cap) {
        throw new RaffleError(
          "PER_ADDRESS_CAP",
          `At most ${cap} tickets per participant`
        );
      }

      const quote = this.accounting.quote(count);
      try {
        await this.deps.payments.transferFrom(who, quote.total);
      } catch (err) {
        throw new RaffleError(
          "PAYMENT_FAILED",
          `Payment of ${quote.total} failed: ${describeError(err)}`
        );
      }

      const { rangeStart, rangeEnd } = this.ledger.append(who, count);
      this.accounting.recordPayment(who, count, quote);
      this.emit({
        type: "TicketsPurchased",
        participant: who,
        ticketCount: count,
        rangeStart,
        rangeEnd,
        amountPaid: quote.total,
      });

      const capacityReached = this.ledger.totalSold() === this.config.capacity;
      if (capacityReached) {
        this.state = RoundState.CLOSED;
        this.emit({ type: "CapacityReached", totalSold: this.ledger.totalSold() });
      }

      return {
        participant: who,
        ticketCount: count,
        rangeStart,
        rangeEnd,
        amountPaid: quote.total,
        capacityReached,
      };
    });
  }

  /* ---------- Close / request randomness ---------- */

  async close(caller: string): Promise<CloseOutcome> {
    return this.guarded(async () => {
      const who = caller.toLowerCase();
      const now = this.deps.clock.now();

      if (this.state === RoundState.CALCULATING) {
        throw new RaffleError(
          "ALREADY_REQUESTED",
          `Round ${this.id} already has a randomness draw in progress`
        );
      }
      if (this.state !== RoundState.OPEN && this.state !== RoundState.CLOSED) {
        throw new RaffleError("BAD_STATE", `Round ${this.id} is ${this.state}`);
      }
      const sold = this.ledger.totalSold();
      if (now < this.deadline && sold < this.config.capacity) {
        throw new RaffleError(
          "NOT_READY",
          `Round ${this.id} closes at ${this.deadline} or when full`
        );
      }

      const participants = this.ledger.participantCount();
      if (participants === 0) {
        this.cancel("no_participants");
        return { kind: "cancelled" };
      }

      if (participants === 1) {
        const [only] = this.ledger.participants();
        this.sweepFees(who);
        this.finish(only, null);
        return { kind: "finished", winner: only };
      }

      // Submit first: if the oracle refuses, the round stays exactly as it was.
      const requestId = await this.deps.randomness.submitRequest(this.id);

      this.state = RoundState.CALCULATING;
      this.pendingRequestId = requestId;
      this.requestTimestamp = now;
      this.requestCount += 1;
      this.emit({ type: "RandomnessRequested", requestId });

      this.sweepFees(who);
      return { kind: "requested", requestId };
    });
  }

  /* ---------- Randomness callback ---------- */

  /**
   * Oracle callback. Never throws: the oracle calls back once and cannot be
   * asked again, so anomalies are logged and dropped and the timeout path
   * takes over.
   */
  onRandomnessFulfilled(
    requestId: string,
    randomWords: readonly bigint[]
  ): FulfillmentOutcome {
    const ignore = (reason: FulfillmentIgnoreReason): FulfillmentOutcome => {
      console.warn(
        `⚠️ [RAFFLE ${this.id}] Ignoring fulfillment ${requestId}: ${reason}`
      );
      this.emit({ type: "FulfillmentIgnored", requestId, reason });
      return { status: "ignored", roundId: this.id, requestId, reason };
    };

    if (this.busy) return ignore("busy");

    try {
      const check = this.deps.randomness.receiveResponse(
        { state: this.state, pendingRequestId: this.pendingRequestId },
        requestId,
        randomWords
      );
      if (!check.accepted) return ignore(check.reason);

      if (this.ledger.totalSold() === 0) {
        this.pendingRequestId = null;
        this.cancel("no_participants");
        return ignore("no_participants");
      }

      this.storedRandomWord = check.randomWord;
      this.randomnessReady = true;
      this.pendingRequestId = null;
      this.emit({ type: "RandomnessStored", requestId });
      console.log(`🎲 [RAFFLE ${this.id}] Randomness stored for request ${requestId}`);
      return { status: "stored", roundId: this.id, requestId };
    } catch (err) {
      console.error(
        `❌ [RAFFLE ${this.id}] Fulfillment handling failed:`,
        describeError(err)
      );
      return ignore("internal_error");
    }
  }

  /* ---------- Finalize ---------- */

  async finalize(caller: string): Promise<{ winner: string; winningIndex: number }> {
    return this.guarded(async () => {
      if (this.state !== RoundState.CALCULATING) {
        throw new RaffleError("BAD_STATE", `Round ${this.id} is ${this.state}`);
      }
      if (!this.randomnessReady || this.storedRandomWord === null) {
        throw new RaffleError(
          "RANDOM_NOT_READY",
          `Round ${this.id} has no stored randomness yet`
        );
      }
      const sold = this.ledger.totalSold();
      if (sold === 0) {
        throw new RaffleError("BAD_STATE", `Round ${this.id} sold no tickets`);
      }

      const winningIndex = Number(this.storedRandomWord % BigInt(sold));
      const winner = this.ledger.locate(winningIndex);

      this.storedRandomWord = null;
      this.randomnessReady = false;
      this.finish(winner, winningIndex);
      console.log(
        `🏆 [RAFFLE ${this.id}] Finalized by ${caller.toLowerCase()}: ticket ${winningIndex} → ${winner}`
      );
      return { winner, winningIndex };
    });
  }

  /* ---------- Recovery ---------- */

  timeoutStatus(): TimeoutStatus {
    return recoveryManager.timeoutStatus(this.recoveryView(), this.deps.clock.now());
  }

  async recover(caller: string): Promise<RecoveryOutcome> {
    return this.guarded(async () => {
      recoveryManager.assertRecoverable(this.recoveryView(), this.deps.clock.now());

      const abandoned = this.pendingRequestId;
      this.pendingRequestId = null;
      this.requestTimestamp = null;

      if (this.config.recoveryPolicy === "reopen") {
        this.state = RoundState.OPEN;
        this.emit({ type: "RoundReopened", abandonedRequestId: abandoned });
      } else {
        this.cancel("randomness_timeout");
      }

      console.warn(
        `🛟 [RAFFLE ${this.id}] Recovered by ${caller.toLowerCase()} after randomness timeout (policy=${this.config.recoveryPolicy}, abandoned request ${abandoned})`
      );
      return { policy: this.config.recoveryPolicy, state: this.state };
    });
  }

  /* ---------- Claims ---------- */

  async claimPrize(participant: string): Promise<ClaimReceipt> {
    return this.guarded(async () => {
      const who = participant.toLowerCase();
      if (this.state !== RoundState.FINISHED || this.winner === null) {
        throw new RaffleError("BAD_STATE", `Round ${this.id} has no winner yet`);
      }
      if (who !== this.winner) {
        throw new RaffleError("NOT_WINNER", `${who} did not win round ${this.id}`);
      }

      const amount = this.accounting.takePrize();
      await this.payOut(who, amount, () => this.accounting.restorePrize(amount));
      this.emit({ type: "PrizeClaimed", participant: who, amount });
      return { participant: who, amount };
    });
  }

  async claimRefund(participant: string): Promise<ClaimReceipt> {
    return this.guarded(async () => {
      const who = participant.toLowerCase();
      if (this.state !== RoundState.CANCELLED) {
        throw new RaffleError("NOT_CANCELLED", `Round ${this.id} is ${this.state}`);
      }

      const amount = this.accounting.takeRefund(who);
      await this.payOut(who, amount, () =>
        this.accounting.restoreRefund(who, amount)
      );
      this.emit({ type: "RefundClaimed", participant: who, amount });
      return { participant: who, amount };
    });
  }

  async claimReward(participant: string): Promise<ClaimReceipt> {
    return this.guarded(async () => {
      const who = participant.toLowerCase();
      const amount = this.accounting.takeReward(who);
      await this.payOut(who, amount, () =>
        this.accounting.restoreReward(who, amount)
      );
      this.emit({ type: "RewardClaimed", participant: who, amount });
      return { participant: who, amount };
    });
  }

  /**
   * Pushes the fee recipient's credited share. A failed push leaves it
   * claimable and resolves 0.
   */
  async pushFees(): Promise<bigint> {
    return this.guarded(async () => {
      const recipient = this.config.feeRecipient;
      if (this.accounting.balance(recipient).claimableReward === 0n) return 0n;

      const amount = this.accounting.takeReward(recipient);
      try {
        await this.payOut(recipient, amount, () =>
          this.accounting.restoreReward(recipient, amount)
        );
      } catch (err) {
        console.warn(
          `⚠️ [RAFFLE ${this.id}] Fee transfer to ${recipient} failed, left claimable:`,
          describeError(err)
        );
        return 0n;
      }
      this.emit({ type: "RewardClaimed", participant: recipient, amount });
      return amount;
    });
  }

  /* ---------- Views ---------- */

  getState(): RoundState {
    return this.state;
  }

  getWinner(): string | null {
    return this.winner;
  }

  getPendingRequestId(): string | null {
    return this.pendingRequestId;
  }

  isRandomnessReady(): boolean {
    return this.randomnessReady;
  }

  totalSold(): number {
    return this.ledger.totalSold();
  }

  locate(ticketIndex: number): string {
    return this.ledger.locate(ticketIndex);
  }

  balanceOf(participant: string): ParticipantBalance {
    return this.accounting.balance(participant.toLowerCase());
  }

  /** Whether close() would pass its timing/capacity gate right now. */
  isClosable(): boolean {
    if (this.state !== RoundState.OPEN && this.state !== RoundState.CLOSED) {
      return false;
    }
    return (
      this.deps.clock.now() >= this.deadline ||
      this.ledger.totalSold() >= this.config.capacity
    );
  }

  /** Removes and returns the events emitted since the last drain. */
  drainEvents(): RecordedRoundEvent[] {
    return this.events.splice(0, this.events.length);
  }

  snapshot(): RoundSnapshot {
    const accounting = this.accounting.state();
    return {
      id: this.id,
      config: { ...this.config },
      state: this.state,
      createdAt: this.createdAt,
      deadline: this.deadline,
      prizePool: accounting.prizePool,
      feePool: accounting.feePool,
      collected: accounting.collected,
      winner: this.winner,
      winningIndex: this.winningIndex,
      pendingRequestId: this.pendingRequestId,
      requestTimestamp: this.requestTimestamp,
      requestCount: this.requestCount,
      randomnessReady: this.randomnessReady,
      storedRandomWord: this.storedRandomWord,
      prizeClaimed: accounting.prizeClaimed,
      ranges: this.ledger.entries(),
      balances: accounting.balances,
    };
  }

  /* ---------- Internals ---------- */

  private async guarded<T>(fn: () => Promise<T>): Promise<T> {
    if (this.busy) {
      throw new RaffleError(
        "REENTRANT_CALL",
        `Round ${this.id} is already executing an operation`
      );
    }
    this.busy = true;
    try {
      return await fn();
    } finally {
      this.busy = false;
    }
  }

  /** Effects already applied; `rollback` undoes them if the transfer fails. */
  private async payOut(
    to: string,
    amount: bigint,
    rollback: () => void
  ): Promise<void> {
    if (amount === 0n) return;
    try {
      await this.deps.payments.transfer(to, amount);
    } catch (err) {
      rollback();
      throw new RaffleError(
        "TRANSFER_FAILED",
        `Transfer of ${amount} to ${to} failed: ${describeError(err)}`
      );
    }
  }

  /** Both shares become claimable rewards; pushFees() pays the recipient's out. */
  private sweepFees(caller: string): void {
    const { recipientAmount, callerReward } = this.accounting.sweepFees(caller);
    if (recipientAmount === 0n && callerReward === 0n) return;
    const recipient = this.config.feeRecipient;
    if (recipientAmount > 0n) {
      this.accounting.creditFeeRecipient(recipient, recipientAmount);
    }
    this.emit({
      type: "FeesSwept",
      recipient,
      recipientAmount,
      caller,
      callerReward,
    });
  }

  private finish(winner: string, winningIndex: number | null): void {
    this.state = RoundState.FINISHED;
    this.winner = winner;
    this.winningIndex = winningIndex;
    this.emit({ type: "WinnerSelected", winner, winningIndex });
  }

  private cancel(reason: string): void {
    this.state = RoundState.CANCELLED;
    this.winner = null;
    const refundLiability = this.accounting.recordRefunds();
    this.emit({ type: "RoundCancelled", reason, refundLiability });
  }

  private recoveryView() {
    return {
      state: this.state,
      randomnessReady: this.randomnessReady,
      requestTimestamp: this.requestTimestamp,
      timeoutSec: this.config.timeoutSec,
    };
  }

  private emit(event: RoundEvent): void {
    this.events.push({ ...event, roundId: this.id, at: this.deps.clock.now() });
  }
}
