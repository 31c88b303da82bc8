import { RoundRepository } from "../db/roundRepository";
import { ParticipantView, RoundView } from "../types";
import {
  ClaimReceipt,
  Clock,
  CloseOutcome,
  EntryReceipt,
  FulfillmentOutcome,
  PaymentToken,
  RandomnessOracle,
  RecordedRoundEvent,
  RecoveryOutcome,
  RoundConfig,
  RoundState,
  TimeoutStatus,
  systemClock,
} from "../types/raffle";
import { AuditActionType, auditDataOperation } from "../utils/auditLogger";
import { RaffleError, describeError } from "../utils/raffleErrors";
import { KeyedMutex } from "../utils/roundMutex";
import { RandomnessCoordinatorClient } from "./randomnessCoordinator";
import { RaffleRound, RoundDependencies } from "./roundStateMachine";

export interface RaffleServiceOptions {
  repository: RoundRepository;
  payments: PaymentToken;
  oracle: RandomnessOracle;
  defaults: RoundConfig;
  clock?: Clock;
  /** Request randomness as soon as an entry fills the round (default true). */
  autoCloseOnCapacity?: boolean;
}

export interface EntryResult extends EntryReceipt {
  /** Present when the entry filled the round and close() was attempted. */
  close: CloseOutcome | { kind: "failed"; code: string; message: string } | null;
}

export interface EnterOptions {
  /** Tickets the participant must hold before this entry; a signed entry carries it. */
  nonce?: number;
}

function roundNotFound(roundId: number): RaffleError {
  return new RaffleError("ROUND_NOT_FOUND", `Round ${roundId} does not exist`);
}

export function toRoundView(round: RaffleRound): RoundView {
  const s = round.snapshot();
  return {
    id: s.id,
    state: s.state,
    createdAt: s.createdAt,
    deadline: s.deadline,
    capacity: s.config.capacity,
    ticketPrice: s.config.ticketPrice.toString(),
    feeBps: s.config.feeBps,
    totalSold: round.totalSold(),
    participants: new Set(s.ranges.map((r) => r.participant)).size,
    prizePool: s.prizePool.toString(),
    feePool: s.feePool.toString(),
    collected: s.collected.toString(),
    winner: s.winner,
    winningIndex: s.winningIndex,
    pendingRequestId: s.pendingRequestId,
    requestTimestamp: s.requestTimestamp,
    randomnessReady: s.randomnessReady,
    prizeClaimed: s.prizeClaimed,
    recoveryPolicy: s.config.recoveryPolicy,
    closable: round.isClosable(),
  };
}

/**
 * Entry point for everything that touches rounds: loads the aggregate, runs
 * one operation on it under the round's mutex, then persists the snapshot
 * together with the events the operation emitted.
 *
 * A close is saved before the fee recipient is paid, in an operation of its
 * own, so a delivery for the new request always finds its round.
 */
export class RaffleService {
  private readonly repository: RoundRepository;
  private readonly deps: RoundDependencies;
  private readonly defaults: RoundConfig;
  private readonly autoCloseOnCapacity: boolean;
  private readonly mutex = new KeyedMutex<number>(
    (roundId) =>
      new RaffleError(
        "REENTRANT_CALL",
        `Round ${roundId} is already executing an operation`
      )
  );

  constructor(options: RaffleServiceOptions) {
    this.repository = options.repository;
    this.defaults = options.defaults;
    this.autoCloseOnCapacity = options.autoCloseOnCapacity ?? true;
    this.deps = {
      payments: options.payments,
      randomness: new RandomnessCoordinatorClient(options.oracle),
      clock: options.clock ?? systemClock,
    };
  }

  /* ---------- Commands ---------- */

  async createRound(overrides: Partial<RoundConfig> = {}): Promise<RoundView> {
    const config: RoundConfig = { ...this.defaults, ...overrides };
    const id = await this.repository.nextId();
    const round = RaffleRound.create(id, config, this.deps);
    await this.repository.insert(round.snapshot(), round.drainEvents());

    auditDataOperation(
      AuditActionType.CREATE_ROUND,
      {
        roundId: id,
        ticketPrice: config.ticketPrice,
        capacity: config.capacity,
        deadline: round.deadline,
      },
      "low"
    );
    return toRoundView(round);
  }

  async enter(
    roundId: number,
    participant: string,
    ticketCount: number,
    options: EnterOptions = {}
  ): Promise<EntryResult> {
    const result = await this.mutate<EntryResult>(roundId, async (round) => {
      if (
        options.nonce !== undefined &&
        round.balanceOf(participant).ticketsOwned !== options.nonce
      ) {
        throw new RaffleError(
          "STALE_NONCE",
          `Entry nonce ${options.nonce} does not match the tickets ${participant.toLowerCase()} holds in round ${roundId}`
        );
      }
      const receipt = await round.enter(participant, ticketCount);
      console.log(
        `🎟️ [RAFFLE ${roundId}] ${receipt.participant} bought ${receipt.ticketCount} tickets #${receipt.rangeStart}..#${receipt.rangeEnd}`
      );
      if (!receipt.capacityReached || !this.autoCloseOnCapacity) {
        return { ...receipt, close: null };
      }

      // The entry stands even if the draw cannot be requested yet; the
      // keeper or any caller can retry close() on the CLOSED round.
      try {
        const outcome = await round.close(receipt.participant);
        return { ...receipt, close: outcome };
      } catch (err) {
        const code = err instanceof RaffleError ? err.code : "INTERNAL";
        console.warn(
          `⚠️ [RAFFLE ${roundId}] Auto-close after capacity failed (${code}):`,
          describeError(err)
        );
        return {
          ...receipt,
          close: { kind: "failed", code, message: describeError(err) },
        };
      }
    });

    if (result.close && result.close.kind !== "failed") {
      await this.pushFees(roundId);
    }
    return result;
  }

  async close(roundId: number, caller: string): Promise<CloseOutcome> {
    const outcome = await this.mutate(roundId, async (round) => {
      const closed = await round.close(caller);
      auditDataOperation(
        AuditActionType.CLOSE_ROUND,
        { roundId, caller: caller.toLowerCase(), outcome: closed.kind },
        closed.kind === "requested" ? "medium" : "high"
      );
      return closed;
    });

    if (outcome.kind !== "cancelled") {
      await this.pushFees(roundId);
    }
    return outcome;
  }

  /**
   * Routes an oracle delivery to the round waiting on `requestId`. Never
   * throws: failures are logged and reported as an ignored outcome.
   */
  async fulfill(
    requestId: string,
    randomWords: readonly bigint[]
  ): Promise<FulfillmentOutcome> {
    try {
      const roundId = await this.repository.findByPendingRequest(requestId);
      if (roundId === null) {
        console.warn(
          `⚠️ [RAFFLE] Ignoring fulfillment ${requestId}: no round is waiting on it`
        );
        return {
          status: "ignored",
          roundId: null,
          requestId,
          reason: "unknown_request",
        };
      }

      return await this.mutate(roundId, async (round) => {
        const outcome = round.onRandomnessFulfilled(requestId, randomWords);
        auditDataOperation(
          AuditActionType.FULFILL_RANDOMNESS,
          {
            roundId,
            requestId,
            status: outcome.status,
            reason: outcome.status === "ignored" ? outcome.reason : undefined,
          },
          "medium"
        );
        return outcome;
      });
    } catch (err) {
      console.error(
        `❌ [RAFFLE] Fulfillment ${requestId} could not be applied:`,
        describeError(err)
      );
      return {
        status: "ignored",
        roundId: null,
        requestId,
        reason: "internal_error",
      };
    }
  }

  async finalize(
    roundId: number,
    caller: string
  ): Promise<{ winner: string; winningIndex: number }> {
    return this.mutate(roundId, async (round) => {
      const result = await round.finalize(caller);
      auditDataOperation(
        AuditActionType.FINALIZE_ROUND,
        { roundId, caller: caller.toLowerCase(), ...result },
        "high"
      );
      return result;
    });
  }

  async recover(roundId: number, caller: string): Promise<RecoveryOutcome> {
    return this.mutate(roundId, async (round) => {
      const outcome = await round.recover(caller);
      auditDataOperation(
        AuditActionType.RECOVER_ROUND,
        { roundId, caller: caller.toLowerCase(), ...outcome },
        "high"
      );
      return outcome;
    });
  }

  async claimPrize(roundId: number, participant: string): Promise<ClaimReceipt> {
    return this.mutate(roundId, (round) => round.claimPrize(participant));
  }

  async claimRefund(roundId: number, participant: string): Promise<ClaimReceipt> {
    return this.mutate(roundId, (round) => round.claimRefund(participant));
  }

  async claimReward(roundId: number, participant: string): Promise<ClaimReceipt> {
    return this.mutate(roundId, (round) => round.claimReward(participant));
  }

  /**
   * Pays out the fee recipient's credited share. The close it follows is
   * already stored, so a failure here is logged and the share stays
   * claimable.
   */
  private async pushFees(roundId: number): Promise<void> {
    try {
      const amount = await this.mutate(roundId, (round) => round.pushFees());
      if (amount > 0n) {
        console.log(`💸 [RAFFLE ${roundId}] Pushed ${amount} in fees`);
      }
    } catch (err) {
      console.error(
        `❌ [RAFFLE ${roundId}] Fee push failed, the share stays claimable:`,
        describeError(err)
      );
    }
  }

  /* ---------- Queries ---------- */

  async getRound(roundId: number): Promise<RoundView> {
    return toRoundView(await this.load(roundId));
  }

  async listRounds(states?: readonly RoundState[]): Promise<RoundView[]> {
    const ids = await this.repository.listIds(states);
    const views: RoundView[] = [];
    for (const id of ids) {
      views.push(await this.getRound(id));
    }
    return views;
  }

  async timeoutStatus(roundId: number): Promise<TimeoutStatus> {
    return (await this.load(roundId)).timeoutStatus();
  }

  async locate(roundId: number, ticketIndex: number): Promise<string> {
    return (await this.load(roundId)).locate(ticketIndex);
  }

  async participant(roundId: number, address: string): Promise<ParticipantView> {
    const round = await this.load(roundId);
    const balance = round.balanceOf(address);
    return {
      participant: address.toLowerCase(),
      ticketsOwned: balance.ticketsOwned,
      amountPaid: balance.amountPaid.toString(),
      claimableRefund: balance.claimableRefund.toString(),
      refundClaimed: balance.refundClaimed,
      claimableReward: balance.claimableReward.toString(),
    };
  }

  async events(roundId: number): Promise<RecordedRoundEvent[]> {
    await this.load(roundId);
    return this.repository.listEvents(roundId);
  }

  /* ---------- Internals ---------- */

  private async load(roundId: number): Promise<RaffleRound> {
    const snapshot = await this.repository.load(roundId);
    if (!snapshot) throw roundNotFound(roundId);
    return RaffleRound.restore(snapshot, this.deps);
  }

  /**
   * Runs one operation on a freshly loaded, locked round. A rejected
   * operation leaves the round unchanged, so nothing is written.
   */
  private async mutate<T>(
    roundId: number,
    fn: (round: RaffleRound) => Promise<T> | T
  ): Promise<T> {
    return this.mutex.run(roundId, () =>
      this.repository.update(roundId, async (snapshot) => {
        if (!snapshot) throw roundNotFound(roundId);
        const round = RaffleRound.restore(snapshot, this.deps);
        const result = await fn(round);
        return { result, snapshot: round.snapshot(), events: round.drainEvents() };
      })
    );
  }
}
