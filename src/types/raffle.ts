export enum RoundState {
  OPEN = "OPEN",
  /** Capacity reached; entries stop, close() may run immediately. */
  CLOSED = "CLOSED",
  CALCULATING = "CALCULATING",
  FINISHED = "FINISHED",
  CANCELLED = "CANCELLED",
}

export type RecoveryPolicy = "reopen" | "cancel";

/** Immutable per-round configuration, fixed when the round is created. */
export interface RoundConfig {
  /** Base price of one ticket in payment token base units. */
  ticketPrice: bigint;
  capacity: number;
  /** Deadline offset from creation, in seconds. */
  durationSec: number;
  /** How long a randomness request may stay unanswered before recovery. */
  timeoutSec: number;
  /** Additive fee charged on top of the base price, in basis points. */
  feeBps: number;
  /** 0 disables the per-participant cap. */
  maxTicketsPerParticipant: number;
  recoveryPolicy: RecoveryPolicy;
  /** Share of swept fees credited to the caller of close(), in basis points. */
  callerRewardBps: number;
  feeRecipient: string;
}

export interface TicketRange {
  participant: string;
  cumulativeUpperBound: number;
}

export interface ParticipantBalance {
  ticketsOwned: number;
  amountPaid: bigint;
  claimableRefund: bigint;
  refundClaimed: boolean;
  claimableReward: bigint;
}

export interface TicketQuote {
  base: bigint;
  fee: bigint;
  total: bigint;
}

export type FulfillmentIgnoreReason =
  | "bad_state"
  | "unknown_request"
  | "empty_payload"
  | "invalid_word"
  | "no_participants"
  | "busy"
  | "internal_error";

export type RoundEvent =
  | {
      type: "TicketsPurchased";
      participant: string;
      ticketCount: number;
      rangeStart: number;
      rangeEnd: number;
      amountPaid: bigint;
    }
  | { type: "CapacityReached"; totalSold: number }
  | {
      type: "FeesSwept";
      recipient: string;
      recipientAmount: bigint;
      caller: string;
      callerReward: bigint;
    }
  | { type: "RandomnessRequested"; requestId: string }
  | { type: "RandomnessStored"; requestId: string }
  | {
      type: "FulfillmentIgnored";
      requestId: string;
      reason: FulfillmentIgnoreReason;
    }
  | { type: "WinnerSelected"; winner: string; winningIndex: number | null }
  | { type: "RoundCancelled"; reason: string; refundLiability: bigint }
  | { type: "RoundReopened"; abandonedRequestId: string | null }
  | { type: "PrizeClaimed"; participant: string; amount: bigint }
  | { type: "RefundClaimed"; participant: string; amount: bigint }
  | { type: "RewardClaimed"; participant: string; amount: bigint };

export type RecordedRoundEvent = RoundEvent & {
  roundId: number;
  at: number;
};

/** Plain-data copy of a round, used for persistence and read views. */
export interface RoundSnapshot {
  id: number;
  config: RoundConfig;
  state: RoundState;
  createdAt: number;
  deadline: number;
  prizePool: bigint;
  feePool: bigint;
  collected: bigint;
  winner: string | null;
  winningIndex: number | null;
  pendingRequestId: string | null;
  requestTimestamp: number | null;
  requestCount: number;
  randomnessReady: boolean;
  storedRandomWord: bigint | null;
  prizeClaimed: boolean;
  ranges: TicketRange[];
  balances: Record<string, ParticipantBalance>;
}

export interface TimeoutStatus {
  shouldRecover: boolean;
  secondsRemaining: number;
}

export interface EntryReceipt {
  participant: string;
  ticketCount: number;
  rangeStart: number;
  rangeEnd: number;
  amountPaid: bigint;
  capacityReached: boolean;
}

export type CloseOutcome =
  | { kind: "requested"; requestId: string }
  | { kind: "finished"; winner: string }
  | { kind: "cancelled" };

export type FulfillmentOutcome =
  | { status: "stored"; roundId: number; requestId: string }
  | {
      status: "ignored";
      roundId: number | null;
      requestId: string;
      reason: FulfillmentIgnoreReason;
    };

export interface RecoveryOutcome {
  policy: RecoveryPolicy;
  state: RoundState;
}

export interface ClaimReceipt {
  participant: string;
  amount: bigint;
}

/* ---------- Collaborators ---------- */

/** Value-transfer service holding the round's funds. */
export interface PaymentToken {
  /** Pulls `amount` from `from` into the raffle treasury. */
  transferFrom(from: string, amount: bigint): Promise<void>;
  /** Pays `amount` out of the treasury to `to`. */
  transfer(to: string, amount: bigint): Promise<void>;
}

export interface RandomnessRequest {
  roundId: number;
  numWords: number;
}

export type FulfillmentHandler = (
  requestId: string,
  randomWords: bigint[]
) => void;

export interface RandomnessOracle {
  /** Submits one request; resolves with the oracle's request id. */
  requestRandomWords(request: RandomnessRequest): Promise<string>;
  /** Subscribes to deliveries; returns an unsubscribe function. */
  onFulfillment?(handler: FulfillmentHandler): () => void;
}

export interface Clock {
  /** Current unix time in seconds. */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};
