/** JSON-safe view of a round: bigints become decimal strings. */
export interface RoundView {
  id: number;
  state: string;
  createdAt: number;
  deadline: number;
  capacity: number;
  ticketPrice: string;
  feeBps: number;
  totalSold: number;
  participants: number;
  prizePool: string;
  feePool: string;
  collected: string;
  winner: string | null;
  winningIndex: number | null;
  pendingRequestId: string | null;
  requestTimestamp: number | null;
  randomnessReady: boolean;
  prizeClaimed: boolean;
  recoveryPolicy: string;
  /** close() would pass its timing/capacity gate now. */
  closable: boolean;
}

export interface ParticipantView {
  participant: string;
  ticketsOwned: number;
  amountPaid: string;
  claimableRefund: string;
  refundClaimed: boolean;
  claimableReward: string;
}

/** POST bodies (validated in middleware/validation.ts) */
export interface EnterRoundRequest {
  participant: string;
  ticketCount: number;
  /** Tickets the participant already holds in the round. */
  nonce: number;
  /** personal_sign signature over entryAuthorizationMessage(). */
  signature: string;
}

export interface CallerRequest {
  caller: string;
}

export interface ClaimRequest {
  participant: string;
}
