export type RaffleErrorCode =
  // entry
  | "NOT_OPEN"
  | "PAST_DEADLINE"
  | "ZERO_COUNT"
  | "CAPACITY_EXCEEDED"
  | "PER_ADDRESS_CAP"
  | "PAYMENT_FAILED"
  | "INVALID_SIGNATURE"
  | "STALE_NONCE"
  // close / randomness
  | "NOT_READY"
  | "ALREADY_REQUESTED"
  | "INSUFFICIENT_ORACLE_FUNDING"
  | "ORACLE_UNAVAILABLE"
  // finalize
  | "RANDOM_NOT_READY"
  | "BAD_STATE"
  // claims
  | "NOT_WINNER"
  | "ALREADY_CLAIMED"
  | "NO_REWARD"
  | "NO_REFUND"
  | "NOT_CANCELLED"
  | "TRANSFER_FAILED"
  // recovery
  | "NOT_STUCK"
  | "TIMEOUT_NOT_ELAPSED"
  // misc
  | "REENTRANT_CALL"
  | "TICKET_OUT_OF_RANGE"
  | "ROUND_NOT_FOUND"
  | "INVALID_CONFIG";

/**
 * Precondition violation on a user-initiated operation. Thrown before any
 * state change, so the caller may retry once the condition changes.
 */
export class RaffleError extends Error {
  readonly code: RaffleErrorCode;

  constructor(code: RaffleErrorCode, message?: string) {
    super(message ?? code);
    this.name = "RaffleError";
    this.code = code;
  }
}

export function isRaffleError(
  err: unknown,
  code?: RaffleErrorCode
): err is RaffleError {
  return err instanceof RaffleError && (code === undefined || err.code === code);
}

/** HTTP status for each error code; unknown codes fall back to 409. */
const STATUS_BY_CODE: Partial<Record<RaffleErrorCode, number>> = {
  ZERO_COUNT: 400,
  TICKET_OUT_OF_RANGE: 400,
  INVALID_CONFIG: 400,
  INVALID_SIGNATURE: 401,
  PAYMENT_FAILED: 402,
  NOT_WINNER: 403,
  ROUND_NOT_FOUND: 404,
  TRANSFER_FAILED: 502,
  ORACLE_UNAVAILABLE: 503,
  INSUFFICIENT_ORACLE_FUNDING: 503,
};

export function httpStatusFor(code: RaffleErrorCode): number {
  return STATUS_BY_CODE[code] ?? 409;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
