import {
  FulfillmentIgnoreReason,
  RandomnessOracle,
  RoundState,
} from "../types/raffle";
import { RaffleError, describeError, isRaffleError } from "../utils/raffleErrors";

/** What the round expects when a fulfillment arrives. */
export interface FulfillmentExpectation {
  state: RoundState;
  pendingRequestId: string | null;
}

export type ResponseCheck =
  | { accepted: true; randomWord: bigint }
  | { accepted: false; reason: FulfillmentIgnoreReason };

/**
 * Boundary with the randomness oracle. A request is submitted once per
 * close(); the response arrives later, from a separate actor, and is joined
 * back to the round only through the stored request id.
 */
export class RandomnessCoordinatorClient {
  constructor(
    private readonly oracle: RandomnessOracle,
    private readonly numWords = 1
  ) {}

  async submitRequest(roundId: number): Promise<string> {
    let requestId: string;
    try {
      requestId = await this.oracle.requestRandomWords({
        roundId,
        numWords: this.numWords,
      });
    } catch (err) {
      if (isRaffleError(err)) throw err;
      throw new RaffleError(
        "ORACLE_UNAVAILABLE",
        `Randomness request failed: ${describeError(err)}`
      );
    }

    if (typeof requestId !== "string" || requestId.trim() === "") {
      throw new RaffleError(
        "ORACLE_UNAVAILABLE",
        "Randomness oracle returned an empty request id"
      );
    }
    return requestId;
  }

  /**
   * Validates a callback against the round's single pending request. Every
   * rejection is a reason, never an exception: the oracle will not retry.
   */
  receiveResponse(
    expectation: FulfillmentExpectation,
    requestId: string,
    randomWords: readonly bigint[]
  ): ResponseCheck {
    if (expectation.state !== RoundState.CALCULATING) {
      return { accepted: false, reason: "bad_state" };
    }
    if (
      expectation.pendingRequestId === null ||
      expectation.pendingRequestId !== requestId
    ) {
      return { accepted: false, reason: "unknown_request" };
    }
    if (!Array.isArray(randomWords) || randomWords.length === 0) {
      return { accepted: false, reason: "empty_payload" };
    }
    const word = randomWords[0];
    if (typeof word !== "bigint" || word < 0n) {
      return { accepted: false, reason: "invalid_word" };
    }
    return { accepted: true, randomWord: word };
  }
}
