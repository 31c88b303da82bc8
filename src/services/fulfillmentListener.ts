import { FulfillmentOutcome, RandomnessOracle } from "../types/raffle";
import { RaffleService } from "./raffleService";

const MAX_REMEMBERED = 1000;

/**
 * Forwards oracle deliveries to the service. Applied deliveries are
 * remembered so RPC replays of the same log do not hit the database again.
 * Ignored ones are not, so a log the provider emits again is forwarded again.
 */
export class FulfillmentListener {
  private readonly processed = new Set<string>();
  private unsubscribe: (() => void) | null = null;

  constructor(
    private readonly oracle: RandomnessOracle,
    private readonly service: RaffleService
  ) {}

  start(): boolean {
    if (this.unsubscribe) return true;
    if (!this.oracle.onFulfillment) {
      console.warn(
        "⚠️ Randomness oracle exposes no delivery feed; relying on direct fulfill calls"
      );
      return false;
    }

    console.log("🔔 Starting randomness fulfillment listener...");
    this.unsubscribe = this.oracle.onFulfillment((requestId, randomWords) => {
      void this.handle(requestId, randomWords);
    });
    console.log("👂 Fulfillment listener active, waiting for deliveries...");
    return true;
  }

  stop(): void {
    if (!this.unsubscribe) return;
    this.unsubscribe();
    this.unsubscribe = null;
    console.log("⏹️ Stopped fulfillment listener");
  }

  /** Resolves null for a delivery skipped as a duplicate. */
  async handle(
    requestId: string,
    randomWords: readonly bigint[]
  ): Promise<FulfillmentOutcome | null> {
    if (this.processed.has(requestId)) {
      console.log(`⚙️ Skipping duplicate delivery for request ${requestId}`);
      return null;
    }

    console.log(`🎯 Randomness delivered for request ${requestId}`);
    const outcome = await this.service.fulfill(requestId, randomWords);

    if (outcome.status === "stored") {
      this.remember(requestId);
      console.log(
        `✅ Round ${outcome.roundId} has randomness for request ${requestId}`
      );
    }
    return outcome;
  }

  private remember(requestId: string): void {
    this.processed.add(requestId);
    if (this.processed.size > MAX_REMEMBERED) {
      const oldest = this.processed.values().next();
      if (!oldest.done) this.processed.delete(oldest.value);
    }
  }
}
