import {
  Clock,
  FulfillmentHandler,
  PaymentToken,
  RandomnessOracle,
  RandomnessRequest,
  RoundConfig,
} from "../../types/raffle";

export const ALICE = "0x000000000000000000000000000000000000a11c";
export const BOB = "0x0000000000000000000000000000000000000b0b";
export const CAROL = "0x00000000000000000000000000000000000ca201";
export const KEEPER = "0x000000000000000000000000000000000000beef";
export const FEE_SINK = "0x000000000000000000000000000000000000fee5";

export class ManualClock implements Clock {
  constructor(private current = 1_000_000) {}

  now(): number {
    return this.current;
  }

  advance(seconds: number): void {
    this.current += seconds;
  }

  set(seconds: number): void {
    this.current = seconds;
  }
}

export interface TokenCall {
  kind: "transferFrom" | "transfer";
  account: string;
  amount: bigint;
}

/**
 * Records every movement; individual directions can be made to fail, and a
 * hook can run inside a transfer to simulate a re-entering recipient.
 */
export class FakePaymentToken implements PaymentToken {
  readonly calls: TokenCall[] = [];
  failTransferFrom = false;
  failTransfer = false;
  /** Recipients whose payouts fail. */
  readonly rejectRecipients = new Set<string>();
  onTransfer: ((to: string, amount: bigint) => Promise<void>) | null = null;

  async transferFrom(from: string, amount: bigint): Promise<void> {
    if (this.failTransferFrom) throw new Error("allowance too low");
    this.calls.push({ kind: "transferFrom", account: from, amount });
  }

  async transfer(to: string, amount: bigint): Promise<void> {
    if (this.failTransfer || this.rejectRecipients.has(to)) {
      throw new Error("recipient rejected transfer");
    }
    if (this.onTransfer) await this.onTransfer(to, amount);
    this.calls.push({ kind: "transfer", account: to, amount });
  }

  paidTo(account: string): bigint {
    return this.calls
      .filter((c) => c.kind === "transfer" && c.account === account)
      .reduce((sum, c) => sum + c.amount, 0n);
  }

  collectedFrom(account: string): bigint {
    return this.calls
      .filter((c) => c.kind === "transferFrom" && c.account === account)
      .reduce((sum, c) => sum + c.amount, 0n);
  }
}

/** Issues sequential request ids ("req-1", "req-2", ...) and delivers on demand. */
export class FakeRandomnessOracle implements RandomnessOracle {
  readonly requests: RandomnessRequest[] = [];
  failWith: Error | null = null;
  private handlers: FulfillmentHandler[] = [];

  async requestRandomWords(request: RandomnessRequest): Promise<string> {
    if (this.failWith) throw this.failWith;
    this.requests.push(request);
    return `req-${this.requests.length}`;
  }

  onFulfillment(handler: FulfillmentHandler): () => void {
    this.handlers.push(handler);
    return () => {
      this.handlers = this.handlers.filter((h) => h !== handler);
    };
  }

  deliver(requestId: string, randomWords: bigint[]): void {
    for (const handler of this.handlers) handler(requestId, randomWords);
  }

  subscriberCount(): number {
    return this.handlers.length;
  }
}

export function testConfig(overrides: Partial<RoundConfig> = {}): RoundConfig {
  return {
    ticketPrice: 100n,
    capacity: 10,
    durationSec: 3600,
    timeoutSec: 600,
    feeBps: 1000,
    maxTicketsPerParticipant: 0,
    recoveryPolicy: "reopen",
    callerRewardBps: 5000,
    feeRecipient: FEE_SINK,
    ...overrides,
  };
}

/** Lets queued promise callbacks run. */
export function flushMicrotasks(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
