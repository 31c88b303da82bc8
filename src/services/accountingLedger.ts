import { ParticipantBalance, RoundConfig, TicketQuote } from "../types/raffle";
import { RaffleError } from "../utils/raffleErrors";

export const BPS_DENOMINATOR = 10_000n;

export interface AccountingState {
  prizePool: bigint;
  feePool: bigint;
  collected: bigint;
  prizeClaimed: boolean;
  balances: Record<string, ParticipantBalance>;
}

export interface FeeSweep {
  recipientAmount: bigint;
  callerReward: bigint;
}

function emptyBalance(): ParticipantBalance {
  return {
    ticketsOwned: 0,
    amountPaid: 0n,
    claimableRefund: 0n,
    refundClaimed: false,
    claimableReward: 0n,
  };
}

/**
 * Prize and fee buckets plus the pull-payment liabilities of one round.
 *
 * Every `take*` method zeroes the liability and returns the amount; the caller
 * transfers afterwards and calls the matching `restore*` only if that
 * transfer fails.
 */
export class AccountingLedger {
  private prizePool: bigint;
  private feePool: bigint;
  private collected: bigint;
  private prizeClaimed: boolean;
  private readonly balances = new Map<string, ParticipantBalance>();

  constructor(
    private readonly config: Pick<
      RoundConfig,
      "ticketPrice" | "feeBps" | "callerRewardBps"
    >,
    state?: AccountingState
  ) {
    this.prizePool = state?.prizePool ?? 0n;
    this.feePool = state?.feePool ?? 0n;
    this.collected = state?.collected ?? 0n;
    this.prizeClaimed = state?.prizeClaimed ?? false;
    for (const [participant, b] of Object.entries(state?.balances ?? {})) {
      this.balances.set(participant, { ...b });
    }
  }

  /** Fee is added on top of the base price, never carved out of it. */
  quote(count: number): TicketQuote {
    const base = this.config.ticketPrice * BigInt(count);
    const fee = (base * BigInt(this.config.feeBps)) / BPS_DENOMINATOR;
    return { base, fee, total: base + fee };
  }

  recordPayment(participant: string, count: number, quote: TicketQuote): void {
    const balance = this.ensureBalance(participant);
    balance.ticketsOwned += count;
    balance.amountPaid += quote.total;
    this.prizePool += quote.base;
    this.feePool += quote.fee;
    this.collected += quote.total;
  }

  /**
   * Empties the fee pool: the caller's share becomes a claimable reward, the
   * remainder is returned for the fee recipient.
   */
  sweepFees(caller: string): FeeSweep {
    const swept = this.feePool;
    const callerReward =
      (swept * BigInt(this.config.callerRewardBps)) / BPS_DENOMINATOR;
    this.feePool = 0n;
    if (callerReward > 0n) {
      this.ensureBalance(caller).claimableReward += callerReward;
    }
    return { recipientAmount: swept - callerReward, callerReward };
  }

  creditFeeRecipient(recipient: string, amount: bigint): void {
    this.ensureBalance(recipient).claimableReward += amount;
  }

  /** Base price of every ticket becomes refundable; fees are not refunded. */
  recordRefunds(): bigint {
    let total = 0n;
    for (const balance of this.balances.values()) {
      if (balance.ticketsOwned === 0) continue;
      const refund = this.config.ticketPrice * BigInt(balance.ticketsOwned);
      balance.claimableRefund = refund;
      total += refund;
    }
    return total;
  }

  takePrize(): bigint {
    if (this.prizeClaimed) {
      throw new RaffleError("ALREADY_CLAIMED", "Prize already claimed");
    }
    const amount = this.prizePool;
    this.prizePool = 0n;
    this.prizeClaimed = true;
    return amount;
  }

  restorePrize(amount: bigint): void {
    this.prizePool += amount;
    this.prizeClaimed = false;
  }

  takeRefund(participant: string): bigint {
    const balance = this.balances.get(participant);
    if (!balance || balance.ticketsOwned === 0) {
      throw new RaffleError("NO_REFUND", "Nothing to refund for this address");
    }
    if (balance.refundClaimed) {
      throw new RaffleError("ALREADY_CLAIMED", "Refund already claimed");
    }
    const amount = balance.claimableRefund;
    balance.claimableRefund = 0n;
    balance.refundClaimed = true;
    this.prizePool -= amount;
    return amount;
  }

  restoreRefund(participant: string, amount: bigint): void {
    const balance = this.ensureBalance(participant);
    balance.claimableRefund += amount;
    balance.refundClaimed = false;
    this.prizePool += amount;
  }

  takeReward(participant: string): bigint {
    const balance = this.balances.get(participant);
    if (!balance || balance.claimableReward === 0n) {
      throw new RaffleError("NO_REWARD", "No reward to claim");
    }
    const amount = balance.claimableReward;
    balance.claimableReward = 0n;
    return amount;
  }

  restoreReward(participant: string, amount: bigint): void {
    this.ensureBalance(participant).claimableReward += amount;
  }

  ticketsOf(participant: string): number {
    return this.balances.get(participant)?.ticketsOwned ?? 0;
  }

  balance(participant: string): ParticipantBalance {
    const balance = this.balances.get(participant);
    return balance ? { ...balance } : emptyBalance();
  }

  isPrizeClaimed(): boolean {
    return this.prizeClaimed;
  }

  state(): AccountingState {
    const balances: Record<string, ParticipantBalance> = {};
    for (const [participant, b] of this.balances) {
      balances[participant] = { ...b };
    }
    return {
      prizePool: this.prizePool,
      feePool: this.feePool,
      collected: this.collected,
      prizeClaimed: this.prizeClaimed,
      balances,
    };
  }

  private ensureBalance(participant: string): ParticipantBalance {
    let balance = this.balances.get(participant);
    if (!balance) {
      balance = emptyBalance();
      this.balances.set(participant, balance);
    }
    return balance;
  }
}
