import { TicketRange } from "../types/raffle";
import { RaffleError } from "../utils/raffleErrors";

/**
 * Append-only weighted entry ledger.
 *
 * Each purchase appends one range whose upper bound is the running ticket
 * total, so participant `p` of range `i` owns global indices
 * `[ranges[i-1].cumulativeUpperBound, ranges[i].cumulativeUpperBound - 1]`.
 * Gate checks (state, deadline, capacity, caps) belong to the round; the
 * ledger only guards the strictly increasing bounds it depends on.
 */
export class TicketLedger {
  private readonly ranges: TicketRange[];
  private readonly owners = new Set<string>();

  constructor(ranges: readonly TicketRange[] = []) {
    this.ranges = [];
    for (const r of ranges) {
      this.push(r.participant, r.cumulativeUpperBound);
    }
  }

  append(
    participant: string,
    count: number
  ): { rangeStart: number; rangeEnd: number } {
    if (!Number.isSafeInteger(count) || count <= 0) {
      throw new RaffleError("ZERO_COUNT", "Ticket count must be positive");
    }
    const rangeStart = this.totalSold();
    const upper = rangeStart + count;
    this.push(participant, upper);
    return { rangeStart, rangeEnd: upper - 1 };
  }

  /** Owner of global ticket `ticketIndex` (binary search over bounds). */
  locate(ticketIndex: number): string {
    const total = this.totalSold();
    if (
      !Number.isSafeInteger(ticketIndex) ||
      ticketIndex < 0 ||
      ticketIndex >= total
    ) {
      throw new RaffleError(
        "TICKET_OUT_OF_RANGE",
        `Ticket ${ticketIndex} is outside [0, ${total})`
      );
    }

    // first range whose upper bound is strictly greater than the index
    let lo = 0;
    let hi = this.ranges.length - 1;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.ranges[mid].cumulativeUpperBound > ticketIndex) {
        hi = mid;
      } else {
        lo = mid + 1;
      }
    }
    return this.ranges[lo].participant;
  }

  totalSold(): number {
    const last = this.ranges[this.ranges.length - 1];
    return last ? last.cumulativeUpperBound : 0;
  }

  participantCount(): number {
    return this.owners.size;
  }

  participants(): string[] {
    return [...this.owners];
  }

  entries(): TicketRange[] {
    return this.ranges.map((r) => ({ ...r }));
  }

  private push(participant: string, cumulativeUpperBound: number): void {
    if (cumulativeUpperBound <= this.totalSold()) {
      throw new Error(
        `Ticket range bounds must be strictly increasing (got ${cumulativeUpperBound} after ${this.totalSold()})`
      );
    }
    this.ranges.push({ participant, cumulativeUpperBound });
    this.owners.add(participant);
  }
}
