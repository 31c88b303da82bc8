import {
  RecordedRoundEvent,
  RoundSnapshot,
  RoundState,
} from "../types/raffle";
import { RoundChange, RoundRepository } from "./roundRepository";

/**
 * Process-local repository. Stores deep copies so a round object mutated by
 * a failed operation never leaks into what is persisted. Only one process
 * sees it, so the service's per-round mutex is the only lock it needs.
 */
export class MemoryRoundRepository implements RoundRepository {
  private readonly rounds = new Map<number, RoundSnapshot>();
  private readonly events = new Map<number, RecordedRoundEvent[]>();
  private lastId = 0;

  async nextId(): Promise<number> {
    this.lastId += 1;
    return this.lastId;
  }

  async insert(
    snapshot: RoundSnapshot,
    events: RecordedRoundEvent[]
  ): Promise<void> {
    if (this.rounds.has(snapshot.id)) {
      throw new Error(`Round ${snapshot.id} already exists`);
    }
    this.lastId = Math.max(this.lastId, snapshot.id);
    this.write(snapshot, events);
  }

  async update<T>(
    id: number,
    fn: (snapshot: RoundSnapshot | null) => Promise<RoundChange<T>>
  ): Promise<T> {
    const change = await fn(await this.load(id));
    this.write(change.snapshot, change.events);
    return change.result;
  }

  private write(snapshot: RoundSnapshot, events: RecordedRoundEvent[]): void {
    const previous = this.rounds.get(snapshot.id);
    if (
      previous &&
      snapshot.ranges.length < previous.ranges.length
    ) {
      throw new Error(`Ticket ranges of round ${snapshot.id} are append-only`);
    }
    this.rounds.set(snapshot.id, structuredClone(snapshot));
    this.appendEvents(events);
  }

  private appendEvents(events: RecordedRoundEvent[]): void {
    for (const event of events) {
      const log = this.events.get(event.roundId) ?? [];
      log.push(structuredClone(event));
      this.events.set(event.roundId, log);
    }
  }

  async load(id: number): Promise<RoundSnapshot | null> {
    const snapshot = this.rounds.get(id);
    return snapshot ? structuredClone(snapshot) : null;
  }

  async findByPendingRequest(requestId: string): Promise<number | null> {
    for (const snapshot of this.rounds.values()) {
      if (snapshot.pendingRequestId === requestId) return snapshot.id;
    }
    return null;
  }

  async listIds(states?: readonly RoundState[]): Promise<number[]> {
    return [...this.rounds.values()]
      .filter((s) => !states || states.includes(s.state))
      .map((s) => s.id)
      .sort((a, b) => a - b);
  }

  async listEvents(roundId: number): Promise<RecordedRoundEvent[]> {
    return (this.events.get(roundId) ?? []).map((e) => structuredClone(e));
  }
}
