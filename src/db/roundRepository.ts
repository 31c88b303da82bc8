import {
  RecordedRoundEvent,
  RoundSnapshot,
  RoundState,
} from "../types/raffle";

export const LIVE_STATES: readonly RoundState[] = [
  RoundState.OPEN,
  RoundState.CLOSED,
  RoundState.CALCULATING,
];

/** What one operation leaves behind: its result and what to persist. */
export interface RoundChange<T> {
  result: T;
  snapshot: RoundSnapshot;
  events: RecordedRoundEvent[];
}

/**
 * Storage for round records, their append-only ticket ranges, participant
 * balances and the event log.
 */
export interface RoundRepository {
  nextId(): Promise<number>;
  insert(snapshot: RoundSnapshot, events: RecordedRoundEvent[]): Promise<void>;
  /**
   * Loads the round locked against every other writer, runs `fn` on it and
   * persists the returned snapshot and events as one unit. When `fn` throws
   * nothing is written.
   */
  update<T>(
    id: number,
    fn: (snapshot: RoundSnapshot | null) => Promise<RoundChange<T>>
  ): Promise<T>;
  load(id: number): Promise<RoundSnapshot | null>;
  findByPendingRequest(requestId: string): Promise<number | null>;
  listIds(states?: readonly RoundState[]): Promise<number[]>;
  listEvents(roundId: number): Promise<RecordedRoundEvent[]>;
}
