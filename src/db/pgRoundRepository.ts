import fs from "fs";
import path from "path";
import { Pool, PoolClient } from "pg";
import {
  ParticipantBalance,
  RecordedRoundEvent,
  RecoveryPolicy,
  RoundSnapshot,
  RoundState,
} from "../types/raffle";
import { decodeEvent, encodeEvent } from "./eventCodec";
import { RoundChange, RoundRepository } from "./roundRepository";

interface RoundRow {
  id: number;
  state: RoundState;
  ticket_price: string;
  capacity: number;
  duration_sec: number;
  timeout_sec: number;
  fee_bps: number;
  max_tickets_per_participant: number;
  recovery_policy: RecoveryPolicy;
  caller_reward_bps: number;
  fee_recipient: string;
  created_at: string;
  deadline: string;
  prize_pool: string;
  fee_pool: string;
  collected: string;
  winner: string | null;
  winning_index: number | null;
  pending_request_id: string | null;
  request_timestamp: string | null;
  request_count: number;
  randomness_ready: boolean;
  stored_random_word: string | null;
  prize_claimed: boolean;
}

interface RangeRow {
  seq: number;
  participant: string;
  cumulative_upper_bound: number;
}

interface BalanceRow {
  participant: string;
  tickets_owned: number;
  amount_paid: string;
  claimable_refund: string;
  refund_claimed: boolean;
  claimable_reward: string;
}

interface EventRow {
  round_id: number;
  at: string;
  payload: Record<string, unknown>;
}

function rowToEvent(row: EventRow): RecordedRoundEvent {
  return decodeEvent({ ...row.payload, roundId: row.round_id, at: Number(row.at) });
}

function resolveSchemaPath(): string {
  const candidates = [
    path.join(__dirname, "schema.sql"),
    path.resolve(process.cwd(), "src/db/schema.sql"),
  ];
  const found = candidates.find((p) => fs.existsSync(p));
  if (!found) {
    throw new Error(`schema.sql not found (looked in ${candidates.join(", ")})`);
  }
  return found;
}

/**
 * PostgreSQL-backed repository. Ranges are only ever inserted (never updated
 * or deleted); balances and the round record are upserted in the same
 * transaction as the events they produced.
 *
 * `update` holds the round row with SELECT ... FOR UPDATE until it commits,
 * so processes sharing the database apply operations on one round in turn.
 */
export class PgRoundRepository implements RoundRepository {
  constructor(private readonly pool: Pool) {}

  async ensureSchema(): Promise<void> {
    const schemaPath = resolveSchemaPath();
    const sql = fs.readFileSync(schemaPath, "utf8");
    await this.pool.query(sql);
    console.log(`✅ [DB] Raffle schema ensured from ${schemaPath}`);
  }

  async nextId(): Promise<number> {
    const { rows } = await this.pool.query<{ id: string }>(
      "SELECT nextval('raffle_round_id_seq') AS id"
    );
    return Number(rows[0].id);
  }

  async insert(
    snapshot: RoundSnapshot,
    events: RecordedRoundEvent[]
  ): Promise<void> {
    await this.transaction(async (client) => {
      const c = snapshot.config;
      await client.query(
        `INSERT INTO raffle_rounds (
           id, state, ticket_price, capacity, duration_sec, timeout_sec, fee_bps,
           max_tickets_per_participant, recovery_policy, caller_reward_bps,
           fee_recipient, created_at, deadline
         ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)`,
        [
          snapshot.id,
          snapshot.state,
          c.ticketPrice.toString(),
          c.capacity,
          c.durationSec,
          c.timeoutSec,
          c.feeBps,
          c.maxTicketsPerParticipant,
          c.recoveryPolicy,
          c.callerRewardBps,
          c.feeRecipient,
          snapshot.createdAt,
          snapshot.deadline,
        ]
      );
      await this.writeState(client, snapshot, 0);
      await this.writeEvents(client, events);
    });
  }

  async update<T>(
    id: number,
    fn: (snapshot: RoundSnapshot | null) => Promise<RoundChange<T>>
  ): Promise<T> {
    return this.transaction(async (client) => {
      const before = await this.readRound(client, id, true);
      const change = await fn(before);
      if (!before) {
        throw new Error(`Round ${id} does not exist`);
      }
      await this.writeState(client, change.snapshot, before.ranges.length);
      await this.writeEvents(client, change.events);
      return change.result;
    });
  }

  async load(id: number): Promise<RoundSnapshot | null> {
    const client = await this.pool.connect();
    try {
      return await this.readRound(client, id, false);
    } finally {
      client.release();
    }
  }

  private async readRound(
    client: PoolClient,
    id: number,
    lock: boolean
  ): Promise<RoundSnapshot | null> {
    const roundResult = await client.query<RoundRow>(
      lock
        ? "SELECT * FROM raffle_rounds WHERE id = $1 FOR UPDATE"
        : "SELECT * FROM raffle_rounds WHERE id = $1",
      [id]
    );
    const row = roundResult.rows[0];
    if (!row) return null;

    const rangeResult = await client.query<RangeRow>(
      "SELECT seq, participant, cumulative_upper_bound FROM ticket_ranges WHERE round_id = $1 ORDER BY seq ASC",
      [id]
    );
    const balanceResult = await client.query<BalanceRow>(
      "SELECT * FROM participant_balances WHERE round_id = $1",
      [id]
    );

    const balances: Record<string, ParticipantBalance> = {};
    for (const b of balanceResult.rows) {
      balances[b.participant] = {
        ticketsOwned: b.tickets_owned,
        amountPaid: BigInt(b.amount_paid),
        claimableRefund: BigInt(b.claimable_refund),
        refundClaimed: b.refund_claimed,
        claimableReward: BigInt(b.claimable_reward),
      };
    }

    return {
      id: row.id,
      config: {
        ticketPrice: BigInt(row.ticket_price),
        capacity: row.capacity,
        durationSec: row.duration_sec,
        timeoutSec: row.timeout_sec,
        feeBps: row.fee_bps,
        maxTicketsPerParticipant: row.max_tickets_per_participant,
        recoveryPolicy: row.recovery_policy,
        callerRewardBps: row.caller_reward_bps,
        feeRecipient: row.fee_recipient,
      },
      state: row.state,
      createdAt: Number(row.created_at),
      deadline: Number(row.deadline),
      prizePool: BigInt(row.prize_pool),
      feePool: BigInt(row.fee_pool),
      collected: BigInt(row.collected),
      winner: row.winner,
      winningIndex: row.winning_index,
      pendingRequestId: row.pending_request_id,
      requestTimestamp:
        row.request_timestamp === null ? null : Number(row.request_timestamp),
      requestCount: row.request_count,
      randomnessReady: row.randomness_ready,
      storedRandomWord:
        row.stored_random_word === null ? null : BigInt(row.stored_random_word),
      prizeClaimed: row.prize_claimed,
      ranges: rangeResult.rows.map((r) => ({
        participant: r.participant,
        cumulativeUpperBound: r.cumulative_upper_bound,
      })),
      balances,
    };
  }

  async findByPendingRequest(requestId: string): Promise<number | null> {
    const { rows } = await this.pool.query<{ id: number }>(
      "SELECT id FROM raffle_rounds WHERE pending_request_id = $1",
      [requestId]
    );
    return rows[0]?.id ?? null;
  }

  async listIds(states?: readonly RoundState[]): Promise<number[]> {
    const { rows } = states
      ? await this.pool.query<{ id: number }>(
          "SELECT id FROM raffle_rounds WHERE state = ANY($1::text[]) ORDER BY id ASC",
          [states]
        )
      : await this.pool.query<{ id: number }>(
          "SELECT id FROM raffle_rounds ORDER BY id ASC"
        );
    return rows.map((r) => r.id);
  }

  async listEvents(roundId: number): Promise<RecordedRoundEvent[]> {
    const { rows } = await this.pool.query<EventRow>(
      "SELECT round_id, at, payload FROM round_events WHERE round_id = $1 ORDER BY id ASC",
      [roundId]
    );
    return rows.map(rowToEvent);
  }

  /** Ranges from `fromSeq` on are new; earlier ones are already stored. */
  private async writeState(
    client: PoolClient,
    s: RoundSnapshot,
    fromSeq: number
  ): Promise<void> {
    const updated = await client.query(
      `UPDATE raffle_rounds
       SET state = $2, prize_pool = $3, fee_pool = $4, collected = $5,
           winner = $6, winning_index = $7, pending_request_id = $8,
           request_timestamp = $9, request_count = $10, randomness_ready = $11,
           stored_random_word = $12, prize_claimed = $13, updated_at = NOW()
       WHERE id = $1`,
      [
        s.id,
        s.state,
        s.prizePool.toString(),
        s.feePool.toString(),
        s.collected.toString(),
        s.winner,
        s.winningIndex,
        s.pendingRequestId,
        s.requestTimestamp,
        s.requestCount,
        s.randomnessReady,
        s.storedRandomWord === null ? null : s.storedRandomWord.toString(),
        s.prizeClaimed,
      ]
    );
    if (updated.rowCount !== 1) {
      throw new Error(`Round ${s.id} does not exist`);
    }

    if (s.ranges.length < fromSeq) {
      throw new Error(`Ticket ranges of round ${s.id} are append-only`);
    }
    // a duplicate seq violates the primary key and aborts the transaction
    for (let seq = fromSeq; seq < s.ranges.length; seq++) {
      const range = s.ranges[seq];
      await client.query(
        `INSERT INTO ticket_ranges (round_id, seq, participant, cumulative_upper_bound)
         VALUES ($1, $2, $3, $4)`,
        [s.id, seq, range.participant, range.cumulativeUpperBound]
      );
    }

    for (const [participant, b] of Object.entries(s.balances)) {
      await client.query(
        `INSERT INTO participant_balances
           (round_id, participant, tickets_owned, amount_paid, claimable_refund, refund_claimed, claimable_reward)
         VALUES ($1, $2, $3, $4, $5, $6, $7)
         ON CONFLICT (round_id, participant) DO UPDATE SET
           tickets_owned = EXCLUDED.tickets_owned,
           amount_paid = EXCLUDED.amount_paid,
           claimable_refund = EXCLUDED.claimable_refund,
           refund_claimed = EXCLUDED.refund_claimed,
           claimable_reward = EXCLUDED.claimable_reward`,
        [
          s.id,
          participant,
          b.ticketsOwned,
          b.amountPaid.toString(),
          b.claimableRefund.toString(),
          b.refundClaimed,
          b.claimableReward.toString(),
        ]
      );
    }
  }

  private async writeEvents(
    client: PoolClient,
    events: RecordedRoundEvent[]
  ): Promise<void> {
    for (const event of events) {
      await client.query(
        "INSERT INTO round_events (round_id, type, at, payload) VALUES ($1, $2, $3, $4::jsonb)",
        [event.roundId, event.type, event.at, encodeEvent(event)]
      );
    }
  }

  private async transaction<T>(
    fn: (client: PoolClient) => Promise<T>
  ): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      const result = await fn(client);
      await client.query("COMMIT");
      return result;
    } catch (err) {
      await client.query("ROLLBACK");
      throw err;
    } finally {
      client.release();
    }
  }
}
