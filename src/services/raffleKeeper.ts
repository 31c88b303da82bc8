import { LIVE_STATES } from "../db/roundRepository";
import { RoundView } from "../types";
import { RoundState } from "../types/raffle";
import { LockProvider, withLock } from "../utils/distributedLock";
import { RaffleError, describeError } from "../utils/raffleErrors";
import { ScheduledTask, every } from "../utils/scheduler";
import { RaffleService } from "./raffleService";

export type KeeperAction = "close" | "finalize" | "recover";

export interface KeeperReport {
  closed: number[];
  finalized: number[];
  recovered: number[];
  failed: { roundId: number; action: KeeperAction; error: string }[];
}

export interface RaffleKeeperOptions {
  keeperAddress: string;
  intervalMs: number;
  lockName?: string;
}

/**
 * Drives rounds forward without waiting for users: closes rounds whose
 * deadline passed or that filled up, finalizes rounds whose randomness
 * arrived and recovers rounds whose request timed out. Acts as an ordinary
 * caller, so any caller reward from close() accrues to the keeper address.
 */
export class RaffleKeeper {
  private task: ScheduledTask | null = null;
  private readonly lockName: string;

  constructor(
    private readonly service: RaffleService,
    private readonly locks: LockProvider,
    private readonly options: RaffleKeeperOptions
  ) {
    this.lockName = options.lockName ?? "raffle_keeper";
  }

  start(): void {
    if (this.task) {
      console.log("🤖 Raffle keeper already running");
      return;
    }
    console.log(
      `🚀 Starting raffle keeper (interval=${this.options.intervalMs}ms, caller=${this.options.keeperAddress})`
    );
    this.task = every(
      "keeper",
      this.options.intervalMs,
      async () => {
        await withLock(this.locks, this.lockName, () => this.tick());
      },
      { immediate: true, maxRetries: 0 }
    );
  }

  stop(): void {
    if (!this.task) return;
    this.task.stop();
    this.task = null;
    console.log("⏹️ Stopped raffle keeper");
  }

  isRunning(): boolean {
    return this.task !== null;
  }

  /** One pass over every live round. */
  async tick(): Promise<KeeperReport> {
    const report: KeeperReport = {
      closed: [],
      finalized: [],
      recovered: [],
      failed: [],
    };

    const rounds = await this.service.listRounds(LIVE_STATES);
    for (const round of rounds) {
      const action = await this.nextAction(round);
      if (!action) continue;

      try {
        await this.perform(action, round.id);
        if (action === "close") report.closed.push(round.id);
        if (action === "finalize") report.finalized.push(round.id);
        if (action === "recover") report.recovered.push(round.id);
      } catch (err) {
        const label = err instanceof RaffleError ? err.code : "ERROR";
        console.warn(
          `⚠️ [KEEPER] ${action} on round ${round.id} failed (${label}):`,
          describeError(err)
        );
        report.failed.push({
          roundId: round.id,
          action,
          error: describeError(err),
        });
      }
    }

    const acted =
      report.closed.length + report.finalized.length + report.recovered.length;
    if (acted > 0 || report.failed.length > 0) {
      console.log(
        `🤖 [KEEPER] closed=${report.closed.join(",") || "-"} finalized=${
          report.finalized.join(",") || "-"
        } recovered=${report.recovered.join(",") || "-"} failed=${report.failed.length}`
      );
    }
    return report;
  }

  private async nextAction(round: RoundView): Promise<KeeperAction | null> {
    if (round.closable) return "close";
    if (round.state !== RoundState.CALCULATING) return null;
    if (round.randomnessReady) return "finalize";

    const timeout = await this.service.timeoutStatus(round.id);
    return timeout.shouldRecover ? "recover" : null;
  }

  private async perform(action: KeeperAction, roundId: number): Promise<void> {
    const caller = this.options.keeperAddress;
    switch (action) {
      case "close":
        await this.service.close(roundId, caller);
        return;
      case "finalize":
        await this.service.finalize(roundId, caller);
        return;
      case "recover":
        await this.service.recover(roundId, caller);
        return;
    }
  }
}
