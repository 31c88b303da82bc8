import { RoundState, TimeoutStatus } from "../types/raffle";
import { RaffleError } from "../utils/raffleErrors";

export interface RecoveryView {
  state: RoundState;
  randomnessReady: boolean;
  requestTimestamp: number | null;
  timeoutSec: number;
}

/**
 * Liveness fallback for a randomness request that is never answered.
 * The round is stuck only while it waits in CALCULATING without a stored
 * word; once a word arrives finalize() is the way forward.
 */
export const recoveryManager = {
  isWaiting(view: RecoveryView): boolean {
    return (
      view.state === RoundState.CALCULATING &&
      !view.randomnessReady &&
      view.requestTimestamp !== null
    );
  },

  /** Read-only; safe to poll from keepers and dashboards. */
  timeoutStatus(view: RecoveryView, now: number): TimeoutStatus {
    if (!this.isWaiting(view) || view.requestTimestamp === null) {
      return { shouldRecover: false, secondsRemaining: 0 };
    }
    const recoverAt = view.requestTimestamp + view.timeoutSec;
    const secondsRemaining = Math.max(0, recoverAt - now);
    return { shouldRecover: secondsRemaining === 0, secondsRemaining };
  },

  assertRecoverable(view: RecoveryView, now: number): void {
    if (!this.isWaiting(view)) {
      throw new RaffleError(
        "NOT_STUCK",
        `Round is not waiting on randomness (state ${view.state})`
      );
    }
    const status = this.timeoutStatus(view, now);
    if (!status.shouldRecover) {
      throw new RaffleError(
        "TIMEOUT_NOT_ELAPSED",
        `Randomness timeout elapses in ${status.secondsRemaining}s`
      );
    }
  },
};
