import { describeError } from "./raffleErrors";

export interface SchedulerOptions {
  jitterMs?: number;
  timeoutMs?: number;
  maxRetries?: number;
  /** Run once right away instead of waiting a full interval first. */
  immediate?: boolean;
}

export interface ScheduledTask {
  stop: () => void;
  /** Runs the task now; skipped while another run is active. */
  runNow: () => Promise<void>;
  isRunning: () => boolean;
  lastRun: () => Date | null;
  nextRun: () => Date | null;
}

class TaskTimeoutError extends Error {
  constructor(label: string, timeoutMs: number) {
    super(`${label} exceeded ${timeoutMs}ms`);
    this.name = "TaskTimeoutError";
  }
}

/**
 * Interval scheduler that never overlaps runs, bounds each
 * run with a timeout and retries failed runs with exponential backoff.
 */
export function every(
  label: string,
  intervalMs: number,
  task: () => Promise<void>,
  options: SchedulerOptions = {}
): ScheduledTask {
  const {
    jitterMs = 0,
    timeoutMs = 20000,
    maxRetries = 2,
    immediate = false,
  } = options;

  let running = false;
  let stopped = false;
  let lastRun: Date | null = null;
  let nextRun: Date | null = null;
  let retryCount = 0;
  const timers = new Set<NodeJS.Timeout>();

  const later = (ms: number, fn: () => void) => {
    const id = setTimeout(() => {
      timers.delete(id);
      fn();
    }, ms);
    timers.add(id);
  };

  const jitter = () => (jitterMs > 0 ? Math.random() * jitterMs : 0);

  const withTimeout = async (): Promise<void> => {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(
        () => reject(new TaskTimeoutError(label, timeoutMs)),
        timeoutMs
      );
    });
    try {
      await Promise.race([task(), timeout]);
    } finally {
      clearTimeout(timer);
    }
  };

  const executeTask = async (): Promise<void> => {
    if (running) {
      console.log(`[SCHED:${label}] SKIP - previous run still active`);
      return;
    }

    running = true;
    const startTime = Date.now();
    try {
      console.log(`[SCHED:${label}] START`);
      await withTimeout();
      lastRun = new Date();
      retryCount = 0;
      console.log(`[SCHED:${label}] DONE - ${Date.now() - startTime}ms`);
    } catch (error) {
      const duration = Date.now() - startTime;
      if (error instanceof TaskTimeoutError) {
        console.error(`[SCHED:${label}] TIMEOUT after ${duration}ms`);
      } else {
        console.error(
          `[SCHED:${label}] ERROR after ${duration}ms:`,
          describeError(error)
        );
        if (retryCount < maxRetries && !stopped) {
          retryCount++;
          const retryDelay = Math.min(1000 * Math.pow(2, retryCount), 30000);
          console.log(
            `[SCHED:${label}] RETRY ${retryCount}/${maxRetries} in ${retryDelay}ms`
          );
          later(retryDelay, () => void executeTask());
        } else {
          console.error(
            `[SCHED:${label}] MAX_RETRIES exceeded, skipping this cycle`
          );
          retryCount = 0;
        }
      }
    } finally {
      running = false;
    }
  };

  const schedule = (delay: number) => {
    if (stopped) return;
    nextRun = new Date(Date.now() + delay);
    later(delay, () => {
      void executeTask().then(() => schedule(intervalMs + jitter()));
    });
  };

  schedule(immediate ? 0 : intervalMs + jitter());

  return {
    stop: () => {
      stopped = true;
      nextRun = null;
      for (const id of timers) clearTimeout(id);
      timers.clear();
      console.log(`[SCHED:${label}] STOPPED`);
    },
    runNow: executeTask,
    isRunning: () => running,
    lastRun: () => lastRun,
    nextRun: () => nextRun,
  };
}
