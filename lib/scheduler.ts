/**
 * Status Scheduler
 *
 * Runs the status cycle on a cadence aligned to wall-clock boundaries
 * (:00/:15/:30/:45 for 15 seconds, the top of the minute for 60) and
 * supervises it: a crashed loop is restarted after a short backoff, and after
 * too many consecutive restarts the scheduler stops for good.
 *
 * Only one cycle runs at a time. Out-of-band updates (`updateNow`) and other
 * exclusive work queue behind the cycle in flight.
 */

import { normalizeRefreshInterval } from "./state-store.js";

// ============================================================================
// Types
// ============================================================================

export type SchedulerState = "stopped" | "running" | "restarting";

export interface SchedulerOptions {
  /** Read before each sleep, so interval changes apply on the next tick. */
  intervalSeconds: () => number | Promise<number>;
  restartDelayMs?: number;
  maxRestarts?: number;
  stopTimeoutMs?: number;
  now?: () => Date;
}

export interface SchedulerStatus {
  state: SchedulerState;
  restarts: number;
  gaveUp: boolean;
  intervalSeconds: number | null;
  lastCycleAt: string | null;
  nextCycleAt: string | null;
  lastError: string | null;
}

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_RESTART_DELAY_MS = 5_000;
const DEFAULT_MAX_RESTARTS = 5;
const DEFAULT_STOP_TIMEOUT_MS = 2_000;

// ============================================================================
// Timing
// ============================================================================

/**
 * Milliseconds until the next multiple of `intervalSeconds` within the
 * minute. A wait under one second skips to the following boundary.
 */
export function msUntilNextBoundary(now: Date, intervalSeconds: number): number {
  const secondsIntoMinute = now.getUTCSeconds() + now.getUTCMilliseconds() / 1000;
  let wait = intervalSeconds - (secondsIntoMinute % intervalSeconds);
  if (wait < 1) {
    wait += intervalSeconds;
  }
  return Math.round(wait * 1000);
}

/**
 * setTimeout that resolves early when the signal aborts.
 */
function delay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ============================================================================
// Scheduler
// ============================================================================

export class StatusScheduler {
  private state: SchedulerState = "stopped";
  private abort: AbortController | null = null;
  private worker: Promise<void> | null = null;
  private chain: Promise<unknown> = Promise.resolve();
  private restarts = 0;
  private gaveUp = false;
  private intervalSeconds: number | null = null;
  private lastCycleAt: Date | null = null;
  private nextCycleAt: Date | null = null;
  private lastError: string | null = null;

  private readonly restartDelayMs: number;
  private readonly maxRestarts: number;
  private readonly stopTimeoutMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly cycle: () => Promise<void>,
    private readonly options: SchedulerOptions
  ) {
    this.restartDelayMs = options.restartDelayMs ?? DEFAULT_RESTART_DELAY_MS;
    this.maxRestarts = options.maxRestarts ?? DEFAULT_MAX_RESTARTS;
    this.stopTimeoutMs = options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Run one cycle right away, then start the periodic loop. No-op when
   * already running.
   */
  async start(): Promise<void> {
    if (this.state !== "stopped") {
      console.log("[Scheduler] Already running");
      return;
    }

    const abort = new AbortController();
    this.abort = abort;
    this.state = "running";
    this.restarts = 0;
    this.gaveUp = false;
    console.log("[Scheduler] Starting");

    await this.updateNow();
    if (abort.signal.aborted) {
      return;
    }
    this.worker = this.supervise(abort.signal);
  }

  /**
   * Ask the loop to exit and wait up to the stop timeout for it. A cycle in
   * flight is never interrupted.
   */
  async stop(): Promise<void> {
    if (this.state === "stopped") {
      return;
    }
    console.log("[Scheduler] Stopping");
    this.state = "stopped";
    this.nextCycleAt = null;
    this.abort?.abort();
    this.abort = null;

    const worker = this.worker;
    this.worker = null;
    if (!worker) return;

    let timer: NodeJS.Timeout | undefined;
    const timedOut = await Promise.race([
      worker.then(() => false),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(true), this.stopTimeoutMs);
      }),
    ]);
    clearTimeout(timer);
    if (timedOut) {
      console.warn("[Scheduler] Worker still finishing a cycle, not waiting for it");
    }
  }

  /**
   * Run one cycle outside the cadence. Waits for a cycle already in flight.
   * Failures are logged, not thrown, and do not count as crashes.
   */
  async updateNow(): Promise<void> {
    try {
      await this.runCycle();
    } catch (err) {
      this.lastError = errorMessage(err);
      console.error(`[Scheduler] Update failed: ${this.lastError}`);
    }
  }

  /**
   * Run `task` with no cycle in progress.
   */
  exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.chain.then(task);
    this.chain = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  isRunning(): boolean {
    return this.state !== "stopped";
  }

  getStatus(): SchedulerStatus {
    return {
      state: this.state,
      restarts: this.restarts,
      gaveUp: this.gaveUp,
      intervalSeconds: this.intervalSeconds,
      lastCycleAt: this.lastCycleAt?.toISOString() ?? null,
      nextCycleAt: this.nextCycleAt?.toISOString() ?? null,
      lastError: this.lastError,
    };
  }

  private runCycle(): Promise<void> {
    return this.exclusive(async () => {
      await this.cycle();
      this.lastCycleAt = this.now();
    });
  }

  private async supervise(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.loop(signal);
        return;
      } catch (err) {
        this.lastError = errorMessage(err);
        if (this.restarts >= this.maxRestarts) {
          console.error(
            `[Scheduler] Cycle crashed (${this.lastError}); giving up after ${this.restarts} restarts`
          );
          if (this.abort?.signal === signal) {
            this.state = "stopped";
            this.gaveUp = true;
            this.abort = null;
            this.worker = null;
            this.nextCycleAt = null;
          }
          return;
        }

        this.restarts++;
        this.state = "restarting";
        console.error(
          `[Scheduler] Cycle crashed (${this.lastError}); restarting in ${this.restartDelayMs / 1000}s (${this.restarts}/${this.maxRestarts})`
        );
        await delay(this.restartDelayMs, signal);
        if (!signal.aborted) {
          this.state = "running";
        }
      }
    }
  }

  /**
   * The periodic loop. The first iteration runs immediately; later ones wait
   * for the next boundary. Missed ticks are not caught up.
   */
  private async loop(signal: AbortSignal): Promise<void> {
    let first = true;
    while (!signal.aborted) {
      if (!first) {
        const interval = normalizeRefreshInterval(await this.options.intervalSeconds());
        this.intervalSeconds = interval;
        const now = this.now();
        const wait = msUntilNextBoundary(now, interval);
        this.nextCycleAt = new Date(now.getTime() + wait);
        await delay(wait, signal);
        if (signal.aborted) return;
      }
      first = false;
      await this.runCycle();
      this.restarts = 0;
    }
  }
}
