import { LOOP_RETRY_DELAY_MS, UPDATE_INTERVAL_SECONDS } from "../config";
import type { TransitCache } from "../cache/transitCache";
import type { FeedFetcher, FetchFailure } from "../feed/fetcher";
import { normalize } from "../services/normalizer";
import { safeErrorMessage } from "../utils/errors";
import { createLogger } from "../utils/logger";

const logger = createLogger("refresh");

export type CancelTimer = () => void;

export interface Scheduler {
  schedule(callback: () => void, delayMs: number): CancelTimer;
}

const timerScheduler: Scheduler = {
  schedule: (callback, delayMs) => {
    const timer = setTimeout(callback, delayMs);
    return () => clearTimeout(timer);
  },
};

export type CycleOutcome =
  | { status: "updated"; lines: string[] }
  | { status: "fetch_failed"; failure: FetchFailure }
  | { status: "empty" };

export interface Refresher {
  triggerRefresh(): void;
}

export interface RefreshLoopOptions {
  cache: TransitCache;
  fetcher: FeedFetcher;
  intervalMs?: number;
  retryDelayMs?: number;
  scheduler?: Scheduler;
  now?: () => number;
}

export class RefreshLoop implements Refresher {
  private readonly cache: TransitCache;
  private readonly fetcher: FeedFetcher;
  private readonly intervalMs: number;
  private readonly retryDelayMs: number;
  private readonly scheduler: Scheduler;
  private readonly now: () => number;
  private cancelTimer: CancelTimer | undefined;
  private running = false;

  constructor(options: RefreshLoopOptions) {
    this.cache = options.cache;
    this.fetcher = options.fetcher;
    this.intervalMs = options.intervalMs ?? UPDATE_INTERVAL_SECONDS * 1000;
    this.retryDelayMs = options.retryDelayMs ?? LOOP_RETRY_DELAY_MS;
    this.scheduler = options.scheduler ?? timerScheduler;
    this.now = options.now ?? Date.now;
  }

  isRunning() {
    return this.running;
  }

  /** Fires an immediate background refresh and schedules the periodic one. */
  start() {
    if (this.running) return;
    this.running = true;
    logger.info("Background updater started", { intervalMs: this.intervalMs });
    this.triggerRefresh();
    this.scheduleNext(this.intervalMs);
  }

  stop() {
    this.running = false;
    this.cancelTimer?.();
    this.cancelTimer = undefined;
  }

  /** Starts a refresh without waiting for it. Overlapping refreshes are allowed; the last write wins. */
  triggerRefresh() {
    void this.runCycle().catch((error: unknown) => {
      logger.error("Detached refresh failed", { message: safeErrorMessage(error) });
    });
  }

  async runCycle(): Promise<CycleOutcome> {
    const start = this.now();
    this.cache.beginUpdate();
    try {
      logger.info("Fetching fresh transit data...");
      const fetched = await this.fetcher.fetchRaw();
      if (!fetched.ok) {
        logger.warn("Failed to fetch fresh data, keeping old cache", {
          kind: fetched.error.kind,
          failures: fetched.error.failures.map((failure) => ({ feed: failure.feedPath, kind: failure.kind })),
        });
        return { status: "fetch_failed", failure: fetched.error };
      }

      const snapshot = normalize(fetched.value, new Date(this.now()));
      if (!snapshot) {
        logger.warn("Feed returned no line data, keeping old cache");
        return { status: "empty" };
      }

      this.cache.write(snapshot);
      logger.info("Cache updated successfully", {
        train: snapshot.trainLabel,
        status: snapshot.status,
        delays: snapshot.delays.length,
        serviceChanges: snapshot.serviceChanges.length,
        plannedWork: snapshot.plannedWork.length,
        durationMs: this.now() - start,
      });
      return { status: "updated", lines: Array.from(fetched.value.keys()) };
    } finally {
      this.cache.endUpdate();
    }
  }

  private scheduleNext(delayMs: number) {
    if (!this.running) return;
    this.cancelTimer = this.scheduler.schedule(() => {
      void this.tick();
    }, Math.max(0, delayMs));
  }

  private async tick() {
    let nextDelayMs = this.intervalMs;
    try {
      await this.runCycle();
    } catch (error) {
      logger.error("Background updater error", { message: safeErrorMessage(error) });
      nextDelayMs = this.retryDelayMs;
    } finally {
      this.scheduleNext(nextDelayMs);
    }
  }
}
