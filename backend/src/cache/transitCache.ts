import { CACHE_DURATION_SECONDS, config } from "../config";
import type { CacheRead, CacheStatus, NormalizedSnapshot } from "../models/domain";
import { cacheErrorSnapshot, startupSnapshot, unavailableSnapshot } from "../services/snapshots";
import { safeErrorMessage } from "../utils/errors";
import { createLogger } from "../utils/logger";

const logger = createLogger("cache");

export interface CacheEntry<T> {
  data: T;
  fetchedAt: number;
}

export type Clock = () => number;

export interface TransitCacheOptions {
  now?: Clock;
  cacheDurationSeconds?: number;
  trackedLines?: readonly string[];
}

// Wall time is used only when the injected clock never produced a usable value.
const errorTime = (now: number | undefined) => {
  const date = new Date(now ?? Date.now());
  return Number.isNaN(date.getTime()) ? new Date() : date;
};

/**
 * Holds the latest snapshot for the process. Every method is synchronous, so
 * each call runs to completion on the event loop before another reader or
 * writer can observe the entry.
 */
export class TransitCache {
  private entry: CacheEntry<NormalizedSnapshot> | undefined;
  private updatesInFlight = 0;
  private readonly now: Clock;
  private readonly cacheDurationMs: number;
  private readonly trackedLines: readonly string[];

  constructor(options: TransitCacheOptions = {}) {
    this.now = options.now ?? Date.now;
    this.cacheDurationMs = (options.cacheDurationSeconds ?? CACHE_DURATION_SECONDS) * 1000;
    this.trackedLines = options.trackedLines ?? config.trackedLines;
  }

  public read(): CacheRead {
    let now: number | undefined;
    try {
      now = this.now();
      const entry = this.entry;
      if (!entry) {
        logger.warn("No cached data available, returning fallback");
        return { snapshot: unavailableSnapshot(this.trackedLines, new Date(now)), source: "error" };
      }

      const ageMs = now - entry.fetchedAt;
      const age = Math.floor(ageMs / 1000);
      if (ageMs < this.cacheDurationMs) {
        return { snapshot: entry.data, source: `cached (${age}s old)` };
      }
      if (this.updatesInFlight > 0) {
        return { snapshot: entry.data, source: `stale but updating (${age}s old)` };
      }
      return { snapshot: entry.data, source: `stale fallback (${age}s old)` };
    } catch (error) {
      logger.error("Cache read failed", { message: safeErrorMessage(error) });
      return { snapshot: cacheErrorSnapshot(errorTime(now)), source: "cache_error" };
    }
  }

  public write(snapshot: NormalizedSnapshot) {
    this.entry = { data: snapshot, fetchedAt: this.now() };
  }

  public beginUpdate() {
    this.updatesInFlight += 1;
  }

  public endUpdate() {
    this.updatesInFlight = Math.max(0, this.updatesInFlight - 1);
  }

  public isUpdating() {
    return this.updatesInFlight > 0;
  }

  public getStatus(): CacheStatus {
    const entry = this.entry;
    return {
      hasData: entry !== undefined,
      ageSeconds: entry ? Math.floor((this.now() - entry.fetchedAt) / 1000) : null,
      isUpdating: this.isUpdating(),
      lastUpdate: entry ? new Date(entry.fetchedAt).toISOString() : null,
    };
  }
}

/** A cache seeded with the startup placeholder, so requests are served before the first fetch lands. */
export const createTransitCache = (options: TransitCacheOptions = {}) => {
  const cache = new TransitCache(options);
  cache.write(startupSnapshot(new Date(options.now ? options.now() : Date.now())));
  return cache;
};
