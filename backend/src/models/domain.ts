import type { IsoTimestamp, StatusType } from "@transit-ticker/core";
import type { RawFeedMap } from "./feed";

export interface NormalizedSnapshot {
  readonly trainLabel: string;
  readonly status: string;
  readonly statusType: StatusType;
  readonly activeTrips: number;
  readonly lastUpdated: IsoTimestamp;
  readonly plannedWork: readonly string[];
  readonly serviceChanges: readonly string[];
  readonly delays: readonly string[];
  /** Per-line samples kept for the per-line endpoints; null on placeholder snapshots. */
  readonly rawByLine: RawFeedMap | null;
}

export interface CacheRead {
  snapshot: NormalizedSnapshot;
  source: string;
}

export interface CacheStatus {
  hasData: boolean;
  ageSeconds: number | null;
  isUpdating: boolean;
  lastUpdate: IsoTimestamp | null;
}

export type AlertBucket = "planned_work" | "delays" | "service_changes";
