import type { StatusType } from "@transit-ticker/core";
import type { AlertBucket, NormalizedSnapshot } from "../models/domain";
import type { RawAlert, RawFeedMap } from "../models/feed";

export const GOOD_SERVICE = "Good Service";

export const deriveStatusType = (status: string): StatusType => {
  const lowered = status.toLowerCase();
  if (lowered.includes("delay")) return "delay";
  if (lowered.includes("planned") || lowered.includes("construction")) return "scheduled_maintenance";
  if (status === GOOD_SERVICE) return "normal";
  return "service_change";
};

export const describeAlert = (alert: RawAlert): string => {
  const parts = [alert.header.trim(), alert.description.trim()].filter(Boolean);
  if (parts.length === 0) return JSON.stringify(alert);
  return parts.join(" - ");
};

export const classifyAlert = (text: string): AlertBucket => {
  const lowered = text.toLowerCase();
  if (lowered.includes("construction") || lowered.includes("planned work")) return "planned_work";
  if (lowered.includes("delay")) return "delays";
  return "service_changes";
};

export const buildTrainLabel = (lineIds: readonly string[]) =>
  lineIds.length > 0 ? `${lineIds.join("/")} TRAINS` : "TRAINS";

/**
 * Folds per-line samples into one snapshot. Lines are visited in map order and
 * the first line that is not in good service sets the overall status.
 */
export const normalize = (raw: RawFeedMap, now: Date = new Date()): NormalizedSnapshot | null => {
  if (raw.size === 0) return null;

  const lineIds: string[] = [];
  const buckets: Record<AlertBucket, string[]> = {
    planned_work: [],
    delays: [],
    service_changes: [],
  };
  let status = GOOD_SERVICE;
  let activeTrips = 0;

  raw.forEach((sample, lineId) => {
    lineIds.push(lineId);
    if (status === GOOD_SERVICE && sample.status !== GOOD_SERVICE) {
      status = sample.status;
    }
    activeTrips += sample.activeTripCount;
    sample.alerts.forEach((alert) => {
      const text = describeAlert(alert);
      buckets[classifyAlert(text)].push(`[${lineId}] ${text}`);
    });
  });

  return {
    trainLabel: buildTrainLabel(lineIds),
    status,
    statusType: deriveStatusType(status),
    activeTrips,
    lastUpdated: now.toISOString(),
    plannedWork: buckets.planned_work,
    serviceChanges: buckets.service_changes,
    delays: buckets.delays,
    rawByLine: raw,
  };
};
