import type { AlertItem, AlertsPayload, StatusPayload, StatusType, TransitPayload } from "@transit-ticker/core";
import type { NormalizedSnapshot } from "../models/domain";
import { buildTrainLabel } from "./normalizer";

export const UNAVAILABLE_STATUS = "Data temporarily unavailable";

const placeholder = (trainLabel: string, status: string, statusType: StatusType, now: Date): NormalizedSnapshot => ({
  trainLabel,
  status,
  statusType,
  activeTrips: 0,
  lastUpdated: now.toISOString(),
  plannedWork: [],
  serviceChanges: [],
  delays: [],
  rawByLine: null,
});

export const startupSnapshot = (now: Date) =>
  placeholder("INITIALIZING", "Service starting up...", "system_startup", now);

export const unavailableSnapshot = (trackedLines: readonly string[], now: Date) =>
  placeholder(buildTrainLabel(trackedLines), UNAVAILABLE_STATUS, "system_error", now);

export const cacheErrorSnapshot = (now: Date) => placeholder("ERROR", "Cache error", "system_error", now);

export const toTransitPayload = (snapshot: NormalizedSnapshot): TransitPayload => ({
  train: snapshot.trainLabel,
  status: snapshot.status,
  status_type: snapshot.statusType,
  active_trips: snapshot.activeTrips,
  last_updated: snapshot.lastUpdated,
  planned_work: [...snapshot.plannedWork],
  service_changes: [...snapshot.serviceChanges],
  delays: [...snapshot.delays],
});

export const toStatusPayload = (snapshot: NormalizedSnapshot): StatusPayload => ({
  train: snapshot.trainLabel,
  status: snapshot.status,
  active_trips: snapshot.activeTrips,
  last_updated: snapshot.lastUpdated,
});

/** Delays first, then service changes. Planned work is left out of the alert feed. */
export const toAlertsPayload = (snapshot: NormalizedSnapshot): AlertsPayload => {
  const alerts: AlertItem[] = [
    ...snapshot.delays.map((message) => ({ type: "delay" as const, message })),
    ...snapshot.serviceChanges.map((message) => ({ type: "service_change" as const, message })),
  ];
  return {
    train: snapshot.trainLabel,
    alert_count: alerts.length,
    alerts,
  };
};
