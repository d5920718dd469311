import type { AlertBucket } from "../models/domain";
import type { ActivePeriod, RawAlert, RawFeedMap, RawLineSample } from "../models/feed";
import type { LineFallbackPayload, LinePayload, LinesFallbackPayload, LinesPayload } from "@transit-ticker/core";
import { GOOD_SERVICE, classifyAlert, deriveStatusType, describeAlert } from "./normalizer";
import { UNAVAILABLE_STATUS } from "./snapshots";

export const isPeriodActive = (period: ActivePeriod, nowSeconds: number) =>
  (period.start === null || period.start <= nowSeconds) && (period.end === null || nowSeconds <= period.end);

export const isAlertActive = (alert: RawAlert, now: Date) => {
  if (alert.activePeriods.length === 0) return true;
  const nowSeconds = Math.floor(now.getTime() / 1000);
  return alert.activePeriods.some((period) => isPeriodActive(period, nowSeconds));
};

export const buildLineView = (sample: RawLineSample, now: Date): LinePayload => {
  const activeAlerts = sample.alerts.filter((alert) => isAlertActive(alert, now));
  // A line whose alerts are all scheduled for later is running normally right now.
  const status = activeAlerts.length > 0 ? sample.status : GOOD_SERVICE;
  const buckets: Record<AlertBucket, string[]> = {
    planned_work: [],
    delays: [],
    service_changes: [],
  };
  activeAlerts.forEach((alert) => {
    const text = describeAlert(alert);
    buckets[classifyAlert(text)].push(text);
  });

  return {
    train: `${sample.lineId} TRAIN`,
    line_id: sample.lineId,
    status,
    status_type: deriveStatusType(status),
    active_trips: sample.activeTripCount,
    last_updated: now.toISOString(),
    planned_work: buckets.planned_work,
    service_changes: buckets.service_changes,
    delays: buckets.delays,
    total_alerts: sample.alerts.length,
    active_alerts: activeAlerts.length,
  };
};

export const buildLineFallback = (lineId: string, now: Date): LinePayload => ({
  train: `${lineId} TRAIN`,
  line_id: lineId,
  status: UNAVAILABLE_STATUS,
  status_type: "system_error",
  active_trips: 0,
  last_updated: now.toISOString(),
  planned_work: [],
  service_changes: [],
  delays: [],
  total_alerts: 0,
  active_alerts: 0,
});

export const buildLinesView = (raw: RawFeedMap, now: Date): LinesPayload => {
  const lines: LinesPayload = {};
  raw.forEach((sample, lineId) => {
    lines[lineId] = buildLineView(sample, now);
  });
  return lines;
};

export const buildLinesFallback = (
  trackedLines: readonly string[],
  dataSource: string,
  now: Date,
): LinesFallbackPayload => ({
  error: "Raw train line data not available",
  data_source: dataSource,
  fallback_lines: Object.fromEntries(trackedLines.map((lineId) => [lineId, buildLineFallback(lineId, now)])),
});

export const buildMissingLineFallback = (
  lineId: string,
  raw: RawFeedMap | null,
  dataSource: string,
  now: Date,
): LineFallbackPayload => ({
  ...buildLineFallback(lineId, now),
  error: `No cached data available for line ${lineId}`,
  debug_info: {
    has_raw_data: raw !== null,
    available_lines: raw ? Array.from(raw.keys()) : [],
    data_source: dataSource,
  },
});
