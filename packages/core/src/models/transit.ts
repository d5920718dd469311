import type { IsoTimestamp, StatusType } from "./common";

/** Aggregate status across every tracked line, as served by `/transit`. */
export interface TransitPayload {
  train: string;
  status: string;
  status_type: StatusType;
  active_trips: number;
  last_updated: IsoTimestamp;
  planned_work: string[];
  service_changes: string[];
  delays: string[];
}

export interface LinePayload {
  train: string;
  line_id: string;
  status: string;
  status_type: StatusType;
  active_trips: number;
  last_updated: IsoTimestamp;
  planned_work: string[];
  service_changes: string[];
  delays: string[];
  total_alerts: number;
  active_alerts: number;
}

export interface LineDebugInfo {
  has_raw_data: boolean;
  available_lines: string[];
  data_source: string;
}

export interface LineFallbackPayload extends LinePayload {
  error: string;
  debug_info: LineDebugInfo;
}

export type LinesPayload = Record<string, LinePayload>;

export interface LinesFallbackPayload {
  error: string;
  data_source: string;
  fallback_lines: Record<string, LinePayload>;
}

export interface StatusPayload {
  train: string;
  status: string;
  active_trips: number;
  last_updated: IsoTimestamp;
}

export type AlertKind = "delay" | "service_change";

export interface AlertItem {
  type: AlertKind;
  message: string;
}

export interface AlertsPayload {
  train: string;
  alert_count: number;
  alerts: AlertItem[];
}
