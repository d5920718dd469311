export type IsoTimestamp = string;

export type StatusType =
  | "normal"
  | "delay"
  | "scheduled_maintenance"
  | "service_change"
  | "system_error"
  | "system_startup";

export type ResponseFormat = "json" | "text" | "compact";

export interface TransitErrorResponse {
  error: string;
}
