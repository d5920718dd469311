import type { IsoTimestamp } from "./common";

export interface FeedTelemetry {
  totalRequests: number;
  failedRequests: number;
  lastSuccessAt: IsoTimestamp | null;
  lastSuccessPath: string | null;
  lastFailureAt: IsoTimestamp | null;
  lastFailurePath: string | null;
  lastFailureMessage: string | null;
}

export interface HealthPayload {
  status: "ok";
  timestamp: IsoTimestamp;
  cache_age_seconds: number | null;
  is_updating: boolean;
  has_cached_data: boolean;
  feed: FeedTelemetry;
}

export interface CacheStatusPayload {
  has_data: boolean;
  cache_age_seconds: number | null;
  is_updating: boolean;
  cache_duration: number;
  update_interval: number;
  last_update: IsoTimestamp | null;
}

export interface CacheRefreshPayload {
  message: string;
}
