import dotenv from "dotenv";

dotenv.config();

const DEFAULT_PORT = 5000;
const DEFAULT_MTA_FEED_BASE_URL = "https://api-endpoint.mta.info/Dataservice/mtagtfsfeeds";
const DEFAULT_TRACKED_LINES = ["F", "R"];

export const CACHE_DURATION_SECONDS = 600;
export const UPDATE_INTERVAL_SECONDS = 480;
export const FEED_TIMEOUT_MS = 30_000;
export const LOOP_RETRY_DELAY_MS = 10_000;

type LogLevel = "debug" | "info" | "warn" | "error";

export interface AppConfig {
  port: number;
  mtaFeedBaseUrl: string;
  mtaApiKey: string | undefined;
  trackedLines: string[];
  logLevel: LogLevel;
  exposeErrors: boolean;
}

const normalizeLogLevel = (value?: string): LogLevel => {
  const normalized = (value ?? "").toLowerCase();
  if (normalized === "debug" || normalized === "warn" || normalized === "error") {
    return normalized;
  }
  return "info";
};

const parsePositiveNumber = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  if (Number.isFinite(parsed) && parsed > 0) return parsed;
  return fallback;
};

export const parseLineList = (value: string | undefined, fallback: string[] = DEFAULT_TRACKED_LINES): string[] => {
  const lines = (value ?? "")
    .split(",")
    .map((entry) => entry.trim().toUpperCase())
    .filter(Boolean);
  const unique = Array.from(new Set(lines));
  return unique.length > 0 ? unique : [...fallback];
};

export const config: AppConfig = {
  port: parsePositiveNumber(process.env.PORT, DEFAULT_PORT),
  mtaFeedBaseUrl: process.env.MTA_FEED_BASE_URL ?? DEFAULT_MTA_FEED_BASE_URL,
  mtaApiKey: process.env.MTA_API_KEY,
  trackedLines: parseLineList(process.env.TRACKED_LINES),
  logLevel: normalizeLogLevel(process.env.LOG_LEVEL),
  exposeErrors: process.env.EXPOSE_ERRORS === "true" || process.env.NODE_ENV !== "production",
};
