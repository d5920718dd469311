import type { JsonFormat, RequestInitWithSignal } from "./types";
import type {
  AlertsPayload,
  LineFallbackPayload,
  LinePayload,
  LinesFallbackPayload,
  LinesPayload,
  StatusPayload,
  TransitPayload,
} from "../models/transit";
import type { CacheRefreshPayload, CacheStatusPayload, HealthPayload } from "../models/service";

export const DATA_SOURCE_HEADER = "X-Data-Source";

const trimTrailingSlash = (value: string) => value.replace(/\/+$/, "");
const ensureLeadingSlash = (value: string) => (value.startsWith("/") ? value : `/${value}`);

export const buildUrl = (baseUrl: string, path: string, query?: Record<string, string | number | undefined>) => {
  const url = new URL(`${trimTrailingSlash(baseUrl)}${ensureLeadingSlash(path)}`);
  if (query) {
    Object.entries(query).forEach(([key, value]) => {
      if (value === undefined || value === null) return;
      url.searchParams.set(key, String(value));
    });
  }
  return url.toString();
};

const ensureOk = (response: Response) => {
  if (!response.ok) {
    throw new Error(`Transit relay request failed (${response.status})`);
  }
};

const handleJson = async <T>(response: Response): Promise<T> => {
  ensureOk(response);
  return (await response.json()) as T;
};

/** A payload together with the cache policy label the relay reported for it. */
export interface WithDataSource<T> {
  data: T;
  dataSource: string | null;
}

const handleSourcedJson = async <T>(response: Response): Promise<WithDataSource<T>> => {
  const data = await handleJson<T>(response);
  return { data, dataSource: response.headers.get(DATA_SOURCE_HEADER) };
};

export interface FormatOptions {
  format?: JsonFormat;
}

export const fetchHealth = async (baseUrl: string, init?: RequestInitWithSignal): Promise<HealthPayload> => {
  const response = await fetch(buildUrl(baseUrl, "/health"), { ...init });
  return handleJson<HealthPayload>(response);
};

export const fetchTransit = async (
  baseUrl: string,
  options: FormatOptions = {},
  init?: RequestInitWithSignal,
): Promise<WithDataSource<TransitPayload>> => {
  const url = buildUrl(baseUrl, "/transit", { format: options.format });
  const response = await fetch(url, { ...init });
  return handleSourcedJson<TransitPayload>(response);
};

export const fetchTransitText = async (baseUrl: string, init?: RequestInitWithSignal): Promise<string> => {
  const url = buildUrl(baseUrl, "/transit", { format: "text" });
  const response = await fetch(url, { ...init });
  ensureOk(response);
  return response.text();
};

export const fetchLines = async (
  baseUrl: string,
  options: FormatOptions = {},
  init?: RequestInitWithSignal,
): Promise<WithDataSource<LinesPayload | LinesFallbackPayload>> => {
  const url = buildUrl(baseUrl, "/transit/lines", { format: options.format });
  const response = await fetch(url, { ...init });
  return handleSourcedJson<LinesPayload | LinesFallbackPayload>(response);
};

export const fetchLine = async (
  baseUrl: string,
  lineId: string,
  options: FormatOptions = {},
  init?: RequestInitWithSignal,
): Promise<WithDataSource<LinePayload | LineFallbackPayload>> => {
  const url = buildUrl(baseUrl, `/transit/line/${encodeURIComponent(lineId)}`, { format: options.format });
  const response = await fetch(url, { ...init });
  return handleSourcedJson<LinePayload | LineFallbackPayload>(response);
};

export const fetchStatus = async (
  baseUrl: string,
  options: FormatOptions = {},
  init?: RequestInitWithSignal,
): Promise<WithDataSource<StatusPayload>> => {
  const url = buildUrl(baseUrl, "/transit/status", { format: options.format });
  const response = await fetch(url, { ...init });
  return handleSourcedJson<StatusPayload>(response);
};

export const fetchAlerts = async (
  baseUrl: string,
  options: FormatOptions = {},
  init?: RequestInitWithSignal,
): Promise<WithDataSource<AlertsPayload>> => {
  const url = buildUrl(baseUrl, "/transit/alerts", { format: options.format });
  const response = await fetch(url, { ...init });
  return handleSourcedJson<AlertsPayload>(response);
};

export const triggerCacheRefresh = async (
  baseUrl: string,
  init?: RequestInitWithSignal,
): Promise<CacheRefreshPayload> => {
  const response = await fetch(buildUrl(baseUrl, "/cache/refresh"), { ...init });
  return handleJson<CacheRefreshPayload>(response);
};

export const fetchCacheStatus = async (
  baseUrl: string,
  init?: RequestInitWithSignal,
): Promise<CacheStatusPayload> => {
  const response = await fetch(buildUrl(baseUrl, "/cache/status"), { ...init });
  return handleJson<CacheStatusPayload>(response);
};

export const isLineFallback = (payload: LinePayload | LineFallbackPayload): payload is LineFallbackPayload =>
  "debug_info" in payload;

export const isLinesFallback = (payload: LinesPayload | LinesFallbackPayload): payload is LinesFallbackPayload =>
  "fallback_lines" in payload && typeof payload.fallback_lines === "object";
