import cors from "cors";
import express, { type ErrorRequestHandler, type Response } from "express";
import type {
  CacheRefreshPayload,
  CacheStatusPayload,
  FeedTelemetry,
  HealthPayload,
  ResponseFormat,
  TransitErrorResponse,
} from "@transit-ticker/core";
import { CACHE_DURATION_SECONDS, UPDATE_INTERVAL_SECONDS } from "../config";
import type { TransitCache } from "../cache/transitCache";
import type { Refresher } from "../polling/refreshLoop";
import { buildLinesFallback, buildLinesView, buildLineView, buildMissingLineFallback } from "../services/lineView";
import { toAlertsPayload, toStatusPayload, toTransitPayload } from "../services/snapshots";
import { formatForDisplay } from "../services/textFormat";
import { safeErrorMessage } from "../utils/errors";
import { createLogger } from "../utils/logger";

const logger = createLogger("http");

export const DATA_SOURCE_HEADER = "X-Data-Source";

export interface AppDependencies {
  cache: TransitCache;
  refresher: Refresher;
  trackedLines: readonly string[];
  feedTelemetry?: () => FeedTelemetry;
  now?: () => number;
  exposeErrors?: boolean;
}

const EMPTY_TELEMETRY: FeedTelemetry = {
  totalRequests: 0,
  failedRequests: 0,
  lastSuccessAt: null,
  lastSuccessPath: null,
  lastFailureAt: null,
  lastFailurePath: null,
  lastFailureMessage: null,
};

export const parseFormat = (value: unknown): ResponseFormat => {
  if (value === "text" || value === "compact") return value;
  return "json";
};

const sendJson = (res: Response, payload: unknown, format: ResponseFormat, dataSource: string) => {
  const body = format === "compact" ? JSON.stringify(payload) : JSON.stringify(payload, null, 2);
  res.status(200).set(DATA_SOURCE_HEADER, dataSource).type("application/json").send(body);
};

export const createApp = (deps: AppDependencies) => {
  const { cache, refresher, trackedLines } = deps;
  const now = deps.now ?? Date.now;
  const feedTelemetry = deps.feedTelemetry ?? (() => EMPTY_TELEMETRY);
  const exposeErrors = deps.exposeErrors ?? true;

  const app = express();
  app.use(cors());

  app.get("/health", (_req, res) => {
    const status = cache.getStatus();
    const payload: HealthPayload = {
      status: "ok",
      timestamp: new Date(now()).toISOString(),
      cache_age_seconds: status.ageSeconds,
      is_updating: status.isUpdating,
      has_cached_data: status.hasData,
      feed: feedTelemetry(),
    };
    res.json(payload);
  });

  app.get("/transit", (req, res) => {
    const { snapshot, source } = cache.read();
    const format = parseFormat(req.query.format);
    if (format === "text") {
      res.status(200).set(DATA_SOURCE_HEADER, source).type("text/plain").send(formatForDisplay(snapshot, source));
      return;
    }
    sendJson(res, toTransitPayload(snapshot), format, source);
  });

  app.get("/transit/lines", (req, res) => {
    const { snapshot, source } = cache.read();
    const format = parseFormat(req.query.format);
    const current = new Date(now());
    if (!snapshot.rawByLine) {
      sendJson(res, buildLinesFallback(trackedLines, source, current), format, source);
      return;
    }
    sendJson(res, buildLinesView(snapshot.rawByLine, current), format, source);
  });

  app.get("/transit/line/:lineId", (req, res) => {
    const lineId = req.params.lineId.toUpperCase();
    const { snapshot, source } = cache.read();
    const format = parseFormat(req.query.format);
    const current = new Date(now());
    const sample = snapshot.rawByLine?.get(lineId);
    if (!sample) {
      sendJson(res, buildMissingLineFallback(lineId, snapshot.rawByLine, source, current), format, source);
      return;
    }
    sendJson(res, buildLineView(sample, current), format, source);
  });

  app.get("/transit/status", (req, res) => {
    const { snapshot, source } = cache.read();
    sendJson(res, toStatusPayload(snapshot), parseFormat(req.query.format), source);
  });

  app.get("/transit/alerts", (req, res) => {
    const { snapshot, source } = cache.read();
    sendJson(res, toAlertsPayload(snapshot), parseFormat(req.query.format), source);
  });

  app.get("/cache/refresh", (_req, res) => {
    refresher.triggerRefresh();
    const payload: CacheRefreshPayload = { message: "Cache refresh triggered" };
    res.status(200).json(payload);
  });

  app.get("/cache/status", (_req, res) => {
    const status = cache.getStatus();
    const payload: CacheStatusPayload = {
      has_data: status.hasData,
      cache_age_seconds: status.ageSeconds,
      is_updating: status.isUpdating,
      cache_duration: CACHE_DURATION_SECONDS,
      update_interval: UPDATE_INTERVAL_SECONDS,
      last_update: status.lastUpdate,
    };
    res.json(payload);
  });

  app.use((_req, res) => {
    const payload: TransitErrorResponse = { error: "endpoint not found" };
    res.status(404).json(payload);
  });

  const handleError: ErrorRequestHandler = (error: unknown, req, res, _next) => {
    const message = safeErrorMessage(error);
    logger.error("Request handler failed", { path: req.path, message });
    const payload: TransitErrorResponse = { error: exposeErrors ? message : "internal server error" };
    res.status(500).json(payload);
  };
  app.use(handleError);

  return app;
};
