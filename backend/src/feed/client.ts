import type { FeedTelemetry } from "@transit-ticker/core";
import { config, FEED_TIMEOUT_MS } from "../config";
import { FeedError, err, ok, safeErrorMessage, type Result } from "../utils/errors";
import { createLogger } from "../utils/logger";

const logger = createLogger("feed");

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface FeedClientOptions {
  baseUrl?: string;
  apiKey?: string | undefined;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

const trimTrailingSlash = (value: string) => value.replace(/\/+$/, "");

export class MtaFeedClient {
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly telemetry: FeedTelemetry = {
    totalRequests: 0,
    failedRequests: 0,
    lastSuccessAt: null,
    lastSuccessPath: null,
    lastFailureAt: null,
    lastFailurePath: null,
    lastFailureMessage: null,
  };

  constructor(options: FeedClientOptions = {}) {
    this.baseUrl = trimTrailingSlash(options.baseUrl ?? config.mtaFeedBaseUrl);
    this.apiKey = options.apiKey ?? config.mtaApiKey;
    this.timeoutMs = options.timeoutMs ?? FEED_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  getTelemetry(): FeedTelemetry {
    return { ...this.telemetry };
  }

  /** Downloads one feed body. Every failure mode comes back as a `FeedError`, never a rejection. */
  async fetchFeed(feedPath: string): Promise<Result<Uint8Array, FeedError>> {
    const url = `${this.baseUrl}/${feedPath}`;
    const headers = new Headers({ Accept: "application/x-protobuf" });
    if (this.apiKey) {
      headers.set("x-api-key", this.apiKey);
    }

    const timeoutController = new AbortController();
    const timeout = setTimeout(() => timeoutController.abort(), this.timeoutMs);
    this.telemetry.totalRequests += 1;

    try {
      const response = await this.fetchImpl(url, { headers, signal: timeoutController.signal });
      if (!response.ok) {
        return this.fail(
          new FeedError(
            "http_status",
            feedPath,
            `Feed request failed (${response.status} ${response.statusText}) for ${feedPath}`,
            response.status,
          ),
        );
      }
      const body = new Uint8Array(await response.arrayBuffer());
      this.telemetry.lastSuccessAt = new Date().toISOString();
      this.telemetry.lastSuccessPath = feedPath;
      return ok(body);
    } catch (error) {
      if (timeoutController.signal.aborted) {
        return this.fail(new FeedError("timeout", feedPath, `Feed request timed out after ${this.timeoutMs}ms for ${feedPath}`));
      }
      return this.fail(new FeedError("network", feedPath, `Feed request errored for ${feedPath}: ${safeErrorMessage(error)}`));
    } finally {
      clearTimeout(timeout);
    }
  }

  private fail(error: FeedError): Result<never, FeedError> {
    this.telemetry.failedRequests += 1;
    this.telemetry.lastFailureAt = new Date().toISOString();
    this.telemetry.lastFailurePath = error.feedPath;
    this.telemetry.lastFailureMessage = error.message;
    logger.warn("Feed request failed", { feedPath: error.feedPath, kind: error.kind, message: error.message });
    return err(error);
  }
}

export const createFeedClient = () => {
  const options: FeedClientOptions = {
    baseUrl: config.mtaFeedBaseUrl,
  };

  if (config.mtaApiKey) {
    options.apiKey = config.mtaApiKey;
  }

  return new MtaFeedClient(options);
};
