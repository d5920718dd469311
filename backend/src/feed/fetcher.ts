import type { DecodedFeed, LineId, LineStatus, RawAlert, RawFeedMap, RawLineSample } from "../models/feed";
import { FeedError, err, ok, safeErrorMessage, type Result } from "../utils/errors";
import { createLogger } from "../utils/logger";
import type { MtaFeedClient } from "./client";
import { decodeFeed } from "./decoder";
import { planFeeds } from "./feedGroups";

const logger = createLogger("fetcher");

export interface FetchFailure {
  kind: "all_feeds_failed" | "no_feeds";
  failures: FeedError[];
}

export type FetchResult = Result<RawFeedMap, FetchFailure>;

export interface FeedFetcher {
  fetchRaw(): Promise<FetchResult>;
}

export const deriveLineStatus = (alerts: readonly RawAlert[]): LineStatus => {
  const text = alerts
    .map((alert) => `${alert.header} ${alert.description}`)
    .join(" ")
    .toLowerCase();
  if (text.includes("delay")) return "Delays";
  if (text.includes("construction")) return "Planned Work";
  if (alerts.length > 0) return "Service Change";
  return "Good Service";
};

export const buildLineSample = (lineId: LineId, feed: DecodedFeed): RawLineSample => {
  const alerts = feed.alerts.filter((alert) => alert.routeIds.includes(lineId));
  return {
    lineId,
    status: deriveLineStatus(alerts),
    alerts,
    activeTripCount: feed.tripCountsByRoute.get(lineId) ?? 0,
  };
};

type FeedBodySource = Pick<MtaFeedClient, "fetchFeed">;

export class MtaFeedFetcher implements FeedFetcher {
  private readonly client: FeedBodySource;
  private readonly trackedLines: LineId[];

  constructor(client: FeedBodySource, trackedLines: readonly LineId[]) {
    this.client = client;
    this.trackedLines = trackedLines.map((lineId) => lineId.toUpperCase());
  }

  async fetchRaw(): Promise<FetchResult> {
    const plan = planFeeds(this.trackedLines);
    if (plan.unknownLines.length > 0) {
      logger.warn("Ignoring tracked lines without a known feed", { lines: plan.unknownLines });
    }
    if (plan.feeds.size === 0) {
      return err<FetchFailure>({ kind: "no_feeds", failures: [] });
    }

    const feedPaths = Array.from(plan.feeds.keys());
    const outcomes = await Promise.all(feedPaths.map((feedPath) => this.loadFeed(feedPath)));

    const decodedByLine = new Map<LineId, DecodedFeed>();
    const failures: FeedError[] = [];
    outcomes.forEach((outcome, index) => {
      const feedPath = feedPaths[index];
      if (feedPath === undefined) return;
      if (!outcome.ok) {
        failures.push(outcome.error);
        return;
      }
      (plan.feeds.get(feedPath) ?? []).forEach((lineId) => decodedByLine.set(lineId, outcome.value));
    });

    if (decodedByLine.size === 0) {
      return err<FetchFailure>({ kind: "all_feeds_failed", failures });
    }

    const raw = new Map<LineId, RawLineSample>();
    this.trackedLines.forEach((lineId) => {
      const feed = decodedByLine.get(lineId);
      if (feed) {
        raw.set(lineId, buildLineSample(lineId, feed));
      }
    });

    if (failures.length > 0) {
      logger.warn("Partial feed refresh", {
        failedFeeds: failures.map((failure) => failure.feedPath),
        lines: Array.from(raw.keys()),
      });
    }
    return ok(raw);
  }

  private async loadFeed(feedPath: string): Promise<Result<DecodedFeed, FeedError>> {
    const body = await this.client.fetchFeed(feedPath);
    if (!body.ok) return body;
    try {
      return ok(decodeFeed(body.value));
    } catch (error) {
      const decodeError = new FeedError(
        "decode",
        feedPath,
        `Failed to decode feed ${feedPath}: ${safeErrorMessage(error)}`,
      );
      logger.warn("Feed decode failed", { feedPath, message: decodeError.message });
      return err(decodeError);
    }
  }
}
