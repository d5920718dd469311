import type { LineId } from "../models/feed";

/** GTFS-realtime feed paths (relative to the feed base URL) and the subway lines each one carries. */
const FEED_GROUPS: Record<string, LineId[]> = {
  "nyct%2Fgtfs": ["1", "2", "3", "4", "5", "6", "6X", "7", "7X", "GS"],
  "nyct%2Fgtfs-ace": ["A", "C", "E", "H", "FS"],
  "nyct%2Fgtfs-bdfm": ["B", "D", "F", "FX", "M"],
  "nyct%2Fgtfs-g": ["G"],
  "nyct%2Fgtfs-jz": ["J", "Z"],
  "nyct%2Fgtfs-l": ["L"],
  "nyct%2Fgtfs-nqrw": ["N", "Q", "R", "W"],
  "nyct%2Fgtfs-si": ["SI"],
};

const feedPathByLine = new Map<LineId, string>(
  Object.entries(FEED_GROUPS).flatMap(([feedPath, lines]) => lines.map((line) => [line, feedPath] as const)),
);

export const resolveFeedPath = (lineId: LineId): string | null => feedPathByLine.get(lineId.toUpperCase()) ?? null;

export interface FeedPlan {
  /** Feed path → tracked lines it covers, in tracked-line order. */
  feeds: Map<string, LineId[]>;
  unknownLines: LineId[];
}

/** Groups tracked lines by feed so each physical feed is requested once per cycle. */
export const planFeeds = (trackedLines: readonly LineId[]): FeedPlan => {
  const feeds = new Map<string, LineId[]>();
  const unknownLines: LineId[] = [];
  trackedLines.forEach((lineId) => {
    const feedPath = resolveFeedPath(lineId);
    if (!feedPath) {
      unknownLines.push(lineId);
      return;
    }
    const lines = feeds.get(feedPath) ?? [];
    lines.push(lineId);
    feeds.set(feedPath, lines);
  });
  return { feeds, unknownLines };
};
