import { transit_realtime } from "gtfs-realtime-bindings";
import type { ActivePeriod, DecodedFeed, RawAlert } from "../models/feed";

type TimestampLike = number | { toNumber(): number } | null | undefined;

const toEpochSeconds = (value: TimestampLike): number | null => {
  if (value === null || value === undefined) return null;
  const seconds = typeof value === "number" ? value : value.toNumber();
  return Number.isFinite(seconds) && seconds > 0 ? seconds : null;
};

const pickTranslation = (text: transit_realtime.ITranslatedString | null | undefined): string => {
  const translations = text?.translation ?? [];
  const preferred =
    translations.find((entry) => !entry.language || entry.language === "en") ?? translations[0];
  return preferred?.text?.trim() ?? "";
};

const toActivePeriods = (ranges: transit_realtime.ITimeRange[] | null | undefined): ActivePeriod[] =>
  (ranges ?? [])
    .map((range) => ({ start: toEpochSeconds(range.start), end: toEpochSeconds(range.end) }));

// Decoded selectors default routeId to "", and trip-scoped alerts name their
// route only through the trip descriptor.
const selectorRouteId = (entity: transit_realtime.IEntitySelector): string =>
  entity.routeId || entity.trip?.routeId || "";

const toRawAlert = (alert: transit_realtime.IAlert): RawAlert => ({
  header: pickTranslation(alert.headerText),
  description: pickTranslation(alert.descriptionText),
  routeIds: Array.from(
    new Set(
      (alert.informedEntity ?? [])
        .map((entity) => selectorRouteId(entity).trim().toUpperCase())
        .filter((routeId) => routeId.length > 0),
    ),
  ),
  activePeriods: toActivePeriods(alert.activePeriod),
});

/** Decodes a GTFS-realtime FeedMessage into alerts and per-route trip update counts. Throws on malformed input. */
export const decodeFeed = (body: Uint8Array): DecodedFeed => {
  const message = transit_realtime.FeedMessage.decode(body);
  const alerts: RawAlert[] = [];
  const tripCountsByRoute = new Map<string, number>();

  message.entity.forEach((entity) => {
    if (entity.alert) {
      alerts.push(toRawAlert(entity.alert));
    }
    const routeId = entity.tripUpdate?.trip.routeId?.trim().toUpperCase();
    if (routeId) {
      tripCountsByRoute.set(routeId, (tripCountsByRoute.get(routeId) ?? 0) + 1);
    }
  });

  return { alerts, tripCountsByRoute };
};
