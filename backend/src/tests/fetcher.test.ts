import test from "node:test";
import assert from "node:assert/strict";
import { transit_realtime } from "gtfs-realtime-bindings";
import { decodeFeed } from "../feed/decoder";
import { planFeeds } from "../feed/feedGroups";
import { buildLineSample, deriveLineStatus, MtaFeedFetcher } from "../feed/fetcher";
import { FeedError, err, ok, type Result } from "../utils/errors";
import { makeAlert } from "./fixtures";

const encodeFeed = (entity: transit_realtime.IFeedEntity[]) =>
  transit_realtime.FeedMessage.encode(
    transit_realtime.FeedMessage.create({
      header: { gtfsRealtimeVersion: "2.0", timestamp: 1_714_996_800 },
      entity,
    }),
  ).finish();

const tripUpdate = (id: string, routeId: string): transit_realtime.IFeedEntity => ({
  id,
  tripUpdate: { trip: { tripId: `${id}-trip`, routeId } },
});

const alertEntity = (
  id: string,
  routeIds: string[],
  header: string,
  description?: string,
  activePeriod: transit_realtime.ITimeRange[] = [],
): transit_realtime.IFeedEntity => ({
  id,
  alert: {
    informedEntity: routeIds.map((routeId) => ({ routeId })),
    headerText: { translation: [{ text: header, language: "en" }] },
    descriptionText: description ? { translation: [{ text: description, language: "en" }] } : null,
    activePeriod,
  },
});

const bdfmFeed = () =>
  encodeFeed([
    tripUpdate("t1", "F"),
    tripUpdate("t2", "F"),
    tripUpdate("t3", "F"),
    tripUpdate("t4", "M"),
    alertEntity("a1", ["F"], "Northbound F trains are delayed", "Signal problems at Jay St", [
      { start: 1_714_990_000, end: 1_715_000_000 },
    ]),
  ]);

const nqrwFeed = () =>
  encodeFeed([
    tripUpdate("t5", "R"),
    tripUpdate("t6", "R"),
    alertEntity("a2", ["R", "W"], "Construction at 36 St", undefined, [{ start: 1_715_100_000 }]),
  ]);

class FakeFeedClient {
  public requested: string[] = [];

  constructor(private readonly bodies: Record<string, Result<Uint8Array, FeedError>>) {}

  async fetchFeed(feedPath: string): Promise<Result<Uint8Array, FeedError>> {
    this.requested.push(feedPath);
    return this.bodies[feedPath] ?? err(new FeedError("http_status", feedPath, "not found", 404));
  }
}

test("decodeFeed extracts alerts and counts trip updates per route", () => {
  const decoded = decodeFeed(bdfmFeed());
  assert.equal(decoded.tripCountsByRoute.get("F"), 3);
  assert.equal(decoded.tripCountsByRoute.get("M"), 1);
  assert.equal(decoded.alerts.length, 1);
  assert.deepEqual(decoded.alerts[0], {
    header: "Northbound F trains are delayed",
    description: "Signal problems at Jay St",
    routeIds: ["F"],
    activePeriods: [{ start: 1_714_990_000, end: 1_715_000_000 }],
  });
});

test("decodeFeed treats missing period bounds as open-ended", () => {
  const decoded = decodeFeed(nqrwFeed());
  assert.deepEqual(decoded.alerts[0]?.activePeriods, [{ start: 1_715_100_000, end: null }]);
  assert.deepEqual(decoded.alerts[0]?.routeIds, ["R", "W"]);
  assert.equal(decoded.alerts[0]?.description, "");
});

test("decodeFeed takes the route from the trip selector when the alert names no route", () => {
  const decoded = decodeFeed(
    encodeFeed([
      tripUpdate("t1", "F"),
      {
        id: "a3",
        alert: {
          informedEntity: [{ trip: { tripId: "123", routeId: "f" } }, { agencyId: "MTASBWY" }],
          headerText: { translation: [{ text: "Train delayed", language: "en" }] },
        },
      },
    ]),
  );
  assert.deepEqual(decoded.alerts[0]?.routeIds, ["F"]);

  const sample = buildLineSample("F", decoded);
  assert.equal(sample.status, "Delays");
  assert.equal(sample.alerts.length, 1);
});

test("decodeFeed throws on malformed bytes", () => {
  assert.throws(() => decodeFeed(new Uint8Array([0xff, 0xff, 0xff])));
});

test("deriveLineStatus scans alert text case-insensitively", () => {
  assert.equal(deriveLineStatus([]), "Good Service");
  assert.equal(deriveLineStatus([makeAlert({ description: "Expect DELAYS" })]), "Delays");
  assert.equal(deriveLineStatus([makeAlert({ header: "Track construction" })]), "Planned Work");
  assert.equal(deriveLineStatus([makeAlert({ header: "Trains run local" })]), "Service Change");
  assert.equal(
    deriveLineStatus([makeAlert({ header: "Construction" }), makeAlert({ header: "Delays" })]),
    "Delays",
    "delay anywhere in the line's alerts wins",
  );
});

test("planFeeds groups lines sharing a feed and reports unknown lines", () => {
  const plan = planFeeds(["F", "R", "M", "X9"]);
  assert.deepEqual(Array.from(plan.feeds.entries()), [
    ["nyct%2Fgtfs-bdfm", ["F", "M"]],
    ["nyct%2Fgtfs-nqrw", ["R"]],
  ]);
  assert.deepEqual(plan.unknownLines, ["X9"]);
});

test("fetchRaw fans feeds out to tracked lines in tracked order", async () => {
  const client = new FakeFeedClient({
    "nyct%2Fgtfs-bdfm": ok(bdfmFeed()),
    "nyct%2Fgtfs-nqrw": ok(nqrwFeed()),
  });
  const fetcher = new MtaFeedFetcher(client, ["R", "F"]);

  const result = await fetcher.fetchRaw();
  assert.ok(result.ok);
  assert.deepEqual(Array.from(result.value.keys()), ["R", "F"]);

  const f = result.value.get("F");
  assert.equal(f?.status, "Delays");
  assert.equal(f?.activeTripCount, 3);
  assert.equal(f?.alerts.length, 1);

  const r = result.value.get("R");
  assert.equal(r?.status, "Planned Work");
  assert.equal(r?.activeTripCount, 2);
});

test("fetchRaw requests a shared feed once for several lines", async () => {
  const client = new FakeFeedClient({ "nyct%2Fgtfs-bdfm": ok(bdfmFeed()) });
  const fetcher = new MtaFeedFetcher(client, ["f", "m"]);

  const result = await fetcher.fetchRaw();
  assert.deepEqual(client.requested, ["nyct%2Fgtfs-bdfm"]);
  assert.ok(result.ok);
  assert.equal(result.value.get("M")?.activeTripCount, 1);
  assert.equal(result.value.get("M")?.status, "Good Service");
});

test("fetchRaw drops lines whose feed failed and keeps the rest", async () => {
  const client = new FakeFeedClient({
    "nyct%2Fgtfs-bdfm": ok(bdfmFeed()),
    "nyct%2Fgtfs-nqrw": err(new FeedError("timeout", "nyct%2Fgtfs-nqrw", "timed out")),
  });
  const result = await new MtaFeedFetcher(client, ["F", "R"]).fetchRaw();
  assert.ok(result.ok);
  assert.deepEqual(Array.from(result.value.keys()), ["F"]);
});

test("fetchRaw reports decode failures as feed errors", async () => {
  const client = new FakeFeedClient({ "nyct%2Fgtfs-bdfm": ok(new Uint8Array([0xff, 0xff, 0xff])) });
  const result = await new MtaFeedFetcher(client, ["F"]).fetchRaw();
  assert.equal(result.ok, false);
  if (result.ok) return;
  assert.equal(result.error.kind, "all_feeds_failed");
  assert.equal(result.error.failures[0]?.kind, "decode");
  assert.equal(result.error.failures[0]?.feedPath, "nyct%2Fgtfs-bdfm");
});

test("fetchRaw fails only when every feed fails", async () => {
  const client = new FakeFeedClient({
    "nyct%2Fgtfs-bdfm": err(new FeedError("http_status", "nyct%2Fgtfs-bdfm", "503", 503)),
    "nyct%2Fgtfs-nqrw": err(new FeedError("network", "nyct%2Fgtfs-nqrw", "reset")),
  });
  const result = await new MtaFeedFetcher(client, ["F", "R"]).fetchRaw();
  assert.equal(result.ok, false);
  if (result.ok) return;
  assert.equal(result.error.kind, "all_feeds_failed");
  assert.deepEqual(
    result.error.failures.map((failure) => failure.kind),
    ["http_status", "network"],
  );
});

test("fetchRaw without any known feed reports no_feeds", async () => {
  const client = new FakeFeedClient({});
  const result = await new MtaFeedFetcher(client, ["X9"]).fetchRaw();
  assert.equal(result.ok, false);
  if (result.ok) return;
  assert.equal(result.error.kind, "no_feeds");
  assert.deepEqual(client.requested, []);
});
