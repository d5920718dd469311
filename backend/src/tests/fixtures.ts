import type { FeedFetcher, FetchResult } from "../feed/fetcher";
import { deriveLineStatus } from "../feed/fetcher";
import type { LineStatus, RawAlert, RawLineSample } from "../models/feed";

export const makeAlert = (overrides: Partial<RawAlert> = {}): RawAlert => ({
  header: "",
  description: "",
  routeIds: [],
  activePeriods: [],
  ...overrides,
});

export const makeSample = (
  lineId: string,
  options: { alerts?: RawAlert[]; activeTripCount?: number; status?: LineStatus } = {},
): RawLineSample => {
  const alerts = options.alerts ?? [];
  return {
    lineId,
    status: options.status ?? deriveLineStatus(alerts),
    alerts,
    activeTripCount: options.activeTripCount ?? 0,
  };
};

export const makeRaw = (...samples: RawLineSample[]) =>
  new Map<string, RawLineSample>(samples.map((sample) => [sample.lineId, sample]));

/** F has planned construction, R has an active delay. */
export const buildFeedFixture = () =>
  makeRaw(
    makeSample("F", {
      alerts: [makeAlert({ header: "Construction on F line", routeIds: ["F"] })],
      activeTripCount: 3,
    }),
    makeSample("R", {
      alerts: [makeAlert({ header: "Signal problems", description: "Expect delays", routeIds: ["R"] })],
      activeTripCount: 2,
    }),
  );

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

export const createDeferred = <T>(): Deferred<T> => {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
};

/** Replays queued results; each entry may be a value, a thrown error, or a promise to await. */
export class FakeFetcher implements FeedFetcher {
  public calls = 0;
  private readonly queue: Array<FetchResult | Error | Promise<FetchResult>> = [];

  enqueue(...results: Array<FetchResult | Error | Promise<FetchResult>>) {
    this.queue.push(...results);
    return this;
  }

  async fetchRaw(): Promise<FetchResult> {
    this.calls += 1;
    const next = this.queue.shift();
    if (next === undefined) {
      throw new Error("FakeFetcher queue is empty");
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

export const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

export const FIXED_NOW = Date.parse("2024-05-06T12:00:00.000Z");
