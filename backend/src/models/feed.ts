export type LineId = string;
export type EpochSeconds = number;

/** A window during which an alert applies. A null bound is open-ended. */
export interface ActivePeriod {
  start: EpochSeconds | null;
  end: EpochSeconds | null;
}

export interface RawAlert {
  header: string;
  description: string;
  routeIds: string[];
  activePeriods: ActivePeriod[];
}

export type LineStatus = "Good Service" | "Delays" | "Planned Work" | "Service Change";

export interface RawLineSample {
  readonly lineId: LineId;
  readonly status: LineStatus;
  readonly alerts: readonly RawAlert[];
  readonly activeTripCount: number;
}

/** Everything one feed contributed to a refresh cycle, before it is split by line. */
export interface DecodedFeed {
  alerts: RawAlert[];
  tripCountsByRoute: Map<string, number>;
}

export type RawFeedMap = ReadonlyMap<LineId, RawLineSample>;
