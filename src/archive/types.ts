export type Frequency = "tick" | "minute" | "hour" | "daily";

export const FREQUENCIES: readonly Frequency[] = ["tick", "minute", "hour", "daily"];

export function isFrequency(value: unknown): value is Frequency {
  return FREQUENCIES.some((f) => f === value);
}

/**
* Epoch milliseconds, always interpreted as UTC.
*/
export type Instant = number;

export type Series = {
  id: string;
  frequency: Frequency;
};

/**
* One row as returned by a source. `t` is an ISO-8601 timestamp; the remaining columns
* are source-specific (OHLCV for bars, price/size for ticks).
*/
export type SeriesRow = {
  t: string;
  [field: string]: string | number | null;
};

export const CHUNK_STATUSES = ["complete", "incomplete", "empty"] as const;

export type ChunkStatus = (typeof CHUNK_STATUSES)[number];

export type ChunkMeta = {
  series: Series;
  label: string;
  rangeStart: Instant;
  rangeEnd: Instant;
  status: ChunkStatus;
  path: string;
};

export type ChunkTask = {
  series: Series;
  label: string;
  rangeStart: Instant;
  rangeEnd: Instant;
  expected: "complete" | "incomplete";
};

export type Horizon =
  | { kind: "rolling"; days: number }
  | { kind: "fixed"; start: Instant };

export type FrequencyPolicy = {
  horizon: Horizon;
  /** Payload size class used when a request's size isn't known up front. */
  estimatedBytes: number;
};

export type FrequencyPolicies = Record<Frequency, FrequencyPolicy>;

/**
* Remote source of rows for one window. Request timeouts are the source's concern; a
* request, once issued, is always allowed to finish.
*/
export type SeriesSource = {
  readonly name: string;
  supports(frequency: Frequency): boolean;
  fetch(
    seriesId: string,
    frequency: Frequency,
    rangeStart: Instant,
    rangeEnd: Instant
  ): Promise<SeriesRow[]>;
};
