import YahooFinance from "yahoo-finance2";

import { FetchError, errorMessage } from "../errors";
import type { Frequency, Instant, SeriesRow, SeriesSource } from "../types";

type YahooInterval = "1m" | "1h" | "1d";

function yahooIntervalFor(frequency: Frequency): YahooInterval | null {
  switch (frequency) {
    case "tick":
      return null;
    case "minute":
      return "1m";
    case "hour":
      return "1h";
    case "daily":
      return "1d";
  }
}

function toSeriesRows(quotes: Array<Record<string, unknown>>, rangeStart: Instant, rangeEnd: Instant): SeriesRow[] {
  const rows: SeriesRow[] = [];

  for (const q of quotes) {
    const date = q.date;
    if (!(date instanceof Date)) {
      continue;
    }
    const t = date.getTime();
    if (t < rangeStart || t >= rangeEnd) {
      continue;
    }

    const open = q.open;
    const high = q.high;
    const low = q.low;
    const close = q.close;
    const volume = q.volume;
    if (
      typeof open !== "number" ||
      typeof high !== "number" ||
      typeof low !== "number" ||
      typeof close !== "number" ||
      !Number.isFinite(open) ||
      !Number.isFinite(high) ||
      !Number.isFinite(low) ||
      !Number.isFinite(close)
    ) {
      continue;
    }

    rows.push({
      t: date.toISOString(),
      o: open,
      h: high,
      l: low,
      c: close,
      v: typeof volume === "number" && Number.isFinite(volume) ? volume : null
    });
  }

  rows.sort((a, b) => a.t.localeCompare(b.t));
  return rows;
}

function httpStatusOf(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) {
    return undefined;
  }

  const candidates: unknown[] = [
    "code" in error ? error.code : undefined,
    "status" in error ? error.status : undefined,
    "statusCode" in error ? error.statusCode : undefined
  ];
  return candidates.find((value): value is number => typeof value === "number");
}

function classifyYahooError(error: unknown): FetchError {
  const message = errorMessage(error);
  const status = httpStatusOf(error);
  if (status === 401 || status === 403 || /unauthori[sz]ed|forbidden/i.test(message)) {
    return new FetchError("fatal", `[yahoo] ${message}`, { cause: error });
  }

  return new FetchError("transient", `[yahoo] ${message}`, { cause: error });
}

/**
* Yahoo Finance chart data as a `SeriesSource`. Yahoo has no tick data, and only serves
* recent intraday bars; the horizons in config/archive.yml are set to match.
*/
export class YahooSeriesSource implements SeriesSource {
  readonly name = "yahoo-finance";
  readonly #yf: InstanceType<typeof YahooFinance>;
  readonly #now: () => Instant;

  constructor(opts: { now?: () => Instant } = {}) {
    this.#yf = new YahooFinance();
    this.#now = opts.now ?? Date.now;
  }

  supports(frequency: Frequency): boolean {
    return yahooIntervalFor(frequency) !== null;
  }

  async fetch(seriesId: string, frequency: Frequency, rangeStart: Instant, rangeEnd: Instant): Promise<SeriesRow[]> {
    const interval = yahooIntervalFor(frequency);
    if (interval === null) {
      throw new FetchError("fatal", `[yahoo] ${frequency} data is not available from Yahoo Finance`);
    }

    // Never ask for bars past "now"; the current window is fetched up to the present.
    const period1 = new Date(rangeStart);
    const period2 = new Date(Math.min(rangeEnd, this.#now()));
    if (period1.getTime() >= period2.getTime()) {
      return [];
    }

    let res;
    try {
      res = await this.#yf.chart(seriesId, { interval, period1, period2 });
    } catch (error) {
      throw classifyYahooError(error);
    }

    if (!Array.isArray(res.quotes) || res.quotes.length === 0) {
      return [];
    }

    return toSeriesRows(res.quotes as Array<Record<string, unknown>>, rangeStart, rangeEnd);
  }
}

export const __testing = {
  classifyYahooError,
  toSeriesRows,
  yahooIntervalFor
};
