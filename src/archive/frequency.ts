import { DAY_MS, HOUR_MS, formatIsoDateUtc, parseIsoDateYmd, utcMidnight } from "../lib/date";

import type { Frequency, FrequencyPolicies, Horizon, Instant } from "./types";

// Chunk files are stored under:
//   <archiveRoot>/<FREQUENCY>/<SERIES>/<LABEL>.json         complete or empty
//   <archiveRoot>/<FREQUENCY>/<SERIES>/<LABEL>.incomplete   current, still accumulating
//
// LABEL is the UTC start of the chunk's window:
//   tick   -> YYYY-MM-DDTHH (one hour)
//   minute -> YYYY-MM-DD    (one day)
//   hour   -> YYYY-MM-DD    (one day)
//   daily  -> YYYY          (one calendar year)

export const DEFAULT_FREQUENCY_POLICIES: FrequencyPolicies = {
  tick: { horizon: { kind: "rolling", days: 90 }, estimatedBytes: 2_000_000 },
  minute: { horizon: { kind: "rolling", days: 366 }, estimatedBytes: 200_000 },
  hour: { horizon: { kind: "rolling", days: 730 }, estimatedBytes: 10_000 },
  daily: { horizon: { kind: "fixed", start: Date.UTC(1980, 0, 1) }, estimatedBytes: 40_000 }
};

export function alignWindowStart(frequency: Frequency, t: Instant): Instant {
  switch (frequency) {
    case "tick":
      return Math.floor(t / HOUR_MS) * HOUR_MS;
    case "minute":
    case "hour":
      return Math.floor(t / DAY_MS) * DAY_MS;
    case "daily":
      return Date.UTC(new Date(t).getUTCFullYear(), 0, 1);
  }
}

export function nextWindowStart(frequency: Frequency, windowStart: Instant): Instant {
  switch (frequency) {
    case "tick":
      return windowStart + HOUR_MS;
    case "minute":
    case "hour":
      return windowStart + DAY_MS;
    case "daily":
      return Date.UTC(new Date(windowStart).getUTCFullYear() + 1, 0, 1);
  }
}

export function formatChunkLabel(frequency: Frequency, windowStart: Instant): string {
  switch (frequency) {
    case "tick":
      return `${formatIsoDateUtc(windowStart)}T${`${new Date(windowStart).getUTCHours()}`.padStart(2, "0")}`;
    case "minute":
    case "hour":
      return formatIsoDateUtc(windowStart);
    case "daily":
      return `${new Date(windowStart).getUTCFullYear()}`;
  }
}

/**
* Inverse of `formatChunkLabel`. Returns `null` for anything that isn't a canonical label,
* so stray files in a series directory are ignored rather than misread.
*/
export function parseChunkLabel(frequency: Frequency, label: string): Instant | null {
  try {
    switch (frequency) {
      case "tick": {
        const match = /^(\d{4}-\d{2}-\d{2})T(\d{2})$/.exec(label);
        if (!match) {
          return null;
        }
        const hour = Number(match[2]);
        if (hour > 23) {
          return null;
        }
        return utcMidnight(match[1]) + hour * HOUR_MS;
      }
      case "minute":
      case "hour":
        parseIsoDateYmd(label);
        return utcMidnight(label);
      case "daily":
        return /^\d{4}$/.test(label) ? Date.UTC(Number(label), 0, 1) : null;
    }
  } catch {
    return null;
  }
}

export function earliestRetrievable(horizon: Horizon, now: Instant): Instant {
  switch (horizon.kind) {
    case "rolling":
      return now - horizon.days * DAY_MS;
    case "fixed":
      return horizon.start;
  }
}
