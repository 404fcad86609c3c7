export type IsoDateYmd = {
  year: number;
  month: number;
  day: number;
};

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

export function parseIsoDateYmd(date: string): IsoDateYmd {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(date)) {
    throw new Error(`Invalid date: ${date}. Expected YYYY-MM-DD.`);
  }

  const [yearStr, monthStr, dayStr] = date.split("-");
  const year = Number(yearStr);
  const month = Number(monthStr);
  const day = Number(dayStr);

  const parsed = new Date(Date.UTC(year, month - 1, day));
  if (
    !Number.isFinite(parsed.getTime()) ||
    parsed.getUTCFullYear() !== year ||
    parsed.getUTCMonth() !== month - 1 ||
    parsed.getUTCDate() !== day
  ) {
    throw new Error(`Invalid date: ${date}. Expected a real calendar day (YYYY-MM-DD).`);
  }

  return { year, month, day };
}

export function utcMidnight(date: string): number {
  const { year, month, day } = parseIsoDateYmd(date);
  return Date.UTC(year, month - 1, day);
}

function pad2(n: number): string {
  return `${n}`.padStart(2, "0");
}

export function formatIsoDateUtc(ms: number): string {
  const d = new Date(ms);
  return `${d.getUTCFullYear()}-${pad2(d.getUTCMonth() + 1)}-${pad2(d.getUTCDate())}`;
}

// 20211125T093000Z; sortable and safe in file names.
export function formatCompactUtcStamp(ms: number): string {
  const d = new Date(ms);
  return (
    `${d.getUTCFullYear()}${pad2(d.getUTCMonth() + 1)}${pad2(d.getUTCDate())}` +
    `T${pad2(d.getUTCHours())}${pad2(d.getUTCMinutes())}${pad2(d.getUTCSeconds())}Z`
  );
}

export function toIso(ms: number): string {
  return new Date(ms).toISOString();
}
