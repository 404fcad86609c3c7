import { readFile } from "node:fs/promises";
import path from "node:path";

import { parse as parseYaml } from "yaml";

import { utcMidnight } from "../lib/date";

import { DEFAULT_FREQUENCY_POLICIES } from "./frequency";
import type { RateLimitConfig } from "./rateLimiter";
import { FREQUENCIES, isFrequency, type FrequencyPolicies, type FrequencyPolicy, type Series } from "./types";

export type ArchiveConfig = {
  archiveRoot: string;
  rateLimit: RateLimitConfig;
  policies: FrequencyPolicies;
};

export const DEFAULT_RATE_LIMIT: RateLimitConfig = {
  minSpacingMs: 5_000,
  windowMs: 60_000,
  maxWindowBytes: 10_000_000
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function assertString(value: unknown, name: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new Error(`${name} must be a non-empty string`);
  }
  return value;
}

function assertNumber(value: unknown, name: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(`${name} must be a finite number`);
  }
  return value;
}

function assertPositiveInteger(value: unknown, name: string): number {
  const n = assertNumber(value, name);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`${name} must be a positive integer, got ${n}`);
  }
  return n;
}

function assertNonNegativeInteger(value: unknown, name: string): number {
  const n = assertNumber(value, name);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`${name} must be a non-negative integer, got ${n}`);
  }
  return n;
}

function validateRateLimit(raw: unknown): RateLimitConfig {
  if (raw === undefined) {
    return { ...DEFAULT_RATE_LIMIT };
  }
  if (!isRecord(raw)) {
    throw new Error("rateLimit must be an object");
  }

  const cfg: RateLimitConfig = {
    minSpacingMs:
      raw.minSpacingMs === undefined
        ? DEFAULT_RATE_LIMIT.minSpacingMs
        : assertNonNegativeInteger(raw.minSpacingMs, "rateLimit.minSpacingMs"),
    windowMs:
      raw.windowMs === undefined ? DEFAULT_RATE_LIMIT.windowMs : assertPositiveInteger(raw.windowMs, "rateLimit.windowMs"),
    maxWindowBytes:
      raw.maxWindowBytes === undefined
        ? DEFAULT_RATE_LIMIT.maxWindowBytes
        : assertPositiveInteger(raw.maxWindowBytes, "rateLimit.maxWindowBytes")
  };

  return cfg;
}

function validatePolicy(raw: unknown, fallback: FrequencyPolicy, name: string): FrequencyPolicy {
  if (raw === undefined) {
    return fallback;
  }
  if (!isRecord(raw)) {
    throw new Error(`${name} must be an object`);
  }
  if (raw.horizonDays !== undefined && raw.earliest !== undefined) {
    throw new Error(`${name} must set either horizonDays or earliest, not both`);
  }

  let horizon = fallback.horizon;
  if (raw.horizonDays !== undefined) {
    horizon = { kind: "rolling", days: assertPositiveInteger(raw.horizonDays, `${name}.horizonDays`) };
  } else if (raw.earliest !== undefined) {
    // YAML parses unquoted dates as strings with the default (core) schema.
    const earliest = assertString(raw.earliest, `${name}.earliest`);
    horizon = { kind: "fixed", start: utcMidnight(earliest) };
  }

  return {
    horizon,
    estimatedBytes:
      raw.estimatedBytes === undefined
        ? fallback.estimatedBytes
        : assertPositiveInteger(raw.estimatedBytes, `${name}.estimatedBytes`)
  };
}

export function parseArchiveConfig(raw: unknown, rootDir: string): ArchiveConfig {
  const cfg = raw ?? {};
  if (!isRecord(cfg)) {
    throw new Error("archive.yml must be a mapping");
  }

  const frequencies = cfg.frequencies ?? {};
  if (!isRecord(frequencies)) {
    throw new Error("archive.yml frequencies must be a mapping");
  }
  for (const key of Object.keys(frequencies)) {
    if (!isFrequency(key)) {
      throw new Error(`Unknown frequency in archive.yml: ${key}`);
    }
  }

  const policies: FrequencyPolicies = { ...DEFAULT_FREQUENCY_POLICIES };
  for (const frequency of FREQUENCIES) {
    policies[frequency] = validatePolicy(
      frequencies[frequency],
      DEFAULT_FREQUENCY_POLICIES[frequency],
      `frequencies.${frequency}`
    );
  }

  const archiveRoot = cfg.archiveRoot === undefined ? "archive" : assertString(cfg.archiveRoot, "archiveRoot");

  return {
    archiveRoot: path.resolve(rootDir, archiveRoot),
    rateLimit: validateRateLimit(cfg.rateLimit),
    policies
  };
}

export async function loadArchiveConfig(rootDir = process.cwd()): Promise<ArchiveConfig> {
  const raw = await readFile(path.join(rootDir, "config", "archive.yml"), "utf8");
  return parseArchiveConfig(parseYaml(raw), rootDir);
}

export function parseSeriesSelection(raw: unknown): Series[] {
  if (!isRecord(raw) || !Array.isArray(raw.series)) {
    throw new Error("config/series.json must contain { series: { id, frequency }[] }");
  }

  return raw.series.map((entry, idx) => {
    if (!isRecord(entry)) {
      throw new Error(`series[${idx}] must be an object`);
    }
    const id = assertString(entry.id, `series[${idx}].id`);
    if (!isFrequency(entry.frequency)) {
      throw new Error(`series[${idx}].frequency must be one of ${FREQUENCIES.join(", ")}`);
    }
    return { id, frequency: entry.frequency };
  });
}

export async function loadSeriesSelection(rootDir = process.cwd()): Promise<Series[]> {
  const raw = await readFile(path.join(rootDir, "config", "series.json"), "utf8");
  return parseSeriesSelection(JSON.parse(raw));
}

/**
* Narrows the configured selection for "update selected". With both ids and a frequency
* the pairs are taken as given, so a series can be fetched without listing it in
* config/series.json first.
*/
export function filterSeriesSelection(
  configured: readonly Series[],
  filter: { ids?: readonly string[]; frequency?: Series["frequency"] }
): Series[] {
  const { ids, frequency } = filter;
  if (ids && ids.length > 0 && frequency) {
    return ids.map((id) => ({ id, frequency }));
  }

  return configured.filter(
    (s) => (!ids || ids.length === 0 || ids.includes(s.id)) && (!frequency || s.frequency === frequency)
  );
}
