import { mkdir, open, readFile, writeFile } from "node:fs/promises";
import path from "node:path";

import type { SeriesRow } from "./types";

export type ChunkBounds = {
  first: string | null;
  last: string | null;
  empty: boolean;
};

/**
* Tabular encoding of one chunk file. The store only needs to write rows and to ask a
* finished file for its row count or its first/last timestamps; everything else about the
* format is the codec's business.
*/
export type ChunkCodec = {
  writeRows(filePath: string, rows: readonly SeriesRow[]): Promise<void>;
  readRowCount(filePath: string): Promise<number>;
  readChunkBounds(filePath: string): Promise<ChunkBounds>;
  readRows(filePath: string): Promise<SeriesRow[]>;
};

type StoredChunk = {
  version: 1;
  rowCount: number;
  rows: SeriesRow[];
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isSeriesRow(value: unknown): value is SeriesRow {
  if (!isRecord(value) || typeof value.t !== "string") {
    return false;
  }

  return Object.values(value).every(
    (v) => v === null || typeof v === "string" || (typeof v === "number" && Number.isFinite(v))
  );
}

async function readStoredRows(filePath: string): Promise<SeriesRow[]> {
  const raw = await readFile(filePath, "utf8");
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed) || !Array.isArray(parsed.rows)) {
    throw new Error(`[archive:codec] ${filePath} is not a chunk file (missing rows)`);
  }

  const rows: SeriesRow[] = [];
  for (const row of parsed.rows) {
    if (!isSeriesRow(row)) {
      throw new Error(`[archive:codec] ${filePath} contains a malformed row: ${JSON.stringify(row)}`);
    }
    rows.push(row);
  }
  return rows;
}

const HEADER_BYTES = 64;
const HEADER_RE = /^\{"version":1,"rowCount":(\d+),/;

// Files written by `writeRows` start with their row count; anything else is parsed in full.
async function readStoredRowCount(filePath: string): Promise<number> {
  const handle = await open(filePath, "r");
  try {
    const buf = Buffer.alloc(HEADER_BYTES);
    const { bytesRead } = await handle.read(buf, 0, HEADER_BYTES, 0);
    const match = HEADER_RE.exec(buf.toString("utf8", 0, bytesRead));
    if (match) {
      return Number(match[1]);
    }
  } finally {
    await handle.close();
  }

  return (await readStoredRows(filePath)).length;
}

export const jsonChunkCodec: ChunkCodec = {
  async writeRows(filePath, rows) {
    await mkdir(path.dirname(filePath), { recursive: true });
    const body: StoredChunk = { version: 1, rowCount: rows.length, rows: [...rows] };
    await writeFile(filePath, `${JSON.stringify(body)}\n`, "utf8");
  },

  readRowCount: readStoredRowCount,

  async readChunkBounds(filePath) {
    const rows = await readStoredRows(filePath);
    if (rows.length === 0) {
      return { first: null, last: null, empty: true };
    }

    return { first: rows[0].t, last: rows[rows.length - 1].t, empty: false };
  },

  readRows: readStoredRows
};
