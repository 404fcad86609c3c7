import { readdir } from "node:fs/promises";
import path from "node:path";

import { isEnoent } from "../lib/fsErrors";

import { ChunkStore } from "./chunkStore";
import { jsonChunkCodec, type ChunkCodec } from "./codec";
import { StoreIOError, errorMessage } from "./errors";
import { FREQUENCIES, type Frequency } from "./types";

export type SelectableSeries = {
  seriesId: string;
  frequency: Frequency;
  /** First and last row timestamps held by the archive; `null` when nothing was observed. */
  observed: { start: string; end: string } | null;
};

async function listDirs(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries.filter((e) => e.isDirectory() && !e.name.startsWith(".")).map((e) => e.name);
  } catch (error) {
    if (isEnoent(error)) {
      return [];
    }
    throw new StoreIOError(`[archive:catalog] Failed listing ${dir}: ${errorMessage(error)}`, dir, { cause: error });
  }
}

function decodeSeriesDir(name: string): string | null {
  try {
    return decodeURIComponent(name);
  } catch {
    return null;
  }
}

/**
* Everything the archive holds, for display: one entry per series directory, ordered by
* frequency and then series id.
*/
export async function listSelectableSeries(
  archiveRoot: string,
  codec: ChunkCodec = jsonChunkCodec
): Promise<SelectableSeries[]> {
  const out: SelectableSeries[] = [];

  for (const frequency of FREQUENCIES) {
    const frequencyDir = path.join(archiveRoot, frequency);
    const ids = (await listDirs(frequencyDir))
      .map(decodeSeriesDir)
      .filter((id): id is string => id !== null && id.length > 0)
      .sort();

    for (const seriesId of ids) {
      const store = new ChunkStore({ archiveRoot, series: { id: seriesId, frequency }, codec });
      const withRows = (await store.listChunks()).filter((c) => c.status !== "empty");

      let start: string | null = null;
      for (const chunk of withRows) {
        start = (await codec.readChunkBounds(chunk.path)).first;
        if (start !== null) {
          break;
        }
      }

      let end: string | null = null;
      for (const chunk of [...withRows].reverse()) {
        end = (await codec.readChunkBounds(chunk.path)).last;
        if (end !== null) {
          break;
        }
      }

      out.push({ seriesId, frequency, observed: start !== null && end !== null ? { start, end } : null });
    }
  }

  return out;
}
