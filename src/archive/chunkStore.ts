import { readdir, rename, stat } from "node:fs/promises";
import path from "node:path";

import { formatCompactUtcStamp } from "../lib/date";
import { isEnoent } from "../lib/fsErrors";

import { jsonChunkCodec, type ChunkCodec } from "./codec";
import { StoreIOError, errorMessage } from "./errors";
import { nextWindowStart, parseChunkLabel } from "./frequency";
import type { ChunkMeta, ChunkTask, Instant, Series, SeriesRow } from "./types";

const FINAL_EXT = ".json";
const INCOMPLETE_EXT = ".incomplete";
const TMP_EXT = ".tmp";

export function safeSeriesId(id: string): string {
  return encodeURIComponent(id);
}

export function getSeriesDir(archiveRoot: string, series: Series): string {
  return path.join(archiveRoot, series.frequency, safeSeriesId(series.id));
}

export type CommitResult =
  | { outcome: "written"; chunk: ChunkMeta }
  | { outcome: "skipped_existing"; chunk: ChunkMeta };

export type ChunkStoreOptions = {
  archiveRoot: string;
  series: Series;
  codec?: ChunkCodec;
  /** Clock used to stamp backup file names. */
  now?: () => Instant;
};

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch (error) {
    if (isEnoent(error)) {
      return false;
    }

    throw error;
  }
}

function ensureSorted(rows: readonly SeriesRow[], label: string): readonly SeriesRow[] {
  // `t` is ISO-8601, so `localeCompare` keeps chronological ordering.
  for (let idx = 1; idx < rows.length; idx += 1) {
    if (rows[idx - 1].t.localeCompare(rows[idx].t) > 0) {
      console.warn(`[archive:store] Non-monotonic row timestamps in chunk ${label}; sorting before write`);
      return [...rows].sort((a, b) => a.t.localeCompare(b.t));
    }
  }

  return rows;
}

// Union by timestamp; on a clash the newer row wins.
function mergeRows(held: readonly SeriesRow[], fetched: readonly SeriesRow[]): readonly SeriesRow[] {
  if (held.length === 0) {
    return fetched;
  }

  const byTime = new Map<string, SeriesRow>();
  for (const row of held) {
    byTime.set(row.t, row);
  }
  for (const row of fetched) {
    byTime.set(row.t, row);
  }
  return [...byTime.values()].sort((a, b) => a.t.localeCompare(b.t));
}

/**
* Durable representation of one series+frequency archive.
*
* The directory listing is the only state: nothing is cached between calls, so a store
* can be re-opened after any interruption and report exactly what was committed.
*
* Finalized chunks (`<label>.json`) are written once and never replaced. The current
* window lives in `<label>.incomplete`; a newer version of it is written to a `.tmp` file,
* the previous version is renamed to a hidden, timestamped backup, and the new file is
* renamed into place.
*/
export class ChunkStore {
  readonly series: Series;
  readonly dir: string;
  readonly #codec: ChunkCodec;
  readonly #now: () => Instant;

  constructor(opts: ChunkStoreOptions) {
    this.series = opts.series;
    this.dir = getSeriesDir(opts.archiveRoot, opts.series);
    this.#codec = opts.codec ?? jsonChunkCodec;
    this.#now = opts.now ?? Date.now;
  }

  finalPath(label: string): string {
    return path.join(this.dir, `${label}${FINAL_EXT}`);
  }

  incompletePath(label: string): string {
    return path.join(this.dir, `${label}${INCOMPLETE_EXT}`);
  }

  isPeriodElapsed(rangeEnd: Instant, now: Instant): boolean {
    return rangeEnd <= now;
  }

  async listChunks(): Promise<ChunkMeta[]> {
    const { finalized, incomplete } = await this.#scan();

    const chunks: ChunkMeta[] = [];
    for (const [start, label] of finalized) {
      chunks.push(await this.#readFinalized(start, label));
    }

    for (const [start, label] of incomplete) {
      // A finalized file beside an incomplete one means a run stopped between writing the
      // final version and backing up the old one; the final version wins.
      if (finalized.has(start)) {
        continue;
      }

      chunks.push({
        series: this.series,
        label,
        rangeStart: start,
        rangeEnd: nextWindowStart(this.series.frequency, start),
        status: "incomplete",
        path: this.incompletePath(label)
      });
    }

    return chunks.sort((a, b) => a.rangeStart - b.rangeStart);
  }

  async commit(task: ChunkTask, rows: readonly SeriesRow[], isElapsed: boolean): Promise<CommitResult> {
    const sorted = ensureSorted(rows, `${this.series.id}/${task.label}`);

    if (isElapsed) {
      const finalPath = this.finalPath(task.label);
      if (await this.#io(finalPath, "checking", () => fileExists(finalPath))) {
        return {
          outcome: "skipped_existing",
          chunk: await this.#readFinalized(task.rangeStart, task.label)
        };
      }

      const incompletePath = this.incompletePath(task.label);
      const hasIncomplete = await this.#io(incompletePath, "checking", () => fileExists(incompletePath));
      // Rows already held for the window are kept; the source may no longer serve all of it.
      const finalRows = hasIncomplete
        ? mergeRows(await this.#io(incompletePath, "reading", () => this.#codec.readRows(incompletePath)), sorted)
        : sorted;

      await this.#writeAtomic(finalPath, finalRows);
      if (hasIncomplete) {
        await this.#backupIncomplete(task.label);
      }

      return {
        outcome: "written",
        chunk: this.#meta(task, finalRows.length === 0 ? "empty" : "complete", finalPath)
      };
    }

    await this.#assertCanHoldIncomplete(task);

    const incompletePath = this.incompletePath(task.label);
    const tmpPath = `${incompletePath}${TMP_EXT}`;
    await this.#io(tmpPath, "writing", () => this.#codec.writeRows(tmpPath, sorted));
    if (await this.#io(incompletePath, "checking", () => fileExists(incompletePath))) {
      await this.#backupIncomplete(task.label);
    }
    await this.#io(incompletePath, "renaming into", () => rename(tmpPath, incompletePath));

    return { outcome: "written", chunk: this.#meta(task, "incomplete", incompletePath) };
  }

  /**
  * Rows of every chunk, in chunk order. Backups are never read.
  */
  async readAllRows(): Promise<SeriesRow[]> {
    const out: SeriesRow[] = [];
    for (const chunk of await this.listChunks()) {
      const rows = await this.#io(chunk.path, "reading", () => this.#codec.readRows(chunk.path));
      out.push(...rows);
    }
    return out;
  }

  /**
  * Chunk files by window start, from names alone. Hidden files are backups; `.tmp` files
  * are writes that never made it into place.
  */
  async #scan(): Promise<{ finalized: Map<Instant, string>; incomplete: Map<Instant, string> }> {
    const finalized = new Map<Instant, string>();
    const incomplete = new Map<Instant, string>();

    let entries: string[];
    try {
      entries = await readdir(this.dir);
    } catch (error) {
      if (isEnoent(error)) {
        return { finalized, incomplete };
      }
      throw new StoreIOError(`[archive:store] Failed listing ${this.dir}: ${errorMessage(error)}`, this.dir, {
        cause: error
      });
    }

    const ignored: string[] = [];
    for (const name of entries) {
      if (name.startsWith(".") || name.endsWith(TMP_EXT)) {
        continue;
      }

      const ext = name.endsWith(FINAL_EXT) ? FINAL_EXT : name.endsWith(INCOMPLETE_EXT) ? INCOMPLETE_EXT : null;
      const label = ext ? name.slice(0, -ext.length) : "";
      const start = ext ? parseChunkLabel(this.series.frequency, label) : null;
      if (start === null) {
        ignored.push(name);
        continue;
      }

      (ext === FINAL_EXT ? finalized : incomplete).set(start, label);
    }

    if (ignored.length > 0) {
      console.warn(
        `[archive:store] Ignoring ${ignored.length} unrecognized file(s) in ${this.dir}: ${ignored.slice(0, 5).join(", ")}`
      );
    }

    return { finalized, incomplete };
  }

  #meta(task: ChunkTask, status: ChunkMeta["status"], filePath: string): ChunkMeta {
    const rangeStart = parseChunkLabel(this.series.frequency, task.label) ?? task.rangeStart;
    return {
      series: this.series,
      label: task.label,
      rangeStart,
      rangeEnd: task.rangeEnd,
      status,
      path: filePath
    };
  }

  async #readFinalized(start: Instant, label: string): Promise<ChunkMeta> {
    const filePath = this.finalPath(label);
    const rowCount = await this.#io(filePath, "reading", () => this.#codec.readRowCount(filePath));
    return {
      series: this.series,
      label,
      rangeStart: start,
      rangeEnd: nextWindowStart(this.series.frequency, start),
      status: rowCount === 0 ? "empty" : "complete",
      path: filePath
    };
  }

  async #writeAtomic(filePath: string, rows: readonly SeriesRow[]): Promise<void> {
    const tmpPath = `${filePath}${TMP_EXT}`;
    await this.#io(tmpPath, "writing", () => this.#codec.writeRows(tmpPath, rows));
    await this.#io(filePath, "renaming into", () => rename(tmpPath, filePath));
  }

  async #backupIncomplete(label: string): Promise<string> {
    const source = this.incompletePath(label);
    const stem = `.${label}${INCOMPLETE_EXT}.${formatCompactUtcStamp(this.#now())}`;

    let backupPath = path.join(this.dir, stem);
    for (let n = 1; await this.#io(backupPath, "checking", () => fileExists(backupPath)); n += 1) {
      backupPath = path.join(this.dir, `${stem}-${n}`);
    }

    await this.#io(source, "backing up", () => rename(source, backupPath));
    return backupPath;
  }

  async #assertCanHoldIncomplete(task: ChunkTask): Promise<void> {
    const windowStart = parseChunkLabel(this.series.frequency, task.label) ?? task.rangeStart;
    const { finalized, incomplete } = await this.#scan();

    let conflict: string | null = null;
    for (const [start, label] of finalized) {
      if (start >= windowStart) {
        conflict = `${label} is finalized`;
        break;
      }
    }
    for (const [start, label] of incomplete) {
      if (conflict === null && start !== windowStart && !finalized.has(start)) {
        conflict = `${label} is incomplete`;
      }
    }

    if (conflict !== null) {
      throw new StoreIOError(
        `[archive:store] Refusing to write ${task.label} as incomplete for ${this.series.id}: ${conflict}`,
        this.incompletePath(task.label),
        { code: "EINCOMPLETE_ORDER" }
      );
    }
  }

  async #io<T>(filePath: string, action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof StoreIOError) {
        throw error;
      }
      throw new StoreIOError(`[archive:store] Failed ${action} ${filePath}: ${errorMessage(error)}`, filePath, {
        cause: error
      });
    }
  }
}
