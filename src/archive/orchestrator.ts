import { toIso } from "../lib/date";

import { ChunkStore } from "./chunkStore";
import type { ChunkCodec } from "./codec";
import { CancellationError, FetchError, QuotaExceededError, StoreIOError, errorMessage } from "./errors";
import { DEFAULT_FREQUENCY_POLICIES } from "./frequency";
import { mergeTaskLayers, planChunks } from "./planner";
import type { RateLimitGrant, RateLimiter } from "./rateLimiter";
import type {
  ChunkStatus,
  ChunkTask,
  Frequency,
  FrequencyPolicies,
  Instant,
  Series,
  SeriesRow,
  SeriesSource
} from "./types";

export type RunState = "idle" | "running" | "completed" | "cancelled" | "failed";

export type ProgressPhase = "started" | "committed" | "failed" | "skipped";

export type ProgressEvent = {
  seriesId: string;
  frequency: Frequency;
  rangeStart: Instant;
  rangeEnd: Instant;
  phase: ProgressPhase;
  chunkStatus?: ChunkStatus;
};

export type TaskOutcomeStatus =
  | "written"
  | "skipped_existing"
  | "fetch_failed"
  | "store_failed"
  | "quota_exceeded"
  | "skipped_after_failure";

export type TaskOutcome = {
  seriesId: string;
  frequency: Frequency;
  label: string;
  rangeStart: Instant;
  rangeEnd: Instant;
  status: TaskOutcomeStatus;
  chunkStatus?: ChunkStatus;
  message?: string;
};

export type UpdateResult = {
  state: Exclude<RunState, "idle" | "running">;
  planned: number;
  fetched: number;
  committed: number;
  failed: number;
  outcomes: TaskOutcome[];
  error?: string;
};

export type UpdateOptions = {
  archiveRoot: string;
  source: SeriesSource;
  /** Shared by every run in the process; the quota is global, not per series. */
  limiter: RateLimiter;
  policies?: FrequencyPolicies;
  codec?: ChunkCodec;
  now?: () => Instant;
  signal?: AbortSignal;
  onProgress?: (event: ProgressEvent) => void;
  onStateChange?: (state: RunState) => void;
  isFatalStoreError?: (error: StoreIOError) => boolean;
};

export type UpdateHandle = {
  state(): RunState;
  cancel(): void;
  readonly done: Promise<UpdateResult>;
};

export const FATAL_STORE_ERROR_CODES: ReadonlySet<string> = new Set([
  "ENOSPC",
  "EDQUOT",
  "EACCES",
  "EPERM",
  "EROFS"
]);

function defaultIsFatalStoreError(error: StoreIOError): boolean {
  return error.code !== undefined && FATAL_STORE_ERROR_CODES.has(error.code);
}

export function seriesKey(series: Series): string {
  return `${series.frequency}/${series.id}`;
}

function describeTask(task: ChunkTask): string {
  return `${task.series.id} ${task.series.frequency} ${task.label} [${toIso(task.rangeStart)}, ${toIso(task.rangeEnd)})`;
}

function payloadBytes(rows: readonly SeriesRow[]): number {
  return Buffer.byteLength(JSON.stringify(rows), "utf8");
}

/**
* Brings every selected series up to date, one request at a time.
*
* Tasks are visited in time layers (each series' oldest pending window first, series in
* the order given) so the archive fills in roughly chronological lockstep. Committing a
* fetched window overlaps with the rate-limiter wait for the next one; the commit is
* awaited before the next request goes out.
*
* A failed request only costs its own window, unless that window holds an incomplete chunk:
* committing later windows past it would leave it behind them, so the series stops for the
* run. Store failures and requests that can never fit the budget also stop the series.
* Nothing is retried within a run: the next run plans from disk and proposes the window
* again.
*/
export async function runUpdate(selection: readonly Series[], options: UpdateOptions): Promise<UpdateResult> {
  const setState = (state: RunState): void => options.onStateChange?.(state);
  setState("running");

  const now = options.now ?? Date.now;
  const policies = options.policies ?? DEFAULT_FREQUENCY_POLICIES;
  const isFatalStoreError = options.isFatalStoreError ?? defaultIsFatalStoreError;
  const { signal, source, limiter } = options;

  const stores = new Map<string, ChunkStore>();
  const perSeries: ChunkTask[][] = [];
  // `<series key>/<label>` of every window that currently holds an incomplete chunk.
  const heldIncomplete = new Set<string>();

  for (const series of selection) {
    const key = seriesKey(series);
    if (stores.has(key)) {
      continue;
    }
    if (!source.supports(series.frequency)) {
      console.error(`[archive:update] ${source.name} does not serve ${series.frequency} data; skipping ${series.id}`);
      continue;
    }

    const store = new ChunkStore({ archiveRoot: options.archiveRoot, series, codec: options.codec, now });
    stores.set(key, store);
    try {
      const chunks = await store.listChunks();
      for (const chunk of chunks) {
        if (chunk.status === "incomplete") {
          heldIncomplete.add(`${key}/${chunk.label}`);
        }
      }
      perSeries.push(planChunks({ series, chunks, now: now(), policy: policies[series.frequency] }));
    } catch (error) {
      console.error(`[archive:update] Planning failed for ${key}: ${errorMessage(error)}`);
    }
  }

  const tasks = mergeTaskLayers(perSeries);
  const outcomes: TaskOutcome[] = [];
  const halted = new Set<string>();
  let fetched = 0;
  let fatalError: string | undefined;
  let cancelled = false;

  const emit = (task: ChunkTask, phase: ProgressPhase, chunkStatus?: ChunkStatus): void => {
    options.onProgress?.({
      seriesId: task.series.id,
      frequency: task.series.frequency,
      rangeStart: task.rangeStart,
      rangeEnd: task.rangeEnd,
      phase,
      chunkStatus
    });
  };

  const record = (
    task: ChunkTask,
    status: TaskOutcomeStatus,
    extra: { chunkStatus?: ChunkStatus; message?: string } = {}
  ): void => {
    outcomes.push({
      seriesId: task.series.id,
      frequency: task.series.frequency,
      label: task.label,
      rangeStart: task.rangeStart,
      rangeEnd: task.rangeEnd,
      status,
      ...extra
    });
  };

  const skipHalted = (task: ChunkTask): void => {
    record(task, "skipped_after_failure");
    emit(task, "skipped");
  };

  const commitTask = async (
    store: ChunkStore,
    task: ChunkTask,
    rows: SeriesRow[],
    isElapsed: boolean
  ): Promise<void> => {
    try {
      const res = await store.commit(task, rows, isElapsed);
      record(task, res.outcome, { chunkStatus: res.chunk.status });
      emit(task, "committed", res.chunk.status);
    } catch (error) {
      const message = errorMessage(error);
      halted.add(seriesKey(task.series));
      record(task, "store_failed", { message });
      emit(task, "failed");
      console.error(`[archive:update] Commit failed for ${describeTask(task)}: ${message}`);

      if (!(error instanceof StoreIOError) || isFatalStoreError(error)) {
        fatalError ??= message;
      }
    }
  };

  let pendingCommit: Promise<void> = Promise.resolve();

  for (const task of tasks) {
    if (signal?.aborted) {
      cancelled = true;
      break;
    }
    if (fatalError) {
      break;
    }

    const key = seriesKey(task.series);
    const store = stores.get(key);
    if (!store) {
      throw new Error(`[archive:update] No store opened for ${key}`);
    }
    if (halted.has(key)) {
      skipHalted(task);
      continue;
    }

    let grant: RateLimitGrant;
    try {
      grant = await limiter.acquire(policies[task.series.frequency].estimatedBytes, signal);
    } catch (error) {
      if (error instanceof CancellationError) {
        cancelled = true;
        break;
      }
      if (error instanceof QuotaExceededError) {
        halted.add(key);
        record(task, "quota_exceeded", { message: error.message });
        emit(task, "skipped");
        console.error(`[archive:update] ${describeTask(task)} skipped: ${error.message}`);
        continue;
      }

      fatalError = errorMessage(error);
      break;
    }

    await pendingCommit;
    if (fatalError) {
      grant.release();
      break;
    }
    if (signal?.aborted) {
      grant.release();
      cancelled = true;
      break;
    }
    if (halted.has(key)) {
      grant.release();
      skipHalted(task);
      continue;
    }

    emit(task, "started");
    // Elapsed-ness is judged at request time: rows fetched before a window closed can't
    // finalize it, whenever the commit happens.
    const requestedAt = now();
    let rows: SeriesRow[];
    try {
      rows = await source.fetch(task.series.id, task.series.frequency, task.rangeStart, task.rangeEnd);
    } catch (error) {
      const message = errorMessage(error);
      record(task, "fetch_failed", { message });
      emit(task, "failed");

      if (error instanceof FetchError && error.kind === "fatal") {
        console.error(`[archive:update] Fatal fetch failure for ${describeTask(task)}: ${message}`);
        fatalError = message;
        break;
      }

      console.error(`[archive:update] Fetch failed for ${describeTask(task)}: ${message}`);
      // Later windows of the series can't be committed past an incomplete chunk that stays
      // behind them; other gaps are filled by the next run.
      if (heldIncomplete.has(`${key}/${task.label}`)) {
        halted.add(key);
      }
      continue;
    }

    fetched += 1;
    grant.settle(payloadBytes(rows));
    pendingCommit = commitTask(store, task, rows, store.isPeriodElapsed(task.rangeEnd, requestedAt));
  }

  await pendingCommit;

  const state: UpdateResult["state"] = fatalError ? "failed" : cancelled ? "cancelled" : "completed";
  setState(state);

  const committed = outcomes.filter((o) => o.status === "written").length;
  const failed = outcomes.filter(
    (o) => o.status === "fetch_failed" || o.status === "store_failed" || o.status === "quota_exceeded"
  ).length;

  return {
    state,
    planned: tasks.length,
    fetched,
    committed,
    failed,
    outcomes,
    ...(fatalError ? { error: fatalError } : {})
  };
}

/**
* Starts `runUpdate` in the background and returns a handle for progress and cancellation.
* Cancelling stops new requests; a request already issued finishes and is committed.
*/
export function startUpdate(selection: readonly Series[], options: UpdateOptions): UpdateHandle {
  const controller = new AbortController();
  const external = options.signal;
  if (external?.aborted) {
    controller.abort();
  } else {
    external?.addEventListener("abort", () => controller.abort(), { once: true });
  }

  let state: RunState = "idle";
  const done = runUpdate(selection, {
    ...options,
    signal: controller.signal,
    onStateChange: (next) => {
      state = next;
      options.onStateChange?.(next);
    }
  });

  return {
    state: () => state,
    cancel: () => controller.abort(),
    done
  };
}

export function cancel(handle: UpdateHandle): void {
  handle.cancel();
}
