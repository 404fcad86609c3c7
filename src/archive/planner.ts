import { alignWindowStart, earliestRetrievable, formatChunkLabel, nextWindowStart } from "./frequency";
import type { ChunkMeta, ChunkTask, FrequencyPolicy, Instant, Series } from "./types";

export type PlanInput = {
  series: Series;
  /** Current archive state, as returned by `ChunkStore.listChunks()`. */
  chunks: readonly ChunkMeta[];
  now: Instant;
  policy: FrequencyPolicy;
};

/**
* Lists the windows of `series` that still need a request, oldest first.
*
* Windows run from the source's horizon up to the window containing `now` (or ending at
* `now`, when `now` sits on a boundary). Complete and empty chunks are settled for good.
* An incomplete chunk is requested again: while its window is current that refreshes it,
* and once the window has elapsed the request finalizes it.
*
* When the horizon falls inside a window, the first task starts at the horizon but keeps
* the label of the window it belongs to. Incomplete chunks older than the horizon come
* first, whole.
*/
export function planChunks(input: PlanInput): ChunkTask[] {
  const { series, chunks, now } = input;
  const frequency = series.frequency;

  const settled = new Set<Instant>();
  for (const chunk of chunks) {
    if (chunk.status === "complete" || chunk.status === "empty") {
      settled.add(chunk.rangeStart);
    }
  }

  const earliest = earliestRetrievable(input.policy.horizon, now);
  const firstWindow = alignWindowStart(frequency, earliest);
  const tasks: ChunkTask[] = [];

  // An incomplete chunk the horizon has moved past still has to be finalized, or it would
  // sit behind newer chunks and block the current window.
  for (const chunk of chunks) {
    if (chunk.status === "incomplete" && chunk.rangeStart < firstWindow && !settled.has(chunk.rangeStart)) {
      tasks.push({
        series,
        label: chunk.label,
        rangeStart: chunk.rangeStart,
        rangeEnd: chunk.rangeEnd,
        expected: chunk.rangeEnd <= now ? "complete" : "incomplete"
      });
    }
  }

  for (let windowStart = firstWindow; windowStart < now; ) {
    const windowEnd = nextWindowStart(frequency, windowStart);

    if (!settled.has(windowStart)) {
      tasks.push({
        series,
        label: formatChunkLabel(frequency, windowStart),
        rangeStart: Math.max(windowStart, earliest),
        rangeEnd: windowEnd,
        expected: windowEnd <= now ? "complete" : "incomplete"
      });
    }

    windowStart = windowEnd;
  }

  return tasks;
}

/**
* Interleaves per-series task lists into time layers: every series' first pending task,
* then every series' second, and so on. Series keep the order they were given in.
*/
export function mergeTaskLayers(perSeries: readonly (readonly ChunkTask[])[]): ChunkTask[] {
  const merged: ChunkTask[] = [];
  const depth = Math.max(0, ...perSeries.map((tasks) => tasks.length));

  for (let layer = 0; layer < depth; layer += 1) {
    for (const tasks of perSeries) {
      const task = tasks[layer];
      if (task) {
        merged.push(task);
      }
    }
  }

  return merged;
}
