import { mkdtemp, readdir, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ChunkStore } from "./chunkStore";
import { jsonChunkCodec, type ChunkCodec } from "./codec";
import { CancellationError, FetchError } from "./errors";
import { DEFAULT_FREQUENCY_POLICIES, alignWindowStart, formatChunkLabel } from "./frequency";
import { cancel, runUpdate, startUpdate, type ProgressEvent, type UpdateOptions } from "./orchestrator";
import { RateLimiter, type Clock } from "./rateLimiter";
import type { Frequency, FrequencyPolicies, Instant, Series, SeriesRow, SeriesSource } from "./types";

class ManualClock implements Clock {
  t = 0;

  now(): number {
    return this.t;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new CancellationError();
    }
    this.t += ms;
  }
}

type Respond = (seriesId: string, label: string) => SeriesRow[] | Error;

class FakeSource implements SeriesSource {
  readonly name = "fake";
  readonly calls: string[] = [];
  respond: Respond;

  constructor(respond: Respond = (_id, label) => [{ t: `${label}-row`, c: 1 }]) {
    this.respond = respond;
  }

  supports(frequency: Frequency): boolean {
    return frequency !== "tick";
  }

  async fetch(seriesId: string, frequency: Frequency, rangeStart: Instant): Promise<SeriesRow[]> {
    const label = formatChunkLabel(frequency, alignWindowStart(frequency, rangeStart));
    this.calls.push(`${seriesId}:${label}`);
    const res = this.respond(seriesId, label);
    if (res instanceof Error) {
      throw res;
    }
    return res;
  }
}

const A: Series = { id: "AAA", frequency: "daily" };
const B: Series = { id: "BBB", frequency: "daily" };

const policies: FrequencyPolicies = {
  ...DEFAULT_FREQUENCY_POLICIES,
  daily: { horizon: { kind: "fixed", start: Date.UTC(2019, 0, 1) }, estimatedBytes: 10 },
  minute: { horizon: { kind: "rolling", days: 1 }, estimatedBytes: 10 }
};

describe("runUpdate", () => {
  let root: string;
  let now: Instant;
  let source: FakeSource;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "series-update-"));
    now = Date.UTC(2021, 9, 25);
    source = new FakeSource();
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  function options(overrides: Partial<UpdateOptions> = {}): UpdateOptions {
    return {
      archiveRoot: root,
      source,
      limiter: new RateLimiter({ minSpacingMs: 5_000, windowMs: 60_000, maxWindowBytes: 1_000 }, new ManualClock()),
      policies,
      now: () => now,
      ...overrides
    };
  }

  it("fills series layer by layer in the order given", async () => {
    const res = await runUpdate([A, B], options());

    expect(source.calls).toEqual(["AAA:2019", "BBB:2019", "AAA:2020", "BBB:2020", "AAA:2021", "BBB:2021"]);
    expect(res).toMatchObject({ state: "completed", planned: 6, fetched: 6, committed: 6, failed: 0 });
    expect(res.outcomes.map((o) => o.chunkStatus)).toEqual([
      "complete",
      "complete",
      "complete",
      "complete",
      "incomplete",
      "incomplete"
    ]);
  });

  it("only refreshes the current window when run again", async () => {
    await runUpdate([A, B], options());
    source.calls.length = 0;

    const res = await runUpdate([A, B], options());

    expect(source.calls).toEqual(["AAA:2021", "BBB:2021"]);
    expect(res.committed).toBe(2);
    const store = new ChunkStore({ archiveRoot: root, series: A });
    expect((await store.listChunks()).map((c) => [c.label, c.status])).toEqual([
      ["2019", "complete"],
      ["2020", "complete"],
      ["2021", "incomplete"]
    ]);
  });

  it("resumes after a cancelled run without fetching committed windows again", async () => {
    let committed = 0;
    const handle = startUpdate(
      [A, B],
      options({
        onProgress: (e) => {
          if (e.phase === "committed") {
            committed += 1;
            if (committed === 2) {
              cancel(handle);
            }
          }
        }
      })
    );

    const first = await handle.done;
    expect(first.state).toBe("cancelled");
    expect(handle.state()).toBe("cancelled");
    expect(source.calls).toEqual(["AAA:2019", "BBB:2019"]);

    source.calls.length = 0;
    const second = await runUpdate([A, B], options());
    expect(second.state).toBe("completed");
    expect(source.calls).toEqual(["AAA:2020", "BBB:2020", "AAA:2021", "BBB:2021"]);
  });

  it("leaves a gap for a transient failure and keeps fetching the series", async () => {
    source.respond = (id, label) =>
      id === "BBB" && label === "2019" ? new FetchError("transient", "timeout") : [{ t: `${label}-row`, c: 1 }];

    const res = await runUpdate([A, B], options());

    expect(source.calls).toEqual(["AAA:2019", "BBB:2019", "AAA:2020", "BBB:2020", "AAA:2021", "BBB:2021"]);
    expect(res).toMatchObject({ state: "completed", committed: 5, failed: 1 });
    expect(res.outcomes.filter((o) => o.seriesId === "BBB").map((o) => o.status)).toEqual([
      "fetch_failed",
      "written",
      "written"
    ]);

    source.respond = (_id, label) => [{ t: `${label}-row`, c: 1 }];
    source.calls.length = 0;
    await runUpdate([A, B], options());
    expect(source.calls).toEqual(["AAA:2021", "BBB:2019", "BBB:2021"]);
  });

  it("finalizes a window left incomplete before a pause longer than the horizon", async () => {
    const minute: Series = { id: "AAA", frequency: "minute" };
    const opts = (): UpdateOptions =>
      options({ policies: { ...policies, minute: { horizon: { kind: "rolling", days: 2 }, estimatedBytes: 10 } } });

    now = Date.UTC(2021, 9, 25, 12);
    await runUpdate([minute], opts());
    source.calls.length = 0;

    now = Date.UTC(2021, 10, 5, 12);
    const res = await runUpdate([minute], opts());

    expect(source.calls).toEqual(["AAA:2021-10-25", "AAA:2021-11-03", "AAA:2021-11-04", "AAA:2021-11-05"]);
    expect(res.outcomes.map((o) => [o.label, o.status, o.chunkStatus])).toEqual([
      ["2021-10-25", "written", "complete"],
      ["2021-11-03", "written", "complete"],
      ["2021-11-04", "written", "complete"],
      ["2021-11-05", "written", "incomplete"]
    ]);
    const chunks = await new ChunkStore({ archiveRoot: root, series: minute }).listChunks();
    expect(chunks.filter((c) => c.status === "incomplete").map((c) => c.label)).toEqual(["2021-11-05"]);
  });

  it("stops a series for the run when its incomplete window can't be finalized", async () => {
    const minute: Series = { id: "AAA", frequency: "minute" };
    now = Date.UTC(2021, 9, 25, 12);
    await runUpdate([minute], options());
    source.calls.length = 0;

    now = Date.UTC(2021, 9, 27, 12);
    source.respond = (_id, label) =>
      label === "2021-10-25" ? new FetchError("transient", "timeout") : [{ t: `${label}-row`, c: 1 }];
    const res = await runUpdate([minute], options());

    expect(source.calls).toEqual(["AAA:2021-10-25"]);
    expect(res.outcomes.map((o) => [o.label, o.status])).toEqual([
      ["2021-10-25", "fetch_failed"],
      ["2021-10-26", "skipped_after_failure"],
      ["2021-10-27", "skipped_after_failure"]
    ]);
  });

  it("gives back the limiter grant of a request it never sends", async () => {
    const limiter = new RateLimiter({ minSpacingMs: 5_000, windowMs: 60_000, maxWindowBytes: 1_000 }, new ManualClock());
    const acquire = limiter.acquire.bind(limiter);
    const released: number[] = [];
    vi.spyOn(limiter, "acquire").mockImplementation(async (bytes, signal) => {
      const grant = await acquire(bytes, signal);
      return {
        ...grant,
        release: () => {
          released.push(grant.grantedAt);
          grant.release();
        }
      };
    });
    const codec: ChunkCodec = {
      ...jsonChunkCodec,
      async writeRows() {
        throw Object.assign(new Error("EIO: write failed"), { code: "EIO" });
      }
    };

    const res = await runUpdate([B], options({ limiter, codec }));

    expect(source.calls).toEqual(["BBB:2019"]);
    expect(released).toEqual([5_000]);
    expect(res.outcomes.map((o) => o.status)).toEqual(["store_failed", "skipped_after_failure", "skipped_after_failure"]);
  });

  it("stops at a fatal fetch failure and keeps what was already committed", async () => {
    source.respond = (id, label) =>
      id === "AAA" && label === "2020" ? new FetchError("fatal", "session expired") : [{ t: `${label}-row`, c: 1 }];

    const res = await runUpdate([A, B], options());

    expect(source.calls).toEqual(["AAA:2019", "BBB:2019", "AAA:2020"]);
    expect(res).toMatchObject({ state: "failed", committed: 2, error: "session expired" });
    expect(await readdir(new ChunkStore({ archiveRoot: root, series: B }).dir)).toEqual(["2019.json"]);
  });

  it("records an elapsed window without rows as empty", async () => {
    const minute: Series = { id: "AAA", frequency: "minute" };
    now = Date.UTC(2021, 9, 25, 12);
    source.respond = (_id, label) => (label === "2021-10-24" ? [] : [{ t: `${label}-row`, c: 1 }]);

    const res = await runUpdate([minute], options());

    expect(res.outcomes.map((o) => [o.label, o.chunkStatus])).toEqual([
      ["2021-10-24", "empty"],
      ["2021-10-25", "incomplete"]
    ]);
  });

  it("skips requests that can never fit the payload budget", async () => {
    const res = await runUpdate(
      [A],
      options({ policies: { ...policies, daily: { ...policies.daily, estimatedBytes: 5_000 } } })
    );

    expect(source.calls).toEqual([]);
    expect(res.state).toBe("completed");
    expect(res.outcomes.map((o) => o.status)).toEqual(["quota_exceeded", "skipped_after_failure", "skipped_after_failure"]);
  });

  it("ignores series the source can't serve", async () => {
    const res = await runUpdate([{ id: "AAA", frequency: "tick" }], options());

    expect(res).toMatchObject({ state: "completed", planned: 0 });
    expect(source.calls).toEqual([]);
  });

  it("fails the run when the disk is full, but only skips the series on other write errors", async () => {
    const failingCodec = (code: string): ChunkCodec => ({
      ...jsonChunkCodec,
      async writeRows(filePath, rows) {
        if (filePath.includes(`${path.sep}BBB${path.sep}`)) {
          throw Object.assign(new Error(`${code}: write failed`), { code });
        }
        await jsonChunkCodec.writeRows(filePath, rows);
      }
    });

    const full = await runUpdate([A, B], options({ codec: failingCodec("ENOSPC") }));
    expect(full.state).toBe("failed");
    expect(full.outcomes.map((o) => `${o.seriesId}:${o.label}:${o.status}`)).toEqual([
      "AAA:2019:written",
      "BBB:2019:store_failed"
    ]);

    await rm(root, { recursive: true, force: true });
    source.calls.length = 0;

    const flaky = await runUpdate([A, B], options({ codec: failingCodec("EIO") }));
    expect(flaky.state).toBe("completed");
    expect(flaky.outcomes.filter((o) => o.seriesId === "BBB").map((o) => o.status)).toEqual([
      "store_failed",
      "skipped_after_failure",
      "skipped_after_failure"
    ]);
  });

  it("reports progress before and after each request", async () => {
    const events: ProgressEvent[] = [];
    await runUpdate([{ id: "AAA", frequency: "daily" }], options({
      policies: { ...policies, daily: { horizon: { kind: "fixed", start: Date.UTC(2021, 0, 1) }, estimatedBytes: 10 } },
      onProgress: (e) => events.push(e)
    }));

    expect(events).toEqual([
      {
        seriesId: "AAA",
        frequency: "daily",
        rangeStart: Date.UTC(2021, 0, 1),
        rangeEnd: Date.UTC(2022, 0, 1),
        phase: "started",
        chunkStatus: undefined
      },
      {
        seriesId: "AAA",
        frequency: "daily",
        rangeStart: Date.UTC(2021, 0, 1),
        rangeEnd: Date.UTC(2022, 0, 1),
        phase: "committed",
        chunkStatus: "incomplete"
      }
    ]);
  });
});

describe("startUpdate", () => {
  it("moves from running to completed", async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), "series-update-"));
    try {
      const handle = startUpdate([], {
        archiveRoot: root,
        source: new FakeSource(),
        limiter: new RateLimiter({ minSpacingMs: 0, windowMs: 1_000, maxWindowBytes: 10 }, new ManualClock())
      });

      expect(handle.state()).toBe("running");
      await expect(handle.done).resolves.toMatchObject({ state: "completed", planned: 0 });
      expect(handle.state()).toBe("completed");
    } finally {
      await rm(root, { recursive: true, force: true });
    }
  });
});
