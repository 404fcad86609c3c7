import { getFrequencyArg, getListArg } from "./lib/args";
import { filterSeriesSelection, loadArchiveConfig, loadSeriesSelection } from "../src/archive/config";
import { startUpdate } from "../src/archive/orchestrator";
import { YahooSeriesSource } from "../src/archive/providers/yahoo";
import { RateLimiter } from "../src/archive/rateLimiter";
import { toIso } from "../src/lib/date";

const argv = process.argv.slice(2);
const cfg = await loadArchiveConfig();
const selection = filterSeriesSelection(await loadSeriesSelection(), {
  ids: getListArg(argv, "series"),
  frequency: getFrequencyArg(argv)
});

const source = new YahooSeriesSource();
const unsupported = selection.filter((s) => !source.supports(s.frequency));
if (unsupported.length > 0) {
  throw new Error(
    `${source.name} cannot serve: ${unsupported.map((s) => `${s.id} (${s.frequency})`).join(", ")}`
  );
}
if (selection.length === 0) {
  throw new Error("Nothing selected; check config/series.json and --series/--frequency");
}

const handle = startUpdate(selection, {
  archiveRoot: cfg.archiveRoot,
  source,
  limiter: new RateLimiter(cfg.rateLimit),
  policies: cfg.policies,
  onProgress: (e) => {
    console.error(`[archive:update] ${e.phase} ${e.seriesId} ${e.frequency} ${toIso(e.rangeStart)} .. ${toIso(e.rangeEnd)}`);
  }
});

process.once("SIGINT", () => {
  console.error("[archive:update] Cancelling; the request in flight will finish and be committed");
  handle.cancel();
});

const res = await handle.done;
const failures = res.outcomes.filter((o) => o.status !== "written" && o.status !== "skipped_existing");
console.log(
  JSON.stringify(
    {
      stage: "update",
      state: res.state,
      planned: res.planned,
      fetched: res.fetched,
      committed: res.committed,
      failed: res.failed,
      error: res.error,
      failures: failures.map((o) => ({ series: o.seriesId, frequency: o.frequency, label: o.label, status: o.status, message: o.message }))
    },
    null,
    2
  )
);

if (res.state === "failed") {
  process.exitCode = 1;
}
