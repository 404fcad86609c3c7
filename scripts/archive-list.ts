import { listSelectableSeries } from "../src/archive/catalog";
import { loadArchiveConfig } from "../src/archive/config";

const cfg = await loadArchiveConfig();
const series = await listSelectableSeries(cfg.archiveRoot);

for (const s of series) {
  const range = s.observed ? `${s.observed.start} to ${s.observed.end}` : "no data";
  console.log(`${s.frequency.padEnd(6)}  ${s.seriesId.padEnd(12)}  ${range}`);
}
