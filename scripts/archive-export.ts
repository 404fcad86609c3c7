import { getArg, getFrequencyArg } from "./lib/args";
import { ChunkStore } from "../src/archive/chunkStore";
import { loadArchiveConfig } from "../src/archive/config";

async function main() {
  const argv = process.argv.slice(2);
  const id = getArg(argv, "series");
  const frequency = getFrequencyArg(argv);
  if (!id || !frequency) {
    throw new Error("Usage: archive:export --series <ID> --frequency <tick|minute|hour|daily>");
  }

  const cfg = await loadArchiveConfig();
  const store = new ChunkStore({ archiveRoot: cfg.archiveRoot, series: { id, frequency } });
  for (const row of await store.readAllRows()) {
    process.stdout.write(`${JSON.stringify(row)}\n`);
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
