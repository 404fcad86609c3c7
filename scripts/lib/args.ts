import { FREQUENCIES, isFrequency, type Frequency } from "../../src/archive/types";

export function getArg(argv: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  for (let i = 0; i < argv.length; i += 1) {
    const a = argv[i];

    if (a === `--${name}`) {
      const next = argv[i + 1];
      if (typeof next !== "string" || next.startsWith("--")) {
        throw new Error(`Expected value after --${name}`);
      }

      return next;
    }

    if (a.startsWith(prefix)) {
      return a.slice(prefix.length);
    }
  }
  return undefined;
}

export function getListArg(argv: string[], name: string): string[] | undefined {
  const raw = getArg(argv, name);
  if (raw === undefined) {
    return undefined;
  }

  const items = raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  if (items.length === 0) {
    throw new Error(`--${name} must list at least one value`);
  }
  return items;
}

export function getFrequencyArg(argv: string[]): Frequency | undefined {
  const raw = getArg(argv, "frequency");
  if (raw === undefined) {
    return undefined;
  }
  if (!isFrequency(raw)) {
    throw new Error(`--frequency must be one of ${FREQUENCIES.join(", ")}, got '${raw}'`);
  }
  return raw;
}
