import type { MeminfoLabel } from "./errors.js";

export const MEMINFO_PATH = "/proc/meminfo";

export type MeminfoFields = {
  cachedKb: number;
  availableKb: number;
  reclaimableKb: number;
};

export type MeminfoParseResult =
  | { complete: true; fields: MeminfoFields }
  | { complete: false; missing: MeminfoLabel[] };

const DETAIL_LABELS: readonly MeminfoLabel[] = ["Cached", "MemAvailable", "SReclaimable"];

function matchLabel(line: string, label: string): number | undefined {
  if (!line.startsWith(`${label}:`)) return undefined;
  const m = /^\s*(\d+)/.exec(line.slice(label.length + 1));
  return m ? Number(m[1]) : undefined;
}

/** Stops reading once every label has a value. */
export async function scanMeminfo<L extends string>(
  lines: Iterable<string> | AsyncIterable<string>,
  labels: readonly L[]
): Promise<Partial<Record<L, number>>> {
  const found: Partial<Record<L, number>> = {};
  let remaining = labels.length;
  if (remaining === 0) return found;

  for await (const line of lines) {
    for (const label of labels) {
      if (found[label] !== undefined) continue;
      const value = matchLabel(line, label);
      if (value === undefined) continue;
      found[label] = value;
      remaining--;
      break;
    }
    if (remaining === 0) break;
  }
  return found;
}

export async function parseMeminfo(
  lines: Iterable<string> | AsyncIterable<string>
): Promise<MeminfoParseResult> {
  const found = await scanMeminfo(lines, DETAIL_LABELS);
  const cachedKb = found.Cached;
  const availableKb = found.MemAvailable;
  const reclaimableKb = found.SReclaimable;
  if (cachedKb === undefined || availableKb === undefined || reclaimableKb === undefined) {
    return { complete: false, missing: DETAIL_LABELS.filter((l) => found[l] === undefined) };
  }
  return { complete: true, fields: { cachedKb, availableKb, reclaimableKb } };
}
