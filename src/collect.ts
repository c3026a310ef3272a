import type { Result, SamplingError } from "./errors.js";
import { parseMeminfo, type MeminfoFields, type MeminfoParseResult } from "./meminfo.js";
import type { FsStats, HostSources, KernelSummary } from "./sources.js";

/** Sizes in KiB, as `free` shows them. */
export type MemoryStats = {
  total: number;
  free: number;
  shared: number;
  cached: number;
  available: number;
  used: number;
};

/** Root filesystem sizes in KiB, as `df` shows them. */
export type DiskStats = {
  total: number;
  free: number;
  available: number;
  used: number;
  usagePercentage: number;
};

export type HostSnapshot = {
  hostname: string;
  uptimeSeconds: number;
  memory: MemoryStats;
  disk: DiskStats;
};

const ROOT_MOUNT = "/";

// cached, available and used are only exact for memUnit 1
export function deriveMemoryStats(summary: KernelSummary, meminfo: MeminfoFields): MemoryStats {
  const unit = summary.memUnit;
  const total = Math.floor((summary.totalram * unit) / 1024);
  const free = Math.floor((summary.freeram * unit) / 1024);
  const shared = Math.floor(summary.sharedram / 1024);

  const available = Math.floor((meminfo.availableKb * 1024) / unit);
  let cached = Math.floor((meminfo.cachedKb * 1024) / unit);
  cached += summary.bufferram;
  cached += Math.floor((meminfo.reclaimableKb * 1024) / unit);

  // unsigned on the wire; a negative result only comes from inconsistent counters
  const used = Math.max(0, Math.floor((summary.totalram - (cached + summary.freeram)) / 1024));

  return {
    total,
    free,
    shared,
    cached: Math.floor(cached / 1024),
    available: Math.floor(available / 1024),
    used
  };
}

export function deriveDiskStats(s: FsStats): DiskStats {
  const total = Math.floor((s.blocks * s.bsize) / 1024);
  const free = Math.floor((s.bfree * s.bsize) / 1024);
  const available = Math.floor((s.bavail * s.bsize) / 1024);
  const used = total - free;
  const usagePercentage = total === 0 ? 0 : (used * 100.0) / total;
  return { total, free, available, used, usagePercentage };
}

export async function sampleHost(sources: HostSources): Promise<Result<HostSnapshot, SamplingError>> {
  let hostname: string;
  try {
    hostname = await sources.hostname();
  } catch (e) {
    return { ok: false, error: { kind: "HostnameUnavailable", cause: e } };
  }
  if (hostname.length === 0) return { ok: false, error: { kind: "HostnameUnavailable" } };

  let summary: KernelSummary;
  try {
    summary = await sources.kernelSummary();
  } catch (e) {
    return { ok: false, error: { kind: "SysinfoUnavailable", cause: e } };
  }

  let parsed: MeminfoParseResult;
  try {
    parsed = await sources.withMeminfoLines(parseMeminfo);
  } catch (e) {
    return { ok: false, error: { kind: "MeminfoUnavailable", cause: e } };
  }
  if (!parsed.complete) return { ok: false, error: { kind: "MeminfoIncomplete", missing: parsed.missing } };

  let fsStats: FsStats;
  try {
    fsStats = await sources.statfs(ROOT_MOUNT);
  } catch (e) {
    return { ok: false, error: { kind: "DiskStatsUnavailable", cause: e } };
  }

  return {
    ok: true,
    value: {
      hostname,
      uptimeSeconds: Math.max(0, Math.floor(summary.uptime)),
      memory: deriveMemoryStats(summary, parsed.fields),
      disk: deriveDiskStats(fsStats)
    }
  };
}
