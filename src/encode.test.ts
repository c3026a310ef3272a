import { describe, it, expect } from "vitest";
import type { HostSnapshot } from "./collect.js";
import { encodeReport, hostReportSchema } from "./encode.js";

const SNAPSHOT: HostSnapshot = {
  hostname: "edge-01",
  uptimeSeconds: 12345,
  memory: { total: 8388608, free: 1048576, shared: 102400, cached: 2564096, available: 5242880, used: 4775936 },
  disk: { total: 4000, free: 1000, available: 800, used: 3000, usagePercentage: 75 }
};

function encodeOrThrow(snapshot: HostSnapshot): string {
  const result = encodeReport(snapshot);
  if (!result.ok) throw new Error(`encoding failed: ${result.error.kind}`);
  return result.value;
}

describe("encodeReport", () => {
  it("produces the wire document", () => {
    expect(JSON.parse(encodeOrThrow(SNAPSHOT))).toEqual({
      hostname: "edge-01",
      uptime: 12345,
      memory: { total: 8388608, used: 4775936, free: 1048576, shared: 102400, cached: 2564096, available: 5242880 },
      disk: { total: 4000, free: 1000, used: 3000, available: 800, usage_percentage: 75 }
    });
  });

  it("uses exactly the documented keys", () => {
    const doc = JSON.parse(encodeOrThrow(SNAPSHOT));
    expect(Object.keys(doc)).toEqual(["hostname", "uptime", "memory", "disk"]);
    expect(Object.keys(doc.memory)).toEqual(["total", "used", "free", "shared", "cached", "available"]);
    expect(Object.keys(doc.disk)).toEqual(["total", "free", "used", "available", "usage_percentage"]);
  });

  it("round-trips a snapshot of zeros", () => {
    const zeros: HostSnapshot = {
      hostname: "",
      uptimeSeconds: 0,
      memory: { total: 0, free: 0, shared: 0, cached: 0, available: 0, used: 0 },
      disk: { total: 0, free: 0, available: 0, used: 0, usagePercentage: 0 }
    };
    const report = hostReportSchema.parse(JSON.parse(encodeOrThrow(zeros)));
    expect(report.uptime).toBe(0);
    expect(report.memory).toEqual({ total: 0, used: 0, free: 0, shared: 0, cached: 0, available: 0 });
    expect(report.disk).toEqual({ total: 0, free: 0, used: 0, available: 0, usage_percentage: 0 });
  });

  it("round-trips values beyond 32 bits", () => {
    const big: HostSnapshot = {
      hostname: "storage-node-7",
      uptimeSeconds: 2 ** 32 + 5,
      memory: {
        total: 2 ** 40,
        free: 2 ** 33,
        shared: 2 ** 31 + 1,
        cached: 2 ** 35,
        available: 2 ** 36,
        used: 2 ** 40 - 2 ** 35 - 2 ** 33
      },
      disk: { total: 2 ** 42, free: 2 ** 41, available: 2 ** 40, used: 2 ** 41, usagePercentage: 50 }
    };
    const report = hostReportSchema.parse(JSON.parse(encodeOrThrow(big)));
    expect(report).toEqual({
      hostname: "storage-node-7",
      uptime: 4294967301,
      memory: {
        total: 1099511627776,
        used: 1056561954816,
        free: 8589934592,
        shared: 2147483649,
        cached: 34359738368,
        available: 68719476736
      },
      disk: { total: 4398046511104, free: 2199023255552, used: 2199023255552, available: 1099511627776, usage_percentage: 50 }
    });
  });

  it("pretty-prints with two spaces", () => {
    expect(encodeOrThrow(SNAPSHOT).startsWith('{\n  "hostname": "edge-01",\n  "uptime": 12345,')).toBe(true);
  });

  it("fails document creation for a non-finite percentage", () => {
    const result = encodeReport({ ...SNAPSHOT, disk: { ...SNAPSHOT.disk, usagePercentage: Number.NaN } });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("DocumentCreationFailed");
  });

  it("fails document creation for a negative size", () => {
    const result = encodeReport({ ...SNAPSHOT, memory: { ...SNAPSHOT.memory, used: -1 } });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("DocumentCreationFailed");
  });
});
