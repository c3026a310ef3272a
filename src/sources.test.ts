import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { parseMeminfo } from "./meminfo.js";
import { createLinuxSources } from "./sources.js";

const MEMINFO = [
  "MemTotal:        8000000 kB",
  "MemFree:         1000000 kB",
  "MemAvailable:    5000000 kB",
  "Buffers:          200000 kB",
  "Cached:          2000000 kB",
  "SwapCached:            0 kB",
  "Shmem:            100000 kB",
  "SReclaimable:     250000 kB",
  ""
].join("\n");

describe("createLinuxSources", () => {
  let tmpDir: string;
  let meminfoPath: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "heartbeat-test-"));
    meminfoPath = join(tmpDir, "meminfo");
    writeFileSync(meminfoPath, MEMINFO);
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("builds the kernel summary in bytes", async () => {
    const summary = await createLinuxSources(meminfoPath).kernelSummary();
    expect(summary).toMatchObject({
      totalram: 8000000 * 1024,
      freeram: 1000000 * 1024,
      sharedram: 100000 * 1024,
      bufferram: 200000 * 1024,
      memUnit: 1
    });
    expect(Number.isInteger(summary.uptime)).toBe(true);
    expect(summary.uptime).toBeGreaterThanOrEqual(0);
  });

  it("fails the kernel summary when a counter is missing", async () => {
    writeFileSync(meminfoPath, "MemTotal: 8000000 kB\nMemFree: 1000000 kB\n");
    await expect(createLinuxSources(meminfoPath).kernelSummary()).rejects.toThrow(
      `${meminfoPath} lacks Shmem, Buffers`
    );
  });

  it("streams meminfo lines to the parser", async () => {
    const result = await createLinuxSources(meminfoPath).withMeminfoLines(parseMeminfo);
    expect(result).toEqual({
      complete: true,
      fields: { cachedKb: 2000000, availableKb: 5000000, reclaimableKb: 250000 }
    });
  });

  it("rejects with the open error for a missing file", async () => {
    const sources = createLinuxSources(join(tmpDir, "absent"));
    await expect(sources.withMeminfoLines(parseMeminfo)).rejects.toMatchObject({ code: "ENOENT" });
  });

  it("reads root filesystem statistics", async () => {
    const stats = await createLinuxSources(meminfoPath).statfs("/");
    expect(stats.bsize).toBeGreaterThan(0);
    expect(stats.blocks).toBeGreaterThanOrEqual(stats.bfree);
  });
});
