import { open, readFile, statfs } from "node:fs/promises";
import * as si from "systeminformation";
import { MEMINFO_PATH, scanMeminfo } from "./meminfo.js";

/** Memory fields are multiples of `memUnit` bytes. */
export type KernelSummary = {
  uptime: number;
  totalram: number;
  freeram: number;
  sharedram: number;
  bufferram: number;
  memUnit: number;
};

export type FsStats = {
  bsize: number;
  blocks: number;
  bfree: number;
  bavail: number;
};

export type HostSources = {
  hostname(): Promise<string>;
  kernelSummary(): Promise<KernelSummary>;
  withMeminfoLines<T>(consume: (lines: AsyncIterable<string>) => Promise<T>): Promise<T>;
  statfs(path: string): Promise<FsStats>;
};

const SUMMARY_LABELS = ["MemTotal", "MemFree", "Shmem", "Buffers"] as const;

export function createLinuxSources(meminfoPath: string = MEMINFO_PATH): HostSources {
  return {
    async hostname() {
      const osInfo = await si.osInfo();
      return osInfo.hostname ?? "";
    },

    async kernelSummary() {
      const text = await readFile(meminfoPath, "utf8");
      const found = await scanMeminfo(text.split("\n"), SUMMARY_LABELS);
      const missing = SUMMARY_LABELS.filter((l) => found[l] === undefined);
      if (missing.length > 0) {
        throw new Error(`${meminfoPath} lacks ${missing.join(", ")}`);
      }
      // kB to bytes
      return {
        uptime: Math.floor(si.time().uptime),
        totalram: (found.MemTotal ?? 0) * 1024,
        freeram: (found.MemFree ?? 0) * 1024,
        sharedram: (found.Shmem ?? 0) * 1024,
        bufferram: (found.Buffers ?? 0) * 1024,
        memUnit: 1
      };
    },

    async withMeminfoLines(consume) {
      const handle = await open(meminfoPath, "r");
      try {
        return await consume(handle.readLines());
      } finally {
        await handle.close();
      }
    },

    async statfs(path) {
      const s = await statfs(path);
      return { bsize: s.bsize, blocks: s.blocks, bfree: s.bfree, bavail: s.bavail };
    }
  };
}
