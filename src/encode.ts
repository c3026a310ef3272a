import { z } from "zod";
import type { HostSnapshot } from "./collect.js";
import type { EncodingError, Result } from "./errors.js";

const kib = z.number().int().nonnegative();

export const hostReportSchema = z
  .object({
    hostname: z.string(),
    uptime: z.number().int().nonnegative(),
    memory: z
      .object({
        total: kib,
        used: kib,
        free: kib,
        shared: kib,
        cached: kib,
        available: kib
      })
      .strict(),
    disk: z
      .object({
        total: kib,
        free: kib,
        used: kib,
        available: kib,
        usage_percentage: z.number().min(0).max(100)
      })
      .strict()
  })
  .strict();

export type HostReport = z.infer<typeof hostReportSchema>;

export function toHostReport(snapshot: HostSnapshot): HostReport {
  return {
    hostname: snapshot.hostname,
    uptime: snapshot.uptimeSeconds,
    memory: {
      total: snapshot.memory.total,
      used: snapshot.memory.used,
      free: snapshot.memory.free,
      shared: snapshot.memory.shared,
      cached: snapshot.memory.cached,
      available: snapshot.memory.available
    },
    disk: {
      total: snapshot.disk.total,
      free: snapshot.disk.free,
      used: snapshot.disk.used,
      available: snapshot.disk.available,
      usage_percentage: snapshot.disk.usagePercentage
    }
  };
}

export function encodeReport(snapshot: HostSnapshot): Result<string, EncodingError> {
  const parsed = hostReportSchema.safeParse(toHostReport(snapshot));
  if (!parsed.success) {
    return { ok: false, error: { kind: "DocumentCreationFailed", cause: parsed.error } };
  }
  try {
    return { ok: true, value: JSON.stringify(parsed.data, null, 2) };
  } catch (e) {
    return { ok: false, error: { kind: "DocumentCreationFailed", cause: e } };
  }
}
