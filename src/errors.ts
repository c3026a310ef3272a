export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type MeminfoLabel = "Cached" | "MemAvailable" | "SReclaimable";

export type SamplingError =
  | { kind: "HostnameUnavailable"; cause?: unknown }
  | { kind: "SysinfoUnavailable"; cause?: unknown }
  | { kind: "DiskStatsUnavailable"; cause?: unknown }
  | { kind: "MeminfoUnavailable"; cause: unknown }
  | { kind: "MeminfoIncomplete"; missing: MeminfoLabel[] };

export type EncodingError = { kind: "DocumentCreationFailed"; cause?: unknown };

export type TransportError =
  | { kind: "RequestFailed"; cause: unknown }
  | { kind: "UnexpectedStatus"; status: number };

export type CycleError = SamplingError | EncodingError | TransportError;

/** The HTTP client could not be constructed. */
export class TransportInitError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportInitError";
  }
}

function causeText(cause: unknown): string {
  if (cause === undefined) return "";
  if (cause instanceof Error) {
    const code = "code" in cause && typeof cause.code === "string" ? ` (${cause.code})` : "";
    return `: ${cause.message}${code}`;
  }
  return `: ${String(cause)}`;
}

export function describeError(error: CycleError): string {
  switch (error.kind) {
    case "HostnameUnavailable":
      return `failed to get hostname${causeText(error.cause)}`;
    case "SysinfoUnavailable":
      return `failed to get kernel memory and uptime summary${causeText(error.cause)}`;
    case "DiskStatsUnavailable":
      return `failed to get disk stats for /${causeText(error.cause)}`;
    case "MeminfoUnavailable":
      return `failed to read /proc/meminfo${causeText(error.cause)}`;
    case "MeminfoIncomplete":
      return `failed to parse /proc/meminfo, missing ${error.missing.join(", ")}`;
    case "DocumentCreationFailed":
      return `failed to create JSON report${causeText(error.cause)}`;
    case "RequestFailed":
      return `HTTP request failed${causeText(error.cause)}`;
    case "UnexpectedStatus":
      return `unexpected HTTP response code ${error.status}`;
  }
}
