import { describe, it, expect } from "vitest";
import { describeError } from "./errors.js";

describe("describeError", () => {
  it("includes the errno code of an I/O cause", () => {
    const cause = Object.assign(new Error("ENOENT: no such file or directory, open '/proc/meminfo'"), {
      code: "ENOENT"
    });
    expect(describeError({ kind: "MeminfoUnavailable", cause })).toBe(
      "failed to read /proc/meminfo: ENOENT: no such file or directory, open '/proc/meminfo' (ENOENT)"
    );
  });

  it("names the missing meminfo fields", () => {
    expect(describeError({ kind: "MeminfoIncomplete", missing: ["MemAvailable", "SReclaimable"] })).toBe(
      "failed to parse /proc/meminfo, missing MemAvailable, SReclaimable"
    );
  });

  it("names the status code", () => {
    expect(describeError({ kind: "UnexpectedStatus", status: 404 })).toBe("unexpected HTTP response code 404");
  });

  it("omits an absent cause", () => {
    expect(describeError({ kind: "HostnameUnavailable" })).toBe("failed to get hostname");
  });

  it("stringifies a non-Error cause", () => {
    expect(describeError({ kind: "RequestFailed", cause: "socket hang up" })).toBe(
      "HTTP request failed: socket hang up"
    );
  });

  it("describes the remaining kinds", () => {
    expect(describeError({ kind: "SysinfoUnavailable" })).toBe("failed to get kernel memory and uptime summary");
    expect(describeError({ kind: "DiskStatsUnavailable" })).toBe("failed to get disk stats for /");
    expect(describeError({ kind: "DocumentCreationFailed" })).toBe("failed to create JSON report");
  });
});
