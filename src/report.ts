import { readFileSync } from "node:fs";
import { createRequire } from "node:module";
import { dirname, join } from "node:path";
import { Pool, request, type Dispatcher } from "undici";
import { z } from "zod";
import { TransportInitError, type TransportError } from "./errors.js";

export const REQUEST_TIMEOUT_MS = 5000;
export const EXPECTED_STATUS = 201;

export type Transport = {
  readonly url: string;
  readonly userAgent: string;
  readonly timeoutMs: number;
  post(payload: string): Promise<TransportError | undefined>;
  close(): Promise<void>;
};

export type TransportOptions = {
  serverUrl: string;
  /** Defaults to a keep-alive pool for the server's origin. */
  dispatcher?: Dispatcher;
  timeoutMs?: number;
};

const manifestSchema = z.object({ name: z.string(), version: z.string() });

/** Version of the undici package this module resolves, not the copy bundled with Node. */
export function undiciVersion(): string {
  const require = createRequire(import.meta.url);
  let dir = dirname(require.resolve("undici"));
  for (;;) {
    const manifest = manifestSchema.safeParse(readJson(join(dir, "package.json")));
    if (manifest.success && manifest.data.name === "undici") return manifest.data.version;
    const parent = dirname(dir);
    if (parent === dir) return "unknown";
    dir = parent;
  }
}

function readJson(path: string): unknown {
  try {
    return JSON.parse(readFileSync(path, "utf8"));
  } catch {
    return undefined;
  }
}

function userAgent(): string {
  return `undici/${undiciVersion()}`;
}

export function createTransport(options: TransportOptions): Transport {
  let url: URL;
  try {
    url = new URL(options.serverUrl);
  } catch (e) {
    throw new TransportInitError(`Invalid server URL '${options.serverUrl}'`, { cause: e });
  }

  let dispatcher: Dispatcher;
  try {
    dispatcher = options.dispatcher ?? new Pool(url.origin, { connections: 1 });
  } catch (e) {
    throw new TransportInitError(`Failed to initialize HTTP client for ${url.origin}`, { cause: e });
  }

  const target = url.toString();
  const ua = userAgent();
  const timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;

  return {
    url: target,
    userAgent: ua,
    timeoutMs,

    async post(payload) {
      let res: Dispatcher.ResponseData;
      try {
        res = await request(target, {
          dispatcher,
          method: "POST",
          headers: {
            "content-type": "application/json",
            "user-agent": ua
          },
          expectContinue: false,
          body: payload,
          signal: AbortSignal.timeout(timeoutMs)
        });
      } catch (e) {
        return { kind: "RequestFailed", cause: e };
      }

      try {
        await res.body.dump();
      } catch (e) {
        return { kind: "RequestFailed", cause: e };
      }

      if (res.statusCode !== EXPECTED_STATUS) {
        return { kind: "UnexpectedStatus", status: res.statusCode };
      }
      return undefined;
    },

    async close() {
      if (options.dispatcher === undefined) {
        await dispatcher.close();
      }
    }
  };
}
