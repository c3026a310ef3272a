import { setTimeout as delay } from "node:timers/promises";
import type winston from "winston";
import type { HostSnapshot } from "./collect.js";
import { describeError, type CycleError, type EncodingError, type Result, type SamplingError } from "./errors.js";
import type { LifecycleNotifier } from "./notify.js";
import type { Transport } from "./report.js";

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_USAGE = 2;

export type SignalState = {
  readonly shutdownRequested: boolean;
  readonly terminationSignal: NodeJS.Signals | undefined;
  /** Aborted by the first termination signal. */
  readonly abortSignal: AbortSignal;
  requestShutdown(signal: NodeJS.Signals): void;
  noteHangup(): void;
  takeHangups(): number;
};

export function createSignalState(): SignalState {
  let terminationSignal: NodeJS.Signals | undefined;
  let hangups = 0;
  const controller = new AbortController();
  return {
    get shutdownRequested() {
      return terminationSignal !== undefined;
    },
    get terminationSignal() {
      return terminationSignal;
    },
    get abortSignal() {
      return controller.signal;
    },
    requestShutdown(signal) {
      terminationSignal ??= signal;
      controller.abort();
    },
    noteHangup() {
      hangups++;
    },
    takeHangups() {
      const n = hangups;
      hangups = 0;
      return n;
    }
  };
}

type SignalTarget = {
  on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
};

export function installSignalHandlers(state: SignalState, target: SignalTarget = process): () => void {
  const onTerminate = (signal: NodeJS.Signals) => state.requestShutdown(signal);
  const onHangup = () => state.noteHangup();
  target.on("SIGTERM", onTerminate);
  target.on("SIGINT", onTerminate);
  target.on("SIGHUP", onHangup);
  return () => {
    target.off("SIGTERM", onTerminate);
    target.off("SIGINT", onTerminate);
    target.off("SIGHUP", onHangup);
  };
}

export type CycleDeps = {
  sample: () => Promise<Result<HostSnapshot, SamplingError>>;
  encode: (snapshot: HostSnapshot) => Result<string, EncodingError>;
  transport: Pick<Transport, "url" | "post">;
  logger: winston.Logger;
};

export async function runCycle(deps: CycleDeps): Promise<CycleError | undefined> {
  const { logger } = deps;

  const sampled = await deps.sample();
  if (!sampled.ok) {
    logger.error(describeError(sampled.error), { kind: sampled.error.kind });
    return sampled.error;
  }

  const encoded = deps.encode(sampled.value);
  if (!encoded.ok) {
    logger.error(describeError(encoded.error), { kind: encoded.error.kind });
    return encoded.error;
  }

  logger.debug(`Executing POST request to '${deps.transport.url}'.`);
  logger.debug(`POST payload='${encoded.value}'`);

  const postError = await deps.transport.post(encoded.value);
  if (postError) {
    logger.error(describeError(postError), { kind: postError.kind });
    return postError;
  }

  logger.info("POST request successful.");
  return undefined;
}

export type DaemonDeps = Omit<CycleDeps, "transport"> & {
  intervalSeconds: number;
  /** May throw; a failure here is fatal. */
  createTransport: () => Transport;
  notifier: LifecycleNotifier;
  signals: SignalState;
  sleep?: (ms: number) => Promise<void>;
};

async function notify(logger: winston.Logger, what: string, send: () => Promise<void>): Promise<void> {
  try {
    await send();
  } catch (e) {
    logger.warn(`Failed to send ${what} notification: ${e instanceof Error ? e.message : String(e)}`);
  }
}

function logHangups(deps: DaemonDeps): void {
  for (let n = deps.signals.takeHangups(); n > 0; n--) {
    deps.logger.warn("Received SIGHUP, but no action implemented.");
  }
}

/** Resolves early with the signal aborted; any other rejection is rethrown. */
export async function interruptibleSleep(ms: number, signal: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (e) {
    if (e instanceof Error && e.name === "AbortError") return;
    throw e;
  }
}

/** Resolves with the process exit status. */
export async function runDaemon(deps: DaemonDeps): Promise<number> {
  const { logger, signals } = deps;
  const sleep = deps.sleep ?? ((ms: number) => interruptibleSleep(ms, signals.abortSignal));
  let exitCode = EXIT_OK;

  await notify(logger, "ready", () => deps.notifier.ready());

  let transport: Transport | undefined;
  try {
    transport = deps.createTransport();
  } catch (e) {
    logger.error(`Shutting down daemon due to: ${e instanceof Error ? e.message : String(e)}`);
    exitCode = EXIT_FATAL;
  }

  if (transport) {
    const cycleDeps: CycleDeps = { sample: deps.sample, encode: deps.encode, transport, logger };
    while (!signals.shutdownRequested) {
      logHangups(deps);
      try {
        await runCycle(cycleDeps);
      } catch (e) {
        logger.error(`Shutting down daemon due to: ${e instanceof Error ? e.message : String(e)}`);
        exitCode = EXIT_FATAL;
        break;
      }
      await notify(logger, "watchdog", () => deps.notifier.watchdog());
      await sleep(deps.intervalSeconds * 1000);
    }
    logHangups(deps);
    if (signals.terminationSignal) {
      logger.warn(`Received ${signals.terminationSignal}. Stopping daemon...`);
    }
    try {
      await transport.close();
    } catch (e) {
      logger.warn(`Failed to close HTTP client: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  await notify(logger, "stopping", () => deps.notifier.stopping());
  if (exitCode === EXIT_OK) logger.info("Daemon has been successfully stopped.");
  return exitCode;
}
