#!/usr/bin/env node
import "dotenv/config";
import { sampleHost } from "./collect.js";
import { EXIT_OK, EXIT_USAGE, createSignalState, installSignalHandlers, runDaemon } from "./daemon.js";
import { encodeReport } from "./encode.js";
import { USAGE, loadConfig } from "./env.js";
import { createLogger } from "./logger.js";
import { createNotifier } from "./notify.js";
import { createTransport } from "./report.js";
import { createLinuxSources } from "./sources.js";

async function main(): Promise<number> {
  const notifier = createNotifier();
  const outcome = loadConfig(process.argv.slice(2));

  if (outcome.kind === "exit") {
    process.stdout.write(outcome.output);
    return EXIT_OK;
  }

  if (outcome.kind === "invalid") {
    const logger = createLogger();
    for (const message of outcome.errors) logger.error(message);
    logger.error(`Usage: ${USAGE}`);
    try {
      await notifier.startupFailed(EXIT_USAGE);
    } catch (e) {
      logger.warn(`Failed to send startup failure notification: ${e instanceof Error ? e.message : String(e)}`);
    }
    return EXIT_USAGE;
  }

  const { config } = outcome;
  const logger = createLogger({ verbosity: config.verbosity });
  const signals = createSignalState();
  const uninstall = installSignalHandlers(signals);
  const sources = createLinuxSources();

  try {
    return await runDaemon({
      intervalSeconds: config.intervalSeconds,
      sample: () => sampleHost(sources),
      encode: encodeReport,
      createTransport: () => createTransport({ serverUrl: config.serverUrl }),
      notifier,
      signals,
      logger
    });
  } finally {
    uninstall();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    // eslint-disable-next-line no-console
    console.error("heartbeatd failed", e);
    process.exitCode = 1;
  }
);
