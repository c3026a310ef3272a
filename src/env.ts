import { readFileSync } from "node:fs";
import { Command, CommanderError } from "commander";
import { z } from "zod";
import { VERBOSITY_DEFAULT, VERBOSITY_MAX, VERBOSITY_MIN } from "./logger.js";

const configSchema = z.object({
  serverUrl: z
    .string({ required_error: "is required" })
    .trim()
    .url()
    .regex(/^https?:\/\//i, "must be an http or https URL"),
  intervalSeconds: z
    .string({ required_error: "is required" })
    .trim()
    .pipe(z.coerce.number().int().min(1, "must be >= 1 second")),
  verbosity: z
    .string()
    .trim()
    .pipe(
      z.coerce
        .number()
        .int()
        .min(VERBOSITY_MIN, `must be between ${VERBOSITY_MIN} and ${VERBOSITY_MAX}`)
        .max(VERBOSITY_MAX, `must be between ${VERBOSITY_MIN} and ${VERBOSITY_MAX}`)
    )
    .optional()
});

export type AgentConfig = {
  serverUrl: string;
  intervalSeconds: number;
  verbosity: number;
};

export type ConfigOutcome =
  | { kind: "ok"; config: AgentConfig }
  | { kind: "exit"; output: string }
  | { kind: "invalid"; errors: string[] };

export const USAGE = "heartbeatd [-v/--verbosity <level>] -s/--server-url <URL> -i/--interval <seconds>";

const FIELDS = ["serverUrl", "intervalSeconds", "verbosity"] as const;

const FLAG_NAMES: Record<(typeof FIELDS)[number], string> = {
  serverUrl: "-s/--server-url",
  intervalSeconds: "-i/--interval",
  verbosity: "-v/--verbosity"
};

function packageVersion(): string {
  try {
    const raw: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf8"));
    const parsed = z.object({ version: z.string() }).safeParse(raw);
    return parsed.success ? parsed.data.version : "0.0.0";
  } catch {
    return "0.0.0";
  }
}

function buildProgram(output: string[]): Command {
  return new Command()
    .name("heartbeatd")
    .description("Periodically POSTs hostname, uptime, memory and disk usage to a collector")
    .version(packageVersion())
    .option("-s, --server-url <url>", "collector URL (env HEARTBEAT_SERVER_URL)")
    .option("-i, --interval <seconds>", "seconds between reports (env HEARTBEAT_INTERVAL_SECONDS)")
    .option(
      "-v, --verbosity <level>",
      `log verbosity ${VERBOSITY_MIN}-${VERBOSITY_MAX} (env HEARTBEAT_VERBOSITY, default ${VERBOSITY_DEFAULT})`
    )
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: (s) => output.push(s),
      writeErr: (s) => output.push(s)
    });
}

/** argv without the node and script entries. */
export function loadConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): ConfigOutcome {
  const output: string[] = [];
  const program = buildProgram(output);

  try {
    program.parse(argv, { from: "user" });
  } catch (e) {
    if (e instanceof CommanderError) {
      if (e.exitCode === 0) return { kind: "exit", output: output.join("") };
      return { kind: "invalid", errors: [e.message] };
    }
    throw e;
  }

  const opts = program.opts<{ serverUrl?: string; interval?: string; verbosity?: string }>();
  const parsed = configSchema.safeParse({
    serverUrl: opts.serverUrl ?? env["HEARTBEAT_SERVER_URL"],
    intervalSeconds: opts.interval ?? env["HEARTBEAT_INTERVAL_SECONDS"],
    verbosity: opts.verbosity ?? env["HEARTBEAT_VERBOSITY"]
  });

  if (!parsed.success) {
    const fieldErrors = parsed.error.flatten().fieldErrors;
    const errors = FIELDS.flatMap((field) =>
      (fieldErrors[field] ?? []).map((msg) => `${FLAG_NAMES[field]}: ${msg}`)
    );
    return { kind: "invalid", errors };
  }

  return {
    kind: "ok",
    config: {
      serverUrl: parsed.data.serverUrl,
      intervalSeconds: parsed.data.intervalSeconds,
      verbosity: parsed.data.verbosity ?? VERBOSITY_DEFAULT
    }
  };
}
