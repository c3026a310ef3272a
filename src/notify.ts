import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

export type LifecycleNotifier = {
  ready(): Promise<void>;
  watchdog(): Promise<void>;
  stopping(): Promise<void>;
  startupFailed(code: number): Promise<void>;
};

export type NotifyCommand = (args: string[]) => Promise<void>;

export const noopNotifier: LifecycleNotifier = {
  async ready() {},
  async watchdog() {},
  async stopping() {},
  async startupFailed() {}
};

// The unit needs NotifyAccess=all: the message comes from a child, not the main PID.
async function runSystemdNotify(args: string[]): Promise<void> {
  await execFileAsync("systemd-notify", args, { timeout: 2000 });
}

export function createSystemdNotifier(
  pid: number = process.pid,
  command: NotifyCommand = runSystemdNotify
): LifecycleNotifier {
  const send = (...assignments: string[]) => command([`--pid=${pid}`, ...assignments]);
  return {
    ready: () => send("READY=1"),
    watchdog: () => send("WATCHDOG=1"),
    stopping: () => send("STOPPING=1"),
    startupFailed: (code) => send("STATUS=Failed to start up", `ERRNO=${code}`)
  };
}

export function createNotifier(env: NodeJS.ProcessEnv = process.env): LifecycleNotifier {
  const socket = env["NOTIFY_SOCKET"];
  return socket ? createSystemdNotifier() : noopNotifier;
}
