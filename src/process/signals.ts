import { debug } from "../logging";
import { errorCode } from "../errors";

export type SignalResult = "sent" | "no-such-process" | "access-denied";

export type KillFn = (pid: number, signal?: NodeJS.Signals | number) => boolean;

export type SignalDeps = {
  kill?: KillFn;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
};

export const sleep = (ms: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

// ESRCH and EPERM become results; anything else is unexpected and propagates.
export function sendSignal(pid: number, signal: NodeJS.Signals, deps: SignalDeps = {}): SignalResult {
  const kill = deps.kill ?? process.kill;
  try {
    kill(pid, signal);
    debug(`sent ${signal} to pid ${pid}`);
    return "sent";
  } catch (err) {
    const code = errorCode(err);
    debug(`${signal} to pid ${pid} failed: ${code ?? String(err)}`);
    if (code === "ESRCH") return "no-such-process";
    if (code === "EPERM") return "access-denied";
    throw err;
  }
}

// Signal 0 probe. EPERM means the process exists but belongs to someone else.
export function isProcessAlive(pid: number, deps: SignalDeps = {}): boolean {
  const kill = deps.kill ?? process.kill;
  try {
    kill(pid, 0);
    return true;
  } catch (err) {
    return errorCode(err) === "EPERM";
  }
}

// Resolves true once the process is gone, false if it is still alive after `timeoutMs`.
export async function waitForExit(
  pid: number,
  timeoutMs: number,
  pollIntervalMs: number,
  deps: SignalDeps = {},
): Promise<boolean> {
  const wait = deps.sleep ?? sleep;
  const now = deps.now ?? Date.now;
  const deadline = now() + timeoutMs;

  while (isProcessAlive(pid, deps)) {
    if (now() >= deadline) return false;
    await wait(pollIntervalMs);
  }
  return true;
}
