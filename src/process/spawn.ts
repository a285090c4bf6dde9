import { spawn, type SpawnOptions } from "child_process";
import { basename } from "path";
import { debug } from "../logging";
import { errorCode, errorMessage } from "../errors";
import { formatCommandLine } from "../cli/utils/shell";
import { SPAWN_GRACE_MS } from "../tunnels/config/ssh";

// The slice of ChildProcess a detached launch needs.
export interface DetachedChild {
  pid?: number;
  unref(): void;
  once(event: "error", listener: (err: Error) => void): unknown;
  once(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
}

export type SpawnCommand = (
  command: string,
  args: readonly string[],
  options: SpawnOptions,
) => DetachedChild;

export type SpawnOutcome =
  | { ok: true; pid: number | undefined }
  | { ok: false; reason: "not-found"; message: string }
  | { ok: false; reason: "exited"; message: string; exitCode: number | null }
  | { ok: false; reason: "error"; message: string };

export type SpawnDeps = {
  spawnCommand?: SpawnCommand;
  graceMs?: number;
};

function failureFromError(err: unknown): SpawnOutcome {
  if (errorCode(err) === "ENOENT") {
    return { ok: false, reason: "not-found", message: errorMessage(err) };
  }
  return { ok: false, reason: "error", message: errorMessage(err) };
}

/**
 * Launch a command detached from this process and return without waiting for it.
 *
 * Watches the child for a short grace window so a missing executable or an
 * immediate non-zero exit can be reported. A child still running when the window
 * closes, or one that exited 0 (ssh -f forks into the background), counts as started.
 */
export function spawnDetached(argv: readonly string[], deps: SpawnDeps = {}): Promise<SpawnOutcome> {
  const spawnCommand = deps.spawnCommand ?? spawn;
  const graceMs = deps.graceMs ?? SPAWN_GRACE_MS;
  const [command, ...args] = argv;

  if (!command) {
    return Promise.resolve({ ok: false, reason: "error", message: "Empty command" });
  }

  debug(`spawning: ${formatCommandLine(argv)}`);

  let child: DetachedChild;
  try {
    child = spawnCommand(command, args, { detached: true, stdio: "ignore", windowsHide: true });
  } catch (err) {
    return Promise.resolve(failureFromError(err));
  }

  return new Promise((resolve) => {
    let settled = false;

    const finish = (outcome: SpawnOutcome) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      child.unref();
      debug(`spawn of ${command} settled: ${JSON.stringify(outcome)}`);
      resolve(outcome);
    };

    const timer = setTimeout(() => finish({ ok: true, pid: child.pid }), graceMs);

    child.once("error", (err) => finish(failureFromError(err)));
    child.once("exit", (code, signal) => {
      if (code === 0) {
        finish({ ok: true, pid: child.pid });
        return;
      }
      const detail = code !== null ? `code ${code}` : `signal ${signal ?? "unknown"}`;
      finish({
        ok: false,
        reason: "exited",
        message: `${basename(command)} exited immediately with ${detail}`,
        exitCode: code,
      });
    });
  });
}
