import type { Tunnel } from "../config/types";
import { errorMessage } from "../errors";
import { createConsoleReporter, debug, type Reporter } from "../logging";
import { collectSshProcesses, findTaggedProcess, type SshProcess } from "../process/inspector";
import { sendSignal, waitForExit, type SignalResult } from "../process/signals";
import { spawnDetached, type SpawnOutcome } from "../process/spawn";
import { buildBatchResult, summarizeBatch, type BatchResult } from "./batch";
import {
  buildStartCommand,
  resolveAutosshExecutable,
  type Launcher,
  type ResolveExecutable,
} from "./command";
import { STOP_POLL_INTERVAL_MS, STOP_TIMEOUT_MS } from "./config/ssh";
import { tunnelTag } from "./tag";

export type StartOutcome =
  | { tunnel: string; result: "started"; launcher: Launcher; pid: number | undefined }
  | { tunnel: string; result: "skipped"; pid: number }
  | { tunnel: string; result: "failed"; reason: string };

export type StopOutcome =
  | { tunnel: string; result: "stopped" | "force-stopped" | "already-stopped"; pid: number }
  | { tunnel: string; result: "not-running" }
  | { tunnel: string; result: "failed"; reason: string };

export interface StartOptions {
  useAutossh: boolean;
}

export type LifecycleDeps = {
  listProcesses?: () => Promise<SshProcess[]>;
  spawn?: (argv: readonly string[]) => Promise<SpawnOutcome>;
  signal?: (pid: number, signal: NodeJS.Signals) => SignalResult;
  waitForExit?: (pid: number, timeoutMs: number) => Promise<boolean>;
  which?: ResolveExecutable;
  platform?: NodeJS.Platform;
  reporter?: Reporter;
};

type ResolvedLifecycleDeps = Required<Omit<LifecycleDeps, "which" | "platform">> &
  Pick<LifecycleDeps, "which" | "platform">;

function normalizeDeps(overrides: LifecycleDeps = {}): ResolvedLifecycleDeps {
  return {
    listProcesses: overrides.listProcesses ?? (() => collectSshProcesses()),
    spawn: overrides.spawn ?? ((argv) => spawnDetached(argv)),
    signal: overrides.signal ?? ((pid, signal) => sendSignal(pid, signal)),
    waitForExit:
      overrides.waitForExit ??
      ((pid, timeoutMs) => waitForExit(pid, timeoutMs, STOP_POLL_INTERVAL_MS)),
    which: overrides.which,
    platform: overrides.platform,
    reporter: overrides.reporter ?? createConsoleReporter(),
  };
}

// Re-read the process table; nothing about a running tunnel is remembered between calls.
async function findRunningTunnel(
  tunnel: Tunnel,
  deps: ResolvedLifecycleDeps,
): Promise<SshProcess | undefined> {
  const processes = await deps.listProcesses();
  return findTaggedProcess(processes, tunnelTag(tunnel.name));
}

function describeSpawnFailure(outcome: Exclude<SpawnOutcome, { ok: true }>): string {
  if (outcome.reason === "not-found") {
    return "SSH/AutoSSH command not found. Please ensure SSH is installed.";
  }
  return outcome.message;
}

async function startResolved(
  tunnel: Tunnel,
  options: StartOptions,
  deps: ResolvedLifecycleDeps,
): Promise<StartOutcome> {
  const running = await findRunningTunnel(tunnel, deps);
  if (running) {
    deps.reporter.warn(`Tunnel '${tunnel.name}' is already running`);
    return { tunnel: tunnel.name, result: "skipped", pid: running.pid };
  }

  const command = buildStartCommand(tunnel, options.useAutossh, {
    which: deps.which,
    platform: deps.platform,
  });
  const outcome = await deps.spawn(command.argv);
  if (!outcome.ok) {
    const reason = describeSpawnFailure(outcome);
    deps.reporter.error(`Failed to start tunnel '${tunnel.name}': ${reason}`);
    return { tunnel: tunnel.name, result: "failed", reason };
  }

  deps.reporter.success(`Started tunnel '${tunnel.name}' using ${command.launcher}`);
  if (command.launcher === "autossh") {
    deps.reporter.note("AutoSSH will automatically reconnect if connection drops");
  }
  return { tunnel: tunnel.name, result: "started", launcher: command.launcher, pid: outcome.pid };
}

async function stopResolved(tunnel: Tunnel, deps: ResolvedLifecycleDeps): Promise<StopOutcome> {
  const running = await findRunningTunnel(tunnel, deps);
  if (!running) {
    deps.reporter.warn(`Tunnel '${tunnel.name}' is not running`);
    return { tunnel: tunnel.name, result: "not-running" };
  }

  const { pid } = running;
  const denied = (): StopOutcome => {
    const reason = "permission denied";
    deps.reporter.error(`Failed to stop tunnel '${tunnel.name}': ${reason}`);
    return { tunnel: tunnel.name, result: "failed", reason };
  };
  const vanished = (): StopOutcome => {
    deps.reporter.warn(`Tunnel '${tunnel.name}' was already stopped`);
    return { tunnel: tunnel.name, result: "already-stopped", pid };
  };

  const terminated = deps.signal(pid, "SIGTERM");
  if (terminated === "no-such-process") return vanished();
  if (terminated === "access-denied") return denied();

  if (await deps.waitForExit(pid, STOP_TIMEOUT_MS)) {
    deps.reporter.success(`Stopped tunnel '${tunnel.name}'`);
    return { tunnel: tunnel.name, result: "stopped", pid };
  }

  debug(`pid ${pid} ignored SIGTERM for ${STOP_TIMEOUT_MS}ms, sending SIGKILL`);
  const killed = deps.signal(pid, "SIGKILL");
  if (killed === "no-such-process") {
    // Exited between the last poll and the kill.
    deps.reporter.success(`Stopped tunnel '${tunnel.name}'`);
    return { tunnel: tunnel.name, result: "stopped", pid };
  }
  if (killed === "access-denied") return denied();

  deps.reporter.success(`Force stopped tunnel '${tunnel.name}'`);
  return { tunnel: tunnel.name, result: "force-stopped", pid };
}

export function startTunnel(
  tunnel: Tunnel,
  options: StartOptions,
  deps: LifecycleDeps = {},
): Promise<StartOutcome> {
  return startResolved(tunnel, options, normalizeDeps(deps));
}

export function stopTunnel(tunnel: Tunnel, deps: LifecycleDeps = {}): Promise<StopOutcome> {
  return stopResolved(tunnel, normalizeDeps(deps));
}

export const START_VERBS = { base: "start", past: "started", skipped: "already running" };
export const STOP_VERBS = { base: "stop", past: "stopped", skipped: "not running" };

function reportSummary<T>(result: BatchResult<T>, reporter: Reporter, verbs: typeof START_VERBS) {
  const summary = summarizeBatch(result, verbs);
  if (summary.level === "success") reporter.success(summary.message);
  else if (summary.level === "warn") reporter.warn(summary.message);
  else reporter.error(summary.message);
}

// Start every tunnel independently; one failure never stops the rest of the batch.
export async function startTunnels(
  tunnels: readonly Tunnel[],
  options: StartOptions,
  overrides: LifecycleDeps = {},
): Promise<BatchResult<StartOutcome>> {
  const deps = normalizeDeps(overrides);
  let useAutossh = options.useAutossh;
  if (useAutossh && !resolveAutosshExecutable({ which: deps.which, platform: deps.platform })) {
    deps.reporter.warn("AutoSSH not found, using regular SSH");
    useAutossh = false;
  }

  const outcomes: StartOutcome[] = [];
  for (const tunnel of tunnels) {
    try {
      outcomes.push(await startResolved(tunnel, { useAutossh }, deps));
    } catch (err) {
      const reason = errorMessage(err);
      deps.reporter.error(`Failed to start tunnel '${tunnel.name}': ${reason}`);
      outcomes.push({ tunnel: tunnel.name, result: "failed", reason });
    }
  }

  const result = buildBatchResult(
    outcomes,
    (outcome) => outcome.result === "failed",
    (outcome) => outcome.result === "skipped",
  );
  reportSummary(result, deps.reporter, START_VERBS);
  return result;
}

export async function stopTunnels(
  tunnels: readonly Tunnel[],
  overrides: LifecycleDeps = {},
): Promise<BatchResult<StopOutcome>> {
  const deps = normalizeDeps(overrides);

  const outcomes: StopOutcome[] = [];
  for (const tunnel of tunnels) {
    try {
      outcomes.push(await stopResolved(tunnel, deps));
    } catch (err) {
      const reason = errorMessage(err);
      deps.reporter.error(`Failed to stop tunnel '${tunnel.name}': ${reason}`);
      outcomes.push({ tunnel: tunnel.name, result: "failed", reason });
    }
  }

  const result = buildBatchResult(
    outcomes,
    (outcome) => outcome.result === "failed",
    (outcome) => outcome.result === "not-running",
  );
  reportSummary(result, deps.reporter, STOP_VERBS);
  return result;
}
