import type { TunnelConfig } from "../../config/types";
import { formatOutput } from "../../output/format";
import { snapshotTunnels } from "../../tunnels/snapshot";
import { CLEAR_SCREEN, LIVE_REFRESH_INTERVAL_MS } from "../config/status";
import type { CliDeps, StatusCommandOptions } from "../types";

const writeStdout = (text: string) => {
  process.stdout.write(text);
};

async function renderStatus(
  config: TunnelConfig,
  options: StatusCommandOptions,
  deps: CliDeps,
): Promise<string> {
  const rows = await snapshotTunnels(config.tunnels, { connectionKind: options.kind }, deps.snapshot);
  return formatOutput(rows, options.format, { columns: options.columns });
}

// Resolves after `ms`, or as soon as `signal` aborts.
export function waitForRefresh(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener("abort", done, { once: true });
  });
}

async function runLiveStatus(
  config: TunnelConfig,
  options: StatusCommandOptions,
  deps: CliDeps,
  signal: AbortSignal,
): Promise<void> {
  const write = deps.stdout ?? writeStdout;
  while (!signal.aborted) {
    const output = await renderStatus(config, options, deps);
    write(`${CLEAR_SCREEN}${output}`);
    await waitForRefresh(LIVE_REFRESH_INTERVAL_MS, signal);
  }
}

// Print one status snapshot, or keep re-rendering until interrupted with --live.
export async function runStatusCommand(
  config: TunnelConfig,
  options: StatusCommandOptions,
  deps: CliDeps = {},
): Promise<void> {
  if (!options.live) {
    const write = deps.stdout ?? writeStdout;
    write(await renderStatus(config, options, deps));
    return;
  }

  if (deps.signal) {
    await runLiveStatus(config, options, deps, deps.signal);
    return;
  }

  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once("SIGINT", onInterrupt);
  try {
    await runLiveStatus(config, options, deps, controller.signal);
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}
