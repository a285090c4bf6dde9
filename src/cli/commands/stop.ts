import type { TunnelConfig } from "../../config/types";
import { createConsoleReporter } from "../../logging";
import { stopTunnels } from "../../tunnels/lifecycle";
import { selectTunnels } from "../../tunnels/select";
import type { CliDeps, StopCommandOptions } from "../types";
import { NO_TUNNELS_MESSAGE } from "./start";

// Stop the selected tunnels, escalating to SIGKILL when SIGTERM is ignored.
export async function runStopCommand(
  config: TunnelConfig,
  options: StopCommandOptions,
  deps: CliDeps = {},
): Promise<void> {
  const reporter = deps.reporter ?? createConsoleReporter();
  const tunnels = selectTunnels(config.tunnels, options.selection);
  if (tunnels.length === 0) {
    reporter.warn(NO_TUNNELS_MESSAGE);
    return;
  }

  await stopTunnels(tunnels, { ...deps.lifecycle, reporter });
}
