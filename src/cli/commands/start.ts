import type { TunnelConfig } from "../../config/types";
import { createConsoleReporter } from "../../logging";
import { startTunnels } from "../../tunnels/lifecycle";
import { selectTunnels } from "../../tunnels/select";
import type { CliDeps, StartCommandOptions } from "../types";

export const NO_TUNNELS_MESSAGE = "No tunnels found matching criteria";

// Start the selected tunnels in the background.
export async function runStartCommand(
  config: TunnelConfig,
  options: StartCommandOptions,
  deps: CliDeps = {},
): Promise<void> {
  const reporter = deps.reporter ?? createConsoleReporter();
  const tunnels = selectTunnels(config.tunnels, options.selection);
  if (tunnels.length === 0) {
    reporter.warn(NO_TUNNELS_MESSAGE);
    return;
  }

  await startTunnels(tunnels, { useAutossh: options.useAutossh }, { ...deps.lifecycle, reporter });
}
