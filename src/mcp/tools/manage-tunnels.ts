import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { NO_TUNNELS_MESSAGE } from "../../cli/commands/start";
import { loadConfig } from "../../config/load";
import type { Tunnel } from "../../config/types";
import { isConfigError, isUsageError } from "../../errors";
import { createBufferedReporter, type BufferedReporter } from "../../logging";
import type { BatchResult } from "../../tunnels/batch";
import { startTunnels, stopTunnels } from "../../tunnels/lifecycle";
import { selectTunnels, type TunnelSelection } from "../../tunnels/select";
import {
  START_TUNNELS_TOOL_DESCRIPTION,
  STOP_TUNNELS_TOOL_DESCRIPTION,
} from "../config/messages";
import type { McpToolDeps } from "../types";
import { errorResult, textResult } from "./result";

const selectionShape = {
  names: z.array(z.string()).optional().describe("Tunnel names to act on"),
  group: z.string().optional().describe("Act on every tunnel in this group"),
  all: z.boolean().optional().describe("Act on every configured tunnel"),
};

export type StartTunnelsArgs = TunnelSelection & { no_autossh?: boolean };

// Shared flow: reload config, select, run the batch, return everything the reporter collected.
async function runBatchTool<T>(
  selection: TunnelSelection,
  deps: McpToolDeps,
  run: (tunnels: Tunnel[], reporter: BufferedReporter) => Promise<BatchResult<T>>,
): Promise<CallToolResult> {
  const load = deps.loadConfig ?? (() => loadConfig());
  const reporter = createBufferedReporter();

  let tunnels: Tunnel[];
  try {
    tunnels = selectTunnels(load().tunnels, selection);
  } catch (err) {
    if (isUsageError(err) || isConfigError(err)) return errorResult(err.message);
    throw err;
  }

  if (tunnels.length === 0) {
    return textResult(NO_TUNNELS_MESSAGE);
  }

  const result = await run(tunnels, reporter);
  const text = reporter.lines.join("\n");
  return result.classification === "failure" ? errorResult(text) : textResult(text);
}

export function startTunnelsTool(
  args: StartTunnelsArgs,
  deps: McpToolDeps = {},
): Promise<CallToolResult> {
  const { no_autossh, ...selection } = args;
  return runBatchTool(selection, deps, (tunnels, reporter) =>
    startTunnels(tunnels, { useAutossh: no_autossh !== true }, { ...deps.lifecycle, reporter }),
  );
}

export function stopTunnelsTool(
  args: TunnelSelection,
  deps: McpToolDeps = {},
): Promise<CallToolResult> {
  return runBatchTool(args, deps, (tunnels, reporter) =>
    stopTunnels(tunnels, { ...deps.lifecycle, reporter }),
  );
}

// Register `start_tunnels` and `stop_tunnels`.
export function registerManageTunnelsTools(server: McpServer, deps: McpToolDeps = {}): void {
  server.tool(
    "start_tunnels",
    START_TUNNELS_TOOL_DESCRIPTION,
    {
      ...selectionShape,
      no_autossh: z.boolean().optional().describe("Launch with ssh even when autossh is installed"),
    },
    async (args) => startTunnelsTool(args, deps),
  );

  server.tool(
    "stop_tunnels",
    STOP_TUNNELS_TOOL_DESCRIPTION,
    selectionShape,
    async (args) => stopTunnelsTool(args, deps),
  );
}
