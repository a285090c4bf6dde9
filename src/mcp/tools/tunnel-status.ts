import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { loadConfig } from "../../config/load";
import type { TunnelConfig } from "../../config/types";
import { isConfigError } from "../../errors";
import { formatOutput } from "../../output/format";
import { snapshotTunnels } from "../../tunnels/snapshot";
import { TUNNEL_STATUS_TOOL_DESCRIPTION } from "../config/messages";
import type { McpToolDeps } from "../types";
import { errorResult, textResult } from "./result";

export async function tunnelStatus(
  args: { name?: string },
  deps: McpToolDeps = {},
): Promise<CallToolResult> {
  const load = deps.loadConfig ?? (() => loadConfig());

  let config: TunnelConfig;
  try {
    config = load();
  } catch (err) {
    if (isConfigError(err)) return errorResult(err.message);
    throw err;
  }

  let tunnels = config.tunnels;
  if (args.name) {
    tunnels = tunnels.filter((tunnel) => tunnel.name === args.name);
    if (tunnels.length === 0) {
      const available = config.tunnels.map((tunnel) => tunnel.name).join(", ") || "(none)";
      return errorResult(`Tunnel '${args.name}' not found. Configured tunnels: ${available}`);
    }
  }

  const rows = await snapshotTunnels(tunnels, {}, deps.snapshot);
  return textResult(formatOutput(rows, "json").trimEnd());
}

// Register `tunnel_status` for a JSON snapshot of every configured tunnel.
export function registerTunnelStatusTool(server: McpServer, deps: McpToolDeps = {}): void {
  server.tool(
    "tunnel_status",
    TUNNEL_STATUS_TOOL_DESCRIPTION,
    {
      name: z.string().optional().describe("Only report this tunnel. If omitted, reports all."),
    },
    async ({ name }) => tunnelStatus({ name }, deps),
  );
}
