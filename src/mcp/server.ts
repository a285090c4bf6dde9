import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { MCP_SERVER_NAME, MCP_SERVER_VERSION } from "./config/server";
import { registerManageTunnelsTools } from "./tools/manage-tunnels";
import { registerTunnelStatusTool } from "./tools/tunnel-status";
import type { McpToolDeps } from "./types";

// Build and configure MCP server instance.
export function createTunnelsMcpServer(deps: McpToolDeps = {}): McpServer {
  const server = new McpServer({
    name: MCP_SERVER_NAME,
    version: MCP_SERVER_VERSION,
  });

  registerTunnelStatusTool(server, deps);
  registerManageTunnelsTools(server, deps);

  return server;
}
