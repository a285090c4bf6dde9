import { CLI_VERSION } from "../../cli/config/app";

// MCP server identity used by clients to display this integration.
export const MCP_SERVER_NAME = "tunnels";
export const MCP_SERVER_VERSION = CLI_VERSION;
