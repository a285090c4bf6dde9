// Centralized MCP tool descriptions and reusable user-facing text.

export const TUNNEL_STATUS_TOOL_DESCRIPTION = `Show the state of the configured SSH tunnels.
Returns one JSON object per tunnel with its name, group, hostname, pid,
status and socket endpoints. Tunnels that are not running report pid "-"
and status "Inactive".

Pass a name to restrict the result to a single tunnel.`;

export const START_TUNNELS_TOOL_DESCRIPTION = `Start SSH tunnels in the background.
Select exactly one of: names (list of tunnel names), group, or all=true.
Tunnels that are already running are left alone. autossh is used when it is
installed unless no_autossh is set.`;

export const STOP_TUNNELS_TOOL_DESCRIPTION = `Stop running SSH tunnels.
Select exactly one of: names (list of tunnel names), group, or all=true.
Processes get SIGTERM and, if still alive after 5 seconds, SIGKILL.`;
