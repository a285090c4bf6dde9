import type { Tunnel } from "../config/types";
import { UsageError } from "../errors";

export interface TunnelSelection {
  names?: readonly string[];
  group?: string;
  all?: boolean;
}

export const SELECTOR_USAGE_MESSAGE = "Exactly one of --name, --group, or --all must be specified.";

// Resolve --name/--group/--all against the configured tunnels; exactly one selector is allowed.
export function selectTunnels(tunnels: readonly Tunnel[], selection: TunnelSelection): Tunnel[] {
  const names = selection.names ?? [];
  const group = selection.group ?? "";
  const selectors = [names.length > 0, group.length > 0, selection.all === true];
  if (selectors.filter(Boolean).length !== 1) {
    throw new UsageError(SELECTOR_USAGE_MESSAGE);
  }

  if (selection.all) {
    return [...tunnels];
  }

  if (names.length > 0) {
    return names.map((name) => {
      const tunnel = tunnels.find((candidate) => candidate.name === name);
      if (!tunnel) {
        throw new UsageError(`Tunnel not found: ${name}`);
      }
      return tunnel;
    });
  }

  const members = tunnels.filter((tunnel) => tunnel.group === group);
  if (members.length === 0) {
    throw new UsageError(`Group not found: ${group}`);
  }
  return members;
}
