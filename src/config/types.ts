import type { Forwarding } from "./forwarding";

// A configured tunnel. Immutable once loaded.
export interface Tunnel {
  readonly name: string;
  readonly group?: string;
  readonly hostname: string;
  readonly forwarding: Forwarding;
}

export interface TunnelGroup {
  readonly name: string;
  readonly tunnels: readonly Tunnel[];
}

export interface TunnelConfig {
  // Absolute path of the file the configuration came from; null when no file exists.
  readonly path: string | null;
  // Flattened: top-level tunnels first, then group members.
  readonly tunnels: readonly Tunnel[];
  readonly groups: readonly TunnelGroup[];
}
