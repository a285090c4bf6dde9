import type { TunnelConfig } from "../config/types";
import type { LifecycleDeps } from "../tunnels/lifecycle";
import type { SnapshotDeps } from "../tunnels/snapshot";

// Collaborators shared by the tool handlers; the configuration is re-read on every call.
export type McpToolDeps = {
  loadConfig?: () => TunnelConfig;
  lifecycle?: Omit<LifecycleDeps, "reporter">;
  snapshot?: SnapshotDeps;
};
