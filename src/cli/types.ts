import type { TunnelConfig } from "../config/types";
import type { Reporter } from "../logging";
import type { OutputFormat } from "../output/format";
import type { ConnectionKind } from "../process/connections";
import type { LifecycleDeps } from "../tunnels/lifecycle";
import type { TunnelSelection } from "../tunnels/select";
import type { SnapshotDeps } from "../tunnels/snapshot";

// Options that apply before the command name.
export interface GlobalOptions {
  configPath?: string;
  version?: boolean;
  help?: boolean;
}

// `tunnels start` command options.
export interface StartCommandOptions {
  selection: TunnelSelection;
  useAutossh: boolean;
}

// `tunnels stop` command options.
export interface StopCommandOptions {
  selection: TunnelSelection;
}

// `tunnels status` command options.
export interface StatusCommandOptions {
  live: boolean;
  format: OutputFormat;
  columns: string[];
  kind: ConnectionKind;
}

// Collaborators the commands reach for; every field defaults to the real implementation.
export type CliDeps = {
  reporter?: Reporter;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  loadConfig?: (explicitPath?: string) => TunnelConfig;
  lifecycle?: LifecycleDeps;
  snapshot?: SnapshotDeps;
  // Ends `status --live`; SIGINT is used when absent.
  signal?: AbortSignal;
};
