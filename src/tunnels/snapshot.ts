import type { Tunnel } from "../config/types";
import {
  DEFAULT_CONNECTION_KIND,
  socketConnections,
  type ConnectionKind,
} from "../process/connections";
import {
  collectSshProcesses,
  findTaggedProcess,
  findTaggedSshChild,
  type SshProcess,
} from "../process/inspector";
import { processStatus, titleCaseStatus } from "../process/status";
import { tunnelTag } from "./tag";

// One row of `tunnels status`. Every field is display-ready text.
export type TunnelStatus = {
  name: string;
  group: string;
  hostname: string;
  pid: string;
  status: string;
  connections: string;
};

export const NO_PID = "-";
export const INACTIVE_STATUS = "Inactive";

export type SnapshotOptions = {
  connectionKind?: ConnectionKind;
};

export type SnapshotDeps = {
  listProcesses?: () => Promise<SshProcess[]>;
  processStatus?: (pid: number) => Promise<string | null>;
  socketConnections?: (pid: number, kind: ConnectionKind) => Promise<string[]>;
};

function inactiveRow(tunnel: Tunnel): TunnelStatus {
  return {
    name: tunnel.name,
    group: tunnel.group ?? "",
    hostname: tunnel.hostname,
    pid: NO_PID,
    status: INACTIVE_STATUS,
    connections: "",
  };
}

export async function snapshotTunnels(
  tunnels: readonly Tunnel[],
  options: SnapshotOptions = {},
  deps: SnapshotDeps = {},
): Promise<TunnelStatus[]> {
  const listProcesses = deps.listProcesses ?? (() => collectSshProcesses());
  const readStatus = deps.processStatus ?? ((pid: number) => processStatus(pid));
  const readConnections =
    deps.socketConnections ??
    ((pid: number, kind: ConnectionKind) => socketConnections(pid, kind));
  const kind = options.connectionKind ?? DEFAULT_CONNECTION_KIND;

  const processes = await listProcesses();
  const rows: TunnelStatus[] = [];

  for (const tunnel of tunnels) {
    const tag = tunnelTag(tunnel.name);
    const proc = findTaggedProcess(processes, tag);
    if (!proc) {
      rows.push(inactiveRow(tunnel));
      continue;
    }

    const status = await readStatus(proc.pid);
    if (status === null) {
      // Exited after the process table was read.
      rows.push(inactiveRow(tunnel));
      continue;
    }

    // Under autossh the sockets belong to the ssh child, not the supervisor.
    const socketOwner = findTaggedSshChild(processes, tag) ?? proc;
    const connections = await readConnections(socketOwner.pid, kind);
    rows.push({
      name: tunnel.name,
      group: tunnel.group ?? "",
      hostname: tunnel.hostname,
      pid: String(proc.pid),
      status: titleCaseStatus(status),
      connections: connections.join("\n"),
    });
  }

  return rows;
}
