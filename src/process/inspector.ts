import psList from "ps-list";
import { hasTunnelTag } from "../tunnels/tag";
import { AUTOSSH_PROCESS_NAMES, SSH_PROCESS_NAMES } from "./config/processes";

// An ssh-family process seen in one read of the process table.
export interface SshProcess {
  readonly pid: number;
  readonly name: string;
  readonly cmdline: string;
}

export interface ProcessTableEntry {
  pid: number;
  name: string;
  cmd?: string;
}

export type ListProcesses = () => Promise<ProcessTableEntry[]>;

export type InspectorDeps = {
  listProcesses?: ListProcesses;
};

export const listProcessTable: ListProcesses = () => psList();

export function isSshProcessName(name: string): boolean {
  return SSH_PROCESS_NAMES.includes(name.toLowerCase());
}

function isAutosshProcess(proc: SshProcess): boolean {
  return AUTOSSH_PROCESS_NAMES.includes(proc.name.toLowerCase());
}

// Lazy, single-pass view over one snapshot of the process table.
export async function* listSshProcesses(deps: InspectorDeps = {}): AsyncGenerator<SshProcess> {
  const listProcesses = deps.listProcesses ?? listProcessTable;
  const table = await listProcesses();

  for (const entry of table) {
    if (!isSshProcessName(entry.name)) continue;
    yield { pid: entry.pid, name: entry.name, cmdline: entry.cmd || entry.name };
  }
}

export async function collectSshProcesses(deps: InspectorDeps = {}): Promise<SshProcess[]> {
  const processes: SshProcess[] = [];
  for await (const proc of listSshProcesses(deps)) {
    processes.push(proc);
  }
  return processes;
}

// Pure lookup. An autossh supervisor wins over its ssh child so stopping it does not trigger a respawn.
export function findTaggedProcess(
  processes: Iterable<SshProcess>,
  tag: string,
): SshProcess | undefined {
  let first: SshProcess | undefined;
  for (const proc of processes) {
    if (!hasTunnelTag(proc.cmdline, tag)) continue;
    if (isAutosshProcess(proc)) return proc;
    first ??= proc;
  }
  return first;
}

// The tagged ssh process itself, skipping autossh; it owns the forwarded sockets.
export function findTaggedSshChild(
  processes: Iterable<SshProcess>,
  tag: string,
): SshProcess | undefined {
  for (const proc of processes) {
    if (hasTunnelTag(proc.cmdline, tag) && !isAutosshProcess(proc)) return proc;
  }
  return undefined;
}
