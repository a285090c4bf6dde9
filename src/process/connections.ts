import { debug } from "../logging";
import { errorMessage } from "../errors";
import { runCommand, type RunCommand } from "./exec";
import { SOCKET_LIST_COMMANDS, SS_BASE_ARGS } from "./config/processes";

export const CONNECTION_KINDS = [
  "inet",
  "inet4",
  "inet6",
  "tcp",
  "tcp4",
  "tcp6",
  "udp",
  "udp4",
  "udp6",
  "unix",
  "all",
] as const;

export type ConnectionKind = (typeof CONNECTION_KINDS)[number];

export const DEFAULT_CONNECTION_KIND: ConnectionKind = "inet4";

const SS_KIND_FLAGS: Record<ConnectionKind, string[]> = {
  inet: ["-t", "-u"],
  inet4: ["-t", "-u", "-4"],
  inet6: ["-t", "-u", "-6"],
  tcp: ["-t"],
  tcp4: ["-t", "-4"],
  tcp6: ["-t", "-6"],
  udp: ["-u"],
  udp4: ["-u", "-4"],
  udp6: ["-u", "-6"],
  unix: ["-x"],
  all: ["-t", "-u", "-x"],
};

// lsof ANDs selections under -a, so "all" can only ask for internet sockets.
const LSOF_KIND_FLAGS: Record<ConnectionKind, string[]> = {
  inet: ["-i"],
  inet4: ["-i4"],
  inet6: ["-i6"],
  tcp: ["-iTCP"],
  tcp4: ["-i4TCP"],
  tcp6: ["-i6TCP"],
  udp: ["-iUDP"],
  udp4: ["-i4UDP"],
  udp6: ["-i6UDP"],
  unix: ["-U"],
  all: ["-i"],
};

export type ConnectionDeps = {
  runCommand?: RunCommand;
  platform?: NodeJS.Platform;
};

export function isConnectionKind(value: string): value is ConnectionKind {
  return CONNECTION_KINDS.some((kind) => kind === value);
}

function uniqueSorted(values: Iterable<string>): string[] {
  return [...new Set(values)].sort();
}

// "127.0.0.1:22", "[::1]:22", "10.0.0.5%eth0:22" → "ip:port"; wildcard ports yield null.
export function normalizeEndpoint(token: string): string | null {
  const separator = token.lastIndexOf(":");
  if (separator <= 0) return null;

  let host = token.slice(0, separator);
  const port = token.slice(separator + 1);
  if (!port || port === "*") return null;

  if (host.startsWith("[") && host.endsWith("]")) {
    host = host.slice(1, -1);
  }
  const scope = host.indexOf("%");
  if (scope >= 0) {
    host = host.slice(0, scope);
  }
  return host ? `${host}:${port}` : null;
}

function ownedByPid(processColumn: string, pid: number): boolean {
  return new RegExp(`pid=${pid}(?:,|\\))`).test(processColumn);
}

// Parse `ss -H -n -a -p` output, keeping sockets owned by `pid`.
export function parseSsConnections(stdout: string, pid: number, kind: ConnectionKind): string[] {
  const endpoints: string[] = [];

  for (const line of stdout.split("\n")) {
    const tokens = line.trim().split(/\s+/);
    const usersIndex = tokens.findIndex((token) => token.startsWith("users:"));
    if (usersIndex < 0) continue;

    const processColumn = tokens.slice(usersIndex).join(" ");
    if (!ownedByPid(processColumn, pid)) continue;

    const isUnix = kind === "unix" || (tokens[0] ?? "").startsWith("u_");
    if (isUnix) {
      // Local and peer are "<path> <inode>" pairs.
      for (const path of [tokens[usersIndex - 4], tokens[usersIndex - 2]]) {
        if (path && path !== "*") endpoints.push(path);
      }
      continue;
    }

    for (const token of [tokens[usersIndex - 2], tokens[usersIndex - 1]]) {
      const endpoint = token ? normalizeEndpoint(token) : null;
      if (endpoint) endpoints.push(endpoint);
    }
  }

  return uniqueSorted(endpoints);
}

// Parse `lsof -F n` output: name lines look like "n127.0.0.1:5000->10.0.0.2:22".
export function parseLsofConnections(stdout: string, kind: ConnectionKind): string[] {
  const endpoints: string[] = [];

  for (const line of stdout.split("\n")) {
    if (!line.startsWith("n")) continue;
    const name = line.slice(1).trim();

    if (kind === "unix") {
      if (name.startsWith("/")) endpoints.push(name.split(" ")[0] ?? name);
      continue;
    }

    for (const part of name.split("->")) {
      const endpoint = normalizeEndpoint(part.trim());
      if (endpoint) endpoints.push(endpoint);
    }
  }

  return uniqueSorted(endpoints);
}

// Sorted, deduplicated socket endpoints of a process; empty once it exits or access is denied.
export async function socketConnections(
  pid: number,
  kind: ConnectionKind = DEFAULT_CONNECTION_KIND,
  deps: ConnectionDeps = {},
): Promise<string[]> {
  const platform = deps.platform ?? process.platform;
  const command = SOCKET_LIST_COMMANDS[platform];
  if (!command) return [];

  const run = deps.runCommand ?? runCommand;
  try {
    if (command === "ss") {
      const { stdout } = await run(command, [...SS_BASE_ARGS, ...SS_KIND_FLAGS[kind]]);
      return parseSsConnections(stdout, pid, kind);
    }
    const { stdout } = await run(command, [
      "-a",
      "-n",
      "-P",
      "-F",
      "n",
      "-p",
      String(pid),
      ...LSOF_KIND_FLAGS[kind],
    ]);
    return parseLsofConnections(stdout, kind);
  } catch (err) {
    debug(`connections of pid ${pid} unavailable: ${errorMessage(err)}`);
    return [];
  }
}
