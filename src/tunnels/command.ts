import { existsSync } from "fs";
import { delimiter, join } from "path";
import { forwardingAddress, forwardingFlag } from "../config/forwarding";
import type { Tunnel } from "../config/types";
import { tagOption, tunnelTag } from "./tag";
import {
  AUTOSSH_EXECUTABLE,
  AUTOSSH_MONITOR_FLAGS,
  SSH_BACKGROUND_FLAGS,
  SSH_EXECUTABLE,
  SSH_TUNNEL_OPTIONS,
  WINDOWS_SSH_FALLBACK,
} from "./config/ssh";

export type Launcher = "autossh" | "ssh";

export interface StartCommand {
  argv: string[];
  launcher: Launcher;
}

export type ResolveExecutable = (command: string) => string | null;

export type CommandDeps = {
  which?: ResolveExecutable;
  platform?: NodeJS.Platform;
};

function pathExtensions(): string[] {
  if (process.platform !== "win32") return [""];
  const pathext = process.env.PATHEXT ?? process.env.PathExt ?? ".EXE;.CMD;.BAT;.COM";
  return ["", ...pathext.split(";").map((ext) => ext.toLowerCase())];
}

// First match for `command` in the directories on PATH, or null.
export const resolveOnPath: ResolveExecutable = (command) => {
  const dirs = (process.env.PATH ?? process.env.Path ?? "").split(delimiter).filter(Boolean);
  const extensions = pathExtensions();
  for (const dir of dirs) {
    for (const ext of extensions) {
      const candidate = join(dir, command + ext);
      if (existsSync(candidate)) return candidate;
    }
  }
  return null;
};

export function resolveSshExecutable(deps: CommandDeps = {}): string {
  const lookup = deps.which ?? resolveOnPath;
  const platform = deps.platform ?? process.platform;
  if (platform === "win32") {
    return lookup(`${SSH_EXECUTABLE}.exe`) ?? lookup(SSH_EXECUTABLE) ?? WINDOWS_SSH_FALLBACK;
  }
  return lookup(SSH_EXECUTABLE) ?? SSH_EXECUTABLE;
}

export function resolveAutosshExecutable(deps: CommandDeps = {}): string | null {
  const lookup = deps.which ?? resolveOnPath;
  const platform = deps.platform ?? process.platform;
  if (platform === "win32") {
    return lookup(`${AUTOSSH_EXECUTABLE}.exe`) ?? lookup(AUTOSSH_EXECUTABLE);
  }
  return lookup(AUTOSSH_EXECUTABLE);
}

// Build the argv that launches a tunnel in the background, tagged for later discovery.
export function buildStartCommand(
  tunnel: Tunnel,
  useAutossh: boolean,
  deps: CommandDeps = {},
): StartCommand {
  const autossh = useAutossh ? resolveAutosshExecutable(deps) : null;
  const argv = autossh
    ? [autossh, ...AUTOSSH_MONITOR_FLAGS, ...SSH_BACKGROUND_FLAGS]
    : [resolveSshExecutable(deps), ...SSH_BACKGROUND_FLAGS];

  argv.push(forwardingFlag(tunnel.forwarding), forwardingAddress(tunnel.forwarding));
  argv.push(tunnel.hostname);
  argv.push("-o", tagOption(tunnelTag(tunnel.name)));
  for (const option of SSH_TUNNEL_OPTIONS) {
    argv.push("-o", option);
  }

  return { argv, launcher: autossh ? "autossh" : "ssh" };
}
