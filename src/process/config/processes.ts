// Executable names treated as tunnel candidates. autossh forks an ssh child carrying the same argv.
export const SSH_PROCESS_NAMES = ["ssh", "autossh", "ssh.exe", "autossh.exe"];
export const AUTOSSH_PROCESS_NAMES = ["autossh", "autossh.exe"];

// `ps` state letters (Linux and BSD/macOS) mapped to lifecycle names.
export const PROCESS_STATE_NAMES: Record<string, string> = {
  R: "running",
  S: "sleeping",
  D: "disk-sleep",
  U: "disk-sleep",
  T: "stopped",
  t: "tracing-stop",
  Z: "zombie",
  X: "dead",
  I: "idle",
  W: "paging",
};

export const PROCESS_STATE_COMMAND = "ps";

export function processStateArgs(pid: number): string[] {
  return ["-o", "stat=", "-p", String(pid)];
}

// Platform-specific socket listing: `ss` on Linux, `lsof` on macOS.
export const SOCKET_LIST_COMMANDS: Partial<Record<NodeJS.Platform, string>> = {
  linux: "ss",
  darwin: "lsof",
};

export const SS_BASE_ARGS = ["-H", "-n", "-a", "-p"];
