import { debug } from "../logging";
import { errorMessage } from "../errors";
import { runCommand, type RunCommand } from "./exec";
import { PROCESS_STATE_COMMAND, PROCESS_STATE_NAMES, processStateArgs } from "./config/processes";

export type ProcessStatusDeps = {
  runCommand?: RunCommand;
  platform?: NodeJS.Platform;
};

// Map `ps -o stat=` output ("Ss", "R+", "Z") to a lifecycle name; null when empty.
export function parseProcessState(stat: string): string | null {
  const letter = stat.trim().charAt(0);
  if (!letter) return null;
  return PROCESS_STATE_NAMES[letter] ?? "unknown";
}

// Lifecycle status of a live process, or null once it has gone away or cannot be read.
export async function processStatus(
  pid: number,
  deps: ProcessStatusDeps = {},
): Promise<string | null> {
  const platform = deps.platform ?? process.platform;
  if (platform === "win32") return "running";

  const run = deps.runCommand ?? runCommand;
  try {
    const { stdout } = await run(PROCESS_STATE_COMMAND, processStateArgs(pid));
    return parseProcessState(stdout);
  } catch (err) {
    debug(`status of pid ${pid} unavailable: ${errorMessage(err)}`);
    return null;
  }
}

export function titleCaseStatus(status: string): string {
  return status.toLowerCase().replace(/(^|-)([a-z])/g, (_match, sep: string, ch: string) => {
    return `${sep}${ch.toUpperCase()}`;
  });
}
