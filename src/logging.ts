import { theme } from "./output/theme";

// User-facing progress lines for start/stop and other commands.
export interface Reporter {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  note(message: string): void;
}

export interface BufferedReporter extends Reporter {
  readonly lines: string[];
}

export function createConsoleReporter(): Reporter {
  return {
    info: (message) => console.log(message),
    success: (message) => console.log(theme.success(message)),
    warn: (message) => console.log(theme.warn(message)),
    error: (message) => console.error(theme.error(message)),
    note: (message) => console.log(theme.muted(message)),
  };
}

// Collects plain lines; used where stdout is reserved (MCP stdio) and in tests.
export function createBufferedReporter(): BufferedReporter {
  const lines: string[] = [];
  const push = (message: string) => {
    lines.push(message);
  };
  return { lines, info: push, success: push, warn: push, error: push, note: push };
}

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.TUNNELS_DEBUG?.trim().toLowerCase();
  return value === "1" || value === "true";
}

export function debug(message: string): void {
  if (!isDebugEnabled()) return;
  process.stderr.write(`[tunnels][debug] ${message}\n`);
}
