// Bad selector combinations, unknown tunnel names or groups, and malformed CLI options.
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

// Missing or unreadable configuration files and schema violations.
export class ConfigError extends Error {
  readonly path: string | null;

  constructor(message: string, path: string | null = null) {
    super(message);
    this.name = "ConfigError";
    this.path = path;
  }
}

export function isUsageError(err: unknown): err is UsageError {
  return err instanceof UsageError;
}

export function isConfigError(err: unknown): err is ConfigError {
  return err instanceof ConfigError;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

// Node system errors carry a string `code` such as ENOENT or ESRCH.
export function errorCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
