import * as fs from "fs";
import { homedir } from "os";
import { resolve } from "path";
import YAML from "yaml";
import type { ZodIssue } from "zod";
import { CONFIG_ENV_VAR, defaultConfigPath } from "../cli/config/paths";
import { ConfigError, errorMessage } from "../errors";
import { configFileSchema, toTunnel, toTunnelGroups } from "./schema";
import type { Tunnel, TunnelConfig } from "./types";

export type LoadConfigDeps = {
  env?: NodeJS.ProcessEnv;
  homedir?: () => string;
  existsSync?: (path: string) => boolean;
  readFileSync?: (path: string, encoding: "utf-8") => string;
};

export interface ResolvedConfigPath {
  path: string;
  // True when the path came from --config or the environment rather than the default.
  explicit: boolean;
}

export const EMPTY_CONFIG: TunnelConfig = Object.freeze({ path: null, tunnels: [], groups: [] });

export function resolveConfigPath(
  explicitPath: string | undefined,
  deps: LoadConfigDeps = {},
): ResolvedConfigPath {
  const env = deps.env ?? process.env;
  if (explicitPath?.trim()) {
    return { path: resolve(explicitPath), explicit: true };
  }

  const fromEnv = env[CONFIG_ENV_VAR]?.trim();
  if (fromEnv) {
    return { path: resolve(fromEnv), explicit: true };
  }

  return { path: defaultConfigPath(env, deps.homedir ?? homedir), explicit: false };
}

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `  ${location}: ${issue.message}`;
    })
    .join("\n");
}

function assertUniqueNames(tunnels: readonly Tunnel[], source: string): void {
  const seen = new Set<string>();
  for (const tunnel of tunnels) {
    if (seen.has(tunnel.name)) {
      throw new ConfigError(`Duplicate tunnel name '${tunnel.name}' in ${source}`, source);
    }
    seen.add(tunnel.name);
  }
}

// Parse and validate YAML configuration text.
export function parseConfig(raw: string, source: string): TunnelConfig {
  let document: unknown;
  try {
    document = YAML.parse(raw);
  } catch (err) {
    throw new ConfigError(`Failed to parse ${source}: ${errorMessage(err)}`, source);
  }

  const result = configFileSchema.safeParse(document ?? {});
  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration in ${source}:\n${formatIssues(result.error.issues)}`,
      source,
    );
  }

  const topLevel = (result.data.tunnels ?? []).map((entry) => toTunnel(entry));
  const groups = toTunnelGroups(result.data);
  const tunnels = [...topLevel, ...groups.flatMap((group) => group.tunnels)];
  assertUniqueNames(tunnels, source);

  return { path: source, tunnels, groups };
}

export function loadConfig(explicitPath?: string, deps: LoadConfigDeps = {}): TunnelConfig {
  const existsSync = deps.existsSync ?? fs.existsSync;
  const readFileSync = deps.readFileSync ?? fs.readFileSync;
  const { path, explicit } = resolveConfigPath(explicitPath, deps);

  if (!existsSync(path)) {
    if (explicit) {
      throw new ConfigError(`Configuration file not found: ${path}`, path);
    }
    return EMPTY_CONFIG;
  }

  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (err) {
    throw new ConfigError(`Failed to read ${path}: ${errorMessage(err)}`, path);
  }

  return parseConfig(raw, path);
}
