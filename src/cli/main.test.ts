import { describe, expect, it, vi } from "vitest";
import type { TunnelConfig } from "../config/types";
import { ConfigError } from "../errors";
import { createBufferedReporter } from "../logging";
import type { SpawnOutcome } from "../process/spawn";
import { CLEAR_SCREEN } from "./config/status";
import { CLI_USAGE_TEXT } from "./config/usage";
import {
  parseGlobalOptions,
  parseStartOptions,
  parseStatusOptions,
  parseStopOptions,
  runCli,
} from "./main";
import type { CliDeps } from "./types";

const config: TunnelConfig = {
  path: "/tmp/tunnels.yaml",
  tunnels: [
    { name: "db", group: "prod", hostname: "bastion", forwarding: { kind: "dynamic", port: 1080 } },
    { name: "api", group: "prod", hostname: "bastion", forwarding: { kind: "dynamic", port: 1081 } },
  ],
  groups: [],
};

function createDeps(overrides: CliDeps = {}) {
  const out: string[] = [];
  const err: string[] = [];
  const reporter = createBufferedReporter();
  const spawn = vi.fn(async (): Promise<SpawnOutcome> => ({ ok: true, pid: 900 }));
  const loadConfig = vi.fn((_path?: string) => config);
  const deps: CliDeps = {
    reporter,
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
    loadConfig,
    lifecycle: {
      listProcesses: async () => [],
      spawn,
      which: (command) => (command === "ssh" ? "/usr/bin/ssh" : null),
      platform: "linux",
    },
    snapshot: { listProcesses: async () => [] },
    ...overrides,
  };
  return { deps, out, err, reporter, spawn, loadConfig };
}

describe("runCli", () => {
  it("prints the version", async () => {
    const { deps, out } = createDeps();
    expect(await runCli(["--version"], deps)).toBe(0);
    expect(out).toEqual(["tunnels 0.3.0\n"]);
  });

  it("prints usage without a command", async () => {
    const { deps, out } = createDeps();
    expect(await runCli([], deps)).toBe(0);
    expect(out).toEqual([CLI_USAGE_TEXT]);
  });

  it("prints usage for command-level help without loading config", async () => {
    const { deps, out, loadConfig } = createDeps();
    expect(await runCli(["start", "--help"], deps)).toBe(0);
    expect(out).toEqual([CLI_USAGE_TEXT]);
    expect(loadConfig).not.toHaveBeenCalled();
  });

  it("exits 1 on an unknown command", async () => {
    const { deps, err } = createDeps();
    expect(await runCli(["restart"], deps)).toBe(1);
    expect(err).toEqual(["Error: Unknown command: restart\n"]);
  });

  it("exits 1 when no selector is given", async () => {
    const { deps, err } = createDeps();
    expect(await runCli(["stop"], deps)).toBe(1);
    expect(err).toEqual(["Error: Exactly one of --name, --group, or --all must be specified.\n"]);
  });

  it("exits 1 on a configuration error", async () => {
    const { deps, err } = createDeps({
      loadConfig: () => {
        throw new ConfigError("Configuration file not found: /tmp/missing.yaml");
      },
    });
    expect(await runCli(["--config", "/tmp/missing.yaml", "status"], deps)).toBe(1);
    expect(err).toEqual(["Error: Configuration file not found: /tmp/missing.yaml\n"]);
  });

  it("passes --config to the loader", async () => {
    const { deps, loadConfig } = createDeps();
    await runCli(["-c", "/tmp/other.yaml", "status", "--format", "json"], deps);
    expect(loadConfig).toHaveBeenCalledWith("/tmp/other.yaml");
  });

  it("starts the selected tunnels and exits 0", async () => {
    const { deps, reporter, spawn } = createDeps();
    expect(await runCli(["start", "--group", "prod", "--no-autossh"], deps)).toBe(0);
    expect(spawn).toHaveBeenCalledTimes(2);
    expect(reporter.lines).toEqual([
      "Started tunnel 'db' using ssh",
      "Started tunnel 'api' using ssh",
      "Successfully started 2 tunnel(s)",
    ]);
  });

  it("exits 0 even when every tunnel fails to start", async () => {
    const { deps, spawn, reporter } = createDeps();
    spawn.mockImplementation(async () => ({
      ok: false,
      reason: "not-found",
      message: "spawn ssh ENOENT",
    }));
    expect(await runCli(["start", "--name", "db"], deps)).toBe(0);
    expect(reporter.lines.at(-1)).toBe("Failed to start any tunnels");
  });

  it("warns when --all matches nothing", async () => {
    const { deps, reporter } = createDeps({
      loadConfig: () => ({ path: null, tunnels: [], groups: [] }),
    });
    expect(await runCli(["stop", "--all"], deps)).toBe(0);
    expect(reporter.lines).toEqual(["No tunnels found matching criteria"]);
  });

  it("prints a status snapshot", async () => {
    const { deps, out } = createDeps();
    expect(await runCli(["status", "-f", "json", "--column", "name", "--column", "pid"], deps)).toBe(0);
    expect(JSON.parse(out.join(""))).toEqual([
      { name: "db", pid: "-" },
      { name: "api", pid: "-" },
    ]);
  });

  it("stops live status when the signal aborts", async () => {
    const controller = new AbortController();
    const out: string[] = [];
    const listProcesses = vi.fn(async () => []);
    const { deps } = createDeps({
      signal: controller.signal,
      snapshot: { listProcesses },
      stdout: (text) => {
        out.push(text);
        controller.abort();
      },
    });

    expect(await runCli(["status", "--live", "--format", "json"], deps)).toBe(0);
    expect(listProcesses).toHaveBeenCalledTimes(1);
    expect(out).toHaveLength(1);
    expect(out[0]?.startsWith(CLEAR_SCREEN)).toBe(true);
  });
});

describe("option parsing", () => {
  it("separates global options from the command", () => {
    expect(parseGlobalOptions(["-c", "cfg.yaml", "status", "-l"])).toEqual({
      options: { configPath: "cfg.yaml" },
      command: "status",
      rest: ["-l"],
    });
  });

  it("rejects unknown global options", () => {
    expect(() => parseGlobalOptions(["--verbose", "status"])).toThrow("Unknown option: --verbose");
  });

  it("collects repeated names and --no-autossh", () => {
    expect(parseStartOptions(["-n", "db", "--name", "api", "--no-autossh"])).toEqual({
      selection: { names: ["db", "api"] },
      useAutossh: false,
    });
  });

  it("does not accept --no-autossh for stop", () => {
    expect(() => parseStopOptions(["--all", "--no-autossh"])).toThrow(
      "Unknown option for stop: --no-autossh",
    );
  });

  it("parses status options", () => {
    expect(parseStatusOptions(["-l", "-f", "JSON", "--column", "name", "--kind", "tcp"])).toEqual({
      live: true,
      format: "json",
      columns: ["name"],
      kind: "tcp",
    });
  });

  it("defaults status to the panel format and inet4 sockets", () => {
    expect(parseStatusOptions([])).toEqual({
      live: false,
      format: "panel",
      columns: [],
      kind: "inet4",
    });
  });

  it("requires option values", () => {
    expect(() => parseStatusOptions(["--format"])).toThrow("Missing value for --format");
    expect(() => parseStartOptions(["--group", "--all"])).toThrow("Missing value for --group");
  });

  it("rejects an unknown socket kind", () => {
    expect(() => parseStatusOptions(["--kind", "sctp"])).toThrow(/^Invalid kind: sctp\./);
  });
});
