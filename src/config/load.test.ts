import { describe, expect, it } from "vitest";
import { ConfigError } from "../errors";
import { EMPTY_CONFIG, loadConfig, parseConfig, resolveConfigPath } from "./load";

const SAMPLE = `
tunnels:
  - name: db
    hostname: bastion
    local:
      port: 8080
      host: db.internal
      host_port: 5432
groups:
  - name: staging
    tunnels:
      - name: socks
        hostname: jump.staging
        dynamic:
          port: 1080
          bind_address: 127.0.0.1
      - name: cache
        group: shared
        hostname: jump.staging
        local:
          local_socket: /tmp/a.sock
          remote_socket: /run/b.sock
`;

describe("parseConfig", () => {
  it("flattens top-level tunnels and group members", () => {
    const config = parseConfig(SAMPLE, "/etc/tunnels.yaml");

    expect(config.path).toBe("/etc/tunnels.yaml");
    expect(config.tunnels.map((tunnel) => tunnel.name)).toEqual(["db", "socks", "cache"]);
    expect(config.groups.map((group) => group.name)).toEqual(["staging"]);
  });

  it("maps snake_case keys onto the forwarding union", () => {
    const [db, socks] = parseConfig(SAMPLE, "cfg").tunnels;

    expect(db?.forwarding).toEqual({
      kind: "local",
      port: 8080,
      host: "db.internal",
      hostPort: 5432,
    });
    expect(socks?.forwarding).toEqual({ kind: "dynamic", port: 1080, bindAddress: "127.0.0.1" });
  });

  it("gives group members the group name unless they set their own", () => {
    const tunnels = parseConfig(SAMPLE, "cfg").tunnels;

    expect(tunnels[0]?.group).toBeUndefined();
    expect(tunnels[1]?.group).toBe("staging");
    expect(tunnels[2]?.group).toBe("shared");
  });

  it("returns frozen tunnels", () => {
    const [db] = parseConfig(SAMPLE, "cfg").tunnels;
    expect(Object.isFrozen(db)).toBe(true);
  });

  it("treats an empty document as no tunnels", () => {
    expect(parseConfig("", "cfg").tunnels).toEqual([]);
  });

  it("reports YAML syntax errors with the source", () => {
    expect(() => parseConfig("tunnels: [", "cfg.yaml")).toThrow(/^Failed to parse cfg\.yaml: /);
  });

  it("lists schema issues with their locations", () => {
    const raw = `
tunnels:
  - name: db
    hostname: bastion
    local:
      port: 8080
      host: db.internal
`;
    let error: unknown;
    try {
      parseConfig(raw, "cfg");
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(ConfigError);
    expect(error instanceof Error ? error.message : "").toBe(
      "Invalid configuration in cfg:\n" +
        "  tunnels.0.local: Invalid combination of values. Please check the configuration.",
    );
  });

  it("requires exactly one forwarding kind", () => {
    const raw = `
tunnels:
  - name: db
    hostname: bastion
`;
    expect(() => parseConfig(raw, "cfg")).toThrow(
      "  tunnels.0: Exactly one of 'dynamic' or 'local' must be set",
    );
  });

  it("rejects out-of-range ports", () => {
    const raw = `
tunnels:
  - name: socks
    hostname: bastion
    dynamic:
      port: 70000
`;
    expect(() => parseConfig(raw, "cfg")).toThrow(/tunnels\.0\.dynamic\.port: /);
  });

  it("rejects duplicate names across groups", () => {
    const raw = `
tunnels:
  - name: db
    hostname: a
    dynamic: { port: 1080 }
groups:
  - name: g
    tunnels:
      - name: db
        hostname: b
        dynamic: { port: 1081 }
`;
    expect(() => parseConfig(raw, "cfg")).toThrow("Duplicate tunnel name 'db' in cfg");
  });
});

describe("resolveConfigPath", () => {
  it("prefers the explicit path", () => {
    expect(
      resolveConfigPath("/tmp/explicit.yaml", { env: { TUNNELS_CONFIG: "/tmp/env.yaml" } }),
    ).toEqual({ path: "/tmp/explicit.yaml", explicit: true });
  });

  it("falls back to TUNNELS_CONFIG", () => {
    expect(resolveConfigPath(undefined, { env: { TUNNELS_CONFIG: "/tmp/env.yaml" } })).toEqual({
      path: "/tmp/env.yaml",
      explicit: true,
    });
  });

  it("uses XDG_CONFIG_HOME, then ~/.config", () => {
    expect(resolveConfigPath(undefined, { env: { XDG_CONFIG_HOME: "/xdg" } })).toEqual({
      path: "/xdg/tunnels/config.yaml",
      explicit: false,
    });
    expect(resolveConfigPath(undefined, { env: {}, homedir: () => "/home/test" })).toEqual({
      path: "/home/test/.config/tunnels/config.yaml",
      explicit: false,
    });
  });
});

describe("loadConfig", () => {
  it("returns an empty config when the default file is missing", () => {
    const config = loadConfig(undefined, {
      env: { XDG_CONFIG_HOME: "/xdg" },
      existsSync: () => false,
    });
    expect(config).toBe(EMPTY_CONFIG);
  });

  it("fails when an explicit file is missing", () => {
    expect(() =>
      loadConfig("/tmp/missing.yaml", { env: {}, existsSync: () => false }),
    ).toThrow("Configuration file not found: /tmp/missing.yaml");
  });

  it("reads and parses the resolved file", () => {
    const reads: string[] = [];
    const config = loadConfig(undefined, {
      env: { TUNNELS_CONFIG: "/tmp/env.yaml" },
      existsSync: () => true,
      readFileSync: (path) => {
        reads.push(path);
        return SAMPLE;
      },
    });

    expect(reads).toEqual(["/tmp/env.yaml"]);
    expect(config.path).toBe("/tmp/env.yaml");
    expect(config.tunnels).toHaveLength(3);
  });

  it("wraps read failures", () => {
    expect(() =>
      loadConfig("/tmp/cfg.yaml", {
        env: {},
        existsSync: () => true,
        readFileSync: () => {
          throw new Error("EACCES: permission denied");
        },
      }),
    ).toThrow("Failed to read /tmp/cfg.yaml: EACCES: permission denied");
  });
});
