import { describe, expect, it } from "vitest";
import type { Tunnel } from "../config/types";
import { UsageError } from "../errors";
import { SELECTOR_USAGE_MESSAGE, selectTunnels } from "./select";

function tunnel(name: string, group?: string): Tunnel {
  return { name, group, hostname: "bastion", forwarding: { kind: "dynamic", port: 1080 } };
}

const tunnels = [tunnel("db", "prod"), tunnel("api", "prod"), tunnel("socks")];

describe("selectTunnels", () => {
  it("selects everything with all", () => {
    expect(selectTunnels(tunnels, { all: true }).map((t) => t.name)).toEqual(["db", "api", "socks"]);
  });

  it("selects names in the order given", () => {
    expect(selectTunnels(tunnels, { names: ["socks", "db"] }).map((t) => t.name)).toEqual([
      "socks",
      "db",
    ]);
  });

  it("selects group members", () => {
    expect(selectTunnels(tunnels, { group: "prod" }).map((t) => t.name)).toEqual(["db", "api"]);
  });

  it("requires exactly one selector", () => {
    expect(() => selectTunnels(tunnels, {})).toThrow(SELECTOR_USAGE_MESSAGE);
    expect(() => selectTunnels(tunnels, { names: [] })).toThrow(UsageError);
    expect(() => selectTunnels(tunnels, { all: true, group: "prod" })).toThrow(
      SELECTOR_USAGE_MESSAGE,
    );
    expect(() => selectTunnels(tunnels, { names: ["db"], all: true })).toThrow(UsageError);
  });

  it("fails on the first unknown name", () => {
    expect(() => selectTunnels(tunnels, { names: ["db", "nope", "also-nope"] })).toThrow(
      "Tunnel not found: nope",
    );
  });

  it("fails on an unknown group", () => {
    expect(() => selectTunnels(tunnels, { group: "staging" })).toThrow("Group not found: staging");
  });

  it("returns an empty list for all on an empty config", () => {
    expect(selectTunnels([], { all: true })).toEqual([]);
  });
});
