import { describe, expect, it, vi } from "vitest";
import {
  collectSshProcesses,
  findTaggedProcess,
  findTaggedSshChild,
  listSshProcesses,
  type SshProcess,
} from "./inspector";

const table = [
  { pid: 1, name: "bash", cmd: "bash -l" },
  { pid: 2, name: "ssh", cmd: "ssh -f -N -n -D 1080 jump -o Tag=tunnels-db" },
  { pid: 3, name: "autossh" },
  { pid: 4, name: "SSH.EXE", cmd: "ssh.exe -o Tag=tunnels-win" },
];

describe("listSshProcesses", () => {
  it("yields only ssh-family processes", async () => {
    const seen: number[] = [];
    for await (const proc of listSshProcesses({ listProcesses: async () => table })) {
      seen.push(proc.pid);
    }
    expect(seen).toEqual([2, 3, 4]);
  });

  it("falls back to the executable name when the command line is missing", async () => {
    const processes = await collectSshProcesses({ listProcesses: async () => table });
    expect(processes[1]).toEqual({ pid: 3, name: "autossh", cmdline: "autossh" });
  });

  it("reads the process table once per call", async () => {
    const listProcesses = vi.fn(async () => table);
    await collectSshProcesses({ listProcesses });
    expect(listProcesses).toHaveBeenCalledTimes(1);
  });

  it("propagates a failure to read the process table", async () => {
    await expect(
      collectSshProcesses({
        listProcesses: async () => {
          throw new Error("ps failed");
        },
      }),
    ).rejects.toThrow("ps failed");
  });
});

describe("findTaggedProcess", () => {
  const ssh: SshProcess = { pid: 11, name: "ssh", cmdline: "ssh host -o Tag=tunnels-db" };
  const autossh: SshProcess = { pid: 10, name: "autossh", cmdline: "autossh -M 0 host -o Tag=tunnels-db" };
  const other: SshProcess = { pid: 12, name: "ssh", cmdline: "ssh host -o Tag=tunnels-db-replica" };

  it("returns undefined when nothing carries the tag", () => {
    expect(findTaggedProcess([other], "tunnels-db")).toBeUndefined();
  });

  it("returns the first plain match", () => {
    expect(findTaggedProcess([other, ssh], "tunnels-db")).toBe(ssh);
  });

  it("prefers the autossh supervisor", () => {
    expect(findTaggedProcess([ssh, autossh], "tunnels-db")).toBe(autossh);
  });
});

describe("findTaggedSshChild", () => {
  const ssh: SshProcess = { pid: 21, name: "ssh", cmdline: "ssh host -o Tag=tunnels-db" };
  const autossh: SshProcess = { pid: 20, name: "autossh", cmdline: "autossh -M 0 host -o Tag=tunnels-db" };

  it("skips the autossh supervisor", () => {
    expect(findTaggedSshChild([autossh, ssh], "tunnels-db")).toBe(ssh);
  });

  it("returns undefined when only autossh carries the tag", () => {
    expect(findTaggedSshChild([autossh], "tunnels-db")).toBeUndefined();
  });
});
