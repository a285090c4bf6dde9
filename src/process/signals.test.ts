import { describe, expect, it, vi } from "vitest";
import { isProcessAlive, sendSignal, waitForExit, type KillFn } from "./signals";

function systemError(code: string): Error {
  return Object.assign(new Error(`kill ${code}`), { code });
}

function throwing(code: string): KillFn {
  return () => {
    throw systemError(code);
  };
}

describe("sendSignal", () => {
  it("reports a delivered signal", () => {
    const kill = vi.fn(() => true);
    expect(sendSignal(42, "SIGTERM", { kill })).toBe("sent");
    expect(kill).toHaveBeenCalledWith(42, "SIGTERM");
  });

  it("maps ESRCH and EPERM", () => {
    expect(sendSignal(42, "SIGTERM", { kill: throwing("ESRCH") })).toBe("no-such-process");
    expect(sendSignal(42, "SIGKILL", { kill: throwing("EPERM") })).toBe("access-denied");
  });

  it("rethrows anything else", () => {
    expect(() => sendSignal(42, "SIGTERM", { kill: throwing("EINVAL") })).toThrow("kill EINVAL");
  });
});

describe("isProcessAlive", () => {
  it("treats EPERM as alive and ESRCH as gone", () => {
    expect(isProcessAlive(42, { kill: () => true })).toBe(true);
    expect(isProcessAlive(42, { kill: throwing("EPERM") })).toBe(true);
    expect(isProcessAlive(42, { kill: throwing("ESRCH") })).toBe(false);
  });
});

describe("waitForExit", () => {
  function fakeClock() {
    let now = 0;
    return {
      now: () => now,
      sleep: vi.fn(async (ms: number) => {
        now += ms;
      }),
    };
  }

  it("resolves true once the process is gone", async () => {
    const clock = fakeClock();
    let probes = 0;
    const kill: KillFn = () => {
      probes += 1;
      if (probes > 2) throw systemError("ESRCH");
      return true;
    };

    expect(await waitForExit(42, 5000, 100, { kill, ...clock })).toBe(true);
    expect(clock.sleep).toHaveBeenCalledTimes(2);
  });

  it("resolves false when the process outlives the timeout", async () => {
    const clock = fakeClock();

    expect(await waitForExit(42, 300, 100, { kill: () => true, ...clock })).toBe(false);
    expect(clock.sleep).toHaveBeenCalledTimes(3);
  });
});
