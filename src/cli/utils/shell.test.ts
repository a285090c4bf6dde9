import { describe, expect, it } from "vitest";
import { formatCommandLine, quoteShellArg } from "./shell";

describe("quoteShellArg", () => {
  it("leaves plain arguments alone", () => {
    expect(quoteShellArg("-o")).toBe("-o");
    expect(quoteShellArg("Tag=tunnels-db")).toBe("Tag=tunnels-db");
  });

  it("single-quotes arguments with shell metacharacters", () => {
    expect(quoteShellArg("[127.0.0.1:]8080")).toBe("'[127.0.0.1:]8080'");
    expect(quoteShellArg("it's")).toBe("'it'\\''s'");
    expect(quoteShellArg("")).toBe("''");
  });

  it("joins a full argv", () => {
    expect(formatCommandLine(["ssh", "-D", "1080", "my host"])).toBe("ssh -D 1080 'my host'");
  });
});
