import { execFile } from "child_process";
import { promisify } from "util";

const execFileAsync = promisify(execFile);

export type RunCommand = (file: string, args: readonly string[]) => Promise<{ stdout: string }>;

// Run a short-lived inspection command and return its stdout; rejects on non-zero exit.
export const runCommand: RunCommand = async (file, args) => {
  const { stdout } = await execFileAsync(file, [...args], { encoding: "utf8", windowsHide: true });
  return { stdout };
};
