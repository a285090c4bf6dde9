const ANSI_SGR_PATTERN = "\\x1b\\[[0-9;]*m";

const ANSI_REGEX = new RegExp(ANSI_SGR_PATTERN, "g");

export function stripAnsi(input: string): string {
  return input.replace(ANSI_REGEX, "");
}

export function visibleWidth(input: string): number {
  return Array.from(stripAnsi(input)).length;
}
