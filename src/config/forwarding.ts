import { ConfigError } from "../errors";

// SOCKS proxy served by ssh on a local port (`ssh -D`).
export interface DynamicForwarding {
  readonly kind: "dynamic";
  readonly port: number;
  readonly bindAddress?: string;
}

// Local port or socket forwarded to a remote host:port or socket (`ssh -L`).
export interface LocalForwarding {
  readonly kind: "local";
  readonly port?: number;
  readonly localSocket?: string;
  readonly host?: string;
  readonly remoteSocket?: string;
  readonly hostPort?: number;
  readonly bindAddress?: string;
}

export type Forwarding = DynamicForwarding | LocalForwarding;

export type LocalField = Exclude<keyof LocalForwarding, "kind">;

export const INVALID_LOCAL_COMBINATION_MESSAGE =
  "Invalid combination of values. Please check the configuration.";

// The populated field set of a local forward must equal exactly one of these.
export const LOCAL_COMBINATIONS: ReadonlyArray<readonly LocalField[]> = [
  ["localSocket", "remoteSocket"],
  ["localSocket", "host", "hostPort"],
  ["port", "host", "hostPort"],
  ["port", "remoteSocket"],
  ["bindAddress", "port", "host", "hostPort"],
  ["bindAddress", "port", "remoteSocket"],
];

// Rendering order after the optional bind prefix.
const LOCAL_SEGMENT_ORDER: readonly LocalField[] = [
  "port",
  "localSocket",
  "host",
  "remoteSocket",
  "hostPort",
];

function isPopulated(value: string | number | undefined): boolean {
  return value !== undefined && value !== "";
}

function bindPrefix(bindAddress: string | undefined): string {
  return bindAddress ? `[${bindAddress}:]` : "";
}

export function populatedLocalFields(forward: Omit<LocalForwarding, "kind">): Set<LocalField> {
  const fields = new Set<LocalField>();
  const keys: LocalField[] = ["bindAddress", ...LOCAL_SEGMENT_ORDER];
  for (const key of keys) {
    if (isPopulated(forward[key])) fields.add(key);
  }
  return fields;
}

// Returns the single combination whose fields are exactly the populated ones, or null.
export function matchLocalCombination(
  forward: Omit<LocalForwarding, "kind">,
): readonly LocalField[] | null {
  const populated = populatedLocalFields(forward);
  const matches = LOCAL_COMBINATIONS.filter(
    (combination) =>
      combination.length === populated.size && combination.every((field) => populated.has(field)),
  );
  return matches.length === 1 ? (matches[0] ?? null) : null;
}

export function isValidLocalForwarding(forward: Omit<LocalForwarding, "kind">): boolean {
  return matchLocalCombination(forward) !== null;
}

export function dynamicAddress(forward: DynamicForwarding): string {
  return `${bindPrefix(forward.bindAddress)}${forward.port}`;
}

export function localAddress(forward: LocalForwarding): string {
  if (!matchLocalCombination(forward)) {
    throw new ConfigError(INVALID_LOCAL_COMBINATION_MESSAGE);
  }

  const segments: string[] = [];
  for (const field of LOCAL_SEGMENT_ORDER) {
    const value = forward[field];
    if (value !== undefined && value !== "") segments.push(String(value));
  }
  return `${bindPrefix(forward.bindAddress)}${segments.join(":")}`;
}

export function forwardingAddress(forwarding: Forwarding): string {
  switch (forwarding.kind) {
    case "dynamic":
      return dynamicAddress(forwarding);
    case "local":
      return localAddress(forwarding);
  }
}

export function forwardingFlag(forwarding: Forwarding): "-D" | "-L" {
  switch (forwarding.kind) {
    case "dynamic":
      return "-D";
    case "local":
      return "-L";
  }
}
