// Namespace that keeps tunnel tags apart from unrelated ssh invocations on the host.
export const TAG_PREFIX = "tunnels-";

export function tunnelTag(name: string): string {
  const normalized = name.trim().toLowerCase().replace(/\s+/g, "-");
  return `${TAG_PREFIX}${normalized}`;
}

export function tagOption(tag: string): string {
  return `Tag=${tag}`;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// Matches the whole `Tag=<tag>` token so `tunnels-api` does not match `tunnels-api-gateway`.
export function hasTunnelTag(cmdline: string, tag: string): boolean {
  const pattern = new RegExp(`(?:^|\\s)${escapeRegExp(tagOption(tag))}(?=\\s|$)`);
  return pattern.test(cmdline);
}
