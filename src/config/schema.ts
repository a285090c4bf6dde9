import { z } from "zod";
import {
  INVALID_LOCAL_COMBINATION_MESSAGE,
  isValidLocalForwarding,
  type Forwarding,
} from "./forwarding";
import type { Tunnel, TunnelGroup } from "./types";

const portSchema = z.number().int().min(1).max(65535);

// YAML leaves `key:` with no value as null; treat it like an absent key.
const optionalText = z
  .string()
  .min(1)
  .nullish()
  .transform((value) => value ?? undefined);

const optionalPort = portSchema.nullish().transform((value) => value ?? undefined);

export const dynamicSchema = z
  .object({
    port: portSchema,
    bind_address: optionalText,
  })
  .strict();

export const localSchema = z
  .object({
    port: optionalPort,
    local_socket: optionalText,
    host: optionalText,
    remote_socket: optionalText,
    host_port: optionalPort,
    bind_address: optionalText,
  })
  .strict()
  .superRefine((value, ctx) => {
    const valid = isValidLocalForwarding({
      port: value.port,
      localSocket: value.local_socket,
      host: value.host,
      remoteSocket: value.remote_socket,
      hostPort: value.host_port,
      bindAddress: value.bind_address,
    });
    if (!valid) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: INVALID_LOCAL_COMBINATION_MESSAGE });
    }
  });

export const tunnelSchema = z
  .object({
    name: z.string().trim().min(1),
    group: optionalText,
    hostname: z.string().min(1),
    dynamic: dynamicSchema.nullish(),
    local: localSchema.nullish(),
  })
  .strict()
  .superRefine((value, ctx) => {
    const hasDynamic = value.dynamic != null;
    const hasLocal = value.local != null;
    if (hasDynamic === hasLocal) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Exactly one of 'dynamic' or 'local' must be set",
      });
    }
  });

export const tunnelGroupSchema = z
  .object({
    name: z.string().trim().min(1),
    tunnels: z.array(tunnelSchema).nullish(),
  })
  .strict();

export const configFileSchema = z
  .object({
    tunnels: z.array(tunnelSchema).nullish(),
    groups: z.array(tunnelGroupSchema).nullish(),
  })
  .strict();

export type TunnelEntry = z.infer<typeof tunnelSchema>;
export type ConfigFile = z.infer<typeof configFileSchema>;

function toForwarding(entry: TunnelEntry): Forwarding {
  if (entry.dynamic) {
    return { kind: "dynamic", port: entry.dynamic.port, bindAddress: entry.dynamic.bind_address };
  }
  if (entry.local) {
    return {
      kind: "local",
      port: entry.local.port,
      localSocket: entry.local.local_socket,
      host: entry.local.host,
      remoteSocket: entry.local.remote_socket,
      hostPort: entry.local.host_port,
      bindAddress: entry.local.bind_address,
    };
  }
  // Unreachable after schema validation.
  throw new Error(`Tunnel '${entry.name}' has no forwarding specification`);
}

export function toTunnel(entry: TunnelEntry, inheritedGroup?: string): Tunnel {
  return Object.freeze({
    name: entry.name,
    group: entry.group ?? inheritedGroup,
    hostname: entry.hostname,
    forwarding: Object.freeze(toForwarding(entry)),
  });
}

export function toTunnelGroups(file: ConfigFile): TunnelGroup[] {
  return (file.groups ?? []).map((group) => ({
    name: group.name,
    tunnels: (group.tunnels ?? []).map((entry) => toTunnel(entry, group.name)),
  }));
}
