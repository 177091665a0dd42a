/**
 * OpenStack API payloads, validated at the client boundary.
 */

import { z } from "zod";
import type { Port, Server, Subnet } from "@port-provider/core";

export const KeystoneEndpointSchema = z.object({
  interface: z.string(),
  region: z.string().nullish(),
  region_id: z.string().nullish(),
  url: z.string(),
});

export const KeystoneCatalogEntrySchema = z.object({
  type: z.string(),
  name: z.string().optional(),
  endpoints: z.array(KeystoneEndpointSchema),
});
export type KeystoneCatalogEntry = z.infer<typeof KeystoneCatalogEntrySchema>;

export const KeystoneTokenResponseSchema = z.object({
  token: z.object({
    expires_at: z.string().optional(),
    catalog: z.array(KeystoneCatalogEntrySchema).default([]),
  }),
});

export const NeutronFixedIpSchema = z.object({
  subnet_id: z.string(),
  ip_address: z.string(),
});

export const NeutronPortSchema = z.object({
  id: z.string(),
  name: z.string().default(""),
  status: z.string(),
  mac_address: z.string(),
  device_id: z.string().default(""),
  fixed_ips: z.array(NeutronFixedIpSchema).default([]),
  tags: z.array(z.string()).default([]),
});
export type NeutronPort = z.infer<typeof NeutronPortSchema>;

export const NeutronPortResponseSchema = z.object({ port: NeutronPortSchema });
export const NeutronPortListResponseSchema = z.object({ ports: z.array(NeutronPortSchema) });

export const NeutronSubnetSchema = z.object({
  id: z.string(),
  name: z.string().default(""),
  network_id: z.string(),
  cidr: z.string(),
});
export type NeutronSubnet = z.infer<typeof NeutronSubnetSchema>;

export const NeutronSubnetListResponseSchema = z.object({ subnets: z.array(NeutronSubnetSchema) });

export const NovaServerSchema = z.object({
  id: z.string(),
  name: z.string(),
});
export type NovaServer = z.infer<typeof NovaServerSchema>;

export const NovaServerListResponseSchema = z.object({ servers: z.array(NovaServerSchema) });

export function toPort(port: NeutronPort): Port {
  return {
    id: port.id,
    name: port.name,
    status: port.status,
    macAddress: port.mac_address,
    deviceId: port.device_id,
    fixedIps: port.fixed_ips.map((fixedIp) => ({
      subnetId: fixedIp.subnet_id,
      ipAddress: fixedIp.ip_address,
    })),
    tags: port.tags,
  };
}

export function toSubnet(subnet: NeutronSubnet): Subnet {
  return {
    id: subnet.id,
    name: subnet.name,
    networkId: subnet.network_id,
    cidr: subnet.cidr,
  };
}

export function toServer(server: NovaServer): Server {
  return { id: server.id, name: server.name };
}
