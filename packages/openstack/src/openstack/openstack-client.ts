/**
 * OpenStack Networking Client
 *
 * Implements NetworkingClient over the Neutron (ports, subnets) and Nova
 * (servers, interface attachments) REST APIs, authenticated through Keystone.
 */

import { Logger } from "@nestjs/common";
import type { z } from "zod";
import { CLOUD_REQUEST_TIMEOUT_MS } from "@port-provider/core";
import type { FixedIpRequest, Port, Server, Subnet } from "@port-provider/core";
import type { NetworkingClient, PortFilter } from "../interface/networking-client";
import { CloudApiError, CloudErrorType, errorTypeForStatus, isNotFound } from "../utils/cloud-errors";
import type { OpenStackAuthOptions } from "./cloud-config";
import { KeystoneSession, type FetchFn, type ServiceType } from "./keystone";
import {
  NeutronPortListResponseSchema,
  NeutronPortResponseSchema,
  NeutronSubnetListResponseSchema,
  NovaServerListResponseSchema,
  toPort,
  toServer,
  toSubnet,
} from "./types";

type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

/**
 * Escape a value for Nova's regular-expression name filter.
 */
function exactNamePattern(name: string): string {
  return `^${name.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")}$`;
}

export class OpenStackNetworkingClient implements NetworkingClient {
  private readonly logger = new Logger(OpenStackNetworkingClient.name);
  private readonly session: KeystoneSession;

  constructor(
    options: OpenStackAuthOptions,
    private readonly fetchFn: FetchFn = fetch
  ) {
    this.session = new KeystoneSession(options, fetchFn);
  }

  async getServer(name: string): Promise<Server | null> {
    const query = new URLSearchParams({ name: exactNamePattern(name) });
    const { servers } = await this.request(
      "compute",
      "GET",
      `/servers?${query}`,
      NovaServerListResponseSchema
    );
    // Nova may still match case-insensitively, so compare again
    const matches = servers.filter((server) => server.name === name);
    const server = this.single(matches, "server", name);
    return server ? toServer(server) : null;
  }

  async getSubnet(nameOrId: string): Promise<Subnet | null> {
    const byName = await this.request(
      "network",
      "GET",
      `/v2.0/subnets?${new URLSearchParams({ name: nameOrId })}`,
      NeutronSubnetListResponseSchema
    );
    const named = this.single(byName.subnets, "subnet", nameOrId);
    if (named) return toSubnet(named);

    const byId = await this.request(
      "network",
      "GET",
      `/v2.0/subnets?${new URLSearchParams({ id: nameOrId })}`,
      NeutronSubnetListResponseSchema
    );
    const subnet = byId.subnets[0];
    return subnet ? toSubnet(subnet) : null;
  }

  async listPorts(filter: PortFilter): Promise<Port[]> {
    const query = new URLSearchParams();
    if (filter.deviceId) query.set("device_id", filter.deviceId);
    if (filter.name) query.set("name", filter.name);
    if (filter.tags && filter.tags.length > 0) query.set("tags", filter.tags.join(","));

    const search = query.toString();
    const { ports } = await this.request(
      "network",
      "GET",
      search ? `/v2.0/ports?${search}` : "/v2.0/ports",
      NeutronPortListResponseSchema
    );
    return ports.map(toPort);
  }

  async getPort(nameOrId: string): Promise<Port | null> {
    const named = this.single(await this.listPorts({ name: nameOrId }), "port", nameOrId);
    if (named) return named;

    try {
      const { port } = await this.request(
        "network",
        "GET",
        `/v2.0/ports/${encodeURIComponent(nameOrId)}`,
        NeutronPortResponseSchema
      );
      return toPort(port);
    } catch (error: unknown) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  async createPort(name: string, networkId: string, fixedIps: FixedIpRequest[]): Promise<Port> {
    this.logger.debug(`Creating port ${name} on network ${networkId}`);
    const { port } = await this.request("network", "POST", "/v2.0/ports", NeutronPortResponseSchema, {
      port: {
        name,
        network_id: networkId,
        fixed_ips: fixedIps.map((fixedIp) =>
          fixedIp.ipAddress
            ? { subnet_id: fixedIp.subnetId, ip_address: fixedIp.ipAddress }
            : { subnet_id: fixedIp.subnetId }
        ),
      },
    });
    return toPort(port);
  }

  async deletePort(portId: string): Promise<void> {
    await this.send("network", "DELETE", `/v2.0/ports/${encodeURIComponent(portId)}`);
  }

  async setTags(port: Port, tags: string[]): Promise<void> {
    await this.send("network", "PUT", `/v2.0/ports/${encodeURIComponent(port.id)}/tags`, { tags });
  }

  async attachInterface(serverId: string, portId: string): Promise<void> {
    this.logger.debug(`Attaching port ${portId} to server ${serverId}`);
    await this.send("compute", "POST", `/servers/${encodeURIComponent(serverId)}/os-interface`, {
      interfaceAttachment: { port_id: portId },
    });
  }

  /**
   * Pick the only match of a name lookup; more than one is ambiguous.
   */
  private single<T>(matches: T[], resourceType: string, name: string): T | null {
    if (matches.length > 1) {
      throw new CloudApiError(
        `Found ${matches.length} ${resourceType}s named '${name}'`,
        CloudErrorType.CONFLICT
      );
    }
    return matches[0] ?? null;
  }

  private async request<S extends z.ZodTypeAny>(
    service: ServiceType,
    method: HttpMethod,
    path: string,
    schema: S,
    body?: unknown
  ): Promise<z.infer<S>> {
    const response = await this.send(service, method, path, body);
    return schema.parse(await response.json());
  }

  /**
   * Send a request, re-authenticating once when the token was rejected.
   */
  private async send(
    service: ServiceType,
    method: HttpMethod,
    path: string,
    body?: unknown
  ): Promise<Response> {
    let response = await this.fetchOnce(service, method, path, body);
    if (response.status === 401) {
      this.session.invalidate();
      response = await this.fetchOnce(service, method, path, body);
    }

    if (!response.ok) {
      const error = await response.text();
      throw new CloudApiError(
        `OpenStack ${service} API error: ${method} ${path} ${response.status} ${error}`,
        errorTypeForStatus(response.status),
        response.status
      );
    }
    return response;
  }

  private async fetchOnce(
    service: ServiceType,
    method: HttpMethod,
    path: string,
    body?: unknown
  ): Promise<Response> {
    const token = await this.session.getToken();
    const endpoint = await this.session.getEndpoint(service);
    const url = service === "network" ? `${endpoint.replace(/\/v2\.0$/, "")}${path}` : `${endpoint}${path}`;

    try {
      return await this.fetchFn(url, {
        method,
        headers: {
          "X-Auth-Token": token,
          "Content-Type": "application/json",
          Accept: "application/json",
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(CLOUD_REQUEST_TIMEOUT_MS),
      });
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new CloudApiError(`OpenStack ${service} API unreachable: ${message}`, CloudErrorType.NETWORK, undefined, error);
    }
  }
}
