/**
 * Networking Client Interface
 *
 * The port/subnet/server operations the agent needs from a cloud. Enables
 * dependency injection of in-memory clients for testing.
 */

import type { FixedIpRequest, Port, Server, Subnet } from "@port-provider/core";

/**
 * Filter for listing ports. All given criteria must match.
 */
export interface PortFilter {
  /** Only ports attached to this server */
  deviceId?: string;
  /** Only ports carrying every one of these tags */
  tags?: string[];
  name?: string;
}

export interface NetworkingClient {
  /**
   * Look up a server by its exact name.
   *
   * @returns The server, or null when no server has that name
   */
  getServer(name: string): Promise<Server | null>;

  /**
   * Look up a subnet by name or ID.
   */
  getSubnet(nameOrId: string): Promise<Subnet | null>;

  listPorts(filter: PortFilter): Promise<Port[]>;

  /**
   * Look up a port by name or ID.
   */
  getPort(nameOrId: string): Promise<Port | null>;

  /**
   * Create a port on a network with the given fixed IPs.
   */
  createPort(name: string, networkId: string, fixedIps: FixedIpRequest[]): Promise<Port>;

  deletePort(portId: string): Promise<void>;

  /**
   * Replace the tags of a port.
   */
  setTags(port: Port, tags: string[]): Promise<void>;

  /**
   * Attach a port to a server as a network interface.
   */
  attachInterface(serverId: string, portId: string): Promise<void>;
}
