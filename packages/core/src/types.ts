/**
 * Networking Domain Types
 *
 * Cloud-agnostic view of the resources the agent reconciles. Cloud clients map
 * their API payloads onto these shapes.
 */

/**
 * The compute node the agent runs on.
 */
export interface Server {
  id: string;
  name: string;
}

/**
 * A declared network segment ports are created from.
 */
export interface Subnet {
  id: string;
  name: string;
  networkId: string;
  /** e.g. "10.0.0.0/24" */
  cidr: string;
}

/**
 * Port status values reported by the networking service.
 * Any other cloud-defined value is passed through as-is.
 */
export type PortStatus = "DOWN" | "ACTIVE" | "BUILD" | "ERROR" | (string & {});

/**
 * Binding of a port to an address in a subnet.
 */
export interface FixedIp {
  subnetId: string;
  ipAddress: string;
}

/**
 * Fixed IP requested at port creation; the address is left to allocation when omitted.
 */
export interface FixedIpRequest {
  subnetId: string;
  ipAddress?: string;
}

/**
 * A virtual network attachment point.
 */
export interface Port {
  id: string;
  name: string;
  status: PortStatus;
  macAddress: string;
  /** ID of the server the port is attached to; empty when unattached */
  deviceId: string;
  fixedIps: FixedIp[];
  tags: string[];
}

/**
 * Expected subnets keyed by subnet ID, in configuration order.
 */
export type SubnetMap = ReadonlyMap<string, Subnet>;
