import type { Port, SubnetMap } from "@port-provider/core";

/**
 * Subnet IDs of every fixed IP of the given ports.
 */
export function collectSubnetIds(ports: readonly Port[]): Set<string> {
  const subnetIds = new Set<string>();
  for (const port of ports) {
    for (const fixedIp of port.fixedIps) {
      subnetIds.add(fixedIp.subnetId);
    }
  }
  return subnetIds;
}

/**
 * Expected subnets that none of the actual ports has an address in.
 */
export function computeMissingSubnetIds(
  actualPorts: readonly Port[],
  expectedSubnets: SubnetMap
): Set<string> {
  const actual = collectSubnetIds(actualPorts);
  return new Set([...expectedSubnets.keys()].filter((subnetId) => !actual.has(subnetId)));
}

/**
 * Name of the port the agent owns for a server/subnet pair. Looking a port up
 * by this name is what keeps port creation idempotent across ticks.
 */
export function derivePortName(prefix: string, serverName: string, subnetName: string): string {
  return `${prefix}-${serverName}-${subnetName}`;
}
