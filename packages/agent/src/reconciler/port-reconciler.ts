/**
 * Port Reconciler
 *
 * Makes sure the server has a port in every expected subnet: reuses the port
 * named after the server and subnet when one exists, creates it otherwise, then
 * tags and attaches it.
 */

import { Logger } from "@nestjs/common";
import {
  PORT_ACTIVE_MAX_RETRIES,
  PORT_ACTIVE_POLL_INTERVAL_MS,
} from "@port-provider/core";
import type { Port, Server, SubnetMap } from "@port-provider/core";
import { sleep, type NetworkingClient } from "@port-provider/openstack";
import { collectSubnetIds, computeMissingSubnetIds, derivePortName } from "./port-diff";

export interface PortReconcilerOptions {
  portNamePrefix: string;
  /** Tags set on every created or reused port; also selects ports for cleanup */
  portTags: string[];
  /** Poll each attached port until it leaves DOWN */
  waitForPort: boolean;
  pollIntervalMs?: number;
  maxRetries?: number;
}

export type PortActivationStatus = "active" | "timeout";

export interface ReconcileResult {
  /** Attached ports, including the ones attached by this call */
  ports: Port[];
  missingSubnetIds: string[];
  createdPortIds: string[];
  attachedPortIds: string[];
}

export class PortReconciler {
  private readonly logger = new Logger(PortReconciler.name);
  private readonly pollIntervalMs: number;
  private readonly maxRetries: number;

  constructor(
    private readonly client: NetworkingClient,
    private readonly options: PortReconcilerOptions
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? PORT_ACTIVE_POLL_INTERVAL_MS;
    this.maxRetries = options.maxRetries ?? PORT_ACTIVE_MAX_RETRIES;
  }

  /**
   * Attach a port for every expected subnet the server has no address in.
   * Cloud errors propagate.
   */
  async reconcile(
    server: Server,
    expectedSubnets: SubnetMap,
    actualPorts: readonly Port[]
  ): Promise<ReconcileResult> {
    const missing = computeMissingSubnetIds(actualPorts, expectedSubnets);

    this.logger.debug(
      "Result of missing subnets calculation:\n" +
        `  actual:   ${[...collectSubnetIds(actualPorts)].join(", ")}\n` +
        `  expected: ${[...expectedSubnets.keys()].join(", ")}\n` +
        `  missing:  ${[...missing].join(", ")}`
    );

    const ports = [...actualPorts];
    const createdPortIds: string[] = [];
    const attachedPortIds: string[] = [];

    for (const subnetId of missing) {
      const subnet = expectedSubnets.get(subnetId);
      if (!subnet) continue;

      this.logger.log(`Will add port with subnet '${subnet.name}' to server '${server.name}'.`);

      const portName = derivePortName(this.options.portNamePrefix, server.name, subnet.name);
      let port = await this.client.getPort(portName);
      if (!port) {
        this.logger.log(`Will create a new port because '${portName}' does not exist.`);
        port = await this.client.createPort(portName, subnet.networkId, [{ subnetId: subnet.id }]);
        createdPortIds.push(port.id);
      }

      if (this.options.portTags.length > 0) {
        await this.client.setTags(port, this.options.portTags);
      }

      await this.client.attachInterface(server.id, port.id);
      attachedPortIds.push(port.id);
      ports.push({ ...port, deviceId: server.id });

      if (this.options.waitForPort) {
        await this.waitForPortActive(port);
      }
    }

    return { ports, missingSubnetIds: [...missing], createdPortIds, attachedPortIds };
  }

  /**
   * Poll a port until it leaves DOWN. Gives up after the configured number of
   * checks without failing; the caller decides what a timeout means.
   */
  async waitForPortActive(port: Port): Promise<PortActivationStatus> {
    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      const current = await this.client.getPort(port.id);
      if (current && current.status !== "DOWN") {
        this.logger.debug(`Port '${port.name}' is ${current.status} after ${attempt} check(s).`);
        return "active";
      }
      if (attempt < this.maxRetries) {
        await sleep(this.pollIntervalMs);
      }
    }

    this.logger.debug(`Port '${port.name}' still DOWN after ${this.maxRetries} checks, continuing.`);
    return "timeout";
  }

  /**
   * Delete tagged ports that are DOWN and not attached to any server.
   * Failures are logged and skipped.
   *
   * @returns IDs of the deleted ports
   */
  async cleanup(): Promise<string[]> {
    if (this.options.portTags.length === 0) {
      return [];
    }

    const ports = await this.client.listPorts({ tags: this.options.portTags });
    const deleted: string[] = [];

    for (const port of ports) {
      if (port.status !== "DOWN" || port.deviceId) continue;

      try {
        await this.client.deletePort(port.id);
        this.logger.log(`Deleted unused port '${port.name}' (${port.id}).`);
        deleted.push(port.id);
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Unable to delete port '${port.name}' (${port.id}): ${message}`);
      }
    }

    return deleted;
  }
}
