import { Logger } from "@nestjs/common";
import {
  ResourceNotFoundError,
  parseApplyCommand,
} from "@port-provider/core";
import type { AgentConfig, Server, Subnet } from "@port-provider/core";
import type { NetworkingClient } from "@port-provider/openstack";
import type { NetworkingConfigHandler } from "./networking/interface";
import { createNetworkingConfigHandler, type NetworkingConfigHandlerOptions } from "./networking/factory";
import { PortReconciler, type PortReconcilerOptions } from "./reconciler/port-reconciler";
import { ReconciliationLoop, type TickResult } from "./reconciler/reconciliation-loop";

const logger = new Logger("Agent");

export interface Agent {
  server: Server;
  /** Expected subnets keyed by ID, in configuration order */
  expectedSubnets: Map<string, Subnet>;
  reconciler: PortReconciler;
  handler: NetworkingConfigHandler;
  loop: ReconciliationLoop;
}

export interface CreateAgentOverrides {
  handler?: NetworkingConfigHandler;
  /** Passed to the networking config handler created from the config */
  networking?: Pick<NetworkingConfigHandlerOptions, "runCommand" | "listInterfaces">;
  reconciler?: Partial<Pick<PortReconcilerOptions, "pollIntervalMs" | "maxRetries">>;
  onTickComplete?: (result: TickResult) => void;
}

/**
 * Resolve the configured server and subnets and wire up the reconciliation loop.
 * A server or subnet that cannot be found is a configuration error.
 */
export async function createAgent(
  config: AgentConfig,
  client: NetworkingClient,
  overrides: CreateAgentOverrides = {}
): Promise<Agent> {
  const server = await client.getServer(config.nodeName);
  if (!server) {
    throw new ResourceNotFoundError("server", config.nodeName);
  }

  const expectedSubnets = new Map<string, Subnet>();
  for (const name of config.subnets) {
    const subnet = await client.getSubnet(name);
    if (!subnet) {
      throw new ResourceNotFoundError("subnet", name);
    }
    expectedSubnets.set(subnet.id, subnet);
  }

  let handler = overrides.handler;
  if (!handler) {
    const applyCmd = config.applyCmd ? parseApplyCommand(config.applyCmd) : undefined;
    if (applyCmd) {
      logger.debug(`Set apply cmd to: ${JSON.stringify(applyCmd)}`);
    }
    handler = createNetworkingConfigHandler(config.networkingConfigType, {
      ...overrides.networking,
      applyCmd,
    });
  }

  const reconciler = new PortReconciler(client, {
    portNamePrefix: config.portNamePrefix,
    portTags: config.portTags,
    waitForPort: config.waitForPort,
    ...overrides.reconciler,
  });

  const loop = new ReconciliationLoop(client, reconciler, handler, server, expectedSubnets, {
    configDestination: config.networkingConfigDestination,
    configTemplates: config.networkingConfigTemplates,
    intervalSeconds: config.reconciliationInterval,
    cleanup: config.cleanup,
    onTickComplete: overrides.onTickComplete,
  });

  logger.log(
    `Managing ports of server '${server.name}' for subnets: ${[...expectedSubnets.values()]
      .map((subnet) => subnet.name)
      .join(", ")}`
  );

  return { server, expectedSubnets, reconciler, handler, loop };
}
