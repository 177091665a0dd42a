/**
 * Networking Config Handler Interface
 *
 * A handler renders host network configuration for the ports attached to the
 * node and applies it. Each variant owns its own "apply needed" state.
 */

import type { NetworkingConfigType, Port, SubnetMap } from "@port-provider/core";

export interface NetworkingConfigHandler {
  readonly type: NetworkingConfigType;

  /**
   * Write one config file per interface for the ports in the expected subnets.
   * Existing files are never rewritten.
   *
   * @param ports - All ports attached to the node, including ones attached this tick
   * @param subnets - Expected subnets; ports outside them are ignored
   * @param configDestination - Directory the config files are written to
   * @param configTemplates - Directory holding one `{subnetName}.yaml` template per subnet
   * @returns Paths of the files written by this call
   */
  create(
    ports: readonly Port[],
    subnets: SubnetMap,
    configDestination: string,
    configTemplates: string
  ): Promise<string[]>;

  /**
   * Apply the written config if anything changed since the last successful apply.
   *
   * @returns Whether the apply command ran
   */
  apply(): Promise<boolean>;

  /**
   * Whether a config was written that has not been applied successfully yet.
   */
  needsApply(): boolean;
}
