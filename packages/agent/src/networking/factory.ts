import type { NetworkingConfigType } from "@port-provider/core";
import type { NetworkingConfigHandler } from "./interface";
import { NetplanConfigHandler, type NetplanConfigHandlerOptions } from "./netplan/netplan-handler";

export type NetworkingConfigHandlerOptions = NetplanConfigHandlerOptions;

export function createNetworkingConfigHandler(
  type: NetworkingConfigType,
  options: NetworkingConfigHandlerOptions = {}
): NetworkingConfigHandler {
  switch (type) {
    case "netplan":
      return new NetplanConfigHandler(options);
    default:
      throw new Error(`Unknown networking config type: ${String(type)}`);
  }
}

export function getAvailableNetworkingConfigTypes(): NetworkingConfigType[] {
  return ["netplan"];
}
