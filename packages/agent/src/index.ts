export * from "./agent";

// Networking config
export * from "./networking/interface";
export * from "./networking/factory";
export {
  NetplanConfigHandler,
  bindPorts,
  configFileName,
  nextFreeInterfaceName,
  prefixLength,
} from "./networking/netplan/netplan-handler";
export type {
  NetplanConfigHandlerOptions,
  BoundPort,
  ExistingConfigs,
} from "./networking/netplan/netplan-handler";

// Reconciliation
export * from "./reconciler/port-diff";
export * from "./reconciler/port-reconciler";
export * from "./reconciler/reconciliation-loop";

// Utils
export { runCommand, formatOutput } from "./utils/run-command";
export type { CommandResult, CommandRunner } from "./utils/run-command";
