/**
 * Agent default configuration values.
 */

// Port naming
export const PORT_NAME_PREFIX = "opp";

// Node identity
export const NODE_NAME_ENV_VAR = "NODENAME";

// Filesystem locations
export const DEFAULT_CLOUD_CONFIG_PATH = "/etc/kubernetes/cloud.config";
export const DEFAULT_NETWORKING_CONFIG_TEMPLATES = "/etc/os-port-provider/config-templates";
export const DEFAULT_NETWORKING_CONFIG_DESTINATION = "/etc/netplan";

// Reconciliation
export const DEFAULT_RECONCILIATION_INTERVAL_SECONDS = 30;

// Netplan
export const NETPLAN_CONFIG_PREFIX = "opp";
export const NETPLAN_CONFIG_PRIORITY = 51;
export const DEFAULT_NETPLAN_APPLY_CMD: readonly string[] = ["netplan", "apply"];

/** Ethernet key the subnet templates use in place of the real interface name */
export const TEMPLATE_INTERFACE_PLACEHOLDER = "ensX";

/** First interface slot handed to ports attached by the agent (ens4, ens5, ...) */
export const INTERFACE_NUMBER_OFFSET = 4;
export const INTERFACE_NAME_PREFIX = "ens";

// Logging
export const DEFAULT_LOG_LEVEL = "INFO";
