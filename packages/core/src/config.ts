import { z } from "zod";
import {
  DEFAULT_CLOUD_CONFIG_PATH,
  DEFAULT_LOG_LEVEL,
  DEFAULT_NETWORKING_CONFIG_DESTINATION,
  DEFAULT_NETWORKING_CONFIG_TEMPLATES,
  DEFAULT_RECONCILIATION_INTERVAL_SECONDS,
  PORT_NAME_PREFIX,
} from "./constants";
import { ConfigurationError } from "./errors";

export const LogLevelSchema = z.enum(["ERROR", "WARNING", "INFO", "DEBUG"]);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const NetworkingConfigTypeSchema = z.enum(["netplan"]);
export type NetworkingConfigType = z.infer<typeof NetworkingConfigTypeSchema>;

const nameSchema = z.string().trim().min(1);

export const AgentConfigSchema = z
  .object({
    /** Path to the cloud config of the OpenStack cloud controller manager */
    cloudConfig: z.string().min(1).default(DEFAULT_CLOUD_CONFIG_PATH),
    /** Name of the server this agent manages */
    nodeName: nameSchema,
    /** Names (or IDs) of the subnets the node must have a port in */
    subnets: z.array(nameSchema).min(1, "At least one subnet is required"),
    portNamePrefix: nameSchema.default(PORT_NAME_PREFIX),
    /** Tags set on every port the agent creates or reuses */
    portTags: z.array(nameSchema).default([]),
    /** Delete tagged ports that are DOWN and unattached before each tick */
    cleanup: z.boolean().default(false),
    /** Poll each newly attached port until it leaves DOWN */
    waitForPort: z.boolean().default(false),
    networkingConfigType: NetworkingConfigTypeSchema.default("netplan"),
    networkingConfigTemplates: z.string().min(1).default(DEFAULT_NETWORKING_CONFIG_TEMPLATES),
    networkingConfigDestination: z.string().min(1).default(DEFAULT_NETWORKING_CONFIG_DESTINATION),
    /** Seconds to sleep between reconciliation ticks */
    reconciliationInterval: z
      .number()
      .int()
      .min(0)
      .default(DEFAULT_RECONCILIATION_INTERVAL_SECONDS),
    /** Custom apply command, split on whitespace */
    applyCmd: z.string().trim().min(1).optional(),
    logLevel: LogLevelSchema.default(DEFAULT_LOG_LEVEL),
  })
  .refine((config) => !config.cleanup || config.portTags.length > 0, {
    message: "Cleanup requires at least one port tag",
    path: ["cleanup"],
  });

export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type AgentConfigInput = z.input<typeof AgentConfigSchema>;

/**
 * Validate raw agent configuration, throwing a ConfigurationError listing every issue.
 */
export function validateAgentConfig(data: unknown): AgentConfig {
  const result = AgentConfigSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigurationError(
      "Invalid agent configuration",
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      )
    );
  }
  return result.data;
}

/**
 * Split a custom apply command into executable and arguments.
 */
export function parseApplyCommand(applyCmd: string): string[] {
  return applyCmd.split(/\s+/).filter((part) => part.length > 0);
}
