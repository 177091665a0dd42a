import chalk from "chalk";
import { Logger, type LogLevel as NestLogLevel } from "@nestjs/common";
import {
  PORT_PROVIDER_VERSION,
  parseApplyCommand,
  validateAgentConfig,
  type AgentConfig,
  type LogLevel,
} from "@port-provider/core";
import { OpenStackNetworkingClient, readCloudConfig } from "@port-provider/openstack";
import { createAgent } from "@port-provider/agent";

const logger = new Logger("PortProvider");

export interface RunOptions {
  cloudConfig?: string;
  nodeName?: string;
  subnet?: string[];
  portNamePrefix?: string;
  portTag?: string[];
  cleanup?: boolean;
  waitForPort?: boolean;
  networkingConfigType?: string;
  networkingConfigDestination?: string;
  networkingConfigTemplates?: string;
  reconciliationInterval?: number;
  applyCmd?: string;
  logLevel?: string;
}

const NEST_LOG_LEVELS: Record<LogLevel, NestLogLevel[]> = {
  ERROR: ["fatal", "error"],
  WARNING: ["fatal", "error", "warn"],
  INFO: ["fatal", "error", "warn", "log"],
  DEBUG: ["fatal", "error", "warn", "log", "debug", "verbose"],
};

export function toNestLogLevels(level: LogLevel): NestLogLevel[] {
  return NEST_LOG_LEVELS[level];
}

/**
 * Map command line options onto a validated agent config.
 */
export function buildAgentConfig(options: RunOptions): AgentConfig {
  return validateAgentConfig({
    cloudConfig: options.cloudConfig,
    nodeName: options.nodeName,
    subnets: options.subnet ?? [],
    portNamePrefix: options.portNamePrefix,
    portTags: options.portTag ?? [],
    cleanup: options.cleanup ?? false,
    waitForPort: options.waitForPort ?? false,
    networkingConfigType: options.networkingConfigType,
    networkingConfigDestination: options.networkingConfigDestination,
    networkingConfigTemplates: options.networkingConfigTemplates,
    reconciliationInterval: options.reconciliationInterval,
    applyCmd: options.applyCmd,
    logLevel: options.logLevel?.toUpperCase(),
  });
}

export async function run(options: RunOptions): Promise<void> {
  try {
    const config = buildAgentConfig(options);
    Logger.overrideLogger(toNestLogLevels(config.logLevel));

    console.log(chalk.blue.bold(`os-port-provider ${PORT_PROVIDER_VERSION}`));
    logger.debug(`Cloud config: ${config.cloudConfig}`);
    if (config.applyCmd) {
      logger.debug(`Apply command: ${JSON.stringify(parseApplyCommand(config.applyCmd))}`);
    }

    const client = new OpenStackNetworkingClient(await readCloudConfig(config.cloudConfig));
    const agent = await createAgent(config, client);

    const stop = (signal: NodeJS.Signals) => {
      logger.log(`Received ${signal}, stopping after the current reconciliation.`);
      agent.loop.stop();
    };
    process.once("SIGINT", stop);
    process.once("SIGTERM", stop);

    await agent.loop.run();
    logger.log("Stopped.");
    process.exit(0);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    logger.fatal(message);
    process.exit(1);
  }
}
