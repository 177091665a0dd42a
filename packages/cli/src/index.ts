#!/usr/bin/env node

import "reflect-metadata";
import { Command, Option } from "commander";
import chalk from "chalk";
import {
  DEFAULT_CLOUD_CONFIG_PATH,
  DEFAULT_LOG_LEVEL,
  DEFAULT_NETWORKING_CONFIG_DESTINATION,
  DEFAULT_NETWORKING_CONFIG_TEMPLATES,
  DEFAULT_RECONCILIATION_INTERVAL_SECONDS,
  NODE_NAME_ENV_VAR,
  PORT_NAME_PREFIX,
  PORT_PROVIDER_VERSION,
} from "@port-provider/core";
import { getAvailableNetworkingConfigTypes } from "@port-provider/agent";
import { run } from "./commands/run";

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parseInterval(value: string): number {
  return Number(value);
}

const program = new Command();

program
  .name("os-port-provider")
  .description("Attach OpenStack ports for the configured subnets to this node and configure them")
  .version(PORT_PROVIDER_VERSION);

program
  .command("run", { isDefault: true })
  .description("Run the reconciliation loop")
  .option("--cloud-config <path>", "Cloud config of the OpenStack cloud controller manager", DEFAULT_CLOUD_CONFIG_PATH)
  .addOption(new Option("--node-name <name>", "Name of the server to manage").env(NODE_NAME_ENV_VAR))
  .option("--subnet <name>", "Subnet the node needs a port in (repeatable)", collect, [])
  .option("--port-name-prefix <prefix>", "Prefix of the port names", PORT_NAME_PREFIX)
  .option("--port-tag <tag>", "Tag set on every port (repeatable)", collect, [])
  .option("--cleanup", "Delete unused tagged ports that are DOWN")
  .option("--wait-for-port", "Wait until attached ports are no longer DOWN")
  .addOption(
    new Option("--networking-config-type <type>", "Networking config type")
      .choices(getAvailableNetworkingConfigTypes())
      .default("netplan")
  )
  .option(
    "--networking-config-destination <dir>",
    "Directory the networking configs are written to",
    DEFAULT_NETWORKING_CONFIG_DESTINATION
  )
  .option(
    "--networking-config-templates <dir>",
    "Directory with one <subnet>.yaml template per subnet",
    DEFAULT_NETWORKING_CONFIG_TEMPLATES
  )
  .option(
    "--reconciliation-interval <seconds>",
    "Seconds between reconciliations",
    parseInterval,
    DEFAULT_RECONCILIATION_INTERVAL_SECONDS
  )
  .option("--apply-cmd <cmd>", "Command that applies the networking config")
  .option("--log-level <level>", "ERROR, WARNING, INFO or DEBUG", DEFAULT_LOG_LEVEL)
  .action(run);

program.exitOverride();

program.parseAsync().catch((error: unknown) => {
  const code = error instanceof Error && "code" in error ? error.code : undefined;
  if (code !== "commander.help" && code !== "commander.version" && code !== "commander.helpDisplayed") {
    console.error(chalk.red("Error:"), error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
});
