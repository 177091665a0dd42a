/**
 * Netplan Networking Config Handler
 *
 * Renders `/etc/netplan/51-opp-ensN.yaml` files from per-subnet templates and
 * runs `netplan apply` when a new file was written.
 */

import * as os from "os";
import * as path from "path";
import fs from "fs-extra";
import { Logger } from "@nestjs/common";
import { parse, stringify } from "yaml";
import { z } from "zod";
import {
  ApplyCommandError,
  ConfigurationError,
  DEFAULT_NETPLAN_APPLY_CMD,
  INTERFACE_NAME_PREFIX,
  INTERFACE_NUMBER_OFFSET,
  NETPLAN_CONFIG_PREFIX,
  NETPLAN_CONFIG_PRIORITY,
  TEMPLATE_INTERFACE_PLACEHOLDER,
  TemplateError,
} from "@port-provider/core";
import type { FixedIp, Port, Subnet, SubnetMap } from "@port-provider/core";
import type { NetworkingConfigHandler } from "../interface";
import { formatOutput, runCommand, type CommandResult, type CommandRunner } from "../../utils/run-command";

export interface NetplanConfigHandlerOptions {
  /** Command that applies netplan config (default: netplan apply) */
  applyCmd?: readonly string[];
  runCommand?: CommandRunner;
  /** Start with a pending apply, e.g. after a failed apply in a previous run */
  shouldApply?: boolean;
  /** Names of the network interfaces present on the host */
  listInterfaces?: () => string[];
}

/**
 * A port bound to one of the expected subnets.
 */
export interface BoundPort {
  port: Port;
  subnet: Subnet;
  fixedIp: FixedIp;
}

/**
 * Interface slots already taken by config files in the destination directory.
 */
export interface ExistingConfigs {
  /** Interface names with a config file */
  interfaces: Set<string>;
  /** Lower-cased MAC address to the interface whose config matches it */
  macAddresses: Map<string, string>;
}

const mappingSchema = z.record(z.unknown());

const renderedConfigSchema = z.object({
  network: z.object({
    ethernets: z.record(
      z.object({
        match: z.object({ macaddress: z.string() }).passthrough().optional(),
      })
    ),
  }),
});

const CONFIG_FILE_PATTERN = new RegExp(
  `^${NETPLAN_CONFIG_PRIORITY}-${NETPLAN_CONFIG_PREFIX}-(${INTERFACE_NAME_PREFIX}\\d+)\\.yaml$`
);

const templateSchema = z
  .object({
    network: z
      .object({
        ethernets: mappingSchema,
      })
      .passthrough(),
  })
  .passthrough();

/**
 * Bind the ports to the expected subnets by their first fixed IP, ordered by
 * the position of the subnet in the expected subnets, then by port name.
 * Ports outside the expected subnets and ports without an address are left out.
 */
export function bindPorts(ports: readonly Port[], subnets: SubnetMap): BoundPort[] {
  const subnetOrder = [...subnets.keys()];
  const bound: BoundPort[] = [];

  for (const port of ports) {
    const fixedIp = port.fixedIps[0];
    const subnet = fixedIp ? subnets.get(fixedIp.subnetId) : undefined;
    if (!fixedIp || !subnet) continue;
    bound.push({ port, subnet, fixedIp });
  }

  return bound.sort(
    (a, b) =>
      subnetOrder.indexOf(a.subnet.id) - subnetOrder.indexOf(b.subnet.id) ||
      a.port.name.localeCompare(b.port.name)
  );
}

/**
 * Lowest interface name from ens4 upwards that is not taken.
 */
export function nextFreeInterfaceName(taken: ReadonlySet<string>): string {
  let number = INTERFACE_NUMBER_OFFSET;
  while (taken.has(`${INTERFACE_NAME_PREFIX}${number}`)) {
    number++;
  }
  return `${INTERFACE_NAME_PREFIX}${number}`;
}

/**
 * Prefix length of a CIDR such as 10.0.0.0/24.
 */
export function prefixLength(subnet: Subnet): number {
  const [, length, ...rest] = subnet.cidr.split("/");
  if (length === undefined || rest.length > 0 || !/^\d+$/.test(length)) {
    throw new ConfigurationError(`Subnet '${subnet.name}' has no valid CIDR`, [subnet.cidr]);
  }
  return Number(length);
}

export function configFileName(interfaceName: string): string {
  return `${NETPLAN_CONFIG_PRIORITY}-${NETPLAN_CONFIG_PREFIX}-${interfaceName}.yaml`;
}

export class NetplanConfigHandler implements NetworkingConfigHandler {
  readonly type = "netplan" as const;
  private readonly logger = new Logger(NetplanConfigHandler.name);
  private readonly applyCmd: readonly string[];
  private readonly runCommand: CommandRunner;
  private readonly listInterfaces: () => string[];
  private shouldApply: boolean;

  constructor(options: NetplanConfigHandlerOptions = {}) {
    this.applyCmd = options.applyCmd ?? DEFAULT_NETPLAN_APPLY_CMD;
    this.runCommand = options.runCommand ?? runCommand;
    this.shouldApply = options.shouldApply ?? false;
    this.listInterfaces = options.listInterfaces ?? (() => Object.keys(os.networkInterfaces()));
  }

  needsApply(): boolean {
    return this.shouldApply;
  }

  async create(
    ports: readonly Port[],
    subnets: SubnetMap,
    configDestination: string,
    configTemplates: string
  ): Promise<string[]> {
    const existing = await this.readExistingConfigs(configDestination);
    const hostInterfaces = new Set(this.listInterfaces());
    const written: string[] = [];

    for (const bound of bindPorts(ports, subnets)) {
      const { port } = bound;
      const macAddress = port.macAddress.toLowerCase();

      const configured = existing.macAddresses.get(macAddress);
      if (configured) {
        this.logger.debug(`Port '${port.name}' is already configured as ${configured}, skipping.`);
        continue;
      }

      if (port.fixedIps.length > 1) {
        this.logger.warn(
          `Port '${port.name}' has more than one IP address (${port.fixedIps
            .map((fixedIp) => fixedIp.ipAddress)
            .join(", ")}).`
        );
      }

      const interfaceName = nextFreeInterfaceName(existing.interfaces);
      if (hostInterfaces.has(interfaceName)) {
        this.logger.warn(
          `Interface with name ${interfaceName} already exists, not creating networking config for port '${port.name}'.`
        );
        continue;
      }

      const configPath = path.join(configDestination, configFileName(interfaceName));
      const templatePath = path.join(configTemplates, `${bound.subnet.name}.yaml`);
      const content = stringify(await this.render({ ...bound, interfaceName }, templatePath));
      this.logger.debug(content);

      await fs.writeFile(configPath, content, { flag: "wx" });
      this.logger.log(`Wrote networking config for ${interfaceName} (port '${port.name}') to ${configPath}.`);
      existing.interfaces.add(interfaceName);
      existing.macAddresses.set(macAddress, interfaceName);
      this.shouldApply = true;
      written.push(configPath);
    }

    return written;
  }

  async apply(): Promise<boolean> {
    if (!this.shouldApply) {
      this.logger.debug("Nothing to apply.");
      return false;
    }

    this.logger.log("Apply networking config.");

    let result: CommandResult;
    try {
      result = await this.runCommand(this.applyCmd);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Unable to apply networking config: ${message}`);
      throw new ApplyCommandError(this.applyCmd, "", null, error);
    }

    const output = formatOutput(result.output);
    if (result.exitCode !== 0) {
      this.logger.error(
        `Unable to apply networking config: exit code ${result.exitCode}\n  Netplan output:\n${output}`
      );
      throw new ApplyCommandError(this.applyCmd, output, result.exitCode);
    }

    this.logger.debug(`Netplan output:\n${output}`);
    this.shouldApply = false;
    return true;
  }

  /**
   * Collect the interfaces and MAC addresses of the configs this agent wrote before.
   * A config whose MAC cannot be read still takes its interface slot.
   */
  private async readExistingConfigs(configDestination: string): Promise<ExistingConfigs> {
    const existing: ExistingConfigs = { interfaces: new Set(), macAddresses: new Map() };
    if (!(await fs.pathExists(configDestination))) {
      return existing;
    }

    for (const fileName of (await fs.readdir(configDestination)).sort()) {
      const interfaceName = CONFIG_FILE_PATTERN.exec(fileName)?.[1];
      if (!interfaceName) continue;
      existing.interfaces.add(interfaceName);

      const configPath = path.join(configDestination, fileName);
      let document: unknown;
      try {
        document = parse(await fs.readFile(configPath, "utf8"));
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Unable to read networking config ${configPath}: ${message}`);
        continue;
      }

      const config = renderedConfigSchema.safeParse(document);
      const macAddress = config.success
        ? config.data.network.ethernets[interfaceName]?.match?.macaddress
        : undefined;
      if (macAddress) {
        existing.macAddresses.set(macAddress.toLowerCase(), interfaceName);
      } else {
        this.logger.debug(`Networking config ${configPath} has no MAC address match.`);
      }
    }

    return existing;
  }

  /**
   * Load the subnet template and replace its placeholder ethernet with the port's interface.
   */
  private async render(
    { interfaceName, port, subnet, fixedIp }: BoundPort & { interfaceName: string },
    templatePath: string
  ): Promise<Record<string, unknown>> {
    const addressPrefix = prefixLength(subnet);

    let raw: string;
    try {
      raw = await fs.readFile(templatePath, "utf8");
    } catch (error: unknown) {
      throw new TemplateError(`Unable to read networking config template for subnet '${subnet.name}'`, templatePath, error);
    }

    let document: unknown;
    try {
      document = parse(raw);
    } catch (error: unknown) {
      throw new TemplateError("Networking config template is not valid YAML", templatePath, error);
    }

    const template = templateSchema.safeParse(document);
    if (!template.success) {
      throw new TemplateError("Networking config template has no 'network.ethernets' mapping", templatePath);
    }

    const { [TEMPLATE_INTERFACE_PLACEHOLDER]: placeholder, ...ethernets } = template.data.network.ethernets;
    const interfaceConfig = mappingSchema.safeParse(placeholder);
    if (!interfaceConfig.success) {
      throw new TemplateError(
        `Networking config template has no 'network.ethernets.${TEMPLATE_INTERFACE_PLACEHOLDER}' mapping`,
        templatePath
      );
    }

    const match = mappingSchema.safeParse(interfaceConfig.data["match"] ?? {});
    if (!match.success) {
      throw new TemplateError(
        `'network.ethernets.${TEMPLATE_INTERFACE_PLACEHOLDER}.match' must be a mapping`,
        templatePath
      );
    }

    return {
      ...template.data,
      network: {
        ...template.data.network,
        ethernets: {
          ...ethernets,
          [interfaceName]: {
            ...interfaceConfig.data,
            addresses: [`${fixedIp.ipAddress}/${addressPrefix}`],
            match: { ...match.data, macaddress: port.macAddress },
            "set-name": interfaceName,
          },
        },
      },
    };
  }
}
