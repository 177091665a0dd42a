import { Logger } from "@nestjs/common";
import { ConfigurationError } from "@port-provider/core";
import { buildAgentConfig, run, toNestLogLevels } from "../commands/run";

describe("buildAgentConfig", () => {
  it("should map command line options onto the agent config", () => {
    const config = buildAgentConfig({
      cloudConfig: "/etc/occm/cloud.config",
      nodeName: "node1",
      subnet: ["s1", "s2"],
      portNamePrefix: "opp",
      portTag: ["opp", "k8s"],
      cleanup: true,
      waitForPort: true,
      networkingConfigType: "netplan",
      networkingConfigDestination: "/tmp/netplan",
      networkingConfigTemplates: "/tmp/templates",
      reconciliationInterval: 10,
      applyCmd: "netplan apply --debug",
      logLevel: "debug",
    });

    expect(config).toEqual({
      cloudConfig: "/etc/occm/cloud.config",
      nodeName: "node1",
      subnets: ["s1", "s2"],
      portNamePrefix: "opp",
      portTags: ["opp", "k8s"],
      cleanup: true,
      waitForPort: true,
      networkingConfigType: "netplan",
      networkingConfigDestination: "/tmp/netplan",
      networkingConfigTemplates: "/tmp/templates",
      reconciliationInterval: 10,
      applyCmd: "netplan apply --debug",
      logLevel: "DEBUG",
    });
  });

  it("should fill in defaults for omitted options", () => {
    const config = buildAgentConfig({ nodeName: "node1", subnet: ["s1"] });

    expect(config.cloudConfig).toBe("/etc/kubernetes/cloud.config");
    expect(config.networkingConfigDestination).toBe("/etc/netplan");
    expect(config.reconciliationInterval).toBe(30);
    expect(config.cleanup).toBe(false);
    expect(config.logLevel).toBe("INFO");
  });

  it("should reject a missing node name", () => {
    expect(() => buildAgentConfig({ subnet: ["s1"] })).toThrow(ConfigurationError);
  });

  it("should reject an interval that is not a number", () => {
    expect(() => buildAgentConfig({ nodeName: "node1", subnet: ["s1"], reconciliationInterval: Number("soon") })).toThrow(
      /reconciliationInterval/
    );
  });

  it("should reject cleanup without port tags", () => {
    expect(() => buildAgentConfig({ nodeName: "node1", subnet: ["s1"], cleanup: true })).toThrow(
      "cleanup: Cleanup requires at least one port tag"
    );
  });

  it("should reject an unknown log level", () => {
    expect(() => buildAgentConfig({ nodeName: "node1", subnet: ["s1"], logLevel: "trace" })).toThrow(/logLevel/);
  });
});

describe("toNestLogLevels", () => {
  it("should enable only errors for ERROR", () => {
    expect(toNestLogLevels("ERROR")).toEqual(["fatal", "error"]);
  });

  it("should add warnings and info for INFO", () => {
    expect(toNestLogLevels("INFO")).toEqual(["fatal", "error", "warn", "log"]);
  });

  it("should enable everything for DEBUG", () => {
    expect(toNestLogLevels("DEBUG")).toEqual(["fatal", "error", "warn", "log", "debug", "verbose"]);
  });
});

describe("run", () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("should report a fatal error once and exit with status 1", async () => {
    const exit = jest.spyOn(process, "exit").mockImplementation((() => undefined) as () => never);
    const fatal = jest.spyOn(Logger.prototype, "fatal");
    const consoleError = jest.spyOn(console, "error").mockImplementation(() => undefined);

    await run({ subnet: ["s1"] });

    expect(fatal).toHaveBeenCalledTimes(1);
    expect(fatal).toHaveBeenCalledWith("Invalid agent configuration: nodeName: Required");
    expect(consoleError).not.toHaveBeenCalled();
    expect(exit).toHaveBeenCalledWith(1);
  });
});
