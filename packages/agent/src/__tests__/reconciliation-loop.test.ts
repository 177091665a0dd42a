import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { NetworkingConfigHandler } from "../networking/interface";
import { NetplanConfigHandler } from "../networking/netplan/netplan-handler";
import { PortReconciler } from "../reconciler/port-reconciler";
import { ReconciliationLoop, type ReconciliationLoopOptions, type TickResult } from "../reconciler/reconciliation-loop";
import type { CommandRunner } from "../utils/run-command";
import { createFakeClient, FakeNetworkingClient, SERVER, SUBNET_1, subnetMap } from "./fake-networking-client";

function createStubHandler(): jest.Mocked<NetworkingConfigHandler> {
  return {
    type: "netplan",
    create: jest.fn().mockResolvedValue([]),
    apply: jest.fn().mockResolvedValue(false),
    needsApply: jest.fn().mockReturnValue(false),
  };
}

function createLoop(
  client: FakeNetworkingClient,
  handler: NetworkingConfigHandler,
  options: Partial<ReconciliationLoopOptions> = {},
  portTags: string[] = []
): { loop: ReconciliationLoop; reconciler: PortReconciler } {
  const reconciler = new PortReconciler(client, {
    portNamePrefix: "opp",
    portTags,
    waitForPort: false,
    pollIntervalMs: 0,
  });
  const loop = new ReconciliationLoop(client, reconciler, handler, SERVER, subnetMap(SUBNET_1), {
    configDestination: "/etc/netplan",
    configTemplates: "/etc/netplan/templates",
    intervalSeconds: 0,
    ...options,
  });
  return { loop, reconciler };
}

function nextMacrotask(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe("ReconciliationLoop", () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("runTick", () => {
    let destination: string;
    let templates: string;

    beforeEach(async () => {
      destination = await mkdtemp(join(tmpdir(), "loop-dest-"));
      templates = await mkdtemp(join(tmpdir(), "loop-templates-"));
      await writeFile(join(templates, "s1.yaml"), "network:\n  ethernets:\n    ensX:\n      dhcp4: false\n");
    });

    afterEach(async () => {
      await rm(destination, { recursive: true, force: true });
      await rm(templates, { recursive: true, force: true });
    });

    it("should attach the missing port, write its config and apply it", async () => {
      const client = createFakeClient();
      const runCommand = jest.fn<ReturnType<CommandRunner>, Parameters<CommandRunner>>();
      runCommand.mockResolvedValue({ exitCode: 0, output: "" });
      const { loop } = createLoop(client, new NetplanConfigHandler({ runCommand, listInterfaces: () => [] }), {
        configDestination: destination,
        configTemplates: templates,
      });

      const result = await loop.runTick();

      expect(result).toEqual<TickResult>({
        missingSubnetIds: ["subnet-1"],
        createdPortIds: ["port-1"],
        attachedPortIds: ["port-1"],
        deletedPortIds: [],
        writtenConfigs: [join(destination, "51-opp-ens4.yaml")],
        applied: true,
      });
      expect(client.ports.get("port-1")?.deviceId).toBe("srv-1");
      expect(runCommand).toHaveBeenCalledTimes(1);
    });

    it("should change nothing on the next tick", async () => {
      const client = createFakeClient();
      const runCommand = jest.fn<ReturnType<CommandRunner>, Parameters<CommandRunner>>();
      runCommand.mockResolvedValue({ exitCode: 0, output: "" });
      const { loop } = createLoop(client, new NetplanConfigHandler({ runCommand, listInterfaces: () => [] }), {
        configDestination: destination,
        configTemplates: templates,
      });

      await loop.runTick();
      const second = await loop.runTick();

      expect(second).toEqual<TickResult>({
        missingSubnetIds: [],
        createdPortIds: [],
        attachedPortIds: [],
        deletedPortIds: [],
        writtenConfigs: [],
        applied: false,
      });
      expect(client.ports.size).toBe(1);
      expect(await readdir(destination)).toEqual(["51-opp-ens4.yaml"]);
      expect(runCommand).toHaveBeenCalledTimes(1);
    });
  });

  it("should clean up stale ports before listing the server ports", async () => {
    const client = createFakeClient();
    client.addPort({ id: "stale", name: "opp-old-s1", tags: ["opp"] });
    const handler = createStubHandler();
    const { loop, reconciler } = createLoop(client, handler, { cleanup: true }, ["opp"]);
    const cleanup = jest.spyOn(reconciler, "cleanup");
    const listPorts = jest.spyOn(client, "listPorts");

    const result = await loop.runTick();

    expect(result.deletedPortIds).toEqual(["stale"]);
    expect(client.ports.has("stale")).toBe(false);
    expect(cleanup.mock.invocationCallOrder[0]).toBeLessThan(listPorts.mock.invocationCallOrder[1]);
    expect(listPorts).toHaveBeenLastCalledWith({ deviceId: "srv-1" });
  });

  it("should skip cleanup when it is disabled", async () => {
    const client = createFakeClient();
    client.addPort({ id: "stale", name: "opp-old-s1", tags: ["opp"] });
    const { loop, reconciler } = createLoop(client, createStubHandler(), {}, ["opp"]);
    const cleanup = jest.spyOn(reconciler, "cleanup");

    const result = await loop.runTick();

    expect(cleanup).not.toHaveBeenCalled();
    expect(result.deletedPortIds).toEqual([]);
    expect(client.ports.has("stale")).toBe(true);
  });

  it("should pass the attached ports to the networking config handler", async () => {
    const client = createFakeClient();
    const handler = createStubHandler();
    const { loop } = createLoop(client, handler);

    await loop.runTick();

    expect(handler.create).toHaveBeenCalledWith(
      [expect.objectContaining({ id: "port-1", deviceId: "srv-1" })],
      subnetMap(SUBNET_1),
      "/etc/netplan",
      "/etc/netplan/templates"
    );
    expect(handler.apply).toHaveBeenCalledTimes(1);
  });

  describe("run", () => {
    it("should tick until stopped", async () => {
      const client = createFakeClient();
      const results: TickResult[] = [];
      const { loop } = createLoop(client, createStubHandler(), {
        onTickComplete: (result) => {
          results.push(result);
          if (results.length === 2) loop.stop();
        },
      });

      await loop.run();

      expect(results).toHaveLength(2);
      expect(results[0].createdPortIds).toEqual(["port-1"]);
      expect(results[1].createdPortIds).toEqual([]);
      expect(loop.isRunning()).toBe(false);
    });

    it("should wake up from the sleep when stopped", async () => {
      const client = createFakeClient();
      let ticks = 0;
      let firstTick: () => void = () => undefined;
      const ticked = new Promise<void>((resolve) => {
        firstTick = resolve;
      });
      const { loop } = createLoop(client, createStubHandler(), {
        intervalSeconds: 3600,
        onTickComplete: () => {
          ticks++;
          firstTick();
        },
      });

      const running = loop.run();
      await ticked;
      await nextMacrotask();
      expect(loop.isRunning()).toBe(true);

      loop.stop();
      await running;

      expect(ticks).toBe(1);
      expect(loop.isRunning()).toBe(false);
    });

    it("should reject with the error of a failing tick", async () => {
      const client = createFakeClient();
      jest.spyOn(client, "listPorts").mockRejectedValue(new Error("Neutron unavailable"));
      const { loop } = createLoop(client, createStubHandler());

      await expect(loop.run()).rejects.toThrow("Neutron unavailable");
      expect(loop.isRunning()).toBe(false);
    });

    it("should not run twice at the same time", async () => {
      const client = createFakeClient();
      const { loop } = createLoop(client, createStubHandler(), { intervalSeconds: 3600 });

      const running = loop.run();
      await expect(loop.run()).rejects.toThrow("Reconciliation loop is already running");

      loop.stop();
      await running;
    });
  });

  it("should default to a 30 second interval", () => {
    const client = createFakeClient();
    const { loop } = createLoop(client, createStubHandler(), { intervalSeconds: undefined });

    expect(loop.getIntervalMs()).toBe(30_000);
  });
});
