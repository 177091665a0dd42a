/**
 * Reconciliation Loop
 *
 * Runs one reconciliation tick at a time: cleanup, diff, reconcile ports,
 * generate networking config, apply. Sleeps for the configured interval between
 * ticks. A failing tick ends the loop.
 */
import { Logger } from "@nestjs/common";
import { DEFAULT_RECONCILIATION_INTERVAL_SECONDS } from "@port-provider/core";
import type { Server, SubnetMap } from "@port-provider/core";
import type { NetworkingClient } from "@port-provider/openstack";
import type { NetworkingConfigHandler } from "../networking/interface";
import type { PortReconciler } from "./port-reconciler";

export interface ReconciliationLoopOptions {
  /** Directory the networking config files are written to */
  configDestination: string;
  /** Directory holding the per-subnet templates */
  configTemplates: string;
  /** Seconds between ticks (default: 30) */
  intervalSeconds?: number;
  /** Delete stale tagged ports at the start of each tick */
  cleanup?: boolean;
  /** Callback invoked after each tick completes */
  onTickComplete?: (result: TickResult) => void;
}

export interface TickResult {
  missingSubnetIds: string[];
  createdPortIds: string[];
  attachedPortIds: string[];
  deletedPortIds: string[];
  writtenConfigs: string[];
  applied: boolean;
}

export class ReconciliationLoop {
  private readonly logger = new Logger(ReconciliationLoop.name);
  private readonly intervalMs: number;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private wake: (() => void) | null = null;
  private running = false;

  constructor(
    private readonly client: NetworkingClient,
    private readonly reconciler: PortReconciler,
    private readonly handler: NetworkingConfigHandler,
    private readonly server: Server,
    private readonly expectedSubnets: SubnetMap,
    private readonly options: ReconciliationLoopOptions
  ) {
    this.intervalMs = (options.intervalSeconds ?? DEFAULT_RECONCILIATION_INTERVAL_SECONDS) * 1000;
  }

  /**
   * Run ticks until stop() is called. Rejects with the error of the first
   * failing tick.
   */
  async run(): Promise<void> {
    if (this.running) {
      throw new Error("Reconciliation loop is already running");
    }
    this.running = true;

    try {
      while (this.running) {
        await this.runTick();
        if (!this.running) break;

        this.logger.debug(`Wait for ${this.intervalMs / 1000}s until reconciliation.`);
        await this.sleep();
      }
    } finally {
      this.running = false;
      this.clearTimer();
    }
  }

  /**
   * Stop after the current tick, or immediately when sleeping.
   */
  stop(): void {
    this.running = false;
    this.clearTimer();
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  isRunning(): boolean {
    return this.running;
  }

  getIntervalMs(): number {
    return this.intervalMs;
  }

  /**
   * Run a single reconciliation tick. Errors are not caught.
   */
  async runTick(): Promise<TickResult> {
    const deletedPortIds = this.options.cleanup ? await this.reconciler.cleanup() : [];

    const actualPorts = await this.client.listPorts({ deviceId: this.server.id });
    const { ports, missingSubnetIds, createdPortIds, attachedPortIds } = await this.reconciler.reconcile(
      this.server,
      this.expectedSubnets,
      actualPorts
    );

    const writtenConfigs = await this.handler.create(
      ports,
      this.expectedSubnets,
      this.options.configDestination,
      this.options.configTemplates
    );
    const applied = await this.handler.apply();

    const result: TickResult = {
      missingSubnetIds,
      createdPortIds,
      attachedPortIds,
      deletedPortIds,
      writtenConfigs,
      applied,
    };
    this.options.onTickComplete?.(result);
    return result;
  }

  private sleep(): Promise<void> {
    return new Promise((resolve) => {
      this.wake = resolve;
      this.timer = setTimeout(() => {
        this.timer = null;
        this.wake = null;
        resolve();
      }, this.intervalMs);
    });
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
