import { EventEmitter } from 'eventemitter3';
import { createChildLogger } from '../utils/logger.js';
import { metrics } from '../utils/metrics.js';
import { MeshCoordinator, type PollerFactory } from './mesh-coordinator.js';
import { Reconciler } from './reconciler.js';
import { HttpVendorTransport } from '../infra/http-transport.js';
import { TagStore, ZoneStore } from '../infra/mapping-store.js';
import type { Config } from '../config/index.js';
import type { VendorTransport } from '../infra/vendor-transport.js';
import type { AuthenticationFailedError } from '../utils/errors.js';
import type { Capability, RouterCredentials } from '../types/router.js';
import type { ControlOutcome, FilterAction, FilterMode } from '../infra/router-control.js';
import type { CycleHealth, CycleReport, MeshView, TopologyChangeEvent } from '../types/mesh.js';

const logger = createChildLogger('mesh-monitor');

export interface MeshMonitorEvents {
  cycle: (report: CycleReport) => void;
  topologyChange: (event: TopologyChangeEvent) => void;
  health: (health: CycleHealth) => void;
  configurationError: (routerId: string, error: AuthenticationFailedError) => void;
}

export interface MeshMonitorOptions {
  config: Config;
  transport?: VendorTransport | undefined;
  tagStore?: TagStore | undefined;
  zoneStore?: ZoneStore | undefined;
  createPoller?: PollerFactory | undefined;
}

/**
 * Fixed-interval driver around the coordinator. Republishes every cycle's
 * outputs as typed events.
 */
export class MeshMonitor extends EventEmitter<MeshMonitorEvents> {
  private readonly config: Config;
  private readonly coordinator: MeshCoordinator;
  private readonly tagStore: TagStore | null;
  private readonly zoneStore: ZoneStore | null;
  private readonly reportedConfigErrors = new Set<string>();
  private timer: NodeJS.Timeout | null = null;
  private lastReport: CycleReport | null = null;

  constructor(options: MeshMonitorOptions) {
    super();
    this.config = options.config;

    const { features, storage, polling } = this.config;
    this.tagStore = features.devicesTags ? options.tagStore ?? new TagStore(storage.tagsFile) : null;
    this.zoneStore = features.routerZones ? options.zoneStore ?? new ZoneStore(storage.zonesFile) : null;

    const reconciler = new Reconciler({
      unavailableGraceCycles: polling.unavailableGraceCycles,
      emitInitialEvents: features.emitInitialEvents,
      tags: this.tagStore ?? undefined,
      zones: this.zoneStore ?? undefined,
    });

    this.coordinator = new MeshCoordinator({
      config: this.config,
      transport: options.transport ?? new HttpVendorTransport({ timeoutMs: polling.requestTimeoutMs }),
      reconciler,
      tags: this.tagStore ?? undefined,
      createPoller: options.createPoller,
    });
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  getCurrentView(): MeshView | null {
    return this.coordinator.getCurrentView();
  }

  getLastReport(): CycleReport | null {
    return this.lastReport;
  }

  getHealthHistory(): CycleHealth[] {
    return this.coordinator.getHealthHistory();
  }

  getTagStore(): TagStore | null {
    return this.tagStore;
  }

  getZoneStore(): ZoneStore | null {
    return this.zoneStore;
  }

  async start(): Promise<void> {
    if (this.timer) return;

    await this.reloadStores();
    this.tagStore?.watch();
    this.zoneStore?.watch();

    logger.info(
      { host: this.config.router.host, intervalMs: this.config.polling.pollIntervalMs },
      'Mesh monitor starting'
    );

    // The interval is armed only once the first cycle went through.
    try {
      await this.runCycle();
    } catch (err) {
      this.tagStore?.unwatch();
      this.zoneStore?.unwatch();
      throw err;
    }
    if (this.timer) return;

    this.timer = setInterval(() => {
      this.runCycle().catch((err: unknown) => {
        logger.error({ err }, 'Cycle crashed');
      });
    }, this.config.polling.pollIntervalMs);
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.tagStore?.unwatch();
    this.zoneStore?.unwatch();
    await this.coordinator.shutdown();
    metrics.logSummary();
    logger.info('Mesh monitor stopped');
  }

  /** Explicit reload hook for the tag and zone files. */
  async reloadStores(): Promise<void> {
    await Promise.all([this.tagStore?.reload(), this.zoneStore?.reload()]);
  }

  updateCredentials(credentials: RouterCredentials): void {
    this.coordinator.updateCredentials(credentials);
    this.reportedConfigErrors.clear();
  }

  setSwitch(routerId: string, capability: Capability, enabled: boolean): Promise<ControlOutcome> {
    return this.coordinator.setSwitch(routerId, capability, enabled);
  }

  applyWlanFilter(
    routerId: string,
    mac: string,
    mode: FilterMode,
    action: FilterAction
  ): Promise<ControlOutcome | 'filterDisabled'> {
    return this.coordinator.applyWlanFilter(routerId, mac, mode, action);
  }

  setWlanFilterMode(routerId: string, mode: FilterMode): Promise<ControlOutcome> {
    return this.coordinator.setWlanFilterMode(routerId, mode);
  }

  reboot(routerId: string): Promise<void> {
    return this.coordinator.reboot(routerId);
  }

  /** Runs one cycle now; null when one is already running. */
  async runCycle(): Promise<CycleReport | null> {
    const report = await this.coordinator.runCycle();
    if (report) {
      this.lastReport = report;
      this.publish(report);
    }
    return report;
  }

  private publish(report: CycleReport): void {
    for (const event of report.events) {
      this.emit('topologyChange', event);
    }
    this.emit('health', report.health);

    const standing = this.coordinator.getConfigurationErrors();
    for (const [routerId, error] of standing) {
      if (this.reportedConfigErrors.has(routerId)) continue;
      this.reportedConfigErrors.add(routerId);
      this.emit('configurationError', routerId, error);
    }
    for (const routerId of [...this.reportedConfigErrors]) {
      if (!standing.has(routerId)) this.reportedConfigErrors.delete(routerId);
    }

    this.emit('cycle', report);
  }
}
