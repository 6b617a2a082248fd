import { createChildLogger } from '../utils/logger.js';
import { withTimeout, TimeoutError, CircularBuffer } from '../utils/async-helpers.js';
import { metrics } from '../utils/metrics.js';
import { parseMac } from '../utils/mac.js';
import { AuthenticationFailedError, ErrorCode, MeshError, RouterUnreachableError } from '../utils/errors.js';
import { SessionClient } from '../infra/session-client.js';
import { RouterPoller } from '../infra/router-poller.js';
import {
  RouterController,
  type ControlOutcome,
  type FilterAction,
  type FilterMode,
} from '../infra/router-control.js';
import { computeClientCounts } from './client-counts.js';
import { createEmptyView } from '../types/mesh.js';
import type { Reconciler } from './reconciler.js';
import type { Config } from '../config/index.js';
import type { VendorTransport } from '../infra/vendor-transport.js';
import type { TagLookup } from '../infra/mapping-store.js';
import type { Capability, RouterAddress, RouterCredentials, RouterSnapshot } from '../types/router.js';
import type { CycleHealth, CycleReport, MeshView, TopologyChangeEvent } from '../types/mesh.js';

const logger = createChildLogger('mesh-coordinator');

const HEALTH_HISTORY_SIZE = 20;

export interface PollerTarget {
  routerId: string;
  isPrimary: boolean;
  address: RouterAddress;
  credentials: RouterCredentials;
}

export type PollerFactory = (target: PollerTarget) => RouterPoller;

export interface MeshCoordinatorOptions {
  config: Config;
  transport: VendorTransport;
  reconciler: Reconciler;
  /** Source of tag names for the counts, when device tags are enabled. */
  tags?: TagLookup | undefined;
  createPoller?: PollerFactory | undefined;
  now?: (() => number) | undefined;
}

/**
 * Runs one poll cycle at a time: the primary first, then every satellite the
 * primary reports, all bounded by the cycle deadline.
 */
export class MeshCoordinator {
  private readonly config: Config;
  private readonly reconciler: Reconciler;
  private readonly tags: TagLookup | undefined;
  private readonly createPoller: PollerFactory;
  private readonly now: () => number;
  private credentials: RouterCredentials;
  private readonly primary: RouterPoller;
  private readonly satellites = new Map<string, RouterPoller>();
  /** Consecutive cycles a known satellite was missing from the primary's list. */
  private readonly absentCycles = new Map<string, number>();
  private readonly configurationErrors = new Map<string, AuthenticationFailedError>();
  private readonly history = new CircularBuffer<CycleHealth>(HEALTH_HISTORY_SIZE);
  private cycleInFlight = false;
  private cycleNumber = 0;

  constructor(options: MeshCoordinatorOptions) {
    this.config = options.config;
    this.reconciler = options.reconciler;
    this.tags = options.tags;
    this.now = options.now ?? Date.now;
    this.credentials = {
      username: options.config.router.username,
      password: options.config.router.password,
    };

    const transport = options.transport;
    this.createPoller = options.createPoller ?? ((target) => new RouterPoller({
      routerId: target.routerId,
      isPrimary: target.isPrimary,
      session: new SessionClient({
        routerId: target.routerId,
        address: target.address,
        credentials: target.credentials,
        transport,
        requestTimeoutMs: this.config.polling.requestTimeoutMs,
        cooldownMs: this.config.polling.sessionCooldownMs,
      }),
    }));

    this.primary = this.spawnPoller(this.config.router.primaryRouterId, true, this.config.router.host);
  }

  isCycleRunning(): boolean {
    return this.cycleInFlight;
  }

  getCurrentView(): MeshView | null {
    return this.reconciler.getCurrentView();
  }

  getSatelliteIds(): string[] {
    return [...this.satellites.keys()].sort();
  }

  getConfigurationErrors(): ReadonlyMap<string, AuthenticationFailedError> {
    return this.configurationErrors;
  }

  getHealthHistory(): CycleHealth[] {
    return this.history.toArray();
  }

  getLastHealth(): CycleHealth | undefined {
    return this.history.latest();
  }

  /** Replaces the credentials of every session and clears auth failures. */
  updateCredentials(credentials: RouterCredentials): void {
    this.credentials = { ...credentials };
    this.primary.session.updateCredentials(credentials);
    for (const poller of this.satellites.values()) {
      poller.session.updateCredentials(credentials);
    }
    this.configurationErrors.clear();
  }

  /** null when the previous cycle is still running. */
  async runCycle(): Promise<CycleReport | null> {
    if (this.cycleInFlight) {
      metrics.cyclesSkipped.inc();
      logger.warn({ cycle: this.cycleNumber }, 'Previous cycle still running, skipping this one');
      return null;
    }

    this.cycleInFlight = true;
    try {
      return await this.executeCycle();
    } finally {
      this.cycleInFlight = false;
    }
  }

  async shutdown(): Promise<void> {
    const pollers = [this.primary, ...this.satellites.values()];
    this.satellites.clear();
    this.absentCycles.clear();
    await Promise.all(pollers.map(poller => poller.dispose()));
    logger.info({ routers: pollers.length }, 'Coordinator shut down');
  }

  /** Write access to one router of the mesh, gated on what its last poll found. */
  getController(routerId: string): RouterController {
    const poller = this.pollerFor(routerId);
    return new RouterController({
      routerId: poller.routerId,
      session: poller.session,
      capabilities: () => poller.getKnownCapabilities(),
    });
  }

  async setSwitch(routerId: string, capability: Capability, enabled: boolean): Promise<ControlOutcome> {
    return this.getController(routerId).setSwitch(capability, enabled);
  }

  /** The access list entry is named after the device as the mesh view knows it. */
  async applyWlanFilter(
    routerId: string,
    mac: string,
    mode: FilterMode,
    action: FilterAction
  ): Promise<ControlOutcome | 'filterDisabled'> {
    const controller = this.getController(routerId);
    const known = this.getCurrentView()?.devices.get(parseMac(mac) ?? mac);
    return controller.applyWlanFilter(mode, action, mac, known?.displayName);
  }

  async setWlanFilterMode(routerId: string, mode: FilterMode): Promise<ControlOutcome> {
    return this.getController(routerId).setWlanFilterMode(mode);
  }

  async reboot(routerId: string): Promise<void> {
    return this.getController(routerId).reboot();
  }

  private pollerFor(routerId: string): RouterPoller {
    const poller = routerId === this.primary.routerId ? this.primary : this.satellites.get(parseMac(routerId) ?? routerId);
    if (!poller) {
      throw new MeshError(ErrorCode.ROUTER_NOT_FOUND, `No router '${routerId}' in the mesh`, {
        context: { routerId },
      });
    }
    return poller;
  }

  private async executeCycle(): Promise<CycleReport> {
    const cycle = ++this.cycleNumber;
    const startedAt = this.now();
    const deadline = startedAt + this.config.polling.cycleTimeoutMs;

    let primarySnapshot: RouterSnapshot;
    try {
      primarySnapshot = await this.pollBounded(this.primary, deadline);
      this.configurationErrors.delete(this.primary.routerId);
    } catch (err) {
      return this.failCycle(cycle, startedAt, err);
    }

    const absent = this.syncSatellites(primarySnapshot);
    const { snapshots, unreachable: failed } = await this.pollSatellites(deadline, absent);
    const unreachable = [...failed, ...absent].sort();

    const result = this.reconciler.reconcile({
      snapshots: [primarySnapshot, ...snapshots],
      unreachableRouterIds: unreachable,
      generatedAt: new Date(this.now()),
    });

    const base = { cycle, startedAt: new Date(startedAt), durationMs: this.now() - startedAt };
    const health: CycleHealth = unreachable.length > 0
      ? { ...base, status: 'partial', unreachableRouterIds: unreachable }
      : { ...base, status: 'succeeded' };

    return this.finish(health, result.view, result.events);
  }

  private async pollBounded(poller: RouterPoller, deadline: number): Promise<RouterSnapshot> {
    const remaining = deadline - this.now();
    if (remaining <= 0) {
      throw new RouterUnreachableError(poller.routerId, 'cycle deadline passed', {
        cause: new MeshError(ErrorCode.CYCLE_TIMEOUT, 'Cycle deadline passed before the poll started'),
      });
    }

    try {
      // On timeout the poll keeps running; its result is dropped.
      return await withTimeout(poller.poll(), remaining, `Poll of '${poller.routerId}' outlived the cycle`);
    } catch (err) {
      if (err instanceof TimeoutError) {
        throw new RouterUnreachableError(poller.routerId, 'poll outlived the cycle deadline', {
          cause: new MeshError(ErrorCode.CYCLE_TIMEOUT, err.message, { cause: err, recoverable: true }),
        });
      }
      throw err;
    }
  }

  private async pollSatellites(
    deadline: number,
    absent: readonly string[]
  ): Promise<{ snapshots: RouterSnapshot[]; unreachable: string[] }> {
    const pollers = [...this.satellites.values()].filter(poller => !absent.includes(poller.routerId));
    const results = await Promise.allSettled(pollers.map(poller => this.pollBounded(poller, deadline)));

    const snapshots: RouterSnapshot[] = [];
    const unreachable: string[] = [];

    results.forEach((result, index) => {
      const poller = pollers[index];
      if (!poller) return;

      if (result.status === 'fulfilled') {
        snapshots.push(result.value);
        this.configurationErrors.delete(poller.routerId);
        return;
      }

      unreachable.push(poller.routerId);
      const reason: unknown = result.reason;
      if (reason instanceof AuthenticationFailedError) {
        this.configurationErrors.set(poller.routerId, reason);
      }
      logger.warn(
        { routerId: poller.routerId, err: reason instanceof Error ? reason.message : String(reason) },
        'Satellite did not report this cycle'
      );
    });

    return { snapshots, unreachable };
  }

  /**
   * Align the satellite pollers with the primary's client list. Returns the
   * satellites kept through their grace period although the primary did not
   * list them; they are not polled this cycle.
   */
  private syncSatellites(primarySnapshot: RouterSnapshot): string[] {
    const targets = new Map<string, string>();
    for (const sighting of primarySnapshot.directClients) {
      if (!sighting.isRouterDevice || sighting.mac === this.primary.routerId) continue;
      if (!sighting.ip) {
        logger.warn({ mac: sighting.mac }, 'Satellite reported without an IP address, skipping');
        continue;
      }
      targets.set(sighting.mac, sighting.ip);
    }

    const graceCycles = this.config.polling.unavailableGraceCycles;
    const absent: string[] = [];

    for (const [routerId, poller] of this.satellites) {
      const host = targets.get(routerId);
      if (host === poller.host) {
        this.absentCycles.delete(routerId);
        continue;
      }

      if (host === undefined) {
        const missed = (this.absentCycles.get(routerId) ?? 0) + 1;
        if (missed <= graceCycles) {
          this.absentCycles.set(routerId, missed);
          absent.push(routerId);
          logger.info({ routerId, missed }, 'Satellite missing from the primary, keeping it for now');
          continue;
        }
      }

      this.satellites.delete(routerId);
      this.absentCycles.delete(routerId);
      this.configurationErrors.delete(routerId);
      this.retire(poller, host === undefined ? 'left the mesh' : 'address changed');
    }

    for (const [routerId, host] of targets) {
      if (this.satellites.has(routerId)) continue;
      this.satellites.set(routerId, this.spawnPoller(routerId, false, host));
      logger.info({ routerId, host }, 'Satellite discovered');
    }

    return absent;
  }

  private spawnPoller(routerId: string, isPrimary: boolean, host: string): RouterPoller {
    const { port, useSsl, verifySsl } = this.config.router;
    return this.createPoller({
      routerId,
      isPrimary,
      address: { host, port, useSsl, verifySsl },
      credentials: { ...this.credentials },
    });
  }

  private retire(poller: RouterPoller, reason: string): void {
    logger.info({ routerId: poller.routerId, reason }, 'Satellite poller retired');
    poller.dispose().catch((err: unknown) => {
      logger.warn({ routerId: poller.routerId, err }, 'Satellite poller did not shut down cleanly');
    });
  }

  private failCycle(cycle: number, startedAt: number, err: unknown): CycleReport {
    const error = MeshError.fromError(err, ErrorCode.CYCLE_FAILED);
    if (error instanceof AuthenticationFailedError) {
      this.configurationErrors.set(this.primary.routerId, error);
    }
    logger.error({ cycle, err: error.message, code: error.code }, 'Primary router failed, keeping previous view');

    const health: CycleHealth = {
      cycle,
      startedAt: new Date(startedAt),
      durationMs: this.now() - startedAt,
      status: 'failed',
      reason: error.message,
      errorCode: error.code,
    };
    const view = this.reconciler.getCurrentView() ?? createEmptyView();
    return this.finish(health, view, []);
  }

  private finish(health: CycleHealth, view: MeshView, events: TopologyChangeEvent[]): CycleReport {
    const counts = computeClientCounts(view, { knownTags: this.tags?.knownTags() });

    this.history.push(health);
    metrics.recordCycle(health.status, health.durationMs);
    metrics.routerCount.set(view.routers.size);
    metrics.deviceCount.set(view.devices.size);

    logger.info(
      {
        cycle: health.cycle,
        status: health.status,
        durationMs: health.durationMs,
        routers: view.routers.size,
        devices: view.devices.size,
        events: events.length,
      },
      'Cycle finished'
    );

    return { health, view, events, counts };
  }
}
