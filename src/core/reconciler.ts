import { createChildLogger } from '../utils/logger.js';
import { ErrorCode, MeshError } from '../utils/errors.js';
import { isWireless, type ClientSighting, type RouterSnapshot } from '../types/router.js';
import type { DeviceState, MeshView, RouterEntry, TopologyChangeEvent } from '../types/mesh.js';
import type { TagLookup, ZoneLookup } from '../infra/mapping-store.js';

const logger = createChildLogger('reconciler');

const NO_TAGS: ReadonlySet<string> = new Set();

export interface ReconcileInput {
  snapshots: readonly RouterSnapshot[];
  /** Known routers that failed to report this cycle. */
  unreachableRouterIds: readonly string[];
  generatedAt: Date;
}

export interface ReconcileResult {
  view: MeshView;
  previous: MeshView | null;
  events: TopologyChangeEvent[];
}

export interface Enrichment {
  /** Absent when device tags are disabled. */
  tags?: TagLookup | undefined;
  /** Absent when router zones are disabled. */
  zones?: ZoneLookup | undefined;
}

export interface ReconcilerOptions extends Enrichment {
  unavailableGraceCycles: number;
  /** Report the very first view as a batch of additions. */
  emitInitialEvents?: boolean | undefined;
}

interface RankedSighting {
  sighting: ClientSighting;
  router: RouterSnapshot;
}

function rankInterface(sighting: ClientSighting): number {
  if (sighting.interfaceType === 'LAN') return 2;
  return isWireless(sighting.interfaceType) ? 1 : 0;
}

/**
 * Negative when `a` should be preferred: wired over wireless, then the
 * stronger signal, then the primary, then the lower routerId.
 */
export function compareSightings(a: RankedSighting, b: RankedSighting): number {
  const byInterface = rankInterface(b.sighting) - rankInterface(a.sighting);
  if (byInterface !== 0) return byInterface;

  const rssiA = a.sighting.rssi ?? Number.NEGATIVE_INFINITY;
  const rssiB = b.sighting.rssi ?? Number.NEGATIVE_INFINITY;
  if (rssiA !== rssiB) return rssiA > rssiB ? -1 : 1;

  if (a.router.isPrimary !== b.router.isPrimary) return a.router.isPrimary ? -1 : 1;

  return a.router.routerId.localeCompare(b.router.routerId);
}

function firstNonEmpty(...values: Array<string | undefined>): string {
  return values.find(value => value !== undefined && value !== '') ?? '';
}

function toRouterEntry(snapshot: RouterSnapshot): RouterEntry {
  const { directClients: _clients, polledAt, ...identity } = snapshot;
  return { ...identity, available: true, missedCycles: 0, lastSeenAt: polledAt };
}

function mergeRouters(
  input: ReconcileInput,
  previous: MeshView | null,
  graceCycles: number
): Map<string, RouterEntry> {
  const routers = new Map<string, RouterEntry>();

  for (const snapshot of input.snapshots) {
    routers.set(snapshot.routerId, toRouterEntry(snapshot));
  }

  for (const routerId of input.unreachableRouterIds) {
    if (routers.has(routerId)) continue;
    const known = previous?.routers.get(routerId);
    if (!known) continue;

    const missedCycles = known.missedCycles + 1;
    if (missedCycles > graceCycles) {
      logger.info({ routerId, missedCycles }, 'Router exceeded its grace period');
      continue;
    }
    routers.set(routerId, { ...known, available: false, missedCycles });
  }

  return routers;
}

/**
 * Merge one batch of snapshots into a fresh MeshView. Pure apart from reading
 * the enrichment lookups.
 */
export function buildMeshView(
  input: ReconcileInput,
  previous: MeshView | null,
  options: ReconcilerOptions
): MeshView {
  const routers = mergeRouters(input, previous, options.unavailableGraceCycles);
  const candidates = new Map<string, RankedSighting[]>();

  for (const snapshot of input.snapshots) {
    for (const sighting of snapshot.directClients) {
      const list = candidates.get(sighting.mac) ?? [];
      list.push({ sighting, router: snapshot });
      candidates.set(sighting.mac, list);
    }
  }

  const devices = new Map<string, DeviceState>();

  for (const [mac, sightings] of candidates) {
    const ranked = [...sightings].sort(compareSightings);
    const winner = ranked[0];
    if (!winner) continue;

    const prior = previous?.devices.get(mac);
    const pick = (field: 'ip' | 'hostname' | 'displayName'): string =>
      firstNonEmpty(...ranked.map(candidate => candidate.sighting[field]), prior?.[field]);

    devices.set(mac, enrich({
      ...winner.sighting,
      ip: pick('ip'),
      hostname: pick('hostname'),
      displayName: pick('displayName'),
      connectedViaRouterId: winner.router.routerId,
      tags: NO_TAGS,
      zone: null,
      stale: false,
      lastSeenAt: winner.router.polledAt,
    }, options));
  }

  // Devices behind a router that is riding out its grace period stay, marked stale.
  if (previous) {
    for (const [mac, device] of previous.devices) {
      if (devices.has(mac)) continue;
      const router = routers.get(device.connectedViaRouterId);
      if (!router || router.available) continue;
      devices.set(mac, enrich({ ...device, stale: true }, options));
    }
  }

  return { routers, devices, generatedAt: input.generatedAt };
}

function enrich(device: DeviceState, enrichment: Enrichment): DeviceState {
  return {
    ...device,
    tags: enrichment.tags?.tagsFor(device.mac) ?? NO_TAGS,
    zone: enrichment.zones?.zoneFor(device.connectedViaRouterId) ?? null,
  };
}

function routerOf(view: MeshView, routerId: string): RouterEntry {
  const router = view.routers.get(routerId);
  if (!router) {
    throw new MeshError(ErrorCode.ROUTER_NOT_FOUND, `Device references unknown router '${routerId}'`, {
      context: { routerId },
    });
  }
  return router;
}

const byKey = <T>(key: (item: T) => string) => (a: T, b: T): number => key(a).localeCompare(key(b));

/**
 * Changes from `previous` to `next`: router removals, router additions, then
 * device disconnects, connects and moves. Each group is sorted by id.
 */
export function diffMeshViews(previous: MeshView, next: MeshView): TopologyChangeEvent[] {
  const events: TopologyChangeEvent[] = [];

  const removedRouters = [...previous.routers.values()]
    .filter(router => !next.routers.has(router.routerId))
    .sort(byKey(router => router.routerId));
  const addedRouters = [...next.routers.values()]
    .filter(router => !previous.routers.has(router.routerId))
    .sort(byKey(router => router.routerId));

  for (const router of removedRouters) events.push({ type: 'routerRemoved', router });
  for (const router of addedRouters) events.push({ type: 'routerAdded', router });

  const disconnected = [...previous.devices.values()]
    .filter(device => !next.devices.has(device.mac))
    .sort(byKey(device => device.mac));
  const connected = [...next.devices.values()]
    .filter(device => !previous.devices.has(device.mac))
    .sort(byKey(device => device.mac));
  const moved = [...next.devices.values()]
    .filter(device => {
      const before = previous.devices.get(device.mac);
      return before !== undefined && before.connectedViaRouterId !== device.connectedViaRouterId;
    })
    .sort(byKey(device => device.mac));

  for (const device of disconnected) {
    events.push({ type: 'deviceDisconnected', device, router: routerOf(previous, device.connectedViaRouterId) });
  }
  for (const device of connected) {
    events.push({ type: 'deviceConnected', device, router: routerOf(next, device.connectedViaRouterId) });
  }
  for (const device of moved) {
    const before = previous.devices.get(device.mac);
    if (!before) continue;
    events.push({
      type: 'deviceMoved',
      device,
      fromRouter: routerOf(previous, before.connectedViaRouterId),
      toRouter: routerOf(next, device.connectedViaRouterId),
    });
  }

  return events;
}

/**
 * Holds the current and previous MeshView. Each reconcile replaces both
 * slots wholesale.
 */
export class Reconciler {
  private current: MeshView | null = null;
  private previous: MeshView | null = null;
  private readonly options: ReconcilerOptions;

  constructor(options: ReconcilerOptions) {
    this.options = { ...options };
  }

  getCurrentView(): MeshView | null {
    return this.current;
  }

  getPreviousView(): MeshView | null {
    return this.previous;
  }

  setEnrichment(enrichment: Enrichment): void {
    this.options.tags = enrichment.tags;
    this.options.zones = enrichment.zones;
  }

  reconcile(input: ReconcileInput): ReconcileResult {
    const prior = this.current;
    const view = buildMeshView(input, prior, this.options);

    let events: TopologyChangeEvent[] = [];
    if (prior) {
      events = diffMeshViews(prior, view);
    } else if (this.options.emitInitialEvents) {
      events = diffMeshViews({ routers: new Map(), devices: new Map(), generatedAt: input.generatedAt }, view);
    }

    this.previous = prior;
    this.current = view;

    logger.debug(
      { routers: view.routers.size, devices: view.devices.size, events: events.length },
      'Mesh view reconciled'
    );
    return { view, previous: prior, events };
  }
}
