import type { ClientSighting, RouterIdentity } from './router.js';
import type { ErrorCode } from '../utils/errors.js';

export interface RouterEntry extends RouterIdentity {
  /** False while the router is kept through its unavailability grace period. */
  readonly available: boolean;
  readonly missedCycles: number;
  readonly lastSeenAt: Date;
}

export interface DeviceState extends Omit<ClientSighting, 'ip' | 'hostname' | 'displayName'> {
  readonly ip: string;
  readonly hostname: string;
  readonly displayName: string;
  readonly connectedViaRouterId: string;
  readonly tags: ReadonlySet<string>;
  readonly zone: string | null;
  /** Carried over from a router that missed this cycle. */
  readonly stale: boolean;
  readonly lastSeenAt: Date;
}

/**
 * Canonical mesh state. Each mac appears at most once and every
 * connectedViaRouterId is a key of `routers`.
 */
export interface MeshView {
  readonly routers: ReadonlyMap<string, RouterEntry>;
  readonly devices: ReadonlyMap<string, DeviceState>;
  readonly generatedAt: Date;
}

export type TopologyChangeEvent =
  | { readonly type: 'routerAdded'; readonly router: RouterEntry }
  | { readonly type: 'routerRemoved'; readonly router: RouterEntry }
  | { readonly type: 'deviceDisconnected'; readonly device: DeviceState; readonly router: RouterEntry }
  | { readonly type: 'deviceConnected'; readonly device: DeviceState; readonly router: RouterEntry }
  | {
      readonly type: 'deviceMoved';
      readonly device: DeviceState;
      readonly fromRouter: RouterEntry;
      readonly toRouter: RouterEntry;
    };

export type TopologyChangeType = TopologyChangeEvent['type'];

export interface ClientCounts {
  totalClients: number;
  guestClients: number;
  hilinkClients: number;
  wirelessClients: number;
  lanClients: number;
  wifi24Clients: number;
  wifi5Clients: number;
  taggedClients: Record<string, number>;
  untaggedClients: number;
}

export interface MeshClientCounts {
  readonly perRouter: ReadonlyMap<string, ClientCounts>;
  readonly total: ClientCounts;
}

interface CycleHealthBase {
  readonly cycle: number;
  readonly startedAt: Date;
  readonly durationMs: number;
}

export type CycleHealth =
  | (CycleHealthBase & { readonly status: 'succeeded' })
  | (CycleHealthBase & { readonly status: 'partial'; readonly unreachableRouterIds: readonly string[] })
  | (CycleHealthBase & { readonly status: 'failed'; readonly reason: string; readonly errorCode: ErrorCode });

export type CycleStatus = CycleHealth['status'];

export interface CycleReport {
  readonly health: CycleHealth;
  readonly view: MeshView;
  readonly events: readonly TopologyChangeEvent[];
  readonly counts: MeshClientCounts;
}

export function createEmptyView(generatedAt: Date = new Date(0)): MeshView {
  return { routers: new Map(), devices: new Map(), generatedAt };
}
