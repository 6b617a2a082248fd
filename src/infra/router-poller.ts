import { createChildLogger } from '../utils/logger.js';
import { parseMac } from '../utils/mac.js';
import {
  AuthenticationFailedError,
  MalformedResponseError,
  MeshError,
  OperationUnsupportedError,
  RouterUnreachableError,
  TooManySessionsError,
} from '../utils/errors.js';
import type { SessionClient } from './session-client.js';
import {
  ALL_CAPABILITIES,
  InterfaceTypeSchema,
  UNKNOWN_VALUE,
  UNKNOWN_WAN_STATUS,
  isWireless,
  type Capability,
  type ClientSighting,
  type FilterListMembership,
  type InterfaceType,
  type RouterSnapshot,
  type WanStatus,
} from '../types/router.js';
import {
  DeviceInfoSchema,
  GuestNetworkSchema,
  HostEntrySchema,
  NfcSwitchSchema,
  RuleListSchema,
  VendorOperations,
  WanDetectSchema,
  WanInfoSchema,
  WlanBasicSchema,
  WlanFilterSchema,
  type HostEntry,
  type OperationName,
} from '../types/vendor.js';

const logger = createChildLogger('router-poller');

interface CapabilityProbe {
  operation: OperationName;
  /** null when the response shows the capability is absent */
  read: (data: unknown) => { enabled: boolean } | null;
}

function ruleListProbe(operation: OperationName): CapabilityProbe {
  return {
    operation,
    read: (data) => {
      const parsed = RuleListSchema.safeParse(data);
      return parsed.success ? { enabled: parsed.data.some(rule => rule.Enable === true) } : null;
    },
  };
}

function wlanBasicProbe(field: 'Dot11REnable' | 'TWTEnable'): CapabilityProbe {
  return {
    operation: VendorOperations.wlanBasic,
    read: (data) => {
      const parsed = WlanBasicSchema.safeParse(data);
      if (!parsed.success) return null;
      const values = parsed.data.WifiConfig.map(config => config[field]).filter((v): v is boolean => v !== undefined);
      return values.length > 0 ? { enabled: values.some(Boolean) } : null;
    },
  };
}

const CAPABILITY_PROBES: Record<Capability, CapabilityProbe> = {
  nfc: {
    operation: VendorOperations.nfcSwitch,
    read: (data) => {
      const parsed = NfcSwitchSchema.safeParse(data);
      return parsed.success ? { enabled: parsed.data.nfcSwitch === 1 } : null;
    },
  },
  twt: wlanBasicProbe('TWTEnable'),
  '80211r': wlanBasicProbe('Dot11REnable'),
  'access-control': {
    operation: VendorOperations.wlanFilter,
    read: (data) => {
      const entry = pickFilterEntry(data);
      return entry ? { enabled: entry.MACAddressControlEnabled } : null;
    },
  },
  'guest-network': {
    operation: VendorOperations.guestNetwork,
    read: (data) => {
      const parsed = GuestNetworkSchema.safeParse(data);
      return parsed.success && parsed.data.length > 0
        ? { enabled: parsed.data.some(band => band.EnableFrequency) }
        : null;
    },
  },
  'url-filter': ruleListProbe(VendorOperations.urlFilter),
  'port-mapping': ruleListProbe(VendorOperations.portMapping),
  'time-control': ruleListProbe(VendorOperations.timeControl),
};

// The 5 GHz filter is authoritative; routers keep the bands in sync.
function pickFilterEntry(data: unknown) {
  const parsed = WlanFilterSchema.safeParse(data);
  if (!parsed.success) return undefined;
  return parsed.data.find(entry => entry.FrequencyBand === '5GHz') ?? parsed.data[0];
}

function parseInterfaceType(value: string | undefined): InterfaceType {
  const parsed = InterfaceTypeSchema.safeParse(value);
  return parsed.success ? parsed.data : 'other';
}

export interface RouterPollerOptions {
  routerId: string;
  isPrimary: boolean;
  session: SessionClient;
  now?: (() => Date) | undefined;
}

/**
 * Turns one router's vendor API into one RouterSnapshot per cycle.
 * Fails with RouterUnreachableError or AuthenticationFailedError.
 */
export class RouterPoller {
  readonly routerId: string;
  readonly isPrimary: boolean;
  readonly session: SessionClient;
  private readonly now: () => Date;
  private knownCapabilities: ReadonlySet<Capability> | null = null;
  private inFlight = false;
  private responses = new Map<OperationName, unknown>();

  constructor(options: RouterPollerOptions) {
    this.routerId = options.routerId;
    this.isPrimary = options.isPrimary;
    this.session = options.session;
    this.now = options.now ?? (() => new Date());
  }

  get host(): string {
    return this.session.address.host;
  }

  isPolling(): boolean {
    return this.inFlight;
  }

  getKnownCapabilities(): ReadonlySet<Capability> | null {
    return this.knownCapabilities;
  }

  /** Forget capability gating so the next poll probes everything again. */
  resetCapabilities(): void {
    this.knownCapabilities = null;
  }

  async poll(): Promise<RouterSnapshot> {
    if (this.inFlight) {
      throw new RouterUnreachableError(this.routerId, 'previous poll still in progress');
    }

    this.inFlight = true;
    this.responses = new Map();
    try {
      return await this.collect();
    } catch (err) {
      throw this.toPollError(err);
    } finally {
      this.inFlight = false;
    }
  }

  async dispose(): Promise<void> {
    await this.session.close();
    this.session.removeAllListeners();
  }

  private async collect(): Promise<RouterSnapshot> {
    this.session.beginCycle();

    const identity = await this.readIdentity();
    const { capabilities, switches } = await this.readCapabilities();
    const wanStatus = this.isPrimary ? await this.readWanStatus() : UNKNOWN_WAN_STATUS;
    const membership = capabilities.has('access-control')
      ? await this.readFilterMembership()
      : new Map<string, FilterListMembership>();
    const directClients = await this.readClients(membership);

    this.knownCapabilities = capabilities;

    logger.debug(
      { routerId: this.routerId, clients: directClients.length, capabilities: [...capabilities] },
      'Router polled'
    );

    return {
      routerId: this.routerId,
      isPrimary: this.isPrimary,
      address: this.host,
      ...identity,
      capabilities,
      switches,
      wanStatus,
      directClients,
      polledAt: this.now(),
    };
  }

  private async readIdentity(): Promise<
    Pick<RouterSnapshot, 'name' | 'model' | 'hardwareVersion' | 'firmwareVersion' | 'uptimeSeconds'>
  > {
    const data = await this.optional(VendorOperations.deviceInfo);
    const parsed = DeviceInfoSchema.safeParse(data);
    if (!parsed.success) {
      logger.warn({ routerId: this.routerId }, 'Device info unreadable, identity left unknown');
      return {
        name: UNKNOWN_VALUE,
        model: UNKNOWN_VALUE,
        hardwareVersion: UNKNOWN_VALUE,
        firmwareVersion: UNKNOWN_VALUE,
        uptimeSeconds: null,
      };
    }

    const info = parsed.data;
    return {
      name: info.FriendlyName || UNKNOWN_VALUE,
      model: info.custinfo?.CustDeviceName || UNKNOWN_VALUE,
      hardwareVersion: info.HardwareVersion || UNKNOWN_VALUE,
      firmwareVersion: info.SoftwareVersion || UNKNOWN_VALUE,
      uptimeSeconds: info.UpTime ?? null,
    };
  }

  private async readCapabilities(): Promise<{
    capabilities: Set<Capability>;
    switches: Partial<Record<Capability, boolean>>;
  }> {
    const candidates = this.knownCapabilities;
    const capabilities = new Set<Capability>();
    const switches: Partial<Record<Capability, boolean>> = {};

    for (const capability of ALL_CAPABILITIES) {
      if (candidates && !candidates.has(capability)) continue;

      const probe = CAPABILITY_PROBES[capability];
      const data = await this.optional(probe.operation);
      if (data === undefined) continue;

      const state = probe.read(data);
      if (!state) continue;

      capabilities.add(capability);
      switches[capability] = state.enabled;
    }

    return { capabilities, switches };
  }

  private async readWanStatus(): Promise<WanStatus> {
    const detect = WanDetectSchema.safeParse(await this.optional(VendorOperations.wanDetect));
    if (!detect.success) {
      return UNKNOWN_WAN_STATUS;
    }

    const info = WanInfoSchema.safeParse(await this.optional(VendorOperations.wanInfo));
    const connected = detect.data.Status === 'Connected';
    const uptime = detect.data.Uptime;

    return {
      state: connected ? 'connected' : 'disconnected',
      externalIp: detect.data.ExternalIPAddress || null,
      uploadRateKBs: info.success ? info.data.UpBandwidth ?? 0 : 0,
      downloadRateKBs: info.success ? info.data.DownBandwidth ?? 0 : 0,
      connectedSince: connected && uptime !== undefined
        ? new Date(this.now().getTime() - uptime * 1000)
        : null,
    };
  }

  private async readFilterMembership(): Promise<Map<string, FilterListMembership>> {
    const membership = new Map<string, FilterListMembership>();
    const entry = pickFilterEntry(await this.optional(VendorOperations.wlanFilter));
    if (!entry) return membership;

    for (const item of entry.BMACAddresses) {
      const mac = parseMac(item.MACAddress);
      if (mac) membership.set(mac, 'blacklist');
    }
    for (const item of entry.WMACAddresses) {
      const mac = parseMac(item.MACAddress);
      if (mac) membership.set(mac, 'whitelist');
    }
    return membership;
  }

  private async readClients(membership: ReadonlyMap<string, FilterListMembership>): Promise<ClientSighting[]> {
    // An unreadable list is not an empty one: fail the poll and keep what is known.
    const data = await this.optional(VendorOperations.hostInfo);
    if (!Array.isArray(data)) {
      throw new MalformedResponseError('client list unreadable', {
        context: { routerId: this.routerId, operation: VendorOperations.hostInfo },
      });
    }

    const entries: unknown[] = data;
    const sightings: ClientSighting[] = [];
    let skipped = 0;

    for (const raw of entries) {
      const parsed = HostEntrySchema.safeParse(raw);
      const sighting = parsed.success ? this.toSighting(parsed.data, membership) : null;
      if (sighting === undefined) continue;
      if (sighting === null) {
        skipped++;
        continue;
      }
      sightings.push(sighting);
    }

    if (skipped > 0) {
      logger.warn({ routerId: this.routerId, skipped }, 'Skipped malformed client entries');
    }
    return sightings;
  }

  /** undefined for inactive entries, null for malformed ones */
  private toSighting(
    entry: HostEntry,
    membership: ReadonlyMap<string, FilterListMembership>
  ): ClientSighting | null | undefined {
    if (entry.Active === false) return undefined;

    const mac = parseMac(entry.MACAddress);
    if (!mac) return null;

    const interfaceType = parseInterfaceType(entry.InterfaceType);
    const hostname = entry.HostName || `device_${mac}`;

    return {
      mac,
      ip: entry.IPAddress ?? '',
      hostname,
      displayName: entry.ActualName || hostname,
      interfaceType,
      rssi: isWireless(interfaceType) ? entry.rssi ?? null : null,
      isGuestNetwork: entry.IsGuest ?? false,
      isHiLink: entry.HiLinkDevice ?? false,
      isRouterDevice: (entry.HiLinkDevice ?? false) && entry.VendorClassID === 'router',
      uploadRateKBs: entry.UpRate ?? 0,
      downloadRateKBs: entry.DownRate ?? 0,
      filterListMembership: membership.get(mac) ?? 'none',
    };
  }

  /**
   * Unsupported and malformed answers resolve to undefined; anything else
   * aborts the poll. Answers are reused within one poll.
   */
  private async optional(operation: OperationName): Promise<unknown> {
    if (this.responses.has(operation)) {
      return this.responses.get(operation);
    }

    let data: unknown;
    try {
      data = await this.session.execute({ name: operation });
    } catch (err) {
      if (err instanceof OperationUnsupportedError || err instanceof MalformedResponseError) {
        logger.debug({ routerId: this.routerId, operation, err: err.message }, 'Optional operation unavailable');
        data = undefined;
      } else {
        throw err;
      }
    }

    this.responses.set(operation, data);
    return data;
  }

  private toPollError(err: unknown): MeshError {
    if (err instanceof AuthenticationFailedError || err instanceof RouterUnreachableError) {
      return err;
    }
    if (err instanceof TooManySessionsError) {
      return new RouterUnreachableError(this.routerId, 'session cooldown in effect', { cause: err });
    }
    const error = MeshError.fromError(err);
    return new RouterUnreachableError(this.routerId, error.message, { cause: error });
  }
}
