import { createChildLogger } from '../utils/logger.js';
import { parseMac } from '../utils/mac.js';
import {
  CapabilityMissingError,
  InvalidParameterError,
  MalformedResponseError,
} from '../utils/errors.js';
import type { SessionClient } from './session-client.js';
import type { Capability } from '../types/router.js';
import {
  VendorOperations,
  WlanFilterSchema,
  type FilterMacEntry,
  type WlanFilterEntry,
} from '../types/vendor.js';

const logger = createChildLogger('router-control');

export type FilterMode = 'blacklist' | 'whitelist';
export type FilterAction = 'add' | 'remove';

/** 'unchanged' when the router already was in the requested state. */
export type ControlOutcome = 'applied' | 'unchanged';

export const WRITABLE_SWITCHES = ['nfc', 'twt', '80211r', 'access-control'] as const;
export type WritableSwitch = (typeof WRITABLE_SWITCHES)[number];

const FILTER_POLICY: Record<FilterMode, number> = {
  blacklist: 0,
  whitelist: 1,
};

export function isWritableSwitch(capability: Capability): capability is WritableSwitch {
  return WRITABLE_SWITCHES.some(candidate => candidate === capability);
}

interface FilterBands {
  band2g: WlanFilterEntry;
  band5g: WlanFilterEntry;
}

interface FilterLists {
  whitelist: FilterMacEntry[];
  blacklist: FilterMacEntry[];
  changed: boolean;
}

export interface RouterControllerOptions {
  routerId: string;
  session: SessionClient;
  /** Capabilities found by the last poll; null before the first one. */
  capabilities: () => ReadonlySet<Capability> | null;
}

/**
 * Write side of one router: switches, the WLAN access lists and reboot.
 * Calls share the router's session with its poller.
 */
export class RouterController {
  readonly routerId: string;
  private readonly session: SessionClient;
  private readonly capabilities: () => ReadonlySet<Capability> | null;

  constructor(options: RouterControllerOptions) {
    this.routerId = options.routerId;
    this.session = options.session;
    this.capabilities = options.capabilities;
  }

  async setSwitch(capability: Capability, enabled: boolean): Promise<ControlOutcome> {
    if (!isWritableSwitch(capability)) {
      throw new InvalidParameterError(`Switch '${capability}' cannot be changed`, {
        context: { routerId: this.routerId, capability },
      });
    }
    this.requireCapability(capability);

    const outcome = await this.writeSwitch(capability, enabled);
    logger.info({ routerId: this.routerId, capability, enabled, outcome }, 'Switch set');
    return outcome;
  }

  /**
   * Put a device on, or take it off, one access list of both bands. Adding
   * to one list takes the device off the other.
   */
  async applyWlanFilter(
    mode: FilterMode,
    action: FilterAction,
    mac: string,
    deviceName?: string
  ): Promise<ControlOutcome | 'filterDisabled'> {
    const normalized = parseMac(mac);
    if (!normalized) {
      throw new InvalidParameterError(`'${mac}' is not a MAC address`, { context: { routerId: this.routerId } });
    }
    this.requireCapability('access-control');

    const { band2g, band5g } = await this.readFilterBands();
    if (!band2g.MACAddressControlEnabled || !band5g.MACAddressControlEnabled) {
      logger.warn({ routerId: this.routerId }, 'WLAN filtering is off, access lists left alone');
      return 'filterDisabled';
    }

    const item: FilterMacEntry = {
      MACAddress: normalized.toUpperCase(),
      HostName: deviceName || `Unknown device ${normalized}`,
    };
    const lists2g = updateAccessLists(band2g, mode, action, normalized, item);
    const lists5g = updateAccessLists(band5g, mode, action, normalized, item);
    if (!lists2g.changed && !lists5g.changed) {
      return 'unchanged';
    }

    await this.writeFilter(
      { ...band2g, WMACAddresses: lists2g.whitelist, BMACAddresses: lists2g.blacklist },
      { ...band5g, WMACAddresses: lists5g.whitelist, BMACAddresses: lists5g.blacklist }
    );
    logger.info({ routerId: this.routerId, mac: normalized, mode, action }, 'Access list updated');
    return 'applied';
  }

  async setWlanFilterMode(mode: FilterMode): Promise<ControlOutcome> {
    this.requireCapability('access-control');

    const { band2g, band5g } = await this.readFilterBands();
    const policy = FILTER_POLICY[mode];
    if (band5g.MacFilterPolicy === policy) {
      return 'unchanged';
    }

    await this.writeFilter({ ...band2g, MacFilterPolicy: policy }, { ...band5g, MacFilterPolicy: policy });
    logger.info({ routerId: this.routerId, mode }, 'Filter mode set');
    return 'applied';
  }

  async reboot(): Promise<void> {
    await this.session.execute({ name: VendorOperations.reboot, params: {} });
    logger.warn({ routerId: this.routerId }, 'Reboot requested');
  }

  private requireCapability(capability: Capability): void {
    const known = this.capabilities();
    if (!known?.has(capability)) {
      throw new CapabilityMissingError(this.routerId, capability, {
        context: { polled: known !== null },
      });
    }
  }

  private async writeSwitch(capability: WritableSwitch, enabled: boolean): Promise<ControlOutcome> {
    switch (capability) {
      case 'nfc':
        await this.session.execute({ name: VendorOperations.setNfcSwitch, params: { nfcSwitch: enabled ? 1 : 0 } });
        return 'applied';
      case '80211r':
        await this.session.execute({
          name: VendorOperations.setWlanBasic,
          params: { Dot11REnable: enabled },
          envelope: { action: '11rSetting' },
        });
        return 'applied';
      case 'twt':
        await this.session.execute({
          name: VendorOperations.setWlanBasic,
          params: { TWTEnable: enabled },
          envelope: { action: 'TWTSetting' },
        });
        return 'applied';
      case 'access-control':
        return this.setFilterEnabled(enabled);
    }
  }

  private async setFilterEnabled(enabled: boolean): Promise<ControlOutcome> {
    const { band2g, band5g } = await this.readFilterBands();
    const current = band2g.MACAddressControlEnabled && band5g.MACAddressControlEnabled;
    if (current === enabled) {
      return 'unchanged';
    }

    await this.writeFilter(
      { ...band2g, MACAddressControlEnabled: enabled },
      { ...band5g, MACAddressControlEnabled: enabled }
    );
    return 'applied';
  }

  private async readFilterBands(): Promise<FilterBands> {
    const parsed = WlanFilterSchema.safeParse(await this.session.execute({ name: VendorOperations.wlanFilter }));
    const entries = parsed.success ? parsed.data : [];
    const band2g = entries.find(entry => entry.FrequencyBand === '2.4GHz');
    const band5g = entries.find(entry => entry.FrequencyBand === '5GHz');
    if (!band2g || !band5g) {
      throw new MalformedResponseError('WLAN filter state lacks a band', {
        context: { routerId: this.routerId, operation: VendorOperations.wlanFilter },
      });
    }
    return { band2g, band5g };
  }

  // Both bands are always written together.
  private async writeFilter(band2g: WlanFilterEntry, band5g: WlanFilterEntry): Promise<void> {
    await this.session.execute({
      name: VendorOperations.setWlanFilter,
      params: { config2g: toFilterConfig(band2g), config5g: toFilterConfig(band5g) },
    });
  }
}

function toFilterConfig(entry: WlanFilterEntry): Record<string, unknown> {
  return {
    MACAddressControlEnabled: entry.MACAddressControlEnabled,
    WMacFilters: entry.WMACAddresses,
    ID: entry.ID,
    MacFilterPolicy: entry.MacFilterPolicy,
    BMacFilters: entry.BMACAddresses,
    FrequencyBand: entry.FrequencyBand,
  };
}

function updateAccessLists(
  entry: WlanFilterEntry,
  mode: FilterMode,
  action: FilterAction,
  mac: string,
  item: FilterMacEntry
): FilterLists {
  const matches = (candidate: FilterMacEntry): boolean => parseMac(candidate.MACAddress) === mac;
  const whitelist = [...entry.WMACAddresses];
  const blacklist = [...entry.BMACAddresses];
  const [target, other]: [FilterMacEntry[], FilterMacEntry[]] =
    mode === 'whitelist' ? [whitelist, blacklist] : [blacklist, whitelist];

  const inTarget = target.findIndex(matches);
  if (action === 'remove') {
    if (inTarget < 0) return { whitelist, blacklist, changed: false };
    target.splice(inTarget, 1);
    return { whitelist, blacklist, changed: true };
  }

  const inOther = other.findIndex(matches);
  const carried = inOther >= 0 ? other.splice(inOther, 1)[0] : undefined;
  if (inTarget < 0) {
    target.push(carried ?? item);
  }
  return { whitelist, blacklist, changed: inOther >= 0 || inTarget < 0 };
}
