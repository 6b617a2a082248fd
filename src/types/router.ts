import { z } from 'zod';

export const CapabilitySchema = z.enum([
  'nfc',
  'twt',
  '80211r',
  'access-control',
  'guest-network',
  'url-filter',
  'port-mapping',
  'time-control',
]);
export type Capability = z.infer<typeof CapabilitySchema>;

export const ALL_CAPABILITIES: readonly Capability[] = CapabilitySchema.options;

export const InterfaceTypeSchema = z.enum(['5GHz', '2.4GHz', 'LAN', 'other']);
export type InterfaceType = z.infer<typeof InterfaceTypeSchema>;

export const FilterListMembershipSchema = z.enum(['none', 'blacklist', 'whitelist']);
export type FilterListMembership = z.infer<typeof FilterListMembershipSchema>;

export const WanStatusSchema = z.object({
  state: z.enum(['connected', 'disconnected', 'unknown']),
  externalIp: z.string().nullable(),
  uploadRateKBs: z.number(),
  downloadRateKBs: z.number(),
  connectedSince: z.date().nullable(),
});
export type WanStatus = z.infer<typeof WanStatusSchema>;

export const UNKNOWN_WAN_STATUS: WanStatus = {
  state: 'unknown',
  externalIp: null,
  uploadRateKBs: 0,
  downloadRateKBs: 0,
  connectedSince: null,
};

export const ClientSightingSchema = z.object({
  mac: z.string(),
  ip: z.string(),
  hostname: z.string(),
  displayName: z.string(),
  interfaceType: InterfaceTypeSchema,
  rssi: z.number().nullable(),
  isGuestNetwork: z.boolean(),
  isHiLink: z.boolean(),
  isRouterDevice: z.boolean(),
  uploadRateKBs: z.number(),
  downloadRateKBs: z.number(),
  filterListMembership: FilterListMembershipSchema,
});
export type ClientSighting = z.infer<typeof ClientSightingSchema>;

export interface RouterAddress {
  host: string;
  port: number;
  useSsl: boolean;
  verifySsl: boolean;
}

export interface RouterCredentials {
  username: string;
  password: string;
}

/** Router metadata shared by snapshots and mesh view entries. */
export interface RouterIdentity {
  readonly routerId: string;
  readonly isPrimary: boolean;
  readonly address: string;
  readonly name: string;
  readonly model: string;
  readonly hardwareVersion: string;
  readonly firmwareVersion: string;
  readonly uptimeSeconds: number | null;
  readonly capabilities: ReadonlySet<Capability>;
  /** Last read on/off state of each present capability. */
  readonly switches: Readonly<Partial<Record<Capability, boolean>>>;
  readonly wanStatus: WanStatus;
}

export interface RouterSnapshot extends RouterIdentity {
  readonly directClients: readonly ClientSighting[];
  readonly polledAt: Date;
}

export const UNKNOWN_VALUE = 'unknown';

export function isWireless(interfaceType: InterfaceType): boolean {
  return interfaceType === '5GHz' || interfaceType === '2.4GHz';
}
