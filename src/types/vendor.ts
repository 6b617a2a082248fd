import { z } from 'zod';

/** Operation names understood by every VendorTransport. */
export const VendorOperations = {
  login: 'session.login',
  logout: 'session.logout',
  deviceInfo: 'system.deviceInfo',
  hostInfo: 'system.hostInfo',
  wanDetect: 'wan.detect',
  wanInfo: 'wan.info',
  nfcSwitch: 'bsp.nfcSwitch',
  wlanBasic: 'ntwk.wlanBasic',
  wlanFilter: 'ntwk.wlanFilter',
  guestNetwork: 'ntwk.guestNetwork',
  urlFilter: 'ntwk.urlFilter',
  portMapping: 'ntwk.portMapping',
  timeControl: 'ntwk.timeControl',
  setNfcSwitch: 'bsp.setNfcSwitch',
  setWlanBasic: 'ntwk.setWlanBasic',
  setWlanFilter: 'ntwk.setWlanFilter',
  reboot: 'system.reboot',
} as const;

export type OperationName = (typeof VendorOperations)[keyof typeof VendorOperations];

export interface VendorOperation {
  name: OperationName;
  params?: Record<string, unknown> | undefined;
  /** Extra top-level fields of a write request, beside csrf and data. */
  envelope?: Record<string, unknown> | undefined;
}

export interface SessionTokens {
  sessionToken: string;
  csrfToken: string;
  csrfParam?: string | undefined;
}

export const DeviceInfoSchema = z.object({
  FriendlyName: z.string().optional(),
  SerialNumber: z.string().optional(),
  SoftwareVersion: z.string().optional(),
  HardwareVersion: z.string().optional(),
  UpTime: z.number().optional(),
  custinfo: z.object({
    CustDeviceName: z.string().optional(),
  }).passthrough().optional(),
}).passthrough();
export type DeviceInfo = z.infer<typeof DeviceInfoSchema>;

export const HostEntrySchema = z.object({
  MACAddress: z.string(),
  IPAddress: z.string().optional(),
  HostName: z.string().optional(),
  ActualName: z.string().optional(),
  Active: z.boolean().optional(),
  InterfaceType: z.string().optional(),
  rssi: z.number().optional(),
  IsGuest: z.boolean().optional(),
  HiLinkDevice: z.boolean().optional(),
  VendorClassID: z.string().optional(),
  UpRate: z.number().optional(),
  DownRate: z.number().optional(),
}).passthrough();
export type HostEntry = z.infer<typeof HostEntrySchema>;

export const WanDetectSchema = z.object({
  Status: z.string(),
  ExternalIPAddress: z.string().optional(),
  Uptime: z.number().optional(),
}).passthrough();

export const WanInfoSchema = z.object({
  UpBandwidth: z.number().optional(),
  DownBandwidth: z.number().optional(),
}).passthrough();

export const NfcSwitchSchema = z.object({
  nfcSwitch: z.number(),
}).passthrough();

export const WlanBasicSchema = z.object({
  WifiConfig: z.array(z.object({
    Dot11REnable: z.boolean().optional(),
    TWTEnable: z.boolean().optional(),
  }).passthrough()),
}).passthrough();

const FilterMacSchema = z.object({
  MACAddress: z.string(),
  HostName: z.string().optional(),
}).passthrough();
export type FilterMacEntry = z.infer<typeof FilterMacSchema>;

export const WlanFilterEntrySchema = z.object({
  ID: z.string().optional(),
  FrequencyBand: z.string(),
  MACAddressControlEnabled: z.boolean(),
  /** 0 = blacklist, 1 = whitelist */
  MacFilterPolicy: z.number(),
  BMACAddresses: z.array(FilterMacSchema).default([]),
  WMACAddresses: z.array(FilterMacSchema).default([]),
}).passthrough();
export const WlanFilterSchema = z.array(WlanFilterEntrySchema);
export type WlanFilterEntry = z.infer<typeof WlanFilterEntrySchema>;

export const GuestNetworkSchema = z.array(z.object({
  FrequencyBand: z.string().optional(),
  EnableFrequency: z.boolean(),
}).passthrough());

/** Shape shared by url filter, port mapping and time control rule lists. */
export const RuleListSchema = z.array(z.object({
  Enable: z.boolean().optional(),
}).passthrough());
