import { describe, it, expect, beforeEach } from 'vitest';
import { RouterPoller } from '../../src/infra/router-poller.js';
import { RouterController } from '../../src/infra/router-control.js';
import { SessionClient } from '../../src/infra/session-client.js';
import { CapabilityMissingError, InvalidParameterError } from '../../src/utils/errors.js';
import { VendorOperations, type OperationName } from '../../src/types/vendor.js';
import {
  FakeMeshTransport,
  TEST_PASSWORD,
  basicRouter,
  filterBands,
  hostEntry,
  testAddress,
} from '../support/fake-mesh.js';

const HOST = '192.168.3.1';
const LAPTOP = 'aa:bb:cc:dd:ee:01';

function controllableRouter(filter = filterBands()): Partial<Record<OperationName, unknown>> {
  return {
    ...basicRouter('Living room', [
      hostEntry({ mac: 'AA:BB:CC:DD:EE:01', ip: '192.168.3.10', name: 'laptop' }),
    ]),
    [VendorOperations.nfcSwitch]: { nfcSwitch: 1 },
    [VendorOperations.wlanBasic]: { WifiConfig: [{ Dot11REnable: false, TWTEnable: true }] },
    [VendorOperations.wlanFilter]: filter,
  };
}

describe('RouterController', () => {
  let transport: FakeMeshTransport;
  let poller: RouterPoller;
  let controller: RouterController;

  const setup = async (responses: Partial<Record<OperationName, unknown>>, poll = true) => {
    transport.addRouter(HOST, responses);
    poller = new RouterPoller({
      routerId: 'primary',
      isPrimary: true,
      session: new SessionClient({
        routerId: 'primary',
        address: testAddress(HOST),
        credentials: { username: 'admin', password: TEST_PASSWORD },
        transport,
        requestTimeoutMs: 1000,
        cooldownMs: 60000,
      }),
    });
    controller = new RouterController({
      routerId: 'primary',
      session: poller.session,
      capabilities: () => poller.getKnownCapabilities(),
    });
    if (poll) await poller.poll();
  };

  const lastWrite = (operation: OperationName) => transport.callsTo(HOST, operation).at(-1);

  beforeEach(() => {
    transport = new FakeMeshTransport();
  });

  describe('switches', () => {
    it('should turn NFC off and show it on the next poll', async () => {
      await setup(controllableRouter());

      await expect(controller.setSwitch('nfc', false)).resolves.toBe('applied');

      expect(lastWrite(VendorOperations.setNfcSwitch)?.params).toEqual({ nfcSwitch: 0 });
      const snapshot = await poller.poll();
      expect(snapshot.switches.nfc).toBe(false);
    });

    it('should name the 802.11r setting in the request envelope', async () => {
      await setup(controllableRouter());

      await controller.setSwitch('80211r', true);

      const call = lastWrite(VendorOperations.setWlanBasic);
      expect(call?.params).toEqual({ Dot11REnable: true });
      expect(call?.envelope).toEqual({ action: '11rSetting' });
    });

    it('should name the TWT setting in the request envelope', async () => {
      await setup(controllableRouter());

      await controller.setSwitch('twt', false);

      const call = lastWrite(VendorOperations.setWlanBasic);
      expect(call?.params).toEqual({ TWTEnable: false });
      expect(call?.envelope).toEqual({ action: 'TWTSetting' });
    });

    it('should refuse a switch the router does not have', async () => {
      await setup(basicRouter('Attic', []));

      await expect(controller.setSwitch('nfc', true)).rejects.toThrow(CapabilityMissingError);
      expect(transport.callsTo(HOST, VendorOperations.setNfcSwitch)).toHaveLength(0);
    });

    it('should refuse every switch before the first poll', async () => {
      await setup(controllableRouter(), false);

      await expect(controller.setSwitch('nfc', true)).rejects.toThrow("Router 'primary' has no 'nfc' capability");
      expect(transport.calls).toHaveLength(0);
    });

    it('should refuse switches that are read only', async () => {
      await setup(controllableRouter());

      await expect(controller.setSwitch('guest-network', true)).rejects.toThrow(InvalidParameterError);
      await expect(controller.setSwitch('port-mapping', true)).rejects.toThrow("Switch 'port-mapping' cannot be changed");
    });

    it('should switch access control on both bands at once', async () => {
      await setup(controllableRouter());

      await expect(controller.setSwitch('access-control', false)).resolves.toBe('applied');

      const params = lastWrite(VendorOperations.setWlanFilter)?.params;
      expect(params?.['config2g']).toMatchObject({ FrequencyBand: '2.4GHz', MACAddressControlEnabled: false });
      expect(params?.['config5g']).toMatchObject({ FrequencyBand: '5GHz', MACAddressControlEnabled: false });
    });

    it('should leave access control alone when it is already in that state', async () => {
      await setup(controllableRouter());

      await expect(controller.setSwitch('access-control', true)).resolves.toBe('unchanged');
      expect(transport.callsTo(HOST, VendorOperations.setWlanFilter)).toHaveLength(0);
    });
  });

  describe('access lists', () => {
    it('should blacklist a device on both bands', async () => {
      await setup(controllableRouter());

      await expect(controller.applyWlanFilter('blacklist', 'add', 'AA-BB-CC-DD-EE-01', 'laptop')).resolves.toBe('applied');

      const params = lastWrite(VendorOperations.setWlanFilter)?.params;
      const entry = { MACAddress: 'AA:BB:CC:DD:EE:01', HostName: 'laptop' };
      expect(params?.['config2g']).toMatchObject({ BMacFilters: [entry], WMacFilters: [] });
      expect(params?.['config5g']).toMatchObject({ BMacFilters: [entry], WMacFilters: [] });

      const snapshot = await poller.poll();
      expect(snapshot.directClients[0]).toMatchObject({ mac: LAPTOP, filterListMembership: 'blacklist' });
    });

    it('should move a blacklisted device to the whitelist', async () => {
      await setup(controllableRouter(filterBands({ blacklist: ['AA:BB:CC:DD:EE:01'] })));

      await expect(controller.applyWlanFilter('whitelist', 'add', LAPTOP)).resolves.toBe('applied');

      expect(lastWrite(VendorOperations.setWlanFilter)?.params?.['config5g']).toMatchObject({
        WMacFilters: [{ MACAddress: 'AA:BB:CC:DD:EE:01', HostName: 'listed' }],
        BMacFilters: [],
      });
    });

    it('should name unknown devices after their MAC', async () => {
      await setup(controllableRouter());

      await controller.applyWlanFilter('whitelist', 'add', LAPTOP);

      expect(lastWrite(VendorOperations.setWlanFilter)?.params?.['config2g']).toMatchObject({
        WMacFilters: [{ MACAddress: 'AA:BB:CC:DD:EE:01', HostName: `Unknown device ${LAPTOP}` }],
      });
    });

    it('should not write when there is nothing to remove', async () => {
      await setup(controllableRouter());

      await expect(controller.applyWlanFilter('blacklist', 'remove', LAPTOP)).resolves.toBe('unchanged');
      expect(transport.callsTo(HOST, VendorOperations.setWlanFilter)).toHaveLength(0);
    });

    it('should remove a device from the whitelist', async () => {
      await setup(controllableRouter(filterBands({ whitelist: ['AA:BB:CC:DD:EE:01', 'AA:BB:CC:DD:EE:02'] })));

      await expect(controller.applyWlanFilter('whitelist', 'remove', LAPTOP)).resolves.toBe('applied');

      expect(lastWrite(VendorOperations.setWlanFilter)?.params?.['config5g']).toMatchObject({
        WMacFilters: [{ MACAddress: 'AA:BB:CC:DD:EE:02', HostName: 'listed' }],
      });
    });

    it('should leave the lists alone while filtering is off', async () => {
      await setup(controllableRouter(filterBands({ enabled: false })));

      await expect(controller.applyWlanFilter('blacklist', 'add', LAPTOP)).resolves.toBe('filterDisabled');
      expect(transport.callsTo(HOST, VendorOperations.setWlanFilter)).toHaveLength(0);
    });

    it('should reject something that is not a MAC', async () => {
      await setup(controllableRouter());

      await expect(controller.applyWlanFilter('blacklist', 'add', 'laptop')).rejects.toThrow(InvalidParameterError);
    });

    it('should switch the filter mode once', async () => {
      await setup(controllableRouter());

      await expect(controller.setWlanFilterMode('whitelist')).resolves.toBe('applied');
      const params = lastWrite(VendorOperations.setWlanFilter)?.params;
      expect(params?.['config2g']).toMatchObject({ MacFilterPolicy: 1 });
      expect(params?.['config5g']).toMatchObject({ MacFilterPolicy: 1 });

      await expect(controller.setWlanFilterMode('whitelist')).resolves.toBe('unchanged');
      expect(transport.callsTo(HOST, VendorOperations.setWlanFilter)).toHaveLength(1);
    });
  });

  it('should ask the router to reboot', async () => {
    await setup(basicRouter('Attic', []));

    await controller.reboot();

    expect(transport.callsTo(HOST, VendorOperations.reboot)).toHaveLength(1);
  });
});
