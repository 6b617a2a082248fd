import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fsp } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { MeshMonitor } from '../src/core/mesh-monitor.js';
import { parseConfig } from '../src/config/index.js';
import { VendorOperations } from '../src/types/vendor.js';
import { FakeMeshTransport, TEST_PASSWORD, basicRouter, hostEntry } from './support/fake-mesh.js';

const PRIMARY_HOST = '192.168.3.1';
const TV = '11:22:33:44:55:01';

describe('MeshMonitor', () => {
  let transport: FakeMeshTransport;
  let monitor: MeshMonitor | null;
  let dir: string;

  const createMonitor = (overrides: { password?: string; emitInitialEvents?: boolean; devicesTags?: boolean } = {}) => {
    const config = parseConfig({
      router: { host: PRIMARY_HOST, password: overrides.password ?? TEST_PASSWORD },
      polling: { pollIntervalMs: 60000, cycleTimeoutMs: 500, requestTimeoutMs: 200 },
      features: {
        emitInitialEvents: overrides.emitInitialEvents ?? false,
        devicesTags: overrides.devicesTags ?? false,
      },
      storage: {
        tagsFile: path.join(dir, 'device-tags.json'),
        zonesFile: path.join(dir, 'router-zones.json'),
      },
    });
    const created = new MeshMonitor({ config, transport });
    monitor = created;
    return created;
  };

  beforeEach(async () => {
    dir = await fsp.mkdtemp(path.join(os.tmpdir(), 'meshwatch-monitor-'));
    monitor = null;
    transport = new FakeMeshTransport();
    transport.addRouter(PRIMARY_HOST, basicRouter('Living room', [
      hostEntry({ mac: TV, ip: '192.168.3.20', name: 'tv', interfaceType: 'LAN' }),
    ]));
  });

  afterEach(async () => {
    await monitor?.stop();
    await fsp.rm(dir, { recursive: true, force: true });
  });

  it('should publish topology changes, then health, then the report', async () => {
    const mesh = createMonitor({ emitInitialEvents: true });
    const published: string[] = [];
    mesh.on('topologyChange', (event) => published.push(event.type));
    mesh.on('health', (health) => published.push(`health:${health.status}`));
    mesh.on('cycle', () => published.push('cycle'));

    await mesh.runCycle();

    expect(published).toEqual(['routerAdded', 'deviceConnected', 'health:succeeded', 'cycle']);
    expect(mesh.getLastReport()?.health.cycle).toBe(1);
  });

  it('should report a credentials problem once while it persists', async () => {
    const mesh = createMonitor({ password: 'wrong-secret' });
    const reported: string[] = [];
    mesh.on('configurationError', (routerId) => reported.push(routerId));

    await mesh.runCycle();
    await mesh.runCycle();
    expect(reported).toEqual(['primary']);

    mesh.updateCredentials({ username: 'admin', password: 'still-wrong' });
    await mesh.runCycle();
    expect(reported).toEqual(['primary', 'primary']);
  });

  it('should run the first cycle on start and stop cleanly', async () => {
    const mesh = createMonitor();

    await mesh.start();
    expect(mesh.isRunning()).toBe(true);
    expect(mesh.getHealthHistory()).toHaveLength(1);
    expect(mesh.getCurrentView()?.devices.has(TV)).toBe(true);

    await mesh.stop();
    expect(mesh.isRunning()).toBe(false);
  });

  it('should not keep polling when the first cycle fails', async () => {
    const mesh = createMonitor();
    mesh.on('health', () => {
      throw new Error('listener failed');
    });

    await expect(mesh.start()).rejects.toThrow('listener failed');
    expect(mesh.isRunning()).toBe(false);
  });

  it('should switch router features once the router was polled', async () => {
    transport.router(PRIMARY_HOST).responses[VendorOperations.nfcSwitch] = { nfcSwitch: 1 };
    const mesh = createMonitor();
    await mesh.runCycle();

    await expect(mesh.setSwitch('primary', 'nfc', false)).resolves.toBe('applied');
    await mesh.reboot('primary');

    expect(transport.callsTo(PRIMARY_HOST, VendorOperations.setNfcSwitch)[0]?.params).toEqual({ nfcSwitch: 0 });
    expect(transport.callsTo(PRIMARY_HOST, VendorOperations.reboot)).toHaveLength(1);
  });

  it('should leave the stores out unless their features are on', () => {
    const mesh = createMonitor();
    expect(mesh.getTagStore()).toBeNull();
    expect(mesh.getZoneStore()).toBeNull();
  });

  it('should tag devices from the tag file', async () => {
    await fsp.writeFile(path.join(dir, 'device-tags.json'), JSON.stringify({ family: [], media: [] }));
    const mesh = createMonitor({ devicesTags: true });
    await mesh.reloadStores();

    const untagged = await mesh.runCycle();
    expect(untagged?.counts.total.taggedClients).toEqual({ family: 0, media: 0 });

    await fsp.writeFile(path.join(dir, 'device-tags.json'), JSON.stringify({ family: [], media: [TV] }));
    await mesh.reloadStores();

    const tagged = await mesh.runCycle();
    expect([...(tagged?.view.devices.get(TV)?.tags ?? [])]).toEqual(['media']);
    expect(tagged?.counts.total.taggedClients).toEqual({ family: 0, media: 1 });
    expect(tagged?.counts.total.untaggedClients).toBe(0);
  });
});
