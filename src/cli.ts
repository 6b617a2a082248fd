#!/usr/bin/env node
import { loadConfigFromEnv, type Config } from './config/index.js';
import { MeshMonitor } from './core/mesh-monitor.js';
import { formatRate } from './utils/rate.js';
import { metrics } from './utils/metrics.js';
import { getCurrentLogFile } from './utils/logger.js';
import type { ClientCounts, CycleReport, DeviceState, RouterEntry, TopologyChangeEvent } from './types/mesh.js';

function printUsage(): void {
  console.log(`
meshwatch - mesh router polling and reconciliation

Usage: meshwatch <command>

Commands:
  poll    Run one cycle and print the mesh view, counts and health
  watch   Poll on the configured interval, printing one JSON line per event

Environment:
  MESH_ROUTER_HOST         Primary router address (default 192.168.3.1)
  MESH_ROUTER_PORT         HTTP port (default 80)
  MESH_ROUTER_USE_SSL      Use HTTPS (default false)
  MESH_ROUTER_USER         Username (default admin)
  MESH_ROUTER_PASSWORD     Password
  POLL_INTERVAL_MS         Interval between cycles (default 30000)
  CYCLE_TIMEOUT_MS         Deadline of one cycle (default 25000)
  REQUEST_TIMEOUT_MS       Deadline of one router call (default 5000)
  DEVICES_TAGS             Enable device tags (default false)
  ROUTER_ZONES             Enable router zones (default false)
  TAGS_FILE / ZONES_FILE   Mapping files
  LOG_LEVEL                pino log level (default info)
  MESHWATCH_LOG_FILE       Also write logs to a daily file (default false)
  MESHWATCH_LOG_DIR        Directory of that file
`);
}

function serializeRouter(router: RouterEntry): Record<string, unknown> {
  return {
    routerId: router.routerId,
    name: router.name,
    model: router.model,
    address: router.address,
    isPrimary: router.isPrimary,
    available: router.available,
    firmwareVersion: router.firmwareVersion,
    hardwareVersion: router.hardwareVersion,
    uptimeSeconds: router.uptimeSeconds,
    capabilities: [...router.capabilities].sort(),
    switches: router.switches,
    wan: router.isPrimary ? router.wanStatus : undefined,
  };
}

function serializeDevice(device: DeviceState): Record<string, unknown> {
  return {
    mac: device.mac,
    name: device.displayName,
    hostname: device.hostname,
    ip: device.ip,
    connectedVia: device.connectedViaRouterId,
    interfaceType: device.interfaceType,
    rssi: device.rssi,
    guest: device.isGuestNetwork,
    upload: formatRate(device.uploadRateKBs),
    download: formatRate(device.downloadRateKBs),
    filter: device.filterListMembership,
    tags: [...device.tags].sort(),
    zone: device.zone,
    stale: device.stale,
  };
}

function serializeEvent(event: TopologyChangeEvent): Record<string, unknown> {
  switch (event.type) {
    case 'routerAdded':
    case 'routerRemoved':
      return { event: event.type, routerId: event.router.routerId, name: event.router.name };
    case 'deviceConnected':
    case 'deviceDisconnected':
      return { event: event.type, mac: event.device.mac, name: event.device.displayName, routerId: event.router.routerId };
    case 'deviceMoved':
      return {
        event: event.type,
        mac: event.device.mac,
        name: event.device.displayName,
        from: event.fromRouter.routerId,
        to: event.toRouter.routerId,
      };
  }
}

function serializeReport(report: CycleReport): Record<string, unknown> {
  const perRouter: Record<string, ClientCounts> = {};
  for (const [routerId, counts] of report.counts.perRouter) {
    perRouter[routerId] = counts;
  }

  return {
    health: report.health,
    routers: [...report.view.routers.values()].map(serializeRouter),
    devices: [...report.view.devices.values()].map(serializeDevice),
    counts: { total: report.counts.total, perRouter },
    events: report.events.map(serializeEvent),
  };
}

async function runPoll(config: Config): Promise<number> {
  const monitor = new MeshMonitor({ config });
  try {
    await monitor.reloadStores();
    const report = await monitor.runCycle();
    if (report) {
      console.log(JSON.stringify(serializeReport(report), null, 2));
    }
    return report?.health.status === 'failed' ? 1 : 0;
  } finally {
    await monitor.stop();
  }
}

async function runWatch(config: Config): Promise<number> {
  const monitor = new MeshMonitor({ config });

  const logFile = getCurrentLogFile();
  if (logFile) {
    console.error(JSON.stringify({ event: 'logging', file: logFile }));
  }

  monitor.on('topologyChange', (event) => {
    console.log(JSON.stringify(serializeEvent(event)));
  });
  monitor.on('health', (health) => {
    console.log(JSON.stringify({ event: 'health', ...health }));
  });
  monitor.on('configurationError', (routerId, error) => {
    console.error(JSON.stringify({ event: 'configurationError', routerId, error: error.message }));
  });

  await new Promise<void>((resolve, reject) => {
    const shutdown = (): void => {
      monitor.stop().then(resolve, reject);
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
    monitor.start().catch(reject);
  });

  console.log(JSON.stringify({ event: 'stopped', metrics: metrics.getSummary() }));
  return 0;
}

async function main(): Promise<void> {
  const command = process.argv[2];

  if (!command || command === '--help' || command === '-h') {
    printUsage();
    process.exit(command ? 0 : 1);
  }

  let config: Config;
  try {
    config = loadConfigFromEnv();
  } catch (err) {
    console.error(JSON.stringify({
      success: false,
      error: err instanceof Error ? err.message : String(err),
    }, null, 2));
    process.exit(1);
  }

  switch (command) {
    case 'poll':
      process.exit(await runPoll(config));
      break;
    case 'watch':
      process.exit(await runWatch(config));
      break;
    default:
      console.error(JSON.stringify({ success: false, error: `Unknown command: ${command}` }, null, 2));
      printUsage();
      process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error(JSON.stringify({
    success: false,
    error: `Unexpected error: ${err instanceof Error ? err.message : String(err)}`,
  }, null, 2));
  process.exit(1);
});
