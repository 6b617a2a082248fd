import type { ClientCounts, DeviceState, MeshClientCounts, MeshView } from '../types/mesh.js';

export interface ClientCountOptions {
  /** Tags reported even when no device in the view carries them. */
  knownTags?: readonly string[] | undefined;
}

function emptyCounts(tags: readonly string[]): ClientCounts {
  const taggedClients: Record<string, number> = {};
  for (const tag of tags) taggedClients[tag] = 0;

  return {
    totalClients: 0,
    guestClients: 0,
    hilinkClients: 0,
    wirelessClients: 0,
    lanClients: 0,
    wifi24Clients: 0,
    wifi5Clients: 0,
    taggedClients,
    untaggedClients: 0,
  };
}

function addDevice(counts: ClientCounts, device: DeviceState): void {
  counts.totalClients++;
  if (device.isGuestNetwork) counts.guestClients++;
  if (device.isHiLink) counts.hilinkClients++;

  switch (device.interfaceType) {
    case '2.4GHz':
      counts.wirelessClients++;
      counts.wifi24Clients++;
      break;
    case '5GHz':
      counts.wirelessClients++;
      counts.wifi5Clients++;
      break;
    case 'LAN':
      counts.lanClients++;
      break;
    case 'other':
      break;
  }

  if (device.tags.size === 0) {
    counts.untaggedClients++;
    return;
  }
  for (const tag of device.tags) {
    counts.taggedClients[tag] = (counts.taggedClients[tag] ?? 0) + 1;
  }
}

function addCounts(target: ClientCounts, source: ClientCounts): void {
  target.totalClients += source.totalClients;
  target.guestClients += source.guestClients;
  target.hilinkClients += source.hilinkClients;
  target.wirelessClients += source.wirelessClients;
  target.lanClients += source.lanClients;
  target.wifi24Clients += source.wifi24Clients;
  target.wifi5Clients += source.wifi5Clients;
  target.untaggedClients += source.untaggedClients;
  for (const [tag, count] of Object.entries(source.taggedClients)) {
    target.taggedClients[tag] = (target.taggedClients[tag] ?? 0) + count;
  }
}

/**
 * Client counts per router and for the whole mesh. The mesh total is the sum
 * of the router buckets.
 */
export function computeClientCounts(view: MeshView, options: ClientCountOptions = {}): MeshClientCounts {
  const tagSet = new Set(options.knownTags ?? []);
  for (const device of view.devices.values()) {
    for (const tag of device.tags) tagSet.add(tag);
  }
  const tags = [...tagSet].sort();

  const perRouter = new Map<string, ClientCounts>();
  for (const routerId of view.routers.keys()) {
    perRouter.set(routerId, emptyCounts(tags));
  }

  for (const device of view.devices.values()) {
    const bucket = perRouter.get(device.connectedViaRouterId);
    if (bucket) addDevice(bucket, device);
  }

  const total = emptyCounts(tags);
  for (const counts of perRouter.values()) {
    addCounts(total, counts);
  }

  return { perRouter, total };
}
