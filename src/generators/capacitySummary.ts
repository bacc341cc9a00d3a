/**
 * Device utilisation of a data center against its fabric design.
 */

import type { InventoryClient } from '../inventory/client';
import type { DeviceRole, FabricDesign, InventoryRecord } from '../types';
import { formatUtilization } from '../utils/format';

export interface Utilization {
  used: number;
  maximum: number;
}

export interface PodCapacity {
  pod: string;
  spines: Utilization;
  leafs: Utilization;
  tors: Utilization;
}

export interface CapacitySummary {
  dc: string;
  superSpines: Utilization;
  pods: Utilization;
  perPod: PodCapacity[];
}

function countActive(devices: InventoryRecord<'device'>[], role: DeviceRole): number {
  return devices.filter((device) => device.payload.role === role && device.payload.status === 'active').length;
}

async function podDevices(inventory: InventoryClient, podKey: string): Promise<InventoryRecord<'device'>[]> {
  const devices = await inventory.listChildren(podKey, 'device');
  for (const row of await inventory.listChildren(podKey, 'row')) {
    for (const rack of await inventory.listChildren(row.key, 'rack')) {
      devices.push(...(await inventory.listChildren(rack.key, 'device')));
    }
  }
  return devices;
}

export async function summarizeCapacity(
  inventory: InventoryClient,
  dcKey: string,
  fabric: FabricDesign
): Promise<CapacitySummary> {
  const dcDevices = await inventory.listChildren(dcKey, 'device');
  const pods = (await inventory.listChildren(dcKey, 'pod')).sort((a, b) => a.payload.index - b.payload.index);

  const perPod: PodCapacity[] = [];
  for (const pod of pods) {
    const devices = await podDevices(inventory, pod.key);
    perPod.push({
      pod: pod.payload.name,
      spines: { used: countActive(devices, 'spine'), maximum: fabric.maximum_spines },
      leafs: { used: countActive(devices, 'leaf'), maximum: fabric.maximum_leafs },
      tors: { used: countActive(devices, 'tor'), maximum: fabric.maximum_tors },
    });
  }

  return {
    dc: dcKey,
    superSpines: { used: countActive(dcDevices, 'super-spine'), maximum: fabric.maximum_super_spines },
    pods: { used: pods.length, maximum: fabric.maximum_pods },
    perPod,
  };
}

export function formatCapacitySummary(summary: CapacitySummary): string {
  const lines = [
    `Data center ${summary.dc}`,
    formatUtilization('Super Spines', summary.superSpines.used, summary.superSpines.maximum),
    formatUtilization('Pods', summary.pods.used, summary.pods.maximum),
  ];
  for (const pod of summary.perPod) {
    lines.push(
      `Pod ${pod.pod}: ` +
        [
          formatUtilization('spines', pod.spines.used, pod.spines.maximum),
          formatUtilization('leafs', pod.leafs.used, pod.leafs.maximum),
          formatUtilization('tors', pod.tors.used, pod.tors.maximum),
        ].join(', ')
    );
  }
  return lines.join('\n');
}
