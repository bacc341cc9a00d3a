/**
 * Device decommissioning.
 *
 * Removes the device's cables, returns their technical prefixes to the pool,
 * frees the far-end interfaces and disables the device's own interfaces.
 * Running it again on a decommissioned device changes nothing.
 */

import { CatalogLookupError } from '../errors';
import type { InventoryClient } from '../inventory/client';
import { pluralize } from '../utils/format';
import { createLogger, type Logger } from '../utils/logger';

export interface DecommissionReport {
  device: string;
  cablesRemoved: number;
  allocationsReleased: number;
  interfacesDisabled: number;
}

export async function decommissionDevice(
  inventory: InventoryClient,
  deviceKey: string,
  log: Logger = createLogger('decommission')
): Promise<DecommissionReport> {
  const device = await inventory.getRecord('device', deviceKey);
  if (!device) {
    throw new CatalogLookupError('record', `device:${deviceKey}`);
  }

  const report: DecommissionReport = {
    device: deviceKey,
    cablesRemoved: 0,
    allocationsReleased: 0,
    interfacesDisabled: 0,
  };

  const interfaces = await inventory.listChildren(deviceKey, 'interface');
  for (const iface of interfaces) {
    const cableKey = iface.payload.cable;
    if (cableKey) {
      const cable = await inventory.getRecord('cable', cableKey);
      if (cable) {
        const pool = cable.payload.technical_pool;
        if (pool && (await inventory.releaseAllocation(pool, cable.key))) {
          report.allocationsReleased += 1;
        }
        for (const endpoint of cable.payload.endpoints) {
          if (endpoint !== iface.key) {
            await inventory.updateRecord('interface', endpoint, { status: 'free', cable: null, ip_address: null });
          }
        }
        if (await inventory.deleteRecord('cable', cable.key)) {
          report.cablesRemoved += 1;
        }
      }
    }

    if (iface.payload.status !== 'disabled') {
      await inventory.updateRecord('interface', iface.key, { status: 'disabled', cable: null, ip_address: null });
      report.interfacesDisabled += 1;
    }
  }

  if (device.payload.status !== 'decommissioned') {
    await inventory.updateRecord('device', deviceKey, { status: 'decommissioned' });
  }

  log.info(
    `Decommissioned ${device.payload.name}: ${pluralize(report.cablesRemoved, 'cable')} removed, ` +
      `${pluralize(report.interfacesDisabled, 'interface')} disabled`
  );
  return report;
}
