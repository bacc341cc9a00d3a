/**
 * Pairing of a lower layer's uplinks with an upper layer's downlinks.
 *
 * Bottom device k (0-based, in device order) takes its j-th uplink to top
 * device j and lands on that device's downlink at position offset + k. With
 * offsets from ./offsets every bottom device in a pod gets its own column of
 * downlinks on the layer above.
 *
 * Inactive devices keep their position in both lists, so the ports of the
 * devices around them stay put; no cable is planned to or from them.
 */

import { CapacityError } from '../errors';

export interface PortRef {
  key: string;
  name: string;
  interface_type: string;
}

export interface CablingDevice {
  key: string;
  name: string;
  active: boolean;
  /** Sorted in the order they are used. */
  uplinks: PortRef[];
  downlinks: PortRef[];
}

export interface PlannedCable {
  bottomDevice: string;
  bottomDeviceName: string;
  bottom: PortRef;
  topDevice: string;
  topDeviceName: string;
  top: PortRef;
}

export function buildCablingPlan(
  bottom: readonly CablingDevice[],
  top: readonly CablingDevice[],
  offset: number
): PlannedCable[] {
  if (!Number.isInteger(offset) || offset < 0) {
    throw new RangeError(`Cabling offset must be a non-negative integer, got ${offset}`);
  }

  const plan: PlannedCable[] = [];
  bottom.forEach((device, k) => {
    if (!device.active) return;
    const links = Math.min(device.uplinks.length, top.length);
    for (let j = 0; j < links; j++) {
      const upstream = top[j];
      if (!upstream.active) continue;
      const position = offset + k;
      const downlink = upstream.downlinks[position];
      if (!downlink) {
        throw new CapacityError(
          `Device '${upstream.name}' has ${upstream.downlinks.length} downlinks, ` +
            `cannot cable '${device.name}' to downlink ${position + 1}`,
          position + 1,
          upstream.downlinks.length
        );
      }
      plan.push({
        bottomDevice: device.key,
        bottomDeviceName: device.name,
        bottom: device.uplinks[j],
        topDevice: upstream.key,
        topDeviceName: upstream.name,
        top: downlink,
      });
    }
  });
  return plan;
}
