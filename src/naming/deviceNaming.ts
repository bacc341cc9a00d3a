import type { Coordinates, DeviceRole, NamingStrategy } from '../types';

/**
 * Where a device sits among its peers of the same role, counted in each
 * scope a name may retain.
 */
export interface DeviceOrdinal {
  /** Within the rack (leafs, ToRs) or the owning pod/DC (spines, super-spines). */
  local: number;
  inPod: number;
  inDc: number;
}

function pad(index: number): string {
  return String(index).padStart(2, '0');
}

function hierarchyParts(strategy: NamingStrategy, coordinates: Coordinates, role: DeviceRole): string[] {
  if (strategy === 'flat') return [];
  const parts = [`fab${coordinates.dc_index}`];
  // super-spines are DC-scoped whatever the strategy
  if (role === 'super-spine') return parts;

  if (coordinates.pod_index !== undefined) parts.push(`pod${coordinates.pod_index}`);
  if (strategy === 'standard') {
    if (coordinates.row_index !== undefined) parts.push(`row${coordinates.row_index}`);
    if (coordinates.rack_index !== undefined) parts.push(`rack${coordinates.rack_index}`);
  }
  return parts;
}

/**
 * Canonical device name.
 *
 * - standard: `{fabric}-fab{dc}-pod{pod}-row{row}-rack{rack}-{role}-{index}`
 * - hierarchical: `{fabric}-fab{dc}-pod{pod}-{role}-{index}`
 * - flat: `{fabric}-{role}-{index}`
 *
 * The index is zero-padded to two digits. Coordinates the device does not
 * have are left out.
 */
export function resolveName(
  strategy: NamingStrategy,
  coordinates: Coordinates,
  role: DeviceRole,
  index: number
): string {
  if (!Number.isInteger(index) || index < 1) {
    throw new RangeError(`Device index must be a positive integer, got ${index}`);
  }
  return [coordinates.fabric, ...hierarchyParts(strategy, coordinates, role), role, pad(index)].join('-');
}

/** The index to pass to resolveName so it is unique in the scope the name keeps. */
export function scopedDeviceIndex(strategy: NamingStrategy, role: DeviceRole, ordinal: DeviceOrdinal): number {
  if (role === 'super-spine') return ordinal.local;
  switch (strategy) {
    case 'standard':
      return ordinal.local;
    case 'hierarchical':
      return ordinal.inPod;
    case 'flat':
      return ordinal.inDc;
  }
}
