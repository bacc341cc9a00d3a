/**
 * Interface Registry - interface names a device template expands to
 *
 * Templates describe interfaces as groups with an {index} placeholder
 * ("Ethernet1/{index}", start 1, count 32). Generators expand them into
 * concrete names and pick uplinks/downlinks from the sorted result.
 */

import { TopologyStateError } from '../errors';
import type { DeviceTemplate, InterfaceGroup, InterfaceRole, InterfaceSorting } from '../types';

export interface ExpandedInterface {
  name: string;
  role: InterfaceRole;
  interface_type: string;
}

/**
 * Generate an interface name for a pattern and index.
 */
export function generateInterfaceName(pattern: string, index: number): string {
  return pattern.replace('{index}', String(index));
}

function expandGroup(group: InterfaceGroup): ExpandedInterface[] {
  return Array.from({ length: group.count }, (_, offset) => ({
    name: generateInterfaceName(group.pattern, group.start + offset),
    role: group.role,
    interface_type: group.interface_type,
  }));
}

/**
 * Expand every interface group of a template, in template order.
 * Two groups producing the same name is a template error.
 */
export function expandTemplate(template: DeviceTemplate): ExpandedInterface[] {
  const seen = new Set<string>();
  const expanded: ExpandedInterface[] = [];
  for (const group of template.interfaces) {
    for (const iface of expandGroup(group)) {
      if (seen.has(iface.name)) {
        throw new TopologyStateError(`Template '${template.name}' defines interface '${iface.name}' twice`);
      }
      seen.add(iface.name);
      expanded.push(iface);
    }
  }
  return expanded;
}

/** Natural order: "Ethernet1/2" sorts before "Ethernet1/10". */
export function compareInterfaceNames(a: string, b: string): number {
  return a.localeCompare(b, 'en', { numeric: true });
}

export function sortInterfaces<T extends { name: string }>(
  interfaces: readonly T[],
  direction: InterfaceSorting = 'bottom_up'
): T[] {
  const sorted = [...interfaces].sort((a, b) => compareInterfaceNames(a.name, b.name));
  return direction === 'top_down' ? sorted.reverse() : sorted;
}

/**
 * Interfaces of one role, sorted.
 */
export function interfacesByRole<T extends { name: string; role: InterfaceRole }>(
  interfaces: readonly T[],
  role: InterfaceRole,
  direction: InterfaceSorting = 'bottom_up'
): T[] {
  return sortInterfaces(
    interfaces.filter((iface) => iface.role === role),
    direction
  );
}
