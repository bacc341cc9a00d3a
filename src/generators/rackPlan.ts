/**
 * Which racks a pod's rows hold and what each rack houses.
 *
 * Every row of a pod has the same plan. Network racks come first in a row,
 * then compute racks:
 *
 * - middle_rack: network racks hold the leafs and the row's ToRs; a network
 *   rack left without leafs gets no ToRs either
 * - tor: compute racks hold ToRs, network racks stay empty
 * - mixed: network racks hold the leafs, compute racks the ToRs
 */

import type { PodDesign, RackType, SiteLayout } from '../types';
import { LEAFS_PER_NETWORK_RACK, type PodDeviceCounts } from '../validation/compatibility';

export interface PlannedRack {
  rack_index: number;
  rack_type: RackType;
  leaf_count: number;
  tor_count: number;
}

export function leafsPerRack(design: PodDesign): number {
  return Math.min(design.leafs_per_rack ?? 2, LEAFS_PER_NETWORK_RACK);
}

export function torsPerRack(design: PodDesign): number {
  return design.tors_per_rack ?? 1;
}

export function rowCount(layout: SiteLayout): number {
  return layout.rows ?? 1;
}

export function planRow(design: PodDesign, layout: SiteLayout): PlannedRack[] {
  const type = design.deployment_type;
  let leafsLeft = type === 'tor' ? 0 : design.max_leafs_per_row;
  let torsLeft = design.max_tors_per_row;
  const racks: PlannedRack[] = [];

  for (let i = 0; i < layout.network_racks_per_row; i++) {
    const leafs = Math.min(leafsPerRack(design), leafsLeft);
    // middle_rack ToRs uplink to the leafs of their own rack
    const tors = type === 'middle_rack' && leafs > 0 ? Math.min(torsPerRack(design), torsLeft) : 0;
    leafsLeft -= leafs;
    torsLeft -= tors;
    racks.push({ rack_index: racks.length + 1, rack_type: 'network', leaf_count: leafs, tor_count: tors });
  }

  for (let i = 0; i < layout.compute_racks_per_row; i++) {
    const tors = type === 'middle_rack' ? 0 : Math.min(torsPerRack(design), torsLeft);
    torsLeft -= tors;
    racks.push({ rack_index: racks.length + 1, rack_type: 'compute', leaf_count: 0, tor_count: tors });
  }

  return racks;
}

/** Devices a pod holds once every rack is generated. */
export function planPodCounts(design: PodDesign, layout: SiteLayout): PodDeviceCounts {
  const row = planRow(design, layout);
  const rows = rowCount(layout);
  return {
    spines: design.spine_count,
    leafs: rows * row.reduce((sum, rack) => sum + rack.leaf_count, 0),
    tors: rows * row.reduce((sum, rack) => sum + rack.tor_count, 0),
  };
}
