/**
 * Cabling offsets: the first upstream port a rack's switches land on.
 *
 * Offsets exist so that every switch-to-switch cable in a pod lands on its own
 * upstream port. The deployment types differ in what a rack's ToRs attach to:
 *
 * - middle_rack: ToRs attach to leafs in the same rack, leafs to spines
 * - tor: ToRs attach straight to spines, there is no leaf layer
 * - mixed: ToRs attach to the leafs of their row, leafs to spines
 */

import { CapacityError } from '../errors';
import type { DeploymentType, PodDesign } from '../types';

export interface OffsetInput {
  deploymentType: DeploymentType;
  /** 1-based */
  rowIndex: number;
  /** 1-based */
  rackIndex: number;
  /** ToRs in the rack being cabled. */
  torsInRack: number;
  /** ToRs in strictly preceding racks of the same row. */
  torsInPrecedingRacks: number;
  design: Pick<PodDesign, 'max_tors_per_row' | 'max_leafs_per_row'>;
}

export interface CablingOffsets {
  tor_offset: number;
  /** null when the deployment has no leaf layer */
  leaf_offset: number | null;
}

type OffsetStrategy = (input: OffsetInput) => CablingOffsets;

/**
 * Row base for leaf-to-spine cabling. Each row owns max_leafs_per_row spine
 * ports, so rows never overlap as long as no row holds more leafs than that.
 */
export function rowLeafOffset(rowIndex: number, maxLeafsPerRow: number): number {
  return (rowIndex - 1) * maxLeafsPerRow;
}

export const OFFSET_STRATEGIES: Record<DeploymentType, OffsetStrategy> = {
  middle_rack: ({ rowIndex, design }) => ({
    tor_offset: 0,
    leaf_offset: rowLeafOffset(rowIndex, design.max_leafs_per_row),
  }),

  tor: ({ rowIndex, rackIndex, torsInRack, design }) => ({
    tor_offset: design.max_tors_per_row * (rowIndex - 1) + torsInRack * (rackIndex - 1),
    leaf_offset: null,
  }),

  mixed: ({ rowIndex, torsInPrecedingRacks, design }) => ({
    tor_offset: torsInPrecedingRacks,
    leaf_offset: rowLeafOffset(rowIndex, design.max_leafs_per_row),
  }),
};

function assertIndex(label: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${label} must be a positive integer, got ${value}`);
  }
}

function assertCount(label: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${label} must be a non-negative integer, got ${value}`);
  }
}

export function computeOffset(input: OffsetInput): CablingOffsets {
  assertIndex('Row index', input.rowIndex);
  assertIndex('Rack index', input.rackIndex);
  assertCount('ToRs in rack', input.torsInRack);
  assertCount('ToRs in preceding racks', input.torsInPrecedingRacks);
  return OFFSET_STRATEGIES[input.deploymentType](input);
}

/**
 * Base spine port for the leafs of one rack: the row base plus the leafs of
 * preceding racks in the row. A row asking for more leafs than
 * max_leafs_per_row would spill into the next row's ports.
 */
export function leafCablingBase(
  offsets: CablingOffsets,
  leafsInPrecedingRacks: number,
  leafsInRack: number,
  maxLeafsPerRow: number
): number {
  if (offsets.leaf_offset === null) {
    throw new RangeError('Deployment has no leaf layer');
  }
  const rowLeafs = leafsInPrecedingRacks + leafsInRack;
  if (rowLeafs > maxLeafsPerRow) {
    throw new CapacityError(
      `Row needs ${rowLeafs} leafs, design allows ${maxLeafsPerRow} per row`,
      rowLeafs,
      maxLeafsPerRow
    );
  }
  return offsets.leaf_offset + leafsInPrecedingRacks;
}
