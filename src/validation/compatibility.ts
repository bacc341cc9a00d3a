/**
 * Design/layout compatibility and fabric capacity checks.
 *
 * All checks here are pure and run before a generator writes anything.
 */

import { CapacityError, WhitelistError, type TopologyError } from '../errors';
import type { FabricDesign, PodDesign, SiteLayout } from '../types';

/** Leaf switches one network rack can house. */
export const LEAFS_PER_NETWORK_RACK = 4;

export type CompatibilityResult =
  | { ok: true }
  | { ok: false; error: TopologyError; issues: TopologyError[] };

/**
 * Check that a pod design fits a site layout.
 *
 * Capacity checks always run; the layout whitelist is an additional
 * restriction when the design declares one. Issues are reported in that order.
 */
export function validateCompatibility(design: PodDesign, layout: SiteLayout): CompatibilityResult {
  const issues: TopologyError[] = [];

  if (design.max_tors_per_row > layout.compute_racks_per_row) {
    issues.push(
      new CapacityError(
        `Design '${design.name}' needs ${design.max_tors_per_row} ToR slots per row, ` +
          `layout '${layout.name}' has ${layout.compute_racks_per_row} compute racks per row`,
        design.max_tors_per_row,
        layout.compute_racks_per_row
      )
    );
  }

  const leafSlots = layout.network_racks_per_row * LEAFS_PER_NETWORK_RACK;
  if (design.max_leafs_per_row > leafSlots) {
    issues.push(
      new CapacityError(
        `Design '${design.name}' needs ${design.max_leafs_per_row} leaf slots per row, ` +
          `layout '${layout.name}' has ${leafSlots} (${layout.network_racks_per_row} network racks × ${LEAFS_PER_NETWORK_RACK})`,
        design.max_leafs_per_row,
        leafSlots
      )
    );
  }

  if (design.compatible_layouts.length > 0 && !design.compatible_layouts.includes(layout.name)) {
    issues.push(new WhitelistError(layout.name, design.compatible_layouts, design.name));
  }

  const [first] = issues;
  return first ? { ok: false, error: first, issues } : { ok: true };
}

/** Throws the first compatibility issue. */
export function assertCompatible(design: PodDesign, layout: SiteLayout): void {
  const result = validateCompatibility(design, layout);
  if (!result.ok) {
    throw result.error;
  }
}

interface LimitCheck {
  label: string;
  requested: number;
  maximum: number;
}

function assertLimits(scope: string, fabric: FabricDesign, checks: LimitCheck[]): void {
  const exceeded = checks.filter((check) => check.requested > check.maximum);
  if (exceeded.length === 0) return;

  const lines = exceeded.map(
    (check) => `Requested ${check.requested} ${check.label} exceeds design pattern maximum of ${check.maximum}`
  );
  const [worst] = exceeded;
  throw new CapacityError(
    `${scope} exceeds the limits of fabric design '${fabric.name}':\n  - ${lines.join('\n  - ')}`,
    worst.requested,
    worst.maximum
  );
}

/** Super-spine and pod counts of a data center against its fabric design. */
export function validateDcCapacity(
  dcName: string,
  fabric: FabricDesign,
  superSpineCount: number,
  podCount: number
): void {
  assertLimits(`Data center '${dcName}'`, fabric, [
    { label: 'super-spines', requested: superSpineCount, maximum: fabric.maximum_super_spines },
    { label: 'pods', requested: podCount, maximum: fabric.maximum_pods },
  ]);
}

export interface PodDeviceCounts {
  spines: number;
  leafs: number;
  tors: number;
}

/** Planned spine, leaf and ToR counts of a pod against its fabric design. */
export function validatePodCapacity(podName: string, fabric: FabricDesign, counts: PodDeviceCounts): void {
  assertLimits(`Pod '${podName}'`, fabric, [
    { label: 'spines', requested: counts.spines, maximum: fabric.maximum_spines },
    { label: 'leafs', requested: counts.leafs, maximum: fabric.maximum_leafs },
    { label: 'tors', requested: counts.tors, maximum: fabric.maximum_tors },
  ]);
}
