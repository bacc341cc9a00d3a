/**
 * Prefix lengths for the pools a data center or pod carves, derived from the
 * fabric design's device limits.
 */

import type { FabricDesign } from '../types';

export type FabricLimits = Pick<
  FabricDesign,
  'maximum_super_spines' | 'maximum_pods' | 'maximum_spines' | 'maximum_leafs' | 'maximum_tors'
>;

export interface FabricPoolLengths {
  management: number;
  'super-spine-loopback': number;
}

export interface PodPoolLengths {
  supernet: number;
  loopback: number;
  technical: number;
}

// /31s reserved per ToR for its uplinks.
const TOR_UPLINK_FANOUT = 4;

export function bitLength(value: number): number {
  return value <= 0 ? 0 : Math.floor(value).toString(2).length;
}

function lengthFor(addresses: number): number {
  return 32 - bitLength(addresses);
}

// network and broadcast addresses are not handed out
function addressPoolLength(hosts: number): number {
  return lengthFor(hosts + 2);
}

export function poolPrefixLengths(scope: 'fabric', limits: FabricLimits): FabricPoolLengths;
export function poolPrefixLengths(scope: 'pod', limits: FabricLimits): PodPoolLengths;
export function poolPrefixLengths(
  scope: 'fabric' | 'pod',
  limits: FabricLimits
): FabricPoolLengths | PodPoolLengths {
  const spines = limits.maximum_spines;
  const leafs = limits.maximum_leafs;
  const tors = limits.maximum_tors;
  const superSpines = limits.maximum_super_spines;

  if (scope === 'fabric') {
    return {
      management: addressPoolLength(limits.maximum_pods * (spines + leafs + tors) + superSpines),
      'super-spine-loopback': addressPoolLength(superSpines),
    };
  }

  // every point-to-point link takes a /31
  const links = spines * (superSpines + leafs + tors) + tors * TOR_UPLINK_FANOUT;
  const loopback = addressPoolLength(spines + leafs + tors);
  const technical = lengthFor(2 * links);
  return {
    supernet: Math.min(loopback, technical) - 1,
    loopback,
    technical,
  };
}
