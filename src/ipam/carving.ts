/**
 * First-fit carving of blocks and host addresses out of a pool's resources.
 *
 * These are free functions over a pool and the prefixes already taken from
 * it; persistence and idempotence live in the inventory and the allocator.
 */

import type { ResourcePool } from '../types';
import {
  addressOf,
  blockSize,
  formatCidr,
  ipToNumber,
  lastAddress,
  numberToIp,
  parseCidr,
  usableRange,
  type ParsedCidr,
} from './cidr';

interface Interval {
  start: number;
  end: number;
}

/** Taken prefixes as sorted address intervals. Addresses may carry a mask. */
function takenIntervals(taken: readonly string[], kind: ResourcePool['kind']): Interval[] {
  return taken
    .map((prefix) => {
      if (kind === 'address') {
        const value = ipToNumber(addressOf(prefix));
        return { start: value, end: value };
      }
      const parsed = parseCidr(prefix);
      return { start: parsed.network, end: lastAddress(parsed) };
    })
    .sort((a, b) => a.start - b.start);
}

function carveBlock(resource: ParsedCidr, taken: Interval[], length: number): string | null {
  if (length < resource.length) return null;
  const size = blockSize(length);
  const end = lastAddress(resource);
  let candidate = resource.network;

  while (candidate + size - 1 <= end) {
    const candidateEnd = candidate + size - 1;
    const clash = taken.find((interval) => interval.start <= candidateEnd && candidate <= interval.end);
    if (!clash) return formatCidr(candidate, length);
    // jump to the first aligned block past the clash
    candidate = Math.ceil((clash.end + 1) / size) * size;
  }
  return null;
}

function carveHost(resource: ParsedCidr, taken: Interval[]): number | null {
  const range = usableRange(resource);
  let candidate = range.first;
  for (const interval of taken) {
    if (interval.end < candidate) continue;
    if (interval.start > candidate) break;
    candidate = interval.end + 1;
  }
  return candidate <= range.last ? candidate : null;
}

/**
 * Carve the first free block of `length` from the pool.
 *
 * Prefix pools return an aligned block. Address pools return one host,
 * formatted as "host/length".
 * @returns null when the pool has no room left
 */
export function carveNext(pool: ResourcePool, taken: readonly string[], length: number): string | null {
  const intervals = takenIntervals(taken, pool.kind);
  for (const resource of pool.resources.map(parseCidr)) {
    if (pool.kind === 'address') {
      const host = carveHost(resource, intervals);
      if (host !== null) return `${numberToIp(host)}/${length}`;
    } else {
      const block = carveBlock(resource, intervals, length);
      if (block) return block;
    }
  }
  return null;
}

/** Free blocks of `length` (or free hosts, for address pools). */
export function remainingCapacity(pool: ResourcePool, taken: readonly string[], length: number): number {
  const intervals = takenIntervals(taken, pool.kind);
  let free = 0;

  for (const resource of pool.resources.map(parseCidr)) {
    if (pool.kind === 'address') {
      const range = usableRange(resource);
      const used = intervals.filter((i) => i.start >= range.first && i.start <= range.last).length;
      free += range.last - range.first + 1 - used;
      continue;
    }

    if (length < resource.length) continue;
    const size = blockSize(length);
    const end = lastAddress(resource);
    let blocked = 0;
    let lastBlocked = -1;
    for (const interval of intervals) {
      if (interval.end < resource.network || interval.start > end) continue;
      const first = Math.floor((Math.max(interval.start, resource.network) - resource.network) / size);
      const last = Math.floor((Math.min(interval.end, end) - resource.network) / size);
      const from = Math.max(first, lastBlocked + 1);
      if (last >= from) {
        blocked += last - from + 1;
        lastBlocked = last;
      }
    }
    free += blockSize(resource.length) / size - blocked;
  }
  return free;
}
