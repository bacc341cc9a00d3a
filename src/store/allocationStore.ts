/**
 * Run-scoped allocation cache.
 *
 * One cache belongs to one generator invocation; it is never shared between
 * invocations.
 */

import { createStore } from 'zustand/vanilla';
import { immer } from 'zustand/middleware/immer';
import { enableMapSet } from 'immer';
import type { PoolAllocation } from '../types';

enableMapSet();

export interface AllocationCacheState {
  entries: Map<string, PoolAllocation>;
  hits: number;

  remember: (allocation: PoolAllocation) => void;
  recordHit: () => void;
}

export function allocationKey(pool: string, identifier: string): string {
  return `${pool}#${identifier}`;
}

export function createAllocationCache() {
  return createStore<AllocationCacheState>()(
    immer((set) => ({
      entries: new Map(),
      hits: 0,

      remember: (allocation) =>
        set((state) => {
          state.entries.set(allocationKey(allocation.pool, allocation.identifier), allocation);
        }),

      recordHit: () =>
        set((state) => {
          state.hits += 1;
        }),
    }))
  );
}

export type AllocationCache = ReturnType<typeof createAllocationCache>;
