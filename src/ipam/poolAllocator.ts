/**
 * Idempotent prefix and address allocation.
 *
 * Lookup order for a (pool, identifier) pair: the run-scoped cache, then the
 * pool's existing allocations in the inventory, then a fresh carve.
 */

import { TopologyStateError } from '../errors';
import type { InventoryClient } from '../inventory/client';
import { allocationKey, createAllocationCache, type AllocationCache } from '../store/allocationStore';
import type { PoolAllocation, PoolKind } from '../types';
import { createLogger, type Logger } from '../utils/logger';
import { remainingCapacity } from './carving';

export class ResourcePoolAllocator {
  private readonly log: Logger;

  constructor(
    private readonly inventory: InventoryClient,
    readonly cache: AllocationCache = createAllocationCache(),
    logger: Logger = createLogger('pool-allocator')
  ) {
    this.log = logger;
  }

  /** Carve a subnet of `prefixLength` from a prefix pool. */
  allocatePrefix(parentPool: string, identifier: string, prefixLength: number, role: string): Promise<PoolAllocation> {
    return this.allocate('prefix', parentPool, identifier, prefixLength, role);
  }

  /** Take one host from an address pool; the result carries `prefixLength` as its mask. */
  allocateAddress(sourcePool: string, identifier: string, prefixLength: number, role: string): Promise<PoolAllocation> {
    return this.allocate('address', sourcePool, identifier, prefixLength, role);
  }

  async remainingCapacity(pool: string, length: number): Promise<number> {
    const poolRecord = await this.inventory.getRecord('pool', pool);
    if (!poolRecord) {
      throw new TopologyStateError(`Pool '${pool}' does not exist`);
    }
    const allocations = await this.inventory.listChildren(pool, 'allocation');
    return remainingCapacity(
      poolRecord.payload,
      allocations.map((record) => record.payload.prefix),
      length
    );
  }

  private async allocate(
    kind: PoolKind,
    pool: string,
    identifier: string,
    length: number,
    role: string
  ): Promise<PoolAllocation> {
    const cached = this.cache.getState().entries.get(allocationKey(pool, identifier));
    if (cached) {
      this.cache.getState().recordHit();
      return cached;
    }

    const allocations = await this.inventory.listChildren(pool, 'allocation');
    const prior = allocations.find((record) => record.payload.identifier === identifier);
    if (prior) {
      this.cache.getState().remember(prior.payload);
      return prior.payload;
    }

    const poolRecord = await this.inventory.getRecord('pool', pool);
    if (!poolRecord) {
      throw new TopologyStateError(`Pool '${pool}' does not exist`);
    }
    if (poolRecord.payload.kind !== kind) {
      throw new TopologyStateError(
        `Pool '${pool}' is of kind ${poolRecord.payload.kind}, cannot allocate ${kind === 'address' ? 'an address' : 'a prefix'} from it`
      );
    }

    const allocation = await this.inventory.allocateFromPool(pool, identifier, length, role);
    this.log.debug(`Allocated ${allocation.prefix} from ${pool} for ${identifier} (${role})`);
    this.cache.getState().remember(allocation);
    return allocation;
  }
}
