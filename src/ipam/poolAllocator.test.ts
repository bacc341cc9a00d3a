import { beforeEach, describe, expect, it, vi } from 'vitest';
import { PoolExhaustedError, TopologyStateError } from '../errors';
import { MemoryInventory } from '../inventory/memoryInventory';
import { createRootPool } from '../test-utils/factories';
import { ResourcePoolAllocator } from './poolAllocator';

describe('ResourcePoolAllocator', () => {
  let inventory: MemoryInventory;
  let allocator: ResourcePoolAllocator;

  beforeEach(() => {
    inventory = new MemoryInventory();
    inventory.seed('pool', 'root-pool', createRootPool());
    inventory.seed('pool', 'mgmt', {
      name: 'mgmt',
      kind: 'address',
      role: 'management',
      parent: null,
      resources: ['10.0.0.0/26'],
      default_prefix_length: 26,
    });
    allocator = new ResourcePoolAllocator(inventory);
  });

  it('carves prefixes in order', async () => {
    const first = await allocator.allocatePrefix('root-pool', 'dc1', 16, 'fabric-supernet');
    const second = await allocator.allocatePrefix('root-pool', 'dc2', 16, 'fabric-supernet');

    expect(first).toEqual({ pool: 'root-pool', identifier: 'dc1', prefix: '10.0.0.0/16', role: 'fabric-supernet' });
    expect(second.prefix).toBe('10.1.0.0/16');
  });

  it('returns the same address for a repeated identifier and consumes capacity once', async () => {
    const before = await allocator.remainingCapacity('mgmt', 26);
    const first = await allocator.allocateAddress('mgmt', 'dc1/pod1/spine1', 26, 'management');
    const second = await allocator.allocateAddress('mgmt', 'dc1/pod1/spine1', 26, 'management');
    const after = await allocator.remainingCapacity('mgmt', 26);

    expect(first.prefix).toBe('10.0.0.1/26');
    expect(second).toEqual(first);
    expect(before).toBe(62);
    expect(after).toBe(61);
  });

  it('answers repeats from the cache without touching the inventory', async () => {
    await allocator.allocateAddress('mgmt', 'leaf1', 26, 'management');
    const listSpy = vi.spyOn(inventory, 'listChildren');

    await allocator.allocateAddress('mgmt', 'leaf1', 26, 'management');

    expect(listSpy).not.toHaveBeenCalled();
    expect(allocator.cache.getState().hits).toBe(1);
  });

  it('finds allocations made by an earlier run', async () => {
    const earlier = new ResourcePoolAllocator(inventory);
    const original = await earlier.allocateAddress('mgmt', 'leaf1', 26, 'management');
    const allocateSpy = vi.spyOn(inventory, 'allocateFromPool');

    const replay = await allocator.allocateAddress('mgmt', 'leaf1', 26, 'management');

    expect(replay).toEqual(original);
    expect(allocateSpy).not.toHaveBeenCalled();
    expect(allocator.cache.getState().entries.get('mgmt#leaf1')).toEqual(original);
  });

  it('rejects unknown pools', async () => {
    await expect(allocator.allocatePrefix('missing', 'x', 24, 'test')).rejects.toThrow(
      new TopologyStateError("Pool 'missing' does not exist")
    );
  });

  it('rejects a pool of the wrong kind', async () => {
    await expect(allocator.allocateAddress('root-pool', 'x', 32, 'loopback')).rejects.toThrow(
      "Pool 'root-pool' is of kind prefix, cannot allocate an address from it"
    );
    await expect(allocator.allocatePrefix('mgmt', 'x', 30, 'test')).rejects.toThrow(
      "Pool 'mgmt' is of kind address, cannot allocate a prefix from it"
    );
  });

  it('reports exhaustion', async () => {
    inventory.seed('pool', 'tiny', {
      name: 'tiny',
      kind: 'prefix',
      role: 'technical',
      parent: null,
      resources: ['10.9.0.0/30'],
      default_prefix_length: 31,
    });
    await allocator.allocatePrefix('tiny', 'a', 31, 'link');
    await allocator.allocatePrefix('tiny', 'b', 31, 'link');

    const failure = allocator.allocatePrefix('tiny', 'c', 31, 'link');
    await expect(failure).rejects.toBeInstanceOf(PoolExhaustedError);
    await expect(failure).rejects.toThrow("Pool 'tiny' has no free /31 left");
  });
});
