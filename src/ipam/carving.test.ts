import { describe, expect, it } from 'vitest';
import type { ResourcePool } from '../types';
import { carveNext, remainingCapacity } from './carving';

function pool(kind: ResourcePool['kind'], resources: string[]): ResourcePool {
  return { name: 'test-pool', kind, role: 'test', parent: null, resources, default_prefix_length: 24 };
}

describe('carveNext (prefix pools)', () => {
  it('returns the first aligned block', () => {
    expect(carveNext(pool('prefix', ['10.0.0.0/16']), [], 24)).toBe('10.0.0.0/24');
  });

  it('skips taken blocks', () => {
    expect(carveNext(pool('prefix', ['10.0.0.0/16']), ['10.0.0.0/24', '10.0.1.0/24'], 24)).toBe('10.0.2.0/24');
  });

  it('jumps past a smaller taken block to the next aligned boundary', () => {
    const taken = ['10.0.0.0/26', '10.0.0.64/29'];
    expect(carveNext(pool('prefix', ['10.0.0.0/16']), taken, 23)).toBe('10.0.2.0/23');
  });

  it('fills gaps left between allocations', () => {
    const taken = ['10.0.0.0/31', '10.0.0.4/31'];
    expect(carveNext(pool('prefix', ['10.0.0.0/24']), taken, 31)).toBe('10.0.0.2/31');
  });

  it('moves on to the next resource when the first is full', () => {
    const p = pool('prefix', ['10.0.0.0/24', '10.1.0.0/24']);
    expect(carveNext(p, ['10.0.0.0/24'], 25)).toBe('10.1.0.0/25');
  });

  it('returns null when nothing fits', () => {
    expect(carveNext(pool('prefix', ['10.0.0.0/24']), ['10.0.0.0/25', '10.0.0.128/25'], 26)).toBeNull();
    expect(carveNext(pool('prefix', ['10.0.0.0/24']), [], 16)).toBeNull();
  });
});

describe('carveNext (address pools)', () => {
  it('hands out hosts after the network address with the requested mask', () => {
    expect(carveNext(pool('address', ['10.0.0.0/26']), [], 26)).toBe('10.0.0.1/26');
    expect(carveNext(pool('address', ['10.0.0.0/26']), ['10.0.0.1/26', '10.0.0.2/26'], 26)).toBe('10.0.0.3/26');
  });

  it('never hands out the broadcast address', () => {
    expect(carveNext(pool('address', ['10.0.0.0/30']), ['10.0.0.1/32', '10.0.0.2/32'], 32)).toBeNull();
  });

  it('reuses released holes first', () => {
    expect(carveNext(pool('address', ['10.0.0.64/29']), ['10.0.0.65/32', '10.0.0.67/32'], 32)).toBe('10.0.0.66/32');
  });
});

describe('remainingCapacity', () => {
  it('counts free aligned blocks', () => {
    const p = pool('prefix', ['10.0.0.0/24']);
    expect(remainingCapacity(p, [], 26)).toBe(4);
    expect(remainingCapacity(p, ['10.0.0.0/26'], 26)).toBe(3);
    // a /27 blocks the /26 that holds it
    expect(remainingCapacity(p, ['10.0.0.32/27'], 26)).toBe(3);
    // a /25 blocks two /26s
    expect(remainingCapacity(p, ['10.0.0.128/25'], 26)).toBe(2);
  });

  it('counts free hosts of address pools', () => {
    const p = pool('address', ['10.0.0.0/29']);
    expect(remainingCapacity(p, [], 32)).toBe(6);
    expect(remainingCapacity(p, ['10.0.0.1/32', '10.0.0.2/32'], 32)).toBe(4);
  });
});
