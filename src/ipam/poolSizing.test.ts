import { describe, expect, it } from 'vitest';
import { bitLength, poolPrefixLengths } from './poolSizing';

const limits = {
  maximum_super_spines: 2,
  maximum_pods: 2,
  maximum_spines: 2,
  maximum_leafs: 8,
  maximum_tors: 8,
};

describe('bitLength', () => {
  it('counts binary digits', () => {
    expect(bitLength(0)).toBe(0);
    expect(bitLength(1)).toBe(1);
    expect(bitLength(4)).toBe(3);
    expect(bitLength(255)).toBe(8);
    expect(bitLength(256)).toBe(9);
  });
});

describe('poolPrefixLengths', () => {
  it('sizes the data center pools', () => {
    // 2 pods × (2 + 8 + 8) + 2 + 2 = 40 → 6 bits; 2 + 2 = 4 → 3 bits
    expect(poolPrefixLengths('fabric', limits)).toEqual({
      management: 26,
      'super-spine-loopback': 29,
    });
  });

  it('sizes the pod pools', () => {
    // loopbacks: 2 + 8 + 8 + 2 = 20 → /27
    // links: 2 × (2 + 8 + 8) + 8 × 4 = 68, two addresses each → 136 → /24
    expect(poolPrefixLengths('pod', limits)).toEqual({
      supernet: 23,
      loopback: 27,
      technical: 24,
    });
  });

  it('leaves room for every host when a limit fills a block exactly', () => {
    const tight = { ...limits, maximum_pods: 1, maximum_super_spines: 0, maximum_spines: 2, maximum_leafs: 2, maximum_tors: 3 };

    // 7 hosts need a /28: a /29 only has 6 usable addresses
    expect(poolPrefixLengths('pod', tight).loopback).toBe(28);
    expect(poolPrefixLengths('fabric', tight).management).toBe(28);
  });

  it('grows pools with the limits', () => {
    const large = poolPrefixLengths('pod', { ...limits, maximum_spines: 4, maximum_leafs: 64 });
    expect(large.loopback).toBe(25);
    expect(large.technical).toBeLessThan(24);
  });
});
