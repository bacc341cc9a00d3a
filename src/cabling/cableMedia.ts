import type { CableMedium } from '../types';

export type MediaFamily = 'copper' | 'twinax' | 'fiber';

/**
 * Twisted-pair types ("1000base-t", "100base-tx", "100base-t1") are copper,
 * twinax types ("25gbase-cr", "100gbase-cr4", "10gbase-cx4") are twinax.
 * Everything else, pluggable cages included, is fiber.
 */
export function mediaFamily(interfaceType: string): MediaFamily {
  const type = interfaceType.trim();
  if (/base-?t(x|\d+)?$/i.test(type)) return 'copper';
  if (/base-c[rx]\d*$/i.test(type)) return 'twinax';
  return 'fiber';
}

/**
 * Medium of a cable from the interface types at its ends.
 *
 * copper + copper is copper, fiber + fiber is multi-mode fiber. A twinax end
 * or a mixed pair needs a direct-attach/active-optical assembly. An override
 * wins.
 */
export function resolveMedium(typeA: string, typeB: string, override?: CableMedium | null): CableMedium {
  if (override) return override;
  const a = mediaFamily(typeA);
  const b = mediaFamily(typeB);
  if (a === 'twinax' || b === 'twinax' || a !== b) return 'dac';
  return a === 'copper' ? 'copper' : 'mmf';
}
