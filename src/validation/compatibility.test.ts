import { describe, expect, it } from 'vitest';
import { CapacityError, WhitelistError } from '../errors';
import { createMockFabricDesign, createMockLayout, createMockPodDesign } from '../test-utils/factories';
import {
  assertCompatible,
  validateCompatibility,
  validateDcCapacity,
  validatePodCapacity,
} from './compatibility';

describe('validateCompatibility', () => {
  it('accepts a design that fits the layout', () => {
    expect(validateCompatibility(createMockPodDesign(), createMockLayout())).toEqual({ ok: true });
  });

  it('rejects a design needing more ToR slots than compute racks', () => {
    const design = createMockPodDesign({ name: 'tor-heavy', max_tors_per_row: 8, max_leafs_per_row: 4 });
    const layout = createMockLayout({ name: 'row-narrow', compute_racks_per_row: 6, network_racks_per_row: 2 });

    const result = validateCompatibility(design, layout);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(CapacityError);
    expect(result.error.message).toBe(
      "Design 'tor-heavy' needs 8 ToR slots per row, layout 'row-narrow' has 6 compute racks per row"
    );
    expect(result.issues).toHaveLength(1);
  });

  it('rejects ten ToRs per row on eight compute racks', () => {
    const design = createMockPodDesign({ deployment_type: 'tor', max_tors_per_row: 10, max_leafs_per_row: 0 });
    const layout = createMockLayout({ compute_racks_per_row: 8 });

    expect(() => assertCompatible(design, layout)).toThrow(CapacityError);
  });

  it('rejects a design needing more leaf slots than network racks hold', () => {
    const design = createMockPodDesign({ name: 'leaf-heavy', max_leafs_per_row: 5 });

    const result = validateCompatibility(design, createMockLayout());

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe(
      "Design 'leaf-heavy' needs 5 leaf slots per row, layout 'row-small' has 4 (1 network racks × 4)"
    );
    expect(result.error).toMatchObject({ required: 5, available: 4 });
  });

  it('treats an empty whitelist as unrestricted', () => {
    const design = createMockPodDesign({ compatible_layouts: [] });
    expect(validateCompatibility(design, createMockLayout({ name: 'anything' })).ok).toBe(true);
  });

  it('applies the whitelist on top of capacity', () => {
    const design = createMockPodDesign({ compatible_layouts: ['row-large'] });

    const result = validateCompatibility(design, createMockLayout());

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(WhitelistError);
    expect(result.error.message).toBe(
      "Layout 'row-small' is not compatible with design 'mixed-small'. Allowed layouts: row-large"
    );
  });

  it('reports capacity issues before whitelist issues', () => {
    const design = createMockPodDesign({ max_tors_per_row: 3, compatible_layouts: ['row-large'] });

    const result = validateCompatibility(design, createMockLayout());

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.issues.map((issue) => issue.code)).toEqual(['capacity', 'whitelist']);
  });

  it('never passes a layout missing from a non-empty whitelist', () => {
    for (const layoutName of ['row-small', 'row-large', 'row-xl']) {
      const design = createMockPodDesign({ compatible_layouts: ['row-medium'] });
      expect(validateCompatibility(design, createMockLayout({ name: layoutName })).ok).toBe(false);
    }
  });
});

describe('assertCompatible', () => {
  it('throws the first issue', () => {
    expect(() => assertCompatible(createMockPodDesign({ max_tors_per_row: 3 }), createMockLayout())).toThrow(
      CapacityError
    );
    expect(() => assertCompatible(createMockPodDesign(), createMockLayout())).not.toThrow();
  });
});

describe('fabric limits', () => {
  const fabric = createMockFabricDesign();

  it('accepts a data center at its limits', () => {
    expect(() => validateDcCapacity('dc1', fabric, 2, 2)).not.toThrow();
  });

  it('lists every exceeded limit of a data center', () => {
    expect(() => validateDcCapacity('dc1', fabric, 3, 4)).toThrow(
      "Data center 'dc1' exceeds the limits of fabric design 'fabric-small':\n" +
        '  - Requested 3 super-spines exceeds design pattern maximum of 2\n' +
        '  - Requested 4 pods exceeds design pattern maximum of 2'
    );
  });

  it('checks pod device counts', () => {
    expect(() => validatePodCapacity('pod1', fabric, { spines: 2, leafs: 9, tors: 8 })).toThrow(
      "Pod 'pod1' exceeds the limits of fabric design 'fabric-small':\n" +
        '  - Requested 9 leafs exceeds design pattern maximum of 8'
    );
    expect(() => validatePodCapacity('pod1', fabric, { spines: 2, leafs: 8, tors: 8 })).not.toThrow();
  });
});
