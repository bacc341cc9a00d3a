/**
 * Test data factories for designs, layouts, templates and seeded inventories.
 *
 * The defaults describe one small mixed pod in data center "dc1"; every
 * factory takes overrides.
 */

import { MemoryInventory } from '../inventory/memoryInventory';
import type {
  DataCenterRecord,
  DeviceTemplate,
  FabricDesign,
  InterfaceGroup,
  PodDesign,
  ResourcePool,
  SiteLayout,
} from '../types';

/**
 * Create a mock pod design (mixed, 2 spines, 2 leafs and 2 ToRs per row)
 */
export function createMockPodDesign(overrides: Partial<PodDesign> = {}): PodDesign {
  return {
    name: 'mixed-small',
    deployment_type: 'mixed',
    spine_count: 2,
    max_tors_per_row: 2,
    max_leafs_per_row: 2,
    compatible_layouts: [],
    tors_per_rack: 1,
    leafs_per_rack: 2,
    spine_template: 'spine-template',
    leaf_template: 'leaf-template',
    tor_template: 'tor-template',
    ...overrides,
  };
}

/**
 * Create a mock site layout (1 network rack, 2 compute racks, 2 rows)
 */
export function createMockLayout(overrides: Partial<SiteLayout> = {}): SiteLayout {
  return {
    name: 'row-small',
    compute_racks_per_row: 2,
    network_racks_per_row: 1,
    rows: 2,
    ...overrides,
  };
}

export function createMockFabricDesign(overrides: Partial<FabricDesign> = {}): FabricDesign {
  return {
    name: 'fabric-small',
    naming_strategy: 'standard',
    maximum_super_spines: 2,
    maximum_pods: 2,
    maximum_spines: 2,
    maximum_leafs: 8,
    maximum_tors: 8,
    super_spine_template: 'super-spine-template',
    supernet_pool: 'root-pool',
    fabric_prefix_length: 16,
    ...overrides,
  };
}

const management: InterfaceGroup = {
  pattern: 'Management{index}',
  start: 0,
  count: 1,
  role: 'management',
  interface_type: '1000base-t',
};

const loopback: InterfaceGroup = {
  pattern: 'Loopback{index}',
  start: 0,
  count: 1,
  role: 'loopback',
  interface_type: 'virtual',
};

/**
 * Templates used by the mock designs:
 * - super-spine: 8 downlinks
 * - spine: 2 uplinks, 16 downlinks
 * - leaf: 2 uplinks, 8 downlinks (10G fiber)
 * - tor: 2 copper uplinks, 4 downlinks, no loopback interface
 */
export function createMockTemplates(): DeviceTemplate[] {
  return [
    {
      name: 'super-spine-template',
      platform: 'test-os',
      interfaces: [
        { pattern: 'Ethernet{index}', start: 1, count: 8, role: 'downlink', interface_type: '100gbase-x-qsfp28' },
        management,
        loopback,
      ],
    },
    {
      name: 'spine-template',
      platform: 'test-os',
      interfaces: [
        { pattern: 'Ethernet1/{index}', start: 1, count: 2, role: 'uplink', interface_type: '100gbase-x-qsfp28' },
        { pattern: 'Ethernet2/{index}', start: 1, count: 16, role: 'downlink', interface_type: '100gbase-x-qsfp28' },
        management,
        loopback,
      ],
    },
    {
      name: 'leaf-template',
      platform: 'test-os',
      interfaces: [
        { pattern: 'Ethernet1/{index}', start: 1, count: 2, role: 'uplink', interface_type: '100gbase-x-qsfp28' },
        { pattern: 'Ethernet2/{index}', start: 1, count: 8, role: 'downlink', interface_type: '10gbase-x-sfp+' },
        management,
        loopback,
      ],
    },
    {
      name: 'tor-template',
      platform: 'test-os',
      interfaces: [
        { pattern: 'Ethernet1/{index}', start: 1, count: 2, role: 'uplink', interface_type: '10gbase-t' },
        { pattern: 'Ethernet2/{index}', start: 1, count: 4, role: 'downlink', interface_type: '10gbase-t' },
        management,
      ],
    },
  ];
}

export function createRootPool(overrides: Partial<ResourcePool> = {}): ResourcePool {
  return {
    name: 'root-pool',
    kind: 'prefix',
    role: 'supernet',
    parent: null,
    resources: ['10.0.0.0/8'],
    default_prefix_length: 16,
    ...overrides,
  };
}

export function createMockDataCenter(overrides: Partial<DataCenterRecord> = {}): DataCenterRecord {
  return {
    name: 'dc1',
    index: 1,
    fabric_design: 'fabric-small',
    super_spine_count: 2,
    pods: [{ name: 'pod1', index: 1, design: 'mixed-small', layout: 'row-small' }],
    ...overrides,
  };
}

export interface TestInventoryOptions {
  design?: Partial<PodDesign>;
  layout?: Partial<SiteLayout>;
  fabric?: Partial<FabricDesign>;
  dc?: Partial<DataCenterRecord>;
}

/**
 * Create an in-memory inventory holding the catalog, the root pool and a
 * data center record keyed "dc1".
 */
export function createTestInventory(options: TestInventoryOptions = {}): MemoryInventory {
  const inventory = new MemoryInventory({
    catalog: {
      designs: [createMockPodDesign(options.design)],
      layouts: [createMockLayout(options.layout)],
      fabrics: [createMockFabricDesign(options.fabric)],
      templates: createMockTemplates(),
    },
  });
  inventory.seed('pool', 'root-pool', createRootPool());
  const dc = createMockDataCenter(options.dc);
  inventory.seed('datacenter', dc.name, dc);
  return inventory;
}
