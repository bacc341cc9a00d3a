import { beforeEach, describe, expect, it } from 'vitest';
import type { MemoryInventory } from '../inventory/memoryInventory';
import { createTestInventory } from '../test-utils/factories';
import { FabricGenerator } from './fabricGenerator';
import { totalCreated } from './report';

describe('FabricGenerator', () => {
  let inventory: MemoryInventory;

  beforeEach(() => {
    inventory = createTestInventory();
  });

  async function generate() {
    return new FabricGenerator({ inventory }).generate('dc1');
  }

  function device(key: string) {
    const record = inventory.recordsOf('device').find((candidate) => candidate.key === key);
    if (!record) throw new Error(`no device ${key}`);
    return record.payload;
  }

  function iface(key: string) {
    const record = inventory.recordsOf('interface').find((candidate) => candidate.key === key);
    if (!record) throw new Error(`no interface ${key}`);
    return record.payload;
  }

  describe('first run', () => {
    it('builds the whole data center', async () => {
      const report = await generate();

      expect(report.node).toBe('dc1');
      expect(report.created).toEqual({
        pod: 1,
        row: 2,
        rack: 6,
        device: 12,
        interface: 136,
        cable: 20,
        name_claim: 12,
        pool: 6,
      });
      expect(inventory.recordsOf('allocation')).toHaveLength(50);
      expect(inventory.recordsOf('pool')).toHaveLength(7);
    });

    it('carves the pool hierarchy from the supernet', async () => {
      await generate();

      const resources = Object.fromEntries(
        inventory.recordsOf('pool').map((record) => [record.key, record.payload.resources])
      );
      expect(resources).toEqual({
        'root-pool': ['10.0.0.0/8'],
        'dc1/prefix-pool': ['10.0.0.0/16'],
        'dc1/management-pool': ['10.0.0.0/26'],
        'dc1/super-spine-loopback-pool': ['10.0.0.64/29'],
        'dc1/pod1/prefix-pool': ['10.0.2.0/23'],
        'dc1/pod1/loopback-pool': ['10.0.2.0/27'],
        'dc1/pod1/technical-pool': ['10.0.3.0/24'],
      });
      const pod = inventory.recordsOf('pod')[0].payload;
      expect(pod).toMatchObject({
        prefix_pool: 'dc1/pod1/prefix-pool',
        loopback_pool: 'dc1/pod1/loopback-pool',
        technical_pool: 'dc1/pod1/technical-pool',
      });
    });

    it('names and addresses devices', async () => {
      await generate();

      expect(device('dc1/super-spine1')).toMatchObject({
        name: 'dc1-fab1-super-spine-01',
        loopback_address: '10.0.0.65/32',
        management_address: '10.0.0.1/26',
      });
      expect(device('dc1/pod1/spine2')).toMatchObject({
        name: 'dc1-fab1-pod1-spine-02',
        loopback_address: '10.0.2.2/32',
        management_address: '10.0.0.4/26',
      });
      expect(device('dc1/pod1/row1/rack1/leaf1')).toMatchObject({
        name: 'dc1-fab1-pod1-row1-rack1-leaf-01',
        loopback_address: '10.0.2.3/32',
        management_address: '10.0.0.5/26',
        location: { fabric: 'dc1', dc_index: 1, pod_index: 1, row_index: 1, rack_index: 1 },
      });
      expect(iface('dc1/pod1/row1/rack1/leaf1/Loopback0')).toMatchObject({
        status: 'active',
        ip_address: '10.0.2.3/32',
      });
      expect(iface('dc1/pod1/row1/rack1/leaf1/Management0').ip_address).toBe('10.0.0.5/26');
    });

    it('gives every device a unique name', async () => {
      await generate();

      const names = inventory.recordsOf('device').map((record) => record.payload.name);
      expect(names).toHaveLength(12);
      expect(new Set(names).size).toBe(12);
    });

    it('cables spines to super-spines on the first downlinks', async () => {
      await generate();

      const cable = inventory
        .recordsOf('cable')
        .find((record) => record.key === 'dc1/pod1/spine1/Ethernet1/1--dc1/super-spine1/Ethernet1');
      expect(cable?.payload).toEqual({
        name: 'dc1-fab1-pod1-spine-01:Ethernet1/1 <> dc1-fab1-super-spine-01:Ethernet1',
        endpoints: ['dc1/pod1/spine1/Ethernet1/1', 'dc1/super-spine1/Ethernet1'],
        medium: 'mmf',
        technical_prefix: '10.0.3.0/31',
        technical_pool: 'dc1/pod1/technical-pool',
      });
      expect(iface('dc1/super-spine1/Ethernet1').ip_address).toBe('10.0.3.0/31');
      expect(iface('dc1/pod1/spine1/Ethernet1/1').ip_address).toBe('10.0.3.1/31');
    });

    it('addresses leaf uplinks with the spine on the first host', async () => {
      await generate();

      const leafUplink = iface('dc1/pod1/row1/rack1/leaf1/Ethernet1/1');
      expect(leafUplink).toMatchObject({
        status: 'active',
        ip_address: '10.0.3.9/31',
        cable: 'dc1/pod1/row1/rack1/leaf1/Ethernet1/1--dc1/pod1/spine1/Ethernet2/1',
      });
      expect(iface('dc1/pod1/spine1/Ethernet2/1').ip_address).toBe('10.0.3.8/31');
    });

    it('moves each row to its own block of spine ports', async () => {
      await generate();

      expect(iface('dc1/pod1/row2/rack1/leaf1/Ethernet1/1').cable).toBe(
        'dc1/pod1/row2/rack1/leaf1/Ethernet1/1--dc1/pod1/spine1/Ethernet2/3'
      );
      const spineDownlinks = inventory
        .recordsOf('cable')
        .map((record) => record.payload.endpoints[1])
        .filter((endpoint) => endpoint.startsWith('dc1/pod1/spine1/'));
      expect(spineDownlinks.sort()).toEqual([
        'dc1/pod1/spine1/Ethernet2/1',
        'dc1/pod1/spine1/Ethernet2/2',
        'dc1/pod1/spine1/Ethernet2/3',
        'dc1/pod1/spine1/Ethernet2/4',
      ]);
    });

    it('attaches ToRs to the leafs of their row with direct-attach cables', async () => {
      await generate();

      const cable = inventory
        .recordsOf('cable')
        .find((record) => record.key === 'dc1/pod1/row1/rack3/tor1/Ethernet1/1--dc1/pod1/row1/rack1/leaf1/Ethernet2/2');
      expect(cable?.payload.medium).toBe('dac');
      expect(iface('dc1/pod1/row1/rack2/tor1/Ethernet1/2').cable).toBe(
        'dc1/pod1/row1/rack2/tor1/Ethernet1/2--dc1/pod1/row1/rack1/leaf2/Ethernet2/1'
      );
    });

    it('never uses a port twice', async () => {
      await generate();

      const endpoints = inventory.recordsOf('cable').flatMap((record) => record.payload.endpoints);
      expect(endpoints).toHaveLength(40);
      expect(new Set(endpoints).size).toBe(40);
    });
  });

  describe('re-runs', () => {
    it('create nothing and leave the inventory unchanged', async () => {
      await generate();
      const before = inventory.store.getState().records;

      const report = await generate();

      expect(totalCreated(report)).toBe(0);
      expect(report.existing.device).toBe(12);
      expect(inventory.store.getState().records).toEqual(before);
    });
  });

  describe('deployment types', () => {
    function expectEachPortUsedOnce(cables: number) {
      const endpoints = inventory.recordsOf('cable').flatMap((record) => record.payload.endpoints);
      expect(endpoints).toHaveLength(2 * cables);
      expect(new Set(endpoints).size).toBe(2 * cables);
    }

    async function expectRerunUnchanged() {
      const before = inventory.store.getState().records;
      const report = await generate();
      expect(totalCreated(report)).toBe(0);
      expect(inventory.store.getState().records).toEqual(before);
    }

    it('builds middle_rack pods whose network racks hold leafs and ToRs', async () => {
      inventory = createTestInventory({
        design: { deployment_type: 'middle_rack', max_leafs_per_row: 4 },
        layout: { network_racks_per_row: 2 },
      });

      const report = await generate();

      expect(report.created).toMatchObject({ row: 2, rack: 8, device: 16, cable: 28 });
      expectEachPortUsedOnce(28);
      expect(iface('dc1/pod1/row1/rack2/leaf1/Ethernet1/1').cable).toBe(
        'dc1/pod1/row1/rack2/leaf1/Ethernet1/1--dc1/pod1/spine1/Ethernet2/3'
      );
      expect(iface('dc1/pod1/row2/rack1/leaf1/Ethernet1/1').cable).toBe(
        'dc1/pod1/row2/rack1/leaf1/Ethernet1/1--dc1/pod1/spine1/Ethernet2/5'
      );
      expect(iface('dc1/pod1/row1/rack2/tor1/Ethernet1/2').cable).toBe(
        'dc1/pod1/row1/rack2/tor1/Ethernet1/2--dc1/pod1/row1/rack2/leaf2/Ethernet2/1'
      );
      await expectRerunUnchanged();
    });

    it('builds middle_rack pods with more network racks than leafs to fill them', async () => {
      inventory = createTestInventory({
        design: { deployment_type: 'middle_rack', max_leafs_per_row: 2, leafs_per_rack: 2 },
        layout: { network_racks_per_row: 2, rows: 1 },
      });

      const report = await generate();

      expect(report.created).toMatchObject({ rack: 4, device: 7, cable: 10 });
      expect(inventory.recordsOf('device').filter((record) => record.key.startsWith('dc1/pod1/row1/rack2/'))).toEqual(
        []
      );
      expectEachPortUsedOnce(10);
      await expectRerunUnchanged();
    });

    it('builds tor pods with ToRs cabled straight to the spines', async () => {
      inventory = createTestInventory({
        design: { deployment_type: 'tor' },
        layout: { network_racks_per_row: 2 },
      });

      const report = await generate();

      expect(report.created).toMatchObject({ row: 2, rack: 8, device: 8, cable: 12 });
      expect(inventory.recordsOf('device').filter((record) => record.payload.role === 'leaf')).toEqual([]);
      expectEachPortUsedOnce(12);
      const cable = inventory
        .recordsOf('cable')
        .find((record) => record.key === 'dc1/pod1/row2/rack4/tor1/Ethernet1/1--dc1/pod1/spine1/Ethernet2/4');
      expect(cable?.payload.medium).toBe('dac');
      await expectRerunUnchanged();
    });
  });

  describe('pods at the fabric maximum', () => {
    it('has a loopback for every device', async () => {
      inventory = createTestInventory({
        fabric: { maximum_spines: 2, maximum_leafs: 2, maximum_tors: 3 },
        design: { max_tors_per_row: 3 },
        layout: { compute_racks_per_row: 3, rows: 1 },
      });

      await generate();

      const loopbacks = inventory
        .recordsOf('allocation')
        .filter((record) => record.payload.pool === 'dc1/pod1/loopback-pool');
      expect(loopbacks).toHaveLength(7);
      const pool = inventory.recordsOf('pool').find((record) => record.key === 'dc1/pod1/loopback-pool');
      expect(pool?.payload.resources[0]).toMatch(/\/28$/);
    });
  });

  describe('naming strategies', () => {
    it('numbers devices across the data center under flat naming', async () => {
      inventory = createTestInventory({ fabric: { naming_strategy: 'flat' } });

      await generate();

      const names = inventory.recordsOf('device').map((record) => record.payload.name);
      expect(names.sort()).toEqual([
        'dc1-leaf-01',
        'dc1-leaf-02',
        'dc1-leaf-03',
        'dc1-leaf-04',
        'dc1-spine-01',
        'dc1-spine-02',
        'dc1-super-spine-01',
        'dc1-super-spine-02',
        'dc1-tor-01',
        'dc1-tor-02',
        'dc1-tor-03',
        'dc1-tor-04',
      ]);
    });

    it('numbers devices across the pod under hierarchical naming', async () => {
      inventory = createTestInventory({ fabric: { naming_strategy: 'hierarchical' } });

      await generate();

      expect(device('dc1/pod1/row2/rack1/leaf2').name).toBe('dc1-fab1-pod1-leaf-04');
      expect(device('dc1/pod1/row2/rack3/tor1').name).toBe('dc1-fab1-pod1-tor-04');
    });
  });
});
