/**
 * Rack generation: the rack's leafs and ToRs, their addressing and their
 * uplink cabling.
 */

import { buildCablingPlan, type CablingDevice } from '../cabling/cablingPlan';
import { computeOffset, leafCablingBase } from '../cabling/offsets';
import { TopologyStateError } from '../errors';
import { ResourcePoolAllocator } from '../ipam/poolAllocator';
import { resolveName, scopedDeviceIndex } from '../naming/deviceNaming';
import { createAllocationCache } from '../store/allocationStore';
import type {
  Coordinates,
  DataCenterRecord,
  DeviceRole,
  DeviceTemplate,
  FabricDesign,
  InventoryRecord,
  PodRecord,
  RackRecord,
} from '../types';
import { assertCompatible } from '../validation/compatibility';
import { TopologyGenerator, type BuiltDevice, type DeviceSpec, type GeneratorDeps } from './baseGenerator';
import { deviceKey, poolKey } from './keys';
import { torsPerRack } from './rackPlan';
import { createReport, formatReport, type GenerationReport } from './report';

interface RowPosition {
  /** Devices of the role in strictly preceding racks of the row. */
  preceding: number;
  /** Devices of the role in the whole row. */
  rowTotal: number;
}

interface SpecContext {
  dc: DataCenterRecord;
  pod: PodRecord;
  rack: InventoryRecord<'rack'>;
  fabric: FabricDesign;
}

function sum(racks: InventoryRecord<'rack'>[], pick: (rack: RackRecord) => number): number {
  return racks.reduce((total, rack) => total + pick(rack.payload), 0);
}

export class RackGenerator extends TopologyGenerator {
  constructor(deps: GeneratorDeps) {
    super(deps, 'rack-generator');
  }

  generate(rackKey: string): Promise<GenerationReport> {
    return this.forNode(rackKey, () => this.run(rackKey));
  }

  private deviceSpecs(
    context: SpecContext,
    role: Extract<DeviceRole, 'leaf' | 'tor'>,
    count: number,
    template: DeviceTemplate,
    position: RowPosition
  ): DeviceSpec[] {
    const { dc, pod, rack, fabric } = context;
    const maximum = role === 'leaf' ? fabric.maximum_leafs : fabric.maximum_tors;
    const location: Coordinates = {
      fabric: dc.name,
      dc_index: dc.index,
      pod_index: pod.index,
      row_index: rack.payload.row_index,
      rack_index: rack.payload.rack_index,
    };

    return Array.from({ length: count }, (_, i) => {
      const local = i + 1;
      const inPod = (rack.payload.row_index - 1) * position.rowTotal + position.preceding + local;
      const ordinal = { local, inPod, inDc: (pod.index - 1) * maximum + inPod };
      return {
        key: deviceKey(rack.key, role, local),
        name: resolveName(fabric.naming_strategy, location, role, scopedDeviceIndex(fabric.naming_strategy, role, ordinal)),
        role,
        template,
        location,
        device_index: local,
        parent: rack.key,
      };
    });
  }

  private async template(name: string | null | undefined, designName: string, role: string): Promise<DeviceTemplate> {
    if (!name) {
      throw new TopologyStateError(`Design '${designName}' has no ${role} template`);
    }
    return this.catalog.getTemplate(name);
  }

  /** Leafs of the row's network racks, in rack order. */
  private async rowLeafs(siblings: InventoryRecord<'rack'>[]): Promise<BuiltDevice[]> {
    const leafs: BuiltDevice[] = [];
    for (const rack of siblings.filter((r) => r.payload.rack_type === 'network')) {
      leafs.push(...(await this.existingDevices(rack.key, 'leaf')));
    }
    return leafs;
  }

  private async run(key: string): Promise<GenerationReport> {
    const report = createReport(key);
    const rack = await this.loadRecord('rack', key);
    const podKey = rack.payload.pod;
    const pod = (await this.loadRecord('pod', podKey)).payload;
    const dc = (await this.loadRecord('datacenter', pod.dc)).payload;
    const fabric = await this.catalog.getFabricDesign(dc.fabric_design);
    const design = await this.catalog.getDesign(pod.design);
    const layout = await this.catalog.getLayout(pod.layout);

    assertCompatible(design, layout);

    if (!pod.loopback_pool || !pod.technical_pool) {
      throw new TopologyStateError(`Pod '${pod.name}' has no address pools; generate the pod first`);
    }
    const { leaf_count: leafCount, tor_count: torCount } = rack.payload;
    const deployment = design.deployment_type;

    const spines = await this.existingDevices(podKey, 'spine');
    const needsSpines = leafCount > 0 || (deployment === 'tor' && torCount > 0);
    if (needsSpines && spines.length === 0) {
      throw new TopologyStateError(`Pod '${pod.name}' has no spines; generate the pod first`);
    }

    const siblings = (await this.inventory.listChildren(rack.payload.row, 'rack')).sort(
      (a, b) => a.payload.rack_index - b.payload.rack_index
    );
    const preceding = siblings.filter((r) => r.payload.rack_index < rack.payload.rack_index);
    const leafsBefore = sum(preceding, (r) => r.leaf_count);
    const torsBefore = sum(preceding, (r) => r.tor_count);
    // racks of the same type before this one, for the per-rack ToR formula
    const rackOrdinal = preceding.filter((r) => r.payload.rack_type === rack.payload.rack_type).length + 1;

    const offsets = computeOffset({
      deploymentType: deployment,
      rowIndex: rack.payload.row_index,
      rackIndex: rackOrdinal,
      torsInRack: torsPerRack(design),
      torsInPrecedingRacks: torsBefore,
      design,
    });
    this.log.debug(
      `${rack.payload.name}: tor_offset=${offsets.tor_offset} leaf_offset=${offsets.leaf_offset ?? 'none'} (${deployment})`
    );

    // mixed ToRs attach to leafs already generated in the row's network racks
    const rowLeafs = deployment === 'mixed' && torCount > 0 ? await this.rowLeafs(siblings) : [];
    const torsWithoutLeafs =
      (deployment === 'mixed' && rowLeafs.length === 0) || (deployment === 'middle_rack' && leafCount === 0);
    if (torCount > 0 && torsWithoutLeafs) {
      throw new TopologyStateError(
        `Rack '${rack.payload.name}' has ToRs but no leafs to attach them to; generate the row's network racks first`
      );
    }

    const managementPool = await this.loadPool(poolKey(pod.dc, 'management'));
    const allocator = new ResourcePoolAllocator(this.inventory, createAllocationCache(), this.log.child('pools'));
    const context: SpecContext = { dc, pod, rack, fabric };

    const specs: DeviceSpec[] = [];
    if (leafCount > 0) {
      const template = await this.template(design.leaf_template, design.name, 'leaf');
      specs.push(
        ...this.deviceSpecs(context, 'leaf', leafCount, template, {
          preceding: leafsBefore,
          rowTotal: sum(siblings, (r) => r.leaf_count),
        })
      );
    }
    if (torCount > 0) {
      const template = await this.template(design.tor_template, design.name, 'tor');
      specs.push(
        ...this.deviceSpecs(context, 'tor', torCount, template, {
          preceding: torsBefore,
          rowTotal: sum(siblings, (r) => r.tor_count),
        })
      );
    }

    const built = await this.createDevices(
      pod.dc,
      specs,
      {
        loopback: pod.loopback_pool,
        management: managementPool.key,
        managementLength: managementPool.payload.default_prefix_length,
      },
      allocator,
      report
    );
    const leafs = built.filter((device) => device.device.payload.role === 'leaf');
    const tors = built.filter((device) => device.device.payload.role === 'tor');

    // --- Leaf uplinks ---

    if (leafs.length > 0) {
      const base = leafCablingBase(offsets, leafsBefore, leafs.length, design.max_leafs_per_row);
      const plan = buildCablingPlan(
        leafs.map((leaf) => this.toCablingDevice(leaf)),
        spines.map((spine) => this.toCablingDevice(spine, design.spine_interface_sorting)),
        base
      );
      await this.connect(plan, pod.technical_pool, key, allocator, report);
    }

    // --- ToR uplinks ---

    if (tors.length > 0) {
      let upstream: CablingDevice[];
      if (deployment === 'tor') {
        upstream = spines.map((spine) => this.toCablingDevice(spine, design.spine_interface_sorting));
      } else {
        const source = deployment === 'middle_rack' ? leafs : rowLeafs;
        upstream = source.map((leaf) => this.toCablingDevice(leaf, design.leaf_interface_sorting));
      }
      const plan = buildCablingPlan(
        tors.map((tor) => this.toCablingDevice(tor)),
        upstream,
        offsets.tor_offset
      );
      await this.connect(plan, pod.technical_pool, key, allocator, report);
    }

    this.log.info(formatReport(report));
    return report;
  }
}
