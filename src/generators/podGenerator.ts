/**
 * Pod generation: pod pools, rows and racks from the site layout, spines and
 * spine to super-spine cabling.
 */

import { buildCablingPlan } from '../cabling/cablingPlan';
import { TopologyStateError } from '../errors';
import { poolPrefixLengths } from '../ipam/poolSizing';
import { ResourcePoolAllocator } from '../ipam/poolAllocator';
import { resolveName, scopedDeviceIndex } from '../naming/deviceNaming';
import { createAllocationCache } from '../store/allocationStore';
import type { Coordinates, RackRecord } from '../types';
import { assertCompatible, validatePodCapacity } from '../validation/compatibility';
import { TopologyGenerator, type DeviceSpec, type GeneratorDeps } from './baseGenerator';
import { deviceKey, poolKey, rackKey, rowKey } from './keys';
import { planPodCounts, planRow, rowCount } from './rackPlan';
import { createReport, formatReport, tally, type GenerationReport } from './report';

export class PodGenerator extends TopologyGenerator {
  constructor(deps: GeneratorDeps) {
    super(deps, 'pod-generator');
  }

  generate(podKey: string): Promise<GenerationReport> {
    return this.forNode(podKey, () => this.run(podKey));
  }

  private async run(podKey: string): Promise<GenerationReport> {
    const report = createReport(podKey);
    const pod = (await this.loadRecord('pod', podKey)).payload;
    const dcKey = pod.dc;
    const dc = (await this.loadRecord('datacenter', dcKey)).payload;
    const fabric = await this.catalog.getFabricDesign(dc.fabric_design);
    const design = await this.catalog.getDesign(pod.design);
    const layout = await this.catalog.getLayout(pod.layout);

    assertCompatible(design, layout);
    validatePodCapacity(pod.name, fabric, planPodCounts(design, layout));

    const dcPrefixPool = await this.inventory.getRecord('pool', poolKey(dcKey, 'prefix'));
    if (!dcPrefixPool) {
      throw new TopologyStateError(`Data center '${dc.name}' has no prefix pool; generate the data center first`);
    }
    const superSpines = await this.existingDevices(dcKey, 'super-spine');
    if (dc.super_spine_count > 0 && superSpines.length === 0) {
      throw new TopologyStateError(`Data center '${dc.name}' has no super-spines; generate the data center first`);
    }
    const spineTemplate = await this.catalog.getTemplate(design.spine_template);
    const managementPool = await this.loadPool(poolKey(dcKey, 'management'));

    // --- Pools ---

    const allocator = new ResourcePoolAllocator(this.inventory, createAllocationCache(), this.log.child('pools'));
    const lengths = poolPrefixLengths('pod', fabric);
    const prefixPool = await this.ensureChildPool(
      allocator,
      {
        parent: dcPrefixPool.key,
        key: poolKey(podKey, 'prefix'),
        kind: 'prefix',
        role: 'pod-supernet',
        length: lengths.supernet,
        defaultPrefixLength: lengths.technical,
      },
      report
    );
    const loopbackPool = await this.ensureChildPool(
      allocator,
      {
        parent: prefixPool.key,
        key: poolKey(podKey, 'loopback'),
        kind: 'address',
        role: 'loopback',
        length: lengths.loopback,
        defaultPrefixLength: 32,
      },
      report
    );
    const technicalPool = await this.ensureChildPool(
      allocator,
      {
        parent: prefixPool.key,
        key: poolKey(podKey, 'technical'),
        kind: 'prefix',
        role: 'technical',
        length: lengths.technical,
        defaultPrefixLength: 31,
      },
      report
    );
    await this.inventory.updateRecord('pod', podKey, {
      prefix_pool: prefixPool.key,
      loopback_pool: loopbackPool.key,
      technical_pool: technicalPool.key,
    });

    // --- Rows and racks ---

    const rowPlan = planRow(design, layout);
    for (let rowIndex = 1; rowIndex <= rowCount(layout); rowIndex++) {
      const row = rowKey(podKey, rowIndex);
      const rowResult = await this.inventory.getOrCreate(
        'row',
        row,
        { name: `${pod.name}-row${rowIndex}`, pod: podKey, row_index: rowIndex },
        podKey
      );
      tally(report, 'row', [rowResult]);

      const racks = await this.inventory.getOrCreateMany(
        'rack',
        rowPlan.map((planned) => {
          const payload: RackRecord = {
            name: `${pod.name}-row${rowIndex}-rack${planned.rack_index}`,
            pod: podKey,
            row,
            row_index: rowIndex,
            ...planned,
          };
          return { key: rackKey(row, planned.rack_index), parent: row, payload };
        })
      );
      tally(report, 'rack', racks);
    }

    // --- Spines ---

    const specs: DeviceSpec[] = [];
    for (let index = 1; index <= design.spine_count; index++) {
      const location: Coordinates = { fabric: dc.name, dc_index: dc.index, pod_index: pod.index };
      const ordinal = { local: index, inPod: index, inDc: (pod.index - 1) * fabric.maximum_spines + index };
      specs.push({
        key: deviceKey(podKey, 'spine', index),
        name: resolveName(
          fabric.naming_strategy,
          location,
          'spine',
          scopedDeviceIndex(fabric.naming_strategy, 'spine', ordinal)
        ),
        role: 'spine',
        template: spineTemplate,
        location,
        device_index: index,
        parent: podKey,
      });
    }
    const spines = await this.createDevices(
      dcKey,
      specs,
      {
        loopback: loopbackPool.key,
        management: managementPool.key,
        managementLength: managementPool.payload.default_prefix_length,
      },
      allocator,
      report
    );

    // --- Spine to super-spine cabling ---

    const plan = buildCablingPlan(
      spines.map((spine) => this.toCablingDevice(spine)),
      superSpines.map((superSpine) => this.toCablingDevice(superSpine)),
      (pod.index - 1) * fabric.maximum_spines
    );
    await this.connect(plan, technicalPool.key, podKey, allocator, report);

    this.log.info(formatReport(report));
    return report;
  }
}
