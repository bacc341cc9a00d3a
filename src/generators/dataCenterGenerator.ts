/**
 * Data center generation: capacity checks for the DC and every planned pod,
 * DC pools, pod records and super-spines.
 */

import { poolPrefixLengths } from '../ipam/poolSizing';
import { ResourcePoolAllocator } from '../ipam/poolAllocator';
import { resolveName } from '../naming/deviceNaming';
import { createAllocationCache } from '../store/allocationStore';
import type { Coordinates } from '../types';
import { assertCompatible, validateDcCapacity, validatePodCapacity } from '../validation/compatibility';
import { TopologyGenerator, type DeviceSpec, type GeneratorDeps } from './baseGenerator';
import { deviceKey, podKey, poolKey } from './keys';
import { planPodCounts } from './rackPlan';
import { createReport, formatReport, tally, type GenerationReport } from './report';

const DEFAULT_FABRIC_PREFIX_LENGTH = 16;

export class DataCenterGenerator extends TopologyGenerator {
  constructor(deps: GeneratorDeps) {
    super(deps, 'dc-generator');
  }

  /** @param dcName key of the data center record */
  generate(dcName: string): Promise<GenerationReport> {
    return this.forNode(dcName, () => this.run(dcName));
  }

  private async run(dcKey: string): Promise<GenerationReport> {
    const report = createReport(dcKey);
    const dc = (await this.loadRecord('datacenter', dcKey)).payload;
    const fabric = await this.catalog.getFabricDesign(dc.fabric_design);

    validateDcCapacity(dc.name, fabric, dc.super_spine_count, dc.pods.length);
    for (const pod of dc.pods) {
      const design = await this.catalog.getDesign(pod.design);
      const layout = await this.catalog.getLayout(pod.layout);
      assertCompatible(design, layout);
      validatePodCapacity(pod.name, fabric, planPodCounts(design, layout));
    }
    const superSpineTemplate = await this.catalog.getTemplate(fabric.super_spine_template);

    const allocator = new ResourcePoolAllocator(this.inventory, createAllocationCache(), this.log.child('pools'));
    const fabricLengths = poolPrefixLengths('fabric', fabric);
    const podLengths = poolPrefixLengths('pod', fabric);

    const prefixPool = await this.ensureChildPool(
      allocator,
      {
        parent: fabric.supernet_pool,
        key: poolKey(dcKey, 'prefix'),
        kind: 'prefix',
        role: 'fabric-supernet',
        length: fabric.fabric_prefix_length ?? DEFAULT_FABRIC_PREFIX_LENGTH,
        defaultPrefixLength: podLengths.supernet,
      },
      report
    );
    const managementPool = await this.ensureChildPool(
      allocator,
      {
        parent: prefixPool.key,
        key: poolKey(dcKey, 'management'),
        kind: 'address',
        role: 'management',
        length: fabricLengths.management,
        defaultPrefixLength: fabricLengths.management,
      },
      report
    );
    const loopbackPool = await this.ensureChildPool(
      allocator,
      {
        parent: prefixPool.key,
        key: poolKey(dcKey, 'super-spine-loopback'),
        kind: 'address',
        role: 'loopback',
        length: fabricLengths['super-spine-loopback'],
        defaultPrefixLength: 32,
      },
      report
    );

    const pods = await this.inventory.getOrCreateMany(
      'pod',
      dc.pods.map((pod) => ({
        key: podKey(dcKey, pod.index),
        parent: dcKey,
        payload: {
          name: pod.name,
          index: pod.index,
          dc: dcKey,
          design: pod.design,
          layout: pod.layout,
          prefix_pool: null,
          loopback_pool: null,
          technical_pool: null,
        },
      }))
    );
    tally(report, 'pod', pods);

    const specs: DeviceSpec[] = [];
    for (let index = 1; index <= dc.super_spine_count; index++) {
      const location: Coordinates = { fabric: dc.name, dc_index: dc.index };
      specs.push({
        key: deviceKey(dcKey, 'super-spine', index),
        name: resolveName(fabric.naming_strategy, location, 'super-spine', index),
        role: 'super-spine',
        template: superSpineTemplate,
        location,
        device_index: index,
        parent: dcKey,
      });
    }
    await this.createDevices(
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

    this.log.info(formatReport(report));
    return report;
  }
}
