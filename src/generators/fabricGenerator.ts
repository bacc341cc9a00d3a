/**
 * Full data center cascade: the DC, then each pod, then each row's network
 * racks before its compute racks (mixed ToRs attach to leafs in network racks).
 */

import type { InventoryRecord } from '../types';
import type { GeneratorDeps } from './baseGenerator';
import { DataCenterGenerator } from './dataCenterGenerator';
import { PodGenerator } from './podGenerator';
import { RackGenerator } from './rackGenerator';
import { createReport, formatReport, mergeReport, type GenerationReport } from './report';
import { createLogger, type Logger } from '../utils/logger';

function rackOrder(a: InventoryRecord<'rack'>, b: InventoryRecord<'rack'>): number {
  if (a.payload.rack_type !== b.payload.rack_type) {
    return a.payload.rack_type === 'network' ? -1 : 1;
  }
  return a.payload.rack_index - b.payload.rack_index;
}

export class FabricGenerator {
  private readonly deps: GeneratorDeps;
  private readonly log: Logger;
  private readonly dcGenerator: DataCenterGenerator;
  private readonly podGenerator: PodGenerator;
  private readonly rackGenerator: RackGenerator;

  constructor(deps: GeneratorDeps) {
    this.deps = deps;
    this.log = deps.logger ? deps.logger.child('fabric-generator') : createLogger('fabric-generator');
    this.dcGenerator = new DataCenterGenerator(deps);
    this.podGenerator = new PodGenerator(deps);
    this.rackGenerator = new RackGenerator(deps);
  }

  async generate(dcName: string): Promise<GenerationReport> {
    const { inventory } = this.deps;
    const report = createReport(dcName);
    mergeReport(report, await this.dcGenerator.generate(dcName));

    const pods = (await inventory.listChildren(dcName, 'pod')).sort((a, b) => a.payload.index - b.payload.index);
    for (const pod of pods) {
      mergeReport(report, await this.podGenerator.generate(pod.key));

      const rows = (await inventory.listChildren(pod.key, 'row')).sort(
        (a, b) => a.payload.row_index - b.payload.row_index
      );
      for (const row of rows) {
        const racks = (await inventory.listChildren(row.key, 'rack')).sort(rackOrder);
        for (const rack of racks) {
          mergeReport(report, await this.rackGenerator.generate(rack.key));
        }
      }
    }

    this.log.info(formatReport(report));
    return report;
  }
}
