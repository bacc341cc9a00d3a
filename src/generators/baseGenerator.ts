/**
 * Shared machinery for the data center, pod and rack generators: record
 * loading, device creation with addressing, pool creation and cabling.
 */

import { inventoryCatalog, type DesignCatalog } from '../catalog/designCatalog';
import { expandTemplate, interfacesByRole } from '../catalog/interfaceRegistry';
import { resolveMedium } from '../cabling/cableMedia';
import type { CablingDevice, PlannedCable } from '../cabling/cablingPlan';
import { CatalogLookupError, DuplicateNameError, InventoryIOError, TopologyStateError } from '../errors';
import type { CreateRequest, InventoryClient } from '../inventory/client';
import { hostAddresses } from '../ipam/cidr';
import type { ResourcePoolAllocator } from '../ipam/poolAllocator';
import type {
  CableMedium,
  Coordinates,
  DeviceRecord,
  DeviceRole,
  DeviceTemplate,
  InterfaceRecord,
  InterfaceSorting,
  InventoryRecord,
  PoolKind,
  RecordKind,
} from '../types';
import { createLogger, type Logger } from '../utils/logger';
import { cableKey, interfaceKey, nameClaimKey } from './keys';
import { tally, type GenerationReport } from './report';

export interface GeneratorDeps {
  inventory: InventoryClient;
  /** Defaults to the catalog the inventory serves. */
  catalog?: DesignCatalog;
  logger?: Logger;
}

export interface DeviceSpec {
  key: string;
  name: string;
  role: DeviceRole;
  template: DeviceTemplate;
  location: Coordinates;
  device_index: number;
  /** Key of the owning rack, pod or data center. */
  parent: string;
}

export interface AddressingPools {
  loopback: string;
  management: string;
  /** Mask handed out with management addresses. */
  managementLength: number;
}

export interface BuiltDevice {
  device: InventoryRecord<'device'>;
  interfaces: InventoryRecord<'interface'>[];
}

export interface ChildPoolRequest {
  parent: string;
  key: string;
  kind: PoolKind;
  role: string;
  /** Size of the block carved from the parent. */
  length: number;
  /** Size of what the new pool hands out. */
  defaultPrefixLength: number;
}

export abstract class TopologyGenerator {
  protected readonly inventory: InventoryClient;
  protected readonly catalog: DesignCatalog;
  protected readonly log: Logger;

  constructor(deps: GeneratorDeps, scope: string) {
    this.inventory = deps.inventory;
    this.catalog = deps.catalog ?? inventoryCatalog(deps.inventory);
    this.log = deps.logger ? deps.logger.child(scope) : createLogger(scope);
  }

  /** Runs one generation and tags inventory failures with the node being generated. */
  protected async forNode<T>(node: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      if (error instanceof InventoryIOError) {
        throw error.withNode(node);
      }
      throw error;
    }
  }

  protected async loadRecord<K extends RecordKind>(kind: K, key: string): Promise<InventoryRecord<K>> {
    const record = await this.inventory.getRecord(kind, key);
    if (!record) {
      throw new CatalogLookupError('record', `${kind}:${key}`);
    }
    return record;
  }

  protected async loadPool(key: string): Promise<InventoryRecord<'pool'>> {
    const pool = await this.inventory.getRecord('pool', key);
    if (!pool) {
      throw new TopologyStateError(`Pool '${key}' does not exist`);
    }
    return pool;
  }

  /** Carve a block from a parent pool and register it as a pool of its own. */
  protected async ensureChildPool(
    allocator: ResourcePoolAllocator,
    request: ChildPoolRequest,
    report: GenerationReport
  ): Promise<InventoryRecord<'pool'>> {
    const block = await allocator.allocatePrefix(request.parent, request.key, request.length, request.role);
    const result = await this.inventory.getOrCreate(
      'pool',
      request.key,
      {
        name: request.key,
        kind: request.kind,
        role: request.role,
        parent: request.parent,
        resources: [block.prefix],
        default_prefix_length: request.defaultPrefixLength,
      },
      request.parent
    );
    tally(report, 'pool', [result]);
    return result.record;
  }

  /**
   * Reserve a device name inside a data center. A claim held by another
   * device means two coordinates resolved to the same name.
   */
  private async claimName(dcKey: string, spec: DeviceSpec, report: GenerationReport): Promise<void> {
    const result = await this.inventory.getOrCreate(
      'name_claim',
      nameClaimKey(dcKey, spec.name),
      { name: spec.name, device: spec.key },
      dcKey
    );
    if (result.record.payload.device !== spec.key) {
      throw new DuplicateNameError(spec.name, result.record.payload.device, spec.key);
    }
    tally(report, 'name_claim', [result]);
  }

  /**
   * Create devices with their addresses and interfaces.
   *
   * Devices are written in one batch, then all their interfaces in another.
   */
  protected async createDevices(
    dcKey: string,
    specs: DeviceSpec[],
    pools: AddressingPools,
    allocator: ResourcePoolAllocator,
    report: GenerationReport
  ): Promise<BuiltDevice[]> {
    if (specs.length === 0) return [];

    const deviceRequests: CreateRequest<'device'>[] = [];
    for (const spec of specs) {
      await this.claimName(dcKey, spec, report);
      const loopback = await allocator.allocateAddress(pools.loopback, spec.key, 32, 'loopback');
      const management = await allocator.allocateAddress(
        pools.management,
        spec.key,
        pools.managementLength,
        'management'
      );
      const payload: DeviceRecord = {
        name: spec.name,
        role: spec.role,
        template: spec.template.name,
        platform: spec.template.platform,
        status: 'active',
        location: spec.location,
        device_index: spec.device_index,
        loopback_address: loopback.prefix,
        management_address: management.prefix,
      };
      deviceRequests.push({ key: spec.key, payload, parent: spec.parent });
    }

    const devices = await this.inventory.getOrCreateMany('device', deviceRequests);
    tally(report, 'device', devices);

    const interfaceRequests: CreateRequest<'interface'>[] = [];
    specs.forEach((spec, i) => {
      const device = devices[i].record;
      for (const iface of expandTemplate(spec.template)) {
        const payload: InterfaceRecord = {
          name: iface.name,
          device: device.key,
          device_name: device.payload.name,
          role: iface.role,
          interface_type: iface.interface_type,
          status: 'free',
          ip_address: null,
          cable: null,
        };
        if (iface.role === 'loopback') {
          payload.ip_address = device.payload.loopback_address ?? null;
          payload.status = 'active';
        } else if (iface.role === 'management') {
          payload.ip_address = device.payload.management_address ?? null;
          payload.status = 'active';
        }
        interfaceRequests.push({ key: interfaceKey(device.key, iface.name), payload, parent: device.key });
      }
    });

    const interfaces = await this.inventory.getOrCreateMany('interface', interfaceRequests);
    tally(report, 'interface', interfaces);

    return devices.map(({ record }) => ({
      device: record,
      interfaces: interfaces.map((result) => result.record).filter((iface) => iface.parent === record.key),
    }));
  }

  /**
   * Devices already present under a parent, filtered by role, in device order.
   * Decommissioned devices are included so they keep their cabling position.
   */
  protected async existingDevices(parent: string, role: DeviceRole): Promise<BuiltDevice[]> {
    const devices = (await this.inventory.listChildren(parent, 'device'))
      .filter((record) => record.payload.role === role)
      .sort((a, b) => a.payload.device_index - b.payload.device_index);

    const built: BuiltDevice[] = [];
    for (const device of devices) {
      built.push({ device, interfaces: await this.inventory.listChildren(device.key, 'interface') });
    }
    return built;
  }

  protected toCablingDevice(built: BuiltDevice, downlinkSorting: InterfaceSorting = 'bottom_up'): CablingDevice {
    const ports = built.interfaces.map((record) => ({
      key: record.key,
      name: record.payload.name,
      role: record.payload.role,
      interface_type: record.payload.interface_type,
    }));
    return {
      key: built.device.key,
      name: built.device.payload.name,
      active: built.device.payload.status === 'active',
      uplinks: interfacesByRole(ports, 'uplink'),
      downlinks: interfacesByRole(ports, 'downlink', downlinkSorting),
    };
  }

  /**
   * Create the planned cables. Each gets a /31 from the technical pool; the
   * upper end takes the first address, the lower end the second.
   */
  protected async connect(
    plan: PlannedCable[],
    technicalPool: string,
    parent: string,
    allocator: ResourcePoolAllocator,
    report: GenerationReport,
    mediumOverride?: CableMedium
  ): Promise<void> {
    if (plan.length === 0) return;

    const requests: CreateRequest<'cable'>[] = [];
    const endpoints: { key: string; bottomIp: string; topIp: string }[] = [];
    for (const link of plan) {
      const key = cableKey(link.bottom.key, link.top.key);
      const technical = await allocator.allocatePrefix(technicalPool, key, 31, 'technical');
      const [topIp, bottomIp] = hostAddresses(technical.prefix);
      endpoints.push({ key, bottomIp, topIp });
      requests.push({
        key,
        parent,
        payload: {
          name: `${link.bottomDeviceName}:${link.bottom.name} <> ${link.topDeviceName}:${link.top.name}`,
          endpoints: [link.bottom.key, link.top.key],
          medium: resolveMedium(link.bottom.interface_type, link.top.interface_type, mediumOverride),
          technical_prefix: technical.prefix,
          technical_pool: technicalPool,
        },
      });
    }

    const cables = await this.inventory.getOrCreateMany('cable', requests);
    tally(report, 'cable', cables);

    for (const [i, link] of plan.entries()) {
      const { key, bottomIp, topIp } = endpoints[i];
      await this.inventory.updateRecord('interface', link.bottom.key, {
        status: 'active',
        cable: key,
        ip_address: `${bottomIp}/31`,
      });
      await this.inventory.updateRecord('interface', link.top.key, {
        status: 'active',
        cable: key,
        ip_address: `${topIp}/31`,
      });
    }
  }
}
