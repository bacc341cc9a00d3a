export * from './types';
export * from './errors';
export { configure, loadConfig, type EngineConfig } from './config';
export { createLogger, setLogLevel, getLogLevel, type Logger, type LogLevel } from './utils/logger';

export {
  createDesignCatalog,
  inventoryCatalog,
  type CatalogData,
  type DesignCatalog,
} from './catalog/designCatalog';
export {
  expandTemplate,
  interfacesByRole,
  sortInterfaces,
  type ExpandedInterface,
} from './catalog/interfaceRegistry';

export {
  LEAFS_PER_NETWORK_RACK,
  assertCompatible,
  validateCompatibility,
  validateDcCapacity,
  validatePodCapacity,
  type CompatibilityResult,
  type PodDeviceCounts,
} from './validation/compatibility';
export { resolveName, scopedDeviceIndex, type DeviceOrdinal } from './naming/deviceNaming';
export {
  OFFSET_STRATEGIES,
  computeOffset,
  leafCablingBase,
  rowLeafOffset,
  type CablingOffsets,
  type OffsetInput,
} from './cabling/offsets';
export { buildCablingPlan, type CablingDevice, type PlannedCable, type PortRef } from './cabling/cablingPlan';
export { mediaFamily, resolveMedium, type MediaFamily } from './cabling/cableMedia';

export { hostAddresses, parseCidr, formatCidr } from './ipam/cidr';
export { carveNext, remainingCapacity } from './ipam/carving';
export { poolPrefixLengths, type FabricLimits } from './ipam/poolSizing';
export { ResourcePoolAllocator } from './ipam/poolAllocator';

export type { CreateRequest, GetOrCreateResult, InventoryClient } from './inventory/client';
export { InventoryApiClient } from './inventory/apiClient';
export { MemoryInventory } from './inventory/memoryInventory';

export type { GeneratorDeps } from './generators/baseGenerator';
export { DataCenterGenerator } from './generators/dataCenterGenerator';
export { PodGenerator } from './generators/podGenerator';
export { RackGenerator } from './generators/rackGenerator';
export { FabricGenerator } from './generators/fabricGenerator';
export { formatReport, type GenerationReport } from './generators/report';
export { decommissionDevice, type DecommissionReport } from './generators/decommission';
export { formatCapacitySummary, summarizeCapacity, type CapacitySummary } from './generators/capacitySummary';
