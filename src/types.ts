export type DeploymentType = 'middle_rack' | 'tor' | 'mixed';

export const DEPLOYMENT_TYPES: readonly DeploymentType[] = ['middle_rack', 'tor', 'mixed'];

export type NamingStrategy = 'standard' | 'hierarchical' | 'flat';

export type DeviceRole = 'super-spine' | 'spine' | 'leaf' | 'tor';

export type InterfaceRole = 'uplink' | 'downlink' | 'management' | 'loopback';

export type InterfaceSorting = 'bottom_up' | 'top_down';

export type InterfaceStatus = 'free' | 'active' | 'disabled';

export type DeviceStatus = 'active' | 'decommissioned';

/** copper, multi-mode fiber, single-mode fiber, direct-attach/active-optical */
export type CableMedium = 'copper' | 'mmf' | 'smf' | 'dac';

export type RackType = 'network' | 'compute';

// --- Catalog templates ---

export interface PodDesign {
  name: string;
  deployment_type: DeploymentType;
  spine_count: number;
  max_tors_per_row: number;
  max_leafs_per_row: number;
  /** Empty means any layout is accepted. */
  compatible_layouts: string[];
  tors_per_rack?: number;
  leafs_per_rack?: number;
  spine_template: string;
  leaf_template?: string | null;
  tor_template?: string | null;
  spine_interface_sorting?: InterfaceSorting;
  leaf_interface_sorting?: InterfaceSorting;
}

export interface SiteLayout {
  name: string;
  compute_racks_per_row: number;
  network_racks_per_row: number;
  rows?: number;
}

/** DC-wide design pattern: limits, naming and addressing roots. */
export interface FabricDesign {
  name: string;
  naming_strategy: NamingStrategy;
  maximum_super_spines: number;
  maximum_pods: number;
  maximum_spines: number;
  maximum_leafs: number;
  maximum_tors: number;
  super_spine_template: string;
  supernet_pool: string;
  fabric_prefix_length?: number;
}

export interface InterfaceGroup {
  /** Name template with an {index} placeholder, e.g. "Ethernet1/{index}" */
  pattern: string;
  start: number;
  count: number;
  role: InterfaceRole;
  interface_type: string;
}

export interface DeviceTemplate {
  name: string;
  platform: string;
  interfaces: InterfaceGroup[];
}

// --- Hierarchy records ---

export interface Coordinates {
  fabric: string;
  dc_index: number;
  pod_index?: number;
  row_index?: number;
  rack_index?: number;
}

export interface PodPlan {
  name: string;
  index: number;
  design: string;
  layout: string;
}

export interface DataCenterRecord {
  name: string;
  index: number;
  fabric_design: string;
  super_spine_count: number;
  pods: PodPlan[];
}

export interface PodRecord {
  name: string;
  index: number;
  dc: string;
  design: string;
  layout: string;
  prefix_pool?: string | null;
  loopback_pool?: string | null;
  technical_pool?: string | null;
}

export interface RowRecord {
  name: string;
  pod: string;
  row_index: number;
}

export interface RackRecord {
  name: string;
  pod: string;
  row: string;
  row_index: number;
  rack_index: number;
  rack_type: RackType;
  leaf_count: number;
  tor_count: number;
}

export interface DeviceRecord {
  name: string;
  role: DeviceRole;
  template: string;
  platform: string;
  status: DeviceStatus;
  location: Coordinates;
  device_index: number;
  loopback_address?: string | null;
  management_address?: string | null;
}

export interface InterfaceRecord {
  name: string;
  device: string;
  device_name: string;
  role: InterfaceRole;
  interface_type: string;
  status: InterfaceStatus;
  ip_address?: string | null;
  cable?: string | null;
}

export interface CableRecord {
  name: string;
  endpoints: [string, string];
  medium: CableMedium;
  technical_prefix?: string | null;
  /** Pool the technical prefix was carved from. */
  technical_pool?: string | null;
}

/** Reserves a device name inside one data center. */
export interface NameClaimRecord {
  name: string;
  device: string;
}

// --- Resource pools ---

export type PoolKind = 'prefix' | 'address';

export interface ResourcePool {
  name: string;
  kind: PoolKind;
  role: string;
  /** Key of the pool this one was carved from; null for bootstrap roots. */
  parent?: string | null;
  /** CIDRs the pool hands out blocks from. */
  resources: string[];
  default_prefix_length: number;
}

export interface PoolAllocation {
  pool: string;
  identifier: string;
  /** Allocated block in CIDR notation; addresses are host-length. */
  prefix: string;
  role: string;
}

export interface RecordPayloads {
  datacenter: DataCenterRecord;
  pod: PodRecord;
  row: RowRecord;
  rack: RackRecord;
  device: DeviceRecord;
  interface: InterfaceRecord;
  cable: CableRecord;
  name_claim: NameClaimRecord;
  pool: ResourcePool;
  allocation: PoolAllocation;
}

export type RecordKind = keyof RecordPayloads;

export interface InventoryRecord<K extends RecordKind = RecordKind> {
  id: string;
  kind: K;
  /** Deterministic key derived from hierarchy coordinates. */
  key: string;
  /** Key of the owning record. */
  parent: string | null;
  payload: RecordPayloads[K];
}
