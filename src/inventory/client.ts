/**
 * Contract between the engine and the inventory that persists its records.
 *
 * Every write goes through getOrCreate with a key derived from hierarchy
 * coordinates, so replaying a run with the same inputs is a no-op.
 */

import type {
  DeviceTemplate,
  FabricDesign,
  InventoryRecord,
  PodDesign,
  PoolAllocation,
  RecordKind,
  RecordPayloads,
  SiteLayout,
} from '../types';

export type GetOrCreateResult<K extends RecordKind = RecordKind> =
  | { status: 'existing'; record: InventoryRecord<K> }
  | { status: 'created'; record: InventoryRecord<K> };

export interface CreateRequest<K extends RecordKind> {
  key: string;
  payload: RecordPayloads[K];
  parent: string | null;
}

export interface InventoryClient {
  getDesign(name: string): Promise<PodDesign>;
  getLayout(name: string): Promise<SiteLayout>;
  getFabricDesign(name: string): Promise<FabricDesign>;
  getTemplate(name: string): Promise<DeviceTemplate>;

  getOrCreate<K extends RecordKind>(
    kind: K,
    key: string,
    payload: RecordPayloads[K],
    parent: string | null
  ): Promise<GetOrCreateResult<K>>;

  /** Batched getOrCreate; results come back in request order. */
  getOrCreateMany<K extends RecordKind>(kind: K, items: CreateRequest<K>[]): Promise<GetOrCreateResult<K>[]>;

  /**
   * Carve the next free block of `length` from a pool. A repeated
   * (pool, identifier) pair returns the earlier allocation.
   */
  allocateFromPool(pool: string, identifier: string, length: number, role: string): Promise<PoolAllocation>;

  listChildren<K extends RecordKind>(parent: string, kind: K): Promise<InventoryRecord<K>[]>;

  getRecord<K extends RecordKind>(kind: K, key: string): Promise<InventoryRecord<K> | null>;
  updateRecord<K extends RecordKind>(
    kind: K,
    key: string,
    patch: Partial<RecordPayloads[K]>
  ): Promise<InventoryRecord<K>>;
  /** @returns false when there was nothing to delete */
  deleteRecord(kind: RecordKind, key: string): Promise<boolean>;
  releaseAllocation(pool: string, identifier: string): Promise<boolean>;
}
