/**
 * In-process inventory backed by a zustand store.
 *
 * Used by tests and dry runs. Behaves like the remote inventory: get-or-create
 * by key, pool allocation keyed by (pool, identifier), children by parent key.
 */

import { createDesignCatalog, type CatalogData, type DesignCatalog } from '../catalog/designCatalog';
import { CatalogLookupError, PoolExhaustedError } from '../errors';
import { carveNext } from '../ipam/carving';
import { allocationKey } from '../store/allocationStore';
import { createInventoryStore, isRecordOf, recordId, type InventoryStore } from '../store/inventoryStore';
import type { InventoryRecord, PoolAllocation, RecordKind, RecordPayloads } from '../types';
import type { CreateRequest, GetOrCreateResult, InventoryClient } from './client';

export interface MemoryInventoryOptions {
  catalog?: CatalogData;
  records?: InventoryRecord[];
}

export function buildRecord<K extends RecordKind>(
  kind: K,
  key: string,
  payload: RecordPayloads[K],
  parent: string | null
): InventoryRecord<K> {
  return { id: recordId(kind, key), kind, key, parent, payload };
}

export class MemoryInventory implements InventoryClient {
  readonly store: InventoryStore;
  private readonly catalog: DesignCatalog;

  constructor(options: MemoryInventoryOptions = {}) {
    this.store = createInventoryStore(options.records);
    this.catalog = createDesignCatalog(options.catalog ?? {});
  }

  getDesign(name: string) {
    return this.catalog.getDesign(name);
  }

  getLayout(name: string) {
    return this.catalog.getLayout(name);
  }

  getFabricDesign(name: string) {
    return this.catalog.getFabricDesign(name);
  }

  getTemplate(name: string) {
    return this.catalog.getTemplate(name);
  }

  /** Seed a record directly, e.g. a data center or root pool. */
  seed<K extends RecordKind>(kind: K, key: string, payload: RecordPayloads[K], parent: string | null = null) {
    const record = buildRecord(kind, key, payload, parent);
    this.store.getState().putRecord(record);
    return record;
  }

  private find<K extends RecordKind>(kind: K, key: string): InventoryRecord<K> | null {
    const record = this.store.getState().records.get(recordId(kind, key));
    return record && isRecordOf(record, kind) ? record : null;
  }

  private children<K extends RecordKind>(parent: string, kind: K): InventoryRecord<K>[] {
    const found: InventoryRecord<K>[] = [];
    for (const record of this.store.getState().records.values()) {
      if (record.parent === parent && isRecordOf(record, kind)) {
        found.push(record);
      }
    }
    return found.sort((a, b) => a.key.localeCompare(b.key, undefined, { numeric: true }));
  }

  private getOrCreateSync<K extends RecordKind>(kind: K, request: CreateRequest<K>): GetOrCreateResult<K> {
    const existing = this.find(kind, request.key);
    if (existing) return { status: 'existing', record: existing };
    const record = buildRecord(kind, request.key, request.payload, request.parent);
    this.store.getState().putRecord(record);
    return { status: 'created', record };
  }

  async getOrCreate<K extends RecordKind>(
    kind: K,
    key: string,
    payload: RecordPayloads[K],
    parent: string | null
  ): Promise<GetOrCreateResult<K>> {
    return this.getOrCreateSync(kind, { key, payload, parent });
  }

  /** New records of a batch are written in one store update. */
  async getOrCreateMany<K extends RecordKind>(kind: K, items: CreateRequest<K>[]): Promise<GetOrCreateResult<K>[]> {
    const created = new Map<string, InventoryRecord<K>>();
    const results = items.map((item): GetOrCreateResult<K> => {
      const existing = this.find(kind, item.key) ?? created.get(item.key);
      if (existing) return { status: 'existing', record: existing };
      const record = buildRecord(kind, item.key, item.payload, item.parent);
      created.set(item.key, record);
      return { status: 'created', record };
    });
    if (created.size > 0) {
      this.store.getState().putRecords([...created.values()]);
    }
    return results;
  }

  async allocateFromPool(pool: string, identifier: string, length: number, role: string): Promise<PoolAllocation> {
    const key = allocationKey(pool, identifier);
    const existing = this.find('allocation', key);
    if (existing) return existing.payload;

    const poolRecord = this.find('pool', pool);
    if (!poolRecord) {
      throw new CatalogLookupError('record', pool);
    }

    const taken = this.children(pool, 'allocation').map((record) => record.payload.prefix);
    const prefix = carveNext(poolRecord.payload, taken, length);
    if (!prefix) {
      throw new PoolExhaustedError(pool, length);
    }

    const allocation: PoolAllocation = { pool, identifier, prefix, role };
    this.store.getState().putRecord(buildRecord('allocation', key, allocation, pool));
    return allocation;
  }

  async listChildren<K extends RecordKind>(parent: string, kind: K): Promise<InventoryRecord<K>[]> {
    return this.children(parent, kind);
  }

  async getRecord<K extends RecordKind>(kind: K, key: string): Promise<InventoryRecord<K> | null> {
    return this.find(kind, key);
  }

  async updateRecord<K extends RecordKind>(
    kind: K,
    key: string,
    patch: Partial<RecordPayloads[K]>
  ): Promise<InventoryRecord<K>> {
    const existing = this.find(kind, key);
    if (!existing) {
      throw new CatalogLookupError('record', recordId(kind, key));
    }
    const updated: InventoryRecord<K> = { ...existing, payload: { ...existing.payload, ...patch } };
    this.store.getState().putRecord(updated);
    return updated;
  }

  async deleteRecord(kind: RecordKind, key: string): Promise<boolean> {
    const id = recordId(kind, key);
    if (!this.store.getState().records.has(id)) return false;
    this.store.getState().removeRecord(id);
    return true;
  }

  async releaseAllocation(pool: string, identifier: string): Promise<boolean> {
    return this.deleteRecord('allocation', allocationKey(pool, identifier));
  }

  /** Every record of one kind, ordered by key. */
  recordsOf<K extends RecordKind>(kind: K): InventoryRecord<K>[] {
    const found: InventoryRecord<K>[] = [];
    for (const record of this.store.getState().records.values()) {
      if (isRecordOf(record, kind)) found.push(record);
    }
    return found.sort((a, b) => a.key.localeCompare(b.key, undefined, { numeric: true }));
  }
}
