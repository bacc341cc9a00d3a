/**
 * Zustand store holding inventory records for the in-process inventory.
 *
 * Records live in one Map keyed by record id ("kind:key"). The store is
 * created per inventory instance rather than as a module singleton, so tests
 * and concurrent runs never share state.
 */

import { createStore } from 'zustand/vanilla';
import { immer } from 'zustand/middleware/immer';
import { enableMapSet } from 'immer';
import type { InventoryRecord, RecordKind } from '../types';

enableMapSet();

export interface InventoryState {
  records: Map<string, InventoryRecord>;

  // Actions
  putRecord: (record: InventoryRecord) => void;
  putRecords: (records: InventoryRecord[]) => void;
  removeRecord: (id: string) => void;
}

export function recordId(kind: RecordKind, key: string): string {
  return `${kind}:${key}`;
}

/** Narrow a stored record to the kind it was written as. */
export function isRecordOf<K extends RecordKind>(
  record: InventoryRecord,
  kind: K
): record is InventoryRecord<K> {
  return record.kind === kind;
}

export function createInventoryStore(seed: InventoryRecord[] = []) {
  return createStore<InventoryState>()(
    immer((set) => ({
      records: new Map(seed.map((record): [string, InventoryRecord] => [record.id, record])),

      putRecord: (record) =>
        set((state) => {
          state.records.set(record.id, record);
        }),

      putRecords: (records) =>
        set((state) => {
          for (const record of records) {
            state.records.set(record.id, record);
          }
        }),

      removeRecord: (id) =>
        set((state) => {
          state.records.delete(id);
        }),
    }))
  );
}

export type InventoryStore = ReturnType<typeof createInventoryStore>;
