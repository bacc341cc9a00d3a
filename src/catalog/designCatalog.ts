/**
 * Read-only catalog of pod designs, site layouts, fabric designs and device
 * templates.
 *
 * Generators receive a catalog handle; nothing reads designs from module
 * state. Entries are frozen when the catalog is built.
 */

import { CatalogLookupError } from '../errors';
import type { InventoryClient } from '../inventory/client';
import type { DeviceTemplate, FabricDesign, PodDesign, SiteLayout } from '../types';

export interface DesignCatalog {
  getDesign(name: string): Promise<PodDesign>;
  getLayout(name: string): Promise<SiteLayout>;
  getFabricDesign(name: string): Promise<FabricDesign>;
  getTemplate(name: string): Promise<DeviceTemplate>;
}

export interface CatalogData {
  designs?: PodDesign[];
  layouts?: SiteLayout[];
  fabrics?: FabricDesign[];
  templates?: DeviceTemplate[];
}

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

function indexByName<T extends { name: string }>(entries: T[] = []): Map<string, T> {
  return new Map(entries.map((entry): [string, T] => [entry.name, deepFreeze(structuredClone(entry))]));
}

function lookup<T>(entries: Map<string, T>, entry: CatalogLookupError['entry'], name: string): Promise<T> {
  const found = entries.get(name);
  if (!found) {
    return Promise.reject(new CatalogLookupError(entry, name));
  }
  return Promise.resolve(found);
}

export function createDesignCatalog(data: CatalogData): DesignCatalog {
  const designs = indexByName(data.designs);
  const layouts = indexByName(data.layouts);
  const fabrics = indexByName(data.fabrics);
  const templates = indexByName(data.templates);

  return {
    getDesign: (name) => lookup(designs, 'design', name),
    getLayout: (name) => lookup(layouts, 'layout', name),
    getFabricDesign: (name) => lookup(fabrics, 'fabric design', name),
    getTemplate: (name) => lookup(templates, 'template', name),
  };
}

/** Catalog served by the inventory itself. */
export function inventoryCatalog(
  inventory: Pick<InventoryClient, 'getDesign' | 'getLayout' | 'getFabricDesign' | 'getTemplate'>
): DesignCatalog {
  return {
    getDesign: (name) => inventory.getDesign(name),
    getLayout: (name) => inventory.getLayout(name),
    getFabricDesign: (name) => inventory.getFabricDesign(name),
    getTemplate: (name) => inventory.getTemplate(name),
  };
}
