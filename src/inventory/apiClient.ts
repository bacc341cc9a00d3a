/**
 * Inventory client for the REST inventory service.
 */

import { configure, loadConfig, type EngineConfig } from '../config';
import { CatalogLookupError, InventoryIOError, PoolExhaustedError } from '../errors';
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
import type { CreateRequest, GetOrCreateResult, InventoryClient } from './client';

type QueryValue = string | number | boolean | undefined | null;

export function buildQueryString(params: Record<string, QueryValue>): string {
  const queryParams = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== null && value !== '') {
      queryParams.set(key, String(value));
    }
  }
  const queryString = queryParams.toString();
  return queryString ? `?${queryString}` : '';
}

const segment = encodeURIComponent;

export type InventoryApiConfig = Pick<EngineConfig, 'inventoryApiUrl' | 'inventoryApiToken' | 'inventoryTimeoutMs'> &
  Partial<Pick<EngineConfig, 'logLevel'>>;

export class InventoryApiClient implements InventoryClient {
  private readonly config: InventoryApiConfig;

  /** A config carrying a log level also sets the logging threshold. */
  constructor(config: InventoryApiConfig = loadConfig()) {
    this.config = config;
    if (config.logLevel) {
      configure({ logLevel: config.logLevel });
    }
  }

  private async send(path: string, options: RequestInit = {}): Promise<Response> {
    const { headers: customHeaders, ...restOptions } = options;
    const token = this.config.inventoryApiToken;
    const method = options.method ?? 'GET';
    const headers = new Headers(customHeaders);
    if (!headers.has('Content-Type')) headers.set('Content-Type', 'application/json');
    if (token) headers.set('Authorization', `Bearer ${token}`);
    try {
      return await fetch(`${this.config.inventoryApiUrl}${path}`, {
        ...restOptions,
        signal: AbortSignal.timeout(this.config.inventoryTimeoutMs),
        headers,
      });
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new InventoryIOError(method, path, detail, undefined, { cause: error });
    }
  }

  private async failure(path: string, method: string, response: Response): Promise<InventoryIOError> {
    if (response.status === 401) {
      return new InventoryIOError(method, path, 'Unauthorized');
    }
    const message = await response.text();
    return new InventoryIOError(method, path, `HTTP ${response.status}: ${message || 'Request failed'}`);
  }

  async apiRequest<T>(path: string, options: RequestInit = {}): Promise<T> {
    const response = await this.send(path, options);
    if (!response.ok) {
      throw await this.failure(path, options.method ?? 'GET', response);
    }
    return (await response.json()) as T;
  }

  /** Like apiRequest, but a 404 yields null. */
  private async apiRequestOrNull<T>(path: string, options: RequestInit = {}): Promise<T | null> {
    const response = await this.send(path, options);
    if (response.status === 404) return null;
    if (!response.ok) {
      throw await this.failure(path, options.method ?? 'GET', response);
    }
    return (await response.json()) as T;
  }

  /** DELETE; false when the target did not exist. */
  private async remove(path: string): Promise<boolean> {
    const response = await this.send(path, { method: 'DELETE' });
    if (response.status === 404) return false;
    if (!response.ok) {
      throw await this.failure(path, 'DELETE', response);
    }
    return true;
  }

  private async catalogEntry<T>(path: string, entry: CatalogLookupError['entry'], name: string): Promise<T> {
    const found = await this.apiRequestOrNull<T>(path);
    if (!found) {
      throw new CatalogLookupError(entry, name);
    }
    return found;
  }

  // --- Catalog ---

  getDesign(name: string): Promise<PodDesign> {
    return this.catalogEntry(`/designs/pods/${segment(name)}`, 'design', name);
  }

  getLayout(name: string): Promise<SiteLayout> {
    return this.catalogEntry(`/designs/layouts/${segment(name)}`, 'layout', name);
  }

  getFabricDesign(name: string): Promise<FabricDesign> {
    return this.catalogEntry(`/designs/fabrics/${segment(name)}`, 'fabric design', name);
  }

  getTemplate(name: string): Promise<DeviceTemplate> {
    return this.catalogEntry(`/templates/${segment(name)}`, 'template', name);
  }

  // --- Records ---

  getOrCreate<K extends RecordKind>(
    kind: K,
    key: string,
    payload: RecordPayloads[K],
    parent: string | null
  ): Promise<GetOrCreateResult<K>> {
    return this.apiRequest<GetOrCreateResult<K>>(`/records/${kind}`, {
      method: 'POST',
      body: JSON.stringify({ key, parent, payload }),
    });
  }

  async getOrCreateMany<K extends RecordKind>(kind: K, items: CreateRequest<K>[]): Promise<GetOrCreateResult<K>[]> {
    if (items.length === 0) return [];
    const response = await this.apiRequest<{ results: GetOrCreateResult<K>[] }>(`/records/${kind}/batch`, {
      method: 'POST',
      body: JSON.stringify({ items }),
    });
    return response.results;
  }

  async listChildren<K extends RecordKind>(parent: string, kind: K): Promise<InventoryRecord<K>[]> {
    const response = await this.apiRequest<{ records: InventoryRecord<K>[] }>(
      `/records/${kind}${buildQueryString({ parent })}`
    );
    return response.records;
  }

  getRecord<K extends RecordKind>(kind: K, key: string): Promise<InventoryRecord<K> | null> {
    return this.apiRequestOrNull<InventoryRecord<K>>(`/records/${kind}/${segment(key)}`);
  }

  updateRecord<K extends RecordKind>(
    kind: K,
    key: string,
    patch: Partial<RecordPayloads[K]>
  ): Promise<InventoryRecord<K>> {
    return this.apiRequest<InventoryRecord<K>>(`/records/${kind}/${segment(key)}`, {
      method: 'PATCH',
      body: JSON.stringify({ payload: patch }),
    });
  }

  deleteRecord(kind: RecordKind, key: string): Promise<boolean> {
    return this.remove(`/records/${kind}/${segment(key)}`);
  }

  // --- Pools ---

  async allocateFromPool(pool: string, identifier: string, length: number, role: string): Promise<PoolAllocation> {
    const path = `/pools/${segment(pool)}/allocations`;
    const response = await this.send(path, {
      method: 'POST',
      body: JSON.stringify({ identifier, prefix_length: length, role }),
    });
    // the service answers 409 when the pool has no block of that size left
    if (response.status === 409) {
      throw new PoolExhaustedError(pool, length);
    }
    if (!response.ok) {
      throw await this.failure(path, 'POST', response);
    }
    return (await response.json()) as PoolAllocation;
  }

  releaseAllocation(pool: string, identifier: string): Promise<boolean> {
    return this.remove(`/pools/${segment(pool)}/allocations/${segment(identifier)}`);
  }
}
