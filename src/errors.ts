/**
 * Error taxonomy for topology generation.
 *
 * Capacity and whitelist failures are raised before anything is written.
 * Pool exhaustion and duplicate names stop a run where they occur; a corrected
 * re-run converges because every write is get-or-create.
 */

export type TopologyErrorCode =
  | 'capacity'
  | 'whitelist'
  | 'pool_exhausted'
  | 'duplicate_name'
  | 'inventory_io'
  | 'catalog_lookup'
  | 'topology_state';

export abstract class TopologyError extends Error {
  abstract readonly code: TopologyErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class CapacityError extends TopologyError {
  readonly code = 'capacity';

  constructor(
    message: string,
    readonly required: number,
    readonly available: number
  ) {
    super(message);
  }
}

export class WhitelistError extends TopologyError {
  readonly code = 'whitelist';

  constructor(
    readonly layout: string,
    readonly allowedLayouts: readonly string[],
    design: string
  ) {
    super(
      `Layout '${layout}' is not compatible with design '${design}'. ` +
        `Allowed layouts: ${allowedLayouts.join(', ')}`
    );
  }
}

export class PoolExhaustedError extends TopologyError {
  readonly code = 'pool_exhausted';

  constructor(
    readonly pool: string,
    readonly prefixLength: number
  ) {
    super(`Pool '${pool}' has no free /${prefixLength} left`);
  }
}

export class DuplicateNameError extends TopologyError {
  readonly code = 'duplicate_name';

  constructor(
    readonly deviceName: string,
    readonly existingDevice: string,
    readonly requestedDevice: string
  ) {
    super(
      `Device name '${deviceName}' is already used by '${existingDevice}', ` +
        `cannot assign it to '${requestedDevice}'`
    );
  }
}

export class InventoryIOError extends TopologyError {
  readonly code = 'inventory_io';
  readonly retryable = true;

  constructor(
    readonly operation: string,
    readonly target: string,
    readonly detail: string,
    readonly node?: string,
    options?: { cause?: unknown }
  ) {
    super(
      `Inventory ${operation} on ${target} failed${node ? ` while generating '${node}'` : ''}: ${detail}`,
      options
    );
  }

  /** Same failure, annotated with the hierarchy node being generated. */
  withNode(node: string): InventoryIOError {
    if (this.node) return this;
    return new InventoryIOError(this.operation, this.target, this.detail, node, { cause: this });
  }
}

export class CatalogLookupError extends TopologyError {
  readonly code = 'catalog_lookup';

  constructor(
    readonly entry: 'design' | 'layout' | 'fabric design' | 'template' | 'record',
    readonly lookupName: string
  ) {
    super(`Unknown ${entry} '${lookupName}'`);
  }
}

/** A prerequisite is missing, e.g. racks generated before their pod. */
export class TopologyStateError extends TopologyError {
  readonly code = 'topology_state';
}

export function isTopologyError(error: unknown): error is TopologyError {
  return error instanceof TopologyError;
}

/**
 * One-line description for logs and CLI output.
 * @returns "[code] message" for topology errors, the plain message otherwise
 */
export function describeError(error: unknown): string {
  if (isTopologyError(error)) return `[${error.code}] ${error.message}`;
  if (error instanceof Error) return error.message;
  return String(error);
}
