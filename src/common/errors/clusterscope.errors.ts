export type ClusterscopeErrorCode =
  | 'INVALID_REQUEST'
  | 'SNAPSHOT_NOT_FOUND'
  | 'SNAPSHOT_CORRUPT'
  | 'CATALOG_CORRUPT'
  | 'SNAPSHOT_WRITE_FAILED';

const EXIT_CODES: Record<ClusterscopeErrorCode, number> = {
  INVALID_REQUEST: 2,
  SNAPSHOT_NOT_FOUND: 3,
  SNAPSHOT_CORRUPT: 4,
  CATALOG_CORRUPT: 4,
  SNAPSHOT_WRITE_FAILED: 5,
};

export const UNEXPECTED_ERROR_EXIT_CODE = 1;

/**
 * Fatal errors of one invocation. Per-host collection failures never become one
 * of these; they are absorbed by the collector.
 */
export abstract class ClusterscopeError extends Error {
  abstract readonly code: ClusterscopeErrorCode;

  get exitCode(): number {
    return EXIT_CODES[this.code];
  }
}

export class InvalidRequestError extends ClusterscopeError {
  readonly code = 'INVALID_REQUEST';

  constructor(message: string, readonly details: string[] = []) {
    super(details.length > 0 ? `${message}: ${details.join('; ')}` : message);
    this.name = 'InvalidRequestError';
  }
}

export class SnapshotNotFoundError extends ClusterscopeError {
  readonly code = 'SNAPSHOT_NOT_FOUND';

  constructor(
    readonly snapshot: number,
    readonly kind?: string,
  ) {
    super(
      kind
        ? `Snapshot ${snapshot} has no data for kind '${kind}'`
        : `Snapshot ${snapshot} does not exist in the catalog`,
    );
    this.name = 'SnapshotNotFoundError';
  }
}

export class SnapshotCorruptError extends ClusterscopeError {
  readonly code = 'SNAPSHOT_CORRUPT';

  constructor(
    readonly snapshot: number,
    readonly kind: string,
    readonly reason: string,
  ) {
    super(`Snapshot ${snapshot} kind '${kind}' cannot be read: ${reason}`);
    this.name = 'SnapshotCorruptError';
  }
}

export class CatalogCorruptError extends ClusterscopeError {
  readonly code = 'CATALOG_CORRUPT';

  constructor(
    readonly location: string,
    readonly reason: string,
  ) {
    super(`Snapshot catalog ${location} is corrupt: ${reason}`);
    this.name = 'CatalogCorruptError';
  }
}

export class SnapshotWriteError extends ClusterscopeError {
  readonly code = 'SNAPSHOT_WRITE_FAILED';

  constructor(
    readonly location: string,
    readonly reason: string,
  ) {
    super(`Failed to write ${location}: ${reason}`);
    this.name = 'SnapshotWriteError';
  }
}

export function isClusterscopeError(err: unknown): err is ClusterscopeError {
  return err instanceof ClusterscopeError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
