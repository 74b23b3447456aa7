import type { EndpointKind } from '../types/endpoint-kind';
import type { StoredRecord } from '../types/records';
import type { SnapshotEntry } from '../types/snapshot.types';

export type { SnapshotEntry } from '../types/snapshot.types';
export type { StoredRecord } from '../types/records';

/**
 * Versioned snapshot persistence. One process writes at a time; nothing guards
 * the catalog against a second concurrent writer.
 */
export interface SnapshotStorePort {
  initialize(): Promise<void>;
  close(): Promise<void>;
  isReady(): boolean;

  /** Allocates max(existing) + 1 and appends it to the catalog. Numbers are never reused. */
  beginSnapshot(comment: string, timestamp: string): Promise<SnapshotEntry>;
  /** Replaces the kind's records of the snapshot as one unit. */
  writeKind(snapshot: number, kind: EndpointKind, records: StoredRecord[]): Promise<void>;

  /** Catalog entries ordered by number. */
  listSnapshots(): Promise<SnapshotEntry[]>;
  listKinds(snapshot: number): Promise<EndpointKind[]>;
  /** Complete record set of one kind, or SnapshotNotFoundError / SnapshotCorruptError. */
  load(snapshot: number, kind: EndpointKind): Promise<StoredRecord[]>;
}

export const SNAPSHOT_STORE = 'SNAPSHOT_STORE';
