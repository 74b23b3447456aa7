import { SnapshotNotFoundError } from '../../common/errors/clusterscope.errors';
import {
  SnapshotEntry,
  SnapshotStorePort,
  StoredRecord,
} from '../../common/interfaces/snapshot-store-port.interface';
import { EndpointKind } from '../../common/types/endpoint-kind';

function copyRecord(record: StoredRecord): StoredRecord {
  return { ...record, fields: { ...record.fields } };
}

export class MemoryAdapter implements SnapshotStorePort {
  private catalog: SnapshotEntry[] = [];
  private snapshots = new Map<number, Map<EndpointKind, StoredRecord[]>>();
  private highestAllocated = 0;
  private ready: boolean = false;

  async initialize(): Promise<void> {
    this.ready = true;
  }

  async close(): Promise<void> {
    this.catalog = [];
    this.snapshots.clear();
    this.ready = false;
  }

  isReady(): boolean {
    return this.ready;
  }

  async beginSnapshot(comment: string, timestamp: string): Promise<SnapshotEntry> {
    this.highestAllocated += 1;
    const entry: SnapshotEntry = { number: this.highestAllocated, timestamp, comment };
    this.catalog.push(entry);
    this.snapshots.set(entry.number, new Map());
    return { ...entry };
  }

  async writeKind(snapshot: number, kind: EndpointKind, records: StoredRecord[]): Promise<void> {
    this.requireSnapshot(snapshot).set(kind, records.map(copyRecord));
  }

  async listSnapshots(): Promise<SnapshotEntry[]> {
    return this.catalog.map((entry) => ({ ...entry }));
  }

  async listKinds(snapshot: number): Promise<EndpointKind[]> {
    return [...this.requireSnapshot(snapshot).keys()].sort();
  }

  async load(snapshot: number, kind: EndpointKind): Promise<StoredRecord[]> {
    const records = this.requireSnapshot(snapshot).get(kind);
    if (!records) {
      throw new SnapshotNotFoundError(snapshot, kind);
    }
    return records.map(copyRecord);
  }

  /** Drops a snapshot's data while its catalog entry and number stay allocated. */
  discardSnapshotData(snapshot: number): void {
    this.snapshots.delete(snapshot);
  }

  private requireSnapshot(snapshot: number): Map<EndpointKind, StoredRecord[]> {
    const kinds = this.snapshots.get(snapshot);
    if (!kinds) {
      throw new SnapshotNotFoundError(snapshot);
    }
    return kinds;
  }
}
