import * as fs from 'fs/promises';
import * as path from 'path';
import {
  SnapshotNotFoundError,
  SnapshotWriteError,
  errorMessage,
} from '../../common/errors/clusterscope.errors';
import {
  SnapshotEntry,
  SnapshotStorePort,
  StoredRecord,
} from '../../common/interfaces/snapshot-store-port.interface';
import { EndpointKind, isEndpointKind } from '../../common/types/endpoint-kind';
import { getEndpointDescriptor } from '../../endpoints/endpoint-descriptors';
import { decodeCatalog, decodeRecords, encodeCatalogEntry, encodeRecords } from './snapshot-csv';

export interface FilesystemAdapterConfig {
  directory: string;
}

const CATALOG_FILE = 'snapshot.index';
const KIND_FILE_EXTENSION = '.csv';

function isMissing(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/**
 * Snapshot store laid out as `<directory>/snapshot.index` plus one numbered
 * directory per snapshot holding `<kind>.csv` files.
 */
export class FilesystemAdapter implements SnapshotStorePort {
  private ready: boolean = false;
  private readonly catalogPath: string;

  constructor(private readonly config: FilesystemAdapterConfig) {
    this.catalogPath = path.join(config.directory, CATALOG_FILE);
  }

  async initialize(): Promise<void> {
    this.ready = true;
  }

  async close(): Promise<void> {
    this.ready = false;
  }

  isReady(): boolean {
    return this.ready;
  }

  async beginSnapshot(comment: string, timestamp: string): Promise<SnapshotEntry> {
    const catalogText = await this.readCatalogText();
    const catalog = catalogText ? decodeCatalog(this.catalogPath, catalogText) : [];
    const highest = Math.max(
      0,
      ...catalog.map((entry) => entry.number),
      ...(await this.numberedDirectories()),
    );
    const entry: SnapshotEntry = { number: highest + 1, timestamp, comment };
    const snapshotDir = this.snapshotDir(entry.number);

    try {
      await fs.mkdir(this.config.directory, { recursive: true });
      await fs.mkdir(snapshotDir);
    } catch (err) {
      throw new SnapshotWriteError(snapshotDir, errorMessage(err));
    }

    // No fsync: a crash right after this append may lose the entry.
    try {
      const withHeader = !catalogText || catalogText.trim().length === 0;
      await fs.appendFile(this.catalogPath, encodeCatalogEntry(entry, withHeader));
    } catch (err) {
      throw new SnapshotWriteError(this.catalogPath, errorMessage(err));
    }

    return entry;
  }

  async writeKind(snapshot: number, kind: EndpointKind, records: StoredRecord[]): Promise<void> {
    const target = this.kindPath(snapshot, kind);
    const staging = `${target}.tmp`;
    const content = encodeRecords(getEndpointDescriptor(kind).columns, records);

    try {
      await fs.writeFile(staging, content);
      await fs.rename(staging, target);
    } catch (err) {
      throw new SnapshotWriteError(target, errorMessage(err));
    }
  }

  async listSnapshots(): Promise<SnapshotEntry[]> {
    const text = await this.readCatalogText();
    return text ? decodeCatalog(this.catalogPath, text) : [];
  }

  async listKinds(snapshot: number): Promise<EndpointKind[]> {
    await this.requireCatalogEntry(snapshot);
    let names: string[];
    try {
      names = await fs.readdir(this.snapshotDir(snapshot));
    } catch (err) {
      if (isMissing(err)) throw new SnapshotNotFoundError(snapshot);
      throw err;
    }
    return names
      .filter((name) => name.endsWith(KIND_FILE_EXTENSION))
      .map((name) => name.slice(0, -KIND_FILE_EXTENSION.length))
      .filter(isEndpointKind)
      .sort();
  }

  async load(snapshot: number, kind: EndpointKind): Promise<StoredRecord[]> {
    await this.requireCatalogEntry(snapshot);
    let text: string;
    try {
      text = await fs.readFile(this.kindPath(snapshot, kind), 'utf8');
    } catch (err) {
      if (isMissing(err)) throw new SnapshotNotFoundError(snapshot, kind);
      throw err;
    }
    return decodeRecords(snapshot, kind, getEndpointDescriptor(kind).columns, text);
  }

  private async requireCatalogEntry(snapshot: number): Promise<void> {
    const catalog = await this.listSnapshots();
    if (!catalog.some((entry) => entry.number === snapshot)) {
      throw new SnapshotNotFoundError(snapshot);
    }
  }

  private async readCatalogText(): Promise<string | null> {
    try {
      return await fs.readFile(this.catalogPath, 'utf8');
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }
  }

  private async numberedDirectories(): Promise<number[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.config.directory);
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }
    return names.filter((name) => /^\d+$/.test(name)).map((name) => parseInt(name, 10));
  }

  private snapshotDir(snapshot: number): string {
    return path.join(this.config.directory, String(snapshot));
  }

  private kindPath(snapshot: number, kind: EndpointKind): string {
    return path.join(this.snapshotDir(snapshot), `${kind}${KIND_FILE_EXTENSION}`);
  }
}
