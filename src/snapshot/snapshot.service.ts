import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  SNAPSHOT_STORE,
  SnapshotEntry,
  SnapshotStorePort,
} from '../common/interfaces/snapshot-store-port.interface';
import { ENDPOINT_KINDS, EndpointKind } from '../common/types/endpoint-kind';
import { CollectionPass } from '../common/types/records';
import { CollectorService } from '../collector/collector.service';
import { requiresObjectId, getEndpointDescriptor } from '../endpoints/endpoint-descriptors';
import { ResolvedTargets } from '../resolver/target-resolver.service';

export interface KindSelection {
  /** Skips the thread dump, which is large and slow on busy servers. */
  disableThreads?: boolean;
  /** Object id for table-detail and tablet-detail; without it those kinds are skipped. */
  uuid?: string;
}

export interface CaptureOptions extends KindSelection {
  comment: string;
}

export interface CapturedSnapshot {
  entry: SnapshotEntry;
  kinds: EndpointKind[];
}

export function kindsForCapture(selection: KindSelection): EndpointKind[] {
  return ENDPOINT_KINDS.filter((kind) => {
    if (kind === EndpointKind.THREADS && selection.disableThreads) return false;
    if (requiresObjectId(getEndpointDescriptor(kind)) && !selection.uuid) return false;
    return true;
  });
}

@Injectable()
export class SnapshotService {
  private readonly logger = new Logger(SnapshotService.name);

  constructor(
    @Inject(SNAPSHOT_STORE) private readonly store: SnapshotStorePort,
    private readonly collector: CollectorService,
  ) {}

  /** Allocates a snapshot number, then collects and writes each kind in turn. */
  async capture(targets: ResolvedTargets, options: CaptureOptions): Promise<CapturedSnapshot> {
    const kinds = kindsForCapture(options);
    const entry = await this.store.beginSnapshot(options.comment, new Date().toISOString());
    this.logger.log(`Capturing snapshot ${entry.number} (${kinds.length} kinds)`);

    for (const kind of kinds) {
      const pass = await this.collector.collect(kind, targets, { uuid: options.uuid });
      await this.store.writeKind(entry.number, kind, pass.records);
      this.logger.debug(`Snapshot ${entry.number}: wrote ${pass.records.length} ${kind} records`);
    }
    return { entry, kinds };
  }

  /** Collects the given kinds without storing them. */
  async collectLive(targets: ResolvedTargets, kinds: EndpointKind[], uuid?: string): Promise<CollectionPass[]> {
    const passes: CollectionPass[] = [];
    for (const kind of kinds) {
      passes.push(await this.collector.collect(kind, targets, { uuid }));
    }
    return passes;
  }

  async listSnapshots(): Promise<SnapshotEntry[]> {
    return this.store.listSnapshots();
  }

  async loadKind(snapshot: number, kind: EndpointKind): Promise<CollectionPass> {
    const catalog = await this.store.listSnapshots();
    const entry = catalog.find((candidate) => candidate.number === snapshot);
    const records = await this.store.load(snapshot, kind);
    return { kind, timestamp: records[0]?.timestamp ?? entry?.timestamp ?? '', records };
  }
}
