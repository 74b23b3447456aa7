import { Inject, Injectable, Logger } from '@nestjs/common';
import { InvalidRequestError, SnapshotNotFoundError } from '../common/errors/clusterscope.errors';
import {
  SNAPSHOT_STORE,
  SnapshotEntry,
  SnapshotStorePort,
} from '../common/interfaces/snapshot-store-port.interface';
import { DiffSource, KindDiff } from '../common/types/diff.types';
import { ENDPOINT_KINDS, EndpointKind } from '../common/types/endpoint-kind';
import { CollectionPass } from '../common/types/records';
import { getEndpointDescriptor } from '../endpoints/endpoint-descriptors';
import { diffMetricRecords } from './metric-diff';
import { DiffInput } from './record-sets';
import { diffStructuredRecords } from './structured-diff';

export interface SnapshotDiff {
  begin: SnapshotEntry;
  end: SnapshotEntry;
  diffs: KindDiff[];
}

export function diffKind(kind: EndpointKind, input: DiffInput): KindDiff {
  const descriptor = getEndpointDescriptor(kind);
  return descriptor.shape === 'metric'
    ? diffMetricRecords(descriptor, input)
    : diffStructuredRecords(descriptor, input);
}

@Injectable()
export class DiffService {
  private readonly logger = new Logger(DiffService.name);

  constructor(@Inject(SNAPSHOT_STORE) private readonly store: SnapshotStorePort) {}

  /**
   * Compares two stored snapshots. Every record is loaded and every kind is
   * compared before anything is returned, so a failure leaves no partial report.
   */
  async diffSnapshots(begin: number, end: number, kinds?: EndpointKind[]): Promise<SnapshotDiff> {
    if (!Number.isInteger(begin) || !Number.isInteger(end) || begin >= end) {
      throw new InvalidRequestError('Begin snapshot must be lower than end snapshot', [
        `begin=${begin}`,
        `end=${end}`,
      ]);
    }

    const catalog = await this.store.listSnapshots();
    const beginEntry = catalog.find((entry) => entry.number === begin);
    if (!beginEntry) throw new SnapshotNotFoundError(begin);
    const endEntry = catalog.find((entry) => entry.number === end);
    if (!endEntry) throw new SnapshotNotFoundError(end);

    const selected = kinds && kinds.length > 0 ? kinds : await this.defaultKinds(begin, end);
    const beginSource: DiffSource = { label: `snapshot ${begin}`, timestamp: beginEntry.timestamp };
    const endSource: DiffSource = { label: `snapshot ${end}`, timestamp: endEntry.timestamp };

    const diffs: KindDiff[] = [];
    for (const kind of selected) {
      const [beginRecords, endRecords] = await Promise.all([
        this.store.load(begin, kind),
        this.store.load(end, kind),
      ]);
      diffs.push(diffKind(kind, { begin: beginRecords, end: endRecords, beginSource, endSource }));
    }
    return { begin: beginEntry, end: endEntry, diffs };
  }

  /** Compares two live collection passes, matched by kind. */
  diffPasses(beginPasses: CollectionPass[], endPasses: CollectionPass[]): KindDiff[] {
    const diffs: KindDiff[] = [];
    for (const endPass of endPasses) {
      const beginPass = beginPasses.find((pass) => pass.kind === endPass.kind);
      if (!beginPass) {
        this.logger.warn(`No begin pass for kind '${endPass.kind}', skipping it`);
        continue;
      }
      diffs.push(
        diffKind(endPass.kind, {
          begin: beginPass.records,
          end: endPass.records,
          beginSource: { label: 'begin', timestamp: beginPass.timestamp },
          endSource: { label: 'end', timestamp: endPass.timestamp },
        }),
      );
    }
    return diffs;
  }

  private async defaultKinds(begin: number, end: number): Promise<EndpointKind[]> {
    const [beginKinds, endKinds] = await Promise.all([this.store.listKinds(begin), this.store.listKinds(end)]);
    const selected = ENDPOINT_KINDS.filter(
      (kind) => getEndpointDescriptor(kind).diffByDefault && beginKinds.includes(kind) && endKinds.includes(kind),
    );
    for (const kind of ENDPOINT_KINDS) {
      if (getEndpointDescriptor(kind).diffByDefault && beginKinds.includes(kind) !== endKinds.includes(kind)) {
        this.logger.warn(`Kind '${kind}' is only present in one of snapshots ${begin} and ${end}, skipping it`);
      }
    }
    return selected;
  }
}
