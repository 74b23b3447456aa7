import { Inject, Injectable, Logger } from '@nestjs/common';
import { InvalidRequestError, errorMessage } from '../common/errors/clusterscope.errors';
import { HOST_PROBE, HostProbe } from '../common/interfaces/host-probe.interface';
import { NODE_HTTP_CLIENT, NodeHttpPort } from '../common/interfaces/node-http-port.interface';
import { EndpointKind } from '../common/types/endpoint-kind';
import { CollectionPass, StoredRecord } from '../common/types/records';
import {
  EndpointDescriptor,
  getEndpointDescriptor,
  keyColumnsOf,
  requiresObjectId,
} from '../endpoints/endpoint-descriptors';
import { PayloadRow } from '../endpoints/parsers/payload-values';
import { ResolvedTargets, TargetResolverService, WorkItem } from '../resolver/target-resolver.service';
import { mapLimit } from './map-limit';

export interface CollectOptions {
  /** Object id substituted into detail endpoints such as table-detail. */
  uuid?: string;
}

export function syntheticRecord(
  descriptor: EndpointDescriptor,
  hostnamePort: string,
  timestamp: string,
): StoredRecord {
  return {
    hostname_port: hostnamePort,
    timestamp,
    synthetic: true,
    fields: Object.fromEntries(descriptor.columns.map((column) => [column, ''])),
  };
}

@Injectable()
export class CollectorService {
  private readonly logger = new Logger(CollectorService.name);

  constructor(
    private readonly resolver: TargetResolverService,
    @Inject(NODE_HTTP_CLIENT) private readonly http: NodeHttpPort,
    @Inject(HOST_PROBE) private readonly probe: HostProbe,
  ) {}

  /**
   * Fetches one kind from every target serving it. Per-host failures become
   * synthetic records and warnings; they never reject.
   */
  async collect(
    kind: EndpointKind,
    targets: ResolvedTargets,
    options: CollectOptions = {},
  ): Promise<CollectionPass> {
    const descriptor = getEndpointDescriptor(kind);
    const path = this.requestPath(descriptor, options);
    const timestamp = new Date().toISOString();
    const items = this.resolver.workList(targets, descriptor.portRole);

    const perHost = await mapLimit(items, targets.parallel, (item) =>
      this.collectFromHost(descriptor, path, item, targets, timestamp),
    );

    return { kind, timestamp, records: perHost.flat() };
  }

  private requestPath(descriptor: EndpointDescriptor, options: CollectOptions): string {
    if (!requiresObjectId(descriptor)) {
      return descriptor.path;
    }
    if (!options.uuid) {
      throw new InvalidRequestError(`Kind '${descriptor.kind}' requires an object id (--uuid)`);
    }
    return descriptor.path.replace('{uuid}', encodeURIComponent(options.uuid));
  }

  private async collectFromHost(
    descriptor: EndpointDescriptor,
    path: string,
    item: WorkItem,
    targets: ResolvedTargets,
    timestamp: string,
  ): Promise<StoredRecord[]> {
    const unavailable = (reason: string): StoredRecord[] => {
      this.logger.warn(`${item.hostname_port}: no ${descriptor.kind} data (${reason})`);
      return [syntheticRecord(descriptor, item.hostname_port, timestamp)];
    };

    const reachable = await this.probe.isReachable(item.host, item.port, targets.probeTimeoutMs);
    if (!reachable) {
      return unavailable('host unreachable');
    }

    const url = `${targets.scheme}://${item.host}:${item.port}${path}`;
    let bodyText: string;
    try {
      const response = await this.http.getText(url, targets.requestTimeoutMs);
      if (response.status < 200 || response.status >= 300) {
        return unavailable(`HTTP ${response.status} from ${url}`);
      }
      bodyText = response.bodyText;
    } catch (err) {
      return unavailable(errorMessage(err));
    }

    let rows: PayloadRow[];
    try {
      rows = descriptor.parse(bodyText);
    } catch (err) {
      return unavailable(`unparsable response from ${url}: ${errorMessage(err)}`);
    }

    return this.toRecords(descriptor, item.hostname_port, timestamp, rows);
  }

  private toRecords(
    descriptor: EndpointDescriptor,
    hostnamePort: string,
    timestamp: string,
    rows: PayloadRow[],
  ): StoredRecord[] {
    const keyColumns = keyColumnsOf(descriptor);
    const seen = new Set<string>();
    const records: StoredRecord[] = [];

    for (const row of rows) {
      const fields = Object.fromEntries(descriptor.columns.map((column) => [column, row[column] ?? '']));
      const key = JSON.stringify(keyColumns.map((column) => fields[column]));
      if (seen.has(key)) {
        this.logger.debug(`${hostnamePort}: dropping duplicate ${descriptor.kind} record ${key}`);
        continue;
      }
      seen.add(key);
      records.push({ hostname_port: hostnamePort, timestamp, synthetic: false, fields });
    }
    return records;
  }
}
