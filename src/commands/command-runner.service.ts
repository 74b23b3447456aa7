import { Inject, Injectable, Logger } from '@nestjs/common';
import { CommandRequestDto, Operation } from '../common/dto/command-request.dto';
import { InvalidRequestError } from '../common/errors/clusterscope.errors';
import { ENDPOINT_KINDS, EndpointKind } from '../common/types/endpoint-kind';
import { DiffService } from '../diff/diff.service';
import { getEndpointDescriptor } from '../endpoints/endpoint-descriptors';
import { RenderOptions, ReportRendererService } from '../report/report-renderer.service';
import { ResolveOptions, TargetResolverService, compileFilter } from '../resolver/target-resolver.service';
import { SnapshotService, kindsForCapture } from '../snapshot/snapshot.service';
import { OPERATION_GATE, OperationGate } from './operation-gate';
import { REPORT_OUTPUT, ReportOutput } from './report-output';

export function renderOptionsFor(request: CommandRequestDto): RenderOptions {
  return {
    statName: compileFilter('stat-name-match', request.statNameMatch),
    tableName: compileFilter('table-name-match', request.tableNameMatch),
    hostname: compileFilter('hostname-match', request.hostnameMatch),
    gauges: request.gaugesEnable,
    details: request.detailsEnable,
    includeUnchanged: request.includeUnchanged,
    sqlLength: request.sqlLength,
    logSeverity: request.logSeverity,
  };
}

@Injectable()
export class CommandRunnerService {
  private readonly logger = new Logger(CommandRunnerService.name);

  constructor(
    private readonly resolver: TargetResolverService,
    private readonly snapshots: SnapshotService,
    private readonly diffs: DiffService,
    private readonly renderer: ReportRendererService,
    @Inject(REPORT_OUTPUT) private readonly output: ReportOutput,
    @Inject(OPERATION_GATE) private readonly gate: OperationGate,
  ) {}

  async run(request: CommandRequestDto): Promise<void> {
    const options = renderOptionsFor(request);

    switch (request.operation) {
      case Operation.SNAPSHOT:
        return this.snapshot(request);
      case Operation.LIST:
        return this.output.write(this.renderer.renderCatalog(await this.snapshots.listSnapshots()));
      case Operation.PRINT:
        return this.print(request, options);
      case Operation.DIFF:
        return this.diff(request, options);
      case Operation.ADHOC_DIFF:
        return this.adhocDiff(request, options);
    }
  }

  private resolveOptions(request: CommandRequestDto, narrowHosts: boolean): ResolveOptions {
    return {
      hosts: request.hosts,
      ports: request.ports,
      parallel: request.parallel,
      hostnameMatch: narrowHosts ? request.hostnameMatch : undefined,
    };
  }

  /** Stored snapshots always cover every host; the hostname filter only narrows live passes. */
  private async snapshot(request: CommandRequestDto): Promise<void> {
    const targets = this.resolver.resolve(this.resolveOptions(request, false));
    const { entry, kinds } = await this.snapshots.capture(targets, {
      comment: request.comment,
      disableThreads: request.disableThreads,
      uuid: request.uuid,
    });
    this.output.write([`Snapshot ${entry.number} created at ${entry.timestamp} (${kinds.length} kinds)`]);
  }

  private async print(request: CommandRequestDto, options: RenderOptions): Promise<void> {
    const [kind] = request.kinds;
    if (request.snapshot !== undefined) {
      const pass = await this.snapshots.loadKind(request.snapshot, kind);
      this.output.write(this.renderer.renderRecords(kind, pass.timestamp, pass.records, options));
      return;
    }

    const targets = this.resolver.resolve(this.resolveOptions(request, true));
    const [pass] = await this.snapshots.collectLive(targets, [kind], request.uuid);
    this.output.write(this.renderer.renderRecords(kind, pass.timestamp, pass.records, options));
  }

  private async diff(request: CommandRequestDto, options: RenderOptions): Promise<void> {
    const { begin, end } = request;
    if (begin === undefined || end === undefined) {
      throw new InvalidRequestError('diff needs both begin and end snapshot numbers');
    }
    const result = await this.diffs.diffSnapshots(begin, end, request.kinds);
    const title =
      `Diff of snapshot ${result.begin.number} (${result.begin.timestamp}) ` +
      `to snapshot ${result.end.number} (${result.end.timestamp})`;
    this.output.write(this.renderer.renderDiffs(title, result.diffs, options));
  }

  private async adhocDiff(request: CommandRequestDto, options: RenderOptions): Promise<void> {
    const targets = this.resolver.resolve(this.resolveOptions(request, true));
    const kinds = request.kinds.length > 0 ? request.kinds : this.defaultAdhocKinds(request);

    const beginPasses = await this.snapshots.collectLive(targets, kinds, request.uuid);
    this.logger.log(`Begin capture of ${kinds.length} kinds done`);
    await this.gate.wait();
    const endPasses = await this.snapshots.collectLive(targets, kinds, request.uuid);

    const beginTime = beginPasses[0]?.timestamp ?? '';
    const endTime = endPasses[0]?.timestamp ?? '';
    const diffs = this.diffs.diffPasses(beginPasses, endPasses);
    this.output.write(this.renderer.renderDiffs(`Adhoc diff ${beginTime} to ${endTime}`, diffs, options));
  }

  private defaultAdhocKinds(request: CommandRequestDto): EndpointKind[] {
    const capturable = kindsForCapture({ disableThreads: request.disableThreads, uuid: request.uuid });
    return ENDPOINT_KINDS.filter((kind) => capturable.includes(kind) && getEndpointDescriptor(kind).diffByDefault);
  }
}
