import { Injectable } from '@nestjs/common';
import { SnapshotEntry } from '../common/types/snapshot.types';
import {
  KindDiff,
  MetricDiffRow,
  MetricKindDiff,
  StructuredDiffRow,
  StructuredKindDiff,
} from '../common/types/diff.types';
import { EndpointKind } from '../common/types/endpoint-kind';
import { METRIC_COLUMNS, StoredRecord } from '../common/types/records';
import {
  EndpointDescriptor,
  MetricKindDescriptor,
  StructuredKindDescriptor,
  getEndpointDescriptor,
} from '../endpoints/endpoint-descriptors';
import { DisplayFilter, filterKindDiff, filterRecords } from '../diff/diff-filter';
import { aggregateMetricRecords, aggregateMetricRows, visibleEntityColumns } from './metric-aggregator';
import { TableColumn, formatNumber, renderTable, truncate } from './table-writer';

export interface RenderOptions extends DisplayFilter {
  /** Statement text is cut to this many characters; 0 keeps it whole. */
  sqlLength: number;
  /** Glog severity letters shown for log kinds, e.g. "WEF". */
  logSeverity: string;
}

@Injectable()
export class ReportRendererService {
  renderCatalog(entries: SnapshotEntry[]): string[] {
    if (entries.length === 0) {
      return ['No snapshots.'];
    }
    return renderTable(
      [{ header: 'number', align: 'right' }, { header: 'timestamp' }, { header: 'comment' }],
      entries.map((entry) => [String(entry.number), entry.timestamp, entry.comment]),
    );
  }

  renderDiffs(title: string, diffs: KindDiff[], options: RenderOptions): string[] {
    const lines = [title];
    for (const diff of diffs) {
      lines.push('', ...this.renderKindDiff(diff, options));
    }
    return lines;
  }

  renderKindDiff(diff: KindDiff, options: RenderOptions): string[] {
    const descriptor = getEndpointDescriptor(diff.kind);
    // Unchanged rows are dropped after collapsed entities are summed.
    const filtered = filterKindDiff(descriptor, diff, { ...options, includeUnchanged: true });

    let body: string[];
    if (filtered.shape === 'metric' && descriptor.shape === 'metric') {
      body = this.metricDiffTable(descriptor, filtered, options);
    } else if (filtered.shape === 'structured' && descriptor.shape === 'structured') {
      body = this.structuredDiffTable(descriptor, filtered, options);
    } else {
      body = [];
    }

    return [`${diff.kind}:`, ...(body.length > 0 ? body : ['(no differences)']), ...this.noDataNote(filtered.unavailableHosts)];
  }

  renderRecords(kind: EndpointKind, timestamp: string, records: StoredRecord[], options: RenderOptions): string[] {
    const descriptor = getEndpointDescriptor(kind);
    let visible = filterRecords(descriptor, records, options);
    if (descriptor.shape === 'metric' && !options.details) {
      visible = aggregateMetricRecords(descriptor, visible);
    }
    if (descriptor.shape === 'structured') {
      visible = visible.filter((record) => record.synthetic || this.severityShown(descriptor, record.fields, options));
    }

    const columns = this.recordColumns(descriptor, options.details);
    const present = visible.filter((record) => !record.synthetic);
    const unavailable = [...new Set(visible.filter((record) => record.synthetic).map((record) => record.hostname_port))];

    const body =
      present.length > 0
        ? renderTable(
            [{ header: 'hostname_port' }, ...columns.map((column) => this.columnFor(descriptor, column))],
            present.map((record) => [
              record.hostname_port,
              ...columns.map((column) => this.cell(descriptor, column, record.fields[column] ?? '', options)),
            ]),
          )
        : ['(no records)'];

    return [`${kind} at ${timestamp}:`, ...body, ...this.noDataNote(unavailable)];
  }

  private metricDiffTable(descriptor: MetricKindDescriptor, diff: MetricKindDiff, options: RenderOptions): string[] {
    const summed: MetricDiffRow[] = options.details ? diff.rows : aggregateMetricRows(descriptor, diff.rows);
    const rows = summed.filter((row) => options.includeUnchanged || row.delta !== 0);
    if (rows.length === 0) return [];
    const entityColumns = visibleEntityColumns(descriptor, options.details);

    const columns: TableColumn[] = [
      { header: 'hostname_port' },
      ...entityColumns.map((column) => ({ header: column })),
      { header: 'metric_name' },
      { header: 'begin', align: 'right' },
      { header: 'end', align: 'right' },
      { header: 'delta', align: 'right' },
      { header: 'rate/s', align: 'right' },
      { header: 'note' },
    ];
    return renderTable(
      columns,
      rows.map((row) => [
        row.hostname_port,
        ...entityColumns.map((column) => this.cell(descriptor, column, row.entity[column] ?? '', options)),
        row.name,
        formatNumber(row.beginValue),
        formatNumber(row.endValue),
        formatNumber(row.delta),
        row.rate === null ? '-' : formatNumber(row.rate),
        [row.gauge ? 'gauge' : '', row.counterReset ? 'counter reset' : ''].filter(Boolean).join(', '),
      ]),
    );
  }

  private structuredDiffTable(
    descriptor: StructuredKindDescriptor,
    diff: StructuredKindDiff,
    options: RenderOptions,
  ): string[] {
    const rows = diff.rows.filter((row) => this.severityShown(descriptor, row.end ?? row.begin ?? {}, options));
    if (rows.length === 0) return [];

    return renderTable(
      [{ header: 'hostname_port' }, { header: 'change' }, ...descriptor.columns.map((column) => ({ header: column }))],
      rows.map((row) => [
        row.hostname_port,
        row.change,
        ...descriptor.columns.map((column) => this.changeCell(descriptor, row, column, options)),
      ]),
    );
  }

  private changeCell(
    descriptor: StructuredKindDescriptor,
    row: StructuredDiffRow,
    column: string,
    options: RenderOptions,
  ): string {
    const before = this.cell(descriptor, column, row.begin?.[column] ?? '', options);
    const after = this.cell(descriptor, column, row.end?.[column] ?? '', options);
    if (row.change === 'added') return after;
    if (row.change === 'removed') return before;
    return row.changedFields.includes(column) ? `${before} -> ${after}` : after;
  }

  private recordColumns(descriptor: EndpointDescriptor, details: boolean): string[] {
    if (descriptor.shape === 'metric') {
      return [...visibleEntityColumns(descriptor, details), ...METRIC_COLUMNS];
    }
    return [...descriptor.columns];
  }

  private columnFor(descriptor: EndpointDescriptor, column: string): TableColumn {
    return descriptor.shape === 'metric' && column === 'value' ? { header: column, align: 'right' } : { header: column };
  }

  private cell(descriptor: EndpointDescriptor, column: string, value: string, options: RenderOptions): string {
    if (descriptor.truncateColumns?.includes(column)) {
      return truncate(value, options.sqlLength);
    }
    return value.replace(/\n/g, ' ');
  }

  private severityShown(
    descriptor: StructuredKindDescriptor,
    fields: Record<string, string>,
    options: RenderOptions,
  ): boolean {
    if (!descriptor.severityColumn) return true;
    const severity = (fields[descriptor.severityColumn] ?? '').charAt(0).toUpperCase();
    return severity !== '' && options.logSeverity.toUpperCase().includes(severity);
  }

  private noDataNote(hosts: string[]): string[] {
    return hosts.length > 0 ? [`no data from: ${hosts.join(', ')}`] : [];
  }
}
