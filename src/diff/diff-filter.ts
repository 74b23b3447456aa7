import { KindDiff, MetricDiffRow, StructuredDiffRow } from '../common/types/diff.types';
import { METRIC_KIND_COLUMN, StoredRecord } from '../common/types/records';
import { EndpointDescriptor, StructuredKindDescriptor } from '../endpoints/endpoint-descriptors';

export const TABLE_NAME_COLUMN = 'table_name';

/** Output-only narrowing; nothing here affects what is fetched or stored. */
export interface DisplayFilter {
  statName: RegExp | null;
  tableName: RegExp | null;
  hostname: RegExp | null;
  gauges: boolean;
  details: boolean;
  includeUnchanged: boolean;
}

export const SHOW_EVERYTHING: DisplayFilter = {
  statName: null,
  tableName: null,
  hostname: null,
  gauges: true,
  details: true,
  includeUnchanged: true,
};

function matches(pattern: RegExp | null, value: string | undefined): boolean {
  return pattern === null || value === undefined || pattern.test(value);
}

function isDetailRow(descriptor: StructuredKindDescriptor, fields: Record<string, string>): boolean {
  const rule = descriptor.detailRows;
  return rule !== undefined && rule.values.includes(fields[rule.column] ?? '');
}

function keepMetricRow(row: MetricDiffRow, filter: DisplayFilter): boolean {
  return (
    matches(filter.hostname, row.hostname_port) &&
    matches(filter.statName, row.name) &&
    matches(filter.tableName, row.entity[TABLE_NAME_COLUMN]) &&
    (filter.gauges || !row.gauge) &&
    (filter.includeUnchanged || row.delta !== 0)
  );
}

function keepStructuredRow(
  descriptor: StructuredKindDescriptor,
  row: StructuredDiffRow,
  filter: DisplayFilter,
): boolean {
  const fields = row.end ?? row.begin ?? {};
  return (
    matches(filter.hostname, row.hostname_port) &&
    matches(filter.statName, descriptor.nameColumn ? fields[descriptor.nameColumn] : undefined) &&
    matches(filter.tableName, fields[TABLE_NAME_COLUMN]) &&
    (filter.details || !isDetailRow(descriptor, fields))
  );
}

export function filterKindDiff(descriptor: EndpointDescriptor, diff: KindDiff, filter: DisplayFilter): KindDiff {
  const unavailableHosts = diff.unavailableHosts.filter((host) => matches(filter.hostname, host));
  if (diff.shape === 'metric') {
    return { ...diff, unavailableHosts, rows: diff.rows.filter((row) => keepMetricRow(row, filter)) };
  }
  if (descriptor.shape !== 'structured') {
    return { ...diff, unavailableHosts };
  }
  return {
    ...diff,
    unavailableHosts,
    rows: diff.rows.filter((row) => keepStructuredRow(descriptor, row, filter)),
  };
}

/** Point-in-time narrowing. The unchanged toggle has no meaning here. */
export function filterRecords(
  descriptor: EndpointDescriptor,
  records: StoredRecord[],
  filter: DisplayFilter,
): StoredRecord[] {
  return records.filter((record) => {
    if (!matches(filter.hostname, record.hostname_port)) return false;
    if (record.synthetic) return true;
    if (!matches(filter.statName, descriptor.nameColumn ? record.fields[descriptor.nameColumn] : undefined)) {
      return false;
    }
    if (!matches(filter.tableName, record.fields[TABLE_NAME_COLUMN])) return false;
    if (descriptor.shape === 'metric') {
      return filter.gauges || record.fields[METRIC_KIND_COLUMN] !== 'gauge';
    }
    return filter.details || !isDetailRow(descriptor, record.fields);
  });
}
