import { MetricDiffRow } from '../common/types/diff.types';
import { METRIC_NAME_COLUMN, METRIC_VALUE_COLUMN, StoredRecord } from '../common/types/records';
import { MetricKindDescriptor } from '../endpoints/endpoint-descriptors';
import { compareMetricRows } from '../diff/metric-diff';

/** Entity columns still shown once the collapsible ones are folded away. */
export function visibleEntityColumns(descriptor: MetricKindDescriptor, details: boolean): string[] {
  return details
    ? [...descriptor.entityColumns]
    : descriptor.entityColumns.filter((column) => !descriptor.collapseColumns.includes(column));
}

/** Sums diff rows that only differ in collapsed entity columns. */
export function aggregateMetricRows(descriptor: MetricKindDescriptor, rows: MetricDiffRow[]): MetricDiffRow[] {
  if (descriptor.collapseColumns.length === 0) return rows;
  const kept = visibleEntityColumns(descriptor, false);
  const groups = new Map<string, MetricDiffRow>();

  for (const row of rows) {
    const entity = Object.fromEntries(kept.map((column) => [column, row.entity[column] ?? '']));
    const key = JSON.stringify([row.hostname_port, ...Object.values(entity), row.name, row.gauge]);
    const group = groups.get(key);
    if (!group) {
      groups.set(key, { ...row, entity });
      continue;
    }
    group.beginValue += row.beginValue;
    group.endValue += row.endValue;
    group.delta += row.delta;
    group.counterReset = group.counterReset || row.counterReset;
    group.elapsedSeconds = Math.max(group.elapsedSeconds, row.elapsedSeconds);
    group.rate = group.rate === null ? row.rate : row.rate === null ? group.rate : group.rate + row.rate;
  }
  return [...groups.values()].sort(compareMetricRows);
}

/** Point-in-time counterpart of aggregateMetricRows: sums values per remaining entity. */
export function aggregateMetricRecords(descriptor: MetricKindDescriptor, records: StoredRecord[]): StoredRecord[] {
  if (descriptor.collapseColumns.length === 0) return records;
  const groups = new Map<string, StoredRecord>();
  const collapsed = Object.fromEntries(descriptor.collapseColumns.map((column) => [column, '']));

  for (const record of records) {
    if (record.synthetic) {
      groups.set(JSON.stringify([record.hostname_port, 'synthetic']), record);
      continue;
    }
    const fields = { ...record.fields, ...collapsed };
    const key = JSON.stringify([
      record.hostname_port,
      ...descriptor.entityColumns.map((column) => fields[column] ?? ''),
      fields[METRIC_NAME_COLUMN] ?? '',
    ]);
    const value = Number(record.fields[METRIC_VALUE_COLUMN]);
    const group = groups.get(key);
    if (!group) {
      groups.set(key, { ...record, fields: { ...fields, [METRIC_VALUE_COLUMN]: String(Number.isFinite(value) ? value : 0) } });
      continue;
    }
    const sum = Number(group.fields[METRIC_VALUE_COLUMN]) + (Number.isFinite(value) ? value : 0);
    group.fields[METRIC_VALUE_COLUMN] = String(sum);
  }
  return [...groups.values()];
}
