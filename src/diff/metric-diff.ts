import { MetricDiffRow, MetricKindDiff } from '../common/types/diff.types';
import {
  METRIC_KIND_COLUMN,
  METRIC_NAME_COLUMN,
  METRIC_VALUE_COLUMN,
  StoredRecord,
} from '../common/types/records';
import { MetricKindDescriptor } from '../endpoints/endpoint-descriptors';
import { DiffInput, compareText, identityKey, pickColumns, splitUnavailableHosts } from './record-sets';

interface MetricPoint {
  value: number;
  timestamp: string;
}

function metricValue(record: StoredRecord): number | null {
  const raw = record.fields[METRIC_VALUE_COLUMN];
  if (raw === undefined || raw.trim() === '') return null;
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
}

function elapsedSeconds(from: string, to: string): number {
  const fromMs = Date.parse(from);
  const toMs = Date.parse(to);
  if (Number.isNaN(fromMs) || Number.isNaN(toMs)) return 0;
  return (toMs - fromMs) / 1000;
}

/**
 * Rate-normalized difference of every metric in the end set. A metric missing
 * from the begin set starts at 0; one missing from the end set is not reported.
 */
export function diffMetricRecords(descriptor: MetricKindDescriptor, input: DiffInput): MetricKindDiff {
  const { begin, end, unavailableHosts } = splitUnavailableHosts(input);
  const keyOf = (record: StoredRecord) =>
    identityKey(record.hostname_port, [
      ...descriptor.entityColumns.map((column) => record.fields[column] ?? ''),
      record.fields[METRIC_NAME_COLUMN] ?? '',
    ]);

  const beginPoints = new Map<string, MetricPoint>();
  const hostBeginTimes = new Map<string, string>();
  for (const record of begin) {
    if (!hostBeginTimes.has(record.hostname_port)) {
      hostBeginTimes.set(record.hostname_port, record.timestamp);
    }
    const value = metricValue(record);
    const key = keyOf(record);
    if (value !== null && !beginPoints.has(key)) {
      beginPoints.set(key, { value, timestamp: record.timestamp });
    }
  }

  const rows: MetricDiffRow[] = [];
  const seen = new Set<string>();
  for (const record of end) {
    const endValue = metricValue(record);
    const key = keyOf(record);
    if (endValue === null || seen.has(key)) continue;
    seen.add(key);

    const gauge = record.fields[METRIC_KIND_COLUMN] === 'gauge';
    const beginPoint = beginPoints.get(key);
    const beginValue = beginPoint?.value ?? 0;
    const beginTime =
      beginPoint?.timestamp ?? hostBeginTimes.get(record.hostname_port) ?? input.beginSource.timestamp;

    let delta = endValue - beginValue;
    let counterReset = false;
    if (delta < 0 && !gauge) {
      delta = endValue;
      counterReset = true;
    }

    const elapsed = elapsedSeconds(beginTime, record.timestamp);
    rows.push({
      hostname_port: record.hostname_port,
      entity: pickColumns(record.fields, descriptor.entityColumns),
      name: record.fields[METRIC_NAME_COLUMN] ?? '',
      gauge,
      beginValue,
      endValue,
      delta,
      counterReset,
      elapsedSeconds: elapsed,
      rate: elapsed > 0 ? delta / elapsed : null,
    });
  }

  rows.sort(compareMetricRows);
  return { kind: descriptor.kind, shape: 'metric', unavailableHosts, rows };
}

export function compareMetricRows(a: MetricDiffRow, b: MetricDiffRow): number {
  const byHost = compareText(a.hostname_port, b.hostname_port);
  if (byHost !== 0) return byHost;
  const byEntity = compareText(JSON.stringify(Object.values(a.entity)), JSON.stringify(Object.values(b.entity)));
  if (byEntity !== 0) return byEntity;
  return compareText(a.name, b.name);
}
