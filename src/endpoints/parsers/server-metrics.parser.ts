import gaugeCatalogue from '../data/gauge-metrics.json';
import { MetricKindLabel } from '../../common/types/records';
import {
  PayloadRow,
  isRecord,
  parseJsonBody,
  requireArray,
  toCell,
  toFiniteNumber,
  valueAtPath,
} from './payload-values';

const GAUGE_NAMES = new Set<string>(gaugeCatalogue.names);

export function isGaugeMetric(name: string): boolean {
  return GAUGE_NAMES.has(name) || gaugeCatalogue.prefixes.some((prefix) => name.startsWith(prefix));
}

/** Histograms and YSQL statement metrics carry several monotonic values per name. */
const COUNTER_SUFFIXES = ['total_count', 'total_sum', 'count', 'sum', 'rows'] as const;

function metricRow(
  entity: PayloadRow,
  name: string,
  kind: MetricKindLabel,
  value: number,
): PayloadRow {
  return { ...entity, metric_name: name, metric_kind: kind, value: String(value) };
}

function metricValues(entity: PayloadRow, metric: Record<string, unknown>): PayloadRow[] {
  const name = toCell(metric.name);
  if (!name) return [];

  const value = toFiniteNumber(metric.value);
  if (value !== undefined) {
    return [metricRow(entity, name, isGaugeMetric(name) ? 'gauge' : 'counter', value)];
  }

  const rows: PayloadRow[] = [];
  for (const suffix of COUNTER_SUFFIXES) {
    const part = toFiniteNumber(metric[suffix]);
    if (part === undefined) continue;
    rows.push(metricRow(entity, `${name}.${suffix}`, 'counter', part));
  }
  return rows;
}

/**
 * Parses the JSON `/metrics` document every server process serves: an array of
 * entities (server, table, tablet, cdc) each with a list of metrics.
 */
export function parseServerMetrics(body: string): PayloadRow[] {
  const entities = requireArray(parseJsonBody(body), 'metrics response');
  const rows: PayloadRow[] = [];

  for (const item of entities) {
    if (!isRecord(item)) continue;
    const entity: PayloadRow = {
      metric_type: toCell(item.type),
      metric_id: toCell(item.id),
      namespace: toCell(valueAtPath(item, 'attributes.namespace_name')),
      table_name: toCell(valueAtPath(item, 'attributes.table_name')),
    };
    const metrics = Array.isArray(item.metrics) ? item.metrics : [];
    for (const metric of metrics) {
      if (!isRecord(metric)) continue;
      rows.push(...metricValues(entity, metric));
    }
  }

  return rows;
}
