import { MetricKindLabel } from '../../common/types/records';
import { PayloadRow, PayloadShapeError } from './payload-values';

const SAMPLE_LINE = /^([a-zA-Z_:][a-zA-Z0-9_:]*)(\{(?:[^"}]|"(?:[^"\\]|\\.)*")*\})?\s+(\S+)(?:\s+-?\d+)?$/;
const TYPE_LINE = /^#\s*TYPE\s+(\S+)\s+(\S+)/;
const AGGREGATE_SUFFIXES = ['_sum', '_count', '_bucket'];

function familyType(name: string, types: Map<string, string>): string | undefined {
  const direct = types.get(name);
  if (direct) return direct;
  for (const suffix of AGGREGATE_SUFFIXES) {
    if (name.endsWith(suffix)) {
      const family = types.get(name.slice(0, -suffix.length));
      if (family) return family;
    }
  }
  return undefined;
}

function metricKindOf(type: string | undefined): MetricKindLabel {
  switch (type) {
    case 'counter':
    case 'summary':
    case 'histogram':
      return 'counter';
    default:
      return 'gauge';
  }
}

/**
 * Parses the Prometheus text exposition format served by node_exporter.
 * Untyped samples are treated as gauges; summary and histogram samples
 * (`_sum`, `_count`, `_bucket`) as counters.
 */
export function parsePrometheusText(body: string): PayloadRow[] {
  const types = new Map<string, string>();
  const rows: PayloadRow[] = [];
  let sawSample = false;

  for (const rawLine of body.split('\n')) {
    const line = rawLine.trim();
    if (!line) continue;

    if (line.startsWith('#')) {
      const typeMatch = TYPE_LINE.exec(line);
      if (typeMatch) types.set(typeMatch[1], typeMatch[2]);
      continue;
    }

    const match = SAMPLE_LINE.exec(line);
    if (!match) continue;
    sawSample = true;

    const value = Number(match[3]);
    if (!Number.isFinite(value)) continue;

    const name = match[1];
    rows.push({
      labels: match[2] ?? '',
      metric_name: name,
      metric_kind: metricKindOf(familyType(name, types)),
      value: String(value),
    });
  }

  if (!sawSample && body.trim().length > 0) {
    throw new PayloadShapeError('no prometheus samples found');
  }
  return rows;
}
