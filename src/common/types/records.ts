import { EndpointKind } from './endpoint-kind';

/**
 * One captured row. `fields` holds the kind-specific columns, always as strings
 * so a row read back from disk is identical to the row that was written.
 */
export interface StoredRecord {
  hostname_port: string;
  /** ISO-8601 with offset, shared by every record of one collection pass. */
  timestamp: string;
  /** True when the row stands in for "no data available" from this host. */
  synthetic: boolean;
  fields: Record<string, string>;
}

export interface CollectionPass {
  kind: EndpointKind;
  timestamp: string;
  records: StoredRecord[];
}

export const ENVELOPE_COLUMNS = ['hostname_port', 'timestamp', 'synthetic'] as const;

export const METRIC_NAME_COLUMN = 'metric_name';
export const METRIC_KIND_COLUMN = 'metric_kind';
export const METRIC_VALUE_COLUMN = 'value';
export const METRIC_COLUMNS = [METRIC_NAME_COLUMN, METRIC_KIND_COLUMN, METRIC_VALUE_COLUMN] as const;

export type MetricKindLabel = 'counter' | 'gauge';
