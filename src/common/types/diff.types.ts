import { EndpointKind, RecordShape } from './endpoint-kind';

export interface MetricDiffRow {
  hostname_port: string;
  /** Entity columns identifying the metric besides its name (table id, label set, query). */
  entity: Record<string, string>;
  name: string;
  gauge: boolean;
  beginValue: number;
  endValue: number;
  delta: number;
  counterReset: boolean;
  elapsedSeconds: number;
  /** Per-second rate; null when elapsed time is not positive. */
  rate: number | null;
}

export type ChangeType = 'added' | 'removed' | 'changed';

export interface StructuredDiffRow {
  hostname_port: string;
  key: Record<string, string>;
  change: ChangeType;
  begin: Record<string, string> | null;
  end: Record<string, string> | null;
  changedFields: string[];
}

interface KindDiffBase {
  kind: EndpointKind;
  /** Hosts with synthetic (no data) records on either side; excluded from comparison. */
  unavailableHosts: string[];
}

export interface MetricKindDiff extends KindDiffBase {
  shape: Extract<RecordShape, 'metric'>;
  rows: MetricDiffRow[];
}

export interface StructuredKindDiff extends KindDiffBase {
  shape: Extract<RecordShape, 'structured'>;
  rows: StructuredDiffRow[];
}

export type KindDiff = MetricKindDiff | StructuredKindDiff;

export interface DiffSource {
  label: string;
  /** Start of the capture; used as the baseline time for metrics new in the end set. */
  timestamp: string;
}
