import { StoredRecord } from '../common/types/records';
import { DiffSource } from '../common/types/diff.types';

export interface DiffInput {
  begin: StoredRecord[];
  end: StoredRecord[];
  beginSource: DiffSource;
  endSource: DiffSource;
}

export interface AvailableRecords {
  begin: StoredRecord[];
  end: StoredRecord[];
  unavailableHosts: string[];
}

/** Drops every host that reported synthetic records on either side. */
export function splitUnavailableHosts(input: DiffInput): AvailableRecords {
  const unavailable = new Set<string>();
  for (const record of [...input.begin, ...input.end]) {
    if (record.synthetic) unavailable.add(record.hostname_port);
  }
  const available = (record: StoredRecord) => !unavailable.has(record.hostname_port);
  return {
    begin: input.begin.filter(available),
    end: input.end.filter(available),
    unavailableHosts: [...unavailable].sort(),
  };
}

export function identityKey(hostnamePort: string, values: readonly string[]): string {
  return JSON.stringify([hostnamePort, ...values]);
}

export function pickColumns(fields: Record<string, string>, columns: readonly string[]): Record<string, string> {
  return Object.fromEntries(columns.map((column) => [column, fields[column] ?? '']));
}

export function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
