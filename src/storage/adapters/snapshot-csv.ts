import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { CatalogCorruptError, SnapshotCorruptError, errorMessage } from '../../common/errors/clusterscope.errors';
import { EndpointKind } from '../../common/types/endpoint-kind';
import { ENVELOPE_COLUMNS, StoredRecord } from '../../common/types/records';
import { SnapshotEntry } from '../../common/types/snapshot.types';

export const CATALOG_HEADER = ['number', 'timestamp', 'comment'] as const;

function isStringRows(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === 'string'))
  );
}

function parseRows(text: string): string[][] {
  const rows: unknown = parse(text, { skip_empty_lines: true, relax_column_count: false });
  if (!isStringRows(rows)) {
    throw new Error('unexpected csv structure');
  }
  return rows;
}

export function recordHeader(columns: readonly string[]): string[] {
  return [...ENVELOPE_COLUMNS, ...columns];
}

export function encodeRecords(columns: readonly string[], records: StoredRecord[]): string {
  const rows = records.map((record) => [
    record.hostname_port,
    record.timestamp,
    String(record.synthetic),
    ...columns.map((column) => record.fields[column] ?? ''),
  ]);
  return stringify([recordHeader(columns), ...rows]);
}

/**
 * Decodes a kind file. Any deviation from the kind's header, an unparsable
 * timestamp or synthetic flag, or a malformed row rejects the whole file.
 */
export function decodeRecords(
  snapshot: number,
  kind: EndpointKind,
  columns: readonly string[],
  text: string,
): StoredRecord[] {
  let rows: string[][];
  try {
    rows = parseRows(text);
  } catch (err) {
    throw new SnapshotCorruptError(snapshot, kind, errorMessage(err));
  }

  const [header, ...body] = rows;
  const expected = recordHeader(columns);
  if (!header || header.join(',') !== expected.join(',')) {
    throw new SnapshotCorruptError(snapshot, kind, `header does not match '${expected.join(',')}'`);
  }

  return body.map((row, index) => {
    const [hostnamePort, timestamp, synthetic, ...values] = row;
    const line = index + 2;
    if (!hostnamePort) {
      throw new SnapshotCorruptError(snapshot, kind, `line ${line} has no hostname_port`);
    }
    if (Number.isNaN(Date.parse(timestamp))) {
      throw new SnapshotCorruptError(snapshot, kind, `line ${line} has an invalid timestamp '${timestamp}'`);
    }
    if (synthetic !== 'true' && synthetic !== 'false') {
      throw new SnapshotCorruptError(snapshot, kind, `line ${line} has an invalid synthetic flag '${synthetic}'`);
    }

    const fields: Record<string, string> = {};
    columns.forEach((column, position) => {
      fields[column] = values[position];
    });
    return { hostname_port: hostnamePort, timestamp, synthetic: synthetic === 'true', fields };
  });
}

export function encodeCatalogEntry(entry: SnapshotEntry, withHeader: boolean): string {
  const row = [String(entry.number), entry.timestamp, entry.comment];
  return stringify(withHeader ? [[...CATALOG_HEADER], row] : [row]);
}

export function decodeCatalog(location: string, text: string): SnapshotEntry[] {
  let rows: string[][];
  try {
    rows = parseRows(text);
  } catch (err) {
    throw new CatalogCorruptError(location, errorMessage(err));
  }
  if (rows.length === 0) return [];

  const [header, ...body] = rows;
  if (header.join(',') !== CATALOG_HEADER.join(',')) {
    throw new CatalogCorruptError(location, `header does not match '${CATALOG_HEADER.join(',')}'`);
  }

  const entries: SnapshotEntry[] = [];
  for (const [number, timestamp, comment] of body) {
    const parsed = Number(number);
    if (!Number.isInteger(parsed) || parsed <= 0) {
      throw new CatalogCorruptError(location, `invalid snapshot number '${number}'`);
    }
    const previous = entries[entries.length - 1];
    if (previous && parsed <= previous.number) {
      throw new CatalogCorruptError(location, `snapshot number ${parsed} does not follow ${previous.number}`);
    }
    if (Number.isNaN(Date.parse(timestamp))) {
      throw new CatalogCorruptError(location, `invalid timestamp '${timestamp}' for snapshot ${parsed}`);
    }
    entries.push({ number: parsed, timestamp, comment });
  }
  return entries;
}
