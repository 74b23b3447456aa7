import { StructuredDiffRow, StructuredKindDiff } from '../common/types/diff.types';
import { StoredRecord } from '../common/types/records';
import { StructuredKindDescriptor } from '../endpoints/endpoint-descriptors';
import { DiffInput, compareText, identityKey, pickColumns, splitUnavailableHosts } from './record-sets';

function indexByKey(
  descriptor: StructuredKindDescriptor,
  records: StoredRecord[],
): Map<string, StoredRecord> {
  const index = new Map<string, StoredRecord>();
  for (const record of records) {
    const key = identityKey(
      record.hostname_port,
      descriptor.keyColumns.map((column) => record.fields[column] ?? ''),
    );
    if (!index.has(key)) index.set(key, record);
  }
  return index;
}

export function diffStructuredRecords(
  descriptor: StructuredKindDescriptor,
  input: DiffInput,
): StructuredKindDiff {
  const { begin, end, unavailableHosts } = splitUnavailableHosts(input);
  const compared = descriptor.compareColumns ?? descriptor.columns;
  const beginIndex = indexByKey(descriptor, begin);
  const endIndex = indexByKey(descriptor, end);
  const rows: StructuredDiffRow[] = [];

  for (const [key, endRecord] of endIndex) {
    const beginRecord = beginIndex.get(key);
    if (!beginRecord) {
      rows.push({
        hostname_port: endRecord.hostname_port,
        key: pickColumns(endRecord.fields, descriptor.keyColumns),
        change: 'added',
        begin: null,
        end: { ...endRecord.fields },
        changedFields: [],
      });
      continue;
    }
    const changedFields = compared.filter(
      (column) => (beginRecord.fields[column] ?? '') !== (endRecord.fields[column] ?? ''),
    );
    if (changedFields.length > 0) {
      rows.push({
        hostname_port: endRecord.hostname_port,
        key: pickColumns(endRecord.fields, descriptor.keyColumns),
        change: 'changed',
        begin: { ...beginRecord.fields },
        end: { ...endRecord.fields },
        changedFields,
      });
    }
  }

  for (const [key, beginRecord] of beginIndex) {
    if (endIndex.has(key)) continue;
    rows.push({
      hostname_port: beginRecord.hostname_port,
      key: pickColumns(beginRecord.fields, descriptor.keyColumns),
      change: 'removed',
      begin: { ...beginRecord.fields },
      end: null,
      changedFields: [],
    });
  }

  rows.sort(
    (a, b) =>
      compareText(a.hostname_port, b.hostname_port) ||
      compareText(JSON.stringify(Object.values(a.key)), JSON.stringify(Object.values(b.key))),
  );
  return { kind: descriptor.kind, shape: 'structured', unavailableHosts, rows };
}
