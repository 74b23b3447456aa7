import {
  PayloadRow,
  isRecord,
  parseJsonBody,
  requireArray,
  requireRecord,
  toCell,
  valueAtPath,
} from './payload-values';

/** Column name -> dotted path inside one JSON object. */
export type ColumnPaths = Record<string, string>;

function rowFromPaths(source: unknown, paths: ColumnPaths): PayloadRow {
  const row: PayloadRow = {};
  for (const [column, path] of Object.entries(paths)) {
    row[column] = toCell(valueAtPath(source, path));
  }
  return row;
}

/** One row from a single JSON object, e.g. `/api/v1/version`. */
export function jsonObjectRow(paths: ColumnPaths) {
  return (body: string): PayloadRow[] => {
    const document = requireRecord(parseJsonBody(body), 'response');
    return [rowFromPaths(document, paths)];
  };
}

/** One row per element of the array found at `arrayPath`. */
export function jsonArrayRows(arrayPath: string, paths: ColumnPaths) {
  return (body: string): PayloadRow[] => {
    const document = requireRecord(parseJsonBody(body), 'response');
    const items = requireArray(valueAtPath(document, arrayPath), arrayPath);
    return items.filter(isRecord).map((item) => rowFromPaths(item, paths));
  };
}

function flattenInto(value: unknown, prefix: string, out: PayloadRow[]): void {
  if (Array.isArray(value)) {
    if (value.length === 0) {
      out.push({ path: prefix, value: '[]' });
      return;
    }
    value.forEach((item, index) => flattenInto(item, prefix ? `${prefix}.${index}` : String(index), out));
    return;
  }
  if (isRecord(value)) {
    const entries = Object.entries(value);
    if (entries.length === 0) {
      out.push({ path: prefix, value: '{}' });
      return;
    }
    for (const [key, child] of entries) {
      flattenInto(child, prefix ? `${prefix}.${key}` : key, out);
    }
    return;
  }
  out.push({ path: prefix, value: toCell(value) });
}

/**
 * Flattens a JSON document into `(path, value)` rows, so nested configuration
 * documents can be compared leaf by leaf.
 */
export function flattenJsonRows(body: string): PayloadRow[] {
  const document = requireRecord(parseJsonBody(body), 'response');
  const rows: PayloadRow[] = [];
  flattenInto(document, '', rows);
  return rows;
}
