import { PayloadRow, PayloadShapeError, decodeHtmlEntities } from './payload-values';

export interface HtmlTable {
  headers: string[];
  rows: string[][];
}

const TABLE_PATTERN = /<table\b[^>]*>([\s\S]*?)<\/table>/gi;
const ROW_PATTERN = /<tr\b[^>]*>([\s\S]*?)<\/tr>/gi;
const CELL_PATTERN = /<(t[dh])\b[^>]*>([\s\S]*?)<\/t[dh]>/gi;

function cellText(html: string): string {
  const withBreaks = html.replace(/<br\s*\/?>/gi, ' ');
  return decodeHtmlEntities(withBreaks.replace(/<[^>]*>/g, ''))
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Extracts every table of a server status page. A row made only of `<th>`
 * cells is the header row; the first one found wins.
 */
export function extractHtmlTables(html: string): HtmlTable[] {
  const tables: HtmlTable[] = [];

  for (const tableMatch of html.matchAll(TABLE_PATTERN)) {
    const table: HtmlTable = { headers: [], rows: [] };
    for (const rowMatch of tableMatch[1].matchAll(ROW_PATTERN)) {
      const cells = [...rowMatch[1].matchAll(CELL_PATTERN)];
      if (cells.length === 0) continue;
      const texts = cells.map((cell) => cellText(cell[2]));
      const headerRow = cells.every((cell) => cell[1].toLowerCase() === 'th');
      if (headerRow) {
        if (table.headers.length === 0) table.headers = texts;
        continue;
      }
      table.rows.push(texts);
    }
    tables.push(table);
  }

  return tables;
}

export interface HtmlTableSpec {
  /** Text (case-insensitive) the first header cell of the wanted table starts with. */
  firstHeader: string;
  /** Output column per cell position; cells beyond the list are ignored. */
  columns: readonly string[];
}

/**
 * Rows of every table whose first header matches. Pages that render the
 * wanted data over several tables (active and finished tasks) are merged.
 */
export function htmlTableRows(spec: HtmlTableSpec) {
  return (body: string): PayloadRow[] => {
    const wanted = spec.firstHeader.toLowerCase();
    const tables = extractHtmlTables(body).filter((table) =>
      (table.headers[0] ?? '').toLowerCase().startsWith(wanted),
    );
    if (tables.length === 0) {
      throw new PayloadShapeError(`no table with header '${spec.firstHeader}' found`);
    }

    const rows: PayloadRow[] = [];
    for (const table of tables) {
      for (const cells of table.rows) {
        const row: PayloadRow = {};
        spec.columns.forEach((column, index) => {
          row[column] = cells[index] ?? '';
        });
        rows.push(row);
      }
    }
    return rows;
  };
}
