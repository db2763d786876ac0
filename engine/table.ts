// engine/table.ts
// Table construction shared by the CSV / Excel / JSON adapters.

import { MAX_TABLE_ROWS, PREVIEW_ROW_COUNT } from './constants';
import { ErrorCodes, TableSourceError } from './errorCodes';
import { toCellValue, toUniqueHeaders } from './normalizeFields';
import type { CellValue, Table, TableRow } from './types';

/**
 * Zip header cells with data records into a Table.
 *  - headers are made unique ("Unnamed: i", "name.1")
 *  - extra cells beyond the header are dropped, missing cells are null
 *  - completely empty records are skipped
 *
 * Throws TableSourceError when nothing is left or the row limit is exceeded.
 */
export function buildTable(
  rawHeaders: readonly unknown[],
  records: readonly (readonly CellValue[])[]
): Table {
  if (rawHeaders.length === 0) {
    throw new TableSourceError(ErrorCodes.MISSING_HEADER_ROW, 'Header row is empty or missing.');
  }

  const columns = toUniqueHeaders(rawHeaders);
  const rows: TableRow[] = [];

  for (const record of records) {
    if (record.every((cell) => cell === null)) continue;

    const row: Record<string, CellValue> = {};
    columns.forEach((column, index) => {
      row[column] = record[index] ?? null;
    });
    rows.push(row);

    if (rows.length > MAX_TABLE_ROWS) {
      throw new TableSourceError(
        ErrorCodes.TOO_MANY_ROWS,
        `Table row limit exceeded. Max ${MAX_TABLE_ROWS} rows allowed.`
      );
    }
  }

  if (rows.length === 0) {
    throw new TableSourceError(ErrorCodes.EMPTY_TABLE, 'The table holds no data rows.');
  }

  return { columns, rows };
}

/**
 * JSON rows → Table. Columns are the union of row keys in first-appearance
 * order; cells go through toCellValue.
 */
export function tableFromJsonRows(rows: readonly Record<string, unknown>[]): Table {
  const headers: string[] = [];
  const seen = new Set<string>();

  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        headers.push(key);
      }
    }
  }

  const records = rows.map((row) => headers.map((key) => toCellValue(row[key])));
  return buildTable(headers, records);
}

export function previewRows(table: Table, limit = PREVIEW_ROW_COUNT): TableRow[] {
  return table.rows.slice(0, limit);
}
