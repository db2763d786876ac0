// engine/parseTableCsv.ts
//
// Parse uploaded CSV text into a Table.
// The first record is the header row; cells are trimmed and blank → null.

import { parse } from 'csv-parse/sync';
import { ErrorCodes, TableSourceError } from './errorCodes';
import { toCellValue } from './normalizeFields';
import { buildTable } from './table';
import type { CellValue, Table } from './types';

function toRecordCells(record: unknown): CellValue[] {
  if (!Array.isArray(record)) return [];
  return record.map((cell: unknown) => toCellValue(cell));
}

export function parseCsvToTable(csvText: string): Table {
  if (!csvText || csvText.trim().length === 0) {
    throw new TableSourceError(ErrorCodes.EMPTY_TABLE, 'CSV text is empty.');
  }

  let records: unknown;
  try {
    records = parse(csvText, {
      bom: true,
      skip_empty_lines: true,
      trim: true,
      relax_column_count: true
    });
  } catch (err) {
    throw new TableSourceError(
      ErrorCodes.UNREADABLE_CSV,
      `CSV text could not be parsed: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  if (!Array.isArray(records) || records.length === 0) {
    throw new TableSourceError(ErrorCodes.MISSING_HEADER_ROW, 'Header row is empty or missing.');
  }

  const [headerRecord, ...dataRecords]: unknown[] = records;
  const headers = toRecordCells(headerRecord).map((cell) => cell ?? '');

  return buildTable(headers, dataRecords.map(toRecordCells));
}
