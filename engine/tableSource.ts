// engine/tableSource.ts
//
// Loads the Table named by a validated request: JSON rows, CSV text or a
// base64-encoded workbook. All three adapters converge on the same Table shape.

import { ErrorCodes, TableSourceError } from './errorCodes';
import { parseCsvToTable } from './parseTableCsv';
import { parseExcelToTable } from './parseTableExcel';
import { tableFromJsonRows } from './table';
import type { Table } from './types';

export type TableSource =
  | { kind: 'rows'; rows: Record<string, unknown>[] }
  | { kind: 'csv'; csv: string }
  | { kind: 'xlsx'; file_base64: string; sheet_name?: string };

const BASE64_BODY = /^[A-Za-z0-9+/_-]*={0,2}$/;

/**
 * Decode base64 / base64url content, tolerating a data-URL prefix and
 * embedded whitespace.
 */
export function decodeBase64File(raw: string): Buffer {
  const body = raw.replace(/^data:[^,]*;base64,/, '').replace(/\s+/g, '');
  if (body.length === 0 || !BASE64_BODY.test(body)) {
    throw new TableSourceError(ErrorCodes.INVALID_BASE64, 'file_base64 is not valid base64 content.');
  }
  return Buffer.from(body.replace(/-/g, '+').replace(/_/g, '/'), 'base64');
}

export async function loadTable(source: TableSource): Promise<Table> {
  switch (source.kind) {
    case 'rows':
      return tableFromJsonRows(source.rows);
    case 'csv':
      return parseCsvToTable(source.csv);
    case 'xlsx':
      return parseExcelToTable(decodeBase64File(source.file_base64), source.sheet_name);
  }
}
