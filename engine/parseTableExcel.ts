// engine/parseTableExcel.ts
//
// Parse an uploaded workbook (.xlsx) into a Table.

import ExcelJS from 'exceljs';
import { ErrorCodes, TableSourceError } from './errorCodes';
import { toCellValue } from './normalizeFields';
import { buildTable } from './table';
import type { CellValue, Table } from './types';

// exceljs wants an ArrayBuffer; copy so a pooled Buffer's neighbours never leak in.
export function toArrayBuffer(buffer: Buffer): ArrayBuffer {
  const copy = new ArrayBuffer(buffer.byteLength);
  new Uint8Array(copy).set(buffer);
  return copy;
}

/**
 * Flatten an exceljs cell value into a CellValue.
 *  - dates → ISO-8601 strings (parsed again by the date coercion)
 *  - formulas → cached result
 *  - rich text / hyperlinks → their text
 *  - error cells → null
 */
export function readCellValue(value: ExcelJS.CellValue): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean') {
    return toCellValue(value);
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if ('formula' in value || 'sharedFormula' in value) {
    return value.result === undefined ? null : readCellValue(value.result);
  }
  if ('richText' in value) {
    return toCellValue(value.richText.map((part) => part.text).join(''));
  }
  if ('hyperlink' in value) {
    return toCellValue(value.text);
  }
  return null;
}

/**
 * Parse a workbook buffer into a Table.
 * - Uses `sheetName` when given; otherwise the first worksheet.
 * - Expects the header row at row 1.
 * - Skips completely empty data rows.
 */
export async function parseExcelToTable(buffer: Buffer, sheetName?: string): Promise<Table> {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.load(toArrayBuffer(buffer));
  } catch (err) {
    throw new TableSourceError(
      ErrorCodes.UNREADABLE_WORKBOOK,
      `Excel workbook could not be read: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const worksheet = sheetName ? workbook.getWorksheet(sheetName) : workbook.worksheets[0];
  if (!worksheet) {
    throw new TableSourceError(
      ErrorCodes.WORKSHEET_NOT_FOUND,
      sheetName ? `Worksheet "${sheetName}" not found.` : 'No worksheet found in Excel file.'
    );
  }

  const headerRow = worksheet.getRow(1);
  const columnCount = headerRow.cellCount;
  if (columnCount === 0) {
    throw new TableSourceError(ErrorCodes.MISSING_HEADER_ROW, 'Header row (row 1) is empty or missing.');
  }

  const headers: CellValue[] = [];
  for (let col = 1; col <= columnCount; col++) {
    headers.push(readCellValue(headerRow.getCell(col).value));
  }

  const records: CellValue[][] = [];
  for (let rowIndex = 2; rowIndex <= worksheet.rowCount; rowIndex++) {
    const row = worksheet.getRow(rowIndex);
    const cells: CellValue[] = [];
    for (let col = 1; col <= columnCount; col++) {
      cells.push(readCellValue(row.getCell(col).value));
    }
    records.push(cells);
  }

  return buildTable(headers, records);
}
