/* test/engine/table.spec.ts */
import { describe, it, expect } from 'vitest';
import { ErrorCodes, TableSourceError } from '../../engine/errorCodes';
import { normalizeHeader, toCellValue, toUniqueHeaders } from '../../engine/normalizeFields';
import { buildTable, previewRows, tableFromJsonRows } from '../../engine/table';

function codeOf(fn: () => unknown): string | null {
  try {
    fn();
    return null;
  } catch (err) {
    return err instanceof TableSourceError ? err.code : 'unexpected';
  }
}

describe('header normalization', () => {
  it('names blank headers by position and suffixes duplicates', () => {
    expect(toUniqueHeaders(['Qty', '', 'Qty', ' Qty ', null])).toEqual([
      'Qty',
      'Unnamed: 1',
      'Qty.1',
      'Qty.2',
      'Unnamed: 4'
    ]);
  });

  it('renames a header that reads like the unset marker', () => {
    expect(toUniqueHeaders(['(none)', 'Qty', '(none)'])).toEqual(['(none).1', 'Qty', '(none).2']);
    expect(tableFromJsonRows([{ '(none)': 5 }]).columns).toEqual(['(none).1']);
  });

  it('ignores case, spaces, underscores and hyphens for matching', () => {
    expect(normalizeHeader(' Produced_Qty ')).toBe('producedqty');
    expect(normalizeHeader('defect-qty')).toBe('defectqty');
  });
});

describe('toCellValue', () => {
  it('keeps finite numbers and trimmed text only', () => {
    expect(toCellValue(3)).toBe(3);
    expect(toCellValue(Number.POSITIVE_INFINITY)).toBeNull();
    expect(toCellValue('  x ')).toBe('x');
    expect(toCellValue('   ')).toBeNull();
    expect(toCellValue(true)).toBe('true');
    expect(toCellValue({ a: 1 })).toBeNull();
  });
});

describe('buildTable', () => {
  it('pads short records and drops empty ones', () => {
    const table = buildTable(['a', 'b'], [[1], [null, null], ['x', 2, 'extra']]);
    expect(table).toEqual({
      columns: ['a', 'b'],
      rows: [
        { a: 1, b: null },
        { a: 'x', b: 2 }
      ]
    });
  });

  it('rejects tables without headers or rows', () => {
    expect(codeOf(() => buildTable([], [[1]]))).toBe(ErrorCodes.MISSING_HEADER_ROW);
    expect(codeOf(() => buildTable(['a'], [[null]]))).toBe(ErrorCodes.EMPTY_TABLE);
  });
});

describe('tableFromJsonRows', () => {
  it('unions keys in first-appearance order', () => {
    const table = tableFromJsonRows([{ a: 1 }, { b: ' y ', a: 2 }]);
    expect(table.columns).toEqual(['a', 'b']);
    expect(table.rows).toEqual([
      { a: 1, b: null },
      { a: 2, b: 'y' }
    ]);
  });

  it('previews at most the requested number of rows', () => {
    const table = tableFromJsonRows([{ a: 1 }, { a: 2 }, { a: 3 }]);
    expect(previewRows(table, 2)).toEqual([{ a: 1 }, { a: 2 }]);
  });
});
