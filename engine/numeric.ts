// engine/numeric.ts
// Numeric / date coercion over mapped columns and the null-safe ratio.
//
// Every helper is total: a missing column, an unparseable cell or a zero
// denominator yields null rather than 0, NaN or Infinity.

import { UNSET, type SemanticRole } from './constants';
import { resolveColumn } from './columnResolver';
import { parseDateCell, parseNumericCell } from './normalizeFields';
import type { ColumnMapping, Maybe, Table } from './types';

/**
 * Parse every cell of `column` as a number; unparseable cells become null.
 */
export function coerceNumeric(table: Table, column: string): Maybe<number>[] {
  return table.rows.map((row) => parseNumericCell(row[column]));
}

/**
 * Parse every cell of `column` as a date (epoch ms); unparseable → null.
 */
export function coerceDates(table: Table, column: string): Maybe<number>[] {
  return table.rows.map((row) => parseDateCell(row[column]));
}

/**
 * Coerced values of the column mapped to `role`, or null when unset.
 */
export function coerceMapped(
  table: Table,
  mapping: ColumnMapping,
  role: SemanticRole
): Maybe<number>[] | null {
  const column = resolveColumn(table, mapping, role);
  return column === UNSET ? null : coerceNumeric(table, column);
}

export function sumValues(values: readonly Maybe<number>[]): number {
  let total = 0;
  for (const v of values) {
    if (v !== null) total += v;
  }
  return total;
}

/**
 * Sum of the mapped column; missing cells count as 0.
 * null only when the role is unset.
 */
export function sumMapped(
  table: Table,
  mapping: ColumnMapping,
  role: SemanticRole
): Maybe<number> {
  const values = coerceMapped(table, mapping, role);
  return values === null ? null : sumValues(values);
}

/**
 * Mean of the parseable cells of the mapped column.
 * null when the role is unset or no cell parses.
 */
export function meanMapped(
  table: Table,
  mapping: ColumnMapping,
  role: SemanticRole
): Maybe<number> {
  const values = coerceMapped(table, mapping, role);
  if (values === null) return null;

  const present = values.filter((v): v is number => v !== null);
  if (present.length === 0) return null;
  return sumValues(present) / present.length;
}

/**
 * numerator / denominator, or null when either side is unavailable, the
 * denominator is exactly zero, or the result is not finite (overflowed sums).
 */
export function safeRatio(
  numerator: Maybe<number>,
  denominator: Maybe<number>
): Maybe<number> {
  if (numerator === null || denominator === null || denominator === 0) {
    return null;
  }
  const ratio = numerator / denominator;
  return Number.isFinite(ratio) ? ratio : null;
}
