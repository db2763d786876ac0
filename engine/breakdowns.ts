// engine/breakdowns.ts
// Grouped rollups by item, line and defect reason.
//
// Each breakdown is independent of KPI scoring. A breakdown whose roles are
// not all mapped is null (skipped), never an error.

import { UNSET, type SemanticRole } from './constants';
import { resolveColumn } from './columnResolver';
import { parseNumericCell, toGroupKey } from './normalizeFields';
import { safeRatio } from './numeric';
import type {
  Breakdown,
  BreakdownRow,
  Breakdowns,
  ColumnMapping,
  DefectReasonRow,
  Maybe,
  Table
} from './types';

interface GroupTotals {
  key: string;
  numerator: number;
  denominator: number;
}

/**
 * Sum `numeratorCol` (and `denominatorCol`, when given) per distinct key.
 * Groups keep first-appearance order; rows with a blank key are dropped;
 * unparseable numbers count as 0. The number 1 and the text "1" are
 * separate groups.
 */
function sumByGroup(
  table: Table,
  keyCol: string,
  numeratorCol: string,
  denominatorCol: string | null
): GroupTotals[] {
  const groups = new Map<string, GroupTotals>();

  for (const row of table.rows) {
    const cell = row[keyCol];
    const key = toGroupKey(cell);
    if (key === null) continue;

    const identity = `${typeof cell}:${key}`;
    let group = groups.get(identity);
    if (!group) {
      group = { key, numerator: 0, denominator: 0 };
      groups.set(identity, group);
    }

    group.numerator += parseNumericCell(row[numeratorCol]) ?? 0;
    if (denominatorCol !== null) {
      group.denominator += parseNumericCell(row[denominatorCol]) ?? 0;
    }
  }

  return Array.from(groups.values());
}

type SortDirection = 'asc' | 'desc';

// Null values sort last in either direction; ties keep input order.
function compareNullable(a: Maybe<number>, b: Maybe<number>, dir: SortDirection): number {
  if (a === null && b === null) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return dir === 'asc' ? a - b : b - a;
}

function resolveAll(
  table: Table,
  mapping: ColumnMapping,
  roles: readonly SemanticRole[]
): string[] | null {
  const columns: string[] = [];
  for (const role of roles) {
    const column = resolveColumn(table, mapping, role);
    if (column === UNSET) return null;
    columns.push(column);
  }
  return columns;
}

/**
 * Defect rate per item: Σ defect_qty / Σ produced_qty, worst item first.
 */
export function breakdownByItem(table: Table, mapping: ColumnMapping): Breakdown | null {
  const cols = resolveAll(table, mapping, ['item', 'produced_qty', 'defect_qty']);
  if (!cols) return null;
  const [itemCol, producedCol, defectCol] = cols;

  const rows: BreakdownRow[] = sumByGroup(table, itemCol, defectCol, producedCol)
    .map((g) => ({ ...g, ratio: safeRatio(g.numerator, g.denominator) }))
    .sort((a, b) => compareNullable(a.ratio, b.ratio, 'desc'));

  return {
    kind: 'by_item',
    key_column: itemCol,
    numerator_label: 'defect_qty',
    denominator_label: 'produced_qty',
    ratio_label: 'defect_rate',
    rows
  };
}

/**
 * Yield per line: Σ good_qty / Σ produced_qty, weakest line first.
 */
export function breakdownByLine(table: Table, mapping: ColumnMapping): Breakdown | null {
  const cols = resolveAll(table, mapping, ['line', 'good_qty', 'produced_qty']);
  if (!cols) return null;
  const [lineCol, goodCol, producedCol] = cols;

  const rows: BreakdownRow[] = sumByGroup(table, lineCol, goodCol, producedCol)
    .map((g) => ({ ...g, ratio: safeRatio(g.numerator, g.denominator) }))
    .sort((a, b) => compareNullable(a.ratio, b.ratio, 'asc'));

  return {
    kind: 'by_line',
    key_column: lineCol,
    numerator_label: 'good_qty',
    denominator_label: 'produced_qty',
    ratio_label: 'yield_rate',
    rows
  };
}

/**
 * Defect count per reason in Pareto order, with each reason's share of all
 * defects and the running (cumulative) share.
 */
export function breakdownByDefectReason(
  table: Table,
  mapping: ColumnMapping
): Breakdown<DefectReasonRow> | null {
  const cols = resolveAll(table, mapping, ['defect_reason', 'defect_qty']);
  if (!cols) return null;
  const [reasonCol, defectCol] = cols;

  const groups = sumByGroup(table, reasonCol, defectCol, null).sort((a, b) =>
    compareNullable(a.numerator, b.numerator, 'desc')
  );
  const total = groups.reduce((acc, g) => acc + g.numerator, 0);

  let running = 0;
  const rows: DefectReasonRow[] = groups.map((g) => {
    running += g.numerator;
    return {
      key: g.key,
      numerator: g.numerator,
      denominator: total,
      ratio: safeRatio(g.numerator, total),
      cumulative_ratio: safeRatio(running, total)
    };
  });

  return {
    kind: 'by_defect_reason',
    key_column: reasonCol,
    numerator_label: 'defect_qty',
    denominator_label: 'total_defect_qty',
    ratio_label: 'defect_share',
    rows
  };
}

export function computeBreakdowns(table: Table, mapping: ColumnMapping): Breakdowns {
  return {
    by_item: breakdownByItem(table, mapping),
    by_line: breakdownByLine(table, mapping),
    by_defect_reason: breakdownByDefectReason(table, mapping)
  };
}
