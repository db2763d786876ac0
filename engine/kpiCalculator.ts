// engine/kpiCalculator.ts
// Derives the business KPIs from a mapped table.
//
// KPIs depend only on raw column sums, never on each other's scores, so the
// order of evaluation below is irrelevant.

import { UNSET } from './constants';
import { resolveColumn } from './columnResolver';
import {
  coerceDates,
  coerceNumeric,
  meanMapped,
  safeRatio,
  sumMapped
} from './numeric';
import type {
  ColumnMapping,
  KpiComputation,
  KpiValues,
  Maybe,
  Table
} from './types';

/**
 * Share of rows shipped on or before the due date, over the rows where both
 * dates parse. null when either role is unset or no row has both dates.
 */
export function computeOnTimeRate(table: Table, mapping: ColumnMapping): Maybe<number> {
  const dueCol = resolveColumn(table, mapping, 'due_date');
  const shipCol = resolveColumn(table, mapping, 'ship_date');
  if (dueCol === UNSET || shipCol === UNSET) return null;

  const due = coerceDates(table, dueCol);
  const ship = coerceDates(table, shipCol);

  let valid = 0;
  let onTime = 0;
  due.forEach((d, i) => {
    const s = ship[i];
    if (d === null || s === null) return;
    valid += 1;
    if (s <= d) onTime += 1;
  });

  return valid === 0 ? null : onTime / valid;
}

/**
 * Σ inventory_qty × unit_cost. Unparseable cells count as 0 for their row;
 * null only when either role is unset.
 */
export function computeInventoryValue(table: Table, mapping: ColumnMapping): Maybe<number> {
  const invCol = resolveColumn(table, mapping, 'inventory_qty');
  const costCol = resolveColumn(table, mapping, 'unit_cost');
  if (invCol === UNSET || costCol === UNSET) return null;

  const qty = coerceNumeric(table, invCol);
  const cost = coerceNumeric(table, costCol);

  let total = 0;
  qty.forEach((q, i) => {
    total += (q ?? 0) * (cost[i] ?? 0);
  });
  return total;
}

/**
 * Operating profit = sales − cogs − fixed − labor.
 *
 * Unlike gross profit, an unset cost component is taken as 0 once sales is
 * available; it does not make the result unavailable.
 */
export function computeOperatingProfit(
  sales: Maybe<number>,
  cogs: Maybe<number>,
  fixed: Maybe<number>,
  labor: Maybe<number>
): Maybe<number> {
  if (sales === null) return null;
  return sales - (cogs ?? 0) - (fixed ?? 0) - (labor ?? 0);
}

export function computeKpis(table: Table, mapping: ColumnMapping): KpiComputation {
  const sales = sumMapped(table, mapping, 'sales');
  const cogs = sumMapped(table, mapping, 'cogs');
  const fixed = sumMapped(table, mapping, 'fixed_cost');
  const labor = sumMapped(table, mapping, 'labor_cost');

  const produced = sumMapped(table, mapping, 'produced_qty');
  const good = sumMapped(table, mapping, 'good_qty');
  const defects = sumMapped(table, mapping, 'defect_qty');

  const grossProfit = sales === null || cogs === null ? null : sales - cogs;
  const operatingProfit = computeOperatingProfit(sales, cogs, fixed, labor);
  const inventoryValue = computeInventoryValue(table, mapping);

  const kpis: KpiValues = {
    gross_margin: safeRatio(grossProfit, sales),
    operating_margin: safeRatio(operatingProfit, sales),
    defect_rate: safeRatio(defects, produced),
    yield_rate: safeRatio(good, produced),
    on_time_rate: computeOnTimeRate(table, mapping),
    inventory_to_sales: safeRatio(inventoryValue, sales)
  };

  return {
    totals: {
      sales,
      cogs,
      fixed_cost: fixed,
      labor_cost: labor,
      produced_qty: produced,
      good_qty: good,
      defect_qty: defects,
      inventory_value: inventoryValue
    },
    indicators: {
      avg_overtime_hours: meanMapped(table, mapping, 'overtime_hours'),
      avg_downtime_hours: meanMapped(table, mapping, 'downtime_hours')
    },
    kpis
  };
}
