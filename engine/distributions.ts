// engine/distributions.ts
// Row-level series for the presentation layer's charts (histograms, scatter).
// Nothing here feeds scoring.

import { MS_PER_DAY, UNSET } from './constants';
import { resolveColumn } from './columnResolver';
import { coerceDates, coerceNumeric } from './numeric';
import type { ColumnMapping, Distributions, PriceCostPoint, Table } from './types';

/**
 * Per-row defect / produced, for rows where both parse and produced > 0.
 */
export function rowDefectRates(table: Table, mapping: ColumnMapping): number[] | null {
  const producedCol = resolveColumn(table, mapping, 'produced_qty');
  const defectCol = resolveColumn(table, mapping, 'defect_qty');
  if (producedCol === UNSET || defectCol === UNSET) return null;

  const produced = coerceNumeric(table, producedCol);
  const defects = coerceNumeric(table, defectCol);

  const rates: number[] = [];
  produced.forEach((p, i) => {
    const d = defects[i];
    if (p === null || d === null || p <= 0) return;
    rates.push(d / p);
  });
  return rates;
}

/**
 * Whole days between due and ship date (floored); positive = late.
 */
export function deliveryDelayDays(table: Table, mapping: ColumnMapping): number[] | null {
  const dueCol = resolveColumn(table, mapping, 'due_date');
  const shipCol = resolveColumn(table, mapping, 'ship_date');
  if (dueCol === UNSET || shipCol === UNSET) return null;

  const due = coerceDates(table, dueCol);
  const ship = coerceDates(table, shipCol);

  const delays: number[] = [];
  due.forEach((d, i) => {
    const s = ship[i];
    if (d === null || s === null) return;
    delays.push(Math.floor((s - d) / MS_PER_DAY));
  });
  return delays;
}

/**
 * (unit price, unit cost) pairs for the margin-structure scatter.
 */
export function priceCostPoints(table: Table, mapping: ColumnMapping): PriceCostPoint[] | null {
  const priceCol = resolveColumn(table, mapping, 'unit_price');
  const costCol = resolveColumn(table, mapping, 'unit_cost');
  if (priceCol === UNSET || costCol === UNSET) return null;

  const prices = coerceNumeric(table, priceCol);
  const costs = coerceNumeric(table, costCol);

  const points: PriceCostPoint[] = [];
  prices.forEach((unit_price, i) => {
    const unit_cost = costs[i];
    if (unit_price === null || unit_cost === null) return;
    points.push({ unit_price, unit_cost });
  });
  return points;
}

export function computeDistributions(table: Table, mapping: ColumnMapping): Distributions {
  return {
    row_defect_rates: rowDefectRates(table, mapping),
    delivery_delay_days: deliveryDelayDays(table, mapping),
    price_cost_points: priceCostPoints(table, mapping)
  };
}
