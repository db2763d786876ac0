/* test/engine/distributions.spec.ts */
import { describe, it, expect } from 'vitest';
import {
  computeDistributions,
  deliveryDelayDays,
  priceCostPoints,
  rowDefectRates
} from '../../engine/distributions';
import { PLANT_MAPPING, makeTable, plantTable } from '../fixtures/plant';

describe('distributions', () => {
  it('builds every series for the plant fixture', () => {
    expect(computeDistributions(plantTable(), PLANT_MAPPING)).toEqual({
      row_defect_rates: [0.03, 0.04, 0.1],
      delivery_delay_days: [-1, 2, 0],
      price_cost_points: [
        { unit_price: 12, unit_cost: 5 },
        { unit_price: 12, unit_cost: 5 },
        { unit_price: 20, unit_cost: 10 }
      ]
    });
  });

  it('skips rows without production', () => {
    const table = makeTable(['p', 'd'], [
      { p: 0, d: 1 },
      { p: 'x', d: 1 },
      { p: 20, d: 1 }
    ]);
    expect(rowDefectRates(table, { produced_qty: 'p', defect_qty: 'd' })).toEqual([0.05]);
  });

  it('floors partial days', () => {
    const table = makeTable(['due', 'ship'], [
      { due: '2024-01-10', ship: '2024-01-10T12:00' },
      { due: '2024-01-10', ship: '2024-01-09T12:00' }
    ]);
    expect(deliveryDelayDays(table, { due_date: 'due', ship_date: 'ship' })).toEqual([0, -1]);
  });

  it('is null per series when its roles are unmapped', () => {
    expect(priceCostPoints(plantTable(), { unit_price: 'Unit Price' })).toBeNull();
    expect(computeDistributions(plantTable(), {})).toEqual({
      row_defect_rates: null,
      delivery_delay_days: null,
      price_cost_points: null
    });
  });
});
