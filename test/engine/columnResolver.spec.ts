/* test/engine/columnResolver.spec.ts */
import { describe, it, expect } from 'vitest';
import { isMapped, resolveAllColumns, resolveColumn } from '../../engine/columnResolver';
import { UNSET } from '../../engine/constants';
import { makeTable } from '../fixtures/plant';

describe('resolveColumn', () => {
  const table = makeTable(['Revenue', 'Qty'], [{ Revenue: 10, Qty: 1 }]);

  it('returns the mapped column when the table has it', () => {
    expect(resolveColumn(table, { sales: 'Revenue' }, 'sales')).toBe('Revenue');
    expect(isMapped(table, { sales: 'Revenue' }, 'sales')).toBe(true);
  });

  it('treats unmapped, "(none)" and dangling columns alike', () => {
    expect(resolveColumn(table, {}, 'sales')).toBe(UNSET);
    expect(resolveColumn(table, { sales: UNSET }, 'sales')).toBe(UNSET);
    expect(resolveColumn(table, { sales: 'Turnover' }, 'sales')).toBe(UNSET);
    expect(isMapped(table, { sales: 'Turnover' }, 'sales')).toBe(false);
  });

  it('resolves every role for echoing back', () => {
    const resolved = resolveAllColumns(table, { sales: 'Revenue', produced_qty: 'Qty', cogs: 'Cost' });
    expect(resolved.sales).toBe('Revenue');
    expect(resolved.produced_qty).toBe('Qty');
    expect(resolved.cogs).toBe(UNSET);
    expect(Object.keys(resolved)).toHaveLength(19);
  });
});
