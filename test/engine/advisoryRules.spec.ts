/* test/engine/advisoryRules.spec.ts */
import { describe, it, expect } from 'vitest';
import { ADVISORY_RULES, FALLBACK_TIPS, buildAdvice } from '../../engine/advisoryRules';
import type { KpiValues } from '../../engine/types';

const healthy: KpiValues = {
  gross_margin: 0.3,
  operating_margin: 0.12,
  defect_rate: 0.005,
  yield_rate: 0.99,
  on_time_rate: 0.97,
  inventory_to_sales: 0.1
};

function tipFor(kpi: keyof KpiValues): string {
  const rule = ADVISORY_RULES.find((r) => r.kpi === kpi);
  if (!rule) throw new Error(`no rule for ${kpi}`);
  return rule.tip;
}

describe('buildAdvice', () => {
  it('falls back per domain when no rule fires', () => {
    expect(buildAdvice(healthy)).toEqual({
      profitability: [FALLBACK_TIPS.profitability],
      quality: [FALLBACK_TIPS.quality],
      delivery_inventory: [FALLBACK_TIPS.delivery_inventory]
    });
  });

  it('collects every firing rule of a domain in rule order', () => {
    const tips = buildAdvice({ ...healthy, defect_rate: 0.05, yield_rate: 0.9 });
    expect(tips.quality).toEqual([tipFor('defect_rate'), tipFor('yield_rate')]);
    expect(tips.profitability).toEqual([FALLBACK_TIPS.profitability]);
  });

  it('uses strict comparisons at the thresholds', () => {
    const tips = buildAdvice({
      gross_margin: 0.15,
      operating_margin: 0.05,
      defect_rate: 0.03,
      yield_rate: 0.95,
      on_time_rate: 0.9,
      inventory_to_sales: 0.3
    });
    expect(tips).toEqual({
      profitability: [FALLBACK_TIPS.profitability],
      quality: [FALLBACK_TIPS.quality],
      delivery_inventory: [FALLBACK_TIPS.delivery_inventory]
    });
  });

  it('never fires on unavailable KPIs', () => {
    const tips = buildAdvice({ ...healthy, on_time_rate: null, inventory_to_sales: 0.45 });
    expect(tips.delivery_inventory).toEqual([tipFor('inventory_to_sales')]);

    const empty = buildAdvice({
      gross_margin: null,
      operating_margin: null,
      defect_rate: null,
      yield_rate: null,
      on_time_rate: null,
      inventory_to_sales: null
    });
    expect(empty.profitability).toEqual([FALLBACK_TIPS.profitability]);
  });

  it('fires for a negative gross margin', () => {
    expect(buildAdvice({ ...healthy, gross_margin: -0.1 }).profitability).toEqual([tipFor('gross_margin')]);
  });
});
