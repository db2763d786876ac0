// engine/advisoryRules.ts
// Rule-based improvement tips per advisory domain.
//
// Rules run over raw KPI values, not scores. Every rule of a domain is
// evaluated in list order (no short-circuit); a domain where nothing fires
// gets its single fallback tip.

import { ADVISORY_DOMAINS, type AdvisoryDomain, type KpiId } from './constants';
import { recordFromKeys } from './records';
import type { AdvisoryTips, KpiValues } from './types';

export interface AdvisoryRule {
  domain: AdvisoryDomain;
  kpi: KpiId;
  /** Only called when the KPI value is available. */
  fires: (value: number) => boolean;
  tip: string;
}

export const ADVISORY_RULES: readonly AdvisoryRule[] = [
  {
    domain: 'profitability',
    kpi: 'gross_margin',
    fires: (v) => v < 0.15,
    tip:
      'Fix the cost structure first: review material, outsourcing and defect costs, renegotiate selling prices and improve the product mix.'
  },
  {
    domain: 'profitability',
    kpi: 'operating_margin',
    fires: (v) => v < 0.05,
    tip:
      'Review the fixed and labor cost structure (indirect staff, overtime, line balancing) and bring the breakeven point down.'
  },
  {
    domain: 'quality',
    kpi: 'defect_rate',
    fires: (v) => v > 0.03,
    tip:
      'Run a Pareto analysis of the top defect causes (process, equipment, operator, material), then tighten standard work, inspection criteria and process capability.'
  },
  {
    domain: 'quality',
    kpi: 'yield_rate',
    fires: (v) => v < 0.95,
    tip:
      'Low yield drives up rework and scrap cost. Check process-condition control and first-article inspection.'
  },
  {
    domain: 'delivery_inventory',
    kpi: 'on_time_rate',
    fires: (v) => v < 0.90,
    tip:
      'Late deliveries cost trust and penalties. Start with bottleneck processes, outsourcing lead times and material supply (safety stock).'
  },
  {
    domain: 'delivery_inventory',
    kpi: 'inventory_to_sales',
    fires: (v) => v > 0.30,
    tip:
      'Inventory is high relative to sales. Manage turnover (ABC classification, target stock levels) and improve production-plan accuracy.'
  }
];

export const FALLBACK_TIPS: Record<AdvisoryDomain, string> = {
  profitability:
    'Profitability indicators look healthy. As a next step, analyse profit by product and by customer.',
  quality:
    'Quality indicators look healthy. As a next step, break defects down by process and yield by line.',
  delivery_inventory:
    'Delivery and inventory indicators look healthy. As a next step, analyse inventory turnover by item and late-delivery cause codes.'
};

export function buildAdvice(
  kpis: KpiValues,
  rules: readonly AdvisoryRule[] = ADVISORY_RULES
): AdvisoryTips {
  return recordFromKeys(ADVISORY_DOMAINS, (domain) => {
    const tips: string[] = [];
    for (const rule of rules) {
      if (rule.domain !== domain) continue;
      const value = kpis[rule.kpi];
      if (value !== null && rule.fires(value)) {
        tips.push(rule.tip);
      }
    }
    return tips.length > 0 ? tips : [FALLBACK_TIPS[domain]];
  });
}
