// engine/config.ts
// Canonical scoring config for the Diagnosis Engine.
// Thresholds and weights are process constants. Pure functions take the config
// as an optional argument; no request can override it.

import type { KpiId } from './constants';
import type { ThresholdPolicy, WeightTable } from './types';

export interface TrafficLightBands {
  goodMin: number;     // score >= goodMin → good
  cautionMin: number;  // cautionMin <= score < goodMin → caution, below → risk
}

export interface DiagnosisConfig {
  name: string;
  thresholds: Record<KpiId, ThresholdPolicy>;
  weights: WeightTable;
  bands: TrafficLightBands;
}

// Shop-floor defaults. Inventory is judged relative to sales.
export const DEFAULT_DIAGNOSIS_CONFIG: DiagnosisConfig = {
  name: 'default',
  thresholds: {
    gross_margin: { good: 0.25, warn: 0.15, direction: 'higher_is_better' },
    operating_margin: { good: 0.10, warn: 0.05, direction: 'higher_is_better' },
    defect_rate: { good: 0.01, warn: 0.03, direction: 'lower_is_better' },
    yield_rate: { good: 0.98, warn: 0.95, direction: 'higher_is_better' },
    on_time_rate: { good: 0.95, warn: 0.90, direction: 'higher_is_better' },
    inventory_to_sales: { good: 0.15, warn: 0.30, direction: 'lower_is_better' }
  },
  weights: {
    gross_margin: 0.22,
    operating_margin: 0.22,
    defect_rate: 0.18,
    yield_rate: 0.18,
    on_time_rate: 0.12,
    inventory_to_sales: 0.08
  },
  bands: {
    goodMin: 85,
    cautionMin: 60
  }
};
