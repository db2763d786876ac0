/* test/engine/scoring.spec.ts */
import { describe, it, expect } from 'vitest';
import { DEFAULT_DIAGNOSIS_CONFIG } from '../../engine/config';
import { compositeScore, scoreByThreshold, scoreKpis, trafficLight } from '../../engine/scoring';
import type { KpiScores, ThresholdPolicy } from '../../engine/types';

const higher: ThresholdPolicy = { good: 0.25, warn: 0.15, direction: 'higher_is_better' };
const lower: ThresholdPolicy = { good: 0.01, warn: 0.03, direction: 'lower_is_better' };

describe('scoreByThreshold', () => {
  it('bands higher-is-better values with inclusive boundaries', () => {
    expect(scoreByThreshold(0.3, higher)).toBe(100);
    expect(scoreByThreshold(0.25, higher)).toBe(100);
    expect(scoreByThreshold(0.15, higher)).toBe(70);
    expect(scoreByThreshold(0.1, higher)).toBe(40);
    expect(scoreByThreshold(-0.2, higher)).toBe(40);
  });

  it('bands lower-is-better values with inclusive boundaries', () => {
    expect(scoreByThreshold(0, lower)).toBe(100);
    expect(scoreByThreshold(0.01, lower)).toBe(100);
    expect(scoreByThreshold(0.012, lower)).toBe(70);
    expect(scoreByThreshold(0.03, lower)).toBe(70);
    expect(scoreByThreshold(0.05, lower)).toBe(40);
  });

  it('keeps unavailable values unscored', () => {
    expect(scoreByThreshold(null, higher)).toBeNull();
  });

  it('does not score non-finite values', () => {
    expect(scoreByThreshold(Number.NaN, higher)).toBeNull();
    expect(scoreByThreshold(Number.NEGATIVE_INFINITY, lower)).toBeNull();
  });
});

describe('scoreKpis', () => {
  it('applies the default policy per KPI', () => {
    const scores = scoreKpis({
      gross_margin: 0.2,
      operating_margin: 0.12,
      defect_rate: 0.012,
      yield_rate: 0.9,
      on_time_rate: null,
      inventory_to_sales: 0.1
    });
    expect(scores).toEqual({
      gross_margin: 70,
      operating_margin: 100,
      defect_rate: 70,
      yield_rate: 40,
      on_time_rate: null,
      inventory_to_sales: 100
    });
  });
});

describe('compositeScore', () => {
  const none: KpiScores = {
    gross_margin: null,
    operating_margin: null,
    defect_rate: null,
    yield_rate: null,
    on_time_rate: null,
    inventory_to_sales: null
  };

  it('renormalizes over the scored KPIs only', () => {
    const scores: KpiScores = { ...none, gross_margin: 100, defect_rate: 40 };
    // (100 × 0.22 + 40 × 0.18) / 0.40
    expect(compositeScore(scores)).toBeCloseTo(73, 10);
  });

  it('equals the single score when only one KPI is available', () => {
    expect(compositeScore({ ...none, on_time_rate: 70 })).toBeCloseTo(70, 10);
  });

  it('is null when nothing is scored', () => {
    expect(compositeScore(none)).toBeNull();
  });

  it('is 100 when every KPI scores 100', () => {
    const all: KpiScores = {
      gross_margin: 100,
      operating_margin: 100,
      defect_rate: 100,
      yield_rate: 100,
      on_time_rate: 100,
      inventory_to_sales: 100
    };
    expect(compositeScore(all)).toBeCloseTo(100, 10);
  });
});

describe('trafficLight', () => {
  it('classifies scores against the default bands', () => {
    expect(trafficLight(85)).toBe('good');
    expect(trafficLight(84.9)).toBe('caution');
    expect(trafficLight(60)).toBe('caution');
    expect(trafficLight(59.9)).toBe('risk');
    expect(trafficLight(null)).toBe('neutral');
  });

  it('accepts custom bands', () => {
    expect(trafficLight(70, { ...DEFAULT_DIAGNOSIS_CONFIG.bands, goodMin: 70 })).toBe('good');
  });
});
