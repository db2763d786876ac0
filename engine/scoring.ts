// engine/scoring.ts
// Threshold scoring, composite aggregation and traffic-light classification.

import { KPI_IDS } from './constants';
import { DEFAULT_DIAGNOSIS_CONFIG, type TrafficLightBands } from './config';
import { recordFromKeys } from './records';
import type {
  KpiScores,
  KpiValues,
  Maybe,
  Score,
  ThresholdPolicy,
  TrafficLight,
  WeightTable
} from './types';

/**
 * Map a KPI value onto 100 / 70 / 40.
 *
 * higher_is_better:  value >= good → 100, value >= warn → 70, else 40
 * lower_is_better:   value <= good → 100, value <= warn → 70, else 40
 *
 * null (and a non-finite value) scores null. The value is neither clamped
 * nor rounded.
 */
export function scoreByThreshold(value: Maybe<number>, policy: ThresholdPolicy): Score {
  if (value === null || !Number.isFinite(value)) return null;

  if (policy.direction === 'higher_is_better') {
    if (value >= policy.good) return 100;
    if (value >= policy.warn) return 70;
    return 40;
  }

  if (value <= policy.good) return 100;
  if (value <= policy.warn) return 70;
  return 40;
}

export function scoreKpis(
  kpis: KpiValues,
  thresholds = DEFAULT_DIAGNOSIS_CONFIG.thresholds
): KpiScores {
  return recordFromKeys(KPI_IDS, (id) => scoreByThreshold(kpis[id], thresholds[id]));
}

/**
 * Weighted average over the KPIs that actually have a score.
 * Weights of unscored KPIs are left out of both sums; null when nothing scored.
 */
export function compositeScore(
  scores: KpiScores,
  weights: WeightTable = DEFAULT_DIAGNOSIS_CONFIG.weights
): Maybe<number> {
  let weighted = 0;
  let weightSum = 0;

  for (const id of KPI_IDS) {
    const score = scores[id];
    if (score === null) continue;
    weighted += score * weights[id];
    weightSum += weights[id];
  }

  return weightSum === 0 ? null : weighted / weightSum;
}

export function trafficLight(
  score: Maybe<number>,
  bands: TrafficLightBands = DEFAULT_DIAGNOSIS_CONFIG.bands
): TrafficLight {
  if (score === null) return 'neutral';
  if (score >= bands.goodMin) return 'good';
  if (score >= bands.cautionMin) return 'caution';
  return 'risk';
}

export const TRAFFIC_LIGHT_ICONS: Record<TrafficLight, string> = {
  good: '🟢',
  caution: '🟠',
  risk: '🔴',
  neutral: '⚪'
};
