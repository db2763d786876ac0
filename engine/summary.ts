// engine/summary.ts
// Plain-text diagnostic summary (copy-paste block for consulting notes).

import { KPI_IDS, KPI_LABELS } from './constants';
import { DEFAULT_DIAGNOSIS_CONFIG, type TrafficLightBands } from './config';
import { TRAFFIC_LIGHT_ICONS } from './scoring';
import type { KpiScores, KpiValues, Maybe } from './types';

export function formatPercent(value: Maybe<number>, digits: number): string {
  return value === null ? '-' : `${(value * 100).toFixed(digits)}%`;
}

export function formatScore(value: Maybe<number>): string {
  return value === null ? '-' : `${value.toFixed(1)}/100`;
}

/**
 * One line per KPI scored below the "good" band; sub-caution scores are
 * flagged as risks, the rest as improvement points.
 */
export function buildRiskLines(
  scores: KpiScores,
  bands: TrafficLightBands = DEFAULT_DIAGNOSIS_CONFIG.bands
): string[] {
  const lines: string[] = [];
  for (const id of KPI_IDS) {
    const score = scores[id];
    if (score === null) continue;
    if (score < bands.cautionMin) {
      lines.push(`  - ${TRAFFIC_LIGHT_ICONS.risk} ${KPI_LABELS[id]}: below standard (score ${score})`);
    } else if (score < bands.goodMin) {
      lines.push(
        `  - ${TRAFFIC_LIGHT_ICONS.caution} ${KPI_LABELS[id]}: improvement recommended (score ${score})`
      );
    }
  }
  return lines;
}

export function buildSummaryLines(
  kpis: KpiValues,
  scores: KpiScores,
  composite: Maybe<number>,
  bands: TrafficLightBands = DEFAULT_DIAGNOSIS_CONFIG.bands
): string[] {
  const lines = [
    `- Composite score: ${formatScore(composite)}`,
    `- Profitability: gross margin ${formatPercent(kpis.gross_margin, 1)} / operating margin ${formatPercent(kpis.operating_margin, 1)}`,
    `- Quality: defect rate ${formatPercent(kpis.defect_rate, 2)} / yield ${formatPercent(kpis.yield_rate, 2)}`,
    `- Delivery: on-time rate ${formatPercent(kpis.on_time_rate, 1)}`
  ];

  if (kpis.inventory_to_sales !== null) {
    lines.push(`- Inventory: inventory/sales ${formatPercent(kpis.inventory_to_sales, 1)}`);
  }

  const risks = buildRiskLines(scores, bands);
  lines.push('- Key risks:');
  if (risks.length > 0) {
    lines.push(...risks);
  } else {
    lines.push(`  - ${TRAFFIC_LIGHT_ICONS.good} No notable warnings (rule-based)`);
  }

  return lines;
}
