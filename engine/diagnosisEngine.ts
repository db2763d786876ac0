// engine/diagnosisEngine.ts
// Single entry point: mapped table → full diagnosis.
//
// Pipeline (synchronous, no shared state between runs):
//   table + mapping → KPIs → scores → composite
//                          → advisory tips
//   table + mapping → breakdowns, distributions
//   all of the above → summary lines

import { KPI_IDS } from './constants';
import { DEFAULT_DIAGNOSIS_CONFIG, type DiagnosisConfig } from './config';
import { resolveAllColumns } from './columnResolver';
import { computeKpis } from './kpiCalculator';
import { compositeScore, scoreKpis, trafficLight } from './scoring';
import { buildAdvice } from './advisoryRules';
import { computeBreakdowns } from './breakdowns';
import { computeDistributions } from './distributions';
import { buildSummaryLines } from './summary';
import { recordFromKeys } from './records';
import type { ColumnMapping, DiagnosisResult, Table } from './types';

export function runDiagnosis(
  table: Table,
  mapping: ColumnMapping,
  config: DiagnosisConfig = DEFAULT_DIAGNOSIS_CONFIG
): DiagnosisResult {
  const { totals, indicators, kpis } = computeKpis(table, mapping);

  const scores = scoreKpis(kpis, config.thresholds);
  const composite = compositeScore(scores, config.weights);

  const summary_lines = buildSummaryLines(kpis, scores, composite, config.bands);

  return {
    row_count: table.rows.length,
    mapping: resolveAllColumns(table, mapping),
    totals,
    indicators,
    kpis,
    scores,
    traffic_lights: recordFromKeys(KPI_IDS, (id) => trafficLight(scores[id], config.bands)),
    composite_score: composite,
    composite_light: trafficLight(composite, config.bands),
    tips: buildAdvice(kpis),
    breakdowns: computeBreakdowns(table, mapping),
    distributions: computeDistributions(table, mapping),
    summary_lines,
    summary_text: summary_lines.join('\n')
  };
}
