// engine/types.ts
// Shared TypeScript interfaces for the Diagnosis Engine.
import type {
  AdvisoryDomain,
  KpiId,
  SemanticRole,
  Unset
} from './constants';

// ------------------------------------------------------------
// Input table
// ------------------------------------------------------------

/**
 * One raw cell. Adapters normalise spreadsheet/CSV/JSON cells into this
 * shape; `null` is an empty or missing cell.
 */
export type CellValue = string | number | null;

export type TableRow = Readonly<Record<string, CellValue>>;

/**
 * Table – an already-loaded dataset.
 * `columns` holds unique names in source order. The engine never mutates it.
 */
export interface Table {
  readonly columns: readonly string[];
  readonly rows: readonly TableRow[];
}

/**
 * ColumnMapping – semantic role → column name.
 * A role that is absent, or mapped to UNSET, is "not available".
 */
export type ColumnMapping = Partial<Record<SemanticRole, string | Unset>>;

// ------------------------------------------------------------
// KPI values and scores
// ------------------------------------------------------------

/** `null` means the value could not be computed. */
export type Maybe<T> = T | null;

export type KpiValues = Record<KpiId, Maybe<number>>;

export type ScoreBand = 100 | 70 | 40;
export type Score = Maybe<ScoreBand>;
export type KpiScores = Record<KpiId, Score>;

export type ThresholdDirection = 'higher_is_better' | 'lower_is_better';

export interface ThresholdPolicy {
  good: number;
  warn: number;
  direction: ThresholdDirection;
}

export type WeightTable = Record<KpiId, number>;

export type TrafficLight = 'good' | 'caution' | 'risk' | 'neutral';

/**
 * Underlying sums used by the KPI formulas, exposed for metric tiles.
 */
export interface KpiTotals {
  sales: Maybe<number>;
  cogs: Maybe<number>;
  fixed_cost: Maybe<number>;
  labor_cost: Maybe<number>;
  produced_qty: Maybe<number>;
  good_qty: Maybe<number>;
  defect_qty: Maybe<number>;
  inventory_value: Maybe<number>;
}

/**
 * Informational (unscored) indicators.
 */
export interface KpiIndicators {
  avg_overtime_hours: Maybe<number>;
  avg_downtime_hours: Maybe<number>;
}

export interface KpiComputation {
  totals: KpiTotals;
  indicators: KpiIndicators;
  kpis: KpiValues;
}

export type AdvisoryTips = Record<AdvisoryDomain, string[]>;

// ------------------------------------------------------------
// Breakdowns
// ------------------------------------------------------------

export type BreakdownKind = 'by_item' | 'by_line' | 'by_defect_reason';

export interface BreakdownRow {
  key: string;
  numerator: number;
  denominator: number;
  ratio: Maybe<number>;
}

export interface DefectReasonRow extends BreakdownRow {
  /** Running share of all defects, in Pareto order. */
  cumulative_ratio: Maybe<number>;
}

export interface Breakdown<Row extends BreakdownRow = BreakdownRow> {
  kind: BreakdownKind;
  key_column: string;
  numerator_label: string;
  denominator_label: string;
  ratio_label: string;
  rows: Row[];
}

export interface Breakdowns {
  by_item: Breakdown | null;
  by_line: Breakdown | null;
  by_defect_reason: Breakdown<DefectReasonRow> | null;
}

// ------------------------------------------------------------
// Distributions (chart series)
// ------------------------------------------------------------

export interface PriceCostPoint {
  unit_price: number;
  unit_cost: number;
}

export interface Distributions {
  row_defect_rates: number[] | null;
  delivery_delay_days: number[] | null;
  price_cost_points: PriceCostPoint[] | null;
}

// ------------------------------------------------------------
// Final result
// ------------------------------------------------------------

/**
 * DiagnosisResult – everything a presentation layer needs to render one run.
 */
export interface DiagnosisResult {
  row_count: number;
  mapping: Record<SemanticRole, string>;
  totals: KpiTotals;
  indicators: KpiIndicators;
  kpis: KpiValues;
  scores: KpiScores;
  traffic_lights: Record<KpiId, TrafficLight>;
  composite_score: Maybe<number>;
  composite_light: TrafficLight;
  tips: AdvisoryTips;
  breakdowns: Breakdowns;
  distributions: Distributions;
  summary_lines: string[];
  summary_text: string;
}
