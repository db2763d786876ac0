// engine/excelExport.ts
import ExcelJS from 'exceljs';
import {
  ADVISORY_DOMAINS,
  DOMAIN_LABELS,
  KPI_IDS,
  KPI_LABELS,
  ROLE_LABELS,
  SEMANTIC_ROLES
} from './constants';
import { DEFAULT_DIAGNOSIS_CONFIG } from './config';
import type { Breakdown, BreakdownRow, DiagnosisResult, WeightTable } from './types';

export const XLSX_CONTENT_TYPE =
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export const TEMPLATE_SHEET_NAME = 'Diagnosis_Input';

const PERCENT_FORMAT = '0.00%';

const BREAKDOWN_SHEET_NAMES = {
  by_item: 'By Item',
  by_line: 'By Line',
  by_defect_reason: 'By Defect Reason'
} as const;

async function toNodeBuffer(workbook: ExcelJS.Workbook): Promise<Buffer> {
  const bytes = await workbook.xlsx.writeBuffer();
  return Buffer.from(bytes);
}

function stampWorkbook(workbook: ExcelJS.Workbook, dateISO: string): void {
  const createdAt = new Date(`${dateISO}T00:00:00.000Z`);
  if (!Number.isNaN(createdAt.getTime())) {
    workbook.created = createdAt;
    workbook.modified = createdAt;
  }
}

// -------------------------------
// Template workbook (Diagnosis_Input)
// -------------------------------
export async function createDiagnosisTemplateWorkbook(): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(TEMPLATE_SHEET_NAME);

  const headers = SEMANTIC_ROLES.map((role) => ROLE_LABELS[role]);

  sheet.addRow(headers);
  sheet.getRow(1).font = { bold: true };

  sheet.autoFilter = {
    from: { row: 1, column: 1 },
    to: { row: 1, column: headers.length }
  };

  headers.forEach((header, index) => {
    sheet.getColumn(index + 1).width = Math.max(header.length + 4, 16);
  });

  return toNodeBuffer(workbook);
}

// -------------------------------
// Report workbook
// -------------------------------
function addBreakdownSheet(
  workbook: ExcelJS.Workbook,
  name: string,
  breakdown: Breakdown<BreakdownRow & { cumulative_ratio?: number | null }>
): void {
  const sheet = workbook.addWorksheet(name);
  const withCumulative = breakdown.kind === 'by_defect_reason';

  sheet.columns = [
    { header: breakdown.key_column, key: 'key', width: 28 },
    { header: breakdown.numerator_label, key: 'numerator', width: 16 },
    { header: breakdown.denominator_label, key: 'denominator', width: 18 },
    { header: breakdown.ratio_label, key: 'ratio', width: 16, style: { numFmt: PERCENT_FORMAT } },
    ...(withCumulative
      ? [{ header: 'cumulative_share', key: 'cumulative_ratio', width: 18, style: { numFmt: PERCENT_FORMAT } }]
      : [])
  ];
  sheet.getRow(1).font = { bold: true };

  for (const row of breakdown.rows) {
    sheet.addRow({
      key: row.key,
      numerator: row.numerator,
      denominator: row.denominator,
      ratio: row.ratio,
      ...(withCumulative ? { cumulative_ratio: row.cumulative_ratio ?? null } : {})
    });
  }
}

/**
 * Report workbook for one diagnosis run:
 *   Scorecard | Advice | Summary | one sheet per available breakdown
 */
export async function createDiagnosisReportWorkbook(
  result: DiagnosisResult,
  dateISO: string,
  weights: WeightTable = DEFAULT_DIAGNOSIS_CONFIG.weights
): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  stampWorkbook(workbook, dateISO);

  const scorecard = workbook.addWorksheet('Scorecard');
  scorecard.columns = [
    { header: 'KPI', key: 'kpi', width: 36 },
    { header: 'Value', key: 'value', width: 14, style: { numFmt: PERCENT_FORMAT } },
    { header: 'Score', key: 'score', width: 10 },
    { header: 'Light', key: 'light', width: 12 },
    { header: 'Weight', key: 'weight', width: 10 }
  ];
  scorecard.getRow(1).font = { bold: true };

  for (const id of KPI_IDS) {
    scorecard.addRow({
      kpi: KPI_LABELS[id],
      value: result.kpis[id],
      score: result.scores[id],
      light: result.traffic_lights[id],
      weight: weights[id]
    });
  }
  scorecard.addRow({
    kpi: 'Composite score',
    value: null,
    score: result.composite_score === null ? null : Number(result.composite_score.toFixed(1)),
    light: result.composite_light,
    weight: null
  });

  const advice = workbook.addWorksheet('Advice');
  advice.columns = [
    { header: 'Domain', key: 'domain', width: 26 },
    { header: 'Tip', key: 'tip', width: 100 }
  ];
  advice.getRow(1).font = { bold: true };
  for (const domain of ADVISORY_DOMAINS) {
    for (const tip of result.tips[domain]) {
      advice.addRow({ domain: DOMAIN_LABELS[domain], tip });
    }
  }

  const summary = workbook.addWorksheet('Summary');
  summary.columns = [{ header: 'Summary', key: 'line', width: 90 }];
  summary.getRow(1).font = { bold: true };
  for (const line of result.summary_lines) {
    summary.addRow({ line });
  }

  const { by_item, by_line, by_defect_reason } = result.breakdowns;
  if (by_item) addBreakdownSheet(workbook, BREAKDOWN_SHEET_NAMES.by_item, by_item);
  if (by_line) addBreakdownSheet(workbook, BREAKDOWN_SHEET_NAMES.by_line, by_line);
  if (by_defect_reason) {
    addBreakdownSheet(workbook, BREAKDOWN_SHEET_NAMES.by_defect_reason, by_defect_reason);
  }

  return toNodeBuffer(workbook);
}
