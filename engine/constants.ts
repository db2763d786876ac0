// engine/constants.ts
// Canonical constants for the Diagnosis Engine.
// Ensures predictable role / KPI ordering across all modules.

// ------------------------------------------------------------
// Semantic roles (column mapping targets)
// ------------------------------------------------------------

export const SEMANTIC_ROLES = [
  'date',
  'sales',
  'cogs',
  'fixed_cost',
  'labor_cost',
  'produced_qty',
  'good_qty',
  'defect_qty',
  'due_date',
  'ship_date',
  'inventory_qty',
  'unit_cost',
  'unit_price',
  'overtime_hours',
  'downtime_hours',
  'item',
  'line',
  'process',
  'defect_reason'
] as const;

export type SemanticRole = (typeof SEMANTIC_ROLES)[number];

// Explicit "field not available" marker a client may send for any role.
export const UNSET = '(none)';
export type Unset = typeof UNSET;

// Month names accepted in date cells (full or 3–4 letter abbreviation).
export const MONTH_NAMES = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december'
] as const;

// Recommended header per role (template workbook, mapping UI labels)
export const ROLE_LABELS: Record<SemanticRole, string> = {
  date: 'Reference Date',
  sales: 'Sales',
  cogs: 'COGS',
  fixed_cost: 'Fixed Cost',
  labor_cost: 'Labor Cost',
  produced_qty: 'Produced Qty',
  good_qty: 'Good Qty',
  defect_qty: 'Defect Qty',
  due_date: 'Due Date',
  ship_date: 'Ship Date',
  inventory_qty: 'Inventory Qty',
  unit_cost: 'Unit Cost',
  unit_price: 'Unit Price',
  overtime_hours: 'Overtime Hours',
  downtime_hours: 'Downtime Hours',
  item: 'Item',
  line: 'Line',
  process: 'Process',
  defect_reason: 'Defect Reason'
};

// ------------------------------------------------------------
// KPIs and advisory domains
// ------------------------------------------------------------

export const KPI_IDS = [
  'gross_margin',
  'operating_margin',
  'defect_rate',
  'yield_rate',
  'on_time_rate',
  'inventory_to_sales'
] as const;

export type KpiId = (typeof KPI_IDS)[number];

export const KPI_LABELS: Record<KpiId, string> = {
  gross_margin: 'Profitability (gross margin)',
  operating_margin: 'Profitability (operating margin)',
  defect_rate: 'Quality (defect rate)',
  yield_rate: 'Quality (yield)',
  on_time_rate: 'Delivery (on-time rate)',
  inventory_to_sales: 'Inventory (inventory/sales)'
};

export const ADVISORY_DOMAINS = [
  'profitability',
  'quality',
  'delivery_inventory'
] as const;

export type AdvisoryDomain = (typeof ADVISORY_DOMAINS)[number];

export const DOMAIN_LABELS: Record<AdvisoryDomain, string> = {
  profitability: 'Finance / Profitability',
  quality: 'Production / Quality',
  delivery_inventory: 'Delivery / Inventory'
};

// ------------------------------------------------------------
// Request / table limits
// ------------------------------------------------------------

export const MAX_BODY_BYTES = 4_000_000;
export const MAX_TABLE_ROWS = 100_000;
export const PREVIEW_ROW_COUNT = 50;

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

// ------------------------------------------------------------
// Published reports (Vercel Blob)
// ------------------------------------------------------------

export const DEFAULT_REPORTS_PREFIX = 'diagnosis-reports/';
export const REPORT_TTL_MS = 2 * 60 * 60 * 1000;
