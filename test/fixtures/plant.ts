/* test/fixtures/plant.ts */
import { tableFromJsonRows } from '../../engine/table';
import type { ColumnMapping, Table } from '../../engine/types';

// Three production lots over two items and two lines.
//   sales 4000 · cogs 2800 · fixed 400 · labor 200
//   produced 250 · good 235 · defects 15
//   inventory value 10×5 + 20×5 + 25×10 = 400
export const PLANT_ROWS: Record<string, unknown>[] = [
  {
    Item: 'A',
    Line: 'L1',
    Sales: 1000,
    COGS: 700,
    'Fixed Cost': 100,
    'Labor Cost': 50,
    'Produced Qty': 100,
    'Good Qty': 97,
    'Defect Qty': 3,
    'Due Date': '2024-01-10',
    'Ship Date': '2024-01-09',
    'Inventory Qty': 10,
    'Unit Cost': 5,
    'Unit Price': 12,
    'Defect Reason': 'Scratch',
    'Overtime Hours': 2
  },
  {
    Item: 'A',
    Line: 'L2',
    Sales: 1000,
    COGS: 800,
    'Fixed Cost': 100,
    'Labor Cost': 50,
    'Produced Qty': 50,
    'Good Qty': 48,
    'Defect Qty': 2,
    'Due Date': '2024-01-10',
    'Ship Date': '2024-01-12',
    'Inventory Qty': 20,
    'Unit Cost': 5,
    'Unit Price': 12,
    'Defect Reason': 'Dent',
    'Overtime Hours': 4
  },
  {
    Item: 'B',
    Line: 'L1',
    Sales: 2000,
    COGS: 1300,
    'Fixed Cost': 200,
    'Labor Cost': 100,
    'Produced Qty': 100,
    'Good Qty': 90,
    'Defect Qty': 10,
    'Due Date': '2024-01-15',
    'Ship Date': '2024-01-15',
    'Inventory Qty': 25,
    'Unit Cost': 10,
    'Unit Price': 20,
    'Defect Reason': 'Scratch',
    'Overtime Hours': null
  }
];

export const PLANT_MAPPING: ColumnMapping = {
  item: 'Item',
  line: 'Line',
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
  defect_reason: 'Defect Reason',
  overtime_hours: 'Overtime Hours',
  downtime_hours: '(none)'
};

export function plantTable(): Table {
  return tableFromJsonRows(PLANT_ROWS);
}

export function makeTable(columns: string[], rows: Record<string, string | number | null>[]): Table {
  return { columns, rows };
}
