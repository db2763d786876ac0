// engine/columnResolver.ts
// Role → column resolution against the table's actual columns.

import { SEMANTIC_ROLES, UNSET, type SemanticRole, type Unset } from './constants';
import { recordFromKeys } from './records';
import type { ColumnMapping, Table } from './types';

/**
 * Resolve a semantic role to a column of `table`.
 *
 * Returns UNSET when the role was never mapped, was mapped to UNSET, or names
 * a column the table does not have. Absence is the normal state for optional
 * fields; this never throws.
 */
export function resolveColumn(
  table: Table,
  mapping: ColumnMapping,
  role: SemanticRole
): string | Unset {
  const column = mapping[role];
  if (column === undefined || column === UNSET) return UNSET;
  return table.columns.includes(column) ? column : UNSET;
}

export function isMapped(
  table: Table,
  mapping: ColumnMapping,
  role: SemanticRole
): boolean {
  return resolveColumn(table, mapping, role) !== UNSET;
}

/**
 * Fully resolved mapping (every role present) for echoing back to clients.
 */
export function resolveAllColumns(
  table: Table,
  mapping: ColumnMapping
): Record<SemanticRole, string> {
  return recordFromKeys(SEMANTIC_ROLES, (role) => resolveColumn(table, mapping, role));
}
