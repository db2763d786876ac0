// engine/mappingAutoSuggest.ts
// Suggests a role → column mapping from header names, and builds the
// inspection payload the mapping UI starts from.

import role_header_synonyms from '../data/role_header_synonyms.json';
import { SEMANTIC_ROLES, UNSET, type SemanticRole } from './constants';
import { normalizeHeader } from './normalizeFields';
import { recordFromKeys } from './records';
import { previewRows } from './table';
import type { Table, TableRow } from './types';

const HEADER_SYNONYMS: Record<SemanticRole, readonly string[]> = role_header_synonyms;

export interface TableInspection {
  columns: string[];
  row_count: number;
  preview: TableRow[];
  roles: SemanticRole[];
  unset_value: string;
  suggested_mapping: Record<SemanticRole, string>;
}

/**
 * For each role (in enumeration order) pick the first column whose normalized
 * header equals one of the role's normalized synonyms. A column is claimed by
 * at most one role; roles without a match are UNSET.
 */
export function suggestColumnMapping(
  columns: readonly string[]
): Record<SemanticRole, string> {
  const claimed = new Set<string>();
  const normalized = columns.map((column) => ({ column, key: normalizeHeader(column) }));

  return recordFromKeys(SEMANTIC_ROLES, (role) => {
    const synonyms = new Set(HEADER_SYNONYMS[role].map(normalizeHeader));
    const hit = normalized.find((c) => !claimed.has(c.column) && synonyms.has(c.key));
    if (!hit) return UNSET;
    claimed.add(hit.column);
    return hit.column;
  });
}

export function inspectTable(table: Table): TableInspection {
  return {
    columns: [...table.columns],
    row_count: table.rows.length,
    preview: previewRows(table),
    roles: [...SEMANTIC_ROLES],
    unset_value: UNSET,
    suggested_mapping: suggestColumnMapping(table.columns)
  };
}
