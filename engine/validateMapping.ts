// engine/validateMapping.ts
// Column-mapping validation against a loaded table.
//
// Enforces the mapping invariant at the request boundary: every role named is
// a known role, and every mapped column (other than "(none)") exists in the
// table. The KPI core itself never sees an invalid mapping.

import { SEMANTIC_ROLES, UNSET, type SemanticRole } from './constants';
import { ErrorCodes, addErrorCode, type ErrorCode } from './errorCodes';
import type { ColumnMapping, Table } from './types';

export type MappingValidationResult =
  | { ok: true; mapping: ColumnMapping }
  | { ok: false; errorCodes: ErrorCode[]; details: string[] };

export function toSemanticRole(key: string): SemanticRole | undefined {
  return SEMANTIC_ROLES.find((role) => role === key);
}

export function validateColumnMapping(
  rawMapping: Record<string, unknown>,
  table: Table
): MappingValidationResult {
  const mapping: ColumnMapping = {};
  const errorCodes: ErrorCode[] = [];
  const details: string[] = [];

  for (const [key, value] of Object.entries(rawMapping)) {
    const role = toSemanticRole(key);
    if (!role) {
      addErrorCode(errorCodes, ErrorCodes.UNKNOWN_MAPPING_ROLE);
      details.push(`Unknown role "${key}".`);
      continue;
    }

    if (value === null || value === undefined) {
      mapping[role] = UNSET;
      continue;
    }

    if (typeof value !== 'string') {
      addErrorCode(errorCodes, ErrorCodes.INVALID_MAPPING_VALUE);
      details.push(`Role "${role}" must map to a column name, "${UNSET}" or null.`);
      continue;
    }

    const column = value.trim();
    if (column === '' || column === UNSET) {
      mapping[role] = UNSET;
      continue;
    }

    if (!table.columns.includes(column)) {
      addErrorCode(errorCodes, ErrorCodes.MAPPED_COLUMN_NOT_FOUND);
      details.push(`Column "${column}" mapped to "${role}" is not in the table.`);
      continue;
    }

    mapping[role] = column;
  }

  if (errorCodes.length > 0) {
    return { ok: false, errorCodes, details };
  }
  return { ok: true, mapping };
}
