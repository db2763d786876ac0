// engine/validateTransport.ts
// Transport-level validation for the diagnosis entrypoints.
//
// Responsibilities:
//  - Validate the top-level request structure
//  - Ensure exactly one table source (rows / csv / file_base64) is present
//  - Ensure "mapping" is an object where one is required
//  - Do NOT perform column-level logic (that happens once the table is loaded)

import { ErrorCodes, buildErrorBody, type ErrorBody } from './errorCodes';
import type { TableSource } from './tableSource';

export interface TransportFailure {
  ok: false;
  errorStatus: number;
  errorBody: ErrorBody;
}

export type TransportValidationResult<T> = { ok: true; value: T } | TransportFailure;

export interface DiagnosisTransport {
  source: TableSource;
  rawMapping: Record<string, unknown>;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function reject(errorBody: ErrorBody): TransportFailure {
  return { ok: false, errorStatus: 400, errorBody };
}

/**
 * Validate the table-source part of a request body.
 *
 * NOTE:
 *  - JSON parsing is handled earlier by the entrypoint
 *  - This function operates on already parsed JSON
 */
export function validateTableSourceTransport(
  body: unknown
): TransportValidationResult<TableSource> {
  // -----------------------------------------
  // 1) Validate top-level JSON object shape
  // -----------------------------------------
  if (!isPlainObject(body)) {
    return reject(buildErrorBody([ErrorCodes.INVALID_REQUEST_STRUCTURE]));
  }

  // -----------------------------------------
  // 2) Exactly one table source
  // -----------------------------------------
  const present = (['rows', 'csv', 'file_base64'] as const).filter(
    (key) => body[key] !== undefined && body[key] !== null
  );
  if (present.length !== 1) {
    return reject(
      buildErrorBody([ErrorCodes.INVALID_TABLE_SOURCE], [
        present.length === 0
          ? 'No table source provided.'
          : `Several table sources provided: ${present.join(', ')}.`
      ])
    );
  }

  // -----------------------------------------
  // 3) rows[]: non-empty array of plain objects
  // -----------------------------------------
  if (present[0] === 'rows') {
    const rows = body.rows;
    if (!Array.isArray(rows)) {
      return reject(buildErrorBody([ErrorCodes.INVALID_ROWS_ARRAY]));
    }
    if (rows.length === 0) {
      return reject(buildErrorBody([ErrorCodes.EMPTY_TABLE]));
    }
    const objects = rows.filter(isPlainObject);
    if (objects.length !== rows.length) {
      return reject(buildErrorBody([ErrorCodes.INVALID_TRANSPORT_PAYLOAD]));
    }
    return { ok: true, value: { kind: 'rows', rows: objects } };
  }

  // -----------------------------------------
  // 4) csv: string
  // -----------------------------------------
  if (present[0] === 'csv') {
    if (typeof body.csv !== 'string') {
      return reject(buildErrorBody([ErrorCodes.INVALID_REQUEST_STRUCTURE], ['"csv" must be a string.']));
    }
    return { ok: true, value: { kind: 'csv', csv: body.csv } };
  }

  // -----------------------------------------
  // 5) file_base64 (+ optional sheet_name)
  // -----------------------------------------
  if (typeof body.file_base64 !== 'string') {
    return reject(
      buildErrorBody([ErrorCodes.INVALID_REQUEST_STRUCTURE], ['"file_base64" must be a string.'])
    );
  }
  const sheet = body.sheet_name;
  if (sheet !== undefined && sheet !== null && typeof sheet !== 'string') {
    return reject(
      buildErrorBody([ErrorCodes.INVALID_REQUEST_STRUCTURE], ['"sheet_name" must be a string.'])
    );
  }
  return {
    ok: true,
    value: {
      kind: 'xlsx',
      file_base64: body.file_base64,
      ...(typeof sheet === 'string' && sheet.trim() !== '' ? { sheet_name: sheet.trim() } : {})
    }
  };
}

/**
 * Table source + mapping object, for the diagnose / report entrypoints.
 */
export function validateDiagnosisTransport(
  body: unknown
): TransportValidationResult<DiagnosisTransport> {
  if (!isPlainObject(body)) {
    return reject(buildErrorBody([ErrorCodes.INVALID_REQUEST_STRUCTURE]));
  }

  if (!isPlainObject(body.mapping)) {
    return reject(buildErrorBody([ErrorCodes.INVALID_MAPPING_OBJECT]));
  }

  const source = validateTableSourceTransport(body);
  if (!source.ok) return source;

  return { ok: true, value: { source: source.value, rawMapping: body.mapping } };
}
