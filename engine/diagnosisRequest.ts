// engine/diagnosisRequest.ts
//
// Request preparation shared by every POST entrypoint:
//   size guard → JSON parse → transport validation → table load → mapping check
// Failures come back as { status, body, event } so each entrypoint only has
// to log and respond.

import { MAX_BODY_BYTES } from './constants';
import {
  ErrorCodes,
  TableSourceError,
  buildErrorBody,
  type ErrorBody
} from './errorCodes';
import { loadTable, type TableSource } from './tableSource';
import { validateColumnMapping } from './validateMapping';
import {
  validateDiagnosisTransport,
  validateTableSourceTransport
} from './validateTransport';
import type { ColumnMapping, Table } from './types';

export interface RequestFailure {
  ok: false;
  status: number;
  body: ErrorBody;
  event: string;
}

export type RequestOutcome<T> = { ok: true; value: T } | RequestFailure;

export interface PreparedDiagnosis {
  table: Table;
  mapping: ColumnMapping;
}

function fail(status: number, event: string, body: ErrorBody): RequestFailure {
  return { ok: false, status, event, body };
}

export function measureBody(rawBody: unknown): number {
  if (typeof rawBody === 'string') return Buffer.byteLength(rawBody, 'utf8');
  if (rawBody == null) return 0;
  try {
    return Buffer.byteLength(JSON.stringify(rawBody), 'utf8');
  } catch {
    return 0;
  }
}

/**
 * Size guard + JSON parse. Vercel hands over an already-parsed object for
 * application/json requests and a raw string otherwise.
 */
export function parseRequestBody(rawBody: unknown): RequestOutcome<unknown> {
  const size = measureBody(rawBody);
  if (size > MAX_BODY_BYTES) {
    return fail(413, 'request_body_too_large', buildErrorBody([ErrorCodes.REQUEST_BODY_TOO_LARGE]));
  }

  if (typeof rawBody !== 'string') {
    return { ok: true, value: rawBody };
  }

  try {
    const parsed: unknown = JSON.parse(rawBody);
    return { ok: true, value: parsed };
  } catch {
    return fail(400, 'invalid_json_body', buildErrorBody([ErrorCodes.INVALID_JSON_BODY]));
  }
}

async function loadTableOutcome(source: TableSource): Promise<RequestOutcome<Table>> {
  try {
    return { ok: true, value: await loadTable(source) };
  } catch (err) {
    if (err instanceof TableSourceError) {
      return fail(400, 'table_source_rejected', buildErrorBody([err.code], [err.message]));
    }
    throw err;
  }
}

/**
 * Body carrying only a table source (inspection).
 */
export async function prepareTableRequest(rawBody: unknown): Promise<RequestOutcome<Table>> {
  const parsed = parseRequestBody(rawBody);
  if (!parsed.ok) return parsed;

  const transport = validateTableSourceTransport(parsed.value);
  if (!transport.ok) {
    return fail(transport.errorStatus, 'transport_validation_failed', transport.errorBody);
  }

  return loadTableOutcome(transport.value);
}

/**
 * Body carrying a table source and a column mapping (diagnosis, reports).
 */
export async function prepareDiagnosisRequest(
  rawBody: unknown
): Promise<RequestOutcome<PreparedDiagnosis>> {
  const parsed = parseRequestBody(rawBody);
  if (!parsed.ok) return parsed;

  const transport = validateDiagnosisTransport(parsed.value);
  if (!transport.ok) {
    return fail(transport.errorStatus, 'transport_validation_failed', transport.errorBody);
  }

  const table = await loadTableOutcome(transport.value.source);
  if (!table.ok) return table;

  const mapping = validateColumnMapping(transport.value.rawMapping, table.value);
  if (!mapping.ok) {
    return fail(400, 'mapping_rejected', buildErrorBody(mapping.errorCodes, mapping.details));
  }

  return { ok: true, value: { table: table.value, mapping: mapping.mapping } };
}
