// engine/errorCodes.ts
// Canonical error codes for the Diagnosis Engine.
//
// Code ranges:
//
//  E600–E699 → JSON / transport issues (request shape, size, row limits)
//  E700–E799 → Column mapping issues (unknown roles, dangling column names)
//  E800–E899 → Table source issues (CSV / workbook decoding)
//
// NOTE:
// - The KPI core never produces an error code. Missing columns, malformed
//   cells and zero denominators are all reported as null KPI values.
// - Error codes are additive; the HTTP status is chosen by the entrypoint.

export const ErrorCodes = {
  // 6xx – JSON / structural issues
  INVALID_JSON_BODY: 'E601',          // JSON parse failed
  INVALID_REQUEST_STRUCTURE: 'E602',  // body is null / not an object
  INVALID_ROWS_ARRAY: 'E603',         // rows present but not an array
  EMPTY_TABLE: 'E604',                // table source holds no data rows
  INVALID_TRANSPORT_PAYLOAD: 'E605',  // a row is not a plain object
  INVALID_TABLE_SOURCE: 'E606',       // none or several of rows / csv / file_base64
  INTERNAL_ENGINE_ERROR: 'E607',
  REQUEST_BODY_TOO_LARGE: 'E608',
  TOO_MANY_ROWS: 'E609',
  REPORT_STORAGE_FAILED: 'E610',      // report built but the blob upload failed

  // 7xx – Column mapping
  INVALID_MAPPING_OBJECT: 'E701',     // mapping missing or not an object
  UNKNOWN_MAPPING_ROLE: 'E702',       // key is not a semantic role
  INVALID_MAPPING_VALUE: 'E703',      // value is not a string / null
  MAPPED_COLUMN_NOT_FOUND: 'E704',    // column name absent from the table

  // 8xx – Table source decoding
  UNREADABLE_CSV: 'E801',
  UNREADABLE_WORKBOOK: 'E802',
  WORKSHEET_NOT_FOUND: 'E803',
  MISSING_HEADER_ROW: 'E804',
  INVALID_BASE64: 'E805'
} as const;

export type ErrorCodeKey = keyof typeof ErrorCodes;
export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// Human-readable descriptions (for logs and error bodies)
export const ErrorCodeDescriptions: Record<ErrorCode, string> = {
  [ErrorCodes.INVALID_JSON_BODY]: 'Request body is not valid JSON.',
  [ErrorCodes.INVALID_REQUEST_STRUCTURE]: 'Request structure is invalid or not a non-null object.',
  [ErrorCodes.INVALID_ROWS_ARRAY]: 'The "rows" property is not a valid array.',
  [ErrorCodes.EMPTY_TABLE]: 'The table holds no data rows.',
  [ErrorCodes.INVALID_TRANSPORT_PAYLOAD]: 'One or more rows are not valid objects.',
  [ErrorCodes.INVALID_TABLE_SOURCE]: 'Provide exactly one of "rows", "csv" or "file_base64".',
  [ErrorCodes.INTERNAL_ENGINE_ERROR]: 'Internal backend processing failure.',
  [ErrorCodes.REQUEST_BODY_TOO_LARGE]: 'Request body too large for the diagnosis engine.',
  [ErrorCodes.TOO_MANY_ROWS]: 'The table exceeds the maximum number of rows.',
  [ErrorCodes.REPORT_STORAGE_FAILED]: 'The report was built but could not be stored for download.',

  [ErrorCodes.INVALID_MAPPING_OBJECT]: 'The "mapping" property is missing or is not an object.',
  [ErrorCodes.UNKNOWN_MAPPING_ROLE]: 'The mapping names a role that does not exist.',
  [ErrorCodes.INVALID_MAPPING_VALUE]: 'Mapping values must be column names, "(none)" or null.',
  [ErrorCodes.MAPPED_COLUMN_NOT_FOUND]: 'The mapping names a column that is not in the table.',

  [ErrorCodes.UNREADABLE_CSV]: 'CSV text could not be parsed.',
  [ErrorCodes.UNREADABLE_WORKBOOK]: 'Excel workbook could not be read.',
  [ErrorCodes.WORKSHEET_NOT_FOUND]: 'Requested worksheet does not exist in the workbook.',
  [ErrorCodes.MISSING_HEADER_ROW]: 'Header row is empty or missing.',
  [ErrorCodes.INVALID_BASE64]: 'file_base64 is not valid base64 content.'
};

// Helper: add an error code only once, preserving insertion order
export function addErrorCode(list: ErrorCode[], code: ErrorCode): void {
  if (!list.includes(code)) {
    list.push(code);
  }
}

export interface ErrorBody {
  error: string;
  error_codes: ErrorCode[];
  details?: string[];
}

export function buildErrorBody(codes: ErrorCode[], details?: string[]): ErrorBody {
  const first = codes[0] ?? ErrorCodes.INTERNAL_ENGINE_ERROR;
  const body: ErrorBody = {
    error: ErrorCodeDescriptions[first],
    error_codes: codes.length > 0 ? codes : [first]
  };
  if (details && details.length > 0) {
    body.details = details;
  }
  return body;
}

/**
 * Raised by the table ingestion adapters. Carries the error code the HTTP
 * entrypoints report back to the caller.
 */
export class TableSourceError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = 'TableSourceError';
    this.code = code;
  }
}
