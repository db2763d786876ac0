// api/_shared.ts
// Response helpers shared by the entrypoints (underscore prefix: not a route).

import type { VercelResponse } from '@vercel/node';
import { ErrorCodes, buildErrorBody } from '../engine/errorCodes';
import type { RequestFailure } from '../engine/diagnosisRequest';
import { errorMessage, logError, logWarn } from '../engine/log';

export function rejectMethod(
  res: VercelResponse,
  endpoint: string,
  method: string | undefined,
  allow: string
): VercelResponse {
  res.setHeader('Allow', allow);
  logWarn('method_not_allowed', { endpoint, method: method ?? null });
  return res.status(405).json({ error: 'Method Not Allowed' });
}

export function sendRequestFailure(
  res: VercelResponse,
  endpoint: string,
  failure: RequestFailure
): VercelResponse {
  const ctx = { endpoint, status: failure.status, error_codes: failure.body.error_codes };
  if (failure.status >= 500) {
    logError(failure.event, ctx);
  } else {
    logWarn(failure.event, ctx);
  }
  return res.status(failure.status).json(failure.body);
}

export function sendInternalError(
  res: VercelResponse,
  endpoint: string,
  err: unknown
): VercelResponse {
  logError('unhandled_exception', { endpoint, message: errorMessage(err) });
  return res.status(500).json(buildErrorBody([ErrorCodes.INTERNAL_ENGINE_ERROR]));
}
