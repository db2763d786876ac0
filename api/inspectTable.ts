// api/inspectTable.ts
// First step of the mapping flow: columns, preview rows and a suggested mapping.

import type { VercelRequest, VercelResponse } from '@vercel/node';

import { prepareTableRequest } from '../engine/diagnosisRequest';
import { inspectTable } from '../engine/mappingAutoSuggest';
import { logInfo } from '../engine/log';
import { rejectMethod, sendInternalError, sendRequestFailure } from './_shared';

const ENDPOINT = 'inspectTable';

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'POST') {
    return rejectMethod(res, ENDPOINT, req.method, 'POST');
  }

  try {
    const prepared = await prepareTableRequest(req.body);
    if (!prepared.ok) {
      return sendRequestFailure(res, ENDPOINT, prepared);
    }

    const inspection = inspectTable(prepared.value);
    const suggested = Object.values(inspection.suggested_mapping).filter(
      (column) => column !== inspection.unset_value
    ).length;

    logInfo('table_inspected_200', {
      endpoint: ENDPOINT,
      column_count: inspection.columns.length,
      row_count: inspection.row_count,
      suggested_roles: suggested
    });

    return res.status(200).json(inspection);
  } catch (err) {
    return sendInternalError(res, ENDPOINT, err);
  }
}
