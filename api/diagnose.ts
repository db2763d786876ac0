// api/diagnose.ts
// Diagnosis HTTP entrypoint: table + column mapping → scored diagnosis.

import type { VercelRequest, VercelResponse } from '@vercel/node';

import { prepareDiagnosisRequest } from '../engine/diagnosisRequest';
import { runDiagnosis } from '../engine/diagnosisEngine';
import { logInfo } from '../engine/log';
import { rejectMethod, sendInternalError, sendRequestFailure } from './_shared';

const ENDPOINT = 'diagnose';

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'POST') {
    return rejectMethod(res, ENDPOINT, req.method, 'POST');
  }

  try {
    const prepared = await prepareDiagnosisRequest(req.body);
    if (!prepared.ok) {
      return sendRequestFailure(res, ENDPOINT, prepared);
    }

    const { table, mapping } = prepared.value;
    const result = runDiagnosis(table, mapping);

    logInfo('diagnosis_completed_200', {
      endpoint: ENDPOINT,
      row_count: result.row_count,
      composite_score: result.composite_score,
      composite_light: result.composite_light
    });

    return res.status(200).json(result);
  } catch (err) {
    return sendInternalError(res, ENDPOINT, err);
  }
}
