// api/diagnosisReportPublish.ts
// Runs a diagnosis, stores the report workbook in Vercel Blob and returns a
// short-lived download_url (see api/cron/cleanupDiagnosisReports.ts).

import type { VercelRequest, VercelResponse } from '@vercel/node';
import crypto from 'node:crypto';
import { put } from '@vercel/blob';

import { DEFAULT_REPORTS_PREFIX } from '../engine/constants';
import { prepareDiagnosisRequest } from '../engine/diagnosisRequest';
import { runDiagnosis } from '../engine/diagnosisEngine';
import { ErrorCodes, buildErrorBody } from '../engine/errorCodes';
import { XLSX_CONTENT_TYPE, createDiagnosisReportWorkbook } from '../engine/excelExport';
import { errorMessage, logError, logInfo } from '../engine/log';
import type { Maybe } from '../engine/types';
import { rejectMethod, sendInternalError, sendRequestFailure } from './_shared';

const ENDPOINT = 'diagnosisReportPublish';

export interface DiagnosisReportPublishResponse {
  download_url: string;
  composite_score: Maybe<number>;
  ui_message: string;
}

// "YYYY-MM-DDTHH-mm-ssZ" (safe in blob keys)
export function toSafeIsoTimestamp(d: Date): string {
  return d
    .toISOString()
    .replace(/\.\d{3}Z$/, 'Z')
    .replace(/:/g, '-');
}

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'POST') {
    return rejectMethod(res, ENDPOINT, req.method, 'POST');
  }

  let buffer: Buffer;
  let composite: Maybe<number>;
  const now = new Date();
  const dateISO = now.toISOString().slice(0, 10);

  try {
    const prepared = await prepareDiagnosisRequest(req.body);
    if (!prepared.ok) {
      return sendRequestFailure(res, ENDPOINT, prepared);
    }

    const result = runDiagnosis(prepared.value.table, prepared.value.mapping);
    composite = result.composite_score;
    buffer = await createDiagnosisReportWorkbook(result, dateISO);
  } catch (err) {
    return sendInternalError(res, ENDPOINT, err);
  }

  try {
    const prefix = process.env.DIAGNOSIS_REPORTS_PREFIX || DEFAULT_REPORTS_PREFIX;
    const pathname = `${prefix}${toSafeIsoTimestamp(now)}_${crypto.randomUUID()}.xlsx`;

    const blob = await put(pathname, buffer, {
      access: 'public',
      contentType: XLSX_CONTENT_TYPE,
      addRandomSuffix: false
    });

    const response: DiagnosisReportPublishResponse = {
      download_url: blob.url,
      composite_score: composite,
      ui_message: `Diagnosis report is ready. Click the link to download Diagnosis_Report_${dateISO}.xlsx.`
    };

    logInfo('report_published_200', { endpoint: ENDPOINT, pathname, bytes: buffer.length });
    return res.status(200).json(response);
  } catch (err) {
    logError('report_storage_failed', { endpoint: ENDPOINT, message: errorMessage(err) });
    return res.status(500).json(buildErrorBody([ErrorCodes.REPORT_STORAGE_FAILED]));
  }
}
