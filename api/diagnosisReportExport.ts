// api/diagnosisReportExport.ts
// Runs a diagnosis and streams the report workbook back as an attachment.

import type { VercelRequest, VercelResponse } from '@vercel/node';

import { prepareDiagnosisRequest } from '../engine/diagnosisRequest';
import { runDiagnosis } from '../engine/diagnosisEngine';
import { XLSX_CONTENT_TYPE, createDiagnosisReportWorkbook } from '../engine/excelExport';
import { logInfo } from '../engine/log';
import { rejectMethod, sendInternalError, sendRequestFailure } from './_shared';

const ENDPOINT = 'diagnosisReportExport';

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'POST') {
    return rejectMethod(res, ENDPOINT, req.method, 'POST');
  }

  try {
    const prepared = await prepareDiagnosisRequest(req.body);
    if (!prepared.ok) {
      return sendRequestFailure(res, ENDPOINT, prepared);
    }

    const result = runDiagnosis(prepared.value.table, prepared.value.mapping);
    const dateISO = new Date().toISOString().slice(0, 10);
    const buffer = await createDiagnosisReportWorkbook(result, dateISO);

    logInfo('report_exported_200', {
      endpoint: ENDPOINT,
      row_count: result.row_count,
      bytes: buffer.length
    });

    res.setHeader('Content-Type', XLSX_CONTENT_TYPE);
    res.setHeader('Content-Disposition', `attachment; filename="Diagnosis_Report_${dateISO}.xlsx"`);
    return res.status(200).send(buffer);
  } catch (err) {
    return sendInternalError(res, ENDPOINT, err);
  }
}
