import type { VercelRequest, VercelResponse } from '@vercel/node';

import { XLSX_CONTENT_TYPE, createDiagnosisTemplateWorkbook } from '../engine/excelExport';
import { sendInternalError } from './_shared';

const ENDPOINT = 'diagnosisTemplateDownload';

// Serves the input template (one recommended header per role) as a real XLSX binary
export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'GET' && req.method !== 'HEAD') {
    res.setHeader('Allow', 'GET, HEAD');
    return res.status(405).json({ error: 'Method Not Allowed' });
  }

  let buffer: Buffer;
  try {
    buffer = await createDiagnosisTemplateWorkbook();
  } catch (err) {
    return sendInternalError(res, ENDPOINT, err);
  }

  res.setHeader('Content-Type', XLSX_CONTENT_TYPE);
  res.setHeader('Content-Disposition', 'attachment; filename="Diagnosis_Input_Template.xlsx"');
  res.setHeader('Content-Length', buffer.length);

  // HEAD request: headers only
  if (req.method === 'HEAD') {
    return res.status(200).end();
  }

  return res.status(200).send(buffer);
}
