// api/cron/cleanupDiagnosisReports.ts
// Purpose: Delete published diagnosis report blobs older than 2 hours.
// Schedule: every 1 hour (vercel.json)
// Supports: dry-run mode (no deletions)

import type { VercelRequest, VercelResponse } from '@vercel/node';
import { del, list } from '@vercel/blob';

import { DEFAULT_REPORTS_PREFIX, REPORT_TTL_MS } from '../../engine/constants';
import { errorMessage, logError, logInfo } from '../../engine/log';

const SAMPLE_SIZE = 5;

export function parseBool(v: unknown): boolean {
  const s = String(Array.isArray(v) ? v[0] : v ?? '').trim().toLowerCase();
  return s === '1' || s === 'true' || s === 'yes' || s === 'y';
}

function firstQueryValue(v: string | string[] | undefined): string | undefined {
  return Array.isArray(v) ? v[0] : v;
}

export default async function handler(req: VercelRequest, res: VercelResponse) {
  // Cron calls are GET
  if (req.method !== 'GET') {
    res.setHeader('Allow', 'GET');
    return res.status(405).json({ error: 'Method Not Allowed' });
  }

  const now = Date.now();

  const dry_run = parseBool(req.query.dry_run) || parseBool(process.env.CLEANUP_DRY_RUN);

  // Only ever touch report exports; keep aligned with the publish endpoint.
  const prefix =
    firstQueryValue(req.query.prefix) || process.env.DIAGNOSIS_REPORTS_PREFIX || DEFAULT_REPORTS_PREFIX;

  let scanned = 0;
  let eligible = 0;
  let deleted = 0;
  const sample_deleted: string[] = [];
  const sample_kept: string[] = [];

  try {
    let cursor: string | undefined;

    do {
      const page = await list({ prefix, cursor, limit: 1000 });
      scanned += page.blobs.length;

      const expired: string[] = [];
      for (const blob of page.blobs) {
        const uploadedAt = blob.uploadedAt.getTime();

        // Unknown age is never deleted.
        if (!Number.isFinite(uploadedAt) || now - uploadedAt <= REPORT_TTL_MS) {
          if (sample_kept.length < SAMPLE_SIZE) sample_kept.push(blob.pathname);
          continue;
        }

        eligible += 1;
        expired.push(blob.url);
        if (sample_deleted.length < SAMPLE_SIZE) sample_deleted.push(blob.url);
      }

      if (!dry_run && expired.length > 0) {
        await del(expired);
        deleted += expired.length;
      }

      cursor = page.hasMore ? page.cursor : undefined;
    } while (cursor);

    logInfo('report_cleanup_completed', { dry_run, prefix, scanned, eligible, deleted });

    return res.status(200).json({
      ok: true,
      dry_run,
      prefix,
      scanned,
      eligible,
      deleted,
      would_delete: dry_run ? eligible : 0,
      sample_deleted,
      sample_kept
    });
  } catch (err) {
    logError('report_cleanup_failed', { dry_run, prefix, message: errorMessage(err) });
    return res.status(500).json({
      ok: false,
      error: 'Cleanup failed',
      dry_run,
      prefix
    });
  }
}
