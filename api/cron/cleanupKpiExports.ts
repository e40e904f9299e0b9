// api/cron/cleanupKpiExports.ts
// Purpose: Delete stored KPI export XLSX blobs older than 2 hours.
// Schedule: every 1 hour (via Vercel Cron)
// Supports: dry-run mode (no deletions)

import { list, del } from '@vercel/blob';
import { queryValue, rejectMethod, type HandlerRequest, type HandlerResponse } from '../../engine/httpTypes';
import { logEngineError, logEngineInfo } from '../../engine/logger';

export const TWO_HOURS_MS = 2 * 60 * 60 * 1000;
const SAMPLE_SIZE = 5;

export interface StoredBlob {
  url: string;
  pathname: string;
  uploadedAt: Date;
}

export interface BlobStore {
  list(options: { prefix: string; cursor?: string; limit: number }): Promise<{ blobs: StoredBlob[]; cursor?: string }>;
  del(url: string): Promise<void>;
}

export const vercelBlobStore: BlobStore = {
  list: (options) => list(options),
  del: (url) => del(url)
};

export interface CleanupReport {
  ok: true;
  dry_run: boolean;
  prefix: string;
  scanned: number;
  eligible: number;
  deleted: number;
  would_delete: number;
  sample_deleted: string[];
  sample_kept: string[];
}

export function parseBool(v: unknown): boolean {
  const s = String(v ?? '').trim().toLowerCase();
  return s === '1' || s === 'true' || s === 'yes' || s === 'y';
}

export async function cleanupExports(
  store: BlobStore,
  prefix: string,
  dryRun: boolean,
  now: number = Date.now()
): Promise<CleanupReport> {
  let scanned = 0;
  let eligible = 0;
  let deleted = 0;
  const sample_deleted: string[] = [];
  const sample_kept: string[] = [];

  let cursor: string | undefined;
  do {
    const page = await store.list({ prefix, cursor, limit: 1000 });
    scanned += page.blobs.length;

    for (const blob of page.blobs) {
      const uploadedAt = blob.uploadedAt.getTime();
      // Unknown age is kept.
      if (!Number.isFinite(uploadedAt) || now - uploadedAt <= TWO_HOURS_MS) {
        if (sample_kept.length < SAMPLE_SIZE) sample_kept.push(blob.pathname);
        continue;
      }

      eligible += 1;
      if (!dryRun) {
        await store.del(blob.url);
        deleted += 1;
      }
      if (sample_deleted.length < SAMPLE_SIZE) sample_deleted.push(blob.pathname);
    }

    cursor = page.cursor;
  } while (cursor);

  return {
    ok: true,
    dry_run: dryRun,
    prefix,
    scanned,
    eligible,
    deleted,
    would_delete: dryRun ? eligible : 0,
    sample_deleted,
    sample_kept
  };
}

export async function handleCleanup(req: HandlerRequest, res: HandlerResponse, store: BlobStore): Promise<void> {
  // Cron calls are GET by default
  if (req.method !== 'GET') {
    rejectMethod(res, 'GET');
    return;
  }

  const dryRun = parseBool(queryValue(req.query.dry_run)) || parseBool(process.env.CLEANUP_DRY_RUN);
  const prefix = queryValue(req.query.prefix) ?? process.env.KPI_EXPORTS_PREFIX ?? 'kpi-exports/';

  try {
    const report = await cleanupExports(store, prefix, dryRun);
    logEngineInfo('cleanup_completed', {
      dry_run: dryRun,
      prefix,
      scanned: report.scanned,
      eligible: report.eligible,
      deleted: report.deleted
    });
    res.status(200).json(report);
  } catch (err) {
    logEngineError('cleanup_failed', {
      prefix,
      message: err instanceof Error ? err.message : String(err)
    });
    res.status(500).json({ ok: false, error: 'Cleanup failed', dry_run: dryRun, prefix });
  }
}

export default async function handler(req: HandlerRequest, res: HandlerResponse): Promise<void> {
  await handleCleanup(req, res, vercelBlobStore);
}
