// =============================================================================
// Report Routes — read-only views over the sync store
// =============================================================================
import { Router, Request, Response } from 'express';
import type { RequestHandler } from '../utils/authMiddleware';
import type { SyncOrchestrator } from '../services/syncOrchestrator';
import { fieldChangesToCsv, issuesToCsv } from '../utils/csv';
import logger from '../utils/logger';
import { errorMessage } from '../utils/sanitizeError';

/** `?limit=` clamped to [1, max] */
export function parseLimit(value: unknown, fallback: number, max = 500): number {
  const parsed = typeof value === 'string' ? parseInt(value, 10) : NaN;
  return Math.min(max, Math.max(1, Number.isNaN(parsed) ? fallback : parsed));
}

function parseId(value: string): number | null {
  return /^\d+$/.test(value) ? Number(value) : null;
}

export default function createReportRoutes(orchestrator: SyncOrchestrator, auth: RequestHandler): Router {
  const router = Router();
  router.use(auth);

  /* ── Activities ── */
  router.get('/activities', async (req: Request, res: Response): Promise<void> => {
    try {
      const activities = await orchestrator.listActivities(parseLimit(req.query.limit, 50));
      res.json({ activities });
    } catch (err) {
      logger.error('Activity list error', { error: errorMessage(err) });
      res.status(500).json({ error: 'Failed to fetch activities' });
    }
  });

  router.get('/activities/:id/changes', async (req: Request, res: Response): Promise<void> => {
    const id = parseId(req.params.id);
    if (id === null) {
      res.status(400).json({ error: 'Activity id must be numeric' });
      return;
    }
    try {
      const activity = await orchestrator.getActivity(id);
      if (!activity) {
        res.status(404).json({ error: 'Activity not found' });
        return;
      }
      res.json({ activity, changes: await orchestrator.getActivityChanges(id) });
    } catch (err) {
      logger.error('Activity changes error', { id, error: errorMessage(err) });
      res.status(500).json({ error: 'Failed to fetch activity changes' });
    }
  });

  router.get('/activities/:id/export', async (req: Request, res: Response): Promise<void> => {
    const id = parseId(req.params.id);
    if (id === null) {
      res.status(400).json({ error: 'Activity id must be numeric' });
      return;
    }
    try {
      const activity = await orchestrator.getActivity(id);
      if (!activity) {
        res.status(404).json({ error: 'Activity not found' });
        return;
      }
      const csv = fieldChangesToCsv(await orchestrator.getActivityChanges(id));
      res
        .status(200)
        .type('text/csv')
        .set('Content-Disposition', `attachment; filename="sync-activity-${id}.csv"`)
        .send(csv);
    } catch (err) {
      logger.error('Activity export error', { id, error: errorMessage(err) });
      res.status(500).json({ error: 'Failed to export activity' });
    }
  });

  /* ── Issues ── */
  router.get('/issues', async (req: Request, res: Response): Promise<void> => {
    try {
      const issues = await orchestrator.listUnresolvedIssues(parseLimit(req.query.limit, 100));
      res.json({ issues });
    } catch (err) {
      logger.error('Issue list error', { error: errorMessage(err) });
      res.status(500).json({ error: 'Failed to fetch issues' });
    }
  });

  router.get('/issues/export', async (req: Request, res: Response): Promise<void> => {
    try {
      const issues = await orchestrator.listUnresolvedIssues(parseLimit(req.query.limit, 5000, 5000));
      res
        .status(200)
        .type('text/csv')
        .set('Content-Disposition', 'attachment; filename="reconciliation-issues.csv"')
        .send(issuesToCsv(issues));
    } catch (err) {
      logger.error('Issue export error', { error: errorMessage(err) });
      res.status(500).json({ error: 'Failed to export issues' });
    }
  });

  router.post('/issues/:id/resolve', async (req: Request, res: Response): Promise<void> => {
    const id = parseId(req.params.id);
    if (id === null) {
      res.status(400).json({ error: 'Issue id must be numeric' });
      return;
    }
    try {
      const resolved = await orchestrator.resolveIssue(id);
      if (!resolved) {
        res.status(404).json({ error: 'Issue not found or already resolved' });
        return;
      }
      logger.info('Issue resolved', { id, operator: req.operator });
      res.json({ id, resolved: true });
    } catch (err) {
      logger.error('Issue resolve error', { id, error: errorMessage(err) });
      res.status(500).json({ error: 'Failed to resolve issue' });
    }
  });

  /* ── Reconciliation reports ── */
  router.get('/reconciliation/last', async (_req: Request, res: Response): Promise<void> => {
    try {
      const report = await orchestrator.getLastReconciliationReport();
      if (!report) {
        res.status(404).json({ error: 'No reconciliation report yet' });
        return;
      }
      res.json(report);
    } catch (err) {
      logger.error('Reconciliation report error', { error: errorMessage(err) });
      res.status(500).json({ error: 'Failed to fetch reconciliation report' });
    }
  });

  router.get('/reconciliation', async (req: Request, res: Response): Promise<void> => {
    try {
      const reports = await orchestrator.listReconciliationReports(parseLimit(req.query.limit, 20, 100));
      res.json({ reports });
    } catch (err) {
      logger.error('Reconciliation history error', { error: errorMessage(err) });
      res.status(500).json({ error: 'Failed to fetch reconciliation reports' });
    }
  });

  /* ── Change queue ── */
  router.get('/changes/stats', async (req: Request, res: Response): Promise<void> => {
    const hours = parseLimit(req.query.hours, 24, 24 * 90);
    try {
      const since = new Date(Date.now() - hours * 60 * 60 * 1000);
      res.json({ since, stats: await orchestrator.getChangeStats(since) });
    } catch (err) {
      logger.error('Change stats error', { error: errorMessage(err) });
      res.status(500).json({ error: 'Failed to fetch change stats' });
    }
  });

  /* ── Identity map ── */
  router.get('/mappings', async (req: Request, res: Response): Promise<void> => {
    try {
      const mappings = await orchestrator.listMappings(parseLimit(req.query.limit, 100));
      res.json({ mappings, counts: await orchestrator.countMappings() });
    } catch (err) {
      logger.error('Mapping list error', { error: errorMessage(err) });
      res.status(500).json({ error: 'Failed to fetch mappings' });
    }
  });

  return router;
}
