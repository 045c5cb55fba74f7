// =============================================================================
// Sync Routes — Trigger & monitor sync operations
// =============================================================================
import { Router, Request, Response } from 'express';
import type { RequestHandler } from '../utils/authMiddleware';
import { SyncCycleError, type SyncOrchestrator } from '../services/syncOrchestrator';
import logger from '../utils/logger';
import { errorMessage, safeErrorMessage } from '../utils/sanitizeError';
import type { ExternalSystem } from '../types';

function isExternalSystem(value: string): value is ExternalSystem {
  return value === 'wrike' || value === 'hubspot';
}

export default function createSyncRoutes(orchestrator: SyncOrchestrator, auth: RequestHandler): Router {
  const router = Router();
  router.use(auth);

  /* ── Full cycle ── */
  router.post('/run', async (_req: Request, res: Response): Promise<void> => {
    try {
      const result = await orchestrator.runCycle();
      if (result.status === 'skipped') {
        res.status(409).json(result);
        return;
      }
      res.json(result);
    } catch (err) {
      if (err instanceof SyncCycleError) {
        res.status(500).json({ error: err.message, result: err.result });
        return;
      }
      logger.error('Sync run error', { error: errorMessage(err) });
      res.status(500).json({ error: 'Sync failed' });
    }
  });

  /* ── Reconciliation audit ── */
  router.post('/reconcile', async (_req: Request, res: Response): Promise<void> => {
    try {
      const result = await orchestrator.runReconciliation();
      res.status(result.status === 'skipped' ? 409 : 200).json(result);
    } catch (err) {
      logger.error('Reconciliation error', { error: errorMessage(err) });
      res.status(500).json({ error: 'Reconciliation failed', detail: safeErrorMessage(err) });
    }
  });

  /* ── Change detection + queue drain ── */
  router.post('/detect', async (_req: Request, res: Response): Promise<void> => {
    try {
      const result = await orchestrator.runChangeDetection();
      res.status(result.status === 'skipped' ? 409 : 200).json(result);
    } catch (err) {
      logger.error('Change detection error', { error: errorMessage(err) });
      res.status(500).json({ error: 'Change detection failed', detail: safeErrorMessage(err) });
    }
  });

  /* ── Single record (event-driven) ── */
  router.post('/records/:source/:id', async (req: Request, res: Response): Promise<void> => {
    const { source, id } = req.params;
    if (!isExternalSystem(source)) {
      res.status(400).json({ error: `Unknown source system: ${source}` });
      return;
    }
    try {
      const result = await orchestrator.syncSingleRecord(source, id);
      res.status(result.status === 'queued' ? 202 : 200).json(result);
    } catch (err) {
      logger.error('Single-record sync error', { source, id, error: errorMessage(err) });
      res.status(500).json({ error: 'Record sync failed', detail: safeErrorMessage(err) });
    }
  });

  /* ── Status ── */
  router.get('/status', async (_req: Request, res: Response): Promise<void> => {
    try {
      res.json(await orchestrator.getStatus());
    } catch (err) {
      logger.error('Sync status error', { error: errorMessage(err) });
      res.status(500).json({ error: 'Failed to fetch sync status' });
    }
  });

  /* ── Preflight ── */
  router.get('/verify', async (_req: Request, res: Response): Promise<void> => {
    try {
      const report = await orchestrator.verifyConfiguration();
      res.json({ ...report, mapping: await orchestrator.buildMappingReport() });
    } catch (err) {
      logger.error('Preflight verify error', { error: errorMessage(err) });
      res.status(500).json({ error: 'Verification failed' });
    }
  });

  router.get('/test', async (_req: Request, res: Response): Promise<void> => {
    try {
      res.json(await orchestrator.testConnections());
    } catch (err) {
      logger.error('Connection test error', { error: errorMessage(err) });
      res.status(500).json({ error: 'Connection test failed' });
    }
  });

  return router;
}
