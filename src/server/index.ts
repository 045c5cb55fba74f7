// =============================================================================
// Server Entry — Express application bootstrap
// =============================================================================
import express from 'express';
import cors from 'cors';

import config, { assertRuntimeConfig, loadSyncConfig } from './config';
import logger from './utils/logger';
import { createAuthMiddleware } from './utils/authMiddleware';
import { errorMessage } from './utils/sanitizeError';
import { createSyncStore } from './services/syncStore';
import { SyncOrchestrator } from './services/syncOrchestrator';
import { SyncScheduler } from './services/syncScheduler';
import { WrikeClient } from './services/wrikeClient';
import { HubSpotClient } from './services/hubspotClient';

// Routes
import createSyncRoutes from './routes/sync';
import createReportRoutes from './routes/reports';

/**
 * Builds the HTTP app around one orchestrator.
 * @param jwtSecret — secret the operator tokens are signed with
 */
export function createApp(orchestrator: SyncOrchestrator, jwtSecret: string = config.jwtSecret): express.Express {
  const app = express();
  const auth = createAuthMiddleware(jwtSecret);

  /* ── Global middleware ── */
  app.use(cors({ origin: true, credentials: true }));
  app.use(express.json({ limit: '1mb' }));

  // Request logging
  app.use((req, _res, next) => {
    logger.debug(`${req.method} ${req.path}`, {
      ip: req.ip,
      userAgent: req.get('user-agent')?.substring(0, 60),
    });
    next();
  });

  /* ── Health check ── */
  app.get('/api/health', (_req, res) => {
    res.json({
      status: 'ok',
      syncRunning: orchestrator.isRunning,
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
    });
  });

  /* ── API routes ── */
  app.use('/api/sync', createSyncRoutes(orchestrator, auth));
  app.use('/api/reports', createReportRoutes(orchestrator, auth));

  app.use('/api', (_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  /* ── Global error handler ── */
  app.use(
    (
      err: Error,
      _req: express.Request,
      res: express.Response,
      _next: express.NextFunction,
    ) => {
      logger.error('Unhandled server error', { error: err.message, stack: err.stack });
      res.status(500).json({ error: 'Internal server error' });
    },
  );

  return app;
}

/* ── Start ── */
async function start(): Promise<void> {
  try {
    assertRuntimeConfig(config);
    const syncConfig = loadSyncConfig();

    const store = await createSyncStore(config);
    await store.init();
    logger.info(`Sync store ready [${config.storeBackend}]`);

    const orchestrator = new SyncOrchestrator({
      store,
      wrike: WrikeClient.fromConfig(config),
      hubspot: HubSpotClient.fromConfig(config),
      config: syncConfig,
    });

    const scheduler = SyncScheduler.fromConfig(orchestrator, syncConfig.sync);
    if (config.schedulerEnabled) scheduler.start();

    const server = createApp(orchestrator).listen(config.port, () => {
      logger.info(`Server running on port ${config.port} [${config.nodeEnv}]`);
    });

    // Graceful shutdown — stop scheduler and close the store before exit
    const shutdown = (signal: string): void => {
      logger.info(`${signal} received, shutting down`);
      scheduler.stop();
      server.close();
      store.close().catch((err: unknown) => {
        logger.error('Failed to close sync store', { error: errorMessage(err) });
      });
    };
    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (err) {
    logger.error('Failed to start server', { error: errorMessage(err) });
    process.exit(1);
  }
}

if (require.main === module) {
  void start();
}
