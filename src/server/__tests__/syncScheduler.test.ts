// =============================================================================
// Sync Scheduler Tests
// =============================================================================

jest.mock('../utils/logger', () => ({
  __esModule: true,
  default: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

import logger from '../utils/logger';
import { SyncOrchestrator } from '../services/syncOrchestrator';
import { SyncScheduler } from '../services/syncScheduler';
import { createHarness, type TestHarness } from './helpers/fakeGateways';

const MINUTE = 60 * 1000;

describe('SyncScheduler', () => {
  let h: TestHarness;
  let orchestrator: SyncOrchestrator;
  let detect: jest.SpyInstance;
  let reconcile: jest.SpyInstance;
  let cleanup: jest.SpyInstance;
  let scheduler: SyncScheduler;

  beforeEach(async () => {
    h = await createHarness();
    orchestrator = new SyncOrchestrator({
      store: h.store,
      wrike: h.wrike,
      hubspot: h.hubspot,
      config: h.ctx.config,
      now: h.ctx.now,
    });
    detect = jest
      .spyOn(orchestrator, 'runChangeDetection')
      .mockResolvedValue({ status: 'skipped', reason: 'A sync run is already in progress' });
    reconcile = jest
      .spyOn(orchestrator, 'runReconciliation')
      .mockResolvedValue({ status: 'skipped', reason: 'A sync run is already in progress' });
    cleanup = jest.spyOn(orchestrator, 'cleanupOldChanges').mockResolvedValue(0);
    jest.useFakeTimers();
    scheduler = new SyncScheduler(orchestrator, {
      changeDetectionMs: 5 * MINUTE,
      reconciliationMs: 60 * MINUTE,
      cleanupMs: 120 * MINUTE,
    });
  });

  afterEach(async () => {
    scheduler.stop();
    jest.useRealTimers();
    jest.clearAllMocks();
    await h.store.close();
  });

  it('runs each job on its own interval', async () => {
    scheduler.start();

    await jest.advanceTimersByTimeAsync(60 * MINUTE);

    expect(detect).toHaveBeenCalledTimes(12);
    expect(reconcile).toHaveBeenCalledTimes(1);
    expect(cleanup).not.toHaveBeenCalled();

    await jest.advanceTimersByTimeAsync(60 * MINUTE);

    expect(cleanup).toHaveBeenCalledTimes(1);
  });

  it('ignores a second start', async () => {
    scheduler.start();
    scheduler.start();

    await jest.advanceTimersByTimeAsync(5 * MINUTE);

    expect(detect).toHaveBeenCalledTimes(1);
  });

  it('stops every timer', async () => {
    scheduler.start();
    expect(scheduler.isRunning()).toBe(true);

    scheduler.stop();
    await jest.advanceTimersByTimeAsync(120 * MINUTE);

    expect(scheduler.isRunning()).toBe(false);
    expect(detect).not.toHaveBeenCalled();
  });

  it('logs a failed job and keeps the schedule', async () => {
    detect.mockRejectedValueOnce(new Error('Wrike unavailable'));
    scheduler.start();

    await jest.advanceTimersByTimeAsync(10 * MINUTE);

    expect(logger.error).toHaveBeenCalledWith('Scheduled change detection failed', { error: 'Wrike unavailable' });
    expect(detect).toHaveBeenCalledTimes(2);
  });

  it('logs a failed cleanup', async () => {
    cleanup.mockRejectedValueOnce(new Error('disk full'));

    await scheduler.cleanup();

    expect(logger.error).toHaveBeenCalledWith('Scheduled change-queue cleanup failed', { error: 'disk full' });
  });

  it('derives intervals from the sync settings', async () => {
    const fromConfig = SyncScheduler.fromConfig(orchestrator, {
      changeDetectionIntervalMinutes: 2,
      reconciliationIntervalHours: 1,
    });
    fromConfig.start();

    await jest.advanceTimersByTimeAsync(60 * MINUTE);
    fromConfig.stop();

    expect(detect).toHaveBeenCalledTimes(30);
    expect(reconcile).toHaveBeenCalledTimes(1);
  });
});
