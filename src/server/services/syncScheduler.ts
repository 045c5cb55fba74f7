// =============================================================================
// Sync Scheduler
// =============================================================================
// Three periodic jobs against one orchestrator:
//
//   1. Change detection + queue drain   every changeDetectionIntervalMinutes
//   2. Reconciliation audit             every reconciliationIntervalHours
//   3. Change-queue cleanup             once a day
//
// A job that finds the orchestrator busy is skipped until its next tick.
// Errors are logged; a timer callback never throws.
// =============================================================================
import logger from '../utils/logger';
import { errorMessage } from '../utils/sanitizeError';
import type { SyncOrchestrator } from './syncOrchestrator';

const MINUTE_MS = 60 * 1000;
const CLEANUP_INTERVAL_MS = 24 * 60 * MINUTE_MS;

export interface SchedulerIntervals {
  changeDetectionMs: number;
  reconciliationMs: number;
  cleanupMs: number;
}

export class SyncScheduler {
  private handles: Array<ReturnType<typeof setInterval>> = [];
  private readonly intervals: SchedulerIntervals;

  constructor(
    private readonly orchestrator: SyncOrchestrator,
    intervals: Partial<SchedulerIntervals> & { changeDetectionMs: number; reconciliationMs: number },
  ) {
    this.intervals = { cleanupMs: CLEANUP_INTERVAL_MS, ...intervals };
  }

  /** Intervals from the sync section of the mapping file */
  static fromConfig(
    orchestrator: SyncOrchestrator,
    sync: { changeDetectionIntervalMinutes: number; reconciliationIntervalHours: number },
  ): SyncScheduler {
    return new SyncScheduler(orchestrator, {
      changeDetectionMs: sync.changeDetectionIntervalMinutes * MINUTE_MS,
      reconciliationMs: sync.reconciliationIntervalHours * 60 * MINUTE_MS,
    });
  }

  async detectChanges(): Promise<void> {
    try {
      const result = await this.orchestrator.runChangeDetection();
      if (result.status === 'skipped') logger.debug('Scheduled change detection skipped', { reason: result.reason });
    } catch (err) {
      logger.error('Scheduled change detection failed', { error: errorMessage(err) });
    }
  }

  async reconcile(): Promise<void> {
    try {
      const result = await this.orchestrator.runReconciliation();
      if (result.status === 'skipped') logger.info('Scheduled reconciliation skipped', { reason: result.reason });
    } catch (err) {
      logger.error('Scheduled reconciliation failed', { error: errorMessage(err) });
    }
  }

  async cleanup(): Promise<void> {
    try {
      await this.orchestrator.cleanupOldChanges();
    } catch (err) {
      logger.error('Scheduled change-queue cleanup failed', { error: errorMessage(err) });
    }
  }

  /** Calling start twice is a no-op. */
  start(): void {
    if (this.handles.length) {
      logger.debug('Sync scheduler already running — skipping start');
      return;
    }

    logger.info('Starting sync scheduler', { ...this.intervals });
    this.schedule(() => this.detectChanges(), this.intervals.changeDetectionMs);
    this.schedule(() => this.reconcile(), this.intervals.reconciliationMs);
    this.schedule(() => this.cleanup(), this.intervals.cleanupMs);
  }

  stop(): void {
    if (!this.handles.length) return;
    for (const handle of this.handles) clearInterval(handle);
    this.handles = [];
    logger.info('Sync scheduler stopped');
  }

  isRunning(): boolean {
    return this.handles.length > 0;
  }

  private schedule(job: () => Promise<void>, everyMs: number): void {
    const handle = setInterval(() => {
      void job();
    }, everyMs);
    // Allow the process to exit even if the timer is still scheduled
    handle.unref();
    this.handles.push(handle);
  }
}
