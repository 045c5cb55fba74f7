// =============================================================================
// Sync Orchestrator — owns the lock, the store and both gateways
// =============================================================================
// Entry points:
//
//   runCycle            companies W→H, contacts W→H, companies H→W,
//                       contacts H→W (opt-in), company names, company ids
//   runReconciliation   full-population audit (separate, slower cadence)
//   runChangeDetection  detect both systems, then drain the pending queue
//   syncSingleRecord    event-driven path for one record
//
// Mutual exclusion: one in-process flag, tested and set before the first
// await. A second caller gets `{ status: 'skipped' }` without touching the
// store or either gateway; syncSingleRecord queues the record instead.
//
// Every run opens an activity row, marks it completed or failed, and
// re-raises failures to the caller (the HTTP layer answers 500).
// =============================================================================
import type { SyncConfig } from '../config';
import type {
  ActivityTotals,
  ActivityType,
  ChangeStats,
  CompanyMapping,
  EntityType,
  ExternalSystem,
  FieldChange,
  HubSpotGateway,
  MappingCounts,
  ReconciliationIssue,
  ReconciliationReport,
  ReconciliationReportInput,
  SyncActivity,
  WrikeGateway,
} from '../types';
import { NotFoundError } from '../utils/GatewayError';
import logger from '../utils/logger';
import { errorMessage, safeErrorMessage } from '../utils/sanitizeError';
import { syncCompaniesToHubSpot, syncCompaniesToWrike, syncCompanyTaskToHubSpot, syncHubSpotCompanyToWrike } from './companySync';
import { syncContactTaskToHubSpot, syncContactsToHubSpot, syncContactsToWrike, syncHubSpotContactToWrike } from './contactSync';
import { detectChanges, type DetectionResult } from './changeDetector';
import { listCompanyTasks, syncCompanyIds, syncCompanyNames, type IdSyncResult, type NameSyncResult } from './crossSync';
import { FieldMappingTable } from './fieldMapping';
import { IdentityMap } from './identityMap';
import { buildMappingReport, testConnections, verifyConfiguration, type ConnectionTestResult, type MappingReport, type VerificationReport } from './preflight';
import { runReconciliationAudit } from './reconciliationAuditor';
import {
  emptyContactResult,
  recordFailure,
  tallyOutcome,
  type ContactDirectionResult,
  type DirectionResult,
  type RecordDetail,
  type RecordOutcome,
  type SyncContext,
} from './syncContext';
import { SyncDiagnostics } from './syncDiagnostics';
import type { SyncStore } from './syncStore';

// ─────────────────────────────────────────────────────────────────────────────
// Result shapes
// ─────────────────────────────────────────────────────────────────────────────

export interface SkippedRun {
  status: 'skipped';
  reason: string;
}

interface Timing {
  activityId: number;
  startedAt: string;
  finishedAt: string;
  durationSeconds: number;
}

export interface CycleResult extends Timing {
  status: 'completed';
  companiesToHubSpot: DirectionResult;
  contactsToHubSpot: ContactDirectionResult;
  companiesToWrike: DirectionResult;
  /** null when the HubSpot → Wrike contact direction is disabled */
  contactsToWrike: ContactDirectionResult | null;
  companyNames: NameSyncResult;
  companyIds: IdSyncResult;
  totals: ActivityTotals;
  unresolvedIssues: number;
  diagnosticReport: string[];
}

export interface FailedCycleResult extends Timing {
  status: 'failed';
  error: string;
  diagnosticReport: string[];
}

export interface ReconciliationRunResult extends Timing {
  status: 'completed';
  reportId: number;
  report: ReconciliationReportInput;
  issuesRecorded: number;
}

export interface QueueDrainResult {
  processed: number;
  synced: number;
  failed: number;
}

export interface ChangeDetectionRunResult extends Timing {
  status: 'completed';
  wrike: DetectionResult;
  hubspot: DetectionResult;
  queue: QueueDrainResult;
}

export interface SingleRecordResult extends Timing {
  status: 'completed';
  source: ExternalSystem;
  recordId: string;
  entityType: EntityType;
  outcome: RecordDetail;
}

export interface QueuedRecordResult {
  status: 'queued';
  source: ExternalSystem;
  recordId: string;
  /** null when the same change instant was already queued */
  changeId: number | null;
}

export interface SyncStatus {
  running: boolean;
  lastActivity: SyncActivity | null;
  mappings: MappingCounts;
  unresolvedIssues: number;
  changesLast24h: ChangeStats;
}

/** A cycle failed after its activity row was opened. */
export class SyncCycleError extends Error {
  public readonly result: FailedCycleResult;

  constructor(result: FailedCycleResult, cause: unknown) {
    super(`Sync cycle failed: ${result.error}`, { cause });
    this.name = 'SyncCycleError';
    this.result = result;

    Object.setPrototypeOf(this, SyncCycleError.prototype);
  }
}

export interface SyncOrchestratorOptions {
  store: SyncStore;
  wrike: WrikeGateway;
  hubspot: HubSpotGateway;
  config: SyncConfig;
  now?: () => Date;
}

const BUSY_REASON = 'A sync run is already in progress';
const DEFAULT_QUEUE_BATCH = 50;

/** Wrike → HubSpot counts already-synced records as updated too; they changed nothing. */
function wrikeToHubSpotChanges(result: DirectionResult): number {
  return result.created + result.updated - result.alreadySynced;
}

// =============================================================================
// Orchestrator
// =============================================================================

export class SyncOrchestrator {
  readonly store: SyncStore;
  readonly fields: FieldMappingTable;
  readonly identityMap: IdentityMap;
  readonly diagnostics: SyncDiagnostics;
  private readonly ctx: SyncContext;
  private readonly now: () => Date;
  private running = false;

  constructor(options: SyncOrchestratorOptions) {
    this.store = options.store;
    this.now = options.now ?? (() => new Date());
    this.fields = new FieldMappingTable(options.config);
    this.identityMap = new IdentityMap(options.store);
    this.diagnostics = new SyncDiagnostics({
      crossReferenceProperty: options.config.hubspot.companyProperties.wrikeTaskId,
      now: this.now,
    });
    this.ctx = {
      store: options.store,
      identityMap: this.identityMap,
      wrike: options.wrike,
      hubspot: options.hubspot,
      config: options.config,
      fields: this.fields,
      diagnostics: this.diagnostics,
      now: this.now,
    };
  }

  get isRunning(): boolean {
    return this.running;
  }

  // ── Lock ──────────────────────────────────────────────────────────────────

  /** Non-blocking try-lock; synchronous so two callers cannot both win. */
  private tryAcquire(): boolean {
    if (this.running) return false;
    this.running = true;
    return true;
  }

  private release(): void {
    this.running = false;
  }

  private timing(activityId: number, started: Date): Timing {
    const finished = this.now();
    return {
      activityId,
      startedAt: started.toISOString(),
      finishedAt: finished.toISOString(),
      durationSeconds: (finished.getTime() - started.getTime()) / 1000,
    };
  }

  /** Marks the activity failed; a store failure here is logged, the original error wins. */
  private async failActivity(activityId: number, message: string): Promise<void> {
    try {
      await this.store.failActivity(activityId, message);
    } catch (storeErr) {
      logger.error('Could not mark activity failed', { activityId, error: errorMessage(storeErr) });
    }
  }

  /** Opens an activity, runs `fn`, and marks the activity failed if it throws. */
  private async withActivity<T>(type: ActivityType, fn: (activityId: number, started: Date) => Promise<T>): Promise<T> {
    const started = this.now();
    const activityId = await this.store.startActivity(type);
    try {
      return await fn(activityId, started);
    } catch (err) {
      logger.error(`${type} failed`, { activityId, error: errorMessage(err) });
      await this.failActivity(activityId, safeErrorMessage(err));
      throw err;
    }
  }

  // ===========================================================================
  // Full cycle
  // ===========================================================================

  async runCycle(): Promise<CycleResult | SkippedRun> {
    if (!this.tryAcquire()) {
      logger.warn('Sync cycle skipped: already running');
      return { status: 'skipped', reason: BUSY_REASON };
    }
    try {
      return await this.executeCycle();
    } finally {
      this.release();
    }
  }

  private async executeCycle(): Promise<CycleResult> {
    const ctx = this.ctx;
    this.diagnostics.reset();

    const started = this.now();
    const activityId = await this.store.startActivity('full_sync');
    logger.info('Sync cycle started', { activityId });

    try {
      logger.info('Syncing companies from Wrike to HubSpot...');
      const companiesToHubSpot = await syncCompaniesToHubSpot(ctx, activityId);

      logger.info('Syncing contacts from Wrike to HubSpot...');
      const contactsToHubSpot = await syncContactsToHubSpot(ctx, activityId);

      logger.info('Syncing companies from HubSpot to Wrike...');
      const companiesToWrike = await syncCompaniesToWrike(ctx, activityId);

      let contactsToWrike: ContactDirectionResult | null = null;
      if (ctx.config.sync.syncContactsHubspotToWrike) {
        logger.info('Syncing contacts from HubSpot to Wrike...');
        contactsToWrike = await syncContactsToWrike(ctx, activityId);
      }

      const companyTasks = await listCompanyTasks(ctx);
      logger.info('Syncing HubSpot company names to Wrike...');
      const companyNames = await syncCompanyNames(ctx, companyTasks, activityId);
      logger.info('Syncing company cross-reference ids...');
      const companyIds = await syncCompanyIds(ctx, companyTasks, activityId);

      const companiesProcessed = companiesToHubSpot.processed + companiesToWrike.processed;
      const contactsProcessed = contactsToHubSpot.processed + (contactsToWrike?.processed ?? 0);
      const changes =
        wrikeToHubSpotChanges(companiesToHubSpot) +
        wrikeToHubSpotChanges(contactsToHubSpot) +
        companiesToWrike.updated +
        (contactsToWrike?.updated ?? 0) +
        companyNames.updated +
        companyIds.wrikeIdsUpdated +
        companyIds.hubspotIdsUpdated;
      const errors =
        companiesToHubSpot.failed +
        contactsToHubSpot.failed +
        companiesToWrike.failed +
        (contactsToWrike?.failed ?? 0) +
        companyNames.failed +
        companyIds.failed;

      const totals: ActivityTotals = {
        companiesProcessed,
        contactsProcessed,
        changesMade: changes,
        errors,
        summary: `Companies: ${companiesProcessed}, Contacts: ${contactsProcessed}, Changes: ${changes}, Errors: ${errors}`,
      };

      const unresolvedIssues = await this.store.countUnresolvedIssues();
      await this.store.completeActivity(activityId, totals);

      const diagnosticReport = this.diagnostics.generateReport();
      for (const line of diagnosticReport) logger.info(line);

      const result: CycleResult = {
        status: 'completed',
        ...this.timing(activityId, started),
        companiesToHubSpot,
        contactsToHubSpot,
        companiesToWrike,
        contactsToWrike,
        companyNames,
        companyIds,
        totals,
        unresolvedIssues,
        diagnosticReport,
      };
      logger.info('Sync cycle completed', { activityId, durationSeconds: result.durationSeconds, summary: totals.summary });
      return result;
    } catch (err) {
      const message = safeErrorMessage(err);
      logger.error('Sync cycle failed', { activityId, error: errorMessage(err) });
      await this.failActivity(activityId, message);

      const failed: FailedCycleResult = {
        status: 'failed',
        ...this.timing(activityId, started),
        error: message,
        diagnosticReport: this.diagnostics.generateReport(),
      };
      throw new SyncCycleError(failed, err);
    }
  }

  // ===========================================================================
  // Reconciliation
  // ===========================================================================

  async runReconciliation(): Promise<ReconciliationRunResult | SkippedRun> {
    if (!this.tryAcquire()) {
      logger.warn('Reconciliation skipped: sync already running');
      return { status: 'skipped', reason: BUSY_REASON };
    }
    try {
      return await this.withActivity('reconciliation', async (activityId, started) => {
        const outcome = await runReconciliationAudit(this.ctx);
        const { report } = outcome;
        await this.store.completeActivity(activityId, {
          companiesProcessed: report.wrikeTotal,
          contactsProcessed: 0,
          changesMade: 0,
          errors: 0,
          summary:
            `Matched: ${report.matched}, Mismatched: ${report.mismatched}, ` +
            `Wrike-only: ${report.wrikeOnly}, HubSpot-only: ${report.hubspotOnly}`,
        });
        return { status: 'completed', ...this.timing(activityId, started), ...outcome };
      });
    } finally {
      this.release();
    }
  }

  // ===========================================================================
  // Event-driven path
  // ===========================================================================

  async runChangeDetection(): Promise<ChangeDetectionRunResult | SkippedRun> {
    if (!this.tryAcquire()) {
      logger.debug('Change detection skipped: sync already running');
      return { status: 'skipped', reason: BUSY_REASON };
    }
    try {
      this.diagnostics.reset();
      return await this.withActivity('change_detection', async (activityId, started) => {
        const wrike = await detectChanges(this.ctx, 'wrike');
        const hubspot = await detectChanges(this.ctx, 'hubspot');
        const queue = await this.drainQueue(activityId, DEFAULT_QUEUE_BATCH);

        await this.store.completeActivity(activityId, {
          companiesProcessed: queue.processed,
          contactsProcessed: 0,
          changesMade: queue.synced,
          errors: queue.failed,
          summary:
            `Detected: Wrike ${wrike.detected} (${wrike.queued} new), HubSpot ${hubspot.detected} ` +
            `(${hubspot.queued} new); Queue: ${queue.synced} synced, ${queue.failed} failed`,
        });
        return { status: 'completed', ...this.timing(activityId, started), wrike, hubspot, queue };
      });
    } finally {
      this.release();
    }
  }

  /** Drains up to `limit` pending change-tracking entries on its own activity. */
  async processPendingChanges(limit = DEFAULT_QUEUE_BATCH): Promise<(QueueDrainResult & Timing & { status: 'completed' }) | SkippedRun> {
    if (!this.tryAcquire()) return { status: 'skipped', reason: BUSY_REASON };
    try {
      this.diagnostics.reset();
      return await this.withActivity('change_detection', async (activityId, started) => {
        const queue = await this.drainQueue(activityId, limit);
        await this.store.completeActivity(activityId, {
          companiesProcessed: queue.processed,
          contactsProcessed: 0,
          changesMade: queue.synced,
          errors: queue.failed,
          summary: `Queue: ${queue.synced} synced, ${queue.failed} failed`,
        });
        return { status: 'completed', ...this.timing(activityId, started), ...queue };
      });
    } finally {
      this.release();
    }
  }

  private async drainQueue(activityId: number, limit: number): Promise<QueueDrainResult> {
    const pending = await this.store.listPendingChanges(limit);
    const result: QueueDrainResult = { processed: 0, synced: 0, failed: 0 };

    for (const change of pending) {
      result.processed++;
      const { outcome } = await this.syncOne(change.source, change.recordId, activityId);
      if (outcome.action === 'failed') {
        result.failed++;
        await this.store.markChangeFailed(change.id, outcome.reason ?? 'Sync failed');
      } else {
        result.synced++;
        await this.store.markChangeSynced(change.id);
      }
    }
    return result;
  }

  /**
   * Syncs one record now, or queues it when another run holds the lock.
   */
  async syncSingleRecord(source: ExternalSystem, recordId: string): Promise<SingleRecordResult | QueuedRecordResult> {
    if (!this.tryAcquire()) {
      const changeId = await this.store.trackChange({
        source,
        recordId,
        recordName: '',
        changeType: 'update',
        detectedAt: this.now(),
      });
      logger.info('Sync busy; record queued', { source, recordId, changeId });
      return { status: 'queued', source, recordId, changeId };
    }
    try {
      this.diagnostics.reset();
      return await this.withActivity('single_record', async (activityId, started) => {
        const { entityType, outcome } = await this.syncOne(source, recordId, activityId);
        const failed = outcome.action === 'failed';
        const wrote = outcome.action === 'created' || outcome.action === 'updated';
        await this.store.completeActivity(activityId, {
          companiesProcessed: entityType === 'company' ? 1 : 0,
          contactsProcessed: entityType === 'contact' ? 1 : 0,
          changesMade: wrote ? 1 : 0,
          errors: failed ? 1 : 0,
          summary: `${source} ${entityType} ${recordId}: ${outcome.action}`,
        });
        return { status: 'completed', ...this.timing(activityId, started), source, recordId, entityType, outcome };
      });
    } finally {
      this.release();
    }
  }

  /** One record through the matching directional routine; failures become a 'failed' detail. */
  private async syncOne(
    source: ExternalSystem,
    recordId: string,
    activityId: number,
  ): Promise<{ entityType: EntityType; outcome: RecordDetail }> {
    const result = emptyContactResult();
    let entityType: EntityType = 'company';
    try {
      const routed = await this.routeRecord(source, recordId, activityId);
      entityType = routed.entityType;
      tallyOutcome(this.ctx, result, routed.outcome);
      const detail = result.details[0];
      return {
        entityType,
        outcome: detail ?? {
          recordId,
          name: routed.outcome.name,
          action: routed.outcome.kind,
          counterpartId: routed.outcome.counterpartId,
          ...(routed.outcome.reason ? { reason: routed.outcome.reason } : {}),
        },
      };
    } catch (err) {
      await recordFailure(this.ctx, result, { source, entityType, recordId, name: recordId }, err);
      const detail = result.details[result.details.length - 1];
      return {
        entityType,
        outcome: detail ?? { recordId, name: recordId, action: 'failed', counterpartId: null, reason: safeErrorMessage(err) },
      };
    }
  }

  private async routeRecord(
    source: ExternalSystem,
    recordId: string,
    activityId: number,
  ): Promise<{ entityType: EntityType; outcome: RecordOutcome }> {
    const { wrike, hubspot, config } = this.ctx;

    if (source === 'wrike') {
      const task = await wrike.getTask(recordId);
      if (this.fields.hasMarkerPrefix(task.title)) {
        return { entityType: 'company', outcome: await syncCompanyTaskToHubSpot(this.ctx, task, activityId) };
      }
      return { entityType: 'contact', outcome: await syncContactTaskToHubSpot(this.ctx, task, activityId) };
    }

    try {
      const company = await hubspot.getObject('companies', recordId, this.fields.companyPropertyNames());
      return { entityType: 'company', outcome: await syncHubSpotCompanyToWrike(this.ctx, company, activityId) };
    } catch (err) {
      if (!(err instanceof NotFoundError)) throw err;
    }

    const contact = await hubspot.getObject('contacts', recordId, this.fields.contactPropertyNames());
    if (!config.sync.syncContactsHubspotToWrike) {
      return {
        entityType: 'contact',
        outcome: {
          kind: 'skipped',
          recordId,
          name: recordId,
          counterpartId: null,
          reason: 'HubSpot → Wrike contact sync is disabled',
        },
      };
    }
    return { entityType: 'contact', outcome: await syncHubSpotContactToWrike(this.ctx, contact, activityId) };
  }

  // ===========================================================================
  // Preflight
  // ===========================================================================

  verifyConfiguration(): Promise<VerificationReport> {
    return verifyConfiguration(this.ctx);
  }

  testConnections(): Promise<ConnectionTestResult> {
    return testConnections(this.ctx);
  }

  buildMappingReport(): Promise<MappingReport> {
    return buildMappingReport(this.ctx);
  }

  // ===========================================================================
  // Read-only queries
  // ===========================================================================

  async getStatus(): Promise<SyncStatus> {
    const since = new Date(this.now().getTime() - 24 * 60 * 60 * 1000);
    const [activities, mappings, unresolvedIssues, changesLast24h] = await Promise.all([
      this.store.listActivities(1),
      this.store.countMappings(),
      this.store.countUnresolvedIssues(),
      this.store.getChangeStats(since),
    ]);
    return { running: this.running, lastActivity: activities[0] ?? null, mappings, unresolvedIssues, changesLast24h };
  }

  listActivities(limit = 50): Promise<SyncActivity[]> {
    return this.store.listActivities(limit);
  }

  getActivity(id: number): Promise<SyncActivity | null> {
    return this.store.getActivity(id);
  }

  getActivityChanges(activityId: number): Promise<FieldChange[]> {
    return this.store.getActivityChanges(activityId);
  }

  listUnresolvedIssues(limit = 100): Promise<ReconciliationIssue[]> {
    return this.store.listUnresolvedIssues(limit);
  }

  /** Operator action; the engine itself never resolves issues. */
  resolveIssue(id: number): Promise<boolean> {
    return this.store.resolveIssue(id);
  }

  getLastReconciliationReport(): Promise<ReconciliationReport | null> {
    return this.store.getLastReconciliationReport();
  }

  listReconciliationReports(limit = 20): Promise<ReconciliationReport[]> {
    return this.store.listReconciliationReports(limit);
  }

  getChangeStats(since: Date): Promise<ChangeStats> {
    return this.store.getChangeStats(since);
  }

  /** Removes synced/failed queue entries detected before `before`. */
  async cleanupOldChanges(before?: Date): Promise<number> {
    const cutoff =
      before ?? new Date(this.now().getTime() - this.ctx.config.sync.changeRetentionDays * 24 * 60 * 60 * 1000);
    const removed = await this.store.cleanupOldChanges(cutoff);
    logger.info('Change-tracking cleanup complete', { removed, before: cutoff.toISOString() });
    return removed;
  }

  listMappings(limit = 100): Promise<CompanyMapping[]> {
    return this.store.listMappings(limit);
  }

  countMappings(): Promise<MappingCounts> {
    return this.store.countMappings();
  }
}
