// =============================================================================
// MongoSyncStore — networked backend on mongoose
// =============================================================================
// Same contract as the SQLite store. Numeric ids for the log collections
// come from the `counters` collection so activity ids look the same on
// either backend. Every write is a single-document operation except the
// identity-map upsert, which runs in a transaction (needs a replica set).
// =============================================================================
import mongoose from 'mongoose';
import CompanyMapping, { ICompanyMapping } from '../models/CompanyMapping';
import SyncState from '../models/SyncState';
import ChangeTracking, { IChangeTracking } from '../models/ChangeTracking';
import SyncActivity, { ISyncActivity } from '../models/SyncActivity';
import SyncActivityChange, { ISyncActivityChange } from '../models/SyncActivityChange';
import ReconciliationIssue, { IReconciliationIssue } from '../models/ReconciliationIssue';
import ReconciliationReport, { IReconciliationReport } from '../models/ReconciliationReport';
import SyncLog from '../models/SyncLog';
import { nextSequence } from '../models/Counter';
import type {
  ActivityTotals,
  ActivityType,
  ChangeRecord,
  ChangeRecordInput,
  ChangeStats,
  CompanyMapping as CompanyMappingRecord,
  FieldChange,
  FieldChangeInput,
  MappingCounts,
  MappingStatus,
  ReconciliationIssue as ReconciliationIssueRecord,
  ReconciliationIssueInput,
  ReconciliationReport as ReconciliationReportRecord,
  ReconciliationReportInput,
  SyncActivity as SyncActivityRecord,
  SyncLogInput,
} from '../types';
import { safeStoreCall } from '../utils/StoreError';
import logger from '../utils/logger';
import type { SyncStore, UpsertMappingInput } from './syncStore';

// ─────────────────────────────────────────────────────────────────────────────
// Document → record helpers
// ─────────────────────────────────────────────────────────────────────────────

function toMapping(doc: ICompanyMapping): CompanyMappingRecord {
  return {
    wrikeCompanyId: doc.wrikeCompanyId,
    hubspotCompanyId: doc.hubspotCompanyId,
    companyName: doc.companyName,
    syncStatus: doc.syncStatus,
    lastSyncedAt: doc.lastSyncedAt,
    notes: doc.notes,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

function toChange(doc: IChangeTracking): ChangeRecord {
  return {
    id: doc.changeId,
    source: doc.source,
    recordId: doc.recordId,
    recordName: doc.recordName,
    changeType: doc.changeType,
    detectedAt: doc.detectedAt,
    status: doc.status,
    syncedAt: doc.syncedAt,
    errorMessage: doc.errorMessage,
  };
}

function toActivity(doc: ISyncActivity): SyncActivityRecord {
  return {
    id: doc.activityId,
    activityType: doc.activityType,
    startedAt: doc.startedAt,
    completedAt: doc.completedAt,
    status: doc.status,
    companiesProcessed: doc.companiesProcessed,
    contactsProcessed: doc.contactsProcessed,
    changesMade: doc.changesMade,
    errors: doc.errorCount,
    summary: doc.summary,
  };
}

function toFieldChange(doc: ISyncActivityChange): FieldChange {
  return {
    id: doc.changeId,
    activityId: doc.activityId,
    companyName: doc.companyName,
    wrikeId: doc.wrikeCompanyId,
    hubspotId: doc.hubspotCompanyId,
    entityType: doc.entityType,
    fieldName: doc.fieldName,
    systemChanged: doc.systemChanged,
    oldValue: doc.oldValue,
    newValue: doc.newValue,
    changed: doc.changed,
    action: doc.action,
    createdAt: doc.createdAt,
  };
}

function toIssue(doc: IReconciliationIssue): ReconciliationIssueRecord {
  return {
    id: doc.issueId,
    createdAt: doc.createdAt,
    source: doc.source,
    entityType: doc.entityType,
    entityId: doc.entityId,
    issueType: doc.issueType,
    detail: doc.detail,
    resolved: doc.resolved,
  };
}

function toReport(doc: IReconciliationReport): ReconciliationReportRecord {
  return {
    id: doc.reportId,
    runAt: doc.runAt,
    wrikeTotal: doc.wrikeTotal,
    hubspotTotal: doc.hubspotTotal,
    matched: doc.matched,
    wrikeOnly: doc.wrikeOnly,
    hubspotOnly: doc.hubspotOnly,
    mismatched: doc.mismatched,
    autoFixed: doc.autoFixed,
    status: doc.status,
    errorMessage: doc.errorMessage,
    details: doc.details,
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Store
// ─────────────────────────────────────────────────────────────────────────────

export class MongoSyncStore implements SyncStore {
  constructor(
    private readonly uri: string,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async init(): Promise<void> {
    await safeStoreCall('init', async () => {
      await mongoose.connect(this.uri);
      logger.info('MongoDB sync store connected');
    });
  }

  async close(): Promise<void> {
    await safeStoreCall('close', () => mongoose.disconnect());
  }

  // ── Identity map ──────────────────────────────────────────────────────────

  async findMappingByWrikeId(wrikeCompanyId: string): Promise<CompanyMappingRecord | null> {
    return safeStoreCall('mapping.find', async () => {
      const doc = await CompanyMapping.findOne({ wrikeCompanyId });
      return doc ? toMapping(doc) : null;
    });
  }

  async findMappingByHubSpotId(hubspotCompanyId: string): Promise<CompanyMappingRecord | null> {
    return safeStoreCall('mapping.find', async () => {
      const doc = await CompanyMapping.findOne({ hubspotCompanyId });
      return doc ? toMapping(doc) : null;
    });
  }

  async upsertMapping(input: UpsertMappingInput): Promise<CompanyMappingRecord> {
    return safeStoreCall('mapping.upsert', () =>
      mongoose.connection.transaction(async (session) => {
        // Release the HubSpot id from any other Wrike task first (unique index)
        await CompanyMapping.updateMany(
          { hubspotCompanyId: input.hubspotCompanyId, wrikeCompanyId: { $ne: input.wrikeCompanyId } },
          {
            $set: {
              hubspotCompanyId: null,
              syncStatus: 'inactive',
              notes: `HubSpot id ${input.hubspotCompanyId} re-linked to Wrike ${input.wrikeCompanyId}`,
            },
          },
          { session },
        );

        const doc = await CompanyMapping.findOneAndUpdate(
          { wrikeCompanyId: input.wrikeCompanyId },
          {
            $set: {
              hubspotCompanyId: input.hubspotCompanyId,
              companyName: input.companyName,
              syncStatus: 'active',
              lastSyncedAt: this.clock(),
              notes: input.notes ?? '',
            },
          },
          { upsert: true, new: true, setDefaultsOnInsert: true, session },
        );
        if (!doc) throw new Error('Upserted mapping document not returned');
        return toMapping(doc);
      }),
    );
  }

  async setMappingStatus(wrikeCompanyId: string, status: MappingStatus, notes: string): Promise<void> {
    await safeStoreCall('mapping.status', () =>
      CompanyMapping.updateOne({ wrikeCompanyId }, { $set: { syncStatus: status, notes } }),
    );
  }

  async listMappings(limit: number): Promise<CompanyMappingRecord[]> {
    return safeStoreCall('mapping.list', async () => {
      const docs = await CompanyMapping.find().sort({ updatedAt: -1 }).limit(limit);
      return docs.map(toMapping);
    });
  }

  async countMappings(): Promise<MappingCounts> {
    return safeStoreCall('mapping.list', async () => {
      const [total, active] = await Promise.all([
        CompanyMapping.countDocuments({}),
        CompanyMapping.countDocuments({ syncStatus: 'active' }),
      ]);
      return { total, active, inactive: total - active };
    });
  }

  // ── Watermarks ────────────────────────────────────────────────────────────

  async getState(key: string): Promise<string | null> {
    return safeStoreCall('state.get', async () => {
      const doc = await SyncState.findOne({ key });
      return doc?.value ?? null;
    });
  }

  async setState(key: string, value: string): Promise<void> {
    await safeStoreCall('state.set', () =>
      SyncState.updateOne({ key }, { $set: { value } }, { upsert: true }),
    );
  }

  // ── Change-tracking queue ─────────────────────────────────────────────────

  async trackChange(input: ChangeRecordInput): Promise<number | null> {
    return safeStoreCall('change.track', async () => {
      const changeId = await nextSequence('change_tracking');
      const result = await ChangeTracking.updateOne(
        { source: input.source, recordId: input.recordId, detectedAt: input.detectedAt },
        {
          $setOnInsert: {
            changeId,
            recordName: input.recordName,
            changeType: input.changeType,
            status: 'pending',
          },
        },
        { upsert: true },
      );
      return result.upsertedCount === 1 ? changeId : null;
    });
  }

  async listPendingChanges(limit: number): Promise<ChangeRecord[]> {
    return safeStoreCall('change.list', async () => {
      const docs = await ChangeTracking.find({ status: 'pending' }).sort({ detectedAt: 1, changeId: 1 }).limit(limit);
      return docs.map(toChange);
    });
  }

  async markChangeSynced(id: number): Promise<void> {
    await safeStoreCall('change.mark', () =>
      ChangeTracking.updateOne(
        { changeId: id },
        { $set: { status: 'synced', syncedAt: this.clock(), errorMessage: null } },
      ),
    );
  }

  async markChangeFailed(id: number, errorMessage: string): Promise<void> {
    await safeStoreCall('change.mark', () =>
      ChangeTracking.updateOne(
        { changeId: id },
        { $set: { status: 'failed', syncedAt: this.clock(), errorMessage: errorMessage.slice(0, 1000) } },
      ),
    );
  }

  async getChangeStats(since: Date): Promise<ChangeStats> {
    return safeStoreCall('change.stats', async () => {
      const groups = await ChangeTracking.aggregate<{ _id: { source: string; status: string }; n: number }>([
        { $match: { detectedAt: { $gte: since } } },
        { $group: { _id: { source: '$source', status: '$status' }, n: { $sum: 1 } } },
      ]);

      const stats: ChangeStats = { total: 0, pending: 0, synced: 0, failed: 0, bySource: { wrike: 0, hubspot: 0 } };
      for (const group of groups) {
        stats.total += group.n;
        if (group._id.status === 'pending' || group._id.status === 'synced' || group._id.status === 'failed') {
          stats[group._id.status] += group.n;
        }
        if (group._id.source === 'wrike' || group._id.source === 'hubspot') {
          stats.bySource[group._id.source] += group.n;
        }
      }
      return stats;
    });
  }

  async cleanupOldChanges(before: Date): Promise<number> {
    return safeStoreCall('change.cleanup', async () => {
      const result = await ChangeTracking.deleteMany({ detectedAt: { $lt: before }, status: { $ne: 'pending' } });
      return result.deletedCount ?? 0;
    });
  }

  // ── Activities ────────────────────────────────────────────────────────────

  async startActivity(type: ActivityType): Promise<number> {
    return safeStoreCall('activity.start', async () => {
      const activityId = await nextSequence('sync_activities');
      await SyncActivity.create({ activityId, activityType: type, startedAt: this.clock(), status: 'running' });
      return activityId;
    });
  }

  async completeActivity(id: number, totals: ActivityTotals): Promise<void> {
    await safeStoreCall('activity.finish', () =>
      SyncActivity.updateOne(
        { activityId: id },
        {
          $set: {
            status: 'completed',
            completedAt: this.clock(),
            companiesProcessed: totals.companiesProcessed,
            contactsProcessed: totals.contactsProcessed,
            changesMade: totals.changesMade,
            errorCount: totals.errors,
            summary: totals.summary,
          },
        },
      ),
    );
  }

  async failActivity(id: number, errorMessage: string): Promise<void> {
    await safeStoreCall('activity.finish', () =>
      SyncActivity.updateOne(
        { activityId: id },
        { $set: { status: 'failed', completedAt: this.clock(), summary: errorMessage.slice(0, 2000) } },
      ),
    );
  }

  async recordFieldChange(input: FieldChangeInput): Promise<void> {
    await safeStoreCall('activity.record', async () => {
      const changeId = await nextSequence('sync_activity_changes');
      await SyncActivityChange.create({
        changeId,
        activityId: input.activityId,
        companyName: input.companyName,
        wrikeCompanyId: input.wrikeId,
        hubspotCompanyId: input.hubspotId,
        entityType: input.entityType,
        fieldName: input.fieldName,
        systemChanged: input.systemChanged,
        oldValue: input.oldValue,
        newValue: input.newValue,
        changed: input.changed,
        action: input.action,
      });
    });
  }

  async listActivities(limit: number): Promise<SyncActivityRecord[]> {
    return safeStoreCall('activity.list', async () => {
      const docs = await SyncActivity.find().sort({ activityId: -1 }).limit(limit);
      return docs.map(toActivity);
    });
  }

  async getActivity(id: number): Promise<SyncActivityRecord | null> {
    return safeStoreCall('activity.list', async () => {
      const doc = await SyncActivity.findOne({ activityId: id });
      return doc ? toActivity(doc) : null;
    });
  }

  async getActivityChanges(activityId: number): Promise<FieldChange[]> {
    return safeStoreCall('activity.list', async () => {
      const docs = await SyncActivityChange.find({ activityId }).sort({ changeId: 1 });
      return docs.map(toFieldChange);
    });
  }

  // ── Issues + reports ──────────────────────────────────────────────────────

  async addIssue(input: ReconciliationIssueInput): Promise<void> {
    await safeStoreCall('issue.add', async () => {
      const issueId = await nextSequence('reconciliation_issue');
      await ReconciliationIssue.create({ issueId, ...input, detail: input.detail.slice(0, 2000) });
    });
  }

  async listUnresolvedIssues(limit: number): Promise<ReconciliationIssueRecord[]> {
    return safeStoreCall('issue.list', async () => {
      const docs = await ReconciliationIssue.find({ resolved: false }).sort({ issueId: -1 }).limit(limit);
      return docs.map(toIssue);
    });
  }

  async countUnresolvedIssues(): Promise<number> {
    return safeStoreCall('issue.list', () => ReconciliationIssue.countDocuments({ resolved: false }));
  }

  async resolveIssue(id: number): Promise<boolean> {
    return safeStoreCall('issue.resolve', async () => {
      const result = await ReconciliationIssue.updateOne({ issueId: id, resolved: false }, { $set: { resolved: true } });
      return result.modifiedCount > 0;
    });
  }

  async saveReconciliationReport(report: ReconciliationReportInput): Promise<number> {
    return safeStoreCall('report.save', async () => {
      const reportId = await nextSequence('reconciliation_reports');
      await ReconciliationReport.create({ reportId, runAt: this.clock(), ...report });
      return reportId;
    });
  }

  async getLastReconciliationReport(): Promise<ReconciliationReportRecord | null> {
    return safeStoreCall('report.list', async () => {
      const doc = await ReconciliationReport.findOne().sort({ reportId: -1 });
      return doc ? toReport(doc) : null;
    });
  }

  async listReconciliationReports(limit: number): Promise<ReconciliationReportRecord[]> {
    return safeStoreCall('report.list', async () => {
      const docs = await ReconciliationReport.find().sort({ reportId: -1 }).limit(limit);
      return docs.map(toReport);
    });
  }

  // ── Operation log ─────────────────────────────────────────────────────────

  async logOperation(input: SyncLogInput): Promise<void> {
    await safeStoreCall('log.write', () => SyncLog.create({ ...input, message: input.message.slice(0, 1000) }));
  }
}
