// =============================================================================
// Sync Store — the one persistence contract the sync engine depends on
// =============================================================================
// Two backends implement it with the same semantics:
//   • SqliteSyncStore — embedded single file (better-sqlite3), one instance
//   • MongoSyncStore  — networked (mongoose), shared / multi-instance
//
// The backend is picked once, in createSyncStore(). Every write is a single
// immediately-committed operation; nothing spans a whole directional pass.
// =============================================================================
import type { AppConfig } from '../config';
import type {
  ActivityTotals,
  ActivityType,
  ChangeRecord,
  ChangeRecordInput,
  ChangeStats,
  CompanyMapping,
  FieldChange,
  FieldChangeInput,
  MappingCounts,
  MappingStatus,
  ReconciliationIssue,
  ReconciliationIssueInput,
  ReconciliationReport,
  ReconciliationReportInput,
  SyncActivity,
  SyncLogInput,
} from '../types';

export interface UpsertMappingInput {
  wrikeCompanyId: string;
  hubspotCompanyId: string;
  companyName: string;
  notes?: string;
}

export interface SyncStore {
  init(): Promise<void>;
  close(): Promise<void>;

  // ── Identity map (company_id_map) ──────────────────────────────────────
  findMappingByWrikeId(wrikeCompanyId: string): Promise<CompanyMapping | null>;
  findMappingByHubSpotId(hubspotCompanyId: string): Promise<CompanyMapping | null>;
  /** Insert-or-update keyed by Wrike id; always leaves the row active. */
  upsertMapping(input: UpsertMappingInput): Promise<CompanyMapping>;
  setMappingStatus(wrikeCompanyId: string, status: MappingStatus, notes: string): Promise<void>;
  listMappings(limit: number): Promise<CompanyMapping[]>;
  countMappings(): Promise<MappingCounts>;

  // ── Watermarks (sync_state) ─────────────────────────────────────────────
  getState(key: string): Promise<string | null>;
  setState(key: string, value: string): Promise<void>;

  // ── Change-tracking queue ───────────────────────────────────────────────
  /** Returns the new row id, or null when the same change instant was already queued. */
  trackChange(input: ChangeRecordInput): Promise<number | null>;
  listPendingChanges(limit: number): Promise<ChangeRecord[]>;
  markChangeSynced(id: number): Promise<void>;
  markChangeFailed(id: number, errorMessage: string): Promise<void>;
  getChangeStats(since: Date): Promise<ChangeStats>;
  cleanupOldChanges(before: Date): Promise<number>;

  // ── Activities + per-field change log ───────────────────────────────────
  startActivity(type: ActivityType): Promise<number>;
  completeActivity(id: number, totals: ActivityTotals): Promise<void>;
  failActivity(id: number, errorMessage: string): Promise<void>;
  recordFieldChange(input: FieldChangeInput): Promise<void>;
  listActivities(limit: number): Promise<SyncActivity[]>;
  getActivity(id: number): Promise<SyncActivity | null>;
  getActivityChanges(activityId: number): Promise<FieldChange[]>;

  // ── Reconciliation issues + reports ─────────────────────────────────────
  addIssue(input: ReconciliationIssueInput): Promise<void>;
  listUnresolvedIssues(limit: number): Promise<ReconciliationIssue[]>;
  countUnresolvedIssues(): Promise<number>;
  /** Manual resolution only; the engine never calls this. */
  resolveIssue(id: number): Promise<boolean>;
  saveReconciliationReport(report: ReconciliationReportInput): Promise<number>;
  getLastReconciliationReport(): Promise<ReconciliationReport | null>;
  listReconciliationReports(limit: number): Promise<ReconciliationReport[]>;

  // ── Operation log (sync_logs) ───────────────────────────────────────────
  logOperation(input: SyncLogInput): Promise<void>;
}

/**
 * Builds the configured backend. Imports are deferred so the unused
 * driver is never loaded.
 */
export async function createSyncStore(cfg: AppConfig): Promise<SyncStore> {
  if (cfg.storeBackend === 'mongo') {
    const { MongoSyncStore } = await import('./mongoSyncStore');
    return new MongoSyncStore(cfg.mongodbUri);
  }
  const { SqliteSyncStore } = await import('./sqliteSyncStore');
  return new SqliteSyncStore(cfg.sqlitePath);
}
