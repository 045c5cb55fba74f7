// =============================================================================
// SqliteSyncStore — embedded single-file backend (better-sqlite3)
// =============================================================================
// WAL mode, prepared statements, ON CONFLICT upserts. better-sqlite3 is
// synchronous, so each method is one committed statement (or one short
// transaction) wrapped into the async SyncStore contract.
// =============================================================================
import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import type {
  ActivityStatus,
  ActivityTotals,
  ActivityType,
  ChangeRecord,
  ChangeRecordInput,
  ChangeStats,
  ChangeStatus,
  ChangeType,
  CompanyMapping,
  EntityType,
  ExternalSystem,
  FieldChange,
  FieldChangeInput,
  IssueType,
  MappingCounts,
  MappingStatus,
  RecordAction,
  ReconciliationDetails,
  ReconciliationIssue,
  ReconciliationIssueInput,
  ReconciliationReport,
  ReconciliationReportInput,
  SyncActivity,
  SyncLogInput,
} from '../types';
import { safeStoreCall } from '../utils/StoreError';
import logger from '../utils/logger';
import { errorMessage } from '../utils/sanitizeError';
import type { SyncStore, UpsertMappingInput } from './syncStore';

const SCHEMA = `
CREATE TABLE IF NOT EXISTS company_id_map (
  wrike_company_id   TEXT PRIMARY KEY,
  hubspot_company_id TEXT UNIQUE,
  company_name       TEXT NOT NULL DEFAULT '',
  sync_status        TEXT NOT NULL DEFAULT 'active',
  last_synced_at     TEXT,
  updated_at         TEXT NOT NULL,
  created_at         TEXT NOT NULL,
  notes              TEXT NOT NULL DEFAULT ''
);

CREATE TABLE IF NOT EXISTS sync_state (
  k TEXT PRIMARY KEY,
  v TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS change_tracking (
  id            INTEGER PRIMARY KEY AUTOINCREMENT,
  source        TEXT NOT NULL,
  record_id     TEXT NOT NULL,
  record_name   TEXT NOT NULL DEFAULT '',
  change_type   TEXT NOT NULL DEFAULT 'update',
  detected_at   TEXT NOT NULL,
  status        TEXT NOT NULL DEFAULT 'pending',
  synced_at     TEXT,
  error_message TEXT,
  UNIQUE(source, record_id, detected_at)
);
CREATE INDEX IF NOT EXISTS idx_change_tracking_status ON change_tracking(status, detected_at);

CREATE TABLE IF NOT EXISTS sync_activities (
  id                  INTEGER PRIMARY KEY AUTOINCREMENT,
  activity_type       TEXT NOT NULL,
  started_at          TEXT NOT NULL,
  completed_at        TEXT,
  status              TEXT NOT NULL DEFAULT 'running',
  companies_processed INTEGER NOT NULL DEFAULT 0,
  contacts_processed  INTEGER NOT NULL DEFAULT 0,
  changes_made        INTEGER NOT NULL DEFAULT 0,
  errors              INTEGER NOT NULL DEFAULT 0,
  summary             TEXT
);

CREATE TABLE IF NOT EXISTS sync_activity_changes (
  id                 INTEGER PRIMARY KEY AUTOINCREMENT,
  activity_id        INTEGER NOT NULL REFERENCES sync_activities(id),
  company_name       TEXT NOT NULL DEFAULT '',
  wrike_company_id   TEXT NOT NULL,
  hubspot_company_id TEXT,
  entity_type        TEXT NOT NULL,
  field_name         TEXT NOT NULL,
  system_changed     TEXT NOT NULL,
  old_value          TEXT,
  new_value          TEXT,
  changed            INTEGER NOT NULL DEFAULT 1,
  action             TEXT NOT NULL,
  created_at         TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_activity_changes_activity ON sync_activity_changes(activity_id);

CREATE TABLE IF NOT EXISTS reconciliation_issue (
  id          INTEGER PRIMARY KEY AUTOINCREMENT,
  created_at  TEXT NOT NULL,
  source      TEXT NOT NULL,
  entity_type TEXT NOT NULL,
  entity_id   TEXT NOT NULL,
  issue_type  TEXT NOT NULL,
  detail      TEXT NOT NULL DEFAULT '',
  resolved    INTEGER NOT NULL DEFAULT 0
);

CREATE TABLE IF NOT EXISTS reconciliation_reports (
  id            INTEGER PRIMARY KEY AUTOINCREMENT,
  run_at        TEXT NOT NULL,
  wrike_total   INTEGER NOT NULL DEFAULT 0,
  hubspot_total INTEGER NOT NULL DEFAULT 0,
  matched       INTEGER NOT NULL DEFAULT 0,
  wrike_only    INTEGER NOT NULL DEFAULT 0,
  hubspot_only  INTEGER NOT NULL DEFAULT 0,
  mismatched    INTEGER NOT NULL DEFAULT 0,
  auto_fixed    INTEGER NOT NULL DEFAULT 0,
  status        TEXT NOT NULL,
  error_message TEXT,
  details_json  TEXT NOT NULL DEFAULT '{}'
);

CREATE TABLE IF NOT EXISTS sync_logs (
  id            INTEGER PRIMARY KEY AUTOINCREMENT,
  operation     TEXT NOT NULL,
  source_system TEXT NOT NULL,
  target_system TEXT NOT NULL,
  entity_type   TEXT NOT NULL,
  entity_id     TEXT NOT NULL,
  status        TEXT NOT NULL,
  message       TEXT NOT NULL DEFAULT '',
  created_at    TEXT NOT NULL
);
`;

// ─────────────────────────────────────────────────────────────────────────────
// Raw row shapes (snake_case, as stored)
// ─────────────────────────────────────────────────────────────────────────────

interface RawMappingRow {
  wrike_company_id: string;
  hubspot_company_id: string | null;
  company_name: string;
  sync_status: string;
  last_synced_at: string | null;
  updated_at: string;
  created_at: string;
  notes: string;
}

interface RawChangeRow {
  id: number;
  source: string;
  record_id: string;
  record_name: string;
  change_type: string;
  detected_at: string;
  status: string;
  synced_at: string | null;
  error_message: string | null;
}

interface RawActivityRow {
  id: number;
  activity_type: string;
  started_at: string;
  completed_at: string | null;
  status: string;
  companies_processed: number;
  contacts_processed: number;
  changes_made: number;
  errors: number;
  summary: string | null;
}

interface RawFieldChangeRow {
  id: number;
  activity_id: number;
  company_name: string;
  wrike_company_id: string;
  hubspot_company_id: string | null;
  entity_type: string;
  field_name: string;
  system_changed: string;
  old_value: string | null;
  new_value: string | null;
  changed: number;
  action: string;
  created_at: string;
}

interface RawIssueRow {
  id: number;
  created_at: string;
  source: string;
  entity_type: string;
  entity_id: string;
  issue_type: string;
  detail: string;
  resolved: number;
}

interface RawReportRow {
  id: number;
  run_at: string;
  wrike_total: number;
  hubspot_total: number;
  matched: number;
  wrike_only: number;
  hubspot_only: number;
  mismatched: number;
  auto_fixed: number;
  status: string;
  error_message: string | null;
  details_json: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Row → domain helpers
// ─────────────────────────────────────────────────────────────────────────────

function oneOf<T extends string>(values: readonly T[], raw: string, fallback: T): T {
  return values.find((v) => v === raw) ?? fallback;
}

const SYSTEMS: readonly ExternalSystem[] = ['wrike', 'hubspot'];
const ENTITY_TYPES: readonly EntityType[] = ['company', 'contact'];
const ACTIVITY_TYPES: readonly ActivityType[] = ['full_sync', 'change_detection', 'single_record', 'reconciliation'];
const ACTIVITY_STATUSES: readonly ActivityStatus[] = ['running', 'completed', 'failed'];
const CHANGE_STATUSES: readonly ChangeStatus[] = ['pending', 'synced', 'failed'];
const CHANGE_TYPES: readonly ChangeType[] = ['create', 'update'];
const ACTIONS: readonly RecordAction[] = ['created', 'updated', 'skipped'];
const ISSUE_TYPES: readonly IssueType[] = ['sync_error', 'wrike_only', 'hubspot_only', 'field_mismatch', 'stale_mapping'];
const ISSUE_SOURCES: readonly ReconciliationIssueInput['source'][] = ['wrike', 'hubspot', 'reconciliation'];
const MAPPING_STATUSES: readonly MappingStatus[] = ['active', 'inactive'];

function toDate(value: string): Date;
function toDate(value: string | null): Date | null;
function toDate(value: string | null): Date | null {
  return value === null ? null : new Date(value);
}

function toMapping(row: RawMappingRow): CompanyMapping {
  return {
    wrikeCompanyId: row.wrike_company_id,
    hubspotCompanyId: row.hubspot_company_id,
    companyName: row.company_name,
    syncStatus: oneOf(MAPPING_STATUSES, row.sync_status, 'inactive'),
    lastSyncedAt: toDate(row.last_synced_at),
    notes: row.notes,
    createdAt: toDate(row.created_at),
    updatedAt: toDate(row.updated_at),
  };
}

function toChange(row: RawChangeRow): ChangeRecord {
  return {
    id: row.id,
    source: oneOf(SYSTEMS, row.source, 'wrike'),
    recordId: row.record_id,
    recordName: row.record_name,
    changeType: oneOf(CHANGE_TYPES, row.change_type, 'update'),
    detectedAt: toDate(row.detected_at),
    status: oneOf(CHANGE_STATUSES, row.status, 'pending'),
    syncedAt: toDate(row.synced_at),
    errorMessage: row.error_message,
  };
}

function toActivity(row: RawActivityRow): SyncActivity {
  return {
    id: row.id,
    activityType: oneOf(ACTIVITY_TYPES, row.activity_type, 'full_sync'),
    startedAt: toDate(row.started_at),
    completedAt: toDate(row.completed_at),
    status: oneOf(ACTIVITY_STATUSES, row.status, 'failed'),
    companiesProcessed: row.companies_processed,
    contactsProcessed: row.contacts_processed,
    changesMade: row.changes_made,
    errors: row.errors,
    summary: row.summary,
  };
}

function toFieldChange(row: RawFieldChangeRow): FieldChange {
  return {
    id: row.id,
    activityId: row.activity_id,
    companyName: row.company_name,
    wrikeId: row.wrike_company_id,
    hubspotId: row.hubspot_company_id,
    entityType: oneOf(ENTITY_TYPES, row.entity_type, 'company'),
    fieldName: row.field_name,
    systemChanged: oneOf(SYSTEMS, row.system_changed, 'hubspot'),
    oldValue: row.old_value,
    newValue: row.new_value,
    changed: row.changed === 1,
    action: oneOf(ACTIONS, row.action, 'updated'),
    createdAt: toDate(row.created_at),
  };
}

function toIssue(row: RawIssueRow): ReconciliationIssue {
  return {
    id: row.id,
    createdAt: toDate(row.created_at),
    source: oneOf(ISSUE_SOURCES, row.source, 'reconciliation'),
    entityType: oneOf(ENTITY_TYPES, row.entity_type, 'company'),
    entityId: row.entity_id,
    issueType: oneOf(ISSUE_TYPES, row.issue_type, 'sync_error'),
    detail: row.detail,
    resolved: row.resolved === 1,
  };
}

function parseDetails(json: string): ReconciliationDetails {
  const empty: ReconciliationDetails = { mismatches: [], wrikeOnly: [], hubspotOnly: [] };
  try {
    const parsed: unknown = JSON.parse(json);
    if (!parsed || typeof parsed !== 'object') return empty;
    return {
      mismatches: 'mismatches' in parsed && Array.isArray(parsed.mismatches) ? parsed.mismatches : [],
      wrikeOnly: 'wrikeOnly' in parsed && Array.isArray(parsed.wrikeOnly) ? parsed.wrikeOnly : [],
      hubspotOnly: 'hubspotOnly' in parsed && Array.isArray(parsed.hubspotOnly) ? parsed.hubspotOnly : [],
    };
  } catch (err) {
    logger.warn('Unreadable reconciliation report details', { error: errorMessage(err) });
    return empty;
  }
}

function toReport(row: RawReportRow): ReconciliationReport {
  return {
    id: row.id,
    runAt: toDate(row.run_at),
    wrikeTotal: row.wrike_total,
    hubspotTotal: row.hubspot_total,
    matched: row.matched,
    wrikeOnly: row.wrike_only,
    hubspotOnly: row.hubspot_only,
    mismatched: row.mismatched,
    autoFixed: row.auto_fixed,
    status: row.status === 'failed' ? 'failed' : 'completed',
    errorMessage: row.error_message,
    details: parseDetails(row.details_json),
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Store
// ─────────────────────────────────────────────────────────────────────────────

export class SqliteSyncStore implements SyncStore {
  private db: Database.Database | null = null;

  /**
   * @param filename — database file, or ':memory:'
   * @param clock    — timestamp source for every row written
   */
  constructor(
    private readonly filename: string,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  private get conn(): Database.Database {
    if (!this.db) throw new Error('SqliteSyncStore used before init()');
    return this.db;
  }

  private nowIso(): string {
    return this.clock().toISOString();
  }

  async init(): Promise<void> {
    await safeStoreCall('init', () => {
      if (this.db) return;
      if (this.filename !== ':memory:') {
        fs.mkdirSync(path.dirname(path.resolve(this.filename)), { recursive: true });
      }
      const db = new Database(this.filename);
      db.pragma('journal_mode = WAL');
      db.pragma('foreign_keys = ON');
      db.exec(SCHEMA);
      this.db = db;
      logger.info('SQLite sync store ready', { filename: this.filename });
    });
  }

  async close(): Promise<void> {
    await safeStoreCall('close', () => {
      this.db?.close();
      this.db = null;
    });
  }

  // ── Identity map ──────────────────────────────────────────────────────────

  async findMappingByWrikeId(wrikeCompanyId: string): Promise<CompanyMapping | null> {
    return safeStoreCall('mapping.find', () => {
      const row = this.conn
        .prepare<[string], RawMappingRow>('SELECT * FROM company_id_map WHERE wrike_company_id = ?')
        .get(wrikeCompanyId);
      return row ? toMapping(row) : null;
    });
  }

  async findMappingByHubSpotId(hubspotCompanyId: string): Promise<CompanyMapping | null> {
    return safeStoreCall('mapping.find', () => {
      const row = this.conn
        .prepare<[string], RawMappingRow>('SELECT * FROM company_id_map WHERE hubspot_company_id = ?')
        .get(hubspotCompanyId);
      return row ? toMapping(row) : null;
    });
  }

  async upsertMapping(input: UpsertMappingInput): Promise<CompanyMapping> {
    return safeStoreCall('mapping.upsert', () => {
      const now = this.nowIso();
      const release = this.conn.prepare<[string, string, string, string]>(
        `UPDATE company_id_map
            SET hubspot_company_id = NULL, sync_status = 'inactive', notes = ?, updated_at = ?
          WHERE hubspot_company_id = ? AND wrike_company_id <> ?`,
      );
      const upsert = this.conn.prepare<[string, string, string, string, string, string, string]>(
        `INSERT INTO company_id_map
           (wrike_company_id, hubspot_company_id, company_name, sync_status, last_synced_at, updated_at, created_at, notes)
         VALUES (?, ?, ?, 'active', ?, ?, ?, ?)
         ON CONFLICT(wrike_company_id) DO UPDATE SET
           hubspot_company_id = excluded.hubspot_company_id,
           company_name       = excluded.company_name,
           sync_status        = 'active',
           last_synced_at     = excluded.last_synced_at,
           updated_at         = excluded.updated_at,
           notes              = excluded.notes`,
      );

      this.conn.transaction(() => {
        release.run(
          `HubSpot id ${input.hubspotCompanyId} re-linked to Wrike ${input.wrikeCompanyId}`,
          now,
          input.hubspotCompanyId,
          input.wrikeCompanyId,
        );
        upsert.run(
          input.wrikeCompanyId,
          input.hubspotCompanyId,
          input.companyName,
          now,
          now,
          now,
          input.notes ?? '',
        );
      })();

      const row = this.conn
        .prepare<[string], RawMappingRow>('SELECT * FROM company_id_map WHERE wrike_company_id = ?')
        .get(input.wrikeCompanyId);
      if (!row) throw new Error('Upserted mapping row not found');
      return toMapping(row);
    });
  }

  async setMappingStatus(wrikeCompanyId: string, status: MappingStatus, notes: string): Promise<void> {
    await safeStoreCall('mapping.status', () => {
      this.conn
        .prepare<[string, string, string, string]>(
          'UPDATE company_id_map SET sync_status = ?, notes = ?, updated_at = ? WHERE wrike_company_id = ?',
        )
        .run(status, notes, this.nowIso(), wrikeCompanyId);
    });
  }

  async listMappings(limit: number): Promise<CompanyMapping[]> {
    return safeStoreCall('mapping.list', () =>
      this.conn
        .prepare<[number], RawMappingRow>('SELECT * FROM company_id_map ORDER BY updated_at DESC LIMIT ?')
        .all(limit)
        .map(toMapping),
    );
  }

  async countMappings(): Promise<MappingCounts> {
    return safeStoreCall('mapping.list', () => {
      const row = this.conn
        .prepare<[], { total: number; active: number | null }>(
          `SELECT COUNT(*) AS total, SUM(CASE WHEN sync_status = 'active' THEN 1 ELSE 0 END) AS active
             FROM company_id_map`,
        )
        .get();
      const total = row?.total ?? 0;
      const active = row?.active ?? 0;
      return { total, active, inactive: total - active };
    });
  }

  // ── Watermarks ────────────────────────────────────────────────────────────

  async getState(key: string): Promise<string | null> {
    return safeStoreCall('state.get', () => {
      const row = this.conn.prepare<[string], { v: string }>('SELECT v FROM sync_state WHERE k = ?').get(key);
      return row?.v ?? null;
    });
  }

  async setState(key: string, value: string): Promise<void> {
    await safeStoreCall('state.set', () => {
      this.conn
        .prepare<[string, string]>('INSERT INTO sync_state (k, v) VALUES (?, ?) ON CONFLICT(k) DO UPDATE SET v = excluded.v')
        .run(key, value);
    });
  }

  // ── Change-tracking queue ─────────────────────────────────────────────────

  async trackChange(input: ChangeRecordInput): Promise<number | null> {
    return safeStoreCall('change.track', () => {
      const result = this.conn
        .prepare<[string, string, string, string, string]>(
          `INSERT OR IGNORE INTO change_tracking (source, record_id, record_name, change_type, detected_at, status)
           VALUES (?, ?, ?, ?, ?, 'pending')`,
        )
        .run(input.source, input.recordId, input.recordName, input.changeType, input.detectedAt.toISOString());
      return result.changes === 0 ? null : Number(result.lastInsertRowid);
    });
  }

  async listPendingChanges(limit: number): Promise<ChangeRecord[]> {
    return safeStoreCall('change.list', () =>
      this.conn
        .prepare<[number], RawChangeRow>(
          `SELECT * FROM change_tracking WHERE status = 'pending' ORDER BY detected_at ASC, id ASC LIMIT ?`,
        )
        .all(limit)
        .map(toChange),
    );
  }

  async markChangeSynced(id: number): Promise<void> {
    await safeStoreCall('change.mark', () => {
      this.conn
        .prepare<[string, number]>(
          `UPDATE change_tracking SET status = 'synced', synced_at = ?, error_message = NULL WHERE id = ?`,
        )
        .run(this.nowIso(), id);
    });
  }

  async markChangeFailed(id: number, errorMessage: string): Promise<void> {
    await safeStoreCall('change.mark', () => {
      this.conn
        .prepare<[string, string, number]>(
          `UPDATE change_tracking SET status = 'failed', synced_at = ?, error_message = ? WHERE id = ?`,
        )
        .run(this.nowIso(), errorMessage.slice(0, 1000), id);
    });
  }

  async getChangeStats(since: Date): Promise<ChangeStats> {
    return safeStoreCall('change.stats', () => {
      const rows = this.conn
        .prepare<[string], { source: string; status: string; n: number }>(
          `SELECT source, status, COUNT(*) AS n FROM change_tracking
            WHERE detected_at >= ? GROUP BY source, status`,
        )
        .all(since.toISOString());

      const stats: ChangeStats = { total: 0, pending: 0, synced: 0, failed: 0, bySource: { wrike: 0, hubspot: 0 } };
      for (const row of rows) {
        stats.total += row.n;
        stats[oneOf(CHANGE_STATUSES, row.status, 'pending')] += row.n;
        stats.bySource[oneOf(SYSTEMS, row.source, 'wrike')] += row.n;
      }
      return stats;
    });
  }

  async cleanupOldChanges(before: Date): Promise<number> {
    return safeStoreCall('change.cleanup', () => {
      const result = this.conn
        .prepare<[string]>(`DELETE FROM change_tracking WHERE detected_at < ? AND status <> 'pending'`)
        .run(before.toISOString());
      return result.changes;
    });
  }

  // ── Activities ────────────────────────────────────────────────────────────

  async startActivity(type: ActivityType): Promise<number> {
    return safeStoreCall('activity.start', () => {
      const result = this.conn
        .prepare<[string, string]>(`INSERT INTO sync_activities (activity_type, started_at, status) VALUES (?, ?, 'running')`)
        .run(type, this.nowIso());
      return Number(result.lastInsertRowid);
    });
  }

  async completeActivity(id: number, totals: ActivityTotals): Promise<void> {
    await safeStoreCall('activity.finish', () => {
      this.conn
        .prepare<[string, number, number, number, number, string, number]>(
          `UPDATE sync_activities
              SET status = 'completed', completed_at = ?, companies_processed = ?, contacts_processed = ?,
                  changes_made = ?, errors = ?, summary = ?
            WHERE id = ?`,
        )
        .run(
          this.nowIso(),
          totals.companiesProcessed,
          totals.contactsProcessed,
          totals.changesMade,
          totals.errors,
          totals.summary,
          id,
        );
    });
  }

  async failActivity(id: number, errorMessage: string): Promise<void> {
    await safeStoreCall('activity.finish', () => {
      this.conn
        .prepare<[string, string, number]>(
          `UPDATE sync_activities SET status = 'failed', completed_at = ?, summary = ? WHERE id = ?`,
        )
        .run(this.nowIso(), errorMessage.slice(0, 2000), id);
    });
  }

  async recordFieldChange(input: FieldChangeInput): Promise<void> {
    await safeStoreCall('activity.record', () => {
      this.conn
        .prepare<
          [number, string, string, string | null, string, string, string, string | null, string | null, number, string, string]
        >(
          `INSERT INTO sync_activity_changes
             (activity_id, company_name, wrike_company_id, hubspot_company_id, entity_type, field_name,
              system_changed, old_value, new_value, changed, action, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          input.activityId,
          input.companyName,
          input.wrikeId,
          input.hubspotId,
          input.entityType,
          input.fieldName,
          input.systemChanged,
          input.oldValue,
          input.newValue,
          input.changed ? 1 : 0,
          input.action,
          this.nowIso(),
        );
    });
  }

  async listActivities(limit: number): Promise<SyncActivity[]> {
    return safeStoreCall('activity.list', () =>
      this.conn
        .prepare<[number], RawActivityRow>('SELECT * FROM sync_activities ORDER BY id DESC LIMIT ?')
        .all(limit)
        .map(toActivity),
    );
  }

  async getActivity(id: number): Promise<SyncActivity | null> {
    return safeStoreCall('activity.list', () => {
      const row = this.conn.prepare<[number], RawActivityRow>('SELECT * FROM sync_activities WHERE id = ?').get(id);
      return row ? toActivity(row) : null;
    });
  }

  async getActivityChanges(activityId: number): Promise<FieldChange[]> {
    return safeStoreCall('activity.list', () =>
      this.conn
        .prepare<[number], RawFieldChangeRow>('SELECT * FROM sync_activity_changes WHERE activity_id = ? ORDER BY id ASC')
        .all(activityId)
        .map(toFieldChange),
    );
  }

  // ── Issues + reports ──────────────────────────────────────────────────────

  async addIssue(input: ReconciliationIssueInput): Promise<void> {
    await safeStoreCall('issue.add', () => {
      this.conn
        .prepare<[string, string, string, string, string, string]>(
          `INSERT INTO reconciliation_issue (created_at, source, entity_type, entity_id, issue_type, detail)
           VALUES (?, ?, ?, ?, ?, ?)`,
        )
        .run(this.nowIso(), input.source, input.entityType, input.entityId, input.issueType, input.detail.slice(0, 2000));
    });
  }

  async listUnresolvedIssues(limit: number): Promise<ReconciliationIssue[]> {
    return safeStoreCall('issue.list', () =>
      this.conn
        .prepare<[number], RawIssueRow>('SELECT * FROM reconciliation_issue WHERE resolved = 0 ORDER BY id DESC LIMIT ?')
        .all(limit)
        .map(toIssue),
    );
  }

  async countUnresolvedIssues(): Promise<number> {
    return safeStoreCall('issue.list', () => {
      const row = this.conn
        .prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM reconciliation_issue WHERE resolved = 0')
        .get();
      return row?.n ?? 0;
    });
  }

  async resolveIssue(id: number): Promise<boolean> {
    return safeStoreCall('issue.resolve', () => {
      const result = this.conn
        .prepare<[number]>('UPDATE reconciliation_issue SET resolved = 1 WHERE id = ? AND resolved = 0')
        .run(id);
      return result.changes > 0;
    });
  }

  async saveReconciliationReport(report: ReconciliationReportInput): Promise<number> {
    return safeStoreCall('report.save', () => {
      const result = this.conn
        .prepare<[string, number, number, number, number, number, number, number, string, string | null, string]>(
          `INSERT INTO reconciliation_reports
             (run_at, wrike_total, hubspot_total, matched, wrike_only, hubspot_only, mismatched, auto_fixed,
              status, error_message, details_json)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          this.nowIso(),
          report.wrikeTotal,
          report.hubspotTotal,
          report.matched,
          report.wrikeOnly,
          report.hubspotOnly,
          report.mismatched,
          report.autoFixed,
          report.status,
          report.errorMessage,
          JSON.stringify(report.details),
        );
      return Number(result.lastInsertRowid);
    });
  }

  async getLastReconciliationReport(): Promise<ReconciliationReport | null> {
    return safeStoreCall('report.list', () => {
      const row = this.conn
        .prepare<[], RawReportRow>('SELECT * FROM reconciliation_reports ORDER BY id DESC LIMIT 1')
        .get();
      return row ? toReport(row) : null;
    });
  }

  async listReconciliationReports(limit: number): Promise<ReconciliationReport[]> {
    return safeStoreCall('report.list', () =>
      this.conn
        .prepare<[number], RawReportRow>('SELECT * FROM reconciliation_reports ORDER BY id DESC LIMIT ?')
        .all(limit)
        .map(toReport),
    );
  }

  // ── Operation log ─────────────────────────────────────────────────────────

  async logOperation(input: SyncLogInput): Promise<void> {
    await safeStoreCall('log.write', () => {
      this.conn
        .prepare<[string, string, string, string, string, string, string, string]>(
          `INSERT INTO sync_logs
             (operation, source_system, target_system, entity_type, entity_id, status, message, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          input.operation,
          input.sourceSystem,
          input.targetSystem,
          input.entityType,
          input.entityId,
          input.status,
          input.message.slice(0, 1000),
          this.nowIso(),
        );
    });
  }
}
