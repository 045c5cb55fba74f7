// =============================================================================
// Shared Type Definitions
// =============================================================================

/** The two external systems of record */
export type ExternalSystem = 'wrike' | 'hubspot';

export type EntityType = 'company' | 'contact';

/** Link state of an identity-map row */
export type MappingStatus = 'active' | 'inactive';

/** Change-tracking queue entry state */
export type ChangeStatus = 'pending' | 'synced' | 'failed';

export type ChangeType = 'create' | 'update';

export type ActivityStatus = 'running' | 'completed' | 'failed';

export type ActivityType =
  | 'full_sync'
  | 'change_detection'
  | 'single_record'
  | 'reconciliation';

/** What a directional routine did to one record */
export type RecordAction = 'created' | 'updated' | 'skipped';

/** Issue kinds persisted in reconciliation_issue */
export type IssueType =
  | 'sync_error'
  | 'wrike_only'
  | 'hubspot_only'
  | 'field_mismatch'
  | 'stale_mapping';

// ─────────────────────────────────────────────────────────────────────────────
// Wrike (System A) shapes
// ─────────────────────────────────────────────────────────────────────────────

export interface WrikeCustomFieldValue {
  id: string;
  value: string;
}

export interface WrikeTask {
  id: string;
  title: string;
  customFields?: WrikeCustomFieldValue[];
  createdDate?: string;
  updatedDate?: string;
  permalink?: string;
}

export interface WrikeCustomField {
  id: string;
  title: string;
  type: string;
}

export interface WrikeTaskQuery {
  /** Half-open window on the task's updatedDate */
  updatedBetween?: { start: Date; end: Date };
  /** Equality filter on one custom field */
  customField?: WrikeCustomFieldValue;
  descendants?: boolean;
  pageSize?: number;
  pageToken?: string;
}

export interface WrikeTaskUpdate {
  title?: string;
  customFields?: WrikeCustomFieldValue[];
}

// ─────────────────────────────────────────────────────────────────────────────
// HubSpot (System B) shapes
// ─────────────────────────────────────────────────────────────────────────────

export type HubSpotObjectType = 'companies' | 'contacts';

export interface HubSpotObject {
  id: string;
  properties: Record<string, string | null | undefined>;
  createdAt?: string;
  updatedAt?: string;
}

export interface HubSpotProperty {
  name: string;
  label: string;
  type: string;
}

export type FilterOperator = 'EQ' | 'NEQ' | 'GT' | 'GTE' | 'LT' | 'LTE' | 'HAS_PROPERTY' | 'NOT_HAS_PROPERTY';

export interface HubSpotFilter {
  propertyName: string;
  operator: FilterOperator;
  value?: string;
}

/** Filters inside a group are ANDed; groups are ORed */
export interface HubSpotFilterGroup {
  filters: HubSpotFilter[];
}

export interface HubSpotSearchOptions {
  properties: string[];
  after?: string;
  limit?: number;
  sorts?: Array<{ propertyName: string; direction: 'ASCENDING' | 'DESCENDING' }>;
}

/** One page of a cursor-paged listing */
export interface Page<T> {
  items: T[];
  nextCursor?: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Gateway contracts
// ─────────────────────────────────────────────────────────────────────────────

export interface WrikeGateway {
  listFolderTasks(folderId: string, query?: WrikeTaskQuery): Promise<Page<WrikeTask>>;
  getTask(taskId: string): Promise<WrikeTask>;
  createTask(folderId: string, title: string, customFields: WrikeCustomFieldValue[]): Promise<WrikeTask>;
  updateTask(taskId: string, update: WrikeTaskUpdate): Promise<WrikeTask>;
  listCustomFields(): Promise<WrikeCustomField[]>;
}

export interface HubSpotGateway {
  searchObjects(
    objectType: HubSpotObjectType,
    filterGroups: HubSpotFilterGroup[],
    options: HubSpotSearchOptions,
  ): Promise<Page<HubSpotObject>>;
  getObject(objectType: HubSpotObjectType, id: string, properties: string[]): Promise<HubSpotObject>;
  createObject(objectType: HubSpotObjectType, properties: Record<string, string>): Promise<HubSpotObject>;
  updateObject(objectType: HubSpotObjectType, id: string, properties: Record<string, string>): Promise<HubSpotObject>;
  findContactByEmail(email: string, emailProperty: string, properties: string[]): Promise<HubSpotObject | null>;
  listProperties(objectType: HubSpotObjectType): Promise<HubSpotProperty[]>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Persisted records
// ─────────────────────────────────────────────────────────────────────────────

export interface CompanyMapping {
  wrikeCompanyId: string;
  hubspotCompanyId: string | null;
  companyName: string;
  syncStatus: MappingStatus;
  lastSyncedAt: Date | null;
  notes: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface MappingCounts {
  total: number;
  active: number;
  inactive: number;
}

export interface ChangeRecordInput {
  source: ExternalSystem;
  recordId: string;
  recordName: string;
  changeType: ChangeType;
  /** Modification instant of the source record; part of the dedupe key */
  detectedAt: Date;
}

export interface ChangeRecord extends ChangeRecordInput {
  id: number;
  status: ChangeStatus;
  syncedAt: Date | null;
  errorMessage: string | null;
}

export interface ChangeStats {
  total: number;
  pending: number;
  synced: number;
  failed: number;
  bySource: Record<ExternalSystem, number>;
}

export interface SyncActivity {
  id: number;
  activityType: ActivityType;
  startedAt: Date;
  completedAt: Date | null;
  status: ActivityStatus;
  companiesProcessed: number;
  contactsProcessed: number;
  changesMade: number;
  errors: number;
  summary: string | null;
}

export interface ActivityTotals {
  companiesProcessed: number;
  contactsProcessed: number;
  changesMade: number;
  errors: number;
  summary: string;
}

export interface FieldChangeInput {
  activityId: number;
  companyName: string;
  wrikeId: string;
  hubspotId: string | null;
  entityType: EntityType;
  fieldName: string;
  /** The system whose value was written */
  systemChanged: ExternalSystem;
  oldValue: string | null;
  newValue: string | null;
  changed: boolean;
  action: RecordAction;
}

export interface FieldChange extends FieldChangeInput {
  id: number;
  createdAt: Date;
}

export interface ReconciliationIssueInput {
  source: ExternalSystem | 'reconciliation';
  entityType: EntityType;
  entityId: string;
  issueType: IssueType;
  detail: string;
}

export interface ReconciliationIssue extends ReconciliationIssueInput {
  id: number;
  createdAt: Date;
  resolved: boolean;
}

export interface MismatchObservation {
  wrikeId: string;
  hubspotId: string;
  name: string;
  differences: string[];
}

export interface ReconciliationDetails {
  mismatches: MismatchObservation[];
  wrikeOnly: Array<{ wrikeId: string; name: string }>;
  hubspotOnly: Array<{ hubspotId: string; name: string }>;
}

export interface ReconciliationReportInput {
  wrikeTotal: number;
  hubspotTotal: number;
  matched: number;
  wrikeOnly: number;
  hubspotOnly: number;
  mismatched: number;
  autoFixed: number;
  status: 'completed' | 'failed';
  errorMessage: string | null;
  details: ReconciliationDetails;
}

export interface ReconciliationReport extends ReconciliationReportInput {
  id: number;
  runAt: Date;
}

export interface SyncLogInput {
  operation: 'create' | 'update';
  sourceSystem: ExternalSystem;
  targetSystem: ExternalSystem;
  entityType: EntityType;
  entityId: string;
  status: 'success' | 'error';
  message: string;
}
