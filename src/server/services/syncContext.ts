// =============================================================================
// Sync Context — what every routine receives from the orchestrator
// =============================================================================
// Routines are plain async functions over this context; the orchestrator
// owns the instances and the lock. Shared result bookkeeping lives here so
// the four directional passes count records the same way.
// =============================================================================
import type { SyncConfig } from '../config';
import type { EntityType, ExternalSystem, HubSpotGateway, WrikeGateway } from '../types';
import logger from '../utils/logger';
import { safeErrorMessage } from '../utils/sanitizeError';
import type { FieldMappingTable } from './fieldMapping';
import type { IdentityMap } from './identityMap';
import { classifyFailure, type SyncDiagnostics } from './syncDiagnostics';
import type { SyncStore } from './syncStore';

export interface SyncContext {
  store: SyncStore;
  identityMap: IdentityMap;
  wrike: WrikeGateway;
  hubspot: HubSpotGateway;
  config: SyncConfig;
  fields: FieldMappingTable;
  diagnostics: SyncDiagnostics;
  now: () => Date;
}

/** Watermark keys in sync_state, one per direction */
export const WATERMARKS = {
  companiesToHubSpot: 'wrike_to_hubspot_companies_last_run',
  contactsToHubSpot: 'wrike_to_hubspot_contacts_last_run',
  companiesToWrike: 'hubspot_to_wrike_companies_last_run',
  contactsToWrike: 'hubspot_to_wrike_contacts_last_run',
  detectWrike: 'change_detection_wrike_last_run',
  detectHubSpot: 'change_detection_hubspot_last_run',
} as const;

export type WatermarkKey = (typeof WATERMARKS)[keyof typeof WATERMARKS];

export interface SyncWindow {
  start: Date;
  end: Date;
}

/**
 * `[watermark, now)`; without a readable watermark the window opens
 * `fallbackMs` before now.
 */
export async function windowFor(ctx: SyncContext, key: WatermarkKey, fallbackMs: number): Promise<SyncWindow> {
  const end = ctx.now();
  const stored = await ctx.store.getState(key);
  const parsed = stored ? new Date(stored) : null;
  const start =
    parsed && !Number.isNaN(parsed.getTime()) ? parsed : new Date(end.getTime() - fallbackMs);
  return { start, end };
}

export async function advanceWatermark(ctx: SyncContext, key: WatermarkKey, to: Date): Promise<void> {
  await ctx.store.setState(key, to.toISOString());
}

export function batchLookbackMs(ctx: SyncContext): number {
  return ctx.config.sync.batchLookbackDays * 24 * 60 * 60 * 1000;
}

// ─────────────────────────────────────────────────────────────────────────────
// Per-record outcomes + pass results
// ─────────────────────────────────────────────────────────────────────────────

export type OutcomeKind =
  | 'created'
  | 'updated'
  | 'already_synced'
  | 'skipped'
  | 'no_email'
  | 'out_of_scope';

export interface RecordOutcome {
  kind: OutcomeKind;
  recordId: string;
  name: string;
  /** Id of the record in the other system, once known */
  counterpartId: string | null;
  /** An already-synced record was still written (Wrike → HubSpot always writes) */
  written?: boolean;
  reason?: string;
}

export interface RecordDetail {
  recordId: string;
  name: string;
  action: OutcomeKind | 'failed';
  counterpartId: string | null;
  reason?: string;
}

export interface DirectionResult {
  processed: number;
  created: number;
  updated: number;
  /** Linked records whose compared fields were all equal */
  alreadySynced: number;
  skipped: number;
  failed: number;
  details: RecordDetail[];
}

export interface ContactDirectionResult extends DirectionResult {
  skippedNoEmail: number;
}

export function emptyDirectionResult(): DirectionResult {
  return { processed: 0, created: 0, updated: 0, alreadySynced: 0, skipped: 0, failed: 0, details: [] };
}

export function emptyContactResult(): ContactDirectionResult {
  return { ...emptyDirectionResult(), skippedNoEmail: 0 };
}

/** Adds one record's outcome to a pass result. */
export function tallyOutcome(
  ctx: SyncContext,
  result: DirectionResult | ContactDirectionResult,
  outcome: RecordOutcome,
): void {
  if (outcome.kind === 'out_of_scope') return;
  if (outcome.kind === 'no_email') {
    if ('skippedNoEmail' in result) result.skippedNoEmail++;
    return;
  }

  result.processed++;
  ctx.diagnostics.incrementProcessed();

  switch (outcome.kind) {
    case 'created':
      result.created++;
      ctx.diagnostics.recordSuccess();
      break;
    case 'updated':
      result.updated++;
      ctx.diagnostics.recordSuccess();
      break;
    case 'already_synced':
      result.alreadySynced++;
      if (outcome.written) result.updated++;
      ctx.diagnostics.recordSuccess();
      break;
    case 'skipped':
      result.skipped++;
      break;
  }

  result.details.push({
    recordId: outcome.recordId,
    name: outcome.name,
    action: outcome.kind,
    counterpartId: outcome.counterpartId,
    ...(outcome.reason ? { reason: outcome.reason } : {}),
  });
}

export interface FailedRecord {
  source: ExternalSystem;
  entityType: EntityType;
  recordId: string;
  name: string;
}

/**
 * Record-boundary failure: logged, persisted as a reconciliation issue,
 * classified for diagnostics and counted. The pass carries on.
 */
export async function recordFailure(
  ctx: SyncContext,
  result: DirectionResult,
  record: FailedRecord,
  err: unknown,
): Promise<void> {
  const message = safeErrorMessage(err);
  logger.error(`Failed to sync ${record.source} ${record.entityType}`, {
    recordId: record.recordId,
    error: message,
  });

  result.processed++;
  result.failed++;
  result.details.push({
    recordId: record.recordId,
    name: record.name,
    action: 'failed',
    counterpartId: null,
    reason: message,
  });

  ctx.diagnostics.incrementProcessed();
  ctx.diagnostics.incrementFailed();
  ctx.diagnostics.recordIssue(classifyFailure(err), record.recordId, record.name, undefined, message);

  await ctx.store.addIssue({
    source: record.source,
    entityType: record.entityType,
    entityId: record.recordId,
    issueType: 'sync_error',
    detail: message,
  });
}
