// =============================================================================
// ID / Name Cross-Sync — keeps each system's pointer to the other current
// =============================================================================
// Runs after the four directional passes, over every marker company task.
//   Names : HubSpot company name → Wrike "HubSpot Account Name" field
//   Ids   : HubSpot id → Wrike "HubSpot Account ID" field, and
//           Wrike task id → HubSpot cross-reference property
//
// Each routine is skipped (with a warning) when its Wrike field is not in
// the mapping file. Task titles are never written here.
// =============================================================================
import type { HubSpotObject, WrikeTask } from '../types';
import { GatewayError, NotFoundError } from '../utils/GatewayError';
import logger from '../utils/logger';
import { collectAll } from '../utils/paginate';
import { safeErrorMessage } from '../utils/sanitizeError';
import { normalizeValue, readCustomField, setCustomField } from './fieldMapping';
import { classifyFailure } from './syncDiagnostics';
import type { SyncContext } from './syncContext';

export interface NameSyncResult {
  processed: number;
  updated: number;
  matched: number;
  notFound: number;
  failed: number;
  /** Set when the routine did not run */
  skippedReason?: string;
}

export interface IdSyncResult {
  processed: number;
  wrikeIdsUpdated: number;
  hubspotIdsUpdated: number;
  alreadySynced: number;
  notLinked: number;
  failed: number;
  skippedReason?: string;
}

/** Every marker company task in the companies folder, unwindowed. */
export async function listCompanyTasks(ctx: SyncContext): Promise<WrikeTask[]> {
  const folderId = ctx.config.wrike.companiesFolderId;
  const tasks = await collectAll((pageToken) => ctx.wrike.listFolderTasks(folderId, { descendants: true, pageToken }));
  return tasks.filter((task) => ctx.fields.hasMarkerPrefix(task.title));
}

// ─────────────────────────────────────────────────────────────────────────────
// Company resolution
// ─────────────────────────────────────────────────────────────────────────────

export type Resolution =
  | { kind: 'found'; company: HubSpotObject; via: 'wrike_field' | 'identity_map' | 'search' }
  | { kind: 'missing' }
  | { kind: 'rejected' };

/**
 * HubSpot company for a Wrike company task:
 * Wrike "HubSpot Account ID" field → identity map → cross-reference search.
 * A 404 at either of the first two steps falls through to the next.
 */
export async function resolveCompany(
  ctx: SyncContext,
  task: WrikeTask,
  properties: string[],
): Promise<Resolution> {
  const { hubspot, identityMap, diagnostics, fields } = ctx;
  const name = fields.cleanCompanyName(task.title);
  const idField = fields.company.wrike.hubspotAccountId;

  const fromField = idField ? readCustomField(task, idField) : null;
  if (fromField) {
    try {
      return { kind: 'found', company: await hubspot.getObject('companies', fromField, properties), via: 'wrike_field' };
    } catch (err) {
      if (!(err instanceof NotFoundError)) throw err;
      diagnostics.recordIssue('RECORD_NOT_FOUND', task.id, name, 'HubSpot Account ID', `HubSpot company ${fromField} not found`);
    }
  }

  const mapped = await identityMap.lookupHubSpotByWrike(task.id);
  if (mapped && mapped !== fromField) {
    try {
      return { kind: 'found', company: await hubspot.getObject('companies', mapped, properties), via: 'identity_map' };
    } catch (err) {
      if (!(err instanceof NotFoundError)) throw err;
      await identityMap.markStale(task.id, `HubSpot company ${mapped} returned 404`);
      diagnostics.recordIssue('STALE_LOCAL_MAPPING', task.id, name, undefined, `HubSpot company ${mapped} not found`);
    }
  }

  try {
    const page = await hubspot.searchObjects(
      'companies',
      [{ filters: [{ propertyName: fields.company.hubspot.wrikeTaskId, operator: 'EQ', value: task.id }] }],
      { properties, limit: 1 },
    );
    const match = page.items[0];
    return match ? { kind: 'found', company: match, via: 'search' } : { kind: 'missing' };
  } catch (err) {
    if (!(err instanceof GatewayError) || err.status !== 400) throw err;
    diagnostics.recordIssue(
      'SEARCH_QUERY_REJECTED',
      task.id,
      name,
      fields.company.hubspot.wrikeTaskId,
      'HubSpot search API returned 400 - property may not exist',
    );
    diagnostics.recordSkip(task.id, name, 'HubSpot search failed (400)');
    return { kind: 'rejected' };
  }
}

async function recordCrossSyncFailure(
  ctx: SyncContext,
  task: WrikeTask,
  fieldName: string,
  err: unknown,
): Promise<void> {
  const message = safeErrorMessage(err);
  logger.error(`Cross-sync of ${fieldName} failed`, { taskId: task.id, error: message });
  ctx.diagnostics.incrementFailed();
  ctx.diagnostics.recordIssue(classifyFailure(err), task.id, ctx.fields.cleanCompanyName(task.title), fieldName, message);
  await ctx.store.addIssue({
    source: 'wrike',
    entityType: 'company',
    entityId: task.id,
    issueType: 'sync_error',
    detail: `${fieldName}: ${message}`,
  });
}

// =============================================================================
// (a) HubSpot name → Wrike "HubSpot Account Name"
// =============================================================================

export async function syncCompanyNames(
  ctx: SyncContext,
  tasks: WrikeTask[],
  activityId: number,
): Promise<NameSyncResult> {
  const result: NameSyncResult = { processed: 0, updated: 0, matched: 0, notFound: 0, failed: 0 };
  const nameField = ctx.fields.company.wrike.hubspotAccountName;
  if (!nameField) {
    logger.warn('hubspotAccountName Wrike field not configured; skipping company name sync');
    return { ...result, skippedReason: 'wrike.companyCustomFields.hubspotAccountName not configured' };
  }

  const props = ctx.fields.company.hubspot;
  for (const task of tasks) {
    if (!ctx.fields.hasMarkerPrefix(task.title)) continue;
    result.processed++;
    const companyName = ctx.fields.cleanCompanyName(task.title);

    try {
      const resolution = await resolveCompany(ctx, task, [props.name, props.wrikeTaskId]);
      if (resolution.kind === 'rejected') {
        result.notFound++;
        continue;
      }

      const actual = resolution.kind === 'found' ? normalizeValue(resolution.company.properties[props.name]) : '';
      if (resolution.kind === 'missing' || !actual) {
        result.notFound++;
        ctx.diagnostics.recordIssue(
          'NO_CROSS_REFERENCE_LINK',
          task.id,
          companyName,
          'HubSpot Account Name',
          'No HubSpot company found to take the name from',
        );
        ctx.diagnostics.recordSkip(task.id, companyName, 'No HubSpot match by id');
        continue;
      }

      const current = readCustomField(task, nameField) ?? '';
      const changed = actual !== current;
      if (changed) {
        await ctx.wrike.updateTask(task.id, { customFields: setCustomField([], nameField, actual) });
        result.updated++;
        logger.info('Wrike HubSpot Account Name updated', { taskId: task.id, from: current, to: actual });
      } else {
        result.matched++;
      }

      await ctx.store.recordFieldChange({
        activityId,
        companyName,
        wrikeId: task.id,
        hubspotId: resolution.company.id,
        entityType: 'company',
        fieldName: 'HubSpot Account Name',
        systemChanged: 'wrike',
        oldValue: current,
        newValue: actual,
        changed,
        action: changed ? 'updated' : 'skipped',
      });
    } catch (err) {
      result.failed++;
      await recordCrossSyncFailure(ctx, task, 'HubSpot Account Name', err);
    }
  }

  logger.info('Company name sync complete', { ...result });
  return result;
}

// =============================================================================
// (b) Cross-reference ids, both directions
// =============================================================================

export async function syncCompanyIds(
  ctx: SyncContext,
  tasks: WrikeTask[],
  activityId: number,
): Promise<IdSyncResult> {
  const result: IdSyncResult = {
    processed: 0,
    wrikeIdsUpdated: 0,
    hubspotIdsUpdated: 0,
    alreadySynced: 0,
    notLinked: 0,
    failed: 0,
  };
  const idField = ctx.fields.company.wrike.hubspotAccountId;
  if (!idField) {
    logger.warn('hubspotAccountId Wrike field not configured; skipping company id sync');
    return { ...result, skippedReason: 'wrike.companyCustomFields.hubspotAccountId not configured' };
  }

  const crossRef = ctx.fields.company.hubspot.wrikeTaskId;
  for (const task of tasks) {
    if (!ctx.fields.hasMarkerPrefix(task.title)) continue;
    result.processed++;
    const companyName = ctx.fields.cleanCompanyName(task.title);

    try {
      const resolution = await resolveCompany(ctx, task, [ctx.fields.company.hubspot.name, crossRef]);
      if (resolution.kind !== 'found') {
        result.notLinked++;
        continue;
      }

      const hubspotId = resolution.company.id;
      const wrikeHolds = readCustomField(task, idField) ?? '';
      const hubspotHolds = normalizeValue(resolution.company.properties[crossRef]);
      const wrikeChanged = wrikeHolds !== hubspotId;
      const hubspotChanged = hubspotHolds !== task.id;

      if (wrikeChanged) {
        await ctx.wrike.updateTask(task.id, { customFields: setCustomField([], idField, hubspotId) });
        result.wrikeIdsUpdated++;
      }
      await ctx.store.recordFieldChange({
        activityId,
        companyName,
        wrikeId: task.id,
        hubspotId,
        entityType: 'company',
        fieldName: 'HubSpot Account ID',
        systemChanged: 'wrike',
        oldValue: wrikeHolds,
        newValue: hubspotId,
        changed: wrikeChanged,
        action: wrikeChanged ? 'updated' : 'skipped',
      });

      if (hubspotChanged) {
        await ctx.hubspot.updateObject('companies', hubspotId, { [crossRef]: task.id });
        result.hubspotIdsUpdated++;
      }
      await ctx.store.recordFieldChange({
        activityId,
        companyName,
        wrikeId: task.id,
        hubspotId,
        entityType: 'company',
        fieldName: 'Wrike Client ID',
        systemChanged: 'hubspot',
        oldValue: hubspotHolds,
        newValue: task.id,
        changed: hubspotChanged,
        action: hubspotChanged ? 'updated' : 'skipped',
      });

      await ctx.identityMap.link(task.id, hubspotId, companyName);

      if (wrikeChanged || hubspotChanged) {
        logger.info('Company ids reconciled', { taskId: task.id, hubspotId, wrikeChanged, hubspotChanged });
      } else {
        result.alreadySynced++;
      }
    } catch (err) {
      result.failed++;
      await recordCrossSyncFailure(ctx, task, 'HubSpot Account ID', err);
    }
  }

  logger.info('Company id sync complete', { ...result });
  return result;
}
