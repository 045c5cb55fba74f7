// =============================================================================
// Company Sync — Wrike marker tasks ⇄ HubSpot companies
// =============================================================================
// Wrike → HubSpot
//   Only titles carrying the marker prefix are companies; anything else in
//   the folder is skipped before any remote call. The display name is the
//   title with the marker stripped, tier becomes priority, and every write
//   stamps the cross-reference property with the Wrike task id.
//
//   Target resolution:  identity map  →  search by cross-reference id  →  create
//   A 404 on the mapped id deactivates the link and falls through.
//   Never matched by name: names collide.
//
// HubSpot → Wrike
//   Custom fields only; the task title (and its marker) is never written.
//   Skips the write when every compared field already matches, so the
//   HubSpot echo of our own update does not bounce back.
// =============================================================================
import type { HubSpotFilterGroup, HubSpotObject, RecordAction, WrikeCustomFieldValue, WrikeTask } from '../types';
import { GatewayError, NotFoundError } from '../utils/GatewayError';
import logger from '../utils/logger';
import { paginate } from '../utils/paginate';
import { normalizeValue, readCustomField, setCustomField } from './fieldMapping';
import {
  WATERMARKS,
  advanceWatermark,
  batchLookbackMs,
  emptyDirectionResult,
  recordFailure,
  tallyOutcome,
  windowFor,
  type DirectionResult,
  type RecordOutcome,
  type SyncContext,
} from './syncContext';

interface ComparedField {
  label: string;
  oldValue: string;
  newValue: string;
}

function crossReferenceFilter(ctx: SyncContext, wrikeTaskId: string): HubSpotFilterGroup[] {
  return [
    {
      filters: [{ propertyName: ctx.fields.company.hubspot.wrikeTaskId, operator: 'EQ', value: wrikeTaskId }],
    },
  ];
}

async function writeFieldChanges(
  ctx: SyncContext,
  activityId: number,
  base: { companyName: string; wrikeId: string; hubspotId: string | null; systemChanged: 'wrike' | 'hubspot' },
  compared: ComparedField[],
  action: RecordAction,
): Promise<void> {
  for (const field of compared) {
    await ctx.store.recordFieldChange({
      activityId,
      ...base,
      entityType: 'company',
      fieldName: field.label,
      oldValue: field.oldValue,
      newValue: field.newValue,
      changed: field.oldValue !== field.newValue,
      action,
    });
  }
}

// =============================================================================
// Wrike → HubSpot
// =============================================================================

/** Syncs one Wrike company task into HubSpot. Throws on record-level failure. */
export async function syncCompanyTaskToHubSpot(
  ctx: SyncContext,
  task: WrikeTask,
  activityId: number,
): Promise<RecordOutcome> {
  const { fields, hubspot, identityMap, diagnostics } = ctx;
  const props = fields.company.hubspot;
  const cf = fields.company.wrike;

  if (!fields.hasMarkerPrefix(task.title)) {
    logger.debug('Skipping non-company Wrike task', { taskId: task.id });
    return { kind: 'out_of_scope', recordId: task.id, name: task.title, counterpartId: null };
  }

  const name = fields.cleanCompanyName(task.title);
  if (!name) {
    diagnostics.recordIssue('REQUIRED_FIELD_MISSING', task.id, task.title, props.name, 'Title has no name after the marker');
    diagnostics.recordSkip(task.id, task.title, 'Empty company name');
    return { kind: 'skipped', recordId: task.id, name: task.title, counterpartId: null, reason: 'Empty company name' };
  }

  const status = readCustomField(task, cf.accountStatus) ?? '';
  const score = readCustomField(task, cf.affinityScore) ?? '';
  const tier = readCustomField(task, cf.accountTier) ?? '';
  const priority = fields.tierToPriority(tier);

  const outgoing: Record<string, string> = {
    [props.name]: name,
    [props.accountStatus]: status,
    [props.affinityScore]: score,
    [props.accountPriority]: priority,
    [props.wrikeTaskId]: task.id,
  };
  const readProps = fields.companyPropertyNames();

  logger.info('Syncing company to HubSpot', { taskId: task.id, name, tier, priority });

  let hubspotId = await identityMap.lookupHubSpotByWrike(task.id);
  let before: HubSpotObject | null = null;
  let action: RecordAction | null = null;

  // (a) identity map
  if (hubspotId) {
    try {
      before = await hubspot.getObject('companies', hubspotId, readProps);
      await hubspot.updateObject('companies', hubspotId, outgoing);
      action = 'updated';
    } catch (err) {
      if (!(err instanceof NotFoundError)) throw err;
      await identityMap.markStale(task.id, `HubSpot company ${hubspotId} returned 404`);
      diagnostics.recordIssue('STALE_LOCAL_MAPPING', task.id, name, props.wrikeTaskId, `HubSpot company ${hubspotId} not found`);
      hubspotId = null;
      before = null;
    }
  }

  // (b) search by cross-reference id
  if (!hubspotId) {
    let match: HubSpotObject | undefined;
    try {
      const page = await hubspot.searchObjects('companies', crossReferenceFilter(ctx, task.id), {
        properties: readProps,
        limit: 1,
      });
      match = page.items[0];
    } catch (err) {
      if (!(err instanceof GatewayError) || err.status !== 400) throw err;
      logger.warn('HubSpot rejected cross-reference search', { taskId: task.id, property: props.wrikeTaskId });
      diagnostics.recordIssue(
        'SEARCH_QUERY_REJECTED',
        task.id,
        name,
        props.wrikeTaskId,
        'HubSpot search API returned 400 - property may not exist',
      );
      diagnostics.recordSkip(task.id, name, 'HubSpot search failed (400)');
      return { kind: 'skipped', recordId: task.id, name, counterpartId: null, reason: 'HubSpot search rejected' };
    }

    if (match) {
      hubspotId = match.id;
      before = match;
      await hubspot.updateObject('companies', hubspotId, outgoing);
      action = 'updated';
    }
  }

  // (c) create
  if (!hubspotId) {
    const created = await hubspot.createObject('companies', outgoing);
    hubspotId = created.id;
    action = 'created';
  }

  const effectiveAction: RecordAction = action ?? 'created';
  await identityMap.link(task.id, hubspotId, name);
  await ctx.store.logOperation({
    operation: effectiveAction === 'created' ? 'create' : 'update',
    sourceSystem: 'wrike',
    targetSystem: 'hubspot',
    entityType: 'company',
    entityId: task.id,
    status: 'success',
    message: `${effectiveAction} HubSpot company ${hubspotId}`,
  });

  const current = (prop: string): string => normalizeValue(before?.properties[prop]);
  const compared: ComparedField[] = [
    { label: 'Company Name', oldValue: current(props.name), newValue: name },
    { label: 'Account Status', oldValue: current(props.accountStatus), newValue: status },
    { label: 'Affinity Score', oldValue: current(props.affinityScore), newValue: score },
    { label: 'Priority', oldValue: current(props.accountPriority), newValue: priority },
  ];
  await writeFieldChanges(
    ctx,
    activityId,
    { companyName: name, wrikeId: task.id, hubspotId, systemChanged: 'hubspot' },
    compared,
    effectiveAction,
  );

  logger.info(`HubSpot company ${effectiveAction}`, { taskId: task.id, hubspotId });

  if (effectiveAction === 'updated' && compared.every((f) => f.oldValue === f.newValue)) {
    return { kind: 'already_synced', recordId: task.id, name, counterpartId: hubspotId, written: true };
  }
  return { kind: effectiveAction, recordId: task.id, name, counterpartId: hubspotId };
}

/** Batch pass over Wrike company tasks updated in `[watermark, now)`. */
export async function syncCompaniesToHubSpot(ctx: SyncContext, activityId: number): Promise<DirectionResult> {
  const { start, end } = await windowFor(ctx, WATERMARKS.companiesToHubSpot, batchLookbackMs(ctx));
  const folderId = ctx.config.wrike.companiesFolderId;
  const result = emptyDirectionResult();

  logger.info('Wrike → HubSpot companies', { start: start.toISOString(), end: end.toISOString() });

  const tasks = paginate((pageToken) =>
    ctx.wrike.listFolderTasks(folderId, { updatedBetween: { start, end }, descendants: true, pageToken }),
  );
  for await (const task of tasks) {
    try {
      tallyOutcome(ctx, result, await syncCompanyTaskToHubSpot(ctx, task, activityId));
    } catch (err) {
      await recordFailure(
        ctx,
        result,
        { source: 'wrike', entityType: 'company', recordId: task.id, name: ctx.fields.cleanCompanyName(task.title) },
        err,
      );
    }
  }

  await advanceWatermark(ctx, WATERMARKS.companiesToHubSpot, end);
  return result;
}

// =============================================================================
// HubSpot → Wrike
// =============================================================================

/** Syncs one HubSpot company onto its linked Wrike task. */
export async function syncHubSpotCompanyToWrike(
  ctx: SyncContext,
  company: HubSpotObject,
  activityId: number,
): Promise<RecordOutcome> {
  const { fields, wrike, identityMap, diagnostics } = ctx;
  const props = fields.company.hubspot;
  const cf = fields.company.wrike;
  const hubspotName = normalizeValue(company.properties[props.name]) || company.id;

  const mapped = await identityMap.lookupWrikeByHubSpot(company.id);
  const wrikeId = mapped ?? (normalizeValue(company.properties[props.wrikeTaskId]) || null);
  if (!wrikeId) {
    diagnostics.recordIssue('NO_CROSS_REFERENCE_LINK', company.id, hubspotName, props.wrikeTaskId, 'No Wrike task linked');
    diagnostics.recordSkip(company.id, hubspotName, 'No Wrike link');
    return { kind: 'skipped', recordId: company.id, name: hubspotName, counterpartId: null, reason: 'No Wrike link' };
  }

  // A property-only link never takes over a task another company holds
  if (!mapped) {
    const holder = await identityMap.lookupHubSpotByWrike(wrikeId);
    if (holder && holder !== company.id) {
      const detail = `Wrike task ${wrikeId} is already linked to HubSpot company ${holder}`;
      diagnostics.recordIssue('NO_CROSS_REFERENCE_LINK', company.id, hubspotName, props.wrikeTaskId, detail);
      diagnostics.recordSkip(company.id, hubspotName, detail);
      logger.warn('HubSpot company points at a Wrike task linked elsewhere', {
        hubspotId: company.id,
        taskId: wrikeId,
        linkedHubSpotId: holder,
      });
      return {
        kind: 'skipped',
        recordId: company.id,
        name: hubspotName,
        counterpartId: wrikeId,
        reason: 'Wrike task linked to another HubSpot company',
      };
    }
  }

  let task: WrikeTask;
  try {
    task = await wrike.getTask(wrikeId);
  } catch (err) {
    if (!(err instanceof NotFoundError)) throw err;
    if (mapped) {
      await identityMap.markStale(wrikeId, `Wrike task ${wrikeId} returned 404`);
      diagnostics.recordIssue('STALE_LOCAL_MAPPING', company.id, hubspotName, undefined, `Wrike task ${wrikeId} not found`);
    } else {
      diagnostics.recordIssue('RECORD_NOT_FOUND', company.id, hubspotName, props.wrikeTaskId, `Wrike task ${wrikeId} not found`);
    }
    diagnostics.recordSkip(company.id, hubspotName, 'Linked Wrike task not found');
    return { kind: 'skipped', recordId: company.id, name: hubspotName, counterpartId: wrikeId, reason: 'Wrike task not found' };
  }

  if (!fields.hasMarkerPrefix(task.title)) {
    diagnostics.recordSkip(company.id, hubspotName, 'Linked Wrike task is not a company task');
    return { kind: 'skipped', recordId: company.id, name: hubspotName, counterpartId: wrikeId, reason: 'Not a company task' };
  }

  const incoming: Array<{ label: string; fieldId: string; value: string }> = [
    { label: 'Account Status', fieldId: cf.accountStatus, value: normalizeValue(company.properties[props.accountStatus]) },
    { label: 'Affinity Score', fieldId: cf.affinityScore, value: normalizeValue(company.properties[props.affinityScore]) },
    { label: 'Tier', fieldId: cf.accountTier, value: fields.priorityToTier(company.properties[props.accountPriority]) },
  ];

  // Empty HubSpot values leave the Wrike field as it is
  const compared = incoming.map((f) => {
    const oldValue = readCustomField(task, f.fieldId) ?? '';
    return { ...f, oldValue, newValue: f.value === '' ? oldValue : f.value };
  });
  const pending = compared.filter((f) => f.oldValue !== f.newValue);

  let customFields: WrikeCustomFieldValue[] = [];
  for (const f of pending) customFields = setCustomField(customFields, f.fieldId, f.newValue);

  const companyName = fields.cleanCompanyName(task.title);
  if (pending.length) {
    await wrike.updateTask(task.id, { customFields });
    await ctx.store.logOperation({
      operation: 'update',
      sourceSystem: 'hubspot',
      targetSystem: 'wrike',
      entityType: 'company',
      entityId: company.id,
      status: 'success',
      message: `updated Wrike task ${task.id}: ${pending.map((f) => f.label).join(', ')}`,
    });
  }

  await identityMap.link(task.id, company.id, companyName);
  await writeFieldChanges(
    ctx,
    activityId,
    { companyName, wrikeId: task.id, hubspotId: company.id, systemChanged: 'wrike' },
    compared,
    pending.length ? 'updated' : 'skipped',
  );

  if (!pending.length) {
    logger.debug('Wrike company already matches HubSpot', { hubspotId: company.id, taskId: task.id });
    return { kind: 'already_synced', recordId: company.id, name: hubspotName, counterpartId: task.id };
  }
  logger.info('Wrike company updated from HubSpot', { hubspotId: company.id, taskId: task.id });
  return { kind: 'updated', recordId: company.id, name: hubspotName, counterpartId: task.id };
}

/** Batch pass over HubSpot companies modified since the watermark. */
export async function syncCompaniesToWrike(ctx: SyncContext, activityId: number): Promise<DirectionResult> {
  const { start, end } = await windowFor(ctx, WATERMARKS.companiesToWrike, batchLookbackMs(ctx));
  const props = ctx.fields.company.hubspot;
  const result = emptyDirectionResult();

  logger.info('HubSpot → Wrike companies', { start: start.toISOString(), end: end.toISOString() });

  const filterGroups: HubSpotFilterGroup[] = [
    { filters: [{ propertyName: props.lastModified, operator: 'GTE', value: String(start.getTime()) }] },
  ];
  const companies = paginate((after) =>
    ctx.hubspot.searchObjects('companies', filterGroups, {
      properties: ctx.fields.companyPropertyNames(),
      after,
      limit: 100,
      sorts: [{ propertyName: props.lastModified, direction: 'ASCENDING' }],
    }),
  );

  for await (const company of companies) {
    try {
      tallyOutcome(ctx, result, await syncHubSpotCompanyToWrike(ctx, company, activityId));
    } catch (err) {
      await recordFailure(
        ctx,
        result,
        {
          source: 'hubspot',
          entityType: 'company',
          recordId: company.id,
          name: normalizeValue(company.properties[props.name]) || company.id,
        },
        err,
      );
    }
  }

  await advanceWatermark(ctx, WATERMARKS.companiesToWrike, end);
  return result;
}
