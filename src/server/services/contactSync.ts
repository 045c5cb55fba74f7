// =============================================================================
// Contact Sync — Wrike contact tasks ⇄ HubSpot contacts, joined by email
// =============================================================================
// Email is the only reliable join key: a contact without one is counted as
// skippedNoEmail before any remote call. Job title has no Wrike field and
// is never sent either way.
//
// HubSpot → Wrike is opt-in (sync.syncContactsHubspotToWrike) and is the
// only routine that rewrites a task title (to the contact's full name).
// =============================================================================
import type { HubSpotFilterGroup, HubSpotObject, RecordAction, WrikeCustomFieldValue, WrikeTask } from '../types';
import logger from '../utils/logger';
import { paginate } from '../utils/paginate';
import { fullName, normalizeValue, readCustomField, setCustomField, splitTitle } from './fieldMapping';
import {
  WATERMARKS,
  advanceWatermark,
  batchLookbackMs,
  emptyContactResult,
  recordFailure,
  tallyOutcome,
  windowFor,
  type ContactDirectionResult,
  type RecordOutcome,
  type SyncContext,
} from './syncContext';

interface ContactField {
  label: string;
  wrikeField: string;
  hubspotProperty: string;
}

/** Email, name pair, then the plain attributes */
function contactFields(ctx: SyncContext): ContactField[] {
  const w = ctx.fields.contact.wrike;
  const h = ctx.fields.contact.hubspot;
  return [
    { label: 'Email', wrikeField: w.email, hubspotProperty: h.email },
    { label: 'First Name', wrikeField: w.firstName, hubspotProperty: h.firstname },
    { label: 'Last Name', wrikeField: w.lastName, hubspotProperty: h.lastname },
    ...ctx.fields.contactAttributePairs(),
  ];
}

async function writeContactChanges(
  ctx: SyncContext,
  activityId: number,
  base: { name: string; wrikeId: string; hubspotId: string; systemChanged: 'wrike' | 'hubspot' },
  compared: Array<{ label: string; oldValue: string; newValue: string }>,
  action: RecordAction,
): Promise<void> {
  for (const field of compared) {
    await ctx.store.recordFieldChange({
      activityId,
      companyName: base.name,
      wrikeId: base.wrikeId,
      hubspotId: base.hubspotId,
      entityType: 'contact',
      fieldName: field.label,
      systemChanged: base.systemChanged,
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

export async function syncContactTaskToHubSpot(
  ctx: SyncContext,
  task: WrikeTask,
  activityId: number,
): Promise<RecordOutcome> {
  const { fields, hubspot, diagnostics } = ctx;
  const w = fields.contact.wrike;
  const h = fields.contact.hubspot;

  const email = readCustomField(task, w.email);
  if (!email) {
    logger.warn('Contact task missing email, skipping', { taskId: task.id });
    diagnostics.recordIssue('REQUIRED_FIELD_MISSING', task.id, task.title, h.email, 'Contact has no email');
    diagnostics.recordSkip(task.id, task.title, 'Missing email');
    return { kind: 'no_email', recordId: task.id, name: task.title, counterpartId: null };
  }

  let first = readCustomField(task, w.firstName) ?? '';
  let last = readCustomField(task, w.lastName) ?? '';
  if (!first && !last) ({ first, last } = splitTitle(task.title));

  const values = new Map<string, string>([
    [h.email, email],
    [h.firstname, first],
    [h.lastname, last],
  ]);
  for (const pair of fields.contactAttributePairs()) {
    values.set(pair.hubspotProperty, readCustomField(task, pair.wrikeField) ?? '');
  }
  const outgoing = Object.fromEntries(values);
  const name = fullName(first, last) || email;

  const existing = await hubspot.findContactByEmail(email, h.email, fields.contactPropertyNames());
  let hubspotId: string;
  let action: RecordAction;
  if (existing) {
    hubspotId = existing.id;
    await hubspot.updateObject('contacts', hubspotId, outgoing);
    action = 'updated';
  } else {
    const created = await hubspot.createObject('contacts', outgoing);
    hubspotId = created.id;
    action = 'created';
  }

  await ctx.store.logOperation({
    operation: action === 'created' ? 'create' : 'update',
    sourceSystem: 'wrike',
    targetSystem: 'hubspot',
    entityType: 'contact',
    entityId: task.id,
    status: 'success',
    message: `${action} HubSpot contact ${hubspotId}`,
  });

  const compared = contactFields(ctx).map((f) => ({
    label: f.label,
    oldValue: normalizeValue(existing?.properties[f.hubspotProperty]),
    newValue: values.get(f.hubspotProperty) ?? '',
  }));
  await writeContactChanges(ctx, activityId, { name, wrikeId: task.id, hubspotId, systemChanged: 'hubspot' }, compared, action);

  logger.info(`HubSpot contact ${action}`, { taskId: task.id, hubspotId });

  if (action === 'updated' && compared.every((f) => f.oldValue === f.newValue)) {
    return { kind: 'already_synced', recordId: task.id, name, counterpartId: hubspotId, written: true };
  }
  return { kind: action, recordId: task.id, name, counterpartId: hubspotId };
}

export async function syncContactsToHubSpot(ctx: SyncContext, activityId: number): Promise<ContactDirectionResult> {
  const { start, end } = await windowFor(ctx, WATERMARKS.contactsToHubSpot, batchLookbackMs(ctx));
  const folderId = ctx.config.wrike.contactsFolderId;
  const result = emptyContactResult();

  logger.info('Wrike → HubSpot contacts', { start: start.toISOString(), end: end.toISOString() });

  const tasks = paginate((pageToken) =>
    ctx.wrike.listFolderTasks(folderId, { updatedBetween: { start, end }, descendants: true, pageToken }),
  );
  for await (const task of tasks) {
    try {
      tallyOutcome(ctx, result, await syncContactTaskToHubSpot(ctx, task, activityId));
    } catch (err) {
      await recordFailure(ctx, result, { source: 'wrike', entityType: 'contact', recordId: task.id, name: task.title }, err);
    }
  }

  await advanceWatermark(ctx, WATERMARKS.contactsToHubSpot, end);
  return result;
}

// =============================================================================
// HubSpot → Wrike (opt-in)
// =============================================================================

export async function syncHubSpotContactToWrike(
  ctx: SyncContext,
  contact: HubSpotObject,
  activityId: number,
): Promise<RecordOutcome> {
  const { fields, wrike, diagnostics } = ctx;
  const w = fields.contact.wrike;
  const h = fields.contact.hubspot;

  const email = normalizeValue(contact.properties[h.email]);
  if (!email) {
    diagnostics.recordIssue('REQUIRED_FIELD_MISSING', contact.id, contact.id, h.email, 'Contact has no email');
    diagnostics.recordSkip(contact.id, contact.id, 'Missing email');
    return { kind: 'no_email', recordId: contact.id, name: contact.id, counterpartId: null };
  }

  const first = normalizeValue(contact.properties[h.firstname]);
  const last = normalizeValue(contact.properties[h.lastname]);
  const name = fullName(first, last) || email;

  const page = await wrike.listFolderTasks(ctx.config.wrike.contactsFolderId, {
    customField: { id: w.email, value: email },
    descendants: true,
  });
  const task = page.items[0];
  if (!task) {
    diagnostics.recordSkip(contact.id, name, 'No Wrike contact task with this email');
    return { kind: 'skipped', recordId: contact.id, name, counterpartId: null, reason: 'No Wrike task for email' };
  }

  const incoming = contactFields(ctx)
    .filter((f) => f.label !== 'Email')
    .map((f) => {
      const oldValue = readCustomField(task, f.wrikeField) ?? '';
      const value = normalizeValue(contact.properties[f.hubspotProperty]);
      return { label: f.label, fieldId: f.wrikeField, oldValue, newValue: value === '' ? oldValue : value };
    });
  const pending = incoming.filter((f) => f.oldValue !== f.newValue);

  let customFields: WrikeCustomFieldValue[] = [];
  for (const f of pending) customFields = setCustomField(customFields, f.fieldId, f.newValue);

  const title = fullName(first, last);
  const retitle = title !== '' && title !== task.title.trim();
  const compared = [
    ...incoming.map(({ label, oldValue, newValue }) => ({ label, oldValue, newValue })),
    { label: 'Title', oldValue: task.title.trim(), newValue: retitle ? title : task.title.trim() },
  ];

  const changed = pending.length > 0 || retitle;
  if (changed) {
    await wrike.updateTask(task.id, {
      ...(retitle ? { title } : {}),
      ...(customFields.length ? { customFields } : {}),
    });
    await ctx.store.logOperation({
      operation: 'update',
      sourceSystem: 'hubspot',
      targetSystem: 'wrike',
      entityType: 'contact',
      entityId: contact.id,
      status: 'success',
      message: `updated Wrike task ${task.id}`,
    });
  }

  await writeContactChanges(
    ctx,
    activityId,
    { name, wrikeId: task.id, hubspotId: contact.id, systemChanged: 'wrike' },
    compared,
    changed ? 'updated' : 'skipped',
  );

  return { kind: changed ? 'updated' : 'already_synced', recordId: contact.id, name, counterpartId: task.id };
}

export async function syncContactsToWrike(ctx: SyncContext, activityId: number): Promise<ContactDirectionResult> {
  const { start, end } = await windowFor(ctx, WATERMARKS.contactsToWrike, batchLookbackMs(ctx));
  const h = ctx.fields.contact.hubspot;
  const result = emptyContactResult();

  logger.info('HubSpot → Wrike contacts', { start: start.toISOString(), end: end.toISOString() });

  const filterGroups: HubSpotFilterGroup[] = [
    { filters: [{ propertyName: h.lastModified, operator: 'GTE', value: String(start.getTime()) }] },
  ];
  const contacts = paginate((after) =>
    ctx.hubspot.searchObjects('contacts', filterGroups, {
      properties: ctx.fields.contactPropertyNames(),
      after,
      limit: 100,
      sorts: [{ propertyName: h.lastModified, direction: 'ASCENDING' }],
    }),
  );

  for await (const contact of contacts) {
    try {
      tallyOutcome(ctx, result, await syncHubSpotContactToWrike(ctx, contact, activityId));
    } catch (err) {
      await recordFailure(ctx, result, { source: 'hubspot', entityType: 'contact', recordId: contact.id, name: contact.id }, err);
    }
  }

  await advanceWatermark(ctx, WATERMARKS.contactsToWrike, end);
  return result;
}
