// =============================================================================
// Change Detector — queues records modified since the last detection run
// =============================================================================
// Wrike:   company-folder tasks updated in [since, now), marker titles only
// HubSpot: companies whose last-modified property is >= since (epoch ms)
//
// Each hit becomes a change-tracking row keyed by (source, recordId,
// detectedAt) with detectedAt = the record's own modification instant, so
// re-detecting the same edit is a no-op. The watermark moves to `now` only
// after every page has been read.
// =============================================================================
import type { ChangeRecordInput, ExternalSystem, HubSpotObject, WrikeTask } from '../types';
import logger from '../utils/logger';
import { paginate } from '../utils/paginate';
import { normalizeValue } from './fieldMapping';
import { WATERMARKS, advanceWatermark, windowFor, type SyncContext, type SyncWindow } from './syncContext';

export interface DetectionResult {
  system: ExternalSystem;
  since: Date;
  until: Date;
  detected: number;
  queued: number;
  duplicates: number;
}

/** HubSpot returns timestamps as ISO strings in search results, epoch ms elsewhere */
export function parseHubSpotTimestamp(value: string | null | undefined): Date | null {
  const text = normalizeValue(value);
  if (!text) return null;
  const date = /^\d+$/.test(text) ? new Date(Number(text)) : new Date(text);
  return Number.isNaN(date.getTime()) ? null : date;
}

function parseDate(value: string | undefined): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function fromWrikeTask(ctx: SyncContext, task: WrikeTask, window: SyncWindow): ChangeRecordInput {
  const created = parseDate(task.createdDate);
  return {
    source: 'wrike',
    recordId: task.id,
    recordName: ctx.fields.cleanCompanyName(task.title),
    changeType: created && created >= window.start ? 'create' : 'update',
    detectedAt: parseDate(task.updatedDate) ?? window.end,
  };
}

function fromHubSpotCompany(ctx: SyncContext, company: HubSpotObject, window: SyncWindow): ChangeRecordInput {
  const props = ctx.fields.company.hubspot;
  const created = parseHubSpotTimestamp(company.createdAt);
  return {
    source: 'hubspot',
    recordId: company.id,
    recordName: normalizeValue(company.properties[props.name]),
    changeType: created && created >= window.start ? 'create' : 'update',
    detectedAt:
      parseHubSpotTimestamp(company.properties[props.lastModified]) ??
      parseHubSpotTimestamp(company.updatedAt) ??
      window.end,
  };
}

function changesIn(ctx: SyncContext, system: ExternalSystem, window: SyncWindow): AsyncGenerator<ChangeRecordInput> {
  if (system === 'wrike') return wrikeChanges(ctx, window);
  return hubspotChanges(ctx, window);
}

async function* wrikeChanges(ctx: SyncContext, window: SyncWindow): AsyncGenerator<ChangeRecordInput> {
  const folderId = ctx.config.wrike.companiesFolderId;
  const tasks = paginate((pageToken) =>
    ctx.wrike.listFolderTasks(folderId, { updatedBetween: window, descendants: true, pageToken }),
  );
  for await (const task of tasks) {
    if (ctx.fields.hasMarkerPrefix(task.title)) yield fromWrikeTask(ctx, task, window);
  }
}

async function* hubspotChanges(ctx: SyncContext, window: SyncWindow): AsyncGenerator<ChangeRecordInput> {
  const props = ctx.fields.company.hubspot;
  const companies = paginate((after) =>
    ctx.hubspot.searchObjects(
      'companies',
      [{ filters: [{ propertyName: props.lastModified, operator: 'GTE', value: String(window.start.getTime()) }] }],
      {
        properties: [props.name, props.lastModified],
        after,
        limit: 100,
        sorts: [{ propertyName: props.lastModified, direction: 'ASCENDING' }],
      },
    ),
  );
  for await (const company of companies) yield fromHubSpotCompany(ctx, company, window);
}

/**
 * Enqueues every change in `[since, now)` for one system.
 * `since` defaults to the watermark, then to the configured short lookback.
 */
export async function detectChanges(ctx: SyncContext, system: ExternalSystem, since?: Date): Promise<DetectionResult> {
  const key = system === 'wrike' ? WATERMARKS.detectWrike : WATERMARKS.detectHubSpot;
  const lookbackMs = ctx.config.sync.changeDetectionLookbackMinutes * 60 * 1000;
  const stored = await windowFor(ctx, key, lookbackMs);
  const window: SyncWindow = since ? { start: since, end: stored.end } : stored;

  const result: DetectionResult = {
    system,
    since: window.start,
    until: window.end,
    detected: 0,
    queued: 0,
    duplicates: 0,
  };

  for await (const change of changesIn(ctx, system, window)) {
    result.detected++;
    const id = await ctx.store.trackChange(change);
    if (id === null) result.duplicates++;
    else result.queued++;
  }

  await advanceWatermark(ctx, key, window.end);
  logger.info(`Change detection (${system}) complete`, { ...result });
  return result;
}
