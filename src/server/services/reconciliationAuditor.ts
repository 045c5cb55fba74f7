// =============================================================================
// Reconciliation Auditor — full-population diff, observational only
// =============================================================================
// Not windowed: reads every marker company task and every HubSpot company,
// pairs them through the identity map (falling back to the HubSpot
// cross-reference property) and classifies:
//
//   matched       linked, status and score equal
//   mismatched    linked, at least one compared field differs
//   wrike-only    no HubSpot counterpart
//   hubspot-only  no Wrike task points at it
//
// One report row per run. Issues are capped per category; the report keeps
// the full counts and lists.
// =============================================================================
import type {
  HubSpotObject,
  IssueType,
  MismatchObservation,
  ReconciliationDetails,
  ReconciliationIssueInput,
  ReconciliationReportInput,
} from '../types';
import logger from '../utils/logger';
import { collectAll } from '../utils/paginate';
import { safeErrorMessage } from '../utils/sanitizeError';
import { normalizeValue, readCustomField } from './fieldMapping';
import { listCompanyTasks } from './crossSync';
import type { SyncContext } from './syncContext';

export interface ReconciliationOutcome {
  reportId: number;
  report: ReconciliationReportInput;
  issuesRecorded: number;
}

async function listAllHubSpotCompanies(ctx: SyncContext): Promise<HubSpotObject[]> {
  return collectAll((after) =>
    ctx.hubspot.searchObjects('companies', [], {
      properties: ctx.fields.companyPropertyNames(),
      after,
      limit: 100,
    }),
  );
}

function emptyReport(): ReconciliationReportInput {
  return {
    wrikeTotal: 0,
    hubspotTotal: 0,
    matched: 0,
    wrikeOnly: 0,
    hubspotOnly: 0,
    mismatched: 0,
    autoFixed: 0,
    status: 'completed',
    errorMessage: null,
    details: { mismatches: [], wrikeOnly: [], hubspotOnly: [] },
  };
}

/**
 * Persists up to `cap` issues of one category.
 * @returns number of issues written
 */
async function recordCapped<T>(
  ctx: SyncContext,
  items: T[],
  cap: number,
  toIssue: (item: T) => ReconciliationIssueInput,
): Promise<number> {
  const slice = items.slice(0, cap);
  for (const item of slice) await ctx.store.addIssue(toIssue(item));
  return slice.length;
}

export async function runReconciliationAudit(ctx: SyncContext): Promise<ReconciliationOutcome> {
  const { fields, identityMap } = ctx;
  const props = fields.company.hubspot;
  const cf = fields.company.wrike;
  const report = emptyReport();

  try {
    const tasks = await listCompanyTasks(ctx);
    const companies = await listAllHubSpotCompanies(ctx);
    report.wrikeTotal = tasks.length;
    report.hubspotTotal = companies.length;

    const byId = new Map(companies.map((c) => [c.id, c]));
    const byCrossRef = new Map<string, HubSpotObject>();
    for (const company of companies) {
      const ref = normalizeValue(company.properties[props.wrikeTaskId]);
      if (ref && !byCrossRef.has(ref)) byCrossRef.set(ref, company);
    }

    const details: ReconciliationDetails = { mismatches: [], wrikeOnly: [], hubspotOnly: [] };
    const paired = new Set<string>();

    for (const task of tasks) {
      const name = fields.cleanCompanyName(task.title);
      const mappedId = await identityMap.lookupHubSpotByWrike(task.id);
      const company = (mappedId ? byId.get(mappedId) : undefined) ?? byCrossRef.get(task.id);

      if (!company) {
        details.wrikeOnly.push({ wrikeId: task.id, name });
        continue;
      }
      paired.add(company.id);

      const differences: string[] = [];
      const compare = (label: string, wrikeValue: string, hubspotValue: string): void => {
        if (wrikeValue !== hubspotValue) {
          differences.push(`${label}: Wrike '${wrikeValue}' vs HubSpot '${hubspotValue}'`);
        }
      };
      compare(
        'Account Status',
        readCustomField(task, cf.accountStatus) ?? '',
        normalizeValue(company.properties[props.accountStatus]),
      );
      compare(
        'Affinity Score',
        readCustomField(task, cf.affinityScore) ?? '',
        normalizeValue(company.properties[props.affinityScore]),
      );

      if (differences.length) {
        details.mismatches.push({ wrikeId: task.id, hubspotId: company.id, name, differences });
      } else {
        report.matched++;
      }
    }

    for (const company of companies) {
      if (!paired.has(company.id)) {
        details.hubspotOnly.push({
          hubspotId: company.id,
          name: normalizeValue(company.properties[props.name]),
        });
      }
    }

    report.mismatched = details.mismatches.length;
    report.wrikeOnly = details.wrikeOnly.length;
    report.hubspotOnly = details.hubspotOnly.length;
    report.details = details;
  } catch (err) {
    const message = safeErrorMessage(err);
    logger.error('Reconciliation audit failed', { error: message });
    await ctx.store.saveReconciliationReport({ ...emptyReport(), status: 'failed', errorMessage: message });
    throw err;
  }

  const reportId = await ctx.store.saveReconciliationReport(report);

  const cap = ctx.config.sync.issueCapPerCategory;
  const issue = (issueType: IssueType, entityId: string, detail: string): ReconciliationIssueInput => ({
    source: 'reconciliation',
    entityType: 'company',
    entityId,
    issueType,
    detail,
  });

  let issuesRecorded = 0;
  issuesRecorded += await recordCapped(ctx, report.details.mismatches, cap, (m: MismatchObservation) =>
    issue('field_mismatch', m.wrikeId, `${m.name} (HubSpot ${m.hubspotId}): ${m.differences.join('; ')}`),
  );
  issuesRecorded += await recordCapped(ctx, report.details.wrikeOnly, cap, (w) =>
    issue('wrike_only', w.wrikeId, `Wrike company '${w.name}' has no HubSpot counterpart`),
  );
  issuesRecorded += await recordCapped(ctx, report.details.hubspotOnly, cap, (h) =>
    issue('hubspot_only', h.hubspotId, `HubSpot company '${h.name}' is not linked to a Wrike task`),
  );

  logger.info('Reconciliation audit complete', {
    reportId,
    matched: report.matched,
    mismatched: report.mismatched,
    wrikeOnly: report.wrikeOnly,
    hubspotOnly: report.hubspotOnly,
    issuesRecorded,
  });

  return { reportId, report, issuesRecorded };
}
