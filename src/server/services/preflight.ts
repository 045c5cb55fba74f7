// =============================================================================
// Preflight — configuration checks run before (or between) sync cycles
// =============================================================================
// verifyConfiguration  every mapped Wrike field / HubSpot property exists,
//                      every tier value maps to a priority
// testConnections      one read against each system
// buildMappingReport   the active field tables plus identity-map counts
//
// None of these write to either system or to the store.
// =============================================================================
import type { MappingCounts } from '../types';
import logger from '../utils/logger';
import { safeErrorMessage } from '../utils/sanitizeError';
import { normalizeValue } from './fieldMapping';
import type { SyncContext } from './syncContext';

export type VerificationStatus = 'PASSED' | 'FAILED' | 'ERROR';

export interface CheckResult {
  name: string;
  passed: boolean;
  missing: string[];
}

export interface VerificationReport {
  status: VerificationStatus;
  checks: CheckResult[];
  error?: string;
}

function check(name: string, expected: string[], available: Set<string>): CheckResult {
  const missing = expected.filter((item) => !available.has(item));
  return { name, passed: missing.length === 0, missing };
}

export async function verifyConfiguration(ctx: SyncContext): Promise<VerificationReport> {
  const { fields, wrike, hubspot } = ctx;
  const checks: CheckResult[] = [];

  try {
    const companyProps = new Set((await hubspot.listProperties('companies')).map((p) => p.name));
    checks.push(check('HubSpot company properties', fields.companyPropertyNames(), companyProps));

    const contactProps = new Set((await hubspot.listProperties('contacts')).map((p) => p.name));
    checks.push(check('HubSpot contact properties', fields.contactPropertyNames(), contactProps));

    const wrikeFields = new Set((await wrike.listCustomFields()).map((f) => f.id));
    const companyFieldIds = Object.values(fields.company.wrike).filter((id): id is string => Boolean(id));
    checks.push(check('Wrike company custom fields', companyFieldIds, wrikeFields));
    checks.push(check('Wrike contact custom fields', Object.values(fields.contact.wrike), wrikeFields));

    const unmapped = Object.entries(ctx.config.sync.tierToPriority)
      .filter(([, priority]) => normalizeValue(priority) === '')
      .map(([tier]) => tier);
    checks.push({ name: 'Tier → priority table', passed: unmapped.length === 0, missing: unmapped });

    const nonInvertible = fields.nonInvertibleTiers();
    if (nonInvertible.length) {
      logger.warn('Tier values do not round-trip through priority', { tiers: nonInvertible });
    }
  } catch (err) {
    const message = safeErrorMessage(err);
    logger.error('Preflight verification failed', { error: message });
    return { status: 'ERROR', checks, error: message };
  }

  const status: VerificationStatus = checks.every((c) => c.passed) ? 'PASSED' : 'FAILED';
  logger.info(`Preflight verification ${status}`, {
    failed: checks.filter((c) => !c.passed).map((c) => c.name),
  });
  return { status, checks };
}

// ─────────────────────────────────────────────────────────────────────────────
// Connectivity
// ─────────────────────────────────────────────────────────────────────────────

export interface SideStatus {
  ok: boolean;
  sample: string[];
  error?: string;
}

export interface ConnectionTestResult {
  wrike: SideStatus;
  hubspot: SideStatus;
}

async function probe(label: string, read: () => Promise<string[]>): Promise<SideStatus> {
  try {
    return { ok: true, sample: await read() };
  } catch (err) {
    const message = safeErrorMessage(err);
    logger.warn(`${label} connection test failed`, { error: message });
    return { ok: false, sample: [], error: message };
  }
}

export async function testConnections(ctx: SyncContext): Promise<ConnectionTestResult> {
  const props = ctx.fields.company.hubspot;

  const wrike = await probe('Wrike', async () => {
    const page = await ctx.wrike.listFolderTasks(ctx.config.wrike.companiesFolderId, { pageSize: 1 });
    return page.items.map((task) => task.title);
  });
  const hubspot = await probe('HubSpot', async () => {
    const page = await ctx.hubspot.searchObjects('companies', [], { properties: [props.name], limit: 1 });
    return page.items.map((company) => normalizeValue(company.properties[props.name]));
  });

  return { wrike, hubspot };
}

// ─────────────────────────────────────────────────────────────────────────────
// Mapping report
// ─────────────────────────────────────────────────────────────────────────────

export interface FieldRow {
  label: string;
  wrike: string | null;
  hubspot: string;
}

export interface MappingReport {
  markerPrefix: string;
  companyFields: FieldRow[];
  contactFields: FieldRow[];
  tierToPriority: Record<string, string>;
  priorityToTier: Record<string, string>;
  identityMap: MappingCounts;
}

export async function buildMappingReport(ctx: SyncContext): Promise<MappingReport> {
  const { fields, config } = ctx;
  const cw = fields.company.wrike;
  const ch = fields.company.hubspot;
  const kw = fields.contact.wrike;
  const kh = fields.contact.hubspot;

  const priorityToTier =
    config.sync.priorityToTier ??
    Object.fromEntries(Object.entries(config.sync.tierToPriority).map(([tier, priority]) => [priority, tier]));

  return {
    markerPrefix: fields.marker,
    companyFields: [
      { label: 'Company Name', wrike: null, hubspot: ch.name },
      { label: 'Account Status', wrike: cw.accountStatus, hubspot: ch.accountStatus },
      { label: 'Affinity Score', wrike: cw.affinityScore, hubspot: ch.affinityScore },
      { label: 'Tier / Priority', wrike: cw.accountTier, hubspot: ch.accountPriority },
      { label: 'Wrike Client ID', wrike: null, hubspot: ch.wrikeTaskId },
      { label: 'HubSpot Account ID', wrike: cw.hubspotAccountId ?? null, hubspot: 'hs_object_id' },
      { label: 'HubSpot Account Name', wrike: cw.hubspotAccountName ?? null, hubspot: ch.name },
    ],
    contactFields: [
      { label: 'Email', wrike: kw.email, hubspot: kh.email },
      { label: 'First Name', wrike: kw.firstName, hubspot: kh.firstname },
      { label: 'Last Name', wrike: kw.lastName, hubspot: kh.lastname },
      ...fields.contactAttributePairs().map((p) => ({ label: p.label, wrike: p.wrikeField, hubspot: p.hubspotProperty })),
    ],
    tierToPriority: { ...config.sync.tierToPriority },
    priorityToTier: { ...priorityToTier },
    identityMap: await ctx.store.countMappings(),
  };
}
