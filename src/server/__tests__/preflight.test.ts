// =============================================================================
// Preflight Tests
// =============================================================================

jest.mock('../utils/logger', () => ({
  __esModule: true,
  default: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

import { buildMappingReport, testConnections, verifyConfiguration } from '../services/preflight';
import { CF, createHarness, type TestHarness } from './helpers/fakeGateways';

function property(name: string) {
  return { name, label: name, type: 'string' };
}

describe('Preflight', () => {
  let h: TestHarness;

  async function harness(sync: Parameters<typeof createHarness>[0] = {}): Promise<void> {
    h = await createHarness(sync);
    h.hubspot.properties = {
      companies: h.ctx.fields.companyPropertyNames().map(property),
      contacts: h.ctx.fields.contactPropertyNames().map(property),
    };
    h.wrike.customFields = Object.values(CF).map((id) => ({ id, title: id, type: 'Text' }));
  }

  afterEach(async () => {
    await h.store.close();
  });

  describe('verifyConfiguration', () => {
    it('passes when every mapped field exists', async () => {
      await harness();

      const report = await verifyConfiguration(h.ctx);

      expect(report.status).toBe('PASSED');
      expect(report.checks.map((c) => c.name)).toEqual([
        'HubSpot company properties',
        'HubSpot contact properties',
        'Wrike company custom fields',
        'Wrike contact custom fields',
        'Tier → priority table',
      ]);
    });

    it('lists the missing HubSpot property', async () => {
      await harness();
      h.hubspot.properties.companies = h.hubspot.properties.companies.filter((p) => p.name !== 'wrike_task_id');

      const report = await verifyConfiguration(h.ctx);

      expect(report.status).toBe('FAILED');
      expect(report.checks[0]).toEqual({
        name: 'HubSpot company properties',
        passed: false,
        missing: ['wrike_task_id'],
      });
    });

    it('lists the missing Wrike custom field', async () => {
      await harness();
      h.wrike.customFields = h.wrike.customFields.filter((f) => f.id !== CF.city);

      const report = await verifyConfiguration(h.ctx);

      expect(report.checks[3]).toEqual({ name: 'Wrike contact custom fields', passed: false, missing: [CF.city] });
    });

    it('flags tiers without a priority', async () => {
      await harness({ tierToPriority: { 'Tier 1': 'High', 'Tier 4': '' } });

      const report = await verifyConfiguration(h.ctx);

      expect(report.checks[4]).toEqual({ name: 'Tier → priority table', passed: false, missing: ['Tier 4'] });
    });

    it('reports ERROR when a remote read fails', async () => {
      await harness();
      jest.spyOn(h.hubspot, 'listProperties').mockRejectedValueOnce(new Error('HubSpot unavailable'));

      const report = await verifyConfiguration(h.ctx);

      expect(report).toEqual({ status: 'ERROR', checks: [], error: 'HubSpot unavailable' });
    });
  });

  describe('testConnections', () => {
    it('reads one record from each system', async () => {
      await harness();
      h.wrike.addTask({ id: 'T1', title: 'AdminCard_Acme' });
      h.hubspot.add('companies', '2001', { name: 'Acme' });

      expect(await testConnections(h.ctx)).toEqual({
        wrike: { ok: true, sample: ['AdminCard_Acme'] },
        hubspot: { ok: true, sample: ['Acme'] },
      });
    });

    it('reports each side independently', async () => {
      await harness();
      h.wrike.listError = new Error('Wrike unavailable');

      const result = await testConnections(h.ctx);

      expect(result.wrike).toEqual({ ok: false, sample: [], error: 'Wrike unavailable' });
      expect(result.hubspot.ok).toBe(true);
    });
  });

  describe('buildMappingReport', () => {
    it('describes the active mapping', async () => {
      await harness();
      await h.store.upsertMapping({ wrikeCompanyId: 'T1', hubspotCompanyId: '2001', companyName: 'Acme' });

      const report = await buildMappingReport(h.ctx);

      expect(report.markerPrefix).toBe('AdminCard');
      expect(report.priorityToTier).toEqual({ High: 'Tier 1', Medium: 'Tier 2', Low: 'Tier 3' });
      expect(report.companyFields).toContainEqual({ label: 'HubSpot Account ID', wrike: CF.hubspotId, hubspot: 'hs_object_id' });
      expect(report.contactFields).toHaveLength(10);
      expect(report.identityMap).toEqual({ total: 1, active: 1, inactive: 0 });
    });
  });
});
