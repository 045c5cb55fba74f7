// =============================================================================
// Reconciliation Auditor Tests
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

import { runReconciliationAudit } from '../services/reconciliationAuditor';
import { CF, createHarness, type TestHarness } from './helpers/fakeGateways';

describe('runReconciliationAudit', () => {
  let h: TestHarness;

  afterEach(async () => {
    await h.store.close();
  });

  describe('mixed population', () => {
    beforeEach(async () => {
      h = await createHarness();
      h.wrike.addTask({ id: 'T1', title: 'AdminCard_Acme', fields: { [CF.status]: 'Active', [CF.score]: '5' } });
      h.wrike.addTask({ id: 'T2', title: 'AdminCard_Beta', fields: { [CF.status]: 'Active' } });
      h.wrike.addTask({ id: 'T3', title: 'AdminCard_Gamma' });
      h.hubspot.add('companies', '2001', {
        name: 'Acme',
        account_status: 'Active',
        affinity_score: '5',
        wrike_task_id: 'T1',
      });
      h.hubspot.add('companies', '2002', { name: 'Beta', account_status: 'Churned', wrike_task_id: 'T2' });
      h.hubspot.add('companies', '2009', { name: 'Orphan' });
    });

    it('classifies every record into one bucket', async () => {
      const { report, issuesRecorded } = await runReconciliationAudit(h.ctx);

      expect(report).toMatchObject({
        wrikeTotal: 3,
        hubspotTotal: 3,
        matched: 1,
        mismatched: 1,
        wrikeOnly: 1,
        hubspotOnly: 1,
        status: 'completed',
      });
      expect(issuesRecorded).toBe(3);
    });

    it('records one issue per finding', async () => {
      await runReconciliationAudit(h.ctx);

      const issues = await h.store.listUnresolvedIssues(10);
      expect(issues.map((i) => [i.issueType, i.entityId, i.detail])).toEqual([
        ['hubspot_only', '2009', "HubSpot company 'Orphan' is not linked to a Wrike task"],
        ['wrike_only', 'T3', "Wrike company 'Gamma' has no HubSpot counterpart"],
        ['field_mismatch', 'T2', "Beta (HubSpot 2002): Account Status: Wrike 'Active' vs HubSpot 'Churned'"],
      ]);
    });

    it('persists the report', async () => {
      const { reportId } = await runReconciliationAudit(h.ctx);

      const last = await h.store.getLastReconciliationReport();
      expect(last?.id).toBe(reportId);
      expect(last?.details.hubspotOnly).toEqual([{ hubspotId: '2009', name: 'Orphan' }]);
    });

    it('never writes to either system', async () => {
      await runReconciliationAudit(h.ctx);

      expect(h.wrike.updates).toEqual([]);
      expect(h.hubspot.writes()).toEqual([]);
    });

    it('prefers the identity map over the cross-reference property', async () => {
      await h.ctx.identityMap.link('T3', '2009', 'Gamma');

      const { report } = await runReconciliationAudit(h.ctx);

      expect(report).toMatchObject({ wrikeOnly: 0, hubspotOnly: 0, mismatched: 1, matched: 2 });
    });
  });

  it('caps persisted issues per category while keeping full counts', async () => {
    h = await createHarness({ issueCapPerCategory: 1 });
    h.wrike.addTask({ id: 'T1', title: 'AdminCard_One' });
    h.wrike.addTask({ id: 'T2', title: 'AdminCard_Two' });

    const { report, issuesRecorded } = await runReconciliationAudit(h.ctx);

    expect(report.wrikeOnly).toBe(2);
    expect(report.details.wrikeOnly).toHaveLength(2);
    expect(issuesRecorded).toBe(1);
  });

  it('saves a failed report and rethrows when a listing fails', async () => {
    h = await createHarness();
    h.wrike.listError = new Error('Wrike unavailable');

    await expect(runReconciliationAudit(h.ctx)).rejects.toThrow('Wrike unavailable');

    const last = await h.store.getLastReconciliationReport();
    expect(last).toMatchObject({ status: 'failed', errorMessage: 'Wrike unavailable', wrikeTotal: 0 });
  });
});
