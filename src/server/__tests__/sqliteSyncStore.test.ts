// =============================================================================
// SQLite Sync Store Tests
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

import { SqliteSyncStore } from '../services/sqliteSyncStore';
import { StoreError } from '../utils/StoreError';

describe('SqliteSyncStore', () => {
  let now: Date;
  let store: SqliteSyncStore;

  beforeEach(async () => {
    now = new Date('2026-03-02T12:00:00.000Z');
    store = new SqliteSyncStore(':memory:', () => now);
    await store.init();
  });

  afterEach(async () => {
    await store.close();
  });

  it('wraps use before init in a StoreError', async () => {
    const fresh = new SqliteSyncStore(':memory:');

    await expect(fresh.getState('k')).rejects.toThrow('Sync store state.get failed: SqliteSyncStore used before init()');
  });

  describe('identity map', () => {
    it('inserts, finds and refreshes a mapping', async () => {
      await store.upsertMapping({ wrikeCompanyId: 'T1', hubspotCompanyId: '2001', companyName: 'Acme' });
      now = new Date('2026-03-02T13:00:00.000Z');
      const updated = await store.upsertMapping({ wrikeCompanyId: 'T1', hubspotCompanyId: '2001', companyName: 'Acme Ltd' });

      expect(updated).toMatchObject({
        wrikeCompanyId: 'T1',
        hubspotCompanyId: '2001',
        companyName: 'Acme Ltd',
        syncStatus: 'active',
        lastSyncedAt: new Date('2026-03-02T13:00:00.000Z'),
        createdAt: new Date('2026-03-02T12:00:00.000Z'),
      });
      expect((await store.findMappingByHubSpotId('2001'))?.wrikeCompanyId).toBe('T1');
    });

    it('releases a HubSpot id from its previous holder', async () => {
      await store.upsertMapping({ wrikeCompanyId: 'T1', hubspotCompanyId: '2001', companyName: 'Acme' });
      await store.upsertMapping({ wrikeCompanyId: 'T2', hubspotCompanyId: '2001', companyName: 'Acme' });

      expect(await store.findMappingByWrikeId('T1')).toMatchObject({
        hubspotCompanyId: null,
        syncStatus: 'inactive',
        notes: 'HubSpot id 2001 re-linked to Wrike T2',
      });
      expect((await store.findMappingByHubSpotId('2001'))?.wrikeCompanyId).toBe('T2');
      expect(await store.countMappings()).toEqual({ total: 2, active: 1, inactive: 1 });
    });

    it('deactivates a mapping with a reason', async () => {
      await store.upsertMapping({ wrikeCompanyId: 'T1', hubspotCompanyId: '2001', companyName: 'Acme' });

      await store.setMappingStatus('T1', 'inactive', 'HubSpot company 2001 returned 404');

      expect(await store.findMappingByWrikeId('T1')).toMatchObject({
        syncStatus: 'inactive',
        notes: 'HubSpot company 2001 returned 404',
      });
    });

    it('counts an empty map', async () => {
      expect(await store.countMappings()).toEqual({ total: 0, active: 0, inactive: 0 });
    });
  });

  it('stores and overwrites watermarks', async () => {
    expect(await store.getState('wrike_to_hubspot_companies_last_run')).toBeNull();

    await store.setState('wrike_to_hubspot_companies_last_run', '2026-03-01T00:00:00.000Z');
    await store.setState('wrike_to_hubspot_companies_last_run', '2026-03-02T00:00:00.000Z');

    expect(await store.getState('wrike_to_hubspot_companies_last_run')).toBe('2026-03-02T00:00:00.000Z');
  });

  describe('change queue', () => {
    const change = {
      source: 'hubspot' as const,
      recordId: '2001',
      recordName: 'Acme',
      changeType: 'update' as const,
      detectedAt: new Date('2026-03-02T11:30:00.000Z'),
    };

    it('ignores the same change instant twice', async () => {
      expect(await store.trackChange(change)).toBe(1);
      expect(await store.trackChange(change)).toBeNull();
      expect(await store.listPendingChanges(10)).toHaveLength(1);
    });

    it('counts entries by status and source', async () => {
      const first = await store.trackChange(change);
      const second = await store.trackChange({ ...change, source: 'wrike', recordId: 'T1' });
      await store.trackChange({ ...change, recordId: '2002' });
      if (first === null || second === null) throw new Error('expected queued changes');

      await store.markChangeSynced(first);
      await store.markChangeFailed(second, 'wrike record not found: GET /tasks/T1');

      expect(await store.getChangeStats(new Date('2026-03-02T00:00:00.000Z'))).toEqual({
        total: 3,
        pending: 1,
        synced: 1,
        failed: 1,
        bySource: { wrike: 1, hubspot: 2 },
      });
    });

    it('cleans up only finished entries before the cutoff', async () => {
      const done = await store.trackChange(change);
      await store.trackChange({ ...change, recordId: '2002' });
      if (done === null) throw new Error('expected a queued change');
      await store.markChangeSynced(done);

      expect(await store.cleanupOldChanges(new Date('2026-03-02T12:00:00.000Z'))).toBe(1);
      expect((await store.listPendingChanges(10)).map((c) => c.recordId)).toEqual(['2002']);
    });
  });

  describe('activities', () => {
    it('records the lifecycle of a run', async () => {
      const id = await store.startActivity('full_sync');
      expect(await store.getActivity(id)).toMatchObject({ status: 'running', completedAt: null });

      now = new Date('2026-03-02T12:05:00.000Z');
      await store.completeActivity(id, {
        companiesProcessed: 2,
        contactsProcessed: 1,
        changesMade: 3,
        errors: 0,
        summary: 'Companies: 2, Contacts: 1, Changes: 3, Errors: 0',
      });

      expect(await store.getActivity(id)).toEqual({
        id,
        activityType: 'full_sync',
        startedAt: new Date('2026-03-02T12:00:00.000Z'),
        completedAt: new Date('2026-03-02T12:05:00.000Z'),
        status: 'completed',
        companiesProcessed: 2,
        contactsProcessed: 1,
        changesMade: 3,
        errors: 0,
        summary: 'Companies: 2, Contacts: 1, Changes: 3, Errors: 0',
      });
    });

    it('keeps the failure message as the summary', async () => {
      const id = await store.startActivity('reconciliation');

      await store.failActivity(id, 'HubSpot unavailable');

      expect(await store.getActivity(id)).toMatchObject({ status: 'failed', summary: 'HubSpot unavailable' });
    });

    it('lists newest first', async () => {
      await store.startActivity('full_sync');
      await store.startActivity('single_record');

      expect((await store.listActivities(10)).map((a) => a.activityType)).toEqual(['single_record', 'full_sync']);
    });

    it('rejects field changes for an unknown activity', async () => {
      const write = store.recordFieldChange({
        activityId: 42,
        companyName: 'Acme',
        wrikeId: 'T1',
        hubspotId: null,
        entityType: 'company',
        fieldName: 'Company Name',
        systemChanged: 'hubspot',
        oldValue: '',
        newValue: 'Acme',
        changed: true,
        action: 'created',
      });

      await expect(write).rejects.toBeInstanceOf(StoreError);
      await expect(write).rejects.toMatchObject({ operation: 'activity.record' });
    });
  });

  describe('reconciliation', () => {
    it('resolves an issue only once', async () => {
      await store.addIssue({
        source: 'reconciliation',
        entityType: 'company',
        entityId: 'T3',
        issueType: 'wrike_only',
        detail: "Wrike company 'Gamma' has no HubSpot counterpart",
      });

      expect(await store.countUnresolvedIssues()).toBe(1);
      expect(await store.resolveIssue(1)).toBe(true);
      expect(await store.resolveIssue(1)).toBe(false);
      expect(await store.countUnresolvedIssues()).toBe(0);
    });

    it('round-trips report details', async () => {
      const details = {
        mismatches: [{ wrikeId: 'T2', hubspotId: '2002', name: 'Beta', differences: ["Account Status: Wrike 'Active' vs HubSpot 'Churned'"] }],
        wrikeOnly: [{ wrikeId: 'T3', name: 'Gamma' }],
        hubspotOnly: [],
      };

      const id = await store.saveReconciliationReport({
        wrikeTotal: 3,
        hubspotTotal: 2,
        matched: 1,
        wrikeOnly: 1,
        hubspotOnly: 0,
        mismatched: 1,
        autoFixed: 0,
        status: 'completed',
        errorMessage: null,
        details,
      });

      expect(await store.getLastReconciliationReport()).toEqual({
        id,
        runAt: new Date('2026-03-02T12:00:00.000Z'),
        wrikeTotal: 3,
        hubspotTotal: 2,
        matched: 1,
        wrikeOnly: 1,
        hubspotOnly: 0,
        mismatched: 1,
        autoFixed: 0,
        status: 'completed',
        errorMessage: null,
        details,
      });
    });
  });
});
