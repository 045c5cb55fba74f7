// =============================================================================
// Sync Orchestrator Tests
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

import { SyncCycleError, SyncOrchestrator } from '../services/syncOrchestrator';
import { CF, T0, createHarness, type TestHarness } from './helpers/fakeGateways';

describe('SyncOrchestrator', () => {
  let h: TestHarness;
  let orchestrator: SyncOrchestrator;

  beforeEach(async () => {
    h = await createHarness();
    orchestrator = new SyncOrchestrator({
      store: h.store,
      wrike: h.wrike,
      hubspot: h.hubspot,
      config: h.ctx.config,
      now: h.ctx.now,
    });
  });

  afterEach(async () => {
    await h.store.close();
  });

  /** Holds every Wrike listing until the returned function is called */
  function blockWrike(): () => void {
    let unblock: () => void = () => undefined;
    h.wrike.blockUntil = new Promise<void>((resolve) => {
      unblock = resolve;
    });
    return () => {
      h.wrike.blockUntil = null;
      unblock();
    };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // runCycle
  // ─────────────────────────────────────────────────────────────────────────

  describe('runCycle', () => {
    it('runs every pass and totals the changes', async () => {
      h.wrike.addTask({ id: 'T1', title: 'AdminCard_Acme' });

      const result = await orchestrator.runCycle();

      if (result.status !== 'completed') throw new Error('expected a completed cycle');
      expect(result.companiesToHubSpot).toMatchObject({ processed: 1, created: 1 });
      expect(result.companyNames.updated).toBe(1);
      expect(result.companyIds).toMatchObject({ wrikeIdsUpdated: 1, hubspotIdsUpdated: 0 });
      expect(result.contactsToWrike).toBeNull();
      expect(result.totals).toEqual({
        companiesProcessed: 1,
        contactsProcessed: 0,
        changesMade: 3,
        errors: 0,
        summary: 'Companies: 1, Contacts: 0, Changes: 3, Errors: 0',
      });
      expect(result.diagnosticReport).toContain('│  Total Records Processed: 1');
      expect(h.wrike.field('T1', CF.hubspotId)).toBe('1001');
      expect(h.wrike.field('T1', CF.hubspotName)).toBe('Acme');
    });

    it('completes the activity row', async () => {
      const result = await orchestrator.runCycle();

      if (result.status !== 'completed') throw new Error('expected a completed cycle');
      const activity = await h.store.getActivity(result.activityId);
      expect(activity).toMatchObject({
        activityType: 'full_sync',
        status: 'completed',
        summary: 'Companies: 0, Contacts: 0, Changes: 0, Errors: 0',
      });
    });

    it('skips a second cycle while one is running', async () => {
      const startActivity = jest.spyOn(h.store, 'startActivity');
      const unblock = blockWrike();

      const first = orchestrator.runCycle();
      const second = await orchestrator.runCycle();
      unblock();
      await first;

      expect(second).toEqual({ status: 'skipped', reason: 'A sync run is already in progress' });
      expect(startActivity).toHaveBeenCalledTimes(1);
      expect(orchestrator.isRunning).toBe(false);
    });

    it('marks the activity failed and throws a SyncCycleError', async () => {
      h.wrike.listError = new Error('Wrike unavailable');

      let caught: unknown;
      try {
        await orchestrator.runCycle();
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(SyncCycleError);
      if (!(caught instanceof SyncCycleError)) return;
      expect(caught.message).toBe('Sync cycle failed: Wrike unavailable');
      expect(caught.result.status).toBe('failed');

      const activity = await h.store.getActivity(caught.result.activityId);
      expect(activity?.status).toBe('failed');
      expect(orchestrator.isRunning).toBe(false);
    });

    it('runs the HubSpot → Wrike contact pass when enabled', async () => {
      await h.store.close();
      h = await createHarness({ syncContactsHubspotToWrike: true });
      orchestrator = new SyncOrchestrator({
        store: h.store,
        wrike: h.wrike,
        hubspot: h.hubspot,
        config: h.ctx.config,
        now: h.ctx.now,
      });

      const result = await orchestrator.runCycle();

      if (result.status !== 'completed') throw new Error('expected a completed cycle');
      expect(result.contactsToWrike).toMatchObject({ processed: 0, skippedNoEmail: 0 });
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // syncSingleRecord
  // ─────────────────────────────────────────────────────────────────────────

  describe('syncSingleRecord', () => {
    it('syncs a Wrike company task', async () => {
      h.wrike.addTask({ id: 'T1', title: 'AdminCard_Acme' });

      const result = await orchestrator.syncSingleRecord('wrike', 'T1');

      expect(result).toMatchObject({
        status: 'completed',
        entityType: 'company',
        outcome: { recordId: 'T1', name: 'Acme', action: 'created', counterpartId: '1001' },
      });
    });

    it('routes a non-marker Wrike task to the contact routine', async () => {
      h.wrike.addTask({ id: 'C1', title: 'Jane Doe', fields: { [CF.email]: 'jane@example.com' } });

      const result = await orchestrator.syncSingleRecord('wrike', 'C1');

      expect(result).toMatchObject({ status: 'completed', entityType: 'contact', outcome: { action: 'created' } });
    });

    it('skips a HubSpot contact while contact sync to Wrike is disabled', async () => {
      h.hubspot.add('contacts', '501', { email: 'jane@example.com' });

      const result = await orchestrator.syncSingleRecord('hubspot', '501');

      expect(result).toMatchObject({
        status: 'completed',
        entityType: 'contact',
        outcome: { action: 'skipped', reason: 'HubSpot → Wrike contact sync is disabled' },
      });
      if (result.status !== 'completed') return;
      const activity = await h.store.getActivity(result.activityId);
      expect(activity?.summary).toBe('hubspot contact 501: skipped');
    });

    it('reports a missing record as failed without throwing', async () => {
      const result = await orchestrator.syncSingleRecord('wrike', 'MISSING');

      expect(result).toMatchObject({
        status: 'completed',
        outcome: { action: 'failed', reason: 'wrike record not found: GET /tasks/MISSING' },
      });
    });

    it('queues the record while a cycle holds the lock', async () => {
      const unblock = blockWrike();
      const cycle = orchestrator.runCycle();

      const result = await orchestrator.syncSingleRecord('hubspot', '2001');
      unblock();
      await cycle;

      expect(result).toEqual({ status: 'queued', source: 'hubspot', recordId: '2001', changeId: 1 });
      const [queued] = await h.store.listPendingChanges(10);
      expect(queued).toMatchObject({ source: 'hubspot', recordId: '2001', changeType: 'update' });
      expect(queued.detectedAt).toEqual(T0);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Queue + detection
  // ─────────────────────────────────────────────────────────────────────────

  describe('processPendingChanges', () => {
    it('marks each entry synced or failed', async () => {
      h.wrike.addTask({ id: 'T1', title: 'AdminCard_Acme' });
      await h.store.trackChange({
        source: 'wrike',
        recordId: 'T1',
        recordName: 'Acme',
        changeType: 'update',
        detectedAt: new Date('2026-03-02T11:00:00Z'),
      });
      await h.store.trackChange({
        source: 'wrike',
        recordId: 'MISSING',
        recordName: '',
        changeType: 'update',
        detectedAt: new Date('2026-03-02T11:05:00Z'),
      });

      const result = await orchestrator.processPendingChanges();

      expect(result).toMatchObject({ status: 'completed', processed: 2, synced: 1, failed: 1 });
      expect(await h.store.listPendingChanges(10)).toEqual([]);
      const stats = await h.store.getChangeStats(new Date('2026-03-02T00:00:00Z'));
      expect(stats).toMatchObject({ total: 2, synced: 1, failed: 1, pending: 0 });
    });
  });

  describe('runChangeDetection', () => {
    it('detects, queues and drains in one activity', async () => {
      h.wrike.addTask({ id: 'T1', title: 'AdminCard_Acme', updatedDate: '2026-03-02T11:30:00Z' });

      const result = await orchestrator.runChangeDetection();

      if (result.status !== 'completed') throw new Error('expected a completed run');
      expect(result.queue).toEqual({ processed: 1, synced: 1, failed: 0 });
      const activity = await h.store.getActivity(result.activityId);
      expect(activity?.summary).toBe('Detected: Wrike 1 (1 new), HubSpot 0 (0 new); Queue: 1 synced, 0 failed');
      expect(h.hubspot.objects.companies.get('1001')?.properties.name).toBe('Acme');
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Reconciliation + queries
  // ─────────────────────────────────────────────────────────────────────────

  describe('runReconciliation', () => {
    it('summarises the audit on its activity', async () => {
      h.wrike.addTask({ id: 'T1', title: 'AdminCard_Acme' });

      const result = await orchestrator.runReconciliation();

      if (result.status !== 'completed') throw new Error('expected a completed run');
      const activity = await h.store.getActivity(result.activityId);
      expect(activity).toMatchObject({
        activityType: 'reconciliation',
        companiesProcessed: 1,
        summary: 'Matched: 0, Mismatched: 0, Wrike-only: 1, HubSpot-only: 0',
      });
    });

    it('shares the lock with sync cycles', async () => {
      const unblock = blockWrike();
      const cycle = orchestrator.runCycle();

      const result = await orchestrator.runReconciliation();
      unblock();
      await cycle;

      expect(result.status).toBe('skipped');
    });
  });

  describe('getStatus', () => {
    it('reports the last activity and open issues', async () => {
      await orchestrator.runCycle();

      const status = await orchestrator.getStatus();

      expect(status.running).toBe(false);
      expect(status.lastActivity?.status).toBe('completed');
      expect(status.unresolvedIssues).toBe(0);
    });
  });

  describe('cleanupOldChanges', () => {
    it('removes finished entries older than the retention window', async () => {
      const id = await h.store.trackChange({
        source: 'wrike',
        recordId: 'T1',
        recordName: 'Acme',
        changeType: 'update',
        detectedAt: new Date('2026-01-01T00:00:00Z'),
      });
      if (id === null) throw new Error('expected a queued change');
      await h.store.markChangeSynced(id);

      expect(await orchestrator.cleanupOldChanges()).toBe(1);
    });
  });
});
