// =============================================================================
// HTTP Route Tests
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

import type express from 'express';
import jwt from 'jsonwebtoken';
import request from 'supertest';
import { createApp } from '../index';
import { SyncOrchestrator } from '../services/syncOrchestrator';
import { parseLimit } from '../routes/reports';
import { createHarness, type TestHarness } from './helpers/fakeGateways';

const SECRET = 'test-secret';

describe('HTTP API', () => {
  let h: TestHarness;
  let orchestrator: SyncOrchestrator;
  let app: express.Express;
  const token = jwt.sign({ sub: 'ops' }, SECRET);
  const auth = `Bearer ${token}`;

  beforeEach(async () => {
    h = await createHarness();
    orchestrator = new SyncOrchestrator({
      store: h.store,
      wrike: h.wrike,
      hubspot: h.hubspot,
      config: h.ctx.config,
      now: h.ctx.now,
    });
    app = createApp(orchestrator, SECRET);
  });

  afterEach(async () => {
    await h.store.close();
  });

  /* ── Health + auth ── */

  it('serves health without a token', async () => {
    const res = await request(app).get('/api/health');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'ok', syncRunning: false });
  });

  it('rejects a request without a token', async () => {
    const res = await request(app).get('/api/sync/status');

    expect(res.status).toBe(401);
    expect(res.body).toEqual({ error: 'Missing authentication token' });
  });

  it('rejects a token signed with another secret', async () => {
    const res = await request(app)
      .get('/api/sync/status')
      .set('Authorization', `Bearer ${jwt.sign({ sub: 'ops' }, 'other-secret')}`);

    expect(res.status).toBe(401);
    expect(res.body).toEqual({ error: 'Invalid authentication token' });
  });

  it('answers 404 for unknown API paths', async () => {
    const res = await request(app).get('/api/nowhere');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'Not found' });
  });

  /* ── Sync ── */

  describe('POST /api/sync/run', () => {
    it('returns the cycle result', async () => {
      h.wrike.addTask({ id: 'T1', title: 'AdminCard_Acme' });

      const res = await request(app).post('/api/sync/run').set('Authorization', auth);

      expect(res.status).toBe(200);
      expect(res.body.status).toBe('completed');
      expect(res.body.totals.summary).toBe('Companies: 1, Contacts: 0, Changes: 3, Errors: 0');
    });

    it('answers 409 while a cycle is running', async () => {
      let unblock: () => void = () => undefined;
      h.wrike.blockUntil = new Promise<void>((resolve) => {
        unblock = resolve;
      });
      const running = orchestrator.runCycle();

      const res = await request(app).post('/api/sync/run').set('Authorization', auth);
      h.wrike.blockUntil = null;
      unblock();
      await running;

      expect(res.status).toBe(409);
      expect(res.body).toEqual({ status: 'skipped', reason: 'A sync run is already in progress' });
    });

    it('answers 500 with the failed result', async () => {
      h.wrike.listError = new Error('Wrike unavailable');

      const res = await request(app).post('/api/sync/run').set('Authorization', auth);

      expect(res.status).toBe(500);
      expect(res.body.error).toBe('Sync cycle failed: Wrike unavailable');
      expect(res.body.result.status).toBe('failed');
    });
  });

  describe('POST /api/sync/records/:source/:id', () => {
    it('rejects an unknown source', async () => {
      const res = await request(app).post('/api/sync/records/jira/1').set('Authorization', auth);

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Unknown source system: jira' });
    });

    it('syncs one record', async () => {
      h.wrike.addTask({ id: 'T1', title: 'AdminCard_Acme' });

      const res = await request(app).post('/api/sync/records/wrike/T1').set('Authorization', auth);

      expect(res.status).toBe(200);
      expect(res.body.outcome).toMatchObject({ action: 'created', counterpartId: '1001' });
    });

    it('answers 202 when the record is queued', async () => {
      let unblock: () => void = () => undefined;
      h.wrike.blockUntil = new Promise<void>((resolve) => {
        unblock = resolve;
      });
      const running = orchestrator.runCycle();

      const res = await request(app).post('/api/sync/records/hubspot/2001').set('Authorization', auth);
      h.wrike.blockUntil = null;
      unblock();
      await running;

      expect(res.status).toBe(202);
      expect(res.body).toEqual({ status: 'queued', source: 'hubspot', recordId: '2001', changeId: 1 });
    });
  });

  /* ── Reports ── */

  describe('activity reports', () => {
    it('rejects a non-numeric activity id', async () => {
      const res = await request(app).get('/api/reports/activities/latest/changes').set('Authorization', auth);

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Activity id must be numeric' });
    });

    it('answers 404 for an unknown activity', async () => {
      const res = await request(app).get('/api/reports/activities/99/changes').set('Authorization', auth);

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: 'Activity not found' });
    });

    it('exports the field changes as CSV', async () => {
      h.wrike.addTask({ id: 'T1', title: 'AdminCard_Acme' });
      await orchestrator.runCycle();

      const res = await request(app).get('/api/reports/activities/1/export').set('Authorization', auth);

      expect(res.status).toBe(200);
      expect(res.headers['content-type']).toBe('text/csv; charset=utf-8');
      expect(res.headers['content-disposition']).toBe('attachment; filename="sync-activity-1.csv"');
      const lines = res.text.split('\n');
      expect(lines[0]).toBe(
        'Timestamp,Company,Entity,Wrike ID,HubSpot ID,Field,System Changed,Old Value,New Value,Changed,Action',
      );
      expect(lines[1]).toBe('2026-03-02T12:00:00.000Z,Acme,company,T1,1001,Company Name,hubspot,,Acme,yes,created');
      expect(lines).toHaveLength(9);
    });
  });

  describe('issues', () => {
    it('resolves an open issue once', async () => {
      await h.store.addIssue({
        source: 'reconciliation',
        entityType: 'company',
        entityId: 'T1',
        issueType: 'wrike_only',
        detail: "Wrike company 'Acme' has no HubSpot counterpart",
      });

      const first = await request(app).post('/api/reports/issues/1/resolve').set('Authorization', auth);
      const second = await request(app).post('/api/reports/issues/1/resolve').set('Authorization', auth);
      const list = await request(app).get('/api/reports/issues').set('Authorization', auth);

      expect(first.body).toEqual({ id: 1, resolved: true });
      expect(second.status).toBe(404);
      expect(list.body).toEqual({ issues: [] });
    });

    it('exports only unresolved issues as CSV', async () => {
      await h.store.addIssue({
        source: 'reconciliation',
        entityType: 'company',
        entityId: 'T1',
        issueType: 'wrike_only',
        detail: "Wrike company 'Acme' has no HubSpot counterpart",
      });
      await h.store.addIssue({
        source: 'hubspot',
        entityType: 'company',
        entityId: '2002',
        issueType: 'sync_error',
        detail: 'HubSpot said "no", twice',
      });
      await h.store.resolveIssue(1);

      const res = await request(app).get('/api/reports/issues/export').set('Authorization', auth);

      expect(res.status).toBe(200);
      expect(res.headers['content-type']).toBe('text/csv; charset=utf-8');
      expect(res.headers['content-disposition']).toBe('attachment; filename="reconciliation-issues.csv"');
      expect(res.text).toBe(
        'Issue ID,Created,Source,Entity,Entity ID,Issue Type,Detail\n' +
          '2,2026-03-02T12:00:00.000Z,hubspot,company,2002,sync_error,"HubSpot said ""no"", twice"\n',
      );
    });
  });

  it('answers 404 before any reconciliation has run', async () => {
    const res = await request(app).get('/api/reports/reconciliation/last').set('Authorization', auth);

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'No reconciliation report yet' });
  });
});

describe('parseLimit', () => {
  it('falls back on missing or unparseable values', () => {
    expect(parseLimit(undefined, 50)).toBe(50);
    expect(parseLimit('abc', 50)).toBe(50);
  });

  it('clamps to [1, max]', () => {
    expect(parseLimit('0', 50)).toBe(1);
    expect(parseLimit('9999', 50)).toBe(500);
    expect(parseLimit('150', 20, 100)).toBe(100);
    expect(parseLimit('25', 50)).toBe(25);
  });
});
