// =============================================================================
// Contact Sync Tests
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

import {
  syncContactTaskToHubSpot,
  syncContactsToHubSpot,
  syncHubSpotContactToWrike,
} from '../services/contactSync';
import { CF, FOLDERS, createHarness, type TestHarness } from './helpers/fakeGateways';

describe('Contact sync', () => {
  let h: TestHarness;
  let activityId: number;

  beforeEach(async () => {
    h = await createHarness({ syncContactsHubspotToWrike: true });
    activityId = await h.store.startActivity('full_sync');
  });

  afterEach(async () => {
    await h.store.close();
  });

  describe('Wrike → HubSpot', () => {
    it('skips contacts without an email and makes no HubSpot call', async () => {
      h.wrike.addTask({ id: 'C1', title: 'Jane Doe', folderId: FOLDERS.contacts });

      const result = await syncContactsToHubSpot(h.ctx, activityId);

      expect(result).toMatchObject({ processed: 0, created: 0, updated: 0, skipped: 0, failed: 0, skippedNoEmail: 1 });
      expect(h.hubspot.calls).toEqual([]);
    });

    it('creates a HubSpot contact, splitting the title when name fields are empty', async () => {
      h.wrike.addTask({
        id: 'C1',
        title: 'Jane Doe',
        folderId: FOLDERS.contacts,
        fields: { [CF.email]: 'jane@example.com', [CF.city]: 'Lyon' },
      });

      const result = await syncContactsToHubSpot(h.ctx, activityId);

      expect(result).toMatchObject({ processed: 1, created: 1, skippedNoEmail: 0 });
      expect(h.hubspot.objects.contacts.get('1001')?.properties).toMatchObject({
        email: 'jane@example.com',
        firstname: 'Jane',
        lastname: 'Doe',
        city: 'Lyon',
      });
    });

    it('never sends a job title', async () => {
      const task = h.wrike.addTask({
        id: 'C1',
        title: 'Jane Doe',
        folderId: FOLDERS.contacts,
        fields: { [CF.email]: 'jane@example.com' },
      });

      await syncContactTaskToHubSpot(h.ctx, task, activityId);

      const [create] = h.hubspot.writes();
      expect(Object.keys(create.properties ?? {})).not.toContain('jobtitle');
    });

    it('updates the existing contact matched by email', async () => {
      h.hubspot.add('contacts', '501', { email: 'jane@example.com', firstname: 'Janet', lastname: 'Doe' });
      const task = h.wrike.addTask({
        id: 'C1',
        title: 'Jane Doe',
        folderId: FOLDERS.contacts,
        fields: { [CF.email]: 'jane@example.com', [CF.firstName]: 'Jane', [CF.lastName]: 'Doe' },
      });

      const outcome = await syncContactTaskToHubSpot(h.ctx, task, activityId);

      expect(outcome).toMatchObject({ kind: 'updated', counterpartId: '501', name: 'Jane Doe' });
      expect(h.hubspot.objects.contacts.size).toBe(1);
      expect(h.hubspot.objects.contacts.get('501')?.properties.firstname).toBe('Jane');
    });

    it('reports an unchanged contact as already synced', async () => {
      const task = h.wrike.addTask({
        id: 'C1',
        title: 'Jane Doe',
        folderId: FOLDERS.contacts,
        fields: { [CF.email]: 'jane@example.com' },
      });

      await syncContactTaskToHubSpot(h.ctx, task, activityId);
      const second = await syncContactTaskToHubSpot(h.ctx, task, activityId);

      expect(second).toMatchObject({ kind: 'already_synced', written: true, counterpartId: '1001' });
    });
  });

  describe('HubSpot → Wrike', () => {
    beforeEach(() => {
      h.wrike.addTask({
        id: 'C1',
        title: 'Jane Doe',
        folderId: FOLDERS.contacts,
        fields: { [CF.email]: 'jane@example.com', [CF.firstName]: 'Jane', [CF.lastName]: 'Doe' },
      });
    });

    it('writes changed fields and retitles the task to the full name', async () => {
      const contact = h.hubspot.add('contacts', '501', {
        email: 'jane@example.com',
        firstname: 'Janet',
        lastname: 'Doe',
        city: 'Lyon',
      });

      const outcome = await syncHubSpotContactToWrike(h.ctx, contact, activityId);

      expect(outcome).toMatchObject({ kind: 'updated', counterpartId: 'C1', name: 'Janet Doe' });
      expect(h.wrike.updates).toEqual([
        {
          taskId: 'C1',
          update: {
            title: 'Janet Doe',
            customFields: [
              { id: CF.firstName, value: 'Janet' },
              { id: CF.city, value: 'Lyon' },
            ],
          },
        },
      ]);
    });

    it('does not write when nothing differs', async () => {
      const contact = h.hubspot.add('contacts', '501', {
        email: 'jane@example.com',
        firstname: 'Jane',
        lastname: 'Doe',
      });

      const outcome = await syncHubSpotContactToWrike(h.ctx, contact, activityId);

      expect(outcome.kind).toBe('already_synced');
      expect(h.wrike.updates).toEqual([]);
    });

    it('skips a contact without an email before any Wrike call', async () => {
      const contact = h.hubspot.add('contacts', '502', { firstname: 'No', lastname: 'Email' });

      const outcome = await syncHubSpotContactToWrike(h.ctx, contact, activityId);

      expect(outcome.kind).toBe('no_email');
      expect(h.wrike.listCalls).toEqual([]);
    });

    it('skips a contact with no matching Wrike task', async () => {
      const contact = h.hubspot.add('contacts', '503', { email: 'someone@example.com' });

      const outcome = await syncHubSpotContactToWrike(h.ctx, contact, activityId);

      expect(outcome).toMatchObject({ kind: 'skipped', reason: 'No Wrike task for email' });
      expect(h.wrike.updates).toEqual([]);
    });
  });
});
