// =============================================================================
// Field Mapping Table Tests
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
  FieldMappingTable,
  fullName,
  normalizeValue,
  readCustomField,
  setCustomField,
  splitTitle,
} from '../services/fieldMapping';
import type { WrikeTask } from '../types';
import { testConfig } from './helpers/fakeGateways';

describe('value helpers', () => {
  it('normalizes remote values to trimmed strings', () => {
    expect(normalizeValue(null)).toBe('');
    expect(normalizeValue(undefined)).toBe('');
    expect(normalizeValue('  Active ')).toBe('Active');
    expect(normalizeValue(7)).toBe('7');
  });

  it('reads a custom field, treating blank as unset', () => {
    const task: WrikeTask = {
      id: 'T1',
      title: 'AdminCard_Acme',
      customFields: [
        { id: 'CF_STATUS', value: ' Active ' },
        { id: 'CF_SCORE', value: '   ' },
      ],
    };

    expect(readCustomField(task, 'CF_STATUS')).toBe('Active');
    expect(readCustomField(task, 'CF_SCORE')).toBeNull();
    expect(readCustomField(task, 'CF_OTHER')).toBeNull();
  });

  it('sets a custom field without mutating the input', () => {
    const original = [{ id: 'A', value: '1' }];

    const updated = setCustomField(original, 'A', '2');

    expect(updated).toEqual([{ id: 'A', value: '2' }]);
    expect(original).toEqual([{ id: 'A', value: '1' }]);
  });

  it('drops a field set to an empty value', () => {
    expect(setCustomField([{ id: 'A', value: '1' }], 'A', '')).toEqual([]);
  });

  it('joins and splits names', () => {
    expect(fullName('Jane', 'Doe')).toBe('Jane Doe');
    expect(fullName('', 'Doe')).toBe('Doe');
    expect(fullName(null, undefined)).toBe('');
    expect(splitTitle('  Mary Ann Smith ')).toEqual({ first: 'Mary', last: 'Ann Smith' });
    expect(splitTitle('Cher')).toEqual({ first: 'Cher', last: '' });
  });
});

describe('FieldMappingTable', () => {
  const table = new FieldMappingTable(testConfig());

  describe('tier ↔ priority', () => {
    it('maps configured tiers and back', () => {
      expect(table.tierToPriority('Tier 2')).toBe('Medium');
      expect(table.priorityToTier('Medium')).toBe('Tier 2');
    });

    it('passes unmapped values through and keeps empty as empty', () => {
      expect(table.tierToPriority('Tier 9')).toBe('Tier 9');
      expect(table.priorityToTier('Urgent')).toBe('Urgent');
      expect(table.tierToPriority('')).toBe('');
      expect(table.priorityToTier(null)).toBe('');
    });

    it('uses an explicit reverse table when configured', () => {
      const custom = new FieldMappingTable(
        testConfig({
          tierToPriority: { 'Tier 1': 'High', 'Tier 1b': 'High' },
          priorityToTier: { High: 'Tier 1' },
        }),
      );

      expect(custom.priorityToTier('High')).toBe('Tier 1');
      expect(custom.nonInvertibleTiers()).toEqual(['Tier 1b']);
    });

    it('has no non-invertible tiers for a one-to-one table', () => {
      expect(table.nonInvertibleTiers()).toEqual([]);
    });
  });

  describe('marker prefix', () => {
    it('detects the marker at the start of a title', () => {
      expect(table.hasMarkerPrefix('AdminCard_Acme')).toBe(true);
      expect(table.hasMarkerPrefix('  AdminCard Acme')).toBe(true);
      expect(table.hasMarkerPrefix('Acme AdminCard')).toBe(false);
      expect(table.hasMarkerPrefix(undefined)).toBe(false);
    });

    it('strips every leading marker form', () => {
      expect(table.cleanCompanyName('AdminCard_Acme')).toBe('Acme');
      expect(table.cleanCompanyName('AdminCard - Acme Ltd')).toBe('Acme Ltd');
      expect(table.cleanCompanyName('AdminCard_AdminCard_Acme')).toBe('Acme');
      expect(table.cleanCompanyName('AdminCard')).toBe('');
      expect(table.cleanCompanyName('Acme')).toBe('Acme');
    });
  });

  it('lists the HubSpot properties to request', () => {
    expect(table.companyPropertyNames()).toEqual([
      'name',
      'account_status',
      'affinity_score',
      'account_priority',
      'wrike_task_id',
      'hs_lastmodifieddate',
    ]);
    expect(table.contactPropertyNames()).not.toContain('jobtitle');
  });
});
