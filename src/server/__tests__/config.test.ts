// =============================================================================
// Configuration Tests
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

import fs from 'fs';
import os from 'os';
import path from 'path';
import config, { ConfigError, assertRuntimeConfig, loadSyncConfig, parseSyncConfig, type AppConfig } from '../config';
import { testConfigInput } from './helpers/fakeGateways';

describe('parseSyncConfig', () => {
  it('fills the documented defaults', () => {
    const input = testConfigInput();
    const parsed = parseSyncConfig({ ...input, sync: {} });

    expect(parsed.environment).toBe('development');
    expect(parsed.hubspot.companyProperties.lastModified).toBe('hs_lastmodifieddate');
    expect(parsed.hubspot.contactProperties.lastModified).toBe('lastmodifieddate');
    expect(parsed.sync).toEqual({
      markerPrefix: 'AdminCard',
      tierToPriority: {},
      syncContactsHubspotToWrike: false,
      batchLookbackDays: 7,
      changeDetectionLookbackMinutes: 60,
      changeDetectionIntervalMinutes: 5,
      reconciliationIntervalHours: 24,
      changeRetentionDays: 30,
      issueCapPerCategory: 20,
    });
  });

  it('reports every problem with its path', () => {
    const input = testConfigInput();
    let caught: unknown;
    try {
      parseSyncConfig({
        ...input,
        wrike: { ...input.wrike, companiesFolderId: undefined, contactsFolderId: '   ' },
      });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.problems).toHaveLength(2);
    expect(caught.problems[0]).toBe('wrike.companiesFolderId: Required');
    expect(caught.problems[1]).toMatch(/^wrike\.contactsFolderId: /);
  });

  it('names the root when the document is not an object', () => {
    expect(() => parseSyncConfig(null)).toThrow('(root): Expected object, received null');
  });

  it('rejects a non-positive lookback', () => {
    expect(() => parseSyncConfig(testConfigInput({ batchLookbackDays: 0 }))).toThrow(ConfigError);
  });
});

describe('loadSyncConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sync-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('loads the shipped mapping file', () => {
    const parsed = loadSyncConfig(path.join(__dirname, '..', '..', '..', 'config', 'sync.config.json'));

    expect(parsed.sync.markerPrefix).toBe('AdminCard');
    expect(parsed.sync.tierToPriority).toEqual({ 'Tier 1': 'High', 'Tier 2': 'Medium', 'Tier 3': 'Low' });
  });

  it('rejects a missing file', () => {
    const file = path.join(dir, 'absent.json');

    expect(() => loadSyncConfig(file)).toThrow(`Cannot read sync config ${file}`);
  });

  it('rejects malformed JSON', () => {
    const file = path.join(dir, 'broken.json');
    fs.writeFileSync(file, '{ "wrike": ');

    expect(() => loadSyncConfig(file)).toThrow(`Sync config ${file} is not valid JSON`);
  });
});

describe('assertRuntimeConfig', () => {
  const valid: AppConfig = {
    ...config,
    port: 3000,
    wrikeApiToken: 'test-secret',
    hubspotAccessToken: 'test-secret',
    jwtSecret: 'test-secret',
    storeBackend: 'sqlite',
  };

  it('accepts a complete environment', () => {
    expect(() => assertRuntimeConfig(valid)).not.toThrow();
  });

  it('lists each missing setting', () => {
    let caught: unknown;
    try {
      assertRuntimeConfig({ ...valid, wrikeApiToken: '', jwtSecret: '' });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.problems).toEqual([
      'Missing environment setting: wrikeApiToken',
      'Missing environment setting: jwtSecret',
    ]);
  });

  it('requires a Mongo URI for the mongo backend', () => {
    expect(() => assertRuntimeConfig({ ...valid, storeBackend: 'mongo', mongodbUri: '' })).toThrow(
      'MONGODB_URI is required when SYNC_STORE=mongo',
    );
  });
});
