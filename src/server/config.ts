// =============================================================================
// Application Configuration — Centralised + Validated
// =============================================================================
// Two sources:
//   • process.env (via dotenv)     — secrets, ports, store selection
//   • config/sync.config.json      — field mapping table, folders, tables
//
// The mapping file is validated exhaustively with zod at startup. Any
// missing section or key is a ConfigError; the server refuses to start.
// =============================================================================
import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { errorMessage } from './utils/sanitizeError';

dotenv.config();

export type StoreBackend = 'sqlite' | 'mongo';

export interface AppConfig {
  port: number;
  nodeEnv: string;
  wrikeApiToken: string;
  wrikeBaseUrl: string;
  hubspotAccessToken: string;
  hubspotBaseUrl: string;
  storeBackend: StoreBackend;
  sqlitePath: string;
  mongodbUri: string;
  jwtSecret: string;
  syncConfigPath: string;
  schedulerEnabled: boolean;
}

const config: AppConfig = {
  port: parseInt(process.env.PORT ?? '3000', 10),
  nodeEnv: process.env.NODE_ENV ?? 'development',

  // Wrike
  wrikeApiToken: process.env.WRIKE_API_TOKEN ?? '',
  wrikeBaseUrl: process.env.WRIKE_BASE_URL ?? 'https://www.wrike.com/api/v4',

  // HubSpot (private app token)
  hubspotAccessToken: process.env.HUBSPOT_ACCESS_TOKEN ?? '',
  hubspotBaseUrl: process.env.HUBSPOT_BASE_URL ?? 'https://api.hubapi.com',

  // Persistence — embedded SQLite for single-instance, MongoDB for shared deployments
  storeBackend: process.env.SYNC_STORE === 'mongo' ? 'mongo' : 'sqlite',
  sqlitePath: process.env.SQLITE_PATH ?? 'data/sync.db',
  mongodbUri: process.env.MONGODB_URI ?? '',

  // JWT for the operator API
  jwtSecret: process.env.JWT_SECRET ?? '',

  syncConfigPath: process.env.SYNC_CONFIG_PATH ?? path.join(process.cwd(), 'config', 'sync.config.json'),
  schedulerEnabled: (process.env.SCHEDULER_ENABLED ?? 'true') !== 'false',
};

export default config;

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export class ConfigError extends Error {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
    this.name = 'ConfigError';
    this.problems = problems;

    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Fails fast on environment settings the server cannot run without.
 * Called once from `start()`; never at cycle time.
 */
export function assertRuntimeConfig(cfg: AppConfig): void {
  const problems: string[] = [];
  const required: Array<keyof AppConfig> = ['wrikeApiToken', 'hubspotAccessToken', 'jwtSecret'];

  for (const key of required) {
    if (!cfg[key]) problems.push(`Missing environment setting: ${key}`);
  }
  if (cfg.storeBackend === 'mongo' && !cfg.mongodbUri) {
    problems.push('MONGODB_URI is required when SYNC_STORE=mongo');
  }
  if (!Number.isInteger(cfg.port) || cfg.port <= 0) {
    problems.push(`PORT must be a positive integer (got ${cfg.port})`);
  }

  if (problems.length) throw new ConfigError(problems);
}

// ─────────────────────────────────────────────────────────────────────────────
// Sync mapping file
// ─────────────────────────────────────────────────────────────────────────────

const id = z.string().trim().min(1);

const syncConfigSchema = z.object({
  environment: z.enum(['development', 'production']).default('development'),

  wrike: z.object({
    companiesFolderId: id,
    contactsFolderId: id,
    /** Wrike custom-field ids on company tasks */
    companyCustomFields: z.object({
      accountStatus: id,
      affinityScore: id,
      accountTier: id,
      /** Mirror of the HubSpot company id; enables id cross-sync */
      hubspotAccountId: id.optional(),
      /** Mirror of the HubSpot company name; enables name cross-sync */
      hubspotAccountName: id.optional(),
    }),
    contactCustomFields: z.object({
      email: id,
      firstName: id,
      lastName: id,
      phone: id,
      mobile: id,
      address1: id,
      address2: id,
      city: id,
      state: id,
      country: id,
    }),
  }),

  hubspot: z.object({
    companyProperties: z.object({
      name: id,
      accountStatus: id,
      affinityScore: id,
      accountPriority: id,
      /** Cross-reference property holding the Wrike task id */
      wrikeTaskId: id,
      lastModified: id.default('hs_lastmodifieddate'),
    }),
    contactProperties: z.object({
      firstname: id,
      lastname: id,
      email: id,
      phone: id,
      mobilephone: id,
      address: id,
      address2: id,
      city: id,
      state: id,
      country: id,
      lastModified: id.default('lastmodifieddate'),
    }),
  }),

  sync: z
    .object({
      markerPrefix: id.default('AdminCard'),
      tierToPriority: z.record(z.string()).default({}),
      /** Defaults to the inverse of tierToPriority */
      priorityToTier: z.record(z.string()).optional(),
      syncContactsHubspotToWrike: z.boolean().default(false),
      batchLookbackDays: z.number().int().positive().default(7),
      changeDetectionLookbackMinutes: z.number().int().positive().default(60),
      changeDetectionIntervalMinutes: z.number().int().positive().default(5),
      reconciliationIntervalHours: z.number().positive().default(24),
      changeRetentionDays: z.number().int().positive().default(30),
      issueCapPerCategory: z.number().int().positive().default(20),
    })
    .default({}),
});

export type SyncConfig = z.infer<typeof syncConfigSchema>;
export type SyncConfigInput = z.input<typeof syncConfigSchema>;

/** Validates an already-parsed mapping document. */
export function parseSyncConfig(raw: unknown): SyncConfig {
  const result = syncConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return result.data;
}

/** Reads and validates the JSON mapping file. */
export function loadSyncConfig(filePath: string = config.syncConfigPath): SyncConfig {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    throw new ConfigError([`Cannot read sync config ${filePath}: ${errorMessage(err)}`]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError([`Sync config ${filePath} is not valid JSON: ${errorMessage(err)}`]);
  }

  return parseSyncConfig(raw);
}
