/**
 * Configuration Loader for the inventory-segments service
 *
 * Static settings come from environment variables, validated with zod.
 * Tunables that operators change at runtime live in one SSM parameter:
 *   /tf/{stage}/services/inventory-segments/settings
 *
 * @module config/loader
 */

import { SSMClient, GetParameterCommand } from '@aws-sdk/client-ssm';
import { z } from 'zod';

import { AppError, ErrorCode } from '../errors';
import { parseCalendarDate } from '../inventory-analytics/calendar-date';

// ============================================================================
// Types
// ============================================================================

const envSchema = z.object({
  PRODUCTS_TABLE: z.string().min(1, 'PRODUCTS_TABLE is required'),
  AWS_REGION: z.string().min(1).default('eu-west-1'),
  STAGE: z.string().min(1).default('dev'),
  SNAPSHOT_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(600),
  SCAN_PAGE_SIZE: z.coerce.number().int().positive().max(1000).default(500),
});

export interface ServiceConfig {
  productsTable: string;
  region: string;
  stage: string;
  snapshotCacheTtlSeconds: number;
  scanPageSize: number;
}

const calendarDate = z.string().transform((value, ctx) => {
  const parsed = parseCalendarDate(value);
  if (parsed === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid calendar date: ${value}` });
    return z.NEVER;
  }
  return parsed;
});

const dateRangeSchema = z
  .object({ start: calendarDate, end: calendarDate })
  .refine((range) => range.start <= range.end, 'start must not be after end');

const remoteSettingsSchema = z.object({
  defaultWindow: dateRangeSchema.optional(),
  fallbackDateRange: dateRangeSchema.optional(),
  snapshotCacheTtlSeconds: z.number().int().positive().optional(),
});

/**
 * Runtime settings from SSM. Every field is optional.
 */
export type RemoteSettings = z.infer<typeof remoteSettingsSchema>;

interface SettingsCacheEntry {
  data: RemoteSettings;
  timestamp: number;
}

// ============================================================================
// Configuration
// ============================================================================

const SETTINGS_CACHE_TTL = parseInt(process.env.CONFIG_CACHE_TTL || '300000', 10); // 5 minutes
const SERVICE_NAME = 'inventory-segments';

// ============================================================================
// SSM Client (lazy-initialized)
// ============================================================================

let ssmClient: SSMClient | null = null;

function getSSMClient(): SSMClient {
  if (!ssmClient) {
    ssmClient = new SSMClient({
      region: process.env.AWS_REGION || 'eu-west-1',
      maxAttempts: 3,
    });
  }
  return ssmClient;
}

const settingsCache = new Map<string, SettingsCacheEntry>();

// ============================================================================
// Public API
// ============================================================================

/**
 * Read and validate the service environment.
 *
 * @throws AppError with CONFIG_ERROR when a variable is missing or invalid
 */
export function getServiceConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new AppError(
      ErrorCode.CONFIG_ERROR,
      'Invalid service configuration',
      result.error.issues.map((issue) => ({
        field: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }

  return {
    productsTable: result.data.PRODUCTS_TABLE,
    region: result.data.AWS_REGION,
    stage: result.data.STAGE,
    snapshotCacheTtlSeconds: result.data.SNAPSHOT_CACHE_TTL_SECONDS,
    scanPageSize: result.data.SCAN_PAGE_SIZE,
  };
}

export function settingsParameterPath(stage: string): string {
  return `/tf/${stage}/services/${SERVICE_NAME}/settings`;
}

/**
 * Load runtime settings from SSM Parameter Store, cached for five minutes.
 * A missing, unreadable or invalid parameter yields `{}` so the service
 * keeps running on its built-in defaults.
 */
export async function loadRemoteSettings(stage: string): Promise<RemoteSettings> {
  const cached = settingsCache.get(stage);
  if (cached && Date.now() - cached.timestamp < SETTINGS_CACHE_TTL) {
    return cached.data;
  }

  const path = settingsParameterPath(stage);
  let settings: RemoteSettings = {};

  try {
    const response = await getSSMClient().send(
      new GetParameterCommand({ Name: path, WithDecryption: true })
    );

    const raw = response.Parameter?.Value;
    if (raw) {
      const parsed = remoteSettingsSchema.safeParse(JSON.parse(raw));
      if (parsed.success) {
        settings = parsed.data;
      } else {
        console.warn(JSON.stringify({
          level: 'warn',
          msg: 'settings.invalid',
          path,
          issues: parsed.error.issues.map((issue) => issue.message),
        }));
      }
    }
  } catch (error) {
    console.warn(JSON.stringify({
      level: 'warn',
      msg: 'settings.load.failed',
      path,
      error: error instanceof Error ? error.message : String(error),
    }));
  }

  settingsCache.set(stage, { data: settings, timestamp: Date.now() });
  return settings;
}

/**
 * Clear the settings cache, forcing the next call to read SSM again
 */
export function clearSettingsCache(): void {
  settingsCache.clear();
}
