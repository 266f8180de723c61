/**
 * Segments Handler
 *
 * GET endpoint serving the dashboard data: filtered product table, per-tier
 * rollup, KPIs, rankings and the daily series for a date window.
 *
 * Query parameters: mode, category, segment, product, start, end
 */

import type { APIGatewayProxyEventV2 } from 'aws-lambda';
import { z } from 'zod';

import { getServiceConfig, loadRemoteSettings } from '../lib/config/loader';
import {
  AppError,
  ErrorCode,
  createSuccessResponse,
  handleError,
  type ApiResponse,
} from '../lib/errors';
import {
  DynamoProductSource,
  InventoryAnalyticsService,
  parseCalendarDate,
  parseDisplayMode,
  parseSegment,
  segmentLabel,
  type DashboardQuery,
  type DashboardResult,
} from '../lib/inventory-analytics';
import { createRequestLogger, logTiming } from '../lib/logger';

// ============================================================================
// Request validation
// ============================================================================

/** Values the dashboard sends for "no filter" */
const ALL_VALUES = new Set(['all', 'Tất cả']);

const filterValue = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value === undefined || value === '' || ALL_VALUES.has(value) ? undefined : value));

const optionalDate = z
  .string()
  .optional()
  .transform((value, ctx) => {
    if (value === undefined || value === '') return undefined;
    const parsed = parseCalendarDate(value);
    if (parsed === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid date: ${value}` });
      return z.NEVER;
    }
    return parsed;
  });

export const segmentsQuerySchema = z
  .object({
    mode: z.string().optional(),
    category: filterValue,
    segment: filterValue,
    product: filterValue,
    start: optionalDate,
    end: optionalDate,
  })
  .transform((params, ctx): DashboardQuery => {
    const mode = params.mode === undefined ? 'sales' : parseDisplayMode(params.mode);
    if (mode === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['mode'], message: 'mode must be sales or inventory' });
      return z.NEVER;
    }

    const segment = params.segment === undefined ? undefined : parseSegment(params.segment);
    if (segment === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['segment'], message: `Unknown segment: ${params.segment}` });
      return z.NEVER;
    }

    return {
      mode,
      filters: { category: params.category, segment, product: params.product },
      window: { start: params.start, end: params.end },
    };
  });

// ============================================================================
// Response shaping
// ============================================================================

export function toResponseBody(result: DashboardResult): Record<string, unknown> {
  const base = {
    status: result.status,
    mode: result.mode,
    dateRange: result.dateRange,
    window: result.window,
    options: {
      ...result.options,
      segments: result.options.segments.map((segment) => ({ segment, label: segmentLabel(segment) })),
    },
  };

  if (result.status === 'empty') {
    return { ...base, reason: result.reason };
  }

  return {
    ...base,
    rows: result.rows.map((row) => ({ ...row, segmentLabel: segmentLabel(row.segment) })),
    segments: result.segments.map((summary) => ({ ...summary, label: segmentLabel(summary.segment) })),
    kpis: result.kpis,
    ranking: result.ranking,
    daily: result.daily,
    failedRows: result.failures.length,
  };
}

// ============================================================================
// Handler
// ============================================================================

export type ServiceFactory = () => Promise<InventoryAnalyticsService>;

let shared: { service: InventoryAnalyticsService; settingsKey: string } | null = null;

/**
 * Service kept across warm invocations so the snapshot cache is reused.
 * Settings are re-read on every call (served from the loader's five-minute
 * cache); when they change, the service and its snapshot are rebuilt.
 */
export const defaultServiceFactory: ServiceFactory = async () => {
  const config = getServiceConfig();
  const settings = await loadRemoteSettings(config.stage);
  const settingsKey = JSON.stringify({ config, settings });

  if (shared && shared.settingsKey === settingsKey) return shared.service;

  const service = new InventoryAnalyticsService({
    source: new DynamoProductSource({
      tableName: config.productsTable,
      region: config.region,
      pageSize: config.scanPageSize,
    }),
    cacheTtlSeconds: settings.snapshotCacheTtlSeconds ?? config.snapshotCacheTtlSeconds,
    fallbackDateRange: settings.fallbackDateRange,
    defaultWindowBounds: settings.defaultWindow,
  });
  shared = { service, settingsKey };
  return service;
};

export function createSegmentsHandler(getService: ServiceFactory) {
  return async (event: APIGatewayProxyEventV2): Promise<ApiResponse> => {
    const requestId = event.requestContext?.requestId;
    const logger = createRequestLogger({ requestId, handler: 'segments' });
    const startTime = Date.now();

    try {
      const method = event.requestContext?.http?.method ?? 'GET';
      if (method !== 'GET') {
        throw new AppError(ErrorCode.METHOD_NOT_ALLOWED, `Method ${method} not allowed`);
      }

      const query = segmentsQuerySchema.parse(event.queryStringParameters ?? {});
      const service = await getService();
      const result = await service.query(query);

      logger.info('Dashboard query served', {
        status: result.status,
        mode: query.mode,
        window: result.window,
        rows: result.status === 'ok' ? result.rows.length : 0,
      });
      logTiming('segments.query', Date.now() - startTime, { requestId });

      return createSuccessResponse(toResponseBody(result));
    } catch (error) {
      return handleError(error, 'segments-handler', requestId);
    }
  };
}

export const segments = createSegmentsHandler(defaultServiceFactory);
