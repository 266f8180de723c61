/**
 * Product Source
 *
 * Reads raw product documents from the products table. The source applies
 * the price pre-filter (0 < price < 1e9) and caps each stock history at 100
 * entries; everything else is left to the normalizer.
 *
 * @module lib/inventory-analytics/product-source
 */

import {
  DynamoDBClient,
  ScanCommand,
  type AttributeValue,
  type ScanCommandInput,
} from '@aws-sdk/client-dynamodb';
import { marshall, unmarshall } from '@aws-sdk/util-dynamodb';
import { Logger } from '@aws-lambda-powertools/logger';

import { SourceUnavailableError } from '../errors';
import { MAX_SOURCE_PRICE, SOURCE_HISTORY_LIMIT } from './constants';
import type { RawProductRecord } from './types';

export interface SourceFetchResult {
  records: RawProductRecord[];
  /** Items examined by the store, including those the price filter removed */
  scanned: number;
}

/**
 * Anything that can hand the engine a batch of raw product records
 */
export interface ProductSource {
  /** Stable identity used as the snapshot cache key */
  readonly identity: string;
  fetchProducts(): Promise<SourceFetchResult>;
}

/**
 * Configuration for DynamoProductSource
 */
export interface DynamoProductSourceConfig {
  /** DynamoDB table name */
  tableName: string;
  /** AWS region */
  region?: string;
  /** Items per scan page (default: 500) */
  pageSize?: number;
  /** Logger instance (optional) */
  logger?: Logger;
  /** Pre-built client (optional) */
  client?: DynamoDBClient;
}

export class DynamoProductSource implements ProductSource {
  readonly identity: string;
  private client: DynamoDBClient;
  private tableName: string;
  private pageSize: number;
  private logger: Logger;

  constructor(config: DynamoProductSourceConfig) {
    this.tableName = config.tableName;
    this.identity = `dynamodb:${config.tableName}`;
    this.pageSize = config.pageSize ?? 500;
    this.logger = config.logger ?? new Logger({ serviceName: 'ProductSource' });
    this.client =
      config.client ??
      new DynamoDBClient({
        region: config.region ?? 'eu-west-1',
      });
  }

  /**
   * Scan the whole table, page by page.
   *
   * @throws SourceUnavailableError if any page cannot be read
   */
  async fetchProducts(): Promise<SourceFetchResult> {
    const records: RawProductRecord[] = [];
    let scanned = 0;
    let pages = 0;
    let exclusiveStartKey: Record<string, AttributeValue> | undefined;

    const startTime = Date.now();

    do {
      const input: ScanCommandInput = {
        TableName: this.tableName,
        ProjectionExpression: '#id, #name, #category, #price, #promotion, #history',
        FilterExpression: '#price > :minPrice AND #price < :maxPrice',
        ExpressionAttributeNames: {
          '#id': 'id',
          '#name': 'name',
          '#category': 'category',
          '#price': 'price',
          '#promotion': 'promotion',
          '#history': 'stock_history',
        },
        ExpressionAttributeValues: marshall({ ':minPrice': 0, ':maxPrice': MAX_SOURCE_PRICE }),
        Limit: this.pageSize,
        ExclusiveStartKey: exclusiveStartKey,
      };

      try {
        const response = await this.client.send(new ScanCommand(input));
        pages++;
        scanned += response.ScannedCount ?? 0;

        for (const item of response.Items ?? []) {
          records.push(this.toRawRecord(unmarshall(item)));
        }

        exclusiveStartKey = response.LastEvaluatedKey;
      } catch (error) {
        this.logger.error('Failed to scan products table', {
          tableName: this.tableName,
          pages,
          error: error instanceof Error ? error.message : String(error),
        });
        throw new SourceUnavailableError(`Products table ${this.tableName} is unavailable`, error);
      }
    } while (exclusiveStartKey);

    this.logger.info('Fetched products', {
      tableName: this.tableName,
      pages,
      scanned,
      returned: records.length,
      filteredByPrice: scanned - records.length,
      durationMs: Date.now() - startTime,
    });

    return { records, scanned };
  }

  private toRawRecord(item: Record<string, unknown>): RawProductRecord {
    const history = item.stock_history;
    return {
      ...item,
      stock_history: Array.isArray(history) ? history.slice(0, SOURCE_HISTORY_LIMIT) : history,
    };
  }
}
