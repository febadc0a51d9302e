import { GetCommand, PutCommand, QueryCommand, type DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { z } from 'zod';
import {
  componentTypeSchema,
  reviewStatusRecordSchema,
  type ComponentType,
  type JsonValue,
  type ResultRecord,
  type ResultSet,
  type ReviewStatusRecord,
  type ReviewStatusUpdate,
  type StoredReport,
} from '../types';
import { computeExpiry, DEFAULT_RETENTION_DAYS } from '../utils/time';
import {
  decodePayload,
  encodePayload,
  fail,
  ok,
  REPORT_CONTENT_TYPE,
  REPORT_KEY,
  STATUS_KEY,
  toStorageError,
  type ConsistencyModel,
  type StorageBackend,
  type StorageResult,
} from './storage.backend';

const resultItemSchema = z.object({
  reviewId: z.string(),
  componentType: componentTypeSchema,
  body: z.string(),
  ttl: z.number(),
});

const reportItemSchema = z.object({
  reviewId: z.string(),
  contentType: z.string(),
  body: z.string(),
  ttl: z.number(),
});

export interface DynamoDBStorageOptions {
  client: DynamoDBDocumentClient;
  table: string;
  retentionDays?: number;
  now?: () => Date;
}

/**
 * Key-value backend: one item per (reviewId, componentType), where reviewId is
 * the partition key and componentType the sort key. The numeric `ttl`
 * attribute drives the table's native TTL expiry.
 *
 * Payloads are kept as a JSON string in `body`, not as a native map: the
 * table's number type cannot hold every JSON number without losing precision.
 */
export class DynamoDBStorageBackend implements StorageBackend {
  readonly kind = 'key-value-table' as const;
  readonly consistency: ConsistencyModel = { pointReads: 'strong', listReads: 'strong' };
  readonly retentionDays: number;

  private client: DynamoDBDocumentClient;
  private table: string;
  private now: () => Date;

  constructor(options: DynamoDBStorageOptions) {
    this.client = options.client;
    this.table = options.table;
    this.retentionDays = options.retentionDays ?? DEFAULT_RETENTION_DAYS;
    this.now = options.now ?? (() => new Date());
  }

  async put(reviewId: string, componentType: ComponentType, payload: JsonValue): Promise<StorageResult<ResultRecord>> {
    try {
      const ttl = computeExpiry(this.now(), this.retentionDays);
      const body = encodePayload(payload);
      const data = decodePayload(body);

      await this.client.send(
        new PutCommand({
          TableName: this.table,
          Item: { reviewId, componentType, body, ttl },
        })
      );

      console.log(`Stored result for ${componentType} in DynamoDB review ${reviewId}`);
      return ok({ reviewId, componentType, payload: data, expiresAt: ttl });
    } catch (error) {
      const failure = toStorageError(error, `put ${this.table}/${reviewId}/${componentType}`);
      console.error(`Error storing ${componentType} result for review ${reviewId} in DynamoDB:`, failure.message);
      return fail(failure);
    }
  }

  async get(reviewId: string, componentType: ComponentType): Promise<StorageResult<ResultRecord | null>> {
    try {
      const response = await this.client.send(
        new GetCommand({
          TableName: this.table,
          Key: { reviewId, componentType },
          ConsistentRead: true,
        })
      );

      if (!response.Item) return ok(null);

      const item = resultItemSchema.parse(response.Item);
      return ok({
        reviewId: item.reviewId,
        componentType: item.componentType,
        payload: decodePayload(item.body),
        expiresAt: item.ttl,
      });
    } catch (error) {
      const failure = toStorageError(error, `get ${this.table}/${reviewId}/${componentType}`);
      console.error(`Error retrieving ${componentType} result for review ${reviewId} from DynamoDB:`, failure.message);
      return fail(failure);
    }
  }

  async getAll(reviewId: string): Promise<StorageResult<ResultSet>> {
    try {
      const results: ResultSet = {};
      let exclusiveStartKey: Record<string, unknown> | undefined;

      do {
        const response = await this.client.send(
          new QueryCommand({
            TableName: this.table,
            KeyConditionExpression: '#rid = :rid',
            ExpressionAttributeNames: { '#rid': 'reviewId' },
            ExpressionAttributeValues: { ':rid': reviewId },
            ConsistentRead: true,
            ExclusiveStartKey: exclusiveStartKey,
          })
        );

        for (const raw of response.Items ?? []) {
          // The status and report items share the partition; skip them and anything else unrecognised
          const item = resultItemSchema.safeParse(raw);
          if (!item.success) continue;

          try {
            results[item.data.componentType] = decodePayload(item.data.body);
          } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            console.warn(`Skipping unreadable ${item.data.componentType} result for review ${reviewId}: ${reason}`);
          }
        }

        exclusiveStartKey = response.LastEvaluatedKey;
      } while (exclusiveStartKey);

      console.log(`Retrieved ${Object.keys(results).length} results from DynamoDB for review ${reviewId}`);
      return ok(results);
    } catch (error) {
      const failure = toStorageError(error, `query ${this.table}/${reviewId}`);
      console.error(`Error retrieving results for review ${reviewId} from DynamoDB:`, failure.message);
      return fail(failure);
    }
  }

  async putStatus(reviewId: string, update: ReviewStatusUpdate): Promise<StorageResult<ReviewStatusRecord>> {
    try {
      const record: ReviewStatusRecord = {
        ...update,
        reviewId,
        updatedAt: this.now().toISOString(),
        ttl: computeExpiry(this.now(), this.retentionDays),
      };

      await this.client.send(
        new PutCommand({
          TableName: this.table,
          Item: { ...record, componentType: STATUS_KEY },
        })
      );

      console.log(`Updated review ${reviewId} status to ${record.status}`);
      return ok(record);
    } catch (error) {
      const failure = toStorageError(error, `put ${this.table}/${reviewId}/${STATUS_KEY}`);
      console.error(`Error updating review ${reviewId} status in DynamoDB:`, failure.message);
      return fail(failure);
    }
  }

  async getStatus(reviewId: string): Promise<StorageResult<ReviewStatusRecord | null>> {
    try {
      const response = await this.client.send(
        new GetCommand({
          TableName: this.table,
          Key: { reviewId, componentType: STATUS_KEY },
          ConsistentRead: true,
        })
      );
      return ok(response.Item ? reviewStatusRecordSchema.parse(response.Item) : null);
    } catch (error) {
      const failure = toStorageError(error, `get ${this.table}/${reviewId}/${STATUS_KEY}`);
      console.error(`Error reading review ${reviewId} status from DynamoDB:`, failure.message);
      return fail(failure);
    }
  }

  async putReport(reviewId: string, html: string): Promise<StorageResult<StoredReport>> {
    try {
      const ttl = computeExpiry(this.now(), this.retentionDays);

      await this.client.send(
        new PutCommand({
          TableName: this.table,
          Item: { reviewId, componentType: REPORT_KEY, contentType: REPORT_CONTENT_TYPE, body: html, ttl },
        })
      );

      console.log(`Stored report for review ${reviewId} in DynamoDB`);
      return ok({
        reviewId,
        contentType: REPORT_CONTENT_TYPE,
        body: html,
        location: this.reportLocation(reviewId),
        expiresAt: ttl,
      });
    } catch (error) {
      const failure = toStorageError(error, `put ${this.table}/${reviewId}/${REPORT_KEY}`);
      console.error(`Error storing report for review ${reviewId} in DynamoDB:`, failure.message);
      return fail(failure);
    }
  }

  async getReport(reviewId: string): Promise<StorageResult<StoredReport | null>> {
    try {
      const response = await this.client.send(
        new GetCommand({
          TableName: this.table,
          Key: { reviewId, componentType: REPORT_KEY },
          ConsistentRead: true,
        })
      );
      if (!response.Item) return ok(null);

      const item = reportItemSchema.parse(response.Item);
      return ok({
        reviewId: item.reviewId,
        contentType: item.contentType,
        body: item.body,
        location: this.reportLocation(reviewId),
        expiresAt: item.ttl,
      });
    } catch (error) {
      const failure = toStorageError(error, `get ${this.table}/${reviewId}/${REPORT_KEY}`);
      console.error(`Error reading report for review ${reviewId} from DynamoDB:`, failure.message);
      return fail(failure);
    }
  }

  private reportLocation(reviewId: string): string {
    return `dynamodb://${this.table}/${reviewId}/${REPORT_KEY}`;
  }
}
