import {
  GetObjectCommand,
  ListObjectsV2Command,
  NoSuchKey,
  PutObjectCommand,
  type S3Client,
} from '@aws-sdk/client-s3';
import { z } from 'zod';
import { DomainError } from '../errors/domain.error';
import {
  componentTypeSchema,
  isComponentType,
  jsonValueSchema,
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
  serializePayload,
  STATUS_KEY,
  toStorageError,
  type ConsistencyModel,
  type StorageBackend,
  type StorageResult,
} from './storage.backend';

const envelopeSchema = z.object({
  reviewId: z.string(),
  componentType: componentTypeSchema,
  data: jsonValueSchema,
  ttl: z.number(),
});

type Envelope = z.infer<typeof envelopeSchema>;

function parseEnvelope(body: string): Envelope {
  const envelope = envelopeSchema.safeParse(decodePayload(body));
  if (!envelope.success) {
    throw new DomainError({
      code: 'SERIALIZATION_ERROR',
      message: `Stored object is not a result envelope: ${envelope.error.issues.map((issue) => issue.message).join('; ')}`,
    });
  }
  return envelope.data;
}

export interface S3StorageOptions {
  client: S3Client;
  bucket: string;
  retentionDays?: number;
  now?: () => Date;
}

/**
 * Object-store backend. Each result is one JSON object at
 * `reviews/{reviewId}/{componentType}.json`; deletion is left to the bucket's
 * lifecycle rules, which read the `ttl` stamped in the envelope and metadata.
 */
export class S3StorageBackend implements StorageBackend {
  readonly kind = 'object-store' as const;
  readonly consistency: ConsistencyModel = { pointReads: 'strong', listReads: 'eventual' };
  readonly retentionDays: number;

  private client: S3Client;
  private bucket: string;
  private now: () => Date;

  constructor(options: S3StorageOptions) {
    this.client = options.client;
    this.bucket = options.bucket;
    this.retentionDays = options.retentionDays ?? DEFAULT_RETENTION_DAYS;
    this.now = options.now ?? (() => new Date());
  }

  static keyFor(reviewId: string, componentType: string): string {
    return `reviews/${reviewId}/${componentType}.json`;
  }

  static reportKeyFor(reviewId: string): string {
    return `connect-ops-review-${reviewId}.html`;
  }

  async put(reviewId: string, componentType: ComponentType, payload: JsonValue): Promise<StorageResult<ResultRecord>> {
    const key = S3StorageBackend.keyFor(reviewId, componentType);
    try {
      const ttl = computeExpiry(this.now(), this.retentionDays);
      const data = decodePayload(encodePayload(payload));
      const body = serializePayload({ reviewId, componentType, data, ttl });

      await this.writeObject(key, body, ttl);

      console.log(`Stored result for ${componentType} in S3: s3://${this.bucket}/${key}`);
      return ok({ reviewId, componentType, payload: data, expiresAt: ttl });
    } catch (error) {
      const failure = toStorageError(error, `put ${key}`);
      console.error(`Error storing ${componentType} result for review ${reviewId} in S3:`, failure.message);
      return fail(failure);
    }
  }

  async get(reviewId: string, componentType: ComponentType): Promise<StorageResult<ResultRecord | null>> {
    const key = S3StorageBackend.keyFor(reviewId, componentType);
    try {
      const body = await this.readObject(key);
      if (body === null) {
        console.warn(`Result not found in S3: ${componentType} for review ${reviewId}`);
        return ok(null);
      }

      const envelope = parseEnvelope(body);
      return ok({
        reviewId: envelope.reviewId,
        componentType: envelope.componentType,
        payload: envelope.data,
        expiresAt: envelope.ttl,
      });
    } catch (error) {
      const failure = toStorageError(error, `get ${key}`);
      console.error(`Error retrieving ${componentType} result for review ${reviewId} from S3:`, failure.message);
      return fail(failure);
    }
  }

  async getAll(reviewId: string): Promise<StorageResult<ResultSet>> {
    const prefix = `reviews/${reviewId}/`;
    try {
      const keys = await this.listKeys(prefix);
      const results: ResultSet = {};

      for (const key of keys) {
        const name = key.slice(prefix.length).replace(/\.json$/, '');
        // Skip non-JSON files, the status document and anything nested deeper
        if (!key.endsWith('.json') || !isComponentType(name)) continue;

        const body = await this.readObject(key);
        // Listed but gone again: treat like any other missing section
        if (body === null) continue;

        try {
          const envelope = parseEnvelope(body);
          results[envelope.componentType] = envelope.data;
        } catch (error) {
          const reason = error instanceof Error ? error.message : String(error);
          console.warn(`Skipping unreadable result s3://${this.bucket}/${key} for review ${reviewId}: ${reason}`);
        }
      }

      console.log(`Retrieved ${Object.keys(results).length} results from S3 for review ${reviewId}`);
      return ok(results);
    } catch (error) {
      const failure = toStorageError(error, `list ${prefix}`);
      console.error(`Error retrieving results for review ${reviewId} from S3:`, failure.message);
      return fail(failure);
    }
  }

  async putStatus(reviewId: string, update: ReviewStatusUpdate): Promise<StorageResult<ReviewStatusRecord>> {
    const key = S3StorageBackend.keyFor(reviewId, STATUS_KEY);
    try {
      const record: ReviewStatusRecord = {
        ...update,
        reviewId,
        updatedAt: this.now().toISOString(),
        ttl: computeExpiry(this.now(), this.retentionDays),
      };
      await this.writeObject(key, serializePayload(record), record.ttl);

      console.log(`Updated review ${reviewId} status to ${record.status}`);
      return ok(record);
    } catch (error) {
      const failure = toStorageError(error, `put ${key}`);
      console.error(`Error updating review ${reviewId} status in S3:`, failure.message);
      return fail(failure);
    }
  }

  async getStatus(reviewId: string): Promise<StorageResult<ReviewStatusRecord | null>> {
    const key = S3StorageBackend.keyFor(reviewId, STATUS_KEY);
    try {
      const body = await this.readObject(key);
      return ok(body === null ? null : reviewStatusRecordSchema.parse(JSON.parse(body)));
    } catch (error) {
      const failure = toStorageError(error, `get ${key}`);
      console.error(`Error reading review ${reviewId} status from S3:`, failure.message);
      return fail(failure);
    }
  }

  async putReport(reviewId: string, html: string): Promise<StorageResult<StoredReport>> {
    const key = S3StorageBackend.reportKeyFor(reviewId);
    try {
      const ttl = computeExpiry(this.now(), this.retentionDays);
      await this.writeObject(key, html, ttl, REPORT_CONTENT_TYPE);

      const location = `https://${this.bucket}.s3.amazonaws.com/${key}`;
      console.log(`Report generated successfully: ${location}`);
      return ok({ reviewId, contentType: REPORT_CONTENT_TYPE, body: html, location, expiresAt: ttl });
    } catch (error) {
      const failure = toStorageError(error, `put ${key}`);
      console.error(`Error storing report for review ${reviewId} in S3:`, failure.message);
      return fail(failure);
    }
  }

  async getReport(reviewId: string): Promise<StorageResult<StoredReport | null>> {
    const key = S3StorageBackend.reportKeyFor(reviewId);
    try {
      const head = await this.readObjectWithMetadata(key);
      if (!head) return ok(null);

      return ok({
        reviewId,
        contentType: REPORT_CONTENT_TYPE,
        body: head.body,
        location: `https://${this.bucket}.s3.amazonaws.com/${key}`,
        expiresAt: Number(head.ttl ?? 0),
      });
    } catch (error) {
      const failure = toStorageError(error, `get ${key}`);
      console.error(`Error reading report for review ${reviewId} from S3:`, failure.message);
      return fail(failure);
    }
  }

  private async writeObject(key: string, body: string, ttl: number, contentType = 'application/json'): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: body,
        ContentType: contentType,
        ServerSideEncryption: 'AES256',
        Metadata: { ttl: String(ttl) },
      })
    );
  }

  private async readObject(key: string): Promise<string | null> {
    const object = await this.readObjectWithMetadata(key);
    return object ? object.body : null;
  }

  private async readObjectWithMetadata(key: string): Promise<{ body: string; ttl?: string } | null> {
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
      if (!response.Body) return null;
      return { body: await response.Body.transformToString(), ttl: response.Metadata?.ttl };
    } catch (error) {
      if (error instanceof NoSuchKey || (error instanceof Error && error.name === 'NoSuchKey')) return null;
      throw error;
    }
  }

  private async listKeys(prefix: string): Promise<string[]> {
    const keys: string[] = [];
    let continuationToken: string | undefined;

    do {
      const response = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: prefix,
          ContinuationToken: continuationToken,
        })
      );
      for (const object of response.Contents ?? []) {
        if (object.Key) keys.push(object.Key);
      }
      continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
    } while (continuationToken);

    return keys;
  }
}
