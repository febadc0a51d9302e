import type { StorageBackendKind } from '../config';
import { DomainError, isDomainError } from '../errors/domain.error';
import {
  jsonValueSchema,
  type ComponentType,
  type JsonValue,
  type ResultRecord,
  type ResultSet,
  type ReviewStatusRecord,
  type ReviewStatusUpdate,
  type StoredReport,
} from '../types';

export type StorageResult<T> = { success: true; value: T } | { success: false; error: DomainError };

/**
 * What a reader can expect right after a write.
 *
 * - `pointReads`: whether `get` observes a preceding `put` to the same key.
 * - `listReads`: whether `getAll` observes every preceding `put`. The object
 *   store only promises eventual visibility when the list runs from another
 *   execution context, so a missing section shortly after a write is staleness
 *   rather than an error.
 */
export interface ConsistencyModel {
  pointReads: 'strong' | 'eventual';
  listReads: 'strong' | 'eventual';
}

/**
 * Persistence for analyzer results, keyed by (reviewId, componentType).
 *
 * Implementations never throw from these methods; every failure is returned
 * as `{ success: false }` with a DomainError. Records are never deleted here:
 * each write stamps an expiry marker and the backend expires it natively.
 */
export interface StorageBackend {
  readonly kind: StorageBackendKind;
  readonly consistency: ConsistencyModel;
  readonly retentionDays: number;

  put(reviewId: string, componentType: ComponentType, payload: JsonValue): Promise<StorageResult<ResultRecord>>;
  get(reviewId: string, componentType: ComponentType): Promise<StorageResult<ResultRecord | null>>;
  getAll(reviewId: string): Promise<StorageResult<ResultSet>>;

  putStatus(reviewId: string, update: ReviewStatusUpdate): Promise<StorageResult<ReviewStatusRecord>>;
  getStatus(reviewId: string): Promise<StorageResult<ReviewStatusRecord | null>>;

  /** Stores the rendered HTML report; one per review, overwritten on re-render. */
  putReport(reviewId: string, html: string): Promise<StorageResult<StoredReport>>;
  getReport(reviewId: string): Promise<StorageResult<StoredReport | null>>;
}

/** Reserved componentType slot for the per-review status document. */
export const STATUS_KEY = 'STATUS';

/** Reserved componentType slot for the rendered report in the key-value table. */
export const REPORT_KEY = 'REPORT';

export const REPORT_CONTENT_TYPE = 'text/html';

const THROTTLING_ERROR_NAMES = new Set([
  'ThrottlingException',
  'Throttling',
  'ProvisionedThroughputExceededException',
  'RequestLimitExceeded',
  'SlowDown',
  'TooManyRequestsException',
]);

export function serializePayload(payload: unknown): string {
  let body: string | undefined;
  try {
    body = JSON.stringify(payload);
  } catch (error) {
    throw new DomainError({
      code: 'SERIALIZATION_ERROR',
      message: `Payload is not serializable: ${error instanceof Error ? error.message : String(error)}`,
      cause: error,
    });
  }
  if (body === undefined) {
    throw new DomainError({
      code: 'SERIALIZATION_ERROR',
      message: 'Payload is not serializable: no JSON representation',
    });
  }
  return body;
}

const describeIssues = (issues: { path: (string | number)[]; message: string }[]) =>
  issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)).join('; ');

/**
 * Serializes an analyzer payload, refusing values JSON cannot carry
 * (non-finite numbers, cycles) instead of letting them collapse to null.
 */
export function encodePayload(payload: JsonValue): string {
  const body = serializePayload(payload);

  const checked = jsonValueSchema.safeParse(payload);
  if (!checked.success) {
    throw new DomainError({
      code: 'SERIALIZATION_ERROR',
      message: `Payload is not serializable: ${describeIssues(checked.error.issues)}`,
      details: { issues: checked.error.issues.length },
    });
  }
  return body;
}

export function decodePayload(body: string): JsonValue {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    throw new DomainError({
      code: 'SERIALIZATION_ERROR',
      message: `Stored payload is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      cause: error,
    });
  }

  const checked = jsonValueSchema.safeParse(parsed);
  if (!checked.success) {
    throw new DomainError({
      code: 'SERIALIZATION_ERROR',
      message: `Stored payload is not a JSON value: ${describeIssues(checked.error.issues)}`,
    });
  }
  return checked.data;
}

export function toStorageError(error: unknown, operation: string): DomainError {
  if (isDomainError(error)) return error;

  const name = error instanceof Error ? error.name : '';
  const message = error instanceof Error ? error.message : String(error);

  if (THROTTLING_ERROR_NAMES.has(name)) {
    return new DomainError({
      code: 'THROTTLED',
      message: `${operation} was throttled: ${message}`,
      retryable: true,
      details: { operation, errorName: name },
      cause: error,
    });
  }

  return new DomainError({
    code: 'STORAGE_ERROR',
    message: `${operation} failed: ${message}`,
    details: { operation, errorName: name || undefined },
    cause: error,
  });
}

export const ok = <T>(value: T): StorageResult<T> => ({ success: true, value });

export const fail = <T>(error: DomainError): StorageResult<T> => ({ success: false, error });
