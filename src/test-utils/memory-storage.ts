import { DomainError } from '../errors/domain.error';
import { fail, ok, type ConsistencyModel, type StorageBackend, type StorageResult } from '../storage/storage.backend';
import type {
  ComponentType,
  JsonValue,
  ResultRecord,
  ResultSet,
  ReviewStatusRecord,
  ReviewStatusUpdate,
  StoredReport,
} from '../types';
import { computeExpiry } from '../utils/time';

/** In-process StorageBackend for orchestrator and route tests. */
export class MemoryStorageBackend implements StorageBackend {
  readonly kind = 'key-value-table' as const;
  readonly consistency: ConsistencyModel = { pointReads: 'strong', listReads: 'strong' };
  readonly retentionDays = 90;

  readonly records = new Map<string, ResultRecord>();
  readonly statuses = new Map<string, ReviewStatusRecord[]>();
  readonly reports = new Map<string, StoredReport>();
  failPutsFor = new Set<ComponentType>();
  failReportPuts = false;
  failReads = false;

  async put(reviewId: string, componentType: ComponentType, payload: JsonValue): Promise<StorageResult<ResultRecord>> {
    if (this.failPutsFor.has(componentType)) {
      return fail(new DomainError({ code: 'THROTTLED', message: 'Rate exceeded', retryable: true }));
    }
    const record: ResultRecord = { reviewId, componentType, payload, expiresAt: computeExpiry(new Date()) };
    this.records.set(`${reviewId}/${componentType}`, record);
    return ok(record);
  }

  async get(reviewId: string, componentType: ComponentType): Promise<StorageResult<ResultRecord | null>> {
    if (this.failReads) return fail(new DomainError({ code: 'STORAGE_ERROR', message: 'read failed' }));
    return ok(this.records.get(`${reviewId}/${componentType}`) ?? null);
  }

  async getAll(reviewId: string): Promise<StorageResult<ResultSet>> {
    if (this.failReads) return fail(new DomainError({ code: 'STORAGE_ERROR', message: 'read failed' }));
    const results: ResultSet = {};
    for (const record of this.records.values()) {
      if (record.reviewId === reviewId) results[record.componentType] = record.payload;
    }
    return ok(results);
  }

  async putStatus(reviewId: string, update: ReviewStatusUpdate): Promise<StorageResult<ReviewStatusRecord>> {
    const record: ReviewStatusRecord = {
      ...update,
      reviewId,
      updatedAt: new Date().toISOString(),
      ttl: computeExpiry(new Date()),
    };
    this.statuses.set(reviewId, [...(this.statuses.get(reviewId) ?? []), record]);
    return ok(record);
  }

  async getStatus(reviewId: string): Promise<StorageResult<ReviewStatusRecord | null>> {
    if (this.failReads) return fail(new DomainError({ code: 'STORAGE_ERROR', message: 'read failed' }));
    const history = this.statuses.get(reviewId) ?? [];
    return ok(history[history.length - 1] ?? null);
  }

  async putReport(reviewId: string, html: string): Promise<StorageResult<StoredReport>> {
    if (this.failReportPuts) return fail(new DomainError({ code: 'STORAGE_ERROR', message: 'report write failed' }));
    const report: StoredReport = {
      reviewId,
      contentType: 'text/html',
      body: html,
      location: `memory://${reviewId}/report.html`,
      expiresAt: computeExpiry(new Date()),
    };
    this.reports.set(reviewId, report);
    return ok(report);
  }

  async getReport(reviewId: string): Promise<StorageResult<StoredReport | null>> {
    if (this.failReads) return fail(new DomainError({ code: 'STORAGE_ERROR', message: 'read failed' }));
    return ok(this.reports.get(reviewId) ?? null);
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}
