import {
  GetObjectCommand,
  ListObjectsV2Command,
  NoSuchKey,
  PutObjectCommand,
  S3Client,
} from '@aws-sdk/client-s3';
import { mockClient } from 'aws-sdk-client-mock';
import { S3StorageBackend } from '../s3.backend';
import type { JsonValue } from '../../types';
import { silenceConsole, unwrap, unwrapError } from '../../test-utils/results';

const s3Mock = mockClient(S3Client);
const objects = new Map<string, string>();
const metadata = new Map<string, Record<string, string> | undefined>();
const PAGE_SIZE = 2;

const writtenAt = new Date('2026-01-01T00:00:00.000Z');

function installBucket() {
  s3Mock.on(PutObjectCommand).callsFake((input) => {
    objects.set(input.Key ?? '', typeof input.Body === 'string' ? input.Body : '');
    metadata.set(input.Key ?? '', input.Metadata);
    return {};
  });

  s3Mock.on(GetObjectCommand).callsFake((input) => {
    const body = objects.get(input.Key ?? '');
    if (body === undefined) {
      throw new NoSuchKey({ message: 'The specified key does not exist.', $metadata: {} });
    }
    return { Body: { transformToString: async () => body }, Metadata: metadata.get(input.Key ?? '') };
  });

  // Pages of two keys so every listing over three or more objects paginates
  s3Mock.on(ListObjectsV2Command).callsFake((input) => {
    const keys = [...objects.keys()].filter((key) => key.startsWith(input.Prefix ?? '')).sort();
    const start = Number(input.ContinuationToken ?? '0');
    const end = start + PAGE_SIZE;
    return {
      Contents: keys.slice(start, end).map((Key) => ({ Key })),
      IsTruncated: end < keys.length,
      NextContinuationToken: end < keys.length ? String(end) : undefined,
    };
  });
}

function createBackend() {
  return new S3StorageBackend({
    client: new S3Client({ region: 'us-east-1' }),
    bucket: 'review-bucket',
    now: () => writtenAt,
  });
}

describe('S3StorageBackend', () => {
  beforeEach(() => {
    silenceConsole();
    objects.clear();
    metadata.clear();
    s3Mock.reset();
    installBucket();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('returns exactly the payload that was written', async () => {
    const storage = createBackend();
    const payload = { used: 80, limit: 100, queues: ['sales', 'support'], nested: { ratio: 0.8, flag: null } };

    unwrap(await storage.put('R1', 'quota', payload));
    const record = unwrap(await storage.get('R1', 'quota'));

    expect(record).toEqual({
      reviewId: 'R1',
      componentType: 'quota',
      payload,
      expiresAt: 1767225600 + 90 * 86400,
    });
  });

  it('writes to reviews/{reviewId}/{componentType}.json with encryption and a ttl', async () => {
    const storage = createBackend();

    unwrap(await storage.put('R1', 'phone', { count: 12 }));

    const [call] = s3Mock.commandCalls(PutObjectCommand);
    expect(call.args[0].input).toMatchObject({
      Bucket: 'review-bucket',
      Key: 'reviews/R1/phone.json',
      ContentType: 'application/json',
      ServerSideEncryption: 'AES256',
      Metadata: { ttl: '1775001600' },
    });
    expect(JSON.parse(objects.get('reviews/R1/phone.json') ?? '')).toEqual({
      reviewId: 'R1',
      componentType: 'phone',
      data: { count: 12 },
      ttl: 1775001600,
    });
  });

  it('returns the stored copy rather than the caller\'s object', async () => {
    const storage = createBackend();
    const payload = { queues: ['sales'] };

    const record = unwrap(await storage.put('R1', 'quota', payload));
    payload.queues.push('support');

    expect(record.payload).not.toBe(payload);
    expect(record.payload).toEqual({ queues: ['sales'] });
  });

  it.each([NaN, Infinity, -Infinity])('refuses %p instead of storing it as null', async (value) => {
    const storage = createBackend();

    const error = unwrapError(await storage.put('R1', 'metrics', { ratio: value }));

    expect(error.code).toBe('SERIALIZATION_ERROR');
    expect(s3Mock.commandCalls(PutObjectCommand)).toHaveLength(0);
  });

  it('skips an unreadable object and still returns the rest of the review', async () => {
    const storage = createBackend();
    unwrap(await storage.put('R1', 'quota', { used: 7 }));
    objects.set('reviews/R1/phone.json', '{"truncated');
    objects.set('reviews/R1/flow.json', '{"reviewId":"R1","componentType":"flow"}');

    expect(unwrap(await storage.getAll('R1'))).toEqual({ quota: { used: 7 } });
    expect(console.warn).toHaveBeenCalledWith(
      expect.stringMatching(/^Skipping unreadable result s3:\/\/review-bucket\/reviews\/R1\/phone\.json for review R1: /)
    );
  });

  it('overwrites a second write to the same key', async () => {
    const storage = createBackend();

    unwrap(await storage.put('R1', 'quota', { used: 10 }));
    unwrap(await storage.put('R1', 'quota', { used: 95 }));

    expect(unwrap(await storage.getAll('R1'))).toEqual({ quota: { used: 95 } });
  });

  it('returns null for a missing record', async () => {
    const storage = createBackend();

    expect(unwrap(await storage.get('R1', 'flow'))).toBeNull();
  });

  it('returns an empty mapping for a review with no writes', async () => {
    const storage = createBackend();

    expect(unwrap(await storage.getAll('never-written'))).toEqual({});
  });

  it('collects every component across paginated listings and skips the status document', async () => {
    const storage = createBackend();

    unwrap(await storage.put('R2', 'quota', { used: 1 }));
    unwrap(await storage.put('R2', 'metrics', { contacts: 40 }));
    unwrap(await storage.put('R2', 'logs', []));
    unwrap(await storage.putStatus('R2', { status: 'in_progress', message: 'Starting analysis' }));
    unwrap(await storage.put('R3', 'quota', { used: 99 }));
    objects.set('reviews/R2/report.html', '<html></html>');

    expect(unwrap(await storage.getAll('R2'))).toEqual({
      quota: { used: 1 },
      metrics: { contacts: 40 },
      logs: [],
    });
    expect(s3Mock.commandCalls(ListObjectsV2Command).length).toBe(3);
  });

  it('reports throttling as a retryable failure', async () => {
    s3Mock
      .on(PutObjectCommand)
      .rejects(Object.assign(new Error('Please reduce your request rate.'), { name: 'SlowDown' }));
    const storage = createBackend();

    const error = unwrapError(await storage.put('R1', 'quota', { used: 1 }));

    expect(error.code).toBe('THROTTLED');
    expect(error.retryable).toBe(true);
  });

  it('fails without writing when the payload cannot be serialized', async () => {
    const storage = createBackend();
    const circular: { [key: string]: JsonValue } = {};
    circular.self = circular;

    const error = unwrapError(await storage.put('R1', 'quota', circular));

    expect(error.code).toBe('SERIALIZATION_ERROR');
    expect(s3Mock.commandCalls(PutObjectCommand)).toHaveLength(0);
  });

  it('surfaces a listing failure as a storage error', async () => {
    s3Mock.on(ListObjectsV2Command).rejects(Object.assign(new Error('Access Denied'), { name: 'AccessDenied' }));
    const storage = createBackend();

    const error = unwrapError(await storage.getAll('R1'));

    expect(error.code).toBe('STORAGE_ERROR');
    expect(error.message).toBe('list reviews/R1/ failed: Access Denied');
  });

  it('stores and reads back the review status document', async () => {
    const storage = createBackend();

    unwrap(
      await storage.putStatus('R1', {
        status: 'completed',
        message: 'Review completed successfully',
        daysBack: 7,
        analyzers: { quota: 'succeeded', metrics: 'timed-out' },
      })
    );

    expect(unwrap(await storage.getStatus('R1'))).toEqual({
      reviewId: 'R1',
      status: 'completed',
      message: 'Review completed successfully',
      daysBack: 7,
      analyzers: { quota: 'succeeded', metrics: 'timed-out' },
      updatedAt: '2026-01-01T00:00:00.000Z',
      ttl: 1775001600,
    });
    expect(objects.has('reviews/R1/STATUS.json')).toBe(true);
  });

  it('writes the rendered report as an html object beside the results', async () => {
    const storage = createBackend();

    const stored = unwrap(await storage.putReport('R1', '<html><body>R1</body></html>'));

    expect(stored).toEqual({
      reviewId: 'R1',
      contentType: 'text/html',
      body: '<html><body>R1</body></html>',
      location: 'https://review-bucket.s3.amazonaws.com/connect-ops-review-R1.html',
      expiresAt: 1775001600,
    });
    expect(s3Mock.commandCalls(PutObjectCommand)[0].args[0].input).toMatchObject({
      Key: 'connect-ops-review-R1.html',
      ContentType: 'text/html',
      ServerSideEncryption: 'AES256',
    });
    expect(unwrap(await storage.getReport('R1'))).toEqual(stored);
    expect(unwrap(await storage.getReport('R2'))).toBeNull();
  });
});
