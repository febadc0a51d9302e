import { S3Client } from '@aws-sdk/client-s3';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import type { AppConfig } from '../config';
import { DomainError } from '../errors/domain.error';
import { DynamoDBStorageBackend } from './dynamodb.backend';
import { S3StorageBackend } from './s3.backend';
import type { StorageBackend } from './storage.backend';

export * from './storage.backend';
export { S3StorageBackend } from './s3.backend';
export { DynamoDBStorageBackend } from './dynamodb.backend';

export interface StorageClients {
  s3?: S3Client;
  dynamodb?: DynamoDBDocumentClient;
}

/**
 * Builds the one backend this deployment uses. Called once at startup; the
 * result is injected everywhere else so no call site branches on the kind.
 */
export function createStorageBackend(
  config: Pick<AppConfig, 'storage' | 'awsRegion'>,
  clients: StorageClients = {}
): StorageBackend {
  const { backend, bucket, table, retentionDays } = config.storage;

  if (backend === 'object-store') {
    if (!bucket) {
      throw new DomainError({ code: 'CONFIGURATION_ERROR', message: 'S3_REPORTING_BUCKET environment variable not set' });
    }
    const client = clients.s3 ?? new S3Client({ region: config.awsRegion });
    console.log(`Using object-store backend: s3://${bucket}`);
    return new S3StorageBackend({ client, bucket, retentionDays });
  }

  if (!table) {
    throw new DomainError({ code: 'CONFIGURATION_ERROR', message: 'RESULTS_TABLE environment variable not set' });
  }
  const client =
    clients.dynamodb ??
    DynamoDBDocumentClient.from(new DynamoDBClient({ region: config.awsRegion }), {
      marshallOptions: { removeUndefinedValues: true },
    });
  console.log(`Using key-value-table backend: ${table}`);
  return new DynamoDBStorageBackend({ client, table, retentionDays });
}
