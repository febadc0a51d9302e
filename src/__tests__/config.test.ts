import { loadConfig } from '../config';
import { DomainError } from '../errors/domain.error';

const baseEnv = {
  CONNECT_INSTANCE_ARN: 'arn:aws:connect:us-east-1:123456789012:instance/test-instance',
  S3_REPORTING_BUCKET: 'review-bucket',
};

function configError(env: NodeJS.ProcessEnv): DomainError {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof DomainError) return error;
    throw error;
  }
  throw new Error('Expected loadConfig to fail');
}

describe('loadConfig', () => {
  it('applies defaults around the required settings', () => {
    const config = loadConfig(baseEnv);

    expect(config).toEqual({
      port: 3000,
      awsRegion: undefined,
      storage: { backend: 'object-store', bucket: 'review-bucket', table: undefined, retentionDays: 90 },
      orchestration: {
        runTimeoutMs: 840000,
        analyzerTimeoutMs: undefined,
        finishedRunTtlMs: 60000,
        defaultDaysBack: 14,
        maxDaysBack: 90,
      },
      instance: {
        instanceArn: 'arn:aws:connect:us-east-1:123456789012:instance/test-instance',
        instanceId: 'test-instance',
        awsRegion: 'us-east-1',
        accountId: '123456789012',
        partition: 'aws',
        logGroup: undefined,
      },
      analyzerFunctions: {
        quota: undefined,
        metrics: undefined,
        phone: undefined,
        flow: undefined,
        cloudtrail: undefined,
        logs: undefined,
      },
      publicBaseUrl: '',
    });
  });

  it('reads the key-value backend and numeric overrides', () => {
    const config = loadConfig({
      CONNECT_INSTANCE_ARN: baseEnv.CONNECT_INSTANCE_ARN,
      STORAGE_BACKEND: 'DynamoDB',
      RESULTS_TABLE: 'review-results',
      RETENTION_DAYS: '30',
      RUN_TIMEOUT_MS: '60000',
      ANALYZER_TIMEOUT_MS: '45000',
      FINISHED_RUN_TTL_MS: '5000',
      PORT: '8080',
      PUBLIC_BASE_URL: 'https://reviews.example.test/',
      LOG_ANALYZER_FUNCTION: 'log-analyzer',
    });

    expect(config.port).toBe(8080);
    expect(config.storage).toEqual({
      backend: 'key-value-table',
      bucket: undefined,
      table: 'review-results',
      retentionDays: 30,
    });
    expect(config.orchestration.runTimeoutMs).toBe(60000);
    expect(config.orchestration.analyzerTimeoutMs).toBe(45000);
    expect(config.orchestration.finishedRunTtlMs).toBe(5000);
    expect(config.publicBaseUrl).toBe('https://reviews.example.test');
    expect(config.analyzerFunctions.logs).toBe('log-analyzer');
  });

  it('requires the bucket for the object-store backend', () => {
    const error = configError({ CONNECT_INSTANCE_ARN: baseEnv.CONNECT_INSTANCE_ARN, STORAGE_BACKEND: 's3' });

    expect(error.code).toBe('CONFIGURATION_ERROR');
    expect(error.message).toBe(
      'Invalid configuration: S3_REPORTING_BUCKET: S3_REPORTING_BUCKET is required for the object-store backend'
    );
  });

  it('requires the table for the key-value-table backend', () => {
    const error = configError({ ...baseEnv, STORAGE_BACKEND: 'key-value-table' });

    expect(error.message).toBe(
      'Invalid configuration: RESULTS_TABLE: RESULTS_TABLE is required for the key-value-table backend'
    );
  });

  it('rejects an unknown backend', () => {
    expect(configError({ ...baseEnv, STORAGE_BACKEND: 'redis' }).message).toMatch(
      /^Invalid configuration: STORAGE_BACKEND: /
    );
  });

  it('rejects a default window larger than the maximum', () => {
    expect(configError({ ...baseEnv, DEFAULT_DAYS_BACK: '30', MAX_DAYS_BACK: '7' }).message).toBe(
      'Invalid configuration: DEFAULT_DAYS_BACK: DEFAULT_DAYS_BACK must not exceed MAX_DAYS_BACK'
    );
  });

  it('rejects a malformed instance ARN', () => {
    expect(configError({ ...baseEnv, CONNECT_INSTANCE_ARN: 'arn:aws:connect:us-east-1:123456789012:queue/x' }).message).toBe(
      'Invalid resource type in ARN: queue/x'
    );
  });
});
