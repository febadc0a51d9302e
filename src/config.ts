import { z } from 'zod';
import { DomainError } from './errors/domain.error';
import type { ComponentType, InstanceContext } from './types';
import { DEFAULT_RETENTION_DAYS } from './utils/time';
import { parseConnectInstanceArn } from './utils/instance-arn';

export type StorageBackendKind = 'object-store' | 'key-value-table';

const storageBackendSchema = z
  .enum(['object-store', 's3', 'key-value-table', 'dynamodb'])
  .default('object-store')
  .transform((value): StorageBackendKind =>
    value === 's3' || value === 'object-store' ? 'object-store' : 'key-value-table'
  );

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const envSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(3000),
    AWS_REGION: optionalString,
    STORAGE_BACKEND: z.preprocess(
      (value) => (typeof value === 'string' ? value.trim().toLowerCase() || undefined : value),
      storageBackendSchema
    ),
    S3_REPORTING_BUCKET: optionalString,
    RESULTS_TABLE: optionalString,
    RETENTION_DAYS: z.coerce.number().int().positive().default(DEFAULT_RETENTION_DAYS),
    RUN_TIMEOUT_MS: z.coerce.number().int().positive().default(840_000),
    ANALYZER_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
    FINISHED_RUN_TTL_MS: z.coerce.number().int().positive().default(60_000),
    DEFAULT_DAYS_BACK: z.coerce.number().int().positive().default(14),
    MAX_DAYS_BACK: z.coerce.number().int().positive().default(90),
    CONNECT_INSTANCE_ARN: z.string().min(1, 'CONNECT_INSTANCE_ARN is required'),
    CONNECT_CW_LOG_GROUP: optionalString,
    PUBLIC_BASE_URL: optionalString,
    QUOTA_ANALYZER_FUNCTION: optionalString,
    METRICS_ANALYZER_FUNCTION: optionalString,
    PHONE_ANALYZER_FUNCTION: optionalString,
    FLOW_ANALYZER_FUNCTION: optionalString,
    CLOUDTRAIL_ANALYZER_FUNCTION: optionalString,
    LOG_ANALYZER_FUNCTION: optionalString,
  })
  .superRefine((env, ctx) => {
    if (env.STORAGE_BACKEND === 'object-store' && !env.S3_REPORTING_BUCKET) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['S3_REPORTING_BUCKET'],
        message: 'S3_REPORTING_BUCKET is required for the object-store backend',
      });
    }
    if (env.STORAGE_BACKEND === 'key-value-table' && !env.RESULTS_TABLE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['RESULTS_TABLE'],
        message: 'RESULTS_TABLE is required for the key-value-table backend',
      });
    }
    if (env.DEFAULT_DAYS_BACK > env.MAX_DAYS_BACK) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DEFAULT_DAYS_BACK'],
        message: 'DEFAULT_DAYS_BACK must not exceed MAX_DAYS_BACK',
      });
    }
  });

export interface AppConfig {
  port: number;
  awsRegion?: string;
  storage: {
    backend: StorageBackendKind;
    bucket?: string;
    table?: string;
    retentionDays: number;
  };
  orchestration: {
    runTimeoutMs: number;
    analyzerTimeoutMs?: number;
    finishedRunTtlMs: number;
    defaultDaysBack: number;
    maxDaysBack: number;
  };
  instance: InstanceContext;
  analyzerFunctions: Partial<Record<ComponentType, string>>;
  publicBaseUrl: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new DomainError({
      code: 'CONFIGURATION_ERROR',
      message: `Invalid configuration: ${issues.join('; ')}`,
      details: { issues },
    });
  }

  const values = parsed.data;

  return {
    port: values.PORT,
    awsRegion: values.AWS_REGION,
    storage: {
      backend: values.STORAGE_BACKEND,
      bucket: values.S3_REPORTING_BUCKET,
      table: values.RESULTS_TABLE,
      retentionDays: values.RETENTION_DAYS,
    },
    orchestration: {
      runTimeoutMs: values.RUN_TIMEOUT_MS,
      analyzerTimeoutMs: values.ANALYZER_TIMEOUT_MS,
      finishedRunTtlMs: values.FINISHED_RUN_TTL_MS,
      defaultDaysBack: values.DEFAULT_DAYS_BACK,
      maxDaysBack: values.MAX_DAYS_BACK,
    },
    instance: parseConnectInstanceArn(values.CONNECT_INSTANCE_ARN, values.CONNECT_CW_LOG_GROUP),
    analyzerFunctions: {
      quota: values.QUOTA_ANALYZER_FUNCTION,
      metrics: values.METRICS_ANALYZER_FUNCTION,
      phone: values.PHONE_ANALYZER_FUNCTION,
      flow: values.FLOW_ANALYZER_FUNCTION,
      cloudtrail: values.CLOUDTRAIL_ANALYZER_FUNCTION,
      logs: values.LOG_ANALYZER_FUNCTION,
    },
    publicBaseUrl: (values.PUBLIC_BASE_URL ?? '').replace(/\/+$/, ''),
  };
}
