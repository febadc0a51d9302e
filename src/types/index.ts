import { z } from 'zod';

export const COMPONENT_TYPES = ['quota', 'metrics', 'phone', 'flow', 'cloudtrail', 'logs'] as const;

export type ComponentType = (typeof COMPONENT_TYPES)[number];

export const componentTypeSchema = z.enum(COMPONENT_TYPES);

export const isComponentType = (value: string): value is ComponentType =>
  componentTypeSchema.safeParse(value).success;

// ============================================================================
// JSON payloads
// ============================================================================

const literalSchema = z.union([z.string(), z.number().finite(), z.boolean(), z.null()]);

export type JsonValue = z.infer<typeof literalSchema> | JsonValue[] | { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([literalSchema, z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

// ============================================================================
// Review runs
// ============================================================================

export type AnalyzerStatus = 'pending' | 'succeeded' | 'failed' | 'timed-out';

export type TerminalStatus = Exclude<AnalyzerStatus, 'pending'>;

export type ReviewRunState = 'created' | 'dispatching' | 'awaiting_results' | 'resolved';

export type Resolution = 'all-settled' | 'run-timeout';

export interface TimeWindow {
  start: string;
  end: string;
}

export interface InstanceContext {
  instanceArn: string;
  instanceId: string;
  awsRegion: string;
  accountId: string;
  partition: string;
  logGroup?: string;
}

export interface ReviewRunSnapshot {
  reviewId: string;
  daysBack: number;
  window: TimeWindow;
  createdAt: string;
  state: ReviewRunState;
  analyzers: Partial<Record<ComponentType, AnalyzerStatus>>;
  errors: Partial<Record<ComponentType, string>>;
  resolvedAt?: string;
  resolution?: Resolution;
}

export interface StartedReview {
  reviewId: string;
  reportUrl: string;
  analyzers: ComponentType[];
}

// ============================================================================
// Persistence
// ============================================================================

export interface ResultRecord {
  reviewId: string;
  componentType: ComponentType;
  payload: JsonValue;
  /** Unix seconds after which the backend may expire the record. */
  expiresAt: number;
}

export type ResultSet = Partial<Record<ComponentType, JsonValue>>;

export type ReviewStatus = 'in_progress' | 'completed' | 'failed';

export const analyzerStatusSchema = z.enum(['pending', 'succeeded', 'failed', 'timed-out']);

export const reviewStatusRecordSchema = z.object({
  reviewId: z.string(),
  status: z.enum(['in_progress', 'completed', 'failed']),
  message: z.string(),
  updatedAt: z.string(),
  daysBack: z.number().int().optional(),
  analyzers: z.record(componentTypeSchema, analyzerStatusSchema).optional(),
  reportLocation: z.string().optional(),
  ttl: z.number(),
});

export type ReviewStatusRecord = z.infer<typeof reviewStatusRecordSchema>;

export type ReviewStatusUpdate = Omit<ReviewStatusRecord, 'reviewId' | 'updatedAt' | 'ttl'>;

// ============================================================================
// Reports
// ============================================================================

/** The rendered report as persisted by the storage backend. */
export interface StoredReport {
  reviewId: string;
  contentType: string;
  body: string;
  /** Where the backend put it, e.g. an object URL. */
  location: string;
  expiresAt: number;
}

export type ReportSection =
  | {
      componentType: ComponentType;
      title: string;
      status: AnalyzerStatus;
      available: true;
      data: JsonValue;
    }
  | {
      componentType: ComponentType;
      title: string;
      status: AnalyzerStatus;
      available: false;
      notice: string;
    };

export interface ReviewReport {
  reviewId: string;
  generatedAt: string;
  daysBack?: number;
  sections: ReportSection[];
  warnings: string[];
}

export interface ReviewOutcome {
  reviewId: string;
  resolution: Resolution;
  status: Exclude<ReviewStatus, 'in_progress'>;
  analyzers: Partial<Record<ComponentType, AnalyzerStatus>>;
  report: ReviewReport;
  /** Location of the stored HTML report; absent when the write failed. */
  reportLocation?: string;
}
