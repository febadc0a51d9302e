import { z } from 'zod';
import type { AnalyzerInput, AnalyzerSignal } from '../analyzers/analyzer';
import { DomainError } from '../errors/domain.error';
import type { StorageBackend } from '../storage/storage.backend';
import type {
  ComponentType,
  InstanceContext,
  Resolution,
  ReviewOutcome,
  ReviewRunSnapshot,
  StartedReview,
  TerminalStatus,
} from '../types';
import { COMPONENT_TYPES } from '../types';
import { generateReviewId } from '../utils/review-id';
import { getTimeWindow } from '../utils/time';
import type { AnalyzerInvoker } from './invoker.service';
import type { ReportService } from './report.service';
import { ReviewRun } from './review-run';

export interface OrchestratorOptions {
  storage: StorageBackend;
  invoker: AnalyzerInvoker;
  reports: ReportService;
  instanceContext: InstanceContext;
  analyzers?: readonly ComponentType[];
  runTimeoutMs: number;
  analyzerTimeoutMs?: number;
  maxDaysBack: number;
  publicBaseUrl?: string;
  /** How long a finalized run stays in memory before status is served from storage. */
  finishedRunTtlMs?: number;
  now?: () => Date;
  generateId?: (now: Date) => string;
}

export const DEFAULT_FINISHED_RUN_TTL_MS = 60_000;

interface TrackedRun {
  run: ReviewRun;
  resolved: Promise<Resolution>;
  finalizing?: Promise<ReviewOutcome>;
}

/**
 * Fans a review out to every analyzer, waits (with a deadline) for each one
 * to signal, then hands the final status map to the report stage exactly
 * once.
 *
 * The deadline only stops the waiting. An analyzer still running when it
 * fires keeps going and may write its result after the report is built;
 * a new review is the remedy for that, not reconciliation.
 */
export class OrchestratorService {
  private storage: StorageBackend;
  private invoker: AnalyzerInvoker;
  private reports: ReportService;
  private instanceContext: InstanceContext;
  private analyzers: readonly ComponentType[];
  private runTimeoutMs: number;
  private analyzerTimeoutMs?: number;
  private daysBackSchema: z.ZodNumber;
  private publicBaseUrl: string;
  private now: () => Date;
  private generateId: (now: Date) => string;
  private finishedRunTtlMs: number;
  private runs = new Map<string, TrackedRun>();

  constructor(options: OrchestratorOptions) {
    this.storage = options.storage;
    this.invoker = options.invoker;
    this.reports = options.reports;
    this.instanceContext = options.instanceContext;
    this.analyzers = options.analyzers ?? COMPONENT_TYPES;
    this.runTimeoutMs = options.runTimeoutMs;
    this.analyzerTimeoutMs = options.analyzerTimeoutMs;
    this.daysBackSchema = z
      .number({ invalid_type_error: 'daysBack must be a number', required_error: 'daysBack is required' })
      .int('daysBack must be an integer')
      .positive('daysBack must be positive')
      .max(options.maxDaysBack, `daysBack must be at most ${options.maxDaysBack}`);
    this.publicBaseUrl = options.publicBaseUrl ?? '';
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? generateReviewId;
    this.finishedRunTtlMs = options.finishedRunTtlMs ?? DEFAULT_FINISHED_RUN_TTL_MS;
  }

  reportUrlFor(reviewId: string): string {
    return `${this.publicBaseUrl}/api/reviews/${reviewId}/report`;
  }

  async startReview(daysBack: unknown): Promise<StartedReview> {
    const parsed = this.daysBackSchema.safeParse(daysBack);
    if (!parsed.success) {
      throw new DomainError({
        code: 'VALIDATION_ERROR',
        message: parsed.error.issues.map((issue) => issue.message).join('; '),
        details: { daysBack },
      });
    }

    const createdAt = this.now();
    const reviewId = this.allocateId(createdAt);
    const run = new ReviewRun({
      reviewId,
      daysBack: parsed.data,
      window: getTimeWindow(parsed.data, createdAt),
      createdAt,
      expected: this.analyzers,
    });

    console.log(`Starting review ${reviewId} covering the last ${run.daysBack} days`);

    const status = await this.storage.putStatus(reviewId, {
      status: 'in_progress',
      message: 'Starting analysis',
      daysBack: run.daysBack,
    });
    if (!status.success) {
      console.warn(`Review ${reviewId}: could not record in_progress status: ${status.error.message}`);
    }

    this.runs.set(reviewId, { run, resolved: this.dispatchAll(run) });

    this.waitForCompletion(reviewId)
      .catch((error: unknown) => {
        console.error(`Review ${reviewId} finalization failed:`, error);
      })
      .finally(() => this.scheduleEviction(reviewId));

    return {
      reviewId,
      reportUrl: this.reportUrlFor(reviewId),
      analyzers: [...run.expected],
    };
  }

  getRun(reviewId: string): ReviewRunSnapshot | null {
    return this.runs.get(reviewId)?.run.snapshot() ?? null;
  }

  /** Resolves with the finalized outcome of a run started by this process. */
  waitForCompletion(reviewId: string): Promise<ReviewOutcome> {
    const tracked = this.runs.get(reviewId);
    if (!tracked) {
      return Promise.reject(new DomainError({ code: 'NOT_FOUND', message: `Review ${reviewId} not found` }));
    }
    return tracked.resolved.then(() => this.finalizeReview(reviewId));
  }

  /**
   * Assembles the report for a resolved run and records the final status.
   * The first call does the work; every later call gets the same outcome.
   */
  finalizeReview(reviewId: string): Promise<ReviewOutcome> {
    const tracked = this.runs.get(reviewId);
    if (!tracked) {
      return Promise.reject(new DomainError({ code: 'NOT_FOUND', message: `Review ${reviewId} not found` }));
    }
    if (!tracked.run.isResolved) {
      return Promise.reject(
        new DomainError({
          code: 'VALIDATION_ERROR',
          message: `Review ${reviewId} is still ${tracked.run.currentState}`,
        })
      );
    }

    // Memoized before the first await so racing callers share one finalization
    if (!tracked.finalizing) {
      tracked.finalizing = this.buildOutcome(tracked.run);
    }
    return tracked.finalizing;
  }

  /** Drops a finished run from memory; the stored status record answers for it afterwards. */
  private scheduleEviction(reviewId: string): void {
    const timer = setTimeout(() => {
      this.runs.delete(reviewId);
      console.log(`Review ${reviewId} evicted from memory`);
    }, this.finishedRunTtlMs);
    timer.unref();
  }

  private allocateId(createdAt: Date): string {
    let reviewId = this.generateId(createdAt);
    // Only reachable with a custom generator; the default one carries 64 random bits
    while (this.runs.has(reviewId)) {
      reviewId = this.generateId(createdAt);
    }
    return reviewId;
  }

  /**
   * Dispatches every analyzer without waiting on any of them, then resolves
   * once all have signalled or the run deadline fires, whichever is first.
   */
  private async dispatchAll(run: ReviewRun): Promise<Resolution> {
    run.beginDispatch();

    const input: AnalyzerInput = {
      reviewId: run.reviewId,
      daysBack: run.daysBack,
      instanceContext: this.instanceContext,
    };

    console.log(`Invoking ${run.expected.length} analyzers in parallel for review ${run.reviewId}`);

    const completions = run.expected.map((componentType) =>
      this.track(componentType, input).then((result) =>
        this.handleCompletion(run, componentType, result.status, result.error)
      )
    );

    run.markDispatched();

    let deadline: NodeJS.Timeout | undefined;
    const timeout = new Promise<Resolution>((resolve) => {
      deadline = setTimeout(() => resolve('run-timeout'), this.runTimeoutMs);
    });

    const resolution = await Promise.race([
      Promise.all(completions).then((): Resolution => 'all-settled'),
      timeout,
    ]);
    clearTimeout(deadline);

    if (resolution === 'run-timeout') {
      console.warn(`Review ${run.reviewId}: run timeout of ${this.runTimeoutMs}ms elapsed`);
    }

    run.resolve(resolution, this.now());
    console.log(
      `Review ${run.reviewId} resolved (${resolution}): ${run.countWhere('succeeded')} succeeded, ` +
        `${run.countWhere('failed')} failed, ${run.countWhere('timed-out')} timed out`
    );

    return resolution;
  }

  /** Observes one invocation; never rejects. */
  private track(
    componentType: ComponentType,
    input: AnalyzerInput
  ): Promise<{ status: TerminalStatus; error?: string }> {
    const invocation = this.invoker
      .invoke(componentType, input)
      .then((signal: AnalyzerSignal): { status: TerminalStatus; error?: string } =>
        signal.success ? { status: 'succeeded' } : { status: 'failed', error: signal.error }
      )
      .catch((error: unknown) => ({
        status: 'failed' as const,
        error: error instanceof Error ? error.message : String(error),
      }));

    if (this.analyzerTimeoutMs === undefined) return invocation;

    const timeoutMs = this.analyzerTimeoutMs;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<{ status: TerminalStatus; error?: string }>((resolve) => {
      timer = setTimeout(
        () => resolve({ status: 'timed-out', error: `Analyzer ${componentType} timed out after ${timeoutMs}ms` }),
        timeoutMs
      );
    });

    return Promise.race([invocation, timeout]).finally(() => clearTimeout(timer));
  }

  private handleCompletion(run: ReviewRun, componentType: ComponentType, status: TerminalStatus, error?: string) {
    const accepted = run.settle(componentType, status, error);

    if (!accepted) {
      console.warn(`Review ${run.reviewId}: discarding late ${status} signal from ${componentType}`);
      return;
    }

    if (status === 'succeeded') {
      console.log(`Analyzer ${componentType} completed successfully for review ${run.reviewId}`);
    } else {
      console.error(`Analyzer ${componentType} ${status} for review ${run.reviewId}: ${error ?? 'no details'}`);
    }
  }

  private async buildOutcome(run: ReviewRun): Promise<ReviewOutcome> {
    const analyzers = run.statusMap();
    const snapshot = run.snapshot();
    const resolution = snapshot.resolution ?? 'all-settled';

    const report = await this.reports.assemble({
      reviewId: run.reviewId,
      analyzers,
      daysBack: run.daysBack,
    });

    const succeeded = run.countWhere('succeeded');
    const status = succeeded > 0 ? 'completed' : 'failed';
    const failures = Object.entries(snapshot.errors).map(([name, message]) => `${name}: ${message}`);
    const message =
      status === 'completed'
        ? failures.length > 0
          ? `Review completed with ${failures.length} unavailable analyzer(s): ${failures.join('; ')}`
          : 'Review completed successfully'
        : `All analyzers failed: ${failures.join('; ')}`;

    const stored = await this.storage.putReport(run.reviewId, this.reports.render(report, 'html'));
    const reportLocation = stored.success ? stored.value.location : undefined;
    if (!stored.success) {
      console.error(`Review ${run.reviewId}: could not store report: ${stored.error.message}`);
    }

    const recorded = await this.storage.putStatus(run.reviewId, {
      status,
      message,
      daysBack: run.daysBack,
      analyzers,
      reportLocation,
    });
    if (!recorded.success) {
      console.error(`Review ${run.reviewId}: could not record final status: ${recorded.error.message}`);
    }

    console.log(`Review ${run.reviewId} finalized as ${status}`);

    return { reviewId: run.reviewId, resolution, status, analyzers, report, reportLocation };
  }
}
