import type {
  AnalyzerStatus,
  ComponentType,
  Resolution,
  ReviewRunSnapshot,
  ReviewRunState,
  TerminalStatus,
  TimeWindow,
} from '../types';

/**
 * In-memory state of one review run.
 *
 * Every mutation is a synchronous method, so each completion is applied as a
 * single step on the event loop; only the orchestrator's completion handler
 * calls them. Once resolved, the status map is frozen.
 */
export class ReviewRun {
  readonly reviewId: string;
  readonly daysBack: number;
  readonly window: TimeWindow;
  readonly createdAt: Date;
  readonly expected: readonly ComponentType[];

  private state: ReviewRunState = 'created';
  private statuses = new Map<ComponentType, AnalyzerStatus>();
  private errors = new Map<ComponentType, string>();
  private resolvedAt?: Date;
  private resolution?: Resolution;

  constructor(args: {
    reviewId: string;
    daysBack: number;
    window: TimeWindow;
    createdAt: Date;
    expected: readonly ComponentType[];
  }) {
    this.reviewId = args.reviewId;
    this.daysBack = args.daysBack;
    this.window = args.window;
    this.createdAt = args.createdAt;
    this.expected = [...new Set(args.expected)];

    for (const componentType of this.expected) {
      this.statuses.set(componentType, 'pending');
    }
  }

  get currentState(): ReviewRunState {
    return this.state;
  }

  get isResolved(): boolean {
    return this.state === 'resolved';
  }

  beginDispatch(): void {
    this.transition('created', 'dispatching');
  }

  markDispatched(): void {
    this.transition('dispatching', 'awaiting_results');
  }

  /**
   * Records a terminal status for one analyzer. Returns false, leaving the map
   * untouched, when the run is already resolved, the analyzer is not expected,
   * or it already reached a terminal status.
   */
  settle(componentType: ComponentType, status: TerminalStatus, error?: string): boolean {
    if (this.state === 'resolved') return false;
    if (this.statuses.get(componentType) !== 'pending') return false;

    this.statuses.set(componentType, status);
    if (error) this.errors.set(componentType, error);
    return true;
  }

  /**
   * Moves the run to `resolved`, marking anything still pending as timed out.
   * Returns false if the run was already resolved.
   */
  resolve(resolution: Resolution, at: Date): boolean {
    if (this.state === 'resolved') return false;

    for (const [componentType, status] of this.statuses) {
      if (status === 'pending') {
        this.statuses.set(componentType, 'timed-out');
        this.errors.set(componentType, 'Run timeout elapsed before the analyzer signalled completion');
      }
    }

    this.state = 'resolved';
    this.resolution = resolution;
    this.resolvedAt = at;
    return true;
  }

  statusMap(): Partial<Record<ComponentType, AnalyzerStatus>> {
    return Object.fromEntries(this.statuses);
  }

  countWhere(status: AnalyzerStatus): number {
    let count = 0;
    for (const value of this.statuses.values()) {
      if (value === status) count++;
    }
    return count;
  }

  snapshot(): ReviewRunSnapshot {
    return {
      reviewId: this.reviewId,
      daysBack: this.daysBack,
      window: this.window,
      createdAt: this.createdAt.toISOString(),
      state: this.state,
      analyzers: this.statusMap(),
      errors: Object.fromEntries(this.errors),
      resolvedAt: this.resolvedAt?.toISOString(),
      resolution: this.resolution,
    };
  }

  private transition(from: ReviewRunState, to: ReviewRunState): void {
    if (this.state !== from) {
      throw new Error(`Review ${this.reviewId} cannot move to ${to} from ${this.state}`);
    }
    this.state = to;
  }
}
