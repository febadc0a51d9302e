import { ReviewRun } from '../review-run';
import { getTimeWindow } from '../../utils/time';

const createdAt = new Date('2026-01-10T08:00:00.000Z');

function createRun(expected: ConstructorParameters<typeof ReviewRun>[0]['expected'] = ['quota', 'metrics', 'phone']) {
  return new ReviewRun({ reviewId: 'R1', daysBack: 7, window: getTimeWindow(7, createdAt), createdAt, expected });
}

describe('ReviewRun', () => {
  it('starts created with every expected analyzer pending', () => {
    const run = createRun();

    expect(run.currentState).toBe('created');
    expect(run.statusMap()).toEqual({ quota: 'pending', metrics: 'pending', phone: 'pending' });
  });

  it('collapses duplicate analyzers in the expected list', () => {
    const run = createRun(['quota', 'quota', 'logs']);

    expect(run.expected).toEqual(['quota', 'logs']);
  });

  it('walks the lifecycle in order and refuses to skip a step', () => {
    const run = createRun();

    expect(() => run.markDispatched()).toThrow('Review R1 cannot move to awaiting_results from created');
    run.beginDispatch();
    expect(run.currentState).toBe('dispatching');
    run.markDispatched();
    expect(run.currentState).toBe('awaiting_results');
    expect(() => run.beginDispatch()).toThrow('Review R1 cannot move to dispatching from awaiting_results');
  });

  it('accepts the first terminal status for an analyzer and ignores repeats', () => {
    const run = createRun();

    expect(run.settle('quota', 'succeeded')).toBe(true);
    expect(run.settle('quota', 'failed', 'second signal')).toBe(false);
    expect(run.statusMap().quota).toBe('succeeded');
    expect(run.snapshot().errors).toEqual({});
  });

  it('ignores analyzers it was not expecting', () => {
    const run = createRun(['quota']);

    expect(run.settle('logs', 'succeeded')).toBe(false);
    expect(run.statusMap()).toEqual({ quota: 'pending' });
  });

  it('times out whatever is still pending when resolved and freezes afterwards', () => {
    const run = createRun();
    run.settle('quota', 'succeeded');
    run.settle('phone', 'failed', 'phone API error');

    expect(run.resolve('run-timeout', new Date('2026-01-10T08:14:00.000Z'))).toBe(true);
    expect(run.resolve('all-settled', new Date('2026-01-10T08:15:00.000Z'))).toBe(false);
    expect(run.settle('metrics', 'succeeded')).toBe(false);

    expect(run.snapshot()).toEqual({
      reviewId: 'R1',
      daysBack: 7,
      window: { start: '2026-01-03T08:00:00.000Z', end: '2026-01-10T08:00:00.000Z' },
      createdAt: '2026-01-10T08:00:00.000Z',
      state: 'resolved',
      analyzers: { quota: 'succeeded', metrics: 'timed-out', phone: 'failed' },
      errors: {
        phone: 'phone API error',
        metrics: 'Run timeout elapsed before the analyzer signalled completion',
      },
      resolvedAt: '2026-01-10T08:14:00.000Z',
      resolution: 'run-timeout',
    });
  });

  it('counts analyzers by status', () => {
    const run = createRun();
    run.settle('quota', 'succeeded');
    run.settle('metrics', 'succeeded');

    expect(run.countWhere('succeeded')).toBe(2);
    expect(run.countWhere('pending')).toBe(1);
    expect(run.countWhere('failed')).toBe(0);
  });
});
