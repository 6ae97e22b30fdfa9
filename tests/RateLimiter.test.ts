import { WindowRateLimiter } from '../src/services/RateLimiter';
import { FixedWindowQuotaTracker } from '../src/services/QuotaTracker';
import { ClientClosedError, OperationAbortedError } from '../src/errors/DocumentClientErrors';
import { createMockLogger } from './helpers/mocks';

describe('WindowRateLimiter', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  test('should run tasks immediately while permits remain', async () => {
    const limiter = new WindowRateLimiter(new FixedWindowQuotaTracker(2, 1000));

    await expect(limiter.execute(async () => 'done')).resolves.toBe('done');
    expect(limiter.getRemainingPermits()).toBe(1);
  });

  test('should hold over-quota tasks until the next window and drop none', async () => {
    const logger = createMockLogger();
    const limiter = new WindowRateLimiter(new FixedWindowQuotaTracker(2, 1000), logger);
    const started: number[] = [];
    const task = (id: number) => async () => {
      started.push(id);
      return id;
    };

    const results = Promise.all([1, 2, 3, 4, 5].map((id) => limiter.execute(task(id))));

    expect(started).toEqual([1, 2]);

    await jest.advanceTimersByTimeAsync(999);
    expect(started).toEqual([1, 2]);

    await jest.advanceTimersByTimeAsync(1);
    expect(started).toEqual([1, 2, 3, 4]);

    await jest.advanceTimersByTimeAsync(1000);
    expect(started).toEqual([1, 2, 3, 4, 5]);

    await expect(results).resolves.toEqual([1, 2, 3, 4, 5]);
    expect(logger.debug).toHaveBeenCalledWith('Rate limit reached, waiting 1000ms', { attempt: 1 });
    expect(logger.debug).toHaveBeenCalledWith('Rate limit reached, waiting 1000ms', { attempt: 2 });
  });

  test('should propagate task failures unchanged', async () => {
    const limiter = new WindowRateLimiter(new FixedWindowQuotaTracker(1, 1000));
    const failure = new Error('upstream down');

    await expect(limiter.execute(async () => { throw failure; })).rejects.toBe(failure);
  });

  test('should stop waiting when the caller aborts', async () => {
    const limiter = new WindowRateLimiter(new FixedWindowQuotaTracker(1, 1000));
    await limiter.execute(async () => 'first');

    const controller = new AbortController();
    const task = jest.fn(async () => 'second');
    const pending = limiter.execute(task, controller.signal);

    expect(jest.getTimerCount()).toBe(1);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(OperationAbortedError);
    expect(task).not.toHaveBeenCalled();
    expect(jest.getTimerCount()).toBe(0);
  });

  test('should not consume a permit for an already aborted signal', async () => {
    const tracker = new FixedWindowQuotaTracker(2, 1000);
    const limiter = new WindowRateLimiter(tracker);
    const controller = new AbortController();
    controller.abort();

    await expect(limiter.execute(async () => 'never', controller.signal)).rejects.toBeInstanceOf(OperationAbortedError);
    expect(tracker.getRemainingPermits()).toBe(2);
  });

  test('should reject with a typed abort reason unchanged', async () => {
    const limiter = new WindowRateLimiter(new FixedWindowQuotaTracker(1, 1000));
    await limiter.execute(async () => 'first');

    const controller = new AbortController();
    const closed = new ClientClosedError();
    const pending = limiter.execute(async () => 'second', controller.signal);
    controller.abort(closed);

    await expect(pending).rejects.toBe(closed);
    expect(jest.getTimerCount()).toBe(0);
  });
});
