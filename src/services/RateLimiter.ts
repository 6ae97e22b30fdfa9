import { ILogger, IQuotaTracker, IRateLimiter } from '../interfaces/services';
import { DocumentClientError, OperationAbortedError } from '../errors/DocumentClientErrors';

// Typed reasons (e.g. ClientClosedError from a closing client) are passed through as-is
function abortReason(signal: AbortSignal): DocumentClientError {
  return signal.reason instanceof DocumentClientError
    ? signal.reason
    : new OperationAbortedError('Operation was aborted while waiting for a rate limit slot', signal.reason);
}

// setTimeout that gives up early when the caller aborts
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      if (signal) reject(abortReason(signal));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Admission gate over a quota tracker. Runs the task right away when a permit is
 * granted; otherwise sleeps until the window boundary and asks the tracker again.
 * Waiters are not queued, so there is no ordering between them and no depth limit.
 */
export class WindowRateLimiter implements IRateLimiter {
  constructor(
    private readonly tracker: IQuotaTracker,
    private readonly logger?: ILogger
  ) {}

  async execute<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    let attempt = 0;

    // Loop instead of recursion so sustained contention doesn't grow the stack
    for (;;) {
      if (signal?.aborted) {
        throw abortReason(signal);
      }

      attempt += 1;
      const { granted, waitMs } = this.tracker.tryAcquire();
      if (granted) {
        return task();
      }

      this.logger?.debug(`Rate limit reached, waiting ${waitMs}ms`, { attempt });
      await sleep(waitMs, signal);
    }
  }

  getRemainingPermits(): number {
    return this.tracker.getRemainingPermits();
  }
}
