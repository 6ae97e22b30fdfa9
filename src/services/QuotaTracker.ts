import { IQuotaTracker } from '../interfaces/services';
import { AcquireResult } from '../types/domain';
import { ValidationError } from '../errors/DocumentClientErrors';

export type Clock = () => number;

/**
 * Fixed-window permit counter.
 *
 * Optimistic decrement, no refund: every call to tryAcquire() consumes a permit
 * whether or not it is granted. Over-quota callers push `remaining` below zero and
 * all wait for the same window boundary, after which they compete for a fresh pool.
 * tryAcquire() is synchronous, so the refill check and the decrement happen as one
 * step on the event loop.
 */
export class FixedWindowQuotaTracker implements IQuotaTracker {
  private remaining: number;
  private windowStart: number;
  private readonly capacity: number;
  private readonly windowLengthMs: number;
  private readonly now: Clock;

  constructor(capacity: number, windowLengthMs: number, now: Clock = () => Date.now()) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new ValidationError(`Request limit must be a positive integer, got ${capacity}`);
    }
    if (!Number.isFinite(windowLengthMs) || windowLengthMs <= 0) {
      throw new ValidationError(`Window length must be a positive number of milliseconds, got ${windowLengthMs}`);
    }

    this.capacity = capacity;
    this.windowLengthMs = windowLengthMs;
    this.now = now;
    this.remaining = capacity;
    this.windowStart = now();
  }

  tryAcquire(): AcquireResult {
    const now = this.now();
    this.refillIfWindowElapsed(now);

    const before = this.remaining;
    this.remaining -= 1;

    if (before > 0) {
      return { granted: true, waitMs: 0 };
    }

    const elapsed = now - this.windowStart;
    return { granted: false, waitMs: Math.max(0, this.windowLengthMs - elapsed) };
  }

  getRemainingPermits(): number {
    return Math.max(0, this.remaining);
  }

  getCapacity(): number {
    return this.capacity;
  }

  getWindowLengthMs(): number {
    return this.windowLengthMs;
  }

  private refillIfWindowElapsed(now: number): void {
    if (now - this.windowStart >= this.windowLengthMs) {
      this.remaining = this.capacity;
      this.windowStart = now;
    }
  }
}
