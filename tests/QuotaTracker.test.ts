import { FixedWindowQuotaTracker } from '../src/services/QuotaTracker';
import { ValidationError } from '../src/errors/DocumentClientErrors';

describe('FixedWindowQuotaTracker', () => {
  let now: number;
  const clock = () => now;

  beforeEach(() => {
    now = 10_000;
  });

  describe('Construction', () => {
    test.each([0, -1, 1.5, Number.NaN])('should reject capacity %p', (capacity) => {
      expect(() => new FixedWindowQuotaTracker(capacity, 1000, clock)).toThrow(ValidationError);
    });

    test('should reject a non-positive window length', () => {
      expect(() => new FixedWindowQuotaTracker(1, 0, clock)).toThrow(ValidationError);
    });

    test('should start with a full window', () => {
      const tracker = new FixedWindowQuotaTracker(3, 1000, clock);

      expect(tracker.getRemainingPermits()).toBe(3);
      expect(tracker.getCapacity()).toBe(3);
      expect(tracker.getWindowLengthMs()).toBe(1000);
    });
  });

  describe('Acquisition', () => {
    test('should grant up to capacity and then report the time left in the window', () => {
      const tracker = new FixedWindowQuotaTracker(2, 1000, clock);

      expect(tracker.tryAcquire()).toEqual({ granted: true, waitMs: 0 });
      expect(tracker.tryAcquire()).toEqual({ granted: true, waitMs: 0 });
      expect(tracker.tryAcquire()).toEqual({ granted: false, waitMs: 1000 });

      now += 400;
      expect(tracker.tryAcquire()).toEqual({ granted: false, waitMs: 600 });
    });

    test('should refill to capacity once the window has elapsed', () => {
      const tracker = new FixedWindowQuotaTracker(2, 1000, clock);
      tracker.tryAcquire();
      tracker.tryAcquire();
      tracker.tryAcquire();
      tracker.tryAcquire();
      expect(tracker.getRemainingPermits()).toBe(0);

      now += 1000;
      expect(tracker.tryAcquire()).toEqual({ granted: true, waitMs: 0 });
      expect(tracker.getRemainingPermits()).toBe(1);
    });

    test('should anchor the new window at the time of refill', () => {
      const tracker = new FixedWindowQuotaTracker(1, 1000, clock);
      tracker.tryAcquire();

      now += 1500;
      expect(tracker.tryAcquire().granted).toBe(true);

      now += 200;
      expect(tracker.tryAcquire()).toEqual({ granted: false, waitMs: 800 });
    });

    test('should not refund permits consumed by denied calls', () => {
      const tracker = new FixedWindowQuotaTracker(1, 1000, clock);
      tracker.tryAcquire();
      tracker.tryAcquire();
      tracker.tryAcquire();

      // Still inside the same window, nothing comes back
      now += 999;
      expect(tracker.tryAcquire().granted).toBe(false);
      expect(tracker.getRemainingPermits()).toBe(0);
    });

    test('should never grant more than capacity within any window', () => {
      const capacity = 3;
      const tracker = new FixedWindowQuotaTracker(capacity, 1000, clock);
      const grantsPerWindow = new Map<number, number>();

      // 25 attempts per 1000ms for five windows
      for (let step = 0; step < 125; step++) {
        now = 10_000 + step * 40;
        if (tracker.tryAcquire().granted) {
          const window = Math.floor((now - 10_000) / 1000);
          grantsPerWindow.set(window, (grantsPerWindow.get(window) ?? 0) + 1);
        }
      }

      expect(Array.from(grantsPerWindow.values())).toEqual([3, 3, 3, 3, 3]);
    });
  });
});
